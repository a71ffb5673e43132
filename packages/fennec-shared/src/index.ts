import type { Meta } from '@fennec/ast';

export type CompileErrorKind =
  | 'ArityMismatch'
  | 'InvalidCaptureArity'
  | 'InvalidCaptureShape'
  | 'BlockInCapture'
  | 'BareCaptureDigit'
  | 'NonPositivePlaceholder'
  | 'NestedCapture'
  | 'GapInPlaceholders'
  | 'UnsupportedConstruct'
  | 'InvalidForm'
  | 'UndefinedVariable';

export class CompileError extends Error {
  constructor(
    public readonly kind: CompileErrorKind,
    message: string,
    public readonly file: string,
    public readonly line: number,
  ) {
    super(message);
    this.name = 'CompileError';
  }

  format(): string {
    return `${this.file}:${this.line}: ${this.message}`;
  }
}

/** Aborts the current unit. */
export function compileError(kind: CompileErrorKind, meta: Meta, file: string, message: string): never {
  throw new CompileError(kind, message, file, meta.line ?? 0);
}

export type WarningKind = 'UnderscoredPin' | 'UnsafePin';

export type Warning = {
  kind: WarningKind;
  message: string;
  file: string;
  line: number;
};

export type Logger = (msg: string) => void;

export function defaultLogger(stage: string): Logger {
  return (msg: string) => console.log(`[fennec:${stage}] ${msg}`);
}

export function formatWarning(w: Warning): string {
  return `warning: ${w.file}:${w.line}: ${w.message}`;
}

export function warningSink(logger: Logger = defaultLogger('warning')): (w: Warning) => void {
  return (w) => logger(formatWarning(w));
}
