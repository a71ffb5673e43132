// Chevrotain lexer tokens for the quoted-term notation.
// The lexer takes the first matching token, so order in AllTokens matters.
import { createToken, Lexer } from 'chevrotain';

export const WhiteSpace = createToken({ name: 'WhiteSpace', pattern: /[ \t\r\n]+/, group: Lexer.SKIPPED });
export const Comment = createToken({ name: 'Comment', pattern: /#[^\n]*/, group: 'comments' });
export const LBrace = createToken({ name: 'LBrace', pattern: /\{/ });
export const RBrace = createToken({ name: 'RBrace', pattern: /\}/ });
export const LBracket = createToken({ name: 'LBracket', pattern: /\[/ });
export const RBracket = createToken({ name: 'RBracket', pattern: /\]/ });
export const Comma = createToken({ name: 'Comma', pattern: /,/ });

// `:foo`, `:"Elixir.Foo"` and operator atoms such as `:->`, `:%{}`, `:<<>>`
export const AtomLiteral = createToken({
  name: 'AtomLiteral',
  pattern: /:(?:"(?:\\.|[^"\\])*"|[A-Za-z_][A-Za-z0-9_?!@]*|<<>>|%\{\}|\{\}|\.\.|->|::|===|!==|==|!=|<=|>=|&&|\|\||<>|\+\+|--|\|>|=~|\\\\|[=.&%+\-*\/|^<>!@])/,
});

// `line:` inside keyword lists
export const KeywordKey = createToken({ name: 'KeywordKey', pattern: /[a-z_][A-Za-z0-9_?!]*:/ });
export const Alias = createToken({ name: 'Alias', pattern: /[A-Z][A-Za-z0-9_]*(?:\.[A-Z][A-Za-z0-9_]*)*/ });
export const Identifier = createToken({ name: 'Identifier', pattern: /[a-z_][A-Za-z0-9_?!]*/ });

export const FloatLiteral = createToken({ name: 'FloatLiteral', pattern: /-?\d+(?:_\d+)*\.\d+(?:[eE][+-]?\d+)?/ });
export const IntegerLiteral = createToken({ name: 'IntegerLiteral', pattern: /-?\d+(?:_\d+)*/ });
export const StringLiteral = createToken({ name: 'StringLiteral', pattern: /"(?:\\.|[^"\\])*"/ });

export const AllTokens = [
  WhiteSpace,
  Comment,
  LBrace, RBrace, LBracket, RBracket, Comma,
  AtomLiteral,
  KeywordKey,
  Alias,
  Identifier,
  FloatLiteral, IntegerLiteral,
  StringLiteral,
];

export const TermLexer = new Lexer(AllTokens);
