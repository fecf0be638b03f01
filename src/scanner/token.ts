/**
 * Token definitions shared by the lexer, scanner and parsers.
 */

/**
 * Token classifications produced by the lexer.
 */
export const enum TokenType {
  /** `&` opening a group */
  GroupStart = "group_start",
  /** `$` opening (or, inside a group, closing) a group */
  GroupStartAlt = "group_start_alt",
  /** `/` closing a group */
  GroupEnd = "group_end",
  Assign = "assign",
  Comma = "comma",
  LeftParen = "left_paren",
  RightParen = "right_paren",
  Colon = "colon",
  /** `%` derived type component separator */
  Percent = "percent",
  Plus = "plus",
  Minus = "minus",
  /** `*` in repeat expressions */
  Star = "star",
  Identifier = "identifier",
  Integer = "integer",
  Real = "real",
  Complex = "complex",
  Logical = "logical",
  String = "string",
  Comment = "comment",
  Whitespace = "whitespace",
  Eof = "eof",
  Invalid = "invalid",
}

/**
 * A single lexeme with its 1-based source position.
 */
export interface Token {
  readonly type: TokenType;
  readonly lexeme: string;
  readonly line: number;
  readonly column: number;
}

export function createToken(
  type: TokenType,
  lexeme: string,
  line: number,
  column: number
): Token {
  return { type, lexeme, line, column };
}

/**
 * Whitespace and comments carry no meaning for the structural parser.
 */
export function isTrivia(token: Token): boolean {
  return token.type === TokenType.Whitespace || token.type === TokenType.Comment;
}

export function isLiteral(token: Token): boolean {
  switch (token.type) {
    case TokenType.Integer:
    case TokenType.Real:
    case TokenType.Complex:
    case TokenType.Logical:
    case TokenType.String:
      return true;
    default:
      return false;
  }
}

const NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * True for tokens usable as a group or variable name.
 *
 * Single letters `t` and `f` lex as logicals, yet are legal variable
 * names when an assignment follows them.
 */
export function isNameToken(token: Token): boolean {
  if (token.type === TokenType.Identifier) {
    return NAME_PATTERN.test(token.lexeme);
  }
  return token.type === TokenType.Logical && NAME_PATTERN.test(token.lexeme);
}

/**
 * Render a token for diagnostics.
 */
export function describeToken(token: Token): string {
  if (token.type === TokenType.Eof) {
    return "end of input";
  }
  return `${token.type} '${token.lexeme}' at line ${token.line}, column ${token.column}`;
}
