/**
 * Character-level lexer for namelist text.
 *
 * Produces one token per call from a cursor over the whole input.
 * Whitespace runs and comments become tokens of their own so that the
 * structural and the format-preserving scans share one lexer.
 */

import { ParseError } from "../core/errors.js";
import { TokenType, createToken, type Token } from "./token.js";

export interface ScanOptions {
  /** Characters that start a comment running to end of line */
  commentChars: readonly string[];
  /** Let bare identifiers absorb quote characters (`it's`) */
  nonDelimitedStrings: boolean;
}

export const DEFAULT_SCAN_OPTIONS: Readonly<ScanOptions> = Object.freeze({
  commentChars: Object.freeze(["!", "#"]),
  nonDelimitedStrings: true,
});

export function resolveScanOptions(options: Partial<ScanOptions> = {}): ScanOptions {
  return { ...DEFAULT_SCAN_OPTIONS, ...options };
}

// ============================================================================
// Character classes
// ============================================================================

const WHITESPACE = /^\s$/u;
const LETTER = /^\p{L}$/u;
const ALPHANUMERIC = /^[\p{L}\p{N}]$/u;

function isDigit(c: string | undefined): boolean {
  return c !== undefined && c >= "0" && c <= "9";
}

function isLetter(c: string | undefined): boolean {
  return c !== undefined && LETTER.test(c);
}

function isAlphanumeric(c: string | undefined): boolean {
  return c !== undefined && ALPHANUMERIC.test(c);
}

function isExponentMarker(c: string | undefined): boolean {
  return c === "e" || c === "E" || c === "d" || c === "D";
}

function isQuote(c: string | undefined): boolean {
  return c === "'" || c === '"';
}

const PUNCTUATION: Readonly<Record<string, TokenType>> = {
  "&": TokenType.GroupStart,
  $: TokenType.GroupStartAlt,
  "/": TokenType.GroupEnd,
  "=": TokenType.Assign,
  ",": TokenType.Comma,
  "(": TokenType.LeftParen,
  ")": TokenType.RightParen,
  ":": TokenType.Colon,
  "%": TokenType.Percent,
  "*": TokenType.Star,
};

// ============================================================================
// Lexer
// ============================================================================

export class Lexer {
  private readonly chars: string[];
  private readonly options: ScanOptions;
  private cursor = 0;
  private line = 1;
  private column = 1;

  constructor(input: string, options: Partial<ScanOptions> = {}) {
    // Code points, so columns count characters rather than UTF-16 units
    this.chars = Array.from(input);
    this.options = resolveScanOptions(options);
  }

  hasMore(): boolean {
    return this.cursor < this.chars.length;
  }

  getPosition(): { offset: number; line: number; column: number } {
    return { offset: this.cursor, line: this.line, column: this.column };
  }

  reset(): void {
    this.cursor = 0;
    this.line = 1;
    this.column = 1;
  }

  /**
   * Produce the next token; returns an Eof token once input is exhausted.
   */
  nextToken(): Token {
    const line = this.line;
    const column = this.column;
    const start = this.cursor;

    const c = this.peek();
    if (c === undefined) {
      return createToken(TokenType.Eof, "", line, column);
    }

    const type = this.scan(c, line, column);
    return createToken(type, this.chars.slice(start, this.cursor).join(""), line, column);
  }

  private scan(c: string, line: number, column: number): TokenType {
    if (WHITESPACE.test(c)) {
      for (let ch = this.peek(); ch !== undefined && WHITESPACE.test(ch); ch = this.peek()) {
        this.advance();
      }
      return TokenType.Whitespace;
    }

    if (this.options.commentChars.includes(c)) {
      while (this.peek() !== undefined && this.peek() !== "\n") {
        this.advance();
      }
      return TokenType.Comment;
    }

    const punctuation = PUNCTUATION[c];
    if (punctuation !== undefined) {
      this.advance();
      return punctuation;
    }

    if (c === "+" || c === "-") return this.scanSigned(line, column);
    if (c === ".") return this.scanDot(line, column);
    if (isQuote(c)) return this.scanString(c, line, column);
    if (isDigit(c)) return this.scanNumber(line, column);
    if (isLetter(c) || c === "_") return this.scanIdentifier();

    this.advance();
    return TokenType.Invalid;
  }

  /**
   * `+`/`-` start a signed number, a signed word such as `-inf`, or
   * stand alone as an operator.
   */
  private scanSigned(line: number, column: number): TokenType {
    const sign = this.advance();
    const next = this.peek();

    if (isDigit(next) || (next === "." && isDigit(this.peek(1)))) {
      return this.scanNumber(line, column);
    }
    if (isLetter(next)) {
      this.consumeIdentifierRest();
      return TokenType.Identifier;
    }
    return sign === "+" ? TokenType.Plus : TokenType.Minus;
  }

  /**
   * `.5` is a real, `.true.` a logical, `.eq.` an identifier.
   */
  private scanDot(line: number, column: number): TokenType {
    const next = this.peek(1);
    if (isDigit(next)) {
      return this.scanNumber(line, column);
    }
    if (isLetter(next)) {
      const start = this.cursor;
      this.advance();
      while (isAlphanumeric(this.peek()) || this.peek() === "_") {
        this.advance();
      }
      if (this.peek() === ".") {
        this.advance();
      }
      const word = this.chars.slice(start, this.cursor).join("").toLowerCase();
      return word.startsWith(".t") || word.startsWith(".f")
        ? TokenType.Logical
        : TokenType.Identifier;
    }
    this.advance();
    return TokenType.Invalid;
  }

  /**
   * Digits, optional fraction, optional exponent, optional kind suffix.
   * Any of the last three makes the literal a Real.
   */
  private scanNumber(line: number, column: number): TokenType {
    let real = false;
    this.consumeDigits();

    if (this.peek() === ".") {
      const after = this.peek(1);
      // In `1.and.` the dot belongs to the word that follows
      if (!isLetter(after) || isExponentMarker(after)) {
        this.advance();
        this.consumeDigits();
        real = true;
      }
    }

    if (isExponentMarker(this.peek())) {
      this.advance();
      if (this.peek() === "+" || this.peek() === "-") {
        this.advance();
      }
      if (!isDigit(this.peek())) {
        throw new ParseError("Invalid exponent in number", line, column);
      }
      this.consumeDigits();
      real = true;
    }

    if (this.peek() === "_" && isAlphanumeric(this.peek(1))) {
      this.advance();
      while (isAlphanumeric(this.peek()) || this.peek() === "_") {
        this.advance();
      }
      real = true;
    }

    return real ? TokenType.Real : TokenType.Integer;
  }

  private scanString(quote: string, line: number, column: number): TokenType {
    this.advance();
    for (;;) {
      const c = this.peek();
      if (c === undefined || c === "\n") {
        throw new ParseError("Unterminated string literal", line, column);
      }
      this.advance();
      if (c === quote) {
        if (this.peek() === quote) {
          this.advance();
          continue;
        }
        return TokenType.String;
      }
    }
  }

  private scanIdentifier(): TokenType {
    const start = this.cursor;
    this.advance();
    this.consumeIdentifierRest();
    const word = this.chars.slice(start, this.cursor).join("").toLowerCase();
    if (word === "true" || word === "t" || word === "false" || word === "f") {
      return TokenType.Logical;
    }
    return TokenType.Identifier;
  }

  private consumeIdentifierRest(): void {
    for (;;) {
      const c = this.peek();
      if (
        isAlphanumeric(c) ||
        c === "_" ||
        (this.options.nonDelimitedStrings && isQuote(c))
      ) {
        this.advance();
      } else {
        return;
      }
    }
  }

  private consumeDigits(): void {
    while (isDigit(this.peek())) {
      this.advance();
    }
  }

  private peek(offset = 0): string | undefined {
    return this.chars[this.cursor + offset];
  }

  private advance(): string | undefined {
    const c = this.chars[this.cursor];
    if (c === undefined) {
      return undefined;
    }
    this.cursor++;
    if (c === "\n") {
      this.line++;
      this.column = 1;
    } else {
      this.column++;
    }
    return c;
  }
}
