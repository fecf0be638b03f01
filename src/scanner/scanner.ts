/**
 * Whole-input scanning on top of the lexer.
 *
 * Two views of the same token stream:
 * - scanAll(): whitespace removed, comments kept (structural parsing)
 * - scanAllIncludingWhitespace(): every token (format-preserving rewrite)
 */

import { Lexer, type ScanOptions } from "./lexer.js";
import { TokenType, type Token } from "./token.js";

export class Scanner {
  private readonly lexer: Lexer;

  constructor(input: string, options: Partial<ScanOptions> = {}) {
    this.lexer = new Lexer(input, options);
  }

  /**
   * Lazily yield every token, ending with (and including) Eof.
   */
  *tokens(): Generator<Token> {
    this.lexer.reset();
    for (;;) {
      const token = this.lexer.nextToken();
      yield token;
      if (token.type === TokenType.Eof) {
        return;
      }
    }
  }

  scanAll(): Token[] {
    const result: Token[] = [];
    for (const token of this.tokens()) {
      if (token.type !== TokenType.Whitespace) {
        result.push(token);
      }
    }
    return result;
  }

  scanAllIncludingWhitespace(): Token[] {
    return Array.from(this.tokens());
  }
}

/**
 * Scan input into tokens without whitespace.
 */
export function scan(input: string, options?: Partial<ScanOptions>): Token[] {
  return new Scanner(input, options).scanAll();
}

/**
 * Scan input into the complete token list, whitespace included.
 */
export function scanIncludingWhitespace(
  input: string,
  options?: Partial<ScanOptions>
): Token[] {
  return new Scanner(input, options).scanAllIncludingWhitespace();
}
