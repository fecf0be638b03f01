/**
 * Tests for the lexer and scanner.
 */

import { describe, expect, it } from "vitest";
import { ParseError } from "../src/core/errors.js";
import { Lexer } from "../src/scanner/lexer.js";
import { Scanner, scan, scanIncludingWhitespace } from "../src/scanner/scanner.js";
import { TokenType, isNameToken, type Token } from "../src/scanner/token.js";

function types(tokens: readonly Token[]): TokenType[] {
  return tokens.map((token) => token.type);
}

function single(text: string): Token {
  const [token] = scan(text);
  if (token === undefined) {
    throw new Error(`no token for ${text}`);
  }
  return token;
}

describe("Lexer", () => {
  describe("structure", () => {
    it("should tokenize a simple group", () => {
      const tokens = scan("&data_nml x = 1 /");
      expect(types(tokens)).toEqual([
        TokenType.GroupStart,
        TokenType.Identifier,
        TokenType.Identifier,
        TokenType.Assign,
        TokenType.Integer,
        TokenType.GroupEnd,
        TokenType.Eof,
      ]);
      expect(tokens.map((t) => t.lexeme)).toEqual(["&", "data_nml", "x", "=", "1", "/", ""]);
    });

    it("should tokenize the $ dialect", () => {
      expect(types(scan("$grp $end"))).toEqual([
        TokenType.GroupStartAlt,
        TokenType.Identifier,
        TokenType.GroupStartAlt,
        TokenType.Identifier,
        TokenType.Eof,
      ]);
    });

    it("should tokenize index and component punctuation", () => {
      expect(types(scan("a(1:3)%b"))).toEqual([
        TokenType.Identifier,
        TokenType.LeftParen,
        TokenType.Integer,
        TokenType.Colon,
        TokenType.Integer,
        TokenType.RightParen,
        TokenType.Percent,
        TokenType.Identifier,
        TokenType.Eof,
      ]);
    });

    it("should track lines and columns", () => {
      const tokens = scan("&g\n  x=1");
      const x = tokens[2];
      expect(x?.lexeme).toBe("x");
      expect(x?.line).toBe(2);
      expect(x?.column).toBe(3);
    });

    it("should end with an empty Eof token", () => {
      const lexer = new Lexer("");
      const token = lexer.nextToken();
      expect(token.type).toBe(TokenType.Eof);
      expect(token.lexeme).toBe("");
      expect(lexer.hasMore()).toBe(false);
    });
  });

  describe("numbers", () => {
    it("should classify integers and reals", () => {
      expect(single("42").type).toBe(TokenType.Integer);
      expect(single("1.5e3").type).toBe(TokenType.Real);
      expect(single("1d-5").type).toBe(TokenType.Real);
      expect(single(".5").type).toBe(TokenType.Real);
      expect(single("1.").type).toBe(TokenType.Real);
      expect(single("1.0_dp").lexeme).toBe("1.0_dp");
      expect(single("1.0_dp").type).toBe(TokenType.Real);
    });

    it("should keep the sign on signed numbers", () => {
      const token = single("-7");
      expect(token.type).toBe(TokenType.Integer);
      expect(token.lexeme).toBe("-7");
    });

    it("should leave the dot of an operator word to the word", () => {
      const tokens = scan("1.and.");
      expect(tokens[0]?.type).toBe(TokenType.Integer);
      expect(tokens[0]?.lexeme).toBe("1");
      expect(tokens[1]?.type).toBe(TokenType.Identifier);
      expect(tokens[1]?.lexeme).toBe(".and.");
    });

    it("should reject an exponent without digits", () => {
      expect(() => scan("x = 1e+")).toThrow(ParseError);
      expect(() => scan("x = 1e+")).toThrow(
        "Parse error at line 1, column 5: Invalid exponent in number"
      );
    });

    it("should read signed words as identifiers", () => {
      expect(single("-inf").type).toBe(TokenType.Identifier);
      expect(single("+").type).toBe(TokenType.Plus);
      expect(single("- ").type).toBe(TokenType.Minus);
    });
  });

  describe("logicals", () => {
    it("should recognise dotted and bare forms", () => {
      expect(single(".true.").type).toBe(TokenType.Logical);
      expect(single(".F.").type).toBe(TokenType.Logical);
      expect(single("T").type).toBe(TokenType.Logical);
      expect(single("false").type).toBe(TokenType.Logical);
      expect(single(".eq.").type).toBe(TokenType.Identifier);
    });

    it("should allow t and f as names but not dotted logicals", () => {
      expect(isNameToken(single("t"))).toBe(true);
      expect(isNameToken(single(".t."))).toBe(false);
    });
  });

  describe("strings", () => {
    it("should keep doubled quotes inside the lexeme", () => {
      const token = single("'it''s'");
      expect(token.type).toBe(TokenType.String);
      expect(token.lexeme).toBe("'it''s'");
    });

    it("should report an unterminated string at its start", () => {
      expect(() => scan("x = 'abc\ny = 1")).toThrow(
        "Parse error at line 1, column 5: Unterminated string literal"
      );
      expect(() => scan('"abc')).toThrow(ParseError);
    });

    it("should let bare words absorb quotes by default", () => {
      expect(single("it's").lexeme).toBe("it's");
    });
  });

  describe("comments", () => {
    it("should produce comment tokens for ! and #", () => {
      const tokens = scan("x = 1 ! note\n# hash");
      expect(tokens.filter((t) => t.type === TokenType.Comment).map((t) => t.lexeme)).toEqual([
        "! note",
        "# hash",
      ]);
    });

    it("should honour custom comment characters", () => {
      expect(scan("# hash", { commentChars: ["!"] })[0]?.type).toBe(TokenType.Invalid);
      expect(scan("; note", { commentChars: [";"] })[0]?.type).toBe(TokenType.Comment);
    });
  });
});

describe("Scanner", () => {
  const source = "&grp  ! header\n  x = 1,\n  y = 'two'\n/\n";

  it("should drop whitespace but keep comments in scanAll", () => {
    const tokens = new Scanner(source).scanAll();
    expect(tokens.some((t) => t.type === TokenType.Whitespace)).toBe(false);
    expect(tokens.some((t) => t.type === TokenType.Comment)).toBe(true);
  });

  it("should reproduce the input from the full token list", () => {
    const text = scanIncludingWhitespace(source)
      .map((t) => t.lexeme)
      .join("");
    expect(text).toBe(source);
  });

  it("should restart from the beginning on every pass", () => {
    const scanner = new Scanner("x = 1");
    expect(scanner.scanAll().length).toBe(scanner.scanAll().length);
  });
});
