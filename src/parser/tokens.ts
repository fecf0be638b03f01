/**
 * Cursor helpers over a token list.
 *
 * Work on both scans: the whitespace-free list of the structural parser
 * and the complete list of the patching parser.
 */

import { UnexpectedEofError } from "../core/errors.js";
import {
  TokenType,
  isNameToken,
  isTrivia,
  type Token,
} from "../scanner/token.js";

export function skipWhitespace(tokens: readonly Token[], index: number): number {
  let i = index;
  while (tokens[i]?.type === TokenType.Whitespace) {
    i++;
  }
  return i;
}

/**
 * Index of the next token that is neither whitespace nor a comment.
 */
export function nextSignificant(tokens: readonly Token[], index: number): number {
  let i = index;
  for (let token = tokens[i]; token !== undefined && isTrivia(token); token = tokens[++i]) {
    // advance
  }
  return i;
}

/**
 * Number of tokens forming a group close at `index`: `/`, `$`, `$end`
 * or `&end`. Zero when there is none.
 */
export function closeLength(tokens: readonly Token[], index: number): number {
  const token = tokens[index];
  if (token === undefined) return 0;
  if (token.type === TokenType.GroupEnd) return 1;
  if (token.type !== TokenType.GroupStart && token.type !== TokenType.GroupStartAlt) {
    return 0;
  }
  const next = tokens[index + 1];
  if (next?.type === TokenType.Identifier && next.lexeme.toLowerCase() === "end") {
    return 2;
  }
  return token.type === TokenType.GroupStartAlt ? 1 : 0;
}

/**
 * A name followed (after whitespace) by `=`, `(` or `%`.
 */
export function isAssignmentStart(tokens: readonly Token[], index: number): boolean {
  const token = tokens[index];
  if (token === undefined || !isNameToken(token)) {
    return false;
  }
  const next = tokens[skipWhitespace(tokens, index + 1)];
  return (
    next?.type === TokenType.Assign ||
    next?.type === TokenType.LeftParen ||
    next?.type === TokenType.Percent
  );
}

function endsValue(tokens: readonly Token[], index: number): boolean {
  const token = tokens[index];
  return (
    token === undefined ||
    token.type === TokenType.Eof ||
    token.type === TokenType.GroupStart ||
    closeLength(tokens, index) > 0 ||
    isAssignmentStart(tokens, index)
  );
}

/**
 * End (exclusive) of the value starting at `start`, trailing trivia
 * excluded.
 *
 * At parenthesis depth zero the value stops before a group close, the
 * next assignment, or a comma that only separates it from one of those.
 * Commas followed by further values belong to the value list.
 */
export function findValueEnd(tokens: readonly Token[], start: number): number {
  let depth = 0;
  let end = start;

  for (let i = start; i < tokens.length; i++) {
    const token = tokens[i];
    if (token === undefined || token.type === TokenType.Eof) break;

    if (depth === 0) {
      if (endsValue(tokens, i)) break;
      if (token.type === TokenType.Comma && endsValue(tokens, nextSignificant(tokens, i + 1))) {
        break;
      }
    }

    if (token.type === TokenType.LeftParen) {
      depth++;
    } else if (token.type === TokenType.RightParen && depth > 0) {
      depth--;
    }
    if (!isTrivia(token)) {
      end = i + 1;
    }
  }
  return end;
}

/**
 * Text between a `(` at `open` and its matching `)`, and the index
 * after the `)`.
 */
export function readParenthesized(
  tokens: readonly Token[],
  open: number,
  group: string
): { text: string; end: number } {
  let depth = 0;
  let text = "";
  for (let i = open; ; i++) {
    const token = tokens[i];
    if (token === undefined || token.type === TokenType.Eof) {
      throw new UnexpectedEofError(group);
    }
    if (token.type === TokenType.LeftParen) {
      depth++;
      if (depth === 1) continue;
    } else if (token.type === TokenType.RightParen) {
      depth--;
      if (depth === 0) return { text, end: i + 1 };
    }
    if (!isTrivia(token)) {
      text += token.lexeme;
    }
  }
}

/**
 * Inline comment following a value on its last line, without the
 * comment character. A separating comma may sit in between.
 */
export function trailingComment(
  tokens: readonly Token[],
  index: number,
  line: number
): string | undefined {
  for (let i = index; i < tokens.length; i++) {
    const token = tokens[i];
    if (token === undefined) return undefined;
    switch (token.type) {
      case TokenType.Whitespace:
        if (token.lexeme.includes("\n")) return undefined;
        break;
      case TokenType.Comma:
        break;
      case TokenType.Comment:
        return token.line === line ? token.lexeme.slice(1).trim() : undefined;
      default:
        return undefined;
    }
  }
  return undefined;
}
