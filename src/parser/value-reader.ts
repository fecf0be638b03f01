/**
 * Turning the tokens of one value list into a Value.
 */

import { InvalidTokenError, InvalidValueError } from "../core/errors.js";
import { TokenType, isTrivia, type Token } from "../scanner/token.js";
import { parseCharacter, parseRepeatCount, parseValue } from "../values/parse.js";
import { NULL_VALUE, array, type Value } from "../values/value.js";

const VALUE_EXPECTED = ["value", ","] as const;

function tokenWidth(token: Token): number {
  return Array.from(token.lexeme).length;
}

/**
 * Rebuild source text from tokens, keeping a space only where the
 * input had a gap.
 */
export function joinTokens(tokens: readonly Token[]): string {
  let text = "";
  let previous: Token | undefined;
  for (const token of tokens) {
    const adjacent =
      previous !== undefined &&
      previous.line === token.line &&
      previous.column + tokenWidth(previous) === token.column;
    if (previous !== undefined && !adjacent) {
      text += " ";
    }
    text += token.lexeme;
    previous = token;
  }
  return text;
}

/**
 * Split on commas outside parentheses.
 */
function splitSegments(tokens: readonly Token[]): Token[][] {
  const segments: Token[][] = [[]];
  let depth = 0;
  for (const token of tokens) {
    if (token.type === TokenType.LeftParen) depth++;
    else if (token.type === TokenType.RightParen && depth > 0) depth--;

    if (token.type === TokenType.Comma && depth === 0) {
      segments.push([]);
    } else {
      segments[segments.length - 1]?.push(token);
    }
  }
  return segments;
}

function segmentValue(segment: readonly Token[]): Value {
  for (const token of segment) {
    if (token.type === TokenType.Invalid) {
      throw new InvalidTokenError(token.lexeme, [...VALUE_EXPECTED], token.line, token.column);
    }
  }
  const [only] = segment;
  if (only === undefined) {
    return NULL_VALUE;
  }
  if (segment.length === 1 && only.type === TokenType.String) {
    return parseCharacter(only.lexeme);
  }
  return parseValue(joinTokens(segment));
}

/**
 * Read the value of one assignment from the tokens after its `=`.
 *
 * Commas separate list items, an empty item is a null and `n*v` repeats
 * `v` n times. More than one item, or any repeat, gives an array.
 */
export function readValue(tokens: readonly Token[], variable: string): Value {
  const significant = tokens.filter((token) => !isTrivia(token));
  if (significant.length === 0) {
    return NULL_VALUE;
  }

  const segments = splitSegments(significant);
  const items: Value[] = [];
  let listLike = segments.length > 1;

  for (const segment of segments) {
    const [count, star] = segment;
    if (count?.type === TokenType.Integer && star?.type === TokenType.Star) {
      let repeat: number;
      try {
        repeat = parseRepeatCount(count.lexeme);
      } catch (err) {
        if (err instanceof InvalidValueError) {
          throw new InvalidValueError(variable, count.lexeme, err.expectedType);
        }
        throw err;
      }
      const repeated = segmentValue(segment.slice(2));
      for (let i = 0; i < repeat; i++) {
        items.push(repeated);
      }
      listLike = true;
      continue;
    }
    items.push(segmentValue(segment));
  }

  const [first] = items;
  return listLike || first === undefined ? array(items) : first;
}
