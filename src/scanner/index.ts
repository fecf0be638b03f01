/**
 * Scanner exports.
 */

export * from "./token.js";
export * from "./lexer.js";
export * from "./scanner.js";
