/**
 * Value model exports.
 */

export * from "./value.js";
export * from "./equal.js";
export * from "./parse.js";
export * from "./convert.js";
export * from "./format.js";
