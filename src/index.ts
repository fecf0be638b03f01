/**
 * nmlkit library exports.
 *
 * Parsing, formatting and format-preserving patching of Fortran
 * namelist documents.
 */

// Operations
export * from "./api.js";

// Core
export * from "./core/index.js";

// Document model
export * from "./namelist/index.js";
export * from "./values/index.js";
export * from "./findex/index.js";

// Text processing
export * from "./scanner/index.js";
export * from "./parser/index.js";
export { FileSink, StringSink, type OutputSink } from "./io/index.js";
