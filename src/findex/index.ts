/**
 * Index iterator exports.
 */

export { IndexBound } from "./bound.js";
export { FIndex } from "./findex.js";
export { parseIndexString, parseIndexSpec } from "./parse-index.js";
