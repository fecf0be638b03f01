/**
 * Document model exports.
 */

export { NamelistGroup } from "./group.js";
export { Namelist } from "./namelist.js";
export {
  MERGE_STRATEGIES,
  appendValues,
  isMergeStrategy,
  mergeValues,
  type MergeStrategy,
} from "./merge.js";
export {
  DEFAULT_WRITE_OPTIONS,
  resolveWriteOptions,
  valueFormatFor,
  type WriteOptions,
} from "./options.js";
export { createGroupMatcher, type GroupMatcher, type GroupSelection } from "./select.js";
export { findValueIssues } from "./validate.js";
export { formatComment, formatVariable, type VariableMetadata } from "./write.js";
