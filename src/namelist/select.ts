/**
 * Glob selection of group names.
 */

import picomatch from "picomatch";

export interface GroupSelection {
  /** Only groups matching one of these globs (all groups when empty) */
  include?: readonly string[];
  /** Drop groups matching any of these globs */
  exclude?: readonly string[];
}

export type GroupMatcher = (groupName: string) => boolean;

/**
 * Build a predicate over group names. Matching ignores case, as group
 * identity does.
 */
export function createGroupMatcher(selection: GroupSelection = {}): GroupMatcher {
  const include = (selection.include ?? []).map((p) => picomatch(p, { nocase: true }));
  const exclude = (selection.exclude ?? []).map((p) => picomatch(p, { nocase: true }));

  return (groupName) => {
    if (include.length > 0 && !include.some((m) => m(groupName))) {
      return false;
    }
    return !exclude.some((m) => m(groupName));
  };
}
