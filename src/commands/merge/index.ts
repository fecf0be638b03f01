/**
 * Merge command: combine two documents under a merge strategy.
 */

import { readFileNamelist } from "../../io/files.js";
import type { MergeStrategy } from "../../namelist/merge.js";
import type { WriteOptions } from "../../namelist/options.js";

/**
 * Canonical text of `path` with `otherPath` merged into it.
 */
export async function executeMerge(
  path: string,
  otherPath: string,
  strategy: MergeStrategy,
  write: Partial<WriteOptions> = {}
): Promise<string> {
  const [base, other] = await Promise.all([readFileNamelist(path), readFileNamelist(otherPath)]);
  base.mergeWithStrategy(other, strategy);
  return base.toText(write);
}
