/**
 * Validate command: report structural issues in a document.
 */

import type { NamelistError } from "../../core/errors.js";
import { readFileNamelist } from "../../io/files.js";
import { renderIssues } from "../../render/terminal.js";

export interface ValidateResult {
  issues: NamelistError[];
  report: string;
}

export async function executeValidate(path: string): Promise<ValidateResult> {
  const nml = await readFileNamelist(path);
  const issues = nml.findIssues();
  return { issues, report: renderIssues(issues, path) };
}
