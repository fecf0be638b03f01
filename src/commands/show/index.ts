/**
 * Show command: list every variable of a document.
 */

import { readFileNamelist } from "../../io/files.js";
import type { Namelist } from "../../namelist/namelist.js";
import { renderVariableTable, type VariableRow } from "../../render/terminal.js";
import { formatValue } from "../../values/format.js";
import { summary, typeName } from "../../values/value.js";

export type ShowFormat = "table" | "text" | "json";

export const SHOW_FORMATS: readonly ShowFormat[] = ["table", "text", "json"];

export function isShowFormat(name: string): name is ShowFormat {
  return SHOW_FORMATS.some((format) => format === name);
}

/**
 * One row per variable, in document order.
 */
export function collectRows(nml: Namelist): VariableRow[] {
  const rows: VariableRow[] = [];
  for (const group of nml.groups()) {
    for (const [variable, value] of group.entries()) {
      const row: VariableRow = {
        group: group.name,
        variable,
        type: typeName(value),
        summary: summary(value),
      };
      const comment = group.getComment(variable);
      if (comment !== undefined) row.comment = comment;
      rows.push(row);
    }
  }
  return rows;
}

/**
 * `group%variable = value` lines.
 */
export function renderShowText(nml: Namelist): string {
  let output = "";
  for (const group of nml.groups()) {
    for (const [variable, value] of group.entries()) {
      output += `${group.name}%${variable} = ${formatValue(value)}\n`;
    }
  }
  return output;
}

export function renderShowJSON(rows: readonly VariableRow[], pretty = true): string {
  return pretty ? JSON.stringify(rows, null, 2) : JSON.stringify(rows);
}

export async function executeShow(path: string, format: ShowFormat): Promise<string> {
  const nml = await readFileNamelist(path);
  switch (format) {
    case "table":
      return renderVariableTable(collectRows(nml), path);
    case "text":
      return renderShowText(nml);
    case "json":
      return `${renderShowJSON(collectRows(nml))}\n`;
  }
}
