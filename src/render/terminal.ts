/**
 * Terminal rendering with colors and tables.
 */

import chalk from "chalk";
import Table from "cli-table3";
import type { NamelistError } from "../core/errors.js";

/**
 * Color scheme for terminal output.
 */
const colors = {
  header: chalk.magenta.bold,
  group: chalk.cyan.bold,
  label: chalk.gray,
  variable: chalk.white,
  type: chalk.blue,
  muted: chalk.dim,
  warning: chalk.yellow,
  success: chalk.green,
  error: chalk.red,
};

const TABLE_CHARS = {
  top: "─",
  "top-mid": "┬",
  "top-left": "┌",
  "top-right": "┐",
  bottom: "─",
  "bottom-mid": "┴",
  "bottom-left": "└",
  "bottom-right": "┘",
  left: "│",
  "left-mid": "├",
  mid: "─",
  "mid-mid": "┼",
  right: "│",
  "right-mid": "┤",
  middle: "│",
};

/**
 * One row of the variable listing.
 */
export interface VariableRow {
  group: string;
  variable: string;
  type: string;
  summary: string;
  comment?: string;
}

function sectionHeader(title: string): string {
  return `\n${colors.header(title)}\n${"─".repeat(50)}\n`;
}

/**
 * Variables as a table, one section per group.
 */
export function renderVariableTable(rows: readonly VariableRow[], title: string): string {
  if (rows.length === 0) {
    return `${sectionHeader(title)}${colors.muted("(no variables)")}\n`;
  }

  const table = new Table({
    head: [
      colors.label("Group"),
      colors.label("Variable"),
      colors.label("Type"),
      colors.label("Value"),
      colors.label("Comment"),
    ],
    style: {
      head: [],
      border: ["dim"],
    },
    chars: TABLE_CHARS,
  });

  for (const row of rows) {
    table.push([
      colors.group(row.group),
      colors.variable(row.variable),
      colors.type(row.type),
      row.summary,
      colors.muted(row.comment ?? "-"),
    ]);
  }

  return `${sectionHeader(title)}${table.toString()}\n`;
}

/**
 * Validation issues, or a success line.
 */
export function renderIssues(issues: readonly NamelistError[], source: string): string {
  if (issues.length === 0) {
    return `${colors.success("✔")} ${source}: no issues found\n`;
  }

  let output = sectionHeader(`${source}: ${issues.length} issue(s)`);
  for (const issue of issues) {
    const mark = issue.severity === "warning" ? colors.warning("!") : colors.error("✖");
    output += `${mark} ${issue.message}\n`;
  }
  return output;
}
