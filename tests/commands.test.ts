/**
 * Tests for CLI command helpers.
 */

import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { reads } from "../src/api.js";
import { CustomError, InvalidFormatError, InvalidValueError } from "../src/core/errors.js";
import { executeFormat } from "../src/commands/format/index.js";
import { executeMerge } from "../src/commands/merge/index.js";
import { executePatch } from "../src/commands/patch/index.js";
import {
  parseGlobList,
  parseIntegerFlag,
  parseStrategy,
  toWriteOptions,
} from "../src/commands/shared.js";
import {
  collectRows,
  executeShow,
  isShowFormat,
  renderShowJSON,
  renderShowText,
} from "../src/commands/show/index.js";
import { executeValidate } from "../src/commands/validate/index.js";

// ============================================================================
// Option parsing
// ============================================================================

describe("shared option parsing", () => {
  it("should parse integer flags", () => {
    expect(parseIntegerFlag("indent", "2", 0)).toBe(2);
    expect(() => parseIntegerFlag("indent", "-1", 0)).toThrow(InvalidFormatError);
    expect(() => parseIntegerFlag("indent", "two", 0)).toThrow(
      "Invalid format '--indent two': expected an integer >= 0"
    );
  });

  it("should map write flags to write options", () => {
    expect(toWriteOptions({ indent: "2", sort: true, columnWidth: "40" })).toEqual({
      indent: "  ",
      columnWidth: 40,
      sortGroups: true,
      sortVariables: true,
    });
    expect(toWriteOptions({})).toEqual({});
  });

  it("should split glob lists", () => {
    expect(parseGlobList(["a,b", " c ", ""])).toEqual(["a", "b", "c"]);
    expect(parseGlobList(undefined)).toEqual([]);
  });

  it("should check merge strategy names", () => {
    expect(parseStrategy("append")).toBe("append");
    expect(() => parseStrategy("mix")).toThrow(CustomError);
  });
});

// ============================================================================
// Show
// ============================================================================

describe("show", () => {
  const nml = reads("&run\n  steps = 10  ! count\n  name = 'demo'\n/\n&io out = .true. /\n");

  it("should collect one row per variable", () => {
    expect(collectRows(nml)).toEqual([
      { group: "run", variable: "steps", type: "integer", summary: "integer(10)", comment: "count" },
      { group: "run", variable: "name", type: "character", summary: 'character("demo")' },
      { group: "io", variable: "out", type: "logical", summary: "logical(true)" },
    ]);
  });

  it("should render qualified text lines", () => {
    expect(renderShowText(nml)).toBe("run%steps = 10\nrun%name = 'demo'\nio%out = .true.\n");
  });

  it("should render compact JSON", () => {
    const rows = collectRows(reads("&g x = 1 /"));
    expect(renderShowJSON(rows, false)).toBe(
      '[{"group":"g","variable":"x","type":"integer","summary":"integer(1)"}]'
    );
  });

  it("should know its formats", () => {
    expect(isShowFormat("json")).toBe(true);
    expect(isShowFormat("yaml")).toBe(false);
  });
});

// ============================================================================
// File-backed commands
// ============================================================================

describe("file commands", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "nmlkit-cmd-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  async function fixture(name: string, text: string): Promise<string> {
    const path = join(dir, name);
    await writeFile(path, text);
    return path;
  }

  it("should show a file as text", async () => {
    const path = await fixture("a.nml", "&g x = 1 /\n");
    expect(await executeShow(path, "text")).toBe("g%x = 1\n");
  });

  it("should format a file and write it when asked", async () => {
    const path = await fixture("a.nml", "&G  X=1,Y=2 /\n");
    const output = join(dir, "out.nml");
    const text = await executeFormat(path, { output, write: toWriteOptions({ indent: "2" }) });

    expect(text).toBe("&g\n  x = 1\n  y = 2\n/\n");
    expect(await readFile(output, "utf-8")).toBe(text);
  });

  it("should patch to text or to a file", async () => {
    const path = await fixture("a.nml", "&a x = 1 /\n&b x = 1 /\n");
    const patchPath = await fixture("p.nml", "&a x = 2 /\n&b x = 3 /\n");
    const base = { include: [], exclude: ["b"], force: false };

    expect(await executePatch(path, patchPath, base)).toBe("&a x = 2 /\n&b x = 1 /\n");

    const output = join(dir, "out.nml");
    expect(await executePatch(path, patchPath, { ...base, exclude: [], output })).toBeUndefined();
    expect(await readFile(output, "utf-8")).toBe("&a x = 2 /\n&b x = 3 /\n");
  });

  it("should merge under a strategy", async () => {
    const path = await fixture("a.nml", "&g x = 1 a = 1 /\n");
    const other = await fixture("b.nml", "&g x = 2 a = 2 y = 3 /\n&h z = 1 /\n");

    expect(await executeMerge(path, other, "skip_existing")).toBe(
      "&g\n    x = 1\n    a = 1\n    y = 3\n/\n\n&h\n    z = 1\n/\n"
    );
    expect(await executeMerge(path, other, "append")).toBe(
      "&g\n    x(1:2) = 1, 2\n    a(1:2) = 1, 2\n    y = 3\n/\n\n&h\n    z = 1\n/\n"
    );
  });

  it("should report validation issues", async () => {
    const clean = await fixture("clean.nml", "&g a = 1, 2 /\n");
    expect((await executeValidate(clean)).issues).toEqual([]);

    const mixed = await fixture("mixed.nml", "&g a = 1, 'x' /\n");
    const { issues, report } = await executeValidate(mixed);
    expect(issues).toHaveLength(1);
    expect(issues[0]).toBeInstanceOf(InvalidValueError);
    expect(issues[0]?.message).toBe("Invalid value ''x'' for variable 'g%a'. Expected type: integer");
    expect(report).toContain("Invalid value ''x'' for variable 'g%a'");
  });
});
