/**
 * Tests for the structural parse.
 */

import { describe, expect, it } from "vitest";
import {
  DimensionMismatchError,
  InvalidTokenError,
  InvalidValueError,
  ParseError,
  UnexpectedEofError,
} from "../src/core/errors.js";
import { NamelistGroup } from "../src/namelist/group.js";
import { Namelist } from "../src/namelist/namelist.js";
import { StreamingParser, parseNamelist } from "../src/parser/streaming-parser.js";
import {
  NULL_VALUE,
  array,
  character,
  complex,
  derivedType,
  derivedTypeArray,
  integer,
  logical,
  multiArray,
  real,
} from "../src/values/value.js";

function group(text: string, name = "g"): NamelistGroup {
  const found = parseNamelist(text).getGroup(name);
  if (found === undefined) {
    throw new Error(`group ${name} missing`);
  }
  return found;
}

describe("StreamingParser.parse", () => {
  describe("scalars", () => {
    it("should parse a basic group", () => {
      const nml = new StreamingParser("&data_nml\n    x = 1,\n    y = 2.0\n/").parse();
      expect(nml.groupNames()).toEqual(["data_nml"]);
      const data = nml.requireGroup("data_nml");
      expect(data.get("x")).toEqual(integer(1));
      expect(data.get("y")).toEqual(real(2));
    });

    it("should parse every scalar type", () => {
      const g = group("&g z = (1.0, -2.0) s = 'hello world' t = .true. name = plain /");
      expect(g.get("z")).toEqual(complex(1, -2));
      expect(g.get("s")).toEqual(character("hello world"));
      expect(g.get("t")).toEqual(logical(true));
      expect(g.get("name")).toEqual(character("plain"));
    });

    it("should accept t and f as variable names", () => {
      const g = group("&g t = 1 f = .false. /");
      expect(g.get("t")).toEqual(integer(1));
      expect(g.get("f")).toEqual(logical(false));
    });

    it("should read empty values as null", () => {
      const g = group("&g a = , b = 2 c = /");
      expect(g.get("a")).toBe(NULL_VALUE);
      expect(g.get("b")).toEqual(integer(2));
      expect(g.get("c")).toBe(NULL_VALUE);
    });
  });

  describe("value lists", () => {
    it("should read comma lists as arrays", () => {
      expect(group("&g a = 1, 2, 3 /").get("a")).toEqual(array([1, 2, 3]));
    });

    it("should read lists continued over lines", () => {
      expect(group("&g\n a = 1, 2,\n     3\n b = 4\n/").get("a")).toEqual(array([1, 2, 3]));
    });

    it("should expand repeats", () => {
      const g = group("&g b = 3*0 c = 2*1.5, 4.0 d = 2*'x' /");
      expect(g.get("b")).toEqual(array([0, 0, 0]));
      expect(g.get("c")).toEqual(array([real(1.5), real(1.5), real(4)]));
      expect(g.get("d")).toEqual(array(["x", "x"]));
    });

    it("should keep nulls inside lists", () => {
      expect(group("&g a = 1, , 3 /").get("a")).toEqual(array([integer(1), NULL_VALUE, integer(3)]));
    });
  });

  describe("indexed assignments", () => {
    it("should record the start of a ranged assignment", () => {
      const g = group("&g x(3:5) = 1, 2, 3 /");
      expect(g.get("x")).toEqual(array([1, 2, 3]));
      expect(g.getStartIndices("x")).toEqual([3]);
    });

    it("should build one array from element assignments", () => {
      const g = group("&g v(1) = 10 v(2) = 20 v(4) = 40 /");
      expect(g.get("v")).toEqual(array([integer(10), integer(20), NULL_VALUE, integer(40)]));
      expect(g.getStartIndices("v")).toBeUndefined();
    });

    it("should fill consecutive elements from a single index", () => {
      const g = group("&g x(2) = 1, 2, 3 /");
      expect(g.get("x")).toEqual(array([1, 2, 3]));
      expect(g.getStartIndices("x")).toEqual([2]);
    });

    it("should read a one-element range as an array", () => {
      expect(group("&g x(1:1) = 5 /").get("x")).toEqual(array([5]));
    });

    it("should pad a range to its full extent", () => {
      expect(group("&g x(1:3) = 1 /").get("x")).toEqual(
        array([integer(1), NULL_VALUE, NULL_VALUE])
      );
      expect(group("&g x(1:2) = 1, /").get("x")).toEqual(array([integer(1), NULL_VALUE]));
    });

    it("should follow strides", () => {
      expect(group("&g w(1:5:2) = 1, 2, 3 /").get("w")).toEqual(
        array([integer(1), NULL_VALUE, integer(2), NULL_VALUE, integer(3)])
      );
    });

    it("should reject more values than the range holds", () => {
      expect(() => parseNamelist("&g w(1:2) = 1, 2, 3 /")).toThrow(DimensionMismatchError);
    });

    it("should build multi-dimensional arrays in column-major order", () => {
      const g = group("&g m(1:2, 1:3) = 1, 2, 3, 4, 5, 6 /");
      expect(g.get("m")).toEqual(multiArray([1, 2, 3, 4, 5, 6], [2, 3]));
    });

    it("should update single elements of a multi-dimensional array", () => {
      const g = group("&g m(1:2, 1:2) = 1, 2, 3, 4\n m(2, 2) = 9 /");
      expect(g.get("m")).toEqual(multiArray([1, 2, 3, 9], [2, 2]));
    });

    it("should build derived types from components", () => {
      const g = group("&g p%x = 1 p%y = 2.5 s(1)%a = 1 s(2)%a = 2 /");
      expect(g.get("p")).toEqual(derivedType([["x", 1], ["y", real(2.5)]]));
      expect(g.get("s")).toEqual(
        derivedTypeArray([new Map([["a", integer(1)]]), new Map([["a", integer(2)]])])
      );
    });
  });

  describe("comments and layout", () => {
    it("should attach inline comments to variables", () => {
      const g = group("&g\n  x = 1  ! first\n  y = 2\n  ! standalone\n/");
      expect(g.getComment("x")).toBe("first");
      expect(g.getComment("y")).toBeUndefined();
    });

    it("should attach a comment after a trailing comma", () => {
      expect(group("&g\n  x = 1,  # hashed\n/").getComment("x")).toBe("hashed");
    });

    it("should ignore text outside groups", () => {
      const nml = parseNamelist("header text\n&a x=1 /\n&b y=2 /\ntrailer");
      expect(nml.groupNames()).toEqual(["a", "b"]);
    });

    it("should accept the $ and &end dialects", () => {
      expect(group("$g x = 1 $end").get("x")).toEqual(integer(1));
      expect(group("&g x = 1 &end").get("x")).toEqual(integer(1));
      expect(group("$g x = 1 $").get("x")).toEqual(integer(1));
    });

    it("should lower-case names", () => {
      const nml = parseNamelist("&DATA X = 1 /");
      expect(nml.getGroup("data")?.get("x")).toEqual(integer(1));
    });
  });

  describe("errors", () => {
    it("should report a group left open", () => {
      expect(() => parseNamelist("&g x = 1")).toThrow(UnexpectedEofError);
      expect(() => parseNamelist("&g x = 1")).toThrow("Unexpected end of file inside group 'g'");
    });

    it("should require a group name", () => {
      expect(() => parseNamelist("& = 1 /")).toThrow("Expected group name after '&'");
    });

    it("should require = after a variable name", () => {
      expect(() => parseNamelist("&g x 1 /")).toThrow(ParseError);
      expect(() => parseNamelist("&g x 1 /")).toThrow("Expected '=' after variable name 'x'");
    });

    it("should reject invalid tokens inside values", () => {
      expect(() => parseNamelist("&g x = 1 @ /")).toThrow(InvalidTokenError);
    });

    it("should reject signed repeat counts", () => {
      expect(() => parseNamelist("&g x = +3*1 /")).toThrow(InvalidValueError);
    });

    it("should reject repeat counts too large to expand", () => {
      expect(() => parseNamelist("&g x = 4294967296*1 /")).toThrow(
        "Invalid value '4294967296' for variable 'x'. Expected type: repeat count of at most 16777216"
      );
    });

    it("should reject a group opened inside a group", () => {
      expect(() => parseNamelist("&g &h /")).toThrow("Unexpected '&' inside group 'g'");
    });
  });

  it("should read back its own canonical output", () => {
    const original = new Namelist();
    const g = original.insertGroup("g");
    g.insert("x", 1);
    g.insert("arr", array([1, 2, 3]));
    g.insert("r", real(2.5));
    g.insert("c", complex(1, -2));
    g.insert("s", "it's");
    g.insert("l", logical(true));
    g.insert("m", multiArray([1, 2, 3, 4], [2, 2]));
    g.insert("p", derivedType([["a", 1], ["b", "q"]]));
    original.insertGroup("empty");

    const reparsed = parseNamelist(original.toText());
    expect(reparsed.equals(original)).toBe(true);
  });

  it("should read back one-element arrays and trailing nulls", () => {
    const original = new Namelist();
    const g = original.insertGroup("g");
    g.insert("one", array([5]));
    g.insert("tail", array([1, null]));

    const text = original.toText();
    expect(text).toBe("&g\n    one(1:1) = 5\n    tail(1:2) = 1,\n/\n");
    expect(parseNamelist(text).equals(original)).toBe(true);
  });
});
