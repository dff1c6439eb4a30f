import { describe, expect, it } from "vitest";

import { FormatError, ParseError } from "../src/errors.js";
import { parseFloatLiteral, parseLogLine, splitLines } from "../src/timing/parse_line.js";

describe("parseLogLine", () => {
  it("reads the tag and the value of the first key:value pair", () => {
    expect(parseLogLine("WRITE1|duration:12.5,extra:foo", 1)).toEqual({
      tag: "WRITE1",
      value: 12.5,
      lineNumber: 1
    });
  });

  it("strips surrounding whitespace around the line and the value", () => {
    expect(parseLogLine("  READ3|d: 4 ,x:y \r", 7)).toEqual({ tag: "READ3", value: 4, lineNumber: 7 });
  });

  it("strips a leading byte order mark along with the whitespace", () => {
    expect(parseLogLine("\uFEFFWRITE1|duration:2.0,x:y", 1).tag).toBe("WRITE1");
  });

  it("ignores extra colons in the first field", () => {
    expect(parseLogLine("RD1|d:1:2", 1).value).toBe(1);
  });

  it("only looks at the second pipe segment", () => {
    expect(() => parseLogLine("A|B|c:1", 3)).toThrow(FormatError);
  });

  it("fails a line without a pipe", () => {
    const attempt = () => parseLogLine("BADLINE no pipe", 4);
    expect(attempt).toThrow(FormatError);
    expect(attempt).toThrow("Line 4:");
  });

  it("fails a blank line", () => {
    expect(() => parseLogLine("", 2)).toThrow(FormatError);
  });

  it("fails a first field without a colon", () => {
    expect(() => parseLogLine("WRITE1|duration", 1)).toThrow(FormatError);
  });

  it("fails a value that is not a float", () => {
    try {
      parseLogLine("WRITE1|duration:abc,x:y", 9);
      expect.unreachable("parseLogLine should throw");
    } catch (error) {
      expect(error).toBeInstanceOf(ParseError);
      if (error instanceof ParseError) {
        expect(error.field).toBe("abc");
        expect(error.lineNumber).toBe(9);
        expect(error.message).toBe('Line 9: could not convert "abc" to a float');
      }
    }
  });

  it("fails an empty value", () => {
    expect(() => parseLogLine("WRITE1|duration:", 1)).toThrow(ParseError);
  });
});

describe("parseFloatLiteral", () => {
  it("accepts decimal and exponent forms", () => {
    expect(parseFloatLiteral("2.0")).toBe(2);
    expect(parseFloatLiteral(".5")).toBe(0.5);
    expect(parseFloatLiteral("5.")).toBe(5);
    expect(parseFloatLiteral("-1e-3")).toBe(-0.001);
    expect(parseFloatLiteral(" 7 ")).toBe(7);
    expect(parseFloatLiteral("1_000.5")).toBe(1000.5);
  });

  it("accepts infinity and nan words in any case", () => {
    expect(parseFloatLiteral("inf")).toBe(Number.POSITIVE_INFINITY);
    expect(parseFloatLiteral("-Infinity")).toBe(Number.NEGATIVE_INFINITY);
    expect(parseFloatLiteral("NaN")).toBeNaN();
  });

  it("rejects anything else", () => {
    for (const text of ["", "   ", "abc", "0x10", "1__0", "1e", "1.2.3", "_1"]) {
      expect(parseFloatLiteral(text)).toBeNull();
    }
  });
});

describe("splitLines", () => {
  it("does not produce a line for the trailing newline", () => {
    expect(splitLines("a\nb\n")).toEqual(["a", "b"]);
    expect(splitLines("\n")).toEqual([""]);
    expect(splitLines("")).toEqual([]);
  });

  it("treats CRLF and CR as line breaks and keeps inner blank lines", () => {
    expect(splitLines("a\r\nb\rc")).toEqual(["a", "b", "c"]);
    expect(splitLines("a\n\nb\n")).toEqual(["a", "", "b"]);
  });
});
