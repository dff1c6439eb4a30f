import type { TimingSample } from "lib/timing/types.js";

import { FIELD_DELIMITER, KEY_VALUE_DELIMITER, TAG_DELIMITER } from "../constants.js";
import { FormatError, ParseError } from "../errors.js";

const DIGITS = String.raw`\d(?:_?\d)*`;
const FLOAT_LITERAL = new RegExp(
  String.raw`^[+-]?(?:(?:${DIGITS})?\.${DIGITS}|${DIGITS}\.?)(?:[eE][+-]?${DIGITS})?$`
);
const SPECIAL_LITERAL = /^([+-]?)(inf|infinity|nan)$/i;

/**
 * Parses a decimal floating-point literal. Accepts surrounding whitespace,
 * exponents, digit-group underscores and the `inf` / `infinity` / `nan` words.
 * Returns null for anything else, including the empty string.
 */
export function parseFloatLiteral(text: string): number | null {
  const trimmed = text.trim();
  const special = SPECIAL_LITERAL.exec(trimmed);
  if (special) {
    if (special[2].toLowerCase() === "nan") {
      return Number.NaN;
    }
    return special[1] === "-" ? Number.NEGATIVE_INFINITY : Number.POSITIVE_INFINITY;
  }
  if (!FLOAT_LITERAL.test(trimmed)) {
    return null;
  }
  return Number(trimmed.replace(/_/g, ""));
}

/**
 * Splits file content into lines. `\r\n` and `\r` count as line breaks, and a
 * trailing break does not yield an extra empty line.
 */
export function splitLines(content: string): string[] {
  if (content.length === 0) {
    return [];
  }
  const lines = content.split(/\r\n|\r|\n/);
  if (lines[lines.length - 1] === "") {
    lines.pop();
  }
  return lines;
}

export function parseLogLine(raw: string, lineNumber: number): TimingSample {
  const segments = raw.trim().split(TAG_DELIMITER);
  if (segments.length < 2) {
    throw new FormatError(`expected "<TAG>${TAG_DELIMITER}<key>${KEY_VALUE_DELIMITER}<value>,..."`, lineNumber, raw);
  }
  const [tag, rest] = segments;

  const firstField = rest.trim().split(FIELD_DELIMITER)[0];
  const keyValue = firstField.split(KEY_VALUE_DELIMITER);
  if (keyValue.length < 2) {
    throw new FormatError(`first field ${JSON.stringify(firstField)} has no "${KEY_VALUE_DELIMITER}"`, lineNumber, raw);
  }

  const value = parseFloatLiteral(keyValue[1]);
  if (value === null) {
    throw new ParseError(lineNumber, raw, keyValue[1]);
  }

  return { tag, value, lineNumber };
}
