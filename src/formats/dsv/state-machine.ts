/**
 * CSV State Machine Module
 *
 * RFC 4180 row splitting: quoted fields, doubled quotes and fields that
 * span several lines once the caller has joined them.
 */

import { DSVParseError } from "../../errors";
import { CSVParseState } from "./types";

/**
 * Count unescaped quotes in a line
 * A doubled quote counts as an escaped quote when the escape character is
 * the quote itself.
 */
export function countUnescapedQuotes(line: string, quote: string, escapeChar: string): number {
  let count = 0;
  for (let i = 0; i < line.length; i++) {
    if (line[i] !== quote) continue;
    if (escapeChar === quote && line[i + 1] === quote) {
      i++;
    } else {
      count++;
    }
  }
  return count;
}

/**
 * True when every opened quote in the text has been closed
 */
export function hasBalancedQuotes(line: string, quote: string, escapeChar: string): boolean {
  return countUnescapedQuotes(line, quote, escapeChar) % 2 === 0;
}

/**
 * Split one (possibly multi-line) row into fields
 *
 * Characters after a closing quote are kept as part of the field.
 *
 * @throws {DSVParseError} When a quoted field is never closed
 */
export function parseCSVRow(
  line: string,
  delimiter: string = ",",
  quote: string = '"',
  escapeChar: string = '"'
): string[] {
  const fields: string[] = [];
  let currentField = "";
  let state = CSVParseState.FIELD_START;

  for (let i = 0; i < line.length; i++) {
    const char = line.charAt(i);
    const nextChar = line.charAt(i + 1);

    switch (state) {
      case CSVParseState.FIELD_START:
        if (char === quote) {
          state = CSVParseState.QUOTED_FIELD;
        } else if (char === delimiter) {
          fields.push("");
        } else {
          currentField = char;
          state = CSVParseState.UNQUOTED_FIELD;
        }
        break;

      case CSVParseState.UNQUOTED_FIELD:
        if (char === delimiter) {
          fields.push(currentField);
          currentField = "";
          state = CSVParseState.FIELD_START;
        } else {
          currentField += char;
        }
        break;

      case CSVParseState.QUOTED_FIELD:
        if (char !== quote) {
          currentField += char;
        } else if (escapeChar === quote && nextChar === quote) {
          currentField += quote;
          i++;
        } else {
          state = CSVParseState.QUOTE_IN_QUOTED;
        }
        break;

      case CSVParseState.QUOTE_IN_QUOTED:
        if (char === delimiter) {
          fields.push(currentField);
          currentField = "";
          state = CSVParseState.FIELD_START;
        } else {
          currentField += char;
          state = CSVParseState.UNQUOTED_FIELD;
        }
        break;
    }
  }

  if (state === CSVParseState.QUOTED_FIELD) {
    throw new DSVParseError("Unclosed quote in CSV field", undefined, undefined, line);
  }
  if (state === CSVParseState.UNQUOTED_FIELD || state === CSVParseState.QUOTE_IN_QUOTED) {
    fields.push(currentField);
  } else if (line.endsWith(delimiter)) {
    // Trailing delimiter means empty final field
    fields.push("");
  }

  return fields;
}
