/**
 * @module formats/dsv/reader
 * @description Synchronous reader for delimited text uploads
 *
 * Reads a whole upload held in memory into a header row and data rows.
 * Quoted fields may span lines; blank and comment lines are skipped
 * outside quoted fields. Rows shorter than the header are padded with
 * empty fields; longer rows and unclosed quotes go to `onError`.
 */

import { type } from "arktype";
import { DSVParseError, ValidationError } from "../../errors";
import {
  COMMENT_PREFIX,
  DEFAULT_DELIMITER,
  DEFAULT_ESCAPE,
  DEFAULT_QUOTE,
  MAX_FIELD_LINES,
} from "./constants";
import { hasBalancedQuotes, parseCSVRow } from "./state-machine";
import type { DelimitedRow, DelimitedTable, DSVReadOptions } from "./types";
import { normalizeLineEndings, padRow, removeBOM } from "./utils";
import { DSVReadOptionsSchema } from "./validation";

type ResolvedOptions = Required<DSVReadOptions>;

function resolveOptions(options: DSVReadOptions): ResolvedOptions {
  const validation = DSVReadOptionsSchema(options);
  if (validation instanceof type.errors) {
    throw new ValidationError(`Invalid DSV reader options: ${validation.summary}`);
  }

  return {
    delimiter: DEFAULT_DELIMITER,
    quote: DEFAULT_QUOTE,
    escape: DEFAULT_ESCAPE,
    skipEmptyLines: true,
    commentPrefix: COMMENT_PREFIX,
    maxFieldLines: MAX_FIELD_LINES,
    onError: (error: string, lineNumber?: number): void => {
      throw new DSVParseError(error, lineNumber);
    },
    ...options,
  };
}

/**
 * Read delimited text into a header and data rows
 *
 * @example
 * ```typescript
 * const table = readDelimitedTable("hgvs_nt,score\nc.1A>G,0.5\n");
 * table.headers; // ["hgvs_nt", "score"]
 * table.rows[0]?.fields; // ["c.1A>G", "0.5"]
 * ```
 *
 * @throws {ValidationError} When options are invalid
 * @throws {DSVParseError} On malformed rows when no `onError` is given
 */
export function readDelimitedTable(text: string, options: DSVReadOptions = {}): DelimitedTable {
  const opts = resolveOptions(options);
  const lines = normalizeLineEndings(removeBOM(text)).split("\n");

  let headers: string[] | null = null;
  const rows: DelimitedRow[] = [];

  let accumulated = "";
  let rowStartLine = 0;
  let linesInRow = 0;

  const emit = (): void => {
    let fields: string[];
    try {
      fields = parseCSVRow(accumulated, opts.delimiter, opts.quote, opts.escape);
    } catch (error) {
      if (!(error instanceof DSVParseError)) throw error;
      opts.onError(`Unclosed quote in field starting at line ${rowStartLine}`, rowStartLine);
      return;
    }

    if (headers === null) {
      headers = fields;
      return;
    }

    const padded = padRow(fields, headers.length);
    if (padded === null) {
      opts.onError(
        `Expected ${headers.length} fields on line ${rowStartLine}, found ${fields.length}`,
        rowStartLine
      );
      return;
    }
    rows.push({ fields: padded, lineNumber: rowStartLine });
  };

  lines.forEach((line, index) => {
    const lineNumber = index + 1;
    const inQuotedField = linesInRow > 0;

    if (!inQuotedField) {
      if (opts.skipEmptyLines && line.trim() === "") return;
      if (line.startsWith(opts.commentPrefix)) return;
      accumulated = line;
      rowStartLine = lineNumber;
      linesInRow = 1;
    } else {
      accumulated += `\n${line}`;
      linesInRow++;
    }

    if (hasBalancedQuotes(accumulated, opts.quote, opts.escape)) {
      emit();
      linesInRow = 0;
    } else if (linesInRow >= opts.maxFieldLines) {
      opts.onError(
        `Field starting at line ${rowStartLine} exceeds maximum line limit (${opts.maxFieldLines})`,
        rowStartLine
      );
      linesInRow = 0;
    }
  });

  if (linesInRow > 0) {
    opts.onError(`Unclosed quote in field starting at line ${rowStartLine}`, rowStartLine);
  }

  return { headers: headers ?? [], rows };
}
