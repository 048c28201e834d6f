/**
 * @module formats/dsv
 * @description Delimited text support for dataset uploads
 *
 * RFC 4180 quoting, multi-line quoted fields, comment and blank line
 * skipping, BOM and line ending normalization.
 *
 * @example
 * ```typescript
 * import { readDelimitedTable } from './formats/dsv';
 *
 * const { headers, rows } = readDelimitedTable(text, {
 *   onError: (message) => errors.push(message),
 * });
 * ```
 */

export type { DelimitedRow, DelimitedTable, DSVReadOptions } from "./types";
export { CSVParseState } from "./types";

export { COMMENT_PREFIX, DEFAULT_DELIMITER, DEFAULT_ESCAPE, DEFAULT_QUOTE } from "./constants";
export { readDelimitedTable } from "./reader";
export { countUnescapedQuotes, hasBalancedQuotes, parseCSVRow } from "./state-machine";
export { normalizeLineEndings, padRow, removeBOM } from "./utils";
export { DSVReadOptionsSchema } from "./validation";
