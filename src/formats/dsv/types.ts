/**
 * Delimited Table Type Definitions
 *
 * Types for reading a delimited text upload into a header row and data rows.
 */

// =============================================================================
// TYPES
// =============================================================================

/**
 * Parser state for the CSV row state machine
 */
export enum CSVParseState {
  FIELD_START,
  UNQUOTED_FIELD,
  QUOTED_FIELD,
  QUOTE_IN_QUOTED,
}

/**
 * One data row and the line it started on
 */
export interface DelimitedRow {
  readonly fields: readonly string[];
  /** 1-based source line, counting comment and blank lines */
  readonly lineNumber: number;
}

/**
 * Header and data rows of a delimited upload
 */
export interface DelimitedTable {
  readonly headers: readonly string[];
  readonly rows: readonly DelimitedRow[];
}

/**
 * Options for reading delimited text
 */
export interface DSVReadOptions {
  delimiter?: string;
  quote?: string;
  escape?: string;

  skipEmptyLines?: boolean;
  /** Lines starting with this prefix are skipped outside quoted fields */
  commentPrefix?: string;

  /** Maximum lines a single quoted field may span */
  maxFieldLines?: number;

  /**
   * Called for malformed rows; the row is dropped and reading continues.
   * Defaults to throwing DSVParseError.
   */
  onError?: (error: string, lineNumber?: number) => void;
}
