/**
 * Dataset Type Definitions
 */

import type { HgvsColumn } from "./column-schema";
import type { NullTokens } from "./null-tokens";
import type { DatasetTable } from "./table";

// =============================================================================
// CELLS AND SOURCES
// =============================================================================

/**
 * One table cell after reading; null tokens are already null
 */
export type Cell = number | string | null;

export type DatasetKind = "scores" | "counts";

/**
 * Raw upload content
 */
export type SourceContent = string | Uint8Array | ArrayBuffer;

/**
 * An upload held in memory, or a file-like handle read once in full
 */
export type DatasetSource = SourceContent | { read(): SourceContent };

// =============================================================================
// OPTIONS
// =============================================================================

export type WarningHandler = (warning: string) => void;

export interface DatasetValidatorOptions {
  /** Reference sequence (DNA or protein) for positional checks */
  targetSequence?: string | null;
  /** Accept multi-variant events in any position order */
  relaxedOrdering?: boolean;
  /** Skip the duplicate check on the primary column */
  allowIndexDuplicates?: boolean;
  /** Extra columns that must coerce to numbers, beyond the kind's own */
  numericColumns?: string[];
  nullTokens?: NullTokens;
  onWarning?: WarningHandler;
}

// =============================================================================
// RESULTS
// =============================================================================

/**
 * Table plus every error found while validating it
 * `isValid` is true exactly when `errors` is empty; `indexColumn` is null
 * for invalid results.
 */
export interface ValidationResult {
  readonly kind: DatasetKind;
  readonly table: DatasetTable;
  readonly errors: readonly string[];
  readonly isValid: boolean;
  readonly indexColumn: HgvsColumn | null;
}

/**
 * One variant handed to persistence
 */
export interface VariantRecord {
  readonly hgvs_nt: string | null;
  readonly hgvs_splice: string | null;
  readonly hgvs_pro: string | null;
  readonly data: {
    readonly scores: Record<string, Cell>;
    readonly counts: Record<string, Cell>;
  };
}
