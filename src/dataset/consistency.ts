/**
 * @module dataset/consistency
 * @description Cross-checks of a validated scores and counts pair
 */

import { HGVS_COLUMNS } from "./column-schema";
import type { DatasetTable } from "./table";
import type { Cell, ValidationResult } from "./types";

/**
 * Message used when the two uploads list different variants
 */
export const DIFFERENT_VARIANTS_MESSAGE =
  "Your scores and counts files do not define the same variants. " +
  "Every value of the hgvs_nt, hgvs_splice and hgvs_pro columns must appear " +
  "in both files the same number of times";

function cellKey(cell: Cell): string {
  if (cell === null) return "\u0000";
  return typeof cell === "number" ? `n:${cell}` : `s:${cell}`;
}

function sortedColumn(table: DatasetTable, column: string): string[] {
  return table.has(column) ? table.column(column).map(cellKey).sort() : [];
}

/**
 * True when both columns hold the same values the same number of times
 */
export function sameMultiset(a: DatasetTable, b: DatasetTable, column: string): boolean {
  const left = sortedColumn(a, column);
  const right = sortedColumn(b, column);
  return left.length === right.length && left.every((key, i) => key === right[i]);
}

/**
 * Check that a scores and counts pair define the same variants
 *
 * @returns null when either result is invalid, false when the primary
 * columns differ or any HGVS column holds different values, true otherwise
 */
export function matchDatasets(scores: ValidationResult, counts: ValidationResult): boolean | null {
  if (!scores.isValid || !counts.isValid) return null;
  if (scores.indexColumn !== counts.indexColumn) return false;
  return HGVS_COLUMNS.every((column) => sameMultiset(scores.table, counts.table, column));
}

/**
 * Error text for a pair that does not define the same variants
 *
 * @returns the message, or null when the pair matches or either side is
 * invalid (its own errors are reported instead)
 */
export function checkSameVariants(scores: ValidationResult, counts: ValidationResult): string | null {
  return matchDatasets(scores, counts) === false ? DIFFERENT_VARIANTS_MESSAGE : null;
}
