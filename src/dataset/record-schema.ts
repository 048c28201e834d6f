/**
 * @module dataset/record-schema
 * @description Shape checks for a variant record's data mapping
 *
 * Used when records are built or edited outside the ingestion pipeline,
 * before they are handed to persistence.
 */

import { type } from "arktype";
import { SCORE_COLUMN } from "./column-schema";

const DATA_KEYS = ["scores", "counts"] as const;

/**
 * Column-to-value mapping of one data section
 */
export const DataSectionSchema = type({ "[string]": "number|string|null" });

/**
 * Columns a dataset declares for its records
 */
export interface DeclaredColumns {
  readonly scoreColumns: readonly string[];
  readonly countColumns: readonly string[];
}

function describe(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  return typeof value;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Check a record's `data` mapping
 *
 * It must hold exactly the `scores` and `counts` keys, both mappings of
 * column to number, string or null, and `scores` must hold `score`.
 *
 * @returns every problem found; empty when the mapping is usable
 */
export function validateRecordData(data: unknown): string[] {
  if (!isPlainObject(data)) {
    return [`Variant data must be an object not ${describe(data)}.`];
  }

  const errors: string[] = [];
  for (const key of DATA_KEYS) {
    if (!(key in data)) {
      errors.push(`Missing the required key '${key}'.`);
    }
  }

  const extras = Object.keys(data).filter((key) => !DATA_KEYS.some((expected) => expected === key));
  if (extras.length > 0) {
    errors.push(`Encountered unexpected keys '${extras.join(", ")}'.`);
  }

  for (const key of DATA_KEYS) {
    if (!(key in data)) continue;
    const section = data[key];
    if (!isPlainObject(section)) {
      errors.push(`Value for '${key}' must be an object not ${describe(section)}.`);
      continue;
    }
    const checked = DataSectionSchema(section);
    if (checked instanceof type.errors) {
      errors.push(`Value for '${key}' is invalid: ${checked.summary}`);
    }
    if (key === "scores" && !(SCORE_COLUMN in section)) {
      errors.push(`Missing required column '${SCORE_COLUMN}' in variant's score data.`);
    }
  }

  return errors;
}

function sameColumns(a: readonly string[], b: readonly string[]): boolean {
  return a.length === b.length && a.every((column, i) => column === b[i]);
}

/**
 * Check that a record's data columns are the ones its dataset declares
 *
 * @returns every mismatch found; empty when the columns agree
 */
export function validateColumnsMatch(
  record: { readonly data: { readonly scores: object; readonly counts: object } },
  declared: DeclaredColumns
): string[] {
  const errors: string[] = [];
  const scoreColumns = Object.keys(record.data.scores);
  const countColumns = Object.keys(record.data.counts);

  if (!sameColumns(scoreColumns, declared.scoreColumns)) {
    errors.push(
      `Variant defines score columns '${scoreColumns.join(", ")}' ` +
        `but parent defines columns '${declared.scoreColumns.join(", ")}'.`
    );
  }
  if (!sameColumns(countColumns, declared.countColumns)) {
    errors.push(
      `Variant defines count columns '${countColumns.join(", ")}' ` +
        `but parent defines columns '${declared.countColumns.join(", ")}'.`
    );
  }
  return errors;
}
