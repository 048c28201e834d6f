/**
 * @module dataset/records
 * @description Variant records built from validated tables
 *
 * Score rows are grouped by primary key in first-seen order and paired
 * positionally with the count rows of the same key. The tables are
 * expected to have passed the consistency check; the builder only asserts
 * the preconditions it depends on.
 */

import { RecordAssemblyError } from "../errors";
import { HgvsColumn, isHgvsColumn } from "./column-schema";
import type { DatasetTable } from "./table";
import type { Cell, VariantRecord } from "./types";

type Row = Record<string, Cell>;

function groupByKey(table: DatasetTable, indexColumn: HgvsColumn): Map<Cell, Row[]> {
  const groups = new Map<Cell, Row[]>();
  const keys = table.column(indexColumn);
  table.records().forEach((row, i) => {
    const key = keys[i] ?? null;
    const group = groups.get(key) ?? [];
    group.push(row);
    groups.set(key, group);
  });
  return groups;
}

function sortedKeys(table: DatasetTable, indexColumn: HgvsColumn): string[] {
  return table
    .column(indexColumn)
    .map((cell) => (cell === null ? "" : String(cell)))
    .sort();
}

function hgvsField(row: Row, column: HgvsColumn): string | null {
  const value = row[column];
  return value === null || value === undefined || typeof value === "number" ? null : value;
}

/**
 * Row without HGVS columns, NaN replaced by null
 */
function residual(row: Row): Row {
  return Object.fromEntries(
    Object.entries(row)
      .filter(([column]) => !isHgvsColumn(column))
      .map(([column, value]): [string, Cell] => [
        column,
        typeof value === "number" && Number.isNaN(value) ? null : value,
      ])
  );
}

function sameData(a: Row, b: Row): boolean {
  const keys = Object.keys(a);
  return (
    keys.length === Object.keys(b).length &&
    keys.every((key) => Object.hasOwn(b, key) && Object.is(a[key], b[key]))
  );
}

/**
 * Build one record per score row
 *
 * `data.counts` is empty when there is no counts table, or when a count
 * row carries exactly the same data as its score row.
 *
 * @example
 * ```typescript
 * const records = buildVariantRecords(scores.table, counts.table, "hgvs_nt");
 * records[0]?.data.scores; // { score: 0.5 }
 * ```
 *
 * @throws {RecordAssemblyError} When the two tables are not keyed by the
 * same primary key values, each the same number of times
 */
export function buildVariantRecords(
  scores: DatasetTable,
  counts: DatasetTable | null,
  indexColumn: HgvsColumn
): VariantRecord[] {
  if (scores.rowCount === 0) return [];

  let countGroups = new Map<Cell, Row[]>();
  if (counts !== null && counts.rowCount > 0) {
    const scoreKeys = sortedKeys(scores, indexColumn);
    const countKeys = sortedKeys(counts, indexColumn);
    if (scoreKeys.length !== countKeys.length || scoreKeys.some((key, i) => key !== countKeys[i])) {
      throw new RecordAssemblyError(
        `Scores and counts are not keyed by the same '${indexColumn}' values`
      );
    }
    countGroups = groupByKey(counts, indexColumn);
  }

  const records: VariantRecord[] = [];
  for (const [key, scoreRows] of groupByKey(scores, indexColumn)) {
    // Equal sorted keys give every key the same number of rows in both tables
    const countRows = countGroups.get(key) ?? [];

    scoreRows.forEach((scoreRow, i) => {
      const scoreData = residual(scoreRow);
      const countRow = countRows[i];
      const countData: Row = countRow === undefined ? {} : residual(countRow);
      records.push({
        hgvs_nt: hgvsField(scoreRow, HgvsColumn.NUCLEOTIDE),
        hgvs_splice: hgvsField(scoreRow, HgvsColumn.TRANSCRIPT),
        hgvs_pro: hgvsField(scoreRow, HgvsColumn.PROTEIN),
        data: {
          scores: scoreData,
          counts: sameData(scoreData, countData) ? {} : countData,
        },
      });
    });
  }

  return records;
}

/**
 * Data columns of a table, in table order
 */
export function dataColumns(table: DatasetTable): string[] {
  return table.columns.filter((column) => !isHgvsColumn(column));
}
