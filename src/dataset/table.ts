/**
 * In-memory dataset table
 *
 * Named columns over rows of cells. Tables are never mutated; every
 * transformation returns a new table.
 */

import type { Cell } from "./types";

export class DatasetTable {
  constructor(
    readonly columns: readonly string[],
    readonly rows: readonly (readonly Cell[])[]
  ) {}

  get rowCount(): number {
    return this.rows.length;
  }

  /** True when the table has no rows or no columns */
  get isEmpty(): boolean {
    return this.rows.length === 0 || this.columns.length === 0;
  }

  has(column: string): boolean {
    return this.columns.includes(column);
  }

  /**
   * Cells of one column, top to bottom
   *
   * @throws {TypeError} When the column does not exist
   */
  column(name: string): Cell[] {
    const index = this.columns.indexOf(name);
    if (index === -1) {
      throw new TypeError(`Unknown column '${name}'. Columns are: ${this.columns.join(", ")}`);
    }
    return this.rows.map((row) => row[index] ?? null);
  }

  /**
   * Replace a column's cells, or append the column when it is missing
   */
  withColumn(name: string, cells: readonly Cell[]): DatasetTable {
    if (cells.length !== this.rows.length) {
      throw new TypeError(`Column '${name}' has ${cells.length} cells, expected ${this.rows.length}`);
    }
    const index = this.columns.indexOf(name);
    if (index === -1) {
      return new DatasetTable(
        [...this.columns, name],
        this.rows.map((row, i) => [...row, cells[i] ?? null])
      );
    }
    return new DatasetTable(
      this.columns,
      this.rows.map((row, i) => row.map((cell, j) => (j === index ? (cells[i] ?? null) : cell)))
    );
  }

  /**
   * Table with its columns in the given order
   */
  reorder(columns: readonly string[]): DatasetTable {
    const indexes = columns.map((column) => {
      const index = this.columns.indexOf(column);
      if (index === -1) throw new TypeError(`Unknown column '${column}'`);
      return index;
    });
    return new DatasetTable(
      columns,
      this.rows.map((row) => indexes.map((index) => row[index] ?? null))
    );
  }

  /**
   * Rows as column-to-cell mappings
   */
  records(): Record<string, Cell>[] {
    return this.rows.map((row) =>
      Object.fromEntries(this.columns.map((column, i): [string, Cell] => [column, row[i] ?? null]))
    );
  }

  /** True when every cell of the column is null */
  isColumnNull(name: string): boolean {
    return this.column(name).every((cell) => cell === null);
  }

  /** True when some, but not all, cells of the column are null */
  isColumnPartiallyNull(name: string): boolean {
    const cells = this.column(name);
    const nulls = cells.filter((cell) => cell === null).length;
    return nulls > 0 && nulls < cells.length;
  }
}
