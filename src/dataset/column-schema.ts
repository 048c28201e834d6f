/**
 * Column names and canonical column order
 */

// =============================================================================
// COLUMN NAMES
// =============================================================================

export const HgvsColumn = {
  NUCLEOTIDE: "hgvs_nt",
  TRANSCRIPT: "hgvs_splice",
  PROTEIN: "hgvs_pro",
} as const;

export type HgvsColumn = (typeof HgvsColumn)[keyof typeof HgvsColumn];

/** HGVS columns in canonical order */
export const HGVS_COLUMNS: readonly HgvsColumn[] = [
  HgvsColumn.NUCLEOTIDE,
  HgvsColumn.TRANSCRIPT,
  HgvsColumn.PROTEIN,
];

/** Column every scores file must define */
export const SCORE_COLUMN = "score";

/** Rank of every column not pinned by a schema */
const UNPINNED_RANK = 100;

export function isHgvsColumn(name: string): name is HgvsColumn {
  return HGVS_COLUMNS.some((column) => column === name);
}

// =============================================================================
// SCHEMA
// =============================================================================

/**
 * Declared column order for one dataset kind
 *
 * HGVS columns come first, then the kind's pinned columns, then every other
 * column in upload order.
 */
export class ColumnSchema {
  private readonly ranks: ReadonlyMap<string, number>;

  constructor(readonly pinned: readonly string[]) {
    this.ranks = new Map([...HGVS_COLUMNS, ...pinned].map((column, rank) => [column, rank]));
  }

  rank(column: string): number {
    return this.ranks.get(column) ?? UNPINNED_RANK;
  }

  /**
   * Columns sorted into canonical order; ties keep their input order
   */
  order(columns: readonly string[]): string[] {
    return columns
      .map((column, position) => ({ column, position }))
      .sort((a, b) => this.rank(a.column) - this.rank(b.column) || a.position - b.position)
      .map(({ column }) => column);
  }

  static readonly SCORES = new ColumnSchema([SCORE_COLUMN]);
  static readonly COUNTS = new ColumnSchema([]);
}
