/**
 * Null token configuration
 *
 * Cells equal to one of these tokens (case-insensitive), empty cells and
 * whitespace-only cells are null. One instance is injected into each
 * validator rather than read from module state.
 */

/**
 * Tokens treated as null by default, including the missing-value markers
 * spreadsheet exports write
 */
export const DEFAULT_NULL_TOKENS = ["nan", "na", "none", "null", "n/a", "#n/a", "<na>"] as const;

export class NullTokens {
  private readonly tokens: ReadonlySet<string>;

  /** Tokens in the order they are listed in messages */
  readonly listed: readonly string[];

  constructor(tokens: Iterable<string> = DEFAULT_NULL_TOKENS) {
    const listed = [...new Set([...tokens].map((token) => token.trim().toLowerCase()))].filter(
      (token) => token !== ""
    );
    this.listed = listed;
    this.tokens = new Set(listed);
  }

  /**
   * True for null, undefined, NaN, blank strings and listed tokens
   */
  isNull(value: string | number | null | undefined): boolean {
    if (value === null || value === undefined) return true;
    if (typeof value === "number") return Number.isNaN(value);
    const trimmed = value.trim();
    return trimmed === "" || this.tokens.has(trimmed.toLowerCase());
  }

  /**
   * Comma-separated list used in error messages, e.g. "nan, na, none"
   */
  toString(): string {
    return this.listed.join(", ");
  }
}

export const DEFAULT_NULLS = new NullTokens();
