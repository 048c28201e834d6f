/**
 * @module dataset/variant-validator
 * @description HGVS cell validation with column binding rules
 *
 * Wraps the grammar matcher with the rules for which prefix is legal in
 * which logical column. Malformed cells come back as error values.
 */

import { formatVariant, matchVariant } from "../hgvs";
import type { ParsedVariant, VariantPrefix } from "../hgvs";
import { HgvsColumn } from "./column-schema";
import { DEFAULT_NULLS, type NullTokens } from "./null-tokens";
import type { WarningHandler } from "./types";

// =============================================================================
// TYPES
// =============================================================================

export type LogicalColumn = "nucleotide" | "transcript" | "protein";

const COLUMN_NAMES: Record<LogicalColumn, HgvsColumn> = {
  nucleotide: HgvsColumn.NUCLEOTIDE,
  transcript: HgvsColumn.TRANSCRIPT,
  protein: HgvsColumn.PROTEIN,
};

export interface VariantValidationOptions {
  /** A transcript column is populated alongside the nucleotide column */
  spliceDefined?: boolean;
  targetSequence?: string | null;
  relaxedOrdering?: boolean;
  nullTokens?: NullTokens;
  onWarning?: WarningHandler;
}

export type VariantValidation =
  | { readonly kind: "null" }
  | {
      readonly kind: "variant";
      readonly variant: ParsedVariant;
      /** Null for legacy sentinels, which carry no prefix */
      readonly prefix: VariantPrefix | null;
      /** Canonical text */
      readonly text: string;
    }
  | {
      readonly kind: "error";
      readonly message: string;
      /** Prefix of a well-formed variant bound to the wrong column */
      readonly prefix: VariantPrefix | null;
    };

const SENTINEL_REPLACEMENTS = {
  wildtype: "one of 'g.=', 'c.=' or 'n.='",
  synonymous: "'p.(=)'",
} as const;

// =============================================================================
// PREFIX BINDING
// =============================================================================

/**
 * Message for a prefix used in the wrong column, or null when it is legal
 */
export function checkPrefixForColumn(
  text: string,
  prefix: VariantPrefix,
  column: LogicalColumn,
  spliceDefined: boolean
): string | null {
  const name = COLUMN_NAMES[column];
  switch (column) {
    case "nucleotide":
      if (spliceDefined) {
        return prefix === "g"
          ? null
          : `${name}: '${text}' is not a genomic variant (prefix 'g.'). ` +
              "Nucleotide variants must be genomic if transcript variants are also present";
      }
      return prefix === "c" || prefix === "n"
        ? null
        : `${name}: '${text}' is not a transcript variant. ` +
            "The accepted transcript variant prefixes are 'c.' or 'n.'";
    case "transcript":
      return prefix === "c" || prefix === "n"
        ? null
        : `${name}: '${text}' is not a transcript variant. ` +
            "The accepted transcript variant prefixes are 'c.' or 'n.'";
    case "protein":
      return prefix === "p"
        ? null
        : `${name}: '${text}' is not a protein variant. The accepted protein variant prefix is 'p.'`;
  }
}

function assertLogicalColumn(column: string): asserts column is LogicalColumn {
  if (!Object.hasOwn(COLUMN_NAMES, column)) {
    throw new TypeError(
      `Unknown column '${column}'. Expected one of ${Object.keys(COLUMN_NAMES).join(", ")}`
    );
  }
}

// =============================================================================
// VALIDATION
// =============================================================================

/**
 * Validate one HGVS cell for a logical column
 *
 * @example
 * ```typescript
 * validateVariant("c.1A>G", "nucleotide");
 * // { kind: "variant", prefix: "c", text: "c.1A>G", variant: {...} }
 * validateVariant("p.Gly1Ala", "nucleotide");
 * // { kind: "error", message: "hgvs_nt: 'p.Gly1Ala' is not a transcript variant. ..." }
 * ```
 *
 * @throws {TypeError} When `column` is not a logical column name
 */
export function validateVariant(
  token: string | number | null | undefined,
  column: LogicalColumn,
  options: VariantValidationOptions = {}
): VariantValidation {
  assertLogicalColumn(column);
  const nulls = options.nullTokens ?? DEFAULT_NULLS;

  if (nulls.isNull(token)) return { kind: "null" };
  const value = String(token);

  const result = matchVariant(value, {
    targetSequence: options.targetSequence ?? null,
    relaxedOrdering: options.relaxedOrdering ?? false,
  });
  if (!result.success) {
    return { kind: "error", message: `${value}: ${result.error}`, prefix: null };
  }

  const variant = result.data;
  const text = formatVariant(variant);

  if (variant.level === "sentinel") {
    const warn = options.onWarning ?? ((warning: string): void => console.warn(`HGVS Warning: ${warning}`));
    warn(
      `'${value}' is deprecated and should be replaced by ${SENTINEL_REPLACEMENTS[variant.sentinel]}`
    );
    return { kind: "variant", variant, prefix: null, text };
  }

  const problem = checkPrefixForColumn(text, variant.prefix, column, options.spliceDefined ?? false);
  return problem === null
    ? { kind: "variant", variant, prefix: variant.prefix, text }
    : { kind: "error", message: problem, prefix: variant.prefix };
}
