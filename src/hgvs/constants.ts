/**
 * Constants for HGVS variant parsing
 *
 * Prefix sets, residue alphabets and the sentinel tokens that bypass
 * grammar matching.
 */

// ============================================================================
// PREFIXES
// ============================================================================

/** Prefixes of nucleotide-level descriptions */
export const NUCLEOTIDE_PREFIXES = ["g", "c", "n", "m", "r"] as const;

/** Every supported prefix letter */
export const VARIANT_PREFIXES = [...NUCLEOTIDE_PREFIXES, "p"] as const;

/** Prefixes that may use 5'/3' UTR positions (`-N`, `*N`) */
export const UTR_PREFIXES: ReadonlySet<string> = new Set(["c", "r"]);

/** Prefixes that may use intronic offsets (`+N`, `-N`) */
export const INTRONIC_PREFIXES: ReadonlySet<string> = new Set(["c", "n", "r"]);

// ============================================================================
// RESIDUE ALPHABETS
// ============================================================================

/** DNA bases accepted in g./c./n./m. descriptions */
export const DNA_BASES = "ACGTN";

/** RNA bases accepted in r. descriptions */
export const RNA_BASES = "acgun";

/**
 * Three-letter amino acid codes mapped to their one-letter form
 * `Ter` is the stop codon; `*` is accepted as its shorthand.
 */
export const AMINO_ACIDS: Readonly<Record<string, string>> = {
  Ala: "A",
  Arg: "R",
  Asn: "N",
  Asp: "D",
  Cys: "C",
  Gln: "Q",
  Glu: "E",
  Gly: "G",
  His: "H",
  Ile: "I",
  Leu: "L",
  Lys: "K",
  Met: "M",
  Phe: "F",
  Pro: "P",
  Ser: "S",
  Thr: "T",
  Trp: "W",
  Tyr: "Y",
  Val: "V",
  Ter: "*",
};

/** Regex alternation over the three-letter codes */
export const AMINO_ACID_PATTERN = Object.keys(AMINO_ACIDS).join("|");

// ============================================================================
// SENTINELS
// ============================================================================

/**
 * Legacy wildtype/synonymous tokens, matched case-insensitively
 */
export const LEGACY_SENTINELS = {
  WILDTYPE: "_wt",
  SYNONYMOUS: "_sy",
} as const;

/**
 * Modern whole-sequence no-change forms
 */
export const NO_CHANGE_TOKENS = ["g.=", "c.=", "n.=", "m.=", "r.=", "p.=", "p.(=)"] as const;
