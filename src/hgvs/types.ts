/**
 * HGVS Type Definitions
 *
 * A parsed variant is a prefix plus one or more events. Events form a
 * closed tagged union; each event is generic over the position type so the
 * nucleotide and protein grammars share one shape.
 */

import type { NUCLEOTIDE_PREFIXES, VARIANT_PREFIXES } from "./constants";

// =============================================================================
// PREFIXES
// =============================================================================

export type NucleotidePrefix = (typeof NUCLEOTIDE_PREFIXES)[number];

export type VariantPrefix = (typeof VARIANT_PREFIXES)[number];

// =============================================================================
// POSITIONS
// =============================================================================

/**
 * Intronic offset relative to the nearest exonic base
 * `amount` is null for an unknown offset (`+?`).
 */
export interface IntronicOffset {
  readonly sign: "+" | "-";
  readonly amount: number | null;
}

/**
 * Nucleotide position such as `12`, `-5`, `*3` or `31+1`
 */
export interface NucleotidePosition {
  readonly kind: "known";
  readonly base: number;
  /** "5" for `-N` (5' UTR), "3" for `*N` (3' UTR) */
  readonly utr?: "5" | "3";
  readonly offset?: IntronicOffset;
}

/**
 * Protein position: the reference residue and its number, e.g. `Gly12`
 */
export interface ProteinPosition {
  readonly kind: "residue";
  readonly aminoAcid: string;
  readonly base: number;
}

/**
 * Position written as `?`
 */
export interface UnknownPosition {
  readonly kind: "unknown";
}

/**
 * Uncertain endpoint written as `(start_end)`, e.g. `(?_-245)`
 */
export interface UncertainRange<P> {
  readonly kind: "range";
  readonly start: P | UnknownPosition;
  readonly end: P | UnknownPosition;
}

export type Endpoint<P> = P | UnknownPosition | UncertainRange<P>;

// =============================================================================
// EVENTS
// =============================================================================

/**
 * Inserted material: explicit residues or a length (`N[12]`, `(12)`)
 */
export type InsertedSequence =
  | { readonly kind: "sequence"; readonly residues: string }
  | { readonly kind: "count"; readonly count: number; readonly notation: "bracket" | "paren" };

export interface Substitution<P> {
  readonly kind: "substitution";
  readonly position: P;
  readonly ref: string;
  readonly alt: string;
  /** `=/` (mosaic) or `=//` (chimeric) marker */
  readonly mosaic?: "mosaic" | "chimeric";
}

export interface NoChange<P> {
  readonly kind: "no-change";
  /** Absent for a whole-sequence `=` */
  readonly position?: P;
  readonly ref?: string;
}

export interface Deletion<P> {
  readonly kind: "deletion";
  readonly start: Endpoint<P>;
  readonly end?: Endpoint<P>;
  /** Explicit deleted residues, e.g. `delAC` */
  readonly deleted?: string;
}

export interface Insertion<P> {
  readonly kind: "insertion";
  readonly start: P | UnknownPosition;
  readonly end: P | UnknownPosition;
  readonly inserted: InsertedSequence;
}

export interface Delins<P> {
  readonly kind: "delins";
  readonly start: Endpoint<P>;
  readonly end?: Endpoint<P>;
  readonly inserted: InsertedSequence;
}

export type VariantEvent<P> = Substitution<P> | NoChange<P> | Deletion<P> | Insertion<P> | Delins<P>;

export type EventKind = VariantEvent<unknown>["kind"];

export type NucleotideEvent = VariantEvent<NucleotidePosition>;

export type ProteinEvent = VariantEvent<ProteinPosition>;

// =============================================================================
// VARIANTS
// =============================================================================

export interface NucleotideVariant {
  readonly level: "nucleotide";
  readonly prefix: NucleotidePrefix;
  readonly multi: boolean;
  readonly events: readonly NucleotideEvent[];
  readonly raw: string;
}

export interface ProteinVariant {
  readonly level: "protein";
  readonly prefix: "p";
  readonly multi: boolean;
  /** Written inside parentheses, e.g. `p.(Gly12Ala)` */
  readonly predicted: boolean;
  readonly events: readonly ProteinEvent[];
  readonly raw: string;
}

/**
 * Legacy `_wt`/`_sy` token with no prefix
 */
export interface SentinelVariant {
  readonly level: "sentinel";
  readonly sentinel: "wildtype" | "synonymous";
  readonly raw: string;
}

export type ParsedVariant = NucleotideVariant | ProteinVariant | SentinelVariant;

/**
 * Which token shapes the matcher accepts
 */
export type MatchScope = "single" | "multi" | "any";

export interface MatchOptions {
  scope?: MatchScope;
  /** Reference sequence for positional checks */
  targetSequence?: string | null;
  /** Accept multi-variant events in any position order */
  relaxedOrdering?: boolean;
}

/**
 * Outcome of a match: a parsed variant or the reason it failed
 */
export type MatchResult =
  | { readonly success: true; readonly data: ParsedVariant }
  | { readonly success: false; readonly error: string };
