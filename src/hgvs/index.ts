/**
 * HGVS variant grammar
 *
 * Matching, formatting and target checks for single HGVS tokens.
 */

export {
  AMINO_ACIDS,
  LEGACY_SENTINELS,
  NO_CHANGE_TOKENS,
  NUCLEOTIDE_PREFIXES,
  VARIANT_PREFIXES,
} from "./constants";
export { formatVariant, matchVariant, parseVariant } from "./parser";
export { validateAgainstTarget } from "./target";
export type {
  Deletion,
  Delins,
  Endpoint,
  EventKind,
  InsertedSequence,
  Insertion,
  IntronicOffset,
  MatchOptions,
  MatchResult,
  MatchScope,
  NoChange,
  NucleotideEvent,
  NucleotidePosition,
  NucleotidePrefix,
  NucleotideVariant,
  ParsedVariant,
  ProteinEvent,
  ProteinPosition,
  ProteinVariant,
  SentinelVariant,
  Substitution,
  UncertainRange,
  UnknownPosition,
  VariantEvent,
  VariantPrefix,
} from "./types";
