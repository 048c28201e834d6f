/**
 * Sequence type inference for target sequences
 */

/**
 * Sequence types recognised for a target
 */
export const SequenceType = {
  DNA: "dna",
  RNA: "rna",
  PROTEIN: "protein",
  UNKNOWN: "unknown",
} as const;

export type SequenceType = (typeof SequenceType)[keyof typeof SequenceType];

const DNA = /^[ACGTN]+$/i;
const RNA = /^[ACGUN]+$/i;
const PROTEIN = /^[ACDEFGHIKLMNPQRSTVWYX*]+$/i;

/**
 * Infer whether a target is DNA, RNA or protein
 *
 * A sequence made only of `A`, `C`, `G` (and `N`) is ambiguous between DNA
 * and RNA and is reported as DNA.
 */
export function inferSequenceType(sequence: string): SequenceType {
  const trimmed = sequence.trim();
  if (trimmed.length === 0) return SequenceType.UNKNOWN;
  if (DNA.test(trimmed)) return SequenceType.DNA;
  if (RNA.test(trimmed)) return SequenceType.RNA;
  if (PROTEIN.test(trimmed)) return SequenceType.PROTEIN;
  return SequenceType.UNKNOWN;
}
