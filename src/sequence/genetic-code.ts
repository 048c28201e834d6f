/**
 * Standard genetic code translation
 *
 * Target sequences supplied as DNA are translated in frame 1 before
 * protein variants are checked against them. The codon table lives in
 * `standard-code.json` (NCBI table 1).
 *
 * @module sequence/genetic-code
 */

import standardCode from "./standard-code.json";

const CODONS: Readonly<Record<string, string>> = standardCode.codons;

/**
 * Translation of whole codons plus the bases left over at the end
 */
export interface Translation {
  readonly protein: string;
  /** Trailing bases that do not fill a codon; empty when the length is a multiple of 3 */
  readonly remainder: string;
}

/**
 * Translate a DNA (or RNA) sequence with the standard code
 *
 * Codons containing ambiguous bases translate to `X`; stops translate to `*`
 * and do not end translation.
 *
 * @example
 * ```typescript
 * translateDna("ATGGCTA"); // { protein: "MA", remainder: "A" }
 * ```
 */
export function translateDna(sequence: string): Translation {
  const dna = sequence.toUpperCase().replace(/U/g, "T");
  const usable = dna.length - (dna.length % 3);

  let protein = "";
  for (let i = 0; i < usable; i += 3) {
    protein += CODONS[dna.substring(i, i + 3)] ?? "X";
  }

  return { protein, remainder: dna.substring(usable) };
}
