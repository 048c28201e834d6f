/**
 * @module hgvs/target
 * @description Positional checks of a parsed variant against a reference
 */

import { oneLetterCode } from "./grammar";
import { isUnknown, knownPositions, nucleotidePositions } from "./position";
import type {
  NucleotideEvent,
  NucleotidePosition,
  ParsedVariant,
  ProteinEvent,
  ProteinPosition,
} from "./types";

const normaliseBases = (value: string): string => value.toUpperCase().replaceAll("U", "T");

function beyondEnd(base: number, target: string): string | null {
  return base > target.length
    ? `position ${base} is beyond the end of the target sequence (length ${target.length})`
    : null;
}

function checkReference(ref: string, base: number, target: string): string | null {
  const found = target.slice(base - 1, base - 1 + ref.length);
  if (found.length < ref.length) {
    return beyondEnd(base - 1 + ref.length, target);
  }
  return normaliseBases(found) === normaliseBases(ref)
    ? null
    : `reference nucleotide '${ref}' at position ${base} does not match the target sequence ('${found}')`;
}

function plainPositions(event: NucleotideEvent): NucleotidePosition[] {
  switch (event.kind) {
    case "substitution":
      return [event.position];
    case "no-change":
      return event.position ? [event.position] : [];
    case "insertion":
      return [event.start, event.end].filter((p): p is NucleotidePosition => !isUnknown(p));
    case "deletion":
    case "delins":
      return [...knownPositions(event.start), ...knownPositions(event.end)];
  }
}

function checkNucleotideEvent(event: NucleotideEvent, target: string): string | null {
  const plain = plainPositions(event).filter((p) => nucleotidePositions.isPlain(p));
  for (const position of plain) {
    const problem = beyondEnd(position.base, target);
    if (problem) return problem;
  }

  switch (event.kind) {
    case "substitution":
      return nucleotidePositions.isPlain(event.position)
        ? checkReference(event.ref, event.position.base, target)
        : null;
    case "no-change":
      return event.position && event.ref && nucleotidePositions.isPlain(event.position)
        ? checkReference(event.ref, event.position.base, target)
        : null;
    case "deletion": {
      if (event.deleted === undefined || event.start.kind !== "known") return null;
      if (!nucleotidePositions.isPlain(event.start)) return null;
      return checkReference(event.deleted, event.start.base, target);
    }
    case "insertion":
    case "delins":
      return null;
  }
}

function residuePositions(event: ProteinEvent): ProteinPosition[] {
  switch (event.kind) {
    case "substitution":
      return [event.position];
    case "no-change":
      return event.position ? [event.position] : [];
    case "insertion":
      return [event.start, event.end].filter((p): p is ProteinPosition => !isUnknown(p));
    case "deletion":
    case "delins":
      return [...knownPositions(event.start), ...knownPositions(event.end)];
  }
}

function checkProteinEvent(event: ProteinEvent, target: string): string | null {
  for (const position of residuePositions(event)) {
    const problem = beyondEnd(position.base, target);
    if (problem) return problem;
    const found = target.charAt(position.base - 1).toUpperCase();
    const expected = oneLetterCode(position.aminoAcid);
    if (expected !== found) {
      return `reference amino acid '${position.aminoAcid}' at position ${position.base} does not match the target sequence ('${found}')`;
    }
  }
  return null;
}

/**
 * Check positions and reference residues of a variant against a target
 *
 * Only plain exonic nucleotide positions map onto the target; UTR and
 * intronic positions are not checked. Protein variants expect a protein
 * target in one-letter codes.
 *
 * @returns a message for the first mismatch, or null
 */
export function validateAgainstTarget(variant: ParsedVariant, target: string): string | null {
  if (variant.level === "sentinel") return null;
  if (variant.level === "protein") {
    for (const event of variant.events) {
      const problem = checkProteinEvent(event, target);
      if (problem) return problem;
    }
    return null;
  }
  for (const event of variant.events) {
    const problem = checkNucleotideEvent(event, target);
    if (problem) return problem;
  }
  return null;
}
