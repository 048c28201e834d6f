/**
 * @module hgvs/grammar
 * @description Event grammars for nucleotide and protein descriptions
 *
 * One anchored matcher per event kind. A grammar turns the text after the
 * prefix (`12A>G`, `Gly12_Ala14del`) into a typed event, checks the
 * constraints a regex cannot express, and formats events back to text.
 */

import {
  AMINO_ACID_PATTERN,
  AMINO_ACIDS,
  DNA_BASES,
  INTRONIC_PREFIXES,
  RNA_BASES,
  UTR_PREFIXES,
} from "./constants";
import {
  compareKeys,
  endpointKey,
  formatEndpoint,
  formatPosition,
  isRange,
  isUnknown,
  knownPositions,
  NT_ENDPOINT,
  NT_POSITION,
  nucleotidePositions,
  PRO_POSITION,
  parseEndpoint,
  type PositionCodec,
  proteinPositions,
  type SortKey,
  type Tagged,
} from "./position";
import type {
  Endpoint,
  EventKind,
  InsertedSequence,
  NucleotidePosition,
  ProteinPosition,
  VariantEvent,
} from "./types";

// =============================================================================
// TYPES
// =============================================================================

type Groups = Partial<Record<string, string>>;

/**
 * Anchored pattern for one event kind
 * `build` returns the event, or a message when the text matched but
 * breaks a rule the pattern cannot express.
 */
interface EventMatcher<P> {
  readonly kind: EventKind;
  readonly pattern: RegExp;
  build(groups: Groups): VariantEvent<P> | string;
}

export interface Grammar<P extends Tagged> {
  readonly level: "nucleotide" | "protein";
  /** Residue word used in messages */
  readonly residue: "nucleotide" | "amino acid";
  readonly codec: PositionCodec<P>;
  /** Symbol used in `X[12]` counted insertions */
  readonly countSymbol: string;
  readonly matchers: readonly EventMatcher<P>[];
}

// =============================================================================
// SHARED BUILDERS
// =============================================================================

const COUNTED = /^(?<symbol>N|n|Xaa)\[(?<count>\d+)\]$/;
const PARENTHESISED_COUNT = /^\((?<count>\d+)\)$/;

function parseInserted(text: string): InsertedSequence {
  const bracket = COUNTED.exec(text)?.groups?.count;
  if (bracket !== undefined) {
    return { kind: "count", count: Number.parseInt(bracket, 10), notation: "bracket" };
  }
  const paren = PARENTHESISED_COUNT.exec(text)?.groups?.count;
  if (paren !== undefined) {
    return { kind: "count", count: Number.parseInt(paren, 10), notation: "paren" };
  }
  return { kind: "sequence", residues: text };
}

function required(groups: Groups, name: string): string {
  const value = groups[name];
  if (value === undefined) {
    throw new TypeError(`Pattern is missing the '${name}' group`);
  }
  return value;
}

function spanEvent<P extends Tagged>(
  groups: Groups,
  codec: PositionCodec<P>
): { start: Endpoint<P>; end?: Endpoint<P> } {
  const start = parseEndpoint(required(groups, "start"), codec);
  return groups.end === undefined
    ? { start }
    : { start, end: parseEndpoint(groups.end, codec) };
}

// =============================================================================
// NUCLEOTIDE GRAMMAR
// =============================================================================

function nucleotideGrammar(bases: string, countSymbol: string): Grammar<NucleotidePosition> {
  const base = `[${bases}]`;
  const inserted = String.raw`${base}+|${countSymbol}\[\d+\]|\(\d+\)`;
  const codec = nucleotidePositions;

  const position = (groups: Groups): NucleotidePosition | string => {
    const parsed = codec.parse(required(groups, "pos"));
    return isUnknown(parsed) ? "a substitution requires a known position" : parsed;
  };

  return {
    level: "nucleotide",
    residue: "nucleotide",
    codec,
    countSymbol,
    matchers: [
      {
        kind: "substitution",
        pattern: new RegExp(
          `^(?<pos>${NT_POSITION})(?<mosaic>=//|=/)?(?<ref>${base})>(?<alt>${base})$`
        ),
        build(groups) {
          const parsed = position(groups);
          if (typeof parsed === "string") return parsed;
          const mosaic = groups.mosaic === "=//" ? "chimeric" : groups.mosaic === "=/" ? "mosaic" : undefined;
          return {
            kind: "substitution",
            position: parsed,
            ref: required(groups, "ref"),
            alt: required(groups, "alt"),
            ...(mosaic !== undefined ? { mosaic } : {}),
          };
        },
      },
      {
        kind: "no-change",
        pattern: new RegExp(`^(?:(?<pos>${NT_POSITION})(?<ref>${base}+)?)?=$`),
        build(groups) {
          if (groups.pos === undefined) return { kind: "no-change" };
          const parsed = position(groups);
          if (typeof parsed === "string") return parsed;
          return groups.ref === undefined
            ? { kind: "no-change", position: parsed }
            : { kind: "no-change", position: parsed, ref: groups.ref };
        },
      },
      {
        kind: "delins",
        pattern: new RegExp(
          `^(?<start>${NT_ENDPOINT})(?:_(?<end>${NT_ENDPOINT}))?delins(?<inserted>${inserted})$`
        ),
        build(groups) {
          return {
            kind: "delins",
            ...spanEvent(groups, codec),
            inserted: parseInserted(required(groups, "inserted")),
          };
        },
      },
      {
        kind: "deletion",
        pattern: new RegExp(
          `^(?<start>${NT_ENDPOINT})(?:_(?<end>${NT_ENDPOINT}))?del(?<deleted>${base}+)?$`
        ),
        build(groups) {
          const span = spanEvent(groups, codec);
          return groups.deleted === undefined
            ? { kind: "deletion", ...span }
            : { kind: "deletion", ...span, deleted: groups.deleted };
        },
      },
      {
        kind: "insertion",
        pattern: new RegExp(
          `^(?<start>${NT_POSITION})_(?<end>${NT_POSITION})ins(?<inserted>${inserted})$`
        ),
        build(groups) {
          return {
            kind: "insertion",
            start: codec.parse(required(groups, "start")),
            end: codec.parse(required(groups, "end")),
            inserted: parseInserted(required(groups, "inserted")),
          };
        },
      },
    ],
  };
}

export const DNA_GRAMMAR = nucleotideGrammar(DNA_BASES, "N");

export const RNA_GRAMMAR = nucleotideGrammar(RNA_BASES, "n");

// =============================================================================
// PROTEIN GRAMMAR
// =============================================================================

const AA = `(?:${AMINO_ACID_PATTERN})`;
const AA_INSERTED = String.raw`${AA}+|Xaa\[\d+\]|\(\d+\)`;

export const PROTEIN_GRAMMAR: Grammar<ProteinPosition> = {
  level: "protein",
  residue: "amino acid",
  codec: proteinPositions,
  countSymbol: "Xaa",
  matchers: [
    {
      kind: "substitution",
      pattern: new RegExp(`^(?<pos>${PRO_POSITION})(?<alt>${AA}|\\*|\\?)$`),
      build(groups) {
        const position = proteinPositions.parse(required(groups, "pos"));
        if (isUnknown(position)) return "a substitution requires a known position";
        return {
          kind: "substitution",
          position,
          ref: position.aminoAcid,
          alt: required(groups, "alt"),
        };
      },
    },
    {
      kind: "no-change",
      pattern: new RegExp(`^(?<pos>${PRO_POSITION})?=$`),
      build(groups) {
        if (groups.pos === undefined) return { kind: "no-change" };
        const position = proteinPositions.parse(groups.pos);
        if (isUnknown(position)) return "a synonymous variant requires a known position";
        return { kind: "no-change", position };
      },
    },
    {
      kind: "delins",
      pattern: new RegExp(
        `^(?<start>${PRO_POSITION})(?:_(?<end>${PRO_POSITION}))?delins(?<inserted>${AA_INSERTED})$`
      ),
      build(groups) {
        return {
          kind: "delins",
          ...spanEvent(groups, proteinPositions),
          inserted: parseInserted(required(groups, "inserted")),
        };
      },
    },
    {
      kind: "deletion",
      pattern: new RegExp(`^(?<start>${PRO_POSITION})(?:_(?<end>${PRO_POSITION}))?del$`),
      build(groups) {
        return { kind: "deletion", ...spanEvent(groups, proteinPositions) };
      },
    },
    {
      kind: "insertion",
      pattern: new RegExp(
        `^(?<start>${PRO_POSITION})_(?<end>${PRO_POSITION})ins(?<inserted>${AA_INSERTED})$`
      ),
      build(groups) {
        return {
          kind: "insertion",
          start: proteinPositions.parse(required(groups, "start")),
          end: proteinPositions.parse(required(groups, "end")),
          inserted: parseInserted(required(groups, "inserted")),
        };
      },
    },
  ],
};

// =============================================================================
// MATCHING
// =============================================================================

const KIND_LABELS: Record<EventKind, string> = {
  substitution: "substitution",
  "no-change": "no-change",
  deletion: "deletion",
  insertion: "insertion",
  delins: "deletion-insertion",
};

/**
 * Guess which event kind a failed description was aiming for
 * `delins` must be checked before `ins` and `del`, which it contains.
 */
export function inferEventKind(text: string): EventKind {
  if (text.includes("delins")) return "delins";
  if (text.includes("ins")) return "insertion";
  if (text.includes("del")) return "deletion";
  if (text.endsWith("=") && !text.includes(">")) return "no-change";
  return "substitution";
}

/**
 * Match the text of one event against a grammar
 *
 * @returns the event, or a message describing why it was rejected
 */
export function matchEvent<P extends Tagged>(
  text: string,
  grammar: Grammar<P>
): VariantEvent<P> | string {
  for (const matcher of grammar.matchers) {
    const match = matcher.pattern.exec(text);
    if (match) {
      return matcher.build(match.groups ?? {});
    }
  }
  return `'${text}' is not a supported ${KIND_LABELS[inferEventKind(text)]} syntax`;
}

// =============================================================================
// RULES
// =============================================================================

function eventPositions<P extends Tagged>(event: VariantEvent<P>): P[] {
  switch (event.kind) {
    case "substitution":
      return [event.position];
    case "no-change":
      return event.position ? [event.position] : [];
    case "insertion":
      return [event.start, event.end].filter((p): p is P => !isUnknown(p));
    case "deletion":
    case "delins":
      return [...knownPositions(event.start), ...knownPositions(event.end)];
  }
}

function outOfOrder<P extends Tagged>(
  start: Endpoint<P>,
  end: Endpoint<P>,
  codec: PositionCodec<P>
): boolean {
  const startKeys = knownPositions(start).map((p) => codec.sortKey(p));
  const endKeys = knownPositions(end).map((p) => codec.sortKey(p));
  const last = startKeys[startKeys.length - 1];
  const first = endKeys[0];
  return last !== undefined && last !== null && first !== undefined && first !== null
    ? compareKeys(last, first) >= 0
    : false;
}

function rangeOutOfOrder<P extends Tagged>(endpoint: Endpoint<P> | undefined, codec: PositionCodec<P>): boolean {
  if (endpoint === undefined || !isRange(endpoint)) return false;
  return outOfOrder(endpoint.start, endpoint.end, codec);
}

function sameResidue(a: string, b: string): boolean {
  const normalise = (value: string): string => (value === "*" ? "Ter" : value);
  return normalise(a) === normalise(b);
}

/**
 * Check the rules a pattern cannot express for an event under a prefix
 *
 * @returns a message, or null when the event is acceptable
 */
export function checkEvent<P extends Tagged>(
  event: VariantEvent<P>,
  prefix: string,
  grammar: Grammar<P>
): string | null {
  const { codec } = grammar;

  for (const position of eventPositions(event)) {
    if (codec.base(position) < 1) {
      return "positions must be greater than zero";
    }
    if (grammar.level === "nucleotide") {
      const formatted = codec.format(position);
      if ((formatted.startsWith("-") || formatted.startsWith("*")) && !UTR_PREFIXES.has(prefix)) {
        return `UTR position '${formatted}' is only valid for 'c.' and 'r.' variants`;
      }
      if (/\d[+-]/.test(formatted) && !INTRONIC_PREFIXES.has(prefix)) {
        return `intronic position '${formatted}' is only valid for 'c.', 'n.' and 'r.' variants`;
      }
    }
  }

  switch (event.kind) {
    case "substitution":
      if (sameResidue(event.ref, event.alt)) {
        return grammar.level === "protein"
          ? `reference amino acid cannot be the same as the new amino acid; ` +
              `describe this as a synonymous variant 'p.${codec.format(event.position)}='`
          : "reference nucleotide cannot be the same as the new nucleotide";
      }
      return null;
    case "insertion": {
      if (event.inserted.kind === "count" && event.inserted.count < 1) {
        return "inserted length must be greater than zero";
      }
      if (isUnknown(event.start) || isUnknown(event.end)) return null;
      if (codec.isPlain(event.start) && codec.isPlain(event.end)) {
        if (codec.base(event.end) !== codec.base(event.start) + 1) {
          return "insertion must be between adjacent positions";
        }
      } else if (outOfOrder(event.start, event.end, codec)) {
        return "start position must precede end position";
      }
      return null;
    }
    case "deletion":
    case "delins":
      if (event.kind === "delins" && event.inserted.kind === "count" && event.inserted.count < 1) {
        return "inserted length must be greater than zero";
      }
      if (rangeOutOfOrder(event.start, codec) || rangeOutOfOrder(event.end, codec)) {
        return "uncertain range must run from lower to higher position";
      }
      if (event.end !== undefined && outOfOrder(event.start, event.end, codec)) {
        return "start position must precede end position";
      }
      if (event.kind === "deletion" && event.deleted !== undefined && event.end === undefined) {
        if (event.deleted.length !== 1) {
          return "a single-position deletion can only name one deleted nucleotide";
        }
      }
      return null;
    case "no-change":
      return null;
  }
}

/**
 * Sort key of the first position an event touches
 */
export function eventKey<P extends Tagged>(event: VariantEvent<P>, codec: PositionCodec<P>): SortKey | null {
  switch (event.kind) {
    case "substitution":
      return codec.sortKey(event.position);
    case "no-change":
      return event.position ? codec.sortKey(event.position) : null;
    case "insertion":
    case "deletion":
    case "delins":
      return endpointKey(event.start, codec);
  }
}

// =============================================================================
// FORMATTING
// =============================================================================

function formatInserted(inserted: InsertedSequence, countSymbol: string): string {
  if (inserted.kind === "sequence") return inserted.residues;
  return inserted.notation === "bracket"
    ? `${countSymbol}[${inserted.count}]`
    : `(${inserted.count})`;
}

function formatSpan<P extends Tagged>(
  start: Endpoint<P>,
  end: Endpoint<P> | undefined,
  codec: PositionCodec<P>
): string {
  const head = formatEndpoint(start, codec);
  return end === undefined ? head : `${head}_${formatEndpoint(end, codec)}`;
}

/**
 * Canonical text of one event (no prefix)
 */
export function formatEvent<P extends Tagged>(event: VariantEvent<P>, grammar: Grammar<P>): string {
  const { codec } = grammar;
  switch (event.kind) {
    case "substitution": {
      const position = codec.format(event.position);
      if (grammar.level === "protein") return `${position}${event.alt}`;
      const mosaic = event.mosaic === "mosaic" ? "=/" : event.mosaic === "chimeric" ? "=//" : "";
      return `${position}${mosaic}${event.ref}>${event.alt}`;
    }
    case "no-change":
      return event.position === undefined
        ? "="
        : `${codec.format(event.position)}${event.ref ?? ""}=`;
    case "deletion":
      return `${formatSpan(event.start, event.end, codec)}del${event.deleted ?? ""}`;
    case "insertion":
      return `${formatPosition(event.start, codec)}_${formatPosition(event.end, codec)}ins${formatInserted(event.inserted, grammar.countSymbol)}`;
    case "delins":
      return `${formatSpan(event.start, event.end, codec)}delins${formatInserted(event.inserted, grammar.countSymbol)}`;
  }
}

/**
 * One-letter code for a three-letter amino acid, `*` for stop
 */
export function oneLetterCode(aminoAcid: string): string | undefined {
  return aminoAcid === "*" ? "*" : AMINO_ACIDS[aminoAcid];
}
