/**
 * @module hgvs/position
 * @description Position tokens for nucleotide and protein descriptions
 *
 * Nucleotide positions are plain integers, 5' UTR (`-N`) or 3' UTR (`*N`)
 * positions, each with an optional intronic offset (`+N`, `-N`, `+?`).
 * Protein positions pair a three-letter residue with its number.
 */

import { AMINO_ACID_PATTERN } from "./constants";
import type {
  Endpoint,
  NucleotidePosition,
  ProteinPosition,
  UncertainRange,
  UnknownPosition,
} from "./types";

// =============================================================================
// PATTERN SOURCES
// =============================================================================

/** Regex source for one nucleotide position (no capture groups) */
export const NT_POSITION = String.raw`(?:[*-]?\d+(?:[+-](?:\d+|\?))?|\?)`;

/** Regex source for a nucleotide endpoint, plain or `(a_b)` */
export const NT_ENDPOINT = String.raw`(?:${NT_POSITION}|\(${NT_POSITION}_${NT_POSITION}\))`;

/** Regex source for one protein position, e.g. `Gly12` */
export const PRO_POSITION = String.raw`(?:(?:${AMINO_ACID_PATTERN})\d+)`;

const NT_POSITION_PARTS = /^(?<utr>[*-])?(?<base>\d+)(?:(?<sign>[+-])(?<amount>\d+|\?))?$/;
const PRO_POSITION_PARTS = new RegExp(`^(?<aa>${AMINO_ACID_PATTERN})(?<base>\\d+)$`);
const RANGE_PARTS = /^\((?<start>[^_]+)_(?<end>[^_]+)\)$/;

const UNKNOWN: UnknownPosition = { kind: "unknown" };

/**
 * Lexicographic sort key: region (5' UTR, coding, 3' UTR), base, offset
 */
export type SortKey = readonly [number, number, number];

/**
 * Parsing, formatting and ordering for one position type
 */
export interface PositionCodec<P> {
  parse(text: string): P | UnknownPosition;
  format(position: P): string;
  sortKey(position: P): SortKey | null;
  /** Plain exonic position that maps directly onto a target sequence */
  isPlain(position: P): boolean;
  base(position: P): number;
}

// =============================================================================
// CODECS
// =============================================================================

export const nucleotidePositions: PositionCodec<NucleotidePosition> = {
  parse(text) {
    if (text === "?") return UNKNOWN;
    const groups = NT_POSITION_PARTS.exec(text)?.groups;
    if (groups?.base === undefined) {
      throw new TypeError(`'${text}' is not a nucleotide position`);
    }
    const position: { -readonly [K in keyof NucleotidePosition]: NucleotidePosition[K] } = {
      kind: "known",
      base: Number.parseInt(groups.base, 10),
    };
    if (groups.utr === "-") position.utr = "5";
    if (groups.utr === "*") position.utr = "3";
    if (groups.sign === "+" || groups.sign === "-") {
      position.offset = {
        sign: groups.sign,
        amount: groups.amount === undefined || groups.amount === "?"
          ? null
          : Number.parseInt(groups.amount, 10),
      };
    }
    return position;
  },

  format(position) {
    const utr = position.utr === "5" ? "-" : position.utr === "3" ? "*" : "";
    const offset = position.offset
      ? `${position.offset.sign}${position.offset.amount ?? "?"}`
      : "";
    return `${utr}${position.base}${offset}`;
  },

  sortKey(position) {
    const region = position.utr === "5" ? 0 : position.utr === "3" ? 2 : 1;
    const base = position.utr === "5" ? -position.base : position.base;
    if (!position.offset) return [region, base, 0];
    if (position.offset.amount === null) return null;
    const offset = position.offset.sign === "+" ? position.offset.amount : -position.offset.amount;
    return [region, base, offset];
  },

  isPlain(position) {
    return position.utr === undefined && position.offset === undefined;
  },

  base(position) {
    return position.base;
  },
};

export const proteinPositions: PositionCodec<ProteinPosition> = {
  parse(text) {
    if (text === "?") return UNKNOWN;
    const groups = PRO_POSITION_PARTS.exec(text)?.groups;
    if (groups?.aa === undefined || groups.base === undefined) {
      throw new TypeError(`'${text}' is not a protein position`);
    }
    return { kind: "residue", aminoAcid: groups.aa, base: Number.parseInt(groups.base, 10) };
  },

  format(position) {
    return `${position.aminoAcid}${position.base}`;
  },

  sortKey(position) {
    return [1, position.base, 0];
  },

  isPlain() {
    return true;
  },

  base(position) {
    return position.base;
  },
};

// =============================================================================
// ENDPOINTS
// =============================================================================

/** Shape shared by every position type */
export interface Tagged {
  readonly kind: string;
}

export function isUnknown<P extends Tagged>(value: P | UnknownPosition): value is UnknownPosition {
  return value.kind === "unknown";
}

export function isRange<P extends Tagged>(value: Endpoint<P>): value is UncertainRange<P> {
  return value.kind === "range";
}

/**
 * Parse `12`, `?` or `(?_-245)` into an endpoint
 */
export function parseEndpoint<P extends Tagged>(text: string, codec: PositionCodec<P>): Endpoint<P> {
  const range = RANGE_PARTS.exec(text)?.groups;
  if (range?.start !== undefined && range.end !== undefined) {
    return { kind: "range", start: codec.parse(range.start), end: codec.parse(range.end) };
  }
  return codec.parse(text);
}

export function formatPosition<P extends Tagged>(position: P | UnknownPosition, codec: PositionCodec<P>): string {
  return isUnknown(position) ? "?" : codec.format(position);
}

export function formatEndpoint<P extends Tagged>(endpoint: Endpoint<P>, codec: PositionCodec<P>): string {
  if (isRange(endpoint)) {
    return `(${formatPosition(endpoint.start, codec)}_${formatPosition(endpoint.end, codec)})`;
  }
  return formatPosition(endpoint, codec);
}

/**
 * Every concrete position named by an endpoint, in written order
 */
export function knownPositions<P extends Tagged>(endpoint: Endpoint<P> | undefined): P[] {
  if (endpoint === undefined) return [];
  if (isRange(endpoint)) {
    return [endpoint.start, endpoint.end].filter((p): p is P => !isUnknown(p));
  }
  return isUnknown(endpoint) ? [] : [endpoint];
}

/**
 * Compare two sort keys; negative when `a` precedes `b`
 */
export function compareKeys(a: SortKey, b: SortKey): number {
  for (let i = 0; i < 3; i++) {
    const diff = (a[i] ?? 0) - (b[i] ?? 0);
    if (diff !== 0) return diff;
  }
  return 0;
}

/**
 * Sort key of the first concrete position of an endpoint
 */
export function endpointKey<P extends Tagged>(endpoint: Endpoint<P>, codec: PositionCodec<P>): SortKey | null {
  const [first] = knownPositions(endpoint);
  return first === undefined ? null : codec.sortKey(first);
}
