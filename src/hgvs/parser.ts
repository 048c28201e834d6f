/**
 * @module hgvs/parser
 * @description Single entry point for matching HGVS variant tokens
 *
 * `matchVariant` never throws for malformed input: it returns a tagged
 * result and leaves the caller to decide whether a failure is an error.
 * `parseVariant` is the throwing form.
 */

import { HgvsParseError } from "../errors";
import { LEGACY_SENTINELS, NO_CHANGE_TOKENS, NUCLEOTIDE_PREFIXES } from "./constants";
import {
  checkEvent,
  DNA_GRAMMAR,
  eventKey,
  formatEvent,
  type Grammar,
  matchEvent,
  PROTEIN_GRAMMAR,
  RNA_GRAMMAR,
} from "./grammar";
import { compareKeys, type SortKey, type Tagged } from "./position";
import { validateAgainstTarget } from "./target";
import type {
  MatchOptions,
  MatchResult,
  NucleotidePrefix,
  NucleotideVariant,
  ParsedVariant,
  ProteinVariant,
  SentinelVariant,
  VariantEvent,
} from "./types";

// =============================================================================
// TOKEN SHAPE
// =============================================================================

const TOKEN = /^(?<prefix>[a-zA-Z])\.(?<body>.+)$/;
const MULTI_BODY = /^\[(?<events>.+)\]$/;
const PREDICTED_BODY = /^\((?<inner>.+)\)$/;

function isNucleotidePrefix(value: string): value is NucleotidePrefix {
  return NUCLEOTIDE_PREFIXES.some((prefix) => prefix === value);
}

function isNoChangeToken(token: string): boolean {
  return NO_CHANGE_TOKENS.some((candidate) => candidate === token);
}

function sentinelFor(token: string): SentinelVariant | null {
  switch (token.toLowerCase()) {
    case LEGACY_SENTINELS.WILDTYPE:
      return { level: "sentinel", sentinel: "wildtype", raw: token };
    case LEGACY_SENTINELS.SYNONYMOUS:
      return { level: "sentinel", sentinel: "synonymous", raw: token };
    default:
      return null;
  }
}

function wholeNoChange(token: string): ParsedVariant {
  const prefix = token.charAt(0);
  if (isNucleotidePrefix(prefix)) {
    return { level: "nucleotide", prefix, multi: false, events: [{ kind: "no-change" }], raw: token };
  }
  return {
    level: "protein",
    prefix: "p",
    multi: false,
    predicted: token === "p.(=)",
    events: [{ kind: "no-change" }],
    raw: token,
  };
}

// =============================================================================
// EVENTS
// =============================================================================

/**
 * Parse every event text of a token with one grammar
 * Multi-variant lists must be free of duplicates and, unless relaxed,
 * in increasing position order.
 */
function parseEvents<P extends Tagged>(
  texts: readonly string[],
  prefix: string,
  grammar: Grammar<P>,
  relaxedOrdering: boolean
): VariantEvent<P>[] | string {
  const events: VariantEvent<P>[] = [];
  for (const text of texts) {
    const event = matchEvent(text, grammar);
    if (typeof event === "string") return event;
    const problem = checkEvent(event, prefix, grammar);
    if (problem !== null) return `'${text}': ${problem}`;
    events.push(event);
  }

  if (events.length < 2) return events;

  const seen = new Set<string>();
  for (const event of events) {
    const text = formatEvent(event, grammar);
    if (seen.has(text)) {
      return `multi-variant description lists '${text}' more than once`;
    }
    seen.add(text);
  }

  if (!relaxedOrdering) {
    let previous: SortKey | null = null;
    for (const event of events) {
      const key = eventKey(event, grammar.codec);
      if (key === null) continue;
      if (previous !== null && compareKeys(previous, key) >= 0) {
        return "events in a multi-variant description must be listed in increasing position order";
      }
      previous = key;
    }
  }

  return events;
}

function splitBody(body: string): { texts: string[]; multi: boolean } {
  const inner = MULTI_BODY.exec(body)?.groups?.events;
  return inner === undefined ? { texts: [body], multi: false } : { texts: inner.split(";"), multi: true };
}

// =============================================================================
// PUBLIC API
// =============================================================================

/**
 * Match a token against the supported HGVS grammars
 *
 * @example
 * ```typescript
 * const result = matchVariant("c.[1A>G;3C>T]", { scope: "multi" });
 * if (result.success) console.log(result.data.level); // "nucleotide"
 * ```
 */
export function matchVariant(token: string, options: MatchOptions = {}): MatchResult {
  const scope = options.scope ?? "any";
  const relaxedOrdering = options.relaxedOrdering ?? false;

  const sentinel = sentinelFor(token);
  if (sentinel) return { success: true, data: sentinel };
  if (isNoChangeToken(token)) return { success: true, data: wholeNoChange(token) };

  const shape = TOKEN.exec(token)?.groups;
  if (shape?.prefix === undefined || shape.body === undefined) {
    return {
      success: false,
      error: `'${token}' is not a supported HGVS variant: expected a prefix such as 'c.' followed by a description`,
    };
  }
  const { prefix, body } = shape;

  if (prefix !== "p" && !isNucleotidePrefix(prefix)) {
    return {
      success: false,
      error: `unsupported prefix '${prefix}.'; expected one of 'g.', 'c.', 'n.', 'm.', 'r.' or 'p.'`,
    };
  }

  const predicted = prefix === "p" ? PREDICTED_BODY.exec(body)?.groups?.inner : undefined;
  const { texts, multi } = splitBody(predicted ?? body);

  if (multi && scope === "single") {
    return { success: false, error: "multi-variant descriptions are not accepted here" };
  }
  if (!multi && scope === "multi") {
    return {
      success: false,
      error: `expected a multi-variant description such as '${prefix}.[<event>;<event>]'`,
    };
  }
  if (multi && texts.length < 2) {
    return { success: false, error: "a multi-variant description must list at least two events" };
  }

  let variant: NucleotideVariant | ProteinVariant;
  if (isNucleotidePrefix(prefix)) {
    const grammar = prefix === "r" ? RNA_GRAMMAR : DNA_GRAMMAR;
    const events = parseEvents(texts, prefix, grammar, relaxedOrdering);
    if (typeof events === "string") return { success: false, error: events };
    variant = { level: "nucleotide", prefix, multi, events, raw: token };
  } else {
    const events = parseEvents(texts, prefix, PROTEIN_GRAMMAR, relaxedOrdering);
    if (typeof events === "string") return { success: false, error: events };
    variant = { level: "protein", prefix: "p", multi, predicted: predicted !== undefined, events, raw: token };
  }

  const target = options.targetSequence;
  if (target !== undefined && target !== null && target !== "") {
    const problem = validateAgainstTarget(variant, target);
    if (problem !== null) return { success: false, error: problem };
  }

  return { success: true, data: variant };
}

/**
 * Throwing form of {@link matchVariant}
 *
 * @throws {HgvsParseError} When the token does not match
 */
export function parseVariant(token: string, options: MatchOptions = {}): ParsedVariant {
  const result = matchVariant(token, options);
  if (!result.success) {
    throw new HgvsParseError(result.error, token);
  }
  return result.data;
}

/**
 * Canonical text of a parsed variant
 *
 * Matching the canonical text yields an equal variant. Legacy sentinels
 * are lower-cased.
 */
export function formatVariant(variant: ParsedVariant): string {
  switch (variant.level) {
    case "sentinel":
      return variant.raw.toLowerCase();
    case "nucleotide": {
      const grammar = variant.prefix === "r" ? RNA_GRAMMAR : DNA_GRAMMAR;
      const texts = variant.events.map((event) => formatEvent(event, grammar));
      return `${variant.prefix}.${variant.multi ? `[${texts.join(";")}]` : texts.join("")}`;
    }
    case "protein": {
      const texts = variant.events.map((event) => formatEvent(event, PROTEIN_GRAMMAR));
      const body = variant.multi ? `[${texts.join(";")}]` : texts.join("");
      return `p.${variant.predicted ? `(${body})` : body}`;
    }
  }
}
