/**
 * Tests for target sequence type inference
 */

import { describe, expect, test } from "vitest";
import { inferSequenceType, SequenceType } from "../../src/sequence";

describe("inferSequenceType", () => {
  test.each([
    ["ATGC", SequenceType.DNA],
    ["atgcn", SequenceType.DNA],
    ["ACG", SequenceType.DNA],
    ["AUGC", SequenceType.RNA],
    ["MKLV*", SequenceType.PROTEIN],
    ["mklv", SequenceType.PROTEIN],
    ["ATG-C", SequenceType.UNKNOWN],
    ["", SequenceType.UNKNOWN],
    ["   ", SequenceType.UNKNOWN],
  ] as const)("infers '%s' as %s", (sequence, expected) => {
    expect(inferSequenceType(sequence)).toBe(expected);
  });

  test("ignores surrounding blank space", () => {
    expect(inferSequenceType("  ATG\n")).toBe(SequenceType.DNA);
  });
});
