/**
 * Tests for scores and counts consistency checks
 */

import { describe, expect, test } from "vitest";
import {
  checkSameVariants,
  DIFFERENT_VARIANTS_MESSAGE,
  matchDatasets,
  sameMultiset,
} from "../../src/dataset/consistency";
import { DatasetTable } from "../../src/dataset/table";
import { validateCounts, validateScores } from "../../src/dataset/validator";

describe("matchDatasets", () => {
  test("matches files listing the same variants in any order", () => {
    const scores = validateScores("hgvs_nt,score\nc.1A>G,1\nc.2C>T,2");
    const counts = validateCounts("hgvs_nt,count\nc.2C>T,5\nc.1A>G,6");
    expect(matchDatasets(scores, counts)).toBe(true);
    expect(checkSameVariants(scores, counts)).toBeNull();
  });

  test("compares every HGVS column, not only the primary one", () => {
    const scores = validateScores("hgvs_nt,hgvs_pro,score\nc.1A>G,p.Met1Val,1");
    const counts = validateCounts("hgvs_nt,hgvs_pro,count\nc.1A>G,p.Met1Ala,1");
    expect(matchDatasets(scores, counts)).toBe(false);
  });

  test("fails when one file lists a variant the other does not", () => {
    const scores = validateScores("hgvs_nt,score\nc.1A>G,1\nc.2C>T,2");
    const counts = validateCounts("hgvs_nt,count\nc.1A>G,5\nc.3G>A,6");
    expect(matchDatasets(scores, counts)).toBe(false);
    expect(checkSameVariants(scores, counts)).toBe(DIFFERENT_VARIANTS_MESSAGE);
  });

  test("counts repeated variants", () => {
    const scores = validateScores("hgvs_nt,score\nc.1A>G,1\nc.1A>G,2", {
      allowIndexDuplicates: true,
    });
    const counts = validateCounts("hgvs_nt,count\nc.1A>G,5");
    expect(matchDatasets(scores, counts)).toBe(false);
  });

  test("fails when the files are keyed by different columns", () => {
    const scores = validateScores("hgvs_pro,score\np.Met1Val,1");
    const counts = validateCounts("hgvs_nt,hgvs_pro,count\nc.1A>G,p.Met1Val,5");
    expect(scores.indexColumn).toBe("hgvs_pro");
    expect(counts.indexColumn).toBe("hgvs_nt");
    expect(matchDatasets(scores, counts)).toBe(false);
  });

  test("is undecided when either file is invalid", () => {
    const scores = validateScores("hgvs_nt,value\nc.1A>G,1");
    const counts = validateCounts("hgvs_nt,count\nc.1A>G,5");
    expect(matchDatasets(scores, counts)).toBeNull();
    expect(checkSameVariants(scores, counts)).toBeNull();
  });
});

describe("sameMultiset", () => {
  test("distinguishes numbers from strings and nulls", () => {
    const a = new DatasetTable(["x"], [["1"], [null]]);
    const b = new DatasetTable(["x"], [[1], [null]]);
    const c = new DatasetTable(["x"], [[null], ["1"]]);
    expect(sameMultiset(a, b, "x")).toBe(false);
    expect(sameMultiset(a, c, "x")).toBe(true);
  });

  test("treats a column missing from both tables as equal", () => {
    const a = new DatasetTable(["x"], [["1"]]);
    expect(sameMultiset(a, a, "y")).toBe(true);
  });
});
