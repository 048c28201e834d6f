/**
 * Tests for variant record building
 */

import { describe, expect, test } from "vitest";
import { buildVariantRecords, dataColumns } from "../../src/dataset/records";
import { DatasetTable } from "../../src/dataset/table";
import { validateCounts, validateScores } from "../../src/dataset/validator";
import { RecordAssemblyError } from "../../src/errors";

describe("buildVariantRecords", () => {
  test("pairs score and count rows by primary key in score order", () => {
    const scores = validateScores("hgvs_nt,hgvs_pro,score,sd\nc.1A>G,p.Met1Val,0.5,0.1\nc.2T>C,p.Met1Thr,1.5,");
    const counts = validateCounts("hgvs_nt,hgvs_pro,count\nc.2T>C,p.Met1Thr,7\nc.1A>G,p.Met1Val,9");

    expect(buildVariantRecords(scores.table, counts.table, "hgvs_nt")).toEqual([
      {
        hgvs_nt: "c.1A>G",
        hgvs_splice: null,
        hgvs_pro: "p.Met1Val",
        data: { scores: { score: 0.5, sd: 0.1 }, counts: { count: 9 } },
      },
      {
        hgvs_nt: "c.2T>C",
        hgvs_splice: null,
        hgvs_pro: "p.Met1Thr",
        data: { scores: { score: 1.5, sd: null }, counts: { count: 7 } },
      },
    ]);
  });

  test("leaves counts empty without a counts table", () => {
    const scores = validateScores("hgvs_pro,score\np.Gly1Ala,2");
    expect(buildVariantRecords(scores.table, null, "hgvs_pro")).toEqual([
      { hgvs_nt: null, hgvs_splice: null, hgvs_pro: "p.Gly1Ala", data: { scores: { score: 2 }, counts: {} } },
    ]);
  });

  test("leaves counts empty when they repeat the score data", () => {
    const scores = validateScores("hgvs_nt,score\nc.1A>G,2");
    const counts = validateCounts("hgvs_nt,score\nc.1A>G,2");
    const [record] = buildVariantRecords(scores.table, counts.table, "hgvs_nt");
    expect(record?.data).toEqual({ scores: { score: 2 }, counts: {} });
  });

  test("pairs repeated keys positionally", () => {
    const options = { allowIndexDuplicates: true };
    const scores = validateScores("hgvs_nt,score\nc.1A>G,1\nc.2T>C,2\nc.1A>G,3", options);
    const counts = validateCounts("hgvs_nt,count\nc.1A>G,10\nc.1A>G,30\nc.2T>C,20", options);
    const records = buildVariantRecords(scores.table, counts.table, "hgvs_nt");
    expect(records.map((record) => [record.hgvs_nt, record.data.scores, record.data.counts])).toEqual([
      ["c.1A>G", { score: 1 }, { count: 10 }],
      ["c.1A>G", { score: 3 }, { count: 30 }],
      ["c.2T>C", { score: 2 }, { count: 20 }],
    ]);
  });

  test("replaces NaN with null", () => {
    const table = new DatasetTable(["hgvs_nt", "score"], [["c.1A>G", Number.NaN]]);
    const [record] = buildVariantRecords(table, null, "hgvs_nt");
    expect(record?.data.scores).toEqual({ score: null });
  });

  test("returns no records for an empty table", () => {
    expect(buildVariantRecords(new DatasetTable(["hgvs_nt", "score"], []), null, "hgvs_nt")).toEqual([]);
  });

  test("throws when the tables are keyed by different variants", () => {
    const scores = new DatasetTable(["hgvs_nt", "score"], [["c.1A>G", 1], ["c.1A>G", 2]]);
    const counts = new DatasetTable(["hgvs_nt", "count"], [["c.1A>G", 1], ["c.2T>C", 2]]);
    expect(() => buildVariantRecords(scores, counts, "hgvs_nt")).toThrow(RecordAssemblyError);
    expect(() => buildVariantRecords(scores, counts, "hgvs_nt")).toThrow(
      "Scores and counts are not keyed by the same 'hgvs_nt' values"
    );
  });
});

describe("dataColumns", () => {
  test("lists the columns that are not HGVS columns", () => {
    const scores = validateScores("hgvs_nt,score,sd\nc.1A>G,1,0.1");
    expect(dataColumns(scores.table)).toEqual(["score", "sd"]);
  });
});
