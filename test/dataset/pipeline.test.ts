/**
 * Tests for scores and counts ingestion
 */

import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterAll, beforeAll, describe, expect, test } from "vitest";
import { DIFFERENT_VARIANTS_MESSAGE } from "../../src/dataset/consistency";
import { ingestDatasetFiles, ingestDatasets } from "../../src/dataset/pipeline";
import { FileError } from "../../src/errors";

const SCORES = "hgvs_nt,score,sd\nc.1A>G,0.5,0.1\nc.2T>C,1.5,0.2\n";
const COUNTS = "hgvs_nt,count\nc.2T>C,20\nc.1A>G,10\n";

describe("ingestDatasets", () => {
  test("builds records from a matching scores and counts pair", () => {
    const result = ingestDatasets({ scores: SCORES, counts: COUNTS });
    expect(result).toEqual({
      success: true,
      data: {
        records: [
          {
            hgvs_nt: "c.1A>G",
            hgvs_splice: null,
            hgvs_pro: null,
            data: { scores: { score: 0.5, sd: 0.1 }, counts: { count: 10 } },
          },
          {
            hgvs_nt: "c.2T>C",
            hgvs_splice: null,
            hgvs_pro: null,
            data: { scores: { score: 1.5, sd: 0.2 }, counts: { count: 20 } },
          },
        ],
        indexColumn: "hgvs_nt",
        scoreColumns: ["score", "sd"],
        countColumns: ["count"],
      },
    });
  });

  test("builds records from scores alone", () => {
    const result = ingestDatasets({ scores: SCORES });
    expect(result.success && result.data.countColumns).toEqual([]);
    expect(result.success && result.data.records.map((record) => record.data.counts)).toEqual([{}, {}]);
  });

  test("passes validator options to both files", () => {
    const result = ingestDatasets({
      scores: "hgvs_nt,score\nc.[3C>T;1A>G],1",
      counts: "hgvs_nt,count\nc.[3C>T;1A>G],5",
      relaxedOrdering: true,
    });
    expect(result.success).toBe(true);
  });

  test("reports scores errors before counts errors", () => {
    const result = ingestDatasets({
      scores: "hgvs_nt,value\nc.1A>G,1",
      counts: "hgvs_nt,count\nc.1A>X,5",
    });
    expect(result).toEqual({
      success: false,
      errors: [
        "Your scores dataset is missing the 'score' column. " +
          "Columns are case-sensitive and must be comma delimited",
        "c.1A>X: '1A>X' is not a supported substitution syntax",
      ],
    });
  });

  test("builds no record for a row without a variant", () => {
    const result = ingestDatasets({ scores: "hgvs_nt,score\nNA,1.0" });
    expect(result).toEqual({
      success: false,
      errors: ["Every variant must define 'hgvs_nt' or 'hgvs_pro'. Rows without either: [1]"],
    });
  });

  test("reports files that define different variants", () => {
    const result = ingestDatasets({
      scores: SCORES,
      counts: "hgvs_nt,count\nc.1A>G,10\nc.3G>A,30",
    });
    expect(result).toEqual({ success: false, errors: [DIFFERENT_VARIANTS_MESSAGE] });
  });
});

describe("ingestDatasetFiles", () => {
  let directory = "";

  beforeAll(() => {
    directory = mkdtempSync(join(tmpdir(), "mave-ingest-"));
    writeFileSync(join(directory, "scores.csv"), SCORES);
    writeFileSync(join(directory, "counts.csv"), COUNTS);
  });

  afterAll(() => {
    rmSync(directory, { recursive: true, force: true });
  });

  test("reads both files before ingesting them", async () => {
    const result = await ingestDatasetFiles({
      scores: join(directory, "scores.csv"),
      counts: join(directory, "counts.csv"),
    });
    expect(result.success && result.data.records.length).toBe(2);
  });

  test("rejects files over the size limit", async () => {
    await expect(
      ingestDatasetFiles({ scores: join(directory, "scores.csv") }, { maxFileSize: 10 })
    ).rejects.toThrow(FileError);
  });

  test("rejects a missing file", async () => {
    await expect(
      ingestDatasetFiles({ scores: join(directory, "missing.csv") })
    ).rejects.toBeInstanceOf(FileError);
  });
});
