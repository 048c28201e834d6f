/**
 * @module dataset/pipeline
 * @description Scores and counts ingestion from upload to records
 *
 * Validates a scores upload and an optional counts upload, checks that
 * they define the same variants and builds the variant records. On any
 * error the whole ordered error list comes back and no records are built.
 */

import { RecordAssemblyError } from "../errors";
import { type FileReaderOptions, readToBytes } from "../io/file-reader";
import type { HgvsColumn } from "./column-schema";
import { checkSameVariants } from "./consistency";
import { buildVariantRecords, dataColumns } from "./records";
import type { DatasetSource, DatasetValidatorOptions, VariantRecord } from "./types";
import { validateCounts, validateScores } from "./validator";

export interface IngestOptions extends DatasetValidatorOptions {
  scores: DatasetSource;
  counts?: DatasetSource | null;
}

export interface IngestedDatasets {
  readonly records: VariantRecord[];
  readonly indexColumn: HgvsColumn;
  /** Data columns of the scores file, in canonical order */
  readonly scoreColumns: string[];
  /** Data columns of the counts file; empty without counts */
  readonly countColumns: string[];
}

export type IngestResult =
  | { readonly success: true; readonly data: IngestedDatasets }
  | { readonly success: false; readonly errors: string[] };

/**
 * Validate and join a scores upload and an optional counts upload
 *
 * @example
 * ```typescript
 * const result = ingestDatasets({
 *   scores: "hgvs_nt,score\nc.1A>G,0.5\n",
 *   counts: "hgvs_nt,count\nc.1A>G,10\n",
 * });
 * if (result.success) {
 *   result.data.records[0]?.data; // { scores: { score: 0.5 }, counts: { count: 10 } }
 * }
 * ```
 */
export function ingestDatasets(options: IngestOptions): IngestResult {
  const { scores, counts, ...validatorOptions } = options;

  const scoresResult = validateScores(scores, validatorOptions);
  const countsResult =
    counts === undefined || counts === null ? null : validateCounts(counts, validatorOptions);

  const errors = [...scoresResult.errors, ...(countsResult?.errors ?? [])];
  if (countsResult !== null) {
    const mismatch = checkSameVariants(scoresResult, countsResult);
    if (mismatch !== null) errors.push(mismatch);
  }
  if (errors.length > 0) {
    return { success: false, errors };
  }

  const indexColumn = scoresResult.indexColumn;
  if (indexColumn === null) {
    throw new RecordAssemblyError("A valid scores dataset must have a primary column");
  }

  return {
    success: true,
    data: {
      records: buildVariantRecords(scoresResult.table, countsResult?.table ?? null, indexColumn),
      indexColumn,
      scoreColumns: dataColumns(scoresResult.table),
      countColumns: countsResult === null ? [] : dataColumns(countsResult.table),
    },
  };
}

export interface IngestFilesOptions extends DatasetValidatorOptions, FileReaderOptions {}

/**
 * Read uploads from disk, then ingest them
 *
 * @throws {FileError} When either file cannot be read
 */
export async function ingestDatasetFiles(
  paths: { readonly scores: string; readonly counts?: string | null },
  options: IngestFilesOptions = {}
): Promise<IngestResult> {
  const { maxFileSize, ...validatorOptions } = options;
  const readerOptions = maxFileSize === undefined ? {} : { maxFileSize };

  const scores = await readToBytes(paths.scores, readerOptions);
  const counts =
    paths.counts === undefined || paths.counts === null
      ? null
      : await readToBytes(paths.counts, readerOptions);

  return ingestDatasets({ ...validatorOptions, scores, counts });
}
