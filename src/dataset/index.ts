/**
 * Dataset validation and ingestion
 */

export {
  ColumnSchema,
  HGVS_COLUMNS,
  HgvsColumn,
  isHgvsColumn,
  SCORE_COLUMN,
} from "./column-schema";
export { checkSameVariants, DIFFERENT_VARIANTS_MESSAGE, matchDatasets } from "./consistency";
export { DEFAULT_NULL_TOKENS, DEFAULT_NULLS, NullTokens } from "./null-tokens";
export {
  type IngestedDatasets,
  type IngestFilesOptions,
  type IngestOptions,
  type IngestResult,
  ingestDatasetFiles,
  ingestDatasets,
} from "./pipeline";
export { type DeclaredColumns, validateColumnsMatch, validateRecordData } from "./record-schema";
export { buildVariantRecords, dataColumns } from "./records";
export { decodeSource } from "./source";
export { DatasetTable } from "./table";
export type {
  Cell,
  DatasetKind,
  DatasetSource,
  DatasetValidatorOptions,
  SourceContent,
  ValidationResult,
  VariantRecord,
  WarningHandler,
} from "./types";
export {
  CountsDatasetValidator,
  createValidationResult,
  DatasetValidator,
  DatasetValidatorOptionsSchema,
  ScoresDatasetValidator,
  validateCounts,
  validateScores,
} from "./validator";
export {
  checkPrefixForColumn,
  type LogicalColumn,
  type VariantValidation,
  type VariantValidationOptions,
  validateVariant,
} from "./variant-validator";
