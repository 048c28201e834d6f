/**
 * mave-validate - HGVS variant dataset validation and ingestion
 *
 * Checks scores and counts uploads for multiplexed assays of variant effect,
 * validates every HGVS token they carry and joins the two files into
 * per-variant records.
 */

// Dataset validation, consistency and record building
export {
  buildVariantRecords,
  type Cell,
  checkPrefixForColumn,
  checkSameVariants,
  ColumnSchema,
  CountsDatasetValidator,
  createValidationResult,
  DatasetTable,
  type DatasetKind,
  type DatasetSource,
  DatasetValidator,
  type DatasetValidatorOptions,
  DatasetValidatorOptionsSchema,
  dataColumns,
  type DeclaredColumns,
  DEFAULT_NULL_TOKENS,
  DEFAULT_NULLS,
  DIFFERENT_VARIANTS_MESSAGE,
  decodeSource,
  HGVS_COLUMNS,
  HgvsColumn,
  type IngestedDatasets,
  type IngestFilesOptions,
  type IngestOptions,
  type IngestResult,
  ingestDatasetFiles,
  ingestDatasets,
  isHgvsColumn,
  type LogicalColumn,
  matchDatasets,
  NullTokens,
  SCORE_COLUMN,
  ScoresDatasetValidator,
  type SourceContent,
  type ValidationResult,
  type VariantRecord,
  type VariantValidation,
  type VariantValidationOptions,
  validateColumnsMatch,
  validateCounts,
  validateRecordData,
  validateScores,
  validateVariant,
  type WarningHandler,
} from "./dataset";
// Error types
export {
  DSVParseError,
  FileError,
  HgvsParseError,
  MaveError,
  ParseError,
  RecordAssemblyError,
  ValidationError,
} from "./errors";
// Delimited text
export {
  type DelimitedRow,
  type DelimitedTable,
  type DSVReadOptions,
  readDelimitedTable,
} from "./formats/dsv";
// HGVS grammar
export * from "./hgvs";
// File reading
export {
  exists,
  FileReader,
  type FileReaderOptions,
  getSize,
  readToBytes,
  readToString,
} from "./io/file-reader";
// Target sequences
export { inferSequenceType, SequenceType, type Translation, translateDna } from "./sequence";

/**
 * Library version
 */
export const VERSION = "0.1.0";
