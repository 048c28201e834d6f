/**
 * @module dataset/validator
 * @description Tabular validation of scores and counts uploads
 *
 * Reads an upload into a table and runs the validation stages in order:
 * header checks, normalization, nucleotide, transcript and protein column
 * checks, primary index checks and the emptiness check. Every stage adds
 * to one error list; nothing malformed in the upload throws.
 */

import { type } from "arktype";
import { ValidationError } from "../errors";
import { readDelimitedTable } from "../formats/dsv";
import type { VariantPrefix } from "../hgvs";
import { inferSequenceType, SequenceType, translateDna } from "../sequence";
import { ColumnSchema, HGVS_COLUMNS, HgvsColumn, isHgvsColumn } from "./column-schema";
import { DEFAULT_NULLS, type NullTokens } from "./null-tokens";
import { decodeSource } from "./source";
import { DatasetTable } from "./table";
import type {
  Cell,
  DatasetKind,
  DatasetSource,
  DatasetValidatorOptions,
  ValidationResult,
  WarningHandler,
} from "./types";
import { type LogicalColumn, validateVariant } from "./variant-validator";

// =============================================================================
// CONSTANTS AND SCHEMAS
// =============================================================================

/** Names a table library gives to blank header cells */
const UNNAMED_COLUMN = /^Unnamed: \d+$/i;

const NUMERIC = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

const INFINITE = /^([+-]?)inf(?:inity)?$/i;

const NOT_MULTIPLE_OF_THREE =
  "Protein variants could not be validated because the length of your " +
  "target sequence is not a multiple of 3";

/**
 * ArkType validation schema for dataset validator options
 * `nullTokens` and `onWarning` are checked by their types only.
 */
export const DatasetValidatorOptionsSchema = type({
  "targetSequence?": "string|null",
  "relaxedOrdering?": "boolean",
  "allowIndexDuplicates?": "boolean",
  "numericColumns?": "string[]",
}).narrow((options, ctx) => {
  const hgvs = (options.numericColumns ?? []).filter((column) => isHgvsColumn(column));
  if (hgvs.length > 0) {
    return ctx.reject({
      path: ["numericColumns"],
      expected: "data column names",
      actual: `HGVS columns ${hgvs.join(", ")}`,
    });
  }

  const target = options.targetSequence;
  if (target && inferSequenceType(target) === SequenceType.UNKNOWN) {
    return ctx.reject({
      path: ["targetSequence"],
      expected: "a DNA, RNA or protein sequence",
      actual: `'${target.length > 20 ? `${target.slice(0, 20)}...` : target}'`,
    });
  }

  return true;
});

interface ResolvedOptions {
  readonly targetSequence: string | null;
  readonly relaxedOrdering: boolean;
  readonly allowIndexDuplicates: boolean;
  readonly numericColumns: readonly string[];
  readonly nullTokens: NullTokens;
  readonly onWarning: WarningHandler;
}

/**
 * Mutable state of one validation call
 */
interface ValidationRun {
  table: DatasetTable;
  readonly errors: string[];
  indexColumn: HgvsColumn | null;
}

interface CellValidation {
  readonly cells: Cell[];
  readonly prefixes: ReadonlySet<VariantPrefix>;
  readonly errors: string[];
}

/**
 * Build a result, keeping `isValid` and `indexColumn` consistent with the errors
 */
export function createValidationResult(
  kind: DatasetKind,
  table: DatasetTable,
  errors: readonly string[],
  indexColumn: HgvsColumn | null
): ValidationResult {
  const isValid = errors.length === 0;
  return { kind, table, errors: [...errors], isValid, indexColumn: isValid ? indexColumn : null };
}

// =============================================================================
// BASE VALIDATOR
// =============================================================================

/**
 * Validator for one dataset kind
 *
 * Subclasses name their kind, declare their column schema and may add
 * header checks. Options are merged in order: base defaults, kind
 * defaults, caller options.
 */
export abstract class DatasetValidator {
  protected readonly options: ResolvedOptions;

  abstract readonly kind: DatasetKind;
  protected abstract readonly schema: ColumnSchema;

  constructor(options: DatasetValidatorOptions = {}) {
    const validation = DatasetValidatorOptionsSchema(options);
    if (validation instanceof type.errors) {
      throw new ValidationError(`Invalid dataset validator options: ${validation.summary}`);
    }

    const baseDefaults: ResolvedOptions = {
      targetSequence: null,
      relaxedOrdering: false,
      allowIndexDuplicates: false,
      numericColumns: [],
      nullTokens: DEFAULT_NULLS,
      onWarning: (warning: string): void => {
        console.warn(`${this.label} Warning: ${warning}`);
      },
    };

    this.options = { ...baseDefaults, ...this.getDefaultOptions(), ...definedOnly(options) };
  }

  /**
   * Kind-specific default options
   */
  protected getDefaultOptions(): Partial<ResolvedOptions> {
    return {};
  }

  /** Word used for the file in messages */
  get label(): string {
    return this.kind;
  }

  /**
   * Validate an upload
   *
   * @throws {TypeError} When the source is not something the library can read
   */
  validate(source: DatasetSource): ValidationResult {
    const readErrors: string[] = [];
    const { headers, rows } = readDelimitedTable(decodeSource(source), {
      onError: (error) => readErrors.push(`Could not read your ${this.label} file: ${error}`),
    });

    const nulls = this.options.nullTokens;
    const run: ValidationRun = {
      table: new DatasetTable(
        headers,
        rows.map((row) => row.fields.map((field) => (nulls.isNull(field) ? null : field)))
      ),
      errors: readErrors,
      indexColumn: null,
    };

    this.validateColumns(run.table.columns, run.errors);

    // Row-level checks are meaningless without valid columns
    if (run.errors.length === 0) {
      this.normalize(run);
      this.validateNucleotideColumn(run);
      this.validateTranscriptColumn(run);
      this.validateProteinColumn(run);
      this.validateIndexColumn(run);
    }

    if (run.table.isEmpty) {
      run.errors.push(
        `No variants could be parsed from your ${this.label} file. Please upload a non-empty file.`
      );
    }

    return createValidationResult(this.kind, run.table, run.errors, run.indexColumn);
  }

  // ===========================================================================
  // HEADER
  // ===========================================================================

  protected validateColumns(columns: readonly string[], errors: string[]): void {
    const nulls = this.options.nullTokens;

    if (columns.some((column) => nulls.isNull(column) || UNNAMED_COLUMN.test(column))) {
      errors.push(
        `Column names in your ${this.label} file cannot be values considered null ` +
          `such as the following: ${nulls.toString()}`
      );
    }

    const named = columns.filter((column) => !nulls.isNull(column));
    if (named.length < 1) {
      errors.push(
        `No columns could be parsed from your ${this.label} file. ` +
          "Make sure columns are comma delimited. Column names with commas " +
          "must be escaped by enclosing them in double quotes"
      );
    }

    const duplicated = [...new Set(named.filter((column, i) => named.indexOf(column) !== i))];
    if (duplicated.length > 0) {
      errors.push(
        `Column names in your ${this.label} file must be unique. ` +
          `Duplicated columns: ${duplicated.join(", ")}`
      );
    }

    if (!named.includes(HgvsColumn.NUCLEOTIDE) && !named.includes(HgvsColumn.PROTEIN)) {
      errors.push(
        `Your ${this.label} file must define either a nucleotide hgvs column ` +
          `'(${HgvsColumn.NUCLEOTIDE})' or a protein hgvs column '(${HgvsColumn.PROTEIN})'. ` +
          "Columns are case-sensitive and must be comma delimited"
      );
    }

    if (named.every((column) => isHgvsColumn(column))) {
      errors.push(
        `Your ${this.label} file must define at least one additional column different ` +
          `from '${HgvsColumn.NUCLEOTIDE}', '${HgvsColumn.TRANSCRIPT}' and '${HgvsColumn.PROTEIN}'`
      );
    }
  }

  // ===========================================================================
  // NORMALIZATION
  // ===========================================================================

  private normalize(run: ValidationRun): void {
    for (const column of HGVS_COLUMNS) {
      if (!run.table.has(column)) {
        run.table = run.table.withColumn(column, Array<Cell>(run.table.rowCount).fill(null));
      }
    }
    run.table = run.table.reorder(this.schema.order(run.table.columns));

    const declared = new Set([...this.schema.pinned, ...this.options.numericColumns]);
    for (const column of run.table.columns) {
      if (isHgvsColumn(column)) continue;
      if (declared.has(column)) {
        this.coerceDeclared(run, column);
      } else {
        const cells = run.table.column(column);
        const numbers = cells.map(toNumber);
        if (numbers.every((value): value is number | null => value !== undefined)) {
          run.table = run.table.withColumn(column, numbers);
        }
      }
    }
  }

  private coerceDeclared(run: ValidationRun, column: string): void {
    const cells = run.table.column(column);
    const numbers: Cell[] = [];
    for (const cell of cells) {
      const value = toNumber(cell);
      if (value === undefined) {
        run.errors.push(`${column}: could not convert string to float: '${String(cell)}'`);
        return;
      }
      numbers.push(value);
    }
    run.table = run.table.withColumn(column, numbers);
  }

  // ===========================================================================
  // VARIANT COLUMNS
  // ===========================================================================

  private validateCells(
    table: DatasetTable,
    column: HgvsColumn,
    logical: LogicalColumn,
    spliceDefined: boolean,
    targetSequence: string | null
  ): CellValidation {
    const prefixes = new Set<VariantPrefix>();
    const errors: string[] = [];
    const cells = table.column(column).map((cell): Cell => {
      const result = validateVariant(cell, logical, {
        spliceDefined,
        targetSequence,
        relaxedOrdering: this.options.relaxedOrdering,
        nullTokens: this.options.nullTokens,
        onWarning: this.options.onWarning,
      });
      switch (result.kind) {
        case "null":
          return null;
        case "variant":
          if (result.prefix !== null) prefixes.add(result.prefix);
          return result.text;
        case "error":
          if (result.prefix !== null) prefixes.add(result.prefix);
          errors.push(result.message);
          return cell;
      }
    });
    return { cells, prefixes, errors };
  }

  private validateNucleotideColumn(run: ValidationRun): void {
    const { NUCLEOTIDE, TRANSCRIPT } = HgvsColumn;
    if (run.table.isColumnNull(NUCLEOTIDE)) return;

    const spliceDefined = !run.table.isColumnNull(TRANSCRIPT);
    const { cells, prefixes, errors } = this.validateCells(
      run.table,
      NUCLEOTIDE,
      "nucleotide",
      spliceDefined,
      this.options.targetSequence
    );

    if ((prefixes.has("c") || prefixes.has("n")) && prefixes.has("g")) {
      run.errors.push(
        `${NUCLEOTIDE}: Genomic variants (prefix 'g.') cannot be mixed with ` +
          "transcript variants (prefix 'c.' or 'n.')"
      );
    }
    if (prefixes.size === 1 && prefixes.has("g") && !spliceDefined) {
      run.errors.push(
        `Transcript variants ('${TRANSCRIPT}' column) are required when specifying ` +
          `genomic variants (prefix 'g.' in the '${NUCLEOTIDE}' column)`
      );
    }

    run.errors.push(...errors);
    if (run.errors.length === 0) {
      run.table = run.table.withColumn(NUCLEOTIDE, cells);
    }
    run.indexColumn = NUCLEOTIDE;
  }

  private validateTranscriptColumn(run: ValidationRun): void {
    const { NUCLEOTIDE, TRANSCRIPT } = HgvsColumn;
    const definesNucleotide = !run.table.isColumnNull(NUCLEOTIDE);
    const definesTranscript = !run.table.isColumnNull(TRANSCRIPT);

    if (definesTranscript && !definesNucleotide) {
      run.errors.push(
        `Genomic variants ('${NUCLEOTIDE}' column) must be defined when specifying ` +
          `transcript variants ('${TRANSCRIPT}' column)`
      );
    }
    if (!definesTranscript) return;

    // Transcript variants are not mapped onto the target
    const { cells, errors } = this.validateCells(run.table, TRANSCRIPT, "transcript", false, null);
    run.errors.push(...errors);
    if (run.errors.length === 0) {
      run.table = run.table.withColumn(TRANSCRIPT, cells);
    }
  }

  private validateProteinColumn(run: ValidationRun): void {
    const { NUCLEOTIDE, TRANSCRIPT, PROTEIN } = HgvsColumn;
    if (run.table.isColumnNull(PROTEIN)) return;

    const definesNucleotide = !run.table.isColumnNull(NUCLEOTIDE);
    const definesSplice = !run.table.isColumnNull(TRANSCRIPT);

    let proteinTarget: string | null = null;
    if (!definesSplice) {
      proteinTarget = this.options.targetSequence;
      if (proteinTarget && inferSequenceType(proteinTarget) === SequenceType.DNA) {
        const { protein, remainder } = translateDna(proteinTarget);
        proteinTarget = protein;
        if (remainder !== "") {
          run.errors.unshift(NOT_MULTIPLE_OF_THREE);
        }
      }
    }

    const { cells, errors } = this.validateCells(run.table, PROTEIN, "protein", false, proteinTarget);
    run.errors.push(...errors);
    if (run.errors.length === 0) {
      run.table = run.table.withColumn(PROTEIN, cells);
    }
    if (!definesNucleotide) {
      run.indexColumn = PROTEIN;
    }
  }

  // ===========================================================================
  // PRIMARY INDEX
  // ===========================================================================

  private validateIndexColumn(run: ValidationRun): void {
    if (run.errors.length > 0) return;

    const index = run.indexColumn ?? HgvsColumn.NUCLEOTIDE;
    run.indexColumn = index;

    if (run.table.isColumnPartiallyNull(index)) {
      run.errors.push(
        `Primary column (inferred as '${index}') cannot contain any null values ` +
          `from ${this.options.nullTokens.toString()} (case-insensitive)`
      );
    }

    const nucleotide = run.table.column(HgvsColumn.NUCLEOTIDE);
    const protein = run.table.column(HgvsColumn.PROTEIN);
    const keyless = nucleotide.flatMap((cell, i) =>
      cell === null && (protein[i] ?? null) === null ? [i + 1] : []
    );
    if (keyless.length > 0) {
      run.errors.push(
        `Every variant must define '${HgvsColumn.NUCLEOTIDE}' or '${HgvsColumn.PROTEIN}'. ` +
          `Rows without either: [${keyless.join(", ")}]`
      );
    }

    if (this.options.allowIndexDuplicates) return;

    // Null keys are reported above, not as duplicates
    const rowsByValue = new Map<string, number[]>();
    run.table.column(index).forEach((cell, i) => {
      if (cell === null) return;
      const key = String(cell);
      const rowNumbers = rowsByValue.get(key) ?? [];
      rowNumbers.push(i + 1);
      rowsByValue.set(key, rowNumbers);
    });

    const duplicates = [...rowsByValue].filter(([, rowNumbers]) => rowNumbers.length > 1);
    if (duplicates.length > 0) {
      const listed = duplicates
        .map(([value, rowNumbers]) => `${value}: [${rowNumbers.join(", ")}]`)
        .join(", ");
      run.errors.push(
        `Primary column (inferred as '${index}') contains duplicate HGVS variants: ${listed}`
      );
    }
  }
}

// =============================================================================
// DATASET KINDS
// =============================================================================

export class ScoresDatasetValidator extends DatasetValidator {
  readonly kind = "scores";
  protected readonly schema = ColumnSchema.SCORES;

  protected override validateColumns(columns: readonly string[], errors: string[]): void {
    super.validateColumns(columns, errors);

    const [score] = this.schema.pinned;
    if (score !== undefined && !columns.includes(score)) {
      errors.push(
        `Your scores dataset is missing the '${score}' column. ` +
          "Columns are case-sensitive and must be comma delimited"
      );
    }
  }
}

export class CountsDatasetValidator extends DatasetValidator {
  readonly kind = "counts";
  protected readonly schema = ColumnSchema.COUNTS;
}

/**
 * Validate a scores upload
 *
 * @example
 * ```typescript
 * const result = validateScores("hgvs_nt,score\nc.1A>G,0.5\n");
 * result.isValid; // true
 * result.indexColumn; // "hgvs_nt"
 * ```
 */
export function validateScores(
  source: DatasetSource,
  options: DatasetValidatorOptions = {}
): ValidationResult {
  return new ScoresDatasetValidator(options).validate(source);
}

/**
 * Validate a counts upload
 */
export function validateCounts(
  source: DatasetSource,
  options: DatasetValidatorOptions = {}
): ValidationResult {
  return new CountsDatasetValidator(options).validate(source);
}

// =============================================================================
// HELPERS
// =============================================================================

/**
 * Numeric value of a cell, ignoring surrounding blanks
 *
 * Returns `undefined` when the cell is not a number.
 */
function toNumber(cell: Cell): number | null | undefined {
  if (cell === null || typeof cell === "number") return cell;
  const text = cell.trim();
  if (NUMERIC.test(text)) return Number(text);
  const infinite = INFINITE.exec(text);
  if (infinite) return infinite[1] === "-" ? Number.NEGATIVE_INFINITY : Number.POSITIVE_INFINITY;
  return undefined;
}

/**
 * Caller options without keys explicitly set to undefined
 */
function definedOnly(options: DatasetValidatorOptions): Partial<ResolvedOptions> {
  const resolved: { -readonly [K in keyof ResolvedOptions]?: ResolvedOptions[K] } = {};
  if (options.targetSequence !== undefined) resolved.targetSequence = options.targetSequence;
  if (options.relaxedOrdering !== undefined) resolved.relaxedOrdering = options.relaxedOrdering;
  if (options.allowIndexDuplicates !== undefined) {
    resolved.allowIndexDuplicates = options.allowIndexDuplicates;
  }
  if (options.numericColumns !== undefined) resolved.numericColumns = options.numericColumns;
  if (options.nullTokens !== undefined) resolved.nullTokens = options.nullTokens;
  if (options.onWarning !== undefined) resolved.onWarning = options.onWarning;
  return resolved;
}
