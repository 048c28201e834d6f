/**
 * Error handling for dataset validation and ingestion
 *
 * Malformed uploads never throw: they surface as error strings on a
 * ValidationResult. The classes here cover the conditions that indicate a
 * defect in the calling code (bad options, broken preconditions) or an
 * unreadable input file.
 */

/**
 * Base error class for all library errors
 */
export class MaveError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly lineNumber?: number,
    public readonly context?: string
  ) {
    super(message);
    this.name = "MaveError";
  }

  /**
   * Create a user-friendly error message with context
   */
  override toString(): string {
    let msg = `${this.name}: ${this.message}`;
    if (this.lineNumber !== undefined) {
      msg += ` (line ${this.lineNumber})`;
    }
    if (this.context !== undefined && this.context !== "") {
      msg += `\nContext: ${this.context}`;
    }
    return msg;
  }
}

/**
 * Validation errors for invalid options or records
 */
export class ValidationError extends MaveError {
  constructor(message: string, lineNumber?: number, context?: string) {
    super(message, "VALIDATION_ERROR", lineNumber, context);
    this.name = "ValidationError";
  }
}

/**
 * Parsing errors for format-specific issues
 */
export class ParseError extends MaveError {
  constructor(
    message: string,
    public readonly format: string,
    lineNumber?: number,
    context?: string
  ) {
    super(message, "PARSE_ERROR", lineNumber, context);
    this.name = "ParseError";
  }
}

/**
 * DSV-specific parsing error with column context
 */
export class DSVParseError extends ParseError {
  constructor(
    message: string,
    public readonly line?: number,
    public readonly column?: number,
    public readonly field?: string
  ) {
    const context = [
      line !== undefined && `line ${line}`,
      column !== undefined && `column ${column}`,
      field !== undefined && `field "${field}"`,
    ]
      .filter(Boolean)
      .join(", ");

    super(context ? `${message} (${context})` : message, "DSV", line);
    this.name = "DSVParseError";
  }
}

/**
 * HGVS grammar failure for a single token
 *
 * The grammar matcher reports failures as values; this class exists for
 * callers that prefer exceptions via `parseVariant`.
 */
export class HgvsParseError extends ParseError {
  constructor(
    message: string,
    public readonly token: string
  ) {
    super(message, "HGVS", undefined, token);
    this.name = "HgvsParseError";
  }
}

/**
 * Broken precondition while joining score and count rows into records
 */
export class RecordAssemblyError extends MaveError {
  constructor(
    message: string,
    public readonly primaryKey?: string | null
  ) {
    super(message, "RECORD_ASSEMBLY_ERROR");
    this.name = "RecordAssemblyError";
  }
}

/**
 * File I/O errors with the failing path and operation
 */
export class FileError extends MaveError {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly operation: "read" | "stat",
    public readonly systemError?: unknown,
    context?: string
  ) {
    super(message, "FILE_ERROR", undefined, context);
    this.name = "FileError";
  }

  /**
   * Create file error with system error context
   */
  static fromSystemError(
    operation: FileError["operation"],
    filePath: string,
    systemError: unknown
  ): FileError {
    const errorMessage = systemError instanceof Error ? systemError.message : String(systemError);
    const suggestion = FileError.getSuggestionForSystemError(errorMessage);

    return new FileError(
      `${operation} operation failed: ${errorMessage}${suggestion !== undefined ? `. ${suggestion}` : ""}`,
      filePath,
      operation,
      systemError,
      `System error: ${errorMessage}`
    );
  }

  private static getSuggestionForSystemError(errorMessage: string): string | undefined {
    const msg = errorMessage.toLowerCase();

    if (msg.includes("enoent") || msg.includes("no such file")) {
      return "Check that the file path is correct and the file exists";
    }
    if (msg.includes("eacces") || msg.includes("permission denied")) {
      return "Check file permissions";
    }
    if (msg.includes("eisdir") || msg.includes("is a directory")) {
      return "Path points to a directory, not a file";
    }

    return undefined;
  }
}
