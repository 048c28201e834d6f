/**
 * Delimited Table Constants
 */

// =============================================================================
// CONSTANTS
// =============================================================================

/**
 * Uploads are comma-delimited
 */
export const DEFAULT_DELIMITER = ",";

/**
 * Default quote character (RFC 4180 compliant)
 */
export const DEFAULT_QUOTE = '"';

/**
 * Default escape character (doubling quotes per RFC 4180)
 */
export const DEFAULT_ESCAPE = '"';

/**
 * Prefix of comment lines
 */
export const COMMENT_PREFIX = "#";

/**
 * Lines a quoted field may span before the row is abandoned
 */
export const MAX_FIELD_LINES = 100;
