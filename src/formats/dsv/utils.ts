/**
 * Delimited Table Utility Functions
 *
 * Text normalization applied before rows are split.
 */

/**
 * Remove Byte Order Mark (BOM) from text
 * Handles UTF-8, UTF-16 BE, and UTF-16 LE BOMs
 */
export function removeBOM(text: string): string {
  // UTF-8 BOM
  if (text.charCodeAt(0) === 0xfeff) {
    return text.slice(1);
  }
  // UTF-16 BOMs decoded as latin-1
  if (
    (text.charCodeAt(0) === 0xfe && text.charCodeAt(1) === 0xff) ||
    (text.charCodeAt(0) === 0xff && text.charCodeAt(1) === 0xfe)
  ) {
    return text.slice(2);
  }
  return text;
}

/**
 * Normalize Windows (CRLF) and classic Mac (CR) line endings to LF
 */
export function normalizeLineEndings(text: string): string {
  return text.replace(/\r\n/g, "\n").replace(/\r/g, "\n");
}

/**
 * Pad a short row with empty fields up to the header width
 *
 * @returns the padded fields, or null when the row has too many fields
 */
export function padRow(fields: readonly string[], expectedColumns: number): string[] | null {
  if (fields.length > expectedColumns) {
    return null;
  }
  return [...fields, ...Array<string>(expectedColumns - fields.length).fill("")];
}
