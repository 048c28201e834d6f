/**
 * Decoding of raw uploads
 */

import type { DatasetSource } from "./types";

const decoder = new TextDecoder("utf-8");

function decodeContent(content: unknown): string | null {
  if (typeof content === "string") return content;
  if (content instanceof Uint8Array) return decoder.decode(content);
  if (content instanceof ArrayBuffer) return decoder.decode(new Uint8Array(content));
  return null;
}

/**
 * Decode an upload to text, reading a file-like handle once
 *
 * Surrounding blank space is trimmed.
 *
 * @throws {TypeError} When the source is not an upload the library can read
 */
export function decodeSource(source: DatasetSource): string {
  const direct = decodeContent(source);
  if (direct !== null) return direct.trim();

  if (typeof source === "object" && source !== null && "read" in source && typeof source.read === "function") {
    const read = decodeContent(source.read());
    if (read !== null) return read.trim();
  }

  throw new TypeError(
    "Dataset source must be a string, Uint8Array, ArrayBuffer or an object whose read() returns one"
  );
}
