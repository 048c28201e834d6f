/**
 * Tests for reading uploads held on disk
 */

import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterAll, beforeAll, describe, expect, test } from "vitest";
import { FileError } from "../../src/errors";
import {
  exists,
  FileReader,
  getSize,
  readToBytes,
  readToString,
} from "../../src/io/file-reader";

let fixtures = "";
const files = {
  scores: "",
  empty: "",
  utf8: "",
  missing: "",
  directory: "",
};

beforeAll(() => {
  fixtures = mkdtempSync(join(tmpdir(), "mave-reader-"));
  files.scores = join(fixtures, "scores.csv");
  files.empty = join(fixtures, "empty.csv");
  files.utf8 = join(fixtures, "utf8.csv");
  files.missing = join(fixtures, "missing.csv");
  files.directory = join(fixtures, "uploads");

  writeFileSync(files.scores, "hgvs_nt,score\nc.1A>G,0.5\n");
  writeFileSync(files.empty, "");
  writeFileSync(files.utf8, "note\nβ-globin\n");
  mkdirSync(files.directory);
});

afterAll(() => {
  rmSync(fixtures, { recursive: true, force: true });
});

describe("FileReader", () => {
  describe("exists", () => {
    test("detects regular files", async () => {
      expect(await exists(files.scores)).toBe(true);
      expect(await exists(files.empty)).toBe(true);
    });

    test("is false for missing paths and directories", async () => {
      expect(await exists(files.missing)).toBe(false);
      expect(await exists(files.directory)).toBe(false);
    });
  });

  describe("getSize", () => {
    test("returns the size in bytes", async () => {
      expect(await getSize(files.scores)).toBe(25);
      expect(await getSize(files.empty)).toBe(0);
      expect(await getSize(files.utf8)).toBe(15);
    });

    test("throws FileError for a missing file", async () => {
      await expect(getSize(files.missing)).rejects.toBeInstanceOf(FileError);
    });
  });

  describe("readToString", () => {
    test("reads UTF-8 text", async () => {
      expect(await readToString(files.scores)).toBe("hgvs_nt,score\nc.1A>G,0.5\n");
      expect(await readToString(files.utf8)).toBe("note\nβ-globin\n");
      expect(await readToString(files.empty)).toBe("");
    });

    test("enforces the size limit", async () => {
      await expect(readToString(files.scores, { maxFileSize: 10 })).rejects.toThrow(
        "File too large: 25 bytes exceeds limit of 10 bytes"
      );
    });
  });

  describe("readToBytes", () => {
    test("reads raw bytes", async () => {
      const bytes = await readToBytes(files.utf8);
      expect(bytes.length).toBe(15);
      expect(new TextDecoder().decode(bytes)).toBe("note\nβ-globin\n");
    });

    test("reports the failing operation for a missing file", async () => {
      const error = await readToBytes(files.missing).catch((caught: unknown) => caught);
      expect(error).toBeInstanceOf(FileError);
      expect(error instanceof FileError && error.operation).toBe("stat");
      expect(error instanceof FileError && error.filePath).toBe(files.missing);
    });
  });

  describe("path and option validation", () => {
    test("rejects empty paths and paths with null characters", async () => {
      await expect(readToString("")).rejects.toThrow(FileError);
      await expect(readToString("scores\0.csv")).rejects.toThrow("Invalid file path");
    });

    test("rejects a non-positive size limit", async () => {
      await expect(readToString(files.scores, { maxFileSize: 0 })).rejects.toThrow(
        "Invalid file reader options"
      );
    });
  });

  test("groups the readers on one object", () => {
    expect(FileReader.readToString).toBe(readToString);
    expect(FileReader.exists).toBe(exists);
  });
});
