/**
 * Delimited table reader tests
 *
 * Covers RFC 4180 quoting, multi-line fields, comment and blank line
 * skipping, ragged rows and option validation.
 */

import { describe, expect, test } from "vitest";
import { DSVParseError, ValidationError } from "../../src/errors";
import {
  countUnescapedQuotes,
  hasBalancedQuotes,
  normalizeLineEndings,
  padRow,
  parseCSVRow,
  readDelimitedTable,
  removeBOM,
} from "../../src/formats/dsv";

function collect(text: string): { headers: readonly string[]; rows: string[][]; errors: string[] } {
  const errors: string[] = [];
  const table = readDelimitedTable(text, { onError: (error) => errors.push(error) });
  return { headers: table.headers, rows: table.rows.map((row) => [...row.fields]), errors };
}

describe("DSV Format Module", () => {
  describe("parseCSVRow", () => {
    test("splits plain fields", () => {
      expect(parseCSVRow("c.1A>G,0.5,note")).toEqual(["c.1A>G", "0.5", "note"]);
    });

    test("keeps delimiters inside quoted fields", () => {
      expect(parseCSVRow('a,"b,c",d')).toEqual(["a", "b,c", "d"]);
    });

    test("unescapes doubled quotes", () => {
      expect(parseCSVRow('"he said ""hi"""')).toEqual(['he said "hi"']);
    });

    test("keeps empty fields", () => {
      expect(parseCSVRow("a,,c")).toEqual(["a", "", "c"]);
      expect(parseCSVRow("a,")).toEqual(["a", ""]);
      expect(parseCSVRow(",")).toEqual(["", ""]);
    });

    test("reads no fields from an empty line", () => {
      expect(parseCSVRow("")).toEqual([]);
    });

    test("uses a custom delimiter", () => {
      expect(parseCSVRow("a\tb", "\t")).toEqual(["a", "b"]);
    });

    test("throws on an unclosed quote", () => {
      expect(() => parseCSVRow('a,"b')).toThrow(DSVParseError);
    });
  });

  describe("quote counting", () => {
    test("counts doubled quotes as escaped", () => {
      expect(countUnescapedQuotes('"a""b"', '"', '"')).toBe(2);
      expect(hasBalancedQuotes('"a""b"', '"', '"')).toBe(true);
      expect(hasBalancedQuotes('"a', '"', '"')).toBe(false);
    });
  });

  describe("text normalization", () => {
    test("removes a UTF-8 BOM", () => {
      expect(removeBOM("\uFEFFhgvs_nt")).toBe("hgvs_nt");
      expect(removeBOM("hgvs_nt")).toBe("hgvs_nt");
    });

    test("normalizes CRLF and CR line endings", () => {
      expect(normalizeLineEndings("a\r\nb\rc\n")).toBe("a\nb\nc\n");
    });

    test("pads short rows and rejects long ones", () => {
      expect(padRow(["a"], 3)).toEqual(["a", "", ""]);
      expect(padRow(["a", "b", "c"], 2)).toBeNull();
    });
  });

  describe("readDelimitedTable", () => {
    test("reads the header and data rows", () => {
      const table = readDelimitedTable("hgvs_nt,score\nc.1A>G,0.5\nc.2C>T,1.5\n");
      expect(table.headers).toEqual(["hgvs_nt", "score"]);
      expect(table.rows).toEqual([
        { fields: ["c.1A>G", "0.5"], lineNumber: 2 },
        { fields: ["c.2C>T", "1.5"], lineNumber: 3 },
      ]);
    });

    test("skips comment and blank lines and keeps source line numbers", () => {
      const table = readDelimitedTable("# exported\nhgvs_nt,score\n\nc.1A>G,0.5\n# done\n");
      expect(table.headers).toEqual(["hgvs_nt", "score"]);
      expect(table.rows).toEqual([{ fields: ["c.1A>G", "0.5"], lineNumber: 4 }]);
    });

    test("strips a BOM and reads CRLF input", () => {
      const { headers, rows } = collect("\uFEFFhgvs_nt,score\r\nc.1A>G,0.5\r\n");
      expect(headers).toEqual(["hgvs_nt", "score"]);
      expect(rows).toEqual([["c.1A>G", "0.5"]]);
    });

    test("joins quoted fields that span lines", () => {
      const table = readDelimitedTable('hgvs_nt,note\nc.1A>G,"first\nsecond"\nc.2C>T,x');
      expect(table.rows).toEqual([
        { fields: ["c.1A>G", "first\nsecond"], lineNumber: 2 },
        { fields: ["c.2C>T", "x"], lineNumber: 4 },
      ]);
    });

    test("keeps comment-like lines inside quoted fields", () => {
      const { rows } = collect('a,b\n1,"x\n# not a comment"');
      expect(rows).toEqual([["1", "x\n# not a comment"]]);
    });

    test("pads rows shorter than the header", () => {
      const { rows, errors } = collect("a,b,c\n1\n");
      expect(rows).toEqual([["1", "", ""]]);
      expect(errors).toEqual([]);
    });

    test("reports rows longer than the header and keeps reading", () => {
      const { rows, errors } = collect("a,b\n1,2,3\n4,5");
      expect(rows).toEqual([["4", "5"]]);
      expect(errors).toEqual(["Expected 2 fields on line 2, found 3"]);
    });

    test("reports an unclosed quote at the end of input", () => {
      const { rows, errors } = collect('a,b\n1,"open');
      expect(rows).toEqual([]);
      expect(errors).toEqual(["Unclosed quote in field starting at line 2"]);
    });

    test("reports a quoted field longer than the line limit", () => {
      const errors: string[] = [];
      const table = readDelimitedTable('a,b\n1,"x\ny\nz\n"\n2,3', {
        maxFieldLines: 2,
        onError: (error) => errors.push(error),
      });
      expect(errors[0]).toBe("Field starting at line 2 exceeds maximum line limit (2)");
      expect(table.headers).toEqual(["a", "b"]);
    });

    test("throws DSVParseError without an error handler", () => {
      expect(() => readDelimitedTable("a,b\n1,2,3")).toThrow(DSVParseError);
    });

    test("reads empty input as no header and no rows", () => {
      expect(readDelimitedTable("")).toEqual({ headers: [], rows: [] });
    });

    test("reads tab-delimited text", () => {
      const table = readDelimitedTable("hgvs_pro\tscore\np.Gly1Ala\t2", { delimiter: "\t" });
      expect(table.rows[0]?.fields).toEqual(["p.Gly1Ala", "2"]);
    });
  });

  describe("option validation", () => {
    test("rejects a multi-character delimiter", () => {
      expect(() => readDelimitedTable("a", { delimiter: ";;" })).toThrow(ValidationError);
    });

    test("rejects a quote equal to the delimiter", () => {
      expect(() => readDelimitedTable("a", { delimiter: "|", quote: "|" })).toThrow(ValidationError);
    });

    test("rejects an empty comment prefix", () => {
      expect(() => readDelimitedTable("a", { commentPrefix: "" })).toThrow(ValidationError);
    });

    test("rejects a non-positive line limit", () => {
      expect(() => readDelimitedTable("a", { maxFieldLines: 0 })).toThrow(ValidationError);
    });
  });
});
