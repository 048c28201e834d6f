/**
 * Tests for HGVS cell validation and column binding
 */

import { describe, expect, test } from "vitest";
import { NullTokens } from "../../src/dataset/null-tokens";
import {
  checkPrefixForColumn,
  type LogicalColumn,
  validateVariant,
} from "../../src/dataset/variant-validator";

describe("validateVariant", () => {
  describe("null cells", () => {
    test.each([null, undefined, Number.NaN, "", "   ", "NA", "nan", "None", "NULL"])(
      "treats %s as null",
      (value) => {
        expect(validateVariant(value, "nucleotide")).toEqual({ kind: "null" });
      }
    );

    test("uses the injected null tokens", () => {
      const nullTokens = new NullTokens(["missing"]);
      expect(validateVariant("missing", "nucleotide", { nullTokens })).toEqual({ kind: "null" });
      expect(validateVariant("NA", "nucleotide", { nullTokens })).toEqual({
        kind: "error",
        message:
          "NA: 'NA' is not a supported HGVS variant: expected a prefix such as 'c.' followed by a description",
        prefix: null,
      });
    });
  });

  describe("grammar failures", () => {
    test("prefixes the parser message with the token", () => {
      expect(validateVariant("c.1A>X", "nucleotide")).toEqual({
        kind: "error",
        message: "c.1A>X: '1A>X' is not a supported substitution syntax",
        prefix: null,
      });
    });

    test("checks against the target sequence", () => {
      const result = validateVariant("c.2A>G", "nucleotide", { targetSequence: "ATG" });
      expect(result.kind === "error" && result.message).toBe(
        "c.2A>G: reference nucleotide 'A' at position 2 does not match the target sequence ('T')"
      );
    });

    test("honours relaxed ordering", () => {
      expect(validateVariant("c.[3C>T;1A>G]", "nucleotide").kind).toBe("error");
      expect(
        validateVariant("c.[3C>T;1A>G]", "nucleotide", { relaxedOrdering: true }).kind
      ).toBe("variant");
    });
  });

  describe("column binding", () => {
    test("accepts c. and n. in the nucleotide column without a transcript column", () => {
      const result = validateVariant("c.1A>G", "nucleotide");
      expect(result.kind === "variant" && [result.prefix, result.text]).toEqual(["c", "c.1A>G"]);
      expect(validateVariant("n.1A>G", "nucleotide").kind).toBe("variant");
    });

    test("requires g. in the nucleotide column when transcripts are present", () => {
      expect(validateVariant("g.1A>G", "nucleotide", { spliceDefined: true }).kind).toBe("variant");
      expect(validateVariant("c.1A>G", "nucleotide", { spliceDefined: true })).toEqual({
        kind: "error",
        message:
          "hgvs_nt: 'c.1A>G' is not a genomic variant (prefix 'g.'). " +
          "Nucleotide variants must be genomic if transcript variants are also present",
        prefix: "c",
      });
    });

    test("rejects g. in the nucleotide column without transcripts", () => {
      expect(validateVariant("g.1A>G", "nucleotide")).toEqual({
        kind: "error",
        message:
          "hgvs_nt: 'g.1A>G' is not a transcript variant. " +
          "The accepted transcript variant prefixes are 'c.' or 'n.'",
        prefix: "g",
      });
    });

    test("requires c. or n. in the transcript column", () => {
      expect(validateVariant("c.1A>G", "transcript").kind).toBe("variant");
      const result = validateVariant("g.1A>G", "transcript");
      expect(result.kind === "error" && result.message).toBe(
        "hgvs_splice: 'g.1A>G' is not a transcript variant. " +
          "The accepted transcript variant prefixes are 'c.' or 'n.'"
      );
    });

    test("requires p. in the protein column", () => {
      expect(validateVariant("p.Gly1Ala", "protein").kind).toBe("variant");
      const result = validateVariant("c.1A>G", "protein");
      expect(result.kind === "error" && result.message).toBe(
        "hgvs_pro: 'c.1A>G' is not a protein variant. The accepted protein variant prefix is 'p.'"
      );
    });

    test("binds whole-sequence no-change forms like other variants", () => {
      expect(validateVariant("p.=", "protein").kind).toBe("variant");
      expect(validateVariant("p.=", "nucleotide").kind).toBe("error");
    });
  });

  describe("legacy sentinels", () => {
    test("accepts _wt in any column with a deprecation warning", () => {
      const warnings: string[] = [];
      const onWarning = (warning: string): void => {
        warnings.push(warning);
      };

      const result = validateVariant("_WT", "protein", { onWarning });
      expect(result.kind === "variant" && [result.prefix, result.text]).toEqual([null, "_wt"]);
      expect(warnings).toEqual([
        "'_WT' is deprecated and should be replaced by one of 'g.=', 'c.=' or 'n.='",
      ]);
    });

    test("suggests p.(=) for _sy", () => {
      const warnings: string[] = [];
      validateVariant("_sy", "nucleotide", { onWarning: (warning) => warnings.push(warning) });
      expect(warnings).toEqual(["'_sy' is deprecated and should be replaced by 'p.(=)'"]);
    });
  });

  test("throws TypeError for an unknown column", () => {
    expect(() => Reflect.apply(validateVariant, undefined, ["c.1A>G", "hgvs_nt"])).toThrow(
      "Unknown column 'hgvs_nt'. Expected one of nucleotide, transcript, protein"
    );
  });
});

describe("checkPrefixForColumn", () => {
  test.each([
    ["nucleotide", "c", false, true],
    ["nucleotide", "n", false, true],
    ["nucleotide", "g", true, true],
    ["nucleotide", "p", false, false],
    ["transcript", "n", true, true],
    ["transcript", "p", true, false],
    ["protein", "p", false, true],
    ["protein", "g", false, false],
  ] as const)("%s column with prefix %s (splice %s) accepted: %s", (column, prefix, splice, ok) => {
    const message = checkPrefixForColumn(`${prefix}.=`, prefix, column satisfies LogicalColumn, splice);
    expect(message === null).toBe(ok);
  });
});
