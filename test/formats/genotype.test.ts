import { describe, expect, test } from "vitest";
import {
  calledAlleles,
  formatGenotype,
  isMissingGenotype,
  missingGenotype,
  parseGenotype,
  remapGenotype,
} from "../../src/formats/vcf/genotype";

describe("genotype helpers", () => {
  test("parses unphased, phased and haploid calls", () => {
    expect(parseGenotype("0/1")).toEqual({ alleles: [0, 1], separators: ["/"] });
    expect(parseGenotype("1|0")).toEqual({ alleles: [1, 0], separators: ["|"] });
    expect(parseGenotype("2")).toEqual({ alleles: [2], separators: [] });
    expect(parseGenotype("./.")).toEqual({ alleles: [null, null], separators: ["/"] });
  });

  test("returns undefined for absent or malformed text", () => {
    expect(parseGenotype(undefined)).toBeUndefined();
    expect(parseGenotype(".")).toBeUndefined();
    expect(parseGenotype("A/B")).toBeUndefined();
  });

  test("formatGenotype reverses parseGenotype", () => {
    expect(formatGenotype({ alleles: [0, null], separators: ["|"] })).toBe("0|.");
  });

  test("missing means no called allele", () => {
    expect(isMissingGenotype(new Map([["GT", "./."]]))).toBe(true);
    expect(isMissingGenotype(new Map([["GT", "."]]))).toBe(true);
    expect(isMissingGenotype(new Map([["DP", "4"]]))).toBe(true);
    expect(isMissingGenotype(new Map([["GT", "0/."]]))).toBe(false);
    expect(isMissingGenotype(new Map([["GT", "1/1"]]))).toBe(false);
  });

  test("calledAlleles skips missing alleles", () => {
    expect(calledAlleles(parseGenotype("1/."))).toEqual([1]);
    expect(calledAlleles(undefined)).toEqual([]);
  });

  test("remapGenotype rewrites indices and keeps phasing", () => {
    expect(remapGenotype("0|1", [0, 2])).toBe("0|2");
    expect(remapGenotype("1/.", [0, 3])).toBe("3/.");
    expect(remapGenotype("garbage", [0, 1])).toBe("garbage");
  });

  test("missingGenotype uses the given ploidy", () => {
    expect(missingGenotype()).toBe("./.");
    expect(missingGenotype(1)).toBe(".");
  });
});
