import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { writeFileSync } from "node:fs";
import { join } from "node:path";
import { ValidationError } from "../../src/errors";
import {
  CHROMOSOME_END,
  isBedPath,
  parseIntervals,
  parseRegion,
  parseRenameMap,
  parseSampleArgument,
  parseSampleList,
  parseSites,
  readIntervalsFile,
  readSampleListFile,
} from "../../src/formats/lists";
import { createTempDir } from "../utils/vcf-fixtures";

describe("list inputs", () => {
  describe("parseRegion", () => {
    test("whole chromosome, single position and range", () => {
      expect(parseRegion("chrX")).toEqual({ chromosome: "chrX", start: 1, end: CHROMOSOME_END });
      expect(parseRegion("chr1:500")).toEqual({ chromosome: "chr1", start: 500, end: 500 });
      expect(parseRegion("chr1:1,000-2,000")).toEqual({ chromosome: "chr1", start: 1000, end: 2000 });
      expect(parseRegion("chr1:1000-")).toEqual({ chromosome: "chr1", start: 1000, end: CHROMOSOME_END });
    });

    test("keeps a chromosome name containing ':'", () => {
      expect(parseRegion("HLA-A*02:01N")).toEqual({ chromosome: "HLA-A*02:01N", start: 1, end: CHROMOSOME_END });
    });

    test("rejects bad ranges", () => {
      expect(() => parseRegion("chr1:abc-200")).toThrow(ValidationError);
      expect(() => parseRegion("chr1:300-200")).toThrow(ValidationError);
      expect(() => parseRegion("  ")).toThrow("Region must not be empty");
    });
  });

  describe("parseIntervals", () => {
    test("accepts region strings, two columns and three columns", () => {
      const text = ["# comment", "chr1:10-20", "", "chr2 15", "chr3 100 200 name"].join("\n");

      expect(parseIntervals(text)).toEqual([
        { chromosome: "chr1", start: 10, end: 20 },
        { chromosome: "chr2", start: 15, end: 15 },
        { chromosome: "chr3", start: 100, end: 200 },
      ]);
    });

    test("converts BED to 1-based inclusive and skips zero-length lines", () => {
      const text = ["track name=x", "chr1\t99\t200", "chr1\t50\t50"].join("\n");

      expect(parseIntervals(text, { bed: true })).toEqual([{ chromosome: "chr1", start: 100, end: 200 }]);
    });

    test("names the source and line of a bad entry", () => {
      expect(() => parseIntervals("chr1 1 5\nchr1 x 9\n", { source: "regions.txt" })).toThrow(
        "regions.txt:2: Invalid coordinates 'x' '9'"
      );
    });
  });

  test("parseSampleList takes the first column", () => {
    expect(parseSampleList("S1\nS2 extra\n# skip\n\nS3\n")).toEqual(["S1", "S2", "S3"]);
  });

  test("parseSampleArgument splits on commas", () => {
    expect(parseSampleArgument("A, B,,C")).toEqual(["A", "B", "C"]);
  });

  test("parseSites reads chrom/pos pairs", () => {
    expect(parseSites("chr1\t5\nchr2 7\n")).toEqual([
      { chromosome: "chr1", position: 5 },
      { chromosome: "chr2", position: 7 },
    ]);
    expect(() => parseSites("chr1\n", { source: "sites.txt" })).toThrow("sites.txt:1: Expected 'chrom<TAB>pos'");
  });

  test("parseRenameMap reads old/new pairs and rejects repeats", () => {
    expect(parseRenameMap("a\tb\nc d\n")).toEqual(
      new Map([
        ["a", "b"],
        ["c", "d"],
      ])
    );
    expect(() => parseRenameMap("a b\na c\n")).toThrow("'a' is mapped more than once");
    expect(() => parseRenameMap("a b c\n")).toThrow(ValidationError);
  });

  test("isBedPath looks at the extension", () => {
    expect(isBedPath("targets.bed")).toBe(true);
    expect(isBedPath("targets.bed.gz")).toBe(true);
    expect(isBedPath("targets.txt")).toBe(false);
  });

  describe("files", () => {
    let dir: ReturnType<typeof createTempDir>;

    beforeEach(() => {
      dir = createTempDir();
    });

    afterEach(() => {
      dir.cleanup();
    });

    test("readIntervalsFile uses BED rules for .bed files", async () => {
      const bed = join(dir.path, "targets.bed");
      const plain = join(dir.path, "targets.txt");
      writeFileSync(bed, "chr1\t0\t10\n");
      writeFileSync(plain, "chr1\t0\t10\n");

      expect(await readIntervalsFile(bed)).toEqual([{ chromosome: "chr1", start: 1, end: 10 }]);
      await expect(readIntervalsFile(plain)).rejects.toThrow(ValidationError);
    });

    test("readSampleListFile", async () => {
      const path = join(dir.path, "samples.txt");
      writeFileSync(path, "S2\nS1\n");

      expect(await readSampleListFile(path)).toEqual(["S2", "S1"]);
    });
  });
});
