import { describe, expect, test } from "vitest";
import { DuplicateSampleError, UnknownSampleError } from "../../src/errors";
import { keepSamples, removeSamples, renameSamples, selectSamples } from "../../src/operations/samples";
import { COHORT, collect, genotypes, vcfSource } from "../utils/vcf-fixtures";

describe("sample projection", () => {
  describe("keepSamples", () => {
    test("keeps the named samples in header order", async () => {
      const result = keepSamples(await vcfSource(COHORT), ["S3", "S1", "S3"]);
      const records = await collect(result.records);

      expect(result.header.samples).toEqual(["S1", "S3"]);
      expect(genotypes(records[0])).toEqual(["0/0", "1/1"]);
      expect(genotypes(records[2])).toEqual(["1/2", "./."]);
    });

    test("keeps other sample fields with the genotype", async () => {
      const result = keepSamples(await vcfSource(COHORT), ["S2"]);
      const [first] = await collect(result.records);

      expect(first?.samples[0]?.get("DP")).toBe("12");
      expect(first?.format).toEqual(["GT", "DP"]);
    });

    test("an empty list gives a sites-only stream", async () => {
      const result = keepSamples(await vcfSource(COHORT), []);
      const records = await collect(result.records);

      expect(result.header.samples).toEqual([]);
      expect(records.map((record) => record.samples.length)).toEqual([0, 0, 0]);
    });

    test("rejects unknown names before reading records", async () => {
      const source = await vcfSource(COHORT);
      expect(() => keepSamples(source, ["S1", "X9", "Y7"])).toThrow(UnknownSampleError);
      expect(() => keepSamples(source, ["X9", "Y7"])).toThrow("Unknown samples: X9, Y7");
    });
  });

  describe("removeSamples", () => {
    test("drops the named samples", async () => {
      const result = removeSamples(await vcfSource(COHORT), ["S2", "S4"]);
      const records = await collect(result.records);

      expect(result.header.samples).toEqual(["S1", "S3"]);
      expect(genotypes(records[1])).toEqual(["0/1", "0/0"]);
    });

    test("rejects an unknown name", async () => {
      const source = await vcfSource(COHORT);
      expect(() => removeSamples(source, ["nope"])).toThrow("Unknown sample: nope");
    });
  });

  describe("renameSamples", () => {
    test("renames mapped samples and leaves records alone", async () => {
      const warnings: string[] = [];
      const result = renameSamples(
        await vcfSource(COHORT),
        { S1: "P1", S4: "P4" },
        { onWarning: (message) => warnings.push(message) }
      );

      expect(result.header.samples).toEqual(["P1", "S2", "S3", "P4"]);
      expect(genotypes((await collect(result.records))[0])).toEqual(["0/0", "0/1", "1/1", "./."]);
      expect(warnings).toEqual([]);
    });

    test("warns about entries for absent samples and applies the rest", async () => {
      const warnings: string[] = [];
      const mapping = new Map([
        ["S1", "P1"],
        ["ghost", "P9"],
      ]);
      const result = renameSamples(await vcfSource(COHORT), mapping, { onWarning: (message) => warnings.push(message) });

      expect(result.header.samples).toEqual(["P1", "S2", "S3", "S4"]);
      expect(warnings).toEqual(["Sample 'ghost' not found in header; rename entry skipped"]);
    });

    test("applying the same mapping twice changes nothing more", async () => {
      const mapping = { S1: "P1" };
      const once = renameSamples(await vcfSource(COHORT), mapping, { onWarning: () => {} });
      const twice = renameSamples(once, mapping, { onWarning: () => {} });

      expect(twice.header.samples).toEqual(once.header.samples);
    });

    test("swapping two names is allowed", async () => {
      const result = renameSamples(await vcfSource(COHORT), { S1: "S2", S2: "S1" });
      expect(result.header.samples).toEqual(["S2", "S1", "S3", "S4"]);
    });

    test("rejects a rename that duplicates a name", async () => {
      const source = await vcfSource(COHORT);
      expect(() => renameSamples(source, { S1: "S2" })).toThrow(DuplicateSampleError);
      expect(() => renameSamples(source, { S1: "S2" })).toThrow("Duplicate sample name after rename: S2");
    });
  });

  test("selectSamples can reorder columns", async () => {
    const result = selectSamples(await vcfSource(COHORT), [3, 0]);
    const [first] = await collect(result.records);

    expect(result.header.samples).toEqual(["S4", "S1"]);
    expect(genotypes(first)).toEqual(["./.", "0/0"]);
  });
});

test("keeping names then removing the rest matches keeping them alone", async () => {
  const names = ["S4", "S2"];
  const kept = keepSamples(await vcfSource(COHORT), names);
  const leftover = kept.header.samples.filter((name) => !names.includes(name));
  const thenRemoved = removeSamples(kept, leftover);

  const complement = COHORT.samples?.filter((name) => !names.includes(name)) ?? [];
  const removedOnly = removeSamples(await vcfSource(COHORT), complement);

  expect(thenRemoved.header.samples).toEqual(["S2", "S4"]);
  expect(removedOnly.header.samples).toEqual(thenRemoved.header.samples);
  expect((await collect(thenRemoved.records)).map(genotypes)).toEqual(
    (await collect(removedOnly.records)).map(genotypes)
  );
});
