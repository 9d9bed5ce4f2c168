import { describe, expect, test } from "vitest";
import { MergeError, OverlapError, SampleMismatchError, ValidationError, VcfFormatError } from "../../src/errors";
import type { VcfRecord, VcfSource } from "../../src/formats/vcf/types";
import { getContigIds } from "../../src/formats/vcf/header";
import { concatVcf, createChromosomeComparator, mergeVcf, naturalCompare } from "../../src/operations/merge";
import { collect, genotypes, sites, vcfSource } from "../utils/vcf-fixtures";

const PAIR = { samples: ["S1", "S2"], contigs: ["chr1", "chr2"] };

/**
 * Wrap a source so tests can see whether its records were released
 */
function tracked(source: VcfSource): { source: VcfSource; released: () => boolean } {
  let released = false;
  const inner = source.records[Symbol.asyncIterator]();
  const records: AsyncIterableIterator<VcfRecord> = {
    next: () => inner.next(),
    async return(): Promise<IteratorResult<VcfRecord>> {
      released = true;
      await inner.return?.();
      return { done: true, value: undefined };
    },
    [Symbol.asyncIterator]() {
      return this;
    },
  };
  return { source: { header: source.header, records }, released: () => released };
}

function row(chrom: string, pos: number, ref = "A", alt = "G"): string {
  return `${chrom} ${pos} . ${ref} ${alt} . . . GT 0/0 0/1`;
}

describe("chromosome order", () => {
  test("naturalCompare orders embedded numbers numerically", () => {
    expect(["chr10", "chr2", "chrX", "chr1"].sort(naturalCompare)).toEqual(["chr1", "chr2", "chr10", "chrX"]);
    expect(naturalCompare("chr1", "chr1")).toBe(0);
  });

  test("declared contigs come first in header order", () => {
    const compare = createChromosomeComparator(["chrM", "chr1"]);
    expect(["chr1", "chr2", "chrM"].sort(compare)).toEqual(["chrM", "chr1", "chr2"]);
  });

  test("every declared contig sorts before any undeclared chromosome", () => {
    const compare = createChromosomeComparator(["chr10", "chr2"]);

    expect(["chr5", "chr2", "chr10", "chr1"].sort(compare)).toEqual(["chr10", "chr2", "chr1", "chr5"]);
    expect(compare("chr2", "chr5")).toBeLessThan(0);
    expect(compare("chr5", "chr10")).toBeGreaterThan(0);
  });
});

describe("mergeVcf: same samples, disjoint sites", () => {
  test("interleaves sorted inputs", async () => {
    const a = await vcfSource({ ...PAIR, records: [row("chr1", 10), row("chr2", 5, "C", "T")] });
    const b = await vcfSource({ ...PAIR, records: [row("chr1", 20), row("chr1", 30, "G", "C")] });
    const merged = mergeVcf([a, b]);

    expect(merged.header.samples).toEqual(["S1", "S2"]);
    expect(sites(await collect(merged.records))).toEqual(["chr1:10", "chr1:20", "chr1:30", "chr2:5"]);
  });

  test("uses natural order for undeclared chromosomes", async () => {
    const a = await vcfSource({ records: ["chr2 1 . A G . . .", "chr10 1 . A G . . ."] });
    const b = await vcfSource({ records: ["chr10 5 . A G . . ."] });

    expect(sites(await collect(mergeVcf([a, b]).records))).toEqual(["chr2:1", "chr10:1", "chr10:5"]);
  });

  test("places undeclared chromosomes after the declared ones", async () => {
    const a = await vcfSource({
      contigs: ["chr10", "chr2"],
      records: ["chr10 1 . A G . . .", "chr2 1 . A G . . .", "chr5 1 . A G . . ."],
    });
    const b = await vcfSource({ records: ["chr5 2 . A G . . ."] });

    expect(sites(await collect(mergeVcf([a, b]).records))).toEqual(["chr10:1", "chr2:1", "chr5:1", "chr5:2"]);
  });

  test("combines header contigs", async () => {
    const a = await vcfSource({ contigs: ["chr1"], records: [] });
    const b = await vcfSource({ contigs: ["chr1", "chr2"], records: [] });

    expect(getContigIds(mergeVcf([a, b]).header)).toEqual(["chr1", "chr2"]);
  });

  test("fails when a site is in two inputs", async () => {
    const a = await vcfSource({ ...PAIR, records: [row("chr1", 10)] });
    const b = await vcfSource({ ...PAIR, records: [row("chr1", 10, "A", "T")] });
    const failure = collect(mergeVcf([a, b]).records);

    await expect(failure).rejects.toThrow(OverlapError);
    await expect(failure).rejects.toThrow("Records at the same site in several inputs at chr1:10");
  });

  test("fails on differing sample lists", async () => {
    const a = await vcfSource({ samples: ["S1", "S2"] });
    const b = await vcfSource({ samples: ["S2", "S1"] });

    expect(() => mergeVcf([a, b])).toThrow(SampleMismatchError);
  });

  test("fails on an unsorted input", async () => {
    const a = await vcfSource({ records: ["chr1 30 . A G . . .", "chr1 10 . A G . . ."] });
    const b = await vcfSource({ records: ["chr1 20 . A G . . ."] });

    await expect(collect(mergeVcf([a, b]).records)).rejects.toThrow(
      new MergeError("Input #1 is not sorted: chr1:10 follows chr1:30", 0)
    );
  });

  test("rejects an empty input list", () => {
    expect(() => mergeVcf([])).toThrow(ValidationError);
    expect(() => mergeVcf([])).toThrow("Merge needs at least one input");
  });
});

describe("mergeVcf: different samples, union sites", () => {
  const left = {
    samples: ["S1", "S2"],
    contigs: ["chr1"],
    records: ["chr1 10 rs1 A G 50 PASS DP=9 GT:DP 0/1:5 1/1:6", "chr1 20 . C T 30 PASS . GT:DP 0/0:4 0/1:3"],
  };
  const right = {
    samples: ["S3"],
    contigs: ["chr1"],
    records: ["chr1 10 rs9 A T,G 12 q10 . GT 1/2", "chr1 30 . G A 40 PASS . GT 0|1"],
  };

  test("joins samples and sites", async () => {
    const merged = mergeVcf([await vcfSource(left), await vcfSource(right)], { mode: "different-samples-union-sites" });
    const records = await collect(merged.records);

    expect(merged.header.samples).toEqual(["S1", "S2", "S3"]);
    expect(sites(records)).toEqual(["chr1:10", "chr1:20", "chr1:30"]);
  });

  test("takes the ALT union and remaps genotypes", async () => {
    const merged = mergeVcf([await vcfSource(left), await vcfSource(right)], { mode: "different-samples-union-sites" });
    const [joined] = await collect(merged.records);

    expect(joined?.alt).toEqual(["G", "T"]);
    expect(genotypes(joined)).toEqual(["0/1", "1/1", "2/1"]);
    expect(joined?.format).toEqual(["GT", "DP"]);
    expect(joined?.id).toBe("rs1");
    expect(joined?.qual).toBe(50);
    expect(joined?.samples[0]?.get("DP")).toBe("5");
  });

  test("fills samples missing at a site with ./.", async () => {
    const merged = mergeVcf([await vcfSource(left), await vcfSource(right)], { mode: "different-samples-union-sites" });
    const records = await collect(merged.records);

    expect(genotypes(records[1])).toEqual(["0/0", "0/1", "./."]);
    expect(genotypes(records[2])).toEqual(["./.", "./.", "0|1"]);
  });

  test("a sample in several inputs keeps the first input's data", async () => {
    const a = await vcfSource({ samples: ["S1"], records: ["chr1 5 . A G . . . GT 0/1"] });
    const b = await vcfSource({ samples: ["S1", "S2"], records: ["chr1 5 . A G . . . GT 1/1 0/0"] });
    const merged = mergeVcf([a, b], { mode: "different-samples-union-sites" });

    expect(merged.header.samples).toEqual(["S1", "S2"]);
    expect(genotypes((await collect(merged.records))[0])).toEqual(["0/1", "0/0"]);
  });

  test("fails when REF alleles disagree", async () => {
    const a = await vcfSource({ samples: ["S1"], records: ["chr1 5 . A G . . . GT 0/1"] });
    const b = await vcfSource({ samples: ["S2"], records: ["chr1 5 . C G . . . GT 0/1"] });

    await expect(collect(mergeVcf([a, b], { mode: "different-samples-union-sites" }).records)).rejects.toThrow(
      "REF alleles disagree (A vs C) at chr1:5"
    );
  });
});

describe("concatVcf", () => {
  test("emits inputs one after another", async () => {
    const a = await vcfSource({ ...PAIR, records: [row("chr1", 10), row("chr1", 20)] });
    const b = await vcfSource({ ...PAIR, records: [row("chr2", 5)] });

    expect(sites(await collect(concatVcf([a, b]).records))).toEqual(["chr1:10", "chr1:20", "chr2:5"]);
  });

  test("keeps only records inside the given intervals", async () => {
    const a = await vcfSource({ ...PAIR, records: [row("chr1", 10), row("chr1", 20)] });
    const b = await vcfSource({ ...PAIR, records: [row("chr2", 5)] });
    const result = concatVcf([a, b], {
      intervals: [
        { chromosome: "chr1", start: 15, end: 25 },
        { chromosome: "chr2", start: 1, end: 5 },
      ],
    });

    expect(sites(await collect(result.records))).toEqual(["chr1:20", "chr2:5"]);
  });

  test("warns about interval chromosomes the header lacks", async () => {
    const warnings: string[] = [];
    const a = await vcfSource({ ...PAIR, records: [row("chr1", 10)] });
    const result = concatVcf([a], {
      intervals: [{ chromosome: "chrZ", start: 1, end: 5 }],
      onWarning: (message) => warnings.push(message),
    });

    expect(await collect(result.records)).toEqual([]);
    expect(warnings).toEqual(["Chromosome 'chrZ' from interval entry not found in VCF header; entry has no effect"]);
  });

  test("releases inputs it never reached when the consumer stops", async () => {
    const a = await vcfSource({ ...PAIR, records: [row("chr1", 10), row("chr1", 20)] });
    const b = tracked(await vcfSource({ ...PAIR, records: [row("chr2", 5)] }));

    for await (const record of concatVcf([a, b.source]).records) {
      expect(record.pos).toBe(10);
      break;
    }

    expect(b.released()).toBe(true);
  });

  test("releases later inputs when an earlier one fails", async () => {
    const a = await vcfSource({ ...PAIR, records: ["chr1 10 . A G . . . GT 0/0"] });
    const b = tracked(await vcfSource({ ...PAIR, records: [row("chr2", 5)] }));

    await expect(collect(concatVcf([a, b.source]).records)).rejects.toThrow(VcfFormatError);
    expect(b.released()).toBe(true);
  });

  test("requires identical sample lists", async () => {
    const a = await vcfSource({ samples: ["S1"] });
    const b = await vcfSource({ samples: ["S1", "S2"] });

    expect(() => concatVcf([a, b])).toThrow("Sample list differs from input #1 (2 vs 1 samples)");
  });
});
