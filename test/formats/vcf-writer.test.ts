import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { readFileSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { gunzipSync } from "node:zlib";
import { FileError } from "../../src/errors";
import { openVcf, parseVcfString } from "../../src/formats/vcf/parser";
import type { VcfRecord } from "../../src/formats/vcf/types";
import { formatInfo, formatRecord, formatSample, formatVcf, writeVcf } from "../../src/formats/vcf/writer";
import { buildVcf, COHORT, collect, createTempDir } from "../utils/vcf-fixtures";

const BGZF_EOF = [
  0x1f, 0x8b, 0x08, 0x04, 0x00, 0x00, 0x00, 0x00, 0x00, 0xff, 0x06, 0x00, 0x42, 0x43, 0x02, 0x00, 0x1b, 0x00, 0x03,
  0x00, 0x00, 0x00, 0x00, 0x00, 0x00, 0x00, 0x00, 0x00,
];

describe("VCF writer", () => {
  describe("formatRecord", () => {
    test("writes '.' for empty columns", () => {
      const record: VcfRecord = {
        chrom: "chr1",
        pos: 10,
        id: ".",
        ref: "A",
        alt: [],
        filter: [],
        info: new Map(),
        format: [],
        samples: [],
      };
      expect(formatRecord(record)).toBe("chr1\t10\t.\tA\t.\t.\t.\t.");
    });

    test("writes lists, flags and samples", () => {
      const record: VcfRecord = {
        chrom: "chr2",
        pos: 5,
        id: "rs9",
        ref: "G",
        alt: ["A", "T"],
        qual: 42,
        filter: ["q10", "s50"],
        info: new Map<string, string | readonly string[] | true>([
          ["AF", ["0.1", "0.2"]],
          ["DB", true],
        ]),
        format: ["GT", "DP"],
        samples: [new Map([["GT", "0/1"], ["DP", "7"]]), new Map([["GT", "./."]])],
      };
      expect(formatRecord(record)).toBe("chr2\t5\trs9\tG\tA,T\t42\tq10;s50\tAF=0.1,0.2;DB\tGT:DP\t0/1:7\t./.");
    });
  });

  test("formatInfo writes '.' for an empty map", () => {
    expect(formatInfo(new Map())).toBe(".");
  });

  test("formatSample fills inner gaps and drops trailing ones", () => {
    const format = ["GT", "AD", "DP"];
    expect(formatSample(new Map([["GT", "0/1"], ["DP", "5"]]), format)).toBe("0/1:.:5");
    expect(formatSample(new Map([["GT", "1/1"]]), format)).toBe("1/1");
    expect(formatSample(new Map(), format)).toBe(".");
  });

  test("parse then format reproduces the input text", async () => {
    const text = buildVcf(COHORT);
    const source = await parseVcfString(text);
    const written = (await collect(formatVcf(source))).join("");

    expect(written).toBe(text);
  });

  describe("writeVcf", () => {
    let dir: ReturnType<typeof createTempDir>;

    beforeEach(() => {
      dir = createTempDir();
    });

    afterEach(() => {
      dir.cleanup();
    });

    test("writes plain text and counts records", async () => {
      const path = join(dir.path, "out.vcf");
      const summary = await writeVcf(await parseVcfString(buildVcf(COHORT)), path);

      expect(summary).toEqual({ path, records: 3 });
      expect(readFileSync(path, "utf8")).toBe(buildVcf(COHORT));
    });

    test("writes BGZF for .gz paths, ending with the EOF block", async () => {
      const path = join(dir.path, "out.vcf.gz");
      await writeVcf(await parseVcfString(buildVcf(COHORT)), path);

      const bytes = readFileSync(path);
      expect(bytes[3]).toBe(0x04);
      expect([...bytes.subarray(bytes.length - 28)]).toEqual(BGZF_EOF);
      expect(gunzipSync(bytes).toString("utf8")).toBe(buildVcf(COHORT));
    });

    test("output read back gives the same records", async () => {
      const path = join(dir.path, "roundtrip.vcf.bgz");
      await writeVcf(await parseVcfString(buildVcf(COHORT)), path);

      const reread = await openVcf(path);
      const records = await collect(reread.records);
      expect(records.map((record) => [record.chrom, record.pos, record.ref, record.alt])).toEqual([
        ["chr1", 100, "A", ["G"]],
        ["chr1", 250, "C", ["T"]],
        ["chr2", 50, "G", ["A", "T"]],
      ]);
    });

    test("fails with FileError when the parent path is a file", async () => {
      const blocker = join(dir.path, "blocker");
      writeFileSync(blocker, "");
      const path = join(blocker, "out.vcf");

      await expect(writeVcf(await parseVcfString(buildVcf(COHORT)), path)).rejects.toThrow(FileError);
    });
  });
});
