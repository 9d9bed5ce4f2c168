/**
 * Shared VCF fixtures and helpers for tests
 */

import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { parseVcfString } from "../../src/formats/vcf/parser";
import type { VcfRecord, VcfSource } from "../../src/formats/vcf/types";

export interface VcfFixture {
  samples?: readonly string[];
  contigs?: readonly string[];
  meta?: readonly string[];
  records?: readonly string[];
}

/**
 * Build VCF text; record lines use spaces or tabs between columns
 */
export function buildVcf(fixture: VcfFixture = {}): string {
  const samples = fixture.samples ?? [];
  const lines = ["##fileformat=VCFv4.2"];
  for (const contig of fixture.contigs ?? []) {
    lines.push(`##contig=<ID=${contig}>`);
  }
  lines.push(...(fixture.meta ?? []));
  const columns = ["#CHROM", "POS", "ID", "REF", "ALT", "QUAL", "FILTER", "INFO"];
  if (samples.length > 0) columns.push("FORMAT", ...samples);
  lines.push(columns.join("\t"));
  for (const record of fixture.records ?? []) {
    lines.push(record.trim().split(/\s+/).join("\t"));
  }
  return `${lines.join("\n")}\n`;
}

export async function vcfSource(fixture: VcfFixture): Promise<VcfSource> {
  return parseVcfString(buildVcf(fixture), { onWarning: () => {} });
}

/**
 * Drain an async iterable into an array
 */
export async function collect<T>(items: AsyncIterable<T>): Promise<T[]> {
  const results: T[] = [];
  for await (const item of items) {
    results.push(item);
  }
  return results;
}

export async function* fromArray<T>(items: readonly T[]): AsyncGenerator<T, void, undefined> {
  for (const item of items) {
    yield item;
  }
}

/**
 * `chrom:pos` of each record
 */
export function sites(records: readonly VcfRecord[]): string[] {
  return records.map((record) => `${record.chrom}:${record.pos}`);
}

export function genotypes(record: VcfRecord | undefined): (string | undefined)[] {
  return record?.samples.map((sample) => sample.get("GT")) ?? [];
}

/**
 * Four samples at three sites on two chromosomes
 *
 * chr1:100 has GT 0/0, 0/1, 1/1, ./.
 */
export const COHORT: VcfFixture = {
  samples: ["S1", "S2", "S3", "S4"],
  contigs: ["chr1", "chr2"],
  meta: [
    '##INFO=<ID=DP,Number=1,Type=Integer,Description="Total depth">',
    '##FORMAT=<ID=GT,Number=1,Type=String,Description="Genotype">',
    '##FORMAT=<ID=DP,Number=1,Type=Integer,Description="Read depth">',
  ],
  records: [
    "chr1 100 rs1 A G 50 PASS DP=40 GT:DP 0/0:10 0/1:12 1/1:8 ./.:0",
    "chr1 250 rs2 C T 30 PASS DP=35 GT:DP 0/1:9 0/1:11 0/0:7 0/0:8",
    "chr2 50 . G A,T 20 q10 DP=12 GT:DP 1/2:3 0/0:4 ./.:0 ./.:0",
  ],
};

/**
 * Fresh temporary directory and its cleanup
 */
export function createTempDir(prefix = "vcfops-test-"): { path: string; cleanup: () => void } {
  const path = mkdtempSync(join(tmpdir(), prefix));
  return { path, cleanup: () => rmSync(path, { recursive: true, force: true }) };
}
