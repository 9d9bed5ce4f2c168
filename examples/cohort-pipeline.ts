#!/usr/bin/env -S node --import tsx
/**
 * Merge per-batch VCFs, drop low-frequency sites and write one file per chromosome
 *
 * Usage: tsx examples/cohort-pipeline.ts out-dir batch1.vcf.gz batch2.vcf.gz ...
 */

import { openVcf } from "../src/formats/vcf";
import { mergeVcf, vcfops } from "../src/operations";

const [outputDir, ...inputs] = process.argv.slice(2);
if (outputDir === undefined || inputs.length === 0) {
  console.error("usage: cohort-pipeline.ts <out-dir> <input.vcf>...");
  process.exit(2);
}

const sources = await Promise.all(inputs.map((path) => openVcf(path)));
const merged = mergeVcf(sources, { mode: "different-samples-union-sites" });

const summary = await vcfops(merged)
  .quality({ minMac: 2, maxMissingRate: 0.1 })
  .split({ outputDir, extension: ".vcf.gz" });

for (const file of summary.files) {
  console.log(`${file.chromosome}\t${file.records}\t${file.path}`);
}
console.log(`total\t${summary.totalRecords}`);
