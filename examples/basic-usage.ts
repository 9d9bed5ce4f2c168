#!/usr/bin/env -S node --import tsx
/**
 * Subset a cohort VCF and print a per-sample genotype table
 *
 * Usage: tsx examples/basic-usage.ts cohort.vcf.gz S1,S2 chr1:1-5000000
 */

import { VcfOps } from "../src/operations";

const [input, samples = "", region = ""] = process.argv.slice(2);
if (input === undefined) {
  console.error("usage: basic-usage.ts <input.vcf> [samples] [region]");
  process.exit(2);
}

let ops = await VcfOps.open(input, { onWarning: (message) => console.error(`warning: ${message}`) });
if (samples !== "") ops = ops.keepSamples(samples.split(","));
if (region !== "") ops = ops.regions([region]);

for await (const line of ops.quality({ minMaf: 0.05, maxMissingRate: 0.2 }).project("%CHROM\\t%POS[\\t%GT]\\n")) {
  process.stdout.write(line);
}
