/**
 * Summary statistics for a VCF stream (`bcftools stats` summary numbers)
 *
 * Counts are accumulated in one pass; only per-chromosome counters are kept
 * in memory.
 */

import { isMissingGenotype } from "../formats/vcf/genotype";
import type { VcfHeader, VcfSource } from "../formats/vcf/types";

// =============================================================================
// TYPES
// =============================================================================

/**
 * Kind of change an ALT allele describes relative to REF
 */
export type VariantType = "snp" | "mnp" | "indel" | "other";

export interface ChromosomeCount {
  readonly chromosome: string;
  readonly records: number;
}

/**
 * Counts gathered from a whole stream
 *
 * A record counts once toward each variant type any of its ALT alleles has,
 * so a site with one SNP and one indel allele counts toward both.
 */
export interface VcfStats {
  readonly samples: number;
  readonly records: number;
  /** Records per chromosome in order of first appearance */
  readonly chromosomes: readonly ChromosomeCount[];
  readonly snps: number;
  readonly mnps: number;
  readonly indels: number;
  readonly others: number;
  /** Records with more than one ALT allele */
  readonly multiallelic: number;
  /** Records whose ALT is `.` */
  readonly noAlt: number;
  /** Records whose FILTER is `PASS` */
  readonly pass: number;
  /** SNP alleles that are transitions (A↔G, C↔T) */
  readonly transitions: number;
  readonly transversions: number;
  /** Genotype cells checked (records × samples) */
  readonly genotypes: number;
  readonly missingGenotypes: number;
  /** `missingGenotypes / genotypes`, 0 without genotypes */
  readonly missingRate: number;
}

interface StatsAccumulator {
  records: number;
  chromosomes: Map<string, number>;
  snps: number;
  mnps: number;
  indels: number;
  others: number;
  multiallelic: number;
  noAlt: number;
  pass: number;
  transitions: number;
  transversions: number;
  genotypes: number;
  missingGenotypes: number;
}

const TRANSITIONS = new Set(["AG", "GA", "CT", "TC"]);

/**
 * Classify one ALT allele against REF
 *
 * Symbolic (`<DEL>`), breakend, `*` and `.` alleles are `other`.
 */
export function classifyAllele(ref: string, alt: string): VariantType {
  if (!/^[ACGTNacgtn]+$/.test(alt) || !/^[ACGTNacgtn]+$/.test(ref)) {
    return "other";
  }
  if (ref.length === alt.length) {
    return ref.length === 1 ? "snp" : "mnp";
  }
  return "indel";
}

/**
 * Streaming calculator for {@link VcfStats}
 */
export class VcfStatsCalculator {
  async calculate(source: VcfSource): Promise<VcfStats> {
    const acc = this.createAccumulator();
    for await (const record of source.records) {
      acc.records++;
      acc.chromosomes.set(record.chrom, (acc.chromosomes.get(record.chrom) ?? 0) + 1);

      if (record.alt.length === 0) acc.noAlt++;
      if (record.alt.length > 1) acc.multiallelic++;
      if (record.filter.length === 1 && record.filter[0] === "PASS") acc.pass++;

      const types = new Set<VariantType>();
      for (const alt of record.alt) {
        const kind = classifyAllele(record.ref, alt);
        types.add(kind);
        if (kind === "snp" && alt.toUpperCase() !== record.ref.toUpperCase()) {
          if (TRANSITIONS.has(`${record.ref}${alt}`.toUpperCase())) {
            acc.transitions++;
          } else {
            acc.transversions++;
          }
        }
      }
      if (types.has("snp")) acc.snps++;
      if (types.has("mnp")) acc.mnps++;
      if (types.has("indel")) acc.indels++;
      if (types.has("other")) acc.others++;

      for (const sample of record.samples) {
        acc.genotypes++;
        if (isMissingGenotype(sample)) acc.missingGenotypes++;
      }
    }
    return this.finalize(acc, source.header);
  }

  private createAccumulator(): StatsAccumulator {
    return {
      records: 0,
      chromosomes: new Map(),
      snps: 0,
      mnps: 0,
      indels: 0,
      others: 0,
      multiallelic: 0,
      noAlt: 0,
      pass: 0,
      transitions: 0,
      transversions: 0,
      genotypes: 0,
      missingGenotypes: 0,
    };
  }

  private finalize(acc: StatsAccumulator, header: VcfHeader): VcfStats {
    return {
      samples: header.samples.length,
      records: acc.records,
      chromosomes: [...acc.chromosomes].map(([chromosome, records]) => ({ chromosome, records })),
      snps: acc.snps,
      mnps: acc.mnps,
      indels: acc.indels,
      others: acc.others,
      multiallelic: acc.multiallelic,
      noAlt: acc.noAlt,
      pass: acc.pass,
      transitions: acc.transitions,
      transversions: acc.transversions,
      genotypes: acc.genotypes,
      missingGenotypes: acc.missingGenotypes,
      missingRate: acc.genotypes === 0 ? 0 : acc.missingGenotypes / acc.genotypes,
    };
  }
}

/**
 * Sample names in header order (`bcftools query -l`)
 */
export function listSamples(header: VcfHeader): string[] {
  return [...header.samples];
}

/**
 * Render stats as `key<TAB>value` lines
 */
export function formatStats(stats: VcfStats): string {
  const rows: [string, string | number][] = [
    ["samples", stats.samples],
    ["records", stats.records],
    ["snps", stats.snps],
    ["mnps", stats.mnps],
    ["indels", stats.indels],
    ["others", stats.others],
    ["multiallelic", stats.multiallelic],
    ["no_alt", stats.noAlt],
    ["pass", stats.pass],
    ["transitions", stats.transitions],
    ["transversions", stats.transversions],
    ["missing_genotypes", stats.missingGenotypes],
    ["missing_rate", stats.missingRate.toFixed(4)],
  ];
  for (const entry of stats.chromosomes) {
    rows.push([`records[${entry.chromosome}]`, entry.records]);
  }
  return `${rows.map(([key, value]) => `${key}\t${value}`).join("\n")}\n`;
}
