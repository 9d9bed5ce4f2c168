/**
 * Site quality filters: genotype missingness and minor allele frequency
 *
 * Equivalent to `vcftools --max-missing` / `--maf` / `--mac`, except that
 * missingness here is the fraction of *missing* genotypes (vcftools takes
 * the fraction present).
 */

import { type } from "arktype";
import { ValidationError } from "../errors";
import { calledAlleles, isMissingGenotype, parseGenotype } from "../formats/vcf/genotype";
import type { VcfRecord, VcfSource } from "../formats/vcf/types";
import { type QualityFilterOptions, QualityFilterOptionsSchema } from "./types";

/**
 * Per-site genotype summary
 */
export interface SiteMetrics {
  readonly sampleCount: number;
  readonly missingCount: number;
  /** `missingCount / sampleCount`; 0 when there are no samples */
  readonly missingRate: number;
  /** Called allele counts indexed by allele (0 = REF) */
  readonly alleleCounts: readonly number[];
  /** Total called alleles across all samples */
  readonly calledAlleleCount: number;
  /** Undefined when no allele was called */
  readonly maf: number | undefined;
  /** Undefined when no allele was called */
  readonly mac: number | undefined;
}

/**
 * Count missing genotypes and called alleles at one record
 *
 * The minor allele of a biallelic site is the rarer of REF and ALT. For a
 * multi-allelic site it is the rarest ALT allele. A site without ALT has a
 * minor allele frequency of 0. Allele indices beyond the ALT list are
 * ignored.
 *
 * @example
 * ```typescript
 * // GT 0/0, 0/1, 1/1, ./.
 * computeSiteMetrics(record); // missingRate 0.25, maf 0.5
 * ```
 */
export function computeSiteMetrics(record: VcfRecord): SiteMetrics {
  const alleleCounts = new Array<number>(record.alt.length + 1).fill(0);
  let missingCount = 0;
  let calledAlleleCount = 0;

  for (const sample of record.samples) {
    if (isMissingGenotype(sample)) {
      missingCount++;
      continue;
    }
    for (const allele of calledAlleles(parseGenotype(sample.get("GT")))) {
      if (allele < alleleCounts.length) {
        alleleCounts[allele] = (alleleCounts[allele] ?? 0) + 1;
        calledAlleleCount++;
      }
    }
  }

  const sampleCount = record.samples.length;
  const mac = minorAlleleCount(alleleCounts, calledAlleleCount);
  return {
    sampleCount,
    missingCount,
    missingRate: sampleCount === 0 ? 0 : missingCount / sampleCount,
    alleleCounts,
    calledAlleleCount,
    mac,
    maf: mac === undefined ? undefined : mac / calledAlleleCount,
  };
}

function minorAlleleCount(counts: readonly number[], total: number): number | undefined {
  if (total === 0) {
    return undefined;
  }
  if (counts.length <= 1) {
    return 0;
  }
  if (counts.length === 2) {
    return Math.min(counts[0] ?? 0, counts[1] ?? 0);
  }
  return Math.min(...counts.slice(1));
}

/**
 * Keep records passing every threshold in `options`
 *
 * Sites where no allele was called have no MAF and fail any `minMaf` or
 * `minMac` above 0.
 *
 * @throws {ValidationError} If a threshold is out of range
 */
export function filterQuality(source: VcfSource, options: QualityFilterOptions = {}): VcfSource {
  const validated = QualityFilterOptionsSchema(options);
  if (validated instanceof type.errors) {
    throw new ValidationError(`Invalid quality filter options: ${validated.summary}`);
  }

  const maxMissingRate = options.maxMissingRate ?? 1;
  const minMaf = options.minMaf ?? 0;
  const minMac = options.minMac ?? 0;

  const passes = (record: VcfRecord): boolean => {
    const metrics = computeSiteMetrics(record);
    if (metrics.missingRate > maxMissingRate) return false;
    if (minMaf > 0 && (metrics.maf === undefined || metrics.maf < minMaf)) return false;
    if (minMac > 0 && (metrics.mac === undefined || metrics.mac < minMac)) return false;
    return true;
  };

  async function* filtered(): AsyncGenerator<VcfRecord, void, undefined> {
    for await (const record of source.records) {
      if (passes(record)) yield record;
    }
  }

  return { header: source.header, records: filtered() };
}
