/**
 * Region and site filters
 *
 * Records are kept in input order, each at most once, however many
 * overlapping intervals cover it. Chromosomes named by intervals but absent
 * from the data are reported through `onWarning` as a ChromMismatchError
 * message: up front when the header declares contigs, otherwise once the
 * record stream has been read to the end.
 */

import { ChromMismatchError } from "../errors";
import { getContigIds } from "../formats/vcf/header";
import type { VcfRecord, VcfSource } from "../formats/vcf/types";
import type { Interval, Site } from "../types";
import { type RegionFilterOptions, resolveWarning } from "./types";

/**
 * Sorted, merged intervals per chromosome with binary-search lookup
 */
export class IntervalIndex {
  private readonly starts = new Map<string, number[]>();
  private readonly ends = new Map<string, number[]>();

  constructor(intervals: Iterable<Interval>) {
    const byChromosome = new Map<string, Interval[]>();
    for (const interval of intervals) {
      const list = byChromosome.get(interval.chromosome) ?? [];
      list.push(interval);
      byChromosome.set(interval.chromosome, list);
    }

    for (const [chromosome, list] of byChromosome) {
      list.sort((a, b) => a.start - b.start);
      const starts: number[] = [];
      const ends: number[] = [];
      for (const interval of list) {
        const last = ends.length - 1;
        const lastEnd = ends[last];
        // adjacent intervals (end + 1 === start) merge as well
        if (lastEnd !== undefined && interval.start <= lastEnd + 1) {
          ends[last] = Math.max(lastEnd, interval.end);
        } else {
          starts.push(interval.start);
          ends.push(interval.end);
        }
      }
      this.starts.set(chromosome, starts);
      this.ends.set(chromosome, ends);
    }
  }

  /** Chromosomes with at least one interval */
  chromosomes(): string[] {
    return [...this.starts.keys()];
  }

  /** Number of merged intervals on `chromosome` */
  size(chromosome: string): number {
    return this.starts.get(chromosome)?.length ?? 0;
  }

  contains(chromosome: string, position: number): boolean {
    const starts = this.starts.get(chromosome);
    const ends = this.ends.get(chromosome);
    if (starts === undefined || ends === undefined) {
      return false;
    }

    // last interval whose start <= position
    let low = 0;
    let high = starts.length - 1;
    let found = -1;
    while (low <= high) {
      const mid = (low + high) >>> 1;
      if ((starts[mid] ?? Infinity) <= position) {
        found = mid;
        low = mid + 1;
      } else {
        high = mid - 1;
      }
    }
    return found !== -1 && position <= (ends[found] ?? -Infinity);
  }
}

/**
 * Keep records whose position lies inside any interval
 *
 * @example
 * ```typescript
 * const region = filterRegions(source, [parseRegion("chr1:1000-2000")]);
 * ```
 */
export function filterRegions(
  source: VcfSource,
  intervals: Iterable<Interval>,
  options: RegionFilterOptions = {}
): VcfSource {
  const index = new IntervalIndex(intervals);
  return {
    header: source.header,
    records: keepMatching(
      source,
      index.chromosomes(),
      (record) => index.contains(record.chrom, record.pos),
      "interval",
      options
    ),
  };
}

/**
 * Keep records at exactly the listed positions (vcftools `--positions`)
 */
export function filterSites(source: VcfSource, sites: Iterable<Site>, options: RegionFilterOptions = {}): VcfSource {
  const positions = new Map<string, Set<number>>();
  for (const site of sites) {
    const set = positions.get(site.chromosome) ?? new Set<number>();
    set.add(site.position);
    positions.set(site.chromosome, set);
  }

  return {
    header: source.header,
    records: keepMatching(
      source,
      [...positions.keys()],
      (record) => positions.get(record.chrom)?.has(record.pos) === true,
      "site",
      options
    ),
  };
}

async function* keepMatching(
  source: VcfSource,
  chromosomes: readonly string[],
  matches: (record: VcfRecord) => boolean,
  entryKind: "interval" | "site",
  options: RegionFilterOptions
): AsyncGenerator<VcfRecord, void, undefined> {
  const onWarning = resolveWarning(options);
  const contigs = getContigIds(source.header);

  if (contigs.length > 0) {
    const declared = new Set(contigs);
    for (const chromosome of chromosomes) {
      if (!declared.has(chromosome)) {
        onWarning(new ChromMismatchError(chromosome, entryKind, contigs).message);
      }
    }
  }

  const seen = new Set<string>();
  for await (const record of source.records) {
    seen.add(record.chrom);
    if (matches(record)) {
      yield record;
    }
  }

  if (contigs.length === 0) {
    const observed = [...seen];
    for (const chromosome of chromosomes) {
      if (!seen.has(chromosome)) {
        onWarning(new ChromMismatchError(chromosome, entryKind, observed).message);
      }
    }
  }
}
