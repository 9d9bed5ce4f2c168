/**
 * VcfOps - pipeline-style VCF operations
 *
 * Each chain step returns a new VcfOps around a lazily evaluated source;
 * records are only read when a terminal operation (collect, count, stats,
 * write, split, ...) runs. A pipeline can be consumed once.
 */

import type { VcfHeader, VcfParserOptions, VcfRecord, VcfSource } from "../formats/vcf/types";
import { openVcf, parseVcfString } from "../formats/vcf/parser";
import { formatVcf, type WriteSummary, writeVcf } from "../formats/vcf/writer";
import { parseRegion } from "../formats/lists";
import type { Interval, Site, WarningOptions, WriteOptions } from "../types";
import { renameChromosomes } from "./chromosomes";
import { type ChromosomeGroup, partitionByChromosome, splitByChromosome } from "./partition";
import { type CompiledTemplate, projectFields } from "./project";
import { filterQuality } from "./quality";
import { filterRegions, filterSites } from "./region";
import { keepSamples, removeSamples, renameSamples } from "./samples";
import { type VcfStats, VcfStatsCalculator } from "./stats";
import type {
  ProjectionOptions,
  QualityFilterOptions,
  RegionFilterOptions,
  SplitOptions,
  SplitSummary,
  VcfTransform,
} from "./types";

/**
 * Fluent interface over a {@link VcfSource}
 *
 * @example
 * ```typescript
 * await (await VcfOps.open("cohort.vcf.gz"))
 *   .keepSamples(["S1", "S2"])
 *   .regions(["chr1:1-5000000"])
 *   .quality({ minMaf: 0.05, maxMissingRate: 0.1 })
 *   .write("subset.vcf.gz");
 * ```
 */
export class VcfOps {
  constructor(private readonly source: VcfSource) {}

  // =============================================================================
  // STATIC FACTORY METHODS
  // =============================================================================

  /**
   * Open a plain, gzip or BGZF VCF file
   */
  static async open(path: string, options: VcfParserOptions = {}): Promise<VcfOps> {
    return new VcfOps(await openVcf(path, options));
  }

  static async fromString(text: string, options: VcfParserOptions = {}): Promise<VcfOps> {
    return new VcfOps(await parseVcfString(text, options));
  }

  get header(): VcfHeader {
    return this.source.header;
  }

  /** The underlying header and record stream */
  toSource(): VcfSource {
    return this.source;
  }

  // =============================================================================
  // CHAIN STEPS
  // =============================================================================

  /** Apply any source-to-source transform */
  pipe(transform: VcfTransform): VcfOps {
    return new VcfOps(transform(this.source));
  }

  keepSamples(names: Iterable<string>): VcfOps {
    return new VcfOps(keepSamples(this.source, names));
  }

  removeSamples(names: Iterable<string>): VcfOps {
    return new VcfOps(removeSamples(this.source, names));
  }

  renameSamples(
    mapping: ReadonlyMap<string, string> | Readonly<Record<string, string>>,
    options: WarningOptions = {}
  ): VcfOps {
    return new VcfOps(renameSamples(this.source, mapping, options));
  }

  renameChromosomes(
    mapping: ReadonlyMap<string, string> | Readonly<Record<string, string>>,
    options: WarningOptions = {}
  ): VcfOps {
    return new VcfOps(renameChromosomes(this.source, mapping, options));
  }

  /**
   * Keep records inside any of the regions
   *
   * Strings are parsed as `chr`, `chr:pos` or `chr:start-end`.
   */
  regions(regions: Iterable<Interval | string>, options: RegionFilterOptions = {}): VcfOps {
    const intervals = [...regions].map((region) => (typeof region === "string" ? parseRegion(region) : region));
    return new VcfOps(filterRegions(this.source, intervals, options));
  }

  sites(sites: Iterable<Site>, options: RegionFilterOptions = {}): VcfOps {
    return new VcfOps(filterSites(this.source, sites, options));
  }

  quality(options: QualityFilterOptions): VcfOps {
    return new VcfOps(filterQuality(this.source, options));
  }

  filter(predicate: (record: VcfRecord) => boolean | Promise<boolean>): VcfOps {
    async function* filtered(records: AsyncIterable<VcfRecord>): AsyncGenerator<VcfRecord, void, undefined> {
      for await (const record of records) {
        if (await predicate(record)) yield record;
      }
    }
    return new VcfOps({ header: this.source.header, records: filtered(this.source.records) });
  }

  /**
   * Rewrite each record; the header is kept as is
   */
  map(fn: (record: VcfRecord) => VcfRecord | Promise<VcfRecord>): VcfOps {
    async function* mapped(records: AsyncIterable<VcfRecord>): AsyncGenerator<VcfRecord, void, undefined> {
      for await (const record of records) {
        yield await fn(record);
      }
    }
    return new VcfOps({ header: this.source.header, records: mapped(this.source.records) });
  }

  /**
   * First `n` records
   *
   * @example
   * ```typescript
   * vcfops(source).head(1000)
   * ```
   */
  head(n: number): VcfOps {
    async function* take(records: AsyncIterable<VcfRecord>): AsyncGenerator<VcfRecord, void, undefined> {
      if (n <= 0) return;
      let count = 0;
      for await (const record of records) {
        yield record;
        count++;
        if (count >= n) break;
      }
    }
    return new VcfOps({ header: this.source.header, records: take(this.source.records) });
  }

  // =============================================================================
  // TERMINAL OPERATIONS
  // =============================================================================

  async collect(): Promise<VcfRecord[]> {
    const results: VcfRecord[] = [];
    for await (const record of this.source.records) {
      results.push(record);
    }
    return results;
  }

  async count(): Promise<number> {
    let count = 0;
    for await (const _record of this.source.records) {
      count++;
    }
    return count;
  }

  async stats(): Promise<VcfStats> {
    return new VcfStatsCalculator().calculate(this.source);
  }

  /** Render each record through a query template */
  project(template: string | CompiledTemplate, options: ProjectionOptions = {}): AsyncIterable<string> {
    return projectFields(this.source, template, options);
  }

  /** VCF text chunks: the header, then one line per record */
  text(): AsyncIterable<string> {
    return formatVcf(this.source);
  }

  async write(path: string, options: WriteOptions = {}): Promise<WriteSummary> {
    return writeVcf(this.source, path, options);
  }

  partition(): AsyncIterable<ChromosomeGroup> {
    return partitionByChromosome(this.source.records);
  }

  async split(options: SplitOptions): Promise<SplitSummary> {
    return splitByChromosome(this.source, options);
  }
}

/**
 * Start a pipeline from an opened source
 *
 * @example
 * ```typescript
 * const n = await vcfops(await openVcf("in.vcf")).quality({ minMaf: 0.01 }).count();
 * ```
 */
export function vcfops(source: VcfSource): VcfOps {
  return new VcfOps(source);
}

export { renameChromosomes } from "./chromosomes";
export { concatVcf, createChromosomeComparator, mergeVcf, naturalCompare } from "./merge";
export {
  type ChromosomeGroup,
  groupRuns,
  partitionByChromosome,
  type Run,
  splitByChromosome,
} from "./partition";
export { type CompiledTemplate, compileTemplate, FieldProjector, projectFields, type TemplatePart } from "./project";
export { computeSiteMetrics, filterQuality, type SiteMetrics } from "./quality";
export { filterRegions, filterSites, IntervalIndex } from "./region";
export { keepSamples, removeSamples, renameSamples, selectSamples } from "./samples";
export {
  type ChromosomeCount,
  classifyAllele,
  formatStats,
  listSamples,
  type VariantType,
  type VcfStats,
  VcfStatsCalculator,
} from "./stats";
export {
  type ConcatOptions,
  MERGE_MODES,
  type MergeMode,
  type MergeOptions,
  type ProjectionOptions,
  type QualityFilterOptions,
  type RegionFilterOptions,
  resolveWarning,
  type SplitFile,
  type SplitOptions,
  type SplitSummary,
  type VcfTransform,
} from "./types";
