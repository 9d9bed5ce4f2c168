/**
 * Shared option types for the VCF operations
 *
 * Each interface holds the options for a single-purpose operation. Options
 * with numeric ranges have an arktype schema next to them.
 */

import { type } from "arktype";
import type { VcfSource } from "../formats/vcf/types";
import type { Interval, WarningOptions, WriteOptions } from "../types";

/**
 * A transform from one VCF source to another
 *
 * Header and records are rebuilt together so they always agree.
 */
export type VcfTransform = (source: VcfSource) => VcfSource;

/**
 * Warning sink used when the caller gives none
 */
export function resolveWarning(options: WarningOptions = {}): (warning: string, lineNumber?: number) => void {
  return (
    options.onWarning ??
    ((warning: string, lineNumber?: number): void => {
      const where = lineNumber !== undefined ? ` (line ${lineNumber})` : "";
      console.warn(`VCF Warning${where}: ${warning}`);
    })
  );
}

// =============================================================================
// QUALITY
// =============================================================================

/**
 * Missingness and allele-frequency thresholds
 *
 * A record must pass every threshold to be kept.
 */
export interface QualityFilterOptions {
  /** Largest tolerated fraction of samples with a missing genotype (default 1) */
  readonly maxMissingRate?: number;
  /** Smallest minor allele frequency kept (default 0) */
  readonly minMaf?: number;
  /** Smallest minor allele count kept (default 0) */
  readonly minMac?: number;
}

export const QualityFilterOptionsSchema = type({
  "maxMissingRate?": "0<=number<=1",
  "minMaf?": "0<=number<=1",
  "minMac?": "number>=0",
});

// =============================================================================
// REGIONS
// =============================================================================

export type RegionFilterOptions = WarningOptions;

// =============================================================================
// PARTITION / SPLIT
// =============================================================================

/**
 * Options for writing one file per chromosome
 */
export interface SplitOptions {
  /** Directory the files are written to (created when missing) */
  readonly outputDir: string;
  /** Text placed before the chromosome name in file names */
  readonly prefix?: string;
  /** File extension including the dot (default `.vcf`; `.vcf.gz` writes BGZF) */
  readonly extension?: string;
  /** Start a new numbered file after this many records */
  readonly maxRecords?: number;
  /** Compression options for every file */
  readonly writeOptions?: WriteOptions;
}

export const SplitOptionsSchema = type({
  outputDir: "string>0",
  "prefix?": "string",
  "extension?": "string",
  "maxRecords?": "number>=1",
});

/**
 * One file written by a split
 */
export interface SplitFile {
  readonly path: string;
  readonly chromosome: string;
  /** 1-based chunk number when `maxRecords` is set */
  readonly part?: number;
  readonly records: number;
}

export interface SplitSummary {
  readonly files: readonly SplitFile[];
  readonly totalRecords: number;
}

// =============================================================================
// MERGE / CONCAT
// =============================================================================

/**
 * `same-samples-disjoint-sites`: inputs share one sample list and never share
 * a site. `different-samples-union-sites`: sample lists are combined and
 * records at the same site are merged into one.
 */
export type MergeMode = "same-samples-disjoint-sites" | "different-samples-union-sites";

export const MERGE_MODES: readonly MergeMode[] = [
  "same-samples-disjoint-sites",
  "different-samples-union-sites",
];

export interface MergeOptions {
  /** Default `same-samples-disjoint-sites` */
  readonly mode?: MergeMode;
}

export const MergeOptionsSchema = type({
  "mode?": "'same-samples-disjoint-sites' | 'different-samples-union-sites'",
});

export interface ConcatOptions extends WarningOptions {
  /** Keep only records inside these intervals */
  readonly intervals?: readonly Interval[];
}

// =============================================================================
// PROJECTION
// =============================================================================

export interface ProjectionOptions {
  /** Text printed for absent values (default `.`) */
  readonly missing?: string;
  /** Text placed between repetitions of a `[...]` sample block (default empty) */
  readonly sampleSeparator?: string;
}
