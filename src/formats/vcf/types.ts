/**
 * VCF record and header types
 *
 * Records are immutable: every transform produces new record objects and
 * leaves its input untouched.
 */

import type { FileReaderOptions, ParserOptions } from "../../types";

/**
 * INFO value: a single value, a comma-separated list, or `true` for a flag
 */
export type InfoValue = string | readonly string[] | true;

/**
 * Per-sample fields keyed by FORMAT key, in FORMAT order
 *
 * Trailing fields the VCF line omitted are absent from the map.
 */
export type SampleData = ReadonlyMap<string, string>;

/**
 * A single VCF data line
 */
export interface VcfRecord {
  readonly chrom: string;
  /** 1-based position */
  readonly pos: number;
  /** `.` when the line carries no ID */
  readonly id: string;
  readonly ref: string;
  /** Empty when ALT is `.` */
  readonly alt: readonly string[];
  /** Absent when QUAL is `.` */
  readonly qual?: number;
  /** Empty when FILTER is `.` */
  readonly filter: readonly string[];
  readonly info: ReadonlyMap<string, InfoValue>;
  readonly format: readonly string[];
  /** One entry per header sample, in header order */
  readonly samples: readonly SampleData[];
  /** Line number in the source, when parsed from text */
  readonly lineNumber?: number;
}

/**
 * A `##key=value` meta-information line
 *
 * Structured values (`<ID=...,Description="...">`) also carry their parsed
 * fields with quotes removed.
 */
export interface VcfMetaLine {
  readonly key: string;
  /** Raw value text after the first `=` */
  readonly value: string;
  readonly fields?: ReadonlyMap<string, string>;
}

/**
 * VCF header: file format, meta lines and sample columns
 */
export interface VcfHeader {
  /** e.g. `VCFv4.2` */
  readonly fileformat: string;
  /** Meta lines in file order, `##fileformat` excluded */
  readonly meta: readonly VcfMetaLine[];
  /** Sample column names, unique, in column order */
  readonly samples: readonly string[];
}

/**
 * A header plus a lazily produced record stream
 *
 * `records` can be iterated once.
 */
export interface VcfSource {
  readonly header: VcfHeader;
  readonly records: AsyncIterable<VcfRecord>;
}

/**
 * `##contig` declaration
 */
export interface ContigDefinition {
  readonly id: string;
  readonly length?: number;
}

/**
 * `##INFO` or `##FORMAT` declaration
 */
export interface FieldDefinition {
  readonly id: string;
  /** `Number` attribute: an integer, `A`, `R`, `G` or `.` */
  readonly number: string;
  readonly type: string;
  readonly description: string;
}

/**
 * Parsed GT field
 */
export interface Genotype {
  /** Allele indices; `null` for a `.` allele */
  readonly alleles: readonly (number | null)[];
  /** Separator before each allele after the first (`/` or `|`) */
  readonly separators: readonly ("/" | "|")[];
}

/**
 * VCF parser options
 *
 * When `onError` is supplied, malformed data lines are reported to it and
 * skipped; otherwise they abort the stream with a `VcfFormatError`. Header
 * errors always abort.
 */
export interface VcfParserOptions extends ParserOptions {
  /** Reader options used by `parseFile` */
  readonly fileOptions?: FileReaderOptions;
}
