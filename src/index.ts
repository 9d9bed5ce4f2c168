/**
 * vcfops - streaming VCF record and sample projection
 *
 * Open a VCF, narrow it to the samples, regions and sites you need, filter
 * on missingness and allele frequency, then write it back out, split it per
 * chromosome, merge it with others or print selected fields.
 *
 * @example
 * ```typescript
 * import { VcfOps } from "vcfops";
 *
 * const summary = await (await VcfOps.open("cohort.vcf.gz"))
 *   .removeSamples(["control_01"])
 *   .quality({ maxMissingRate: 0.1, minMaf: 0.05 })
 *   .write("filtered.vcf.gz");
 * ```
 */

// Compression
export {
  BGZF_MAX_BLOCK_SIZE,
  BgzfCompressor,
  type BgzfCompressorOptions,
  CompressionDetector,
  CompressionService,
  type CompressionServiceShape,
  compressBgzf,
  GzipDecompressor,
} from "./compression";
// Errors
export {
  ChromMismatchError,
  CompressionError,
  DuplicateSampleError,
  FileError,
  MergeError,
  OverlapError,
  ParseError,
  SampleMismatchError,
  StreamError,
  UnknownSampleError,
  ValidationError,
  VcfFormatError,
  VcfOpsError,
} from "./errors";
// Formats
export * from "./formats";
// File I/O
export { FileReader, readToString } from "./io/file-reader";
export { writeStream, writeString } from "./io/file-writer";
export { readLines, splitLines } from "./io/stream-utils";
// Operations
export * from "./operations";
// Core types
export type {
  CompressionFormat,
  FileReaderOptions,
  Interval,
  ParserOptions,
  Site,
  WarningOptions,
  WriteOptions,
} from "./types";
export { IntervalSchema, SiteSchema } from "./types";

export const VERSION = "0.1.0";
