/**
 * Core type definitions shared by the I/O, compression and operation layers
 *
 * VCF record and header types live in `formats/vcf/types.ts`; this module holds
 * the coordinate types, option shapes and their arktype schemas.
 */

import { type } from "arktype";

/**
 * Genomic interval, 1-based with both ends inclusive
 *
 * List files in BED layout are converted on read: a BED line `chr1 99 200`
 * becomes `{ chromosome: "chr1", start: 100, end: 200 }`.
 */
export interface Interval {
  /** Chromosome name, matched exactly against record CHROM values */
  readonly chromosome: string;
  /** First position covered (1-based, inclusive) */
  readonly start: number;
  /** Last position covered (1-based, inclusive) */
  readonly end: number;
}

/**
 * A single variant site (vcftools `--positions` style)
 */
export interface Site {
  readonly chromosome: string;
  /** 1-based position */
  readonly position: number;
}

/**
 * Parser configuration options
 */
export interface ParserOptions {
  /** Skip header cross-checks of INFO/FORMAT declarations */
  skipValidation?: boolean;
  /** Maximum line length before throwing error */
  maxLineLength?: number;
  /** AbortController signal for cancelling parsing operations */
  signal?: AbortSignal;
  /** Custom error handler */
  onError?: (error: string, lineNumber?: number) => void;
  /** Custom warning handler */
  onWarning?: (warning: string, lineNumber?: number) => void;
}

/**
 * Warning sink accepted by operations that report non-fatal conditions
 */
export interface WarningOptions {
  onWarning?: (warning: string, lineNumber?: number) => void;
}

/**
 * Compression formats understood by the reader and writer
 *
 * `bgzf` is blocked gzip (bgzip / htslib); any gzip reader can decode it.
 */
export type CompressionFormat = "gzip" | "bgzf" | "none";

/**
 * Options for streaming decompression
 */
export interface DecompressorOptions {
  /** Chunk size handed to the inflater */
  bufferSize?: number;
  /** Abort decompression mid-stream */
  signal?: AbortSignal;
  /** Called with the number of compressed bytes consumed so far */
  onProgress?: (bytesProcessed: number) => void;
}

/**
 * Options for opening a file for streaming reads
 */
export interface FileReaderOptions {
  /** Read chunk size in bytes */
  bufferSize?: number;
  /** Text encoding for line decoding */
  encoding?: "utf8" | "latin1";
  /** Refuse files larger than this many bytes */
  maxFileSize?: number;
  /** Decompress gzip/BGZF input transparently */
  autoDecompress?: boolean;
  /** Force a compression format instead of detecting it */
  compressionFormat?: CompressionFormat;
}

/**
 * Options for writing files
 */
export interface WriteOptions {
  /** Compress according to the file extension (default true) */
  autoCompress?: boolean;
  /** Force a compression format instead of detecting it */
  compressionFormat?: CompressionFormat;
  /** Deflate level 0-9 */
  compressionLevel?: number;
  /** Uncompressed bytes gathered before a block is flushed */
  blockSize?: number;
}

/**
 * Result of splitting a text buffer into complete lines
 */
export interface LineProcessingResult {
  readonly lines: string[];
  readonly remainder: string;
}

/**
 * File metadata used when validating input paths
 */
export interface FileMetadata {
  readonly path: string;
  readonly size: number;
  readonly lastModified: Date;
  readonly extension: string;
}

/**
 * Outcome of pre-open file validation
 */
export interface FileValidationResult {
  readonly isValid: boolean;
  readonly metadata?: FileMetadata;
  readonly error?: string;
}

// =============================================================================
// SCHEMAS
// =============================================================================

export const CompressionFormatSchema = type("'gzip' | 'bgzf' | 'none'");

export const FilePathSchema = type("string>0").narrow((path, ctx) => {
  if (path.includes("\0")) {
    return ctx.reject({ expected: "a path without NUL bytes", actual: JSON.stringify(path) });
  }
  return true;
});

export const IntervalSchema = type({
  chromosome: "string>0",
  start: "number>=1",
  end: "number>=1",
}).narrow((interval, ctx) => {
  if (!Number.isInteger(interval.start) || !Number.isInteger(interval.end)) {
    return ctx.reject({ expected: "integer coordinates", path: ["start"] });
  }
  if (interval.end < interval.start) {
    return ctx.reject({
      expected: "end >= start",
      actual: `start=${interval.start}, end=${interval.end}`,
      path: ["end"],
    });
  }
  return true;
});

export const SiteSchema = type({
  chromosome: "string>0",
  position: "number>=1",
});

export const FileReaderOptionsSchema = type({
  "bufferSize?": "number>0",
  "encoding?": "'utf8' | 'latin1'",
  "maxFileSize?": "number>0",
  "autoDecompress?": "boolean",
  "compressionFormat?": CompressionFormatSchema,
});

export const WriteOptionsSchema = type({
  "autoCompress?": "boolean",
  "compressionFormat?": CompressionFormatSchema,
  "compressionLevel?": "0<=number<=9",
  "blockSize?": "1024<=number<=65280",
});
