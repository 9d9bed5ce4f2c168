/**
 * Compression module: format detection, gzip decoding and BGZF encoding
 *
 * @example Streaming decompression
 * ```typescript
 * import { CompressionDetector, GzipDecompressor } from "./compression";
 *
 * if (CompressionDetector.fromExtension("calls.vcf.gz") !== "none") {
 *   const text = GzipDecompressor.wrapStream(compressedStream);
 * }
 * ```
 */

export { CompressionDetector, type CompressionDetection } from "./detector";
export {
  GzipDecompressor,
  compress as compressGzip,
  decompress as decompressGzip,
  createCompressionStream as createGzipCompressionStream,
  toDeflateLevel,
  type DeflateLevel,
  type GzipCompressOptions,
} from "./gzip";
export {
  BgzfCompressor,
  BGZF_MAX_BLOCK_SIZE,
  compressBgzf,
  crc32,
  type BgzfCompressorOptions,
} from "./bgzf";
export { CompressionService, type CompressionServiceShape } from "./service";

export type { CompressionFormat, DecompressorOptions } from "../types";
export { CompressionFormatSchema } from "../types";
export { CompressionError } from "../errors";
