/**
 * Gzip compression and decompression
 *
 * Decompression goes through Node's zlib inflater, which continues across
 * concatenated gzip members. BGZF files are a chain of small gzip members, so
 * the same stream reads both `.vcf.gz` flavours. Compression uses fflate.
 */

import { once } from "node:events";
import { finished } from "node:stream/promises";
import { createGunzip, gunzip } from "node:zlib";
import { Gzip, gzipSync } from "fflate";
import { CompressionError } from "../errors";
import type { DecompressorOptions } from "../types";

const DEFAULT_GZIP_OPTIONS = {
  bufferSize: 65536,
  onProgress: (_bytesProcessed: number): void => {},
} as const;

/** Deflate levels fflate accepts */
export type DeflateLevel = 0 | 1 | 2 | 3 | 4 | 5 | 6 | 7 | 8 | 9;

const DEFLATE_LEVELS: readonly DeflateLevel[] = [0, 1, 2, 3, 4, 5, 6, 7, 8, 9];

/**
 * Options for gzip compression
 */
export interface GzipCompressOptions {
  /** Deflate level 0-9 (default 6) */
  level?: number;
}

/**
 * Narrow a numeric level to one fflate accepts
 *
 * @throws {CompressionError} When the level is not an integer in 0-9
 */
export function toDeflateLevel(level: number): DeflateLevel {
  const match = DEFLATE_LEVELS.find((candidate) => candidate === level);
  if (match === undefined) {
    throw new CompressionError(
      `Compression level must be an integer between 0 and 9, got ${level}`,
      "gzip",
      "validate"
    );
  }
  return match;
}

function gunzipBuffer(compressed: Uint8Array): Promise<Uint8Array> {
  return new Promise((resolve, reject) => {
    gunzip(compressed, (error, result) => {
      if (error !== null) {
        reject(error);
        return;
      }
      resolve(new Uint8Array(result.buffer, result.byteOffset, result.byteLength));
    });
  });
}

/**
 * Decompress a complete gzip (or BGZF) buffer
 *
 * @throws {CompressionError} If the data is not gzip or is truncated
 *
 * @example
 * ```typescript
 * const text = new TextDecoder().decode(await decompress(bytes));
 * ```
 */
export async function decompress(compressed: Uint8Array): Promise<Uint8Array> {
  if (compressed.length < 18) {
    throw new CompressionError(
      `Data too short to be gzip (${compressed.length} bytes)`,
      "gzip",
      "validate",
      compressed.length
    );
  }
  if (compressed[0] !== 0x1f || compressed[1] !== 0x8b) {
    throw new CompressionError(
      "Invalid gzip magic bytes",
      "gzip",
      "validate",
      0,
      "File may be corrupted or not actually gzip compressed"
    );
  }

  try {
    return await gunzipBuffer(compressed);
  } catch (error) {
    throw CompressionError.fromSystemError("gzip", "decompress", error, compressed.length);
  }
}

/**
 * Create a gzip decompression transform stream
 *
 * Output chunks are forwarded as the inflater produces them; `flush` waits
 * for the inflater to drain before the readable side closes.
 */
export function createStream(
  options: DecompressorOptions = {}
): TransformStream<Uint8Array, Uint8Array> {
  const bufferSize = options.bufferSize ?? DEFAULT_GZIP_OPTIONS.bufferSize;
  const onProgress = options.onProgress ?? DEFAULT_GZIP_OPTIONS.onProgress;
  const inflater = createGunzip({ chunkSize: Math.max(bufferSize, 1024) });
  let bytesProcessed = 0;
  let failure: CompressionError | undefined;

  return new TransformStream<Uint8Array, Uint8Array>({
    start(controller) {
      inflater.on("data", (chunk: Buffer) => {
        controller.enqueue(new Uint8Array(chunk.buffer, chunk.byteOffset, chunk.byteLength));
      });
      inflater.on("error", (error: unknown) => {
        failure = CompressionError.fromSystemError("gzip", "stream", error, bytesProcessed);
        controller.error(failure);
      });
    },

    async transform(chunk) {
      if (failure !== undefined) throw failure;
      if (options.signal?.aborted === true) {
        inflater.destroy();
        throw new CompressionError("Decompression aborted", "gzip", "stream", bytesProcessed);
      }

      bytesProcessed += chunk.length;
      onProgress(bytesProcessed);
      if (!inflater.write(chunk)) {
        await once(inflater, "drain");
      }
    },

    async flush() {
      if (failure !== undefined) throw failure;
      inflater.end();
      try {
        await finished(inflater);
      } catch (error) {
        throw failure ?? CompressionError.fromSystemError("gzip", "stream", error, bytesProcessed);
      }
    },
  });
}

/**
 * Pipe a compressed byte stream through gzip decompression
 */
export function wrapStream(
  input: ReadableStream<Uint8Array>,
  options: DecompressorOptions = {}
): ReadableStream<Uint8Array> {
  return input.pipeThrough(createStream(options));
}

/**
 * Compress a buffer into a single gzip member
 */
export async function compress(
  data: Uint8Array,
  options: GzipCompressOptions = {}
): Promise<Uint8Array> {
  const level = toDeflateLevel(options.level ?? 6);
  try {
    return gzipSync(data, { level });
  } catch (error) {
    throw CompressionError.fromSystemError("gzip", "compress", error, data.length);
  }
}

/**
 * Create a streaming gzip compressor producing one gzip member
 */
export function createCompressionStream(
  options: GzipCompressOptions = {}
): TransformStream<Uint8Array, Uint8Array> {
  const level = toDeflateLevel(options.level ?? 6);
  let deflater: Gzip | undefined;

  return new TransformStream<Uint8Array, Uint8Array>({
    start(controller) {
      deflater = new Gzip({ level }, (chunk) => {
        controller.enqueue(chunk);
      });
    },
    transform(chunk) {
      deflater?.push(chunk, false);
    },
    flush() {
      deflater?.push(new Uint8Array(0), true);
    },
  });
}

/**
 * Namespace export of the gzip codec
 */
export const GzipDecompressor = {
  decompress,
  createStream,
  wrapStream,
} as const;
