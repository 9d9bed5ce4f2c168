/**
 * Effect-based compression service
 *
 * The file reader and writer resolve their codecs through this tag so tests
 * can swap in a different implementation without touching the I/O code.
 *
 * @example
 * ```typescript
 * import { Effect } from "effect";
 * import { CompressionService } from "./compression";
 *
 * const program = Effect.gen(function* () {
 *   const compressor = yield* CompressionService;
 *   return yield* compressor.compress(data, "bgzf", 6);
 * });
 *
 * await Effect.runPromise(program.pipe(Effect.provide(CompressionService.Live)));
 * ```
 *
 * @module compression/service
 */

import { Context, Effect, Layer } from "effect";
import { CompressionError } from "../errors";
import type { CompressionFormat } from "../types";
import { BgzfCompressor, compressBgzf } from "./bgzf";
import {
  compress as compressGzip,
  createCompressionStream as createGzipCompressionStream,
  createStream as createGzipDecompressionStream,
  decompress as decompressGzip,
} from "./gzip";

// =============================================================================
// SERVICE SHAPE
// =============================================================================

export interface CompressionServiceShape {
  /**
   * Compress a complete buffer
   *
   * @param level - Deflate level 0-9
   */
  readonly compress: (
    data: Uint8Array,
    format: CompressionFormat,
    level?: number
  ) => Effect.Effect<Uint8Array, CompressionError>;

  /**
   * Decompress a complete buffer; gzip and BGZF share one decoder
   */
  readonly decompress: (
    data: Uint8Array,
    format: CompressionFormat
  ) => Effect.Effect<Uint8Array, CompressionError>;

  readonly createCompressionStream: (
    format: CompressionFormat,
    level?: number
  ) => TransformStream<Uint8Array, Uint8Array>;

  readonly createDecompressionStream: (
    format: CompressionFormat
  ) => TransformStream<Uint8Array, Uint8Array>;
}

// =============================================================================
// SERVICE TAG
// =============================================================================

export class CompressionService extends Context.Tag("vcfops/CompressionService")<
  CompressionService,
  CompressionServiceShape
>() {
  /**
   * gzip, BGZF and passthrough codecs
   */
  static readonly Live: Layer.Layer<CompressionService> = Layer.succeed(
    CompressionService,
    createLiveService()
  );
}

// =============================================================================
// SERVICE IMPLEMENTATION
// =============================================================================

function toCompressionError(
  format: CompressionFormat,
  operation: CompressionError["operation"],
  error: unknown
): CompressionError {
  return error instanceof CompressionError
    ? error
    : CompressionError.fromSystemError(format, operation, error);
}

function createLiveService(): CompressionServiceShape {
  return {
    compress: (data, format, level) => {
      switch (format) {
        case "gzip":
          return Effect.tryPromise({
            try: () => compressGzip(data, { level: level ?? 6 }),
            catch: (error) => toCompressionError("gzip", "compress", error),
          });
        case "bgzf":
          return Effect.try({
            try: () => compressBgzf(data, { compressionLevel: level ?? 6 }),
            catch: (error) => toCompressionError("bgzf", "compress", error),
          });
        case "none":
          return Effect.succeed(data);
      }
    },

    decompress: (data, format) => {
      if (format === "none") {
        return Effect.succeed(data);
      }
      return Effect.tryPromise({
        try: () => decompressGzip(data),
        catch: (error) => toCompressionError(format, "decompress", error),
      });
    },

    createCompressionStream: (format, level) => {
      switch (format) {
        case "gzip":
          return createGzipCompressionStream({ level: level ?? 6 });
        case "bgzf":
          return new BgzfCompressor({ compressionLevel: level ?? 6 }).createStream();
        case "none":
          return createPassthroughStream();
      }
    },

    createDecompressionStream: (format) =>
      format === "none" ? createPassthroughStream() : createGzipDecompressionStream(),
  };
}

/**
 * Create a passthrough stream that forwards data unchanged
 */
function createPassthroughStream(): TransformStream<Uint8Array, Uint8Array> {
  return new TransformStream<Uint8Array, Uint8Array>({
    transform(chunk, controller) {
      controller.enqueue(chunk);
    },
  });
}
