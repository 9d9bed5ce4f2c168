/**
 * File writing operations using Effect Platform
 *
 * Text is gathered into blocks, compressed through the injected
 * {@link CompressionService} and streamed into a scoped file sink, so the
 * handle is closed on success, failure and interruption alike.
 *
 * Files named `.gz`, `.gzip`, `.bgz` or `.bgzf` are written as BGZF, which
 * every gzip reader accepts and which tabix can index.
 *
 * @module file-writer
 */

import { FileSystem, Path } from "@effect/platform";
import { type } from "arktype";
import { Effect, Stream } from "effect";
import { CompressionDetector } from "../compression/detector";
import { CompressionService } from "../compression/service";
import { FileError, StreamError, ValidationError, VcfOpsError } from "../errors";
import type { CompressionFormat, WriteOptions } from "../types";
import { WriteOptionsSchema } from "../types";
import { runIo } from "./runtime";

const DEFAULT_BLOCK_SIZE = 65280;

/**
 * Compression applied when writing to `path`
 */
export function resolveOutputCompression(path: string, options: WriteOptions = {}): CompressionFormat {
  if (options.autoCompress === false) {
    return "none";
  }
  if (options.compressionFormat !== undefined) {
    return options.compressionFormat;
  }
  return CompressionDetector.fromExtension(path) === "none" ? "none" : "bgzf";
}

/**
 * Write a string to a file (overwrites), compressing by extension
 *
 * @throws {FileError} When the destination cannot be written
 *
 * @example
 * ```typescript
 * await writeString("regions.txt", "chr1\t100\t200\n");
 * await writeString("calls.vcf.gz", vcfText); // BGZF
 * ```
 */
export async function writeString(path: string, content: string, options: WriteOptions = {}): Promise<void> {
  const validated = validateOptions(options);
  const format = resolveOutputCompression(path, validated);

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const compression = yield* CompressionService;
    const data = yield* compression.compress(
      new TextEncoder().encode(content),
      format,
      validated.compressionLevel ?? 6
    );
    yield* ensureParentDirectory(path);
    yield* fs
      .writeFile(path, data)
      .pipe(Effect.mapError((error) => FileError.fromSystemError("write", path, error)));
  });

  await runIo(program);
}

/**
 * Stream text chunks into a file, compressing by extension
 *
 * Chunks are concatenated into blocks of `blockSize` characters before
 * encoding. An error raised by `chunks` aborts the write and propagates
 * unchanged.
 *
 * @throws {FileError} When the destination cannot be written
 */
export async function writeStream(
  path: string,
  chunks: AsyncIterable<string>,
  options: WriteOptions = {}
): Promise<void> {
  const validated = validateOptions(options);
  const format = resolveOutputCompression(path, validated);
  const blockSize = validated.blockSize ?? DEFAULT_BLOCK_SIZE;

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const compression = yield* CompressionService;

    const bytes = Stream.fromAsyncIterable(batchText(chunks, blockSize), toLibraryError).pipe(
      Stream.encodeText
    );
    const encoded =
      format === "none"
        ? bytes
        : Stream.fromReadableStream(
            () =>
              Stream.toReadableStream(bytes).pipeThrough(
                compression.createCompressionStream(format, validated.compressionLevel ?? 6)
              ),
            toLibraryError
          );

    yield* ensureParentDirectory(path);
    yield* Stream.run(encoded, fs.sink(path)).pipe(
      Effect.mapError((error) =>
        error instanceof VcfOpsError ? error : FileError.fromSystemError("write", path, error)
      )
    );
  });

  await runIo(program);
}

/**
 * Create a directory and any missing parents
 *
 * @throws {FileError} When the directory cannot be created
 */
export async function ensureDirectory(path: string): Promise<void> {
  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    yield* fs
      .makeDirectory(path, { recursive: true })
      .pipe(Effect.mapError((error) => FileError.fromSystemError("mkdir", path, error)));
  });

  await runIo(program);
}

// =============================================================================
// PRIVATE HELPER FUNCTIONS
// =============================================================================

function ensureParentDirectory(
  path: string
): Effect.Effect<void, FileError, FileSystem.FileSystem | Path.Path> {
  return Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const pathService = yield* Path.Path;
    const parent = pathService.dirname(path);
    const present = yield* fs.exists(parent);
    if (!present) {
      yield* fs.makeDirectory(parent, { recursive: true });
    }
  }).pipe(Effect.mapError((error) => FileError.fromSystemError("mkdir", path, error)));
}

function validateOptions(options: WriteOptions): WriteOptions {
  const result = WriteOptionsSchema(options);
  if (result instanceof type.errors) {
    throw new ValidationError(`Invalid write options: ${result.summary}`);
  }
  return options;
}

function toLibraryError(error: unknown): VcfOpsError {
  if (error instanceof VcfOpsError) {
    return error;
  }
  return new StreamError(error instanceof Error ? error.message : String(error), "read");
}

async function* batchText(chunks: AsyncIterable<string>, blockSize: number): AsyncGenerator<string> {
  let pending = "";
  for await (const chunk of chunks) {
    pending += chunk;
    if (pending.length >= blockSize) {
      yield pending;
      pending = "";
    }
  }
  if (pending.length > 0) {
    yield pending;
  }
}
