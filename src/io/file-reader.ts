/**
 * File reading on top of the Effect platform FileSystem
 *
 * Streams are decompressed transparently: the format comes from the file
 * extension, and files without a compression extension are sniffed for gzip
 * magic bytes.
 */

import { FileSystem } from "@effect/platform";
import { type } from "arktype";
import { Effect, Option, Stream } from "effect";
import { CompressionDetector } from "../compression/detector";
import { CompressionService } from "../compression/service";
import { FileError } from "../errors";
import type { CompressionFormat, FileMetadata, FileReaderOptions, FileValidationResult } from "../types";
import { FilePathSchema, FileReaderOptionsSchema } from "../types";
import { runIo } from "./runtime";

const MAGIC_BYTES_LENGTH = 18;

const DEFAULT_OPTIONS = {
  bufferSize: 65536,
  encoding: "utf8",
  maxFileSize: Number.MAX_SAFE_INTEGER,
  autoDecompress: true,
} as const;

type ResolvedReaderOptions = Required<
  Pick<FileReaderOptions, "bufferSize" | "encoding" | "maxFileSize" | "autoDecompress">
> &
  Pick<FileReaderOptions, "compressionFormat">;

/**
 * Check if a path exists and is a regular file
 *
 * @throws {FileError} If the path is invalid or cannot be inspected
 */
export async function exists(path: string): Promise<boolean> {
  const validatedPath = validatePath(path);

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const pathExists = yield* fs.exists(validatedPath);
    if (!pathExists) return false;

    const info = yield* fs.stat(validatedPath);
    return info.type === "File";
  });

  return runIo(
    program.pipe(Effect.mapError((error) => FileError.fromSystemError("stat", validatedPath, error)))
  );
}

/**
 * Get file metadata
 *
 * @throws {FileError} If the file cannot be accessed
 */
export async function getMetadata(path: string): Promise<FileMetadata> {
  const validatedPath = validatePath(path);

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const info = yield* fs.stat(validatedPath);
    const dot = validatedPath.lastIndexOf(".");

    return {
      path: validatedPath,
      size: Number(info.size),
      lastModified: Option.getOrElse(info.mtime, () => new Date(0)),
      extension: dot === -1 ? "" : validatedPath.substring(dot),
    };
  });

  return runIo(
    program.pipe(Effect.mapError((error) => FileError.fromSystemError("stat", validatedPath, error)))
  );
}

/**
 * Read a byte range `[start, end)`; shorter than requested at end of file
 *
 * @throws {FileError} If the range is invalid or the file cannot be read
 */
export async function readByteRange(path: string, start: number, end: number): Promise<Uint8Array> {
  const validatedPath = validatePath(path);

  if (start < 0 || end < 0) {
    throw new FileError("Byte range must be non-negative", validatedPath, "read");
  }
  if (start >= end) {
    throw new FileError("Start byte must be less than end byte", validatedPath, "read");
  }

  const program = Effect.scoped(
    Effect.gen(function* () {
      const fs = yield* FileSystem.FileSystem;
      const file = yield* fs.open(validatedPath, { flag: "r" });
      yield* file.seek(start, "start");
      const bytes = yield* file.readAlloc(end - start);
      return Option.getOrElse(bytes, () => new Uint8Array(0));
    })
  );

  return runIo(
    program.pipe(Effect.mapError((error) => FileError.fromSystemError("read", validatedPath, error)))
  );
}

/**
 * Work out how a file is compressed
 *
 * An explicit `compressionFormat` wins; then the extension; then magic bytes.
 */
export async function detectCompression(
  path: string,
  options: Pick<FileReaderOptions, "compressionFormat"> = {}
): Promise<CompressionFormat> {
  if (options.compressionFormat !== undefined) {
    return options.compressionFormat;
  }

  const byExtension = CompressionDetector.fromExtension(path);
  if (byExtension !== "none") {
    return byExtension;
  }

  const metadata = await getMetadata(path);
  if (metadata.size === 0) {
    return "none";
  }
  const head = await readByteRange(path, 0, Math.min(MAGIC_BYTES_LENGTH, metadata.size));
  return CompressionDetector.fromMagicBytes(head).format;
}

/**
 * Create a streaming reader for a file
 *
 * The underlying handle is released when the stream finishes, errors or
 * is cancelled.
 *
 * @throws {FileError} If the file is missing, too large or unreadable
 *
 * @example
 * ```typescript
 * const stream = await createStream("calls.vcf.gz");
 * for await (const line of readLines(stream)) {
 *   // ...
 * }
 * ```
 */
export async function createStream(
  path: string,
  options: FileReaderOptions = {}
): Promise<ReadableStream<Uint8Array>> {
  const validatedPath = validatePath(path);
  const mergedOptions = mergeOptions(options);

  const validation = await validateFile(validatedPath, mergedOptions);
  if (!validation.isValid) {
    throw new FileError(validation.error ?? "File validation failed", validatedPath, "open");
  }

  const format = mergedOptions.autoDecompress
    ? await detectCompression(validatedPath, mergedOptions)
    : "none";

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const compression = yield* CompressionService;

    const bytes = fs
      .stream(validatedPath, { bufferSize: mergedOptions.bufferSize })
      .pipe(Stream.mapError((error) => FileError.fromSystemError("read", validatedPath, error)));
    const raw = Stream.toReadableStream(bytes);
    return format === "none" ? raw : raw.pipeThrough(compression.createDecompressionStream(format));
  });

  return runIo(program);
}

/**
 * Read a whole file into a string, decompressing when needed
 *
 * Intended for small inputs such as sample lists and region files.
 *
 * @throws {FileError} If the file cannot be read or exceeds `maxFileSize`
 */
export async function readToString(path: string, options: FileReaderOptions = {}): Promise<string> {
  const validatedPath = validatePath(path);
  const mergedOptions = mergeOptions(options);

  const validation = await validateFile(validatedPath, mergedOptions);
  if (!validation.isValid) {
    throw new FileError(validation.error ?? "File validation failed", validatedPath, "read");
  }

  const format = mergedOptions.autoDecompress
    ? await detectCompression(validatedPath, mergedOptions)
    : "none";

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const compression = yield* CompressionService;
    const bytes = yield* fs
      .readFile(validatedPath)
      .pipe(Effect.mapError((error) => FileError.fromSystemError("read", validatedPath, error)));
    const decoded = yield* compression.decompress(bytes, format);
    return new TextDecoder(mergedOptions.encoding).decode(decoded);
  });

  return runIo(program);
}

export const FileReader = {
  exists,
  getMetadata,
  readByteRange,
  detectCompression,
  createStream,
  readToString,
} as const;

// =============================================================================
// PRIVATE HELPER FUNCTIONS
// =============================================================================

async function validateFile(
  path: string,
  options: ResolvedReaderOptions
): Promise<FileValidationResult> {
  if (!(await exists(path))) {
    return { isValid: false, error: `File not found or not a regular file: ${path}` };
  }

  const metadata = await getMetadata(path);
  if (metadata.size > options.maxFileSize) {
    return {
      isValid: false,
      metadata,
      error: `File size ${metadata.size} exceeds maximum ${options.maxFileSize}`,
    };
  }
  return { isValid: true, metadata };
}

function validatePath(path: string): string {
  const validationResult = FilePathSchema(path);
  if (validationResult instanceof type.errors) {
    throw new FileError(`Invalid file path: ${validationResult.summary}`, path, "stat");
  }
  return validationResult;
}

function mergeOptions(options: FileReaderOptions): ResolvedReaderOptions {
  const merged: ResolvedReaderOptions = {
    bufferSize: options.bufferSize ?? DEFAULT_OPTIONS.bufferSize,
    encoding: options.encoding ?? DEFAULT_OPTIONS.encoding,
    maxFileSize: options.maxFileSize ?? DEFAULT_OPTIONS.maxFileSize,
    autoDecompress: options.autoDecompress ?? DEFAULT_OPTIONS.autoDecompress,
    ...(options.compressionFormat !== undefined ? { compressionFormat: options.compressionFormat } : {}),
  };

  const validationResult = FileReaderOptionsSchema(merged);
  if (validationResult instanceof type.errors) {
    throw new FileError(`Invalid file reader options: ${validationResult.summary}`, "", "read");
  }

  return merged;
}
