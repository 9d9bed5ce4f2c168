/**
 * Line splitting over byte streams
 */

import { StreamError, VcfOpsError } from "../errors";
import type { LineProcessingResult } from "../types";

// VCF rows for large cohorts run to tens of megabytes
const DEFAULT_MAX_LINE_LENGTH = 256 * 1024 * 1024;

export interface ReadLinesOptions {
  encoding?: "utf8" | "latin1";
  maxLineLength?: number;
}

/**
 * Convert a byte stream into an async iterable of lines
 *
 * Line terminators (`\n`, `\r\n`) are stripped. A final line without a
 * terminator is still yielded. When the consumer stops early the stream is
 * cancelled, which releases the file handle behind it.
 *
 * @throws {StreamError} If a line exceeds `maxLineLength` or the stream fails
 *
 * @example
 * ```typescript
 * for await (const line of readLines(await createStream("calls.vcf"))) {
 *   if (line.startsWith("#CHROM")) break;
 * }
 * ```
 */
export async function* readLines(
  stream: ReadableStream<Uint8Array>,
  options: ReadLinesOptions = {}
): AsyncGenerator<string, void, undefined> {
  const maxLineLength = options.maxLineLength ?? DEFAULT_MAX_LINE_LENGTH;
  const reader = stream.getReader();
  const decoder = new TextDecoder(options.encoding === "latin1" ? "latin1" : "utf-8");
  let buffer = "";
  let bytesProcessed = 0;
  let completed = false;
  let streamFailed = false;

  try {
    while (true) {
      let chunk: Awaited<ReturnType<typeof reader.read>>;
      try {
        chunk = await reader.read();
      } catch (error) {
        streamFailed = true;
        throw error instanceof VcfOpsError
          ? error
          : new StreamError(
              `Line reading failed: ${error instanceof Error ? error.message : String(error)}`,
              "read",
              bytesProcessed
            );
      }

      if (chunk.done) {
        buffer += decoder.decode();
        break;
      }

      bytesProcessed += chunk.value.length;
      buffer += decoder.decode(chunk.value, { stream: true });

      const result = processBuffer(buffer, maxLineLength);
      buffer = result.remainder;
      for (const line of result.lines) {
        yield line;
      }
    }

    const tail = buffer.endsWith("\r") ? buffer.slice(0, -1) : buffer;
    if (tail.length > 0) {
      yield tail;
    }
    completed = true;
  } finally {
    if (!completed && !streamFailed) {
      await reader.cancel();
    }
    reader.releaseLock();
  }
}

/**
 * Split a text buffer into complete lines and an unterminated remainder
 *
 * @throws {StreamError} If a line or the remainder exceeds `maxLineLength`
 */
export function processBuffer(
  buffer: string,
  maxLineLength = DEFAULT_MAX_LINE_LENGTH
): LineProcessingResult {
  const lines: string[] = [];
  let lineStart = 0;
  let newline = buffer.indexOf("\n", lineStart);

  while (newline !== -1) {
    const lineEnd = newline > lineStart && buffer[newline - 1] === "\r" ? newline - 1 : newline;
    const line = buffer.slice(lineStart, lineEnd);
    if (line.length > maxLineLength) {
      throw new StreamError(
        `Line too long: ${line.length} characters exceeds maximum ${maxLineLength}`,
        "buffer"
      );
    }
    lines.push(line);
    lineStart = newline + 1;
    newline = buffer.indexOf("\n", lineStart);
  }

  const remainder = buffer.slice(lineStart);
  if (remainder.length > maxLineLength) {
    throw new StreamError(
      `Incomplete line too long: ${remainder.length} characters exceeds maximum ${maxLineLength}`,
      "buffer"
    );
  }
  return { lines, remainder };
}

/**
 * Split in-memory text into lines with the same rules as {@link readLines}
 */
export function* splitLines(text: string): Generator<string, void, undefined> {
  const { lines, remainder } = processBuffer(text);
  yield* lines;
  const tail = remainder.endsWith("\r") ? remainder.slice(0, -1) : remainder;
  if (tail.length > 0) {
    yield tail;
  }
}
