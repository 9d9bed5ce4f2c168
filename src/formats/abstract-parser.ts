/**
 * Abstract base parser with shared option handling and interrupt support
 *
 * Concrete parsers keep their own parsing logic; the base class resolves the
 * common {@link ParserOptions} and turns an aborted `signal` into a
 * {@link ParseError}.
 */

import { ParseError } from "../errors";
import type { FileReaderOptions, ParserOptions } from "../types";

const DEFAULT_MAX_LINE_LENGTH = 256 * 1024 * 1024;

/**
 * Parser options after defaults have been applied
 */
export interface ResolvedParserOptions {
  readonly skipValidation: boolean;
  readonly maxLineLength: number;
  readonly signal?: AbortSignal;
  /** Absent unless the caller asked for lenient parsing */
  readonly onError?: (error: string, lineNumber?: number) => void;
  readonly onWarning: (warning: string, lineNumber?: number) => void;
}

/**
 * @template T - What a parse produces (for VCF, a header plus record stream)
 */
export abstract class AbstractParser<T> {
  protected readonly options: ResolvedParserOptions;

  constructor(options: ParserOptions = {}) {
    const resolved: ResolvedParserOptions = {
      skipValidation: options.skipValidation ?? false,
      maxLineLength: options.maxLineLength ?? DEFAULT_MAX_LINE_LENGTH,
      onWarning:
        options.onWarning ??
        ((warning: string, lineNumber?: number): void => {
          const where = lineNumber !== undefined ? ` (line ${lineNumber})` : "";
          console.warn(`${this.getFormatName()} Warning${where}: ${warning}`);
        }),
      ...(options.signal !== undefined ? { signal: options.signal } : {}),
      ...(options.onError !== undefined ? { onError: options.onError } : {}),
    };
    this.options = resolved;
  }

  /**
   * Check if parsing should stop; call once per line
   *
   * @throws {ParseError} If the signal has been aborted
   */
  protected checkAborted(context = "parsing"): void {
    if (this.options.signal?.aborted === true) {
      throw new ParseError(`Operation aborted during ${this.getFormatName()} ${context}`, "ABORTED");
    }
  }

  /**
   * Parse in-memory text
   */
  abstract parseString(data: string): Promise<T>;

  /**
   * Parse a file, decompressing when needed
   */
  abstract parseFile(filePath: string, options?: FileReaderOptions): Promise<T>;

  /**
   * Parse a byte stream
   */
  abstract parse(stream: ReadableStream<Uint8Array>): Promise<T>;

  /**
   * Format identifier used in messages (e.g. "VCF")
   */
  protected abstract getFormatName(): string;
}
