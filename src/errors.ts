/**
 * Error handling for VCF processing
 *
 * Every failure raised by the library extends {@link VcfOpsError} and carries a
 * stable `code`, plus the line number and offending text when one exists.
 */

/**
 * Base error class for all vcfops errors
 */
export class VcfOpsError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly lineNumber?: number,
    public readonly context?: string
  ) {
    super(message);
    this.name = "VcfOpsError";
  }

  /**
   * Create a user-friendly error message with context
   */
  override toString(): string {
    let msg = `${this.name}: ${this.message}`;
    if (this.lineNumber !== undefined) {
      msg += ` (line ${this.lineNumber})`;
    }
    if (this.context !== undefined && this.context !== "") {
      msg += `\nContext: ${this.context}`;
    }
    return msg;
  }
}

/**
 * Validation errors for invalid options, list files and templates
 */
export class ValidationError extends VcfOpsError {
  constructor(message: string, lineNumber?: number, context?: string) {
    super(message, "VALIDATION_ERROR", lineNumber, context);
    this.name = "ValidationError";
  }
}

/**
 * Parsing errors for format-specific issues
 */
export class ParseError extends VcfOpsError {
  constructor(
    message: string,
    public readonly format: string,
    lineNumber?: number,
    context?: string
  ) {
    super(message, "PARSE_ERROR", lineNumber, context);
    this.name = "ParseError";
  }
}

/**
 * Malformed VCF header or record line
 *
 * Unrecoverable: the stream that raised it is aborted.
 */
export class VcfFormatError extends ParseError {
  constructor(
    message: string,
    lineNumber?: number,
    public readonly line?: string,
    public readonly filePath?: string
  ) {
    const where = filePath !== undefined ? `${filePath}: ` : "";
    super(`${where}${message}`, "VCF", lineNumber, line !== undefined ? truncate(line) : undefined);
    this.name = "VcfFormatError";
  }
}

/**
 * Compression/decompression errors with detailed context
 */
export class CompressionError extends VcfOpsError {
  constructor(
    message: string,
    public readonly format: "gzip" | "bgzf" | "none",
    public readonly operation: "detect" | "decompress" | "stream" | "validate" | "compress",
    public readonly bytesProcessed?: number,
    context?: string
  ) {
    super(message, "COMPRESSION_ERROR", undefined, context);
    this.name = "CompressionError";
  }

  /**
   * Create compression error from system error
   */
  static fromSystemError(
    format: CompressionError["format"],
    operation: CompressionError["operation"],
    systemError: unknown,
    bytesProcessed?: number
  ): CompressionError {
    const errorMessage = systemError instanceof Error ? systemError.message : String(systemError);
    const suggestion = CompressionError.getSuggestionForCompressionError(format, errorMessage);

    return new CompressionError(
      `${operation} operation failed for ${format}: ${errorMessage}${suggestion !== undefined ? `. ${suggestion}` : ""}`,
      format,
      operation,
      bytesProcessed,
      `System error: ${errorMessage}`
    );
  }

  private static getSuggestionForCompressionError(
    format: CompressionError["format"],
    errorMessage: string
  ): string | undefined {
    const msg = errorMessage.toLowerCase();

    if (msg.includes("magic") || msg.includes("header") || msg.includes("incorrect")) {
      return `File may be corrupted or not actually ${format} compressed`;
    }
    if (msg.includes("truncated") || msg.includes("unexpected end")) {
      return "File appears to be truncated or incomplete";
    }
    if (msg.includes("crc") || msg.includes("checksum")) {
      return "Data integrity check failed - file may be corrupted";
    }
    return undefined;
  }

  override toString(): string {
    let msg = super.toString();
    if (this.bytesProcessed !== undefined) {
      msg += `\nBytes processed: ${this.bytesProcessed}`;
    }
    return msg;
  }
}

/**
 * File I/O errors (unreadable input, unwritable destination)
 */
export class FileError extends VcfOpsError {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly operation: "read" | "write" | "stat" | "open" | "close" | "mkdir",
    public readonly systemError?: unknown,
    context?: string
  ) {
    super(message, "FILE_ERROR", undefined, context);
    this.name = "FileError";
  }

  /**
   * Create file error with system error context
   */
  static fromSystemError(
    operation: FileError["operation"],
    filePath: string,
    systemError: unknown
  ): FileError {
    const errorMessage = systemError instanceof Error ? systemError.message : String(systemError);
    const suggestion = FileError.getSuggestionForSystemError(errorMessage);

    return new FileError(
      `${operation} '${filePath}' failed: ${errorMessage}${suggestion !== undefined ? `. ${suggestion}` : ""}`,
      filePath,
      operation,
      systemError,
      `System error: ${errorMessage}`
    );
  }

  private static getSuggestionForSystemError(errorMessage: string): string | undefined {
    const msg = errorMessage.toLowerCase();

    if (msg.includes("enoent") || msg.includes("no such file") || msg.includes("notfound")) {
      return "Check that the file path is correct and the file exists";
    }
    if (msg.includes("eacces") || msg.includes("permission denied")) {
      return "Check file permissions";
    }
    if (msg.includes("eisdir") || msg.includes("is a directory")) {
      return "Path points to a directory, not a file";
    }
    if (msg.includes("enospc") || msg.includes("no space left")) {
      return "Free up disk space or use a different location";
    }
    return undefined;
  }
}

/**
 * Line-stream failures below the parser (decoding, oversized lines)
 */
export class StreamError extends VcfOpsError {
  constructor(
    message: string,
    public readonly operation: "read" | "decode" | "buffer",
    public readonly bytesProcessed?: number
  ) {
    super(message, "STREAM_ERROR");
    this.name = "StreamError";
  }
}

/**
 * Reference to a sample name the header does not declare
 */
export class UnknownSampleError extends VcfOpsError {
  constructor(
    public readonly samples: readonly string[],
    public readonly available: readonly string[]
  ) {
    super(
      `Unknown sample${samples.length === 1 ? "" : "s"}: ${samples.join(", ")}`,
      "UNKNOWN_SAMPLE",
      undefined,
      `Header declares ${available.length} sample(s)${available.length > 0 ? `: ${preview(available)}` : ""}`
    );
    this.name = "UnknownSampleError";
  }
}

/**
 * Sample rename that would leave two columns with the same name
 */
export class DuplicateSampleError extends VcfOpsError {
  constructor(public readonly samples: readonly string[]) {
    super(
      `Duplicate sample name${samples.length === 1 ? "" : "s"} after rename: ${samples.join(", ")}`,
      "DUPLICATE_SAMPLE"
    );
    this.name = "DuplicateSampleError";
  }
}

/**
 * Conflicting records at the same site while merging
 */
export class OverlapError extends VcfOpsError {
  constructor(
    message: string,
    public readonly chromosome: string,
    public readonly position: number,
    public readonly inputs: readonly number[]
  ) {
    super(
      `${message} at ${chromosome}:${position}`,
      "OVERLAP",
      undefined,
      `Inputs: ${inputs.map((index) => `#${index + 1}`).join(", ")}`
    );
    this.name = "OverlapError";
  }
}

/**
 * Interval or rename entry naming a chromosome the header does not declare
 *
 * Reported through `onWarning` rather than thrown: naming convention
 * mismatches (chr1 vs Chr01) are common and must not halt a run.
 */
export class ChromMismatchError extends VcfOpsError {
  constructor(
    public readonly chromosome: string,
    public readonly source: "interval" | "site" | "rename",
    public readonly knownContigs: readonly string[]
  ) {
    super(
      `Chromosome '${chromosome}' from ${source} entry not found in VCF header; entry has no effect`,
      "CHROM_MISMATCH",
      undefined,
      knownContigs.length > 0 ? `Header contigs: ${preview(knownContigs)}` : undefined
    );
    this.name = "ChromMismatchError";
  }
}

/**
 * Inputs whose sample lists must agree but do not
 */
export class SampleMismatchError extends VcfOpsError {
  constructor(
    message: string,
    public readonly inputIndex: number
  ) {
    super(message, "SAMPLE_MISMATCH", undefined, `Input #${inputIndex + 1}`);
    this.name = "SampleMismatchError";
  }
}

/**
 * Merge input that is not sorted by chromosome and position
 */
export class MergeError extends VcfOpsError {
  constructor(
    message: string,
    public readonly inputIndex: number,
    lineNumber?: number
  ) {
    super(message, "MERGE_ERROR", lineNumber, `Input #${inputIndex + 1}`);
    this.name = "MergeError";
  }
}

function preview(names: readonly string[], limit = 8): string {
  const shown = names.slice(0, limit).join(", ");
  return names.length > limit ? `${shown}, ... (${names.length - limit} more)` : shown;
}

function truncate(line: string, limit = 200): string {
  return line.length > limit ? `${line.slice(0, limit)}...` : line;
}
