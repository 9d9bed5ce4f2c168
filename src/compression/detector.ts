/**
 * Compression format detection for VCF files
 *
 * Combines file-extension rules with gzip magic-byte sniffing. A gzip member
 * whose extra field carries a `BC` subfield is reported as BGZF.
 */

import { CompressionError } from "../errors";
import type { CompressionFormat } from "../types";

const GZIP_MAGIC_FIRST_BYTE = 0x1f;
const GZIP_MAGIC_SECOND_BYTE = 0x8b;
const GZIP_FLAG_EXTRA = 0x04;
const BGZF_SUBFIELD_B = 0x42;
const BGZF_SUBFIELD_C = 0x43;

const COMPRESSION_EXTENSIONS = {
  bgzf: [".bgz", ".bgzf"],
  gzip: [".gz", ".gzip"],
} as const;

/**
 * Result of sniffing the leading bytes of a file
 */
export interface CompressionDetection {
  readonly format: CompressionFormat;
  /** 1.0 for a full BGZF header, 0.9 for plain gzip magic, 0.5 for no match */
  readonly confidence: number;
}

/**
 * Compression format detector
 *
 * @example
 * ```typescript
 * CompressionDetector.fromExtension("cohort.vcf.gz"); // "gzip"
 * CompressionDetector.fromMagicBytes(firstBytes).format; // "bgzf"
 * ```
 */
export class CompressionDetector {
  /**
   * Detect compression format from file extension
   *
   * @throws {CompressionError} If the path is empty
   */
  static fromExtension(filePath: string): CompressionFormat {
    if (filePath.length === 0) {
      throw new CompressionError("File path must not be empty", "none", "detect");
    }

    const normalizedPath = filePath.toLowerCase().replace(/\\/g, "/");

    for (const ext of COMPRESSION_EXTENSIONS.bgzf) {
      if (normalizedPath.endsWith(ext)) return "bgzf";
    }
    for (const ext of COMPRESSION_EXTENSIONS.gzip) {
      if (normalizedPath.endsWith(ext)) return "gzip";
    }
    return "none";
  }

  /**
   * Detect compression format from the first bytes of a file
   *
   * Needs 2 bytes to recognise gzip and 14 bytes to recognise BGZF.
   */
  static fromMagicBytes(bytes: Uint8Array): CompressionDetection {
    if (bytes[0] !== GZIP_MAGIC_FIRST_BYTE || bytes[1] !== GZIP_MAGIC_SECOND_BYTE) {
      return { format: "none", confidence: 0.5 };
    }

    const flags = bytes[3] ?? 0;
    if ((flags & GZIP_FLAG_EXTRA) !== 0 && bytes[12] === BGZF_SUBFIELD_B && bytes[13] === BGZF_SUBFIELD_C) {
      return { format: "bgzf", confidence: 1.0 };
    }
    return { format: "gzip", confidence: 0.9 };
  }

  /**
   * Whether data in this format needs inflating before it can be read
   */
  static isCompressed(format: CompressionFormat): boolean {
    return format !== "none";
  }
}
