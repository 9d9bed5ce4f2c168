/**
 * BGZF (blocked gzip) compression for `.vcf.gz` output
 *
 * Each block is a complete gzip member carrying a `BC` extra subfield that
 * records the compressed block size, so tabix and bcftools can index the
 * output. The stream ends with the standard 28-byte empty block.
 */

import { deflateSync } from "fflate";
import { CompressionError } from "../errors";
import { toDeflateLevel, type DeflateLevel } from "./gzip";

/** Largest uncompressed payload per block, as written by bgzip */
export const BGZF_MAX_BLOCK_SIZE = 65280;

const BGZF_HEADER_SIZE = 18;
const BGZF_FOOTER_SIZE = 8;
const BGZF_MAX_COMPRESSED_BLOCK = 65536;

const BGZF_EOF_BLOCK = new Uint8Array([
  0x1f, 0x8b, 0x08, 0x04, 0x00, 0x00, 0x00, 0x00, 0x00, 0xff, 0x06, 0x00, 0x42, 0x43, 0x02, 0x00,
  0x1b, 0x00, 0x03, 0x00, 0x00, 0x00, 0x00, 0x00, 0x00, 0x00, 0x00, 0x00,
]);

export interface BgzfCompressorOptions {
  /** Deflate level 0-9 (default 6) */
  compressionLevel?: number;
  /** Uncompressed bytes per block, at most 65280 */
  blockSize?: number;
}

let crc32Table: Uint32Array | undefined;

function getCrc32Table(): Uint32Array {
  if (crc32Table === undefined) {
    const table = new Uint32Array(256);
    for (let i = 0; i < 256; i++) {
      let crc = i;
      for (let j = 0; j < 8; j++) {
        crc = crc & 1 ? 0xedb88320 ^ (crc >>> 1) : crc >>> 1;
      }
      table[i] = crc;
    }
    crc32Table = table;
  }
  return crc32Table;
}

/**
 * CRC32 of a byte buffer (gzip polynomial)
 */
export function crc32(data: Uint8Array): number {
  const table = getCrc32Table();
  let crc = 0xffffffff;
  for (const byte of data) {
    crc = (table[(crc ^ byte) & 0xff] ?? 0) ^ (crc >>> 8);
  }
  return (crc ^ 0xffffffff) >>> 0;
}

/**
 * BGZF block compressor
 *
 * @example
 * ```typescript
 * const compressor = new BgzfCompressor({ compressionLevel: 6 });
 * const bytes = textStream.pipeThrough(compressor.createStream());
 * ```
 */
export class BgzfCompressor {
  private readonly level: DeflateLevel;
  readonly blockSize: number;

  constructor(options: BgzfCompressorOptions = {}) {
    const blockSize = options.blockSize ?? BGZF_MAX_BLOCK_SIZE;
    if (!Number.isInteger(blockSize) || blockSize < 1 || blockSize > BGZF_MAX_BLOCK_SIZE) {
      throw new CompressionError(
        `BGZF block size must be between 1 and ${BGZF_MAX_BLOCK_SIZE}, got ${blockSize}`,
        "bgzf",
        "validate"
      );
    }
    this.blockSize = blockSize;
    this.level = toDeflateLevel(options.compressionLevel ?? 6);
  }

  /**
   * Compress one payload into a single BGZF block
   *
   * @throws {CompressionError} If the payload exceeds the block size or the
   * compressed block would not fit the 16-bit size field
   */
  compressBlock(data: Uint8Array): Uint8Array {
    if (data.length > this.blockSize) {
      throw new CompressionError(
        `Block payload of ${data.length} bytes exceeds block size ${this.blockSize}`,
        "bgzf",
        "compress",
        data.length
      );
    }

    let deflated: Uint8Array;
    try {
      deflated = deflateSync(data, { level: this.level });
    } catch (error) {
      throw CompressionError.fromSystemError("bgzf", "compress", error, data.length);
    }

    const totalSize = BGZF_HEADER_SIZE + deflated.length + BGZF_FOOTER_SIZE;
    if (totalSize > BGZF_MAX_COMPRESSED_BLOCK) {
      throw new CompressionError(
        `Compressed block of ${totalSize} bytes exceeds the BGZF limit`,
        "bgzf",
        "compress",
        data.length
      );
    }

    const block = new Uint8Array(totalSize);
    const view = new DataView(block.buffer);

    // gzip member header with FEXTRA set and a 6-byte BC subfield
    block.set([0x1f, 0x8b, 0x08, 0x04, 0x00, 0x00, 0x00, 0x00, 0x00, 0xff, 0x06, 0x00, 0x42, 0x43]);
    view.setUint16(14, 2, true);
    view.setUint16(16, totalSize - 1, true);

    block.set(deflated, BGZF_HEADER_SIZE);

    const footerOffset = BGZF_HEADER_SIZE + deflated.length;
    view.setUint32(footerOffset, crc32(data), true);
    view.setUint32(footerOffset + 4, data.length, true);

    return block;
  }

  /**
   * The empty block that marks the end of a BGZF file
   */
  createEOFBlock(): Uint8Array {
    return BGZF_EOF_BLOCK.slice();
  }

  /**
   * Create a streaming compressor
   *
   * Input is gathered until a full block is available; `flush` writes the
   * remainder and the EOF block.
   */
  createStream(): TransformStream<Uint8Array, Uint8Array> {
    const pending = new Uint8Array(this.blockSize);
    let filled = 0;

    return new TransformStream<Uint8Array, Uint8Array>({
      transform: (chunk, controller) => {
        let offset = 0;
        while (offset < chunk.length) {
          const take = Math.min(this.blockSize - filled, chunk.length - offset);
          pending.set(chunk.subarray(offset, offset + take), filled);
          filled += take;
          offset += take;

          if (filled === this.blockSize) {
            controller.enqueue(this.compressBlock(pending));
            filled = 0;
          }
        }
      },

      flush: (controller) => {
        if (filled > 0) {
          controller.enqueue(this.compressBlock(pending.subarray(0, filled)));
        }
        controller.enqueue(this.createEOFBlock());
      },
    });
  }
}

/**
 * Compress a whole buffer into BGZF blocks followed by the EOF block
 */
export function compressBgzf(data: Uint8Array, options: BgzfCompressorOptions = {}): Uint8Array {
  const compressor = new BgzfCompressor(options);
  const blocks: Uint8Array[] = [];
  for (let offset = 0; offset < data.length; offset += compressor.blockSize) {
    blocks.push(compressor.compressBlock(data.subarray(offset, offset + compressor.blockSize)));
  }
  blocks.push(compressor.createEOFBlock());

  const output = new Uint8Array(blocks.reduce((sum, block) => sum + block.length, 0));
  let position = 0;
  for (const block of blocks) {
    output.set(block, position);
    position += block.length;
  }
  return output;
}
