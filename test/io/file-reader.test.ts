/**
 * Tests for file reading and compression detection
 */

import { afterAll, beforeAll, describe, expect, test } from "vitest";
import { mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { gzipSync } from "fflate";
import { compressBgzf } from "../../src/compression/bgzf";
import { FileError } from "../../src/errors";
import {
  createStream,
  detectCompression,
  exists,
  getMetadata,
  readByteRange,
  readToString,
} from "../../src/io/file-reader";
import { readLines } from "../../src/io/stream-utils";
import { createTempDir } from "../utils/vcf-fixtures";

const encoder = new TextEncoder();
const TEXT = "chr1\t100\nchr1\t200\nchr2\t50\n";

describe("file reader", () => {
  const dir = createTempDir();
  const files = {
    plain: join(dir.path, "sites.txt"),
    gz: join(dir.path, "sites.txt.gz"),
    sniffed: join(dir.path, "sites-compressed.vcf"),
    gzipNoExt: join(dir.path, "sites-gzip.dat"),
    empty: join(dir.path, "empty.txt"),
    directory: join(dir.path, "folder"),
    missing: join(dir.path, "absent.txt"),
  };

  beforeAll(() => {
    writeFileSync(files.plain, TEXT);
    writeFileSync(files.gz, compressBgzf(encoder.encode(TEXT)));
    writeFileSync(files.sniffed, compressBgzf(encoder.encode(TEXT)));
    writeFileSync(files.gzipNoExt, gzipSync(encoder.encode(TEXT)));
    writeFileSync(files.empty, "");
    mkdirSync(files.directory);
  });

  afterAll(() => {
    dir.cleanup();
  });

  describe("exists", () => {
    test("true only for regular files", async () => {
      expect(await exists(files.plain)).toBe(true);
      expect(await exists(files.directory)).toBe(false);
      expect(await exists(files.missing)).toBe(false);
    });

    test("rejects a path with a NUL byte", async () => {
      await expect(exists("bad\0path")).rejects.toThrow(FileError);
    });
  });

  test("getMetadata reports size and extension", async () => {
    const metadata = await getMetadata(files.plain);
    expect(metadata.size).toBe(TEXT.length);
    expect(metadata.extension).toBe(".txt");
    expect(metadata.path).toBe(files.plain);
  });

  describe("readByteRange", () => {
    test("reads the requested bytes", async () => {
      const bytes = await readByteRange(files.plain, 0, 4);
      expect(new TextDecoder().decode(bytes)).toBe("chr1");
    });

    test("returns fewer bytes at end of file", async () => {
      const bytes = await readByteRange(files.plain, TEXT.length - 3, TEXT.length + 10);
      expect(new TextDecoder().decode(bytes)).toBe("50\n");
    });

    test("rejects an empty or negative range", async () => {
      await expect(readByteRange(files.plain, 5, 5)).rejects.toThrow("Start byte must be less than end byte");
      await expect(readByteRange(files.plain, -1, 5)).rejects.toThrow("Byte range must be non-negative");
    });
  });

  describe("detectCompression", () => {
    test("uses the extension first", async () => {
      expect(await detectCompression(files.gz)).toBe("gzip");
    });

    test("sniffs magic bytes when the extension says nothing", async () => {
      expect(await detectCompression(files.sniffed)).toBe("bgzf");
      expect(await detectCompression(files.gzipNoExt)).toBe("gzip");
      expect(await detectCompression(files.plain)).toBe("none");
      expect(await detectCompression(files.empty)).toBe("none");
    });

    test("an explicit format wins", async () => {
      expect(await detectCompression(files.gz, { compressionFormat: "none" })).toBe("none");
    });
  });

  describe("readToString", () => {
    test("reads plain and compressed files alike", async () => {
      expect(await readToString(files.plain)).toBe(TEXT);
      expect(await readToString(files.gz)).toBe(TEXT);
      expect(await readToString(files.sniffed)).toBe(TEXT);
    });

    test("autoDecompress false returns the raw bytes", async () => {
      const raw = await readToString(files.gzipNoExt, { autoDecompress: false, encoding: "latin1" });
      expect(raw.charCodeAt(0)).toBe(0x1f);
      expect(raw.length).toBe(readFileSync(files.gzipNoExt).length);
    });

    test("enforces maxFileSize", async () => {
      await expect(readToString(files.plain, { maxFileSize: 4 })).rejects.toThrow(
        `File size ${TEXT.length} exceeds maximum 4`
      );
    });

    test("fails with FileError for a missing file", async () => {
      await expect(readToString(files.missing)).rejects.toThrow(
        `File not found or not a regular file: ${files.missing}`
      );
    });

    test("rejects invalid options", async () => {
      await expect(readToString(files.plain, { bufferSize: 0 })).rejects.toThrow("Invalid file reader options");
    });
  });

  describe("createStream", () => {
    test("streams decompressed lines", async () => {
      const lines: string[] = [];
      for await (const line of readLines(await createStream(files.gz, { bufferSize: 8 }))) {
        lines.push(line);
      }
      expect(lines).toEqual(["chr1\t100", "chr1\t200", "chr2\t50"]);
    });

    test("rejects a directory", async () => {
      await expect(createStream(files.directory)).rejects.toThrow(FileError);
    });
  });
});
