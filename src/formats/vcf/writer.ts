/**
 * VCF text formatting and file output
 */

import { writeStream } from "../../io/file-writer";
import type { WriteOptions } from "../../types";
import { formatHeaderLines } from "./header";
import type { InfoValue, SampleData, VcfHeader, VcfRecord, VcfSource } from "./types";

/**
 * Format the header, including a trailing newline
 */
export function formatHeader(header: VcfHeader): string {
  return `${formatHeaderLines(header).join("\n")}\n`;
}

/**
 * Format one record as a VCF data line, without a newline
 */
export function formatRecord(record: VcfRecord): string {
  const columns = [
    record.chrom,
    String(record.pos),
    record.id.length > 0 ? record.id : ".",
    record.ref,
    record.alt.length > 0 ? record.alt.join(",") : ".",
    record.qual !== undefined ? String(record.qual) : ".",
    record.filter.length > 0 ? record.filter.join(";") : ".",
    formatInfo(record.info),
  ];

  if (record.samples.length > 0) {
    columns.push(record.format.length > 0 ? record.format.join(":") : ".");
    for (const sample of record.samples) {
      columns.push(formatSample(sample, record.format));
    }
  }
  return columns.join("\t");
}

export function formatInfo(info: ReadonlyMap<string, InfoValue>): string {
  if (info.size === 0) return ".";
  const entries: string[] = [];
  for (const [key, value] of info) {
    if (value === true) {
      entries.push(key);
    } else if (typeof value === "string") {
      entries.push(`${key}=${value}`);
    } else {
      entries.push(`${key}=${value.join(",")}`);
    }
  }
  return entries.join(";");
}

/**
 * Format one sample column; trailing keys the sample lacks are dropped
 */
export function formatSample(sample: SampleData, format: readonly string[]): string {
  let last = -1;
  format.forEach((key, index) => {
    if (sample.has(key)) last = index;
  });
  if (last === -1) return ".";
  return format
    .slice(0, last + 1)
    .map((key) => sample.get(key) ?? ".")
    .join(":");
}

/**
 * VCF text in chunks: the header, then one line per record
 *
 * @example
 * ```typescript
 * for await (const chunk of formatVcf(source)) process.stdout.write(chunk);
 * ```
 */
export async function* formatVcf(source: VcfSource): AsyncGenerator<string, void, undefined> {
  yield formatHeader(source.header);
  for await (const record of source.records) {
    yield `${formatRecord(record)}\n`;
  }
}

/**
 * Counts reported after writing a file
 */
export interface WriteSummary {
  readonly path: string;
  readonly records: number;
}

/**
 * Write a source to a file; `.gz` and `.bgz` paths are written as BGZF
 *
 * @throws {FileError} When the destination cannot be written
 */
export async function writeVcf(
  source: VcfSource,
  path: string,
  options: WriteOptions = {}
): Promise<WriteSummary> {
  let records = 0;
  async function* counted(): AsyncGenerator<string, void, undefined> {
    yield formatHeader(source.header);
    for await (const record of source.records) {
      records++;
      yield `${formatRecord(record)}\n`;
    }
  }

  await writeStream(path, counted(), options);
  return { path, records };
}

/**
 * Namespace export of the VCF writer
 */
export const VcfWriter = {
  formatHeader,
  formatRecord,
  formatVcf,
  writeVcf,
} as const;
