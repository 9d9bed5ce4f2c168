/**
 * Streaming VCF parser
 *
 * The header is read eagerly when a source is opened; records are parsed
 * one line at a time as the consumer pulls them. Breaking out of the record
 * loop cancels the underlying byte stream and releases its file handle.
 */

import { VcfFormatError } from "../../errors";
import { createStream } from "../../io/file-reader";
import { readLines, splitLines } from "../../io/stream-utils";
import type { FileReaderOptions } from "../../types";
import { AbstractParser } from "../abstract-parser";
import { FIXED_COLUMNS, getContigIds, getFormatDefinitions, getInfoDefinitions, parseMetaLine } from "./header";
import type { InfoValue, SampleData, VcfHeader, VcfMetaLine, VcfParserOptions, VcfRecord, VcfSource } from "./types";

type LineIterator = AsyncGenerator<string, void, undefined>;

interface HeaderResult {
  readonly header: VcfHeader;
  readonly columnCount: number;
  readonly lineNumber: number;
}

/**
 * Record iterator that also releases the line source when closed before the
 * first `next()`, which a bare async generator would skip
 */
class RecordStream implements AsyncIterableIterator<VcfRecord> {
  private started = false;

  constructor(
    private readonly records: AsyncGenerator<VcfRecord, void, undefined>,
    private readonly lines: LineIterator
  ) {}

  next(): Promise<IteratorResult<VcfRecord, void>> {
    this.started = true;
    return this.records.next();
  }

  async return(): Promise<IteratorResult<VcfRecord, void>> {
    if (!this.started) {
      this.started = true;
      await this.lines.return(undefined);
    }
    return this.records.return(undefined);
  }

  [Symbol.asyncIterator](): AsyncIterableIterator<VcfRecord> {
    return this;
  }
}

/**
 * Release the file behind a source without reading its records
 */
export async function closeSource(source: VcfSource): Promise<void> {
  await source.records[Symbol.asyncIterator]().return?.();
}

/**
 * Context attached to record-level errors
 */
export interface RecordLineContext {
  /** Expected column count; defaults to 8, or 9 + samples when there are samples */
  readonly columnCount?: number;
  readonly lineNumber?: number;
  readonly filePath?: string;
}

/**
 * VCF parser
 *
 * @example
 * ```typescript
 * const parser = new VcfParser({ onWarning: (msg, line) => log.push(`${line}: ${msg}`) });
 * const { header, records } = await parser.parseFile("calls.vcf.gz");
 * for await (const record of records) {
 *   console.log(record.chrom, record.pos);
 * }
 * ```
 */
export class VcfParser extends AbstractParser<VcfSource> {
  private readonly fileOptions: FileReaderOptions;

  constructor(options: VcfParserOptions = {}) {
    super(options);
    this.fileOptions = options.fileOptions ?? {};
  }

  protected getFormatName(): string {
    return "VCF";
  }

  async parseString(data: string): Promise<VcfSource> {
    return this.parseLines(fromIterable(splitLines(data)));
  }

  async parseFile(filePath: string, options: FileReaderOptions = this.fileOptions): Promise<VcfSource> {
    const stream = await createStream(filePath, options);
    const lines = readLines(stream, {
      maxLineLength: this.options.maxLineLength,
      ...(options.encoding !== undefined ? { encoding: options.encoding } : {}),
    });
    return this.parseLines(lines, filePath);
  }

  async parse(stream: ReadableStream<Uint8Array>): Promise<VcfSource> {
    return this.parseLines(readLines(stream, { maxLineLength: this.options.maxLineLength }));
  }

  private async parseLines(lines: LineIterator, filePath?: string): Promise<VcfSource> {
    let result: HeaderResult;
    try {
      result = await this.readHeader(lines, filePath);
    } catch (error) {
      await lines.return(undefined);
      throw error;
    }
    return {
      header: result.header,
      records: new RecordStream(this.readRecords(lines, result, filePath), lines),
    };
  }

  private async readHeader(lines: LineIterator, filePath?: string): Promise<HeaderResult> {
    let fileformat: string | undefined;
    const meta: VcfMetaLine[] = [];
    let lineNumber = 0;

    while (true) {
      const next = await lines.next();
      if (next.done === true) {
        throw new VcfFormatError(
          fileformat === undefined ? "Missing ##fileformat line" : "Missing #CHROM header line",
          lineNumber > 0 ? lineNumber : undefined,
          undefined,
          filePath
        );
      }
      lineNumber++;
      this.checkAborted("header parsing");

      const line = next.value;
      if (line.trim().length === 0) continue;

      if (fileformat === undefined) {
        fileformat = parseFileformat(line, lineNumber, filePath);
        continue;
      }

      if (line.startsWith("##")) {
        const parsed = parseMetaLine(line);
        if (parsed === undefined) {
          throw new VcfFormatError("Malformed meta-information line", lineNumber, line, filePath);
        }
        if (parsed.key === "fileformat") {
          this.options.onWarning(`Ignoring repeated ##fileformat line`, lineNumber);
          continue;
        }
        meta.push(parsed);
        continue;
      }

      if (line.startsWith("#")) {
        const columns = parseColumnHeader(line, lineNumber, filePath);
        return {
          header: { fileformat, meta, samples: columns.slice(9) },
          columnCount: columns.length,
          lineNumber,
        };
      }

      throw new VcfFormatError("Data line before #CHROM header line", lineNumber, line, filePath);
    }
  }

  private async *readRecords(
    lines: LineIterator,
    { header, columnCount, lineNumber: headerEnd }: HeaderResult,
    filePath?: string
  ): AsyncGenerator<VcfRecord, void, undefined> {
    const checker = this.options.skipValidation
      ? undefined
      : new DeclarationChecker(header, this.options.onWarning);
    let lineNumber = headerEnd;

    try {
      while (true) {
        const next = await lines.next();
        if (next.done === true) return;
        lineNumber++;
        this.checkAborted("record parsing");

        const line = next.value;
        if (line.length === 0) continue;

        let record: VcfRecord;
        try {
          if (line.startsWith("#")) {
            throw new VcfFormatError("Header line after #CHROM line", lineNumber, line, filePath);
          }
          record = parseRecordLine(line, header, { columnCount, lineNumber, ...(filePath !== undefined ? { filePath } : {}) });
        } catch (error) {
          if (error instanceof VcfFormatError && this.options.onError !== undefined) {
            this.options.onError(error.message, lineNumber);
            continue;
          }
          throw error;
        }

        checker?.check(record);
        yield record;
      }
    } finally {
      await lines.return(undefined);
    }
  }
}

/**
 * Parse one data line against a header
 *
 * @throws {VcfFormatError} On a wrong column count, bad POS or QUAL, or a
 * sample with more values than FORMAT keys
 */
export function parseRecordLine(line: string, header: VcfHeader, context: RecordLineContext = {}): VcfRecord {
  const { lineNumber, filePath } = context;
  const fail = (message: string): VcfFormatError => new VcfFormatError(message, lineNumber, line, filePath);

  const expected = context.columnCount ?? (header.samples.length > 0 ? 9 + header.samples.length : 8);
  const columns = line.split("\t");
  if (columns.length !== expected) {
    throw fail(`Expected ${expected} tab-separated columns, found ${columns.length}`);
  }

  const [chrom = "", rawPos = "", id = "", ref = "", rawAlt = "", rawQual = "", rawFilter = "", rawInfo = ""] =
    columns;

  if (chrom.length === 0) throw fail("CHROM must not be empty");
  if (!/^\d+$/.test(rawPos) || Number(rawPos) < 1) {
    throw fail(`POS must be a positive integer, got '${rawPos}'`);
  }
  if (ref.length === 0) throw fail("REF must not be empty");

  let qual: number | undefined;
  if (rawQual !== ".") {
    qual = Number(rawQual);
    if (rawQual.trim().length === 0 || !Number.isFinite(qual)) {
      throw fail(`QUAL must be a number or '.', got '${rawQual}'`);
    }
  }

  const format = columns.length > 8 && columns[8] !== "." ? (columns[8] ?? "").split(":") : [];
  const samples: SampleData[] = [];
  for (let i = 9; i < columns.length; i++) {
    samples.push(parseSampleColumn(columns[i] ?? ".", format, fail));
  }

  return {
    chrom,
    pos: Number(rawPos),
    id: id.length === 0 ? "." : id,
    ref,
    alt: rawAlt === "." || rawAlt === "" ? [] : rawAlt.split(","),
    ...(qual !== undefined ? { qual } : {}),
    filter: rawFilter === "." || rawFilter === "" ? [] : [...new Set(rawFilter.split(";"))],
    info: parseInfo(rawInfo),
    format,
    samples,
    ...(lineNumber !== undefined ? { lineNumber } : {}),
  };
}

/**
 * Parse an INFO column; list values are split on `,`, bare keys are flags
 */
export function parseInfo(raw: string): Map<string, InfoValue> {
  const info = new Map<string, InfoValue>();
  if (raw === "." || raw === "") return info;

  for (const entry of raw.split(";")) {
    if (entry.length === 0) continue;
    const eq = entry.indexOf("=");
    const key = eq === -1 ? entry : entry.slice(0, eq);
    if (info.has(key)) continue;
    if (eq === -1) {
      info.set(key, true);
    } else {
      const value = entry.slice(eq + 1);
      info.set(key, value.includes(",") ? value.split(",") : value);
    }
  }
  return info;
}

function parseSampleColumn(
  raw: string,
  format: readonly string[],
  fail: (message: string) => VcfFormatError
): SampleData {
  const sample = new Map<string, string>();
  if (format.length === 0) return sample;

  const values = raw.split(":");
  if (values.length > format.length) {
    throw fail(`Sample column has ${values.length} values but FORMAT declares ${format.length} keys`);
  }
  values.forEach((value, index) => {
    const key = format[index];
    if (key !== undefined) sample.set(key, value);
  });
  return sample;
}

function parseFileformat(line: string, lineNumber: number, filePath?: string): string {
  if (!line.startsWith("##fileformat=")) {
    throw new VcfFormatError("First header line must be ##fileformat=VCFv4.x", lineNumber, line, filePath);
  }
  const value = line.slice("##fileformat=".length).trim();
  if (!/^VCFv\d+\.\d+$/.test(value)) {
    throw new VcfFormatError(`Invalid ##fileformat value '${value}'`, lineNumber, line, filePath);
  }
  return value;
}

function parseColumnHeader(line: string, lineNumber: number, filePath?: string): string[] {
  const columns = line.slice(1).split("\t");

  const fixedMatches = FIXED_COLUMNS.every((name, index) => columns[index] === name);
  if (!fixedMatches) {
    throw new VcfFormatError(
      `#CHROM line must start with ${FIXED_COLUMNS.join("\\t")}`,
      lineNumber,
      line,
      filePath
    );
  }
  if (columns.length > 8 && columns[8] !== "FORMAT") {
    throw new VcfFormatError("Ninth header column must be FORMAT", lineNumber, line, filePath);
  }

  const samples = columns.slice(9);
  if (samples.some((name) => name.length === 0)) {
    throw new VcfFormatError("Empty sample name in #CHROM line", lineNumber, line, filePath);
  }
  const seen = new Set<string>();
  const duplicates = new Set<string>();
  for (const name of samples) {
    if (seen.has(name)) duplicates.add(name);
    seen.add(name);
  }
  if (duplicates.size > 0) {
    throw new VcfFormatError(
      `Duplicate sample names in header: ${[...duplicates].join(", ")}`,
      lineNumber,
      line,
      filePath
    );
  }
  return columns;
}

/**
 * Warns once per undeclared contig, INFO key or FORMAT key, for each kind
 * the header declares at all
 */
class DeclarationChecker {
  private readonly contigs: ReadonlySet<string>;
  private readonly infoKeys: ReadonlySet<string>;
  private readonly formatKeys: ReadonlySet<string>;
  private readonly reported = new Set<string>();

  constructor(
    header: VcfHeader,
    private readonly onWarning: (warning: string, lineNumber?: number) => void
  ) {
    this.contigs = new Set(getContigIds(header));
    this.infoKeys = new Set(getInfoDefinitions(header).map((definition) => definition.id));
    this.formatKeys = new Set(getFormatDefinitions(header).map((definition) => definition.id));
  }

  check(record: VcfRecord): void {
    if (this.contigs.size > 0 && !this.contigs.has(record.chrom)) {
      this.report("contig", record.chrom, record.lineNumber);
    }
    if (this.infoKeys.size > 0) {
      for (const key of record.info.keys()) {
        if (!this.infoKeys.has(key)) this.report("INFO", key, record.lineNumber);
      }
    }
    if (this.formatKeys.size > 0) {
      for (const key of record.format) {
        if (!this.formatKeys.has(key)) this.report("FORMAT", key, record.lineNumber);
      }
    }
  }

  private report(kind: "contig" | "INFO" | "FORMAT", name: string, lineNumber?: number): void {
    const identity = `${kind}:${name}`;
    if (this.reported.has(identity)) return;
    this.reported.add(identity);
    this.onWarning(`${kind} '${name}' is not declared in the header`, lineNumber);
  }
}

async function* fromIterable(lines: Iterable<string>): AsyncGenerator<string, void, undefined> {
  yield* lines;
}

/**
 * Open a VCF file (plain, gzip or BGZF)
 *
 * @throws {FileError} If the file is missing or unreadable
 * @throws {VcfFormatError} If the header is malformed
 */
export async function openVcf(path: string, options: VcfParserOptions = {}): Promise<VcfSource> {
  return new VcfParser(options).parseFile(path, options.fileOptions ?? {});
}

/**
 * Parse VCF text held in memory
 */
export async function parseVcfString(text: string, options: VcfParserOptions = {}): Promise<VcfSource> {
  return new VcfParser(options).parseString(text);
}
