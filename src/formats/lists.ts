/**
 * Plain-text list inputs: regions, sample names, sites and rename maps
 *
 * Blank lines and `#` comments are skipped everywhere. Region files with a
 * `.bed` extension are 0-based half-open; every other interval input is
 * 1-based inclusive.
 */

import { type } from "arktype";
import { ValidationError } from "../errors";
import { readToString } from "../io/file-reader";
import type { Interval, Site } from "../types";
import { IntervalSchema } from "../types";

/** End coordinate used for a region naming a whole chromosome */
export const CHROMOSOME_END = Number.MAX_SAFE_INTEGER;

/**
 * Options shared by the list parsers
 */
export interface ListParseOptions {
  /** File name used in error messages */
  source?: string;
}

export interface IntervalParseOptions extends ListParseOptions {
  /** Columns are BED (0-based start, exclusive end) */
  bed?: boolean;
}

interface ListLine {
  readonly text: string;
  readonly lineNumber: number;
}

function* contentLines(text: string, skipTrackLines = false): Generator<ListLine> {
  const lines = text.split(/\r?\n/);
  for (let i = 0; i < lines.length; i++) {
    const trimmed = (lines[i] ?? "").trim();
    if (trimmed.length === 0 || trimmed.startsWith("#")) continue;
    if (skipTrackLines && (trimmed.startsWith("track") || trimmed.startsWith("browser"))) continue;
    yield { text: trimmed, lineNumber: i + 1 };
  }
}

function listError(message: string, line: ListLine, options: ListParseOptions): ValidationError {
  const where = options.source !== undefined ? `${options.source}:${line.lineNumber}: ` : "";
  return new ValidationError(`${where}${message}`, line.lineNumber, line.text);
}

function parseCoordinate(text: string): number | undefined {
  const cleaned = text.replace(/,/g, "");
  return /^\d+$/.test(cleaned) ? Number(cleaned) : undefined;
}

function validateInterval(interval: Interval): Interval | string {
  const result = IntervalSchema(interval);
  if (result instanceof type.errors) {
    return result.summary;
  }
  return interval;
}

/**
 * Parse a region string: `chr`, `chr:pos` or `chr:start-end` (1-based, inclusive)
 *
 * A chromosome name that itself contains `:` is kept whole when the text
 * after the last `:` is not a position or range.
 *
 * @throws {ValidationError} If the coordinates are invalid
 *
 * @example
 * ```typescript
 * parseRegion("chr1:1,000-2,000"); // { chromosome: "chr1", start: 1000, end: 2000 }
 * parseRegion("chrX");             // whole chromosome
 * ```
 */
export function parseRegion(text: string): Interval {
  const trimmed = text.trim();
  if (trimmed.length === 0) {
    throw new ValidationError("Region must not be empty");
  }

  const colon = trimmed.lastIndexOf(":");
  let interval: Interval = { chromosome: trimmed, start: 1, end: CHROMOSOME_END };

  if (colon > 0) {
    const chromosome = trimmed.slice(0, colon);
    const range = trimmed.slice(colon + 1);
    const dash = range.indexOf("-");
    if (dash === -1) {
      const position = parseCoordinate(range);
      if (position !== undefined) {
        interval = { chromosome, start: position, end: position };
      }
    } else {
      const start = parseCoordinate(range.slice(0, dash));
      const endText = range.slice(dash + 1);
      const end = endText.length === 0 ? CHROMOSOME_END : parseCoordinate(endText);
      if (start !== undefined && end !== undefined) {
        interval = { chromosome, start, end };
      } else {
        throw new ValidationError(`Invalid region '${text}': expected chr:start-end`);
      }
    }
  }

  const validated = validateInterval(interval);
  if (typeof validated === "string") {
    throw new ValidationError(`Invalid region '${text}': ${validated}`);
  }
  return validated;
}

/**
 * Parse interval lines: a region string, `chrom pos`, or `chrom start end [...]`
 *
 * @throws {ValidationError} Naming the source and line of the first bad entry
 */
export function parseIntervals(text: string, options: IntervalParseOptions = {}): Interval[] {
  const intervals: Interval[] = [];

  for (const line of contentLines(text, options.bed === true)) {
    const columns = line.text.split(/\s+/);
    const chromosome = columns[0] ?? "";
    let interval: Interval;

    if (columns.length === 1) {
      try {
        interval = parseRegion(line.text);
      } catch (error) {
        throw listError(error instanceof Error ? error.message : String(error), line, options);
      }
    } else if (columns.length === 2) {
      const position = parseCoordinate(columns[1] ?? "");
      if (position === undefined) {
        throw listError(`Invalid position '${columns[1] ?? ""}'`, line, options);
      }
      interval = { chromosome, start: position, end: position };
    } else {
      const start = parseCoordinate(columns[1] ?? "");
      const end = parseCoordinate(columns[2] ?? "");
      if (start === undefined || end === undefined) {
        throw listError(`Invalid coordinates '${columns[1] ?? ""}' '${columns[2] ?? ""}'`, line, options);
      }
      // zero-length BED intervals cover no position
      if (options.bed === true && start === end) continue;
      interval = options.bed === true ? { chromosome, start: start + 1, end } : { chromosome, start, end };
    }

    const validated = validateInterval(interval);
    if (typeof validated === "string") {
      throw listError(validated, line, options);
    }
    intervals.push(validated);
  }
  return intervals;
}

/**
 * One sample name per line; only the first column is used
 */
export function parseSampleList(text: string): string[] {
  const names: string[] = [];
  for (const line of contentLines(text)) {
    const name = line.text.split(/\s+/)[0];
    if (name !== undefined && name.length > 0) names.push(name);
  }
  return names;
}

/**
 * Split a comma-separated sample argument (`--samples A,B,C`)
 */
export function parseSampleArgument(text: string): string[] {
  return text
    .split(",")
    .map((name) => name.trim())
    .filter((name) => name.length > 0);
}

/**
 * Two-column positions list (`chrom pos`)
 *
 * @throws {ValidationError} On a missing or non-positive position
 */
export function parseSites(text: string, options: ListParseOptions = {}): Site[] {
  const sites: Site[] = [];
  for (const line of contentLines(text)) {
    const [chromosome = "", rawPosition = ""] = line.text.split(/\s+/);
    const position = parseCoordinate(rawPosition);
    if (position === undefined || position < 1) {
      throw listError(`Expected 'chrom<TAB>pos', got '${line.text}'`, line, options);
    }
    sites.push({ chromosome, position });
  }
  return sites;
}

/**
 * Two-column rename map (`old new`)
 *
 * @throws {ValidationError} On a line without two columns or a repeated old name
 */
export function parseRenameMap(text: string, options: ListParseOptions = {}): Map<string, string> {
  const mapping = new Map<string, string>();
  for (const line of contentLines(text)) {
    const columns = line.text.split(/\s+/);
    const [from, to] = columns;
    if (columns.length !== 2 || from === undefined || to === undefined) {
      throw listError(`Expected 'old<TAB>new', got '${line.text}'`, line, options);
    }
    if (mapping.has(from)) {
      throw listError(`'${from}' is mapped more than once`, line, options);
    }
    mapping.set(from, to);
  }
  return mapping;
}

// =============================================================================
// FILE READERS
// =============================================================================

/**
 * Whether a region file uses BED coordinates, judged by its extension
 */
export function isBedPath(path: string): boolean {
  return /\.bed(\.b?gz)?$/i.test(path);
}

export async function readIntervalsFile(path: string): Promise<Interval[]> {
  return parseIntervals(await readToString(path), { source: path, bed: isBedPath(path) });
}

export async function readSampleListFile(path: string): Promise<string[]> {
  return parseSampleList(await readToString(path));
}

export async function readSitesFile(path: string): Promise<Site[]> {
  return parseSites(await readToString(path), { source: path });
}

export async function readRenameMapFile(path: string): Promise<Map<string, string>> {
  return parseRenameMap(await readToString(path), { source: path });
}
