/**
 * Sample projection: keep, remove and rename sample columns
 *
 * Mirrors `bcftools view -s / -S`, `bcftools view -s ^...` and
 * `bcftools reheader -s`. Unknown names are checked against the header when
 * the transform is built, before any record is read.
 */

import { DuplicateSampleError, UnknownSampleError } from "../errors";
import { withSamples } from "../formats/vcf/header";
import type { SampleData, VcfRecord, VcfSource } from "../formats/vcf/types";
import type { WarningOptions } from "../types";
import { resolveWarning } from "./types";

const EMPTY_SAMPLE: SampleData = new Map();

/**
 * Keep only the named samples, in header order
 *
 * Names requested more than once are kept once.
 *
 * @throws {UnknownSampleError} Listing every name the header lacks
 *
 * @example
 * ```typescript
 * const subset = keepSamples(source, ["NA001", "NA003"]);
 * ```
 */
export function keepSamples(source: VcfSource, names: Iterable<string>): VcfSource {
  const requested = checkKnown(source.header.samples, names);
  const indices = indicesWhere(source.header.samples, (name) => requested.has(name));
  return selectSamples(source, indices);
}

/**
 * Drop the named samples, keeping the rest in header order
 *
 * @throws {UnknownSampleError} Listing every name the header lacks
 */
export function removeSamples(source: VcfSource, names: Iterable<string>): VcfSource {
  const requested = checkKnown(source.header.samples, names);
  const indices = indicesWhere(source.header.samples, (name) => !requested.has(name));
  return selectSamples(source, indices);
}

/**
 * Rename samples through an old → new mapping
 *
 * Unmapped names pass through. Mapping entries for names the header lacks
 * are skipped with a warning, so applying the same mapping twice changes
 * nothing the second time.
 *
 * @throws {DuplicateSampleError} If two columns would end up with one name
 */
export function renameSamples(
  source: VcfSource,
  mapping: ReadonlyMap<string, string> | Readonly<Record<string, string>>,
  options: WarningOptions = {}
): VcfSource {
  const onWarning = resolveWarning(options);
  const entries = mapping instanceof Map ? mapping : new Map(Object.entries(mapping));
  const present = new Set(source.header.samples);

  for (const from of entries.keys()) {
    if (!present.has(from)) {
      onWarning(`Sample '${from}' not found in header; rename entry skipped`);
    }
  }

  const renamed = source.header.samples.map((name) => entries.get(name) ?? name);
  const duplicates = findDuplicates(renamed);
  if (duplicates.length > 0) {
    throw new DuplicateSampleError(duplicates);
  }

  return { header: withSamples(source.header, renamed), records: source.records };
}

function checkKnown(available: readonly string[], names: Iterable<string>): Set<string> {
  const requested = new Set(names);
  const known = new Set(available);
  const unknown = [...requested].filter((name) => !known.has(name));
  if (unknown.length > 0) {
    throw new UnknownSampleError(unknown, available);
  }
  return requested;
}

function indicesWhere(names: readonly string[], predicate: (name: string) => boolean): number[] {
  const indices: number[] = [];
  names.forEach((name, index) => {
    if (predicate(name)) indices.push(index);
  });
  return indices;
}

function findDuplicates(names: readonly string[]): string[] {
  const seen = new Set<string>();
  const duplicates = new Set<string>();
  for (const name of names) {
    if (seen.has(name)) duplicates.add(name);
    seen.add(name);
  }
  return [...duplicates];
}

/**
 * Project header and records onto the sample columns at `indices`
 */
export function selectSamples(source: VcfSource, indices: readonly number[]): VcfSource {
  const names = indices.map((index) => source.header.samples[index] ?? "");

  async function* project(records: AsyncIterable<VcfRecord>): AsyncGenerator<VcfRecord, void, undefined> {
    for await (const record of records) {
      yield {
        ...record,
        samples: indices.map((index) => record.samples[index] ?? EMPTY_SAMPLE),
      };
    }
  }

  return { header: withSamples(source.header, names), records: project(source.records) };
}
