/**
 * Combining several VCF inputs: sorted merge and concatenation
 *
 * Merging is a k-way merge over inputs sorted by chromosome then position,
 * holding one buffered record per input. Chromosome order follows the
 * `##contig` lines of the merged header; chromosomes it does not declare
 * fall back to natural order (`chr2` before `chr10`).
 */

import { type } from "arktype";
import { MergeError, OverlapError, SampleMismatchError, ValidationError } from "../errors";
import { getContigIds, mergeHeaders } from "../formats/vcf/header";
import { missingGenotype, remapGenotype } from "../formats/vcf/genotype";
import type { SampleData, VcfHeader, VcfRecord, VcfSource } from "../formats/vcf/types";
import { closeSource } from "../formats/vcf/parser";
import { filterRegions } from "./region";
import { type ConcatOptions, type MergeMode, type MergeOptions, MergeOptionsSchema } from "./types";

// =============================================================================
// CHROMOSOME ORDER
// =============================================================================

/**
 * Compare chromosome names by natural order
 */
export function naturalCompare(a: string, b: string): number {
  const left = a.match(/\d+|\D+/g) ?? [];
  const right = b.match(/\d+|\D+/g) ?? [];
  const length = Math.min(left.length, right.length);

  for (let i = 0; i < length; i++) {
    const x = left[i] ?? "";
    const y = right[i] ?? "";
    if (x === y) continue;
    const xNumeric = /^\d/.test(x);
    const yNumeric = /^\d/.test(y);
    if (xNumeric && yNumeric) {
      const difference = Number(x) - Number(y);
      if (difference !== 0) return difference;
      return x.length - y.length;
    }
    return x < y ? -1 : 1;
  }
  return left.length - right.length;
}

/**
 * Order of chromosomes: declared contigs in header order, then every
 * undeclared chromosome in natural order
 */
export function createChromosomeComparator(contigs: readonly string[]): (a: string, b: string) => number {
  const rank = new Map(contigs.map((id, index) => [id, index] as const));
  return (a, b) => {
    if (a === b) return 0;
    const rankA = rank.get(a);
    const rankB = rank.get(b);
    if (rankA !== undefined && rankB !== undefined) return rankA - rankB;
    if (rankA !== undefined) return -1;
    if (rankB !== undefined) return 1;
    return naturalCompare(a, b);
  };
}

// =============================================================================
// MERGE
// =============================================================================

/**
 * Merge inputs sorted by chromosome and position into one sorted stream
 *
 * `same-samples-disjoint-sites` requires identical sample lists and fails on
 * any site present in two inputs. `different-samples-union-sites` combines
 * the sample lists (first input's order, then new names as they appear) and
 * joins records at the same site: ALT alleles become their ordered union with
 * GT indices remapped, and samples absent from every input at that site get
 * `./.`.
 *
 * @throws {SampleMismatchError} Sample lists differ in disjoint mode
 * @throws {ValidationError} No inputs or an unknown mode
 *
 * Errors found while reading (unsorted input, overlap, REF disagreement) are
 * thrown from the record stream as MergeError or OverlapError.
 *
 * @example
 * ```typescript
 * const merged = mergeVcf([a, b], { mode: "different-samples-union-sites" });
 * await writeVcf(merged, "merged.vcf.gz");
 * ```
 */
export function mergeVcf(sources: readonly VcfSource[], options: MergeOptions = {}): VcfSource {
  const validated = MergeOptionsSchema(options);
  if (validated instanceof type.errors) {
    throw new ValidationError(`Invalid merge options: ${validated.summary}`);
  }
  if (sources.length === 0) {
    throw new ValidationError("Merge needs at least one input");
  }

  const mode: MergeMode = options.mode ?? "same-samples-disjoint-sites";
  const headers = sources.map((source) => source.header);
  const samples = mode === "same-samples-disjoint-sites" ? requireSameSamples(headers) : unionSamples(headers);
  const header = mergeHeaders(headers, samples);
  const compareChrom = createChromosomeComparator(getContigIds(header));

  return {
    header,
    records: mergeRecords(sources, header, mode, compareChrom),
  };
}

function requireSameSamples(headers: readonly VcfHeader[]): readonly string[] {
  const first = headers[0]?.samples ?? [];
  headers.forEach((header, index) => {
    if (index === 0) return;
    const same =
      header.samples.length === first.length && header.samples.every((name, i) => name === first[i]);
    if (!same) {
      throw new SampleMismatchError(
        `Sample list differs from input #1 (${header.samples.length} vs ${first.length} samples)`,
        index
      );
    }
  });
  return first;
}

function unionSamples(headers: readonly VcfHeader[]): string[] {
  const seen = new Set<string>();
  const names: string[] = [];
  for (const header of headers) {
    for (const name of header.samples) {
      if (!seen.has(name)) {
        seen.add(name);
        names.push(name);
      }
    }
  }
  return names;
}

interface MergeInput {
  readonly index: number;
  readonly iterator: AsyncIterator<VcfRecord>;
  readonly sampleIndex: ReadonlyMap<string, number>;
  pending: VcfRecord | undefined;
  previous: VcfRecord | undefined;
  exhausted: boolean;
}

async function* mergeRecords(
  sources: readonly VcfSource[],
  header: VcfHeader,
  mode: MergeMode,
  compareChrom: (a: string, b: string) => number
): AsyncGenerator<VcfRecord, void, undefined> {
  const inputs: MergeInput[] = sources.map((source, index) => ({
    index,
    iterator: source.records[Symbol.asyncIterator](),
    sampleIndex: new Map(source.header.samples.map((name, i) => [name, i] as const)),
    pending: undefined,
    previous: undefined,
    exhausted: false,
  }));

  const compareSite = (a: VcfRecord, b: VcfRecord): number =>
    a.chrom === b.chrom ? a.pos - b.pos : compareChrom(a.chrom, b.chrom);

  const refill = async (input: MergeInput): Promise<void> => {
    if (input.pending !== undefined || input.exhausted) return;
    const next = await input.iterator.next();
    if (next.done === true) {
      input.exhausted = true;
      return;
    }
    const record = next.value;
    if (input.previous !== undefined && compareSite(input.previous, record) > 0) {
      throw new MergeError(
        `Input #${input.index + 1} is not sorted: ${record.chrom}:${record.pos} follows ${input.previous.chrom}:${input.previous.pos}`,
        input.index,
        record.lineNumber
      );
    }
    input.previous = record;
    input.pending = record;
  };

  let completed = false;
  try {
    while (true) {
      for (const input of inputs) {
        await refill(input);
      }

      let lowest: VcfRecord | undefined;
      for (const input of inputs) {
        if (input.pending !== undefined && (lowest === undefined || compareSite(input.pending, lowest) < 0)) {
          lowest = input.pending;
        }
      }
      if (lowest === undefined) break;

      const site = lowest;
      const contributing = inputs.filter(
        (input) => input.pending !== undefined && compareSite(input.pending, site) === 0
      );

      if (mode === "same-samples-disjoint-sites") {
        if (contributing.length > 1) {
          throw new OverlapError(
            "Records at the same site in several inputs",
            site.chrom,
            site.pos,
            contributing.map((input) => input.index)
          );
        }
        const only = contributing[0];
        if (only !== undefined) only.pending = undefined;
        yield site;
        continue;
      }

      yield joinSite(contributing, header.samples);
      for (const input of contributing) {
        input.pending = undefined;
      }
    }
    completed = true;
  } finally {
    if (!completed) {
      await Promise.all(inputs.map((input) => input.iterator.return?.()));
    }
  }
}

/**
 * Join the buffered records of every input at one site
 *
 * Site-level columns (ID, QUAL, FILTER, INFO) come from the first input
 * holding a record there.
 */
function joinSite(contributing: readonly MergeInput[], samples: readonly string[]): VcfRecord {
  const records = contributing.flatMap((input) => (input.pending !== undefined ? [input.pending] : []));
  const first = records[0];
  if (first === undefined) {
    throw new ValidationError("No records to join");
  }

  for (const record of records) {
    if (record.ref !== first.ref) {
      throw new OverlapError(
        `REF alleles disagree (${first.ref} vs ${record.ref})`,
        first.chrom,
        first.pos,
        contributing.map((input) => input.index)
      );
    }
  }

  const alt: string[] = [];
  const format: string[] = [];
  for (const record of records) {
    for (const allele of record.alt) {
      if (!alt.includes(allele)) alt.push(allele);
    }
    for (const key of record.format) {
      if (!format.includes(key)) format.push(key);
    }
  }
  // GT must lead FORMAT when present
  const gt = format.indexOf("GT");
  if (gt > 0) {
    format.splice(gt, 1);
    format.unshift("GT");
  }

  const owners = new Map<string, { input: MergeInput; record: VcfRecord; indexMap: number[] }>();
  for (const input of contributing) {
    const record = input.pending;
    if (record === undefined) continue;
    const indexMap = [0, ...record.alt.map((allele) => alt.indexOf(allele) + 1)];
    for (const name of input.sampleIndex.keys()) {
      if (!owners.has(name)) owners.set(name, { input, record, indexMap });
    }
  }

  const hasGenotype = format.includes("GT");
  const merged: SampleData[] = samples.map((name) => {
    const owner = owners.get(name);
    const column = owner?.input.sampleIndex.get(name);
    const sample = column !== undefined ? owner?.record.samples[column] : undefined;
    if (owner === undefined || sample === undefined) {
      return hasGenotype ? new Map([["GT", missingGenotype(2)]]) : new Map<string, string>();
    }
    const gtValue = sample.get("GT");
    if (gtValue === undefined) {
      return sample;
    }
    const remapped = new Map(sample);
    remapped.set("GT", remapGenotype(gtValue, owner.indexMap));
    return remapped;
  });

  return {
    chrom: first.chrom,
    pos: first.pos,
    id: first.id,
    ref: first.ref,
    alt,
    ...(first.qual !== undefined && { qual: first.qual }),
    filter: first.filter,
    info: first.info,
    format: merged.length > 0 ? format : [],
    samples: merged,
  };
}

// =============================================================================
// CONCAT
// =============================================================================

/**
 * Emit every input's records in turn (`bcftools concat`)
 *
 * Inputs must share one sample list. With `intervals`, only records inside
 * them are kept, and interval chromosomes the merged header lacks are
 * reported through `onWarning`. Inputs not yet reached are released when the
 * stream stops early or fails.
 *
 * @throws {SampleMismatchError} If sample lists differ
 */
export function concatVcf(sources: readonly VcfSource[], options: ConcatOptions = {}): VcfSource {
  if (sources.length === 0) {
    throw new ValidationError("Concat needs at least one input");
  }

  const headers = sources.map((source) => source.header);
  const header = mergeHeaders(headers, requireSameSamples(headers));

  async function* chained(): AsyncGenerator<VcfRecord, void, undefined> {
    let current = 0;
    try {
      for (const [position, source] of sources.entries()) {
        current = position;
        yield* source.records;
      }
    } finally {
      await Promise.all(sources.slice(current + 1).map((source) => closeSource(source)));
    }
  }

  const joined: VcfSource = { header, records: chained() };
  if (options.intervals === undefined) {
    return joined;
  }
  return filterRegions(joined, options.intervals, options);
}
