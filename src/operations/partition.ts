/**
 * Chromosome partitioning and per-chromosome file output
 *
 * Partitioning groups *contiguous runs* of records: a chromosome that shows
 * up again after another one starts a new group. Groups share the upstream
 * iterator, so each group must be read before the next is requested; asking
 * for the next group drains whatever the consumer left of the current one.
 */

import { join } from "node:path";
import { type } from "arktype";
import { ValidationError } from "../errors";
import type { VcfRecord, VcfSource } from "../formats/vcf/types";
import { writeVcf } from "../formats/vcf/writer";
import { ensureDirectory } from "../io/file-writer";
import { type SplitFile, type SplitOptions, SplitOptionsSchema, type SplitSummary } from "./types";

/**
 * One run of consecutive items sharing a key
 */
export interface Run<K, T> {
  readonly key: K;
  readonly items: AsyncIterable<T>;
}

/**
 * All records of one contiguous chromosome run
 */
export interface ChromosomeGroup {
  readonly chromosome: string;
  readonly records: AsyncIterable<VcfRecord>;
}

/**
 * Split a stream into runs of consecutive items with equal keys (`===`)
 *
 * `keyOf` receives the item's index in the whole stream.
 */
export async function* groupRuns<T, K>(
  source: AsyncIterable<T>,
  keyOf: (item: T, index: number) => K
): AsyncGenerator<Run<K, T>, void, undefined> {
  const iterator = source[Symbol.asyncIterator]();
  let current = await iterator.next();
  let index = 0;
  let runId = 0;
  let completed = false;

  const keyAt = (result: IteratorResult<T>): { key: K } | undefined =>
    result.done === true ? undefined : { key: keyOf(result.value, index) };

  try {
    let head = keyAt(current);
    while (head !== undefined) {
      const key = head.key;
      const id = ++runId;

      const items = async function* (): AsyncGenerator<T, void, undefined> {
        // a stale run must not read into a later run with the same key
        while (id === runId && head !== undefined && head.key === key && current.done !== true) {
          const item = current.value;
          current = await iterator.next();
          index++;
          head = keyAt(current);
          yield item;
        }
      };

      yield { key, items: items() };

      while (head !== undefined && head.key === key && current.done !== true) {
        current = await iterator.next();
        index++;
        head = keyAt(current);
      }
    }
    completed = true;
  } finally {
    if (!completed) {
      await iterator.return?.();
    }
  }
}

/**
 * One group per contiguous run of a chromosome, not one per chromosome
 *
 * Unsorted input that returns to a chromosome yields a second group with the
 * same name.
 *
 * @example
 * ```typescript
 * for await (const group of partitionByChromosome(source.records)) {
 *   let n = 0;
 *   for await (const _ of group.records) n++;
 *   console.log(group.chromosome, n);
 * }
 * ```
 */
export async function* partitionByChromosome(
  records: AsyncIterable<VcfRecord>
): AsyncGenerator<ChromosomeGroup, void, undefined> {
  for await (const run of groupRuns(records, (record) => record.chrom)) {
    yield { chromosome: run.key, records: run.items };
  }
}

/**
 * Write one file per chromosome, optionally in chunks of `maxRecords`
 *
 * File names are `<prefix><chrom><ext>`, or `<prefix><chrom>.<n><ext>` when
 * chunked. Characters outside `[A-Za-z0-9._-]` in the chromosome name become
 * `_`. Input must be grouped by chromosome.
 *
 * @throws {ValidationError} If options are invalid, a chromosome reappears
 * after another one, or two chromosomes map to the same file name
 */
export async function splitByChromosome(source: VcfSource, options: SplitOptions): Promise<SplitSummary> {
  const validated = SplitOptionsSchema(options);
  if (validated instanceof type.errors) {
    throw new ValidationError(`Invalid split options: ${validated.summary}`);
  }

  const prefix = options.prefix ?? "";
  const extension = options.extension ?? ".vcf";
  const maxRecords = options.maxRecords;
  const writeOptions = options.writeOptions ?? {};

  await ensureDirectory(options.outputDir);

  const files: SplitFile[] = [];
  const finished = new Set<string>();
  const fileNames = new Map<string, string>();
  let totalRecords = 0;

  for await (const group of partitionByChromosome(source.records)) {
    if (finished.has(group.chromosome)) {
      throw new ValidationError(
        `Chromosome '${group.chromosome}' appears again after other chromosomes; input must be grouped by chromosome`
      );
    }
    finished.add(group.chromosome);

    const name = `${prefix}${safeFileName(group.chromosome)}`;
    const owner = fileNames.get(name);
    if (owner !== undefined) {
      throw new ValidationError(
        `Chromosomes '${owner}' and '${group.chromosome}' both map to file name '${name}'`
      );
    }
    fileNames.set(name, group.chromosome);

    if (maxRecords === undefined) {
      const path = join(options.outputDir, `${name}${extension}`);
      const summary = await writeVcf({ header: source.header, records: group.records }, path, writeOptions);
      files.push({ path, chromosome: group.chromosome, records: summary.records });
      totalRecords += summary.records;
      continue;
    }

    for await (const chunk of groupRuns(group.records, (_record, index) => Math.floor(index / maxRecords))) {
      const part = chunk.key + 1;
      const path = join(options.outputDir, `${name}.${part}${extension}`);
      const summary = await writeVcf({ header: source.header, records: chunk.items }, path, writeOptions);
      files.push({ path, chromosome: group.chromosome, part, records: summary.records });
      totalRecords += summary.records;
    }
  }

  return { files, totalRecords };
}

function safeFileName(chromosome: string): string {
  return chromosome.replace(/[^A-Za-z0-9._-]/g, "_");
}
