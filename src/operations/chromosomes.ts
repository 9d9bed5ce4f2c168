/**
 * Chromosome renaming (`bcftools annotate --rename-chrs`)
 */

import { ChromMismatchError, ValidationError } from "../errors";
import { createStructuredMeta, getContigIds } from "../formats/vcf/header";
import type { VcfHeader, VcfMetaLine, VcfRecord, VcfSource } from "../formats/vcf/types";
import type { WarningOptions } from "../types";
import { resolveWarning } from "./types";

/**
 * Rename chromosomes in `##contig` lines and record CHROM values
 *
 * Names without a mapping entry are kept. Entries naming a contig the header
 * lacks are reported through `onWarning`; when the header declares no
 * contigs, entries never seen in the records are reported after the last
 * record.
 *
 * @throws {ValidationError} If two contigs would share a name after renaming
 *
 * @example
 * ```typescript
 * const ucsc = renameChromosomes(source, new Map([["1", "chr1"], ["2", "chr2"]]));
 * ```
 */
export function renameChromosomes(
  source: VcfSource,
  mapping: ReadonlyMap<string, string> | Readonly<Record<string, string>>,
  options: WarningOptions = {}
): VcfSource {
  const onWarning = resolveWarning(options);
  const entries: ReadonlyMap<string, string> = mapping instanceof Map ? mapping : new Map(Object.entries(mapping));
  const contigs = getContigIds(source.header);

  if (contigs.length > 0) {
    const declared = new Set(contigs);
    for (const from of entries.keys()) {
      if (!declared.has(from)) {
        onWarning(new ChromMismatchError(from, "rename", contigs).message);
      }
    }

    const renamed = contigs.map((id) => entries.get(id) ?? id);
    const clashes = renamed.filter((id, index) => renamed.indexOf(id) !== index);
    if (clashes.length > 0) {
      throw new ValidationError(`Chromosome rename produces duplicate contigs: ${[...new Set(clashes)].join(", ")}`);
    }
  }

  const header: VcfHeader = {
    ...source.header,
    meta: source.header.meta.map((line) => renameContigLine(line, entries)),
  };

  async function* renamedRecords(): AsyncGenerator<VcfRecord, void, undefined> {
    const seen = new Set<string>();
    for await (const record of source.records) {
      seen.add(record.chrom);
      const chrom = entries.get(record.chrom);
      yield chrom === undefined ? record : { ...record, chrom };
    }

    if (contigs.length === 0) {
      const observed = [...seen];
      for (const from of entries.keys()) {
        if (!seen.has(from)) {
          onWarning(new ChromMismatchError(from, "rename", observed).message);
        }
      }
    }
  }

  return { header, records: renamedRecords() };
}

function renameContigLine(line: VcfMetaLine, entries: ReadonlyMap<string, string>): VcfMetaLine {
  const id = line.key === "contig" ? line.fields?.get("ID") : undefined;
  const to = id !== undefined ? entries.get(id) : undefined;
  if (line.fields === undefined || to === undefined) {
    return line;
  }
  const fields = new Map(line.fields);
  fields.set("ID", to);
  return createStructuredMeta(line.key, fields);
}
