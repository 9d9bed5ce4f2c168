/**
 * VCF header helpers: meta-line parsing and formatting, declaration lookup
 */

import type { ContigDefinition, FieldDefinition, VcfHeader, VcfMetaLine } from "./types";

export const FIXED_COLUMNS = ["CHROM", "POS", "ID", "REF", "ALT", "QUAL", "FILTER", "INFO"] as const;

const ALWAYS_QUOTED = new Set(["Description", "Source", "Version"]);

/**
 * Parse the text after `##`
 *
 * @returns `undefined` when the line has no `=`
 */
export function parseMetaLine(line: string): VcfMetaLine | undefined {
  const body = line.startsWith("##") ? line.slice(2) : line;
  const eq = body.indexOf("=");
  if (eq <= 0) {
    return undefined;
  }

  const key = body.slice(0, eq);
  const value = body.slice(eq + 1);
  if (value.startsWith("<") && value.endsWith(">")) {
    const fields = parseStructuredValue(value.slice(1, -1));
    if (fields !== undefined) {
      return { key, value, fields };
    }
  }
  return { key, value };
}

/**
 * Split `ID=x,Description="a, b"` into fields, honouring quotes
 *
 * @returns `undefined` when a quote is left open
 */
export function parseStructuredValue(text: string): Map<string, string> | undefined {
  const fields = new Map<string, string>();
  let index = 0;

  while (index < text.length) {
    const eq = text.indexOf("=", index);
    if (eq === -1) {
      const name = text.slice(index).trim();
      if (name.length > 0) fields.set(name, "");
      break;
    }
    const name = text.slice(index, eq).trim();
    let cursor = eq + 1;
    let value = "";

    if (text[cursor] === '"') {
      cursor++;
      let closed = false;
      while (cursor < text.length) {
        const char = text[cursor];
        if (char === "\\" && cursor + 1 < text.length) {
          value += text[cursor + 1];
          cursor += 2;
          continue;
        }
        if (char === '"') {
          closed = true;
          cursor++;
          break;
        }
        value += char;
        cursor++;
      }
      if (!closed) return undefined;
      const comma = text.indexOf(",", cursor);
      index = comma === -1 ? text.length : comma + 1;
    } else {
      const comma = text.indexOf(",", cursor);
      value = comma === -1 ? text.slice(cursor) : text.slice(cursor, comma);
      index = comma === -1 ? text.length : comma + 1;
    }
    fields.set(name, value);
  }
  return fields;
}

/**
 * Build a structured meta line from fields
 */
export function createStructuredMeta(key: string, fields: ReadonlyMap<string, string>): VcfMetaLine {
  const parts: string[] = [];
  for (const [name, value] of fields) {
    parts.push(`${name}=${needsQuotes(name, value) ? `"${value.replace(/(["\\])/g, "\\$1")}"` : value}`);
  }
  return { key, value: `<${parts.join(",")}>`, fields: new Map(fields) };
}

function needsQuotes(name: string, value: string): boolean {
  return ALWAYS_QUOTED.has(name) || /[\s,"<>=]/.test(value);
}

export function formatMetaLine(meta: VcfMetaLine): string {
  return `##${meta.key}=${meta.value}`;
}

/**
 * The `#CHROM` column header line
 */
export function formatColumnHeader(samples: readonly string[]): string {
  const columns: string[] = [...FIXED_COLUMNS];
  if (samples.length > 0) {
    columns.push("FORMAT", ...samples);
  }
  return `#${columns.join("\t")}`;
}

/**
 * All header lines, `##fileformat` first and `#CHROM` last
 */
export function formatHeaderLines(header: VcfHeader): string[] {
  return [
    `##fileformat=${header.fileformat}`,
    ...header.meta.map(formatMetaLine),
    formatColumnHeader(header.samples),
  ];
}

/**
 * Declared contigs in header order
 */
export function getContigs(header: VcfHeader): ContigDefinition[] {
  const contigs: ContigDefinition[] = [];
  for (const meta of header.meta) {
    const id = meta.key === "contig" ? meta.fields?.get("ID") : undefined;
    if (id === undefined || id === "") continue;

    const rawLength = meta.fields?.get("length");
    const length = rawLength !== undefined && /^\d+$/.test(rawLength) ? Number(rawLength) : undefined;
    contigs.push(length !== undefined ? { id, length } : { id });
  }
  return contigs;
}

export function getContigIds(header: VcfHeader): string[] {
  return getContigs(header).map((contig) => contig.id);
}

/**
 * `##INFO` declarations
 */
export function getInfoDefinitions(header: VcfHeader): FieldDefinition[] {
  return getFieldDefinitions(header, "INFO");
}

/**
 * `##FORMAT` declarations
 */
export function getFormatDefinitions(header: VcfHeader): FieldDefinition[] {
  return getFieldDefinitions(header, "FORMAT");
}

function getFieldDefinitions(header: VcfHeader, key: "INFO" | "FORMAT"): FieldDefinition[] {
  const definitions: FieldDefinition[] = [];
  for (const meta of header.meta) {
    if (meta.key !== key || meta.fields === undefined) continue;
    const id = meta.fields.get("ID");
    if (id === undefined) continue;
    definitions.push({
      id,
      number: meta.fields.get("Number") ?? ".",
      type: meta.fields.get("Type") ?? "String",
      description: meta.fields.get("Description") ?? "",
    });
  }
  return definitions;
}

/**
 * Copy of `header` with a new sample list
 */
export function withSamples(header: VcfHeader, samples: readonly string[]): VcfHeader {
  return { ...header, samples: [...samples] };
}

/**
 * Copy of `header` with one more meta line, placed after the last line with
 * the same key (or at the end)
 */
export function addMetaLine(header: VcfHeader, line: VcfMetaLine): VcfHeader {
  const meta = [...header.meta];
  let insertAt = meta.length;
  for (let i = meta.length - 1; i >= 0; i--) {
    if (meta[i]?.key === line.key) {
      insertAt = i + 1;
      break;
    }
  }
  meta.splice(insertAt, 0, line);
  return { ...header, meta };
}

/**
 * Union of the meta lines of several headers
 *
 * Structured lines are keyed by `key` and `ID`; the first declaration wins.
 * Unstructured lines are de-duplicated by their full text.
 */
export function mergeHeaders(headers: readonly VcfHeader[], samples: readonly string[]): VcfHeader {
  const first = headers[0];
  if (first === undefined) {
    return { fileformat: "VCFv4.2", meta: [], samples: [...samples] };
  }

  const seen = new Set<string>();
  const meta: VcfMetaLine[] = [];
  for (const header of headers) {
    for (const line of header.meta) {
      const id = line.fields?.get("ID");
      const identity = id !== undefined ? `${line.key}\u0000${id}` : formatMetaLine(line);
      if (seen.has(identity)) continue;
      seen.add(identity);
      meta.push(line);
    }
  }
  return { fileformat: first.fileformat, meta, samples: [...samples] };
}
