/**
 * Field projection: render records through a `bcftools query`-style template
 *
 * Template syntax:
 *
 * | Token                         | Meaning                                        |
 * |-------------------------------|------------------------------------------------|
 * | `%CHROM` `%POS` `%ID` `%REF`  | Fixed columns                                  |
 * | `%ALT` `%QUAL` `%FILTER`      | Fixed columns (lists joined with `,` / `;`)    |
 * | `%INFO/KEY`                   | INFO value; a flag prints `1`                  |
 * | `%KEY`                        | INFO value outside `[...]`, FORMAT value inside |
 * | `[ ... ]`                     | Repeated once per sample                       |
 * | `%SAMPLE`                     | Sample name (inside `[...]` only)              |
 * | `%%` `\t` `\n` `\\`           | Literal `%`, tab, newline, backslash           |
 *
 * No newline is added after each record; end the template with `\n`.
 */

import { type } from "arktype";
import { ValidationError } from "../errors";
import type { InfoValue, SampleData, VcfHeader, VcfRecord, VcfSource } from "../formats/vcf/types";
import type { ProjectionOptions } from "./types";

const SITE_FIELDS = ["CHROM", "POS", "ID", "REF", "ALT", "QUAL", "FILTER"] as const;
type SiteField = (typeof SITE_FIELDS)[number];

const ProjectionOptionsSchema = type({
  "missing?": "string",
  "sampleSeparator?": "string",
});

/**
 * One piece of a compiled template
 */
export type TemplatePart =
  | { readonly kind: "literal"; readonly text: string }
  | { readonly kind: "site"; readonly field: SiteField }
  | { readonly kind: "info"; readonly key: string }
  | { readonly kind: "format"; readonly key: string }
  | { readonly kind: "sample-name" }
  | { readonly kind: "per-sample"; readonly parts: readonly TemplatePart[] };

export interface CompiledTemplate {
  readonly source: string;
  readonly parts: readonly TemplatePart[];
}

function isSiteField(name: string): name is SiteField {
  return SITE_FIELDS.some((field) => field === name);
}

const ESCAPES: Readonly<Record<string, string>> = { t: "\t", n: "\n", "\\": "\\" };

/**
 * Compile a template string
 *
 * @throws {ValidationError} On an unknown token, nested or unbalanced
 * brackets, or `%SAMPLE` outside brackets
 *
 * @example
 * ```typescript
 * compileTemplate("%CHROM\\t%POS[\\t%SAMPLE=%GT]\\n");
 * ```
 */
export function compileTemplate(template: string): CompiledTemplate {
  const top: TemplatePart[] = [];
  let inner: TemplatePart[] | undefined;
  let literal = "";
  let index = 0;

  const target = (): TemplatePart[] => inner ?? top;
  const flush = (): void => {
    if (literal.length > 0) {
      target().push({ kind: "literal", text: literal });
      literal = "";
    }
  };
  function fail(message: string): never {
    throw new ValidationError(`Invalid template at column ${index + 1}: ${message}`, undefined, template);
  }

  while (index < template.length) {
    const char = template[index] ?? "";

    if (char === "\\") {
      const next = template[index + 1];
      const escaped = next !== undefined ? ESCAPES[next] : undefined;
      if (escaped === undefined) fail(`unknown escape '\\${next ?? ""}'`);
      literal += escaped;
      index += 2;
      continue;
    }

    if (char === "[") {
      if (inner !== undefined) fail("nested '['");
      flush();
      inner = [];
      index++;
      continue;
    }

    if (char === "]") {
      if (inner === undefined) fail("']' without matching '['");
      flush();
      top.push({ kind: "per-sample", parts: inner });
      inner = undefined;
      index++;
      continue;
    }

    if (char !== "%") {
      literal += char;
      index++;
      continue;
    }

    if (template[index + 1] === "%") {
      literal += "%";
      index += 2;
      continue;
    }

    const match = /^%(INFO\/)?([A-Za-z_][A-Za-z0-9_.]*)/.exec(template.slice(index));
    if (match === null) {
      fail("expected a field name after '%'");
    }
    const whole = match[0];
    const infoPrefix = match[1] !== undefined;
    const name = match[2] ?? "";

    flush();
    if (infoPrefix) {
      target().push({ kind: "info", key: name });
    } else if (name === "SAMPLE") {
      if (inner === undefined) fail("%SAMPLE is only valid inside '[...]'");
      target().push({ kind: "sample-name" });
    } else if (isSiteField(name)) {
      target().push({ kind: "site", field: name });
    } else if (name === "INFO") {
      fail("%INFO needs a key (%INFO/KEY)");
    } else {
      target().push(inner !== undefined ? { kind: "format", key: name } : { kind: "info", key: name });
    }
    index += whole.length;
  }

  if (inner !== undefined) {
    fail("unclosed '['");
  }
  flush();
  return { source: template, parts: top };
}

/**
 * Renders records of one header through a compiled template
 */
export class FieldProjector {
  private readonly template: CompiledTemplate;
  private readonly missing: string;
  private readonly sampleSeparator: string;

  constructor(
    private readonly header: VcfHeader,
    template: string | CompiledTemplate,
    options: ProjectionOptions = {}
  ) {
    const validated = ProjectionOptionsSchema(options);
    if (validated instanceof type.errors) {
      throw new ValidationError(`Invalid projection options: ${validated.summary}`);
    }
    this.template = typeof template === "string" ? compileTemplate(template) : template;
    this.missing = options.missing ?? ".";
    this.sampleSeparator = options.sampleSeparator ?? "";
  }

  project(record: VcfRecord): string {
    return this.render(this.template.parts, record, undefined);
  }

  private render(
    parts: readonly TemplatePart[],
    record: VcfRecord,
    sample: { readonly name: string; readonly data: SampleData } | undefined
  ): string {
    let out = "";
    for (const part of parts) {
      switch (part.kind) {
        case "literal":
          out += part.text;
          break;
        case "site":
          out += this.siteValue(record, part.field);
          break;
        case "info":
          out += this.infoValue(record.info.get(part.key));
          break;
        case "format":
          out += sample?.data.get(part.key) ?? this.missing;
          break;
        case "sample-name":
          out += sample?.name ?? this.missing;
          break;
        case "per-sample":
          out += this.header.samples
            .map((name, i) =>
              this.render(part.parts, record, { name, data: record.samples[i] ?? new Map<string, string>() })
            )
            .join(this.sampleSeparator);
          break;
      }
    }
    return out;
  }

  private siteValue(record: VcfRecord, field: SiteField): string {
    switch (field) {
      case "CHROM":
        return record.chrom;
      case "POS":
        return String(record.pos);
      case "ID":
        return record.id;
      case "REF":
        return record.ref;
      case "ALT":
        return record.alt.length > 0 ? record.alt.join(",") : this.missing;
      case "QUAL":
        return record.qual !== undefined ? String(record.qual) : this.missing;
      case "FILTER":
        return record.filter.length > 0 ? record.filter.join(";") : this.missing;
    }
  }

  private infoValue(value: InfoValue | undefined): string {
    if (value === undefined) return this.missing;
    if (value === true) return "1";
    return typeof value === "string" ? value : value.join(",");
  }
}

/**
 * Project every record of a source
 */
export async function* projectFields(
  source: VcfSource,
  template: string | CompiledTemplate,
  options: ProjectionOptions = {}
): AsyncGenerator<string, void, undefined> {
  const projector = new FieldProjector(source.header, template, options);
  for await (const record of source.records) {
    yield projector.project(record);
  }
}
