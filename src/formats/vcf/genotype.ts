/**
 * GT field parsing and allele accounting
 */

import type { Genotype, SampleData } from "./types";

const MISSING = ".";

/**
 * Parse a GT string such as `0/1`, `1|0`, `./.` or `2`
 *
 * @returns `undefined` for an absent or `.` GT, or text that is not a genotype
 */
export function parseGenotype(gt: string | undefined): Genotype | undefined {
  if (gt === undefined || gt === "" || gt === MISSING) {
    return undefined;
  }

  const alleles: (number | null)[] = [];
  const separators: ("/" | "|")[] = [];
  let token = "";

  const pushAllele = (): boolean => {
    if (token === MISSING) {
      alleles.push(null);
    } else if (/^\d+$/.test(token)) {
      alleles.push(Number(token));
    } else {
      return false;
    }
    token = "";
    return true;
  };

  for (const char of gt) {
    if (char === "/" || char === "|") {
      if (!pushAllele()) return undefined;
      separators.push(char);
    } else {
      token += char;
    }
  }
  if (!pushAllele()) return undefined;

  return { alleles, separators };
}

export function formatGenotype(genotype: Genotype): string {
  let text = "";
  genotype.alleles.forEach((allele, index) => {
    if (index > 0) {
      text += genotype.separators[index - 1] ?? "/";
    }
    text += allele === null ? MISSING : String(allele);
  });
  return text;
}

/**
 * Whether a sample's genotype is missing
 *
 * Missing means no GT key, a GT of `.`, or every allele `.`. A partial call
 * such as `0/.` is not missing.
 */
export function isMissingGenotype(sample: SampleData): boolean {
  const genotype = parseGenotype(sample.get("GT"));
  return genotype === undefined || genotype.alleles.every((allele) => allele === null);
}

/**
 * Called allele indices, in order
 */
export function calledAlleles(genotype: Genotype | undefined): number[] {
  if (genotype === undefined) return [];
  const called: number[] = [];
  for (const allele of genotype.alleles) {
    if (allele !== null) called.push(allele);
  }
  return called;
}

/**
 * Rewrite allele indices through `indexMap` (old index → new index)
 *
 * Text that is not a genotype is returned unchanged.
 */
export function remapGenotype(gt: string, indexMap: readonly number[]): string {
  const genotype = parseGenotype(gt);
  if (genotype === undefined) {
    return gt;
  }
  return formatGenotype({
    alleles: genotype.alleles.map((allele) => (allele === null ? null : (indexMap[allele] ?? allele))),
    separators: genotype.separators,
  });
}

/**
 * A missing genotype of the given ploidy, e.g. `./.`
 */
export function missingGenotype(ploidy = 2): string {
  return Array.from({ length: Math.max(ploidy, 1) }, () => MISSING).join("/");
}
