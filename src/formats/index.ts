/**
 * Central format module exports
 *
 * @example
 * ```typescript
 * import { openVcf, parseIntervals } from "../formats";
 * ```
 */

export * from "./vcf";
export {
  CHROMOSOME_END,
  type IntervalParseOptions,
  isBedPath,
  type ListParseOptions,
  parseIntervals,
  parseRegion,
  parseRenameMap,
  parseSampleArgument,
  parseSampleList,
  parseSites,
  readIntervalsFile,
  readRenameMapFile,
  readSampleListFile,
  readSitesFile,
} from "./lists";
export { AbstractParser, type ResolvedParserOptions } from "./abstract-parser";
