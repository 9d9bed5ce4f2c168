/**
 * VCF format: types, parser, writer and header/genotype helpers
 */

export type {
  ContigDefinition,
  FieldDefinition,
  Genotype,
  InfoValue,
  SampleData,
  VcfHeader,
  VcfMetaLine,
  VcfParserOptions,
  VcfRecord,
  VcfSource,
} from "./types";
export {
  closeSource,
  openVcf,
  parseInfo,
  parseRecordLine,
  parseVcfString,
  type RecordLineContext,
  VcfParser,
} from "./parser";
export {
  formatHeader,
  formatInfo,
  formatRecord,
  formatSample,
  formatVcf,
  VcfWriter,
  type WriteSummary,
  writeVcf,
} from "./writer";
export {
  addMetaLine,
  createStructuredMeta,
  FIXED_COLUMNS,
  formatColumnHeader,
  formatHeaderLines,
  formatMetaLine,
  getContigIds,
  getContigs,
  getFormatDefinitions,
  getInfoDefinitions,
  mergeHeaders,
  parseMetaLine,
  parseStructuredValue,
  withSamples,
} from "./header";
export {
  calledAlleles,
  formatGenotype,
  isMissingGenotype,
  missingGenotype,
  parseGenotype,
  remapGenotype,
} from "./genotype";
