/**
 * vcfops command-line interface
 *
 * Every subcommand reads `--input` (plain, gzip or BGZF VCF) and writes VCF to
 * `--output`, or to stdout when it is omitted. Exit codes: 0 success, 1 a
 * library error (printed as `<ErrorName>: message`), 2 a usage error.
 */

import { once } from "node:events";
import chalk from "chalk";
import { Command, CommanderError, InvalidArgumentError, Option } from "commander";
import { ValidationError, VcfOpsError } from "../errors";
import {
  parseRegion,
  parseSampleArgument,
  readIntervalsFile,
  readRenameMapFile,
  readSampleListFile,
  readSitesFile,
} from "../formats/lists";
import { closeSource, openVcf } from "../formats/vcf/parser";
import type { VcfSource } from "../formats/vcf/types";
import { formatVcf, writeVcf } from "../formats/vcf/writer";
import { writeStream } from "../io/file-writer";
import { renameChromosomes } from "../operations/chromosomes";
import { concatVcf, mergeVcf } from "../operations/merge";
import { splitByChromosome } from "../operations/partition";
import { projectFields } from "../operations/project";
import { filterQuality } from "../operations/quality";
import { filterRegions, filterSites } from "../operations/region";
import { keepSamples, removeSamples, renameSamples } from "../operations/samples";
import { formatStats, listSamples, VcfStatsCalculator } from "../operations/stats";
import { MERGE_MODES, type MergeMode } from "../operations/types";
import type { Interval } from "../types";

const VERSION = "0.1.0";

/**
 * Where the CLI writes; swapped for buffers in tests
 */
export interface CliIo {
  stdout(chunk: string): Promise<void>;
  stderr(text: string): void;
}

export const processIo: CliIo = {
  async stdout(chunk: string): Promise<void> {
    if (!process.stdout.write(chunk)) {
      await once(process.stdout, "drain");
    }
  },
  stderr(text: string): void {
    process.stderr.write(text.endsWith("\n") ? text : `${text}\n`);
  },
};

// =============================================================================
// FLAG TYPES
// =============================================================================

interface IoFlags {
  input: string;
  output?: string;
}

interface RegionFlags extends IoFlags {
  region: string[];
  regionsFile?: string;
}

interface SitesFlags extends IoFlags {
  sitesFile: string;
}

interface SampleFlags extends IoFlags {
  samples?: string;
  samplesFile?: string;
}

interface MapFlags extends IoFlags {
  map: string;
}

interface QualityFlags extends IoFlags {
  minMaf?: number;
  maxMissing?: number;
  minMac?: number;
}

interface SplitFlags {
  input: string;
  outputDir: string;
  prefix?: string;
  maxRecords?: number;
  compress?: boolean;
}

interface MergeFlags {
  inputs: string[];
  output?: string;
  mode: MergeMode;
}

interface ConcatFlags {
  inputs: string[];
  output?: string;
  region: string[];
  regionsFile?: string;
}

interface StatsFlags {
  input: string;
  json?: boolean;
}

interface ProjectFlags {
  input: string;
  output?: string;
  format: string;
  missing: string;
}

// =============================================================================
// HELPERS
// =============================================================================

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function parseNumber(value: string): number {
  const parsed = Number(value);
  if (value.trim() === "" || !Number.isFinite(parsed)) {
    throw new InvalidArgumentError(`Expected a number, got '${value}'`);
  }
  return parsed;
}

function parseCount(value: string): number {
  const parsed = parseNumber(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError(`Expected a positive integer, got '${value}'`);
  }
  return parsed;
}

function warnTo(io: CliIo): (warning: string, lineNumber?: number) => void {
  return (warning, lineNumber) => {
    const where = lineNumber !== undefined ? ` (line ${lineNumber})` : "";
    io.stderr(chalk.yellow(`Warning${where}: ${warning}`));
  };
}

async function emitVcf(source: VcfSource, output: string | undefined, io: CliIo): Promise<void> {
  if (output !== undefined) {
    await writeVcf(source, output);
    return;
  }
  for await (const chunk of formatVcf(source)) {
    await io.stdout(chunk);
  }
}

async function emitText(lines: AsyncIterable<string>, output: string | undefined, io: CliIo): Promise<void> {
  if (output !== undefined) {
    await writeStream(output, lines);
    return;
  }
  for await (const line of lines) {
    await io.stdout(line);
  }
}

async function gatherIntervals(regions: readonly string[], regionsFile: string | undefined): Promise<Interval[]> {
  const intervals = regions.map(parseRegion);
  if (regionsFile !== undefined) {
    intervals.push(...(await readIntervalsFile(regionsFile)));
  }
  return intervals;
}

async function gatherSamples(flags: SampleFlags): Promise<string[]> {
  const names = flags.samples !== undefined ? parseSampleArgument(flags.samples) : [];
  if (flags.samplesFile !== undefined) {
    names.push(...(await readSampleListFile(flags.samplesFile)));
  }
  if (flags.samples === undefined && flags.samplesFile === undefined) {
    throw new ValidationError("Give --samples or --samples-file");
  }
  return names;
}

// =============================================================================
// PROGRAM
// =============================================================================

/**
 * What a run collects: help and version text, and every source it opened
 */
export interface CliState {
  help: string;
  readonly opened: VcfSource[];
}

/**
 * Build the commander program; output and exits go through `io`
 */
export function createProgram(io: CliIo, state: CliState): Command {
  const program = new Command();
  const onWarning = warnTo(io);
  const open = async (path: string): Promise<VcfSource> => {
    const source = await openVcf(path, { onWarning });
    state.opened.push(source);
    return source;
  };
  // Opened in order; runCli closes those already open if a later one fails
  const openAll = async (paths: readonly string[]): Promise<VcfSource[]> => {
    const sources: VcfSource[] = [];
    for (const path of paths) {
      sources.push(await open(path));
    }
    return sources;
  };

  program
    .name("vcfops")
    .description("Sample and record projection for VCF files")
    .version(VERSION)
    .exitOverride()
    .configureOutput({
      writeOut: (text) => {
        state.help += text;
      },
      writeErr: (text) => io.stderr(text),
    });

  const withIo = (command: Command): Command =>
    command
      .requiredOption("-i, --input <path>", "input VCF (.vcf, .vcf.gz, .vcf.bgz)")
      .option("-o, --output <path>", "output VCF; .gz writes BGZF (default: stdout)");

  withIo(program.command("extract-region").description("Keep records inside regions"))
    .option("-r, --region <region>", "chr, chr:pos or chr:start-end (repeatable)", collect, [])
    .option("-R, --regions-file <path>", "regions or BED file")
    .action(async (flags: RegionFlags) => {
      if (flags.region.length === 0 && flags.regionsFile === undefined) {
        throw new ValidationError("Give --region or --regions-file");
      }
      const intervals = await gatherIntervals(flags.region, flags.regionsFile);
      await emitVcf(filterRegions(await open(flags.input), intervals, { onWarning }), flags.output, io);
    });

  withIo(program.command("extract-sites").description("Keep records at listed positions"))
    .requiredOption("-T, --sites-file <path>", "two-column chrom/pos file")
    .action(async (flags: SitesFlags) => {
      const sites = await readSitesFile(flags.sitesFile);
      await emitVcf(filterSites(await open(flags.input), sites, { onWarning }), flags.output, io);
    });

  withIo(program.command("extract-samples").description("Keep only the named samples"))
    .option("-s, --samples <names>", "comma-separated sample names")
    .option("-S, --samples-file <path>", "one sample name per line")
    .action(async (flags: SampleFlags) => {
      const names = await gatherSamples(flags);
      await emitVcf(keepSamples(await open(flags.input), names), flags.output, io);
    });

  withIo(program.command("remove-samples").description("Drop the named samples"))
    .option("-s, --samples <names>", "comma-separated sample names")
    .option("-S, --samples-file <path>", "one sample name per line")
    .action(async (flags: SampleFlags) => {
      const names = await gatherSamples(flags);
      await emitVcf(removeSamples(await open(flags.input), names), flags.output, io);
    });

  withIo(program.command("rename-samples").description("Rename samples from an old/new map"))
    .requiredOption("-m, --map <path>", "two-column old/new file")
    .action(async (flags: MapFlags) => {
      const mapping = await readRenameMapFile(flags.map);
      await emitVcf(renameSamples(await open(flags.input), mapping, { onWarning }), flags.output, io);
    });

  withIo(program.command("rename-chroms").description("Rename chromosomes from an old/new map"))
    .requiredOption("-m, --map <path>", "two-column old/new file")
    .action(async (flags: MapFlags) => {
      const mapping = await readRenameMapFile(flags.map);
      await emitVcf(renameChromosomes(await open(flags.input), mapping, { onWarning }), flags.output, io);
    });

  withIo(program.command("filter-maf").description("Filter sites by missingness and allele frequency"))
    .option("--min-maf <fraction>", "minimum minor allele frequency", parseNumber)
    .option("--max-missing <fraction>", "maximum fraction of missing genotypes", parseNumber)
    .option("--min-mac <count>", "minimum minor allele count", parseNumber)
    .action(async (flags: QualityFlags) => {
      const source = filterQuality(await open(flags.input), {
        ...(flags.minMaf !== undefined && { minMaf: flags.minMaf }),
        ...(flags.maxMissing !== undefined && { maxMissingRate: flags.maxMissing }),
        ...(flags.minMac !== undefined && { minMac: flags.minMac }),
      });
      await emitVcf(source, flags.output, io);
    });

  program
    .command("split-by-chrom")
    .description("Write one VCF per chromosome")
    .requiredOption("-i, --input <path>", "input VCF")
    .requiredOption("-d, --output-dir <dir>", "directory for the per-chromosome files")
    .option("-p, --prefix <text>", "file name prefix", "")
    .option("-n, --max-records <count>", "split each chromosome into files of at most this many records", parseCount)
    .option("-z, --compress", "write .vcf.gz (BGZF) files")
    .action(async (flags: SplitFlags) => {
      const summary = await splitByChromosome(await open(flags.input), {
        outputDir: flags.outputDir,
        extension: flags.compress === true ? ".vcf.gz" : ".vcf",
        ...(flags.prefix !== undefined && { prefix: flags.prefix }),
        ...(flags.maxRecords !== undefined && { maxRecords: flags.maxRecords }),
      });
      for (const file of summary.files) {
        await io.stdout(`${file.path}\t${file.records}\n`);
      }
    });

  program
    .command("merge")
    .description("Merge sorted VCFs")
    .requiredOption("--inputs <paths...>", "input VCFs, sorted by chromosome and position")
    .option("-o, --output <path>", "output VCF (default: stdout)")
    .addOption(
      new Option("--mode <mode>", "how inputs relate").choices(MERGE_MODES).default("same-samples-disjoint-sites")
    )
    .action(async (flags: MergeFlags) => {
      const sources = await openAll(flags.inputs);
      await emitVcf(mergeVcf(sources, { mode: flags.mode }), flags.output, io);
    });

  program
    .command("concat")
    .description("Concatenate VCFs with identical samples")
    .requiredOption("--inputs <paths...>", "input VCFs in output order")
    .option("-o, --output <path>", "output VCF (default: stdout)")
    .option("-r, --region <region>", "keep records in this region (repeatable)", collect, [])
    .option("-R, --regions-file <path>", "regions or BED file")
    .action(async (flags: ConcatFlags) => {
      const sources = await openAll(flags.inputs);
      const restricted = flags.region.length > 0 || flags.regionsFile !== undefined;
      const intervals = restricted ? await gatherIntervals(flags.region, flags.regionsFile) : undefined;
      await emitVcf(concatVcf(sources, { onWarning, ...(intervals !== undefined && { intervals }) }), flags.output, io);
    });

  program
    .command("stats")
    .description("Summary counts")
    .requiredOption("-i, --input <path>", "input VCF")
    .option("--json", "print JSON")
    .action(async (flags: StatsFlags) => {
      const stats = await new VcfStatsCalculator().calculate(await open(flags.input));
      await io.stdout(flags.json === true ? `${JSON.stringify(stats, null, 2)}\n` : formatStats(stats));
    });

  program
    .command("list-samples")
    .description("Print sample names, one per line")
    .requiredOption("-i, --input <path>", "input VCF")
    .action(async (flags: { input: string }) => {
      const source = await open(flags.input);
      const names = listSamples(source.header);
      await closeSource(source);
      await io.stdout(names.map((name) => `${name}\n`).join(""));
    });

  program
    .command("project-fields")
    .description("Print fields through a query template, e.g. '%CHROM\\t%POS[\\t%GT]\\n'")
    .requiredOption("-i, --input <path>", "input VCF")
    .option("-o, --output <path>", "output file (default: stdout)")
    .requiredOption("-f, --format <template>", "query template")
    .option("--missing <text>", "text for absent values", ".")
    .action(async (flags: ProjectFlags) => {
      const lines = projectFields(await open(flags.input), flags.format, { missing: flags.missing });
      await emitText(lines, flags.output, io);
    });

  return program;
}

/**
 * Run the CLI on `argv` (arguments after the executable and script)
 *
 * @returns The process exit code
 */
export async function runCli(argv: readonly string[], io: CliIo = processIo): Promise<number> {
  const state: CliState = { help: "", opened: [] };
  const program = createProgram(io, state);

  try {
    await program.parseAsync([...argv], { from: "user" });
    return 0;
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode === 0 ? 0 : 2;
    }
    const name = error instanceof Error ? error.name : "Error";
    const message = error instanceof Error ? error.message : String(error);
    io.stderr(chalk.red(`${name}: ${message}`));
    if (error instanceof VcfOpsError && error.context !== undefined) {
      io.stderr(chalk.gray(`  ${error.context}`));
    }
    await Promise.all(state.opened.map(closeSource));
    return 1;
  } finally {
    if (state.help.length > 0) {
      await io.stdout(state.help);
    }
  }
}
