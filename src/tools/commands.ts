/**
 * Argument marshalling for every external tool
 *
 * Builders are pure: configuration plus explicit input and output paths in,
 * one ToolInvocation out. Nothing here touches the filesystem.
 *
 * @module tools/commands
 */

import type { PipelineConfig } from "../config/schema";
import { ALIGNMENT_HIT_COLUMNS } from "../tabular/alignment-hits";
import type { ToolInvocation, ToolName } from "./tool-runner";

type ToolConfig = Pick<PipelineConfig, "executables">;

function invocation(
  config: ToolConfig,
  tool: ToolName,
  args: readonly string[],
  extra: Pick<ToolInvocation, "stdout" | "cwd"> = {}
): ToolInvocation {
  return { tool, executable: config.executables[tool], args, ...extra };
}

export interface TrimPaths {
  readonly forward: string;
  readonly reverse: string;
  readonly pairedForward: string;
  readonly unpairedForward: string;
  readonly pairedReverse: string;
  readonly unpairedReverse: string;
  readonly adapters: string;
}

export function trimmomaticCommand(
  config: Pick<PipelineConfig, "executables" | "trimming">,
  paths: TrimPaths
): ToolInvocation {
  return invocation(config, "trimmomatic", [
    "PE",
    config.trimming.phred,
    paths.forward,
    paths.reverse,
    paths.pairedForward,
    paths.unpairedForward,
    paths.pairedReverse,
    paths.unpairedReverse,
    `ILLUMINACLIP:${paths.adapters}:${config.trimming.illuminaClip}`,
  ]);
}

/**
 * PRINSEQ writes its good reads next to the inputs, named after them;
 * failing reads are discarded (`-out_bad null`)
 */
export function prinseqCommand(
  config: Pick<PipelineConfig, "executables" | "filtering">,
  paths: { readonly forward: string; readonly reverse: string; readonly log: string }
): ToolInvocation {
  const filtering = config.filtering;
  return invocation(config, "prinseq", [
    "-verbose",
    "-fastq",
    paths.forward,
    "-fastq2",
    paths.reverse,
    "-min_len",
    String(filtering.minLength),
    "-min_qual_mean",
    String(filtering.minQualityMean),
    "-trim_qual_right",
    String(filtering.trimQualityRight),
    "-trim_qual_window",
    String(filtering.trimQualityWindow),
    "-trim_qual_type",
    filtering.trimQualityType,
    "-out_format",
    String(filtering.outFormat),
    "-out_bad",
    "null",
    "-log",
    paths.log,
  ]);
}

export function spadesCommand(
  config: Pick<PipelineConfig, "executables" | "assembly">,
  paths: { readonly forward: string; readonly reverse: string; readonly outputDirectory: string }
): ToolInvocation {
  const { mode, coverageCutoff } = config.assembly;
  return invocation(config, "spades", [
    "-1",
    paths.forward,
    "-2",
    paths.reverse,
    mode,
    ...(coverageCutoff !== null ? ["--cov-cutoff", String(coverageCutoff)] : []),
    "-o",
    paths.outputDirectory,
  ]);
}

export function quastCommand(
  config: Pick<PipelineConfig, "executables" | "stats">,
  paths: { readonly contigs: string; readonly outputDirectory: string }
): ToolInvocation {
  return invocation(config, "quast", [
    paths.contigs,
    "-o",
    paths.outputDirectory,
    "--min-contig",
    String(config.stats.minContig),
    "--no-icarus",
    "--silent",
  ]);
}

export function prokkaCommand(
  config: Pick<PipelineConfig, "executables" | "prokka">,
  paths: { readonly sampleId: string; readonly contigs: string; readonly outputDirectory: string }
): ToolInvocation {
  return invocation(config, "prokka", [
    "--locustag",
    `${paths.sampleId}_L`,
    "--outdir",
    paths.outputDirectory,
    "--prefix",
    paths.sampleId,
    "--kingdom",
    config.prokka.kingdom,
    "--gcode",
    String(config.prokka.geneticCode),
    "--force",
    paths.contigs,
  ]);
}

export function dfastCommand(
  config: Pick<PipelineConfig, "executables" | "dfast">,
  paths: { readonly contigs: string; readonly outputDirectory: string }
): ToolInvocation {
  return invocation(config, "dfast", [
    "--genome",
    paths.contigs,
    "--out",
    paths.outputDirectory,
    "--minimum_length",
    String(config.dfast.minLength),
    ...(config.dfast.useOriginalName ? ["--use_original_name", "t"] : []),
    "--force",
  ]);
}

export function mlstCommand(
  config: ToolConfig,
  paths: { readonly contigs: readonly string[]; readonly report: string }
): ToolInvocation {
  return invocation(config, "mlst", [...paths.contigs], { stdout: paths.report });
}

export function abricateCommand(
  config: ToolConfig,
  paths: { readonly contigs: readonly string[]; readonly database: string; readonly report: string }
): ToolInvocation {
  return invocation(config, "abricate", [...paths.contigs, "--db", paths.database], {
    stdout: paths.report,
  });
}

export function makeblastdbCommand(
  config: ToolConfig,
  paths: { readonly fasta: string; readonly databasePrefix: string }
): ToolInvocation {
  return invocation(config, "makeblastdb", [
    "-in",
    paths.fasta,
    "-dbtype",
    "nucl",
    "-out",
    paths.databasePrefix,
  ]);
}

/**
 * tblastn with the tabular column list the coverage post-processor expects
 */
export function tblastnCommand(
  config: Pick<PipelineConfig, "executables" | "homologySearch">,
  paths: { readonly proteins: string; readonly databasePrefix: string; readonly hits: string }
): ToolInvocation {
  return invocation(config, "tblastn", [
    "-query",
    paths.proteins,
    "-db",
    paths.databasePrefix,
    "-evalue",
    String(config.homologySearch.evalue),
    "-outfmt",
    `6 ${ALIGNMENT_HIT_COLUMNS.join(" ")}`,
    "-out",
    paths.hits,
  ]);
}

export function roaryCommand(
  config: Pick<PipelineConfig, "executables" | "threads">,
  paths: { readonly outputDirectory: string; readonly annotations: readonly string[] }
): ToolInvocation {
  return invocation(config, "roary", [
    "-f",
    paths.outputDirectory,
    "-e",
    "-n",
    "-v",
    "-p",
    String(config.threads),
    ...paths.annotations,
  ]);
}

/**
 * roary_plots.py writes its images into the working directory
 */
export function roaryPlotsCommand(
  config: ToolConfig,
  paths: { readonly tree: string; readonly presenceAbsence: string; readonly outputDirectory: string }
): ToolInvocation {
  return invocation(config, "roaryPlots", [paths.tree, paths.presenceAbsence], {
    cwd: paths.outputDirectory,
  });
}
