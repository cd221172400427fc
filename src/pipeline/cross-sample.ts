/**
 * Cross-sample phase: runs once, over every sample's artifacts
 *
 * Order: typing, virulence scan, resistance scan, optional homology search
 * with coverage post-processing, pan-genome, plots.
 *
 * @module pipeline/cross-sample
 */

import type { FileSystem } from "@effect/platform";
import { Effect } from "effect";
import { join } from "node:path";
import type { RunContext } from "../config/run-context";
import { type PipelineError, type StageFailedError, toPipelineError } from "../errors";
import { FastaParser, FastaWriter } from "../formats/fasta";
import { copyDecompressed, isGzipPath } from "../io/file-system";
import type { ArtifactLayout } from "../layout/artifact-layout";
import { postProcessAlignmentHits } from "../tabular/alignment-hits";
import {
  abricateCommand,
  makeblastdbCommand,
  mlstCommand,
  roaryCommand,
  roaryPlotsCommand,
  tblastnCommand,
} from "../tools/commands";
import type { ToolRunner } from "../tools/tool-runner";
import type { AbstractSequence } from "../types";
import { type StageResult, type StageSpec, runStagesInOrder, runTool } from "./stage-runner";

type PhaseRequirements = ToolRunner | FileSystem.FileSystem;

/** Separates the sample id from the contig id in the combined BLAST database */
export const COMBINED_ID_SEPARATOR = "|";

const BLAST_DATABASE_NAME = "contigs_db";

/** Inflated copy of a gzip-compressed protein database, beside the BLAST database */
export const QUERY_PROTEINS_NAME = "query_proteins.faa";

/**
 * Concatenate curated contigs, prefixing each id with its sample
 *
 * @returns Number of records written
 */
export async function writeCombinedContigs(
  layout: ArtifactLayout,
  sampleIds: readonly string[],
  output: string
): Promise<number> {
  const parser = new FastaParser({ trackLineNumbers: false });
  const writer = new FastaWriter({ lineWidth: 60, includeDescription: false });

  async function* records(): AsyncIterable<AbstractSequence> {
    for (const sample of sampleIds) {
      const contigs = layout.pathFor("curate_contigs", sample, "contigs_curated");
      for await (const record of parser.parseFile(contigs)) {
        yield {
          id: `${sample}${COMBINED_ID_SEPARATOR}${record.id}`,
          sequence: record.sequence,
          length: record.length,
        };
      }
    }
  }

  return writer.writeFile(output, records());
}

function fromPromise<A>(run: () => Promise<A>): Effect.Effect<A, PipelineError> {
  return Effect.tryPromise({ try: run, catch: (error) => toPipelineError(error, "STAGE_ERROR") });
}

function curatedContigInputs(context: RunContext): { label: string; path: string }[] {
  return context.samples.map((sample) => ({
    label: `contigs_curated of ${sample.id}`,
    path: context.layout.pathFor("curate_contigs", sample.id, "contigs_curated"),
  }));
}

function typingStage(context: RunContext): StageSpec<PhaseRequirements> {
  const inputs = curatedContigInputs(context);
  return {
    stage: "cross_sample_typing",
    sample: null,
    inputs,
    run: runTool(
      "cross_sample_typing",
      null,
      mlstCommand(context.config, {
        contigs: inputs.map((input) => input.path),
        report: context.layout.pathFor("cross_sample_typing", null, "typing_report"),
      })
    ),
  };
}

function scanStage(
  context: RunContext,
  stage: "cross_sample_virulence" | "cross_sample_resistance"
): StageSpec<PhaseRequirements> {
  const inputs = curatedContigInputs(context);
  const { virulenceDatabase, resistanceDatabase } = context.config.abricate;
  const report =
    stage === "cross_sample_virulence"
      ? context.layout.pathFor(stage, null, "virulence_report")
      : context.layout.pathFor(stage, null, "resistance_report");

  return {
    stage,
    sample: null,
    inputs,
    run: runTool(
      stage,
      null,
      abricateCommand(context.config, {
        contigs: inputs.map((input) => input.path),
        database: stage === "cross_sample_virulence" ? virulenceDatabase : resistanceDatabase,
        report,
      })
    ),
  };
}

function homologyStage(context: RunContext, proteins: string): StageSpec<PhaseRequirements> {
  const { layout, config } = context;
  const directory = layout.directoryFor("homology_search", null);
  const combined = layout.pathFor("homology_search", null, "homology_contigs");
  const hits = layout.pathFor("homology_search", null, "homology_hits");
  const databasePrefix = join(directory, BLAST_DATABASE_NAME);
  const query = isGzipPath(proteins) ? join(directory, QUERY_PROTEINS_NAME) : proteins;

  return {
    stage: "homology_search",
    sample: null,
    inputs: [...curatedContigInputs(context), { label: "protein database", path: proteins }],
    run: Effect.gen(function* () {
      if (query !== proteins) {
        yield* copyDecompressed(proteins, query);
      }

      const written = yield* fromPromise(() =>
        writeCombinedContigs(
          layout,
          context.samples.map((sample) => sample.id),
          combined
        )
      );
      yield* Effect.logDebug(`combined ${written} contig(s) into ${combined}`);

      yield* runTool("homology_search", null, makeblastdbCommand(config, { fasta: combined, databasePrefix }));
      yield* runTool("homology_search", null, tblastnCommand(config, { proteins: query, databasePrefix, hits }));

      const result = yield* fromPromise(() =>
        postProcessAlignmentHits({ hits, proteinDatabase: query, outputDirectory: directory })
      );
      yield* Effect.logInfo(`kept ${result.kept} hit(s), dropped ${result.dropped} at or below identity threshold`);
    }),
  };
}

function pangenomeStage(context: RunContext, annotations: readonly string[]): StageSpec<PhaseRequirements> {
  return {
    stage: "pangenome",
    sample: null,
    inputs: annotations.map((path) => ({ label: "annotation_gff", path })),
    directory: "clear",
    run: runTool(
      "pangenome",
      null,
      roaryCommand(context.config, {
        outputDirectory: context.layout.directoryFor("pangenome", null),
        annotations,
      })
    ),
  };
}

function plotsStage(context: RunContext): StageSpec<PhaseRequirements> {
  const { layout } = context;
  const tree = layout.pathFor("pangenome", null, "pangenome_tree");
  const presenceAbsence = layout.pathFor("pangenome", null, "pangenome_presence_absence");

  return {
    stage: "pangenome_plots",
    sample: null,
    inputs: [
      { label: "pangenome_tree", path: tree },
      { label: "pangenome_presence_absence", path: presenceAbsence },
    ],
    run: runTool(
      "pangenome_plots",
      null,
      roaryPlotsCommand(context.config, {
        tree,
        presenceAbsence,
        outputDirectory: layout.directoryFor("pangenome_plots", null),
      })
    ),
  };
}

/**
 * Run the cross-sample stages in order
 *
 * @param annotations - GFF files for the pan-genome, samples and reference alike
 * @param resume - False once any per-sample or reference stage ran in this run
 */
export function runCrossSampleStages(
  context: RunContext,
  annotations: readonly string[],
  resume: boolean
): Effect.Effect<StageResult[], StageFailedError, PhaseRequirements> {
  const proteins = context.auxiliary.proteinDatabase;
  const stages: StageSpec<PhaseRequirements>[] = [
    typingStage(context),
    scanStage(context, "cross_sample_virulence"),
    scanStage(context, "cross_sample_resistance"),
    ...(context.homologySearch && proteins !== null ? [homologyStage(context, proteins)] : []),
    pangenomeStage(context, annotations),
    ...(context.config.pangenome.plots ? [plotsStage(context)] : []),
  ];

  return runStagesInOrder(context.layout, stages, resume).pipe(
    Effect.annotateLogs({ sample: "*" })
  );
}
