/**
 * Per-sample stage chain
 *
 *   raw → trimmed → filtered → assembled → curated → stats_done → annotated
 *
 * Stages run strictly in order; the first failure ends the chain.
 *
 * @module pipeline/sample-chain
 */

import type { FileSystem } from "@effect/platform";
import { Effect } from "effect";
import type { RunContext } from "../config/run-context";
import {
  MissingArtifactError,
  type PipelineError,
  type StageFailedError,
  toPipelineError,
} from "../errors";
import { copyDecompressed } from "../io/file-system";
import type { PairedReadRole } from "../layout/stages";
import {
  prinseqCommand,
  quastCommand,
  spadesCommand,
  trimmomaticCommand,
} from "../tools/commands";
import type { ToolRunner } from "../tools/tool-runner";
import { curateContigs } from "../transform/curate-contigs";
import { reclassifyFilteredReads, removeProducedFiles } from "../transform/reclassify-reads";
import type { Sample } from "../types";
import { type StageResult, type StageSpec, runStagesInOrder, runTool } from "./stage-runner";

type ChainRequirements = ToolRunner | FileSystem.FileSystem;

const PAIRED_ROLES: readonly PairedReadRole[] = ["R1_paired", "R2_paired"];

function fromPromise<A>(run: () => Promise<A>): Effect.Effect<A, PipelineError> {
  return Effect.tryPromise({ try: run, catch: (error) => toPipelineError(error, "STAGE_ERROR") });
}

function trimStage(context: RunContext, sample: Sample): StageSpec<ChainRequirements> {
  const { layout, config, auxiliary } = context;
  const path = (role: "R1_paired" | "R2_paired" | "R1_unpaired" | "R2_unpaired"): string =>
    layout.pathFor("trim", sample.id, role);
  const reads = [
    { label: "forward reads", path: sample.forward },
    { label: "reverse reads", path: sample.reverse },
  ];

  const adapters = auxiliary.adapters;
  if (!config.trimming.enabled || adapters === null) {
    return {
      stage: "trim",
      sample: sample.id,
      inputs: reads,
      required: PAIRED_ROLES,
      run: Effect.gen(function* () {
        yield* Effect.logInfo("trimming disabled; passing raw reads through");
        yield* copyDecompressed(sample.forward, path("R1_paired"));
        yield* copyDecompressed(sample.reverse, path("R2_paired"));
      }),
    };
  }

  return {
    stage: "trim",
    sample: sample.id,
    inputs: [...reads, { label: "adapter sequences", path: adapters }],
    run: runTool(
      "trim",
      sample.id,
      trimmomaticCommand(config, {
        forward: sample.forward,
        reverse: sample.reverse,
        pairedForward: path("R1_paired"),
        unpairedForward: path("R1_unpaired"),
        pairedReverse: path("R2_paired"),
        unpairedReverse: path("R2_unpaired"),
        adapters,
      })
    ),
  };
}

/**
 * PRINSEQ writes next to its inputs, so the trimming directory is the
 * source its outputs are reclassified from
 */
function filterStage(context: RunContext, sample: Sample): StageSpec<ChainRequirements> {
  const { layout, config } = context;
  const forward = layout.pathFor("trim", sample.id, "R1_paired");
  const reverse = layout.pathFor("trim", sample.id, "R2_paired");
  const source = layout.directoryFor("trim", sample.id);

  return {
    stage: "filter",
    sample: sample.id,
    inputs: [
      { label: "R1_paired", path: forward },
      { label: "R2_paired", path: reverse },
    ],
    run: Effect.gen(function* () {
      const stale = yield* fromPromise(() => removeProducedFiles(source, sample.id));
      if (stale.length > 0) {
        yield* Effect.logDebug(`removed ${stale.length} stale filter output(s)`);
      }

      yield* runTool(
        "filter",
        sample.id,
        prinseqCommand(config, {
          forward,
          reverse,
          log: layout.pathFor("filter", sample.id, "filter_log"),
        })
      );

      const found = yield* fromPromise(() =>
        reclassifyFilteredReads({ source, sample: sample.id, layout })
      );
      for (const role of PAIRED_ROLES) {
        const file = found[role];
        if (file === undefined) {
          return yield* Effect.fail(
            new MissingArtifactError("filter", sample.id, role, layout.pathFor("filter", sample.id, role))
          );
        }
        yield* Effect.logDebug(`${role}: ${file.fileName}`);
      }
    }),
  };
}

function assembleStage(context: RunContext, sample: Sample): StageSpec<ChainRequirements> {
  const { layout, config } = context;
  const forward = layout.pathFor("filter", sample.id, "R1_paired");
  const reverse = layout.pathFor("filter", sample.id, "R2_paired");

  return {
    stage: "assemble",
    sample: sample.id,
    inputs: [
      { label: "R1_paired", path: forward },
      { label: "R2_paired", path: reverse },
    ],
    run: runTool(
      "assemble",
      sample.id,
      spadesCommand(config, {
        forward,
        reverse,
        outputDirectory: layout.directoryFor("assemble", sample.id),
      })
    ),
  };
}

function curateStage(context: RunContext, sample: Sample): StageSpec<ChainRequirements> {
  const { layout, config } = context;
  const input = layout.pathFor("assemble", sample.id, "contigs_raw");

  return {
    stage: "curate_contigs",
    sample: sample.id,
    inputs: [{ label: "contigs_raw", path: input }],
    run: Effect.gen(function* () {
      const result = yield* fromPromise(() =>
        curateContigs({
          input,
          output: layout.pathFor("curate_contigs", sample.id, "contigs_curated"),
          minLength: config.curation.minLength,
          marker: config.curation.marker,
        })
      );
      yield* Effect.logInfo(`kept ${result.kept} contig(s), dropped ${result.dropped}`);
    }),
  };
}

function statsStage(context: RunContext, sample: Sample): StageSpec<ChainRequirements> {
  const { layout, config } = context;
  const contigs = layout.pathFor("curate_contigs", sample.id, "contigs_curated");

  return {
    stage: "stats",
    sample: sample.id,
    inputs: [{ label: "contigs_curated", path: contigs }],
    run: runTool(
      "stats",
      sample.id,
      quastCommand(config, { contigs, outputDirectory: layout.directoryFor("stats", sample.id) })
    ),
  };
}

/**
 * Annotation step shared by samples and the reference genome
 */
export function annotateStage(
  context: RunContext,
  sampleId: string,
  contigs: string
): StageSpec<ChainRequirements> {
  const { layout, annotator } = context;
  return {
    stage: "annotate",
    sample: sampleId,
    inputs: [{ label: "contigs", path: contigs }],
    run: annotator.annotate({
      sampleId,
      contigs,
      outputDirectory: layout.directoryFor("annotate", sampleId),
      output: layout.pathFor("annotate", sampleId, "annotation_gff"),
    }),
  };
}

/**
 * Drive one sample from raw reads to its annotation
 *
 * On resume, finished stages are skipped until the first one that runs;
 * everything downstream of it runs again.
 */
export function runSampleChain(
  context: RunContext,
  sample: Sample
): Effect.Effect<StageResult[], StageFailedError, ChainRequirements> {
  const stages = [
    trimStage(context, sample),
    filterStage(context, sample),
    assembleStage(context, sample),
    curateStage(context, sample),
    statsStage(context, sample),
    annotateStage(
      context,
      sample.id,
      context.layout.pathFor("curate_contigs", sample.id, "contigs_curated")
    ),
  ];

  return runStagesInOrder(context.layout, stages, context.config.resume).pipe(
    Effect.annotateLogs({ sample: sample.id })
  );
}
