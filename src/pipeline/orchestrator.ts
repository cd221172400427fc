/**
 * Pipeline orchestrator
 *
 * Per-sample chains run through a worker pool of `parallelism` workers.
 * Once any chain fails no further chain starts; chains already running are
 * left to finish, so no sample's tree is abandoned halfway through a stage.
 * The cross-sample phase starts only after every chain has settled, and
 * only when all of them succeeded. On resume it is reused only when no
 * upstream stage ran and its markers list the current samples.
 *
 * @example
 * ```typescript
 * const { config } = await loadConfig({ configPath: "pipeline.json" });
 * const context = await createRunContext(config);
 * const report = await executePipeline(context);
 * console.log(report.outputRoot);
 * ```
 *
 * @module pipeline/orchestrator
 */

import type { FileSystem } from "@effect/platform";
import type { NodeContext } from "@effect/platform-node";
import { Effect, Either, type Layer, Ref } from "effect";
import type { RunContext } from "../config/run-context";
import { type FileError, RunAbortedError, type StageFailedError } from "../errors";
import { ensureDirectory } from "../io/file-system";
import { runPlatform } from "../io/runtime";
import { loggerLayer } from "../logging";
import { ToolRunner } from "../tools/tool-runner";
import { runCrossSampleStages } from "./cross-sample";
import { annotateStage, runSampleChain } from "./sample-chain";
import { runStage, type StageResult } from "./stage-runner";

export interface SampleReport {
  readonly sample: string;
  readonly stages: readonly StageResult[];
}

export interface RunReport {
  readonly outputRoot: string;
  readonly samples: readonly SampleReport[];
  /** Reference genome annotation, when a reference was supplied */
  readonly reference: SampleReport | null;
  readonly crossSample: readonly StageResult[];
  /** Annotation files handed to the pan-genome stage */
  readonly annotations: readonly string[];
}

type ChainOutcome =
  | { readonly status: "completed"; readonly report: SampleReport }
  | { readonly status: "failed"; readonly sample: string; readonly error: StageFailedError }
  | { readonly status: "not_started"; readonly sample: string };

export type PipelineFailure = StageFailedError | RunAbortedError | FileError;

/**
 * The whole run as one Effect
 *
 * @returns The report of a completed run; fails with RunAbortedError when a
 * sample chain failed, or with StageFailedError when a cross-sample stage did
 */
export function runPipeline(
  context: RunContext
): Effect.Effect<RunReport, PipelineFailure, ToolRunner | FileSystem.FileSystem> {
  const { config, layout } = context;

  return Effect.gen(function* () {
    yield* ensureDirectory(context.outputRoot);
    yield* Effect.logInfo(
      `output root ${context.outputRoot}: ${context.samples.length} sample(s), annotator ${context.annotator.name}, parallelism ${config.parallelism}${config.resume ? ", resuming" : ""}`
    );

    const aborted = yield* Ref.make(false);
    const outcomes = yield* Effect.forEach(
      context.samples,
      (sample) =>
        Effect.gen(function* () {
          if (yield* Ref.get(aborted)) {
            return { status: "not_started", sample: sample.id } satisfies ChainOutcome;
          }

          const result = yield* Effect.either(runSampleChain(context, sample));
          if (Either.isLeft(result)) {
            yield* Ref.set(aborted, true);
            yield* Effect.logError(result.left.message).pipe(Effect.annotateLogs({ sample: sample.id }));
            return { status: "failed", sample: sample.id, error: result.left } satisfies ChainOutcome;
          }
          return {
            status: "completed",
            report: { sample: sample.id, stages: result.right },
          } satisfies ChainOutcome;
        }),
      { concurrency: config.parallelism }
    );

    const failures: StageFailedError[] = [];
    const notStarted: string[] = [];
    const samples: SampleReport[] = [];
    for (const outcome of outcomes) {
      switch (outcome.status) {
        case "completed":
          samples.push(outcome.report);
          break;
        case "failed":
          failures.push(outcome.error);
          break;
        case "not_started":
          notStarted.push(outcome.sample);
          break;
      }
    }
    if (failures.length > 0) {
      return yield* Effect.fail(new RunAbortedError(failures, notStarted));
    }

    const annotations = context.samples.map((sample) =>
      layout.pathFor("annotate", sample.id, "annotation_gff")
    );

    let reference: SampleReport | null = null;
    if (context.reference !== null) {
      const { id, genome } = context.reference;
      const result = yield* runStage(layout, annotateStage(context, id, genome), config.resume).pipe(
        Effect.annotateLogs({ sample: id })
      );
      reference = { sample: id, stages: [result] };
      annotations.push(layout.pathFor("annotate", id, "annotation_gff"));
    }

    const upstreamRan = [...samples, ...(reference === null ? [] : [reference])].some((report) =>
      report.stages.some((stage) => stage.outcome === "completed")
    );
    const crossSample = yield* runCrossSampleStages(context, annotations, config.resume && !upstreamRan);
    yield* Effect.logInfo("pipeline finished");

    return { outputRoot: context.outputRoot, samples, reference, crossSample, annotations };
  });
}

export interface ExecuteOptions {
  /** Replaces the process-backed tool runner */
  readonly toolRunner?: Layer.Layer<ToolRunner, never, NodeContext.NodeContext>;
}

/**
 * Run the pipeline on Node.js with the configured logger
 *
 * @throws {RunAbortedError | StageFailedError | FileError}
 */
export async function executePipeline(
  context: RunContext,
  options: ExecuteOptions = {}
): Promise<RunReport> {
  const toolRunner: Layer.Layer<ToolRunner, never, NodeContext.NodeContext> =
    options.toolRunner ?? ToolRunner.Live;
  return runPlatform(
    runPipeline(context).pipe(
      Effect.provide(toolRunner),
      Effect.provide(loggerLayer(context.config.logLevel, context.config.logFormat))
    )
  );
}
