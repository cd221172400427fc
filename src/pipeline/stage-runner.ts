/**
 * One stage transition: prepare, gate, run, verify, mark
 *
 * Every stage, per-sample or cross-sample, goes through runStage so that
 * input gating, output verification, completion markers and resume behave
 * identically everywhere. A marker holds the input paths the stage consumed,
 * one per line; a resumed stage whose inputs changed runs again.
 *
 * @module pipeline/stage-runner
 */

import type { FileSystem } from "@effect/platform";
import { Effect } from "effect";
import {
  type FileError,
  MissingArtifactError,
  type PipelineError,
  StageFailedError,
  type ToolLaunchError,
} from "../errors";
import { ensureDirectory, isFile, readText, removePath, writeText } from "../io/file-system";
import type { ArtifactLayout } from "../layout/artifact-layout";
import type { ArtifactRole, Stage } from "../layout/stages";
import { describeInvocation, type ToolInvocation, ToolRunner } from "../tools/tool-runner";

export type StageOutcome = "completed" | "skipped";

export interface StageResult {
  readonly stage: Stage;
  readonly outcome: StageOutcome;
}

/**
 * A file the stage reads; a missing one fails the stage before it runs
 */
export interface StageInput {
  readonly label: string;
  readonly path: string;
}

export interface StageSpec<R> {
  readonly stage: Stage;
  readonly sample: string | null;
  readonly inputs: readonly StageInput[];
  /** Roles verified after the run (default: every role the stage requires) */
  readonly required?: readonly ArtifactRole[];
  /**
   * `ensure` creates the stage directory; `clear` deletes it and leaves its
   * creation to the tool, for tools that refuse an existing directory
   */
  readonly directory?: "ensure" | "clear";
  readonly run: Effect.Effect<void, PipelineError, R>;
}

/**
 * Marker content for a stage: its input paths, one per line
 */
export function inputFingerprint(inputs: readonly StageInput[]): string {
  return inputs.map((input) => `${input.path}\n`).join("");
}

/**
 * Whether a stage's marker and every required artifact are on disk
 *
 * @param fingerprint - When given, the marker must also hold exactly this
 */
export function isStageComplete(
  layout: ArtifactLayout,
  stage: Stage,
  sample: string | null,
  required: readonly ArtifactRole[] = layout.requiredRoles(stage),
  fingerprint?: string
): Effect.Effect<boolean, FileError, FileSystem.FileSystem> {
  return Effect.gen(function* () {
    const marker = layout.markerFor(stage, sample);
    if (!(yield* isFile(marker))) return false;
    if (fingerprint !== undefined && (yield* readText(marker)) !== fingerprint) return false;
    for (const role of required) {
      if (!(yield* isFile(layout.pathFor(stage, sample, role)))) return false;
    }
    return true;
  });
}

/**
 * Run one stage
 *
 * With `resume`, a stage whose marker and artifacts exist, and whose marker
 * lists the same inputs, is skipped. Any other stage loses its stale marker
 * first, so an interrupted re-run is never mistaken for a finished one.
 *
 * @returns The stage's outcome; every failure is a StageFailedError naming
 * the stage and sample
 */
export function runStage<R>(
  layout: ArtifactLayout,
  spec: StageSpec<R>,
  resume: boolean
): Effect.Effect<StageResult, StageFailedError, R | FileSystem.FileSystem> {
  const { stage, sample } = spec;
  const required = spec.required ?? layout.requiredRoles(stage);
  const fingerprint = inputFingerprint(spec.inputs);

  const program = Effect.gen(function* () {
    if (resume && (yield* isStageComplete(layout, stage, sample, required, fingerprint))) {
      yield* Effect.logInfo("skipped: already complete");
      return { stage, outcome: "skipped" } satisfies StageResult;
    }

    const marker = layout.markerFor(stage, sample);
    const directory = layout.directoryFor(stage, sample);
    yield* removePath(marker);
    if (spec.directory === "clear") {
      yield* removePath(directory);
    } else {
      yield* ensureDirectory(directory);
    }

    for (const input of spec.inputs) {
      if (!(yield* isFile(input.path))) {
        return yield* Effect.fail(new MissingArtifactError(stage, sample, input.label, input.path));
      }
    }

    yield* Effect.logInfo("started");
    yield* spec.run;

    for (const role of required) {
      const path = layout.pathFor(stage, sample, role);
      if (!(yield* isFile(path))) {
        return yield* Effect.fail(new MissingArtifactError(stage, sample, role, path));
      }
    }

    yield* writeText(marker, fingerprint);
    yield* Effect.logInfo("completed");
    return { stage, outcome: "completed" } satisfies StageResult;
  });

  return program.pipe(
    Effect.mapError((error) => StageFailedError.wrap(stage, sample, error)),
    Effect.withLogSpan(stage),
    Effect.annotateLogs({ stage, sample: sample ?? "*" })
  );
}

/**
 * Run dependent stages in order, stopping at the first failure
 *
 * Once a stage actually runs, every later stage runs too, whatever its
 * marker says: its inputs may have just been rewritten.
 */
export function runStagesInOrder<R>(
  layout: ArtifactLayout,
  specs: readonly StageSpec<R>[],
  resume: boolean
): Effect.Effect<StageResult[], StageFailedError, R | FileSystem.FileSystem> {
  return Effect.gen(function* () {
    const results: StageResult[] = [];
    let reuse = resume;
    for (const spec of specs) {
      const result = yield* runStage(layout, spec, reuse);
      if (result.outcome === "completed") reuse = false;
      results.push(result);
    }
    return results;
  });
}

/**
 * Launch a tool and fail the stage on a non-zero exit
 */
export function runTool(
  stage: Stage,
  sample: string | null,
  invocation: ToolInvocation
): Effect.Effect<void, StageFailedError | ToolLaunchError | FileError, ToolRunner> {
  return Effect.gen(function* () {
    const runner = yield* ToolRunner;
    yield* Effect.logDebug(`running ${describeInvocation(invocation)}`);
    const exitCode = yield* runner.run(invocation);
    if (exitCode !== 0) {
      return yield* Effect.fail(
        StageFailedError.nonZeroExit(stage, sample, invocation.executable, exitCode)
      );
    }
  });
}
