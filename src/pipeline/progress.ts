/**
 * Restart support: which samples already reached `annotated`
 */

import type { FileSystem } from "@effect/platform";
import { Effect } from "effect";
import type { FileError } from "../errors";
import { runPlatform } from "../io/runtime";
import type { ArtifactLayout } from "../layout/artifact-layout";
import { PER_SAMPLE_STAGES } from "../layout/stages";
import { isStageComplete } from "./stage-runner";

/**
 * Samples whose every per-sample stage left its completion marker and whose
 * annotation is on disk, in input order
 */
export function completedSamples(
  layout: ArtifactLayout,
  sampleIds: readonly string[]
): Effect.Effect<string[], FileError, FileSystem.FileSystem> {
  return Effect.filter(sampleIds, (sample) =>
    Effect.forEach(PER_SAMPLE_STAGES, (stage) =>
      isStageComplete(layout, stage, sample, stage === "annotate" ? undefined : [])
    ).pipe(
      Effect.map((complete) => complete.every(Boolean))
    )
  );
}

/**
 * Promise form of completedSamples for callers outside Effect
 */
export async function findCompletedSamples(
  layout: ArtifactLayout,
  sampleIds: readonly string[]
): Promise<string[]> {
  return runPlatform(completedSamples(layout, sampleIds));
}
