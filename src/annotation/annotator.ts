/**
 * Genome annotators
 *
 * Prokka and DFAST are interchangeable: given curated contigs and an id,
 * each leaves exactly one GFF at the path the caller names. The
 * orchestrator and the pan-genome stage only ever see this interface.
 *
 * @module annotation/annotator
 */

import type { FileSystem } from "@effect/platform";
import { Effect } from "effect";
import { join } from "node:path";
import type { PipelineConfig } from "../config/schema";
import { type FileError, MissingArtifactError, StageFailedError, type ToolLaunchError } from "../errors";
import { isFile, movePath } from "../io/file-system";
import { dfastCommand, prokkaCommand } from "../tools/commands";
import { ToolRunner } from "../tools/tool-runner";

export interface AnnotationRequest {
  readonly sampleId: string;
  readonly contigs: string;
  /** Directory the annotator may fill with its own files */
  readonly outputDirectory: string;
  /** Where the GFF must end up */
  readonly output: string;
}

export type AnnotationError = StageFailedError | ToolLaunchError | FileError;

export interface Annotator {
  readonly name: PipelineConfig["annotator"];
  readonly annotate: (
    request: AnnotationRequest
  ) => Effect.Effect<void, AnnotationError, ToolRunner | FileSystem.FileSystem>;
}

const STAGE = "annotate";

/** File DFAST always names its GFF output */
export const DFAST_GFF = "genome.gff";

/**
 * Prokka names its outputs after `--prefix`, so with the sample id as prefix
 * the GFF lands at `<outdir>/<id>.gff` with no further work
 */
export class ProkkaAnnotator implements Annotator {
  readonly name = "prokka";

  constructor(private readonly config: Pick<PipelineConfig, "executables" | "prokka">) {}

  annotate(
    request: AnnotationRequest
  ): Effect.Effect<void, AnnotationError, ToolRunner | FileSystem.FileSystem> {
    const config = this.config;
    return Effect.gen(function* () {
      const runner = yield* ToolRunner;
      const exitCode = yield* runner.run(
        prokkaCommand(config, {
          sampleId: request.sampleId,
          contigs: request.contigs,
          outputDirectory: request.outputDirectory,
        })
      );
      if (exitCode !== 0) {
        return yield* Effect.fail(
          StageFailedError.nonZeroExit(STAGE, request.sampleId, "prokka", exitCode)
        );
      }

      const produced = join(request.outputDirectory, `${request.sampleId}.gff`);
      if (produced !== request.output) {
        yield* moveProduced(produced, request);
      }
    });
  }
}

/**
 * DFAST always writes `genome.gff`; the adapter renames it to the requested path
 */
export class DfastAnnotator implements Annotator {
  readonly name = "dfast";

  constructor(private readonly config: Pick<PipelineConfig, "executables" | "dfast">) {}

  annotate(
    request: AnnotationRequest
  ): Effect.Effect<void, AnnotationError, ToolRunner | FileSystem.FileSystem> {
    const config = this.config;
    return Effect.gen(function* () {
      const runner = yield* ToolRunner;
      const exitCode = yield* runner.run(
        dfastCommand(config, { contigs: request.contigs, outputDirectory: request.outputDirectory })
      );
      if (exitCode !== 0) {
        return yield* Effect.fail(
          StageFailedError.nonZeroExit(STAGE, request.sampleId, "dfast", exitCode)
        );
      }

      yield* moveProduced(join(request.outputDirectory, DFAST_GFF), request);
    });
  }
}

function moveProduced(
  produced: string,
  request: AnnotationRequest
): Effect.Effect<void, MissingArtifactError | FileError, FileSystem.FileSystem> {
  return Effect.gen(function* () {
    if (!(yield* isFile(produced))) {
      return yield* Effect.fail(
        new MissingArtifactError(STAGE, request.sampleId, "annotation_gff", produced)
      );
    }
    yield* movePath(produced, request.output);
  });
}

/**
 * Pick the annotator the configuration names
 */
export function selectAnnotator(
  config: Pick<PipelineConfig, "annotator" | "executables" | "prokka" | "dfast">
): Annotator {
  switch (config.annotator) {
    case "prokka":
      return new ProkkaAnnotator(config);
    case "dfast":
      return new DfastAnnotator(config);
  }
}
