/**
 * Immutable per-run context
 *
 * Built once at startup from the validated configuration and the manifests,
 * then passed explicitly to the orchestrator. Every check that can fail
 * before a tool runs happens here.
 */

import { join } from "node:path";
import { type Annotator, selectAnnotator } from "../annotation/annotator";
import { ConfigurationError, LayoutError } from "../errors";
import { exists } from "../io/file-reader";
import { ArtifactLayout } from "../layout/artifact-layout";
import { type AuxiliaryFiles, loadAuxiliaryManifest, loadSampleManifest } from "../manifest/manifest";
import type { Sample } from "../types";
import type { PipelineConfig } from "./schema";

export interface ReferenceGenome {
  /** Id the reference is annotated under; never equal to a sample id */
  readonly id: string;
  readonly genome: string;
}

export interface RunContext {
  readonly config: PipelineConfig;
  readonly outputRoot: string;
  readonly layout: ArtifactLayout;
  readonly annotator: Annotator;
  readonly homologySearch: boolean;
  readonly samples: readonly Sample[];
  readonly auxiliary: AuxiliaryFiles;
  readonly reference: ReferenceGenome | null;
}

export interface RunContextOptions {
  /** Clock used to name a fresh output root */
  readonly now?: Date;
}

/**
 * `pipeline_output_YYYYMMDD_HHMMSS`, in local time
 */
export function timestampedRootName(now: Date): string {
  const pad = (value: number): string => String(value).padStart(2, "0");
  const date = `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}`;
  const time = `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;
  return `pipeline_output_${date}_${time}`;
}

/**
 * Load manifests, check every input the configuration needs and fix the output root
 *
 * @throws {ConfigurationError} On any manifest, input-file or layout problem
 */
export async function createRunContext(
  config: PipelineConfig,
  options: RunContextOptions = {}
): Promise<RunContext> {
  if (config.resume && config.outputRoot === undefined) {
    throw new ConfigurationError("Resuming needs an explicit outputRoot to resume into");
  }

  const samples = await loadSampleManifest(config.manifests.samples);
  const auxiliary = await loadAuxiliaryManifest(config.manifests.auxiliary);
  const auxiliarySource = config.manifests.auxiliary;

  if (config.trimming.enabled && auxiliary.adapters === null) {
    throw new ConfigurationError("Trimming is enabled but no adapter file is listed", auxiliarySource);
  }
  if (config.homologySearch.enabled && auxiliary.proteinDatabase === null) {
    throw new ConfigurationError(
      "Homology search is enabled but no protein database is listed",
      auxiliarySource
    );
  }

  const reference =
    auxiliary.reference === null ? null : { id: config.reference.id, genome: auxiliary.reference };
  if (reference !== null) {
    const clash = samples.find((sample) => sample.id.toLowerCase() === reference.id.toLowerCase());
    if (clash !== undefined) {
      throw new ConfigurationError(
        `Reference id '${reference.id}' collides with sample '${clash.id}'; set reference.id to another name`
      );
    }
  }

  const required: { label: string; path: string }[] = samples.flatMap((sample) => [
    { label: `forward reads of ${sample.id}`, path: sample.forward },
    { label: `reverse reads of ${sample.id}`, path: sample.reverse },
  ]);
  if (config.trimming.enabled && auxiliary.adapters !== null) {
    required.push({ label: "adapter sequences", path: auxiliary.adapters });
  }
  if (config.homologySearch.enabled && auxiliary.proteinDatabase !== null) {
    required.push({ label: "protein database", path: auxiliary.proteinDatabase });
  }
  if (reference !== null) {
    required.push({ label: "reference genome", path: reference.genome });
  }
  for (const input of required) {
    if (!(await exists(input.path))) {
      throw new ConfigurationError(`Missing ${input.label}: ${input.path}`);
    }
  }

  const outputRoot =
    config.outputRoot ?? join(config.outputDirectory, timestampedRootName(options.now ?? new Date()));
  const layout = new ArtifactLayout(outputRoot);
  try {
    layout.auditLayout([...samples.map((sample) => sample.id), ...(reference !== null ? [reference.id] : [])]);
  } catch (error) {
    if (error instanceof LayoutError) {
      throw new ConfigurationError(error.message);
    }
    throw error;
  }

  return {
    config,
    outputRoot,
    layout,
    annotator: selectAnnotator(config),
    homologySearch: config.homologySearch.enabled,
    samples,
    auxiliary,
    reference,
  };
}
