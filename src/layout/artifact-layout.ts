/**
 * Artifact addressing: (stage, sample, role) to a canonical path
 *
 * Per-sample artifacts live at `<root>/<stage directory>/<sample>/<file>`,
 * cross-sample artifacts at `<root>/<stage directory>/<file>`. Paths are
 * computed, never looked up, so two calls with equal arguments always agree.
 *
 * @module layout/artifact-layout
 */

import { type } from "arktype";
import { join } from "node:path";
import { LayoutError } from "../errors";
import { SampleIdSchema } from "../types";
import {
  type ArtifactRole,
  STAGE_DECLARATIONS,
  STAGES,
  type Stage,
  isPerSampleStage,
  rolesOf,
} from "./stages";

/**
 * Name of the empty file written once a stage's artifacts are verified
 */
export const COMPLETION_MARKER = ".complete";

/**
 * Reject identifiers that could act as path segments other than a plain name
 *
 * @throws {LayoutError} When the identifier is not a valid sample id
 */
export function validateSampleId(sample: string): string {
  const result = SampleIdSchema(sample);
  if (result instanceof type.errors) {
    throw new LayoutError(
      `Invalid sample id ${JSON.stringify(sample)}: ids must start with a letter or digit and contain only letters, digits, '.', '_' or '-'`,
      result.summary
    );
  }
  return result;
}

/**
 * Pure path computation over one run root
 *
 * @example
 * ```typescript
 * const layout = new ArtifactLayout("/data/pipeline_output_20240101_120000");
 * layout.pathFor("curate_contigs", "S1", "contigs_curated");
 * // "/data/pipeline_output_20240101_120000/contigs/S1/S1_contigs.fasta"
 * layout.pathFor("cross_sample_typing", null, "typing_report");
 * // "/data/pipeline_output_20240101_120000/typing/mlst.txt"
 * ```
 */
export class ArtifactLayout {
  constructor(readonly root: string) {
    if (root.length === 0) {
      throw new LayoutError("Artifact layout root must not be empty");
    }
  }

  /**
   * Directory a stage writes into: the sample's subtree for per-sample
   * stages, the stage directory itself for cross-sample stages
   *
   * @throws {LayoutError} On a scope mismatch or an invalid sample id
   */
  directoryFor(stage: Stage, sample: string | null): string {
    const declaration = STAGE_DECLARATIONS[stage];
    const stageDirectory = join(this.root, declaration.directory);

    if (isPerSampleStage(stage)) {
      if (sample === null) {
        throw new LayoutError(`Stage '${stage}' is per-sample and needs a sample id`);
      }
      return join(stageDirectory, validateSampleId(sample));
    }

    if (sample !== null) {
      throw new LayoutError(
        `Stage '${stage}' runs once per run and takes no sample id (got '${sample}')`
      );
    }
    return stageDirectory;
  }

  /**
   * @throws {LayoutError} When the stage does not declare the role
   */
  pathFor(stage: Stage, sample: string | null, role: ArtifactRole): string {
    const declaration = STAGE_DECLARATIONS[stage].roles[role];
    if (declaration === undefined) {
      throw new LayoutError(
        `Stage '${stage}' declares no artifact role '${role}'`,
        `declared roles: ${rolesOf(stage).join(", ")}`
      );
    }

    const directory = this.directoryFor(stage, sample);
    return join(directory, declaration.file(sample ?? ""));
  }

  markerFor(stage: Stage, sample: string | null): string {
    return join(this.directoryFor(stage, sample), COMPLETION_MARKER);
  }

  /**
   * Roles that must exist for the stage to count as complete
   */
  requiredRoles(stage: Stage): ArtifactRole[] {
    return rolesOf(stage).filter((role) => STAGE_DECLARATIONS[stage].roles[role]?.required === true);
  }

  /**
   * Check a whole run's address space for collisions before anything is written
   *
   * Paths are compared case-insensitively, since the output tree may sit on
   * a case-insensitive filesystem.
   *
   * @returns Number of distinct paths checked
   * @throws {LayoutError} On an invalid id, ids that differ only in case, or
   * two triples resolving to the same path
   */
  auditLayout(sampleIds: readonly string[]): number {
    const foldedIds = new Map<string, string>();
    for (const sample of sampleIds) {
      validateSampleId(sample);
      const folded = sample.toLowerCase();
      const previous = foldedIds.get(folded);
      if (previous !== undefined) {
        throw new LayoutError(
          previous === sample
            ? `Duplicate sample id '${sample}'`
            : `Sample ids '${previous}' and '${sample}' differ only in case`
        );
      }
      foldedIds.set(folded, sample);
    }

    const seen = new Map<string, string>();
    const claim = (path: string, owner: string): void => {
      const key = path.toLowerCase();
      const existing = seen.get(key);
      if (existing !== undefined) {
        throw new LayoutError(`Artifact path collision: ${owner} and ${existing} both map to ${path}`);
      }
      seen.set(key, owner);
    };

    for (const stage of STAGES) {
      const owners: (string | null)[] = isPerSampleStage(stage) ? [...sampleIds] : [null];
      for (const sample of owners) {
        const label = sample === null ? stage : `${stage}/${sample}`;
        claim(this.markerFor(stage, sample), `${label}/marker`);
        for (const role of rolesOf(stage)) {
          claim(this.pathFor(stage, sample, role), `${label}/${role}`);
        }
      }
    }

    return seen.size;
  }
}
