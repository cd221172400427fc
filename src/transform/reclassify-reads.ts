/**
 * Filtered-read reclassification
 *
 * Walks the directory the filter tool wrote into, deletes its low-quality
 * singleton files and files the paired outputs under their canonical
 * (filter, sample, role) paths.
 */

import { basename, join } from "node:path";
import { LayoutError } from "../errors";
import { deleteFile, ensureDirectory, listFilesRecursive, movePath } from "../io/file-writer";
import type { ArtifactLayout } from "../layout/artifact-layout";
import { validateSampleId } from "../layout/artifact-layout";
import type { PairedReadRole } from "../layout/stages";
import { classifyProducedFile, PRINSEQ_PATTERN, type ProducedFilePattern } from "./read-patterns";

export interface ReclassifiedFile {
  /** Name the tool gave the file */
  readonly fileName: string;
  /** Where the file now lives */
  readonly path: string;
}

/**
 * Roles actually found; zero, one or both may be present
 */
export type ReclassifiedReads = Partial<Record<PairedReadRole, ReclassifiedFile>>;

export interface ReclassifyOptions {
  readonly source: string;
  readonly sample: string;
  readonly layout: ArtifactLayout;
  readonly pattern?: ProducedFilePattern;
}

/**
 * Delete every file a previous run of the tool left in `source`
 *
 * @returns Names of the deleted files
 */
export async function removeProducedFiles(
  source: string,
  sample: string,
  pattern: ProducedFilePattern = PRINSEQ_PATTERN
): Promise<string[]> {
  const removed: string[] = [];
  for (const file of await listFilesRecursive(source)) {
    if (classifyProducedFile(file.name, sample, pattern).kind !== "foreign") {
      await deleteFile(file.path);
      removed.push(file.name);
    }
  }
  return removed;
}

/**
 * Sort a filter tool's outputs by role
 *
 * Callers decide what a missing role means; this only reports what exists.
 *
 * @throws {LayoutError} When two files claim the same role
 * @throws {FileError} When a file cannot be moved or deleted
 */
export async function reclassifyFilteredReads(
  options: ReclassifyOptions
): Promise<ReclassifiedReads> {
  const { source, layout } = options;
  const sample = validateSampleId(options.sample);
  const pattern = options.pattern ?? PRINSEQ_PATTERN;
  const destination = layout.directoryFor("filter", sample);

  const files = await listFilesRecursive(source);
  const found: ReclassifiedReads = {};
  const moves: { from: string; to: string }[] = [];

  for (const file of files) {
    const classification = classifyProducedFile(file.name, sample, pattern);

    switch (classification.kind) {
      case "foreign":
        break;
      case "discard":
        await deleteFile(file.path);
        break;
      case "role": {
        const previous = found[classification.role];
        if (previous !== undefined) {
          throw new LayoutError(
            `Files '${previous.fileName}' and '${file.name}' both claim role ${classification.role} for sample '${sample}'`
          );
        }
        const target = layout.pathFor("filter", sample, classification.role);
        found[classification.role] = { fileName: file.name, path: target };
        moves.push({ from: file.path, to: target });
        break;
      }
      case "unclassified":
        moves.push({ from: file.path, to: join(destination, basename(file.path)) });
        break;
    }
  }

  await ensureDirectory(destination);
  for (const move of moves) {
    if (move.from !== move.to) {
      await movePath(move.from, move.to);
    }
  }

  return found;
}
