/**
 * File writing operations using Effect Platform
 *
 * Promise-based wrappers over io/file-system.ts for the in-process
 * transformations (curation, reclassification, table post-processing).
 *
 * @module file-writer
 */

import { FileSystem } from "@effect/platform";
import { Effect } from "effect";
import { FileError } from "../errors";
import {
  ensureDirectory as ensureDirectoryEffect,
  movePath as movePathEffect,
  removePath as removePathEffect,
  walkFiles,
  type WalkedFile,
} from "./file-system";
import { runOn, runPlatform } from "./runtime";

/**
 * Handle for writing to a file multiple times within a scope
 */
export interface FileWriteHandle {
  writeString(content: string): Promise<void>;
}

/**
 * Create a directory and any missing parents
 */
export async function ensureDirectory(path: string): Promise<void> {
  await runPlatform(ensureDirectoryEffect(path));
}

/**
 * Move a file, replacing the destination
 */
export async function movePath(from: string, to: string): Promise<void> {
  await runPlatform(movePathEffect(from, to));
}

/**
 * Delete a file or directory; missing paths are ignored
 */
export async function deleteFile(path: string): Promise<void> {
  await runPlatform(removePathEffect(path));
}

/**
 * List every regular file below a directory
 */
export async function listFilesRecursive(root: string): Promise<readonly WalkedFile[]> {
  return runPlatform(walkFiles(root));
}

/**
 * Open file for writing and execute callback with write handle
 *
 * The file is truncated on open and closed when the callback settles,
 * whether it resolves or rejects.
 *
 * @example
 * ```typescript
 * await openForWriting("contigs.fasta", async (handle) => {
 *   for await (const record of records) {
 *     await handle.writeString(writer.formatSequence(record) + "\n");
 *   }
 * });
 * ```
 */
export async function openForWriting<T>(
  path: string,
  callback: (handle: FileWriteHandle) => Promise<T>
): Promise<T> {
  const encoder = new TextEncoder();

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const file = yield* fs
      .open(path, { flag: "w", mode: 0o644 })
      .pipe(Effect.mapError((error) => FileError.fromSystemError("open", path, error)));

    const runtime = yield* Effect.runtime<never>();

    const handle: FileWriteHandle = {
      writeString: (content: string): Promise<void> =>
        runOn(
          runtime,
          file
            .writeAll(encoder.encode(content))
            .pipe(Effect.mapError((error) => FileError.fromSystemError("write", path, error)))
        ),
    };

    return yield* Effect.tryPromise({
      try: () => callback(handle),
      catch: (error) => error,
    });
  });

  return runPlatform(program.pipe(Effect.scoped));
}
