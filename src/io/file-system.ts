/**
 * Filesystem operations as Effect programs
 *
 * Every operation requires the @effect/platform FileSystem service and fails
 * with a FileError naming the path and operation. The orchestrator composes
 * these directly; file-reader.ts and file-writer.ts expose Promise versions.
 *
 * @module io/file-system
 */

import { FileSystem } from "@effect/platform";
import { Effect } from "effect";
import { gunzipSync } from "fflate";
import { basename, join } from "node:path";
import { FileError } from "../errors";

/**
 * Check whether a path exists and is a regular file
 */
export const isFile = (path: string): Effect.Effect<boolean, FileError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    if (!(yield* fs.exists(path))) return false;
    const info = yield* fs.stat(path);
    return info.type === "File";
  }).pipe(Effect.mapError((error) => FileError.fromSystemError("stat", path, error)));

/**
 * Create a directory and its parents; an existing directory is not an error
 */
export const ensureDirectory = (
  path: string
): Effect.Effect<void, FileError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    yield* fs.makeDirectory(path, { recursive: true });
  }).pipe(Effect.mapError((error) => FileError.fromSystemError("mkdir", path, error)));

/**
 * Remove a file or directory tree; a missing path is not an error
 */
export const removePath = (path: string): Effect.Effect<void, FileError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    if (!(yield* fs.exists(path))) return;
    yield* fs.remove(path, { recursive: true });
  }).pipe(Effect.mapError((error) => FileError.fromSystemError("remove", path, error)));

/**
 * Move a file, replacing the destination
 */
export const movePath = (
  from: string,
  to: string
): Effect.Effect<void, FileError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    yield* fs.rename(from, to);
  }).pipe(Effect.mapError((error) => FileError.fromSystemError("move", from, error)));

/**
 * Copy a file, replacing the destination
 */
export const copyPath = (
  from: string,
  to: string
): Effect.Effect<void, FileError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    yield* fs.copyFile(from, to);
  }).pipe(Effect.mapError((error) => FileError.fromSystemError("copy", from, error)));

/**
 * Whether a path names a gzip-compressed file
 */
export function isGzipPath(path: string): boolean {
  return path.toLowerCase().endsWith(".gz");
}

/**
 * Copy a file, inflating it first when its name ends in `.gz`
 *
 * External tools that take plain FASTA or FASTQ get the inflated bytes.
 */
export const copyDecompressed = (
  from: string,
  to: string
): Effect.Effect<void, FileError, FileSystem.FileSystem> =>
  isGzipPath(from)
    ? Effect.gen(function* () {
        const fs = yield* FileSystem.FileSystem;
        const compressed = yield* fs
          .readFile(from)
          .pipe(Effect.mapError((error) => FileError.fromSystemError("read", from, error)));
        const inflated = yield* Effect.try({
          try: () => gunzipSync(compressed),
          catch: (error) =>
            new FileError(
              `Cannot decompress ${from}: ${error instanceof Error ? error.message : String(error)}`,
              from,
              "read",
              error
            ),
        });
        yield* fs
          .writeFile(to, inflated)
          .pipe(Effect.mapError((error) => FileError.fromSystemError("write", to, error)));
      })
    : copyPath(from, to);

/**
 * Overwrite a file with string content
 */
export const writeText = (
  path: string,
  content: string
): Effect.Effect<void, FileError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    yield* fs.writeFileString(path, content);
  }).pipe(Effect.mapError((error) => FileError.fromSystemError("write", path, error)));

/**
 * Read a whole file as UTF-8
 */
export const readText = (path: string): Effect.Effect<string, FileError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    return yield* fs.readFileString(path);
  }).pipe(Effect.mapError((error) => FileError.fromSystemError("read", path, error)));

/**
 * A regular file found while walking a directory tree
 */
export interface WalkedFile {
  /** Absolute (or root-relative, matching the root given) path */
  readonly path: string;
  /** Final path segment */
  readonly name: string;
}

/**
 * List every regular file below a directory, recursively, in sorted order
 */
export const walkFiles = (
  root: string
): Effect.Effect<readonly WalkedFile[], FileError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const entries = yield* fs.readDirectory(root, { recursive: true });
    const files: WalkedFile[] = [];

    for (const entry of [...entries].sort()) {
      const path = join(root, entry);
      const info = yield* fs.stat(path);
      if (info.type === "File") {
        files.push({ path, name: basename(entry) });
      }
    }

    return files;
  }).pipe(Effect.mapError((error) => FileError.fromSystemError("list", root, error)));
