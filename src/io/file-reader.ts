/**
 * File reading utilities
 *
 * Promise-based reads backed by the @effect/platform FileSystem service.
 * Line reading streams plain files chunk by chunk; gzip-compressed inputs
 * (`.gz`, e.g. a compressed reference protein database) are inflated with
 * fflate before being split into lines.
 */

import { FileSystem } from "@effect/platform";
import { type } from "arktype";
import { Effect, Stream } from "effect";
import { gunzipSync, strFromU8 } from "fflate";
import { FileError } from "../errors";
import type { FilePath } from "../types";
import { FilePathSchema } from "../types";
import { isFile, isGzipPath, readText } from "./file-system";
import { runPlatform } from "./runtime";

/**
 * Check if a file exists and is a regular file
 *
 * @throws {FileError} If path validation fails
 */
export async function exists(path: string): Promise<boolean> {
  return runPlatform(isFile(validatePath(path)));
}

/**
 * Read entire file to string
 *
 * @throws {FileError} If the file cannot be read
 */
export async function readToString(path: string): Promise<string> {
  const validatedPath = validatePath(path);
  if (isGzipPath(validatedPath)) {
    return strFromU8(gunzipSync(await readBytes(validatedPath)));
  }
  return runPlatform(readText(validatedPath));
}

/**
 * Stream the lines of a text file, without line terminators
 *
 * @throws {FileError} If the file does not exist or cannot be read
 * @example
 * ```typescript
 * for await (const line of readLines("contigs.fasta")) {
 *   if (line.startsWith(">")) headers++;
 * }
 * ```
 */
export async function* readLines(path: string): AsyncIterable<string> {
  const validatedPath = validatePath(path);

  if (!(await exists(validatedPath))) {
    throw new FileError(`File not found: ${validatedPath}`, validatedPath, "read");
  }

  if (isGzipPath(validatedPath)) {
    const text = strFromU8(gunzipSync(await readBytes(validatedPath)));
    yield* text.split(/\r?\n/);
    return;
  }

  const stream = await runPlatform(
    Effect.gen(function* () {
      const fs = yield* FileSystem.FileSystem;
      return Stream.toReadableStream(
        fs.stream(validatedPath).pipe(Stream.decodeText(), Stream.splitLines)
      );
    })
  );

  const reader = stream.getReader();
  let finished = false;
  try {
    while (true) {
      let chunk: ReadableStreamReadResult<string>;
      try {
        chunk = await reader.read();
      } catch (error) {
        throw FileError.fromSystemError("read", validatedPath, error);
      }
      if (chunk.done) {
        finished = true;
        break;
      }
      yield chunk.value;
    }
  } finally {
    if (!finished) {
      await reader.cancel();
    }
    reader.releaseLock();
  }
}

async function readBytes(path: FilePath): Promise<Uint8Array> {
  return runPlatform(
    Effect.gen(function* () {
      const fs = yield* FileSystem.FileSystem;
      return yield* fs.readFile(path);
    }).pipe(Effect.mapError((error) => FileError.fromSystemError("read", path, error)))
  );
}

/**
 * Validate file path using ArkType, keeping the FileError contract for callers
 */
function validatePath(path: string): FilePath {
  const validationResult = FilePathSchema(path);
  if (validationResult instanceof type.errors) {
    throw new FileError(`Invalid file path: ${validationResult.summary}`, path, "stat");
  }
  return validationResult;
}
