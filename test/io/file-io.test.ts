/**
 * Tests for the decompressing copy and scoped file writing
 */

import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { Effect, Runtime } from "effect";
import { gzipSync, strToU8 } from "fflate";
import { FileError } from "../../src/errors";
import { copyDecompressed, isGzipPath } from "../../src/io/file-system";
import { openForWriting } from "../../src/io/file-writer";
import { runOn, runPlatform } from "../../src/io/runtime";

describe("file I/O", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "file-io-test-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  describe("copyDecompressed", () => {
    test("inflates a .gz source", async () => {
      const source = join(dir, "S1_1.fastq.gz");
      const target = join(dir, "S1_R1_paired.fastq");
      writeFileSync(source, gzipSync(strToU8("@r1\nACGT\n+\nIIII\n")));

      await runPlatform(copyDecompressed(source, target));

      expect(readFileSync(target, "utf8")).toBe("@r1\nACGT\n+\nIIII\n");
    });

    test("copies a plain source as it is", async () => {
      const source = join(dir, "S1_1.fastq");
      const target = join(dir, "copy.fastq");
      writeFileSync(source, "@r1\nACGT\n+\nIIII\n");

      await runPlatform(copyDecompressed(source, target));

      expect(readFileSync(target, "utf8")).toBe("@r1\nACGT\n+\nIIII\n");
    });

    test("fails with FileError when a .gz source is not gzip data", async () => {
      const source = join(dir, "broken.fastq.gz");
      writeFileSync(source, "not compressed");

      await expect(runPlatform(copyDecompressed(source, join(dir, "out.fastq")))).rejects.toMatchObject({
        name: "FileError",
        filePath: source,
        operation: "read",
      });
    });

    test("recognises .gz names regardless of case", () => {
      expect(isGzipPath("reads/S1_1.FASTQ.GZ")).toBe(true);
      expect(isGzipPath("reads/S1_1.fastq")).toBe(false);
    });
  });

  describe("openForWriting", () => {
    test("appends every write to the same truncated file", async () => {
      const path = join(dir, "out.tsv");
      writeFileSync(path, "stale\n");

      const rows = await openForWriting(path, async (handle) => {
        for (const row of ["a\t1\n", "b\t2\n", "c\t3\n"]) {
          await handle.writeString(row);
        }
        return 3;
      });

      expect(rows).toBe(3);
      expect(readFileSync(path, "utf8")).toBe("a\t1\nb\t2\nc\t3\n");
    });

    test("rejects with the callback's error", async () => {
      const attempt = openForWriting(join(dir, "out.tsv"), async () => {
        throw new FileError("disk full", "out.tsv", "write");
      });

      await expect(attempt).rejects.toThrow(FileError);
    });
  });

  describe("runOn", () => {
    test("resolves with the program's value", async () => {
      expect(await runOn(Runtime.defaultRuntime, Effect.succeed(42))).toBe(42);
    });

    test("rejects with the program's own error", async () => {
      const error = new FileError("denied", "/runs/out", "write");

      await expect(runOn(Runtime.defaultRuntime, Effect.fail(error))).rejects.toBe(error);
    });
  });
});
