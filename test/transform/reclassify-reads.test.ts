import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { existsSync, mkdirSync, mkdtempSync, readFileSync, readdirSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { ArtifactLayout } from "../../src/layout/artifact-layout";
import { LayoutError } from "../../src/errors";
import { classifyProducedFile, PRINSEQ_PATTERN } from "../../src/transform/read-patterns";
import { reclassifyFilteredReads, removeProducedFiles } from "../../src/transform/reclassify-reads";

describe("classifyProducedFile", () => {
  test.each([
    ["S1_R1_paired.prinseq.fastq", { kind: "role", role: "R1_paired" }],
    ["S1_R2_paired.prinseq.fastq", { kind: "role", role: "R2_paired" }],
    ["S1_R1_singletons.prinseq.fastq", { kind: "discard" }],
    ["S1_R1_paired.fastq", { kind: "foreign" }],
    ["S2_R1_paired.prinseq.fastq", { kind: "unclassified" }],
  ])("%s", (name, expected) => {
    expect(classifyProducedFile(name, "S1", PRINSEQ_PATTERN)).toEqual(expected);
  });
});

describe("reclassifyFilteredReads", () => {
  let root: string;
  let source: string;
  let layout: ArtifactLayout;

  const touch = (name: string, content = name): void => {
    writeFileSync(join(source, name), content);
  };

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), "reclassify-test-"));
    source = join(root, "trimming", "S1");
    mkdirSync(source, { recursive: true });
    layout = new ArtifactLayout(root);
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  test("files paired outputs under their roles and deletes singletons", async () => {
    touch("S1_R1_paired.fastq");
    touch("S1_R1_paired.prinseq.fastq", "forward");
    touch("S1_R2_paired.prinseq.fastq", "reverse");
    touch("S1_R1_singletons.prinseq.fastq");

    const found = await reclassifyFilteredReads({ source, sample: "S1", layout });

    const r1 = layout.pathFor("filter", "S1", "R1_paired");
    const r2 = layout.pathFor("filter", "S1", "R2_paired");
    expect(found).toEqual({
      R1_paired: { fileName: "S1_R1_paired.prinseq.fastq", path: r1 },
      R2_paired: { fileName: "S1_R2_paired.prinseq.fastq", path: r2 },
    });
    expect(readFileSync(r1, "utf8")).toBe("forward");
    expect(readFileSync(r2, "utf8")).toBe("reverse");
    expect(readdirSync(source)).toEqual(["S1_R1_paired.fastq"]);
  });

  test("reports only the roles that exist", async () => {
    touch("S1_R1_paired.prinseq.fastq");

    const found = await reclassifyFilteredReads({ source, sample: "S1", layout });

    expect(Object.keys(found)).toEqual(["R1_paired"]);
  });

  test("moves unclassified produced files into the filter directory", async () => {
    touch("S1_R1_paired.prinseq.fastq");
    touch("S1_R2_paired.prinseq.fastq");
    touch("unnamed_prinseq_bad.fastq");

    await reclassifyFilteredReads({ source, sample: "S1", layout });

    expect(existsSync(join(layout.directoryFor("filter", "S1"), "unnamed_prinseq_bad.fastq"))).toBe(true);
  });

  test("rejects two files claiming one role", async () => {
    touch("S1_R1_a.prinseq.fastq");
    touch("S1_R1_b.prinseq.fastq");

    await expect(reclassifyFilteredReads({ source, sample: "S1", layout })).rejects.toThrow(LayoutError);
  });

  test("removeProducedFiles clears earlier outputs and keeps inputs", async () => {
    touch("S1_R1_paired.fastq");
    touch("S1_R1_paired.prinseq.fastq");
    touch("S1_R1_singletons.prinseq.fastq");

    const removed = await removeProducedFiles(source, "S1");

    expect(removed.sort()).toEqual(["S1_R1_paired.prinseq.fastq", "S1_R1_singletons.prinseq.fastq"]);
    expect(readdirSync(source)).toEqual(["S1_R1_paired.fastq"]);
  });
});
