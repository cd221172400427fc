/**
 * End-to-end orchestration against a fake tool runner
 */

import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { existsSync, mkdtempSync, readFileSync, rmSync, unlinkSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { createRunContext, type RunContext } from "../../src/config/run-context";
import { RunAbortedError, StageFailedError } from "../../src/errors";
import { COMBINED_ID_SEPARATOR, QUERY_PROTEINS_NAME } from "../../src/pipeline/cross-sample";
import { executePipeline } from "../../src/pipeline/orchestrator";
import { findCompletedSamples } from "../../src/pipeline/progress";
import { createFakeTools } from "../utils/tool-layers";
import {
  FIXTURE_PROTEINS,
  fixtureConfig,
  readContent,
  writeRunFixture,
  type RunFixtureOptions,
} from "../utils/run-fixtures";

describe("executePipeline", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "pipeline-test-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  async function setup(
    overrides: Record<string, unknown> = {},
    fixtureOptions: RunFixtureOptions = {}
  ): Promise<RunContext> {
    return createRunContext(fixtureConfig(writeRunFixture(dir, fixtureOptions), overrides));
  }

  test("runs every stage for two samples", async () => {
    const context = await setup();
    const tools = createFakeTools();

    const report = await executePipeline(context, { toolRunner: tools.layer });
    const { layout } = context;

    expect(report.samples.map((sample) => sample.sample)).toEqual(["S1", "S2"]);
    expect(report.samples[0]?.stages).toEqual([
      { stage: "trim", outcome: "completed" },
      { stage: "filter", outcome: "completed" },
      { stage: "assemble", outcome: "completed" },
      { stage: "curate_contigs", outcome: "completed" },
      { stage: "stats", outcome: "completed" },
      { stage: "annotate", outcome: "completed" },
    ]);
    expect(report.crossSample.map((result) => result.stage)).toEqual([
      "cross_sample_typing",
      "cross_sample_virulence",
      "cross_sample_resistance",
      "homology_search",
      "pangenome",
      "pangenome_plots",
    ]);
    expect(report.reference).toBeNull();

    for (const sample of ["S1", "S2"]) {
      const curated = readFileSync(layout.pathFor("curate_contigs", sample, "contigs_curated"), "utf8");
      expect(curated.split("\n").filter((line) => line.startsWith(">"))).toEqual([
        ">C_1_length_300",
        ">C_3_length_250",
      ]);
      expect(readFileSync(layout.pathFor("annotate", sample, "annotation_gff"), "utf8")).toBe(
        `##gff-version 3\n##sample ${sample}\n`
      );
      expect(existsSync(layout.pathFor("filter", sample, "R1_paired"))).toBe(true);
      expect(existsSync(layout.markerFor("annotate", sample))).toBe(true);
    }

    expect(readFileSync(layout.pathFor("cross_sample_typing", null, "typing_report"), "utf8")).toBe(
      "S1_contigs.fasta\tok\nS2_contigs.fasta\tok\n"
    );
    expect(existsSync(layout.pathFor("cross_sample_virulence", null, "virulence_report"))).toBe(true);
    expect(existsSync(layout.pathFor("cross_sample_resistance", null, "resistance_report"))).toBe(true);
    expect(existsSync(layout.pathFor("pangenome_plots", null, "pangenome_plot"))).toBe(true);

    const roary = tools.calls.filter((call) => call.tool === "roary");
    expect(roary).toHaveLength(1);
    expect(roary[0]?.args.slice(-2)).toEqual(report.annotations);
    expect(report.annotations).toEqual([
      layout.pathFor("annotate", "S1", "annotation_gff"),
      layout.pathFor("annotate", "S2", "annotation_gff"),
    ]);
  });

  test("files prinseq's paired outputs and discards its singletons", async () => {
    const context = await setup({}, { samples: ["S1"] });

    await executePipeline(context, { toolRunner: createFakeTools().layer });

    const trimDirectory = context.layout.directoryFor("trim", "S1");
    expect(existsSync(join(trimDirectory, "S1_R1_paired_prinseq_good_singletons_Zq9k.fastq"))).toBe(false);
    expect(existsSync(join(trimDirectory, "S1_R1_paired_prinseq_good_Ab3x.fastq"))).toBe(false);
    expect(existsSync(context.layout.pathFor("filter", "S1", "filter_log"))).toBe(true);
  });

  test("combines contigs with sample-prefixed ids and post-processes hits", async () => {
    const context = await setup();
    const hits = [
      ["protA", "S1|C_1_length_300", "97.5", "150", "3", "0", "1", "150", "10", "459", "1e-40", "280", "MAAA"],
      ["protA", "S2|C_3_length_250", "42.0", "150", "3", "0", "1", "75", "10", "234", "1e-5", "80", "MAAA"],
    ]
      .map((row) => row.join("\t"))
      .join("\n");

    await executePipeline(context, { toolRunner: createFakeTools({ blastHits: `${hits}\n` }).layer });

    const combined = readFileSync(context.layout.pathFor("homology_search", null, "homology_contigs"), "utf8");
    expect(combined.split("\n").filter((line) => line.startsWith(">"))).toEqual([
      `>S1${COMBINED_ID_SEPARATOR}C_1_length_300`,
      ">S1|C_3_length_250",
      ">S2|C_1_length_300",
      ">S2|C_3_length_250",
    ]);

    const report = readFileSync(context.layout.pathFor("homology_search", null, "homology_report"), "utf8");
    expect(report.split("\n")).toEqual([
      "qseqid\tsseqid\tqlen\tpcov\tpident\tlength\tmismatch\tgapopen\tqstart\tqend\tsstart\tsend\tevalue\tbitscore\tsseq",
      "protA\tS1|C_1_length_300\t150\t100.0\t97.5\t150\t3\t0\t1\t150\t10\t459\t1e-40\t280\tMAAA",
      "",
    ]);
  });

  test("stops after a failed chain and skips the cross-sample phase", async () => {
    const context = await setup({}, { samples: ["S1", "S2", "S3"] });
    const tools = createFakeTools({
      failWhen: (call) => (call.tool === "spades" && call.args.includes(context.layout.directoryFor("assemble", "S2")) ? 1 : undefined),
    });

    const attempt = executePipeline(context, { toolRunner: tools.layer });

    await expect(attempt).rejects.toThrow(RunAbortedError);
    const error = await attempt.catch((caught: unknown) => caught);
    if (!(error instanceof RunAbortedError)) throw new Error("expected RunAbortedError");
    expect(error.notStarted).toEqual(["S3"]);
    expect(error.failures.map((failure) => failure.message)).toEqual([
      "Stage 'assemble' for sample 'S2' failed: spades.py exited with code 1",
    ]);
    const [failure] = error.failures;
    expect(failure).toBeInstanceOf(StageFailedError);

    expect(existsSync(context.layout.pathFor("annotate", "S1", "annotation_gff"))).toBe(true);
    expect(existsSync(context.layout.markerFor("assemble", "S2"))).toBe(false);
    expect(existsSync(context.layout.directoryFor("trim", "S3"))).toBe(false);
    expect(tools.calls.some((call) => call.tool === "mlst")).toBe(false);
  });

  test("fails a cross-sample stage with its name and no sample", async () => {
    const context = await setup({}, { samples: ["S1"] });
    const tools = createFakeTools({ failWhen: (call) => (call.tool === "roary" ? 2 : undefined) });

    await expect(executePipeline(context, { toolRunner: tools.layer })).rejects.toMatchObject({
      name: "StageFailedError",
      stage: "pangenome",
      sample: null,
      exitCode: 2,
    });
    expect(tools.calls.some((call) => call.tool === "roaryPlots")).toBe(false);
  });

  test("runs samples concurrently and still finishes every chain", async () => {
    const context = await setup({ parallelism: 2 }, { samples: ["S1", "S2", "S3"] });
    const tools = createFakeTools();

    const report = await executePipeline(context, { toolRunner: tools.layer });

    expect(report.samples.map((sample) => sample.sample)).toEqual(["S1", "S2", "S3"]);
    expect(tools.calls.filter((call) => call.tool === "prokka")).toHaveLength(3);
  });

  test("resume skips completed stages and reruns a stage whose marker is gone", async () => {
    await executePipeline(await setup(), { toolRunner: createFakeTools().layer });

    const resumed = await setup({ resume: true });
    const idle = createFakeTools();
    const report = await executePipeline(resumed, { toolRunner: idle.layer });

    expect(idle.calls).toEqual([]);
    expect(report.samples.flatMap((sample) => sample.stages).every((stage) => stage.outcome === "skipped")).toBe(true);
    expect(report.crossSample.every((stage) => stage.outcome === "skipped")).toBe(true);

    unlinkSync(resumed.layout.markerFor("annotate", "S2"));
    const partial = createFakeTools();
    const rerun = await executePipeline(resumed, { toolRunner: partial.layer });

    expect(partial.calls.map((call) => call.tool)).toEqual([
      "prokka",
      "mlst",
      "abricate",
      "abricate",
      "makeblastdb",
      "tblastn",
      "roary",
      "roaryPlots",
    ]);
    expect(partial.calls[0]?.args).toContain("S2");
    expect(rerun.samples[1]?.stages[5]).toEqual({ stage: "annotate", outcome: "completed" });
    expect(rerun.crossSample.every((stage) => stage.outcome === "completed")).toBe(true);
  });

  test("resume reruns every stage after the first one that runs", async () => {
    await executePipeline(await setup(), { toolRunner: createFakeTools().layer });
    const resumed = await setup({ resume: true });
    unlinkSync(resumed.layout.markerFor("assemble", "S2"));

    const tools = createFakeTools();
    const report = await executePipeline(resumed, { toolRunner: tools.layer });

    expect(report.samples[0]?.stages.every((stage) => stage.outcome === "skipped")).toBe(true);
    expect(report.samples[1]?.stages.map((stage) => stage.outcome)).toEqual([
      "skipped",
      "skipped",
      "completed",
      "completed",
      "completed",
      "completed",
    ]);
    expect(tools.calls.slice(0, 3).map((call) => call.tool)).toEqual(["spades", "quast", "prokka"]);
  });

  test("resume with an added sample reruns the cross-sample phase over every sample", async () => {
    await executePipeline(await setup({}, { samples: ["S1"] }), { toolRunner: createFakeTools().layer });

    const resumed = await setup({ resume: true }, { samples: ["S1", "S2"] });
    const tools = createFakeTools();
    const report = await executePipeline(resumed, { toolRunner: tools.layer });
    const { layout } = resumed;

    expect(report.samples[0]?.stages.every((stage) => stage.outcome === "skipped")).toBe(true);
    expect(report.samples[1]?.stages.every((stage) => stage.outcome === "completed")).toBe(true);
    expect(report.crossSample.every((stage) => stage.outcome === "completed")).toBe(true);
    expect(readFileSync(layout.pathFor("cross_sample_typing", null, "typing_report"), "utf8")).toBe(
      "S1_contigs.fasta\tok\nS2_contigs.fasta\tok\n"
    );
    expect(tools.calls.find((call) => call.tool === "roary")?.args.slice(-2)).toEqual([
      layout.pathFor("annotate", "S1", "annotation_gff"),
      layout.pathFor("annotate", "S2", "annotation_gff"),
    ]);
  });

  test("resume with a removed sample reruns the cross-sample phase", async () => {
    await executePipeline(await setup(), { toolRunner: createFakeTools().layer });

    const resumed = await setup({ resume: true }, { samples: ["S1"] });
    const tools = createFakeTools();
    const report = await executePipeline(resumed, { toolRunner: tools.layer });

    expect(report.samples[0]?.stages.every((stage) => stage.outcome === "skipped")).toBe(true);
    expect(report.crossSample.every((stage) => stage.outcome === "completed")).toBe(true);
    expect(tools.calls[0]?.tool).toBe("mlst");
    expect(
      readFileSync(resumed.layout.pathFor("cross_sample_typing", null, "typing_report"), "utf8")
    ).toBe("S1_contigs.fasta\tok\n");
  });

  test("reports completed samples for restart", async () => {
    const context = await setup();
    await executePipeline(context, { toolRunner: createFakeTools().layer });

    expect(await findCompletedSamples(context.layout, ["S1", "S2", "S9"])).toEqual(["S1", "S2"]);

    unlinkSync(context.layout.pathFor("annotate", "S1", "annotation_gff"));
    expect(await findCompletedSamples(context.layout, ["S1", "S2"])).toEqual(["S2"]);
  });

  test("annotates the reference genome and adds it to the pan-genome", async () => {
    const context = await setup({}, { reference: true });
    const tools = createFakeTools();

    const report = await executePipeline(context, { toolRunner: tools.layer });

    const referenceGff = context.layout.pathFor("annotate", "reference", "annotation_gff");
    expect(report.reference).toEqual({ sample: "reference", stages: [{ stage: "annotate", outcome: "completed" }] });
    expect(report.annotations).toHaveLength(3);
    expect(report.annotations[2]).toBe(referenceGff);
    expect(readFileSync(referenceGff, "utf8")).toBe("##gff-version 3\n##sample reference\n");

    const prokka = tools.calls.filter((call) => call.tool === "prokka");
    expect(prokka.at(-1)?.args.at(-1)).toBe(join(dir, "reference.fasta"));
    expect(tools.calls.find((call) => call.tool === "roary")?.args.at(-1)).toBe(referenceGff);
  });

  test("moves dfast's genome.gff to the sample's annotation path", async () => {
    const context = await setup({ annotator: "dfast" }, { samples: ["S1"] });
    const tools = createFakeTools();

    await executePipeline(context, { toolRunner: tools.layer });

    const gff = context.layout.pathFor("annotate", "S1", "annotation_gff");
    expect(readFileSync(gff, "utf8")).toBe("##gff-version 3\n");
    expect(existsSync(join(context.layout.directoryFor("annotate", "S1"), "genome.gff"))).toBe(false);
    expect(tools.calls.some((call) => call.tool === "prokka")).toBe(false);
  });

  test("passes raw reads through when trimming is disabled", async () => {
    const context = await setup(
      { trimming: { enabled: false }, homologySearch: { enabled: false }, pangenome: { plots: false } },
      { samples: ["S1"], adapters: false, proteins: false }
    );
    const tools = createFakeTools();

    const report = await executePipeline(context, { toolRunner: tools.layer });

    expect(tools.calls.map((call) => call.tool)).toEqual([
      "prinseq",
      "spades",
      "quast",
      "prokka",
      "mlst",
      "abricate",
      "abricate",
      "roary",
    ]);
    expect(report.crossSample.map((result) => result.stage)).toEqual([
      "cross_sample_typing",
      "cross_sample_virulence",
      "cross_sample_resistance",
      "pangenome",
    ]);
    expect(readFileSync(context.layout.pathFor("trim", "S1", "R1_paired"), "utf8")).toBe(readContent("S1", 1));
  });

  test("inflates gzip-compressed reads when trimming is disabled", async () => {
    const context = await setup(
      { trimming: { enabled: false }, homologySearch: { enabled: false }, pangenome: { plots: false } },
      { samples: ["S1"], adapters: false, proteins: false, gzip: true }
    );

    await executePipeline(context, { toolRunner: createFakeTools().layer });

    expect(readFileSync(context.layout.pathFor("trim", "S1", "R1_paired"), "utf8")).toBe(readContent("S1", 1));
    expect(readFileSync(context.layout.pathFor("trim", "S1", "R2_paired"), "utf8")).toBe(readContent("S1", 2));
  });

  test("hands tblastn an inflated copy of a gzip-compressed protein database", async () => {
    const context = await setup({}, { samples: ["S1"], gzip: true });
    const hits = ["protA", "S1|C_1_length_300", "97.5", "150", "3", "0", "1", "150", "10", "459", "1e-40", "280", "MAAA"].join("\t");
    const tools = createFakeTools({ blastHits: `${hits}\n` });

    await executePipeline(context, { toolRunner: tools.layer });

    const query = join(context.layout.directoryFor("homology_search", null), QUERY_PROTEINS_NAME);
    const tblastn = tools.calls.find((call) => call.tool === "tblastn");
    expect(tblastn?.args.slice(0, 2)).toEqual(["-query", query]);
    expect(readFileSync(query, "utf8")).toBe(FIXTURE_PROTEINS);
    expect(
      readFileSync(context.layout.pathFor("homology_search", null, "homology_report"), "utf8").split("\n")[1]
    ).toBe("protA\tS1|C_1_length_300\t150\t100.0\t97.5\t150\t3\t0\t1\t150\t10\t459\t1e-40\t280\tMAAA");
  });
});
