import { describe, expect, test } from "vitest";
import { ArtifactLayout, COMPLETION_MARKER, validateSampleId } from "../../src/layout/artifact-layout";
import { LayoutError } from "../../src/errors";
import { STAGES, rolesOf } from "../../src/layout/stages";

describe("ArtifactLayout", () => {
  const layout = new ArtifactLayout("/runs/out");

  test("places per-sample artifacts under the sample's subtree", () => {
    expect(layout.pathFor("curate_contigs", "S1", "contigs_curated")).toBe(
      "/runs/out/contigs/S1/S1_contigs.fasta"
    );
    expect(layout.pathFor("trim", "S1", "R2_unpaired")).toBe(
      "/runs/out/trimming/S1/S1_R2_unpaired.fastq"
    );
    expect(layout.pathFor("assemble", "S1", "contigs_raw")).toBe("/runs/out/assembly/S1/contigs.fasta");
  });

  test("places cross-sample artifacts directly in the stage directory", () => {
    expect(layout.pathFor("cross_sample_typing", null, "typing_report")).toBe(
      "/runs/out/typing/mlst.txt"
    );
    expect(layout.pathFor("homology_search", null, "homology_report")).toBe(
      "/runs/out/homology/alignment_hits_coverage.tab"
    );
  });

  test("returns the same path for the same triple", () => {
    expect(layout.pathFor("annotate", "S2", "annotation_gff")).toBe(
      layout.pathFor("annotate", "S2", "annotation_gff")
    );
  });

  test("puts the completion marker inside the stage directory", () => {
    expect(layout.markerFor("stats", "S1")).toBe(`/runs/out/assembly_stats/S1/${COMPLETION_MARKER}`);
    expect(layout.markerFor("pangenome", null)).toBe("/runs/out/pangenome/.complete");
  });

  test("rejects a role the stage does not declare", () => {
    expect(() => layout.pathFor("assemble", "S1", "annotation_gff")).toThrow(LayoutError);
  });

  test("rejects a scope mismatch", () => {
    expect(() => layout.directoryFor("trim", null)).toThrow("needs a sample id");
    expect(() => layout.directoryFor("pangenome", "S1")).toThrow("takes no sample id");
  });

  test("rejects sample ids that would escape their directory", () => {
    expect(() => layout.pathFor("annotate", "../S1", "annotation_gff")).toThrow(LayoutError);
    expect(() => layout.pathFor("annotate", "a/b", "annotation_gff")).toThrow(LayoutError);
  });

  test("requires the filter reads but not its log", () => {
    expect(layout.requiredRoles("filter")).toEqual(["R1_paired", "R2_paired"]);
    expect(rolesOf("filter")).toEqual(["R1_paired", "R2_paired", "filter_log"]);
  });

  test("rejects an empty root", () => {
    expect(() => new ArtifactLayout("")).toThrow(LayoutError);
  });

  describe("auditLayout", () => {
    test("counts every marker and artifact path of a run", () => {
      expect(layout.auditLayout(["S1", "S2"])).toBe(50);
    });

    test("gives distinct paths to samples sharing a prefix", () => {
      expect(layout.auditLayout(["S1", "S1_a", "S10"])).toBe(17 * 3 + 16);
    });

    test("rejects ids that differ only in case", () => {
      expect(() => layout.auditLayout(["S1", "s1"])).toThrow(
        "Sample ids 'S1' and 's1' differ only in case"
      );
    });

    test("rejects duplicate ids", () => {
      expect(() => layout.auditLayout(["S1", "S1"])).toThrow("Duplicate sample id 'S1'");
    });

    test("covers every stage", () => {
      expect(STAGES).toHaveLength(12);
    });
  });
});

describe("validateSampleId", () => {
  test.each(["S1", "sample.2", "A-b_c", "9"])("accepts %s", (id) => {
    expect(validateSampleId(id)).toBe(id);
  });

  test.each(["", ".", "..", "-x", "a b", "a/b", "é"])("rejects %j", (id) => {
    expect(() => validateSampleId(id)).toThrow(LayoutError);
  });
});
