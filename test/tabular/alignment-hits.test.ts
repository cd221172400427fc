import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import {
  ALIGNMENT_HIT_COLUMNS,
  COVERAGE_REPORT_FILE,
  filterByIdentity,
  formatCoverage,
  loadAlignmentHits,
  loadSequenceLengths,
  postProcessAlignmentHits,
  proteinCoverage,
} from "../../src/tabular/alignment-hits";
import { ParseError, ReferenceLookupError, SequenceError } from "../../src/errors";

const hit = (
  query: string,
  subject: string,
  pident: string,
  qstart: number,
  qend: number
): string =>
  [query, subject, pident, qend - qstart + 1, 2, 0, qstart, qend, 1000, 1449, "1e-50", 300, "MAAA"].join("\t");

const PROTEINS = `>protA\nM${"A".repeat(149)}\n>protB\nM${"K".repeat(59)}\n`;

describe("proteinCoverage", () => {
  test("is 100 for a hit spanning the whole query", () => {
    expect(proteinCoverage(1, 150, 150)).toBe(100);
  });

  test("is not clamped above 100", () => {
    expect(proteinCoverage(1, 300, 150)).toBe(200);
  });

  test("counts both endpoints", () => {
    expect(proteinCoverage(11, 40, 60)).toBe(50);
  });
});

describe("formatCoverage", () => {
  test("keeps one decimal place on whole numbers", () => {
    expect(formatCoverage(100)).toBe("100.0");
    expect(formatCoverage(37.5)).toBe("37.5");
  });
});

describe("alignment hit tables", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "alignment-test-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  const file = (name: string, content: string): string => {
    const path = join(dir, name);
    writeFileSync(path, content);
    return path;
  };

  test("assigns the requested columns to a headerless table", async () => {
    const table = await loadAlignmentHits(file("hits.tsv", `${hit("protA", "c1", "98.5", 1, 150)}\n`));

    expect(table.columns).toEqual(ALIGNMENT_HIT_COLUMNS);
    expect(table.rows).toHaveLength(1);
  });

  test("takes the first row as header when it names the needed columns", async () => {
    const table = await loadAlignmentHits(
      file("hits.tsv", "sseqid\tqseqid\tqstart\tqend\tpident\nc1\tprotA\t1\t10\t99\n")
    );

    expect(table.columns).toEqual(["sseqid", "qseqid", "qstart", "qend", "pident"]);
    expect(table.rows.map((row) => row.fields)).toEqual([["c1", "protA", "1", "10", "99"]]);
  });

  test("rejects rows of the wrong width", async () => {
    await expect(loadAlignmentHits(file("hits.tsv", "protA\tc1\t99\n"))).rejects.toThrow(ParseError);
  });

  test("keeps only hits strictly above the identity threshold", async () => {
    const table = await loadAlignmentHits(
      file(
        "hits.tsv",
        [hit("protA", "c1", "50", 1, 10), hit("protA", "c1", "50.01", 1, 10), hit("protB", "c2", "49", 1, 10)].join(
          "\n"
        )
      )
    );

    const { table: kept, dropped } = filterByIdentity(table);

    expect(kept.rows.map((row) => row.fields[2])).toEqual(["50.01"]);
    expect(dropped).toBe(2);
  });

  test("reads protein lengths and rejects duplicate identifiers", async () => {
    const lengths = await loadSequenceLengths(file("proteins.faa", PROTEINS));
    expect([...lengths]).toEqual([
      ["protA", 150],
      ["protB", 60],
    ]);

    await expect(loadSequenceLengths(file("dup.faa", ">p\nMK\n>p\nMK\n"))).rejects.toThrow(SequenceError);
  });

  describe("postProcessAlignmentHits", () => {
    test("filters, inserts qlen and pcov after sseqid, and writes the report", async () => {
      const hits = file(
        "alignment_hits.tsv",
        [
          hit("protA", "S1|C_1_length_300", "98.5", 1, 150),
          hit("protA", "S2|C_3_length_250", "50", 1, 150),
          hit("protB", "S1|C_1_length_300", "50.01", 11, 40),
          hit("protA", "S2|C_3_length_250", "75", 1, 300),
        ].join("\n") + "\n"
      );

      const result = await postProcessAlignmentHits({
        hits,
        proteinDatabase: file("proteins.faa", PROTEINS),
        outputDirectory: dir,
      });

      expect(result).toEqual({ output: join(dir, COVERAGE_REPORT_FILE), kept: 3, dropped: 1 });
      expect(readFileSync(result.output, "utf8").split("\n")).toEqual([
        "qseqid\tsseqid\tqlen\tpcov\tpident\tlength\tmismatch\tgapopen\tqstart\tqend\tsstart\tsend\tevalue\tbitscore\tsseq",
        "protA\tS1|C_1_length_300\t150\t100.0\t98.5\t150\t2\t0\t1\t150\t1000\t1449\t1e-50\t300\tMAAA",
        "protB\tS1|C_1_length_300\t60\t50.0\t50.01\t30\t2\t0\t11\t40\t1000\t1449\t1e-50\t300\tMAAA",
        "protA\tS2|C_3_length_250\t150\t200.0\t75\t300\t2\t0\t1\t300\t1000\t1449\t1e-50\t300\tMAAA",
        "",
      ]);
    });

    test("writes only the header when no hit survives", async () => {
      const result = await postProcessAlignmentHits({
        hits: file("alignment_hits.tsv", ""),
        proteinDatabase: file("proteins.faa", PROTEINS),
        outputDirectory: dir,
      });

      expect(result.kept).toBe(0);
      expect(readFileSync(result.output, "utf8")).toBe(
        "qseqid\tsseqid\tqlen\tpcov\tpident\tlength\tmismatch\tgapopen\tqstart\tqend\tsstart\tsend\tevalue\tbitscore\tsseq\n"
      );
    });

    test("fails for a query missing from the protein database", async () => {
      const hits = file("alignment_hits.tsv", `${hit("protZ", "S1|C_1", "90", 1, 10)}\n`);

      const attempt = postProcessAlignmentHits({
        hits,
        proteinDatabase: file("proteins.faa", PROTEINS),
        outputDirectory: dir,
      });

      await expect(attempt).rejects.toThrow(ReferenceLookupError);
      await expect(attempt).rejects.toMatchObject({ queryId: "protZ", lineNumber: 1 });
    });
  });
});
