/**
 * Post-processing of BLAST tabular (`-outfmt 6`) alignment hits
 *
 * Low-identity hits are dropped, then every surviving hit gains the query
 * protein's length and the share of it the alignment spans:
 *
 *   pcov = (qend - qstart + 1) / qlen * 100
 *
 * Coordinates are 1-based and inclusive. Coverage above 100 occurs for
 * reverse-strand and multi-segment hits and is kept as is.
 *
 * @module tabular/alignment-hits
 */

import { join } from "node:path";
import { ParseError, ReferenceLookupError, SequenceError } from "../errors";
import { DelimitedParser, DelimitedWriter } from "../formats/dsv";
import { FastaParser } from "../formats/fasta";

/**
 * Column list requested from tblastn; BLAST writes no header line
 */
export const ALIGNMENT_HIT_COLUMNS = [
  "qseqid",
  "sseqid",
  "pident",
  "length",
  "mismatch",
  "gapopen",
  "qstart",
  "qend",
  "sstart",
  "send",
  "evalue",
  "bitscore",
  "sseq",
] as const;

/** Hits at or below this percent identity are discarded */
export const IDENTITY_THRESHOLD = 50;

export const COVERAGE_REPORT_FILE = "alignment_hits_coverage.tab";

const REQUIRED_COLUMNS = ["qseqid", "sseqid", "pident", "qstart", "qend"] as const;
type RequiredColumn = (typeof REQUIRED_COLUMNS)[number];

export interface AlignmentRow {
  readonly fields: readonly string[];
  readonly lineNumber: number;
}

export interface AlignmentTable {
  readonly columns: readonly string[];
  readonly rows: readonly AlignmentRow[];
}

export interface PostProcessOptions {
  /** Raw tabular hits */
  readonly hits: string;
  /** Protein FASTA the queries came from */
  readonly proteinDatabase: string;
  readonly outputDirectory: string;
}

export interface PostProcessResult {
  readonly output: string;
  readonly kept: number;
  readonly dropped: number;
}

/**
 * Load a hit table, taking the first row as the header only when it names
 * the columns the enrichment needs
 *
 * @throws {ParseError} When a row's width disagrees with the column list
 */
export async function loadAlignmentHits(path: string): Promise<AlignmentTable> {
  const parser = new DelimitedParser();
  let columns: readonly string[] | null = null;
  const rows: AlignmentRow[] = [];

  for await (const row of parser.parseFile(path)) {
    if (columns === null) {
      if (REQUIRED_COLUMNS.every((column) => row.fields.includes(column))) {
        columns = row.fields;
        continue;
      }
      columns = ALIGNMENT_HIT_COLUMNS;
    }

    if (row.fields.length !== columns.length) {
      throw new ParseError(
        `Expected ${columns.length} columns but found ${row.fields.length}`,
        "TSV",
        row.lineNumber,
        path
      );
    }
    rows.push({ fields: row.fields, lineNumber: row.lineNumber });
  }

  return { columns: columns ?? ALIGNMENT_HIT_COLUMNS, rows };
}

/**
 * Split rows on percent identity; a row is kept only when pident > threshold
 */
export function filterByIdentity(
  table: AlignmentTable,
  threshold = IDENTITY_THRESHOLD
): { table: AlignmentTable; dropped: number } {
  const pident = columnIndex(table.columns, "pident");
  const kept = table.rows.filter((row) => numericField(row, pident, "pident") > threshold);
  return { table: { columns: table.columns, rows: kept }, dropped: table.rows.length - kept.length };
}

/**
 * Read every protein's length from a FASTA database, in one pass
 *
 * @throws {SequenceError} When an identifier appears twice
 */
export async function loadSequenceLengths(fastaPath: string): Promise<Map<string, number>> {
  const parser = new FastaParser({ alphabet: "protein" });
  const lengths = new Map<string, number>();

  for await (const record of parser.parseFile(fastaPath)) {
    if (lengths.has(record.id)) {
      throw new SequenceError(
        `Duplicate sequence identifier in ${fastaPath}`,
        record.id,
        record.lineNumber
      );
    }
    lengths.set(record.id, record.length);
  }

  return lengths;
}

/**
 * Protein coverage in percent, unclamped
 */
export function proteinCoverage(queryStart: number, queryEnd: number, queryLength: number): number {
  return ((queryEnd - queryStart + 1) / queryLength) * 100;
}

/**
 * Render a coverage value with at least one decimal place
 */
export function formatCoverage(value: number): string {
  return Number.isInteger(value) ? value.toFixed(1) : String(value);
}

/**
 * Insert `qlen` and `pcov` immediately after `sseqid`
 *
 * @throws {ReferenceLookupError} When a query id is not in the database
 */
export function addCoverageColumns(
  table: AlignmentTable,
  lengths: ReadonlyMap<string, number>,
  database = "protein database"
): AlignmentTable {
  const qseqid = columnIndex(table.columns, "qseqid");
  const sseqid = columnIndex(table.columns, "sseqid");
  const qstart = columnIndex(table.columns, "qstart");
  const qend = columnIndex(table.columns, "qend");
  const insertAt = sseqid + 1;

  const rows = table.rows.map((row): AlignmentRow => {
    const queryId = row.fields[qseqid] ?? "";
    const queryLength = lengths.get(queryId);
    if (queryLength === undefined) {
      throw new ReferenceLookupError(queryId, database, row.lineNumber);
    }

    const coverage = proteinCoverage(
      numericField(row, qstart, "qstart"),
      numericField(row, qend, "qend"),
      queryLength
    );
    return {
      fields: [
        ...row.fields.slice(0, insertAt),
        String(queryLength),
        formatCoverage(coverage),
        ...row.fields.slice(insertAt),
      ],
      lineNumber: row.lineNumber,
    };
  });

  return {
    columns: [
      ...table.columns.slice(0, insertAt),
      "qlen",
      "pcov",
      ...table.columns.slice(insertAt),
    ],
    rows,
  };
}

export async function writeAlignmentTable(path: string, table: AlignmentTable): Promise<void> {
  const writer = new DelimitedWriter();
  await writer.writeFile(
    path,
    table.columns,
    table.rows.map((row) => row.fields)
  );
}

/**
 * Filter, enrich and write a hit table to `alignment_hits_coverage.tab`
 */
export async function postProcessAlignmentHits(
  options: PostProcessOptions
): Promise<PostProcessResult> {
  const raw = await loadAlignmentHits(options.hits);
  const { table: filtered, dropped } = filterByIdentity(raw);
  const lengths = await loadSequenceLengths(options.proteinDatabase);
  const enriched = addCoverageColumns(filtered, lengths, options.proteinDatabase);

  const output = join(options.outputDirectory, COVERAGE_REPORT_FILE);
  await writeAlignmentTable(output, enriched);

  return { output, kept: enriched.rows.length, dropped };
}

function columnIndex(columns: readonly string[], name: RequiredColumn): number {
  const index = columns.indexOf(name);
  if (index === -1) {
    throw new ParseError(`Alignment table has no '${name}' column`, "TSV");
  }
  return index;
}

function numericField(row: AlignmentRow, index: number, name: RequiredColumn): number {
  const raw = row.fields[index] ?? "";
  const value = Number(raw);
  if (raw.trim() === "" || Number.isNaN(value)) {
    throw new ParseError(`Column '${name}' is not numeric: ${JSON.stringify(raw)}`, "TSV", row.lineNumber);
  }
  return value;
}
