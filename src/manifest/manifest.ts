/**
 * Sample and auxiliary-file manifests
 *
 * Sample manifest (tab-delimited, header required, column order free):
 *
 *   Read1                 Read2                 Samples
 *   reads/S1_1.fastq.gz   reads/S1_2.fastq.gz   S1
 *
 * Auxiliary manifest: a header row then exactly three rows, in this order,
 * whose last field is a path: adapter sequences, reference genome, reference
 * protein database. An empty field, `-` or `NA` means "not provided".
 *
 * Relative paths resolve against the manifest's own directory.
 */

import { dirname, isAbsolute, resolve } from "node:path";
import { ConfigurationError, LayoutError, ParseError } from "../errors";
import { DelimitedParser, type DelimitedRow } from "../formats/dsv";
import { validateSampleId } from "../layout/artifact-layout";
import type { Sample } from "../types";

export const SAMPLE_MANIFEST_COLUMNS = {
  forward: "Read1",
  reverse: "Read2",
  id: "Samples",
} as const;

export const AUXILIARY_ROWS = ["adapters", "reference", "proteinDatabase"] as const;

const ABSENT_VALUES = new Set(["", "-", "NA"]);

export interface AuxiliaryFiles {
  readonly adapters: string | null;
  readonly reference: string | null;
  readonly proteinDatabase: string | null;
}

async function readRows(path: string): Promise<DelimitedRow[]> {
  const parser = new DelimitedParser({ commentPrefix: "#" });
  const rows: DelimitedRow[] = [];
  try {
    for await (const row of parser.parseFile(path)) {
      rows.push(row);
    }
  } catch (error) {
    const lineNumber = error instanceof ParseError ? error.lineNumber : undefined;
    throw new ConfigurationError(
      `Cannot read manifest: ${error instanceof Error ? error.message : String(error)}`,
      path,
      lineNumber
    );
  }
  return rows;
}

function resolveAgainst(manifestPath: string, value: string): string {
  return isAbsolute(value) ? value : resolve(dirname(manifestPath), value);
}

/**
 * Parse the sample manifest into validated, unique samples
 *
 * @throws {ConfigurationError} On missing columns, empty fields, or invalid
 * or duplicate sample ids
 */
export async function loadSampleManifest(path: string): Promise<Sample[]> {
  const [header, ...rows] = await readRows(path);
  if (header === undefined) {
    throw new ConfigurationError("Sample manifest is empty", path);
  }

  const names = header.fields.map((field) => field.trim());
  const indexOf = (column: string): number => {
    const index = names.indexOf(column);
    if (index === -1) {
      throw new ConfigurationError(
        `Sample manifest has no '${column}' column (found: ${names.join(", ")})`,
        path,
        header.lineNumber
      );
    }
    return index;
  };
  const forwardIndex = indexOf(SAMPLE_MANIFEST_COLUMNS.forward);
  const reverseIndex = indexOf(SAMPLE_MANIFEST_COLUMNS.reverse);
  const idIndex = indexOf(SAMPLE_MANIFEST_COLUMNS.id);

  const samples: Sample[] = [];
  const seen = new Map<string, string>();

  for (const row of rows) {
    const field = (index: number, column: string): string => {
      const value = (row.fields[index] ?? "").trim();
      if (value === "") {
        throw new ConfigurationError(`Empty '${column}' field`, path, row.lineNumber);
      }
      return value;
    };

    const id = field(idIndex, SAMPLE_MANIFEST_COLUMNS.id);
    try {
      validateSampleId(id);
    } catch (error) {
      if (error instanceof LayoutError) {
        throw new ConfigurationError(error.message, path, row.lineNumber);
      }
      throw error;
    }

    const previous = seen.get(id.toLowerCase());
    if (previous !== undefined) {
      throw new ConfigurationError(
        previous === id
          ? `Duplicate sample id '${id}'`
          : `Sample ids '${previous}' and '${id}' differ only in case`,
        path,
        row.lineNumber
      );
    }
    seen.set(id.toLowerCase(), id);

    samples.push({
      id,
      forward: resolveAgainst(path, field(forwardIndex, SAMPLE_MANIFEST_COLUMNS.forward)),
      reverse: resolveAgainst(path, field(reverseIndex, SAMPLE_MANIFEST_COLUMNS.reverse)),
    });
  }

  if (samples.length === 0) {
    throw new ConfigurationError("Sample manifest lists no samples", path);
  }
  return samples;
}

/**
 * Parse the three auxiliary file routes
 *
 * @throws {ConfigurationError} When the manifest does not have exactly three data rows
 */
export async function loadAuxiliaryManifest(path: string): Promise<AuxiliaryFiles> {
  const [header, ...rows] = await readRows(path);
  if (header === undefined || rows.length !== AUXILIARY_ROWS.length) {
    throw new ConfigurationError(
      `Auxiliary manifest must have a header and ${AUXILIARY_ROWS.length} rows (adapters, reference genome, protein database); found ${rows.length}`,
      path
    );
  }

  const [adapters, reference, proteinDatabase] = rows.map((row) => {
    const value = (row.fields[row.fields.length - 1] ?? "").trim();
    return ABSENT_VALUES.has(value) ? null : resolveAgainst(path, value);
  });

  return {
    adapters: adapters ?? null,
    reference: reference ?? null,
    proteinDatabase: proteinDatabase ?? null,
  };
}
