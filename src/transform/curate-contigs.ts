/**
 * Contig curation: drop short contigs and shorten assembler identifiers
 *
 * SPAdes names contigs `NODE_<n>_length_<len>_cov_<depth>`. Curated records
 * keep the node number and length only, behind a stage marker, so
 * `NODE_3_length_5000_cov_12.3` becomes `C_3_length_5000`.
 */

import { type } from "arktype";
import { ValidationError } from "../errors";
import { FastaParser, FastaWriter } from "../formats/fasta";
import { deleteFile, movePath } from "../io/file-writer";
import type { AbstractSequence, FastaSequence } from "../types";

export interface CurateContigsOptions {
  readonly input: string;
  readonly output: string;
  /** Records must be strictly longer than this to survive */
  readonly minLength: number;
  readonly marker: string;
}

export interface CurationResult {
  readonly input: string;
  readonly output: string;
  readonly kept: number;
  readonly dropped: number;
}

const CurateContigsOptionsSchema = type({
  input: "string>0",
  output: "string>0",
  minLength: "number.integer>=0",
  marker: /^[^\s_]+$/,
});

/** Curated FASTA is wrapped at this many residues per line */
export const CURATED_LINE_WIDTH = 60;

/**
 * Rewrite an identifier to `<marker>_` plus underscore fields 1 to 3
 *
 * Applying it to its own output returns the same identifier.
 */
export function curatedContigId(id: string, marker: string): string {
  return `${marker}_${id.split("_").slice(1, 4).join("_")}`;
}

/**
 * Filter and rename the contigs of one assembly
 *
 * The output is assembled in a sibling temporary file and renamed over
 * `output` only once every record has been read, so a malformed input
 * leaves no partial file behind. Zero surviving records yield an empty file.
 * A header with no residues counts as a zero-length contig and is dropped.
 *
 * @throws {ValidationError} On invalid options
 * @throws {ParseError | SequenceError} When the input is not valid FASTA
 */
export async function curateContigs(options: CurateContigsOptions): Promise<CurationResult> {
  const validation = CurateContigsOptionsSchema(options);
  if (validation instanceof type.errors) {
    throw new ValidationError(`Invalid curation options: ${validation.summary}`);
  }

  const { input, output, minLength, marker } = options;
  const parser = new FastaParser({ trackLineNumbers: false, allowEmptyRecords: true });
  const writer = new FastaWriter({ lineWidth: CURATED_LINE_WIDTH, includeDescription: false });
  const staging = `${output}.partial`;

  let kept = 0;
  let dropped = 0;

  async function* survivors(records: AsyncIterable<FastaSequence>): AsyncIterable<AbstractSequence> {
    for await (const record of records) {
      if (record.length > minLength) {
        kept++;
        yield {
          id: curatedContigId(record.id, marker),
          sequence: record.sequence,
          length: record.length,
        };
      } else {
        dropped++;
      }
    }
  }

  try {
    await writer.writeFile(staging, survivors(parser.parseFile(input)));
  } catch (error) {
    await deleteFile(staging);
    throw error;
  }
  await movePath(staging, output);

  return { input, output, kept, dropped };
}
