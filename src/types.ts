/**
 * Core type definitions shared by the parsers, transformers and orchestrator
 *
 * Sequence records mirror what FASTA carries; everything a stage reads from
 * disk or configuration is validated through the ArkType schemas below.
 */

import { type } from "arktype";

/**
 * A biological sequence read from or written to FASTA
 */
export interface AbstractSequence {
  /** Sequence identifier (first whitespace-delimited token of the header) */
  readonly id: string;
  /** Remainder of the header line, if any */
  readonly description?: string;
  /** Residues with line wrapping removed */
  readonly sequence: string;
  /** Cached sequence length */
  readonly length: number;
  /** Line number of the header (for error reporting) */
  readonly lineNumber?: number;
}

/**
 * FASTA sequence record
 * Format: >id description\nsequence
 */
export interface FastaSequence extends AbstractSequence {
  readonly format: "fasta";
}

/**
 * Residue alphabets accepted by the FASTA parser
 */
export type SequenceAlphabet = "nucleotide" | "protein";

/**
 * Parser configuration options
 */
export interface ParserOptions {
  /** Maximum line length before reporting an error */
  maxLineLength?: number;
  /** AbortController signal for cancelling parsing */
  signal?: AbortSignal;
  /** Custom error handler; the default throws ParseError */
  onError?: (error: string, lineNumber?: number) => void;
}

/**
 * One paired-end sequencing sample from the sample manifest
 */
export interface Sample {
  readonly id: string;
  readonly forward: string;
  readonly reverse: string;
}

// =============================================================================
// SCHEMAS
// =============================================================================

/**
 * Sample identifiers become directory and file names, so they are restricted
 * to characters that can never act as a path separator or a relative segment
 */
export const SampleIdSchema = type(/^[A-Za-z0-9][A-Za-z0-9._-]*$/);

/**
 * FASTA identifiers: non-empty, no whitespace
 */
export const SequenceIdSchema = type("string>0").narrow((id, ctx) => {
  if (/\s/.test(id)) {
    return ctx.reject({
      expected: "an identifier without whitespace",
      actual: JSON.stringify(id),
    });
  }
  return true;
});

/**
 * IUPAC nucleotides, ambiguity codes and gap characters
 */
export const NucleotideSequenceSchema = type(/^[ACGTURYSWKMBDHVN\-.*]*$/i);

/**
 * IUPAC amino acids including B, Z, J, U, O, X and the stop symbol
 */
export const ProteinSequenceSchema = type(/^[ACDEFGHIKLMNPQRSTVWYBZJUOX\-.*]*$/i);

/**
 * Complete FASTA record; length must agree with the residue string
 */
export const FastaSequenceSchema = type({
  format: '"fasta"',
  id: SequenceIdSchema,
  "description?": "string",
  sequence: "string>0",
  length: "number.integer>0",
  "lineNumber?": "number.integer>0",
}).narrow((record, ctx) => {
  if (record.sequence.length !== record.length) {
    return ctx.reject({
      expected: `length ${record.sequence.length}`,
      actual: `declared length ${record.length}`,
      path: ["length"],
    });
  }
  return true;
});

/**
 * Filesystem paths handed to the parsers and the tool runner
 */
export const FilePathSchema = type("string>0").narrow((path, ctx) => {
  if (path.includes("\0")) {
    return ctx.reject({
      expected: "a path without null characters",
      actual: JSON.stringify(path),
    });
  }
  return true;
});

/**
 * Validated file path
 */
export type FilePath = typeof FilePathSchema.infer;
