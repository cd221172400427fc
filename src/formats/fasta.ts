/**
 * FASTA format parser and writer
 *
 * Handles the messiness of real-world FASTA files:
 * - Wrapped and unwrapped sequences
 * - Headers with and without descriptions
 * - Mixed case residues
 * - Nucleotide (IUPAC) or protein alphabets
 * - Comments and blank lines
 */

import { type } from "arktype";
import { ParseError, SequenceError, ValidationError } from "../errors";
import { readLines } from "../io/file-reader";
import { openForWriting } from "../io/file-writer";
import type { AbstractSequence, FastaSequence, ParserOptions, SequenceAlphabet } from "../types";
import {
  FastaSequenceSchema,
  NucleotideSequenceSchema,
  ProteinSequenceSchema,
  SequenceIdSchema,
} from "../types";
import { AbstractParser } from "./abstract-parser";

/**
 * FASTA-specific parser options
 */
export interface FastaParserOptions extends ParserOptions {
  /** Residue alphabet used for validation (default: nucleotide) */
  alphabet?: SequenceAlphabet;
  /** Skip residue and record validation */
  skipValidation?: boolean;
  /** Record each header's line number (default: true) */
  trackLineNumbers?: boolean;
  /** Yield a header without residues as a zero-length record instead of failing */
  allowEmptyRecords?: boolean;
}

const FastaParserOptionsSchema = type({
  "skipValidation?": "boolean",
  "maxLineLength?": "number>0",
  "trackLineNumbers?": "boolean",
  "alphabet?": "'nucleotide' | 'protein'",
  "allowEmptyRecords?": "boolean",
});

interface PendingHeader {
  readonly id: string;
  readonly description: string | undefined;
  readonly lineNumber: number;
}

/**
 * Streaming FASTA parser
 *
 * Yields one record at a time, so arbitrarily large assemblies are never
 * held in memory as a whole.
 *
 * @example
 * ```typescript
 * const parser = new FastaParser();
 * for await (const contig of parser.parseFile("contigs.fasta")) {
 *   console.log(`${contig.id}: ${contig.length} bp`);
 * }
 * ```
 *
 * @example Protein database
 * ```typescript
 * const parser = new FastaParser({ alphabet: "protein" });
 * ```
 */
export class FastaParser extends AbstractParser<FastaSequence, FastaParserOptions> {
  private readonly alphabet: SequenceAlphabet;
  private readonly skipValidation: boolean;
  private readonly trackLineNumbers: boolean;
  private readonly allowEmptyRecords: boolean;

  constructor(options: FastaParserOptions = {}) {
    const validationResult = FastaParserOptionsSchema(options);
    if (validationResult instanceof type.errors) {
      throw new ValidationError(`Invalid FASTA parser options: ${validationResult.summary}`);
    }

    super(options);
    this.alphabet = options.alphabet ?? "nucleotide";
    this.skipValidation = options.skipValidation ?? false;
    this.trackLineNumbers = options.trackLineNumbers ?? true;
    this.allowEmptyRecords = options.allowEmptyRecords ?? false;
  }

  protected getFormatName(): string {
    return "FASTA";
  }

  /**
   * Parse FASTA records from a string
   *
   * @throws {ParseError} When FASTA structure is invalid
   * @throws {SequenceError} When a record is empty (unless allowEmptyRecords)
   * or its residues are invalid
   */
  async *parseString(data: string): AsyncIterable<FastaSequence> {
    yield* this.parseLines(data.split(/\r?\n/));
  }

  /**
   * Parse FASTA records from a file using streaming I/O
   *
   * @throws {FileError} When the file cannot be read
   * @throws {ParseError} When FASTA structure is invalid
   */
  async *parseFile(filePath: string): AsyncIterable<FastaSequence> {
    if (filePath.length === 0) {
      throw new ValidationError("filePath must not be empty");
    }
    yield* this.parseLines(readLines(filePath));
  }

  private async *parseLines(
    lines: AsyncIterable<string> | Iterable<string>
  ): AsyncIterable<FastaSequence> {
    let header: PendingHeader | null = null;
    let buffer: string[] = [];
    let skippingRecord = false;
    let lineNumber = 0;

    for await (const rawLine of lines) {
      lineNumber++;
      if (lineNumber % 10_000 === 0) {
        this.throwIfAborted("parsing");
      }

      if (rawLine.length > this.settings.maxLineLength) {
        this.settings.onError(
          `Line too long (${rawLine.length} > ${this.settings.maxLineLength})`,
          lineNumber
        );
        continue;
      }

      const line = rawLine.trim();
      if (shouldSkipFastaLine(line)) continue;

      if (isFastaHeader(line)) {
        if (header !== null) {
          yield this.finalizeSequence(header, buffer);
        }
        header = this.parseHeader(line, lineNumber);
        skippingRecord = header === null;
        buffer = [];
        continue;
      }

      if (skippingRecord) continue;

      if (header === null) {
        this.settings.onError("Sequence data found before header", lineNumber);
        continue;
      }

      const residues = this.cleanSequence(line, lineNumber);
      if (residues !== null) {
        buffer.push(residues);
      }
    }

    if (header !== null) {
      yield this.finalizeSequence(header, buffer);
    }
  }

  private parseHeader(line: string, lineNumber: number): PendingHeader | null {
    const parsed = parseFastaHeader(line);

    const idValidation = SequenceIdSchema(parsed.id);
    if (idValidation instanceof type.errors) {
      this.settings.onError(
        'Empty FASTA header: header must contain an identifier after ">"',
        lineNumber
      );
      return null;
    }

    return { id: parsed.id, description: parsed.description, lineNumber };
  }

  private cleanSequence(line: string, lineNumber: number): string | null {
    const cleaned = line.replace(/\s/g, "");
    if (this.skipValidation) return cleaned;

    const schema = this.alphabet === "protein" ? ProteinSequenceSchema : NucleotideSequenceSchema;
    if (schema(cleaned) instanceof type.errors) {
      const invalid = [...new Set(cleaned.match(this.invalidResiduePattern()) ?? [])].join(", ");
      this.settings.onError(`Invalid ${this.alphabet} residues: ${invalid}`, lineNumber);
      return null;
    }
    return cleaned;
  }

  private invalidResiduePattern(): RegExp {
    return this.alphabet === "protein"
      ? /[^ACDEFGHIKLMNPQRSTVWYBZJUOX\-.*]/gi
      : /[^ACGTURYSWKMBDHVN\-.*]/gi;
  }

  private finalizeSequence(header: PendingHeader, buffer: string[]): FastaSequence {
    if (buffer.length === 0 && !this.allowEmptyRecords) {
      throw new SequenceError("Header found but no sequence data", header.id, header.lineNumber);
    }

    const sequence = buffer.join("");
    const record: FastaSequence = {
      format: "fasta",
      id: header.id,
      ...(header.description !== undefined && { description: header.description }),
      sequence,
      length: sequence.length,
      ...(this.trackLineNumbers && { lineNumber: header.lineNumber }),
    };

    if (!this.skipValidation && record.length > 0) {
      const validation = FastaSequenceSchema(record);
      if (validation instanceof type.errors) {
        throw new SequenceError(
          `Invalid FASTA record: ${validation.summary}`,
          header.id,
          header.lineNumber
        );
      }
    }

    return record;
  }
}

/**
 * FASTA writer options
 */
export interface FastaWriterOptions {
  /** Residues per line; 0 disables wrapping (default: 80) */
  lineWidth?: number;
  /** Write descriptions after the identifier (default: true) */
  includeDescription?: boolean;
  /** Line terminator (default: "\n") */
  lineEnding?: string;
}

/**
 * FASTA writer for outputting sequences
 */
export class FastaWriter {
  private readonly lineWidth: number;
  private readonly includeDescription: boolean;
  private readonly lineEnding: string;

  constructor(options: FastaWriterOptions = {}) {
    this.lineWidth = options.lineWidth ?? 80;
    this.includeDescription = options.includeDescription ?? true;
    this.lineEnding = options.lineEnding ?? "\n";
  }

  /**
   * Format a single record; the result has no trailing line terminator
   */
  formatSequence(sequence: AbstractSequence): string {
    let header = `>${sequence.id}`;
    if (this.includeDescription && sequence.description !== undefined && sequence.description !== "") {
      header += ` ${sequence.description}`;
    }
    return `${header}${this.lineEnding}${this.wrapText(sequence.sequence)}`;
  }

  /**
   * Write records to a file, truncating it first
   *
   * @returns Number of records written
   */
  async writeFile(path: string, sequences: AsyncIterable<AbstractSequence>): Promise<number> {
    return openForWriting(path, async (handle) => {
      let written = 0;
      for await (const sequence of sequences) {
        await handle.writeString(this.formatSequence(sequence) + this.lineEnding);
        written++;
      }
      return written;
    });
  }

  private wrapText(text: string): string {
    if (this.lineWidth <= 0) return text;

    const lines: string[] = [];
    for (let i = 0; i < text.length; i += this.lineWidth) {
      lines.push(text.slice(i, i + this.lineWidth));
    }
    return lines.join(this.lineEnding);
  }
}

/**
 * Split a header line into identifier and optional description
 */
export function parseFastaHeader(headerLine: string): { id: string; description?: string } {
  if (!headerLine.startsWith(">")) {
    throw new ParseError('FASTA header must start with ">"', "FASTA", undefined, headerLine);
  }

  const header = headerLine.slice(1).trim();
  const firstSpace = header.search(/\s/);
  if (firstSpace === -1) {
    return { id: header };
  }

  const description = header.slice(firstSpace + 1).trim();
  return description === ""
    ? { id: header.slice(0, firstSpace) }
    : { id: header.slice(0, firstSpace), description };
}

/**
 * Blank lines and ';' comment lines carry no record data
 */
export function shouldSkipFastaLine(line: string): boolean {
  const trimmed = line.trim();
  return trimmed === "" || trimmed.startsWith(";");
}

export function isFastaHeader(line: string): boolean {
  return line.trim().startsWith(">");
}
