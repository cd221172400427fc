/**
 * Abstract base parser with shared option resolution and interrupt handling
 *
 * FASTA and delimited-text parsers share the same error hook and
 * AbortSignal support without sharing their parsing logic.
 */

import { ParseError } from "../errors";
import type { ParserOptions } from "../types";

/**
 * Parser options after defaults have been applied
 */
export interface ResolvedParserOptions {
  readonly maxLineLength: number;
  readonly signal: AbortSignal | undefined;
  readonly onError: (error: string, lineNumber?: number) => void;
}

/**
 * Abstract parser base class
 *
 * @template T - The record type this parser produces
 */
export abstract class AbstractParser<T, TOptions extends ParserOptions = ParserOptions> {
  protected readonly settings: ResolvedParserOptions;

  constructor(protected readonly options: TOptions) {
    const formatName = this.getFormatName();
    this.settings = {
      maxLineLength: options.maxLineLength ?? 1_000_000,
      signal: options.signal,
      onError:
        options.onError ??
        ((error: string, lineNumber?: number): void => {
          throw new ParseError(error, formatName, lineNumber);
        }),
    };
  }

  /**
   * Check if parsing should stop; call this inside parsing loops
   */
  protected throwIfAborted(context: string): void {
    if (this.settings.signal?.aborted === true) {
      throw new ParseError(`Operation aborted during ${this.getFormatName()} ${context}`, "ABORTED");
    }
  }

  /**
   * Parse records from an in-memory string
   */
  abstract parseString(data: string): AsyncIterable<T>;

  /**
   * Parse records from a file, streaming line by line
   */
  abstract parseFile(filePath: string): AsyncIterable<T>;

  /**
   * Format identifier for error messages (e.g., "FASTA", "TSV")
   */
  protected abstract getFormatName(): string;
}
