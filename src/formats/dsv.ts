/**
 * @module formats/dsv
 * @description Delimiter-separated values (TSV by default) parsing and writing
 *
 * Manifests and BLAST tabular output are tab-delimited. Rows are parsed with
 * an RFC 4180 style state machine so quoted fields containing the delimiter
 * survive; rows are yielded as raw string arrays in column order.
 */

import { type } from "arktype";
import { ParseError, ValidationError } from "../errors";
import { readLines } from "../io/file-reader";
import { openForWriting } from "../io/file-writer";
import type { ParserOptions } from "../types";
import { AbstractParser } from "./abstract-parser";

/**
 * One parsed row with its source line number
 */
export interface DelimitedRow {
  readonly fields: readonly string[];
  readonly lineNumber: number;
}

/**
 * Delimited parser options
 */
export interface DelimitedParserOptions extends ParserOptions {
  /** Field delimiter (default: tab) */
  delimiter?: string;
  /** Quote character (default: ") */
  quote?: string;
  /** Lines starting with this prefix are skipped */
  commentPrefix?: string;
}

/**
 * Delimited writer options
 */
export interface DelimitedWriterOptions {
  delimiter?: string;
  quote?: string;
  lineEnding?: "\n" | "\r\n";
}

const DelimitedParserOptionsSchema = type({
  "delimiter?": "string==1",
  "quote?": "string==1",
  "commentPrefix?": "string>0",
  "maxLineLength?": "number>0",
});

enum RowParseState {
  FIELD_START,
  UNQUOTED_FIELD,
  QUOTED_FIELD,
  QUOTE_IN_QUOTED,
}

/**
 * Parse one delimited row with a quote-aware state machine
 *
 * Doubled quotes inside a quoted field are an escaped quote. A trailing
 * delimiter produces a trailing empty field.
 *
 * @throws {ParseError} On an unclosed quoted field
 */
export function parseDelimitedRow(line: string, delimiter = "\t", quote = '"'): string[] {
  const fields: string[] = [];
  let currentField = "";
  let state = RowParseState.FIELD_START;

  for (let i = 0; i < line.length; i++) {
    const char = line.charAt(i);

    switch (state) {
      case RowParseState.FIELD_START:
        if (char === quote) {
          state = RowParseState.QUOTED_FIELD;
        } else if (char === delimiter) {
          fields.push("");
        } else {
          currentField = char;
          state = RowParseState.UNQUOTED_FIELD;
        }
        break;

      case RowParseState.UNQUOTED_FIELD:
        if (char === delimiter) {
          fields.push(currentField);
          currentField = "";
          state = RowParseState.FIELD_START;
        } else {
          currentField += char;
        }
        break;

      case RowParseState.QUOTED_FIELD:
        if (char === quote) {
          if (line.charAt(i + 1) === quote) {
            currentField += quote;
            i++;
          } else {
            state = RowParseState.QUOTE_IN_QUOTED;
          }
        } else {
          currentField += char;
        }
        break;

      case RowParseState.QUOTE_IN_QUOTED:
        if (char === delimiter) {
          fields.push(currentField);
          currentField = "";
          state = RowParseState.FIELD_START;
        } else {
          // Characters after a closing quote: keep them as part of the field
          currentField += char;
          state = RowParseState.UNQUOTED_FIELD;
        }
        break;
    }
  }

  if (state === RowParseState.QUOTED_FIELD) {
    throw new ParseError("Unclosed quote in delimited field", "DSV", undefined, line);
  }
  if (state === RowParseState.UNQUOTED_FIELD || state === RowParseState.QUOTE_IN_QUOTED) {
    fields.push(currentField);
  } else if (line.endsWith(delimiter)) {
    fields.push("");
  }

  return fields;
}

/**
 * Streaming delimited-text parser
 *
 * Blank lines are skipped. Header handling is left to the caller, which
 * knows whether its table carries one.
 *
 * @example
 * ```typescript
 * const parser = new DelimitedParser();
 * for await (const row of parser.parseFile("input_files.tsv")) {
 *   console.log(row.lineNumber, row.fields);
 * }
 * ```
 */
export class DelimitedParser extends AbstractParser<DelimitedRow, DelimitedParserOptions> {
  private readonly delimiter: string;
  private readonly quote: string;

  constructor(options: DelimitedParserOptions = {}) {
    const validation = DelimitedParserOptionsSchema(options);
    if (validation instanceof type.errors) {
      throw new ValidationError(`Invalid delimited parser options: ${validation.summary}`);
    }

    super(options);
    this.delimiter = options.delimiter ?? "\t";
    this.quote = options.quote ?? '"';
  }

  // Called from the base constructor, before this class's fields are set
  protected getFormatName(): string {
    return (this.options.delimiter ?? "\t") === "\t" ? "TSV" : "DSV";
  }

  async *parseString(data: string): AsyncIterable<DelimitedRow> {
    yield* this.parseLines(data.split(/\r?\n/));
  }

  async *parseFile(filePath: string): AsyncIterable<DelimitedRow> {
    yield* this.parseLines(readLines(filePath));
  }

  private async *parseLines(
    lines: AsyncIterable<string> | Iterable<string>
  ): AsyncIterable<DelimitedRow> {
    let lineNumber = 0;

    for await (const line of lines) {
      lineNumber++;
      if (lineNumber % 10_000 === 0) {
        this.throwIfAborted("parsing");
      }

      if (line.trim() === "") continue;
      if (this.options.commentPrefix !== undefined && line.startsWith(this.options.commentPrefix)) {
        continue;
      }
      if (line.length > this.settings.maxLineLength) {
        this.settings.onError(
          `Line too long (${line.length} > ${this.settings.maxLineLength})`,
          lineNumber
        );
        continue;
      }

      let fields: string[];
      try {
        fields = parseDelimitedRow(line, this.delimiter, this.quote);
      } catch (error) {
        this.settings.onError(error instanceof Error ? error.message : String(error), lineNumber);
        continue;
      }

      yield { fields, lineNumber };
    }
  }
}

/**
 * Delimited-text writer with quoting of fields that need it
 */
export class DelimitedWriter {
  private readonly delimiter: string;
  private readonly quote: string;
  private readonly lineEnding: string;

  constructor(options: DelimitedWriterOptions = {}) {
    this.delimiter = options.delimiter ?? "\t";
    this.quote = options.quote ?? '"';
    this.lineEnding = options.lineEnding ?? "\n";
  }

  formatField(value: string | number): string {
    const field = String(value);
    const needsQuoting =
      field.includes(this.delimiter) ||
      field.includes(this.quote) ||
      field.includes("\n") ||
      field.includes("\r");

    if (!needsQuoting) return field;
    return this.quote + field.split(this.quote).join(this.quote + this.quote) + this.quote;
  }

  formatRow(fields: readonly (string | number)[]): string {
    return fields.map((field) => this.formatField(field)).join(this.delimiter);
  }

  /**
   * Write a header and rows to a file, truncating it first
   */
  async writeFile(
    path: string,
    header: readonly string[],
    rows: Iterable<readonly (string | number)[]>
  ): Promise<void> {
    await openForWriting(path, async (handle) => {
      await handle.writeString(this.formatRow(header) + this.lineEnding);
      for (const row of rows) {
        await handle.writeString(this.formatRow(row) + this.lineEnding);
      }
    });
  }
}
