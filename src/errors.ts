/**
 * Error handling for the assembly and annotation pipeline
 *
 * Every failure the pipeline can raise derives from PipelineError, so callers
 * can report the failing stage, sample, file or line without string matching.
 */

/**
 * Base error class for all pipeline errors
 */
export class PipelineError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly lineNumber?: number,
    public readonly context?: string
  ) {
    super(message);
    this.name = "PipelineError";
  }

  /**
   * Render the error with its line number and context, when present
   */
  override toString(): string {
    let msg = `${this.name}: ${this.message}`;
    if (this.lineNumber !== undefined) {
      msg += ` (line ${this.lineNumber})`;
    }
    if (this.context !== undefined && this.context !== "") {
      msg += `\nContext: ${this.context}`;
    }
    return msg;
  }
}

/**
 * Validation errors for malformed or invalid values
 */
export class ValidationError extends PipelineError {
  constructor(message: string, lineNumber?: number, context?: string) {
    super(message, "VALIDATION_ERROR", lineNumber, context);
    this.name = "ValidationError";
  }
}

/**
 * Invalid configuration, manifests or auxiliary files; raised before any stage runs
 */
export class ConfigurationError extends PipelineError {
  constructor(
    message: string,
    public readonly source?: string,
    lineNumber?: number
  ) {
    super(message, "CONFIGURATION_ERROR", lineNumber, source);
    this.name = "ConfigurationError";
  }
}

/**
 * Parsing errors for format-specific issues
 */
export class ParseError extends PipelineError {
  constructor(
    message: string,
    public readonly format: string,
    lineNumber?: number,
    context?: string
  ) {
    super(message, "PARSE_ERROR", lineNumber, context);
    this.name = "ParseError";
  }
}

/**
 * Sequence-level errors (empty records, invalid residues, bad identifiers)
 */
export class SequenceError extends PipelineError {
  constructor(
    message: string,
    public readonly sequenceId: string,
    lineNumber?: number,
    context?: string
  ) {
    super(message, "SEQUENCE_ERROR", lineNumber, context);
    this.name = "SequenceError";
  }
}

/**
 * A query identifier from an alignment table has no entry in the reference database
 */
export class ReferenceLookupError extends PipelineError {
  constructor(
    public readonly queryId: string,
    public readonly database: string,
    lineNumber?: number
  ) {
    super(
      `Query '${queryId}' not found in reference database ${database}`,
      "REFERENCE_LOOKUP_ERROR",
      lineNumber
    );
    this.name = "ReferenceLookupError";
  }
}

/**
 * File I/O errors with the failing path and operation
 */
export class FileError extends PipelineError {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly operation:
      | "read"
      | "write"
      | "stat"
      | "open"
      | "move"
      | "copy"
      | "remove"
      | "mkdir"
      | "list",
    public readonly systemError?: unknown,
    context?: string
  ) {
    super(message, "FILE_ERROR", undefined, context);
    this.name = "FileError";
  }

  /**
   * Create file error with system error context
   */
  static fromSystemError(
    operation: FileError["operation"],
    filePath: string,
    systemError: unknown
  ): FileError {
    const errorMessage = systemError instanceof Error ? systemError.message : String(systemError);
    const suggestion = FileError.getSuggestionForSystemError(errorMessage);

    return new FileError(
      `${operation} operation failed for ${filePath}: ${errorMessage}${suggestion !== undefined ? `. ${suggestion}` : ""}`,
      filePath,
      operation,
      systemError,
      `System error: ${errorMessage}`
    );
  }

  private static getSuggestionForSystemError(errorMessage: string): string | undefined {
    const msg = errorMessage.toLowerCase();

    if (msg.includes("enoent") || msg.includes("no such file") || msg.includes("notfound")) {
      return "Check that the file path is correct and the file exists";
    }
    if (msg.includes("eacces") || msg.includes("permission denied")) {
      return "Check file permissions or run with appropriate privileges";
    }
    if (msg.includes("eisdir") || msg.includes("is a directory")) {
      return "Path points to a directory, not a file";
    }
    if (msg.includes("enospc") || msg.includes("no space left")) {
      return "Free up disk space or use a different output directory";
    }

    return undefined;
  }
}

/**
 * Artifact layout violations: invalid sample ids, unknown (stage, role) pairs, path collisions
 */
export class LayoutError extends PipelineError {
  constructor(message: string, context?: string) {
    super(message, "LAYOUT_ERROR", undefined, context);
    this.name = "LayoutError";
  }
}

/**
 * A stage failed for one sample (or for the cross-sample phase when sample is null)
 */
export class StageFailedError extends PipelineError {
  constructor(
    message: string,
    public readonly stage: string,
    public readonly sample: string | null,
    public readonly exitCode?: number,
    context?: string,
    /** Error raised inside an in-process stage */
    public readonly reason?: PipelineError
  ) {
    super(
      `Stage '${stage}'${sample !== null ? ` for sample '${sample}'` : ""} failed: ${message}`,
      "STAGE_FAILED",
      undefined,
      context
    );
    this.name = "StageFailedError";
  }

  /**
   * Attribute an error to a stage and sample; stage failures pass through unchanged
   */
  static wrap(stage: string, sample: string | null, error: PipelineError): StageFailedError {
    if (error instanceof StageFailedError) return error;
    return new StageFailedError(
      `${error.name}: ${error.message}`,
      stage,
      sample,
      undefined,
      error.context,
      error
    );
  }

  static nonZeroExit(
    stage: string,
    sample: string | null,
    tool: string,
    exitCode: number
  ): StageFailedError {
    return new StageFailedError(`${tool} exited with code ${exitCode}`, stage, sample, exitCode);
  }
}

/**
 * An artifact a stage needs, or claims to have produced, is not on disk
 */
export class MissingArtifactError extends StageFailedError {
  constructor(
    stage: string,
    sample: string | null,
    public readonly role: string,
    public readonly path: string
  ) {
    super(`expected artifact '${role}' is missing at ${path}`, stage, sample);
    this.name = "MissingArtifactError";
  }
}

/**
 * An external tool could not be started at all
 */
export class ToolLaunchError extends PipelineError {
  constructor(
    public readonly tool: string,
    cause: unknown
  ) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(
      `Failed to launch '${tool}': ${detail}`,
      "TOOL_LAUNCH_ERROR",
      undefined,
      "Check that the tool is installed and on PATH, or set its executable in the configuration"
    );
    this.name = "ToolLaunchError";
  }
}

/**
 * One or more sample chains failed, so the cross-sample phase never ran
 */
export class RunAbortedError extends PipelineError {
  constructor(
    public readonly failures: readonly PipelineError[],
    public readonly notStarted: readonly string[]
  ) {
    super(
      `${failures.length} sample chain(s) failed; cross-sample stages were not run`,
      "RUN_ABORTED",
      undefined,
      [
        ...failures.map((failure) => failure.message),
        ...(notStarted.length > 0 ? [`not started: ${notStarted.join(", ")}`] : []),
      ].join("\n")
    );
    this.name = "RunAbortedError";
  }
}

/**
 * Normalise an unknown thrown value into a PipelineError
 */
export function toPipelineError(error: unknown, fallbackCode = "UNKNOWN_ERROR"): PipelineError {
  if (error instanceof PipelineError) return error;
  const message = error instanceof Error ? error.message : String(error);
  return new PipelineError(message, fallbackCode);
}
