/**
 * External tool execution service
 *
 * Every bioinformatics program the pipeline drives is launched through this
 * one service, so orchestration code never touches processes directly and
 * tests can swap in a layer that fabricates tool outputs in process.
 *
 * ## Contract
 *
 * - `run` waits for the child to exit and succeeds with its exit code,
 *   whatever that code is; interpreting it is the caller's job
 * - stderr is inherited; stdout is inherited unless `stdout` names a file,
 *   in which case it is streamed into that file (truncating it)
 * - no timeout and no cancellation
 * - a process that cannot be started fails with ToolLaunchError
 *
 * @example
 * ```typescript
 * const program = Effect.gen(function* () {
 *   const runner = yield* ToolRunner;
 *   return yield* runner.run({ tool: "mlst", executable: "mlst", args: contigs, stdout: report });
 * });
 *
 * await Effect.runPromise(
 *   program.pipe(Effect.provide(ToolRunner.Live), Effect.provide(NodeContext.layer))
 * );
 * ```
 *
 * @module tools/tool-runner
 */

import { Command, CommandExecutor, FileSystem } from "@effect/platform";
import { Context, Effect, Layer, Stream } from "effect";
import { FileError, ToolLaunchError } from "../errors";

/**
 * Logical tool names; each maps to a configurable executable
 */
export const TOOL_NAMES = [
  "trimmomatic",
  "prinseq",
  "spades",
  "quast",
  "prokka",
  "dfast",
  "mlst",
  "abricate",
  "makeblastdb",
  "tblastn",
  "roary",
  "roaryPlots",
] as const;

export type ToolName = (typeof TOOL_NAMES)[number];

/**
 * One fully marshalled tool call
 */
export interface ToolInvocation {
  readonly tool: ToolName;
  readonly executable: string;
  readonly args: readonly string[];
  /** File that receives the tool's standard output */
  readonly stdout?: string;
  /** Working directory of the child process */
  readonly cwd?: string;
}

export interface ToolRunnerShape {
  readonly run: (invocation: ToolInvocation) => Effect.Effect<number, ToolLaunchError | FileError>;
}

export class ToolRunner extends Context.Tag("@panflow/ToolRunner")<ToolRunner, ToolRunnerShape>() {
  /**
   * Process-backed runner; needs a CommandExecutor and a FileSystem
   * (both supplied by NodeContext.layer)
   */
  static readonly Live: Layer.Layer<
    ToolRunner,
    never,
    CommandExecutor.CommandExecutor | FileSystem.FileSystem
  > = Layer.effect(
    ToolRunner,
    Effect.gen(function* () {
      const executor = yield* CommandExecutor.CommandExecutor;
      const fs = yield* FileSystem.FileSystem;

      return {
        run: (invocation: ToolInvocation) =>
          runProcess(invocation, fs).pipe(
            Effect.provideService(CommandExecutor.CommandExecutor, executor)
          ),
      };
    })
  );
}

/**
 * Render an invocation the way a shell user would type it, for logs
 */
export function describeInvocation(invocation: ToolInvocation): string {
  const quote = (arg: string): string => (/[\s"'|;&<>]/.test(arg) ? JSON.stringify(arg) : arg);
  const command = [invocation.executable, ...invocation.args].map(quote).join(" ");
  return invocation.stdout !== undefined ? `${command} > ${quote(invocation.stdout)}` : command;
}

function buildCommand(invocation: ToolInvocation): Command.Command {
  let command = Command.make(invocation.executable, ...invocation.args).pipe(
    Command.stderr("inherit")
  );
  if (invocation.cwd !== undefined) {
    command = Command.workingDirectory(command, invocation.cwd);
  }
  return command;
}

function runProcess(
  invocation: ToolInvocation,
  fs: FileSystem.FileSystem
): Effect.Effect<number, ToolLaunchError | FileError, CommandExecutor.CommandExecutor> {
  const launchFailed = (error: unknown): ToolLaunchError =>
    new ToolLaunchError(invocation.executable, error);

  const stdoutPath = invocation.stdout;
  if (stdoutPath === undefined) {
    return Command.exitCode(buildCommand(invocation).pipe(Command.stdout("inherit"))).pipe(
      Effect.map((code) => Number(code)),
      Effect.mapError(launchFailed)
    );
  }

  return Effect.scoped(
    Effect.gen(function* () {
      const child = yield* Command.start(buildCommand(invocation)).pipe(
        Effect.mapError(launchFailed)
      );
      const [, code] = yield* Effect.all(
        [
          Stream.run(child.stdout, fs.sink(stdoutPath)).pipe(
            Effect.mapError((error) => FileError.fromSystemError("write", stdoutPath, error))
          ),
          child.exitCode.pipe(Effect.mapError(launchFailed)),
        ],
        { concurrency: 2 }
      );
      return Number(code);
    })
  );
}
