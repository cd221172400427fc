/**
 * Effect platform layer selection and Promise bridging
 *
 * File and process access goes through @effect/platform services; this module
 * supplies the Node.js implementations and runs Effect programs for the
 * Promise-based APIs, rethrowing the original typed error on failure.
 */

import { NodeContext } from "@effect/platform-node";
import { Cause, Effect, Exit, Runtime } from "effect";

/**
 * Get the Effect platform layer (FileSystem, Path, CommandExecutor)
 */
export function getPlatform(): typeof NodeContext.layer {
  return NodeContext.layer;
}

/**
 * Run an Effect program against the platform layer
 *
 * Unlike Effect.runPromise, a failure rejects with the program's own error
 * value (a FileError, ParseError, ...) rather than a wrapped fiber failure.
 */
export async function runPlatform<A, E>(
  program: Effect.Effect<A, E, NodeContext.NodeContext>
): Promise<A> {
  const exit = await Effect.runPromiseExit(program.pipe(Effect.provide(getPlatform())));
  if (Exit.isSuccess(exit)) {
    return exit.value;
  }
  throw Cause.squash(exit.cause);
}

/**
 * Run a program on a runtime captured inside a running Effect
 *
 * Lets Promise callbacks re-enter Effect without providing the platform
 * layer again; failures reject with the program's own error, as in runPlatform.
 */
export async function runOn<A, E, R>(
  runtime: Runtime.Runtime<R>,
  program: Effect.Effect<A, E, R>
): Promise<A> {
  const exit = await Runtime.runPromiseExit(runtime)(program);
  if (Exit.isSuccess(exit)) {
    return exit.value;
  }
  throw Cause.squash(exit.cause);
}
