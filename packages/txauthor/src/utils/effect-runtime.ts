import { Cause, Effect, Exit } from "effect"

/**
 * Patterns to filter from stack traces - Effect.ts internal implementation details
 */
const EFFECT_INTERNAL_PATTERNS = [
  /node_modules\/effect\//,
  /at FiberRuntime\./,
  /at EffectPrimitive\./,
  /at Object\.Iterator/,
  /at runLoop/,
  /at evaluateEffect/,
  /at body \(/,
  /effect_instruction_i\d+/,
  /at pipeArguments/,
  /at pipe \(/,
  /at Arguments\./,
  /at \.\.\.$/ // Lines like "... 7 lines matching cause stack trace ..."
]

/**
 * Clean a single error's stack trace by removing Effect.ts internals
 */
function cleanStackTrace(stack: string): string {
  return stack
    .split("\n")
    .filter((line) => !line.trim().startsWith("at ") || !EFFECT_INTERNAL_PATTERNS.some((pattern) => pattern.test(line)))
    .join("\n")
}

/**
 * Recursively clean error chain (error and all causes)
 */
function cleanErrorChain(error: unknown, depth = 0): unknown {
  if (!(error instanceof Error) || depth > 8) return error

  if (error.stack !== undefined) {
    error.stack = cleanStackTrace(error.stack)
  }
  if (error.cause !== undefined) {
    cleanErrorChain(error.cause, depth + 1)
  }

  return error
}

export interface RunOptions {
  /** Interrupts the running fiber when aborted */
  readonly signal?: AbortSignal
}

/**
 * Run an Effect and convert it to a Promise with clean error handling.
 *
 * - Executes the Effect using Effect.runPromiseExit
 * - On failure, squashes the Cause to its primary error and cleans its stack trace
 * - Rejects with that error, so callers see the same tagged errors the Effect API fails with
 *
 * @example
 * ```typescript
 * import { Effect } from "effect"
 * import { runEffect } from "@dcrkit/txauthor"
 *
 * const value = await runEffect(Effect.succeed(42))
 * ```
 *
 * @since 0.1.0
 * @category utilities
 */
export async function runEffect<A, E>(effect: Effect.Effect<A, E>, options?: RunOptions): Promise<A> {
  const exit = await Effect.runPromiseExit(effect, options)

  if (Exit.isFailure(exit)) {
    throw cleanErrorChain(Cause.squash(exit.cause))
  }

  return exit.value
}
