import { Context, Data, Effect } from "effect"

import { runEffect } from "../../utils/effect-runtime.js"
import type { EffectToPromiseAPI } from "../Type.js"

// ============================================================================
// Error Types
// ============================================================================

/**
 * Error raised by a change address provider.
 *
 * @since 0.1.0
 * @category errors
 */
export class AddressGenerationError extends Data.TaggedError("AddressGenerationError")<{
  readonly message: string
  readonly cause?: unknown
}> {}

/**
 * Source of fresh internal addresses used for change.
 *
 * Implementations usually derive the next address of the account's internal branch, which may
 * touch a database or remote wallet. The returned address must be valid on the active network.
 *
 * @since 0.1.0
 * @category interfaces
 */
export interface ChangeSourceEffect {
  readonly nextChangeAddress: (account: number) => Effect.Effect<string, AddressGenerationError>
}

export interface ChangeSource extends EffectToPromiseAPI<ChangeSourceEffect> {
  readonly Effect: ChangeSourceEffect
}

/**
 * @since 0.1.0
 * @category context
 */
export class ChangeSourceTag extends Context.Tag("ChangeSource")<ChangeSourceTag, ChangeSourceEffect>() {}

/**
 * Adapt an async address function. The signal aborts when the authoring fiber is interrupted.
 *
 * @example
 * ```typescript
 * const changeSource = makeChangeSource(async (account, signal) => {
 *   const res = await fetch(`${walletUrl}/accounts/${account}/change`, { signal })
 *   return (await res.json()).address
 * })
 * ```
 *
 * @since 0.1.0
 * @category constructors
 */
export const makeChangeSource = (
  nextChangeAddress: (account: number, signal: AbortSignal) => Promise<string>
): ChangeSource => {
  const effect: ChangeSourceEffect = {
    nextChangeAddress: (account) =>
      Effect.tryPromise({
        try: (signal) => nextChangeAddress(account, signal),
        catch: (cause) =>
          new AddressGenerationError({
            message: cause instanceof Error ? cause.message : String(cause),
            cause
          })
      })
  }

  return {
    Effect: effect,
    nextChangeAddress: (account) => runEffect(effect.nextChangeAddress(account))
  }
}

/**
 * Change source handing out addresses from a fixed list, in order.
 *
 * @since 0.1.0
 * @category constructors
 */
export const fromAddresses = (addresses: ReadonlyArray<string>): ChangeSource => {
  let next = 0
  return makeChangeSource(async () => {
    const address = addresses[next]
    if (address === undefined) {
      throw new Error(`Change address pool exhausted after ${addresses.length} addresses`)
    }
    next += 1
    return address
  })
}
