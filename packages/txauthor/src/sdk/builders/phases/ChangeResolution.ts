/**
 * Change Resolution Phase
 *
 * Decides where left-over value goes before any sizing happens.
 *
 * @module ChangeResolution
 * @since 0.1.0
 */

import { Effect } from "effect"

import * as Address from "../../Address.js"
import { ChangeSourceTag } from "../../wallet/ChangeSource.js"
import type { InvalidAmountError } from "../AuthoringError.js"
import { ChangeAddressGenerationError, ConflictingChangeSpecificationError } from "../AuthoringError.js"
import type { TransactionDestination } from "../Destinations.js"
import { makeTxOutput } from "../Destinations.js"
import type { AuthoringContext, ChangeMode } from "./Phases.js"

/**
 * Change Resolution Phase
 *
 * **Decision Flow:**
 * ```
 * send-max recipient AND change destinations? → ConflictingChangeSpecification
 * send-max recipient?                          → Single (sendMax)
 * change destinations?                         → Explicit (each validated like a payment, dust included)
 * neither                                      → ask the change source → Single (generated)
 * ```
 *
 * The change source is only consulted in the last case.
 */
export const executeChangeResolution = (
  ctx: AuthoringContext,
  params: {
    readonly maxAmountAddress: string | undefined
    readonly changeDestinations: ReadonlyArray<TransactionDestination>
    readonly account: number
  }
): Effect.Effect<
  ChangeMode,
  ConflictingChangeSpecificationError | ChangeAddressGenerationError | InvalidAmountError | Address.AddressError,
  ChangeSourceTag
> =>
  Effect.gen(function* () {
    const { account, changeDestinations, maxAmountAddress } = params

    if (maxAmountAddress !== undefined) {
      if (changeDestinations.length > 0) {
        return yield* Effect.fail(
          new ConflictingChangeSpecificationError({
            message:
              "No change is generated when sending max amount, change destinations must not be provided",
            maxAmountAddress
          })
        )
      }
      return yield* single(ctx, maxAmountAddress, "sendMax")
    }

    if (changeDestinations.length > 0) {
      const destinations = yield* Effect.forEach(changeDestinations, (destination) =>
        Effect.map(
          makeTxOutput(destination.address, destination.atomAmount, ctx.network, ctx.feeRatePerKb),
          (output) => ({ address: destination.address, output })
        )
      )
      const scriptSize = destinations.reduce((acc, d) => acc + d.output.pkScript.length, 0)

      yield* Effect.logDebug(
        `[ChangeResolution] ${destinations.length} explicit change destinations, ${scriptSize} script bytes`
      )

      const mode: ChangeMode = { _tag: "Explicit", destinations, scriptSize }
      return mode
    }

    const changeSource = yield* ChangeSourceTag
    const address = yield* changeSource.nextChangeAddress(account).pipe(
      Effect.mapError(
        (error) =>
          new ChangeAddressGenerationError({
            message: `Error generating internal address to use as change: ${error.message}`,
            account,
            cause: error
          })
      )
    )

    return yield* single(ctx, address, "generated")
  })

const single = (ctx: AuthoringContext, address: string, source: "sendMax" | "generated") =>
  Effect.gen(function* () {
    const decoded = yield* Address.decode(address, ctx.network)
    const pkScript = Address.toPkScript(decoded)

    yield* Effect.logDebug(`[ChangeResolution] Left-over value goes to ${address} (${source})`)

    const mode: ChangeMode = { _tag: "Single", source, address, pkScript, scriptSize: pkScript.length }
    return mode
  })
