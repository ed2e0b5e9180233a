/**
 * Change Creation Phase - Change Output Generation
 *
 * Turns the change amount into change outputs, or drops change that is not worth creating.
 *
 * @module ChangeCreation
 * @since 0.1.0
 */

import { Effect } from "effect"

import { formatAtoms } from "../../Amount.js"
import * as Address from "../../Address.js"
import type { TxOutput } from "../../Transaction.js"
import { ChangeAllocationExceedsAvailableError, ScriptTooLargeError } from "../AuthoringError.js"
import { isDustAmount } from "../FeePolicy.js"
import { estimateSerializeSize } from "../TxSizes.js"
import type { FeeCalculationResult } from "./FeeCalculation.js"
import type { AuthoringContext, ChangeMode, ChangeOutput } from "./Phases.js"

/**
 * @since 0.1.0
 */
export interface ChangeCreationResult {
  readonly changeOutputs: ReadonlyArray<ChangeOutput>
  /** Signed size of the transaction actually emitted */
  readonly estimatedSize: number
}

const checkScriptSize = (ctx: AuthoringContext, change: ChangeOutput) =>
  change.output.pkScript.length > ctx.network.maxScriptElementSize
    ? Effect.fail(
        new ScriptTooLargeError({
          message: `Script size exceeds maximum bytes pushable to the stack for ${change.address}`,
          address: change.address,
          scriptSize: change.output.pkScript.length,
          maxScriptElementSize: ctx.network.maxScriptElementSize
        })
      )
    : Effect.void

/**
 * Change Creation Phase
 *
 * **Decision Flow:**
 * ```
 * changeAmount == 0 or dust (summed change script size)?
 *   → no change outputs; re-estimate size without change
 *     (the leftover is donated to the fee)
 *   ↓ otherwise
 * any change script larger than a stack push? → ScriptTooLarge
 *   ↓
 * Single:   one output of changeAmount
 * Explicit: the requested outputs; sum > changeAmount → ChangeAllocationExceedsAvailable
 *           (any unallocated remainder goes to the fee)
 * ```
 */
export const executeChangeCreation = (
  ctx: AuthoringContext,
  outputs: ReadonlyArray<TxOutput>,
  change: ChangeMode,
  fees: FeeCalculationResult
): Effect.Effect<ChangeCreationResult, ScriptTooLargeError | ChangeAllocationExceedsAvailableError> =>
  Effect.gen(function* () {
    const { changeAmount } = fees

    if (changeAmount === 0n || isDustAmount(changeAmount, change.scriptSize, ctx.feeRatePerKb)) {
      const estimatedSize = estimateSerializeSize(ctx.inputSigScriptSizes, outputs)
      yield* Effect.logDebug(
        `[ChangeCreation] Change of ${changeAmount} atoms is dust, dropped. Size without change: ${estimatedSize}`
      )
      return { changeOutputs: [], estimatedSize }
    }

    if (change._tag === "Single") {
      const single: ChangeOutput = {
        address: change.address,
        output: { value: changeAmount, version: Address.DEFAULT_SCRIPT_VERSION, pkScript: change.pkScript }
      }
      yield* checkScriptSize(ctx, single)
      yield* Effect.logDebug(`[ChangeCreation] ${changeAmount} atoms to ${change.address}`)
      return { changeOutputs: [single], estimatedSize: fees.estimatedSize }
    }

    yield* Effect.forEach(change.destinations, (destination) => checkScriptSize(ctx, destination), {
      discard: true
    })

    const allocated = change.destinations.reduce((acc, d) => acc + d.output.value, 0n)
    if (allocated > changeAmount) {
      return yield* Effect.fail(
        new ChangeAllocationExceedsAvailableError({
          message:
            `Total amount allocated to change addresses (${formatAtoms(allocated)}) is higher than ` +
            `actual change amount for transaction (${formatAtoms(changeAmount)})`,
          allocated,
          available: changeAmount
        })
      )
    }

    yield* Effect.logDebug(
      `[ChangeCreation] ${change.destinations.length} change outputs, ${changeAmount - allocated} atoms unallocated`
    )

    return { changeOutputs: change.destinations, estimatedSize: fees.estimatedSize }
  })
