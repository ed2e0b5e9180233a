/**
 * Fee Calculation Phase
 *
 * Estimates the signed size with change present, prices it, and derives the change amount.
 *
 * @module FeeCalculation
 * @since 0.1.0
 */

import { Effect } from "effect"

import { formatAtoms } from "../../Amount.js"
import type { TxOutput } from "../../Transaction.js"
import { InsufficientFundsError } from "../AuthoringError.js"
import { feeForSerializeSize } from "../FeePolicy.js"
import { estimateSerializeSize } from "../TxSizes.js"
import type { AuthoringContext, ChangeMode } from "./Phases.js"

/**
 * @since 0.1.0
 */
export interface FeeCalculationResult {
  /** Signed size assuming every change output is kept */
  readonly estimatedSize: number
  readonly fee: bigint
  /** `totalInput - totalSend - fee`, never negative */
  readonly changeAmount: bigint
}

/**
 * Signed size of the payment outputs plus change.
 *
 * A single change output is counted by script size; explicit change outputs are already built
 * and are counted one slot each.
 */
export const sizeWithChange = (ctx: AuthoringContext, outputs: ReadonlyArray<TxOutput>, change: ChangeMode): number =>
  change._tag === "Single"
    ? estimateSerializeSize(ctx.inputSigScriptSizes, outputs, change.scriptSize)
    : estimateSerializeSize(ctx.inputSigScriptSizes, [...outputs, ...change.destinations.map((d) => d.output)])

/**
 * Fee Calculation Phase
 *
 * **Decision Flow:**
 * ```
 * size = estimate(inputs, payments + change)
 *   ↓
 * fee = rate × size / 1000
 *   ↓
 * changeAmount = totalInput - totalSend - fee
 *   ↓
 * changeAmount < 0? → InsufficientFunds (shortfall = -changeAmount)
 * ```
 *
 * The fee is priced for the larger, change-inclusive size, so dropping change later never
 * leaves the transaction underpaying.
 */
export const executeFeeCalculation = (
  ctx: AuthoringContext,
  outputs: ReadonlyArray<TxOutput>,
  totalSend: bigint,
  change: ChangeMode
): Effect.Effect<FeeCalculationResult, InsufficientFundsError> =>
  Effect.gen(function* () {
    const estimatedSize = sizeWithChange(ctx, outputs, change)
    const fee = feeForSerializeSize(ctx.feeRatePerKb, estimatedSize)
    const changeAmount = ctx.totalInput - totalSend - fee

    yield* Effect.logDebug(
      `[FeeCalculation] size ${estimatedSize} bytes, fee ${fee} atoms at ${ctx.feeRatePerKb} atoms/kB, ` +
        `change ${changeAmount} atoms`
    )

    if (changeAmount < 0n) {
      const shortfall = -changeAmount
      return yield* Effect.fail(
        new InsufficientFundsError({
          message: `Total send amount plus tx fee is higher than the total input amount by ${formatAtoms(shortfall)}`,
          totalInput: ctx.totalInput,
          totalSend,
          fee,
          shortfall
        })
      )
    }

    return { estimatedSize, fee, changeAmount }
  })
