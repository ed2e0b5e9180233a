/**
 * Transaction author: turns pre-selected inputs and payment destinations into an unsigned
 * transaction whose fee covers its signed size.
 *
 * @module TransactionAuthor
 * @since 0.1.0
 *
 * ## Execution Model
 *
 * Authoring runs five phases in order, each a function of the results before it:
 *
 * ```
 * destinations → changeResolution → feeCalculation → changeCreation → ordering
 * ```
 *
 * Every failure is terminal: no transaction is produced and nothing is retried. Re-selecting
 * inputs after `InsufficientFundsError` is up to the caller.
 */

import { Effect } from "effect"

import type { NetworkParams } from "../Network.js"
import { NetworkParamsTag } from "../Network.js"
import type { AuthoredTransaction, SelectedInput } from "../Transaction.js"
import { makeUnsignedTransaction, totalInputValue, totalOutputValue } from "../Transaction.js"
import type { ChangeSourceTag } from "../wallet/ChangeSource.js"
import type { AuthoringError } from "./AuthoringError.js"
import type { TransactionDestination } from "./Destinations.js"
import { parseOutputs } from "./Destinations.js"
import { feeForSerializeSize } from "./FeePolicy.js"
import { executeChangeCreation } from "./phases/ChangeCreation.js"
import { executeChangeResolution } from "./phases/ChangeResolution.js"
import { executeFeeCalculation } from "./phases/FeeCalculation.js"
import { executeOutputOrdering } from "./phases/OutputOrdering.js"
import type { AuthoringContext } from "./phases/Phases.js"
import { withPhase } from "./phases/Phases.js"
import { REDEEM_P2PKH_SIG_SCRIPT_SIZE } from "./TxSizes.js"

/**
 * @since 0.1.0
 * @category model
 */
export interface AuthorTransactionParams {
  readonly inputs: ReadonlyArray<SelectedInput>
  readonly sendDestinations: ReadonlyArray<TransactionDestination>
  /** Explicit change split. Leave empty to send change to a fresh address from the change source */
  readonly changeDestinations?: ReadonlyArray<TransactionDestination>
  /** Account the change source derives fresh change addresses from */
  readonly account: number
  /** Overrides the network's default relay fee rate, in atoms per kilobyte */
  readonly relayFeePerKb?: bigint
}

export const makeAuthoringContext = (
  network: NetworkParams,
  inputs: ReadonlyArray<SelectedInput>,
  relayFeePerKb?: bigint
): AuthoringContext => ({
  network,
  feeRatePerKb: relayFeePerKb ?? network.defaultRelayFeePerKb,
  inputSigScriptSizes: inputs.map((input) => input.sigScriptSize ?? REDEEM_P2PKH_SIG_SCRIPT_SIZE),
  totalInput: totalInputValue(inputs)
})

/**
 * Author an unsigned transaction.
 *
 * Inputs are used as given, in order. Payment outputs follow the destination order until
 * change outputs are shuffled in among them.
 *
 * @example
 * ```typescript
 * const authored = yield* authorTransaction({
 *   inputs,
 *   sendDestinations: [{ address: recipient, atomAmount: 50_000_000n }],
 *   account: 0
 * })
 * ```
 *
 * @since 0.1.0
 * @category authoring
 */
export const authorTransaction = (
  params: AuthorTransactionParams
): Effect.Effect<AuthoredTransaction, AuthoringError, NetworkParamsTag | ChangeSourceTag> =>
  Effect.gen(function* () {
    const network = yield* NetworkParamsTag
    const ctx = makeAuthoringContext(network, params.inputs, params.relayFeePerKb)

    const parsed = yield* parseOutputs(params.sendDestinations, network, ctx.feeRatePerKb).pipe(
      withPhase("destinations")
    )

    const change = yield* executeChangeResolution(ctx, {
      maxAmountAddress: parsed.maxAmountAddress,
      changeDestinations: params.changeDestinations ?? [],
      account: params.account
    }).pipe(withPhase("changeResolution"))

    const fees = yield* executeFeeCalculation(ctx, parsed.outputs, parsed.totalSend, change).pipe(
      withPhase("feeCalculation")
    )

    const created = yield* executeChangeCreation(ctx, parsed.outputs, change, fees).pipe(withPhase("changeCreation"))

    const ordered = yield* executeOutputOrdering(parsed.outputs, created.changeOutputs).pipe(withPhase("ordering"))

    const authored: AuthoredTransaction = {
      tx: makeUnsignedTransaction(params.inputs, ordered.outputs),
      totalInput: ctx.totalInput,
      estimatedSignedSize: created.estimatedSize,
      fee: ctx.totalInput - totalOutputValue(ordered.outputs),
      requiredFee: feeForSerializeSize(ctx.feeRatePerKb, created.estimatedSize),
      changeIndices: ordered.changeIndices
    }

    yield* Effect.logDebug(
      `[TransactionAuthor] ${params.inputs.length} inputs, ${ordered.outputs.length} outputs, ` +
        `fee ${authored.fee} atoms (required ${authored.requiredFee})`
    )

    return authored
  })
