/**
 * Payment destinations and their conversion to transaction outputs.
 *
 * @module Destinations
 * @since 0.1.0
 */

import { Effect } from "effect"

import { formatAtoms, isValidSendAmount } from "../Amount.js"
import * as Address from "../Address.js"
import type { NetworkParams } from "../Network.js"
import type { TxOutput } from "../Transaction.js"
import { InvalidAmountError, MultipleMaxAmountRecipientsError } from "./AuthoringError.js"
import { dustThreshold, isDustAmount } from "./FeePolicy.js"

/**
 * A requested payment. When `sendMax` is set, `atomAmount` is ignored and the destination
 * receives whatever is left after the other payments and the fee.
 *
 * @since 0.1.0
 * @category model
 */
export interface TransactionDestination {
  readonly address: string
  readonly atomAmount: bigint
  readonly sendMax?: boolean
}

/**
 * @since 0.1.0
 * @category model
 */
export interface ParsedOutputs {
  readonly outputs: ReadonlyArray<TxOutput>
  readonly totalSend: bigint
  /** Recipient of the left-over value, if one destination asked for it */
  readonly maxAmountAddress: string | undefined
}

/**
 * Build the output paying `amount` to `address`, checking both.
 *
 * The amount must lie in `(0, maxAmount]` and must not be dust for the address script at
 * `feeRatePerKb`. The range is checked before the address, the dust rule after it.
 *
 * @since 0.1.0
 * @category constructors
 */
export const makeTxOutput = (
  address: string,
  amount: bigint,
  network: NetworkParams,
  feeRatePerKb: bigint = network.defaultRelayFeePerKb
): Effect.Effect<TxOutput, InvalidAmountError | Address.AddressError> =>
  Effect.gen(function* () {
    if (!isValidSendAmount(amount, network.maxAmount)) {
      return yield* Effect.fail(
        new InvalidAmountError({
          message: `Invalid amount ${formatAtoms(amount)} for ${address}: must be above zero and at most ${formatAtoms(network.maxAmount)}`,
          address,
          amount
        })
      )
    }
    const decoded = yield* Address.decode(address, network)
    const pkScript = Address.toPkScript(decoded)
    if (isDustAmount(amount, pkScript.length, feeRatePerKb)) {
      return yield* Effect.fail(
        new InvalidAmountError({
          message: `Invalid amount ${formatAtoms(amount)} for ${address}: below the dust threshold of ${formatAtoms(dustThreshold(pkScript.length, feeRatePerKb))}`,
          address,
          amount
        })
      )
    }
    return { value: amount, version: Address.DEFAULT_SCRIPT_VERSION, pkScript }
  })

/**
 * Turn payment destinations into outputs.
 *
 * A send-max destination produces no output here; its address is returned as
 * `maxAmountAddress`. A second send-max destination fails the whole call. Dust is judged at
 * `feeRatePerKb`, the network default unless given.
 *
 * @since 0.1.0
 * @category parsing
 */
export const parseOutputs = (
  destinations: ReadonlyArray<TransactionDestination>,
  network: NetworkParams,
  feeRatePerKb: bigint = network.defaultRelayFeePerKb
): Effect.Effect<ParsedOutputs, InvalidAmountError | MultipleMaxAmountRecipientsError | Address.AddressError> =>
  Effect.gen(function* () {
    const outputs: Array<TxOutput> = []
    let totalSend = 0n
    let maxAmountAddress: string | undefined

    for (const destination of destinations) {
      if (destination.sendMax === true) {
        if (maxAmountAddress !== undefined) {
          return yield* Effect.fail(
            new MultipleMaxAmountRecipientsError({
              message: "Cannot send max amount to multiple recipients",
              addresses: [maxAmountAddress, destination.address]
            })
          )
        }
        yield* Address.decode(destination.address, network)
        maxAmountAddress = destination.address
        continue
      }

      const output = yield* makeTxOutput(destination.address, destination.atomAmount, network, feeRatePerKb)
      totalSend += output.value
      outputs.push(output)
    }

    return { outputs, totalSend, maxAmountAddress }
  })
