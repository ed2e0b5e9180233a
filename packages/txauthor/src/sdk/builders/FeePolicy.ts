/**
 * Relay fee and dust policy.
 *
 * @module FeePolicy
 * @since 0.1.0
 */

import { MAX_AMOUNT } from "../Amount.js"
import { varIntSerializeSize } from "./TxSizes.js"

/**
 * Estimated size of the input that will later spend an output, used when pricing dust.
 *
 * @since 0.1.0
 * @category constants
 */
export const DUST_SPEND_INPUT_SIZE = 165

/**
 * Minimum fee a transaction of `serializeSize` bytes must pay to be relayed.
 *
 * `feeRatePerKb * size / 1000`, rounded down. A positive rate never yields a zero fee, and the
 * result is capped at the maximum amount.
 *
 * @since 0.1.0
 * @category fees
 */
export const feeForSerializeSize = (feeRatePerKb: bigint, serializeSize: number): bigint => {
  let fee = (feeRatePerKb * BigInt(serializeSize)) / 1000n

  if (fee === 0n && feeRatePerKb > 0n) {
    fee = feeRatePerKb
  }
  if (fee < 0n || fee > MAX_AMOUNT) {
    fee = MAX_AMOUNT
  }

  return fee
}

/**
 * Argument order matching size-first call sites.
 *
 * @since 0.1.0
 * @category fees
 */
export const requiredFee = (serializeSize: number, feeRatePerKb: bigint): bigint =>
  feeForSerializeSize(feeRatePerKb, serializeSize)

/**
 * Whether an output of `amount` locked by a `scriptSize`-byte script costs more than a third of
 * its value to spend at `feeRatePerKb`.
 *
 * @since 0.1.0
 * @category dust
 */
export const isDustAmount = (amount: bigint, scriptSize: number, feeRatePerKb: bigint): boolean => {
  const totalSize = 8 + 2 + varIntSerializeSize(scriptSize) + scriptSize + DUST_SPEND_INPUT_SIZE
  return (amount * 1000n) / (3n * BigInt(totalSize)) < feeRatePerKb
}

/**
 * Smallest amount that is not dust for the script size and rate.
 *
 * @since 0.1.0
 * @category dust
 */
export const dustThreshold = (scriptSize: number, feeRatePerKb: bigint): bigint => {
  const totalSize = BigInt(8 + 2 + varIntSerializeSize(scriptSize) + scriptSize + DUST_SPEND_INPUT_SIZE)
  // smallest a with floor(a * 1000 / (3 * totalSize)) >= rate
  const denominator = 3n * totalSize
  return (feeRatePerKb * denominator + 999n) / 1000n
}
