/**
 * Fee Validation Utilities
 *
 * Independent validation of an authored transaction's fee against the relay fee policy.
 * The size is recomputed from the final inputs and outputs, so this also checks that the
 * author's reported size matches what it emitted.
 *
 * @since 0.1.0
 * @category validation
 */

import { feeForSerializeSize } from "../sdk/builders/FeePolicy.js"
import { estimateSerializeSize, REDEEM_P2PKH_SIG_SCRIPT_SIZE } from "../sdk/builders/TxSizes.js"
import type { AuthoredTransaction } from "../sdk/Transaction.js"
import { totalOutputValue } from "../sdk/Transaction.js"

/**
 * Result of transaction fee validation.
 *
 * @since 0.1.0
 * @category model
 */
export interface FeeValidationResult {
  /**
   * Whether the transaction fee is valid (actualFee >= minRequiredFee)
   */
  readonly isValid: boolean

  /**
   * Inputs minus outputs, in atoms
   */
  readonly actualFee: bigint

  /**
   * Relay fee for the recomputed size, in atoms
   */
  readonly minRequiredFee: bigint

  /**
   * Estimated signed size recomputed from the transaction, in bytes
   */
  readonly txSizeBytes: number

  /**
   * Positive = overpayment, Negative = underpayment
   */
  readonly difference: bigint
}

/**
 * Validate that an authored transaction pays at least the relay fee for its signed size.
 *
 * @since 0.1.0
 * @category validation
 */
export const validateTransactionFee = (authored: AuthoredTransaction, feeRatePerKb: bigint): FeeValidationResult => {
  const { tx } = authored
  const actualFee = authored.totalInput - totalOutputValue(tx.outputs)
  const txSizeBytes = estimateSerializeSize(
    tx.inputs.map((input) => input.sigScriptSize ?? REDEEM_P2PKH_SIG_SCRIPT_SIZE),
    tx.outputs
  )
  const minRequiredFee = feeForSerializeSize(feeRatePerKb, txSizeBytes)
  const difference = actualFee - minRequiredFee

  return {
    isValid: difference >= 0n,
    actualFee,
    minRequiredFee,
    txSizeBytes,
    difference
  }
}

/**
 * Assert that a transaction's fee is valid, throwing an error if not.
 *
 * Useful for tests where you want to ensure fee validity.
 *
 * @since 0.1.0
 * @category validation
 */
export const assertValidFee = (authored: AuthoredTransaction, feeRatePerKb: bigint): void => {
  const result = validateTransactionFee(authored, feeRatePerKb)

  if (!result.isValid) {
    throw new Error(
      `Transaction fee is invalid. ` +
        `Actual: ${result.actualFee} atoms, ` +
        `Minimum required: ${result.minRequiredFee} atoms, ` +
        `Underpayment: ${-result.difference} atoms ` +
        `(Transaction size: ${result.txSizeBytes} bytes)`
    )
  }
}
