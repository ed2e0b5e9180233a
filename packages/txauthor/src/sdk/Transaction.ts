/**
 * Unsigned transaction model produced by the authoring engine.
 *
 * @module Transaction
 * @since 0.1.0
 */

/**
 * Serialization format version of authored transactions.
 *
 * @since 0.1.0
 * @category constants
 */
export const TX_VERSION = 1

/**
 * Reference to a previous transaction output.
 *
 * @since 0.1.0
 * @category model
 */
export interface OutPoint {
  /** Previous transaction hash (hex, display order) */
  readonly hash: string
  readonly index: number
  /** 0 = regular tree, 1 = stake tree */
  readonly tree: number
}

/**
 * A previously chosen unspent output, supplied by the caller and never modified.
 *
 * @since 0.1.0
 * @category model
 */
export interface SelectedInput {
  readonly previousOutPoint: OutPoint
  readonly valueIn: bigint
  /** Placeholder until signing; usually empty */
  readonly signatureScript: Uint8Array
  /** Size class of the signature script once signed. Defaults to a P2PKH redeem script */
  readonly sigScriptSize?: number
  readonly sequence?: number
}

/**
 * @since 0.1.0
 * @category model
 */
export interface TxOutput {
  readonly value: bigint
  readonly version: number
  readonly pkScript: Uint8Array
}

/**
 * @since 0.1.0
 * @category model
 */
export interface UnsignedTransaction {
  readonly serType: "full"
  readonly version: number
  readonly inputs: ReadonlyArray<SelectedInput>
  readonly outputs: ReadonlyArray<TxOutput>
  readonly lockTime: number
  readonly expiry: number
}

/**
 * Result of a successful authoring call.
 *
 * `fee` is what the transaction actually pays (`totalInput - Σ outputs`, including any change
 * donated as dust); `requiredFee` is the relay fee for `estimatedSignedSize`. `fee >= requiredFee`.
 *
 * @since 0.1.0
 * @category model
 */
export interface AuthoredTransaction {
  readonly tx: UnsignedTransaction
  readonly totalInput: bigint
  readonly estimatedSignedSize: number
  readonly fee: bigint
  readonly requiredFee: bigint
  /** Positions of change outputs in `tx.outputs` */
  readonly changeIndices: ReadonlyArray<number>
}

/**
 * @since 0.1.0
 * @category constructors
 */
export const makeUnsignedTransaction = (
  inputs: ReadonlyArray<SelectedInput>,
  outputs: ReadonlyArray<TxOutput>
): UnsignedTransaction => ({
  serType: "full",
  version: TX_VERSION,
  inputs,
  outputs,
  lockTime: 0,
  expiry: 0
})

export const totalInputValue = (inputs: ReadonlyArray<SelectedInput>): bigint =>
  inputs.reduce((acc, input) => acc + input.valueIn, 0n)

export const totalOutputValue = (outputs: ReadonlyArray<TxOutput>): bigint =>
  outputs.reduce((acc, output) => acc + output.value, 0n)
