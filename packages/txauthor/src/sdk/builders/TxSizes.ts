/**
 * Serialized size estimation for signed transactions.
 *
 * Sizes follow the full (prefix + witness) wire serialization. Input sizes use the signature
 * script size class of each input, since scripts are empty until signing.
 *
 * @module TxSizes
 * @since 0.1.0
 */

import { Either } from "effect"

import * as Address from "../Address.js"
import type { NetworkParams } from "../Network.js"
import type { TxOutput } from "../Transaction.js"

/**
 * Signature script redeeming a compressed-pubkey P2PKH output:
 * `OP_DATA_73 <sig+hashtype> OP_DATA_33 <pubkey>`.
 *
 * @since 0.1.0
 * @category constants
 */
export const REDEEM_P2PKH_SIG_SCRIPT_SIZE = 1 + 73 + 1 + 33

export const P2PKH_PK_SCRIPT_SIZE = 25

/**
 * @since 0.1.0
 * @category utilities
 */
export const varIntSerializeSize = (value: number): number => {
  if (value < 0xfd) return 1
  if (value <= 0xffff) return 3
  if (value <= 0xffffffff) return 5
  return 9
}

/**
 * Worst-case size of a signed input: outpoint (32 + 4 + 1), sequence (4) and the witness
 * (value 8, block height 4, block index 4, varint-prefixed signature script).
 *
 * @since 0.1.0
 * @category estimation
 */
export const estimateInputSize = (sigScriptSize: number): number =>
  32 + 4 + 1 + 8 + 4 + 4 + varIntSerializeSize(sigScriptSize) + sigScriptSize + 4

/**
 * Size of an output: value (8), script version (2) and varint-prefixed script.
 *
 * @since 0.1.0
 * @category estimation
 */
export const estimateOutputSize = (pkScriptSize: number): number =>
  8 + 2 + varIntSerializeSize(pkScriptSize) + pkScriptSize

export const outputSerializeSize = (output: TxOutput): number => estimateOutputSize(output.pkScript.length)

/**
 * Estimate the signed serialized size of a transaction.
 *
 * When `changeScriptSize` is positive, one more output of that script size is counted.
 * The 12 envelope bytes are version, lock time and expiry; input counts appear twice
 * (prefix and witness).
 *
 * @since 0.1.0
 * @category estimation
 */
export const estimateSerializeSize = (
  inputSigScriptSizes: ReadonlyArray<number>,
  outputs: ReadonlyArray<TxOutput>,
  changeScriptSize = 0
): number => {
  const inputsSize = inputSigScriptSizes.reduce((acc, size) => acc + estimateInputSize(size), 0)
  const outputsSize = outputs.reduce((acc, output) => acc + outputSerializeSize(output), 0)
  const hasChange = changeScriptSize > 0
  const outputCount = outputs.length + (hasChange ? 1 : 0)
  const changeSize = hasChange ? estimateOutputSize(changeScriptSize) : 0

  return (
    12 +
    2 * varIntSerializeSize(inputSigScriptSizes.length) +
    varIntSerializeSize(outputCount) +
    inputsSize +
    outputsSize +
    changeSize
  )
}

/**
 * Length of the locking script paying to `address`.
 *
 * @since 0.1.0
 * @category estimation
 */
export const changeScriptSize = (
  address: string,
  network: NetworkParams
): Either.Either<number, Address.AddressError> =>
  Either.map(Address.decode(address, network), (decoded) => Address.toPkScript(decoded).length)
