/**
 * Base58 payment addresses and the locking scripts they pay to.
 *
 * An address is `prefix (2 bytes) ‖ hash160 (20 bytes) ‖ checksum (4 bytes)` in base58, where the
 * checksum is the first four bytes of a double BLAKE-256 of the prefix and hash.
 *
 * @module Address
 * @since 0.1.0
 */

import { blake256 } from "@noble/hashes/blake1"
import { base58 } from "@scure/base"
import { Data, Either } from "effect"

import type { AddressKind, NetworkParams } from "./Network.js"
import { kindForPrefix, networks } from "./Network.js"

// ============================================================================
// Errors
// ============================================================================

/**
 * The address does not decode for the active network.
 *
 * @since 0.1.0
 * @category errors
 */
export class InvalidAddressError extends Data.TaggedError("InvalidAddressError")<{
  readonly message: string
  readonly address: string
  readonly cause?: unknown
}> {}

/**
 * The address decodes but has no known locking script template.
 *
 * @since 0.1.0
 * @category errors
 */
export class UnsupportedAddressTypeError extends Data.TaggedError("UnsupportedAddressTypeError")<{
  readonly message: string
  readonly address: string
}> {}

export type AddressError = InvalidAddressError | UnsupportedAddressTypeError

// ============================================================================
// Model
// ============================================================================

export interface DecodedAddress {
  readonly address: string
  readonly kind: Exclude<AddressKind, "p2pk">
  readonly hash160: Uint8Array
}

const HASH160_SIZE = 20
const CHECKSUM_SIZE = 4
const PREFIX_SIZE = 2

const OP_DUP = 0x76
const OP_HASH160 = 0xa9
const OP_DATA_20 = 0x14
const OP_EQUAL = 0x87
const OP_EQUALVERIFY = 0x88
const OP_CHECKSIG = 0xac
const OP_CHECKSIGALT = 0xbe
const OP_1 = 0x51
const OP_2 = 0x52

/**
 * Script version of every locking script produced here.
 *
 * @since 0.1.0
 * @category constants
 */
export const DEFAULT_SCRIPT_VERSION = 0

const checksum = (data: Uint8Array): Uint8Array => blake256(blake256(data)).subarray(0, CHECKSUM_SIZE)

const bytesEqual = (a: Uint8Array, b: Uint8Array): boolean =>
  a.length === b.length && a.every((byte, i) => byte === b[i])

// ============================================================================
// Encoding
// ============================================================================

/**
 * Base58-encode a prefixed payload with its checksum.
 *
 * @since 0.1.0
 * @category encoding
 */
export const encodePayload = (prefix: readonly [number, number], payload: Uint8Array): string => {
  const body = new Uint8Array(PREFIX_SIZE + payload.length)
  body.set(prefix, 0)
  body.set(payload, PREFIX_SIZE)
  const full = new Uint8Array(body.length + CHECKSUM_SIZE)
  full.set(body, 0)
  full.set(checksum(body), body.length)
  return base58.encode(full)
}

/**
 * Encode a hash160 as an address of the given kind on a network.
 *
 * @since 0.1.0
 * @category encoding
 */
export const encode = (network: NetworkParams, kind: AddressKind, hash160: Uint8Array): string =>
  encodePayload(network.addressPrefixes[kind], hash160)

// ============================================================================
// Decoding
// ============================================================================

/**
 * Decode an address for a network.
 *
 * Fails with `InvalidAddressError` for malformed input, bad checksums and addresses of other
 * networks; with `UnsupportedAddressTypeError` for pay-to-pubkey addresses and unknown prefixes.
 *
 * @since 0.1.0
 * @category decoding
 */
export const decode = (address: string, network: NetworkParams): Either.Either<DecodedAddress, AddressError> => {
  let raw: Uint8Array
  try {
    raw = base58.decode(address)
  } catch (cause) {
    return Either.left(new InvalidAddressError({ message: `Invalid address ${address}: not base58`, address, cause }))
  }

  if (raw.length <= PREFIX_SIZE + CHECKSUM_SIZE) {
    return Either.left(new InvalidAddressError({ message: `Invalid address ${address}: too short`, address }))
  }

  const body = raw.subarray(0, raw.length - CHECKSUM_SIZE)
  if (!bytesEqual(checksum(body), raw.subarray(raw.length - CHECKSUM_SIZE))) {
    return Either.left(new InvalidAddressError({ message: `Invalid address ${address}: checksum mismatch`, address }))
  }

  const kind = kindForPrefix(network, body[0], body[1])
  if (kind === undefined) {
    const foreign = Object.values(networks).find(
      (other) => other.name !== network.name && kindForPrefix(other, body[0], body[1]) !== undefined
    )
    if (foreign !== undefined) {
      return Either.left(
        new InvalidAddressError({
          message: `Invalid address ${address}: belongs to ${foreign.name}, not ${network.name}`,
          address
        })
      )
    }
    return Either.left(
      new UnsupportedAddressTypeError({ message: `Unsupported address type for ${address}: unknown prefix`, address })
    )
  }

  if (kind === "p2pk") {
    return Either.left(
      new UnsupportedAddressTypeError({
        message: `Unsupported address type for ${address}: pay-to-pubkey addresses have no script template`,
        address
      })
    )
  }

  const hash160 = body.subarray(PREFIX_SIZE)
  if (hash160.length !== HASH160_SIZE) {
    return Either.left(
      new InvalidAddressError({
        message: `Invalid address ${address}: expected ${HASH160_SIZE}-byte hash, got ${hash160.length}`,
        address
      })
    )
  }

  return Either.right({ address, kind, hash160: Uint8Array.from(hash160) })
}

/**
 * Whether the address decodes to a payable address on the network.
 *
 * @since 0.1.0
 * @category predicates
 */
export const isAddressValid = (address: string, network: NetworkParams): boolean =>
  Either.isRight(decode(address, network))

// ============================================================================
// Scripts
// ============================================================================

/**
 * Build the version-0 locking script paying to a decoded address.
 *
 * @since 0.1.0
 * @category scripts
 */
export const toPkScript = (decoded: DecodedAddress): Uint8Array => {
  const { hash160, kind } = decoded
  switch (kind) {
    case "p2pkh":
      return Uint8Array.from([OP_DUP, OP_HASH160, OP_DATA_20, ...hash160, OP_EQUALVERIFY, OP_CHECKSIG])
    case "p2pkh-ed25519":
      return Uint8Array.from([OP_DUP, OP_HASH160, OP_DATA_20, ...hash160, OP_EQUALVERIFY, OP_1, OP_CHECKSIGALT])
    case "p2pkh-schnorr":
      return Uint8Array.from([OP_DUP, OP_HASH160, OP_DATA_20, ...hash160, OP_EQUALVERIFY, OP_2, OP_CHECKSIGALT])
    case "p2sh":
      return Uint8Array.from([OP_HASH160, OP_DATA_20, ...hash160, OP_EQUAL])
  }
}
