/**
 * Failures of a transaction authoring call.
 *
 * None of these leave partial state behind: a failed call produces no transaction.
 *
 * @module AuthoringError
 * @since 0.1.0
 */

import { Data } from "effect"

import type { AddressError } from "../Address.js"

export { InvalidAddressError, UnsupportedAddressTypeError } from "../Address.js"

/**
 * A payment or change amount outside `0 < amount <= maxAmount`.
 *
 * @since 0.1.0
 * @category errors
 */
export class InvalidAmountError extends Data.TaggedError("InvalidAmountError")<{
  readonly message: string
  readonly address: string
  readonly amount: bigint
}> {}

/**
 * @since 0.1.0
 * @category errors
 */
export class MultipleMaxAmountRecipientsError extends Data.TaggedError("MultipleMaxAmountRecipientsError")<{
  readonly message: string
  readonly addresses: readonly [string, string]
}> {}

/**
 * A send-max destination was combined with explicit change destinations.
 *
 * @since 0.1.0
 * @category errors
 */
export class ConflictingChangeSpecificationError extends Data.TaggedError("ConflictingChangeSpecificationError")<{
  readonly message: string
  readonly maxAmountAddress: string
}> {}

/**
 * The change address provider failed.
 *
 * @since 0.1.0
 * @category errors
 */
export class ChangeAddressGenerationError extends Data.TaggedError("ChangeAddressGenerationError")<{
  readonly message: string
  readonly account: number
  readonly cause?: unknown
}> {}

/**
 * Payments plus the required fee exceed the inputs.
 *
 * @since 0.1.0
 * @category errors
 */
export class InsufficientFundsError extends Data.TaggedError("InsufficientFundsError")<{
  readonly message: string
  readonly totalInput: bigint
  readonly totalSend: bigint
  readonly fee: bigint
  readonly shortfall: bigint
}> {}

/**
 * @since 0.1.0
 * @category errors
 */
export class ScriptTooLargeError extends Data.TaggedError("ScriptTooLargeError")<{
  readonly message: string
  readonly address: string
  readonly scriptSize: number
  readonly maxScriptElementSize: number
}> {}

/**
 * Explicit change amounts sum above what is left after payments and fee.
 *
 * @since 0.1.0
 * @category errors
 */
export class ChangeAllocationExceedsAvailableError extends Data.TaggedError("ChangeAllocationExceedsAvailableError")<{
  readonly message: string
  readonly allocated: bigint
  readonly available: bigint
}> {}

/**
 * @since 0.1.0
 * @category errors
 */
export type AuthoringError =
  | InvalidAmountError
  | AddressError
  | MultipleMaxAmountRecipientsError
  | ConflictingChangeSpecificationError
  | ChangeAddressGenerationError
  | InsufficientFundsError
  | ScriptTooLargeError
  | ChangeAllocationExceedsAvailableError
