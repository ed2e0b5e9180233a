/**
 * Stateful transaction authoring session.
 *
 * @module TransactionBuilder
 * @since 0.1.0
 *
 * ## Execution Model
 *
 * - **Immutable configuration** at construction (network, change source, account, inputs)
 * - **Mutable destination lists** edited through the add/update/remove methods
 * - **Fresh authoring per call**: `estimateFeeAndSize()`, `estimateMaxSendAmount()` and `build()`
 *   each run a complete authoring pass over the current destinations
 *
 * Estimates never consult the change source. When change would go to a fresh address they use
 * a placeholder P2PKH address of the active network, so no address is consumed until `build()`.
 *
 * Each `build()` seeds change placement from the platform's secure random source unless the
 * configuration supplies a `Random` of its own.
 */

import { bytesToHex, randomBytes } from "@noble/hashes/utils"
import { Data, Effect, Layer, Logger, LogLevel, Random } from "effect"

import { runEffect } from "../../utils/effect-runtime.js"
import * as Address from "../Address.js"
import type { NetworkParams } from "../Network.js"
import { NetworkParamsTag } from "../Network.js"
import type { AuthoredTransaction, SelectedInput } from "../Transaction.js"
import type { EffectToPromiseAPI } from "../Type.js"
import type { ChangeSource } from "../wallet/ChangeSource.js"
import { ChangeSourceTag } from "../wallet/ChangeSource.js"
import type { AuthoringError } from "./AuthoringError.js"
import type { TransactionDestination } from "./Destinations.js"
import { authorTransaction } from "./TransactionAuthor.js"

// ============================================================================
// Error Types
// ============================================================================

/**
 * No destination exists at the given index.
 *
 * @since 0.1.0
 * @category errors
 */
export class DestinationIndexError extends Data.TaggedError("DestinationIndexError")<{
  readonly message: string
  readonly index: number
  readonly length: number
}> {}

/**
 * `estimateMaxSendAmount()` was called without a send-max destination.
 *
 * @since 0.1.0
 * @category errors
 */
export class NoMaxAmountRecipientError extends Data.TaggedError("NoMaxAmountRecipientError")<{
  readonly message: string
}> {}

// ============================================================================
// Configuration
// ============================================================================

/**
 * @since 0.1.0
 * @category model
 */
export interface TxAuthorConfig {
  readonly network: NetworkParams
  readonly changeSource: ChangeSource
  readonly account: number
  readonly inputs: ReadonlyArray<SelectedInput>
  /** Overrides the network's default relay fee rate, in atoms per kilobyte */
  readonly relayFeePerKb?: bigint
  /** Print authoring traces with the pretty logger at debug level (Promise API only) */
  readonly debug?: boolean
  /** Interrupts pending Promise API calls when aborted; a pending change source call sees the abort */
  readonly signal?: AbortSignal
  /** Fixed generator for change placement in `build()` */
  readonly random?: Random.Random
}

/**
 * @since 0.1.0
 * @category model
 */
export interface FeeAndSizeEstimate {
  readonly fee: bigint
  readonly estimatedSignedSize: number
  readonly change: {
    readonly amount: bigint
    /** Set when change goes to a caller-known address (send-max recipient or a single explicit change destination) */
    readonly address?: string
  }
}

// ============================================================================
// Transaction Author Interface - Hybrid Effect/Promise API
// ============================================================================

/**
 * @since 0.1.0
 * @category builder-interfaces
 */
export interface TxAuthorEffect {
  readonly addSendDestination: (destination: TransactionDestination) => Effect.Effect<void>
  readonly updateSendDestination: (
    index: number,
    destination: TransactionDestination
  ) => Effect.Effect<void, DestinationIndexError>
  readonly removeSendDestination: (index: number) => Effect.Effect<void, DestinationIndexError>
  readonly sendDestination: (index: number) => Effect.Effect<TransactionDestination, DestinationIndexError>
  readonly addChangeDestination: (destination: TransactionDestination) => Effect.Effect<void>
  readonly removeChangeDestination: (index: number) => Effect.Effect<void, DestinationIndexError>
  readonly estimateFeeAndSize: () => Effect.Effect<FeeAndSizeEstimate, AuthoringError>
  /** Atoms the send-max destination would receive */
  readonly estimateMaxSendAmount: () => Effect.Effect<bigint, AuthoringError | NoMaxAmountRecipientError>
  readonly build: () => Effect.Effect<AuthoredTransaction, AuthoringError>
}

/**
 * Promise API over {@link TxAuthorEffect}; the Effect API stays reachable as `.Effect`.
 *
 * @since 0.1.0
 * @category builder-interfaces
 */
export interface TxAuthor extends EffectToPromiseAPI<TxAuthorEffect> {
  readonly Effect: TxAuthorEffect
}

const checkIndex = (list: ReadonlyArray<TransactionDestination>, index: number, kind: "send" | "change") =>
  Number.isInteger(index) && index >= 0 && index < list.length
    ? Effect.void
    : Effect.fail(
        new DestinationIndexError({
          message: `No ${kind} destination at index ${index} (${list.length} destinations)`,
          index,
          length: list.length
        })
      )

/**
 * Construct a transaction authoring session over pre-selected inputs.
 *
 * @example
 * ```typescript
 * const author = makeTxAuthor({ network: mainnet, changeSource, account: 0, inputs })
 * await author.addSendDestination({ address: recipient, atomAmount: 50_000_000n })
 * const { fee } = await author.estimateFeeAndSize()
 * const authored = await author.build()
 * ```
 *
 * @since 0.1.0
 * @category constructors
 */
export const makeTxAuthor = (config: TxAuthorConfig): TxAuthor => {
  const sendDestinations: Array<TransactionDestination> = []
  const changeDestinations: Array<TransactionDestination> = []

  const placeholderChangeSource = Layer.sync(ChangeSourceTag, () => {
    const address = Address.encode(config.network, "p2pkh", new Uint8Array(20))
    return { nextChangeAddress: () => Effect.succeed(address) }
  })

  const author = (changeSource: Layer.Layer<ChangeSourceTag>) =>
    authorTransaction({
      inputs: config.inputs,
      sendDestinations: [...sendDestinations],
      changeDestinations: [...changeDestinations],
      account: config.account,
      relayFeePerKb: config.relayFeePerKb
    }).pipe(Effect.provide(Layer.merge(changeSource, Layer.succeed(NetworkParamsTag, config.network))))

  const changeOf = (authored: AuthoredTransaction): bigint =>
    authored.changeIndices.reduce((acc, index) => acc + authored.tx.outputs[index].value, 0n)

  const effect: TxAuthorEffect = {
    addSendDestination: (destination) => Effect.sync(() => void sendDestinations.push(destination)),

    updateSendDestination: (index, destination) =>
      Effect.zipRight(
        checkIndex(sendDestinations, index, "send"),
        Effect.sync(() => {
          sendDestinations[index] = destination
        })
      ),

    removeSendDestination: (index) =>
      Effect.zipRight(
        checkIndex(sendDestinations, index, "send"),
        Effect.sync(() => void sendDestinations.splice(index, 1))
      ),

    sendDestination: (index) =>
      Effect.zipRight(
        checkIndex(sendDestinations, index, "send"),
        Effect.sync(() => sendDestinations[index])
      ),

    addChangeDestination: (destination) => Effect.sync(() => void changeDestinations.push(destination)),

    removeChangeDestination: (index) =>
      Effect.zipRight(
        checkIndex(changeDestinations, index, "change"),
        Effect.sync(() => void changeDestinations.splice(index, 1))
      ),

    estimateFeeAndSize: () =>
      Effect.gen(function* () {
        const authored = yield* author(placeholderChangeSource)
        const maxAmountAddress = sendDestinations.find((d) => d.sendMax === true)?.address
        const address =
          maxAmountAddress ?? (changeDestinations.length === 1 ? changeDestinations[0].address : undefined)

        return {
          fee: authored.fee,
          estimatedSignedSize: authored.estimatedSignedSize,
          change: address === undefined ? { amount: changeOf(authored) } : { amount: changeOf(authored), address }
        }
      }),

    estimateMaxSendAmount: () =>
      Effect.gen(function* () {
        if (!sendDestinations.some((d) => d.sendMax === true)) {
          return yield* Effect.fail(
            new NoMaxAmountRecipientError({ message: "No send destination is set to receive the max amount" })
          )
        }
        const authored = yield* author(placeholderChangeSource)
        return changeOf(authored)
      }),

    build: () =>
      Effect.flatMap(
        Effect.sync(() => config.random ?? Random.make(bytesToHex(randomBytes(32)))),
        (random) => author(Layer.succeed(ChangeSourceTag, config.changeSource.Effect)).pipe(Effect.withRandom(random))
      )
  }

  const run = <A, E>(program: Effect.Effect<A, E>): Promise<A> =>
    runEffect(
      config.debug === true
        ? program.pipe(Effect.provide(Layer.merge(Logger.pretty, Logger.minimumLogLevel(LogLevel.Debug))))
        : program,
      { signal: config.signal }
    )

  return {
    Effect: effect,
    addSendDestination: (destination) => run(effect.addSendDestination(destination)),
    updateSendDestination: (index, destination) => run(effect.updateSendDestination(index, destination)),
    removeSendDestination: (index) => run(effect.removeSendDestination(index)),
    sendDestination: (index) => run(effect.sendDestination(index)),
    addChangeDestination: (destination) => run(effect.addChangeDestination(destination)),
    removeChangeDestination: (index) => run(effect.removeChangeDestination(index)),
    estimateFeeAndSize: () => run(effect.estimateFeeAndSize()),
    estimateMaxSendAmount: () => run(effect.estimateMaxSendAmount()),
    build: () => run(effect.build())
  }
}
