/**
 * Core type definitions shared by the authoring phases.
 *
 * Each phase lives in its own file and is a function of the values produced by the phases
 * before it; nothing is shared between phases through mutable state.
 *
 * @module Phases
 * @since 0.1.0
 */

import { Effect } from "effect"

import type { NetworkParams } from "../../Network.js"
import type { TxOutput } from "../../Transaction.js"

/**
 * Authoring phases, in execution order.
 *
 * @since 0.1.0
 */
export type Phase = "destinations" | "changeResolution" | "feeCalculation" | "changeCreation" | "ordering"

/**
 * Values fixed for the whole authoring call.
 *
 * @since 0.1.0
 */
export interface AuthoringContext {
  readonly network: NetworkParams
  readonly feeRatePerKb: bigint
  readonly inputSigScriptSizes: ReadonlyArray<number>
  readonly totalInput: bigint
}

/**
 * A change output together with the address it pays to.
 *
 * @since 0.1.0
 */
export interface ChangeOutput {
  readonly address: string
  readonly output: TxOutput
}

/**
 * Where left-over value goes.
 *
 * - `Single`: all of it to one address, either the send-max recipient or a fresh change address
 * - `Explicit`: caller-chosen amounts to caller-chosen addresses, anything unallocated goes to the fee
 *
 * `scriptSize` is the summed locking script size of every change output.
 *
 * @since 0.1.0
 */
export type ChangeMode =
  | {
      readonly _tag: "Single"
      readonly source: "sendMax" | "generated"
      readonly address: string
      readonly pkScript: Uint8Array
      readonly scriptSize: number
    }
  | {
      readonly _tag: "Explicit"
      readonly destinations: ReadonlyArray<ChangeOutput>
      readonly scriptSize: number
    }

/**
 * Tag every log line emitted by `effect` with the phase name.
 *
 * @since 0.1.0
 */
export const withPhase =
  (phase: Phase) =>
  <A, E, R>(effect: Effect.Effect<A, E, R>): Effect.Effect<A, E, R> =>
    Effect.annotateLogs(effect, "phase", phase)
