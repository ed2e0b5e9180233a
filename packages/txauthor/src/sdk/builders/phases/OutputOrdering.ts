/**
 * Output Ordering Phase
 *
 * Places change outputs at random positions so their index does not reveal them.
 *
 * @module OutputOrdering
 * @since 0.1.0
 */

import { Effect, Random } from "effect"

import type { TxOutput } from "../../Transaction.js"
import type { ChangeOutput } from "./Phases.js"

/**
 * @since 0.1.0
 */
export interface OrderedOutputs {
  readonly outputs: ReadonlyArray<TxOutput>
  readonly changeIndices: ReadonlyArray<number>
}

/**
 * Output Ordering Phase
 *
 * Each change output is appended and then swapped with a uniformly chosen position among all
 * outputs placed so far (itself included). Payment outputs keep their relative order except
 * where a swap moves one to the end.
 *
 * Randomness comes from the `Random` service; seed it with `Random.make` for reproducible order.
 */
export const executeOutputOrdering = (
  outputs: ReadonlyArray<TxOutput>,
  changeOutputs: ReadonlyArray<ChangeOutput>
): Effect.Effect<OrderedOutputs> =>
  Effect.gen(function* () {
    const ordered: Array<TxOutput> = [...outputs]
    const isChange: Array<boolean> = outputs.map(() => false)

    for (const change of changeOutputs) {
      ordered.push(change.output)
      isChange.push(true)

      const last = ordered.length - 1
      const position = yield* Random.nextIntBetween(0, ordered.length)
      ;[ordered[position], ordered[last]] = [ordered[last], ordered[position]]
      ;[isChange[position], isChange[last]] = [isChange[last], isChange[position]]
    }

    const changeIndices = isChange.flatMap((flag, index) => (flag ? [index] : []))

    if (changeIndices.length > 0) {
      yield* Effect.logDebug(`[OutputOrdering] Change at positions ${changeIndices.join(", ")} of ${ordered.length}`)
    }

    return { outputs: ordered, changeIndices }
  })
