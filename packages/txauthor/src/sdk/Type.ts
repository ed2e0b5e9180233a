import type * as Effect from "effect/Effect"

// Converts an Effect (or a function returning one) to its Promise counterpart
export type EffectToPromise<T> =
  T extends Effect.Effect<infer Return, infer _Error, infer _Context>
    ? Promise<Return>
    : T extends (...args: Array<never>) => Effect.Effect<infer Return, infer _Error, infer _Context>
      ? (...args: Parameters<T>) => Promise<Return>
      : T

/**
 * Utility to force TypeScript to expand and display computed types
 */
type Expand<T> = T extends (...args: infer A) => infer R
  ? (...args: A) => R
  : T extends object
  ? { [K in keyof T]: T[K] }
  : T

/**
 * Promise mirror of an Effect-based service interface.
 */
export type EffectToPromiseAPI<T> = Expand<{
  readonly [K in keyof T]: EffectToPromise<T[K]>
}>
