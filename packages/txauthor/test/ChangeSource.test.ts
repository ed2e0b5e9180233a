import { describe, expect, it } from "@effect/vitest"
import { Deferred, Effect, Exit, Fiber } from "effect"

import { AddressGenerationError, fromAddresses, makeChangeSource } from "../src/sdk/wallet/ChangeSource.js"
import { CHANGE_ADDRESS, SECOND_CHANGE_ADDRESS } from "./utils/input-helpers.js"

describe("ChangeSource", () => {
  it("should expose a Promise API over the provider function", async () => {
    const source = makeChangeSource(async (account) => `${CHANGE_ADDRESS}:${account}`)

    await expect(source.nextChangeAddress(4)).resolves.toBe(`${CHANGE_ADDRESS}:4`)
  })

  it("should reject with AddressGenerationError when the provider throws", async () => {
    const source = makeChangeSource(async () => {
      throw new Error("wallet locked")
    })

    await expect(source.nextChangeAddress(0)).rejects.toMatchObject({
      _tag: "AddressGenerationError",
      message: "wallet locked"
    })
  })

  it.effect("should keep the provider error as the cause", () =>
    Effect.gen(function* () {
      const failure = new Error("wallet locked")
      const source = makeChangeSource(() => Promise.reject(failure))

      const error = yield* Effect.flip(source.Effect.nextChangeAddress(0))

      expect(error).toBeInstanceOf(AddressGenerationError)
      expect(error.cause).toBe(failure)
    })
  )

  it.effect("should abort the provider signal on interruption", () =>
    Effect.gen(function* () {
      let received: AbortSignal | undefined
      const started = yield* Deferred.make<void>()
      const source = makeChangeSource(
        (_account, signal) =>
          new Promise<string>(() => {
            received = signal
            Deferred.unsafeDone(started, Exit.void)
          })
      )

      const fiber = yield* Effect.fork(source.Effect.nextChangeAddress(0))
      yield* Deferred.await(started)
      yield* Fiber.interrupt(fiber)

      expect(received?.aborted).toBe(true)
    })
  )

  describe("fromAddresses", () => {
    it("should hand out addresses in order until exhausted", async () => {
      const source = fromAddresses([CHANGE_ADDRESS, SECOND_CHANGE_ADDRESS])

      await expect(source.nextChangeAddress(0)).resolves.toBe(CHANGE_ADDRESS)
      await expect(source.nextChangeAddress(0)).resolves.toBe(SECOND_CHANGE_ADDRESS)
      await expect(source.nextChangeAddress(0)).rejects.toMatchObject({
        message: "Change address pool exhausted after 2 addresses"
      })
    })
  })
})
