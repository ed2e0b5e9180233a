import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"

import { MAX_AMOUNT } from "../src/sdk/Amount.js"
import { InvalidAddressError } from "../src/sdk/Address.js"
import { InvalidAmountError, MultipleMaxAmountRecipientsError } from "../src/sdk/builders/AuthoringError.js"
import { makeTxOutput, parseOutputs } from "../src/sdk/builders/Destinations.js"
import * as Network from "../src/sdk/Network.js"
import {
  outputValues,
  p2pkhScript,
  RECIPIENT_ADDRESS,
  SECOND_RECIPIENT_ADDRESS,
  testAddress
} from "./utils/input-helpers.js"

describe("Destinations", () => {
  describe("parseOutputs", () => {
    it.effect("should build one output per payment in order", () =>
      Effect.gen(function* () {
        const parsed = yield* parseOutputs(
          [
            { address: RECIPIENT_ADDRESS, atomAmount: 30_000_000n },
            { address: SECOND_RECIPIENT_ADDRESS, atomAmount: 20_000_000n }
          ],
          Network.mainnet
        )

        expect(outputValues(parsed.outputs)).toEqual([30_000_000n, 20_000_000n])
        expect(parsed.outputs[0].pkScript).toEqual(p2pkhScript(0x11))
        expect(parsed.outputs[1].pkScript).toEqual(p2pkhScript(0x12))
        expect(parsed.outputs[0].version).toBe(0)
        expect(parsed.totalSend).toBe(50_000_000n)
        expect(parsed.maxAmountAddress).toBeUndefined()
      })
    )

    it.effect("should hold back the send-max destination", () =>
      Effect.gen(function* () {
        const parsed = yield* parseOutputs(
          [
            { address: RECIPIENT_ADDRESS, atomAmount: 0n, sendMax: true },
            { address: SECOND_RECIPIENT_ADDRESS, atomAmount: 10_000n }
          ],
          Network.mainnet
        )

        expect(outputValues(parsed.outputs)).toEqual([10_000n])
        expect(parsed.totalSend).toBe(10_000n)
        expect(parsed.maxAmountAddress).toBe(RECIPIENT_ADDRESS)
      })
    )

    it.effect("should reject a second send-max destination", () =>
      Effect.gen(function* () {
        const error = yield* Effect.flip(
          parseOutputs(
            [
              { address: RECIPIENT_ADDRESS, atomAmount: 0n, sendMax: true },
              { address: SECOND_RECIPIENT_ADDRESS, atomAmount: 0n, sendMax: true }
            ],
            Network.mainnet
          )
        )

        expect(error).toBeInstanceOf(MultipleMaxAmountRecipientsError)
        expect(error).toMatchObject({
          message: "Cannot send max amount to multiple recipients",
          addresses: [RECIPIENT_ADDRESS, SECOND_RECIPIENT_ADDRESS]
        })
      })
    )

    it.effect("should reject a zero amount", () =>
      Effect.gen(function* () {
        const error = yield* Effect.flip(parseOutputs([{ address: RECIPIENT_ADDRESS, atomAmount: 0n }], Network.mainnet))

        expect(error).toBeInstanceOf(InvalidAmountError)
        expect(error).toMatchObject({ address: RECIPIENT_ADDRESS, amount: 0n })
      })
    )

    it.effect("should reject amounts above the spend ceiling", () =>
      Effect.gen(function* () {
        const error = yield* Effect.flip(
          parseOutputs([{ address: RECIPIENT_ADDRESS, atomAmount: MAX_AMOUNT + 1n }], Network.mainnet)
        )

        expect(error).toBeInstanceOf(InvalidAmountError)
      })
    )

    it.effect("should check the amount before the address", () =>
      Effect.gen(function* () {
        const error = yield* Effect.flip(parseOutputs([{ address: "bogus", atomAmount: -1n }], Network.mainnet))

        expect(error).toBeInstanceOf(InvalidAmountError)
      })
    )

    it.effect("should reject an address of another network", () =>
      Effect.gen(function* () {
        const testnetAddress = testAddress(0x11, "p2pkh", Network.testnet3)

        const error = yield* Effect.flip(parseOutputs([{ address: testnetAddress, atomAmount: 10_000n }], Network.mainnet))

        expect(error).toBeInstanceOf(InvalidAddressError)
      })
    )

    it.effect("should reject a payment below the dust threshold", () =>
      Effect.gen(function* () {
        const error = yield* Effect.flip(
          parseOutputs([{ address: RECIPIENT_ADDRESS, atomAmount: 6_029n }], Network.mainnet)
        )

        expect(error).toBeInstanceOf(InvalidAmountError)
        expect(error).toMatchObject({
          address: RECIPIENT_ADDRESS,
          amount: 6_029n,
          message: `Invalid amount 0.00006029 DCR for ${RECIPIENT_ADDRESS}: below the dust threshold of 0.0000603 DCR`
        })
      })
    )

    it.effect("should judge dust at the given fee rate", () =>
      Effect.gen(function* () {
        const parsed = yield* parseOutputs([{ address: RECIPIENT_ADDRESS, atomAmount: 121n }], Network.mainnet, 200n)

        expect(outputValues(parsed.outputs)).toEqual([121n])

        const error = yield* Effect.flip(
          parseOutputs([{ address: RECIPIENT_ADDRESS, atomAmount: 120n }], Network.mainnet, 200n)
        )
        expect(error).toMatchObject({ _tag: "InvalidAmountError", amount: 120n })
      })
    )

    it.effect("should validate the send-max address", () =>
      Effect.gen(function* () {
        const error = yield* Effect.flip(
          parseOutputs([{ address: "bogus", atomAmount: 0n, sendMax: true }], Network.mainnet)
        )

        expect(error).toBeInstanceOf(InvalidAddressError)
      })
    )
  })

  describe("makeTxOutput", () => {
    it.effect("should pay the amount to the address script", () =>
      Effect.gen(function* () {
        const output = yield* makeTxOutput(RECIPIENT_ADDRESS, 6_030n, Network.mainnet)

        expect(output).toEqual({ value: 6_030n, version: 0, pkScript: p2pkhScript(0x11) })
      })
    )

    it.effect("should report a bad address before dust", () =>
      Effect.gen(function* () {
        const error = yield* Effect.flip(makeTxOutput("bogus", 1n, Network.mainnet))

        expect(error).toBeInstanceOf(InvalidAddressError)
      })
    )
  })
})
