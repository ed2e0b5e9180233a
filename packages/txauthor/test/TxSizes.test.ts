import { describe, expect, it } from "@effect/vitest"
import { Either } from "effect"

import * as Network from "../src/sdk/Network.js"
import type { TxOutput } from "../src/sdk/Transaction.js"
import {
  changeScriptSize,
  estimateInputSize,
  estimateOutputSize,
  estimateSerializeSize,
  P2PKH_PK_SCRIPT_SIZE,
  REDEEM_P2PKH_SIG_SCRIPT_SIZE,
  varIntSerializeSize
} from "../src/sdk/builders/TxSizes.js"
import { p2pkhScript, testAddress } from "./utils/input-helpers.js"

const p2pkhOutput = (value: bigint): TxOutput => ({ value, version: 0, pkScript: p2pkhScript(0x11) })

describe("TxSizes", () => {
  it("varIntSerializeSize should switch width at the encoding boundaries", () => {
    expect(varIntSerializeSize(0)).toBe(1)
    expect(varIntSerializeSize(0xfc)).toBe(1)
    expect(varIntSerializeSize(0xfd)).toBe(3)
    expect(varIntSerializeSize(0xffff)).toBe(3)
    expect(varIntSerializeSize(0x10000)).toBe(5)
    expect(varIntSerializeSize(0xffffffff)).toBe(5)
    expect(varIntSerializeSize(0x100000000)).toBe(9)
  })

  it("should size a P2PKH redeeming input at 166 bytes", () => {
    expect(REDEEM_P2PKH_SIG_SCRIPT_SIZE).toBe(108)
    expect(estimateInputSize(REDEEM_P2PKH_SIG_SCRIPT_SIZE)).toBe(166)
  })

  it("should size a P2PKH output at 36 bytes", () => {
    expect(estimateOutputSize(P2PKH_PK_SCRIPT_SIZE)).toBe(36)
  })

  describe("estimateSerializeSize", () => {
    it("should count one input, one payment and a change slot", () => {
      // 12 + 2*1 + 1 + 166 + 36 + 36
      expect(estimateSerializeSize([108], [p2pkhOutput(1n)], 25)).toBe(253)
    })

    it("should omit the change slot when no change script size is given", () => {
      expect(estimateSerializeSize([108], [p2pkhOutput(1n)])).toBe(217)
      expect(estimateSerializeSize([108], [p2pkhOutput(1n)], 0)).toBe(217)
    })

    it("should count a change slot on its own", () => {
      expect(estimateSerializeSize([108], [], 25)).toBe(217)
    })

    it("should grow the input count varint past 252 inputs", () => {
      const inputs = Array.from({ length: 253 }, () => 108)

      // 12 + 2*3 + 1 + 253*166 + 36
      expect(estimateSerializeSize(inputs, [p2pkhOutput(1n)])).toBe(12 + 6 + 1 + 253 * 166 + 36)
    })
  })

  describe("changeScriptSize", () => {
    it("should follow the address kind", () => {
      const sizeOf = (address: string) => Either.getOrThrow(changeScriptSize(address, Network.mainnet))

      expect(sizeOf(testAddress(0x01))).toBe(25)
      expect(sizeOf(testAddress(0x01, "p2pkh-ed25519"))).toBe(26)
      expect(sizeOf(testAddress(0x01, "p2pkh-schnorr"))).toBe(26)
      expect(sizeOf(testAddress(0x01, "p2sh"))).toBe(23)
    })

    it("should fail for addresses without a script template", () => {
      const result = changeScriptSize(testAddress(0x01, "p2pk"), Network.mainnet)
      if (Either.isRight(result)) {
        throw new Error("expected a failure")
      }

      expect(result.left._tag).toBe("UnsupportedAddressTypeError")
    })
  })
})
