import { describe, expect, it } from "@effect/vitest"
import { Either } from "effect"

import * as Address from "../src/sdk/Address.js"
import * as Network from "../src/sdk/Network.js"
import { p2pkhScript, testAddress, testHash } from "./utils/input-helpers.js"

const expectLeft = (result: Either.Either<Address.DecodedAddress, Address.AddressError>) => {
  if (Either.isRight(result)) {
    throw new Error(`expected decoding to fail, got ${result.right.address}`)
  }
  return result.left
}

const expectRight = (result: Either.Either<Address.DecodedAddress, Address.AddressError>) => {
  if (Either.isLeft(result)) {
    throw new Error(`expected decoding to succeed: ${result.left.message}`)
  }
  return result.right
}

describe("Address", () => {
  describe("encode / decode", () => {
    it("should produce the familiar network leaders for P2PKH", () => {
      expect(testAddress(0x01).startsWith("Ds")).toBe(true)
      expect(testAddress(0x01, "p2pkh", Network.testnet3).startsWith("Ts")).toBe(true)
      expect(testAddress(0x01, "p2pkh", Network.simnet).startsWith("Ss")).toBe(true)
    })

    it("should decode every hash-based kind back to its hash", () => {
      for (const kind of ["p2pkh", "p2pkh-ed25519", "p2pkh-schnorr", "p2sh"] as const) {
        const decoded = expectRight(Address.decode(testAddress(0x42, kind), Network.mainnet))

        expect(decoded.kind).toBe(kind)
        expect(decoded.hash160).toEqual(testHash(0x42))
      }
    })
  })

  describe("decode failures", () => {
    it("should reject a corrupted checksum", () => {
      const valid = testAddress(0x05)
      const last = valid.slice(-1)
      const corrupted = valid.slice(0, -1) + (last === "2" ? "3" : "2")

      const error = expectLeft(Address.decode(corrupted, Network.mainnet))

      expect(error).toBeInstanceOf(Address.InvalidAddressError)
      expect(error.message).toBe(`Invalid address ${corrupted}: checksum mismatch`)
    })

    it("should reject characters outside the base58 alphabet", () => {
      const error = expectLeft(Address.decode("Ds0OIl", Network.mainnet))

      expect(error).toBeInstanceOf(Address.InvalidAddressError)
      expect(error.message).toBe("Invalid address Ds0OIl: not base58")
    })

    it("should reject input too short to carry a checksum", () => {
      const error = expectLeft(Address.decode("Dsabc", Network.mainnet))

      expect(error.message).toBe("Invalid address Dsabc: too short")
    })

    it("should reject an address of another network", () => {
      const testnetAddress = testAddress(0x05, "p2pkh", Network.testnet3)

      const error = expectLeft(Address.decode(testnetAddress, Network.mainnet))

      expect(error).toBeInstanceOf(Address.InvalidAddressError)
      expect(error.message).toBe(`Invalid address ${testnetAddress}: belongs to testnet3, not mainnet`)
    })

    it("should reject pay-to-pubkey addresses as unsupported", () => {
      const p2pk = Address.encode(Network.mainnet, "p2pk", new Uint8Array(33).fill(0x02))

      const error = expectLeft(Address.decode(p2pk, Network.mainnet))

      expect(error).toBeInstanceOf(Address.UnsupportedAddressTypeError)
    })

    it("should reject an unknown prefix as unsupported", () => {
      const unknown = Address.encodePayload([0x00, 0x01], testHash(0x05))

      const error = expectLeft(Address.decode(unknown, Network.mainnet))

      expect(error).toBeInstanceOf(Address.UnsupportedAddressTypeError)
      expect(error.message).toBe(`Unsupported address type for ${unknown}: unknown prefix`)
    })

    it("should reject a hash of the wrong length", () => {
      const long = Address.encodePayload(Network.mainnet.addressPrefixes.p2pkh, new Uint8Array(21))

      const error = expectLeft(Address.decode(long, Network.mainnet))

      expect(error).toBeInstanceOf(Address.InvalidAddressError)
      expect(error.message).toBe(`Invalid address ${long}: expected 20-byte hash, got 21`)
    })
  })

  describe("isAddressValid", () => {
    it("should accept addresses of the network only", () => {
      expect(Address.isAddressValid(testAddress(0x07), Network.mainnet)).toBe(true)
      expect(Address.isAddressValid(testAddress(0x07), Network.testnet3)).toBe(false)
      expect(Address.isAddressValid("not an address", Network.mainnet)).toBe(false)
    })
  })

  describe("toPkScript", () => {
    const scriptOf = (kind: "p2pkh" | "p2pkh-ed25519" | "p2pkh-schnorr" | "p2sh") =>
      Address.toPkScript(expectRight(Address.decode(testAddress(0x33, kind), Network.mainnet)))

    it("should build a secp256k1 P2PKH script", () => {
      expect(scriptOf("p2pkh")).toEqual(p2pkhScript(0x33))
    })

    it("should build alternative signature suite P2PKH scripts", () => {
      const body = [0x76, 0xa9, 0x14, ...testHash(0x33), 0x88]
      expect(scriptOf("p2pkh-ed25519")).toEqual(Uint8Array.from([...body, 0x51, 0xbe]))
      expect(scriptOf("p2pkh-schnorr")).toEqual(Uint8Array.from([...body, 0x52, 0xbe]))
    })

    it("should build a P2SH script", () => {
      expect(scriptOf("p2sh")).toEqual(Uint8Array.from([0xa9, 0x14, ...testHash(0x33), 0x87]))
    })
  })
})
