/**
 * Network parameters for transaction authoring.
 *
 * Address decoding rules, relay fee policy and script limits are supplied as configuration
 * rather than hardcoded per call. Presets cover the public networks; `layerFromConfig`
 * resolves one of them from the environment through Effect `Config`.
 *
 * @module Network
 * @since 0.1.0
 */

import { Config, Context, Effect, Layer, Option } from "effect"

import { MAX_AMOUNT } from "./Amount.js"

/**
 * Address encodings known to the network.
 *
 * - `p2pkh`: pay to secp256k1 public key hash
 * - `p2pkh-ed25519` / `p2pkh-schnorr`: pay to public key hash with an alternative signature suite
 * - `p2sh`: pay to script hash
 * - `p2pk`: pay to a bare public key (no hash form, not accepted as a destination)
 *
 * @since 0.1.0
 * @category model
 */
export type AddressKind = "p2pkh" | "p2pkh-ed25519" | "p2pkh-schnorr" | "p2sh" | "p2pk"

export const ADDRESS_KINDS: ReadonlyArray<AddressKind> = ["p2pkh", "p2pkh-ed25519", "p2pkh-schnorr", "p2sh", "p2pk"]

export type NetworkName = "mainnet" | "testnet3" | "simnet"

export interface NetworkParams {
  readonly name: NetworkName
  /** Two-byte base58 prefix per address kind */
  readonly addressPrefixes: Readonly<Record<AddressKind, readonly [number, number]>>
  /** Relay fee rate in atoms per kilobyte used when the caller sets none */
  readonly defaultRelayFeePerKb: bigint
  /** Upper bound for a single destination amount */
  readonly maxAmount: bigint
  /** Maximum number of bytes pushable to the script stack */
  readonly maxScriptElementSize: number
}

/**
 * 1e4 atoms/kB (0.0001 coin per kilobyte).
 *
 * @since 0.1.0
 * @category constants
 */
export const DEFAULT_RELAY_FEE_PER_KB = 10_000n

export const MAX_SCRIPT_ELEMENT_SIZE = 2048

export const mainnet: NetworkParams = {
  name: "mainnet",
  addressPrefixes: {
    p2pkh: [0x07, 0x3f],
    "p2pkh-ed25519": [0x07, 0x1f],
    "p2pkh-schnorr": [0x07, 0x01],
    p2sh: [0x07, 0x1a],
    p2pk: [0x13, 0x86]
  },
  defaultRelayFeePerKb: DEFAULT_RELAY_FEE_PER_KB,
  maxAmount: MAX_AMOUNT,
  maxScriptElementSize: MAX_SCRIPT_ELEMENT_SIZE
}

export const testnet3: NetworkParams = {
  name: "testnet3",
  addressPrefixes: {
    p2pkh: [0x0f, 0x21],
    "p2pkh-ed25519": [0x0f, 0x01],
    "p2pkh-schnorr": [0x0e, 0xe3],
    p2sh: [0x0e, 0xfc],
    p2pk: [0x28, 0xf7]
  },
  defaultRelayFeePerKb: DEFAULT_RELAY_FEE_PER_KB,
  maxAmount: MAX_AMOUNT,
  maxScriptElementSize: MAX_SCRIPT_ELEMENT_SIZE
}

export const simnet: NetworkParams = {
  name: "simnet",
  addressPrefixes: {
    p2pkh: [0x0e, 0x91],
    "p2pkh-ed25519": [0x0e, 0x71],
    "p2pkh-schnorr": [0x0e, 0x53],
    p2sh: [0x0e, 0x6c],
    p2pk: [0x27, 0x6f]
  },
  defaultRelayFeePerKb: DEFAULT_RELAY_FEE_PER_KB,
  maxAmount: MAX_AMOUNT,
  maxScriptElementSize: MAX_SCRIPT_ELEMENT_SIZE
}

export const networks: Readonly<Record<NetworkName, NetworkParams>> = { mainnet, testnet3, simnet }

/**
 * Find the address kind registered for a two-byte prefix, if any.
 *
 * @since 0.1.0
 * @category utilities
 */
export const kindForPrefix = (network: NetworkParams, b0: number, b1: number): AddressKind | undefined => {
  return ADDRESS_KINDS.find((kind) => {
    const [p0, p1] = network.addressPrefixes[kind]
    return p0 === b0 && p1 === b1
  })
}

/**
 * Active network parameters.
 *
 * @since 0.1.0
 * @category context
 */
export class NetworkParamsTag extends Context.Tag("NetworkParams")<NetworkParamsTag, NetworkParams>() {}

// ============================================================================
// Configuration
// ============================================================================

/**
 * Environment-backed network configuration.
 *
 * - `TXAUTHOR_NETWORK`: `mainnet` (default), `testnet3` or `simnet`
 * - `TXAUTHOR_RELAY_FEE_PER_KB`: relay fee override in atoms per kilobyte
 * - `TXAUTHOR_MAX_SCRIPT_ELEMENT_SIZE`: script push limit override
 *
 * @since 0.1.0
 * @category config
 */
export const NetworkConfig = Config.all({
  network: Config.literal("mainnet", "testnet3", "simnet")("TXAUTHOR_NETWORK").pipe(Config.withDefault("mainnet")),
  relayFeePerKb: Config.option(
    Config.integer("TXAUTHOR_RELAY_FEE_PER_KB").pipe(
      Config.validate({ message: "Relay fee must not be negative", validation: (n) => n >= 0 })
    )
  ),
  maxScriptElementSize: Config.option(
    Config.integer("TXAUTHOR_MAX_SCRIPT_ELEMENT_SIZE").pipe(
      Config.validate({ message: "Script element size must be positive", validation: (n) => n > 0 })
    )
  )
})

/**
 * Resolve network parameters from configuration, applying any overrides to the preset.
 *
 * @since 0.1.0
 * @category config
 */
export const fromConfig = Effect.gen(function* () {
  const config = yield* NetworkConfig
  const preset = networks[config.network]

  const params: NetworkParams = {
    ...preset,
    defaultRelayFeePerKb: Option.match(config.relayFeePerKb, {
      onNone: () => preset.defaultRelayFeePerKb,
      onSome: (rate) => BigInt(rate)
    }),
    maxScriptElementSize: Option.getOrElse(config.maxScriptElementSize, () => preset.maxScriptElementSize)
  }

  yield* Effect.logDebug(
    `[Network] Using ${params.name} (relay fee ${params.defaultRelayFeePerKb} atoms/kB, ` +
      `max script element ${params.maxScriptElementSize} bytes)`
  )

  return params
})

/**
 * Layer providing {@link NetworkParamsTag} from configuration.
 *
 * @since 0.1.0
 * @category layers
 */
export const layerFromConfig = Layer.effect(NetworkParamsTag, fromConfig)

/**
 * Layer providing fixed network parameters.
 *
 * @since 0.1.0
 * @category layers
 */
export const layer = (params: NetworkParams) => Layer.succeed(NetworkParamsTag, params)
