export * as Address from "./sdk/Address.js"
export * as Amount from "./sdk/Amount.js"
export * from "./sdk/builders/index.js"
export * as Network from "./sdk/Network.js"
export * as Transaction from "./sdk/Transaction.js"
export type { EffectToPromise, EffectToPromiseAPI } from "./sdk/Type.js"
export * from "./sdk/wallet/ChangeSource.js"
export * from "./utils/effect-runtime.js"
export * from "./utils/FeeValidation.js"
