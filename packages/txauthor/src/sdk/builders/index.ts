export * from "./AuthoringError.js"
export * from "./Destinations.js"
export * from "./FeePolicy.js"
export * from "./TransactionAuthor.js"
export * from "./TransactionBuilder.js"
export * from "./TxSizes.js"
