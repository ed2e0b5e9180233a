/**
 * Atom amounts: the indivisible integer unit every value in this package is expressed in.
 *
 * @module Amount
 * @since 0.1.0
 */

/**
 * Number of atoms in one coin.
 *
 * @since 0.1.0
 * @category constants
 */
export const ATOMS_PER_COIN = 100_000_000n

/**
 * Largest amount that may ever be spent: the total coin supply (21 million coins) in atoms.
 *
 * @since 0.1.0
 * @category constants
 */
export const MAX_AMOUNT = 21_000_000n * ATOMS_PER_COIN

/**
 * Check a payment amount against the spend ceiling: `0 < amount <= maxAmount`.
 *
 * @since 0.1.0
 * @category validation
 */
export const isValidSendAmount = (amount: bigint, maxAmount: bigint = MAX_AMOUNT): boolean =>
  amount > 0n && amount <= maxAmount

/**
 * Render an atom amount in coins with trailing zeros trimmed.
 *
 * @example
 * ```typescript
 * formatAtoms(1530n)        // "0.0000153 DCR"
 * formatAtoms(100000000n)   // "1 DCR"
 * formatAtoms(-250000000n)  // "-2.5 DCR"
 * ```
 *
 * @since 0.1.0
 * @category formatting
 */
export const formatAtoms = (amount: bigint): string => {
  const sign = amount < 0n ? "-" : ""
  const abs = amount < 0n ? -amount : amount
  const whole = abs / ATOMS_PER_COIN
  const fraction = (abs % ATOMS_PER_COIN).toString().padStart(8, "0").replace(/0+$/, "")
  return `${sign}${whole}${fraction.length > 0 ? `.${fraction}` : ""} DCR`
}

/**
 * Sum a list of atom amounts.
 *
 * @since 0.1.0
 * @category utilities
 */
export const sum = (amounts: Iterable<bigint>): bigint => {
  let total = 0n
  for (const amount of amounts) total += amount
  return total
}
