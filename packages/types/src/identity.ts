/**
 * Identity and Amount Types
 *
 * Every participant in a deployment (users, the wrapper, custody
 * accounts, the coin issuer) is addressed the same way.
 *
 * Rules:
 * - Addresses are "0x" + 40 hex digits
 * - Amounts are integer units held in bigint (no decimals, no floats)
 * - The zero address means "nobody" and never holds anything
 */

/**
 * A participant identity (e.g., "0x5aae...1c4f").
 */
export type Address = string;

/**
 * A count of indivisible units.
 * Both the underlying coin and the synthetic token are 0-decimal.
 */
export type Amount = bigint;

/**
 * Sentinel for "no account".
 *
 * Returned by custody lookups for users without an account, and used as
 * the counterparty of mint and burn transfer notifications.
 */
export const ZERO_ADDRESS: Address = "0x0000000000000000000000000000000000000000";

/**
 * Canonical form of an address. Hex digits are case-insensitive, so every
 * ledger keys and reports addresses in lowercase.
 */
export function canonicalAddress(address: Address): Address {
  return address.toLowerCase();
}
