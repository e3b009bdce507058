/**
 * @coinwrap/ledger — Integer amount arithmetic and validation.
 *
 * Both ledgers count indivisible units, so amounts are plain bigints.
 * String forms appear only at serialization boundaries.
 *
 * Rules:
 * - No floating-point operations
 * - No fractional units
 * - Zero runtime dependencies
 */

import type { Address } from "@coinwrap/types";
import {
  canonicalAddress,
  isAddress,
  isAmount,
  isParticipant,
  isPositiveAmount,
} from "@coinwrap/types";
import { LedgerError } from "./types.js";

const INTEGER_PATTERN = /^\d+$/;

/**
 * Parse a decimal integer string into units.
 *
 * "100" → 100n
 * "007" → 7n
 * "1.5", "-3", "" → INVALID_AMOUNT
 */
export function parseAmount(value: string): bigint {
  const trimmed = value.trim();
  if (!INTEGER_PATTERN.test(trimmed)) {
    throw new LedgerError("INVALID_AMOUNT", `Invalid amount format: "${value}"`);
  }
  return BigInt(trimmed);
}

/**
 * Convert units back to their decimal integer string.
 */
export function formatAmount(value: bigint): string {
  return value.toString();
}

/**
 * Sum a sequence of amounts.
 */
export function sumAmounts(values: Iterable<bigint>): bigint {
  let total = 0n;
  for (const value of values) {
    total += value;
  }
  return total;
}

// ─── Assertions ──────────────────────────────────────────────────────────

export function assertAmount(value: unknown, label = "amount"): asserts value is bigint {
  if (!isAmount(value)) {
    throw new LedgerError(
      "INVALID_AMOUNT",
      `${label} must be a non-negative integer amount, got ${String(value)}`,
    );
  }
}

export function assertPositiveAmount(value: unknown, label = "amount"): asserts value is bigint {
  if (!isPositiveAmount(value)) {
    throw new LedgerError(
      "INVALID_AMOUNT",
      `${label} must be greater than zero, got ${String(value)}`,
    );
  }
}

/**
 * Assert a well-formed address that is not the zero sentinel.
 */
export function assertParticipant(value: unknown, label = "address"): asserts value is Address {
  if (!isParticipant(value)) {
    throw new LedgerError(
      "INVALID_ADDRESS",
      isAddress(value)
        ? `${label} must not be the zero address`
        : `${label} is not a valid address: "${String(value)}"`,
    );
  }
}

/**
 * Assert a participant and return its canonical (lowercase) form.
 */
export function normalizeParticipant(value: unknown, label = "address"): Address {
  assertParticipant(value, label);
  return canonicalAddress(value);
}
