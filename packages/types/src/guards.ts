/**
 * Runtime Type Guards
 *
 * Narrowing functions for coinwrap domain types.
 * These enable safe runtime validation at system boundaries
 * (API inputs, deserialized snapshots, collaborator callbacks).
 */

import type { Address, Amount } from "./identity.js";
import { ZERO_ADDRESS } from "./identity.js";
import type { NotificationType } from "./notification.js";

// =============================================================================
// Identity guards
// =============================================================================

const ADDRESS_PATTERN = /^0x[0-9a-fA-F]{40}$/;

export function isAddress(value: unknown): value is Address {
  return typeof value === "string" && ADDRESS_PATTERN.test(value);
}

/**
 * An address that can act: well-formed and not the zero sentinel.
 */
export function isParticipant(value: unknown): value is Address {
  return isAddress(value) && value.toLowerCase() !== ZERO_ADDRESS;
}

// =============================================================================
// Amount guards
// =============================================================================

export function isAmount(value: unknown): value is Amount {
  return typeof value === "bigint" && value >= 0n;
}

export function isPositiveAmount(value: unknown): value is Amount {
  return typeof value === "bigint" && value > 0n;
}

// =============================================================================
// Notification guards
// =============================================================================

const NOTIFICATION_TYPES = new Set<string>([
  "custody.created",
  "wrap.completed",
  "unwrap.completed",
  "token.transfer",
  "token.approval",
]);

export function isNotificationType(value: unknown): value is NotificationType {
  return typeof value === "string" && NOTIFICATION_TYPES.has(value);
}
