/**
 * @coinwrap/types — Shared domain types for the coinwrap stack.
 *
 * These types are used across all coinwrap packages:
 * - Identities and integer amounts
 * - Notifications emitted by the wrapper
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No methods that mutate state
 */

// Identity types
export type { Address, Amount } from "./identity.js";
export { ZERO_ADDRESS, canonicalAddress } from "./identity.js";

// Notification types
export type {
  Notification,
  NotificationType,
  NotificationMetadata,
  CommittedNotification,
  CustodyAccountCreated,
  Wrapped,
  Unwrapped,
  TokenTransfer,
  TokenApproval,
} from "./notification.js";

// Runtime type guards
export {
  isAddress,
  isParticipant,
  isAmount,
  isPositiveAmount,
  isNotificationType,
} from "./guards.js";
