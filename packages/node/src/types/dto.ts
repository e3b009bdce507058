/**
 * Request/Response DTOs with Zod validation schemas.
 *
 * Each request DTO has a Zod schema and a derived TypeScript type.
 * Amounts travel as decimal integer strings and become bigint after
 * validation; responses turn them back into strings.
 */

import { z } from "zod";
import type { Address, CommittedNotification, NotificationType } from "@coinwrap/types";
import { isParticipant } from "@coinwrap/types";

// =============================================================================
// Shared Schemas
// =============================================================================

export const AmountSchema = z
  .string()
  .regex(/^\d{1,78}$/, "Must be a decimal integer string")
  .transform((v) => BigInt(v));

export const AddressSchema = z
  .string()
  .refine(isParticipant, { message: "Must be a non-zero 0x-prefixed 40 hex digit address" })
  .transform((v) => v.toLowerCase());

export const PaginationQuerySchema = z.object({
  cursor: z.string().optional(),
  limit: z.coerce.number().int().min(1).max(100).default(20),
});

// =============================================================================
// Wrapping DTOs
// =============================================================================

export const AmountBodySchema = z.object({
  amount: AmountSchema,
});

export type AmountBodyDto = z.infer<typeof AmountBodySchema>;

// =============================================================================
// Token DTOs
// =============================================================================

export const TransferSchema = z.object({
  to: AddressSchema,
  amount: AmountSchema,
  /** When set, spends the caller's allowance over `from` */
  from: AddressSchema.optional(),
});

export type TransferDto = z.infer<typeof TransferSchema>;

export const ApproveSchema = z.object({
  spender: AddressSchema,
  amount: AmountSchema,
});

export type ApproveDto = z.infer<typeof ApproveSchema>;

// =============================================================================
// Coin DTOs
// =============================================================================

export const CoinTransferSchema = z.object({
  to: AddressSchema,
  amount: AmountSchema,
});

export type CoinTransferDto = z.infer<typeof CoinTransferSchema>;

// =============================================================================
// Event DTOs
// =============================================================================

const NOTIFICATION_TYPES = [
  "custody.created",
  "wrap.completed",
  "unwrap.completed",
  "token.transfer",
  "token.approval",
] as const satisfies readonly NotificationType[];

export const ListEventsQuerySchema = PaginationQuerySchema.extend({
  type: z.enum(NOTIFICATION_TYPES).optional(),
  afterPosition: z.coerce.number().int().min(0).optional(),
});

export type ListEventsQuery = z.infer<typeof ListEventsQuerySchema>;

// =============================================================================
// Responses
// =============================================================================

export interface TokenInfoDto {
  readonly address: Address;
  readonly name: string;
  readonly symbol: string;
  readonly decimals: number;
  readonly totalSupply: string;
  readonly reserve: string;
  readonly underlyingAsset: Address;
}

export interface CustodyAccountDto {
  readonly user: Address;
  readonly account: Address;
  readonly exists: boolean;
  /** Underlying coins waiting in the account; "0" when it does not exist */
  readonly balance: string;
}

export interface BalancesDto {
  readonly holder: Address;
  readonly synthetic: string;
  readonly underlying: string;
}

export interface NotificationDto {
  readonly position: number;
  readonly type: NotificationType;
  readonly emitter: Address;
  readonly committedAt: string;
  readonly payload: Readonly<Record<string, string>>;
}

/**
 * Flatten a committed notification for JSON, with amounts as strings.
 */
export function toNotificationDto(notification: CommittedNotification): NotificationDto {
  const payload: Record<string, string> = {};
  for (const [key, value] of Object.entries(notification.payload)) {
    payload[key] = typeof value === "bigint" ? value.toString() : String(value);
  }
  return {
    position: notification.metadata.position,
    type: notification.type,
    emitter: notification.metadata.emitter,
    committedAt: notification.metadata.committedAt,
    payload,
  };
}
