/**
 * Notification Types
 *
 * Side-channel notifications emitted by the wrapper and its token ledger.
 * They are observational only: no operation ever reads them back.
 *
 * Rules:
 * - Notifications are immutable after creation
 * - A notification is delivered only once the operation that emitted it
 *   has committed; a rolled-back operation emits nothing
 * - Discriminated by `type`
 */

import type { Address, Amount } from "./identity.js";

/**
 * A custody account was provisioned for `user`.
 */
export interface CustodyAccountCreated {
  readonly type: "custody.created";
  readonly payload: {
    readonly user: Address;
    readonly account: Address;
  };
}

/**
 * `amount` custodied coins were collected and minted to `user`.
 */
export interface Wrapped {
  readonly type: "wrap.completed";
  readonly payload: {
    readonly amount: Amount;
    readonly user: Address;
  };
}

/**
 * `amount` synthetic units were burned and released to `user` as coins.
 */
export interface Unwrapped {
  readonly type: "unwrap.completed";
  readonly payload: {
    readonly amount: Amount;
    readonly user: Address;
  };
}

/**
 * Synthetic units moved. Mints come from, and burns go to, the zero address.
 */
export interface TokenTransfer {
  readonly type: "token.transfer";
  readonly payload: {
    readonly from: Address;
    readonly to: Address;
    readonly amount: Amount;
  };
}

/**
 * `owner` set the allowance of `spender` to `amount`.
 */
export interface TokenApproval {
  readonly type: "token.approval";
  readonly payload: {
    readonly owner: Address;
    readonly spender: Address;
    readonly amount: Amount;
  };
}

export type Notification =
  | CustodyAccountCreated
  | Wrapped
  | Unwrapped
  | TokenTransfer
  | TokenApproval;

export type NotificationType = Notification["type"];

/**
 * Metadata attached at commit time.
 */
export interface NotificationMetadata {
  /** Address of the component that emitted the notification */
  readonly emitter: Address;

  /** Position in the committed notification log (1-based, no gaps) */
  readonly position: number;

  /** ISO 8601 commit timestamp */
  readonly committedAt: string;
}

/**
 * A notification as delivered to subscribers.
 */
export type CommittedNotification = Notification & {
  readonly metadata: NotificationMetadata;
};
