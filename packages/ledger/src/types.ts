/**
 * @coinwrap/ledger — Internal types for the ledger engine.
 *
 * Rules:
 * - All types are readonly
 * - Amounts in snapshots are decimal integer strings
 * - Fail-closed: invalid operations throw, never silently succeed
 */

import type { Address, CommittedNotification } from "@coinwrap/types";

// ─── Journal Types ───────────────────────────────────────────────────────

/** Restores one piece of state to its value before a write. */
export type UndoAction = () => void;

/** Callback for committed notifications. */
export type NotificationHandler = (notification: CommittedNotification) => void;

/**
 * A subscription that can be unsubscribed.
 */
export interface Subscription {
  unsubscribe(): void;
}

// ─── Collaborator Types ──────────────────────────────────────────────────

/**
 * Called after coins are credited to the hook owner's address, before
 * the sending call returns. The hook may call back into any component.
 */
export type ReceiveHook = (from: Address, amount: bigint) => void;

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for ledger operations. */
export type LedgerErrorCode =
  | "INVALID_AMOUNT"
  | "INVALID_ADDRESS"
  | "INSUFFICIENT_BALANCE"
  | "INSUFFICIENT_ALLOWANCE"
  | "UNAUTHORIZED"
  | "INVALID_SNAPSHOT";

/**
 * Structured error from the ledger engine.
 * Always thrown; operations never return error codes.
 */
export class LedgerError extends Error {
  public readonly code: LedgerErrorCode;

  constructor(code: LedgerErrorCode, message: string) {
    super(message);
    this.name = "LedgerError";
    this.code = code;
  }
}

// ─── Snapshot Types ──────────────────────────────────────────────────────

/** A holder and its balance as a decimal integer string. */
export interface BalanceRecord {
  readonly holder: Address;
  readonly amount: string;
}

export interface AllowanceRecord {
  readonly owner: Address;
  readonly spender: Address;
  readonly amount: string;
}

/**
 * Serializable snapshot of a CoinLedger.
 * Receive hooks are code and are not captured.
 */
export interface CoinLedgerSnapshot {
  readonly version: 1;
  readonly address: Address;
  readonly issuer: Address;
  readonly balances: readonly BalanceRecord[];
  readonly totalIssued: string;
  readonly createdAt: string;
}

/**
 * Serializable snapshot of a TokenLedger's bookkeeping.
 */
export interface TokenSnapshot {
  readonly version: 1;
  readonly address: Address;
  readonly name: string;
  readonly symbol: string;
  readonly decimals: number;
  readonly totalSupply: string;
  readonly balances: readonly BalanceRecord[];
  readonly allowances: readonly AllowanceRecord[];
}
