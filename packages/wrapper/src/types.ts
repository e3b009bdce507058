/**
 * @coinwrap/wrapper — Types for custody and wrapping.
 *
 * Rules:
 * - All types are readonly
 * - Amounts in snapshots are decimal integer strings
 * - Errors are thrown, never returned
 */

import type { Address } from "@coinwrap/types";
import type {
  Journal,
  TokenSnapshot,
  UnderlyingAssetLedger,
} from "@coinwrap/ledger";

// ─── Configuration ───────────────────────────────────────────────────────

/**
 * Collaborators a wrapper is bound to for its whole lifetime.
 */
export interface WrapperDependencies {
  /** The single underlying asset this wrapper custodies */
  readonly asset: UnderlyingAssetLedger;

  /** Journal shared with the asset ledger */
  readonly journal: Journal;
}

export interface WrapperConfig extends WrapperDependencies {
  readonly address: Address;
  readonly name: string;
  readonly symbol: string;
}

// ─── Snapshot ────────────────────────────────────────────────────────────

export interface CustodyRecord {
  readonly user: Address;
  readonly account: Address;
}

/**
 * Serializable wrapper state: token bookkeeping plus the custody registry.
 */
export interface WrapperSnapshot {
  readonly version: 1;
  readonly underlyingAsset: Address;
  readonly token: TokenSnapshot;
  readonly custodyAccounts: readonly CustodyRecord[];
  /** Next custody account derivation nonce */
  readonly nonce: number;
  readonly createdAt: string;
}

// ─── Audit ───────────────────────────────────────────────────────────────

export interface ConservationReport {
  readonly totalSupply: bigint;
  readonly sumOfBalances: bigint;
  /** Underlying coins held by the wrapper */
  readonly reserve: bigint;
  /** reserve - totalSupply; negative when supply is unbacked */
  readonly surplus: bigint;
  /** sumOfBalances == totalSupply == reserve */
  readonly balanced: boolean;
  /** totalSupply <= reserve */
  readonly backed: boolean;
}

// ─── Errors ──────────────────────────────────────────────────────────────

export type WrapperErrorCode =
  | "INVALID_AMOUNT"
  | "ALREADY_EXISTS"
  | "NO_CUSTODY_ACCOUNT"
  | "INSUFFICIENT_CUSTODY_FUNDS"
  | "INSUFFICIENT_SYNTHETIC_BALANCE"
  | "INSUFFICIENT_WRAPPER_RESERVE"
  | "UNAUTHORIZED"
  | "INVALID_SNAPSHOT";

/**
 * Structured error from the wrapper.
 *
 * `fatal` marks a broken conservation invariant. Every other code is an
 * ordinary rejection of the caller's request.
 */
export class WrapperError extends Error {
  public readonly code: WrapperErrorCode;
  public readonly fatal: boolean;

  constructor(code: WrapperErrorCode, message: string) {
    super(message);
    this.name = "WrapperError";
    this.code = code;
    this.fatal = code === "INSUFFICIENT_WRAPPER_RESERVE";
  }
}
