/**
 * @coinwrap/ledger — Journaled ledgers for the coinwrap stack.
 *
 * A pure TypeScript ledger layer with zero runtime dependencies:
 * - Journal: atomic scopes with rollback and deferred notifications
 * - CoinLedger: the underlying asset (balance + sendCoin primitive)
 * - TokenLedger: fungible token bookkeeping with protected mint/burn
 *
 * Design rules:
 * - All monetary arithmetic uses bigint (integer units)
 * - Every write goes through the journal
 * - Fail-closed: invalid operations throw, never silently succeed
 */

// State journal
export { Journal } from "./journal.js";
export { JournaledMap, JournaledCell } from "./journaled.js";

// Balances
export { BalanceBook } from "./balance-book.js";

// Collaborator ledgers
export { CoinLedger } from "./coin-ledger.js";
export type { UnderlyingAssetLedger, CoinLedgerConfig } from "./coin-ledger.js";
export { TokenLedger } from "./token-ledger.js";
export type { SyntheticTokenLedger, TokenLedgerConfig } from "./token-ledger.js";

// Amount arithmetic
export {
  parseAmount,
  formatAmount,
  sumAmounts,
  assertAmount,
  assertPositiveAmount,
  assertParticipant,
  normalizeParticipant,
} from "./amount-math.js";

// Types
export type {
  UndoAction,
  NotificationHandler,
  Subscription,
  ReceiveHook,
  LedgerErrorCode,
  BalanceRecord,
  AllowanceRecord,
  CoinLedgerSnapshot,
  TokenSnapshot,
} from "./types.js";

export { LedgerError } from "./types.js";
