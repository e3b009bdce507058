/**
 * @coinwrap/ledger — Fungible token bookkeeping.
 *
 * Standard balances / supply / transfer / approve semantics. Minting and
 * burning are protected: only a subclass (the wrapper) can change supply.
 *
 * Rules:
 * - totalSupply always equals the sum of all balances
 * - Transfers to the zero address are rejected; burns are the only way
 *   to destroy units
 * - Every state change emits a notification through the journal
 * - Addresses are stored and reported in canonical (lowercase) form
 */

import type { Address } from "@coinwrap/types";
import { ZERO_ADDRESS, canonicalAddress } from "@coinwrap/types";
import type { Journal } from "./journal.js";
import { BalanceBook } from "./balance-book.js";
import { JournaledCell, JournaledMap } from "./journaled.js";
import {
  assertAmount,
  assertPositiveAmount,
  normalizeParticipant,
  parseAmount,
} from "./amount-math.js";
import type {
  AllowanceRecord,
  NotificationHandler,
  Subscription,
  TokenSnapshot,
} from "./types.js";
import { LedgerError } from "./types.js";

/**
 * The token surface holders interact with.
 */
export interface SyntheticTokenLedger {
  readonly address: Address;
  name(): string;
  symbol(): string;
  decimals(): number;
  totalSupply(): bigint;
  balanceOf(holder: Address): bigint;
  transfer(caller: Address, to: Address, amount: bigint): void;
  approve(caller: Address, spender: Address, amount: bigint): void;
  allowance(owner: Address, spender: Address): bigint;
  transferFrom(caller: Address, from: Address, to: Address, amount: bigint): void;
}

export interface TokenLedgerConfig {
  readonly address: Address;
  readonly name: string;
  readonly symbol: string;
  readonly decimals: number;
  readonly journal: Journal;
}

interface AllowanceEntry {
  readonly owner: Address;
  readonly spender: Address;
  readonly amount: bigint;
}

function allowanceKey(owner: Address, spender: Address): string {
  return `${canonicalAddress(owner)}:${canonicalAddress(spender)}`;
}

export class TokenLedger implements SyntheticTokenLedger {
  readonly address: Address;

  protected readonly journal: Journal;
  private readonly _name: string;
  private readonly _symbol: string;
  private readonly _decimals: number;
  private readonly _balances: BalanceBook;
  private readonly _allowances: JournaledMap<string, AllowanceEntry>;
  private readonly _supply: JournaledCell<bigint>;

  constructor(config: TokenLedgerConfig) {
    const address = normalizeParticipant(config.address, "token address");
    if (!Number.isInteger(config.decimals) || config.decimals < 0) {
      throw new LedgerError(
        "INVALID_AMOUNT",
        `decimals must be a non-negative integer, got ${String(config.decimals)}`,
      );
    }
    this.address = address;
    this.journal = config.journal;
    this._name = config.name;
    this._symbol = config.symbol;
    this._decimals = config.decimals;
    this._balances = new BalanceBook(config.journal);
    this._allowances = new JournaledMap(config.journal);
    this._supply = new JournaledCell(config.journal, 0n);
  }

  // ─── Metadata ────────────────────────────────────────────────────────

  name(): string {
    return this._name;
  }

  symbol(): string {
    return this._symbol;
  }

  decimals(): number {
    return this._decimals;
  }

  // ─── Queries ─────────────────────────────────────────────────────────

  totalSupply(): bigint {
    return this._supply.value;
  }

  balanceOf(holder: Address): bigint {
    return this._balances.balanceOf(holder);
  }

  /**
   * Addresses holding a non-zero balance.
   */
  holders(): readonly Address[] {
    return this._balances.holders();
  }

  allowance(owner: Address, spender: Address): bigint {
    return this._allowances.get(allowanceKey(owner, spender))?.amount ?? 0n;
  }

  // ─── Holder Operations ───────────────────────────────────────────────

  transfer(caller: Address, to: Address, amount: bigint): void {
    this.journal.atomic(() => {
      this._move(caller, to, amount);
    });
  }

  approve(caller: Address, spender: Address, amount: bigint): void {
    this.journal.atomic(() => {
      const owner = normalizeParticipant(caller, "owner");
      const approved = normalizeParticipant(spender, "spender");
      assertAmount(amount);
      this._setAllowance(owner, approved, amount);
    });
  }

  /**
   * Move units from `from` to `to`, spending `caller`'s allowance.
   * Throws INSUFFICIENT_ALLOWANCE before touching any balance.
   */
  transferFrom(caller: Address, from: Address, to: Address, amount: bigint): void {
    this.journal.atomic(() => {
      assertAmount(amount);
      const allowed = this.allowance(from, caller);
      if (allowed < amount) {
        throw new LedgerError(
          "INSUFFICIENT_ALLOWANCE",
          `Allowance of ${caller} over ${from} is ${allowed.toString()}, cannot spend ${amount.toString()}`,
        );
      }
      this._writeAllowance(from, caller, allowed - amount);
      this._move(from, to, amount);
    });
  }

  /**
   * Receive committed notifications emitted by this token.
   */
  subscribe(handler: NotificationHandler): Subscription {
    return this.journal.subscribe((notification) => {
      if (notification.metadata.emitter === this.address) {
        handler(notification);
      }
    });
  }

  // ─── Supply (subclass only) ──────────────────────────────────────────

  protected mint(to: Address, amount: bigint): void {
    const recipient = normalizeParticipant(to, "recipient");
    assertPositiveAmount(amount);
    this._balances.credit(recipient, amount);
    this._supply.set(this._supply.value + amount);
    this.journal.emit(this.address, {
      type: "token.transfer",
      payload: { from: ZERO_ADDRESS, to: recipient, amount },
    });
  }

  protected burn(from: Address, amount: bigint): void {
    assertPositiveAmount(amount);
    this._balances.debit(from, amount);
    this._supply.set(this._supply.value - amount);
    this.journal.emit(this.address, {
      type: "token.transfer",
      payload: { from: canonicalAddress(from), to: ZERO_ADDRESS, amount },
    });
  }

  // ─── Snapshot ────────────────────────────────────────────────────────

  protected tokenSnapshot(): TokenSnapshot {
    const allowances: AllowanceRecord[] = this._allowances
      .entries()
      .map(([, entry]) => ({
        owner: entry.owner,
        spender: entry.spender,
        amount: entry.amount.toString(),
      }));

    return {
      version: 1,
      address: this.address,
      name: this._name,
      symbol: this._symbol,
      decimals: this._decimals,
      totalSupply: this._supply.value.toString(),
      balances: this._balances.records(),
      allowances,
    };
  }

  /**
   * Load balances, allowances and supply from a snapshot into an empty
   * token. Must run inside a journal scope.
   */
  protected restoreToken(snapshot: TokenSnapshot): void {
    if (canonicalAddress(snapshot.address) !== this.address) {
      throw new LedgerError(
        "INVALID_SNAPSHOT",
        `Snapshot is for token ${snapshot.address}, not ${this.address}`,
      );
    }

    for (const record of snapshot.balances) {
      const holder = normalizeParticipant(record.holder, "holder");
      this._balances.credit(holder, parseAmount(record.amount));
    }
    for (const record of snapshot.allowances) {
      this._writeAllowance(
        normalizeParticipant(record.owner, "owner"),
        normalizeParticipant(record.spender, "spender"),
        parseAmount(record.amount),
      );
    }

    const supply = parseAmount(snapshot.totalSupply);
    if (this._balances.total() !== supply) {
      throw new LedgerError(
        "INVALID_SNAPSHOT",
        `Balances total ${this._balances.total().toString()} does not match supply ${supply.toString()}`,
      );
    }
    this._supply.set(supply);
  }

  // ─── Private ─────────────────────────────────────────────────────────

  private _move(from: Address, to: Address, amount: bigint): void {
    const sender = normalizeParticipant(from, "sender");
    const recipient = normalizeParticipant(to, "recipient");
    assertAmount(amount);

    this._balances.debit(sender, amount);
    this._balances.credit(recipient, amount);
    this.journal.emit(this.address, {
      type: "token.transfer",
      payload: { from: sender, to: recipient, amount },
    });
  }

  private _setAllowance(owner: Address, spender: Address, amount: bigint): void {
    this._writeAllowance(owner, spender, amount);
    this.journal.emit(this.address, {
      type: "token.approval",
      payload: { owner, spender, amount },
    });
  }

  private _writeAllowance(owner: Address, spender: Address, amount: bigint): void {
    const key = allowanceKey(owner, spender);
    if (amount === 0n) {
      this._allowances.delete(key);
    } else {
      this._allowances.set(key, {
        owner: canonicalAddress(owner),
        spender: canonicalAddress(spender),
        amount,
      });
    }
  }
}
