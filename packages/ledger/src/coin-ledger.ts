/**
 * @coinwrap/ledger — Underlying coin ledger.
 *
 * The pre-existing fungible asset that the wrapper custodies. The wrapper
 * only depends on the UnderlyingAssetLedger interface; CoinLedger is the
 * in-process implementation used by the node service and the tests.
 *
 * Rules:
 * - sendCoin moves units out of the sender's own balance only
 * - Only the issuer creates new coins
 * - A receiver's hook runs after the credit and before sendCoin returns;
 *   if it throws, the whole transfer is rolled back
 * - Addresses are compared in canonical (lowercase) form
 */

import type { Address } from "@coinwrap/types";
import { canonicalAddress } from "@coinwrap/types";
import type { Journal } from "./journal.js";
import { BalanceBook } from "./balance-book.js";
import { JournaledCell, JournaledMap } from "./journaled.js";
import {
  assertPositiveAmount,
  normalizeParticipant,
  parseAmount,
} from "./amount-math.js";
import type { CoinLedgerSnapshot, ReceiveHook } from "./types.js";
import { LedgerError } from "./types.js";

/**
 * What the wrapper needs from the underlying asset.
 *
 * `sendCoin` acts as `sender`: callers pass their own identity, the way a
 * contract call carries its caller.
 */
export interface UnderlyingAssetLedger {
  readonly address: Address;
  coinBalanceOf(owner: Address): bigint;
  sendCoin(sender: Address, amount: bigint, receiver: Address): void;
}

export interface CoinLedgerConfig {
  readonly address: Address;
  readonly issuer: Address;
  readonly journal: Journal;
}

export class CoinLedger implements UnderlyingAssetLedger {
  readonly address: Address;
  readonly issuer: Address;

  protected readonly journal: Journal;
  private readonly _balances: BalanceBook;
  private readonly _hooks: JournaledMap<Address, ReceiveHook>;
  private readonly _issued: JournaledCell<bigint>;

  constructor(config: CoinLedgerConfig) {
    this.address = normalizeParticipant(config.address, "coin ledger address");
    this.issuer = normalizeParticipant(config.issuer, "issuer");
    this.journal = config.journal;
    this._balances = new BalanceBook(config.journal);
    this._hooks = new JournaledMap(config.journal);
    this._issued = new JournaledCell(config.journal, 0n);
  }

  // ─── Queries ─────────────────────────────────────────────────────────

  coinBalanceOf(owner: Address): bigint {
    return this._balances.balanceOf(owner);
  }

  /**
   * Total coins ever issued. Transfers never change it.
   */
  totalCoins(): bigint {
    return this._issued.value;
  }

  // ─── Transfers ───────────────────────────────────────────────────────

  /**
   * Move `amount` from `sender` to `receiver`.
   * Throws INSUFFICIENT_BALANCE if `sender` holds less than `amount`.
   */
  sendCoin(sender: Address, amount: bigint, receiver: Address): void {
    this.journal.atomic(() => {
      assertPositiveAmount(amount);
      const to = normalizeParticipant(receiver, "receiver");
      const from = canonicalAddress(sender);

      this._balances.debit(from, amount);
      this._balances.credit(to, amount);

      const hook = this._hooks.get(to);
      if (hook !== undefined) {
        hook(from, amount);
      }
    });
  }

  /**
   * Create `amount` new coins for `to`. Issuer only.
   */
  issue(caller: Address, to: Address, amount: bigint): void {
    this.journal.atomic(() => {
      if (canonicalAddress(caller) !== this.issuer) {
        throw new LedgerError("UNAUTHORIZED", `${caller} is not the coin issuer`);
      }
      assertPositiveAmount(amount);
      const recipient = normalizeParticipant(to, "recipient");

      this._balances.credit(recipient, amount);
      this._issued.set(this._issued.value + amount);
    });
  }

  /**
   * Register (or clear, with undefined) the hook run when coins arrive at
   * `caller`'s own address.
   */
  setReceiveHook(caller: Address, hook: ReceiveHook | undefined): void {
    this.journal.atomic(() => {
      const owner = normalizeParticipant(caller, "caller");
      if (hook === undefined) {
        this._hooks.delete(owner);
      } else {
        this._hooks.set(owner, hook);
      }
    });
  }

  // ─── Snapshot ────────────────────────────────────────────────────────

  snapshot(): CoinLedgerSnapshot {
    return {
      version: 1,
      address: this.address,
      issuer: this.issuer,
      balances: this._balances.records(),
      totalIssued: this._issued.value.toString(),
      createdAt: new Date().toISOString(),
    };
  }

  /**
   * Restore a coin ledger from a snapshot.
   * Balances must not exceed the recorded issuance.
   */
  static fromSnapshot(snapshot: CoinLedgerSnapshot, journal: Journal): CoinLedger {
    const ledger = new CoinLedger({
      address: snapshot.address,
      issuer: snapshot.issuer,
      journal,
    });

    journal.atomic(() => {
      const issued = parseAmount(snapshot.totalIssued);
      for (const record of snapshot.balances) {
        const holder = normalizeParticipant(record.holder, "holder");
        ledger._balances.credit(holder, parseAmount(record.amount));
      }
      if (ledger._balances.total() > issued) {
        throw new LedgerError(
          "INVALID_SNAPSHOT",
          `Balances total ${ledger._balances.total().toString()} exceeds issued ${issued.toString()}`,
        );
      }
      ledger._issued.set(issued);
    });

    return ledger;
  }
}
