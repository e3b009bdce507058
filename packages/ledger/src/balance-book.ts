/**
 * @coinwrap/ledger — Balance book.
 *
 * Holder → units, over a JournaledMap. Zero balances are not stored,
 * so `holders()` lists exactly the addresses that hold something.
 * Holders are keyed by their canonical address.
 *
 * Rules:
 * - Balances never go negative
 * - Debits check the balance before writing
 */

import type { Address } from "@coinwrap/types";
import { canonicalAddress } from "@coinwrap/types";
import type { Journal } from "./journal.js";
import { JournaledMap } from "./journaled.js";
import { sumAmounts } from "./amount-math.js";
import type { BalanceRecord } from "./types.js";
import { LedgerError } from "./types.js";

export class BalanceBook {
  private readonly _balances: JournaledMap<Address, bigint>;

  constructor(journal: Journal) {
    this._balances = new JournaledMap(journal);
  }

  balanceOf(holder: Address): bigint {
    return this._balances.get(canonicalAddress(holder)) ?? 0n;
  }

  /**
   * Addresses with a non-zero balance.
   */
  holders(): readonly Address[] {
    return this._balances.entries().map(([holder]) => holder);
  }

  /**
   * Sum of every balance in the book.
   */
  total(): bigint {
    return sumAmounts(this._balances.entries().map(([, amount]) => amount));
  }

  credit(holder: Address, amount: bigint): void {
    this._write(holder, this.balanceOf(holder) + amount);
  }

  /**
   * Remove units from a holder.
   * Throws INSUFFICIENT_BALANCE if the holder has fewer than `amount`.
   */
  debit(holder: Address, amount: bigint): void {
    const balance = this.balanceOf(holder);
    if (balance < amount) {
      throw new LedgerError(
        "INSUFFICIENT_BALANCE",
        `Balance of ${holder} is ${balance.toString()}, cannot debit ${amount.toString()}`,
      );
    }
    this._write(holder, balance - amount);
  }

  records(): readonly BalanceRecord[] {
    return this._balances
      .entries()
      .map(([holder, amount]) => ({ holder, amount: amount.toString() }));
  }

  private _write(holder: Address, value: bigint): void {
    const key = canonicalAddress(holder);
    if (value === 0n) {
      this._balances.delete(key);
    } else {
      this._balances.set(key, value);
    }
  }
}
