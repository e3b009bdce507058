/**
 * @coinwrap/wrapper — Custody registry.
 *
 * user → CustodyAccount, with a reverse index by account address.
 *
 * Rules:
 * - At most one account per user, whatever the case of its hex digits
 * - Entries are never removed; only a rolled-back registration disappears
 */

import type { Address } from "@coinwrap/types";
import { ZERO_ADDRESS, canonicalAddress } from "@coinwrap/types";
import { JournaledMap } from "@coinwrap/ledger";
import type { Journal } from "@coinwrap/ledger";
import type { CustodyAccount } from "./custody-account.js";
import type { CustodyRecord } from "./types.js";
import { WrapperError } from "./types.js";

export class CustodyRegistry {
  private readonly _byUser: JournaledMap<Address, CustodyAccount>;
  private readonly _byAddress: JournaledMap<Address, CustodyAccount>;

  constructor(journal: Journal) {
    this._byUser = new JournaledMap(journal);
    this._byAddress = new JournaledMap(journal);
  }

  get size(): number {
    return this._byUser.size;
  }

  /**
   * The user's account address, or ZERO_ADDRESS when they have none.
   */
  lookup(user: Address): Address {
    return this._byUser.get(canonicalAddress(user))?.address ?? ZERO_ADDRESS;
  }

  accountOf(user: Address): CustodyAccount | undefined {
    return this._byUser.get(canonicalAddress(user));
  }

  accountAt(address: Address): CustodyAccount | undefined {
    return this._byAddress.get(canonicalAddress(address));
  }

  /**
   * Throws ALREADY_EXISTS if `user` already has an account, or if the
   * account address is already registered to someone else.
   */
  register(user: Address, account: CustodyAccount): void {
    const key = canonicalAddress(user);
    const existing = this._byUser.get(key);
    if (existing !== undefined) {
      throw new WrapperError(
        "ALREADY_EXISTS",
        `${user} already has custody account ${existing.address}`,
      );
    }
    if (this._byAddress.has(canonicalAddress(account.address))) {
      throw new WrapperError(
        "ALREADY_EXISTS",
        `Custody account ${account.address} is already registered`,
      );
    }
    this._byUser.set(key, account);
    this._byAddress.set(canonicalAddress(account.address), account);
  }

  records(): readonly CustodyRecord[] {
    return this._byUser
      .entries()
      .map(([user, account]) => ({ user, account: account.address }));
  }
}
