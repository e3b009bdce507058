/**
 * @coinwrap/wrapper — Custody account.
 *
 * A per-user holding address for underlying coins. The user deposits into
 * it with an ordinary coin transfer; only the controller (the wrapper that
 * created it) can move coins out, and only to itself.
 *
 * The account keeps no balance of its own. Its holdings are whatever the
 * coin ledger says the account address holds.
 */

import type { Address } from "@coinwrap/types";
import { canonicalAddress } from "@coinwrap/types";
import type { UnderlyingAssetLedger } from "@coinwrap/ledger";
import { WrapperError } from "./types.js";

export class CustodyAccount {
  constructor(
    readonly address: Address,
    readonly controller: Address,
    private readonly asset: UnderlyingAssetLedger,
  ) {}

  /**
   * Underlying coins currently held at this account's address.
   */
  balance(): bigint {
    return this.asset.coinBalanceOf(this.address);
  }

  /**
   * Send `amount` of the account's coins to the controller.
   *
   * Throws UNAUTHORIZED for any caller but the controller. A short balance
   * fails inside the coin ledger and its error propagates unchanged.
   */
  collect(caller: Address, amount: bigint): void {
    if (canonicalAddress(caller) !== canonicalAddress(this.controller)) {
      throw new WrapperError(
        "UNAUTHORIZED",
        `${caller} is not the controller of custody account ${this.address}`,
      );
    }
    this.asset.sendCoin(this.address, amount, this.controller);
  }
}
