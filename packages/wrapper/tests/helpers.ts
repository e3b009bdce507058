/**
 * Shared fixtures for wrapper tests.
 */

import { CoinLedger, Journal } from "@coinwrap/ledger";
import { WrapperLedger } from "../src/wrapper-ledger.js";
import { WrapperError } from "../src/types.js";

export const COIN = `0x${"c".repeat(40)}`;
export const WRAPPER = `0x${"d".repeat(40)}`;
export const ISSUER = `0x${"1".repeat(40)}`;
export const ALICE = `0x${"a".repeat(40)}`;
export const BOB = `0x${"b".repeat(40)}`;

export interface Deployment {
  readonly journal: Journal;
  readonly coins: CoinLedger;
  readonly wrapper: WrapperLedger;
}

export function createDeployment(): Deployment {
  const journal = new Journal();
  const coins = new CoinLedger({ address: COIN, issuer: ISSUER, journal });
  const wrapper = new WrapperLedger({
    address: WRAPPER,
    name: "Wrapped Coin",
    symbol: "WCOIN",
    asset: coins,
    journal,
  });
  return { journal, coins, wrapper };
}

/**
 * Issue `amount` coins to `user`, create their custody account and
 * deposit everything into it. Returns the account address.
 */
export function fundCustody(d: Deployment, user: string, amount: bigint): string {
  d.coins.issue(ISSUER, user, amount);
  const account = d.wrapper.createCustodyAccount(user);
  d.coins.sendCoin(user, amount, account);
  return account;
}

/** The code of a thrown WrapperError, or a marker for anything else. */
export function wrapperCode(fn: () => void): string | undefined {
  try {
    fn();
  } catch (err) {
    return err instanceof WrapperError ? err.code : "NOT_A_WRAPPER_ERROR";
  }
  return undefined;
}
