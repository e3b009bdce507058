/**
 * WrapperService — Composition root for one wrapping deployment.
 *
 * Owns the shared journal, the underlying coin ledger and the wrapper.
 * Route handlers delegate to this service; they never touch the ledgers
 * directly.
 */

import type { Address, CommittedNotification } from "@coinwrap/types";
import { ZERO_ADDRESS } from "@coinwrap/types";
import { CoinLedger, Journal } from "@coinwrap/ledger";
import type { NotificationHandler, Subscription } from "@coinwrap/ledger";
import { WrapperError, WrapperLedger, auditConservation } from "@coinwrap/wrapper";
import type { ConservationReport } from "@coinwrap/wrapper";
import type {
  BalancesDto,
  CustodyAccountDto,
  ListEventsQuery,
  TokenInfoDto,
} from "../types/dto.js";

// =============================================================================
// Configuration
// =============================================================================

export interface WrapperServiceConfig {
  readonly wrapperAddress: Address;
  readonly coinAddress: Address;
  readonly issuerAddress: Address;
  readonly tokenName: string;
  readonly tokenSymbol: string;
}

// =============================================================================
// Service
// =============================================================================

export class WrapperService {
  readonly journal: Journal;
  readonly coins: CoinLedger;
  readonly wrapper: WrapperLedger;

  private readonly _events: CommittedNotification[] = [];

  constructor(config: WrapperServiceConfig) {
    this.journal = new Journal();
    this.coins = new CoinLedger({
      address: config.coinAddress,
      issuer: config.issuerAddress,
      journal: this.journal,
    });
    this.wrapper = new WrapperLedger({
      address: config.wrapperAddress,
      name: config.tokenName,
      symbol: config.tokenSymbol,
      asset: this.coins,
      journal: this.journal,
    });

    this.wrapper.subscribe((notification) => {
      this._events.push(notification);
    });
  }

  // ─── Token ──────────────────────────────────────────────────────────

  tokenInfo(): TokenInfoDto {
    return {
      address: this.wrapper.address,
      name: this.wrapper.name(),
      symbol: this.wrapper.symbol(),
      decimals: this.wrapper.decimals(),
      totalSupply: this.wrapper.totalSupply().toString(),
      reserve: this.wrapper.reserve().toString(),
      underlyingAsset: this.wrapper.underlyingAsset,
    };
  }

  transfer(caller: Address, to: Address, amount: bigint): void {
    this.wrapper.transfer(caller, to, amount);
  }

  transferFrom(caller: Address, from: Address, to: Address, amount: bigint): void {
    this.wrapper.transferFrom(caller, from, to, amount);
  }

  approve(caller: Address, spender: Address, amount: bigint): void {
    this.wrapper.approve(caller, spender, amount);
  }

  allowance(owner: Address, spender: Address): bigint {
    return this.wrapper.allowance(owner, spender);
  }

  balances(holder: Address): BalancesDto {
    return {
      holder,
      synthetic: this.wrapper.balanceOf(holder).toString(),
      underlying: this.coins.coinBalanceOf(holder).toString(),
    };
  }

  // ─── Custody ────────────────────────────────────────────────────────

  createCustodyAccount(caller: Address): CustodyAccountDto {
    this.wrapper.createCustodyAccount(caller);
    return this.custodyAccount(caller);
  }

  custodyAccount(user: Address): CustodyAccountDto {
    const account = this.wrapper.getCustodyAccount(user);
    const exists = account !== ZERO_ADDRESS;
    return {
      user,
      account,
      exists,
      balance: exists ? this.coins.coinBalanceOf(account).toString() : "0",
    };
  }

  // ─── Wrapping ───────────────────────────────────────────────────────

  wrap(caller: Address, amount: bigint): BalancesDto {
    this.wrapper.wrap(caller, amount);
    return this.balances(caller);
  }

  unwrap(caller: Address, amount: bigint): BalancesDto {
    this.wrapper.unwrap(caller, amount);
    return this.balances(caller);
  }

  // ─── Underlying Coins ───────────────────────────────────────────────

  /**
   * Send coins as `caller`. Coins held by the wrapper or by a custody
   * account move only through wrap and unwrap.
   */
  sendCoin(caller: Address, to: Address, amount: bigint): BalancesDto {
    if (caller === this.wrapper.address || this.wrapper.custodyAccountAt(caller) !== undefined) {
      throw new WrapperError(
        "UNAUTHORIZED",
        `Coins held by ${caller} can only move through wrap and unwrap`,
      );
    }
    this.coins.sendCoin(caller, amount, to);
    return this.balances(caller);
  }

  issueCoins(caller: Address, to: Address, amount: bigint): BalancesDto {
    this.coins.issue(caller, to, amount);
    return this.balances(to);
  }

  // ─── Events ─────────────────────────────────────────────────────────

  /**
   * Committed notifications in position order.
   */
  readEvents(filter?: Pick<ListEventsQuery, "type" | "afterPosition">): readonly CommittedNotification[] {
    const type = filter?.type;
    const after = filter?.afterPosition ?? 0;
    return this._events.filter(
      (event) =>
        event.metadata.position > after && (type === undefined || event.type === type),
    );
  }

  onNotification(handler: NotificationHandler): Subscription {
    return this.wrapper.subscribe(handler);
  }

  // ─── Health ─────────────────────────────────────────────────────────

  audit(): ConservationReport {
    return auditConservation(this.wrapper);
  }
}
