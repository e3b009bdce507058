/**
 * @coinwrap/wrapper — Wrapper ledger.
 *
 * Issues a 0-decimal synthetic token backed 1:1 by an underlying coin.
 *
 *   deposit → (coin transfer into the user's custody account)
 *   wrap    → collect custodied coins into the wrapper, then mint
 *   unwrap  → burn, then release coins from the wrapper's holdings
 *
 * Rules:
 * - Every operation is atomic: a failure anywhere, including inside a
 *   re-entrant call made by a collaborator, leaves no trace
 * - Local state changes (registry write, burn) happen before any call
 *   into the coin ledger
 * - A wrap mints only what its collection actually added to the wrapper's
 *   coin balance; a collaborator that reports a transfer it did not make
 *   raises a fatal INSUFFICIENT_WRAPPER_RESERVE
 * - The wrapper never acts as its own user
 */

import type { Address } from "@coinwrap/types";
import { ZERO_ADDRESS, canonicalAddress, isPositiveAmount } from "@coinwrap/types";
import { JournaledCell, TokenLedger, normalizeParticipant } from "@coinwrap/ledger";
import type { UnderlyingAssetLedger } from "@coinwrap/ledger";
import { deriveAccountAddress } from "./address.js";
import { CustodyAccount } from "./custody-account.js";
import { CustodyRegistry } from "./custody-registry.js";
import type {
  WrapperConfig,
  WrapperDependencies,
  WrapperSnapshot,
} from "./types.js";
import { WrapperError } from "./types.js";

export class WrapperLedger extends TokenLedger {
  /** Address of the coin ledger this wrapper custodies */
  readonly underlyingAsset: Address;

  private readonly _asset: UnderlyingAssetLedger;
  private readonly _registry: CustodyRegistry;
  private readonly _nonce: JournaledCell<number>;

  constructor(config: WrapperConfig) {
    super({
      address: config.address,
      name: config.name,
      symbol: config.symbol,
      decimals: 0,
      journal: config.journal,
    });
    this._asset = config.asset;
    this.underlyingAsset = canonicalAddress(config.asset.address);
    this._registry = new CustodyRegistry(config.journal);
    this._nonce = new JournaledCell(config.journal, 0);
  }

  override decimals(): number {
    return 0;
  }

  // ─── Custody Accounts ────────────────────────────────────────────────

  /**
   * Provision a custody account for `caller`, controlled by this wrapper.
   * Returns the new account's address.
   */
  createCustodyAccount(caller: Address): Address {
    return this.journal.atomic(() => {
      const user = normalizeParticipant(caller, "caller");
      this._assertExternal(user, "open a custody account");
      const existing = this._registry.lookup(user);
      if (existing !== ZERO_ADDRESS) {
        throw new WrapperError(
          "ALREADY_EXISTS",
          `${user} already has custody account ${existing}`,
        );
      }

      const nonce = this._nonce.value;
      const account = new CustodyAccount(
        deriveAccountAddress(this.address, nonce),
        this.address,
        this._asset,
      );
      this._registry.register(user, account);
      this._nonce.set(nonce + 1);

      this.journal.emit(this.address, {
        type: "custody.created",
        payload: { user, account: account.address },
      });
      return account.address;
    });
  }

  /**
   * The user's custody account address, or ZERO_ADDRESS when none exists.
   */
  getCustodyAccount(user: Address): Address {
    return this._registry.lookup(user);
  }

  custodyAccountAt(address: Address): CustodyAccount | undefined {
    return this._registry.accountAt(address);
  }

  // ─── Reserve ─────────────────────────────────────────────────────────

  /**
   * Underlying coins held by the wrapper itself.
   */
  reserve(): bigint {
    return this._asset.coinBalanceOf(this.address);
  }

  // ─── Wrap / Unwrap ───────────────────────────────────────────────────

  /**
   * Convert `amount` coins in the caller's custody account into synthetic
   * units credited to the caller.
   */
  wrap(caller: Address, amount: bigint): void {
    this.journal.atomic(() => {
      const user = canonicalAddress(caller);
      this._assertExternal(user, "wrap");
      this._assertPositive(amount, "wrap");

      const account = this._registry.accountOf(user);
      if (account === undefined) {
        throw new WrapperError("NO_CUSTODY_ACCOUNT", `${user} has no custody account`);
      }

      const custodied = account.balance();
      if (custodied < amount) {
        throw new WrapperError(
          "INSUFFICIENT_CUSTODY_FUNDS",
          `Custody account ${account.address} holds ${custodied.toString()}, cannot wrap ${amount.toString()}`,
        );
      }

      const before = this.reserve();
      account.collect(this.address, amount);
      const received = this.reserve() - before;
      if (received !== amount) {
        throw new WrapperError(
          "INSUFFICIENT_WRAPPER_RESERVE",
          `Collecting ${amount.toString()} from ${account.address} changed the wrapper reserve by ${received.toString()}`,
        );
      }
      this.mint(user, amount);

      this.journal.emit(this.address, {
        type: "wrap.completed",
        payload: { amount, user },
      });
    });
  }

  /**
   * Burn `amount` of the caller's synthetic units and send the same
   * number of coins from the wrapper to the caller.
   */
  unwrap(caller: Address, amount: bigint): void {
    this.journal.atomic(() => {
      const user = canonicalAddress(caller);
      this._assertExternal(user, "unwrap");
      this._assertPositive(amount, "unwrap");

      const held = this.balanceOf(user);
      if (held < amount) {
        throw new WrapperError(
          "INSUFFICIENT_SYNTHETIC_BALANCE",
          `${user} holds ${held.toString()}, cannot unwrap ${amount.toString()}`,
        );
      }

      // Burn before the coin ledger call: a re-entrant unwrap sees the
      // reduced balance.
      this.burn(user, amount);

      const reserve = this.reserve();
      if (reserve < amount) {
        throw new WrapperError(
          "INSUFFICIENT_WRAPPER_RESERVE",
          `Wrapper reserve ${reserve.toString()} cannot cover unwrap of ${amount.toString()}`,
        );
      }
      this._asset.sendCoin(this.address, amount, user);

      this.journal.emit(this.address, {
        type: "unwrap.completed",
        payload: { amount, user },
      });
    });
  }

  // ─── Snapshot ────────────────────────────────────────────────────────

  snapshot(): WrapperSnapshot {
    return {
      version: 1,
      underlyingAsset: this.underlyingAsset,
      token: this.tokenSnapshot(),
      custodyAccounts: this._registry.records(),
      nonce: this._nonce.value,
      createdAt: new Date().toISOString(),
    };
  }

  /**
   * Rebuild a wrapper from a snapshot, bound to the given coin ledger.
   * The coin ledger must be the one the snapshot was taken against.
   */
  static fromSnapshot(snapshot: WrapperSnapshot, deps: WrapperDependencies): WrapperLedger {
    if (canonicalAddress(snapshot.underlyingAsset) !== canonicalAddress(deps.asset.address)) {
      throw new WrapperError(
        "INVALID_SNAPSHOT",
        `Snapshot custodies ${snapshot.underlyingAsset}, not ${deps.asset.address}`,
      );
    }
    if (snapshot.token.decimals !== 0) {
      throw new WrapperError(
        "INVALID_SNAPSHOT",
        `Wrapped token must have 0 decimals, snapshot has ${String(snapshot.token.decimals)}`,
      );
    }
    if (!Number.isInteger(snapshot.nonce) || snapshot.nonce < snapshot.custodyAccounts.length) {
      throw new WrapperError(
        "INVALID_SNAPSHOT",
        `Nonce ${String(snapshot.nonce)} is below the ${String(snapshot.custodyAccounts.length)} recorded custody accounts`,
      );
    }

    const wrapper = new WrapperLedger({
      address: snapshot.token.address,
      name: snapshot.token.name,
      symbol: snapshot.token.symbol,
      asset: deps.asset,
      journal: deps.journal,
    });

    deps.journal.atomic(() => {
      wrapper.restoreToken(snapshot.token);
      for (const record of snapshot.custodyAccounts) {
        const user = normalizeParticipant(record.user, "user");
        const account = normalizeParticipant(record.account, "custody account");
        wrapper._registry.register(
          user,
          new CustodyAccount(account, wrapper.address, deps.asset),
        );
      }
      wrapper._nonce.set(snapshot.nonce);
    });

    return wrapper;
  }

  // ─── Private ─────────────────────────────────────────────────────────

  private _assertPositive(amount: bigint, operation: string): void {
    if (!isPositiveAmount(amount)) {
      throw new WrapperError(
        "INVALID_AMOUNT",
        `${operation} amount must be greater than zero, got ${String(amount)}`,
      );
    }
  }

  private _assertExternal(user: Address, operation: string): void {
    if (user === this.address) {
      throw new WrapperError("UNAUTHORIZED", `The wrapper cannot ${operation} as its own user`);
    }
  }
}
