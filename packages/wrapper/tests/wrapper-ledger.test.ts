/**
 * Tests for WrapperLedger.
 *
 * Covers:
 * - Custody account lifecycle
 * - wrap / unwrap preconditions and effects
 * - Inherited token operations
 * - Notifications
 */

import { describe, it, expect, beforeEach } from "vitest";
import type { CommittedNotification } from "@coinwrap/types";
import { ZERO_ADDRESS } from "@coinwrap/types";
import { LedgerError } from "@coinwrap/ledger";
import { deriveAccountAddress } from "../src/address.js";
import { auditConservation } from "../src/conservation.js";
import {
  ALICE,
  BOB,
  COIN,
  ISSUER,
  WRAPPER,
  createDeployment,
  fundCustody,
  wrapperCode,
} from "./helpers.js";
import type { Deployment } from "./helpers.js";

describe("WrapperLedger", () => {
  let d: Deployment;
  let seen: CommittedNotification[];

  beforeEach(() => {
    d = createDeployment();
    seen = [];
    d.wrapper.subscribe((n) => {
      seen.push(n);
    });
  });

  it("exposes token metadata with zero decimals", () => {
    expect(d.wrapper.name()).toBe("Wrapped Coin");
    expect(d.wrapper.symbol()).toBe("WCOIN");
    expect(d.wrapper.decimals()).toBe(0);
    expect(d.wrapper.underlyingAsset).toBe(COIN);
    expect(d.wrapper.address).toBe(WRAPPER);
  });

  // ─── Custody Accounts ────────────────────────────────────────────────

  describe("createCustodyAccount", () => {
    it("returns the zero address before creation", () => {
      expect(d.wrapper.getCustodyAccount(ALICE)).toBe(ZERO_ADDRESS);
    });

    it("creates an account controlled by the wrapper", () => {
      const account = d.wrapper.createCustodyAccount(ALICE);

      expect(account).toBe(deriveAccountAddress(WRAPPER, 0));
      expect(d.wrapper.getCustodyAccount(ALICE)).toBe(account);

      const handle = d.wrapper.custodyAccountAt(account);
      expect(handle?.controller).toBe(WRAPPER);
      expect(handle?.address).toBe(account);
    });

    it("gives each user a distinct account", () => {
      const a = d.wrapper.createCustodyAccount(ALICE);
      const b = d.wrapper.createCustodyAccount(BOB);
      expect(a).not.toBe(b);
      expect(b).toBe(deriveAccountAddress(WRAPPER, 1));
    });

    it("emits custody.created", () => {
      const account = d.wrapper.createCustodyAccount(ALICE);
      expect(seen).toHaveLength(1);
      expect(seen[0]!.type).toBe("custody.created");
      expect(seen[0]!.payload).toEqual({ user: ALICE, account });
    });

    it("fails the second time with ALREADY_EXISTS and keeps the first account", () => {
      const first = d.wrapper.createCustodyAccount(ALICE);
      expect(wrapperCode(() => d.wrapper.createCustodyAccount(ALICE))).toBe("ALREADY_EXISTS");
      expect(d.wrapper.getCustodyAccount(ALICE)).toBe(first);
      expect(seen).toHaveLength(1);
    });

    it("rejects the zero address as caller", () => {
      expect(() => d.wrapper.createCustodyAccount(ZERO_ADDRESS)).toThrow(LedgerError);
      expect(d.wrapper.getCustodyAccount(ZERO_ADDRESS)).toBe(ZERO_ADDRESS);
    });

    it("returns undefined for an unknown account address", () => {
      expect(d.wrapper.custodyAccountAt(ALICE)).toBeUndefined();
    });
  });

  // ─── Wrap ────────────────────────────────────────────────────────────

  describe("wrap", () => {
    it("collects custodied coins and mints 1:1", () => {
      const account = fundCustody(d, ALICE, 100n);

      d.wrapper.wrap(ALICE, 100n);

      expect(d.wrapper.balanceOf(ALICE)).toBe(100n);
      expect(d.wrapper.totalSupply()).toBe(100n);
      expect(d.coins.coinBalanceOf(account)).toBe(0n);
      expect(d.wrapper.reserve()).toBe(100n);
    });

    it("wraps part of the custodied balance", () => {
      const account = fundCustody(d, ALICE, 100n);

      d.wrapper.wrap(ALICE, 40n);

      expect(d.wrapper.balanceOf(ALICE)).toBe(40n);
      expect(d.coins.coinBalanceOf(account)).toBe(60n);
      expect(d.wrapper.reserve()).toBe(40n);
    });

    it("emits the mint transfer and wrap.completed", () => {
      fundCustody(d, ALICE, 10n);
      seen.length = 0;

      d.wrapper.wrap(ALICE, 10n);

      expect(seen.map((n) => n.type)).toEqual(["token.transfer", "wrap.completed"]);
      expect(seen[0]!.payload).toEqual({ from: ZERO_ADDRESS, to: ALICE, amount: 10n });
      expect(seen[1]!.payload).toEqual({ amount: 10n, user: ALICE });
    });

    it("rejects zero with INVALID_AMOUNT", () => {
      fundCustody(d, ALICE, 10n);
      expect(wrapperCode(() => d.wrapper.wrap(ALICE, 0n))).toBe("INVALID_AMOUNT");
      expect(d.wrapper.totalSupply()).toBe(0n);
    });

    it("rejects negative amounts with INVALID_AMOUNT", () => {
      fundCustody(d, ALICE, 10n);
      expect(wrapperCode(() => d.wrapper.wrap(ALICE, -5n))).toBe("INVALID_AMOUNT");
    });

    it("fails with NO_CUSTODY_ACCOUNT for a user without one", () => {
      expect(wrapperCode(() => d.wrapper.wrap(ALICE, 1n))).toBe("NO_CUSTODY_ACCOUNT");
    });

    it("fails with INSUFFICIENT_CUSTODY_FUNDS and changes nothing", () => {
      const account = fundCustody(d, ALICE, 50n);
      seen.length = 0;

      expect(wrapperCode(() => d.wrapper.wrap(ALICE, 51n))).toBe("INSUFFICIENT_CUSTODY_FUNDS");

      expect(d.wrapper.balanceOf(ALICE)).toBe(0n);
      expect(d.wrapper.totalSupply()).toBe(0n);
      expect(d.coins.coinBalanceOf(account)).toBe(50n);
      expect(d.wrapper.reserve()).toBe(0n);
      expect(seen).toHaveLength(0);
    });

    it("does not count coins sent elsewhere by the user", () => {
      d.coins.issue(ISSUER, ALICE, 100n);
      d.wrapper.createCustodyAccount(ALICE);

      expect(wrapperCode(() => d.wrapper.wrap(ALICE, 1n))).toBe("INSUFFICIENT_CUSTODY_FUNDS");
    });
  });

  // ─── Unwrap ──────────────────────────────────────────────────────────

  describe("unwrap", () => {
    beforeEach(() => {
      fundCustody(d, ALICE, 100n);
      d.wrapper.wrap(ALICE, 100n);
      seen.length = 0;
    });

    it("burns synthetic units and releases coins", () => {
      d.wrapper.unwrap(ALICE, 30n);

      expect(d.wrapper.balanceOf(ALICE)).toBe(70n);
      expect(d.wrapper.totalSupply()).toBe(70n);
      expect(d.wrapper.reserve()).toBe(70n);
      expect(d.coins.coinBalanceOf(ALICE)).toBe(30n);
    });

    it("emits the burn transfer and unwrap.completed", () => {
      d.wrapper.unwrap(ALICE, 30n);

      expect(seen.map((n) => n.type)).toEqual(["token.transfer", "unwrap.completed"]);
      expect(seen[0]!.payload).toEqual({ from: ALICE, to: ZERO_ADDRESS, amount: 30n });
      expect(seen[1]!.payload).toEqual({ amount: 30n, user: ALICE });
    });

    it("rejects zero with INVALID_AMOUNT", () => {
      expect(wrapperCode(() => d.wrapper.unwrap(ALICE, 0n))).toBe("INVALID_AMOUNT");
      expect(d.wrapper.balanceOf(ALICE)).toBe(100n);
    });

    it("fails with INSUFFICIENT_SYNTHETIC_BALANCE and changes nothing", () => {
      expect(wrapperCode(() => d.wrapper.unwrap(ALICE, 101n))).toBe(
        "INSUFFICIENT_SYNTHETIC_BALANCE",
      );
      expect(d.wrapper.balanceOf(ALICE)).toBe(100n);
      expect(d.wrapper.reserve()).toBe(100n);
      expect(seen).toHaveLength(0);
    });

    it("lets any holder unwrap, not only the one who wrapped", () => {
      d.wrapper.transfer(ALICE, BOB, 25n);
      d.wrapper.unwrap(BOB, 25n);

      expect(d.coins.coinBalanceOf(BOB)).toBe(25n);
      expect(d.wrapper.balanceOf(BOB)).toBe(0n);
      expect(d.wrapper.reserve()).toBe(75n);
    });
  });

  // ─── End to End ──────────────────────────────────────────────────────

  it("wrap then unwrap of a deposit returns the user's coins", () => {
    d.coins.issue(ISSUER, ALICE, 500n);
    const before = d.coins.coinBalanceOf(ALICE);

    const account = d.wrapper.createCustodyAccount(ALICE);
    d.coins.sendCoin(ALICE, 200n, account);
    d.wrapper.wrap(ALICE, 200n);
    d.wrapper.unwrap(ALICE, 200n);

    expect(d.coins.coinBalanceOf(ALICE)).toBe(before);
    expect(d.wrapper.balanceOf(ALICE)).toBe(0n);
    expect(d.wrapper.totalSupply()).toBe(0n);
    expect(d.wrapper.reserve()).toBe(0n);
  });

  it("wrap 100 then unwrap 30", () => {
    const account = fundCustody(d, ALICE, 100n);

    d.wrapper.wrap(ALICE, 100n);
    expect(d.wrapper.balanceOf(ALICE)).toBe(100n);
    expect(d.coins.coinBalanceOf(account)).toBe(0n);
    expect(d.wrapper.reserve()).toBe(100n);

    const coinsBefore = d.coins.coinBalanceOf(ALICE);
    d.wrapper.unwrap(ALICE, 30n);
    expect(d.wrapper.balanceOf(ALICE)).toBe(70n);
    expect(d.wrapper.reserve()).toBe(70n);
    expect(d.coins.coinBalanceOf(ALICE)).toBe(coinsBefore + 30n);
  });

  // ─── Token Operations ────────────────────────────────────────────────

  describe("synthetic token", () => {
    beforeEach(() => {
      fundCustody(d, ALICE, 100n);
      d.wrapper.wrap(ALICE, 100n);
    });

    it("transfers between holders without touching the reserve", () => {
      d.wrapper.transfer(ALICE, BOB, 40n);
      expect(d.wrapper.balanceOf(BOB)).toBe(40n);
      expect(d.wrapper.totalSupply()).toBe(100n);
      expect(d.wrapper.reserve()).toBe(100n);
    });

    it("supports approve and transferFrom", () => {
      d.wrapper.approve(ALICE, BOB, 10n);
      d.wrapper.transferFrom(BOB, ALICE, BOB, 10n);
      expect(d.wrapper.allowance(ALICE, BOB)).toBe(0n);
      expect(d.wrapper.balanceOf(BOB)).toBe(10n);
    });
  });
});

describe("WrapperLedger caller address case", () => {
  const UPPER_ALICE = `0x${"A".repeat(40)}`;
  let d: Deployment;

  beforeEach(() => {
    d = createDeployment();
  });

  it("allows one custody account per user whatever the case", () => {
    const account = d.wrapper.createCustodyAccount(ALICE);

    expect(wrapperCode(() => d.wrapper.createCustodyAccount(UPPER_ALICE))).toBe("ALREADY_EXISTS");
    expect(d.wrapper.getCustodyAccount(UPPER_ALICE)).toBe(account);
    expect(d.wrapper.snapshot().custodyAccounts).toEqual([{ user: ALICE, account }]);
  });

  it("records the canonical user when created with upper-case hex", () => {
    const seen: CommittedNotification[] = [];
    d.wrapper.subscribe((n) => {
      seen.push(n);
    });

    const account = d.wrapper.createCustodyAccount(UPPER_ALICE);

    expect(d.wrapper.getCustodyAccount(ALICE)).toBe(account);
    expect(seen.map((n) => n.payload)).toEqual([{ user: ALICE, account }]);
  });

  it("wraps and unwraps for the same holder across cases", () => {
    fundCustody(d, ALICE, 50n);

    d.wrapper.wrap(UPPER_ALICE, 50n);
    expect(d.wrapper.balanceOf(ALICE)).toBe(50n);

    d.wrapper.unwrap(UPPER_ALICE, 20n);
    expect(d.wrapper.balanceOf(ALICE)).toBe(30n);
    expect(d.coins.coinBalanceOf(ALICE)).toBe(20n);
    expect(auditConservation(d.wrapper).balanced).toBe(true);
  });
});

describe("WrapperLedger acting as its own user", () => {
  let d: Deployment;

  beforeEach(() => {
    d = createDeployment();
    fundCustody(d, ALICE, 100n);
    d.wrapper.wrap(ALICE, 100n);
  });

  it("refuses to open a custody account for the wrapper", () => {
    expect(wrapperCode(() => d.wrapper.createCustodyAccount(WRAPPER))).toBe("UNAUTHORIZED");
    expect(d.wrapper.getCustodyAccount(WRAPPER)).toBe(ZERO_ADDRESS);
  });

  it("refuses to wrap for the wrapper", () => {
    expect(wrapperCode(() => d.wrapper.wrap(WRAPPER, 1n))).toBe("UNAUTHORIZED");
  });

  it("refuses to unwrap units held by the wrapper", () => {
    d.wrapper.transfer(ALICE, WRAPPER, 40n);

    expect(wrapperCode(() => d.wrapper.unwrap(WRAPPER, 40n))).toBe("UNAUTHORIZED");
    expect(wrapperCode(() => d.wrapper.unwrap(`0x${"D".repeat(40)}`, 40n))).toBe("UNAUTHORIZED");

    expect(d.wrapper.balanceOf(WRAPPER)).toBe(40n);
    expect(d.wrapper.totalSupply()).toBe(100n);
    expect(d.wrapper.reserve()).toBe(100n);
    expect(auditConservation(d.wrapper).balanced).toBe(true);
  });
});
