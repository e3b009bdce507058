/**
 * Tests for the shared state journal.
 *
 * Covers:
 * - Commit and rollback of journaled writes
 * - Nested scopes (inner failure caught by outer code)
 * - Deferred notification delivery
 * - Subscription lifecycle
 */

import { describe, it, expect, beforeEach } from "vitest";
import type { CommittedNotification } from "@coinwrap/types";
import { Journal } from "../src/journal.js";
import { JournaledCell, JournaledMap } from "../src/journaled.js";

const EMITTER = `0x${"e".repeat(40)}`;
const ALICE = `0x${"a".repeat(40)}`;

function wrapped(amount: bigint) {
  return { type: "wrap.completed" as const, payload: { amount, user: ALICE } };
}

describe("Journal", () => {
  let journal: Journal;
  let cell: JournaledCell<number>;
  let map: JournaledMap<string, number>;
  let delivered: CommittedNotification[];

  beforeEach(() => {
    journal = new Journal();
    cell = new JournaledCell(journal, 0);
    map = new JournaledMap(journal);
    delivered = [];
    journal.subscribe((n) => {
      delivered.push(n);
    });
  });

  // ─── Scopes ──────────────────────────────────────────────────────────

  describe("atomic", () => {
    it("returns the result and keeps writes on success", () => {
      const result = journal.atomic(() => {
        cell.set(5);
        map.set("a", 1);
        return "done";
      });

      expect(result).toBe("done");
      expect(cell.value).toBe(5);
      expect(map.get("a")).toBe(1);
      expect(journal.depth).toBe(0);
    });

    it("rolls back every write when the scope throws", () => {
      journal.atomic(() => {
        map.set("kept", 1);
      });

      expect(() =>
        journal.atomic(() => {
          cell.set(9);
          map.set("kept", 2);
          map.set("new", 3);
          map.delete("kept");
          throw new Error("boom");
        }),
      ).toThrow("boom");

      expect(cell.value).toBe(0);
      expect(map.get("kept")).toBe(1);
      expect(map.has("new")).toBe(false);
      expect(journal.depth).toBe(0);
    });

    it("rolls back nested writes together with the outer scope", () => {
      expect(() =>
        journal.atomic(() => {
          cell.set(1);
          journal.atomic(() => {
            cell.set(2);
            map.set("inner", 2);
          });
          throw new Error("outer fails");
        }),
      ).toThrow("outer fails");

      expect(cell.value).toBe(0);
      expect(map.has("inner")).toBe(false);
    });

    it("rolls back only the nested scope when the outer code catches", () => {
      journal.atomic(() => {
        cell.set(1);
        try {
          journal.atomic(() => {
            cell.set(2);
            map.set("inner", 2);
            throw new Error("inner fails");
          });
        } catch (err) {
          expect(err).toBeInstanceOf(Error);
        }
        map.set("outer", 1);
      });

      expect(cell.value).toBe(1);
      expect(map.has("inner")).toBe(false);
      expect(map.get("outer")).toBe(1);
    });

    it("keeps writes made outside any scope", () => {
      cell.set(3);
      expect(cell.value).toBe(3);
    });
  });

  // ─── Notifications ───────────────────────────────────────────────────

  describe("notifications", () => {
    it("delivers only after the outermost scope commits", () => {
      journal.atomic(() => {
        journal.emit(EMITTER, wrapped(1n));
        journal.atomic(() => {
          journal.emit(EMITTER, wrapped(2n));
        });
        expect(delivered).toHaveLength(0);
      });

      expect(delivered.map((n) => n.metadata.position)).toEqual([1, 2]);
      expect(delivered[0]!.metadata.emitter).toBe(EMITTER);
      expect(delivered[1]!.payload).toEqual({ amount: 2n, user: ALICE });
      expect(journal.position).toBe(2);
    });

    it("discards notifications of a rolled-back scope", () => {
      expect(() =>
        journal.atomic(() => {
          journal.emit(EMITTER, wrapped(1n));
          throw new Error("boom");
        }),
      ).toThrow();

      expect(delivered).toHaveLength(0);
      expect(journal.position).toBe(0);
    });

    it("discards only the nested notifications when the inner failure is caught", () => {
      journal.atomic(() => {
        journal.emit(EMITTER, wrapped(1n));
        try {
          journal.atomic(() => {
            journal.emit(EMITTER, wrapped(2n));
            throw new Error("inner");
          });
        } catch {
          // swallowed on purpose: the outer scope continues
        }
      });

      expect(delivered).toHaveLength(1);
      expect(delivered[0]!.payload).toEqual({ amount: 1n, user: ALICE });
    });

    it("delivers immediately when emitted outside any scope", () => {
      journal.emit(EMITTER, wrapped(7n));
      expect(delivered).toHaveLength(1);
      expect(delivered[0]!.type).toBe("wrap.completed");
    });

    it("finishes delivering a batch when a subscriber throws", () => {
      journal.subscribe((n) => {
        if (n.metadata.position === 1) {
          throw new Error("first subscriber failure");
        }
      });
      journal.subscribe((n) => {
        if (n.metadata.position === 2) {
          throw new Error("second subscriber failure");
        }
      });
      const later: number[] = [];
      journal.subscribe((n) => {
        later.push(n.metadata.position);
      });

      expect(() =>
        journal.atomic(() => {
          cell.set(5);
          journal.emit(EMITTER, wrapped(1n));
          journal.emit(EMITTER, wrapped(2n));
          journal.emit(EMITTER, wrapped(3n));
        }),
      ).toThrow("first subscriber failure");

      expect(delivered.map((n) => n.metadata.position)).toEqual([1, 2, 3]);
      expect(later).toEqual([1, 2, 3]);
      expect(journal.position).toBe(3);
      expect(cell.value).toBe(5);
    });

    it("stops delivering after unsubscribe", () => {
      const extra: CommittedNotification[] = [];
      const sub = journal.subscribe((n) => {
        extra.push(n);
      });

      journal.emit(EMITTER, wrapped(1n));
      sub.unsubscribe();
      journal.emit(EMITTER, wrapped(2n));

      expect(extra).toHaveLength(1);
      expect(delivered).toHaveLength(2);
    });
  });
});
