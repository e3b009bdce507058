/**
 * @coinwrap/ledger — Shared state journal.
 *
 * Every component of a deployment (coin ledger, token ledger, wrapper)
 * writes through one Journal. The journal gives each operation
 * all-or-nothing semantics in a single sequential state:
 *
 * - atomic() opens a scope; every write inside records an undo action
 * - a throw rolls back every write made since the scope opened,
 *   including writes made by nested re-entrant calls, then rethrows
 * - nested scopes behave like sub-calls: a nested failure that the
 *   outer code catches rolls back only the nested writes
 * - notifications are buffered and delivered only when the outermost
 *   scope commits; a throwing subscriber does not undo the commit or
 *   stop delivery to the others
 *
 * Scopes must be synchronous. There is no locking: re-entrant calls see
 * the uncommitted state of the operation that called them.
 */

import type { Address, CommittedNotification, Notification } from "@coinwrap/types";
import type { NotificationHandler, Subscription, UndoAction } from "./types.js";

interface PendingNotification {
  readonly emitter: Address;
  readonly notification: Notification;
}

export class Journal {
  private readonly _undo: UndoAction[] = [];
  private _pending: PendingNotification[] = [];
  private readonly _handlers = new Set<NotificationHandler>();
  private _depth = 0;
  private _position = 0;

  /**
   * Number of open scopes (0 when idle).
   */
  get depth(): number {
    return this._depth;
  }

  /**
   * Position of the last committed notification (0 when none).
   */
  get position(): number {
    return this._position;
  }

  // ─── Scopes ──────────────────────────────────────────────────────────

  /**
   * Run `fn` as one atomic unit.
   *
   * Returns its result when it completes; rolls back its writes and
   * rethrows when it throws.
   */
  atomic<T>(fn: () => T): T {
    const undoMark = this._undo.length;
    const pendingMark = this._pending.length;

    this._depth++;
    let result: T;
    try {
      result = fn();
    } catch (err) {
      this._rollbackTo(undoMark);
      this._pending.length = pendingMark;
      throw err;
    } finally {
      this._depth--;
    }

    if (this._depth === 0) {
      this._commit();
    }
    return result;
  }

  /**
   * Record how to reverse a write that just happened.
   * Outside any scope a write is final and nothing is recorded.
   */
  record(undo: UndoAction): void {
    if (this._depth > 0) {
      this._undo.push(undo);
    }
  }

  // ─── Notifications ───────────────────────────────────────────────────

  /**
   * Queue a notification for delivery on commit.
   * Outside any scope it is delivered immediately.
   */
  emit(emitter: Address, notification: Notification): void {
    this._pending.push({ emitter, notification });
    if (this._depth === 0) {
      this._commit();
    }
  }

  /**
   * Subscribe to every committed notification.
   */
  subscribe(handler: NotificationHandler): Subscription {
    this._handlers.add(handler);
    return {
      unsubscribe: () => {
        this._handlers.delete(handler);
      },
    };
  }

  // ─── Private ─────────────────────────────────────────────────────────

  private _rollbackTo(mark: number): void {
    while (this._undo.length > mark) {
      const undo = this._undo.pop();
      if (undo !== undefined) {
        undo();
      }
    }
  }

  private _commit(): void {
    this._undo.length = 0;

    const batch = this._pending;
    this._pending = [];
    const committedAt = new Date().toISOString();

    // Every committed notification gets a position and reaches every
    // handler; the first handler error is rethrown afterwards.
    let failure: { readonly error: unknown } | undefined;
    for (const { emitter, notification } of batch) {
      this._position++;
      const committed: CommittedNotification = {
        ...notification,
        metadata: { emitter, position: this._position, committedAt },
      };
      for (const handler of this._handlers) {
        try {
          handler(committed);
        } catch (err) {
          failure ??= { error: err };
        }
      }
    }
    if (failure !== undefined) {
      throw failure.error;
    }
  }
}
