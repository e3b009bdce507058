/**
 * @coinwrap/ledger — Journaled state containers.
 *
 * The only mutable state in the ledgers lives in these containers.
 * Each write records its own undo action in the shared Journal, so a
 * failed operation leaves no trace.
 */

import type { Journal } from "./journal.js";

/**
 * A Map whose writes can be rolled back.
 */
export class JournaledMap<K, V> {
  private readonly _entries = new Map<K, V>();

  constructor(private readonly journal: Journal) {}

  get(key: K): V | undefined {
    return this._entries.get(key);
  }

  has(key: K): boolean {
    return this._entries.has(key);
  }

  get size(): number {
    return this._entries.size;
  }

  entries(): readonly (readonly [K, V])[] {
    return [...this._entries.entries()];
  }

  set(key: K, value: V): void {
    const existed = this._entries.has(key);
    const previous = this._entries.get(key);
    this._entries.set(key, value);
    this.journal.record(() => {
      if (existed && previous !== undefined) {
        this._entries.set(key, previous);
      } else {
        this._entries.delete(key);
      }
    });
  }

  delete(key: K): void {
    if (!this._entries.has(key)) {
      return;
    }
    const previous = this._entries.get(key);
    this._entries.delete(key);
    this.journal.record(() => {
      if (previous !== undefined) {
        this._entries.set(key, previous);
      }
    });
  }
}

/**
 * A single value whose writes can be rolled back.
 */
export class JournaledCell<T> {
  private _value: T;

  constructor(
    private readonly journal: Journal,
    initial: T,
  ) {
    this._value = initial;
  }

  get value(): T {
    return this._value;
  }

  set(value: T): void {
    const previous = this._value;
    this._value = value;
    this.journal.record(() => {
      this._value = previous;
    });
  }
}
