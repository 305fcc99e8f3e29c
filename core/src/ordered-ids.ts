/**
 * Ordered registry of entries keyed by a unique id.
 *
 * Entries live in an array in execution order, with an id → position index
 * kept in lockstep. Every mutation validates first and only then touches
 * the array, so a failed call leaves the registry as it was.
 */

import { StackError } from "./errors.js";

/** Placement relative to the whole registry (add) or to an anchor (insert). */
export const RelativePosition = {
  Before: "before",
  After: "after",
} as const;

export type RelativePosition = (typeof RelativePosition)[keyof typeof RelativePosition];

export interface Identified {
  readonly id: string;
}

export class OrderedIds<T extends Identified> {
  private entries: T[] = [];
  private index = new Map<string, number>();

  get size(): number {
    return this.entries.length;
  }

  has(id: string): boolean {
    return this.index.has(id);
  }

  get(id: string): T | undefined {
    const pos = this.index.get(id);
    return pos === undefined ? undefined : this.entries[pos];
  }

  /**
   * Adds the entry in front of (Before) or behind (After) everything
   * currently present.
   */
  add(entry: T, pos: RelativePosition): void {
    this.assertNew(entry.id);

    if (pos === RelativePosition.Before) {
      this.entries.unshift(entry);
    } else {
      this.entries.push(entry);
    }
    this.reindex();
  }

  /**
   * Inserts the entry immediately before or after the entry `anchorId`.
   */
  insert(entry: T, anchorId: string, pos: RelativePosition): void {
    this.assertNew(entry.id);

    const anchor = this.index.get(anchorId);
    if (anchor === undefined) {
      throw new StackError({
        code: "ANCHOR_NOT_FOUND",
        message: `Cannot insert "${entry.id}" relative to "${anchorId}": no such id`,
        details: { id: entry.id, anchorId },
      });
    }

    const at = pos === RelativePosition.Before ? anchor : anchor + 1;
    this.entries.splice(at, 0, entry);
    this.reindex();
  }

  /**
   * Replaces the entry `id` with `entry` at the same position. Returns the
   * entry that was removed.
   */
  swap(id: string, entry: T): T {
    assertValidId(entry.id);

    const pos = this.index.get(id);
    if (pos === undefined) {
      throw notFound(id);
    }

    const existing = this.index.get(entry.id);
    if (existing !== undefined && existing !== pos) {
      throw duplicate(entry.id);
    }

    const removed = this.entries[pos];
    this.entries[pos] = entry;
    this.index.delete(id);
    this.index.set(entry.id, pos);
    return removed;
  }

  /** Removes the entry `id`, keeping the order of the others. */
  remove(id: string): T {
    const pos = this.index.get(id);
    if (pos === undefined) {
      throw notFound(id);
    }

    const [removed] = this.entries.splice(pos, 1);
    this.reindex();
    return removed;
  }

  clear(): void {
    this.entries = [];
    this.index.clear();
  }

  /** Snapshot of the entries in order. Later mutations do not affect it. */
  getOrder(): ReadonlyArray<T> {
    return [...this.entries];
  }

  ids(): string[] {
    return this.entries.map((e) => e.id);
  }

  private assertNew(id: string): void {
    assertValidId(id);
    if (this.index.has(id)) {
      throw duplicate(id);
    }
  }

  private reindex(): void {
    this.index.clear();
    this.entries.forEach((e, i) => this.index.set(e.id, i));
  }
}

function assertValidId(id: string): void {
  if (typeof id !== "string" || id.length === 0) {
    throw new StackError({
      code: "INVALID_ID",
      message: "Middleware id must be a non-empty string",
      details: { id },
    });
  }
}

function duplicate(id: string): StackError {
  return new StackError({
    code: "DUPLICATE_ID",
    message: `Middleware "${id}" already exists`,
    details: { id },
  });
}

function notFound(id: string): StackError {
  return new StackError({
    code: "NOT_FOUND",
    message: `Middleware "${id}" not found`,
    details: { id },
  });
}
