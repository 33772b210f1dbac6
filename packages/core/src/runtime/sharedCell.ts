/**
 * packages/core/src/runtime/sharedCell.ts — Exclusive-access configuration cell.
 *
 * Why: A widget's public handle and its view-owned element both reach the same
 * configuration. Event handlers run synchronously and may call back into user
 * code, so the cell enforces a strict non-reentrant borrow discipline instead
 * of trusting call order:
 *
 *   - read():  shared access; nested reads are allowed
 *   - write(): exclusive access; refused while any borrow is active
 *   - read() during write(): refused
 *
 * Access is scoped to the callback and always released, even when the
 * callback throws. A refused borrow is a programming error and throws
 * VELLUM_REENTRANT_BORROW.
 */

import { VellumError } from "../errors.js";

export interface SharedCell<T> {
  read<R>(fn: (value: Readonly<T>) => R): R;
  write<R>(fn: (value: T) => R): R;
  isBorrowed(): boolean;
}

class SharedCellImpl<T> implements SharedCell<T> {
  /* >0: that many shared borrows, -1: exclusively borrowed, 0: free */
  private borrows = 0;

  constructor(private readonly value: T) {}

  read<R>(fn: (value: Readonly<T>) => R): R {
    if (this.borrows < 0) {
      throw new VellumError(
        "VELLUM_REENTRANT_BORROW",
        "SharedCell.read: cell is exclusively borrowed by an active write",
      );
    }
    this.borrows++;
    try {
      return fn(this.value);
    } finally {
      this.borrows--;
    }
  }

  write<R>(fn: (value: T) => R): R {
    if (this.borrows !== 0) {
      throw new VellumError(
        "VELLUM_REENTRANT_BORROW",
        this.borrows < 0
          ? "SharedCell.write: cell is already exclusively borrowed"
          : "SharedCell.write: cell has active read borrows",
      );
    }
    this.borrows = -1;
    try {
      return fn(this.value);
    } finally {
      this.borrows = 0;
    }
  }

  isBorrowed(): boolean {
    return this.borrows !== 0;
  }
}

export function createSharedCell<T>(value: T): SharedCell<T> {
  return new SharedCellImpl(value);
}
