/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */

/**
 * An async mutual exclusion lock. Waiters are granted the lock in FIFO order.
 *
 * Usage:
 *   const mutex = new Mutex();
 *
 *   const value = await mutex.runExclusive(() => {
 *     // ... read/modify/write shared state ...
 *   });
 */
export class Mutex {
  private locked = false;
  private waiting: Array<() => void> = [];

  acquire(): Promise<void> {
    if (!this.locked) {
      this.locked = true;
      return Promise.resolve();
    }

    return new Promise<void>((resolve) => {
      this.waiting.push(resolve);
    });
  }

  release(): void {
    const next = this.waiting.shift();
    if (next) {
      // Ownership passes straight to the next waiter
      next();
    } else {
      this.locked = false;
    }
  }

  async runExclusive<T>(critical: () => T | Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await critical();
    } finally {
      this.release();
    }
  }

  isLocked(): boolean {
    return this.locked;
  }

  queueLength(): number {
    return this.waiting.length;
  }
}
