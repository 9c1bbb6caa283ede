/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import type { RandomFunction } from '../lib/weighted-choice.js';

/**
 * Cycles over miner uids in ascending order, wrapping at the end. The
 * starting position is random so restarted validators do not all begin with
 * the same miner.
 */
export class MinerIterator {
  private uids: number[] = [];
  private cursor = 0;

  constructor({
    uids = [],
    randomFunction = Math.random,
  }: {
    uids?: readonly number[];
    randomFunction?: RandomFunction;
  } = {}) {
    this.uids = [...new Set(uids)].sort((a, b) => a - b);
    this.cursor =
      this.uids.length > 0
        ? Math.min(
            Math.floor(randomFunction() * this.uids.length),
            this.uids.length - 1,
          )
        : 0;
  }

  size(): number {
    return this.uids.length;
  }

  peek(): number | undefined {
    return this.uids[this.cursor];
  }

  next(): number | undefined {
    const uid = this.uids[this.cursor];
    if (uid !== undefined) {
      this.cursor = (this.cursor + 1) % this.uids.length;
    }
    return uid;
  }

  // Keeps the rotation position: resumes at the current uid, or the next
  // larger one when the current uid is gone
  setMinerUids(uids: readonly number[]): void {
    const current = this.peek();
    this.uids = [...new Set(uids)].sort((a, b) => a - b);

    if (current === undefined || this.uids.length === 0) {
      this.cursor = 0;
      return;
    }

    const resumeAt = this.uids.findIndex((uid) => uid >= current);
    this.cursor = resumeAt === -1 ? 0 : resumeAt;
  }
}
