/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import winston from 'winston';

import { fromMsgpack, toMsgpack } from '../lib/encoding.js';
import {
  ContractViolationError,
  StateLoadError,
  errorMessage,
} from '../lib/error.js';
import { Mutex } from '../lib/mutex.js';
import { isRecord } from '../lib/validation.js';
import type {
  ScorableMinerIndex,
  ValidationResult,
  ValueModel,
} from '../types.js';

// New miners start half trusted
export const STARTING_CREDIBILITY = 0.5;

// Minimum credibility for a miner's claims to count against other miners
export const CREDIBLE_THRESHOLD = 0.8;

export const DEFAULT_SCORE_ALPHA = 0.05;

const STATE_VERSION = 1;

export interface MinerTrust {
  score: number;
  credibility: number;
}

function isNumberArray(value: unknown): value is number[] {
  return (
    Array.isArray(value) &&
    value.every((n) => typeof n === 'number' && Number.isFinite(n))
  );
}

/**
 * Tracks the score and credibility of every registered uid.
 *
 * Every read and every read/modify/write runs under a single mutex so a
 * concurrent reader never observes a half applied evaluation. Reads return
 * copies.
 */
export class MinerScorer {
  private log: winston.Logger;
  private valueModel: ValueModel;
  private alpha: number;
  private mutex = new Mutex();

  private scores: number[];
  private credibility: number[];

  constructor({
    log,
    valueModel,
    minerCount = 0,
    alpha = DEFAULT_SCORE_ALPHA,
  }: {
    log: winston.Logger;
    valueModel: ValueModel;
    minerCount?: number;
    alpha?: number;
  }) {
    if (!(alpha > 0 && alpha <= 1)) {
      throw new ContractViolationError('Score alpha must be in (0, 1]', {
        alpha,
      });
    }

    this.log = log.child({ class: this.constructor.name });
    this.valueModel = valueModel;
    this.alpha = alpha;
    this.scores = new Array<number>(minerCount).fill(0);
    this.credibility = new Array<number>(minerCount).fill(STARTING_CREDIBILITY);
  }

  async getScores(): Promise<number[]> {
    return this.mutex.runExclusive(() => [...this.scores]);
  }

  async getCredibilities(): Promise<number[]> {
    return this.mutex.runExclusive(() => [...this.credibility]);
  }

  async getMinerTrust(uid: number): Promise<MinerTrust> {
    return this.mutex.runExclusive(() => {
      this.assertUid(uid);
      return { score: this.scores[uid], credibility: this.credibility[uid] };
    });
  }

  async getMinerCount(): Promise<number> {
    return this.mutex.runExclusive(() => this.scores.length);
  }

  async getCredibleMiners(): Promise<number[]> {
    return this.mutex.runExclusive(() => {
      const credible: number[] = [];
      this.credibility.forEach((value, uid) => {
        if (value >= CREDIBLE_THRESHOLD) {
          credible.push(uid);
        }
      });
      return credible;
    });
  }

  async reset(uid: number): Promise<void> {
    await this.mutex.runExclusive(() => {
      this.assertUid(uid);
      this.scores[uid] = 0;
      this.credibility[uid] = STARTING_CREDIBILITY;
    });
  }

  async resize(minerCount: number): Promise<void> {
    await this.mutex.runExclusive(() => {
      const currentCount = this.scores.length;
      if (!Number.isSafeInteger(minerCount) || minerCount < currentCount) {
        throw new ContractViolationError(
          `Tried to downsize the number of miners from ${currentCount} to ${minerCount}`,
          { currentCount, minerCount },
        );
      }

      for (let uid = currentCount; uid < minerCount; uid++) {
        this.scores.push(0);
        this.credibility.push(STARTING_CREDIBILITY);
      }

      if (minerCount > currentCount) {
        this.log.debug('Resized miner trust state', {
          from: currentCount,
          to: minerCount,
        });
      }
    });
  }

  async onMinerEvaluated(
    uid: number,
    index: ScorableMinerIndex,
    validationResults: ValidationResult[],
  ): Promise<void> {
    if (validationResults.length === 0) {
      throw new ContractViolationError(
        'Must be provided at least 1 validation result',
        { uid },
      );
    }

    await this.mutex.runExclusive(() => {
      this.assertUid(uid);

      const validCount = validationResults.filter((r) => r.isValid).length;
      const fracValid = validCount / validationResults.length;
      this.credibility[uid] =
        this.alpha * fracValid + (1 - this.alpha) * this.credibility[uid];

      let reward = 0;
      for (const bucket of index.scorableBuckets) {
        reward += this.valueModel.score(bucket.id, bucket.scorableBytes);
      }

      // Penalized labels may outweigh the rest of the index but a miner's
      // reward never goes below zero
      reward = Math.max(0, reward);

      // Trust compounds: sustained credibility is needed to keep rewards
      reward *= this.credibility[uid] ** 2;

      this.scores[uid] = this.alpha * reward + (1 - this.alpha) * this.scores[uid];

      this.log.debug('Evaluated miner', {
        uid,
        hotkey: index.hotkey,
        validCount,
        resultCount: validationResults.length,
        reward,
        score: this.scores[uid],
        credibility: this.credibility[uid],
      });
    });
  }

  async serialize(): Promise<Buffer> {
    return this.mutex.runExclusive(() =>
      toMsgpack({
        version: STATE_VERSION,
        scores: this.scores,
        credibility: this.credibility,
      }),
    );
  }

  async restore(buffer: Buffer): Promise<void> {
    let state: unknown;
    try {
      state = fromMsgpack(buffer);
    } catch (error) {
      throw new StateLoadError('Unable to decode scorer state', {
        cause: errorMessage(error),
      });
    }

    if (!isRecord(state) || state.version !== STATE_VERSION) {
      throw new StateLoadError('Unsupported scorer state version');
    }
    const { scores, credibility } = state;
    if (!isNumberArray(scores) || !isNumberArray(credibility)) {
      throw new StateLoadError('Scorer state arrays are malformed');
    }
    if (scores.length !== credibility.length) {
      throw new StateLoadError('Scorer state arrays differ in length', {
        scores: scores.length,
        credibility: credibility.length,
      });
    }
    if (credibility.some((c) => c < 0 || c > 1) || scores.some((s) => s < 0)) {
      throw new StateLoadError('Scorer state values are out of range');
    }

    await this.mutex.runExclusive(() => {
      this.scores = [...scores];
      this.credibility = [...credibility];
    });

    this.log.info('Restored scorer state', { minerCount: scores.length });
  }

  // Requires: the mutex is held
  private assertUid(uid: number): void {
    if (!Number.isSafeInteger(uid) || uid < 0 || uid >= this.scores.length) {
      throw new ContractViolationError(`Unknown miner uid ${uid}`, {
        uid,
        minerCount: this.scores.length,
      });
    }
  }
}
