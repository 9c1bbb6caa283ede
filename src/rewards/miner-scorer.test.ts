/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { strict as assert } from 'node:assert';
import { beforeEach, describe, it } from 'node:test';
import winston from 'winston';

import { ContentSource } from '../constants.js';
import { toMsgpack } from '../lib/encoding.js';
import { ContractViolationError, StateLoadError } from '../lib/error.js';
import type { ScorableMinerIndex, ValueModel } from '../types.js';
import {
  CREDIBLE_THRESHOLD,
  MinerScorer,
  STARTING_CREDIBILITY,
} from './miner-scorer.js';

const log = winston.createLogger({ silent: true });

// Every scorable byte is worth exactly one unit of reward
const byteValueModel: ValueModel = {
  score: (_bucketId, bytes) => bytes,
};

const index = (scorableBytes: number[]): ScorableMinerIndex => ({
  hotkey: 'hotkey-1',
  lastUpdated: 0,
  scorableBuckets: scorableBytes.map((bytes, position) => ({
    id: { timeBucketId: position, source: ContentSource.Reddit },
    sizeBytes: bytes,
    scorableBytes: bytes,
  })),
});

const valid = { isValid: true, reason: '' };
const invalid = { isValid: false, reason: 'Content mismatch' };

function assertClose(actual: number, expected: number): void {
  assert.ok(
    Math.abs(actual - expected) < 1e-9,
    `expected ${expected}, got ${actual}`,
  );
}

describe('MinerScorer', () => {
  let scorer: MinerScorer;

  beforeEach(() => {
    scorer = new MinerScorer({ log, valueModel: byteValueModel, minerCount: 3 });
  });

  it('should start every miner at zero score and starting credibility', async () => {
    assert.deepEqual(await scorer.getScores(), [0, 0, 0]);
    assert.deepEqual(await scorer.getCredibilities(), [
      STARTING_CREDIBILITY,
      STARTING_CREDIBILITY,
      STARTING_CREDIBILITY,
    ]);
  });

  it('should reject an alpha outside (0, 1]', () => {
    assert.throws(
      () => new MinerScorer({ log, valueModel: byteValueModel, alpha: 0 }),
      ContractViolationError,
    );
    assert.throws(
      () => new MinerScorer({ log, valueModel: byteValueModel, alpha: 1.5 }),
      ContractViolationError,
    );
  });

  describe('onMinerEvaluated', () => {
    it('should weight the reward by the updated credibility squared', async () => {
      await scorer.onMinerEvaluated(1, index([100]), [valid]);

      const { score, credibility } = await scorer.getMinerTrust(1);
      // 0.05 * 1 + 0.95 * 0.5
      assertClose(credibility, 0.525);
      // 0.05 * 100 * 0.525^2
      assertClose(score, 1.378125);
    });

    it('should lower credibility by the fraction of failed results', async () => {
      await scorer.onMinerEvaluated(0, index([100]), [valid, invalid]);

      const { score, credibility } = await scorer.getMinerTrust(0);
      // 0.05 * 0.5 + 0.95 * 0.5
      assertClose(credibility, 0.5);
      assertClose(score, 0.05 * 100 * 0.25);
    });

    it('should never produce a negative reward', async () => {
      const penalizing: ValueModel = { score: (_id, bytes) => -bytes };
      const penalized = new MinerScorer({
        log,
        valueModel: penalizing,
        minerCount: 1,
      });

      await penalized.onMinerEvaluated(0, index([100, 50]), [valid]);
      assert.equal((await penalized.getMinerTrust(0)).score, 0);
    });

    it('should score only scorable bytes', async () => {
      await scorer.onMinerEvaluated(
        2,
        {
          hotkey: 'hotkey-2',
          lastUpdated: 0,
          scorableBuckets: [
            {
              id: { timeBucketId: 1, source: ContentSource.X },
              sizeBytes: 500,
              scorableBytes: 100,
            },
          ],
        },
        [valid],
      );
      assertClose((await scorer.getMinerTrust(2)).score, 1.378125);
    });

    it('should leave other miners untouched', async () => {
      await scorer.onMinerEvaluated(1, index([100]), [valid]);
      const scores = await scorer.getScores();
      assert.equal(scores[0], 0);
      assert.equal(scores[2], 0);
    });

    it('should require at least one validation result', async () => {
      await assert.rejects(
        scorer.onMinerEvaluated(0, index([100]), []),
        (error: unknown) =>
          error instanceof ContractViolationError &&
          error.message === 'Must be provided at least 1 validation result',
      );
    });

    it('should reject unknown uids', async () => {
      await assert.rejects(
        scorer.onMinerEvaluated(3, index([100]), [valid]),
        /Unknown miner uid 3/,
      );
    });

    it('should converge credibility towards one for honest miners', async () => {
      for (let i = 0; i < 100; i++) {
        await scorer.onMinerEvaluated(0, index([100]), [valid]);
      }
      const { credibility } = await scorer.getMinerTrust(0);
      assert.ok(credibility > 0.99 && credibility <= 1);
    });
  });

  describe('getCredibleMiners', () => {
    it('should list miners at or above the threshold', async () => {
      assert.deepEqual(await scorer.getCredibleMiners(), []);

      // 0.5 * 0.95^n + (1 - 0.95^n) >= 0.8 after 18 valid evaluations
      for (let i = 0; i < 18; i++) {
        await scorer.onMinerEvaluated(2, index([1]), [valid]);
      }
      assert.ok((await scorer.getMinerTrust(2)).credibility >= CREDIBLE_THRESHOLD);
      assert.deepEqual(await scorer.getCredibleMiners(), [2]);
    });
  });

  describe('reset', () => {
    it('should restore the starting trust of a single uid', async () => {
      await scorer.onMinerEvaluated(1, index([100]), [valid]);
      await scorer.reset(1);

      assert.deepEqual(await scorer.getMinerTrust(1), {
        score: 0,
        credibility: STARTING_CREDIBILITY,
      });
    });
  });

  describe('resize', () => {
    it('should grow with fresh entries and keep existing ones', async () => {
      await scorer.onMinerEvaluated(0, index([100]), [valid]);
      await scorer.resize(5);

      const scores = await scorer.getScores();
      assert.equal(scores.length, 5);
      assertClose(scores[0], 1.378125);
      assert.equal(scores[4], 0);
      assert.equal((await scorer.getCredibilities())[4], STARTING_CREDIBILITY);
    });

    it('should refuse to shrink', async () => {
      await assert.rejects(
        scorer.resize(2),
        (error: unknown) =>
          error instanceof ContractViolationError &&
          error.message ===
            'Tried to downsize the number of miners from 3 to 2',
      );
      assert.equal(await scorer.getMinerCount(), 3);
    });
  });

  describe('serialize and restore', () => {
    it('should restore the trust state exactly', async () => {
      await scorer.onMinerEvaluated(1, index([100]), [valid]);
      const state = await scorer.serialize();

      const restored = new MinerScorer({ log, valueModel: byteValueModel });
      await restored.restore(state);

      assert.deepEqual(await restored.getScores(), await scorer.getScores());
      assert.deepEqual(
        await restored.getCredibilities(),
        await scorer.getCredibilities(),
      );
    });

    it('should reject state with mismatched lengths', async () => {
      await assert.rejects(
        scorer.restore(
          toMsgpack({ version: 1, scores: [0, 0], credibility: [0.5] }),
        ),
        StateLoadError,
      );
    });

    it('should reject state with credibility out of range', async () => {
      await assert.rejects(
        scorer.restore(toMsgpack({ version: 1, scores: [0], credibility: [2] })),
        StateLoadError,
      );
    });

    it('should reject bytes that are not scorer state', async () => {
      await assert.rejects(
        scorer.restore(Buffer.from([0xc1])),
        StateLoadError,
      );
      await assert.rejects(scorer.restore(toMsgpack('hello')), StateLoadError);
    });
  });
});
