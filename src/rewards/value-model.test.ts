/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { strict as assert } from 'node:assert';
import { describe, it } from 'node:test';

import { ContentSource, HOUR_MS } from '../constants.js';
import type { RewardDistributionModel } from '../types.js';
import { RewardValueModel } from './value-model.js';

const model: RewardDistributionModel = {
  maxAgeHours: 10,
  sources: {
    [ContentSource.Reddit]: {
      weight: 0.5,
      defaultScaleFactor: 0.5,
      labelScaleFactors: { 'r/good': 1, 'r/bad': -1 },
    },
  },
};

const NOW_BUCKET = 100;
const valueModel = new RewardValueModel({
  model,
  clock: () => NOW_BUCKET * HOUR_MS + 30 * 60 * 1000,
});

const reddit = (timeBucketId: number, label?: string) => ({
  timeBucketId,
  source: ContentSource.Reddit,
  ...(label !== undefined && { label }),
});

describe('RewardValueModel', () => {
  it('should weight bytes by source and label', () => {
    assert.equal(valueModel.score(reddit(NOW_BUCKET, 'r/good'), 200), 100);
    assert.equal(valueModel.score(reddit(NOW_BUCKET, 'R/Good '), 200), 100);
  });

  it('should use the default factor for unlisted or missing labels', () => {
    assert.equal(valueModel.score(reddit(NOW_BUCKET, 'r/other'), 200), 50);
    assert.equal(valueModel.score(reddit(NOW_BUCKET), 200), 50);
  });

  it('should allow penalizing labels', () => {
    assert.equal(valueModel.score(reddit(NOW_BUCKET, 'r/bad'), 200), -100);
  });

  it('should give nothing for sources without a reward entry', () => {
    assert.equal(
      valueModel.score(
        { timeBucketId: NOW_BUCKET, source: ContentSource.X },
        200,
      ),
      0,
    );
  });

  describe('age depreciation', () => {
    it('should depreciate linearly down to one half at the max age', () => {
      assert.equal(valueModel.ageScaleFactor(NOW_BUCKET), 1);
      assert.equal(valueModel.ageScaleFactor(NOW_BUCKET - 5), 0.75);
      assert.equal(valueModel.ageScaleFactor(NOW_BUCKET - 10), 0.5);
      assert.equal(valueModel.score(reddit(NOW_BUCKET - 5, 'r/good'), 200), 75);
    });

    it('should value data older than the max age at zero', () => {
      assert.equal(valueModel.ageScaleFactor(NOW_BUCKET - 11), 0);
      assert.equal(valueModel.score(reddit(NOW_BUCKET - 11, 'r/good'), 200), 0);
    });

    it('should treat future buckets as current', () => {
      assert.equal(valueModel.ageScaleFactor(NOW_BUCKET + 3), 1);
    });
  });
});
