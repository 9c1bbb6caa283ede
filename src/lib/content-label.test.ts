/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { strict as assert } from 'node:assert';
import { describe, it } from 'node:test';

import { ContentSource } from '../constants.js';
import { bucketKey, labelsMatch, normalizeLabel } from './content-label.js';

describe('normalizeLabel', () => {
  it('should trim and lower case labels', () => {
    assert.equal(normalizeLabel('  #Bitcoin '), '#bitcoin');
  });

  it('should treat blank labels as absent', () => {
    assert.equal(normalizeLabel('   '), undefined);
    assert.equal(normalizeLabel(undefined), undefined);
  });
});

describe('labelsMatch', () => {
  it('should compare normalized labels', () => {
    assert.equal(labelsMatch('r/Bitcoin', 'r/bitcoin'), true);
    assert.equal(labelsMatch('', undefined), true);
    assert.equal(labelsMatch('r/bitcoin', undefined), false);
  });
});

describe('bucketKey', () => {
  it('should identify buckets by hour, source and normalized label', () => {
    assert.equal(
      bucketKey({
        timeBucketId: 480000,
        source: ContentSource.Reddit,
        label: ' R/Bitcoin',
      }),
      '480000:1:r/bitcoin',
    );
    assert.equal(
      bucketKey({ timeBucketId: 480000, source: ContentSource.X }),
      '480000:2:',
    );
  });
});
