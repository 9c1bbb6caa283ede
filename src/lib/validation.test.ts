/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { strict as assert } from 'node:assert';
import { describe, it } from 'node:test';

import { ContentSource } from '../constants.js';
import {
  sanityCheckContentResponse,
  sanityCheckMinerIndexResponse,
  sanityCheckParticipantTable,
  sanityCheckValidationResult,
} from './validation.js';

describe('sanityCheckMinerIndexResponse', () => {
  it('should parse flat buckets and normalize labels', () => {
    const index = sanityCheckMinerIndexResponse({
      buckets: [
        { timeBucketId: 5, source: 1, label: ' R/Bittensor_ ', sizeBytes: 100 },
        { timeBucketId: 6, source: 2, sizeBytes: 0 },
        { timeBucketId: 7, source: 2, label: '   ', sizeBytes: 3 },
      ],
    });

    assert.deepEqual(index.buckets, [
      {
        id: { timeBucketId: 5, source: ContentSource.Reddit, label: 'r/bittensor_' },
        sizeBytes: 100,
      },
      { id: { timeBucketId: 6, source: ContentSource.X }, sizeBytes: 0 },
      { id: { timeBucketId: 7, source: ContentSource.X }, sizeBytes: 3 },
    ]);
  });

  it('should reject unknown sources', () => {
    assert.throws(
      () =>
        sanityCheckMinerIndexResponse({
          buckets: [{ timeBucketId: 5, source: 9, sizeBytes: 1 }],
        }),
      /unknown 'source' 9/,
    );
  });

  it('should reject negative or fractional sizes', () => {
    assert.throws(
      () =>
        sanityCheckMinerIndexResponse({
          buckets: [{ timeBucketId: 5, source: 1, sizeBytes: -1 }],
        }),
      /'sizeBytes' must be a non-negative integer/,
    );
    assert.throws(
      () =>
        sanityCheckMinerIndexResponse({
          buckets: [{ timeBucketId: 5, source: 1, sizeBytes: 1.5 }],
        }),
      /'sizeBytes' must be a non-negative integer/,
    );
  });

  it('should reject responses without buckets', () => {
    assert.throws(
      () => sanityCheckMinerIndexResponse({}),
      /missing 'buckets'/,
    );
  });
});

describe('sanityCheckContentResponse', () => {
  it('should decode base64 content', () => {
    const response = sanityCheckContentResponse({
      items: [
        {
          uri: 'https://example.com/post/1',
          timestamp: 1000,
          source: 2,
          label: '#TAO',
          content: Buffer.from('hello').toString('base64'),
          contentSizeBytes: 5,
        },
      ],
    });

    assert.equal(response.items.length, 1);
    const [item] = response.items;
    assert.equal(item.content.toString('utf8'), 'hello');
    assert.equal(item.label, '#tao');
    assert.equal(item.source, ContentSource.X);
  });

  it('should reject items without a uri', () => {
    assert.throws(
      () =>
        sanityCheckContentResponse({
          items: [{ timestamp: 1, source: 1, content: '', contentSizeBytes: 0 }],
        }),
      /missing 'uri'/,
    );
  });
});

describe('sanityCheckParticipantTable', () => {
  const participant = {
    uid: 0,
    hotkey: 'hotkey-0',
    endpoint: 'http://localhost:9000',
    stake: 10,
    validatorPermit: false,
    validatorTrust: 0,
  };

  it('should accept a bare array or a wrapped table', () => {
    assert.deepEqual(sanityCheckParticipantTable([participant]), [participant]);
    assert.deepEqual(
      sanityCheckParticipantTable({ participants: [participant] }),
      [participant],
    );
  });

  it('should reject participants without a hotkey', () => {
    assert.throws(
      () => sanityCheckParticipantTable([{ ...participant, hotkey: '' }]),
      /missing 'hotkey'/,
    );
  });
});

describe('sanityCheckValidationResult', () => {
  it('should default the reason to an empty string', () => {
    assert.deepEqual(sanityCheckValidationResult({ isValid: true }), {
      isValid: true,
      reason: '',
    });
  });

  it('should reject results without isValid', () => {
    assert.throws(
      () => sanityCheckValidationResult({ reason: 'ok' }),
      /missing 'isValid'/,
    );
  });
});
