/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { contentSourceNames } from '../constants.js';
import { labelsMatch } from '../lib/content-label.js';
import { ContractViolationError } from '../lib/error.js';
import {
  formatRange,
  formatTimestamp,
  isInRange,
  timeBucketRange,
} from '../lib/time-bucket.js';
import {
  type RandomFunction,
  randomWeightedChoice,
} from '../lib/weighted-choice.js';
import type {
  BatchValidation,
  ClaimedBucket,
  ContentItem,
  ScorableBucket,
  ScorableMinerIndex,
} from '../types.js';

/**
 * Picks the bucket to audit. Buckets are weighted by claimed size so that
 * large claims get proportionally more scrutiny.
 */
export function chooseBucket(
  index: ScorableMinerIndex,
  randomFunction: RandomFunction = Math.random,
): ScorableBucket {
  const bucket = randomWeightedChoice({
    table: index.scorableBuckets,
    weightOf: (b) => b.sizeBytes,
    randomFunction,
  });

  if (bucket === undefined) {
    throw new ContractViolationError(
      'Cannot choose a bucket from an index with no claimed bytes',
      { hotkey: index.hotkey, bucketCount: index.scorableBuckets.length },
    );
  }
  return bucket;
}

/**
 * Picks the entities whose content is re-verified against its source. One
 * entity is chosen, weighted by claimed content size.
 */
export function chooseEntities(
  entities: readonly ContentItem[],
  randomFunction: RandomFunction = Math.random,
): ContentItem[] {
  const entity = randomWeightedChoice({
    table: entities,
    weightOf: (e) => e.contentSizeBytes,
    randomFunction,
  });

  if (entity === undefined) {
    throw new ContractViolationError(
      'Cannot choose entities from a batch with no claimed bytes',
      { entityCount: entities.length },
    );
  }
  return [entity];
}

/**
 * Checks that every returned entity belongs to the requested bucket and that
 * the miner actually produced at least as many bytes as it claimed. A single
 * non-conforming entity fails the whole batch.
 */
export function validateBatch(
  entities: readonly ContentItem[],
  bucket: ClaimedBucket,
): BatchValidation {
  const expectedRange = timeBucketRange(bucket.id.timeBucketId);
  let actualSize = 0;
  let claimedSize = 0;

  for (const entity of entities) {
    actualSize += entity.content.length;
    claimedSize += entity.contentSizeBytes;

    if (entity.source !== bucket.id.source) {
      return {
        valid: false,
        reason: `Entity source ${contentSourceNames[entity.source]} does not match chunk source ${contentSourceNames[bucket.id.source]}`,
      };
    }
    if (!labelsMatch(entity.label, bucket.id.label)) {
      return {
        valid: false,
        reason: `Entity label ${entity.label ?? '<none>'} does not match chunk label ${bucket.id.label ?? '<none>'}`,
      };
    }
    if (!isInRange(expectedRange, entity.timestamp)) {
      return {
        valid: false,
        reason: `Entity timestamp ${formatTimestamp(entity.timestamp)} is not in the expected range ${formatRange(expectedRange)}`,
      };
    }
  }

  if (actualSize < claimedSize || actualSize < bucket.sizeBytes) {
    return {
      valid: false,
      reason: `Size not as expected. Actual=${actualSize}. Claimed=${claimedSize}. Expected=${bucket.sizeBytes}`,
    };
  }

  return { valid: true, reason: '' };
}
