/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import type { ContentSource } from '../constants.js';
import { normalizeLabel } from '../lib/content-label.js';
import { bucketAgeHours } from '../lib/time-bucket.js';
import type {
  ContentBucketId,
  RewardDistributionModel,
  ValueModel,
} from '../types.js';

/**
 * Values a bucket of claimed content:
 *
 *   weight(source) × labelFactor(source, label) × ageFactor(bucket) × bytes
 *
 * Label factors may be negative to penalize undesirable content. Age is
 * depreciated linearly from 1.0 for the current hour to 0.5 at
 * `maxAgeHours`; anything older is worth nothing.
 */
export class RewardValueModel implements ValueModel {
  private model: RewardDistributionModel;
  private clock: () => number;

  constructor({
    model,
    clock = Date.now,
  }: {
    model: RewardDistributionModel;
    clock?: () => number;
  }) {
    this.model = model;
    this.clock = clock;
  }

  score(bucketId: ContentBucketId, bytes: number): number {
    return (
      this.sourceLabelScaleFactor(bucketId.source, bucketId.label) *
      this.ageScaleFactor(bucketId.timeBucketId) *
      bytes
    );
  }

  sourceLabelScaleFactor(source: ContentSource, label?: string): number {
    const sourceReward = this.model.sources[source];
    if (sourceReward === undefined) {
      return 0;
    }

    const normalized = normalizeLabel(label);
    const labelFactor =
      normalized !== undefined &&
      Object.prototype.hasOwnProperty.call(
        sourceReward.labelScaleFactors,
        normalized,
      )
        ? sourceReward.labelScaleFactors[normalized]
        : sourceReward.defaultScaleFactor;

    return sourceReward.weight * labelFactor;
  }

  ageScaleFactor(timeBucketId: number): number {
    const ageHours = bucketAgeHours(timeBucketId, this.clock());
    if (ageHours > this.model.maxAgeHours) {
      return 0;
    }
    return 1 - ageHours / (2 * this.model.maxAgeHours);
  }
}
