/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { bucketKey } from '../lib/content-label.js';
import type {
  ScorableBucket,
  ScorableMinerIndex,
  StoredMinerIndex,
} from '../types.js';

type CredibleClaim = { hotkey: string; sizeBytes: number };

/**
 * Credible miners rank by hotkey, lexicographically smallest first. A
 * non-credible miner ranks below every credible miner and never outranks
 * anyone.
 */
function outranks({
  other,
  hotkey,
  hotkeyIsCredible,
  credibleHotkeys,
}: {
  other: string;
  hotkey: string;
  hotkeyIsCredible: boolean;
  credibleHotkeys: ReadonlySet<string>;
}): boolean {
  if (other === hotkey || !credibleHotkeys.has(other)) {
    return false;
  }
  return !hotkeyIsCredible || other < hotkey;
}

function indexCredibleClaims(
  indexes: readonly StoredMinerIndex[],
  credibleHotkeys: ReadonlySet<string>,
  keys: ReadonlySet<string>,
): Map<string, CredibleClaim[]> {
  const claimsByKey = new Map<string, CredibleClaim[]>();

  for (const index of indexes) {
    if (!credibleHotkeys.has(index.hotkey)) {
      continue;
    }
    for (const bucket of index.buckets) {
      const key = bucketKey(bucket.id);
      if (!keys.has(key)) {
        continue;
      }
      const claims = claimsByKey.get(key);
      if (claims === undefined) {
        claimsByKey.set(key, [{ hotkey: index.hotkey, sizeBytes: bucket.sizeBytes }]);
      } else {
        claims.push({ hotkey: index.hotkey, sizeBytes: bucket.sizeBytes });
      }
    }
  }

  return claimsByKey;
}

function scorableView(
  index: StoredMinerIndex,
  claimsByKey: ReadonlyMap<string, CredibleClaim[]>,
  credibleHotkeys: ReadonlySet<string>,
): ScorableMinerIndex {
  const hotkeyIsCredible = credibleHotkeys.has(index.hotkey);
  const scorableBuckets: ScorableBucket[] = [];
  const seenKeys = new Set<string>();

  for (const bucket of index.buckets) {
    const key = bucketKey(bucket.id);
    if (seenKeys.has(key)) {
      continue;
    }
    seenKeys.add(key);

    let coveredBytes = 0;
    for (const claim of claimsByKey.get(key) ?? []) {
      if (
        outranks({
          other: claim.hotkey,
          hotkey: index.hotkey,
          hotkeyIsCredible,
          credibleHotkeys,
        })
      ) {
        coveredBytes = Math.max(coveredBytes, claim.sizeBytes);
      }
    }

    const scorableBytes = Math.max(0, bucket.sizeBytes - coveredBytes);
    if (scorableBytes > 0) {
      scorableBuckets.push({ ...bucket, scorableBytes });
    }
  }

  return {
    hotkey: index.hotkey,
    scorableBuckets,
    lastUpdated: index.lastUpdated,
  };
}

/**
 * Computes the part of one miner's index that earns reward.
 *
 * Each claimed bucket is truncated by the largest claim on the same
 * (time bucket, source, label) key made by a higher ranked credible miner.
 * Buckets left with no scorable bytes are dropped. Summed over the credible
 * miners of a key, scorable bytes equal the largest credible claim, so
 * duplicated content is never paid twice.
 *
 * Returns undefined when the miner has no stored index.
 */
export function computeScorableIndex({
  hotkey,
  indexes,
  credibleHotkeys,
}: {
  hotkey: string;
  indexes: readonly StoredMinerIndex[];
  credibleHotkeys: ReadonlySet<string>;
}): ScorableMinerIndex | undefined {
  const index = indexes.find((candidate) => candidate.hotkey === hotkey);
  if (index === undefined) {
    return undefined;
  }

  const keys = new Set(index.buckets.map((bucket) => bucketKey(bucket.id)));
  const claimsByKey = indexCredibleClaims(indexes, credibleHotkeys, keys);
  return scorableView(index, claimsByKey, credibleHotkeys);
}

export function scorableSizeBytes(index: ScorableMinerIndex): number {
  return index.scorableBuckets.reduce((total, bucket) => total + bucket.sizeBytes, 0);
}
