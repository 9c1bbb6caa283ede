/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import winston from 'winston';

import { bucketKey } from '../lib/content-label.js';
import { fromMsgpack, toMsgpack } from '../lib/encoding.js';
import { StateLoadError, errorMessage } from '../lib/error.js';
import { isRecord, sanityCheckMinerIndexResponse } from '../lib/validation.js';
import type {
  ClaimedBucket,
  MinerIndex,
  MinerIndexStore,
  StoredMinerIndex,
} from '../types.js';

const SNAPSHOT_VERSION = 1;

type MinerRecord = {
  index?: StoredMinerIndex;
  lastEvaluated?: number;
};

function uniqueBuckets(buckets: readonly ClaimedBucket[]): ClaimedBucket[] {
  const seen = new Set<string>();
  const unique: ClaimedBucket[] = [];
  for (const bucket of buckets) {
    const key = bucketKey(bucket.id);
    if (!seen.has(key)) {
      seen.add(key);
      unique.push({ id: { ...bucket.id }, sizeBytes: bucket.sizeBytes });
    }
  }
  return unique;
}

function optionalTimestamp(value: unknown): number | undefined {
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

/**
 * Keeps the latest index of every miner in memory. Indexes are replaced
 * wholesale on upsert; the whole store can be exported as an opaque
 * snapshot and restored after a restart.
 */
export class MemoryMinerIndexStore implements MinerIndexStore {
  private log: winston.Logger;
  private records = new Map<string, MinerRecord>();

  constructor({ log }: { log: winston.Logger }) {
    this.log = log.child({ class: this.constructor.name });
  }

  async upsertMinerIndex(index: MinerIndex, updatedAt: number): Promise<void> {
    const record = this.records.get(index.hotkey) ?? {};
    record.index = {
      hotkey: index.hotkey,
      buckets: uniqueBuckets(index.buckets),
      lastUpdated: updatedAt,
    };
    this.records.set(index.hotkey, record);
  }

  async getMinerIndex(hotkey: string): Promise<StoredMinerIndex | undefined> {
    return this.records.get(hotkey)?.index;
  }

  async listMinerIndexes(): Promise<StoredMinerIndex[]> {
    const indexes: StoredMinerIndex[] = [];
    for (const record of this.records.values()) {
      if (record.index !== undefined) {
        indexes.push(record.index);
      }
    }
    return indexes;
  }

  async deleteMinerIndex(hotkey: string): Promise<void> {
    this.records.delete(hotkey);
  }

  async markEvaluated(hotkey: string, evaluatedAt: number): Promise<void> {
    const record = this.records.get(hotkey) ?? {};
    record.lastEvaluated = evaluatedAt;
    this.records.set(hotkey, record);
  }

  async getLastEvaluated(hotkey: string): Promise<number | undefined> {
    return this.records.get(hotkey)?.lastEvaluated;
  }

  toSnapshot(): Buffer {
    const miners = [...this.records.entries()].map(([hotkey, record]) => ({
      hotkey,
      // Same flat bucket layout miners use on the wire
      buckets:
        record.index?.buckets.map((bucket) => ({
          ...bucket.id,
          sizeBytes: bucket.sizeBytes,
        })) ?? null,
      lastUpdated: record.index?.lastUpdated ?? null,
      lastEvaluated: record.lastEvaluated ?? null,
    }));
    return toMsgpack({ version: SNAPSHOT_VERSION, miners });
  }

  restoreSnapshot(snapshot: Buffer): void {
    let decoded: unknown;
    try {
      decoded = fromMsgpack(snapshot);
    } catch (error) {
      throw new StateLoadError('Unable to decode miner index snapshot', {
        cause: errorMessage(error),
      });
    }

    if (
      !isRecord(decoded) ||
      decoded.version !== SNAPSHOT_VERSION ||
      !Array.isArray(decoded.miners)
    ) {
      throw new StateLoadError('Unsupported miner index snapshot');
    }

    const records = new Map<string, MinerRecord>();
    for (const miner of decoded.miners) {
      if (!isRecord(miner) || typeof miner.hotkey !== 'string') {
        throw new StateLoadError('Malformed miner index snapshot entry');
      }

      const record: MinerRecord = {};
      const lastUpdated = optionalTimestamp(miner.lastUpdated);
      if (Array.isArray(miner.buckets) && lastUpdated !== undefined) {
        try {
          const { buckets } = sanityCheckMinerIndexResponse({
            buckets: miner.buckets,
          });
          record.index = { hotkey: miner.hotkey, buckets, lastUpdated };
        } catch (error) {
          throw new StateLoadError('Malformed miner index snapshot buckets', {
            hotkey: miner.hotkey,
            cause: errorMessage(error),
          });
        }
      }

      const lastEvaluated = optionalTimestamp(miner.lastEvaluated);
      if (lastEvaluated !== undefined) {
        record.lastEvaluated = lastEvaluated;
      }
      records.set(miner.hotkey, record);
    }

    this.records = records;
    this.log.info('Restored miner index snapshot', { minerCount: records.size });
  }
}
