/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import NodeCache from 'node-cache';

import type { KVBufferStore } from '../types.js';

// In-process store for validators that do not need state across restarts
export class NodeKvStore implements KVBufferStore {
  private cache: NodeCache;

  constructor({
    ttlSeconds = 0,
    maxKeys = -1,
  }: {
    ttlSeconds?: number;
    maxKeys?: number;
  } = {}) {
    this.cache = new NodeCache({
      stdTTL: ttlSeconds,
      maxKeys,
      deleteOnExpire: true,
      useClones: false,
      checkperiod: ttlSeconds > 0 ? Math.min(60 * 5, ttlSeconds) : 0,
    });
  }

  async get(key: string): Promise<Buffer | undefined> {
    const value = this.cache.get<unknown>(key);
    return Buffer.isBuffer(value) ? value : undefined;
  }

  async set(key: string, buffer: Buffer): Promise<void> {
    this.cache.set(key, buffer);
  }

  async del(key: string): Promise<void> {
    this.cache.del(key);
  }

  async has(key: string): Promise<boolean> {
    return this.cache.has(key);
  }

  async close(): Promise<void> {
    this.cache.close();
  }
}
