/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { strict as assert } from 'node:assert';
import { describe, it } from 'node:test';
import winston from 'winston';

import { KvValidatorStateStore } from './kv-validator-state-store.js';
import { NodeKvStore } from './node-kv-store.js';

const log = winston.createLogger({ silent: true });

describe('KvValidatorStateStore', () => {
  it('should keep each kind of state under its own key', async () => {
    const kvBufferStore = new NodeKvStore();
    const stateStore = new KvValidatorStateStore({ log, kvBufferStore });

    await stateStore.save('scorer', Buffer.from('scores'));
    await stateStore.save('minerIndexes', Buffer.from('indexes'));

    assert.deepEqual(await stateStore.load('scorer'), Buffer.from('scores'));
    assert.deepEqual(await stateStore.load('minerIndexes'), Buffer.from('indexes'));
    assert.equal(await stateStore.load('participants'), undefined);
    assert.deepEqual(
      await kvBufferStore.get('scorer-state'),
      Buffer.from('scores'),
    );

    await stateStore.close();
  });

  it('should propagate storage failures', async () => {
    const stateStore = new KvValidatorStateStore({
      log,
      kvBufferStore: {
        get: async () => undefined,
        set: async () => {
          throw new Error('disk full');
        },
        del: async () => undefined,
        has: async () => false,
        close: async () => undefined,
      },
    });

    await assert.rejects(stateStore.save('scorer', Buffer.alloc(1)), /disk full/);
  });
});
