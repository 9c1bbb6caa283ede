/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { strict as assert } from 'node:assert';
import { afterEach, beforeEach, describe, it, mock } from 'node:test';
import axios, {
  type AxiosInstance,
  type AxiosRequestConfig,
  type CreateAxiosDefaults,
} from 'axios';
import winston from 'winston';

import { ContentSource } from '../constants.js';
import type { MinerPeer } from '../types.js';
import { HttpPeerQueryClient } from './http-peer-query-client.js';

const log = winston.createLogger({ silent: true });

const peer: MinerPeer = {
  uid: 4,
  hotkey: 'hotkey-4',
  endpoint: 'http://miner.local:8091/',
};

describe('HttpPeerQueryClient', () => {
  let requests: AxiosRequestConfig[];
  let responseData: unknown;
  let createConfig: CreateAxiosDefaults | undefined;
  let client: HttpPeerQueryClient;

  beforeEach(() => {
    requests = [];
    responseData = {};
    const mockedAxiosInstance = {
      request: async (config: AxiosRequestConfig) => {
        requests.push(config);
        return { status: 200, data: responseData, headers: {} };
      },
    };
    mock.method(axios, 'create', (config?: CreateAxiosDefaults) => {
      createConfig = config;
      return mockedAxiosInstance as unknown as AxiosInstance;
    });

    client = new HttpPeerQueryClient({
      log,
      requestTimeoutMs: 1234,
      validatorHotkey: 'validator-hotkey',
    });
  });

  afterEach(() => {
    mock.restoreAll();
  });

  it('should configure the timeout and identify the validator', () => {
    assert.equal(createConfig?.timeout, 1234);
    assert.deepEqual(createConfig?.headers, {
      'X-Validator-Hotkey': 'validator-hotkey',
    });
  });

  describe('requestIndex', () => {
    it('should fetch and parse the miner index', async () => {
      responseData = {
        buckets: [{ timeBucketId: 7, source: 1, label: 'r/TAO', sizeBytes: 42 }],
      };
      const controller = new AbortController();

      const index = await client.requestIndex(peer, { signal: controller.signal });

      assert.deepEqual(index.buckets, [
        {
          id: { timeBucketId: 7, source: ContentSource.Reddit, label: 'r/tao' },
          sizeBytes: 42,
        },
      ]);
      assert.equal(requests[0].method, 'GET');
      assert.equal(requests[0].url, 'http://miner.local:8091/index');
      assert.equal(requests[0].signal, controller.signal);
    });

    it('should reject malformed indexes', async () => {
      responseData = { buckets: 'nope' };
      await assert.rejects(client.requestIndex(peer), /missing 'buckets'/);
    });
  });

  describe('requestContent', () => {
    it('should request the bucket and decode its content', async () => {
      responseData = {
        items: [
          {
            uri: 'https://example.com/p/1',
            timestamp: 7 * 3_600_000,
            source: 2,
            content: Buffer.from('post').toString('base64'),
            contentSizeBytes: 4,
          },
        ],
      };

      const response = await client.requestContent(peer, {
        timeBucketId: 7,
        source: ContentSource.X,
      });

      assert.equal(requests[0].method, 'POST');
      assert.equal(requests[0].url, 'http://miner.local:8091/content');
      assert.deepEqual(requests[0].data, {
        timeBucketId: 7,
        source: ContentSource.X,
        label: null,
      });
      assert.equal(response.items[0].content.toString(), 'post');
      assert.equal(response.items[0].label, undefined);
    });

    it('should propagate transport failures', async () => {
      mock.restoreAll();
      mock.method(axios, 'create', () => ({
        request: async () => {
          throw new Error('ECONNREFUSED');
        },
      }) as unknown as AxiosInstance);
      const failing = new HttpPeerQueryClient({ log });

      await assert.rejects(
        failing.requestContent(peer, { timeBucketId: 1, source: ContentSource.X }),
        /ECONNREFUSED/,
      );
    });
  });
});
