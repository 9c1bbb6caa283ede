/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { strict as assert } from 'node:assert';
import { afterEach, beforeEach, describe, it, mock } from 'node:test';
import axios, { type AxiosInstance, type AxiosRequestConfig } from 'axios';
import winston from 'winston';

import { ContentSource } from '../constants.js';
import type { ContentItem } from '../types.js';
import { RemoteContentVerifier } from './remote-content-verifier.js';

const log = winston.createLogger({ silent: true });

const item: ContentItem = {
  uri: 'https://example.com/r/tao/1',
  timestamp: 1_700_000_000_000,
  source: ContentSource.Reddit,
  label: 'r/tao',
  content: Buffer.from('body'),
  contentSizeBytes: 4,
};

describe('RemoteContentVerifier', () => {
  let requests: AxiosRequestConfig[];
  let responseData: unknown;
  let verifier: RemoteContentVerifier;

  beforeEach(() => {
    requests = [];
    responseData = { isValid: true, reason: '' };
    mock.method(axios, 'create', () => ({
      request: async (config: AxiosRequestConfig) => {
        requests.push(config);
        return { status: 200, data: responseData, headers: {} };
      },
    }) as unknown as AxiosInstance);

    verifier = new RemoteContentVerifier({
      log,
      verifierUrl: 'http://verifier.local/verify',
    });
  });

  afterEach(() => {
    mock.restoreAll();
  });

  it('should post the entity with base64 content', async () => {
    const result = await verifier.verify(item);

    assert.deepEqual(result, { isValid: true, reason: '' });
    assert.equal(requests[0].method, 'POST');
    assert.equal(requests[0].url, 'http://verifier.local/verify');
    assert.deepEqual(requests[0].data, {
      uri: item.uri,
      timestamp: item.timestamp,
      source: ContentSource.Reddit,
      label: 'r/tao',
      content: 'Ym9keQ==',
      contentSizeBytes: 4,
    });
  });

  it('should return the verdict of the service', async () => {
    responseData = { isValid: false, reason: 'Content does not match source' };
    assert.deepEqual(await verifier.verify(item), {
      isValid: false,
      reason: 'Content does not match source',
    });
  });

  it('should reject malformed verdicts', async () => {
    responseData = 'ok';
    await assert.rejects(verifier.verify(item), /missing 'isValid'/);
  });
});
