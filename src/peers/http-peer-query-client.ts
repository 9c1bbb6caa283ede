/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { default as axios, type AxiosInstance } from 'axios';
import winston from 'winston';

import {
  sanityCheckContentResponse,
  sanityCheckMinerIndexResponse,
} from '../lib/validation.js';
import * as metrics from '../metrics.js';
import type {
  ContentBucketId,
  ContentResponse,
  MinerIndexResponse,
  MinerPeer,
  PeerQueryClient,
  RequestOptions,
} from '../types.js';

export const DEFAULT_PEER_REQUEST_TIMEOUT_MS = 60_000;

function peerUrl(peer: MinerPeer, path: string): string {
  return `${peer.endpoint.replace(/\/+$/, '')}${path}`;
}

/**
 * Queries miners over HTTP. Responses are parsed and shape checked before
 * they are returned; anything malformed is reported as a request failure.
 */
export class HttpPeerQueryClient implements PeerQueryClient {
  private log: winston.Logger;
  private peerAxios: AxiosInstance;

  constructor({
    log,
    requestTimeoutMs = DEFAULT_PEER_REQUEST_TIMEOUT_MS,
    validatorHotkey,
  }: {
    log: winston.Logger;
    requestTimeoutMs?: number;
    validatorHotkey?: string;
  }) {
    this.log = log.child({ class: this.constructor.name });
    this.peerAxios = axios.create({
      timeout: requestTimeoutMs,
      headers:
        validatorHotkey !== undefined
          ? { 'X-Validator-Hotkey': validatorHotkey }
          : {},
    });
  }

  async requestIndex(
    peer: MinerPeer,
    { signal }: RequestOptions = {},
  ): Promise<MinerIndexResponse> {
    const log = this.log.child({ method: 'requestIndex', uid: peer.uid });
    metrics.peerRequestsCounter.inc({ request: 'index' });

    try {
      const response = await this.peerAxios.request({
        method: 'GET',
        url: peerUrl(peer, '/index'),
        signal,
      });
      const index = sanityCheckMinerIndexResponse(response.data);
      log.debug('Received miner index', { bucketCount: index.buckets.length });
      return index;
    } catch (error) {
      metrics.peerRequestErrorsCounter.inc({ request: 'index' });
      throw error;
    }
  }

  async requestContent(
    peer: MinerPeer,
    bucketId: ContentBucketId,
    { signal }: RequestOptions = {},
  ): Promise<ContentResponse> {
    const log = this.log.child({ method: 'requestContent', uid: peer.uid });
    metrics.peerRequestsCounter.inc({ request: 'content' });

    try {
      const response = await this.peerAxios.request({
        method: 'POST',
        url: peerUrl(peer, '/content'),
        data: {
          timeBucketId: bucketId.timeBucketId,
          source: bucketId.source,
          label: bucketId.label ?? null,
        },
        signal,
      });
      const content = sanityCheckContentResponse(response.data);
      log.debug('Received bucket content', { itemCount: content.items.length });
      return content;
    } catch (error) {
      metrics.peerRequestErrorsCounter.inc({ request: 'content' });
      throw error;
    }
  }
}
