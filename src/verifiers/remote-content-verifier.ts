/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { default as axios, type AxiosInstance } from 'axios';
import winston from 'winston';

import { contentSourceNames } from '../constants.js';
import { toB64 } from '../lib/encoding.js';
import { sanityCheckValidationResult } from '../lib/validation.js';
import * as metrics from '../metrics.js';
import type {
  ContentItem,
  ContentVerifier,
  RequestOptions,
  ValidationResult,
} from '../types.js';

/**
 * Asks an external service to compare a sampled entity with what its source
 * currently serves. Transport errors propagate; the caller decides what an
 * unanswered verification means.
 */
export class RemoteContentVerifier implements ContentVerifier {
  private log: winston.Logger;
  private verifierAxios: AxiosInstance;
  private verifierUrl: string;

  constructor({
    log,
    verifierUrl,
    requestTimeoutMs = 60_000,
  }: {
    log: winston.Logger;
    verifierUrl: string;
    requestTimeoutMs?: number;
  }) {
    this.log = log.child({ class: this.constructor.name, verifierUrl });
    this.verifierUrl = verifierUrl;
    this.verifierAxios = axios.create({ timeout: requestTimeoutMs });
  }

  async verify(
    item: ContentItem,
    { signal }: RequestOptions = {},
  ): Promise<ValidationResult> {
    const response = await this.verifierAxios.request({
      method: 'POST',
      url: this.verifierUrl,
      data: {
        uri: item.uri,
        timestamp: item.timestamp,
        source: item.source,
        label: item.label ?? null,
        content: toB64(item.content),
        contentSizeBytes: item.contentSizeBytes,
      },
      signal,
    });

    const result = sanityCheckValidationResult(response.data);
    metrics.contentVerificationsCounter.inc({
      source: contentSourceNames[item.source],
      result: result.isValid ? 'valid' : 'invalid',
    });
    this.log.debug('Verified entity', {
      uri: item.uri,
      isValid: result.isValid,
      reason: result.reason,
    });
    return result;
  }
}
