/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { isContentSource } from '../constants.js';
import { normalizeLabel } from './content-label.js';
import { fromB64 } from './encoding.js';
import type {
  ClaimedBucket,
  ContentBucketId,
  ContentItem,
  ContentResponse,
  MinerIndexResponse,
  Participant,
  ValidationResult,
} from '../types.js';

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isNonNegativeInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isSafeInteger(value) && value >= 0;
}

function optionalLabel(value: unknown, context: string): string | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'string') {
    throw new Error(`${context}: 'label' must be a string`);
  }
  return normalizeLabel(value);
}

export function sanityCheckBucketId(
  value: unknown,
  context = 'Invalid bucket',
): ContentBucketId {
  if (!isRecord(value)) {
    throw new Error(`${context}: must be an object`);
  }
  if (!isNonNegativeInteger(value.timeBucketId)) {
    throw new Error(`${context}: 'timeBucketId' must be a non-negative integer`);
  }
  if (!isContentSource(value.source)) {
    throw new Error(`${context}: unknown 'source' ${String(value.source)}`);
  }

  const label = optionalLabel(value.label, context);
  return {
    timeBucketId: value.timeBucketId,
    source: value.source,
    ...(label !== undefined && { label }),
  };
}

export function sanityCheckMinerIndexResponse(
  data: unknown,
): MinerIndexResponse {
  if (!isRecord(data) || !Array.isArray(data.buckets)) {
    throw new Error("Invalid index response: missing 'buckets'");
  }

  const buckets: ClaimedBucket[] = data.buckets.map((bucket: unknown) => {
    const id = sanityCheckBucketId(bucket, 'Invalid index response bucket');
    if (!isRecord(bucket) || !isNonNegativeInteger(bucket.sizeBytes)) {
      throw new Error(
        "Invalid index response bucket: 'sizeBytes' must be a non-negative integer",
      );
    }
    return { id, sizeBytes: bucket.sizeBytes };
  });

  return { buckets };
}

export function sanityCheckContentItem(value: unknown): ContentItem {
  if (!isRecord(value)) {
    throw new Error('Invalid content item: must be an object');
  }
  if (typeof value.uri !== 'string' || value.uri === '') {
    throw new Error("Invalid content item: missing 'uri'");
  }
  if (typeof value.timestamp !== 'number' || !Number.isFinite(value.timestamp)) {
    throw new Error("Invalid content item: 'timestamp' must be a number");
  }
  if (!isContentSource(value.source)) {
    throw new Error(
      `Invalid content item: unknown 'source' ${String(value.source)}`,
    );
  }
  if (typeof value.content !== 'string') {
    throw new Error("Invalid content item: 'content' must be base64 text");
  }
  if (!isNonNegativeInteger(value.contentSizeBytes)) {
    throw new Error(
      "Invalid content item: 'contentSizeBytes' must be a non-negative integer",
    );
  }

  const label = optionalLabel(value.label, 'Invalid content item');
  return {
    uri: value.uri,
    timestamp: value.timestamp,
    source: value.source,
    ...(label !== undefined && { label }),
    content: fromB64(value.content),
    contentSizeBytes: value.contentSizeBytes,
  };
}

export function sanityCheckContentResponse(data: unknown): ContentResponse {
  if (!isRecord(data) || !Array.isArray(data.items)) {
    throw new Error("Invalid content response: missing 'items'");
  }
  return { items: data.items.map(sanityCheckContentItem) };
}

export function sanityCheckParticipant(value: unknown): Participant {
  if (!isRecord(value)) {
    throw new Error('Invalid participant: must be an object');
  }
  if (!isNonNegativeInteger(value.uid)) {
    throw new Error("Invalid participant: 'uid' must be a non-negative integer");
  }
  if (typeof value.hotkey !== 'string' || value.hotkey === '') {
    throw new Error("Invalid participant: missing 'hotkey'");
  }
  if (typeof value.endpoint !== 'string') {
    throw new Error("Invalid participant: missing 'endpoint'");
  }
  if (typeof value.stake !== 'number' || value.stake < 0) {
    throw new Error("Invalid participant: 'stake' must be a non-negative number");
  }
  if (typeof value.validatorTrust !== 'number') {
    throw new Error("Invalid participant: 'validatorTrust' must be a number");
  }

  return {
    uid: value.uid,
    hotkey: value.hotkey,
    endpoint: value.endpoint,
    stake: value.stake,
    validatorPermit: value.validatorPermit === true,
    validatorTrust: value.validatorTrust,
  };
}

export function sanityCheckParticipantTable(data: unknown): Participant[] {
  const participants =
    isRecord(data) && Array.isArray(data.participants)
      ? data.participants
      : data;
  if (!Array.isArray(participants)) {
    throw new Error("Invalid participant table: missing 'participants'");
  }
  return participants.map(sanityCheckParticipant);
}

export function sanityCheckValidationResult(data: unknown): ValidationResult {
  if (!isRecord(data) || typeof data.isValid !== 'boolean') {
    throw new Error("Invalid verification result: missing 'isValid'");
  }
  return {
    isValid: data.isValid,
    reason: typeof data.reason === 'string' ? data.reason : '',
  };
}
