/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { HOUR_MS } from '../constants.js';

export interface TimeRange {
  // Inclusive
  start: number;
  // Exclusive
  end: number;
}

export function timeBucketIdFromTimestamp(timestampMs: number): number {
  return Math.floor(timestampMs / HOUR_MS);
}

export function timeBucketStart(timeBucketId: number): number {
  return timeBucketId * HOUR_MS;
}

export function timeBucketRange(timeBucketId: number): TimeRange {
  const start = timeBucketStart(timeBucketId);
  return { start, end: start + HOUR_MS };
}

export function isInRange(range: TimeRange, timestampMs: number): boolean {
  return timestampMs >= range.start && timestampMs < range.end;
}

// Largest magnitude a Date accepts
const MAX_DATE_MS = 8.64e15;

export function formatTimestamp(timestampMs: number): string {
  return Number.isFinite(timestampMs) && Math.abs(timestampMs) <= MAX_DATE_MS
    ? new Date(timestampMs).toISOString()
    : String(timestampMs);
}

export function formatRange(range: TimeRange): string {
  return `[${formatTimestamp(range.start)}, ${formatTimestamp(range.end)})`;
}

// Whole hours elapsed since the start of the bucket, never negative
export function bucketAgeHours(timeBucketId: number, nowMs: number): number {
  return Math.max(0, Math.floor((nowMs - timeBucketStart(timeBucketId)) / HOUR_MS));
}
