/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import type { ContentBucketId } from '../types.js';

export function normalizeLabel(label: string | undefined): string | undefined {
  if (label === undefined) {
    return undefined;
  }
  const normalized = label.trim().toLowerCase();
  return normalized === '' ? undefined : normalized;
}

export function labelsMatch(
  a: string | undefined,
  b: string | undefined,
): boolean {
  return normalizeLabel(a) === normalizeLabel(b);
}

export function bucketKey({ timeBucketId, source, label }: ContentBucketId): string {
  return `${timeBucketId}:${source}:${normalizeLabel(label) ?? ''}`;
}
