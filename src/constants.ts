/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */

// Numeric values are part of the wire format and must never be reassigned
export enum ContentSource {
  Reddit = 1,
  X = 2,
  Youtube = 3,
}

export const contentSourceNames: Record<ContentSource, string> = {
  [ContentSource.Reddit]: 'reddit',
  [ContentSource.X]: 'x',
  [ContentSource.Youtube]: 'youtube',
};

export function isContentSource(value: unknown): value is ContentSource {
  return (
    typeof value === 'number' &&
    Object.prototype.hasOwnProperty.call(contentSourceNames, value)
  );
}

export function contentSourceFromName(name: string): ContentSource | undefined {
  const normalized = name.trim().toLowerCase();
  for (const source of Object.keys(contentSourceNames)) {
    const id = Number(source);
    if (isContentSource(id) && contentSourceNames[id] === normalized) {
      return id;
    }
  }
  return undefined;
}

export const HOUR_MS = 60 * 60 * 1000;

// Minimum stake for a participant holding a validator permit to act as one
export const MIN_VALIDATOR_STAKE = 512;
