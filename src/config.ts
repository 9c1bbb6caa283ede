/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { type ContentSource, contentSourceFromName } from './constants.js';
import * as env from './lib/env.js';
import { isRecord } from './lib/validation.js';
import {
  DEFAULT_EVALUATION_BATCH_SIZE,
  DEFAULT_EVALUATION_TIMEOUT_MS,
  DEFAULT_MIN_EVALUATION_PERIOD_MS,
} from './validator/miner-evaluator.js';

//
// HTTP server
//

// HTTP server port
export const PORT = env.numberOrDefault('PORT', 4000);

//
// Participants
//

// JSON participant table: [{ uid, hotkey, endpoint, stake, validatorPermit, validatorTrust }]
export const PARTICIPANT_TABLE_URL = env.varOrDefault(
  'PARTICIPANT_TABLE_URL',
  'http://localhost:4100/participants',
);

// Sent to miners so they can attribute requests
export const VALIDATOR_HOTKEY = env.varOrUndefined('VALIDATOR_HOTKEY');

//
// Evaluation
//

// A miner is not evaluated again until this much time has passed
export const MIN_EVALUATION_PERIOD_MS = env.numberOrDefault(
  'MIN_EVALUATION_PERIOD_MS',
  DEFAULT_MIN_EVALUATION_PERIOD_MS,
);

export const EVALUATION_BATCH_SIZE = env.numberOrDefault(
  'EVALUATION_BATCH_SIZE',
  DEFAULT_EVALUATION_BATCH_SIZE,
);

// Deadline for each miner request and each content verification
export const PEER_REQUEST_TIMEOUT_MS = env.numberOrDefault(
  'PEER_REQUEST_TIMEOUT_MS',
  DEFAULT_EVALUATION_TIMEOUT_MS,
);

// Smoothing factor for credibility and score
export const SCORE_ALPHA = env.numberOrDefault('SCORE_ALPHA', 0.05);

export const REWARD_DISTRIBUTION_PATH = env.varOrUndefined(
  'REWARD_DISTRIBUTION_PATH',
);

// JSON object mapping source names to verification service URLs, e.g.
// {"reddit":"http://localhost:4200/verify"}
export const CONTENT_VERIFIER_URLS = parseVerifierUrls(
  env.varOrDefault('CONTENT_VERIFIER_URLS', '{}'),
);

//
// State
//

// 'fs' keeps validator state across restarts, 'memory' does not
export const STATE_STORE_TYPE = env.varOrDefault('STATE_STORE_TYPE', 'fs');

export const STATE_DIR = env.varOrDefault('STATE_DIR', 'data/validator');

export function parseVerifierUrls(value: string): Map<ContentSource, string> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(value);
  } catch {
    throw new Error('CONTENT_VERIFIER_URLS must be a JSON object');
  }
  if (!isRecord(parsed)) {
    throw new Error('CONTENT_VERIFIER_URLS must be a JSON object');
  }

  const urls = new Map<ContentSource, string>();
  for (const [name, url] of Object.entries(parsed)) {
    const source = contentSourceFromName(name);
    if (source === undefined) {
      throw new Error(`CONTENT_VERIFIER_URLS: unknown source '${name}'`);
    }
    if (typeof url !== 'string' || url === '') {
      throw new Error(`CONTENT_VERIFIER_URLS: '${name}' must map to a URL`);
    }
    urls.set(source, url);
  }
  return urls;
}
