/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import path from 'node:path';

import * as config from './config.js';
import { errorMessage } from './lib/error.js';
import log from './log.js';
import * as metrics from './metrics.js';
import { HttpParticipantSource } from './peers/http-participant-source.js';
import { HttpPeerQueryClient } from './peers/http-peer-query-client.js';
import { ParticipantSync } from './peers/participant-sync.js';
import { MinerScorer } from './rewards/miner-scorer.js';
import { RewardDistributionLoader } from './rewards/reward-distribution-loader.js';
import { RewardValueModel } from './rewards/value-model.js';
import { FsKVStore } from './store/fs-kv-store.js';
import { KvValidatorStateStore } from './store/kv-validator-state-store.js';
import { MemoryMinerIndexStore } from './store/memory-miner-index-store.js';
import { NodeKvStore } from './store/node-kv-store.js';
import type { ContentSource } from './constants.js';
import type { ContentVerifier, KVBufferStore } from './types.js';
import { MinerEvaluator } from './validator/miner-evaluator.js';
import { MinerIterator } from './validator/miner-iterator.js';
import { StaticContentVerifierProvider } from './verifiers/content-verifier-provider.js';
import { RemoteContentVerifier } from './verifiers/remote-content-verifier.js';
import { MinerEvaluationWorker } from './workers/miner-evaluation-worker.js';

type CleanupHandler = {
  name: string;
  handler: () => Promise<void>;
};

const cleanupHandlers: CleanupHandler[] = [];

/**
 * Register a cleanup handler to be called during shutdown.
 * Handlers are called in the order they are registered.
 */
export function registerCleanupHandler(
  name: string,
  handler: () => Promise<void>,
): void {
  cleanupHandlers.push({ name, handler });
  log.debug(`Registered cleanup handler: ${name}`);
}

process.on('uncaughtException', (error) => {
  metrics.uncaughtExceptionCounter.inc();
  log.error('Uncaught exception:', error);
});

const DEFAULT_REWARD_DISTRIBUTION_PATH = new URL(
  '../config/reward-distribution.json',
  import.meta.url,
);

export const rewardDistribution = new RewardDistributionLoader({ log }).load(
  config.REWARD_DISTRIBUTION_PATH ?? DEFAULT_REWARD_DISTRIBUTION_PATH,
);

export const valueModel = new RewardValueModel({ model: rewardDistribution });

export const scorer = new MinerScorer({
  log,
  valueModel,
  alpha: config.SCORE_ALPHA,
});

export const minerIndexStore = new MemoryMinerIndexStore({ log });

export const minerIterator = new MinerIterator();

export const participantSync = new ParticipantSync({
  log,
  participantSource: new HttpParticipantSource({
    log,
    participantTableUrl: config.PARTICIPANT_TABLE_URL,
  }),
  scorer,
  indexStore: minerIndexStore,
  minerIterator,
});

function makeStateKvStore(): KVBufferStore {
  switch (config.STATE_STORE_TYPE) {
    case 'fs':
      return new FsKVStore({
        baseDir: config.STATE_DIR,
        tmpDir: path.join(config.STATE_DIR, 'tmp'),
      });
    case 'memory':
      return new NodeKvStore();
    default:
      throw new Error(
        `Unsupported STATE_STORE_TYPE '${config.STATE_STORE_TYPE}'`,
      );
  }
}

export const stateStore = new KvValidatorStateStore({
  log,
  kvBufferStore: makeStateKvStore(),
});

export const verifierProvider = new StaticContentVerifierProvider(
  [...config.CONTENT_VERIFIER_URLS.entries()].map(
    ([source, verifierUrl]): [ContentSource, ContentVerifier] => [
      source,
      new RemoteContentVerifier({
        log,
        verifierUrl,
        requestTimeoutMs: config.PEER_REQUEST_TIMEOUT_MS,
      }),
    ],
  ),
);

export const minerEvaluator = new MinerEvaluator({
  log,
  scorer,
  indexStore: minerIndexStore,
  peerClient: new HttpPeerQueryClient({
    log,
    requestTimeoutMs: config.PEER_REQUEST_TIMEOUT_MS,
    validatorHotkey: config.VALIDATOR_HOTKEY,
  }),
  verifierProvider,
  minerDirectory: participantSync,
  minerIterator,
  minEvaluationPeriodMs: config.MIN_EVALUATION_PERIOD_MS,
  batchSize: config.EVALUATION_BATCH_SIZE,
  requestTimeoutMs: config.PEER_REQUEST_TIMEOUT_MS,
});

export const minerEvaluationWorker = new MinerEvaluationWorker({
  log,
  cycle: {
    sync: () => participantSync.sync(),
    runNextEvalBatch: () => minerEvaluator.runNextEvalBatch(),
  },
  stateStore,
  snapshotters: [
    { kind: 'scorer', snapshot: () => scorer.serialize() },
    { kind: 'minerIndexes', snapshot: () => minerIndexStore.toSnapshot() },
    { kind: 'participants', snapshot: () => participantSync.toSnapshot() },
  ],
});

/**
 * Restores persisted validator state. Missing state starts fresh; corrupt
 * state aborts startup rather than silently discarding trust.
 */
let stateLoaded = false;

export async function loadState(): Promise<void> {
  const scorerState = await stateStore.load('scorer');
  if (scorerState !== undefined) {
    await scorer.restore(scorerState);
  }

  const minerIndexes = await stateStore.load('minerIndexes');
  if (minerIndexes !== undefined) {
    minerIndexStore.restoreSnapshot(minerIndexes);
  }

  const participants = await stateStore.load('participants');
  if (participants !== undefined) {
    participantSync.restoreSnapshot(participants);
  }

  stateLoaded = true;
  log.info('Loaded validator state', {
    minerCount: await scorer.getMinerCount(),
    fresh: scorerState === undefined,
  });
}

let isShuttingDown = false;

export const shutdown = async (exitCode = 0) => {
  if (isShuttingDown) {
    log.info('Shutdown already in progress');
  } else {
    isShuttingDown = true;
    log.info('Shutting down...');

    for (const { name, handler } of cleanupHandlers) {
      try {
        log.debug(`Running cleanup handler: ${name}`);
        await handler();
        log.debug(`Cleanup handler completed: ${name}`);
      } catch (error) {
        log.error(`Error in cleanup handler: ${name}`, {
          error: errorMessage(error),
        });
      }
    }

    await minerEvaluationWorker.stop();
    // Never overwrite state that failed to load
    if (stateLoaded) {
      await minerEvaluationWorker.saveState();
    }
    await stateStore.close();

    log.info('Shutdown complete');
    process.exit(exitCode);
  }
};

// Handle shutdown signals
process.on('SIGINT', async () => {
  await shutdown();
});

process.on('SIGTERM', async () => {
  await shutdown();
});
