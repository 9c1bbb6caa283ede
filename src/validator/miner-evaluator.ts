/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import winston from 'winston';

import { ContractViolationError, errorMessage } from '../lib/error.js';
import { withTimeout } from '../lib/timeout.js';
import type { RandomFunction } from '../lib/weighted-choice.js';
import * as metrics from '../metrics.js';
import type { MinerScorer } from '../rewards/miner-scorer.js';
import type {
  ContentItem,
  ContentResponse,
  ContentVerifierProvider,
  MinerDirectory,
  MinerIndexStore,
  MinerPeer,
  PeerQueryClient,
  ScorableMinerIndex,
  ValidationResult,
} from '../types.js';
import { chooseBucket, chooseEntities, validateBatch } from './audit-sampler.js';
import type { MinerIterator } from './miner-iterator.js';
import { computeScorableIndex, scorableSizeBytes } from './scorable-index.js';

export const DEFAULT_MIN_EVALUATION_PERIOD_MS = 20 * 60 * 1000;
export const DEFAULT_EVALUATION_BATCH_SIZE = 10;
export const DEFAULT_EVALUATION_TIMEOUT_MS = 60_000;
export const EMPTY_POPULATION_RETRY_SECONDS = 60;

export type EvaluationOutcome =
  | { status: 'scored'; results: ValidationResult[] }
  | { status: 'no-data'; reason: string }
  | { status: 'discarded'; reason: string }
  | { status: 'skipped'; reason: string };

const FAILED_CONTENT_RESPONSE = 'Response failed or is invalid';

/**
 * Audits miners in batches. Each evaluation fetches the miner's latest index,
 * samples one bucket, checks the returned content and folds the outcome into
 * the miner's trust.
 */
export class MinerEvaluator {
  // Dependencies
  private log: winston.Logger;
  private scorer: MinerScorer;
  private indexStore: MinerIndexStore;
  private peerClient: PeerQueryClient;
  private verifierProvider: ContentVerifierProvider;
  private minerDirectory: MinerDirectory;
  private minerIterator: MinerIterator;
  private clock: () => number;
  private randomFunction: RandomFunction;

  // Parameters
  private minEvaluationPeriodMs: number;
  private batchSize: number;
  private requestTimeoutMs: number;

  constructor({
    log,
    scorer,
    indexStore,
    peerClient,
    verifierProvider,
    minerDirectory,
    minerIterator,
    clock = Date.now,
    randomFunction = Math.random,
    minEvaluationPeriodMs = DEFAULT_MIN_EVALUATION_PERIOD_MS,
    batchSize = DEFAULT_EVALUATION_BATCH_SIZE,
    requestTimeoutMs = DEFAULT_EVALUATION_TIMEOUT_MS,
  }: {
    log: winston.Logger;
    scorer: MinerScorer;
    indexStore: MinerIndexStore;
    peerClient: PeerQueryClient;
    verifierProvider: ContentVerifierProvider;
    minerDirectory: MinerDirectory;
    minerIterator: MinerIterator;
    clock?: () => number;
    randomFunction?: RandomFunction;
    minEvaluationPeriodMs?: number;
    batchSize?: number;
    requestTimeoutMs?: number;
  }) {
    if (!Number.isInteger(batchSize) || batchSize < 1) {
      throw new ContractViolationError(
        `Evaluation batch size must be a positive integer, got ${batchSize}`,
      );
    }

    this.log = log.child({ class: this.constructor.name });
    this.scorer = scorer;
    this.indexStore = indexStore;
    this.peerClient = peerClient;
    this.verifierProvider = verifierProvider;
    this.minerDirectory = minerDirectory;
    this.minerIterator = minerIterator;
    this.clock = clock;
    this.randomFunction = randomFunction;
    this.minEvaluationPeriodMs = minEvaluationPeriodMs;
    this.batchSize = batchSize;
    this.requestTimeoutMs = requestTimeoutMs;
  }

  /**
   * Evaluates the next batch of miners when the first of them is due.
   *
   * @returns seconds to wait before the next call; 0 when a batch ran
   */
  async runNextEvalBatch(): Promise<number> {
    const log = this.log.child({ method: 'runNextEvalBatch' });

    const nextUid = this.minerIterator.peek();
    if (nextUid === undefined) {
      log.debug('No miners to evaluate');
      return EMPTY_POPULATION_RETRY_SECONDS;
    }

    const nextHotkey = this.minerDirectory.getHotkey(nextUid);
    if (nextHotkey !== undefined) {
      const lastEvaluated = await this.indexStore.getLastEvaluated(nextHotkey);
      const now = this.clock();
      if (
        lastEvaluated !== undefined &&
        now - lastEvaluated < this.minEvaluationPeriodMs
      ) {
        const waitSeconds = (lastEvaluated + this.minEvaluationPeriodMs - now) / 1000;
        log.debug('Next miner is not due yet', { uid: nextUid, waitSeconds });
        return waitSeconds;
      }
    }

    const uids: number[] = [];
    const batchSize = Math.min(this.batchSize, this.minerIterator.size());
    while (uids.length < batchSize) {
      const uid = this.minerIterator.next();
      if (uid === undefined || uids.includes(uid)) {
        break;
      }
      uids.push(uid);
    }

    log.info('Evaluating miner batch', { uids });
    const endTimer = metrics.evaluationBatchDurationHistogram.startTimer();
    const settled = await Promise.allSettled(
      uids.map((uid) => this.evalMiner(uid)),
    );
    endTimer();

    let contractViolation: ContractViolationError | undefined;
    for (const [position, result] of settled.entries()) {
      if (result.status === 'rejected') {
        metrics.errorsCounter.inc();
        metrics.minerEvaluationErrorsCounter.inc();
        log.error('Miner evaluation failed', {
          uid: uids[position],
          message: errorMessage(result.reason),
          stack: result.reason instanceof Error ? result.reason.stack : undefined,
        });
        if (result.reason instanceof ContractViolationError) {
          contractViolation ??= result.reason;
        }
      }
    }
    metrics.credibleMinersGauge.set((await this.scorer.getCredibleMiners()).length);

    // The rest of the batch still completes before a broken invariant surfaces
    if (contractViolation !== undefined) {
      throw contractViolation;
    }
    return 0;
  }

  async evalMiner(uid: number): Promise<EvaluationOutcome> {
    const log = this.log.child({ method: 'evalMiner', uid });

    const peer = this.minerDirectory.getMinerPeer(uid);
    if (peer === undefined) {
      log.warn('Miner is not in the participant table');
      return this.record({ status: 'skipped', reason: 'Unknown miner' });
    }

    const outcome = await this.auditMiner(peer, log);
    await this.indexStore.markEvaluated(peer.hotkey, this.clock());

    log.info('Evaluated miner', {
      hotkey: peer.hotkey,
      status: outcome.status,
      ...(outcome.status === 'scored'
        ? { validCount: outcome.results.filter((r) => r.isValid).length }
        : { reason: outcome.reason }),
    });
    return this.record(outcome);
  }

  private async auditMiner(
    peer: MinerPeer,
    log: winston.Logger,
  ): Promise<EvaluationOutcome> {
    // FetchIndex
    const index = await this.updateAndGetMinerIndex(peer, log);
    if (index === undefined) {
      return this.noData(peer.uid, 'No index available');
    }

    // Select
    if (scorableSizeBytes(index) === 0) {
      return this.noData(peer.uid, 'Index has no scorable data');
    }
    const bucket = chooseBucket(index, this.randomFunction);

    // FetchContent
    let content: ContentResponse;
    try {
      content = await withTimeout(
        (signal) => this.peerClient.requestContent(peer, bucket.id, { signal }),
        { timeoutMs: this.requestTimeoutMs, description: 'Content request' },
      );
    } catch (error) {
      log.debug('Content request failed', { message: errorMessage(error) });
      return this.score(peer.uid, index, [
        { isValid: false, reason: FAILED_CONTENT_RESPONSE },
      ]);
    }

    // BasicCheck
    const batch = validateBatch(content.items, bucket);
    if (!batch.valid) {
      return this.score(peer.uid, index, [
        { isValid: false, reason: batch.reason },
      ]);
    }
    if (content.items.every((item) => item.contentSizeBytes === 0)) {
      return this.score(peer.uid, index, [
        { isValid: false, reason: 'Returned entities claim no content' },
      ]);
    }

    // SampleVerify
    const entities = chooseEntities(content.items, this.randomFunction);
    let results: ValidationResult[];
    try {
      results = await this.verifyEntities(entities);
    } catch (error) {
      if (error instanceof ContractViolationError) {
        throw error;
      }
      log.warn('Content verification failed, discarding evaluation', {
        message: errorMessage(error),
      });
      return { status: 'discarded', reason: errorMessage(error) };
    }

    // Score
    return this.score(peer.uid, index, results);
  }

  private async updateAndGetMinerIndex(
    peer: MinerPeer,
    log: winston.Logger,
  ): Promise<ScorableMinerIndex | undefined> {
    try {
      const response = await withTimeout(
        (signal) => this.peerClient.requestIndex(peer, { signal }),
        { timeoutMs: this.requestTimeoutMs, description: 'Index request' },
      );
      await this.indexStore.upsertMinerIndex(
        { hotkey: peer.hotkey, buckets: response.buckets },
        this.clock(),
      );
    } catch (error) {
      // A stale index is still used; only a missing one means no data
      log.debug('Index request failed', { message: errorMessage(error) });
    }

    const credibleHotkeys = new Set<string>();
    for (const uid of await this.scorer.getCredibleMiners()) {
      const hotkey = this.minerDirectory.getHotkey(uid);
      if (hotkey !== undefined) {
        credibleHotkeys.add(hotkey);
      }
    }

    return computeScorableIndex({
      hotkey: peer.hotkey,
      indexes: await this.indexStore.listMinerIndexes(),
      credibleHotkeys,
    });
  }

  private async verifyEntities(
    entities: readonly ContentItem[],
  ): Promise<ValidationResult[]> {
    return Promise.all(
      entities.map((entity) =>
        withTimeout(
          (signal) =>
            this.verifierProvider.get(entity.source).verify(entity, { signal }),
          {
            timeoutMs: this.requestTimeoutMs,
            description: 'Content verification',
          },
        ),
      ),
    );
  }

  private async noData(uid: number, reason: string): Promise<EvaluationOutcome> {
    await this.scorer.reset(uid);
    return { status: 'no-data', reason };
  }

  private async score(
    uid: number,
    index: ScorableMinerIndex,
    results: ValidationResult[],
  ): Promise<EvaluationOutcome> {
    await this.scorer.onMinerEvaluated(uid, index, results);
    return { status: 'scored', results };
  }

  private record(outcome: EvaluationOutcome): EvaluationOutcome {
    metrics.minerEvaluationsCounter.inc({ outcome: outcome.status });
    return outcome;
  }
}
