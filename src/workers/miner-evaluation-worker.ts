/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import * as winston from 'winston';

import { ContractViolationError, errorMessage } from '../lib/error.js';
import * as metrics from '../metrics.js';
import type { ValidatorStateKind, ValidatorStateStore } from '../types.js';

export const DEFAULT_ERROR_RETRY_MS = 10_000;

// The pieces of the validator the control loop drives
export interface EvaluationCycle {
  sync(): Promise<void>;
  runNextEvalBatch(): Promise<number>;
}

export interface StateSnapshotter {
  kind: ValidatorStateKind;
  snapshot(): Promise<Buffer> | Buffer;
}

/**
 * Repeatedly refreshes the participant table, evaluates the next batch of
 * miners and persists validator state, sleeping whenever the evaluator asks
 * it to.
 */
export class MinerEvaluationWorker {
  // Dependencies
  private log: winston.Logger;
  private cycle: EvaluationCycle;
  private stateStore: ValidatorStateStore;
  private snapshotters: StateSnapshotter[];

  // Parameters
  private errorRetryMs: number;

  // State
  private shouldRun = false;
  private running?: Promise<void>;
  private wakeUp?: () => void;
  private sleepTimer?: NodeJS.Timeout;

  constructor({
    log,
    cycle,
    stateStore,
    snapshotters,
    errorRetryMs = DEFAULT_ERROR_RETRY_MS,
  }: {
    log: winston.Logger;
    cycle: EvaluationCycle;
    stateStore: ValidatorStateStore;
    snapshotters: StateSnapshotter[];
    errorRetryMs?: number;
  }) {
    this.log = log.child({ class: this.constructor.name });
    this.cycle = cycle;
    this.stateStore = stateStore;
    this.snapshotters = snapshotters;
    this.errorRetryMs = errorRetryMs;
  }

  /**
   * Runs until stop is called. Rejects when a cycle breaks an invariant, which
   * callers treat as fatal.
   */
  start(): Promise<void> {
    if (this.running !== undefined) {
      return this.running;
    }
    this.shouldRun = true;
    this.running = this.run().finally(() => {
      this.running = undefined;
    });
    return this.running;
  }

  async stop(): Promise<void> {
    this.shouldRun = false;
    this.interruptSleep();
    // start() callers receive the failure; stop only waits for the loop
    await this.running?.catch((error: unknown) => {
      this.log.debug('Evaluation loop ended with an error', {
        message: errorMessage(error),
      });
    });
  }

  private async run(): Promise<void> {
    while (this.shouldRun) {
      const waitMs = await this.runCycle();
      if (this.shouldRun && waitMs > 0) {
        await this.sleep(waitMs);
      }
    }
    this.log.info('Stopped miner evaluation');
  }

  /**
   * @returns milliseconds to sleep before the next cycle
   */
  async runCycle(): Promise<number> {
    const log = this.log.child({ method: 'runCycle' });

    try {
      await this.cycle.sync();
    } catch (error) {
      // Evaluation continues against the last known participant table
      log.warn('Failed to sync participants', { message: errorMessage(error) });
    }

    let waitSeconds: number;
    try {
      waitSeconds = await this.cycle.runNextEvalBatch();
    } catch (error) {
      if (error instanceof ContractViolationError) {
        throw error;
      }
      metrics.errorsCounter.inc();
      log.error('Evaluation batch failed', {
        message: errorMessage(error),
        stack: error instanceof Error ? error.stack : undefined,
      });
      return this.errorRetryMs;
    }

    if (waitSeconds === 0) {
      await this.saveState();
    }
    return waitSeconds * 1000;
  }

  async saveState(): Promise<void> {
    for (const snapshotter of this.snapshotters) {
      const { kind } = snapshotter;
      try {
        await this.stateStore.save(kind, await snapshotter.snapshot());
      } catch (error) {
        metrics.errorsCounter.inc();
        metrics.stateSaveErrorsCounter.inc({ kind });
        this.log.error('Failed to save validator state', {
          kind,
          message: errorMessage(error),
        });
      }
    }
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => {
      this.wakeUp = resolve;
      this.sleepTimer = setTimeout(resolve, ms);
    });
  }

  private interruptSleep(): void {
    clearTimeout(this.sleepTimer);
    this.wakeUp?.();
    this.wakeUp = undefined;
  }
}
