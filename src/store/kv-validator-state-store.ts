/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import winston from 'winston';

import type {
  KVBufferStore,
  ValidatorStateKind,
  ValidatorStateStore,
} from '../types.js';

export const stateKeys: Record<ValidatorStateKind, string> = {
  scorer: 'scorer-state',
  minerIndexes: 'miner-indexes',
  participants: 'participants',
};

// Failures are not caught here; callers decide whether a missed save matters
export class KvValidatorStateStore implements ValidatorStateStore {
  private log: winston.Logger;
  private kvBufferStore: KVBufferStore;

  constructor({
    log,
    kvBufferStore,
  }: {
    log: winston.Logger;
    kvBufferStore: KVBufferStore;
  }) {
    this.log = log.child({ class: this.constructor.name });
    this.kvBufferStore = kvBufferStore;
  }

  async save(kind: ValidatorStateKind, state: Buffer): Promise<void> {
    await this.kvBufferStore.set(stateKeys[kind], state);
    this.log.debug('Saved validator state', { kind, bytes: state.length });
  }

  async load(kind: ValidatorStateKind): Promise<Buffer | undefined> {
    return this.kvBufferStore.get(stateKeys[kind]);
  }

  async close(): Promise<void> {
    await this.kvBufferStore.close();
  }
}
