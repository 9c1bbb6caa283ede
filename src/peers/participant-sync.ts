/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import winston from 'winston';

import { MIN_VALIDATOR_STAKE } from '../constants.js';
import { fromMsgpack, toMsgpack } from '../lib/encoding.js';
import { DetailedError, StateLoadError, errorMessage } from '../lib/error.js';
import { isRecord } from '../lib/validation.js';
import * as metrics from '../metrics.js';
import type { MinerScorer } from '../rewards/miner-scorer.js';
import type { MinerIterator } from '../validator/miner-iterator.js';
import type {
  MinerIndexStore,
  MinerPeer,
  Participant,
  ParticipantDirectory,
  ParticipantSource,
} from '../types.js';

const SNAPSHOT_VERSION = 1;

export function isValidator(participant: Participant): boolean {
  return (
    participant.validatorPermit && participant.stake >= MIN_VALIDATOR_STAKE
  );
}

export function isMiner(participant: Participant): boolean {
  return participant.validatorTrust === 0;
}

/**
 * Mirrors the registered participant table. Uid slots only ever grow; when a
 * slot is taken over by a new hotkey, the trust and index held for the old
 * hotkey are discarded.
 */
export class ParticipantSync implements ParticipantDirectory {
  private log: winston.Logger;
  private participantSource: ParticipantSource;
  private scorer: MinerScorer;
  private indexStore: MinerIndexStore;
  private minerIterator: MinerIterator;

  // Hotkey per uid, kept across restarts to detect replacements
  private hotkeys: string[] = [];
  private participants = new Map<number, Participant>();

  constructor({
    log,
    participantSource,
    scorer,
    indexStore,
    minerIterator,
  }: {
    log: winston.Logger;
    participantSource: ParticipantSource;
    scorer: MinerScorer;
    indexStore: MinerIndexStore;
    minerIterator: MinerIterator;
  }) {
    this.log = log.child({ class: this.constructor.name });
    this.participantSource = participantSource;
    this.scorer = scorer;
    this.indexStore = indexStore;
    this.minerIterator = minerIterator;
  }

  getMinerPeer(uid: number): MinerPeer | undefined {
    const participant = this.participants.get(uid);
    if (participant === undefined) {
      return undefined;
    }
    return {
      uid: participant.uid,
      hotkey: participant.hotkey,
      endpoint: participant.endpoint,
    };
  }

  getHotkey(uid: number): string | undefined {
    return this.participants.get(uid)?.hotkey ?? this.hotkeys[uid];
  }

  getParticipants(): Participant[] {
    return [...this.participants.values()];
  }

  async sync(): Promise<void> {
    const log = this.log.child({ method: 'sync' });

    let participants: Participant[];
    try {
      participants = await this.participantSource.getParticipants();
    } catch (error) {
      metrics.participantSyncErrorsCounter.inc();
      throw error;
    }

    const sorted = [...participants].sort((a, b) => a.uid - b.uid);
    for (const [position, participant] of sorted.entries()) {
      if (participant.uid !== position) {
        metrics.participantSyncErrorsCounter.inc();
        throw new DetailedError('Participant table uids are not contiguous', {
          expectedUid: position,
          uid: participant.uid,
        });
      }
    }
    if (sorted.length < this.hotkeys.length) {
      metrics.participantSyncErrorsCounter.inc();
      throw new DetailedError('Participant table shrank', {
        previousCount: this.hotkeys.length,
        count: sorted.length,
      });
    }

    for (const participant of sorted) {
      const previousHotkey = this.hotkeys[participant.uid];
      if (
        previousHotkey !== undefined &&
        previousHotkey !== participant.hotkey
      ) {
        log.info('Miner hotkey replaced, resetting trust', {
          uid: participant.uid,
          previousHotkey,
          hotkey: participant.hotkey,
        });
        if (participant.uid < (await this.scorer.getMinerCount())) {
          await this.scorer.reset(participant.uid);
        }
        try {
          await this.indexStore.deleteMinerIndex(previousHotkey);
        } catch (error) {
          log.error('Failed to delete replaced miner index', {
            previousHotkey,
            message: errorMessage(error),
          });
        }
      }
    }

    if (sorted.length > (await this.scorer.getMinerCount())) {
      log.info('Participant table grew', { count: sorted.length });
      await this.scorer.resize(sorted.length);
    }

    this.hotkeys = sorted.map((participant) => participant.hotkey);
    this.participants = new Map(
      sorted.map((participant) => [participant.uid, participant]),
    );
    this.minerIterator.setMinerUids(
      sorted.filter(isMiner).map((participant) => participant.uid),
    );
    metrics.credibleMinersGauge.set(
      (await this.scorer.getCredibleMiners()).length,
    );

    log.debug('Synced participant table', {
      participantCount: sorted.length,
      minerCount: this.minerIterator.size(),
    });
  }

  toSnapshot(): Buffer {
    return toMsgpack({ version: SNAPSHOT_VERSION, hotkeys: this.hotkeys });
  }

  restoreSnapshot(snapshot: Buffer): void {
    let decoded: unknown;
    try {
      decoded = fromMsgpack(snapshot);
    } catch (error) {
      throw new StateLoadError('Unable to decode participant snapshot', {
        cause: errorMessage(error),
      });
    }

    if (
      !isRecord(decoded) ||
      decoded.version !== SNAPSHOT_VERSION ||
      !Array.isArray(decoded.hotkeys)
    ) {
      throw new StateLoadError('Unsupported participant snapshot');
    }

    const hotkeys: string[] = [];
    for (const hotkey of decoded.hotkeys) {
      if (typeof hotkey !== 'string') {
        throw new StateLoadError('Malformed participant snapshot hotkey');
      }
      hotkeys.push(hotkey);
    }
    this.hotkeys = hotkeys;
    this.log.info('Restored participant snapshot', {
      participantCount: hotkeys.length,
    });
  }
}
