/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import type { ContentSource } from './constants.js';

//
// Claimed content
//

export interface ContentBucketId {
  // Hours since the Unix epoch (UTC)
  timeBucketId: number;
  source: ContentSource;
  // Normalized (trimmed, lower case); absent for unlabeled content
  label?: string;
}

export interface ClaimedBucket {
  id: ContentBucketId;
  sizeBytes: number;
}

export interface MinerIndex {
  hotkey: string;
  buckets: ClaimedBucket[];
}

export interface StoredMinerIndex extends MinerIndex {
  lastUpdated: number;
}

export interface ScorableBucket extends ClaimedBucket {
  // Bytes not already covered by a higher priority credible miner
  scorableBytes: number;
}

export interface ScorableMinerIndex {
  hotkey: string;
  scorableBuckets: ScorableBucket[];
  lastUpdated: number;
}

export interface ContentItem {
  uri: string;
  // Milliseconds since the Unix epoch
  timestamp: number;
  source: ContentSource;
  label?: string;
  content: Buffer;
  contentSizeBytes: number;
}

//
// Audit results
//

export interface ValidationResult {
  isValid: boolean;
  reason: string;
}

export interface BatchValidation {
  valid: boolean;
  reason: string;
}

//
// Registered participants
//

export interface Participant {
  uid: number;
  hotkey: string;
  endpoint: string;
  stake: number;
  validatorPermit: boolean;
  validatorTrust: number;
}

export interface ParticipantSource {
  getParticipants(): Promise<Participant[]>;
}

export interface MinerDirectory {
  getMinerPeer(uid: number): MinerPeer | undefined;
  getHotkey(uid: number): string | undefined;
}

export interface ParticipantDirectory extends MinerDirectory {
  getParticipants(): Participant[];
}

//
// Peer transport
//

export interface MinerPeer {
  uid: number;
  hotkey: string;
  endpoint: string;
}

export interface RequestOptions {
  signal?: AbortSignal;
}

export interface MinerIndexResponse {
  buckets: ClaimedBucket[];
}

export interface ContentResponse {
  items: ContentItem[];
}

export interface PeerQueryClient {
  requestIndex(
    peer: MinerPeer,
    options?: RequestOptions,
  ): Promise<MinerIndexResponse>;
  requestContent(
    peer: MinerPeer,
    bucketId: ContentBucketId,
    options?: RequestOptions,
  ): Promise<ContentResponse>;
}

//
// Content verification
//

export interface ContentVerifier {
  verify(item: ContentItem, options?: RequestOptions): Promise<ValidationResult>;
}

export interface ContentVerifierProvider {
  get(source: ContentSource): ContentVerifier;
}

//
// Rewards
//

export interface SourceRewardModel {
  weight: number;
  defaultScaleFactor: number;
  labelScaleFactors: Record<string, number>;
}

export interface RewardDistributionModel {
  maxAgeHours: number;
  sources: Partial<Record<ContentSource, SourceRewardModel>>;
}

export interface ValueModel {
  score(bucketId: ContentBucketId, bytes: number): number;
}

//
// Storage
//

export type KVBufferStore = {
  get(key: string): Promise<Buffer | undefined>;
  set(key: string, buffer: Buffer): Promise<void>;
  del(key: string): Promise<void>;
  has(key: string): Promise<boolean>;
  close(): Promise<void>;
};

export interface MinerIndexStore {
  upsertMinerIndex(index: MinerIndex, updatedAt: number): Promise<void>;
  getMinerIndex(hotkey: string): Promise<StoredMinerIndex | undefined>;
  listMinerIndexes(): Promise<StoredMinerIndex[]>;
  deleteMinerIndex(hotkey: string): Promise<void>;
  markEvaluated(hotkey: string, evaluatedAt: number): Promise<void>;
  getLastEvaluated(hotkey: string): Promise<number | undefined>;
}

export type ValidatorStateKind = 'scorer' | 'minerIndexes' | 'participants';

// Opaque blobs; persistence is best effort, not transactional
export interface ValidatorStateStore {
  save(kind: ValidatorStateKind, state: Buffer): Promise<void>;
  load(kind: ValidatorStateKind): Promise<Buffer | undefined>;
}
