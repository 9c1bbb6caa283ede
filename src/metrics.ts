/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import * as promClient from 'prom-client';

//
// Global error metrics
//

export const errorsCounter = new promClient.Counter({
  name: 'errors_total',
  help: 'Total error count',
});

export const uncaughtExceptionCounter = new promClient.Counter({
  name: 'uncaught_exceptions_total',
  help: 'Count of uncaught exceptions',
});

//
// Peer metrics
//

export const peerRequestsCounter = new promClient.Counter({
  name: 'peer_requests_total',
  help: 'Count of requests sent to miners',
  labelNames: ['request'],
});

export const peerRequestErrorsCounter = new promClient.Counter({
  name: 'peer_request_errors_total',
  help: 'Count of failed or malformed miner responses',
  labelNames: ['request'],
});

export const participantSyncErrorsCounter = new promClient.Counter({
  name: 'participant_sync_errors_total',
  help: 'Count of failed participant table refreshes',
});

//
// Evaluation metrics
//

export const minerEvaluationsCounter = new promClient.Counter({
  name: 'miner_evaluations_total',
  help: 'Count of miner evaluations by outcome',
  labelNames: ['outcome'],
});

export const minerEvaluationErrorsCounter = new promClient.Counter({
  name: 'miner_evaluation_errors_total',
  help: 'Count of miner evaluations that raised an error',
});

export const contentVerificationsCounter = new promClient.Counter({
  name: 'content_verifications_total',
  help: 'Count of sampled entities checked against their source',
  labelNames: ['source', 'result'],
});

export const evaluationBatchDurationHistogram = new promClient.Histogram({
  name: 'evaluation_batch_duration_seconds',
  help: 'Time spent evaluating one batch of miners',
  buckets: [1, 5, 10, 30, 60, 120, 300],
});

export const credibleMinersGauge = new promClient.Gauge({
  name: 'credible_miners',
  help: 'Number of miners at or above the credibility threshold',
});

//
// State persistence metrics
//

export const stateSaveErrorsCounter = new promClient.Counter({
  name: 'state_save_errors_total',
  help: 'Count of failed validator state saves',
  labelNames: ['kind'],
});
