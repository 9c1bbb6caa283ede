/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { default as cors } from 'cors';
import express from 'express';
import { Server } from 'node:http';

import * as config from './config.js';
import { errorMessage } from './lib/error.js';
import log from './log.js';
import { createValidatorRouter } from './routes/validator.js';
import * as system from './system.js';

try {
  await system.loadState();
} catch (error) {
  log.error('Failed to load validator state', {
    message: errorMessage(error),
  });
  await system.shutdown(1);
}

system.minerEvaluationWorker.start().catch(async (error: unknown) => {
  log.error('Miner evaluation stopped on an unrecoverable error', {
    message: errorMessage(error),
    stack: error instanceof Error ? error.stack : undefined,
  });
  await system.shutdown(1);
});

// HTTP server
const app = express();

app.use(cors());

app.use(
  createValidatorRouter({
    log,
    scorer: system.scorer,
    participantDirectory: system.participantSync,
  }),
);

const server: Server = app.listen(config.PORT, () => {
  log.info(`Listening on port ${config.PORT}`);
});

system.registerCleanupHandler('http-server', async () => {
  await new Promise<void>((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });
});

export { server };
