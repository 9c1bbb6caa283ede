/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { Router, type Request, type Response } from 'express';
import { default as asyncHandler } from 'express-async-handler';
import * as promClient from 'prom-client';
import type { Logger } from 'winston';

import { errorMessage } from '../lib/error.js';
import { isMiner, isValidator } from '../peers/participant-sync.js';
import { CREDIBLE_THRESHOLD, type MinerScorer } from '../rewards/miner-scorer.js';
import type { ParticipantDirectory } from '../types.js';

export interface ValidatorRouterConfig {
  log: Logger;
  scorer: MinerScorer;
  participantDirectory: ParticipantDirectory;
  registry?: promClient.Registry;
}

export function createValidatorRouter({
  log,
  scorer,
  participantDirectory,
  registry = promClient.register,
}: ValidatorRouterConfig): Router {
  const validatorRouter = Router();
  const startedAt = Date.now();

  validatorRouter.get('/healthcheck', (_req: Request, res: Response) => {
    res.status(200).json({
      status: 'ok',
      uptime: (Date.now() - startedAt) / 1000,
      date: new Date().toISOString(),
    });
  });

  /**
   * GET /scores
   * Current score and credibility of every uid, indexed by uid
   */
  validatorRouter.get(
    '/scores',
    asyncHandler(async (_req: Request, res: Response) => {
      const [scores, credibility] = await Promise.all([
        scorer.getScores(),
        scorer.getCredibilities(),
      ]);
      res.json({ scores, credibility });
    }),
  );

  // Last synced participant table with the role each participant plays
  validatorRouter.get('/participants', (_req: Request, res: Response) => {
    res.json({
      participants: participantDirectory
        .getParticipants()
        .map((participant) => ({
          uid: participant.uid,
          hotkey: participant.hotkey,
          endpoint: participant.endpoint,
          stake: participant.stake,
          isMiner: isMiner(participant),
          isValidator: isValidator(participant),
        })),
    });
  });

  validatorRouter.get(
    '/miners/:uid',
    asyncHandler(async (req: Request, res: Response) => {
      const uid = Number(req.params.uid);
      if (!Number.isSafeInteger(uid) || uid < 0) {
        res.status(400).json({ error: 'uid must be a non-negative integer' });
        return;
      }
      if (uid >= (await scorer.getMinerCount())) {
        res.status(404).json({ error: 'Unknown uid' });
        return;
      }

      const { score, credibility } = await scorer.getMinerTrust(uid);
      res.json({
        uid,
        hotkey: participantDirectory.getHotkey(uid) ?? null,
        score,
        credibility,
        credible: credibility >= CREDIBLE_THRESHOLD,
      });
    }),
  );

  validatorRouter.get(
    '/metrics',
    asyncHandler(async (_req: Request, res: Response) => {
      try {
        res.set('Content-Type', registry.contentType);
        res.end(await registry.metrics());
      } catch (error) {
        log.error('Failed to render metrics', { message: errorMessage(error) });
        res.status(500).send(errorMessage(error));
      }
    }),
  );

  return validatorRouter;
}
