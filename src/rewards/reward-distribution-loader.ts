/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import fs from 'node:fs';
import winston from 'winston';

import { contentSourceFromName } from '../constants.js';
import { normalizeLabel } from '../lib/content-label.js';
import { errorMessage } from '../lib/error.js';
import { isRecord } from '../lib/validation.js';
import type { RewardDistributionModel, SourceRewardModel } from '../types.js';

const SUPPORTED_VERSION = '1.0';

export class RewardDistributionLoader {
  private log: winston.Logger;

  constructor({ log }: { log: winston.Logger }) {
    this.log = log.child({ class: 'RewardDistributionLoader' });
  }

  load(configPath: string | URL): RewardDistributionModel {
    const log = this.log.child({ method: 'load' });

    try {
      const configData = fs.readFileSync(configPath, 'utf-8');
      const model = parseRewardDistribution(JSON.parse(configData));

      log.info('Loaded reward distribution', {
        configPath: configPath.toString(),
        maxAgeHours: model.maxAgeHours,
        sources: Object.keys(model.sources).length,
      });

      return model;
    } catch (error) {
      log.error('Failed to load reward distribution', {
        configPath: configPath.toString(),
        error: errorMessage(error),
      });
      throw new Error(
        `Failed to load reward distribution: ${errorMessage(error)}`,
      );
    }
  }
}

function parseSourceReward(name: string, value: unknown): SourceRewardModel {
  if (!isRecord(value)) {
    throw new Error(`Source '${name}' must be an object`);
  }
  if (typeof value.weight !== 'number' || value.weight < 0) {
    throw new Error(`Source '${name}' weight must be a non-negative number`);
  }
  if (typeof value.defaultScaleFactor !== 'number') {
    throw new Error(`Source '${name}' defaultScaleFactor must be a number`);
  }

  const labelScaleFactors: Record<string, number> = {};
  const rawFactors = value.labelScaleFactors ?? {};
  if (!isRecord(rawFactors)) {
    throw new Error(`Source '${name}' labelScaleFactors must be an object`);
  }
  for (const [label, factor] of Object.entries(rawFactors)) {
    const normalized = normalizeLabel(label);
    if (normalized === undefined || typeof factor !== 'number') {
      throw new Error(`Source '${name}' has an invalid factor for '${label}'`);
    }
    labelScaleFactors[normalized] = factor;
  }

  return {
    weight: value.weight,
    defaultScaleFactor: value.defaultScaleFactor,
    labelScaleFactors,
  };
}

export function parseRewardDistribution(config: unknown): RewardDistributionModel {
  if (!isRecord(config)) {
    throw new Error('Config must be an object');
  }
  if (config.version !== SUPPORTED_VERSION) {
    throw new Error(`Unsupported config version: ${String(config.version)}`);
  }
  if (typeof config.maxAgeHours !== 'number' || config.maxAgeHours <= 0) {
    throw new Error('maxAgeHours must be a positive number');
  }
  if (!isRecord(config.sources)) {
    throw new Error('sources must be an object');
  }

  const sources: RewardDistributionModel['sources'] = {};
  for (const [name, value] of Object.entries(config.sources)) {
    const source = contentSourceFromName(name);
    if (source === undefined) {
      throw new Error(`Unknown content source: ${name}`);
    }
    sources[source] = parseSourceReward(name, value);
  }

  return { maxAgeHours: config.maxAgeHours, sources };
}
