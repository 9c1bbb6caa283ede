/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { default as axios, type AxiosInstance } from 'axios';
import winston from 'winston';

import { sanityCheckParticipantTable } from '../lib/validation.js';
import type { Participant, ParticipantSource } from '../types.js';

export class HttpParticipantSource implements ParticipantSource {
  private log: winston.Logger;
  private tableAxios: AxiosInstance;
  private participantTableUrl: string;

  constructor({
    log,
    participantTableUrl,
    requestTimeoutMs = 30_000,
  }: {
    log: winston.Logger;
    participantTableUrl: string;
    requestTimeoutMs?: number;
  }) {
    this.log = log.child({ class: this.constructor.name });
    this.participantTableUrl = participantTableUrl;
    this.tableAxios = axios.create({ timeout: requestTimeoutMs });
  }

  async getParticipants(): Promise<Participant[]> {
    const response = await this.tableAxios.request({
      method: 'GET',
      url: this.participantTableUrl,
    });
    const participants = sanityCheckParticipantTable(response.data);
    this.log.debug('Fetched participant table', {
      participantCount: participants.length,
    });
    return participants;
  }
}
