/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import fse from 'fs-extra';
import fs from 'node:fs';
import path from 'node:path';

import type { KVBufferStore } from '../types.js';

const VALID_KEY = /^[a-zA-Z0-9_.-]+$/;

let tmpFileCounter = 0;

export class FsKVStore implements KVBufferStore {
  private baseDir: string;
  private tmpDir: string;

  constructor({ baseDir, tmpDir }: { baseDir: string; tmpDir: string }) {
    this.baseDir = baseDir;
    this.tmpDir = tmpDir;
    fs.mkdirSync(baseDir, { recursive: true });
    fs.mkdirSync(tmpDir, { recursive: true });
  }

  private bufferPath(key: string): string {
    if (!VALID_KEY.test(key) || key === '.' || key === '..') {
      throw new Error(`Invalid key: ${key}`);
    }
    return path.join(this.baseDir, key);
  }

  async get(key: string): Promise<Buffer | undefined> {
    if (await this.has(key)) {
      return fs.promises.readFile(this.bufferPath(key));
    }
    return undefined;
  }

  async has(key: string): Promise<boolean> {
    return fse.pathExists(this.bufferPath(key));
  }

  async del(key: string): Promise<void> {
    await fse.remove(this.bufferPath(key));
  }

  async set(key: string, buffer: Buffer): Promise<void> {
    const finalPath = this.bufferPath(key);

    // Write to a temporary file first so readers never see a partial value
    const tmpPath = path.join(this.tmpDir, `${key}.${process.pid}.${tmpFileCounter++}`);
    await fs.promises.writeFile(tmpPath, buffer);
    await fse.move(tmpPath, finalPath, { overwrite: true });
  }

  async close(): Promise<void> {
    // No-op
  }
}
