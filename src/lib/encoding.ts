/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { Packr } from 'msgpackr';

// Base64 encoding and decoding

export function fromB64(input: string): Buffer {
  // Node's base64 decoder also accepts the URL safe alphabet
  return Buffer.from(input, 'base64');
}

export function toB64(buffer: Buffer): string {
  return buffer.toString('base64');
}

// MessagePack encoding and decoding

const packr = new Packr({
  useRecords: false, // stay compatible with other implementations
  variableMapSize: true, // sacrifice speed for space
});

export function toMsgpack(x: unknown): Buffer {
  return packr.pack(x);
}

export function fromMsgpack(buffer: Buffer): unknown {
  return packr.unpack(buffer);
}
