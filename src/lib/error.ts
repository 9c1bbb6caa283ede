/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */

interface DetailedErrorOptions {
  stack?: string;
  [key: string]: unknown;
}

export class DetailedError extends Error {
  constructor(message: string, options?: DetailedErrorOptions) {
    super(message);
    this.name = this.constructor.name;
    Object.assign(this, options);
    this.stack = options?.stack ?? new Error().stack;
  }

  toJSON() {
    const { name, message, ...rest } = this;
    return {
      name,
      message,
      stack: this.stack,
      ...rest,
    };
  }
}

/**
 * Raised when a caller breaks an invariant the callee relies on (shrinking
 * the trust table, sampling from an empty index, scoring without results).
 * These indicate a bug upstream and are never converted into audit results.
 */
export class ContractViolationError extends DetailedError {}

export class TimeoutError extends DetailedError {}

export class StateLoadError extends DetailedError {}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
