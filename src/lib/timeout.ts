/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import pTimeout from 'p-timeout';

import { TimeoutError } from './error.js';

/**
 * Runs `operation` with an AbortSignal that is aborted after `timeoutMs`.
 *
 * The returned promise rejects with a TimeoutError as soon as the deadline
 * passes, even if the operation ignores its signal.
 */
export async function withTimeout<T>(
  operation: (signal: AbortSignal) => Promise<T>,
  {
    timeoutMs,
    description = 'Operation',
  }: {
    timeoutMs: number;
    description?: string;
  },
): Promise<T> {
  const controller = new AbortController();

  return pTimeout(operation(controller.signal), {
    milliseconds: timeoutMs,
    fallback: () => {
      const error = new TimeoutError(
        `${description} timed out after ${timeoutMs}ms`,
        { timeoutMs },
      );
      controller.abort(error);
      throw error;
    },
  });
}
