/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import winston from 'winston';
import log from '../src/log.js';

/**
 * Creates a child of the main logger (which writes to logs/test.log under
 * the test runner) tagged with the suite and test case names.
 *
 * @example
 * ```typescript
 * const log = createTestLogger({ suite: 'MinerScorer' });
 * ```
 */
export function createTestLogger(options?: {
  suite?: string;
  test?: string;
  metadata?: Record<string, unknown>;
}): winston.Logger {
  const { suite, test, metadata = {} } = options ?? {};

  return log.child({
    ...metadata,
    ...(suite !== undefined && { testSuite: suite }),
    ...(test !== undefined && { testCase: test }),
  });
}
