/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { type ContentSource, contentSourceNames } from '../constants.js';
import { ContractViolationError } from '../lib/error.js';
import type { ContentVerifier, ContentVerifierProvider } from '../types.js';

export class StaticContentVerifierProvider implements ContentVerifierProvider {
  private verifiers: Map<ContentSource, ContentVerifier>;

  constructor(verifiers: Iterable<[ContentSource, ContentVerifier]>) {
    this.verifiers = new Map(verifiers);
  }

  sources(): ContentSource[] {
    return [...this.verifiers.keys()];
  }

  get(source: ContentSource): ContentVerifier {
    const verifier = this.verifiers.get(source);
    if (verifier === undefined) {
      throw new ContractViolationError(
        `No content verifier configured for source ${contentSourceNames[source]}`,
        { source },
      );
    }
    return verifier;
  }
}
