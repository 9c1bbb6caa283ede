/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */

export type RandomFunction = () => number;

export function totalWeight<T>(
  table: readonly T[],
  weightOf: (element: T) => number,
): number {
  return table.reduce(
    (previousTotal, element) => previousTotal + Math.max(0, weightOf(element)),
    0,
  );
}

/**
 * Roulette wheel selection over `table` in its given order.
 *
 * A point is drawn uniformly in [0, total) and the first element whose
 * cumulative weight reaches it is returned. Elements with no weight are never
 * chosen. Returns undefined when the table carries no weight at all.
 */
export function randomWeightedChoice<T>({
  table,
  weightOf,
  randomFunction = Math.random,
}: {
  table: readonly T[];
  weightOf: (element: T) => number;
  randomFunction?: RandomFunction;
}): T | undefined {
  const total = totalWeight(table, weightOf);
  if (total <= 0) {
    return undefined;
  }

  const choice = randomFunction() * total;

  let cumulated = 0;
  let lastWeighted: T | undefined;
  for (const element of table) {
    const weight = Math.max(0, weightOf(element));
    if (weight === 0) {
      continue;
    }

    cumulated += weight;
    lastWeighted = element;
    if (cumulated >= choice) {
      return element;
    }
  }

  // Only reachable through floating point drift in the running sum
  return lastWeighted;
}
