/**
 * @license
 * Copyright 2025 Steven Roussey <sroussey@gmail.com>
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * Picks at most `cap` items spread evenly over `items`, always keeping the
 * first and the last, in their original relative order. Sequences that already
 * fit are returned unchanged (as a copy).
 */
export function sampleEvenly<T>(items: readonly T[], cap: number): T[] {
  if (!Number.isInteger(cap) || cap < 1) {
    throw new RangeError(`Sample cap must be a positive integer, got ${cap}`);
  }
  const count = items.length;
  if (count <= cap) {
    return [...items];
  }
  if (cap === 1) {
    return [items[0]];
  }

  const indices = new Set<number>();
  for (let i = 0; i < cap; i++) {
    indices.add(Math.floor(((count - 1) * i) / (cap - 1)));
  }
  return Array.from(indices)
    .sort((a, b) => a - b)
    .map((index) => items[index]);
}
