/**
 * @license
 * Copyright 2025 Steven Roussey <sroussey@gmail.com>
 * SPDX-License-Identifier: Apache-2.0
 */

import { createTextBundle, type TextBundle } from "@handscribe/ai";
import { slotColumnName, type SlotTable } from "@handscribe/storage";
import type { AnnotationUnit } from "./AnnotationUnit";

/**
 * Yields, in row order, one text unit per present cell of an upstream table.
 * The n-th slot of the upstream table feeds the n-th `<targetSuffix>` slot.
 */
export function* tableCorpus(
  upstream: SlotTable,
  targetSuffix: string
): Generator<AnnotationUnit<TextBundle>> {
  for (const key of upstream.keys()) {
    for (const [i, column] of upstream.schema.slotColumns.entries()) {
      const value = upstream.getCell(key, column);
      if (value === null) continue;
      yield {
        key,
        column: slotColumnName(i + 1, targetSuffix),
        bundle: createTextBundle(value),
      };
    }
  }
}
