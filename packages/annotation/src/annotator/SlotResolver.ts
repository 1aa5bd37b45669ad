/**
 * @license
 * Copyright 2025 Steven Roussey <sroussey@gmail.com>
 * SPDX-License-Identifier: Apache-2.0
 */

import type { SlotTable } from "@handscribe/storage";

/**
 * Decides whether a cell still has to be computed.
 *
 * The answer is read from the table every time and never cached, so a cell
 * cleared by hand in the CSV between runs is computed again.
 */
export class SlotResolver {
  needsWork(table: SlotTable, key: string, column: string): boolean {
    return table.isAbsent(key, column);
  }
}
