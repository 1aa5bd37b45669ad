/**
 * @license
 * Copyright 2025 Steven Roussey <sroussey@gmail.com>
 * SPDX-License-Identifier: Apache-2.0
 */

import type { Cell, SlotTable } from "@handscribe/storage";

/**
 * Model answers that mean "nothing was performed". They are stored as absent
 * cells rather than as descriptions.
 */
export const NO_GESTURE_SENTENCES: readonly string[] = [
  "No gesture performed.",
  "No hand gesture performed.",
  "The user does not perform any gesture.",
  "The user does not perform any hand gesture.",
  "The user does not perform any hand gestures.",
  "The user does not perform any gesture throughout the sequence.",
  "The user does not perform any distinct gesture.",
  "No discernible hand gesture is performed.",
];

/**
 * Normalizes annotation values once a table is complete: blocklisted
 * sentences become absent and trailing periods are dropped from the rest.
 * Applying it twice gives the same table as applying it once.
 */
export class PostProcessCleaner {
  private readonly blocklist: ReadonlySet<string>;

  constructor(blocklist: readonly string[] = NO_GESTURE_SENTENCES) {
    this.blocklist = new Set(blocklist);
  }

  cleanValue(value: Cell): Cell {
    if (value === null || this.blocklist.has(value)) {
      return null;
    }
    return value.replace(/\.+$/, "") || null;
  }

  clean(table: SlotTable): SlotTable {
    return table.map((value) => this.cleanValue(value));
  }
}
