/**
 * @license
 * Copyright 2025 Steven Roussey <sroussey@gmail.com>
 * SPDX-License-Identifier: Apache-2.0
 */

import type { ITableStorage, SlotTable } from "@handscribe/storage";

/** Annotators wrote "unknown" where they could not describe a gesture */
export const UNKNOWN_PATTERN = /\s*unknown\s*/;

/**
 * Clears every cell whose text contains the "unknown" marker.
 */
export function scrubUnknown(table: SlotTable): SlotTable {
  return table.map((value) => (value !== null && UNKNOWN_PATTERN.test(value) ? null : value));
}

/**
 * Copies the human study annotations into a description table: only the
 * schema's columns are kept, "unknown" cells are cleared, rows are sorted.
 */
export async function importHumanDescriptions(
  raw: ITableStorage,
  target: ITableStorage
): Promise<SlotTable> {
  const table = scrubUnknown(await raw.load()).sortByKey();
  await target.save(table);
  return table;
}
