/**
 * @license
 * Copyright 2025 Steven Roussey <sroussey@gmail.com>
 * SPDX-License-Identifier: Apache-2.0
 */

import type { EventEmitter } from "@handscribe/util";
import type { SlotSchema } from "./SlotSchema";
import type { SlotTable } from "./SlotTable";

/**
 * Type definitions for table storage events
 */
export type TableStorageEvents = {
  load: [table: SlotTable];
  save: [table: SlotTable];
};

/**
 * Interface defining the contract for persisting one slot table.
 *
 * `load` never fails for a table that was never saved: it returns an empty
 * table with the storage's schema. `save` replaces the whole persisted table.
 */
export interface ITableStorage {
  readonly schema: SlotSchema;
  readonly events: EventEmitter<TableStorageEvents>;
  load(): Promise<SlotTable>;
  save(table: SlotTable): Promise<void>;
}
