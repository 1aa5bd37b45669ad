/**
 * @license
 * Copyright 2025 Steven Roussey <sroussey@gmail.com>
 * SPDX-License-Identifier: Apache-2.0
 */

import { EventEmitter } from "@handscribe/util";
import type { ITableStorage, TableStorageEvents } from "./ITableStorage";
import type { SlotSchema } from "./SlotSchema";
import { SlotTable, type SlotRow } from "./SlotTable";

/**
 * Table storage that keeps the last saved snapshot in memory. Every save is
 * recorded in `history`, which makes it the stand-in for CSV files in tests.
 */
export class InMemoryTableStorage implements ITableStorage {
  public readonly events = new EventEmitter<TableStorageEvents>();
  /** Snapshot of the rows of every save, oldest first */
  public readonly history: SlotRow[][] = [];
  private snapshot: SlotRow[] | undefined;

  constructor(
    public readonly schema: SlotSchema,
    initialRows?: SlotRow[]
  ) {
    this.snapshot = initialRows ? initialRows.map((row) => ({ ...row })) : undefined;
  }

  async load(): Promise<SlotTable> {
    const table = SlotTable.fromRows(this.schema, this.snapshot ?? []);
    this.events.emit("load", table);
    return table;
  }

  async save(table: SlotTable): Promise<void> {
    this.snapshot = table.rows();
    this.history.push(this.snapshot);
    this.events.emit("save", table);
  }
}
