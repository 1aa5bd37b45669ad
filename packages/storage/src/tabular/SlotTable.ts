/**
 * @license
 * Copyright 2025 Steven Roussey <sroussey@gmail.com>
 * SPDX-License-Identifier: Apache-2.0
 */

import { isSlotColumn, type SlotSchema } from "./SlotSchema";
import { KeyNotFoundError, UnknownColumnError } from "./TableErrors";

/**
 * A cell value: a present string, or `null` for absence. The empty string is
 * never stored; it is normalized to `null`.
 */
export type Cell = string | null;

/**
 * One row as written to disk: the identifier column plus every slot column.
 */
export type SlotRow = Readonly<Record<string, Cell>>;

type SlotCells = Record<string, Cell>;

/**
 * An in-memory table of video identifiers and their slot cells.
 *
 * Rows are kept in a Map keyed by identifier, so existence checks and updates
 * are constant time and duplicate keys cannot be represented. Insertion order
 * is the row order until {@link SlotTable.sortByKey} is applied.
 */
export class SlotTable {
  private readonly cells: Map<string, SlotCells> = new Map();

  constructor(public readonly schema: SlotSchema) {}

  /**
   * Builds a table from rows shaped like {@link SlotRow}. A key seen twice is
   * merged into a single row; the first present value of each column wins.
   */
  static fromRows(schema: SlotSchema, rows: Iterable<SlotRow>): SlotTable {
    const table = new SlotTable(schema);
    for (const row of rows) {
      const key = row[schema.idColumn];
      if (!key) continue;
      table.ensureRow(key);
      for (const column of schema.slotColumns) {
        const value = row[column] ?? null;
        if (value && table.isAbsent(key, column)) {
          table.setCell(key, column, value);
        }
      }
    }
    return table;
  }

  get size(): number {
    return this.cells.size;
  }

  keys(): string[] {
    return Array.from(this.cells.keys());
  }

  /**
   * Appends a row with every slot absent unless `key` already exists.
   */
  ensureRow(key: string): this {
    if (!this.cells.has(key)) {
      const empty: SlotCells = {};
      for (const column of this.schema.slotColumns) {
        empty[column] = null;
      }
      this.cells.set(key, empty);
    }
    return this;
  }

  setCell(key: string, column: string, value: Cell): this {
    this.assertColumn(column);
    const row = this.cells.get(key);
    if (!row) {
      throw new KeyNotFoundError(key);
    }
    row[column] = value === "" ? null : value;
    return this;
  }

  getCell(key: string, column: string): Cell {
    this.assertColumn(column);
    return this.cells.get(key)?.[column] ?? null;
  }

  /**
   * True when the cell is absent on every row matching `key`, which includes
   * the case of no matching row at all.
   */
  isAbsent(key: string, column: string): boolean {
    return this.getCell(key, column) === null;
  }

  /**
   * Returns a new table with rows ascending by identifier. Equal keys cannot
   * occur, and `Array.prototype.sort` is stable regardless.
   */
  sortByKey(): SlotTable {
    const sorted = new SlotTable(this.schema);
    const keys = this.keys().sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
    for (const key of keys) {
      const row = this.cells.get(key);
      if (row) sorted.cells.set(key, { ...row });
    }
    return sorted;
  }

  /**
   * Returns a new table with `fn` applied to every slot cell.
   */
  map(fn: (value: Cell, column: string, key: string) => Cell): SlotTable {
    const mapped = new SlotTable(this.schema);
    for (const [key, row] of this.cells) {
      const next: SlotCells = {};
      for (const column of this.schema.slotColumns) {
        const value = fn(row[column] ?? null, column, key);
        next[column] = value === "" ? null : value;
      }
      mapped.cells.set(key, next);
    }
    return mapped;
  }

  /**
   * Rows in table order, each with the identifier column and all slot columns.
   */
  rows(): SlotRow[] {
    return Array.from(this.cells, ([key, row]) => {
      const out: SlotCells = { [this.schema.idColumn]: key };
      for (const column of this.schema.slotColumns) {
        out[column] = row[column] ?? null;
      }
      return out;
    });
  }

  private assertColumn(column: string): void {
    if (!isSlotColumn(this.schema, column)) {
      throw new UnknownColumnError(column);
    }
  }
}
