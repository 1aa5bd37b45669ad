/**
 * @license
 * Copyright 2025 Steven Roussey <sroussey@gmail.com>
 * SPDX-License-Identifier: Apache-2.0
 */

import { EventEmitter } from "@handscribe/util";
import { parse } from "csv-parse/sync";
import { stringify } from "csv-stringify/sync";
import { mkdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import path from "node:path";
import type { ITableStorage, TableStorageEvents } from "./ITableStorage";
import type { SlotSchema } from "./SlotSchema";
import { SlotTable, type SlotRow } from "./SlotTable";
import { TableSchemaError } from "./TableErrors";

/**
 * A table storage backed by a single CSV file.
 *
 * The file has a header row with the schema's columns; absent cells are empty
 * fields. Saves go to a sibling temporary file that is then renamed over the
 * target, so a reader never observes a half-written table.
 */
export class CsvTableStorage implements ITableStorage {
  public readonly events = new EventEmitter<TableStorageEvents>();
  public readonly filePath: string;

  /**
   * @param filePath - Path of the CSV file; it does not need to exist yet
   * @param schema - Columns the table is constrained to
   */
  constructor(
    filePath: string,
    public readonly schema: SlotSchema
  ) {
    this.filePath = path.resolve(filePath);
  }

  /**
   * Reads the CSV file. A missing file yields an empty table; columns outside
   * the schema are dropped; a schema column missing from the header is an error.
   */
  async load(): Promise<SlotTable> {
    let content: string;
    try {
      content = await readFile(this.filePath, { encoding: "utf-8" });
    } catch (error) {
      if (isNotFound(error)) {
        const table = new SlotTable(this.schema);
        this.events.emit("load", table);
        return table;
      }
      throw error;
    }

    const table = SlotTable.fromRows(this.schema, this.parseCsvContent(content));
    this.events.emit("load", table);
    return table;
  }

  /**
   * Writes every row of `table` in schema column order, replacing the file.
   */
  async save(table: SlotTable): Promise<void> {
    const columns = this.schema.columns;
    const records = [
      [...columns],
      ...table.rows().map((row) => columns.map((column) => row[column] ?? "")),
    ];
    const content = stringify(records);

    await mkdir(path.dirname(this.filePath), { recursive: true });
    const tempPath = `${this.filePath}.${process.pid}.tmp`;
    try {
      await writeFile(tempPath, content, { encoding: "utf-8" });
      await rename(tempPath, this.filePath);
    } catch (error) {
      await rm(tempPath, { force: true });
      throw error;
    }
    this.events.emit("save", table);
  }

  /**
   * Parse CSV content into rows restricted to the schema's columns
   */
  protected parseCsvContent(content: string): SlotRow[] {
    if (content.trim() === "") {
      return [];
    }

    let records: unknown;
    try {
      records = parse(content, { bom: true, skip_empty_lines: true, relax_column_count: true });
    } catch (error) {
      throw new TableSchemaError(`Failed to parse CSV ${this.filePath}: ${error}`, {
        cause: error,
      });
    }
    if (!isStringMatrix(records) || records.length === 0) {
      throw new TableSchemaError(`Failed to parse CSV ${this.filePath}: no header row`);
    }

    const [header, ...body] = records;
    const indexes = this.schema.columns.map((column) => header.indexOf(column));
    const missing = this.schema.columns.filter((_, i) => indexes[i] === -1);
    if (missing.length > 0) {
      throw new TableSchemaError(
        `CSV ${this.filePath} is missing column(s): ${missing.join(", ")}`
      );
    }

    return body.map((record) => {
      const row: Record<string, string | null> = {};
      this.schema.columns.forEach((column, i) => {
        const value = record[indexes[i]];
        row[column] = value === undefined || value === "" ? null : value;
      });
      return row;
    });
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

function isStringMatrix(value: unknown): value is string[][] {
  return (
    Array.isArray(value) &&
    value.every((row) => Array.isArray(row) && row.every((cell) => typeof cell === "string"))
  );
}
