/**
 * @license
 * Copyright 2025 Steven Roussey <sroussey@gmail.com>
 * SPDX-License-Identifier: Apache-2.0
 */

import {
  MalformedInputError,
  SourceUnavailableError,
  type AnnotationResult,
  type AnnotationSource,
  type InputBundle,
} from "@handscribe/ai";
import { isSlotColumn, type ITableStorage, type SlotTable } from "@handscribe/storage";
import { EventEmitter } from "@handscribe/util";
import type { AnnotationUnit, AnnotationUnits } from "../corpus/AnnotationUnit";
import { SlotResolver } from "./SlotResolver";

/** Coordinates of a cell, as carried by annotator events */
export type CellRef = Pick<AnnotationUnit, "key" | "column">;

export type SkipReason = "already-filled" | "unknown-column";

/**
 * Type definitions for annotator events
 */
export type AnnotatorEvents = {
  /** A unit was reached; its row exists from here on */
  unit: [cell: CellRef];
  /** The cell needs no work */
  skipped: [cell: CellRef, reason: SkipReason];
  /** The source is being asked for the cell's value */
  pending: [cell: CellRef];
  filled: [cell: CellRef, value: string];
  rejected: [cell: CellRef, reason: string];
  malformed: [cell: CellRef, error: MalformedInputError];
  saved: [table: SlotTable];
  complete: [summary: AnnotationRunSummary];
};

export interface AnnotationRunSummary {
  /** Units read from the corpus */
  units: number;
  filled: number;
  alreadyFilled: number;
  rejected: number;
  malformed: number;
  unknownColumn: number;
  /** Rows of the final table */
  rows: number;
}

export interface AnnotatorRunOptions {
  /** Identifiers that get a row even when they yield no unit */
  readonly seedKeys?: Iterable<string>;
  readonly signal?: AbortSignal;
}

/**
 * Fills the absent cells of one table from an annotation source, one unit at
 * a time.
 *
 * Each filled cell is saved before the next unit starts, so an interrupted run
 * loses at most the cell in flight and the next run resumes where it stopped.
 * A rejected or malformed unit leaves its cell absent and the run continues;
 * an unavailable source stops the run with a {@link SourceUnavailableError}.
 * The table is sorted by identifier and saved once more at the end.
 */
export class IncrementalAnnotator<Bundle extends InputBundle = InputBundle> {
  public readonly events = new EventEmitter<AnnotatorEvents>();

  constructor(
    protected readonly storage: ITableStorage,
    protected readonly source: AnnotationSource<Bundle>,
    protected readonly resolver: SlotResolver = new SlotResolver()
  ) {}

  async run(
    units: AnnotationUnits<Bundle>,
    options: AnnotatorRunOptions = {}
  ): Promise<AnnotationRunSummary> {
    const summary: AnnotationRunSummary = {
      units: 0,
      filled: 0,
      alreadyFilled: 0,
      rejected: 0,
      malformed: 0,
      unknownColumn: 0,
      rows: 0,
    };

    let table = await this.storage.load();
    for (const key of options.seedKeys ?? []) {
      table.ensureRow(key);
    }

    for await (const unit of units) {
      summary.units++;
      const cell: CellRef = { key: unit.key, column: unit.column };
      table.ensureRow(unit.key);
      this.events.emit("unit", cell);

      if (!isSlotColumn(table.schema, unit.column)) {
        summary.unknownColumn++;
        this.events.emit("skipped", cell, "unknown-column");
        continue;
      }
      if (!this.resolver.needsWork(table, unit.key, unit.column)) {
        summary.alreadyFilled++;
        this.events.emit("skipped", cell, "already-filled");
        continue;
      }

      this.events.emit("pending", cell);
      let result: AnnotationResult;
      try {
        result = await this.source.produce(unit.bundle, options.signal);
      } catch (error) {
        if (error instanceof MalformedInputError) {
          summary.malformed++;
          this.events.emit("malformed", cell, error);
          continue;
        }
        throw error;
      }

      switch (result.status) {
        case "filled":
          table.setCell(unit.key, unit.column, result.value);
          await this.storage.save(table);
          summary.filled++;
          this.events.emit("filled", cell, result.value);
          this.events.emit("saved", table);
          break;
        case "rejected":
          summary.rejected++;
          this.events.emit("rejected", cell, result.reason);
          break;
        case "unavailable":
          throw new SourceUnavailableError(
            `[${this.source.name}] ${unit.key} / ${unit.column}: ${result.reason}`
          );
      }
    }

    table = table.sortByKey();
    await this.storage.save(table);
    summary.rows = table.size;
    this.events.emit("saved", table);
    this.events.emit("complete", summary);
    return summary;
  }
}
