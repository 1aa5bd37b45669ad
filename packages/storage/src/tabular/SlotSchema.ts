/**
 * @license
 * Copyright 2025 Steven Roussey <sroussey@gmail.com>
 * SPDX-License-Identifier: Apache-2.0
 */

/** Number of annotation slots recorded per video. */
export const SLOT_COUNT = 8;

/** Name of the identifier column shared by every table. */
export const ID_COLUMN = "id_video";

/**
 * Fixed column layout of a slot table: one identifier column followed by
 * positionally named slot columns (`c1_<suffix>` … `cN_<suffix>`).
 */
export interface SlotSchema {
  readonly idColumn: string;
  readonly slotColumns: readonly string[];
  /** Identifier column first, then the slot columns, in on-disk order. */
  readonly columns: readonly string[];
}

/**
 * Builds the schema for a table whose slot columns end in `_<suffix>`.
 */
export function createSlotSchema(
  suffix: string,
  slotCount: number = SLOT_COUNT,
  idColumn: string = ID_COLUMN
): SlotSchema {
  const slotColumns = Array.from({ length: slotCount }, (_, i) => slotColumnName(i + 1, suffix));
  return {
    idColumn,
    slotColumns,
    columns: [idColumn, ...slotColumns],
  };
}

export function slotColumnName(slot: number, suffix: string): string {
  return `c${slot}_${suffix}`;
}

/** `id_video, c1_description … c8_description` */
export function descriptionSchema(): SlotSchema {
  return createSlotSchema("description");
}

/** `id_video, c1_command … c8_command` */
export function commandSchema(): SlotSchema {
  return createSlotSchema("command");
}

export function isSlotColumn(schema: SlotSchema, column: string): boolean {
  return schema.slotColumns.includes(column);
}
