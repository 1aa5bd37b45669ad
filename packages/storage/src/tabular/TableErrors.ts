/**
 * @license
 * Copyright 2025 Steven Roussey <sroussey@gmail.com>
 * SPDX-License-Identifier: Apache-2.0
 */

import { BaseError } from "@handscribe/util";

/**
 * A CSV file does not carry the columns its schema requires, or cannot be parsed.
 */
export class TableSchemaError extends BaseError {
  public static type: string = "TableSchemaError";
}

/**
 * A cell was addressed on a row that does not exist; call `ensureRow` first.
 */
export class KeyNotFoundError extends BaseError {
  public static type: string = "KeyNotFoundError";

  constructor(public readonly key: string) {
    super(`No row with identifier "${key}"`);
  }
}

/**
 * A cell was addressed on a column that is not one of the schema's slot columns.
 */
export class UnknownColumnError extends BaseError {
  public static type: string = "UnknownColumnError";

  constructor(public readonly column: string) {
    super(`"${column}" is not a slot column of this table`);
  }
}
