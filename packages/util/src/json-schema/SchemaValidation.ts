/**
 * @license
 * Copyright 2025 Steven Roussey <sroussey@gmail.com>
 * SPDX-License-Identifier: Apache-2.0
 */

import { compileSchema } from "json-schema-library";
import type { DataPortSchemaObject } from "./DataPortSchema";

/**
 * Validates `data` against `schema` and returns one message per violation,
 * suffixed with the JSON pointer of the offending value. Empty when valid.
 */
export function schemaErrors(schema: DataPortSchemaObject, data: unknown): string[] {
  const result = compileSchema(schema).validate(data);
  if (result.valid) return [];
  return result.errors.map((e) => {
    const path = e.data?.pointer || "";
    return `${e.message}${path ? ` (${path})` : ""}`;
  });
}
