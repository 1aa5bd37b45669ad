/**
 * @license
 * Copyright 2025 Steven Roussey <sroussey@gmail.com>
 * SPDX-License-Identifier: Apache-2.0
 */

import type { JsonSchema } from "./JsonSchema";

export type DataPortSchemaNonBoolean = Exclude<JsonSchema, boolean>;

/**
 * Narrows to object schemas while preserving all schema properties.
 */
export type DataPortSchemaObject = DataPortSchemaNonBoolean & {
  readonly type: "object";
  readonly properties: Record<string, DataPortSchemaNonBoolean>;
};
