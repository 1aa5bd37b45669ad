/**
 * @license
 * Copyright 2025 Steven Roussey <sroussey@gmail.com>
 * SPDX-License-Identifier: Apache-2.0
 */

export type { FromSchema, JSONSchema as JsonSchema } from "json-schema-to-ts";
