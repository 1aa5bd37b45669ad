/**
 * @license
 * Copyright 2025 Steven Roussey <sroussey@gmail.com>
 * SPDX-License-Identifier: Apache-2.0
 */

export * from "./events/EventEmitter";
export * from "./json-schema/DataPortSchema";
export * from "./json-schema/JsonSchema";
export * from "./json-schema/SchemaValidation";
export * from "./utilities/BaseError";
