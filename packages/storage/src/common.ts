/**
 * @license
 * Copyright 2025 Steven Roussey <sroussey@gmail.com>
 * SPDX-License-Identifier: Apache-2.0
 */

export * from "./tabular/InMemoryTableStorage";
export * from "./tabular/ITableStorage";
export * from "./tabular/SlotSchema";
export * from "./tabular/SlotTable";
export * from "./tabular/TableErrors";
