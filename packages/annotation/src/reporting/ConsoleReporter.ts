/**
 * @license
 * Copyright 2025 Steven Roussey <sroussey@gmail.com>
 * SPDX-License-Identifier: Apache-2.0
 */

import type { EventEmitter } from "@handscribe/util";
import type { AnnotationRunSummary, AnnotatorEvents } from "../annotator/IncrementalAnnotator";

export function formatSummary(label: string, summary: AnnotationRunSummary): string {
  return (
    `${label}: ${summary.filled} filled, ${summary.alreadyFilled} already filled, ` +
    `${summary.rejected} rejected, ${summary.malformed} malformed, ` +
    `${summary.unknownColumn} unknown column(s); ${summary.rows} rows`
  );
}

/**
 * Prints per-unit progress and skips to the console.
 * @returns a function that detaches the reporter
 */
export function attachConsoleReporter(
  events: EventEmitter<AnnotatorEvents>,
  label: string
): () => void {
  const unsubscribes = [
    events.subscribe("unit", ({ key, column }) => {
      console.log(`Processing ${key} / ${column}...`);
    }),
    events.subscribe("skipped", ({ key, column }, reason) => {
      if (reason === "unknown-column") {
        console.warn(`Skipped ${key} / ${column}: not a column of ${label}`);
      }
    }),
    events.subscribe("rejected", ({ key, column }, reason) => {
      console.warn(`Skipped ${key} / ${column}: ${reason}`);
    }),
    events.subscribe("malformed", ({ key, column }, error) => {
      console.warn(`Skipped ${key} / ${column}: ${error.message}`);
    }),
    events.subscribe("complete", (summary) => {
      console.log(formatSummary(label, summary));
    }),
  ];
  return () => unsubscribes.forEach((unsubscribe) => unsubscribe());
}
