/**
 * @license
 * Copyright 2025 Steven Roussey <sroussey@gmail.com>
 * SPDX-License-Identifier: Apache-2.0
 */

import { readFile } from "node:fs/promises";
import { MalformedInputError } from "../provider/AnnotationErrors";
import type { DocumentFilter } from "./InputBundle";

/** Field of a hand-pose document that holds the per-hand landmark lists. */
export const LANDMARKS_FIELD = "hand_landmarks";

type JsonObject = { [key: string]: unknown };

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Reduces one parsed document to the part selected by `filter`.
 */
export function filterDocument(document: unknown, filter: DocumentFilter, path = ""): unknown {
  if (filter === "combined") {
    return document;
  }
  if (!isJsonObject(document)) {
    throw new MalformedInputError(`Expected a JSON object in ${path}`, path);
  }
  if (filter === "landmarks") {
    return { [LANDMARKS_FIELD]: document[LANDMARKS_FIELD] ?? {} };
  }
  const { [LANDMARKS_FIELD]: _landmarks, ...rest } = document;
  return rest;
}

/**
 * Reads the JSON files in order and joins them into one text payload, one line
 * per file labelled with its 1-based position: `Image 1: {...}`.
 */
export async function buildDocumentPayload(
  paths: readonly string[],
  filter: DocumentFilter
): Promise<string> {
  let payload = "";
  for (const [i, path] of paths.entries()) {
    let document: unknown;
    try {
      document = JSON.parse(await readFile(path, { encoding: "utf-8" }));
    } catch (error) {
      throw new MalformedInputError(`Failed to read JSON document ${path}: ${error}`, path, {
        cause: error,
      });
    }
    payload += `Image ${i + 1}: ${JSON.stringify(filterDocument(document, filter, path))}\n`;
  }
  return payload;
}
