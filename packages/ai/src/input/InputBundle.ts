/**
 * @license
 * Copyright 2025 Steven Roussey <sroussey@gmail.com>
 * SPDX-License-Identifier: Apache-2.0
 */

import { sampleEvenly } from "./sampleEvenly";

/** Largest number of images sent for one cell. */
export const MAX_IMAGES_PER_BUNDLE = 50;

/**
 * Which part of each hand-pose document goes into the payload:
 * - `combined`: the whole document
 * - `landmarks`: only the `hand_landmarks` field
 * - `poses`: everything except `hand_landmarks`
 */
export type DocumentFilter = "poses" | "landmarks" | "combined";

export const DOCUMENT_FILTERS: readonly DocumentFilter[] = ["poses", "landmarks", "combined"];

export interface ImageSequenceBundle {
  readonly kind: "images";
  /** Ordered image file paths */
  readonly paths: readonly string[];
}

export interface DocumentSequenceBundle {
  readonly kind: "documents";
  /** Ordered JSON file paths */
  readonly paths: readonly string[];
  readonly filter: DocumentFilter;
}

export interface TextBundle {
  readonly kind: "text";
  readonly text: string;
}

export type InputBundle = ImageSequenceBundle | DocumentSequenceBundle | TextBundle;

/**
 * Image bundle capped at `maxImages` evenly spaced frames of `paths`.
 */
export function createImageBundle(
  paths: readonly string[],
  maxImages: number = MAX_IMAGES_PER_BUNDLE
): ImageSequenceBundle {
  return { kind: "images", paths: sampleEvenly(paths, maxImages) };
}

export function createDocumentBundle(
  paths: readonly string[],
  filter: DocumentFilter
): DocumentSequenceBundle {
  return { kind: "documents", paths: [...paths], filter };
}

export function createTextBundle(text: string): TextBundle {
  return { kind: "text", text };
}
