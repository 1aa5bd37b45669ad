/**
 * @license
 * Copyright 2025 Steven Roussey <sroussey@gmail.com>
 * SPDX-License-Identifier: Apache-2.0
 */

import type { InputBundle } from "@handscribe/ai";

/**
 * One candidate cell of a corpus and the input that produces its value.
 */
export interface AnnotationUnit<Bundle extends InputBundle = InputBundle> {
  readonly key: string;
  readonly column: string;
  readonly bundle: Bundle;
}

/**
 * Units in processing order. Folder corpora are read lazily from disk.
 */
export type AnnotationUnits<Bundle extends InputBundle = InputBundle> =
  | Iterable<AnnotationUnit<Bundle>>
  | AsyncIterable<AnnotationUnit<Bundle>>;
