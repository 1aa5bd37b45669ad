/**
 * @license
 * Copyright 2025 Steven Roussey <sroussey@gmail.com>
 * SPDX-License-Identifier: Apache-2.0
 */

import type { InputBundle } from "../input/InputBundle";

/**
 * Outcome of one `produce` call.
 *
 * - `filled`: the provider answered with a non-empty text
 * - `rejected`: the call completed but the provider refused or blocked the
 *   content, or answered with nothing; the cell is skipped
 * - `unavailable`: the provider cannot be used with this configuration; the
 *   run must stop
 */
export type AnnotationResult =
  | { readonly status: "filled"; readonly value: string }
  | { readonly status: "rejected"; readonly reason: string }
  | { readonly status: "unavailable"; readonly reason: string };

export function filledResult(value: string): AnnotationResult {
  return { status: "filled", value };
}

export function rejectedResult(reason: string): AnnotationResult {
  return { status: "rejected", reason };
}

export function unavailableResult(reason: string): AnnotationResult {
  return { status: "unavailable", reason };
}

/**
 * Something that turns an input bundle into an annotation text.
 *
 * Implementations throw `MalformedInputError` when an input file cannot be
 * read and `ProviderRequestError` for transport failures; every other outcome
 * is reported through the returned {@link AnnotationResult}.
 */
export interface AnnotationSource<Bundle extends InputBundle = InputBundle> {
  readonly name: string;
  produce(bundle: Bundle, signal?: AbortSignal): Promise<AnnotationResult>;
}
