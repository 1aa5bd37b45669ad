/**
 * @license
 * Copyright 2025 Steven Roussey <sroussey@gmail.com>
 * SPDX-License-Identifier: Apache-2.0
 */

export * from "./input/DocumentPayload";
export * from "./input/ImageInput";
export * from "./input/InputBundle";
export * from "./input/sampleEvenly";

export * from "./model/SourceConfig";

export * from "./provider/AnnotationErrors";
export * from "./provider/AnnotationSource";
