/**
 * @license
 * Copyright 2025 Steven Roussey <sroussey@gmail.com>
 * SPDX-License-Identifier: Apache-2.0
 */

import {
  createDocumentBundle,
  createImageBundle,
  type DocumentFilter,
  type DocumentSequenceBundle,
  type ImageSequenceBundle,
  type InputBundle,
} from "@handscribe/ai";
import path from "node:path";
import type { AnnotationUnit } from "./AnnotationUnit";
import { listDirectories, listFiles } from "./fsWalk";

/** `.png` and `.jpg` frames (and the rarer `.jng`/`.ppg` spellings) */
export const IMAGE_FILE_PATTERN = /\.[pj][np]g$/;
export const JSON_FILE_PATTERN = /\.json$/;

export interface FolderCorpusOptions<Bundle extends InputBundle> {
  /** Root of a `<id_video>/<slot>/<files>` tree */
  readonly root: string;
  /** Which files of a slot folder are inputs */
  readonly filePattern: RegExp;
  /** Column suffix appended to the slot folder name (`c1` → `c1_description`) */
  readonly columnSuffix: string;
  readonly toBundle: (files: string[]) => Bundle;
}

/**
 * Walks the `<id_video>/<slot>` folders in path order and yields one unit per
 * folder that holds matching files. Files at any other depth are ignored.
 */
export async function* folderCorpus<Bundle extends InputBundle>(
  options: FolderCorpusOptions<Bundle>
): AsyncGenerator<AnnotationUnit<Bundle>> {
  for (const folder of await listDirectories(options.root)) {
    if (path.relative(options.root, folder).split(path.sep).length !== 2) continue;
    const files = await listFiles(folder, options.filePattern);
    if (files.length === 0) continue;

    yield {
      key: path.basename(path.dirname(folder)),
      column: `${path.basename(folder)}_${options.columnSuffix}`,
      bundle: options.toBundle(files),
    };
  }
}

/**
 * Frame folders, each capped to evenly spaced images.
 */
export function imageFolderCorpus(
  root: string,
  maxImages?: number
): AsyncGenerator<AnnotationUnit<ImageSequenceBundle>> {
  return folderCorpus({
    root,
    filePattern: IMAGE_FILE_PATTERN,
    columnSuffix: "description",
    toBundle: (files) => createImageBundle(files, maxImages),
  });
}

/**
 * Hand-pose JSON folders, every document reduced by `filter`.
 */
export function documentFolderCorpus(
  root: string,
  filter: DocumentFilter
): AsyncGenerator<AnnotationUnit<DocumentSequenceBundle>> {
  return folderCorpus({
    root,
    filePattern: JSON_FILE_PATTERN,
    columnSuffix: "description",
    toBundle: (files) => createDocumentBundle(files, filter),
  });
}
