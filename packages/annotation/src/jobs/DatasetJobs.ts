/**
 * @license
 * Copyright 2025 Steven Roussey <sroussey@gmail.com>
 * SPDX-License-Identifier: Apache-2.0
 */

import {
  DOCUMENT_FILTERS,
  type AnnotationSource,
  type DocumentFilter,
  type DocumentSequenceBundle,
  type ImageSequenceBundle,
  type InputBundle,
  type TextBundle,
} from "@handscribe/ai";
import {
  commandSchema,
  CsvTableStorage,
  descriptionSchema,
  type SlotTable,
} from "@handscribe/storage";
import type { EventEmitter } from "@handscribe/util";
import { access } from "node:fs/promises";
import path from "node:path";
import {
  IncrementalAnnotator,
  type AnnotationRunSummary,
  type AnnotatorEvents,
} from "../annotator/IncrementalAnnotator";
import { importHumanDescriptions } from "../cleaning/HumanDescriptionImport";
import { PostProcessCleaner } from "../cleaning/PostProcessCleaner";
import type { AnnotationUnits } from "../corpus/AnnotationUnit";
import { documentFolderCorpus, imageFolderCorpus } from "../corpus/FolderCorpus";
import { listFilesRecursive } from "../corpus/fsWalk";
import { tableCorpus } from "../corpus/TableCorpus";

/**
 * Where each job reads its inputs and writes its tables, relative to one root.
 */
export interface DatasetLayout {
  /** Raw human annotations of the elicitation study */
  readonly rawAnnotations: string;
  /** `<id_video>/<slot>/*.png|jpg` frame folders */
  readonly imagesDir: string;
  /** `<id_video>/<slot>/*.json` hand-pose folders */
  readonly jsonsDir: string;
  readonly descriptionsDir: string;
  readonly predictionsDir: string;
}

export function datasetLayout(root: string = process.cwd()): DatasetLayout {
  return {
    rawAnnotations: path.join(root, "dataset", "elicit_cam.csv"),
    imagesDir: path.join(root, "dataset", "images"),
    jsonsDir: path.join(root, "dataset", "jsons"),
    descriptionsDir: path.join(root, "data", "descriptions"),
    predictionsDir: path.join(root, "data", "predictions"),
  };
}

export const HUMAN_DESCRIPTIONS_FILE = "d0_human_structured_descriptions.csv";
export const IMAGE_DESCRIPTIONS_FILE = "d3_llm_non_structured_descriptions.csv";

/** `d4_openai_poses_…`, `d5_openai_landmarks_…`, `d6_openai_combined_…` */
export function documentDescriptionsFile(filter: DocumentFilter): string {
  return `d${DOCUMENT_FILTERS.indexOf(filter) + 4}_openai_${filter}_descriptions.csv`;
}

/**
 * Prediction table path mirroring a description table path.
 */
export function predictionPathFor(layout: DatasetLayout, descriptionPath: string): string {
  const relative = path.relative(layout.descriptionsDir, descriptionPath);
  const file = path.basename(relative).replace("_descriptions.", "_predictions.");
  return path.join(layout.predictionsDir, path.dirname(relative), file);
}

const CSV_FILE_PATTERN = /\.csv$/;

export interface JobOptions {
  /** Called with the events of every annotator a job creates, before it runs */
  readonly observe?: (events: EventEmitter<AnnotatorEvents>, label: string) => void;
  readonly signal?: AbortSignal;
}

async function annotate<Bundle extends InputBundle>(
  outputPath: string,
  source: AnnotationSource<Bundle>,
  units: AnnotationUnits<Bundle>,
  options: JobOptions,
  table: "description" | "command",
  seedKeys?: Iterable<string>
): Promise<AnnotationRunSummary> {
  const schema = table === "description" ? descriptionSchema() : commandSchema();
  const annotator = new IncrementalAnnotator(new CsvTableStorage(outputPath, schema), source);
  options.observe?.(annotator.events, path.basename(outputPath));
  return annotator.run(units, { seedKeys, signal: options.signal });
}

/**
 * Human annotations → `d0_human_structured_descriptions.csv`.
 * @throws when the raw annotation file does not exist
 */
export async function runHumanImportJob(layout: DatasetLayout): Promise<SlotTable> {
  await access(layout.rawAnnotations);
  return importHumanDescriptions(
    new CsvTableStorage(layout.rawAnnotations, descriptionSchema()),
    new CsvTableStorage(path.join(layout.descriptionsDir, HUMAN_DESCRIPTIONS_FILE), descriptionSchema())
  );
}

/**
 * Frame folders → `d3_llm_non_structured_descriptions.csv`.
 */
export async function runImageDescriptionJob(
  layout: DatasetLayout,
  source: AnnotationSource<ImageSequenceBundle>,
  options: JobOptions = {}
): Promise<AnnotationRunSummary> {
  return annotate(
    path.join(layout.descriptionsDir, IMAGE_DESCRIPTIONS_FILE),
    source,
    imageFolderCorpus(layout.imagesDir),
    options,
    "description"
  );
}

/**
 * Hand-pose folders → one description table per document filter, in order.
 */
export async function runDocumentDescriptionJobs(
  layout: DatasetLayout,
  source: AnnotationSource<DocumentSequenceBundle>,
  options: JobOptions = {},
  filters: readonly DocumentFilter[] = DOCUMENT_FILTERS
): Promise<Map<DocumentFilter, AnnotationRunSummary>> {
  const summaries = new Map<DocumentFilter, AnnotationRunSummary>();
  for (const filter of filters) {
    summaries.set(
      filter,
      await annotate(
        path.join(layout.descriptionsDir, documentDescriptionsFile(filter)),
        source,
        documentFolderCorpus(layout.jsonsDir, filter),
        options,
        "description"
      )
    );
  }
  return summaries;
}

/**
 * Every description table → a command prediction table beside it under the
 * predictions directory. Every upstream video gets a row.
 */
export async function runCommandPredictionJob(
  layout: DatasetLayout,
  source: AnnotationSource<TextBundle>,
  options: JobOptions = {}
): Promise<Map<string, AnnotationRunSummary>> {
  const summaries = new Map<string, AnnotationRunSummary>();
  for (const descriptionPath of await listFilesRecursive(layout.descriptionsDir, CSV_FILE_PATTERN)) {
    const upstream = await new CsvTableStorage(descriptionPath, descriptionSchema()).load();
    const outputPath = predictionPathFor(layout, descriptionPath);
    summaries.set(
      outputPath,
      await annotate(
        outputPath,
        source,
        tableCorpus(upstream, "command"),
        options,
        "command",
        upstream.keys()
      )
    );
  }
  return summaries;
}

/**
 * Cleans every description table in place.
 * @returns the paths that were rewritten
 */
export async function runCleaningJob(
  layout: DatasetLayout,
  cleaner: PostProcessCleaner = new PostProcessCleaner()
): Promise<string[]> {
  const files = await listFilesRecursive(layout.descriptionsDir, CSV_FILE_PATTERN);
  for (const file of files) {
    const storage = new CsvTableStorage(file, descriptionSchema());
    await storage.save(cleaner.clean(await storage.load()));
  }
  return files;
}
