/**
 * @license
 * Copyright 2025 Steven Roussey <sroussey@gmail.com>
 * SPDX-License-Identifier: Apache-2.0
 */

export * from "./annotator/IncrementalAnnotator";
export * from "./annotator/SlotResolver";

export * from "./cleaning/HumanDescriptionImport";
export * from "./cleaning/PostProcessCleaner";

export * from "./corpus/AnnotationUnit";
export * from "./corpus/FolderCorpus";
export * from "./corpus/fsWalk";
export * from "./corpus/TableCorpus";

export * from "./jobs/DatasetJobs";

export * from "./reporting/ConsoleReporter";
