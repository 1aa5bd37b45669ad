/**
 * @license
 * Copyright 2025 Steven Roussey <sroussey@gmail.com>
 * SPDX-License-Identifier: Apache-2.0
 */

import { DOCUMENT_FILTERS, loadSourceConfig, type DocumentFilter } from "@handscribe/ai";
import {
  CommandPredictionSource,
  GestureDocumentDescriptionSource,
  GestureImageDescriptionSource,
} from "@handscribe/ai-provider";
import {
  attachConsoleReporter,
  datasetLayout,
  runCleaningJob,
  runCommandPredictionJob,
  runDocumentDescriptionJobs,
  runHumanImportJob,
  runImageDescriptionJob,
  type JobOptions,
} from "@handscribe/annotation";
import { InvalidArgumentError, Option, type Command } from "commander";

interface RootOptions {
  root?: string;
}

interface JsonsOptions extends RootOptions {
  filter?: DocumentFilter[];
}

const jobOptions: JobOptions = { observe: attachConsoleReporter };

const rootOption = () =>
  new Option("--root <dir>", "base directory holding dataset/ and data/ (default: cwd)");

function isDocumentFilter(value: string): value is DocumentFilter {
  return DOCUMENT_FILTERS.some((filter) => filter === value);
}

function parseDocumentFilter(value: string, previous: DocumentFilter[] = []): DocumentFilter[] {
  if (!isDocumentFilter(value)) {
    throw new InvalidArgumentError(`Allowed choices are ${DOCUMENT_FILTERS.join(", ")}.`);
  }
  return [...previous, value];
}

/**
 * Runs a job action, turning any error into a commander error exit.
 */
function guarded<Args extends unknown[]>(
  program: Command,
  name: string,
  action: (...args: Args) => Promise<void>
): (...args: Args) => Promise<void> {
  return async (...args: Args) => {
    try {
      await action(...args);
    } catch (error) {
      const message = error instanceof Error ? `${error.name}: ${error.message}` : String(error);
      program.error(`Error running ${name} job: ${message}`);
    }
  };
}

export function AddBaseCommands(program: Command) {
  program
    .command("human")
    .description("import the human study annotations as a description table")
    .addOption(rootOption())
    .action(
      guarded(program, "human", async (options: RootOptions) => {
        const table = await runHumanImportJob(datasetLayout(options.root));
        console.log(`Imported ${table.size} rows of human descriptions`);
      })
    );

  program
    .command("images")
    .description("describe the gesture in every frame folder with the vision model")
    .addOption(rootOption())
    .action(
      guarded(program, "images", async (options: RootOptions) => {
        const source = new GestureImageDescriptionSource(loadSourceConfig());
        await runImageDescriptionJob(datasetLayout(options.root), source, jobOptions);
      })
    );

  program
    .command("jsons")
    .description("describe the gesture in every hand-pose folder, once per document filter")
    .addOption(rootOption())
    .option(
      "--filter <filter>",
      `document filter to run, repeatable (${DOCUMENT_FILTERS.join(", ")}; default: all)`,
      parseDocumentFilter
    )
    .action(
      guarded(program, "jsons", async (options: JsonsOptions) => {
        const source = new GestureDocumentDescriptionSource(loadSourceConfig());
        await runDocumentDescriptionJobs(
          datasetLayout(options.root),
          source,
          jobOptions,
          options.filter ?? DOCUMENT_FILTERS
        );
      })
    );

  program
    .command("commands")
    .description("predict a meeting command for every description")
    .addOption(rootOption())
    .action(
      guarded(program, "commands", async (options: RootOptions) => {
        const source = new CommandPredictionSource(loadSourceConfig());
        const summaries = await runCommandPredictionJob(
          datasetLayout(options.root),
          source,
          jobOptions
        );
        console.log(`Wrote ${summaries.size} prediction table(s)`);
      })
    );

  program
    .command("clean")
    .description("drop no-gesture answers and trailing periods from every description table")
    .addOption(rootOption())
    .action(
      guarded(program, "clean", async (options: RootOptions) => {
        const files = await runCleaningJob(datasetLayout(options.root));
        for (const file of files) {
          console.log(`Cleaned ${file}`);
        }
      })
    );
}
