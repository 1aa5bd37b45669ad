/**
 * @license
 * Copyright 2025 Steven Roussey <sroussey@gmail.com>
 * SPDX-License-Identifier: Apache-2.0
 */

import {
  filledResult,
  type DocumentSequenceBundle,
  type ImageSequenceBundle,
  type TextBundle,
} from "@handscribe/ai";
import {
  datasetLayout,
  documentDescriptionsFile,
  predictionPathFor,
  runCleaningJob,
  runCommandPredictionJob,
  runDocumentDescriptionJobs,
  runHumanImportJob,
  runImageDescriptionJob,
  type DatasetLayout,
} from "@handscribe/annotation";
import { commandSchema, CsvTableStorage, descriptionSchema, SlotTable } from "@handscribe/storage";
import { readdir, readFile } from "node:fs/promises";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
  makeTempDir,
  PNG_BYTES,
  removeTempDir,
  StubAnnotationSource,
  writeFixture,
} from "../../samples";

const DESCRIPTION_HEADER =
  "id_video,c1_description,c2_description,c3_description,c4_description," +
  "c5_description,c6_description,c7_description,c8_description";

describe("dataset layout", () => {
  it("places every input and output under the root", () => {
    const layout = datasetLayout("/work");
    expect(layout).toEqual({
      rawAnnotations: path.join("/work", "dataset", "elicit_cam.csv"),
      imagesDir: path.join("/work", "dataset", "images"),
      jsonsDir: path.join("/work", "dataset", "jsons"),
      descriptionsDir: path.join("/work", "data", "descriptions"),
      predictionsDir: path.join("/work", "data", "predictions"),
    });
  });

  it("numbers document tables after the image table", () => {
    expect(documentDescriptionsFile("poses")).toBe("d4_openai_poses_descriptions.csv");
    expect(documentDescriptionsFile("landmarks")).toBe("d5_openai_landmarks_descriptions.csv");
    expect(documentDescriptionsFile("combined")).toBe("d6_openai_combined_descriptions.csv");
  });

  it("mirrors description paths under the predictions directory", () => {
    const layout = datasetLayout("/work");
    expect(
      predictionPathFor(layout, path.join(layout.descriptionsDir, "d3_llm_non_structured_descriptions.csv"))
    ).toBe(path.join(layout.predictionsDir, "d3_llm_non_structured_predictions.csv"));
    expect(
      predictionPathFor(layout, path.join(layout.descriptionsDir, "extra", "d9_descriptions.csv"))
    ).toBe(path.join(layout.predictionsDir, "extra", "d9_predictions.csv"));
  });
});

describe("dataset jobs", () => {
  let root: string;
  let layout: DatasetLayout;

  beforeEach(async () => {
    root = await makeTempDir();
    layout = datasetLayout(root);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await removeTempDir(root);
  });

  it("imports the human annotations into the d0 table", async () => {
    await writeFixture(
      root,
      "dataset/elicit_cam.csv",
      `participant,${DESCRIPTION_HEADER}\n` +
        "p02,v2,Swipe left,unknown,,,,,,\n" +
        "p01,v1,Closed fist,,,,,,,\n"
    );

    const table = await runHumanImportJob(layout);

    expect(table.keys()).toEqual(["v1", "v2"]);
    expect(
      await readFile(path.join(layout.descriptionsDir, "d0_human_structured_descriptions.csv"), "utf-8")
    ).toBe(`${DESCRIPTION_HEADER}\n` + "v1,Closed fist,,,,,,,\n" + "v2,Swipe left,,,,,,,\n");
  });

  it("fails the human import when the raw file is missing", async () => {
    await expect(runHumanImportJob(layout)).rejects.toMatchObject({ code: "ENOENT" });
  });

  it("describes frame folders into the d3 table", async () => {
    await writeFixture(root, "dataset/images/v1/c2/000.png", PNG_BYTES);
    const source = new StubAnnotationSource<ImageSequenceBundle>(() => filledResult("Hand waves."));
    const observe = vi.fn();

    const summary = await runImageDescriptionJob(layout, source, { observe });

    expect(summary).toMatchObject({ filled: 1, rows: 1 });
    expect(observe).toHaveBeenCalledWith(expect.anything(), "d3_llm_non_structured_descriptions.csv");
    const table = await new CsvTableStorage(
      path.join(layout.descriptionsDir, "d3_llm_non_structured_descriptions.csv"),
      descriptionSchema()
    ).load();
    expect(table.getCell("v1", "c2_description")).toBe("Hand waves.");
  });

  it("writes one table per requested document filter", async () => {
    await writeFixture(root, "dataset/jsons/v1/c1/000.json", "{}");
    const source = new StubAnnotationSource<DocumentSequenceBundle>((bundle) =>
      filledResult(`from ${bundle.filter}`)
    );

    const summaries = await runDocumentDescriptionJobs(layout, source, {}, ["landmarks", "combined"]);

    expect(Array.from(summaries.keys())).toEqual(["landmarks", "combined"]);
    expect((await readdir(layout.descriptionsDir)).sort()).toEqual([
      "d5_openai_landmarks_descriptions.csv",
      "d6_openai_combined_descriptions.csv",
    ]);
    const combined = await new CsvTableStorage(
      path.join(layout.descriptionsDir, "d6_openai_combined_descriptions.csv"),
      descriptionSchema()
    ).load();
    expect(combined.getCell("v1", "c1_description")).toBe("from combined");
  });

  it("predicts commands for every description table, seeding every video", async () => {
    const upstream = new SlotTable(descriptionSchema()).ensureRow("v1").ensureRow("v2");
    upstream.setCell("v1", "c2_description", "Index finger on the lips");
    await new CsvTableStorage(
      path.join(layout.descriptionsDir, "d0_human_structured_descriptions.csv"),
      descriptionSchema()
    ).save(upstream);
    const source = new StubAnnotationSource<TextBundle>(() => filledResult("Mute microphone"));

    const summaries = await runCommandPredictionJob(layout, source);

    const outputPath = path.join(layout.predictionsDir, "d0_human_structured_predictions.csv");
    expect(Array.from(summaries.keys())).toEqual([outputPath]);
    expect(source.calls).toEqual([{ kind: "text", text: "Index finger on the lips" }]);
    const predictions = await new CsvTableStorage(outputPath, commandSchema()).load();
    expect(predictions.keys()).toEqual(["v1", "v2"]);
    expect(predictions.getCell("v1", "c2_command")).toBe("Mute microphone");
    expect(predictions.isAbsent("v2", "c1_command")).toBe(true);
  });

  it("cleans every description table in place", async () => {
    const filePath = await writeFixture(
      root,
      "data/descriptions/d3_llm_non_structured_descriptions.csv",
      `${DESCRIPTION_HEADER}\n` + "v1,Hand raised.,No gesture performed.,,,,,,\n"
    );

    expect(await runCleaningJob(layout)).toEqual([filePath]);
    expect(await readFile(filePath, "utf-8")).toBe(`${DESCRIPTION_HEADER}\n` + "v1,Hand raised,,,,,,,\n");
  });
});
