/**
 * @license
 * Copyright 2025 Steven Roussey <sroussey@gmail.com>
 * SPDX-License-Identifier: Apache-2.0
 */

import {
  buildDocumentPayload,
  detectImageMimeType,
  filterDocument,
  MalformedInputError,
  readImageDataUri,
} from "@handscribe/ai";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { JPEG_BYTES, makeTempDir, PNG_BYTES, removeTempDir, writeFixture } from "../../samples";

const FRAME = {
  handedness: ["Right"],
  hand_world_landmarks: [[0.5, 0.5, 0]],
  hand_landmarks: { Right: [[0.1, 0.2, 0]] },
};

describe("document payloads", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it("filters a document by field", () => {
    expect(filterDocument(FRAME, "combined")).toBe(FRAME);
    expect(filterDocument(FRAME, "landmarks")).toEqual({ hand_landmarks: { Right: [[0.1, 0.2, 0]] } });
    expect(filterDocument(FRAME, "poses")).toEqual({
      handedness: ["Right"],
      hand_world_landmarks: [[0.5, 0.5, 0]],
    });
    expect(filterDocument({ handedness: [] }, "landmarks")).toEqual({ hand_landmarks: {} });
  });

  it("rejects documents that are not objects when filtering", () => {
    expect(() => filterDocument([1, 2], "poses", "frame.json")).toThrow(MalformedInputError);
    expect(filterDocument([1, 2], "combined")).toEqual([1, 2]);
  });

  it("labels one line per document with its position", async () => {
    const first = await writeFixture(dir, "001.json", JSON.stringify(FRAME));
    const second = await writeFixture(dir, "002.json", JSON.stringify({ handedness: ["Left"] }));

    expect(await buildDocumentPayload([first, second], "landmarks")).toBe(
      'Image 1: {"hand_landmarks":{"Right":[[0.1,0.2,0]]}}\n' + 'Image 2: {"hand_landmarks":{}}\n'
    );
    expect(await buildDocumentPayload([second], "combined")).toBe(
      'Image 1: {"handedness":["Left"]}\n'
    );
  });

  it("raises MalformedInputError for unreadable or invalid JSON", async () => {
    const broken = await writeFixture(dir, "broken.json", "{ not json");

    await expect(buildDocumentPayload([broken], "combined")).rejects.toThrow(MalformedInputError);
    await expect(
      buildDocumentPayload([path.join(dir, "missing.json")], "combined")
    ).rejects.toMatchObject({ type: "MalformedInputError", path: path.join(dir, "missing.json") });
  });
});

describe("image input", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it("detects PNG and JPEG from their leading bytes", () => {
    expect(detectImageMimeType(PNG_BYTES)).toBe("image/png");
    expect(detectImageMimeType(JPEG_BYTES)).toBe("image/jpeg");
    expect(detectImageMimeType(Buffer.from("GIF89a"))).toBeUndefined();
    expect(detectImageMimeType(Buffer.alloc(0))).toBeUndefined();
  });

  it("reads an image as a base64 data URI whatever its extension", async () => {
    const png = await writeFixture(dir, "frame.jpg", PNG_BYTES);
    const jpeg = await writeFixture(dir, "frame.png", JPEG_BYTES);

    expect(await readImageDataUri(png)).toBe("data:image/png;base64,iVBORw0KGgo=");
    expect(await readImageDataUri(jpeg)).toBe("data:image/jpeg;base64,/9j/4A==");
  });

  it("raises MalformedInputError for files that are not images", async () => {
    const text = await writeFixture(dir, "frame.png", "not an image");

    await expect(readImageDataUri(text)).rejects.toThrow(MalformedInputError);
    await expect(readImageDataUri(path.join(dir, "missing.png"))).rejects.toThrow(
      MalformedInputError
    );
  });
});
