/**
 * @license
 * Copyright 2025 Steven Roussey <sroussey@gmail.com>
 * SPDX-License-Identifier: Apache-2.0
 */

import { readFile } from "node:fs/promises";
import { MalformedInputError } from "../provider/AnnotationErrors";

const PNG_SIGNATURE = [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a];
const JPEG_SIGNATURE = [0xff, 0xd8, 0xff];

function startsWith(buffer: Buffer, signature: readonly number[]): boolean {
  return buffer.length >= signature.length && signature.every((byte, i) => buffer[i] === byte);
}

/**
 * MIME type of a PNG or JPEG buffer, detected from its leading bytes.
 */
export function detectImageMimeType(buffer: Buffer): "image/png" | "image/jpeg" | undefined {
  if (startsWith(buffer, PNG_SIGNATURE)) return "image/png";
  if (startsWith(buffer, JPEG_SIGNATURE)) return "image/jpeg";
  return undefined;
}

/**
 * Read an image file into a base64 data URI
 */
export async function readImageDataUri(filePath: string): Promise<string> {
  let buffer: Buffer;
  try {
    buffer = await readFile(filePath);
  } catch (error) {
    throw new MalformedInputError(`Failed to read image ${filePath}: ${error}`, filePath, {
      cause: error,
    });
  }

  const mimeType = detectImageMimeType(buffer);
  if (!mimeType) {
    throw new MalformedInputError(`${filePath} is not a PNG or JPEG image`, filePath);
  }
  return `data:${mimeType};base64,${buffer.toString("base64")}`;
}
