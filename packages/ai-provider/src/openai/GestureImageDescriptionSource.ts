/**
 * @license
 * Copyright 2025 Steven Roussey <sroussey@gmail.com>
 * SPDX-License-Identifier: Apache-2.0
 */

import { readImageDataUri, type ImageSequenceBundle } from "@handscribe/ai";
import type { ChatContentPart, ChatMessage } from "./common/OpenAI_JobRunFns";
import {
  IMAGE_DESCRIPTION_SYSTEM_PROMPT,
  IMAGE_DESCRIPTION_USER_PROMPT,
} from "./common/OpenAI_Prompts";
import { OpenAIAnnotationSource } from "./OpenAIAnnotationSource";

/**
 * Describes the hand gesture shown across a sequence of video frames.
 */
export class GestureImageDescriptionSource extends OpenAIAnnotationSource<ImageSequenceBundle> {
  readonly name = "gesture-image-description";

  protected async buildMessages(bundle: ImageSequenceBundle): Promise<ChatMessage[]> {
    const images: ChatContentPart[] = [];
    for (const path of bundle.paths) {
      images.push({ type: "image_url", image_url: { url: await readImageDataUri(path) } });
    }
    return [
      { role: "system", content: IMAGE_DESCRIPTION_SYSTEM_PROMPT },
      { role: "user", content: IMAGE_DESCRIPTION_USER_PROMPT },
      { role: "user", content: images },
    ];
  }
}
