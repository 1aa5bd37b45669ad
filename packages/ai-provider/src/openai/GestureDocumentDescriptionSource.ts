/**
 * @license
 * Copyright 2025 Steven Roussey <sroussey@gmail.com>
 * SPDX-License-Identifier: Apache-2.0
 */

import { buildDocumentPayload, type DocumentSequenceBundle } from "@handscribe/ai";
import type { ChatMessage } from "./common/OpenAI_JobRunFns";
import {
  DOCUMENT_DESCRIPTION_SYSTEM_PROMPT,
  DOCUMENT_DESCRIPTION_USER_PROMPT,
} from "./common/OpenAI_Prompts";
import { OpenAIAnnotationSource } from "./OpenAIAnnotationSource";

/**
 * Describes the hand gesture captured by a sequence of hand-pose JSON documents.
 */
export class GestureDocumentDescriptionSource extends OpenAIAnnotationSource<DocumentSequenceBundle> {
  readonly name = "gesture-document-description";

  protected async buildMessages(bundle: DocumentSequenceBundle): Promise<ChatMessage[]> {
    return [
      { role: "system", content: DOCUMENT_DESCRIPTION_SYSTEM_PROMPT },
      { role: "user", content: DOCUMENT_DESCRIPTION_USER_PROMPT },
      { role: "user", content: await buildDocumentPayload(bundle.paths, bundle.filter) },
    ];
  }
}
