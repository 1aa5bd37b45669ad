/**
 * @license
 * Copyright 2025 Steven Roussey <sroussey@gmail.com>
 * SPDX-License-Identifier: Apache-2.0
 */

import type { TextBundle } from "@handscribe/ai";
import type { ChatMessage } from "./common/OpenAI_JobRunFns";
import {
  COMMAND_PREDICTION_SYSTEM_PROMPT,
  COMMAND_PREDICTION_USER_PROMPT,
} from "./common/OpenAI_Prompts";
import { OpenAIAnnotationSource } from "./OpenAIAnnotationSource";

/**
 * Reduces a free-text answer to a label: every non-letter becomes a space,
 * the ends are trimmed, and only the first letter is upper case.
 */
export function normalizeCommandLabel(text: string): string {
  const letters = text.replace(/[^a-zA-Z]/g, " ").trim();
  return letters.charAt(0).toUpperCase() + letters.slice(1).toLowerCase();
}

/**
 * Maps a gesture description to one of the hybrid-meeting control commands.
 */
export class CommandPredictionSource extends OpenAIAnnotationSource<TextBundle> {
  readonly name = "command-prediction";

  protected async buildMessages(bundle: TextBundle): Promise<ChatMessage[]> {
    return [
      { role: "system", content: COMMAND_PREDICTION_SYSTEM_PROMPT },
      { role: "user", content: COMMAND_PREDICTION_USER_PROMPT },
      { role: "user", content: bundle.text },
    ];
  }

  protected normalize(text: string): string {
    return normalizeCommandLabel(text);
  }
}
