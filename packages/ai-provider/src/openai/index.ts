/**
 * @license
 * Copyright 2025 Steven Roussey <sroussey@gmail.com>
 * SPDX-License-Identifier: Apache-2.0
 */

export { CommandPredictionSource, normalizeCommandLabel } from "./CommandPredictionSource";
export { GestureDocumentDescriptionSource } from "./GestureDocumentDescriptionSource";
export { GestureImageDescriptionSource } from "./GestureImageDescriptionSource";
export { OpenAIAnnotationSource } from "./OpenAIAnnotationSource";
export {
  buildChatCompletionRequest,
  CHAT_COMPLETION_DEFAULTS,
  OpenAI_ChatCompletion,
  shouldUseMaxCompletionTokens,
} from "./common/OpenAI_JobRunFns";
export type { ChatContentPart, ChatMessage } from "./common/OpenAI_JobRunFns";
export * from "./common/OpenAI_Prompts";
