/**
 * @license
 * Copyright 2025 Steven Roussey <sroussey@gmail.com>
 * SPDX-License-Identifier: Apache-2.0
 */

import {
  filledResult,
  rejectedResult,
  validateSourceConfig,
  type AnnotationResult,
  type AnnotationSource,
  type InputBundle,
  type SourceConfig,
} from "@handscribe/ai";
import { OpenAI_ChatCompletion, type ChatMessage } from "./common/OpenAI_JobRunFns";

/**
 * Base class for annotation sources backed by OpenAI chat completions, either
 * directly or through an Azure OpenAI deployment.
 *
 * The config is validated here, so a misconfigured source fails at
 * construction with a `ConfigurationError` before any unit is processed.
 * Subclasses only build the messages for a bundle and may normalize the answer.
 */
export abstract class OpenAIAnnotationSource<Bundle extends InputBundle>
  implements AnnotationSource<Bundle>
{
  abstract readonly name: string;
  public readonly config: SourceConfig;

  constructor(config: SourceConfig) {
    this.config = validateSourceConfig(config);
  }

  protected abstract buildMessages(bundle: Bundle): Promise<ChatMessage[]>;

  /**
   * Post-processes a non-empty model answer. Returning an empty string turns
   * the answer into a rejection.
   */
  protected normalize(text: string): string {
    return text;
  }

  async produce(bundle: Bundle, signal?: AbortSignal): Promise<AnnotationResult> {
    const messages = await this.buildMessages(bundle);
    const result = await OpenAI_ChatCompletion(this.config, messages, signal);
    if (result.status !== "filled") {
      return result;
    }
    const value = this.normalize(result.value);
    return value ? filledResult(value) : rejectedResult(`Answer "${result.value}" normalized to nothing`);
  }
}
