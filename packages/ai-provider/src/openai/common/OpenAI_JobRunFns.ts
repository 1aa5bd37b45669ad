/**
 * @license
 * Copyright 2025 Steven Roussey <sroussey@gmail.com>
 * SPDX-License-Identifier: Apache-2.0
 */

import {
  AZURE_OPENAI,
  filledResult,
  ProviderRequestError,
  rejectedResult,
  unavailableResult,
  type AnnotationResult,
  type SourceConfig,
} from "@handscribe/ai";

/**
 * Models that require or prefer max_completion_tokens instead of max_tokens.
 *
 * - o1-series models REQUIRE max_completion_tokens (will error with max_tokens)
 * - GPT-4o and newer models ACCEPT both parameters but prefer max_completion_tokens
 * - GPT-4, GPT-3.5-turbo primarily use max_tokens
 */
const MODELS_USING_MAX_COMPLETION_TOKENS = ["o1-preview", "o1-mini", "o1", "gpt-4o", "chatgpt-4o-latest"];

/**
 * Models that should use the legacy max_tokens parameter.
 */
const MODELS_USING_MAX_TOKENS = ["gpt-3.5-turbo", "gpt-4", "gpt-4-turbo"];

/**
 * Determines whether to use max_completion_tokens based on the model name.
 * Unknown models get max_completion_tokens, the newer parameter.
 */
export function shouldUseMaxCompletionTokens(model: string): boolean {
  for (const legacyModel of MODELS_USING_MAX_TOKENS) {
    if (model === legacyModel || model.startsWith(`${legacyModel}-`)) {
      return false;
    }
  }
  for (const newModel of MODELS_USING_MAX_COMPLETION_TOKENS) {
    if (model === newModel || model.startsWith(`${newModel}-`)) {
      return true;
    }
  }
  return true;
}

/**
 * Sampling parameters shared by every annotation request.
 */
export const CHAT_COMPLETION_DEFAULTS = {
  maxTokens: 200,
  temperature: 0,
  topP: 0.1,
} as const;

/**
 * A part of a multi-part user message
 */
export type ChatContentPart =
  | { type: "text"; text: string }
  | { type: "image_url"; image_url: { url: string } };

export interface ChatMessage {
  role: "system" | "user" | "assistant";
  content: string | ChatContentPart[];
}

/**
 * OpenAI Chat Completions API request body
 */
interface OpenAIChatCompletionRequest {
  model?: string;
  messages: ChatMessage[];
  max_tokens?: number;
  max_completion_tokens?: number;
  temperature?: number;
  top_p?: number;
}

/** Status codes meaning the credentials or deployment cannot serve requests */
const UNAVAILABLE_STATUSES = new Set([401, 403, 404]);

/** Markers of a provider-side content block in an error body */
const CONTENT_FILTER_PATTERN = /content_filter|content_policy_violation|ResponsibleAIPolicyViolation/;

/**
 * Resolves the request URL, headers and base body for the configured scheme.
 */
export function buildChatCompletionRequest(
  config: SourceConfig,
  messages: ChatMessage[]
): { url: string; headers: Record<string, string>; body: OpenAIChatCompletionRequest } {
  const body: OpenAIChatCompletionRequest = {
    messages,
    temperature: CHAT_COMPLETION_DEFAULTS.temperature,
    top_p: CHAT_COMPLETION_DEFAULTS.topP,
  };

  if (config.provider === AZURE_OPENAI) {
    // The 2024-02-01 API version predates max_completion_tokens
    body.max_tokens = CHAT_COMPLETION_DEFAULTS.maxTokens;
    const endpoint = config.endpoint.replace(/\/+$/, "");
    return {
      url:
        `${endpoint}/openai/deployments/${encodeURIComponent(config.deployment)}` +
        `/chat/completions?api-version=${encodeURIComponent(config.api_version)}`,
      headers: {
        "Content-Type": "application/json",
        "api-key": config.api_key,
      },
      body,
    };
  }

  body.model = config.model;
  if (shouldUseMaxCompletionTokens(config.model)) {
    body.max_completion_tokens = CHAT_COMPLETION_DEFAULTS.maxTokens;
  } else {
    body.max_tokens = CHAT_COMPLETION_DEFAULTS.maxTokens;
  }
  return {
    url: `${config.base_url.replace(/\/+$/, "")}/chat/completions`,
    headers: {
      "Content-Type": "application/json",
      Authorization: `Bearer ${config.api_key}`,
    },
    body,
  };
}

/**
 * Pulls the first choice's text and finish reason out of a response body.
 */
function readFirstChoice(data: unknown): { content: string; finishReason: string } {
  if (typeof data !== "object" || data === null || !("choices" in data)) {
    return { content: "", finishReason: "" };
  }
  const choices = data.choices;
  const choice: unknown = Array.isArray(choices) ? choices[0] : undefined;
  if (typeof choice !== "object" || choice === null) {
    return { content: "", finishReason: "" };
  }
  const finishReason =
    "finish_reason" in choice && typeof choice.finish_reason === "string"
      ? choice.finish_reason
      : "";
  const message = "message" in choice ? choice.message : undefined;
  const content =
    typeof message === "object" &&
    message !== null &&
    "content" in message &&
    typeof message.content === "string"
      ? message.content
      : "";
  return { content, finishReason };
}

/**
 * Sends one chat completion request and classifies the outcome.
 *
 * Content filtered by the provider and empty answers are `rejected`; 401, 403
 * and 404 are `unavailable`.
 * @throws ProviderRequestError on network failures and any other HTTP error
 */
export async function OpenAI_ChatCompletion(
  config: SourceConfig,
  messages: ChatMessage[],
  signal?: AbortSignal
): Promise<AnnotationResult> {
  const { url, headers, body } = buildChatCompletionRequest(config, messages);

  let response: Response;
  try {
    response = await fetch(url, {
      method: "POST",
      headers,
      body: JSON.stringify(body),
      signal,
    });
  } catch (error) {
    throw new ProviderRequestError(
      `OpenAI request failed: ${error instanceof Error ? error.message : String(error)}`,
      undefined,
      { cause: error }
    );
  }

  if (!response.ok) {
    const errorText = await response.text().catch(() => "Unable to read error response");
    const message = `OpenAI API error: ${response.status} ${response.statusText}. ${errorText}`;
    if (UNAVAILABLE_STATUSES.has(response.status)) {
      return unavailableResult(message);
    }
    if (response.status === 400 && CONTENT_FILTER_PATTERN.test(errorText)) {
      return rejectedResult(message);
    }
    throw new ProviderRequestError(message, response.status);
  }

  let data: unknown;
  try {
    data = await response.json();
  } catch (error) {
    throw new ProviderRequestError(
      `OpenAI API returned an unreadable response: ${error instanceof Error ? error.message : String(error)}`,
      response.status,
      { cause: error }
    );
  }
  const { content, finishReason } = readFirstChoice(data);
  if (finishReason === "content_filter") {
    return rejectedResult("Response blocked by the provider content filter");
  }
  const text = content.trim();
  if (!text) {
    return rejectedResult("Empty response from the model");
  }
  return filledResult(text);
}
