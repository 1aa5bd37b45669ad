/**
 * @license
 * Copyright 2025 Steven Roussey <sroussey@gmail.com>
 * SPDX-License-Identifier: Apache-2.0
 */

import { schemaErrors, type DataPortSchemaObject, type FromSchema } from "@handscribe/util";
import { ConfigurationError } from "../provider/AnnotationErrors";

export const OPENAI = "OPENAI";
export const AZURE_OPENAI = "AZURE_OPENAI";

export const DEFAULT_MODEL = "gpt-4o";
export const DEFAULT_OPENAI_BASE_URL = "https://api.openai.com/v1";
export const AZURE_OPENAI_API_VERSION = "2024-02-01";

export const OpenAISourceConfigSchema = {
  type: "object",
  properties: {
    provider: {
      type: "string",
      const: OPENAI,
      title: "Provider",
    },
    api_key: {
      type: "string",
      minLength: 1,
      title: "API Key",
      description: "OpenAI API key (OPENAI_API_KEY)",
    },
    base_url: {
      type: "string",
      pattern: "^https?://",
      title: "Base URL",
      description: "API base URL (OPENAI_BASE_URL, defaults to https://api.openai.com/v1)",
    },
    model: {
      type: "string",
      minLength: 1,
      title: "Model",
      examples: ["gpt-4o", "gpt-4o-mini"],
    },
  },
  required: ["provider", "api_key", "base_url", "model"],
  additionalProperties: false,
} as const satisfies DataPortSchemaObject;

export const AzureOpenAISourceConfigSchema = {
  type: "object",
  properties: {
    provider: {
      type: "string",
      const: AZURE_OPENAI,
      title: "Provider",
    },
    api_key: {
      type: "string",
      minLength: 1,
      title: "API Key",
      description: "Azure OpenAI key (AZURE_OPENAI_API_KEY)",
    },
    endpoint: {
      type: "string",
      pattern: "^https?://",
      title: "Endpoint",
      description: "Azure OpenAI resource endpoint (AZURE_OPENAI_ENDPOINT)",
    },
    api_version: {
      type: "string",
      minLength: 1,
      title: "API Version",
    },
    deployment: {
      type: "string",
      minLength: 1,
      title: "Deployment",
      description: "Deployment name serving the model (AZURE_OPENAI_DEPLOYMENT, defaults to gpt-4o)",
    },
  },
  required: ["provider", "api_key", "endpoint", "api_version", "deployment"],
  additionalProperties: false,
} as const satisfies DataPortSchemaObject;

export type OpenAISourceConfig = FromSchema<typeof OpenAISourceConfigSchema>;
export type AzureOpenAISourceConfig = FromSchema<typeof AzureOpenAISourceConfigSchema>;

/**
 * Credentials and endpoint of the chat-completion provider. The two schemes
 * are mutually exclusive.
 */
export type SourceConfig = OpenAISourceConfig | AzureOpenAISourceConfig;

/**
 * Checks a config against its schema.
 * @throws ConfigurationError listing every violation
 */
export function validateSourceConfig<T extends SourceConfig>(config: T): T {
  const schema =
    config.provider === AZURE_OPENAI ? AzureOpenAISourceConfigSchema : OpenAISourceConfigSchema;
  const errors = schemaErrors(schema, config);
  if (errors.length > 0) {
    throw new ConfigurationError(`[${config.provider}] Configuration Error: ${errors.join(", ")}`);
  }
  return config;
}

/**
 * Builds the provider config from environment variables.
 *
 * `AZURE_OPENAI_API_KEY` or `AZURE_OPENAI_ENDPOINT` select the Azure gateway,
 * which then needs both; otherwise `OPENAI_API_KEY` selects the OpenAI API.
 * @throws ConfigurationError when no complete scheme is configured
 */
export function loadSourceConfig(env: NodeJS.ProcessEnv = process.env): SourceConfig {
  const azureKey = env.AZURE_OPENAI_API_KEY;
  const azureEndpoint = env.AZURE_OPENAI_ENDPOINT;

  if (azureKey || azureEndpoint) {
    if (!azureKey) {
      throw new ConfigurationError(
        "API key for Azure OpenAI not found: set AZURE_OPENAI_API_KEY"
      );
    }
    if (!azureEndpoint) {
      throw new ConfigurationError(
        "Azure endpoint for OpenAI not found: set AZURE_OPENAI_ENDPOINT"
      );
    }
    return validateSourceConfig<AzureOpenAISourceConfig>({
      provider: AZURE_OPENAI,
      api_key: azureKey,
      endpoint: azureEndpoint,
      api_version: AZURE_OPENAI_API_VERSION,
      deployment: env.AZURE_OPENAI_DEPLOYMENT || DEFAULT_MODEL,
    });
  }

  const apiKey = env.OPENAI_API_KEY;
  if (!apiKey) {
    throw new ConfigurationError(
      "Missing OpenAI API Key: set OPENAI_API_KEY, or AZURE_OPENAI_API_KEY and AZURE_OPENAI_ENDPOINT"
    );
  }
  return validateSourceConfig<OpenAISourceConfig>({
    provider: OPENAI,
    api_key: apiKey,
    base_url: env.OPENAI_BASE_URL || DEFAULT_OPENAI_BASE_URL,
    model: env.OPENAI_MODEL || DEFAULT_MODEL,
  });
}
