/**
 * @license
 * Copyright 2025 Steven Roussey <sroussey@gmail.com>
 * SPDX-License-Identifier: Apache-2.0
 */

import {
  AZURE_OPENAI,
  ConfigurationError,
  loadSourceConfig,
  OPENAI,
  validateSourceConfig,
} from "@handscribe/ai";
import { describe, expect, it } from "vitest";

describe("loadSourceConfig", () => {
  it("uses the OpenAI API with defaults when only its key is set", () => {
    expect(loadSourceConfig({ OPENAI_API_KEY: "test-secret" })).toEqual({
      provider: OPENAI,
      api_key: "test-secret",
      base_url: "https://api.openai.com/v1",
      model: "gpt-4o",
    });
  });

  it("honors the OpenAI base URL and model overrides", () => {
    const config = loadSourceConfig({
      OPENAI_API_KEY: "test-secret",
      OPENAI_BASE_URL: "http://localhost:8080/v1",
      OPENAI_MODEL: "gpt-4o-mini",
    });
    expect(config).toMatchObject({ base_url: "http://localhost:8080/v1", model: "gpt-4o-mini" });
  });

  it("prefers Azure OpenAI when its settings are present", () => {
    expect(
      loadSourceConfig({
        OPENAI_API_KEY: "test-secret",
        AZURE_OPENAI_API_KEY: "test-azure-secret",
        AZURE_OPENAI_ENDPOINT: "https://example-resource.openai.azure.com",
      })
    ).toEqual({
      provider: AZURE_OPENAI,
      api_key: "test-azure-secret",
      endpoint: "https://example-resource.openai.azure.com",
      api_version: "2024-02-01",
      deployment: "gpt-4o",
    });
  });

  it("takes the Azure deployment from the environment", () => {
    const config = loadSourceConfig({
      AZURE_OPENAI_API_KEY: "test-azure-secret",
      AZURE_OPENAI_ENDPOINT: "https://example-resource.openai.azure.com",
      AZURE_OPENAI_DEPLOYMENT: "vision-deployment",
    });
    expect(config).toMatchObject({ provider: AZURE_OPENAI, deployment: "vision-deployment" });
  });

  it("requires both Azure settings once one is given", () => {
    expect(() => loadSourceConfig({ AZURE_OPENAI_API_KEY: "test-azure-secret" })).toThrow(
      /AZURE_OPENAI_ENDPOINT/
    );
    expect(() =>
      loadSourceConfig({
        OPENAI_API_KEY: "test-secret",
        AZURE_OPENAI_ENDPOINT: "https://example-resource.openai.azure.com",
      })
    ).toThrow(/AZURE_OPENAI_API_KEY/);
  });

  it("fails before any work when no credentials are set", () => {
    expect(() => loadSourceConfig({})).toThrow(ConfigurationError);
  });

  it("validates the values against the config schema", () => {
    expect(() =>
      loadSourceConfig({ OPENAI_API_KEY: "test-secret", OPENAI_BASE_URL: "ftp://example.com" })
    ).toThrow(/^\[OPENAI\] Configuration Error: /);
  });
});

describe("validateSourceConfig", () => {
  it("returns a valid config unchanged", () => {
    const config = {
      provider: OPENAI,
      api_key: "test-secret",
      base_url: "https://api.openai.com/v1",
      model: "gpt-4o",
    } as const;
    expect(validateSourceConfig(config)).toBe(config);
  });

  it("rejects an empty key", () => {
    expect(() =>
      validateSourceConfig({
        provider: AZURE_OPENAI,
        api_key: "",
        endpoint: "https://example-resource.openai.azure.com",
        api_version: "2024-02-01",
        deployment: "gpt-4o",
      })
    ).toThrow(ConfigurationError);
  });
});
