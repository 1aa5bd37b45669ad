/**
 * @license
 * Copyright 2025 Steven Roussey <sroussey@gmail.com>
 * SPDX-License-Identifier: Apache-2.0
 */

import { BaseError } from "@handscribe/util";

/**
 * Credentials or endpoint settings are missing or invalid. Raised before any
 * work starts.
 */
export class ConfigurationError extends BaseError {
  public static type: string = "ConfigurationError";
}

/**
 * The provider cannot serve requests with the configured credentials
 * (authentication, permission or unknown deployment). Aborts the whole run.
 */
export class SourceUnavailableError extends BaseError {
  public static type: string = "SourceUnavailableError";
}

/**
 * A request failed for a reason that is neither a content rejection nor a
 * credential problem: a network failure, a rate limit, a server error.
 */
export class ProviderRequestError extends BaseError {
  public static type: string = "ProviderRequestError";

  constructor(
    message: string,
    public readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/**
 * An input file of a unit could not be read or decoded.
 */
export class MalformedInputError extends BaseError {
  public static type: string = "MalformedInputError";

  constructor(
    message: string,
    public readonly path: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}
