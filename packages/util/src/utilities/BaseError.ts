/**
 * @license
 * Copyright 2025 Steven Roussey <sroussey@gmail.com>
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * Root of every error thrown by the handscribe packages.
 *
 * Subclasses override the static `type` so callers can branch on
 * `error.type` without holding a reference to the concrete class.
 */
export class BaseError extends Error {
  public static type: string = "BaseError";

  public readonly type: string;

  constructor(message: string = "", options?: { cause?: unknown }) {
    super(message, options);
    this.type = new.target.type;
    this.name = new.target.type;
  }
}
