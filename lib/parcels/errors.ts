/**
 * Resolution Errors
 */

import type { ProviderKey, ResolutionStage } from "./types";

export class InvalidInputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidInputError";
  }
}

export class ExternalServiceError extends Error {
  readonly provider: ProviderKey;
  readonly stage: ResolutionStage;
  readonly status?: number;
  readonly retryable: boolean;

  constructor(
    message: string,
    params: {
      provider: ProviderKey;
      stage: ResolutionStage;
      status?: number;
      retryable?: boolean;
      cause?: unknown;
    }
  ) {
    super(message, { cause: params.cause });
    this.name = "ExternalServiceError";
    this.provider = params.provider;
    this.stage = params.stage;
    this.status = params.status;
    this.retryable = params.retryable ?? true;
  }
}

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super(message);
    this.name = "ConfigError";
  }
}

export function toErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** HTTP statuses that indicate a credential problem rather than a transient fault. */
export function isAuthFailureStatus(status: number): boolean {
  return status === 401 || status === 403;
}
