/**
 * JSON-over-HTTP helper shared by the provider adapters.
 *
 * Every failure mode (network, timeout, non-2xx, unparseable body,
 * payload that does not match the provider schema) surfaces as an
 * ExternalServiceError so callers only have one thing to catch.
 */

import type { z } from "zod";
import { ExternalServiceError, isAuthFailureStatus, toErrorMessage } from "../errors";
import type { ProviderKey, ResolutionStage } from "../types";

export interface FetchJsonOptions {
  provider: ProviderKey;
  stage: ResolutionStage;
  timeoutMs: number;
  headers?: Record<string, string>;
}

const DEFAULT_USER_AGENT = "ParcelGeoResolver/1.0";

export async function fetchJson<TSchema extends z.ZodTypeAny>(
  url: string,
  schema: TSchema,
  options: FetchJsonOptions
): Promise<z.infer<TSchema>> {
  const { provider, stage, timeoutMs } = options;

  let response: Response;
  try {
    response = await fetch(url, {
      headers: {
        Accept: "application/json",
        "User-Agent": DEFAULT_USER_AGENT,
        ...options.headers,
      },
      signal: AbortSignal.timeout(timeoutMs),
    });
  } catch (error) {
    const timedOut = error instanceof Error && (error.name === "TimeoutError" || error.name === "AbortError");
    throw new ExternalServiceError(
      timedOut
        ? `${provider} request timed out after ${timeoutMs}ms`
        : `${provider} request failed: ${toErrorMessage(error)}`,
      { provider, stage, retryable: true, cause: error }
    );
  }

  if (!response.ok) {
    const body = await response.text().catch(() => "");
    throw new ExternalServiceError(
      `${provider} responded with status ${response.status}${body ? `: ${body.slice(0, 200)}` : ""}`,
      {
        provider,
        stage,
        status: response.status,
        retryable: !isAuthFailureStatus(response.status),
      }
    );
  }

  let payload: unknown;
  try {
    payload = await response.json();
  } catch (error) {
    throw new ExternalServiceError(`${provider} returned malformed JSON`, {
      provider,
      stage,
      status: response.status,
      cause: error,
    });
  }

  const parsed = schema.safeParse(payload);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue?.path.length ? ` at ${issue.path.join(".")}` : "";
    throw new ExternalServiceError(
      `${provider} returned an unexpected payload${where}: ${issue?.message ?? "invalid"}`,
      { provider, stage, status: response.status, cause: parsed.error }
    );
  }

  return parsed.data;
}

export function buildUrl(baseUrl: string, params: Record<string, string | number>): string {
  const search = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    search.set(key, String(value));
  }
  return `${baseUrl}?${search.toString()}`;
}
