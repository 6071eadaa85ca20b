/**
 * @pegledger/sdk — HTTP Client.
 *
 * Wraps native fetch() with:
 * - Request ID generation
 * - Timeout handling
 * - Retry with exponential backoff for reads
 * - Error normalization into PegLedgerApiError
 *
 * Mutations are never retried: a POST that timed out may have committed.
 */

import { PegLedgerApiError } from "./types.js";
import type { PegLedgerClientConfig, PegLedgerResponse } from "./types.js";

// =============================================================================
// Internal Helpers
// =============================================================================

function generateRequestId(): string {
  return `sdk-${Date.now().toString(36)}-${Math.random().toString(36).slice(2, 8)}`;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Parse a response body as JSON, handling empty and non-JSON bodies.
 */
async function parseResponseBody(response: Response): Promise<unknown> {
  const text = await response.text();
  if (text.length === 0) {
    return {};
  }
  try {
    return JSON.parse(text);
  } catch {
    return { raw: text };
  }
}

function extractHeaders(response: Response): Record<string, string> {
  const result: Record<string, string> = {};
  for (const name of ["content-type", "x-request-id", "retry-after"]) {
    const value = response.headers.get(name);
    if (value !== null) {
      result[name] = value;
    }
  }
  return result;
}

/**
 * Build a PegLedgerApiError from a non-2xx response body.
 */
function toApiError(body: unknown, status: number, fallbackCode: string): PegLedgerApiError {
  const error = isRecord(body) && isRecord(body["error"]) ? body["error"] : undefined;
  const code = typeof error?.["code"] === "string" ? error["code"] : fallbackCode;
  const message =
    typeof error?.["message"] === "string" ? error["message"] : `HTTP ${String(status)}`;
  return new PegLedgerApiError(code, message, status, error?.["details"]);
}

// =============================================================================
// HTTP Client
// =============================================================================

/**
 * Low-level HTTP client for the node API.
 *
 * Bodies come back unvalidated; the namespace methods name the
 * shape the node documents for each route.
 */
export class HttpClient {
  private readonly baseUrl: string;
  private readonly timeout: number;
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;
  private readonly fetchFn: typeof fetch;

  constructor(config: PegLedgerClientConfig) {
    // Strip trailing slash
    this.baseUrl = config.baseUrl.replace(/\/+$/, "");
    this.timeout = config.timeout ?? 30000;
    this.maxRetries = config.retries ?? 3;
    this.retryDelayMs = config.retryDelayMs ?? 1000;
    this.fetchFn = config.fetchFn ?? globalThis.fetch;
  }

  get(path: string): Promise<PegLedgerResponse<unknown>> {
    return this.request("GET", path, undefined, this.maxRetries);
  }

  post(path: string, body: unknown): Promise<PegLedgerResponse<unknown>> {
    return this.request("POST", path, body, 0);
  }

  private async request(
    method: string,
    path: string,
    body: unknown,
    retries: number,
  ): Promise<PegLedgerResponse<unknown>> {
    const url = `${this.baseUrl}${path}`;
    const init: RequestInit = {
      method,
      headers: {
        "Content-Type": "application/json",
        Accept: "application/json",
        "X-Request-Id": generateRequestId(),
      },
    };
    if (body !== undefined) {
      init.body = JSON.stringify(body);
    }

    for (let attempt = 0; ; attempt++) {
      let response: Response;
      try {
        response = await this.fetchWithTimeout(url, init);
      } catch (error) {
        if (attempt < retries) {
          await this.backoff(attempt);
          continue;
        }
        if (error instanceof PegLedgerApiError) {
          throw error;
        }
        throw new PegLedgerApiError(
          "NETWORK_ERROR",
          error instanceof Error ? error.message : "Network error",
          0,
        );
      }

      const responseBody = await parseResponseBody(response);

      if (response.ok) {
        return {
          data: responseBody,
          status: response.status,
          headers: extractHeaders(response),
        };
      }

      if (response.status >= 500 && attempt < retries) {
        await this.backoff(attempt);
        continue;
      }

      throw toApiError(
        responseBody,
        response.status,
        response.status >= 500 ? "SERVER_ERROR" : "CLIENT_ERROR",
      );
    }
  }

  private backoff(attempt: number): Promise<void> {
    return sleep(Math.min(this.retryDelayMs * 2 ** attempt, 10 * this.retryDelayMs));
  }

  /**
   * Fetch with a timeout using AbortController.
   */
  private async fetchWithTimeout(url: string, init: RequestInit): Promise<Response> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);

    try {
      return await this.fetchFn(url, { ...init, signal: controller.signal });
    } catch (error) {
      if (error instanceof Error && error.name === "AbortError") {
        throw new PegLedgerApiError(
          "TIMEOUT",
          `Request timed out after ${String(this.timeout)}ms`,
          0,
        );
      }
      throw error;
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
