import { DEFAULT_REQUEST_TIMEOUT_MS } from "./config";
import { HttpStatusError } from "./errors";
import { createLogger } from "./logger";

export const SPOTIFY_API_BASE = "https://api.spotify.com/v1";

const log = createLogger("api");

export function buildErrorMessage(status: number, bodyText: string): string {
  if (!bodyText) {
    return `Spotify API request failed with status ${status}`;
  }

  try {
    const parsed = JSON.parse(bodyText) as {
      error?: { message?: string } | string;
      error_description?: string;
      message?: string;
    };

    if (typeof parsed.error === "string") {
      const detail = parsed.error_description ? `${parsed.error} (${parsed.error_description})` : parsed.error;
      return `Spotify API request failed with status ${status}: ${detail}`;
    }

    const errorMessage = parsed.error?.message || parsed.message;
    if (errorMessage) {
      return `Spotify API request failed with status ${status}: ${errorMessage}`;
    }
  } catch {
    // Not JSON; fall through to the raw body.
  }

  return `Spotify API request failed with status ${status}: ${bodyText}`;
}

/**
 * Aborts when either the caller's signal fires or the timeout elapses.
 * `dispose` must be called once the request settles.
 */
export function linkSignal(
  timeoutMs: number,
  parent?: AbortSignal
): { signal: AbortSignal; dispose: () => void } {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(new Error(`Request timed out after ${timeoutMs}ms`)), timeoutMs);
  const onAbort = (): void => controller.abort(parent?.reason);

  if (parent?.aborted) {
    controller.abort(parent.reason);
  } else {
    parent?.addEventListener("abort", onAbort, { once: true });
  }

  return {
    signal: controller.signal,
    dispose: () => {
      clearTimeout(timeoutId);
      parent?.removeEventListener("abort", onAbort);
    }
  };
}

/**
 * Bearer-authorized JSON GETs. Holds no token of its own; every call is
 * independent, so one instance can serve any number of concurrent callers.
 */
export class ApiClient {
  constructor(private readonly timeoutMs: number = DEFAULT_REQUEST_TIMEOUT_MS) {}

  async getJson<T>(url: string, accessToken: string, signal?: AbortSignal): Promise<T> {
    const { signal: requestSignal, dispose } = linkSignal(this.timeoutMs, signal);

    log.debug(`GET ${url}`);

    try {
      const response = await fetch(url, {
        method: "GET",
        headers: {
          Accept: "application/json",
          Authorization: `Bearer ${accessToken}`
        },
        signal: requestSignal
      });

      const bodyText = await response.text();

      if (!response.ok) {
        throw new HttpStatusError(response.status, buildErrorMessage(response.status, bodyText), bodyText);
      }

      return JSON.parse(bodyText) as T;
    } finally {
      dispose();
    }
  }
}
