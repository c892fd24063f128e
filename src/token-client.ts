import { linkSignal } from "./api-client";
import { DEFAULT_REQUEST_TIMEOUT_MS } from "./config";
import { errorMessage, MissingClientCredentialsError, RefreshError, TokenExchangeError } from "./errors";
import { createLogger } from "./logger";
import type { ClientCredentials, SpotifyTokenResponse, TokenRecord } from "./types";

export const SPOTIFY_TOKEN_URL = "https://accounts.spotify.com/api/token";

const log = createLogger("token");

/** The two grants the session needs from the provider's token endpoint. */
export interface TokenEndpoint {
  exchangeCode(input: { code: string; redirectUri: string; verifier: string }, signal?: AbortSignal): Promise<TokenRecord>;
  refresh(refreshToken: string, signal?: AbortSignal): Promise<TokenRecord>;
}

export function nowSeconds(): number {
  return Math.floor(Date.now() / 1000);
}

export function basicAuthHeader(credentials: ClientCredentials): string {
  const encoded = Buffer.from(`${credentials.clientId}:${credentials.clientSecret}`, "utf8").toString("base64");
  return `Basic ${encoded}`;
}

export function assertCredentials(credentials: ClientCredentials): void {
  const missing: string[] = [];
  if (!credentials.clientId) {
    missing.push("client_id");
  }
  if (!credentials.clientSecret) {
    missing.push("client_secret");
  }
  if (missing.length > 0) {
    throw new MissingClientCredentialsError(missing);
  }
}

export function toTokenRecord(response: SpotifyTokenResponse, issuedAt: number): TokenRecord {
  return {
    accessToken: response.access_token ?? "",
    refreshToken: response.refresh_token ?? "",
    expiresAt: issuedAt + (response.expires_in ?? 0),
    scope: response.scope ?? "",
    tokenType: response.token_type ?? ""
  };
}

interface TokenClientOptions {
  timeoutMs?: number;
  now?: () => number;
}

export class TokenClient implements TokenEndpoint {
  private readonly timeoutMs: number;
  private readonly now: () => number;

  constructor(
    private readonly resolveCredentials: () => Promise<ClientCredentials>,
    options: TokenClientOptions = {}
  ) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.now = options.now ?? nowSeconds;
  }

  async exchangeCode(
    input: { code: string; redirectUri: string; verifier: string },
    signal?: AbortSignal
  ): Promise<TokenRecord> {
    const params = new URLSearchParams({
      grant_type: "authorization_code",
      code: input.code,
      redirect_uri: input.redirectUri,
      code_verifier: input.verifier
    });

    const record = await this.post(params, signal, (status, body) => new TokenExchangeError(status, body));
    log.info("Authorization code exchanged for tokens.");

    return record;
  }

  async refresh(refreshToken: string, signal?: AbortSignal): Promise<TokenRecord> {
    const params = new URLSearchParams({
      grant_type: "refresh_token",
      refresh_token: refreshToken
    });

    const record = await this.post(params, signal, (status, body) => new RefreshError(status, body));
    log.info("Access token refreshed.");

    return record;
  }

  private async post(
    params: URLSearchParams,
    signal: AbortSignal | undefined,
    fail: (status: number | null, body: string) => TokenExchangeError | RefreshError
  ): Promise<TokenRecord> {
    const credentials = await this.resolveCredentials();
    assertCredentials(credentials);

    const { signal: requestSignal, dispose } = linkSignal(this.timeoutMs, signal);

    let response: Response;
    try {
      response = await fetch(SPOTIFY_TOKEN_URL, {
        method: "POST",
        headers: {
          Authorization: basicAuthHeader(credentials),
          "Content-Type": "application/x-www-form-urlencoded"
        },
        body: params,
        signal: requestSignal
      });
    } catch (error) {
      dispose();
      if (signal?.aborted) {
        throw error;
      }

      throw fail(null, errorMessage(error));
    }

    let bodyText: string;
    try {
      bodyText = await response.text();
    } finally {
      dispose();
    }

    if (!response.ok) {
      throw fail(response.status, bodyText);
    }

    let parsed: SpotifyTokenResponse;
    try {
      parsed = JSON.parse(bodyText) as SpotifyTokenResponse;
    } catch {
      throw fail(response.status, `Token response was not JSON: ${bodyText}`);
    }

    if (!parsed.access_token) {
      throw fail(response.status, "Token response did not include access_token");
    }

    return toTokenRecord(parsed, this.now());
  }
}
