import { afterEach, describe, expect, it } from "vitest";
import { MissingClientCredentialsError, RefreshError, TokenExchangeError } from "../src/errors";
import { basicAuthHeader, SPOTIFY_TOKEN_URL, TokenClient } from "../src/token-client";

const originalFetch = globalThis.fetch;

interface CapturedRequest {
  url: string;
  method: string;
  headers: Headers;
  body: URLSearchParams;
}

function stubTokenEndpoint(status: number, payload: unknown): CapturedRequest[] {
  const captured: CapturedRequest[] = [];

  globalThis.fetch = (async (input: string | URL | Request, init?: RequestInit) => {
    captured.push({
      url: String(input),
      method: init?.method ?? "GET",
      headers: new Headers(init?.headers),
      body: new URLSearchParams(String(init?.body ?? ""))
    });
    return new Response(typeof payload === "string" ? payload : JSON.stringify(payload), { status });
  }) as typeof fetch;

  return captured;
}

const credentials = async () => ({ clientId: "test-client", clientSecret: "test-secret" });

afterEach(() => {
  globalThis.fetch = originalFetch;
});

describe("TokenClient.exchangeCode", () => {
  it("posts the authorization code with basic auth", async () => {
    const captured = stubTokenEndpoint(200, {
      access_token: "test-access",
      refresh_token: "test-refresh",
      expires_in: 3600,
      scope: "user-library-read",
      token_type: "Bearer"
    });

    const client = new TokenClient(credentials, { now: () => 1700000000 });
    const record = await client.exchangeCode({
      code: "test-code",
      redirectUri: "http://127.0.0.1:3000/callback",
      verifier: "test-verifier"
    });

    expect(record).toEqual({
      accessToken: "test-access",
      refreshToken: "test-refresh",
      expiresAt: 1700003600,
      scope: "user-library-read",
      tokenType: "Bearer"
    });

    expect(captured).toHaveLength(1);
    expect(captured[0].url).toBe(SPOTIFY_TOKEN_URL);
    expect(captured[0].method).toBe("POST");
    expect(captured[0].headers.get("authorization")).toBe(
      `Basic ${Buffer.from("test-client:test-secret").toString("base64")}`
    );
    expect(captured[0].headers.get("content-type")).toBe("application/x-www-form-urlencoded");
    expect(Object.fromEntries(captured[0].body)).toEqual({
      grant_type: "authorization_code",
      code: "test-code",
      redirect_uri: "http://127.0.0.1:3000/callback",
      code_verifier: "test-verifier"
    });
  });

  it("fails with the status and body on rejection", async () => {
    stubTokenEndpoint(400, { error: "invalid_grant" });

    const attempt = new TokenClient(credentials).exchangeCode({ code: "bad", redirectUri: "x", verifier: "y" });

    await expect(attempt).rejects.toBeInstanceOf(TokenExchangeError);
    await expect(attempt).rejects.toMatchObject({ status: 400, body: '{"error":"invalid_grant"}' });
  });

  it("rejects a response without an access token", async () => {
    stubTokenEndpoint(200, { refresh_token: "test-refresh", expires_in: 3600 });

    await expect(
      new TokenClient(credentials).exchangeCode({ code: "c", redirectUri: "x", verifier: "y" })
    ).rejects.toThrow("Token response did not include access_token");
  });

  it("requires both client credentials before calling the provider", async () => {
    const captured = stubTokenEndpoint(200, {});
    const client = new TokenClient(async () => ({ clientId: "test-client", clientSecret: "" }));

    const attempt = client.exchangeCode({ code: "c", redirectUri: "x", verifier: "y" });

    await expect(attempt).rejects.toBeInstanceOf(MissingClientCredentialsError);
    await expect(attempt).rejects.toThrow("Missing Spotify client credentials: client_secret");
    expect(captured).toHaveLength(0);
  });
});

describe("TokenClient.refresh", () => {
  it("posts the refresh grant", async () => {
    const captured = stubTokenEndpoint(200, {
      access_token: "new-access",
      refresh_token: "rotated-refresh",
      expires_in: 3600,
      scope: "user-library-read",
      token_type: "Bearer"
    });

    const record = await new TokenClient(credentials, { now: () => 100 }).refresh("old-refresh");

    expect(Object.fromEntries(captured[0].body)).toEqual({
      grant_type: "refresh_token",
      refresh_token: "old-refresh"
    });
    expect(record.accessToken).toBe("new-access");
    expect(record.refreshToken).toBe("rotated-refresh");
    expect(record.expiresAt).toBe(3700);
  });

  it("returns an empty refresh token when the provider does not rotate it", async () => {
    stubTokenEndpoint(200, { access_token: "new-access", expires_in: 3600 });

    const record = await new TokenClient(credentials).refresh("old-refresh");

    expect(record.refreshToken).toBe("");
  });

  it("marks revoked grants", async () => {
    stubTokenEndpoint(400, { error: "invalid_grant", error_description: "Refresh token revoked" });

    const error = await new TokenClient(credentials).refresh("old-refresh").catch((caught: unknown) => caught);

    if (!(error instanceof RefreshError)) {
      throw error;
    }
    expect(error.status).toBe(400);
    expect(error.isGrantRevoked).toBe(true);
  });

  it("does not treat server errors as revoked grants", async () => {
    stubTokenEndpoint(503, "unavailable");

    const error = await new TokenClient(credentials).refresh("old-refresh").catch((caught: unknown) => caught);

    if (!(error instanceof RefreshError)) {
      throw error;
    }
    expect(error.status).toBe(503);
    expect(error.body).toBe("unavailable");
    expect(error.isGrantRevoked).toBe(false);
  });
});

describe("basicAuthHeader", () => {
  it("encodes id and secret", () => {
    expect(basicAuthHeader({ clientId: "a", clientSecret: "b" })).toBe("Basic YTpi");
  });
});
