import { createHash, randomBytes } from "node:crypto";

export const SPOTIFY_AUTHORIZE_URL = "https://accounts.spotify.com/authorize";
export const SPOTIFY_SCOPES = "user-library-read playlist-read-private playlist-read-collaborative";

const VERIFIER_LENGTH = 64;
const STATE_LENGTH = 32;

/** URL-safe random string drawn from `length` random bytes. */
export function randomUrlSafeString(length: number): string {
  return randomBytes(length).toString("base64url").slice(0, length);
}

export function generateCodeVerifier(): string {
  return randomUrlSafeString(VERIFIER_LENGTH);
}

export function generateState(): string {
  return randomUrlSafeString(STATE_LENGTH);
}

export function codeChallenge(verifier: string): string {
  return createHash("sha256").update(verifier).digest("base64url");
}

export interface PkcePair {
  verifier: string;
  challenge: string;
  state: string;
}

export function createPkcePair(): PkcePair {
  const verifier = generateCodeVerifier();

  return {
    verifier,
    challenge: codeChallenge(verifier),
    state: generateState()
  };
}

export function buildAuthorizeUrl(params: {
  clientId: string;
  redirectUri: string;
  state: string;
  challenge: string;
  scope?: string;
}): string {
  const query = new URLSearchParams({
    client_id: params.clientId,
    response_type: "code",
    redirect_uri: params.redirectUri,
    state: params.state,
    scope: params.scope ?? SPOTIFY_SCOPES,
    code_challenge: params.challenge,
    code_challenge_method: "S256",
    show_dialog: "true"
  });

  return `${SPOTIFY_AUTHORIZE_URL}?${query.toString()}`;
}
