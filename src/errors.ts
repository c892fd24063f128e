export type SessionErrorCode =
  | "MALFORMED_CALLBACK"
  | "STATE_MISMATCH"
  | "AUTHORIZATION_DENIED"
  | "TOKEN_EXCHANGE_FAILED"
  | "REFRESH_FAILED"
  | "MISSING_REFRESH_TOKEN"
  | "MISSING_CLIENT_CREDENTIALS"
  | "NOT_AUTHENTICATED"
  | "LOGIN_CANCELLED"
  | "LOGIN_TIMEOUT"
  | "HTTP_STATUS"
  | "PAGINATION_FAILED"
  | "PAGINATION_CANCELLED";

export class SessionError extends Error {
  readonly code: SessionErrorCode;

  constructor(code: SessionErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "SessionError";
    this.code = code;
  }
}

export class MalformedCallbackError extends SessionError {
  constructor() {
    super("MALFORMED_CALLBACK", "Callback is missing state or code");
    this.name = "MalformedCallbackError";
  }
}

/** The callback carried a state that was not issued for the active login (possible CSRF or replay). */
export class StateMismatchError extends SessionError {
  constructor() {
    super("STATE_MISMATCH", "Callback state does not match the active login");
    this.name = "StateMismatchError";
  }
}

export class AuthorizationDeniedError extends SessionError {
  readonly reason: string;

  constructor(reason: string) {
    super("AUTHORIZATION_DENIED", `Spotify authorization failed: ${reason}`);
    this.name = "AuthorizationDeniedError";
    this.reason = reason;
  }
}

export class TokenExchangeError extends SessionError {
  readonly status: number | null;
  readonly body: string;

  constructor(status: number | null, body: string) {
    super("TOKEN_EXCHANGE_FAILED", status === null ? `Token exchange failed: ${body}` : `Token exchange failed (${status}): ${body}`);
    this.name = "TokenExchangeError";
    this.status = status;
    this.body = body;
  }
}

export class RefreshError extends SessionError {
  readonly status: number | null;
  readonly body: string;

  constructor(status: number | null, body: string) {
    super("REFRESH_FAILED", status === null ? `Token refresh failed: ${body}` : `Token refresh failed (${status}): ${body}`);
    this.name = "RefreshError";
    this.status = status;
    this.body = body;
  }

  /** The provider rejected the refresh token itself; retrying with it cannot succeed. */
  get isGrantRevoked(): boolean {
    return this.status === 400 || this.status === 401;
  }
}

export class MissingRefreshTokenError extends SessionError {
  constructor() {
    super("MISSING_REFRESH_TOKEN", "Stored session has no refresh token");
    this.name = "MissingRefreshTokenError";
  }
}

export class MissingClientCredentialsError extends SessionError {
  constructor(missing: string[]) {
    super("MISSING_CLIENT_CREDENTIALS", `Missing Spotify client credentials: ${missing.join(", ")}`);
    this.name = "MissingClientCredentialsError";
  }
}

export class NotAuthenticatedError extends SessionError {
  constructor(message = "Not authenticated with Spotify") {
    super("NOT_AUTHENTICATED", message);
    this.name = "NotAuthenticatedError";
  }
}

export class LoginCancelledError extends SessionError {
  constructor() {
    super("LOGIN_CANCELLED", "Login was cancelled before the callback arrived");
    this.name = "LoginCancelledError";
  }
}

export class LoginTimeoutError extends SessionError {
  constructor(timeoutMs: number) {
    super("LOGIN_TIMEOUT", `Login did not complete within ${timeoutMs}ms`);
    this.name = "LoginTimeoutError";
  }
}

export class HttpStatusError extends SessionError {
  readonly status: number;
  readonly body: string;

  constructor(status: number, message: string, body: string) {
    super("HTTP_STATUS", message);
    this.name = "HttpStatusError";
    this.status = status;
    this.body = body;
  }
}

export class PaginationError extends SessionError {
  readonly offset: number;

  constructor(offset: number, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super("PAGINATION_FAILED", `Failed fetching page at offset ${offset}: ${detail}`, { cause });
    this.name = "PaginationError";
    this.offset = offset;
  }
}

export class PaginationCancelledError extends SessionError {
  constructor(cause: unknown) {
    super("PAGINATION_CANCELLED", "Paginated fetch was cancelled", { cause });
    this.name = "PaginationCancelledError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
