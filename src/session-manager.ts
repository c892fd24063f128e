import { ApiClient, SPOTIFY_API_BASE } from "./api-client";
import { startCallbackServer, type CallbackResponse, type CallbackServer } from "./callback-server";
import { DEFAULT_REQUEST_TIMEOUT_MS } from "./config";
import {
  AuthorizationDeniedError,
  errorMessage,
  LoginCancelledError,
  LoginTimeoutError,
  MalformedCallbackError,
  MissingClientCredentialsError,
  MissingRefreshTokenError,
  NotAuthenticatedError,
  RefreshError,
  StateMismatchError
} from "./errors";
import { createLogger } from "./logger";
import { LoginResultSlot } from "./login-result";
import { buildAuthorizeUrl, createPkcePair } from "./pkce";
import { nowSeconds, TokenClient, type TokenEndpoint } from "./token-client";
import {
  deleteFileIfExists,
  readOverride,
  readTokens,
  storePaths,
  writeOverride,
  writeTokens,
  type StorePaths
} from "./token-store";
import type {
  AuthStatus,
  ClientCredentials,
  LoginStart,
  SessionState,
  SpotifyUser,
  TokenRecord,
  UserProfile
} from "./types";

/** Tokens closer than this to expiry are refreshed before use. */
export const REFRESH_MARGIN_SECONDS = 30;
export const DEFAULT_LOGIN_TIMEOUT_MS = 120000;

const SUCCESS_PAGE =
  "<!DOCTYPE html><html><head><title>Spotify connected</title></head>" +
  "<body><p>Spotify login successful. You can close this window.</p></body></html>";

const log = createLogger("session");

export interface SessionManagerOptions {
  dataDir: string;
  callbackPort: number;
  /** Used when no override file is present. */
  defaultCredentials: ClientCredentials;
  requestTimeoutMs?: number;
  apiClient?: ApiClient;
  tokenEndpoint?: TokenEndpoint;
  /** Current unix time in seconds. */
  now?: () => number;
}

interface LoginAttempt {
  verifier: string;
  state: string;
  result: LoginResultSlot;
  redirectUri: string;
  server: CallbackServer | null;
  detachSignal: () => void;
}

function toUserProfile(user: SpotifyUser): UserProfile {
  return {
    id: user.id,
    displayName: user.display_name ?? "",
    email: user.email ?? "",
    avatarUrls: (user.images ?? []).map((image) => image.url)
  };
}

/**
 * Owns the Spotify session: the current tokens, the cached profile and the
 * single active login attempt. Every operation runs under one internal lock,
 * including the loopback callback handler, so a login completing and a status
 * check never interleave.
 */
export class SessionManager {
  private readonly paths: StorePaths;
  private readonly callbackPort: number;
  private readonly defaultCredentials: ClientCredentials;
  private readonly apiClient: ApiClient;
  private readonly tokenEndpoint: TokenEndpoint;
  private readonly now: () => number;

  private lockTail: Promise<void> = Promise.resolve();
  private tokens: TokenRecord | null = null;
  private profile: UserProfile | null = null;
  private login: LoginAttempt | null = null;
  private pendingResult: LoginResultSlot | null = null;
  private refreshing = false;

  constructor(options: SessionManagerOptions) {
    const timeoutMs = options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;

    this.paths = storePaths(options.dataDir);
    this.callbackPort = options.callbackPort;
    this.defaultCredentials = options.defaultCredentials;
    this.apiClient = options.apiClient ?? new ApiClient(timeoutMs);
    this.now = options.now ?? nowSeconds;
    this.tokenEndpoint =
      options.tokenEndpoint ?? new TokenClient(() => this.resolveCredentials(), { timeoutMs, now: this.now });
  }

  get state(): SessionState {
    if (this.refreshing) {
      return "refreshing";
    }
    if (this.login) {
      return "login-pending";
    }

    return this.tokens ? "authenticated" : "unauthenticated";
  }

  get tokenFilePath(): string {
    return this.paths.tokenFile;
  }

  /**
   * Starts a PKCE login and returns the URL the user should open. Any login
   * already in progress is torn down first. The loopback listener is closed
   * when `signal` aborts.
   */
  async startLogin(signal?: AbortSignal): Promise<LoginStart> {
    const { attempt, url } = await this.withLock(async () => {
      if (this.login) {
        log.info("Closing previous login listener.");
        await this.endLoginLocked(this.login, new LoginCancelledError());
      }

      const credentials = await this.resolveCredentials();
      if (!credentials.clientId) {
        throw new MissingClientCredentialsError(["client_id"]);
      }

      const pkce = createPkcePair();
      const attempt: LoginAttempt = {
        verifier: pkce.verifier,
        state: pkce.state,
        result: new LoginResultSlot(),
        redirectUri: "",
        server: null,
        detachSignal: () => undefined
      };

      const server = await startCallbackServer(this.callbackPort, (query) =>
        this.withLock(() => this.handleCallbackLocked(attempt, query))
      );
      attempt.server = server;
      attempt.redirectUri = server.redirectUri;

      this.login = attempt;
      this.pendingResult = attempt.result;

      log.info(`Login started; waiting for callback on ${server.redirectUri}`);

      const url = buildAuthorizeUrl({
        clientId: credentials.clientId,
        redirectUri: server.redirectUri,
        state: pkce.state,
        challenge: pkce.challenge
      });

      return { attempt, url };
    });

    if (signal) {
      const onAbort = (): void => {
        this.cancelLogin(attempt, new LoginCancelledError()).catch((error: unknown) =>
          log.warn(`Failed to cancel login: ${errorMessage(error)}`)
        );
      };

      if (signal.aborted) {
        onAbort();
      } else {
        signal.addEventListener("abort", onAbort, { once: true });
        attempt.detachSignal = () => signal.removeEventListener("abort", onAbort);
      }
    }

    return { url };
  }

  /**
   * Resolves once the pending login has completed. Throws the login's error,
   * or `LoginTimeoutError` after `timeoutMs` (the listener is closed then).
   */
  async waitForLogin(timeoutMs = DEFAULT_LOGIN_TIMEOUT_MS): Promise<void> {
    const slot = this.pendingResult;
    if (!slot) {
      throw new NotAuthenticatedError("No login in progress");
    }

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(new LoginTimeoutError(timeoutMs)), timeoutMs);

    try {
      const outcome = await slot.take(controller.signal);
      if (outcome) {
        throw outcome;
      }
    } catch (error) {
      if (error instanceof LoginTimeoutError) {
        const attempt = this.login;
        if (attempt && attempt.result === slot) {
          await this.cancelLogin(attempt, error);
        }
      }

      throw error;
    } finally {
      clearTimeout(timeoutId);
      if (this.pendingResult === slot) {
        this.pendingResult = null;
      }
    }
  }

  async status(signal?: AbortSignal): Promise<AuthStatus> {
    return this.withLock<AuthStatus>(async () => {
      await this.loadTokensLocked();
      if (!this.tokens) {
        return { authenticated: false };
      }

      const tokens = await this.ensureFreshLocked(signal);

      let profile = this.profile;
      if (!profile) {
        profile = await this.fetchProfileLocked(tokens.accessToken, signal);
        this.profile = profile;
      }

      return {
        authenticated: true,
        displayName: profile.displayName,
        userId: profile.id,
        avatarUrl: profile.avatarUrls[0] ?? "",
        expiresAt: tokens.expiresAt,
        scope: tokens.scope
      };
    });
  }

  /** Fresh access token for library calls. */
  async getAccessToken(signal?: AbortSignal): Promise<string> {
    return this.withLock(async () => {
      await this.loadTokensLocked();
      if (!this.tokens) {
        throw new NotAuthenticatedError();
      }

      const tokens = await this.ensureFreshLocked(signal);
      return tokens.accessToken;
    });
  }

  /** Idempotent. */
  async logout(): Promise<void> {
    await this.withLock(async () => {
      await this.clearSessionLocked();
      log.info("Logged out.");
    });
  }

  async resolveCredentials(): Promise<ClientCredentials> {
    const [clientIdOverride, clientSecretOverride] = await Promise.all([
      readOverride(this.paths.clientIdFile),
      readOverride(this.paths.clientSecretFile)
    ]);

    return {
      clientId: clientIdOverride || this.defaultCredentials.clientId.trim(),
      clientSecret: clientSecretOverride || this.defaultCredentials.clientSecret.trim()
    };
  }

  /** Empty values remove the corresponding override. */
  async setClientCredentials(credentials: ClientCredentials): Promise<void> {
    await this.withLock(async () => {
      await writeOverride(this.paths.clientIdFile, credentials.clientId);
      await writeOverride(this.paths.clientSecretFile, credentials.clientSecret);
    });
  }

  private withLock<T>(task: () => Promise<T>): Promise<T> {
    const run = this.lockTail.then(task);
    this.lockTail = run.then(
      () => undefined,
      () => undefined
    );

    return run;
  }

  private async handleCallbackLocked(attempt: LoginAttempt, query: URLSearchParams): Promise<CallbackResponse> {
    if (this.login !== attempt) {
      return { status: 410, body: "This login attempt is no longer active." };
    }

    const providerError = query.get("error");
    if (providerError) {
      return this.finishLoginLocked(attempt, new AuthorizationDeniedError(providerError), 400, "Spotify authorization failed.");
    }

    const state = query.get("state");
    const code = query.get("code");
    if (!state || !code) {
      return this.finishLoginLocked(attempt, new MalformedCallbackError(), 400, "Invalid response from Spotify");
    }

    if (state !== attempt.state) {
      log.warn("Rejected callback with mismatched state.");
      return this.finishLoginLocked(attempt, new StateMismatchError(), 400, "State mismatch");
    }

    let tokens: TokenRecord;
    try {
      tokens = await this.tokenEndpoint.exchangeCode({
        code,
        redirectUri: attempt.redirectUri,
        verifier: attempt.verifier
      });
    } catch (error) {
      return this.finishLoginLocked(attempt, toError(error), 500, "Failed to exchange code");
    }

    try {
      await this.saveTokensLocked(tokens);
    } catch (error) {
      return this.finishLoginLocked(attempt, toError(error), 500, "Failed to persist token");
    }

    let profile: UserProfile;
    try {
      profile = await this.fetchProfileLocked(tokens.accessToken);
    } catch (error) {
      return this.finishLoginLocked(attempt, toError(error), 500, "Failed to fetch profile");
    }

    this.profile = profile;
    log.info(`Login completed for userId=${profile.id}.`);
    return this.finishLoginLocked(attempt, null, 200, SUCCESS_PAGE, "text/html; charset=utf-8");
  }

  private finishLoginLocked(
    attempt: LoginAttempt,
    outcome: Error | null,
    status: number,
    body: string,
    contentType?: string
  ): CallbackResponse {
    if (outcome) {
      log.error(`Login failed: ${outcome.message}`);
    }

    // The callback server closes itself once this response is written.
    attempt.detachSignal();
    attempt.result.offer(outcome);
    this.login = null;

    return { status, body, contentType };
  }

  private async cancelLogin(attempt: LoginAttempt, reason: Error): Promise<void> {
    await this.withLock(async () => {
      if (this.login === attempt) {
        log.info(`Login abandoned: ${reason.message}`);
        await this.endLoginLocked(attempt, reason);
      }
    });
  }

  private async endLoginLocked(attempt: LoginAttempt, reason: Error): Promise<void> {
    this.login = null;
    attempt.detachSignal();
    attempt.result.offer(reason);
    await attempt.server?.close();
  }

  private async loadTokensLocked(): Promise<void> {
    if (!this.tokens) {
      this.tokens = await readTokens(this.paths.tokenFile);
    }
  }

  private async saveTokensLocked(tokens: TokenRecord): Promise<void> {
    await writeTokens(this.paths.tokenFile, tokens);
    this.tokens = tokens;
  }

  private async clearSessionLocked(): Promise<void> {
    this.tokens = null;
    this.profile = null;
    await deleteFileIfExists(this.paths.tokenFile);
  }

  private async ensureFreshLocked(signal?: AbortSignal): Promise<TokenRecord> {
    const tokens = this.tokens;
    if (!tokens) {
      throw new NotAuthenticatedError();
    }

    if (tokens.expiresAt - this.now() >= REFRESH_MARGIN_SECONDS) {
      return tokens;
    }

    if (!tokens.refreshToken) {
      throw new MissingRefreshTokenError();
    }

    log.info("Access token is expiring; refreshing.");
    this.refreshing = true;

    let refreshed: TokenRecord;
    try {
      refreshed = await this.tokenEndpoint.refresh(tokens.refreshToken, signal);
    } catch (error) {
      if (error instanceof RefreshError && error.isGrantRevoked) {
        log.warn("Refresh token was rejected; clearing the stored session.");
        await this.clearSessionLocked();
      }

      throw error;
    } finally {
      this.refreshing = false;
    }

    const next: TokenRecord = {
      ...refreshed,
      refreshToken: refreshed.refreshToken || tokens.refreshToken
    };
    await this.saveTokensLocked(next);

    return next;
  }

  private async fetchProfileLocked(accessToken: string, signal?: AbortSignal): Promise<UserProfile> {
    const user = await this.apiClient.getJson<SpotifyUser>(`${SPOTIFY_API_BASE}/me`, accessToken, signal);
    return toUserProfile(user);
  }
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
