import type { Logger } from "pino";
import { systemClock, toEasternIso, type EasternClock } from "./clock.js";
import { endpointsFor, type Environment, type EtradeEndpoints } from "./endpoints.js";
import { AuthError, errorMessage, fail, succeed, type AuthResult } from "./errors.js";
import {
  parseTokenResponse,
  SignedClient,
  type ConsumerCredentials,
  type FetchFn,
  type SignedResponse,
  type TokenPair,
} from "./oauth1.js";
import type { PersistedToken, TokenStore } from "./token-store.js";

/** Idle time after which E*TRADE wants the access token renewed before use. */
export const IDLE_RENEWAL_MS = 2 * 60 * 60 * 1000;

/** Out-of-band callback marker: the user copies the verifier code by hand. */
const OOB_CALLBACK = "oob";

export interface TokenManagerOptions {
  credentials: ConsumerCredentials;
  environment: Environment;
  store: TokenStore;
  logger: Logger;
  endpoints?: EtradeEndpoints;
  clock?: EasternClock;
  fetchFn?: FetchFn;
}

export interface AuthorizationStart {
  token: string;
  tokenSecret: string;
  authorizationUrl: string;
}

export interface TokenManagerStatus {
  authenticated: boolean;
  environment: Environment;
  tokenDate: string | null;
  lastUsed: string | null;
  authorizationPending: boolean;
  verifierSupplied: boolean;
}

/** What the API client needs from the manager. */
export interface SessionProvider {
  ensureReady(): Promise<boolean>;
  getSender(): SignedClient | null;
}

interface AccessTokenState extends TokenPair {
  tokenDate: string;
  lastUsed: Date;
  environment: Environment;
}

/**
 * Owns the E*TRADE OAuth 1.0a session: the three-legged handshake, the
 * midnight-Eastern expiry, the two-hour idle renewal and the persisted
 * same-day snapshot.
 *
 * One instance per process, built by the composition root and handed to the
 * REST and MCP facades. Every state transition runs through {@link exclusive}
 * so concurrent handlers cannot interleave a renewal with an expiry check.
 * Public operations never throw: handshake steps return an {@link AuthResult},
 * `ensureReady` a boolean.
 */
export class TokenLifecycleManager implements SessionProvider {
  private readonly credentials: ConsumerCredentials;
  private readonly environment: Environment;
  private readonly endpoints: EtradeEndpoints;
  private readonly store: TokenStore;
  private readonly clock: EasternClock;
  private readonly fetchFn: FetchFn;
  private readonly log: Logger;

  private requestToken: TokenPair | null = null;
  private verifier: string | null = null;
  private access: AccessTokenState | null = null;
  private sender: SignedClient | null = null;
  private queue: Promise<void> = Promise.resolve();

  constructor(options: TokenManagerOptions) {
    this.credentials = options.credentials;
    this.environment = options.environment;
    this.endpoints = options.endpoints ?? endpointsFor(options.environment);
    this.store = options.store;
    this.clock = options.clock ?? systemClock;
    this.fetchFn = options.fetchFn ?? ((input, init) => fetch(input, init));
    this.log = options.logger;

    this.restore();
  }

  /**
   * Step 1: fetch a request token and build the URL the user must visit.
   * Replaces any handshake already in flight.
   */
  beginAuthorization(): Promise<AuthResult<AuthorizationStart>> {
    return this.exclusive<AuthResult<AuthorizationStart>>(async () => {
      const configError = this.checkCredentials();
      if (configError) return fail(configError);

      const client = new SignedClient({ credentials: this.credentials, fetchFn: this.fetchFn });
      const url = `${this.endpoints.oauthBase}/request_token`;

      let response: SignedResponse;
      try {
        response = await client.request(url, { oauth: { oauth_callback: OOB_CALLBACK } });
      } catch (e) {
        this.log.error({ err: errorMessage(e), url }, "Request token call failed");
        return fail(new AuthError("network", `Request token call failed: ${errorMessage(e)}`, { cause: e }));
      }

      const pair = this.readTokenPair(response, "request token");
      if (!pair.ok) return pair;

      this.requestToken = pair.value;
      this.verifier = null;

      const authorizationUrl =
        `${this.endpoints.authorizeUrl}?key=${encodeURIComponent(this.credentials.consumerKey)}` +
        `&token=${encodeURIComponent(pair.value.token)}`;

      this.log.info({ environment: this.environment }, "Request token obtained — waiting for verifier");
      return succeed({ token: pair.value.token, tokenSecret: pair.value.tokenSecret, authorizationUrl });
    });
  }

  /** Step 2: record the code the user got after approving access. No network call. */
  supplyVerifier(code: string): Promise<AuthResult<void>> {
    return this.exclusive<AuthResult<void>>(async () => {
      if (!this.requestToken) {
        return fail(new AuthError("state", "No request token. Must authorize first (beginAuthorization)."));
      }
      const trimmed = code.trim();
      if (!trimmed) {
        return fail(new AuthError("state", "Verifier code is empty."));
      }
      this.verifier = trimmed;
      this.log.info("OAuth verifier set");
      return succeed(undefined);
    });
  }

  /**
   * Step 3: trade request token + verifier for an access token, bind the
   * authenticated sender to it and persist the snapshot.
   *
   * On failure the verifier is discarded and the request token kept, so the
   * user may retry with a fresh code; an existing access token is untouched.
   */
  completeAuthorization(): Promise<AuthResult<TokenPair>> {
    return this.exclusive<AuthResult<TokenPair>>(async () => {
      const requestToken = this.requestToken;
      if (!requestToken) {
        return fail(new AuthError("state", "No request token. Must authorize first (beginAuthorization)."));
      }
      const verifier = this.verifier;
      if (!verifier) {
        return fail(new AuthError("state", "OAuth verifier not set. User must authorize first."));
      }
      const configError = this.checkCredentials();
      if (configError) return fail(configError);

      const client = new SignedClient({ credentials: this.credentials, token: requestToken, fetchFn: this.fetchFn });
      const url = `${this.endpoints.oauthBase}/access_token`;

      let response: SignedResponse;
      try {
        response = await client.request(url, { oauth: { oauth_verifier: verifier } });
      } catch (e) {
        this.verifier = null;
        this.log.error({ err: errorMessage(e), url }, "Access token call failed");
        return fail(new AuthError("network", `Access token call failed: ${errorMessage(e)}`, { cause: e }));
      }

      const pair = this.readTokenPair(response, "access token");
      if (!pair.ok) {
        this.verifier = null;
        return pair;
      }

      this.access = {
        ...pair.value,
        tokenDate: this.clock.today(),
        lastUsed: this.clock.now(),
        environment: this.environment,
      };
      this.sender = this.buildSender(pair.value);
      this.requestToken = null;
      this.verifier = null;
      this.persist();

      this.log.info({ tokenDate: this.access.tokenDate, environment: this.environment }, "Access token obtained");
      return succeed({ ...pair.value });
    });
  }

  /**
   * Gate for every outbound API call. True when the session may sign requests
   * right now; false when the user must (re)authorize or a renewal failed.
   */
  ensureReady(): Promise<boolean> {
    return this.exclusive<boolean>(async () => {
      const access = this.access;
      if (!access) return false;

      const today = this.clock.today();
      if (access.environment !== this.environment || access.tokenDate !== today) {
        this.log.info(
          { tokenDate: access.tokenDate, today, tokenEnvironment: access.environment },
          "Access token expired at midnight ET (or environment changed) — re-authorization required",
        );
        this.access = null;
        this.sender = null;
        this.clearPersisted();
        return false;
      }

      const idleMs = this.clock.now().getTime() - access.lastUsed.getTime();
      if (idleMs > IDLE_RENEWAL_MS) {
        this.log.info({ idleMinutes: Math.round(idleMs / 60_000) }, "Token idle > 2 hours, attempting renewal");
        if (!(await this.renew())) {
          // Keep the token: a later probe may renew it before midnight.
          this.log.warn("Token renewal failed — session unusable until renewal succeeds or re-authorization");
          return false;
        }
      }

      this.access = { ...access, lastUsed: this.clock.now() };
      this.persist();
      return true;
    });
  }

  /** True iff an access token pair is held. Does not check expiry; use ensureReady for that. */
  isAuthenticated(): boolean {
    return this.access !== null && this.sender !== null;
  }

  getSender(): SignedClient | null {
    return this.sender;
  }

  getStatus(): TokenManagerStatus {
    return {
      authenticated: this.isAuthenticated(),
      environment: this.environment,
      tokenDate: this.access?.tokenDate ?? null,
      lastUsed: this.access ? toEasternIso(this.access.lastUsed) : null,
      authorizationPending: this.requestToken !== null,
      verifierSupplied: this.verifier !== null,
    };
  }

  private async renew(): Promise<boolean> {
    const sender = this.sender;
    if (!sender) return false;

    const url = `${this.endpoints.oauthBase}/renew_access_token`;
    try {
      const response = await sender.request(url);
      if (!response.ok) {
        this.log.error({ status: response.status, body: response.body.slice(0, 200) }, "Renew access token rejected");
        return false;
      }
    } catch (e) {
      this.log.error({ err: errorMessage(e) }, "Renew access token call failed");
      return false;
    }

    this.log.info("Access token renewed successfully");
    return true;
  }

  private readTokenPair(response: SignedResponse, what: string): AuthResult<TokenPair> {
    if (!response.ok) {
      this.log.error({ status: response.status, body: response.body.slice(0, 200) }, `E*TRADE rejected ${what} request`);
      return fail(
        new AuthError("vendor_rejection", `E*TRADE rejected ${what} request (HTTP ${response.status})`, {
          status: response.status,
          body: response.body,
        }),
      );
    }
    const pair = parseTokenResponse(response.body);
    if (!pair) {
      return fail(
        new AuthError("vendor_rejection", `E*TRADE ${what} response has no oauth_token/oauth_token_secret`, {
          status: response.status,
          body: response.body,
        }),
      );
    }
    return succeed(pair);
  }

  private checkCredentials(): AuthError | null {
    if (this.credentials.consumerKey && this.credentials.consumerSecret) return null;
    return new AuthError("configuration", `E*TRADE consumer key/secret not configured for ${this.environment}`);
  }

  private buildSender(token: TokenPair): SignedClient {
    return new SignedClient({ credentials: this.credentials, token, fetchFn: this.fetchFn });
  }

  private restore(): void {
    let record: PersistedToken | null;
    try {
      record = this.store.load();
    } catch (e) {
      this.log.error({ err: errorMessage(e) }, "Failed to load saved tokens");
      return;
    }
    if (!record) {
      this.log.info("No saved tokens found");
      return;
    }
    if (record.environment !== this.environment) {
      this.log.info({ saved: record.environment, current: this.environment }, "Saved tokens are for a different environment");
      return;
    }
    const today = this.clock.today();
    if (record.token_date !== today) {
      this.log.info({ tokenDate: record.token_date, today }, "Saved tokens expired");
      return;
    }
    const lastUsed = new Date(record.last_used);
    if (Number.isNaN(lastUsed.getTime())) {
      this.log.warn({ lastUsed: record.last_used }, "Saved tokens have an unreadable last_used — ignoring");
      return;
    }

    const pair: TokenPair = { token: record.access_token, tokenSecret: record.access_token_secret };
    this.access = { ...pair, tokenDate: record.token_date, lastUsed, environment: record.environment };
    this.sender = this.buildSender(pair);
    this.log.info({ tokenDate: record.token_date }, "Loaded saved tokens");
  }

  private persist(): void {
    const access = this.access;
    if (!access) return;
    try {
      this.store.save({
        access_token: access.token,
        access_token_secret: access.tokenSecret,
        last_used: toEasternIso(access.lastUsed),
        token_date: access.tokenDate,
        environment: access.environment,
      });
    } catch (e) {
      this.log.error({ err: errorMessage(e) }, "Failed to save tokens — session stays usable in memory");
    }
  }

  private clearPersisted(): void {
    try {
      this.store.clear();
    } catch (e) {
      this.log.error({ err: errorMessage(e) }, "Failed to clear saved tokens");
    }
  }

  private exclusive<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task);
    this.queue = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }
}
