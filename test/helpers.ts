import pino from "pino";
import type { BridgeDeps } from "../src/bridge.js";
import { loadConfig } from "../src/config.js";
import { EtradeApi } from "../src/etrade/api.js";
import { easternDate, toEasternIso, type EasternClock } from "../src/etrade/clock.js";
import type { FetchFn } from "../src/etrade/oauth1.js";
import { TokenLifecycleManager } from "../src/etrade/token-manager.js";
import { MemoryTokenStore, type PersistedToken, type TokenStore } from "../src/etrade/token-store.js";

/** Tuesday 2026-03-10, 10:30 EDT */
export const TEST_NOW = new Date("2026-03-10T14:30:00.000Z");
export const TEST_TODAY = "2026-03-10";

export const CONSUMER_KEY = "test-consumer-key";
export const CONSUMER_SECRET = "test-secret";

export const REQUEST_TOKEN = "reqtoken123";
export const REQUEST_SECRET = "reqsecret456";
export const ACCESS_TOKEN = "acctoken789";
export const ACCESS_SECRET = "accsecret012";

export const AUTHORIZE_URL = `https://us.etrade.com/e/t/etws/authorize?key=${CONSUMER_KEY}&token=${REQUEST_TOKEN}`;

export const silentLogger = pino({ level: "silent" });

/** Mutable clock pinned to a chosen instant. */
export class FixedClock implements EasternClock {
  private current: Date;

  constructor(start: Date = TEST_NOW) {
    this.current = new Date(start.getTime());
  }

  now(): Date {
    return new Date(this.current.getTime());
  }

  today(): string {
    return easternDate(this.current);
  }

  set(date: Date): void {
    this.current = new Date(date.getTime());
  }

  advance(ms: number): void {
    this.current = new Date(this.current.getTime() + ms);
  }
}

export interface VendorCall {
  method: string;
  url: string;
  path: string;
  authorization: string;
  contentType: string | null;
  body: string | undefined;
}

export interface StubResponse {
  status?: number;
  body?: string;
  contentType?: string;
}

type Responder = StubResponse | ((call: VendorCall) => StubResponse | Promise<StubResponse>);

/**
 * In-process stand-in for the E*TRADE hosts. Routes are keyed by
 * "METHOD /path"; unknown routes answer 404. Every call is recorded.
 */
export class VendorStub {
  readonly calls: VendorCall[] = [];
  private readonly routes = new Map<string, Responder>();

  constructor() {
    this.on("GET /oauth/request_token", {
      body: `oauth_token=${REQUEST_TOKEN}&oauth_token_secret=${REQUEST_SECRET}&oauth_callback_confirmed=true`,
      contentType: "application/x-www-form-urlencoded",
    });
    this.on("GET /oauth/access_token", {
      body: `oauth_token=${ACCESS_TOKEN}&oauth_token_secret=${ACCESS_SECRET}`,
      contentType: "application/x-www-form-urlencoded",
    });
    this.on("GET /oauth/renew_access_token", { body: "Access Token has been renewed", contentType: "text/plain" });
  }

  on(route: string, responder: Responder): this {
    this.routes.set(route, responder);
    return this;
  }

  onJson(route: string, payload: unknown, status = 200): this {
    return this.on(route, { status, body: JSON.stringify(payload), contentType: "application/json" });
  }

  /** Make a route reject as if the host were unreachable. */
  fail(route: string, message = "connect ECONNREFUSED"): this {
    return this.on(route, () => Promise.reject(new TypeError(message)));
  }

  callsTo(path: string): VendorCall[] {
    return this.calls.filter((c) => c.path === path);
  }

  readonly fetchFn: FetchFn = async (input, init) => {
    const url = new URL(input);
    const headers = new Headers(init?.headers);
    const call: VendorCall = {
      method: init?.method ?? "GET",
      url: input,
      path: url.pathname,
      authorization: headers.get("authorization") ?? "",
      contentType: headers.get("content-type"),
      body: typeof init?.body === "string" ? init.body : undefined,
    };
    this.calls.push(call);

    const responder = this.routes.get(`${call.method} ${call.path}`);
    if (!responder) return new Response("not found", { status: 404 });
    const res = typeof responder === "function" ? await responder(call) : responder;
    return new Response(res.body ?? "", {
      status: res.status ?? 200,
      headers: { "content-type": res.contentType ?? "text/plain" },
    });
  };
}

/** A snapshot that restores as a live session at {@link TEST_NOW}. */
export function persistedToken(overrides: Partial<PersistedToken> = {}): PersistedToken {
  return {
    access_token: ACCESS_TOKEN,
    access_token_secret: ACCESS_SECRET,
    last_used: toEasternIso(TEST_NOW),
    token_date: TEST_TODAY,
    environment: "sandbox",
    ...overrides,
  };
}

export interface TestManagerOptions {
  store?: TokenStore;
  clock?: EasternClock;
  vendor?: VendorStub;
  environment?: "sandbox" | "production";
  consumerKey?: string;
}

export function createTestManager(options: TestManagerOptions = {}): TokenLifecycleManager {
  return new TokenLifecycleManager({
    credentials: { consumerKey: options.consumerKey ?? CONSUMER_KEY, consumerSecret: CONSUMER_SECRET },
    environment: options.environment ?? "sandbox",
    store: options.store ?? new MemoryTokenStore(),
    logger: silentLogger,
    clock: options.clock ?? new FixedClock(),
    fetchFn: (options.vendor ?? new VendorStub()).fetchFn,
  });
}

export interface TestDepsOptions extends TestManagerOptions {
  apiKey?: string;
}

export function createTestDeps(options: TestDepsOptions = {}): BridgeDeps {
  const config = loadConfig({
    ETRADE_SANDBOX: options.environment === "production" ? "false" : "true",
    ETRADE_CONSUMER_KEY_SANDBOX: options.consumerKey ?? CONSUMER_KEY,
    ETRADE_CONSUMER_SECRET_SANDBOX: CONSUMER_SECRET,
    ETRADE_TOKEN_FILE: "/tmp/etrade-bridge-test-tokens.json",
    API_HOST: "127.0.0.1",
    REST_API_KEY: options.apiKey ?? "",
  });
  const manager = createTestManager(options);
  const api = new EtradeApi({ session: manager, apiBase: config.etrade.endpoints.apiBase, logger: silentLogger });
  return { config, manager, api };
}
