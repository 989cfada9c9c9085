import crypto from "node:crypto";

/**
 * OAuth 1.0a request signing (HMAC-SHA1, Authorization header), as E*TRADE
 * expects it on every OAuth and API call.
 */

export interface ConsumerCredentials {
  consumerKey: string;
  consumerSecret: string;
}

export interface TokenPair {
  token: string;
  tokenSecret: string;
}

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

export type HttpMethod = "GET" | "POST" | "PUT" | "DELETE";

/**
 * Percent-encode for OAuth (RFC 3986)
 */
export function percentEncode(str: string): string {
  return encodeURIComponent(str)
    .replace(/!/g, "%21")
    .replace(/'/g, "%27")
    .replace(/\(/g, "%28")
    .replace(/\)/g, "%29")
    .replace(/\*/g, "%2A");
}

/**
 * Signature base string: METHOD&encoded-base-url&encoded-sorted-params.
 * Query parameters of `url` take part in the signature; the JSON body does not.
 */
export function buildBaseString(method: string, url: string, oauthParams: Record<string, string>): string {
  const parsed = new URL(url);
  const baseUrl = `${parsed.protocol}//${parsed.host}${parsed.pathname}`;

  const pairs: Array<[string, string]> = Object.entries(oauthParams).map(
    ([k, v]): [string, string] => [percentEncode(k), percentEncode(v)],
  );
  for (const [k, v] of parsed.searchParams) {
    pairs.push([percentEncode(k), percentEncode(v)]);
  }
  pairs.sort(([ak, av], [bk, bv]) => (ak === bk ? compare(av, bv) : compare(ak, bk)));
  const paramString = pairs.map(([k, v]) => `${k}=${v}`).join("&");

  return [method.toUpperCase(), percentEncode(baseUrl), percentEncode(paramString)].join("&");
}

function compare(a: string, b: string): number {
  if (a < b) return -1;
  return a > b ? 1 : 0;
}

export function hmacSignature(baseString: string, consumerSecret: string, tokenSecret: string): string {
  const signingKey = `${percentEncode(consumerSecret)}&${percentEncode(tokenSecret)}`;
  return crypto.createHmac("sha1", signingKey).update(baseString).digest("base64");
}

export function buildAuthHeader(params: Record<string, string>): string {
  const fields = Object.keys(params)
    .filter((key) => key.startsWith("oauth_"))
    .sort()
    .map((key) => `${percentEncode(key)}="${percentEncode(params[key])}"`)
    .join(",");
  return `OAuth ${fields}`;
}

export interface SignInput {
  method: HttpMethod;
  url: string;
  credentials: ConsumerCredentials;
  token?: TokenPair;
  /** Extra protocol parameters: oauth_callback, oauth_verifier */
  extra?: Record<string, string>;
  nonce?: string;
  timestamp?: string;
}

export function signRequest(input: SignInput): string {
  const oauthParams: Record<string, string> = {
    oauth_consumer_key: input.credentials.consumerKey,
    oauth_nonce: input.nonce ?? generateNonce(),
    oauth_signature_method: "HMAC-SHA1",
    oauth_timestamp: input.timestamp ?? Math.floor(Date.now() / 1000).toString(),
    oauth_version: "1.0",
    ...input.extra,
  };
  if (input.token) {
    oauthParams.oauth_token = input.token.token;
  }

  const baseString = buildBaseString(input.method, input.url, oauthParams);
  const signature = hmacSignature(baseString, input.credentials.consumerSecret, input.token?.tokenSecret ?? "");

  return buildAuthHeader({ ...oauthParams, oauth_signature: signature });
}

function generateNonce(): string {
  return crypto.randomBytes(16).toString("hex");
}

/**
 * Read oauth_token / oauth_token_secret from a form-encoded token response.
 * Only the documented response fields are used.
 */
export function parseTokenResponse(body: string): TokenPair | null {
  const params = new URLSearchParams(body.trim());
  const token = params.get("oauth_token");
  const tokenSecret = params.get("oauth_token_secret");
  if (!token || !tokenSecret) return null;
  return { token, tokenSecret };
}

export interface SignedRequest {
  method?: HttpMethod;
  query?: Record<string, string | undefined>;
  json?: unknown;
  /** Extra oauth_* protocol parameters for the handshake calls */
  oauth?: Record<string, string>;
}

export interface SignedResponse {
  status: number;
  ok: boolean;
  contentType: string;
  body: string;
}

export interface SignedClientOptions {
  credentials: ConsumerCredentials;
  token?: TokenPair;
  fetchFn: FetchFn;
}

/**
 * HTTP handle that signs every outgoing request with the consumer credentials
 * and, when bound to one, a token pair. One round trip per call, no retries:
 * a replayed nonce would be rejected anyway.
 */
export class SignedClient {
  constructor(private readonly options: SignedClientOptions) {}

  async request(url: string, req: SignedRequest = {}): Promise<SignedResponse> {
    const method = req.method ?? "GET";
    const target = new URL(url);
    for (const [key, value] of Object.entries(req.query ?? {})) {
      if (value !== undefined) target.searchParams.set(key, value);
    }

    const headers: Record<string, string> = {
      Accept: "application/json",
      Authorization: signRequest({
        method,
        url: target.toString(),
        credentials: this.options.credentials,
        token: this.options.token,
        extra: req.oauth,
      }),
    };

    let body: string | undefined;
    if (req.json !== undefined) {
      headers["Content-Type"] = "application/json";
      body = JSON.stringify(req.json);
    }

    const res = await this.options.fetchFn(target.toString(), { method, headers, body });
    return {
      status: res.status,
      ok: res.ok,
      contentType: res.headers.get("content-type") ?? "",
      body: await res.text(),
    };
  }
}
