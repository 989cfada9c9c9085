export type AuthErrorKind =
  | "configuration" // consumer key/secret missing
  | "state" // handshake step called out of order
  | "vendor_rejection" // OAuth endpoint answered with a non-success status
  | "network"; // request never got an answer

export class AuthError extends Error {
  readonly kind: AuthErrorKind;
  /** Vendor HTTP status, for vendor_rejection */
  readonly status?: number;
  /** Vendor response body, verbatim */
  readonly body?: string;

  constructor(kind: AuthErrorKind, message: string, details: { status?: number; body?: string; cause?: unknown } = {}) {
    super(message, { cause: details.cause });
    this.name = "AuthError";
    this.kind = kind;
    this.status = details.status;
    this.body = details.body;
  }
}

export type AuthSuccess<T> = { ok: true; value: T };
export type AuthFailure = { ok: false; error: AuthError };
export type AuthResult<T> = AuthSuccess<T> | AuthFailure;

export function succeed<T>(value: T): AuthSuccess<T> {
  return { ok: true, value };
}

export function fail(error: AuthError): AuthFailure {
  return { ok: false, error };
}

/** The session cannot sign requests right now; the user has to (re)authorize. */
export class NotAuthenticatedError extends Error {
  constructor(message = "Not authenticated. Start authorization and supply the verifier code.") {
    super(message);
    this.name = "NotAuthenticatedError";
  }
}

/** Caller input that cannot be turned into a vendor request. Nothing was sent. */
export class InvalidInputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidInputError";
  }
}

/** A signed passthrough call came back with a non-success status or an unreadable body. */
export class EtradeApiError extends Error {
  constructor(
    message: string,
    readonly status: number,
    readonly body: string,
  ) {
    super(message);
    this.name = "EtradeApiError";
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
