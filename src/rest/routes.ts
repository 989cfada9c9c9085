import { Router, type Request, type Response } from "express";
import { z } from "zod";
import type { BridgeDeps } from "../bridge.js";
import {
  AuthError,
  errorMessage,
  EtradeApiError,
  InvalidInputError,
  NotAuthenticatedError,
  type AuthErrorKind,
} from "../etrade/errors.js";
import {
  accountIdKeySchema,
  cancelOrderInputSchema,
  lookupSearchSchema,
  orderInputSchema,
  placeOrderInputSchema,
  validateSymbolList,
} from "../etrade/schemas.js";
import { logRest } from "../logging.js";
import { getStatus } from "../providers/status.js";

const AUTH_ERROR_STATUS: Record<AuthErrorKind, number> = {
  configuration: 500,
  state: 409,
  vendor_rejection: 502,
  network: 502,
};

export function sendAuthFailure(res: Response, error: AuthError): void {
  const status = AUTH_ERROR_STATUS[error.kind];
  res.status(status).json({
    error: error.message,
    kind: error.kind,
    ...(error.status !== undefined ? { status: error.status, body: error.body ?? "" } : {}),
  });
}

export function sendApiError(res: Response, e: unknown): void {
  if (e instanceof InvalidInputError) {
    res.status(400).json({ error: e.message });
    return;
  }
  if (e instanceof NotAuthenticatedError) {
    res.status(401).json({ error: e.message });
    return;
  }
  if (e instanceof EtradeApiError) {
    res.status(502).json({ error: e.message, status: e.status, body: e.body });
    return;
  }
  logRest.error({ err: errorMessage(e) }, "Unhandled route error");
  res.status(500).json({ error: errorMessage(e) });
}

function sendInvalid(res: Response, error: z.ZodError): void {
  res.status(400).json({ error: "Invalid request", details: error.issues.map((i) => `${i.path.join(".") || "body"}: ${i.message}`) });
}

const verifierBodySchema = z.object({
  verifier: z.string().trim().min(1, "verifier is required"),
});

const listOrdersQuerySchema = z.object({
  status: z.enum(["OPEN", "EXECUTED", "CANCELLED", "INDIVIDUAL_FILLS", "CANCEL_REQUESTED", "EXPIRED", "REJECTED"]).optional(),
});

const placeBodySchema = z.object({
  order: orderInputSchema,
  preview: placeOrderInputSchema,
});

// Async handler that funnels anything thrown into sendApiError
function handle(fn: (req: Request, res: Response) => Promise<void>) {
  return (req: Request, res: Response): void => {
    fn(req, res).catch((e: unknown) => sendApiError(res, e));
  };
}

export function createRouter(deps: BridgeDeps): Router {
  const { manager, api } = deps;
  const router = Router();

  router.param("accountIdKey", (_req, res, next, value: string) => {
    const parsed = accountIdKeySchema.safeParse(value);
    if (!parsed.success) {
      res.status(400).json({ error: parsed.error.issues[0]?.message ?? "Invalid accountIdKey" });
      return;
    }
    next();
  });

  router.get("/status", (_req, res) => {
    res.json(getStatus(manager.getStatus()));
  });

  // ── OAuth handshake ───────────────────────────────────────────────

  router.get("/auth/status", (_req, res) => {
    res.json(manager.getStatus());
  });

  router.post(
    "/auth/authorize",
    handle(async (_req, res) => {
      const result = await manager.beginAuthorization();
      if (!result.ok) {
        sendAuthFailure(res, result.error);
        return;
      }
      res.json({
        token: result.value.token,
        token_secret: result.value.tokenSecret,
        authorization_url: result.value.authorizationUrl,
        instructions: "Visit the URL, log in, then POST the verifier code to /api/auth/callback.",
      });
    }),
  );

  router.post(
    "/auth/verifier",
    handle(async (req, res) => {
      const parsed = verifierBodySchema.safeParse(req.body ?? {});
      if (!parsed.success) {
        sendInvalid(res, parsed.error);
        return;
      }
      const result = await manager.supplyVerifier(parsed.data.verifier);
      if (!result.ok) {
        sendAuthFailure(res, result.error);
        return;
      }
      res.json({ verifier_set: true });
    }),
  );

  router.post(
    "/auth/complete",
    handle(async (_req, res) => {
      const result = await manager.completeAuthorization();
      if (!result.ok) {
        sendAuthFailure(res, result.error);
        return;
      }
      res.json(manager.getStatus());
    }),
  );

  // Convenience: supplyVerifier + completeAuthorization in one call
  router.post(
    "/auth/callback",
    handle(async (req, res) => {
      const parsed = verifierBodySchema.safeParse(req.body ?? {});
      if (!parsed.success) {
        sendInvalid(res, parsed.error);
        return;
      }
      const supplied = await manager.supplyVerifier(parsed.data.verifier);
      if (!supplied.ok) {
        sendAuthFailure(res, supplied.error);
        return;
      }
      const completed = await manager.completeAuthorization();
      if (!completed.ok) {
        sendAuthFailure(res, completed.error);
        return;
      }
      res.json(manager.getStatus());
    }),
  );

  // ── Accounts ──────────────────────────────────────────────────────

  router.get(
    "/accounts",
    handle(async (_req, res) => {
      res.json({ accounts: await api.listAccounts() });
    }),
  );

  router.get(
    "/accounts/summary",
    handle(async (_req, res) => {
      res.json(await api.getSummary());
    }),
  );

  router.get(
    "/accounts/:accountIdKey/balance",
    handle(async (req, res) => {
      res.json(await api.getBalance(req.params.accountIdKey));
    }),
  );

  router.get(
    "/accounts/:accountIdKey/portfolio",
    handle(async (req, res) => {
      const positions = await api.getPortfolio(req.params.accountIdKey);
      res.json({ accountIdKey: req.params.accountIdKey, positions, count: positions.length });
    }),
  );

  router.get(
    "/accounts/:accountIdKey/orders",
    handle(async (req, res) => {
      const parsed = listOrdersQuerySchema.safeParse(req.query);
      if (!parsed.success) {
        sendInvalid(res, parsed.error);
        return;
      }
      const orders = await api.listOrders(req.params.accountIdKey, parsed.data.status);
      res.json({ orders, count: orders.length });
    }),
  );

  // ── Orders ────────────────────────────────────────────────────────

  router.post(
    "/accounts/:accountIdKey/orders/preview",
    handle(async (req, res) => {
      const parsed = orderInputSchema.safeParse(req.body ?? {});
      if (!parsed.success) {
        sendInvalid(res, parsed.error);
        return;
      }
      const preview = await api.previewOrder(req.params.accountIdKey, parsed.data);
      res.json({ ...preview, order: parsed.data });
    }),
  );

  router.post(
    "/accounts/:accountIdKey/orders/place",
    handle(async (req, res) => {
      const parsed = placeBodySchema.safeParse(req.body ?? {});
      if (!parsed.success) {
        sendInvalid(res, parsed.error);
        return;
      }
      const result = await api.placeOrder(req.params.accountIdKey, parsed.data.order, parsed.data.preview);
      res.json(result);
    }),
  );

  router.put(
    "/accounts/:accountIdKey/orders/cancel",
    handle(async (req, res) => {
      const parsed = cancelOrderInputSchema.safeParse(req.body ?? {});
      if (!parsed.success) {
        sendInvalid(res, parsed.error);
        return;
      }
      res.json(await api.cancelOrder(req.params.accountIdKey, parsed.data.orderId));
    }),
  );

  // ── Market data ───────────────────────────────────────────────────

  router.get(
    "/quote/:symbols",
    handle(async (req, res) => {
      const err = validateSymbolList(req.params.symbols);
      if (err) {
        res.status(400).json({ error: err });
        return;
      }
      const quotes = await api.getQuotes(req.params.symbols);
      res.json({ quotes, count: quotes.length });
    }),
  );

  router.get(
    "/lookup/:search",
    handle(async (req, res) => {
      const parsed = lookupSearchSchema.safeParse(req.params.search);
      if (!parsed.success) {
        res.status(400).json({ error: parsed.error.issues[0]?.message ?? "Invalid search" });
        return;
      }
      const results = await api.lookupSymbol(parsed.data);
      res.json({ results, count: results.length });
    }),
  );

  return router;
}
