import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { BridgeDeps } from "../bridge.js";
import { errorMessage, EtradeApiError, InvalidInputError, NotAuthenticatedError } from "../etrade/errors.js";
import {
  accountIdKeySchema,
  cancelOrderInputSchema,
  lookupSearchSchema,
  orderInputSchema,
  orderInputShape,
  validateSymbolList,
} from "../etrade/schemas.js";
import { logMcp } from "../logging.js";
import { getStatus } from "../providers/status.js";

export const NOT_AUTHENTICATED_MESSAGE = "Not authenticated. Run etrade_auth_status to get auth URL.";

type ToolResult = { content: Array<{ type: "text"; text: string }>; isError?: boolean };

function text(payload: Record<string, unknown>, isError = false): ToolResult {
  const result: ToolResult = { content: [{ type: "text", text: JSON.stringify(payload, null, 2) }] };
  if (isError) result.isError = true;
  return result;
}

function failure(message: string, extra: Record<string, unknown> = {}): ToolResult {
  return text({ status: "error", error: message, ...extra }, true);
}

// Wrap tool handlers: success payloads get status "success", thrown errors
// become isError results the model can read
async function run(tool: string, fn: () => Promise<Record<string, unknown>>): Promise<ToolResult> {
  logMcp.info({ tool }, "Tool call");
  try {
    return text({ status: "success", ...(await fn()) });
  } catch (e) {
    if (e instanceof NotAuthenticatedError) return failure(NOT_AUTHENTICATED_MESSAGE);
    if (e instanceof InvalidInputError) return failure(e.message);
    if (e instanceof z.ZodError) return failure(e.issues.map((i) => i.message).join("; "));
    if (e instanceof EtradeApiError) {
      logMcp.warn({ tool, status: e.status }, "E*TRADE call failed");
      return failure(e.message, { http_status: e.status, body: e.body });
    }
    logMcp.error({ tool, err: errorMessage(e) }, "MCP tool error");
    return failure(errorMessage(e));
  }
}

const accountIdKey = accountIdKeySchema.describe("Account key from etrade_get_accounts");

export function createMcpServer(deps: BridgeDeps): McpServer {
  const { config, manager, api } = deps;
  const sandbox = config.etrade.environment === "sandbox";

  const server = new McpServer({
    name: "etrade-bridge",
    version: "0.1.0",
  });

  server.tool(
    "get_status",
    "Bridge status: Eastern time, market session and E*TRADE session state. Call this first.",
    {},
    async () => text(getStatus(manager.getStatus())),
  );

  // ── Authentication ──────────────────────────────────────────────────

  server.tool(
    "etrade_auth_status",
    "Check E*TRADE authentication. If not authenticated, starts authorization and returns the URL the user must visit; then call etrade_auth_callback with the verifier code.",
    {},
    async () => {
      logMcp.info({ tool: "etrade_auth_status" }, "Tool call");
      if (manager.isAuthenticated()) {
        const status = manager.getStatus();
        return text({ status: "authenticated", sandbox, token_date: status.tokenDate, last_used: status.lastUsed });
      }
      const result = await manager.beginAuthorization();
      if (!result.ok) return failure(result.error.message, { kind: result.error.kind });
      return text({
        status: "not_authenticated",
        authorization_url: result.value.authorizationUrl,
        instructions: "Visit the URL, login, and call etrade_auth_callback with the verifier code.",
      });
    },
  );

  server.tool(
    "etrade_auth_callback",
    "Complete E*TRADE OAuth with the verifier code shown after authorizing.",
    { verifier: z.string().min(1).describe("Verification code from the E*TRADE authorization page") },
    async ({ verifier }) => {
      logMcp.info({ tool: "etrade_auth_callback" }, "Tool call");
      const supplied = await manager.supplyVerifier(verifier);
      if (!supplied.ok) return failure(supplied.error.message, { kind: supplied.error.kind });
      const completed = await manager.completeAuthorization();
      if (!completed.ok) return failure(completed.error.message, { kind: completed.error.kind });
      return text({ status: "success", authenticated: manager.isAuthenticated(), sandbox });
    },
  );

  // ── Accounts ────────────────────────────────────────────────────────

  server.tool("etrade_get_accounts", "List all E*TRADE accounts.", {}, async () =>
    run("etrade_get_accounts", async () => ({ accounts: await api.listAccounts() })),
  );

  server.tool(
    "etrade_get_summary",
    "Every account with cash balance, portfolio value, total gain and positions, plus grand totals.",
    {},
    async () => run("etrade_get_summary", async () => ({ ...(await api.getSummary()) })),
  );

  server.tool("etrade_get_balance", "Cash and buying power for one account.", { accountIdKey }, async (args) =>
    run("etrade_get_balance", async () => ({ balance: await api.getBalance(args.accountIdKey) })),
  );

  server.tool("etrade_get_portfolio", "Positions held in one account.", { accountIdKey }, async (args) =>
    run("etrade_get_portfolio", async () => {
      const positions = await api.getPortfolio(args.accountIdKey);
      return { accountIdKey: args.accountIdKey, positions, count: positions.length };
    }),
  );

  // ── Market data ─────────────────────────────────────────────────────

  server.tool(
    "etrade_get_quote",
    "Real-time quotes for one or more symbols.",
    { symbols: z.string().min(1).describe("Comma-separated symbols, e.g. AAPL,MSFT") },
    async ({ symbols }) => {
      const invalid = validateSymbolList(symbols);
      if (invalid) return failure(invalid);
      return run("etrade_get_quote", async () => {
        const quotes = await api.getQuotes(symbols);
        return { quotes, count: quotes.length };
      });
    },
  );

  server.tool(
    "etrade_lookup_symbol",
    "Search symbols by company name or partial ticker.",
    { search: lookupSearchSchema.describe("Company name or ticker fragment") },
    async ({ search }) =>
      run("etrade_lookup_symbol", async () => {
        const results = await api.lookupSymbol(search);
        return { results, count: results.length };
      }),
  );

  // ── Orders ──────────────────────────────────────────────────────────

  server.tool(
    "etrade_list_orders",
    "Orders for one account, optionally filtered by status.",
    {
      accountIdKey,
      status: z
        .enum(["OPEN", "EXECUTED", "CANCELLED", "INDIVIDUAL_FILLS", "CANCEL_REQUESTED", "EXPIRED", "REJECTED"])
        .optional(),
    },
    async (args) =>
      run("etrade_list_orders", async () => {
        const orders = await api.listOrders(args.accountIdKey, args.status);
        return { orders, count: orders.length };
      }),
  );

  server.tool(
    "etrade_preview_order",
    "Preview an equity order. Returns previewId and clientOrderId, both needed by etrade_place_order.",
    { accountIdKey, ...orderInputShape },
    async ({ accountIdKey: key, ...input }) =>
      run("etrade_preview_order", async () => {
        const order = orderInputSchema.parse(input);
        const preview = await api.previewOrder(key, order);
        return { ...preview, order };
      }),
  );

  server.tool(
    "etrade_place_order",
    "Place an equity order previously previewed with etrade_preview_order. Use the same order fields.",
    {
      accountIdKey,
      ...orderInputShape,
      previewId: z.string().min(1).describe("previewId from etrade_preview_order"),
      clientOrderId: z.string().min(1).max(20).describe("clientOrderId from etrade_preview_order"),
    },
    async ({ accountIdKey: key, previewId, clientOrderId, ...input }) =>
      run("etrade_place_order", async () => {
        const order = orderInputSchema.parse(input);
        return { ...(await api.placeOrder(key, order, { previewId, clientOrderId })) };
      }),
  );

  server.tool(
    "etrade_cancel_order",
    "Cancel an open order.",
    { accountIdKey, orderId: z.union([z.string().min(1), z.number().int().positive()]).describe("Order id to cancel") },
    async (args) =>
      run("etrade_cancel_order", async () => {
        const { orderId } = cancelOrderInputSchema.parse({ orderId: args.orderId });
        return { ...(await api.cancelOrder(args.accountIdKey, orderId)) };
      }),
  );

  return server;
}
