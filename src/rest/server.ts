import express, { type Request, type Response, type NextFunction } from "express";
import cors from "cors";
import rateLimit from "express-rate-limit";
import { randomUUID, timingSafeEqual } from "node:crypto";
import type { Server } from "node:http";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import type { BridgeDeps } from "../bridge.js";
import { createRouter } from "./routes.js";
import { requestLogger, logRest } from "../logging.js";
import { createMcpServer } from "../mcp/server.js";

export const SERVICE_NAME = "etrade-bridge";
export const SERVICE_VERSION = "0.1.0";

function headerValue(req: Request, name: string): string | undefined {
  const value = req.headers[name];
  return Array.isArray(value) ? value[0] : value;
}

function apiKeyAuth(apiKey: string) {
  return (req: Request, res: Response, next: NextFunction): void => {
    if (!apiKey) {
      next();
      return;
    }
    const provided = headerValue(req, "x-api-key") ?? req.headers.authorization?.replace(/^Bearer\s+/i, "");
    const providedBuffer = Buffer.from(provided ?? "");
    const keyBuffer = Buffer.from(apiKey);

    if (providedBuffer.length === keyBuffer.length && timingSafeEqual(providedBuffer, keyBuffer)) {
      next();
    } else {
      res.status(401).json({ error: "Unauthorized: invalid or missing API key" });
    }
  };
}

// Keyed by API key, not IP: the bridge usually sits behind a local proxy
const keyGenerator = (req: Request): string => headerValue(req, "x-api-key") ?? "anonymous";

function limiter(max: number, message: string) {
  return rateLimit({
    windowMs: 60_000,
    max,
    standardHeaders: true,
    legacyHeaders: false,
    keyGenerator,
    message: { error: message },
    validate: { ip: false },
  });
}

// ── MCP-over-HTTP session management ────────────────────────────────
// Each client conversation gets its own transport + MCP server instance,
// keyed by the Mcp-Session-Id header. All of them share the one token manager.
const SESSION_TTL_MS = 30 * 60 * 1000;

class McpSessions {
  private readonly transports = new Map<string, StreamableHTTPServerTransport>();
  private readonly timers = new Map<string, ReturnType<typeof setTimeout>>();

  get size(): number {
    return this.transports.size;
  }

  get(id: string | undefined): StreamableHTTPServerTransport | undefined {
    return id ? this.transports.get(id) : undefined;
  }

  add(id: string, transport: StreamableHTTPServerTransport): void {
    this.transports.set(id, transport);
    this.touch(id);
  }

  touch(id: string): void {
    const existing = this.timers.get(id);
    if (existing) clearTimeout(existing);
    const timer = setTimeout(() => {
      const transport = this.transports.get(id);
      if (!transport) return;
      logRest.info({ sessionId: id }, "MCP session expired — cleaning up");
      this.remove(id);
      transport.close().catch((e: unknown) => logRest.warn({ sessionId: id, err: e }, "MCP transport close failed"));
    }, SESSION_TTL_MS);
    timer.unref();
    this.timers.set(id, timer);
  }

  remove(id: string): void {
    this.transports.delete(id);
    const timer = this.timers.get(id);
    if (timer) clearTimeout(timer);
    this.timers.delete(id);
  }
}

export function createApp(deps: BridgeDeps): express.Express {
  const { config, manager } = deps;
  const app = express();
  const auth = apiKeyAuth(config.rest.apiKey);
  const sessions = new McpSessions();

  app.use(cors());
  app.use(express.json());
  app.use(requestLogger);

  // Service descriptor (unauthenticated)
  app.get("/", (_req, res) => {
    res.json({
      name: SERVICE_NAME,
      version: SERVICE_VERSION,
      api: "/api/status",
      auth: "/api/auth/status",
      mcp: "/mcp",
    });
  });

  app.get("/health", (_req, res) => {
    res.json({
      status: "healthy",
      service: SERVICE_NAME,
      version: SERVICE_VERSION,
      authenticated: manager.isAuthenticated(),
      mcp_sessions: sessions.size,
      timestamp: new Date().toISOString(),
    });
  });

  app.get("/config", (_req, res) => {
    res.json({
      sandbox_mode: config.etrade.environment === "sandbox",
      api_host: config.rest.host,
      api_port: config.rest.port,
      etrade_base_url: config.etrade.endpoints.apiBase,
    });
  });

  // ── MCP Streamable HTTP endpoint ──
  app.post("/mcp", auth, async (req: Request, res: Response) => {
    const sessionId = headerValue(req, "mcp-session-id");
    const existing = sessions.get(sessionId);

    try {
      if (sessionId && existing) {
        sessions.touch(sessionId);
        await existing.handleRequest(req, res, req.body);
        return;
      }

      const transport: StreamableHTTPServerTransport = new StreamableHTTPServerTransport({
        sessionIdGenerator: () => randomUUID(),
        onsessioninitialized: (id: string) => {
          sessions.add(id, transport);
          logRest.info({ sessionId: id, total: sessions.size }, "MCP session created");
        },
      });
      transport.onclose = () => {
        const id = transport.sessionId;
        if (!id) return;
        sessions.remove(id);
        logRest.info({ sessionId: id, total: sessions.size }, "MCP session closed");
      };

      const server = createMcpServer(deps);
      await server.connect(transport);
      await transport.handleRequest(req, res, req.body);
    } catch (e) {
      logRest.error({ err: e, sessionId }, "MCP request failed");
      if (!res.headersSent) res.status(500).json({ error: "MCP request failed" });
    }
  });

  // GET /mcp opens the SSE stream, DELETE /mcp ends the session
  const forward = async (req: Request, res: Response): Promise<void> => {
    const sessionId = headerValue(req, "mcp-session-id");
    const transport = sessions.get(sessionId);
    if (!sessionId || !transport) {
      res.status(400).json({ error: "Invalid or missing Mcp-Session-Id header" });
      return;
    }
    sessions.touch(sessionId);
    await transport.handleRequest(req, res);
  };
  app.get("/mcp", auth, (req, res) => {
    forward(req, res).catch((e: unknown) => {
      logRest.error({ err: e }, "MCP stream failed");
      if (!res.headersSent) res.status(500).json({ error: "MCP request failed" });
    });
  });
  app.delete("/mcp", auth, (req, res) => {
    forward(req, res).catch((e: unknown) => {
      logRest.error({ err: e }, "MCP session delete failed");
      if (!res.headersSent) res.status(500).json({ error: "MCP request failed" });
    });
  });

  // Stricter limit on anything that touches orders
  const orderLimiter = limiter(10, "Order rate limit exceeded — 10 orders/minute");
  app.use("/api/accounts/:accountIdKey/orders/preview", orderLimiter);
  app.use("/api/accounts/:accountIdKey/orders/place", orderLimiter);
  app.use("/api/accounts/:accountIdKey/orders/cancel", orderLimiter);

  app.use("/api", auth, limiter(100, "Rate limit exceeded — 100 requests/minute"), createRouter(deps));

  return app;
}

export function startRestServer(deps: BridgeDeps): Promise<Server> {
  const { host, port, apiKey } = deps.config.rest;
  return new Promise((resolve, reject) => {
    const app = createApp(deps);
    const httpServer = app.listen(port, host, () => {
      logRest.info({ host, port }, "REST server listening");
      logRest.info({ url: `http://localhost:${port}/mcp` }, "MCP Streamable HTTP endpoint available");
      if (apiKey) {
        logRest.info("API key authentication enabled");
      } else {
        logRest.warn("No REST_API_KEY set — endpoints are unauthenticated");
      }
      resolve(httpServer);
    });
    httpServer.on("error", reject);
  });
}
