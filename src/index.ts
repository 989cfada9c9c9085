#!/usr/bin/env node
// suppress-stdout MUST be the first import: it redirects console.log → stderr
// before anything else can write to MCP's stdio transport.
import "./suppress-stdout.js";

import type { Server } from "node:http";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { createBridge } from "./bridge.js";
import { config } from "./config.js";
import { validateConfig } from "./config-validator.js";
import { logger, pruneOldLogs } from "./logging.js";
import { createMcpServer } from "./mcp/server.js";
import { startRestServer } from "./rest/server.js";

type Mode = "mcp" | "rest" | "both";

function parseMode(): Mode {
  const idx = process.argv.indexOf("--mode");
  const raw = idx !== -1 ? process.argv[idx + 1] : undefined;
  if (raw) {
    const val = raw.toLowerCase();
    if (val === "mcp" || val === "rest" || val === "both") return val;
  }
  return "both";
}

async function main() {
  const mode = parseMode();
  process.stderr.write(`[etrade-bridge] PID=${process.pid} mode=${mode} ts=${new Date().toISOString()}\n`);
  logger.info({ mode, environment: config.etrade.environment }, "E*TRADE bridge starting");

  const validation = validateConfig(config);
  for (const warning of validation.warnings) {
    logger.warn(warning);
  }
  if (validation.errors.length > 0) {
    for (const error of validation.errors) {
      logger.error(error);
    }
    throw new Error("Configuration validation failed. Please fix the errors above.");
  }

  pruneOldLogs();

  // One token manager per process; both facades share it
  const deps = createBridge(config);

  let httpServer: Server | null = null;
  if (mode === "rest" || mode === "both") {
    httpServer = await startRestServer(deps);
  }

  const shutdown = async () => {
    logger.info("Shutting down...");
    const server = httpServer;
    if (server) {
      await new Promise<void>((resolve) => {
        server.close(() => resolve());
      });
    }
    process.exit(0);
  };

  if (mode === "mcp" || mode === "both") {
    const mcpServer = createMcpServer(deps);
    const transport = new StdioServerTransport();

    process.stdin.on("error", (err) => {
      logger.error({ err: err.message }, "MCP stdin error — shutting down");
      shutdown().catch((e: unknown) => logger.error({ err: e }, "Shutdown error after stdin failure"));
    });

    await mcpServer.connect(transport);
    logger.info("MCP server running on stdio");
  }

  process.on("SIGINT", () => {
    shutdown().catch((e: unknown) => logger.error({ err: e }, "Shutdown error"));
  });
  process.on("SIGTERM", () => {
    shutdown().catch((e: unknown) => logger.error({ err: e }, "Shutdown error"));
  });

  // Log but keep running: a failed vendor call inside a timer must not take
  // the session down with it
  process.on("unhandledRejection", (reason) => {
    logger.error({ reason }, "Unhandled promise rejection");
  });

  logger.info({ mode, authenticated: deps.manager.isAuthenticated() }, "Bridge ready");
}

main().catch((err: unknown) => {
  logger.fatal({ err }, "Fatal error");
  process.exit(1);
});
