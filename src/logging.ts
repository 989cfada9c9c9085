import pino from "pino";
import path from "path";
import { fileURLToPath } from "url";
import fs from "fs";
import type { Request, Response, NextFunction } from "express";
import { config } from "./config.js";

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const logsDir = process.env.LOG_DIR ?? path.join(__dirname, "../data/logs");
if (!fs.existsSync(logsDir)) fs.mkdirSync(logsDir, { recursive: true });

// Rotate log file daily — filename: bridge-YYYY-MM-DD.log
function logFilePath(): string {
  const date = new Date().toISOString().slice(0, 10);
  return path.join(logsDir, `bridge-${date}.log`);
}

// Multi-destination: stderr (human-readable) + file (JSON for parsing)
const transport = pino.transport({
  targets: [
    {
      target: "pino-pretty",
      options: {
        destination: 2, // stderr — stdout belongs to the MCP stdio transport
        colorize: true,
        translateTime: "HH:MM:ss.l",
        ignore: "pid,hostname",
      },
      level: config.log.level,
    },
    {
      target: "pino/file",
      options: {
        destination: logFilePath(),
        mkdir: true,
      },
      level: "debug", // file gets everything
    },
  ],
});

export const logger = pino(
  {
    level: "debug", // base level — targets filter individually
    base: { service: "etrade-bridge" },
    redact: {
      paths: [
        "consumerSecret",
        "tokenSecret",
        "token_secret",
        "access_token",
        "access_token_secret",
        "verifier",
        "*.consumerSecret",
        "*.tokenSecret",
        "*.access_token_secret",
      ],
      censor: "[REDACTED]",
    },
  },
  transport,
);

// Typed child loggers for subsystems
export const logOauth = logger.child({ subsystem: "oauth" });
export const logEtrade = logger.child({ subsystem: "etrade" });
export const logRest = logger.child({ subsystem: "rest" });
export const logMcp = logger.child({ subsystem: "mcp" });

// Express request logging middleware
export function requestLogger(req: Request, res: Response, next: NextFunction) {
  const start = Date.now();
  res.on("finish", () => {
    const duration = Date.now() - start;
    logRest.info(
      {
        method: req.method,
        path: req.path,
        status: res.statusCode,
        duration_ms: duration,
      },
      `${req.method} ${req.path} → ${res.statusCode} (${duration}ms)`,
    );
  });
  next();
}

// Clean up old log files (keep last N days)
export function pruneOldLogs(keepDays: number = 30) {
  try {
    const files = fs.readdirSync(logsDir).filter((f) => f.startsWith("bridge-") && f.endsWith(".log"));
    const cutoff = new Date();
    cutoff.setDate(cutoff.getDate() - keepDays);
    const cutoffStr = cutoff.toISOString().slice(0, 10);

    for (const file of files) {
      const dateMatch = file.match(/bridge-(\d{4}-\d{2}-\d{2})\.log/);
      if (dateMatch && dateMatch[1] < cutoffStr) {
        fs.unlinkSync(path.join(logsDir, file));
        logger.info({ file }, "Pruned old log file");
      }
    }
  } catch (e) {
    logger.warn({ err: e }, "Failed to prune old logs");
  }
}
