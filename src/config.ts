import dotenv from "dotenv";
import os from "node:os";
import path from "node:path";
import { endpointsFor, type Environment, type EtradeEndpoints } from "./etrade/endpoints.js";

dotenv.config();

export interface AppConfig {
  etrade: {
    environment: Environment;
    consumerKey: string;
    consumerSecret: string;
    tokenFile: string;
    endpoints: EtradeEndpoints;
  };
  rest: {
    host: string;
    port: number;
    apiKey: string;
  };
  log: {
    level: string;
  };
}

function parseBool(raw: string | undefined, fallback: boolean): boolean {
  if (raw === undefined || raw.trim() === "") return fallback;
  const val = raw.trim().toLowerCase();
  return !(val === "false" || val === "0" || val === "no");
}

// Sandbox and production keys live side by side; only the pair for the
// selected environment is ever used.
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const sandbox = parseBool(env.ETRADE_SANDBOX, true);
  const environment: Environment = sandbox ? "sandbox" : "production";

  return {
    etrade: {
      environment,
      consumerKey: (sandbox ? env.ETRADE_CONSUMER_KEY_SANDBOX : env.ETRADE_CONSUMER_KEY_PROD) ?? "",
      consumerSecret: (sandbox ? env.ETRADE_CONSUMER_SECRET_SANDBOX : env.ETRADE_CONSUMER_SECRET_PROD) ?? "",
      tokenFile: env.ETRADE_TOKEN_FILE || path.join(os.homedir(), ".etrade_tokens.json"),
      endpoints: endpointsFor(environment),
    },
    rest: {
      host: env.API_HOST ?? "0.0.0.0",
      port: parseInt(env.API_PORT ?? "8000", 10),
      apiKey: env.REST_API_KEY ?? "",
    },
    log: {
      level: env.LOG_LEVEL ?? "info",
    },
  };
}

export const config = loadConfig();
