import type { AppConfig } from "./config.js";

/**
 * Validation result with errors (fatal) and warnings (non-fatal).
 */
export interface ValidationResult {
  errors: string[];
  warnings: string[];
}

/**
 * Validates configuration values.
 *
 * Checks:
 * - REST port is in valid range (1-65535)
 * - REST host is set
 * - Consumer key/secret exist for the selected environment (warning only:
 *   the bridge still serves /health and /config, and the OAuth calls report
 *   the missing credentials when they are first used)
 * - API key is at least 16 characters (warning if shorter)
 * - Binding to every interface without an API key (warning)
 */
export function validateConfig(cfg: AppConfig): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (!isValidPort(cfg.rest.port)) {
    errors.push(`REST port must be between 1 and 65535, got ${cfg.rest.port}`);
  }

  if (!cfg.rest.host) {
    errors.push("REST host is required");
  }

  const env = cfg.etrade.environment;
  if (!cfg.etrade.consumerKey || !cfg.etrade.consumerSecret) {
    const suffix = env === "sandbox" ? "SANDBOX" : "PROD";
    warnings.push(
      `E*TRADE consumer key/secret missing for ${env} (set ETRADE_CONSUMER_KEY_${suffix} and ETRADE_CONSUMER_SECRET_${suffix})`,
    );
  }

  if (cfg.rest.apiKey && cfg.rest.apiKey.length < 16) {
    warnings.push(`REST API key is only ${cfg.rest.apiKey.length} characters (recommended: at least 16)`);
  }

  if (!cfg.rest.apiKey && cfg.rest.host === "0.0.0.0") {
    warnings.push("REST server listens on all interfaces with no REST_API_KEY set");
  }

  return { errors, warnings };
}

function isValidPort(port: number): boolean {
  return Number.isInteger(port) && port >= 1 && port <= 65535;
}
