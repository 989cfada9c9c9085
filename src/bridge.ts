import type { AppConfig } from "./config.js";
import { EtradeApi } from "./etrade/api.js";
import type { EasternClock } from "./etrade/clock.js";
import type { FetchFn } from "./etrade/oauth1.js";
import { TokenLifecycleManager } from "./etrade/token-manager.js";
import { FileTokenStore, type TokenStore } from "./etrade/token-store.js";
import { logEtrade, logOauth } from "./logging.js";

/** What both facades are handed by the composition root. */
export interface BridgeDeps {
  config: AppConfig;
  manager: TokenLifecycleManager;
  api: EtradeApi;
}

export interface BridgeOverrides {
  store?: TokenStore;
  clock?: EasternClock;
  fetchFn?: FetchFn;
}

export function createBridge(config: AppConfig, overrides: BridgeOverrides = {}): BridgeDeps {
  const { etrade } = config;
  const manager = new TokenLifecycleManager({
    credentials: { consumerKey: etrade.consumerKey, consumerSecret: etrade.consumerSecret },
    environment: etrade.environment,
    endpoints: etrade.endpoints,
    store: overrides.store ?? new FileTokenStore(etrade.tokenFile),
    logger: logOauth,
    clock: overrides.clock,
    fetchFn: overrides.fetchFn,
  });
  const api = new EtradeApi({ session: manager, apiBase: etrade.endpoints.apiBase, logger: logEtrade });
  return { config, manager, api };
}
