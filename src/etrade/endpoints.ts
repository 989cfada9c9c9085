export type Environment = "sandbox" | "production";

export interface EtradeEndpoints {
  /** Versioned REST base, e.g. https://apisb.etrade.com/v1 */
  apiBase: string;
  /** OAuth base, e.g. https://apisb.etrade.com/oauth */
  oauthBase: string;
  /** User-facing authorization page. Never called by the bridge itself. */
  authorizeUrl: string;
}

const HOSTS: Record<Environment, string> = {
  sandbox: "https://apisb.etrade.com",
  production: "https://api.etrade.com",
};

const AUTHORIZE_URL = "https://us.etrade.com/e/t/etws/authorize";

export function endpointsFor(environment: Environment): EtradeEndpoints {
  const host = HOSTS[environment];
  return {
    apiBase: `${host}/v1`,
    oauthBase: `${host}/oauth`,
    authorizeUrl: AUTHORIZE_URL,
  };
}
