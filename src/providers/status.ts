import { EASTERN_TZ } from "../etrade/clock.js";
import type { TokenManagerStatus } from "../etrade/token-manager.js";

export type MarketSession = "pre-market" | "regular" | "after-hours" | "closed";

export function getMarketSession(now: Date = new Date()): { easternTime: string; session: MarketSession } {
  const et = new Date(now.toLocaleString("en-US", { timeZone: EASTERN_TZ }));
  const h = et.getHours();
  const m = et.getMinutes();
  const mins = h * 60 + m;
  const day = et.getDay(); // 0=Sun, 6=Sat

  const easternTime = et.toLocaleString("en-US", {
    weekday: "short", year: "numeric", month: "short", day: "numeric",
    hour: "2-digit", minute: "2-digit", second: "2-digit", hour12: true,
  });

  if (day === 0 || day === 6) return { easternTime, session: "closed" };
  if (mins >= 240 && mins < 570) return { easternTime, session: "pre-market" };
  if (mins >= 570 && mins < 960) return { easternTime, session: "regular" };
  if (mins >= 960 && mins < 1200) return { easternTime, session: "after-hours" };
  return { easternTime, session: "closed" };
}

export function getStatus(auth: TokenManagerStatus, now: Date = new Date()) {
  const { easternTime, session } = getMarketSession(now);
  return {
    status: "ready",
    easternTime,
    marketSession: session,
    etrade: {
      environment: auth.environment,
      authenticated: auth.authenticated,
      tokenDate: auth.tokenDate,
      lastUsed: auth.lastUsed,
      authorizationPending: auth.authorizationPending,
      note: auth.authenticated
        ? "Access token held — expires at midnight ET"
        : "Not authenticated — start authorization and supply the verifier code",
    },
    timestamp: now.toISOString(),
  };
}
