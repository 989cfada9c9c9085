import { randomBytes } from "node:crypto";
import type { Logger } from "pino";
import type { z } from "zod";
import { EtradeApiError, InvalidInputError, NotAuthenticatedError } from "./errors.js";
import type { SignedRequest } from "./oauth1.js";
import {
  accountIdKeySchema,
  accountListResponseSchema,
  balanceResponseSchema,
  lookupResponseSchema,
  lookupSearchSchema,
  ordersResponseSchema,
  placeOrderResponseSchema,
  portfolioResponseSchema,
  previewOrderResponseSchema,
  quoteResponseSchema,
  validateSymbolList,
  type OrderInput,
} from "./schemas.js";
import type { SessionProvider } from "./token-manager.js";

export interface Account {
  accountIdKey: string;
  accountId: string | null;
  accountDesc: string | null;
  accountType: string | null;
  accountMode: string | null;
  accountStatus: string | null;
}

export interface Balance {
  accountIdKey: string;
  cashAvailableForInvestment: number;
  cashBuyingPower: number | null;
  marginBuyingPower: number | null;
  totalAccountValue: number | null;
}

export interface Position {
  symbol: string;
  quantity: number;
  price: number;
  marketValue: number;
  gain: number;
  gainPct: number;
}

export interface Quote {
  symbol: string;
  lastTrade: number | null;
  bid: number | null;
  ask: number | null;
  changeClose: number | null;
  changeClosePercentage: number | null;
  volume: number | null;
}

export interface LookupResult {
  symbol: string;
  description: string | null;
  type: string | null;
}

export interface OrderSummary {
  orderId: string;
  orderType: string | null;
  status: string | null;
  symbol: string | null;
  action: string | null;
  quantity: number | null;
  priceType: string | null;
}

export interface AccountSummary {
  account: Pick<Account, "accountIdKey" | "accountDesc" | "accountType">;
  cash: number;
  portfolioValue: number;
  totalValue: number;
  totalGain: number;
  positions: Position[];
}

export interface PortfolioSummary {
  accounts: AccountSummary[];
  totals: {
    cash: number;
    portfolioValue: number;
    totalValue: number;
    totalGain: number;
  };
}

export interface OrderPreview {
  previewId: string;
  clientOrderId: string;
}

export interface EtradeApiOptions {
  session: SessionProvider;
  apiBase: string;
  logger: Logger;
}

function accountPath(accountIdKey: string, suffix: string): string {
  const parsed = accountIdKeySchema.safeParse(accountIdKey);
  if (!parsed.success) throw new InvalidInputError(parsed.error.issues[0]?.message ?? "Invalid accountIdKey");
  return `/accounts/${parsed.data}${suffix}`;
}

// E*TRADE caps clientOrderId at 20 characters
export function createClientOrderId(): string {
  return randomBytes(10).toString("hex");
}

type OrderRequestKind = "PreviewOrderRequest" | "PlaceOrderRequest";

export function buildOrderRequest(
  kind: OrderRequestKind,
  order: OrderInput,
  clientOrderId: string,
  previewId?: string,
): Record<string, Record<string, unknown>> {
  const detail: Record<string, unknown> = {
    allOrNone: "false",
    priceType: order.priceType,
    orderTerm: order.orderTerm,
    marketSession: "REGULAR",
    Instrument: [
      {
        Product: { securityType: "EQ", symbol: order.symbol.toUpperCase() },
        orderAction: order.action,
        quantityType: "QUANTITY",
        quantity: String(order.quantity),
      },
    ],
  };
  if (order.limitPrice !== undefined) detail.limitPrice = String(order.limitPrice);
  if (order.stopPrice !== undefined) detail.stopPrice = String(order.stopPrice);

  const request: Record<string, unknown> = {
    orderType: "EQ",
    clientOrderId,
    Order: [detail],
  };
  if (previewId) request.PreviewIds = [{ previewId }];

  return { [kind]: request };
}

/**
 * Signed passthrough to the E*TRADE v1 REST API. Every call first clears
 * the token manager's `ensureReady` gate.
 */
export class EtradeApi {
  private readonly session: SessionProvider;
  private readonly apiBase: string;
  private readonly log: Logger;

  constructor(options: EtradeApiOptions) {
    this.session = options.session;
    this.apiBase = options.apiBase;
    this.log = options.logger;
  }

  async listAccounts(): Promise<Account[]> {
    const data = await this.call("/accounts/list", accountListResponseSchema);
    return data.AccountListResponse.Accounts.Account.map((a) => ({
      accountIdKey: a.accountIdKey,
      accountId: a.accountId ?? null,
      accountDesc: a.accountDesc ?? a.accountName ?? null,
      accountType: a.accountType ?? null,
      accountMode: a.accountMode ?? null,
      accountStatus: a.accountStatus ?? null,
    }));
  }

  async getBalance(accountIdKey: string): Promise<Balance> {
    const data = await this.call(accountPath(accountIdKey, "/balance"), balanceResponseSchema, {
      query: { instType: "BROKERAGE", realTimeNAV: "true" },
    });
    const computed = data.BalanceResponse.Computed;
    return {
      accountIdKey,
      cashAvailableForInvestment: computed?.cashAvailableForInvestment ?? 0,
      cashBuyingPower: computed?.cashBuyingPower ?? null,
      marginBuyingPower: computed?.marginBuyingPower ?? null,
      totalAccountValue: computed?.RealTimeValues?.totalAccountValue ?? null,
    };
  }

  async getPortfolio(accountIdKey: string): Promise<Position[]> {
    const data = await this.call(accountPath(accountIdKey, "/portfolio"), portfolioResponseSchema);
    return data.PortfolioResponse.AccountPortfolio.flatMap((p) =>
      p.Position.map((pos) => ({
        symbol: pos.Product?.symbol ?? pos.symbolDescription ?? "",
        quantity: pos.quantity,
        price: pos.Quick?.lastTrade ?? 0,
        marketValue: pos.marketValue,
        gain: pos.totalGain,
        gainPct: pos.totalGainPct,
      })),
    );
  }

  /**
   * Every account with cash, positions and totals. A balance or portfolio
   * call the vendor rejects counts as zero for that account.
   */
  async getSummary(): Promise<PortfolioSummary> {
    const accounts = await this.listAccounts();
    const summaries: AccountSummary[] = [];

    for (const account of accounts) {
      const cash = await this.tolerate(
        async () => (await this.getBalance(account.accountIdKey)).cashAvailableForInvestment,
        0,
        account.accountIdKey,
      );
      const positions = await this.tolerate(() => this.getPortfolio(account.accountIdKey), [], account.accountIdKey);
      const portfolioValue = positions.reduce((sum, p) => sum + p.marketValue, 0);
      const totalGain = positions.reduce((sum, p) => sum + p.gain, 0);

      summaries.push({
        account: { accountIdKey: account.accountIdKey, accountDesc: account.accountDesc, accountType: account.accountType },
        cash,
        portfolioValue,
        totalValue: cash + portfolioValue,
        totalGain,
        positions,
      });
    }

    const cash = summaries.reduce((sum, s) => sum + s.cash, 0);
    const portfolioValue = summaries.reduce((sum, s) => sum + s.portfolioValue, 0);
    return {
      accounts: summaries,
      totals: {
        cash,
        portfolioValue,
        totalValue: cash + portfolioValue,
        totalGain: summaries.reduce((sum, s) => sum + s.totalGain, 0),
      },
    };
  }

  /** @param symbols comma-separated, e.g. "AAPL,MSFT" */
  async getQuotes(symbols: string): Promise<Quote[]> {
    const invalid = validateSymbolList(symbols);
    if (invalid) throw new InvalidInputError(invalid);
    const list = symbols
      .split(",")
      .map((s) => s.trim().toUpperCase())
      .filter(Boolean);
    const data = await this.call(`/market/quote/${list.map(encodeURIComponent).join(",")}`, quoteResponseSchema);
    return data.QuoteResponse.QuoteData.map((q) => ({
      symbol: q.Product?.symbol ?? "",
      lastTrade: q.All?.lastTrade ?? null,
      bid: q.All?.bid ?? null,
      ask: q.All?.ask ?? null,
      changeClose: q.All?.changeClose ?? null,
      changeClosePercentage: q.All?.changeClosePercentage ?? null,
      volume: q.All?.totalVolume ?? null,
    }));
  }

  async lookupSymbol(search: string): Promise<LookupResult[]> {
    const parsed = lookupSearchSchema.safeParse(search);
    if (!parsed.success) throw new InvalidInputError(parsed.error.issues[0]?.message ?? "Invalid search");
    const data = await this.call(`/market/lookup/${encodeURIComponent(parsed.data)}`, lookupResponseSchema);
    return data.LookupResponse.Data.map((d) => ({
      symbol: d.symbol,
      description: d.description ?? null,
      type: d.type ?? null,
    }));
  }

  async listOrders(accountIdKey: string, status?: string): Promise<OrderSummary[]> {
    const data = await this.call(accountPath(accountIdKey, "/orders"), ordersResponseSchema, {
      query: { status },
    });
    return data.OrdersResponse.Order.map((o) => {
      const detail = o.OrderDetail[0];
      const instrument = detail?.Instrument[0];
      return {
        orderId: o.orderId,
        orderType: o.orderType ?? null,
        status: detail?.status ?? null,
        symbol: instrument?.Product?.symbol ?? null,
        action: instrument?.orderAction ?? null,
        quantity: instrument?.orderedQuantity ?? null,
        priceType: detail?.priceType ?? null,
      };
    });
  }

  async previewOrder(accountIdKey: string, order: OrderInput): Promise<OrderPreview> {
    const clientOrderId = createClientOrderId();
    const data = await this.call(
      accountPath(accountIdKey, "/orders/preview"),
      previewOrderResponseSchema,
      { method: "POST", json: buildOrderRequest("PreviewOrderRequest", order, clientOrderId) },
    );
    const previewId = data.PreviewOrderResponse.PreviewIds[0].previewId;
    this.log.info({ symbol: order.symbol, action: order.action, quantity: order.quantity, previewId }, "Order previewed");
    return { previewId, clientOrderId };
  }

  async placeOrder(accountIdKey: string, order: OrderInput, preview: OrderPreview): Promise<{ orderId: string }> {
    const data = await this.call(
      accountPath(accountIdKey, "/orders/place"),
      placeOrderResponseSchema,
      {
        method: "POST",
        json: buildOrderRequest("PlaceOrderRequest", order, preview.clientOrderId, preview.previewId),
      },
    );
    const orderId = data.PlaceOrderResponse.OrderIds[0].orderId;
    this.log.info({ symbol: order.symbol, action: order.action, quantity: order.quantity, orderId }, "Order placed");
    return { orderId };
  }

  async cancelOrder(accountIdKey: string, orderId: string): Promise<{ orderId: string }> {
    await this.send(accountPath(accountIdKey, "/orders/cancel"), {
      method: "PUT",
      json: { CancelOrderRequest: { orderId } },
    });
    this.log.info({ orderId }, "Order cancelled");
    return { orderId };
  }

  private async tolerate<T>(fn: () => Promise<T>, fallback: T, accountIdKey: string): Promise<T> {
    try {
      return await fn();
    } catch (e) {
      if (!(e instanceof EtradeApiError)) throw e;
      this.log.warn({ accountIdKey, status: e.status }, "Account detail call failed — counting as zero");
      return fallback;
    }
  }

  private async call<S extends z.ZodTypeAny>(path: string, schema: S, req: SignedRequest = {}): Promise<z.output<S>> {
    const body = await this.send(path, req);
    let json: unknown = {};
    if (body.trim()) {
      try {
        json = JSON.parse(body);
      } catch {
        throw new EtradeApiError(`E*TRADE returned a non-JSON body for ${path}`, 200, body);
      }
    }
    const parsed = schema.safeParse(json);
    if (!parsed.success) {
      throw new EtradeApiError(
        `Unexpected E*TRADE response for ${path}: ${parsed.error.issues[0]?.message ?? "invalid"}`,
        200,
        body,
      );
    }
    return parsed.data;
  }

  private async send(path: string, req: SignedRequest): Promise<string> {
    const ready = await this.session.ensureReady();
    const sender = this.session.getSender();
    if (!ready || !sender) throw new NotAuthenticatedError();

    const res = await sender.request(`${this.apiBase}${path}`, req);
    if (!res.ok) {
      this.log.warn({ path, status: res.status }, "E*TRADE call failed");
      throw new EtradeApiError(`E*TRADE returned ${res.status} for ${path}`, res.status, res.body);
    }
    return res.body;
  }
}
