import { describe, it, expect, beforeEach } from "vitest";
import { buildOrderRequest, createClientOrderId, EtradeApi } from "../api.js";
import { EtradeApiError, InvalidInputError, NotAuthenticatedError } from "../errors.js";
import { orderInputSchema } from "../schemas.js";
import { MemoryTokenStore } from "../token-store.js";
import { FixedClock, VendorStub, createTestManager, persistedToken, silentLogger } from "../../../test/helpers.js";

const API_BASE = "https://apisb.etrade.com/v1";

function accountList(...keys: string[]) {
  return {
    AccountListResponse: {
      Accounts: {
        Account: keys.map((key, i) => ({
          accountIdKey: key,
          accountId: 1000 + i,
          accountDesc: `Brokerage ${i + 1}`,
          accountType: "INDIVIDUAL",
          accountMode: "CASH",
          accountStatus: "ACTIVE",
        })),
      },
    },
  };
}

describe("EtradeApi", () => {
  let vendor: VendorStub;
  let api: EtradeApi;

  beforeEach(() => {
    vendor = new VendorStub();
    const manager = createTestManager({
      vendor,
      clock: new FixedClock(),
      store: new MemoryTokenStore(persistedToken()),
    });
    api = new EtradeApi({ session: manager, apiBase: API_BASE, logger: silentLogger });
  });

  it("refuses to call out without a session", async () => {
    const manager = createTestManager({ vendor, clock: new FixedClock() });
    const unauthenticated = new EtradeApi({ session: manager, apiBase: API_BASE, logger: silentLogger });

    await expect(unauthenticated.listAccounts()).rejects.toBeInstanceOf(NotAuthenticatedError);
    expect(vendor.calls).toHaveLength(0);
  });

  it("lists accounts", async () => {
    vendor.onJson("GET /v1/accounts/list", accountList("k1"));

    expect(await api.listAccounts()).toEqual([
      {
        accountIdKey: "k1",
        accountId: "1000",
        accountDesc: "Brokerage 1",
        accountType: "INDIVIDUAL",
        accountMode: "CASH",
        accountStatus: "ACTIVE",
      },
    ]);
    expect(vendor.calls[0].authorization).toContain('oauth_token="acctoken789"');
  });

  it("turns a vendor error status into EtradeApiError with status and body", async () => {
    vendor.on("GET /v1/accounts/list", { status: 500, body: "boom" });

    const err = await api.listAccounts().catch((e: unknown) => e);
    expect(err).toBeInstanceOf(EtradeApiError);
    if (!(err instanceof EtradeApiError)) return;
    expect(err.message).toBe("E*TRADE returned 500 for /accounts/list");
    expect(err.status).toBe(500);
    expect(err.body).toBe("boom");
  });

  it("rejects a body that is not JSON", async () => {
    vendor.on("GET /v1/accounts/list", { body: "<AccountListResponse/>", contentType: "application/xml" });
    await expect(api.listAccounts()).rejects.toThrow("E*TRADE returned a non-JSON body for /accounts/list");
  });

  it("asks for the brokerage balance with real-time NAV", async () => {
    vendor.onJson("GET /v1/accounts/k1/balance", {
      BalanceResponse: {
        Computed: {
          cashAvailableForInvestment: 1500.5,
          cashBuyingPower: 1500.5,
          marginBuyingPower: "3001",
          RealTimeValues: { totalAccountValue: 25000 },
        },
      },
    });

    expect(await api.getBalance("k1")).toEqual({
      accountIdKey: "k1",
      cashAvailableForInvestment: 1500.5,
      cashBuyingPower: 1500.5,
      marginBuyingPower: 3001,
      totalAccountValue: 25000,
    });
    expect(vendor.calls[0].url).toBe(`${API_BASE}/accounts/k1/balance?instType=BROKERAGE&realTimeNAV=true`);
  });

  it("flattens portfolio positions", async () => {
    vendor.onJson("GET /v1/accounts/k1/portfolio", {
      PortfolioResponse: {
        AccountPortfolio: [
          {
            Position: [
              {
                symbolDescription: "AAPL",
                Product: { symbol: "AAPL", securityType: "EQ" },
                quantity: 10,
                marketValue: 1800,
                totalGain: 200,
                totalGainPct: 12.5,
                Quick: { lastTrade: 180 },
              },
            ],
          },
        ],
      },
    });

    expect(await api.getPortfolio("k1")).toEqual([
      { symbol: "AAPL", quantity: 10, price: 180, marketValue: 1800, gain: 200, gainPct: 12.5 },
    ]);
  });

  it("treats an empty portfolio body as no positions", async () => {
    vendor.on("GET /v1/accounts/k1/portfolio", { status: 200, body: "" });
    expect(await api.getPortfolio("k1")).toEqual([]);
  });

  it("summarizes every account and counts a failed balance as zero cash", async () => {
    vendor.onJson("GET /v1/accounts/list", accountList("k1", "k2"));
    vendor.onJson("GET /v1/accounts/k1/balance", { BalanceResponse: { Computed: { cashAvailableForInvestment: 100 } } });
    vendor.onJson("GET /v1/accounts/k1/portfolio", {
      PortfolioResponse: {
        AccountPortfolio: [
          {
            Position: [
              { Product: { symbol: "MSFT" }, quantity: 2, marketValue: 800, totalGain: 50, totalGainPct: 6.67 },
              { Product: { symbol: "IBM" }, quantity: 1, marketValue: 200, totalGain: -10, totalGainPct: -4.76 },
            ],
          },
        ],
      },
    });
    vendor.on("GET /v1/accounts/k2/balance", { status: 500, body: "unavailable" });
    vendor.on("GET /v1/accounts/k2/portfolio", { status: 200, body: "" });

    const summary = await api.getSummary();

    expect(summary.accounts).toHaveLength(2);
    expect(summary.accounts[0]).toMatchObject({
      account: { accountIdKey: "k1", accountDesc: "Brokerage 1", accountType: "INDIVIDUAL" },
      cash: 100,
      portfolioValue: 1000,
      totalValue: 1100,
      totalGain: 40,
    });
    expect(summary.accounts[1]).toMatchObject({ cash: 0, portfolioValue: 0, totalValue: 0, positions: [] });
    expect(summary.totals).toEqual({ cash: 100, portfolioValue: 1000, totalValue: 1100, totalGain: 40 });
  });

  it("quotes a cleaned, uppercased symbol list", async () => {
    vendor.onJson("GET /v1/market/quote/AAPL,MSFT", {
      QuoteResponse: {
        QuoteData: [
          { Product: { symbol: "AAPL" }, All: { lastTrade: 180.1, bid: 180, ask: 180.2, totalVolume: 1000 } },
          { Product: { symbol: "MSFT" }, All: { lastTrade: 400 } },
        ],
      },
    });

    const quotes = await api.getQuotes(" aapl, msft ,");
    expect(quotes.map((q) => q.symbol)).toEqual(["AAPL", "MSFT"]);
    expect(quotes[0]).toEqual({
      symbol: "AAPL",
      lastTrade: 180.1,
      bid: 180,
      ask: 180.2,
      changeClose: null,
      changeClosePercentage: null,
      volume: 1000,
    });
  });

  it("looks up symbols", async () => {
    vendor.onJson("GET /v1/market/lookup/apple", {
      LookupResponse: { Data: [{ symbol: "AAPL", description: "APPLE INC COM", type: "EQUITY" }] },
    });
    expect(await api.lookupSymbol("apple")).toEqual([{ symbol: "AAPL", description: "APPLE INC COM", type: "EQUITY" }]);
  });

  it("lists orders with a status filter", async () => {
    vendor.onJson("GET /v1/accounts/k1/orders", {
      OrdersResponse: {
        Order: [
          {
            orderId: 42,
            orderType: "EQ",
            OrderDetail: [
              {
                status: "OPEN",
                priceType: "LIMIT",
                Instrument: [{ Product: { symbol: "AAPL" }, orderAction: "BUY", orderedQuantity: 5 }],
              },
            ],
          },
        ],
      },
    });

    expect(await api.listOrders("k1", "OPEN")).toEqual([
      { orderId: "42", orderType: "EQ", status: "OPEN", symbol: "AAPL", action: "BUY", quantity: 5, priceType: "LIMIT" },
    ]);
    expect(vendor.calls[0].url).toBe(`${API_BASE}/accounts/k1/orders?status=OPEN`);
  });

  it("previews then places an order with the same client order id", async () => {
    vendor.onJson("POST /v1/accounts/k1/orders/preview", {
      PreviewOrderResponse: { PreviewIds: [{ previewId: 901 }] },
    });
    vendor.onJson("POST /v1/accounts/k1/orders/place", { PlaceOrderResponse: { OrderIds: [{ orderId: 77 }] } });
    const order = orderInputSchema.parse({ symbol: "aapl", action: "BUY", quantity: 5, priceType: "LIMIT", limitPrice: 150 });

    const preview = await api.previewOrder("k1", order);
    expect(preview.previewId).toBe("901");
    expect(preview.clientOrderId).toMatch(/^[0-9a-f]{20}$/);

    const placed = await api.placeOrder("k1", order, preview);
    expect(placed).toEqual({ orderId: "77" });

    const [previewCall, placeCall] = vendor.calls;
    expect(previewCall.contentType).toBe("application/json");
    expect(JSON.parse(previewCall.body ?? "")).toEqual(buildOrderRequest("PreviewOrderRequest", order, preview.clientOrderId));
    expect(JSON.parse(placeCall.body ?? "")).toEqual(
      buildOrderRequest("PlaceOrderRequest", order, preview.clientOrderId, "901"),
    );
  });

  it.each(["..", ".", "k1/../x", "key with spaces"])("refuses account key %j before signing anything", async (key) => {
    await expect(api.getBalance(key)).rejects.toThrow(
      new InvalidInputError("accountIdKey must be 1-64 letters, digits, '_' or '-'"),
    );
    await expect(api.cancelOrder(key, "42")).rejects.toBeInstanceOf(InvalidInputError);
    expect(vendor.calls).toHaveLength(0);
  });

  it("refuses a dot-segment lookup", async () => {
    await expect(api.lookupSymbol(" .. ")).rejects.toThrow("search cannot be '.' or '..'");
    expect(vendor.calls).toHaveLength(0);
  });

  it("refuses a quote list with a dot-segment symbol", async () => {
    await expect(api.getQuotes("..")).rejects.toThrow("Invalid symbol: must be 1-20 alphanumeric characters (..)");
    expect(vendor.calls).toHaveLength(0);
  });

  it("cancels an order with a PUT", async () => {
    vendor.onJson("PUT /v1/accounts/k1/orders/cancel", { CancelOrderResponse: { orderId: 42 } });

    expect(await api.cancelOrder("k1", "42")).toEqual({ orderId: "42" });
    expect(vendor.calls[0].body).toBe('{"CancelOrderRequest":{"orderId":"42"}}');
  });
});

describe("buildOrderRequest", () => {
  it("renders the vendor order payload with string quantities and prices", () => {
    const order = orderInputSchema.parse({
      symbol: "msft",
      action: "SELL",
      quantity: 3,
      priceType: "STOP_LIMIT",
      limitPrice: 410.5,
      stopPrice: 411,
      orderTerm: "GOOD_UNTIL_CANCEL",
    });

    expect(buildOrderRequest("PlaceOrderRequest", order, "abc123", "901")).toEqual({
      PlaceOrderRequest: {
        orderType: "EQ",
        clientOrderId: "abc123",
        PreviewIds: [{ previewId: "901" }],
        Order: [
          {
            allOrNone: "false",
            priceType: "STOP_LIMIT",
            orderTerm: "GOOD_UNTIL_CANCEL",
            marketSession: "REGULAR",
            limitPrice: "410.5",
            stopPrice: "411",
            Instrument: [
              {
                Product: { securityType: "EQ", symbol: "MSFT" },
                orderAction: "SELL",
                quantityType: "QUANTITY",
                quantity: "3",
              },
            ],
          },
        ],
      },
    });
  });

  it("omits prices a market order does not carry", () => {
    const order = orderInputSchema.parse({ symbol: "IBM", action: "BUY", quantity: 1 });
    const json = JSON.stringify(buildOrderRequest("PreviewOrderRequest", order, "x"));
    expect(json).toContain('"priceType":"MARKET"');
    expect(json).not.toContain('"limitPrice"');
    expect(json).not.toContain('"stopPrice"');
    expect(json).not.toContain('"PreviewIds"');
  });
});

describe("createClientOrderId", () => {
  it("fits the 20-character limit", () => {
    expect(createClientOrderId()).toHaveLength(20);
    expect(createClientOrderId()).not.toBe(createClientOrderId());
  });
});

describe("orderInputSchema", () => {
  it("defaults to a day market order", () => {
    expect(orderInputSchema.parse({ symbol: " aapl ", action: "BUY", quantity: 1 })).toEqual({
      symbol: "aapl",
      action: "BUY",
      quantity: 1,
      priceType: "MARKET",
      orderTerm: "GOOD_FOR_DAY",
    });
  });

  it("requires a limit price for LIMIT orders", () => {
    const result = orderInputSchema.safeParse({ symbol: "AAPL", action: "BUY", quantity: 1, priceType: "LIMIT" });
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.issues.map((i) => i.message)).toEqual(["LIMIT requires limitPrice"]);
  });

  it("requires both prices for STOP_LIMIT orders", () => {
    const result = orderInputSchema.safeParse({ symbol: "AAPL", action: "SELL", quantity: 1, priceType: "STOP_LIMIT" });
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.issues.map((i) => i.message)).toEqual([
      "STOP_LIMIT requires limitPrice",
      "STOP_LIMIT requires stopPrice",
    ]);
  });

  it("rejects fractional quantities", () => {
    expect(orderInputSchema.safeParse({ symbol: "AAPL", action: "BUY", quantity: 1.5 }).success).toBe(false);
  });
});
