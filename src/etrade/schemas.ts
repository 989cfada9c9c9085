import { z } from "zod";

// ── Vendor responses (JSON flavour, Accept: application/json) ───────────
// Lenient on purpose: only the fields the facades report are declared and
// everything else is dropped. Numbers arrive as numbers, but coercion keeps
// the occasional quoted value readable.

const optNum = z.coerce.number().optional();

const accountSchema = z.object({
  accountIdKey: z.string(),
  accountId: z.coerce.string().optional(),
  accountName: z.string().optional(),
  accountDesc: z.string().optional(),
  accountType: z.string().optional(),
  accountMode: z.string().optional(),
  accountStatus: z.string().optional(),
  institutionType: z.string().optional(),
});

export const accountListResponseSchema = z.object({
  AccountListResponse: z.object({
    Accounts: z
      .object({
        Account: z.array(accountSchema).default([]),
      })
      .default({}),
  }),
});

export const balanceResponseSchema = z.object({
  BalanceResponse: z.object({
    accountId: z.coerce.string().optional(),
    accountType: z.string().optional(),
    Computed: z
      .object({
        cashAvailableForInvestment: optNum,
        cashBuyingPower: optNum,
        marginBuyingPower: optNum,
        netCash: optNum,
        RealTimeValues: z
          .object({
            totalAccountValue: optNum,
          })
          .optional(),
      })
      .optional(),
  }),
});

const positionSchema = z.object({
  symbolDescription: z.string().optional(),
  Product: z.object({ symbol: z.string().optional(), securityType: z.string().optional() }).optional(),
  quantity: z.coerce.number().default(0),
  marketValue: z.coerce.number().default(0),
  totalGain: z.coerce.number().default(0),
  totalGainPct: z.coerce.number().default(0),
  Quick: z.object({ lastTrade: optNum }).optional(),
});

export const portfolioResponseSchema = z.object({
  PortfolioResponse: z
    .object({
      AccountPortfolio: z
        .array(
          z.object({
            Position: z.array(positionSchema).default([]),
          }),
        )
        .default([]),
    })
    .default({}),
});

export const quoteResponseSchema = z.object({
  QuoteResponse: z.object({
    QuoteData: z
      .array(
        z.object({
          dateTime: z.string().optional(),
          Product: z.object({ symbol: z.string().optional() }).optional(),
          All: z
            .object({
              lastTrade: optNum,
              bid: optNum,
              ask: optNum,
              changeClose: optNum,
              changeClosePercentage: optNum,
              totalVolume: optNum,
            })
            .optional(),
        }),
      )
      .default([]),
    Messages: z
      .object({
        Message: z.array(z.object({ description: z.string().optional() })).default([]),
      })
      .optional(),
  }),
});

export const lookupResponseSchema = z.object({
  LookupResponse: z
    .object({
      Data: z
        .array(
          z.object({
            symbol: z.string(),
            description: z.string().optional(),
            type: z.string().optional(),
          }),
        )
        .default([]),
    })
    .default({}),
});

export const ordersResponseSchema = z.object({
  OrdersResponse: z
    .object({
      Order: z
        .array(
          z.object({
            orderId: z.coerce.string(),
            orderType: z.string().optional(),
            OrderDetail: z
              .array(
                z.object({
                  status: z.string().optional(),
                  priceType: z.string().optional(),
                  orderTerm: z.string().optional(),
                  limitPrice: optNum,
                  stopPrice: optNum,
                  Instrument: z
                    .array(
                      z.object({
                        Product: z.object({ symbol: z.string().optional() }).optional(),
                        orderAction: z.string().optional(),
                        orderedQuantity: optNum,
                        filledQuantity: optNum,
                      }),
                    )
                    .default([]),
                }),
              )
              .default([]),
          }),
        )
        .default([]),
    })
    .default({}),
});

export const previewOrderResponseSchema = z.object({
  PreviewOrderResponse: z.object({
    PreviewIds: z.array(z.object({ previewId: z.coerce.string() })).min(1),
  }),
});

export const placeOrderResponseSchema = z.object({
  PlaceOrderResponse: z.object({
    OrderIds: z.array(z.object({ orderId: z.coerce.string() })).min(1),
  }),
});

// ── Path segments ───────────────────────────────────────────────────────
// Values interpolated into vendor URLs. `.` and `..` survive
// encodeURIComponent and would be collapsed by URL parsing.

export const accountIdKeySchema = z
  .string()
  .regex(/^[A-Za-z0-9_-]{1,64}$/, "accountIdKey must be 1-64 letters, digits, '_' or '-'");

export const lookupSearchSchema = z
  .string()
  .trim()
  .min(1, "search must be 1-64 characters")
  .max(64, "search must be 1-64 characters")
  .refine((s) => s !== "." && s !== "..", "search cannot be '.' or '..'");

/** Validate a stock symbol: alphanumeric first, then dots or hyphens, max 20 chars */
const SYMBOL_RE = /^[A-Za-z0-9][A-Za-z0-9.\-]{0,19}$/;
export function validateSymbol(symbol: string): string | null {
  if (!symbol || !SYMBOL_RE.test(symbol)) {
    return "Invalid symbol: must be 1-20 alphanumeric characters";
  }
  return null;
}

/** Comma-separated symbol list, each checked with {@link validateSymbol}. Max 25 per E*TRADE call. */
export function validateSymbolList(raw: string): string | null {
  const symbols = raw.split(",").map((s) => s.trim()).filter(Boolean);
  if (symbols.length === 0) return "At least one symbol is required";
  if (symbols.length > 25) return "At most 25 symbols per quote request";
  for (const s of symbols) {
    const err = validateSymbol(s);
    if (err) return `${err} (${s})`;
  }
  return null;
}

// ── Order input (shared by REST body validation and MCP tool params) ────

export const ORDER_ACTIONS = ["BUY", "SELL", "BUY_TO_COVER", "SELL_SHORT"] as const;
export const PRICE_TYPES = ["MARKET", "LIMIT", "STOP", "STOP_LIMIT", "TRAILING_STOP_PRCT"] as const;
export const ORDER_TERMS = ["GOOD_FOR_DAY", "GOOD_UNTIL_CANCEL"] as const;

/** Raw shape so MCP tools can register it directly. */
export const orderInputShape = {
  symbol: z.string().trim().min(1).max(20).describe("Stock symbol, e.g. AAPL"),
  action: z.enum(ORDER_ACTIONS).describe("BUY, SELL, BUY_TO_COVER or SELL_SHORT"),
  quantity: z.number().int().positive().describe("Number of shares"),
  priceType: z.enum(PRICE_TYPES).default("MARKET").describe("MARKET, LIMIT, STOP, STOP_LIMIT, TRAILING_STOP_PRCT"),
  limitPrice: z.number().positive().optional().describe("Required for LIMIT and STOP_LIMIT"),
  stopPrice: z
    .number()
    .positive()
    .optional()
    .describe("Required for STOP and STOP_LIMIT; trailing percentage for TRAILING_STOP_PRCT"),
  orderTerm: z.enum(ORDER_TERMS).default("GOOD_FOR_DAY").describe("GOOD_FOR_DAY or GOOD_UNTIL_CANCEL"),
};

export const orderInputSchema = z.object(orderInputShape).superRefine((order, ctx) => {
  if ((order.priceType === "LIMIT" || order.priceType === "STOP_LIMIT") && order.limitPrice === undefined) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["limitPrice"], message: `${order.priceType} requires limitPrice` });
  }
  if (
    (order.priceType === "STOP" || order.priceType === "STOP_LIMIT" || order.priceType === "TRAILING_STOP_PRCT") &&
    order.stopPrice === undefined
  ) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["stopPrice"], message: `${order.priceType} requires stopPrice` });
  }
});

export type OrderInput = z.output<typeof orderInputSchema>;

export const placeOrderInputSchema = z.object({
  previewId: z.string().min(1),
  clientOrderId: z.string().min(1).max(20),
});

export const cancelOrderInputSchema = z.object({
  orderId: z.union([z.string().min(1), z.number().int().positive()]).transform(String),
});
