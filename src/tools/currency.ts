import { z } from "zod";
import { defineTool, type ToolDefinition } from "./registry.js";
import { DEFAULT_HTTP_TIMEOUT_MS, getJson, type HttpToolOptions } from "./http.js";

// ── Currency Exchange — Frankfurter (ECB rates) ──────────

const LATEST_URL = "https://api.frankfurter.app/latest";

const RatesSchema = z.object({
  amount: z.number(),
  base: z.string(),
  rates: z.record(z.number()),
});

const currencyCode = z.coerce
  .string()
  .trim()
  .regex(/^[A-Za-z]{3}$/, "Expected a 3-letter currency code")
  .transform((code) => code.toUpperCase());

export function createCurrencyTool(options: HttpToolOptions = {}): ToolDefinition {
  const timeoutMs = options.timeoutMs ?? DEFAULT_HTTP_TIMEOUT_MS;

  return defineTool({
    name: "get_currency_exchange",
    description: "Converts an amount between currencies using the latest ECB exchange rates.",
    example: 'get_currency_exchange("USD", "EUR", 200)',
    parameters: {
      from_currency: currencyCode.describe('Source currency code, e.g. "USD"'),
      to_currency: currencyCode.describe('Target currency code, e.g. "EUR"'),
      amount: z.coerce.number().positive().default(1).describe("Amount to convert"),
    },
    execute: async ({ from_currency, to_currency, amount }) => {
      if (from_currency === to_currency) {
        return `Exchange rate: 1 ${from_currency} = 1.0000 ${to_currency}. ${amount} ${from_currency} = ${amount.toFixed(2)} ${to_currency}`;
      }

      const data = await getJson(
        LATEST_URL,
        { from: from_currency, to: to_currency, amount },
        RatesSchema,
        timeoutMs,
      );

      const converted = data.rates[to_currency];
      if (converted === undefined) {
        return `Currency error: Could not find exchange rate for ${from_currency} to ${to_currency}`;
      }

      const rate = converted / amount;
      return `Exchange rate: 1 ${from_currency} = ${rate.toFixed(4)} ${to_currency}. ${amount} ${from_currency} = ${converted.toFixed(2)} ${to_currency}`;
    },
  });
}
