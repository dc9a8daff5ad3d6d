/**
 * Currency conversion handler - "<amount> <CODE> to|in <CODE>"
 * Rates come from an exchange-rate endpoint (`<base url>/<BASE>` returning
 * `{ rates: { CODE: number } }`) and are cached per base code.
 */

import { readFileSync } from "node:fs";
import { z } from "zod";
import { LookupCache } from "../cache.ts";
import { fetchJson } from "../http.ts";
import { createLogger } from "../logger.ts";
import { formatNumber, isValidNumber } from "../math/index.ts";
import type { FetchLike, Handler } from "./types.ts";

const log = createLogger("currency");

const CONVERSION_PATTERN =
  /^(-?(?:\d+\.?\d*|\.\d+))\s*([a-z]{3})\s+(?:to|in)\s+([a-z]{3})$/i;

const RatesResponseSchema = z.object({
  rates: z.record(z.string(), z.number().positive()),
});

export type Rates = Record<string, number>;

export interface CurrencyHandlerOptions {
  apiUrl: string;
  fetch: FetchLike;
  timeoutMs: number;
  cache?: LookupCache<Rates>;
  /** Codes the handler will try; anything else declines without a request */
  currencies?: readonly string[];
}

export function loadCurrencyCodes(
  path: URL = new URL("../../data/currencies.json", import.meta.url),
): string[] {
  return z.array(z.string().length(3)).parse(JSON.parse(readFileSync(path, "utf-8")));
}

/** Round to cents, keeping the general number formatting */
export function formatAmount(value: number): string {
  return formatNumber(Math.round(value * 100) / 100);
}

export function createCurrencyHandler(options: CurrencyHandlerOptions): Handler {
  const cache = options.cache ?? new LookupCache<Rates>();
  const known = new Set((options.currencies ?? loadCurrencyCodes()).map((c) => c.toUpperCase()));

  async function getRates(base: string): Promise<Rates> {
    const cached = cache.get(base);
    if (cached) return cached;

    const url = `${options.apiUrl.replace(/\/+$/, "")}/${encodeURIComponent(base)}`;
    const body = RatesResponseSchema.parse(
      await fetchJson(url, { fetch: options.fetch, timeoutMs: options.timeoutMs }),
    );
    cache.set(base, body.rates);
    return body.rates;
  }

  return {
    name: "currency",
    description: "Currency conversion (100 usd to eur)",
    attempt: async (line) => {
      const match = line.match(CONVERSION_PATTERN);
      if (!match?.[1] || !match[2] || !match[3]) return null;

      const amount = parseFloat(match[1]);
      const from = match[2].toUpperCase();
      const to = match[3].toUpperCase();
      if (!known.has(from) || !known.has(to)) return null;
      if (from === to) return formatAmount(amount);

      const rate = (await getRates(from))[to];
      if (rate === undefined) {
        log.debug("no rate", { from, to });
        return null;
      }

      const converted = amount * rate;
      return isValidNumber(converted) ? formatAmount(converted) : null;
    },
  };
}
