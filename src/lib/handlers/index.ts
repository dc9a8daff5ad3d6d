/**
 * Handler registry
 * Maps configured handler names to instances. Order is the caller's list order.
 */

import type { AppConfig, HandlerName } from "../../config.ts";
import { LookupCache } from "../cache.ts";
import { defaultFetch } from "../http.ts";
import { arithmeticHandler } from "./arithmetic.ts";
import { createCurrencyHandler, type Rates } from "./currency.ts";
import { functionHandler } from "./function.ts";
import { createTranslateHandler } from "./translate.ts";
import type { FetchLike, Handler } from "./types.ts";
import { createUnitHandler } from "./unit.ts";
import { variableHandler } from "./variable.ts";

export { arithmeticHandler } from "./arithmetic.ts";
export { createCurrencyHandler, formatAmount, loadCurrencyCodes } from "./currency.ts";
export { callFunction, evaluateCalls, functionHandler, MATH_FUNCTIONS, resolveCalls } from "./function.ts";
export { createTranslateHandler, extractTranslation, loadLanguages, resolveLanguage } from "./translate.ts";
export type { FetchLike, Handler, HandlerResult } from "./types.ts";
export { convertUnits, createUnitHandler, indexUnits, loadUnitTable } from "./unit.ts";
export { tryVariable, variableHandler } from "./variable.ts";

export type HandlerSettings = Pick<
  AppConfig,
  "handlers" | "httpTimeoutMs" | "currencyApiUrl" | "translateApiUrl" | "cacheTtlMs"
>;

export interface BuildHandlersOptions {
  fetch?: FetchLike;
}

/**
 * Instantiate handlers in the configured order. Each call gets its own
 * lookup caches; share the returned list to share them.
 *
 * @example
 * buildHandlers({ ...DEFAULT_CONFIG, handlers: ["arithmetic", "unit"] });
 * // [arithmeticHandler, unitHandler]
 */
export function buildHandlers(settings: HandlerSettings, options: BuildHandlersOptions = {}): Handler[] {
  const fetch = options.fetch ?? defaultFetch;

  const factories: Record<HandlerName, () => Handler> = {
    arithmetic: () => arithmeticHandler,
    function: () => functionHandler,
    variable: () => variableHandler,
    unit: () => createUnitHandler(),
    currency: () =>
      createCurrencyHandler({
        apiUrl: settings.currencyApiUrl,
        fetch,
        timeoutMs: settings.httpTimeoutMs,
        cache: new LookupCache<Rates>({ ttlMs: settings.cacheTtlMs }),
      }),
    translate: () =>
      createTranslateHandler({
        apiUrl: settings.translateApiUrl,
        fetch,
        timeoutMs: settings.httpTimeoutMs,
        cache: new LookupCache<string>({ ttlMs: settings.cacheTtlMs }),
      }),
  };

  return settings.handlers.map((name) => factories[name]());
}
