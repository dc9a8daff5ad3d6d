/**
 * Handler tests
 * Local handlers run against the bundled tables; network handlers get a fake fetch
 */

import { describe, expect, test, vi } from "vitest";
import { DEFAULT_CONFIG } from "../src/config";
import { LookupCache } from "../src/lib/cache";
import {
  buildHandlers,
  callFunction,
  convertUnits,
  createCurrencyHandler,
  createTranslateHandler,
  createUnitHandler,
  evaluateCalls,
  extractTranslation,
  type FetchLike,
  formatAmount,
  indexUnits,
  loadCurrencyCodes,
  loadLanguages,
  loadUnitTable,
  resolveCalls,
  resolveLanguage,
  tryVariable,
} from "../src/lib/handlers";

/** Fake fetch answering every request with the same JSON body */
function fakeFetch(body: unknown, status = 200) {
  return vi.fn<FetchLike>(async () => ({
    ok: status >= 200 && status < 300,
    status,
    json: async () => body,
  }));
}

// =============================================================================
// VARIABLE HANDLER
// =============================================================================

describe("tryVariable", () => {
  test("evaluates arithmetic values", () => {
    expect(tryVariable("z = 5 + 3")).toBe("8");
    expect(tryVariable("y := 10")).toBe("10");
  });

  test("returns non-arithmetic values verbatim", () => {
    expect(tryVariable("name = box")).toBe("box");
  });

  test("evaluates function calls in values", () => {
    expect(tryVariable("r = sqrt(16)")).toBe("4");
  });

  test("declines other lines", () => {
    expect(tryVariable("5 + 3")).toBeNull();
    expect(tryVariable("2x = 5")).toBeNull();
    expect(tryVariable("x =")).toBeNull();
  });
});

// =============================================================================
// FUNCTION HANDLER
// =============================================================================

describe("function handler", () => {
  test("evaluates built-in calls", () => {
    expect(evaluateCalls("abs(-5)")).toBe("5");
    expect(evaluateCalls("sqrt(16)")).toBe("4");
    expect(evaluateCalls("pow(2, 3)")).toBe("8");
    expect(evaluateCalls("log10(1000)")).toBe("3");
    expect(evaluateCalls("ABS(-2)")).toBe("2");
  });

  test("nested calls inside arithmetic", () => {
    expect(resolveCalls("2 * sqrt(abs(-16))")).toBe("2 * 4");
    expect(evaluateCalls("2 * sqrt(abs(-16))")).toBe("8");
    expect(evaluateCalls("pow(1 + 1, 2 * 2) - 1")).toBe("15");
  });

  test("invalid results decline", () => {
    expect(evaluateCalls("sqrt(-1)")).toBeNull();
    expect(evaluateCalls("ln(0)")).toBeNull();
    expect(evaluateCalls("pow(2, 101)")).toBeNull();
    expect(resolveCalls("sqrt(-1)")).toBeNull();
  });

  test("unknown names, wrong arity and bad arguments decline", () => {
    expect(evaluateCalls("foo(1)")).toBeNull();
    expect(evaluateCalls("pow(2)")).toBeNull();
    expect(evaluateCalls("abs(1, 2)")).toBeNull();
    expect(evaluateCalls("abs(x)")).toBeNull();
    expect(evaluateCalls("sqrt(16")).toBeNull();
  });

  test("lines without calls are left to other handlers", () => {
    expect(evaluateCalls("2 + 2")).toBeNull();
    expect(resolveCalls("2 + 2")).toBe("2 + 2");
  });

  test("callFunction", () => {
    expect(callFunction("abs", [-3])).toBe(3);
    expect(callFunction("Pow", [3, 2])).toBe(9);
    expect(callFunction("sqrt", [1, 2])).toBeNull();
    expect(callFunction("nope", [1])).toBeNull();
  });
});

// =============================================================================
// UNIT HANDLER
// =============================================================================

describe("unit handler", () => {
  const handler = createUnitHandler();

  test("length and mass", () => {
    expect(handler.attempt("1 km to m")).toBe("1000");
    expect(handler.attempt("100 cm to m")).toBe("1");
    expect(handler.attempt("2.5 kg in g")).toBe("2500");
    expect(handler.attempt("1 mile to km")).toBe("1.609344");
  });

  test("temperature uses offsets", () => {
    expect(handler.attempt("100 c to f")).toBe("212");
    expect(handler.attempt("212 f to c")).toBe("100");
    expect(handler.attempt("0 c to k")).toBe("273.15");
    expect(handler.attempt("-40 celsius to fahrenheit")).toBe("-40");
  });

  test("unit names are case-insensitive", () => {
    expect(handler.attempt("1 KM TO M")).toBe("1000");
  });

  test("declines mismatched dimensions and unknown units", () => {
    expect(handler.attempt("1 kg to m")).toBeNull();
    expect(handler.attempt("1 parsec to m")).toBeNull();
    expect(handler.attempt("2 + 2")).toBeNull();
  });

  test("convertUnits returns raw values", () => {
    const units = indexUnits(loadUnitTable());
    expect(convertUnits(1, "h", "min", units)).toBe(60);
    expect(convertUnits(1, "h", "kg", units)).toBeNull();
  });

  test("indexUnits rejects duplicate keys", () => {
    expect(() =>
      indexUnits({
        length: { m: { factor: 1, offset: 0, aliases: [] } },
        time: { min: { factor: 60, offset: 0, aliases: ["m"] } },
      }),
    ).toThrow("Unit 'm' defined twice (length, time)");
  });
});

// =============================================================================
// CURRENCY HANDLER
// =============================================================================

describe("currency handler", () => {
  const options = { apiUrl: "https://rates.test/latest/", timeoutMs: 1000, currencies: ["USD", "EUR", "GBP"] };

  test("converts with fetched rates", async () => {
    const fetch = fakeFetch({ rates: { EUR: 0.9, GBP: 0.8 } });
    const handler = createCurrencyHandler({ ...options, fetch });

    expect(await handler.attempt("100 usd to eur")).toBe("90");
    expect(fetch).toHaveBeenCalledTimes(1);
    expect(fetch.mock.calls[0]?.[0]).toBe("https://rates.test/latest/USD");
  });

  test("caches rates per base currency", async () => {
    const fetch = fakeFetch({ rates: { EUR: 0.9, GBP: 0.8 } });
    const handler = createCurrencyHandler({ ...options, fetch });

    await handler.attempt("1 usd to eur");
    expect(await handler.attempt("10 USD in GBP")).toBe("8");
    expect(fetch).toHaveBeenCalledTimes(1);
  });

  test("rounds to cents", async () => {
    const fetch = fakeFetch({ rates: { EUR: 0.123456 } });
    const handler = createCurrencyHandler({ ...options, fetch });
    expect(await handler.attempt("10 usd to eur")).toBe("1.23");
  });

  test("same currency needs no request", async () => {
    const fetch = fakeFetch({ rates: {} });
    const handler = createCurrencyHandler({ ...options, fetch });
    expect(await handler.attempt("5 eur to eur")).toBe("5");
    expect(fetch).not.toHaveBeenCalled();
  });

  test("declines unknown codes without a request", async () => {
    const fetch = fakeFetch({ rates: {} });
    const handler = createCurrencyHandler({ ...options, fetch });
    expect(await handler.attempt("5 abc to eur")).toBeNull();
    expect(await handler.attempt("1 km to m")).toBeNull();
    expect(fetch).not.toHaveBeenCalled();
  });

  test("declines when the rate is missing", async () => {
    const handler = createCurrencyHandler({ ...options, fetch: fakeFetch({ rates: { EUR: 0.9 } }) });
    expect(await handler.attempt("5 usd to gbp")).toBeNull();
  });

  test("HTTP errors propagate to the caller", async () => {
    const handler = createCurrencyHandler({ ...options, fetch: fakeFetch({}, 503) });
    await expect(handler.attempt("5 usd to eur")).rejects.toThrow("HTTP 503 from https://rates.test/latest/USD");
  });

  test("malformed bodies are rejected", async () => {
    const handler = createCurrencyHandler({ ...options, fetch: fakeFetch({ rates: { EUR: "x" } }) });
    await expect(handler.attempt("5 usd to eur")).rejects.toThrow();
  });

  test("formatAmount", () => {
    expect(formatAmount(1.005)).toBe("1");
    expect(formatAmount(2.345678)).toBe("2.35");
  });

  test("bundled currency codes", () => {
    const codes = loadCurrencyCodes();
    expect(codes).toContain("USD");
    expect(codes).toContain("JPY");
  });
});

// =============================================================================
// TRANSLATE HANDLER
// =============================================================================

describe("translate handler", () => {
  const languages = { es: "Spanish", fr: "French", de: "German" };
  const options = { apiUrl: "https://translate.test/single", timeoutMs: 1000, languages };
  const response = [[["Hola ", "Hello ", null, null], ["Mundo", "world", null, null]], null, "en"];

  test("translates and lowercases", async () => {
    const fetch = fakeFetch(response);
    const handler = createTranslateHandler({ ...options, fetch });

    expect(await handler.attempt("hello world in spanish")).toBe("hola mundo");
    expect(fetch.mock.calls[0]?.[0]).toBe(
      "https://translate.test/single?client=gtx&sl=auto&tl=es&dt=t&q=hello+world",
    );
  });

  test("caches by language and text", async () => {
    const fetch = fakeFetch(response);
    const cache = new LookupCache<string>();
    const handler = createTranslateHandler({ ...options, fetch, cache });

    await handler.attempt("hello world in es");
    await handler.attempt("hello world in Spanish");
    expect(fetch).toHaveBeenCalledTimes(1);
    expect(cache.get("es:hello world")).toBe("hola mundo");
  });

  test("declines unknown languages without a request", async () => {
    const fetch = fakeFetch(response);
    const handler = createTranslateHandler({ ...options, fetch });
    expect(await handler.attempt("hello in klingon")).toBeNull();
    expect(await handler.attempt("hello")).toBeNull();
    expect(fetch).not.toHaveBeenCalled();
  });

  test("declines an unusable response", async () => {
    const handler = createTranslateHandler({ ...options, fetch: fakeFetch({ error: "nope" }) });
    expect(await handler.attempt("hello in fr")).toBeNull();
  });

  test("resolveLanguage", () => {
    expect(resolveLanguage("ES", languages)).toBe("es");
    expect(resolveLanguage("french", languages)).toBe("fr");
    expect(resolveLanguage("germ", languages)).toBe("de");
    expect(resolveLanguage("ge", languages)).toBeNull();
    expect(resolveLanguage("klingon", languages)).toBeNull();
  });

  test("extractTranslation", () => {
    expect(extractTranslation(response)).toBe("Hola Mundo");
    expect(extractTranslation([[]])).toBeNull();
    expect(extractTranslation("text")).toBeNull();
  });

  test("bundled languages", () => {
    const langs = loadLanguages();
    expect(langs.es).toBe("Spanish");
    expect(resolveLanguage("spanish", langs)).toBe("es");
  });
});

// =============================================================================
// REGISTRY
// =============================================================================

describe("buildHandlers", () => {
  test("follows the configured order", () => {
    const handlers = buildHandlers({ ...DEFAULT_CONFIG, handlers: ["translate", "arithmetic"] });
    expect(handlers.map((h) => h.name)).toEqual(["translate", "arithmetic"]);
  });

  test("network handlers use the injected fetch", async () => {
    const fetch = fakeFetch({ rates: { EUR: 2 } });
    const [currency] = buildHandlers({ ...DEFAULT_CONFIG, handlers: ["currency"] }, { fetch });
    expect(await currency?.attempt("3 usd to eur")).toBe("6");
    expect(fetch.mock.calls[0]?.[0]).toBe("https://open.er-api.com/v6/latest/USD");
  });
});
