/**
 * Translation handler - "<text> in <language>"
 * Calls a `client=gtx` style translate endpoint with automatic source
 * language detection. Languages are matched by code or name against
 * src/data/languages.json.
 */

import { readFileSync } from "node:fs";
import { z } from "zod";
import { LookupCache } from "../cache.ts";
import { fetchJson } from "../http.ts";
import type { FetchLike, Handler } from "./types.ts";

const TRANSLATE_PATTERN = /^(.+?)\s+in\s+([a-zA-Z-]+)$/i;

/** Shortest language-name prefix accepted ("span" → Spanish) */
const MIN_PREFIX_LENGTH = 3;

const LanguagesSchema = z.record(z.string(), z.string());

/** `[[["hola","hello",...], ...], ...]`; only the first element's segments matter */
const TranslateResponseSchema = z
  .array(z.unknown())
  .min(1)
  .transform((data) => data[0])
  .pipe(z.array(z.unknown()));

export type Languages = Record<string, string>;

export interface TranslateHandlerOptions {
  apiUrl: string;
  fetch: FetchLike;
  timeoutMs: number;
  cache?: LookupCache<string>;
  languages?: Languages;
}

export function loadLanguages(
  path: URL = new URL("../../data/languages.json", import.meta.url),
): Languages {
  return LanguagesSchema.parse(JSON.parse(readFileSync(path, "utf-8")));
}

/**
 * Resolve a language code or name to a code
 * Exact code, then exact name, then name prefix of at least three letters
 *
 * @example
 * resolveLanguage("es", langs);      // "es"
 * resolveLanguage("Spanish", langs); // "es"
 * resolveLanguage("span", langs);    // "es"
 */
export function resolveLanguage(language: string, languages: Languages): string | null {
  const wanted = language.toLowerCase();
  if (Object.hasOwn(languages, wanted)) return wanted;

  const entries = Object.entries(languages);
  const byName = entries.find(([, name]) => name.toLowerCase() === wanted);
  if (byName) return byName[0];

  if (wanted.length < MIN_PREFIX_LENGTH) return null;
  const byPrefix = entries.find(([, name]) => name.toLowerCase().startsWith(wanted));
  return byPrefix ? byPrefix[0] : null;
}

/** Join the translated segments of a translate response */
export function extractTranslation(data: unknown): string | null {
  const parsed = TranslateResponseSchema.safeParse(data);
  if (!parsed.success) return null;

  let translated = "";
  for (const segment of parsed.data) {
    if (Array.isArray(segment) && typeof segment[0] === "string") {
      translated += segment[0];
    }
  }
  return translated || null;
}

export function createTranslateHandler(options: TranslateHandlerOptions): Handler {
  const cache = options.cache ?? new LookupCache<string>();
  const languages = options.languages ?? loadLanguages();

  return {
    name: "translate",
    description: "Translation (hello in spanish)",
    attempt: async (line) => {
      const match = line.match(TRANSLATE_PATTERN);
      if (!match?.[1] || !match[2]) return null;

      const text = match[1];
      const target = resolveLanguage(match[2], languages);
      if (!target) return null;

      const key = `${target}:${text}`;
      const cached = cache.get(key);
      if (cached) return cached;

      const params = new URLSearchParams({ client: "gtx", sl: "auto", tl: target, dt: "t", q: text });
      const data = await fetchJson(`${options.apiUrl}?${params.toString()}`, {
        fetch: options.fetch,
        timeoutMs: options.timeoutMs,
      });

      const translated = extractTranslation(data);
      if (!translated) return null;

      const result = translated.toLowerCase();
      cache.set(key, result);
      return result;
    },
  };
}
