/**
 * Function handler - built-in calls such as abs(-5), sqrt(16), pow(2, 3)
 * Calls are resolved innermost first: each argument goes through the safe
 * evaluator, the function result is checked, and the call text is replaced
 * by the formatted number. The resolved line is then evaluated as arithmetic.
 */

import {
  evaluate,
  evaluateExpression,
  formatNumber,
  isValidNumber,
  MAX_EXPONENT,
  MAX_EXPRESSION_LENGTH,
} from "../math/index.ts";
import type { Handler } from "./types.ts";

type MathFunction =
  | { arity: 1; apply: (x: number) => number }
  | { arity: 2; apply: (x: number, y: number) => number };

/** Supported functions; trigonometry works in radians, `log` is natural */
export const MATH_FUNCTIONS: Readonly<Record<string, MathFunction>> = {
  abs: { arity: 1, apply: Math.abs },
  sqrt: { arity: 1, apply: Math.sqrt },
  cbrt: { arity: 1, apply: Math.cbrt },
  exp: { arity: 1, apply: Math.exp },
  ln: { arity: 1, apply: (x) => (x > 0 ? Math.log(x) : Number.NaN) },
  log: { arity: 1, apply: (x) => (x > 0 ? Math.log(x) : Number.NaN) },
  log10: { arity: 1, apply: (x) => (x > 0 ? Math.log10(x) : Number.NaN) },
  floor: { arity: 1, apply: Math.floor },
  ceil: { arity: 1, apply: Math.ceil },
  round: { arity: 1, apply: Math.round },
  sin: { arity: 1, apply: Math.sin },
  cos: { arity: 1, apply: Math.cos },
  tan: { arity: 1, apply: Math.tan },
  pow: {
    arity: 2,
    apply: (base, exponent) => (Math.abs(exponent) > MAX_EXPONENT ? Number.NaN : base ** exponent),
  },
};

/** Function name immediately followed by "(" */
const CALL_START = /[a-zA-Z][a-zA-Z0-9]*\(/g;
const HAS_CALL = /[a-zA-Z][a-zA-Z0-9]*\(/;

/** Call a function by name; null for unknown names, wrong arity or an invalid result */
export function callFunction(name: string, args: readonly number[]): number | null {
  const fn = MATH_FUNCTIONS[name.toLowerCase()];
  if (!fn) return null;

  let result: number;
  if (fn.arity === 1) {
    const [x] = args;
    if (args.length !== 1 || x === undefined) return null;
    result = fn.apply(x);
  } else {
    const [x, y] = args;
    if (args.length !== 2 || x === undefined || y === undefined) return null;
    result = fn.apply(x, y);
  }

  return isValidNumber(result) ? result : null;
}

/** Index of the ")" closing the "(" at `open`, or -1 */
function findClosingParen(text: string, open: number): number {
  let depth = 0;
  for (let i = open; i < text.length; i++) {
    if (text[i] === "(") depth++;
    else if (text[i] === ")") {
      depth--;
      if (depth === 0) return i;
    }
  }
  return -1;
}

/** Split on commas outside parentheses */
function splitArguments(text: string): string[] {
  const args: string[] = [];
  let depth = 0;
  let start = 0;
  for (let i = 0; i < text.length; i++) {
    const char = text[i];
    if (char === "(") depth++;
    else if (char === ")") depth--;
    else if (char === "," && depth === 0) {
      args.push(text.slice(start, i));
      start = i + 1;
    }
  }
  args.push(text.slice(start));
  return args;
}

/**
 * Replace every function call with its value.
 * Returns the line unchanged when it has no calls, null when any call fails.
 *
 * @example
 * resolveCalls("2 * sqrt(abs(-16))"); // "2 * 4"
 * resolveCalls("sqrt(-1)");           // null
 */
export function resolveCalls(line: string): string | null {
  let text = line;

  for (;;) {
    // The rightmost call start has no other call inside its argument list
    const starts = Array.from(text.matchAll(CALL_START));
    const last = starts.at(-1);
    if (!last || last.index === undefined) return text;

    const name = last[0].slice(0, -1);
    const open = last.index + name.length;
    const close = findClosingParen(text, open);
    if (close === -1) return null;

    const args: number[] = [];
    for (const arg of splitArguments(text.slice(open + 1, close))) {
      const { value } = evaluateExpression(arg);
      if (value === null) return null;
      args.push(value);
    }

    const result = callFunction(name, args);
    if (result === null) return null;

    text = `${text.slice(0, last.index)}${formatNumber(result)}${text.slice(close + 1)}`;
  }
}

/** Evaluate a line containing at least one function call, or null */
export function evaluateCalls(line: string): string | null {
  if (line.length > MAX_EXPRESSION_LENGTH || !HAS_CALL.test(line)) return null;

  const resolved = resolveCalls(line);
  return resolved === null ? null : evaluate(resolved);
}

export const functionHandler: Handler = {
  name: "function",
  description: "Built-in functions (abs, sqrt, pow, ln, log10, floor, sin, ...)",
  attempt: evaluateCalls,
};
