/**
 * Math Operator Utilities
 * Canonical operator set, natural-language aliases, and precedence metadata
 */

// ASCII: + - * / ^ %
// Unicode: × ÷ − (normalized to their ASCII forms)

/** Canonical operator tokens every alias resolves to */
export const CANONICAL_OPERATORS = ["+", "-", "*", "/", "%", "^"] as const;

export type CanonicalOperator = (typeof CANONICAL_OPERATORS)[number];

/** All recognized math operator characters (ASCII + Unicode) */
export const MATH_OPERATORS = "+-*/^%×÷−" as const;

/** Pattern to match a single math operator character */
export const SINGLE_OPERATOR_PATTERN = /^[+\-*/^%×÷−]$/;

/**
 * Natural-language aliases per canonical operator.
 * Alias sets are pairwise disjoint.
 */
export const OPERATOR_ALIASES: Readonly<Record<CanonicalOperator, readonly string[]>> = {
  "+": ["plus", "add"],
  "-": ["minus", "subtract"],
  "*": ["multiply", "times"],
  "/": ["divide", "division"],
  "%": ["mod", "modulus"],
  "^": ["power", "exponent"],
};

/** Unicode glyphs accepted as spellings of a canonical operator */
const UNICODE_SPELLINGS: Readonly<Record<string, CanonicalOperator>> = {
  "−": "-",
  "×": "*",
  "÷": "/",
};

/**
 * Operator precedence levels (higher = binds tighter)
 * - Level 1: Addition/subtraction (lowest)
 * - Level 2: Multiplication/division/remainder
 * - Level 3: Exponentiation
 * Unary minus sits above all of these and is handled by arity, not by this table.
 */
export const OPERATOR_PRECEDENCE: Record<string, number> = {
  "+": 1,
  "-": 1,
  "−": 1,

  "*": 2,
  "/": 2,
  "%": 2,
  "×": 2,
  "÷": 2,

  "^": 3,
};

/**
 * Right-associative operators (evaluated right-to-left)
 * e.g., 2^3^2 = 2^(3^2) = 512, not (2^3)^2 = 64
 */
export const RIGHT_ASSOCIATIVE = new Set(["^"]);

/**
 * Operators that can be either unary or binary depending on context.
 * Only minus has a unary form.
 */
export const AMBIGUOUS_OPERATORS = new Set(["-", "−"]);

const ALIAS_LOOKUP: ReadonlyMap<string, CanonicalOperator> = buildAliasLookup();

function buildAliasLookup(): Map<string, CanonicalOperator> {
  const lookup = new Map<string, CanonicalOperator>();
  for (const op of CANONICAL_OPERATORS) {
    lookup.set(op, op);
    for (const alias of OPERATOR_ALIASES[op]) {
      lookup.set(alias.toLowerCase(), op);
    }
  }
  for (const [glyph, op] of Object.entries(UNICODE_SPELLINGS)) {
    lookup.set(glyph, op);
  }
  return lookup;
}

/**
 * Resolve an operator symbol or alias to its canonical operator.
 * Case-insensitive; returns null for anything else.
 *
 * @example
 * canonicalOf("Plus"); // "+"
 * canonicalOf("×");    // "*"
 * canonicalOf("x");    // null
 */
export function canonicalOf(token: string): CanonicalOperator | null {
  return ALIAS_LOOKUP.get(token.toLowerCase()) ?? null;
}

/** Every (key, canonical operator) pair of the alias table, symbols included */
export function aliasEntries(): Array<[string, CanonicalOperator]> {
  return Array.from(ALIAS_LOOKUP.entries());
}

/** Check if a value is one of the canonical operator tokens */
export function isCanonicalOperator(value: string): value is CanonicalOperator {
  return (CANONICAL_OPERATORS as readonly string[]).includes(value);
}

/** Check if a character is a recognized math operator */
export function isMathOperator(char: string): boolean {
  return SINGLE_OPERATOR_PATTERN.test(char);
}

/**
 * Get the precedence level of a math operator
 * Returns null for unrecognized characters
 */
export function getOperatorPrecedence(char: string): number | null {
  return OPERATOR_PRECEDENCE[char] ?? null;
}

/** Check if an operator is right-associative */
export function isRightAssociative(char: string): boolean {
  return RIGHT_ASSOCIATIVE.has(normalizeOperator(char));
}

/**
 * Determine operator arity based on context
 * @param afterOperator - Whether this operator follows another operator, an
 *   opening paren, or the start of the expression
 */
export function getOperatorArityInContext(char: string, afterOperator: boolean): 1 | 2 | null {
  if (!isMathOperator(char)) return null;
  if (afterOperator && AMBIGUOUS_OPERATORS.has(char)) return 1;
  return 2;
}

/**
 * Normalize operator to canonical ASCII form
 * - − → -
 * - × → *
 * - ÷ → /
 */
export function normalizeOperator(op: string): string {
  return UNICODE_SPELLINGS[op] ?? op;
}
