/**
 * Math Expression Tokenizer
 * Tokenizes arithmetic text into structured tokens with operator metadata,
 * and validates operand/operator alternation before any tree is built
 */

import {
  getOperatorArityInContext,
  getOperatorPrecedence,
  isMathOperator,
  isRightAssociative,
  normalizeOperator,
} from "./operators.ts";

// =============================================================================
// TOKEN TYPES
// =============================================================================

/** Token types for math expression tokenization */
export type MathTokenType = "number" | "operator" | "paren" | "identifier" | "unknown";

/** A single token from a math expression */
export interface MathToken {
  type: MathTokenType;
  /** Operators are stored in canonical ASCII form */
  value: string;
  position: number;
  /** For operators: precedence level (1-3) */
  precedence?: number;
  /** For operators: arity in context (1 or 2) */
  arity?: 1 | 2;
  /** For operators: whether right-associative */
  rightAssociative?: boolean;
}

/** Result of tokenizing an expression */
export interface TokenizeResult {
  tokens: MathToken[];
  /** Any errors encountered during tokenization */
  errors: string[];
}

/** Integer, decimal, or exponent-form literal */
const NUMBER_PATTERN = /^(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

// =============================================================================
// TOKENIZER
// =============================================================================

/**
 * Tokenize a math expression into structured tokens
 *
 * @example
 * tokenizeMathExpression("2 + 3 × -4")
 * // Returns tokens: [
 * //   { type: "number", value: "2", position: 0 },
 * //   { type: "operator", value: "+", position: 2, precedence: 1, arity: 2 },
 * //   { type: "number", value: "3", position: 4 },
 * //   { type: "operator", value: "*", position: 6, precedence: 2, arity: 2 },
 * //   { type: "operator", value: "-", position: 8, precedence: 1, arity: 1 },
 * //   { type: "number", value: "4", position: 9 },
 * // ]
 */
export function tokenizeMathExpression(expr: string): TokenizeResult {
  const tokens: MathToken[] = [];
  const errors: string[] = [];
  let i = 0;
  let lastWasOperator = true; // Start as if after operator (for unary detection)

  while (i < expr.length) {
    const char = expr[i] as string;
    const startPos = i;

    if (/\s/.test(char)) {
      i++;
      continue;
    }

    if (char === "(" || char === ")") {
      tokens.push({ type: "paren", value: char, position: startPos });
      lastWasOperator = char === "(";
      i++;
      continue;
    }

    if (isMathOperator(char)) {
      const arity = getOperatorArityInContext(char, lastWasOperator);
      tokens.push({
        type: "operator",
        value: normalizeOperator(char),
        position: startPos,
        precedence: getOperatorPrecedence(char) ?? undefined,
        arity: arity ?? undefined,
        rightAssociative: isRightAssociative(char) || undefined,
      });
      lastWasOperator = true;
      i++;
      continue;
    }

    // Numbers (including decimals and scientific notation)
    if (/[\d.]/.test(char)) {
      let numStr = "";
      while (i < expr.length) {
        const c = expr[i] as string;
        if (/[\d.]/.test(c)) {
          numStr += c;
          i++;
        } else if (/[eE]/.test(c) && i + 1 < expr.length) {
          const next = expr[i + 1] as string;
          if (/[\d+-]/.test(next)) {
            numStr += c + next;
            i += 2;
          } else {
            break;
          }
        } else {
          break;
        }
      }
      if (!NUMBER_PATTERN.test(numStr)) {
        errors.push(`Malformed number '${numStr}' at position ${startPos}`);
      }
      tokens.push({ type: "number", value: numStr, position: startPos });
      lastWasOperator = false;
      continue;
    }

    if (/[a-zA-Z_]/.test(char)) {
      let name = "";
      while (i < expr.length && /[a-zA-Z0-9_]/.test(expr[i] as string)) {
        name += expr[i];
        i++;
      }
      tokens.push({ type: "identifier", value: name, position: startPos });
      errors.push(`Unknown identifier '${name}' at position ${startPos}`);
      lastWasOperator = false;
      continue;
    }

    tokens.push({ type: "unknown", value: char, position: startPos });
    errors.push(`Unknown character '${char}' at position ${startPos}`);
    i++;
  }

  return { tokens, errors };
}

// =============================================================================
// EXPRESSION VALIDATION
// =============================================================================

/** Result of expression validation */
export interface ExpressionValidation {
  valid: boolean;
  error?: string;
  /** Position in expression where error was detected */
  errorIndex?: number;
}

/** State for expression validation */
interface ValidationState {
  parenDepth: number;
  expectOperand: boolean;
}

/**
 * Validate a token stream for structural correctness
 * Checks for:
 * - Adjacent operands (e.g., "2 3", "2 (3)")
 * - Consecutive binary operators (e.g., "2 + * 3")
 * - Missing operands (e.g., "5 +", "* 5")
 * - Mismatched or empty parentheses
 */
export function validateExpression(tokens: MathToken[]): ExpressionValidation {
  if (tokens.length === 0) {
    return { valid: false, error: "Empty expression" };
  }

  const state: ValidationState = { parenDepth: 0, expectOperand: true };

  for (const token of tokens) {
    const error = validateToken(token, state);
    if (error) {
      return { valid: false, error, errorIndex: token.position };
    }
  }

  if (state.parenDepth > 0) {
    return { valid: false, error: "Unclosed parenthesis" };
  }
  if (state.expectOperand) {
    return { valid: false, error: "Expression ends with operator" };
  }

  return { valid: true };
}

/** Check one token against the current state; returns an error message or null */
function validateToken(token: MathToken, state: ValidationState): string | null {
  switch (token.type) {
    case "number":
      if (!state.expectOperand) return `Unexpected number '${token.value}'`;
      state.expectOperand = false;
      return null;

    case "paren":
      if (token.value === "(") {
        if (!state.expectOperand) return "Unexpected '('";
        state.parenDepth++;
        return null;
      }
      state.parenDepth--;
      if (state.parenDepth < 0) return "Unmatched closing parenthesis";
      if (state.expectOperand) return "Empty parentheses or missing operand";
      state.expectOperand = false;
      return null;

    case "operator":
      if (token.arity === 1) {
        return state.expectOperand ? null : `Unexpected operator '${token.value}'`;
      }
      if (state.expectOperand) return `Unexpected operator '${token.value}'`;
      state.expectOperand = true;
      return null;

    case "identifier":
      return `Unknown identifier '${token.value}'`;

    case "unknown":
      return `Unknown character '${token.value}'`;
  }
}
