/**
 * Math Expression AST (Abstract Syntax Tree)
 * Building, safety validation, and checked evaluation of arithmetic expressions.
 *
 * Untrusted text only ever reaches a closed set of node kinds; the tree is
 * validated in full before the first arithmetic operation runs.
 */

import { type CanonicalOperator, isCanonicalOperator } from "./operators.ts";
import { type MathToken, tokenizeMathExpression, validateExpression } from "./tokenizer.ts";

// =============================================================================
// LIMITS
// =============================================================================

/** Longest expression text accepted before parsing */
export const MAX_EXPRESSION_LENGTH = 1000;

/** Deepest tree accepted; the root is at depth 1 */
export const MAX_AST_DEPTH = 20;

/** Largest exponent magnitude `^` accepts */
export const MAX_EXPONENT = 100;

/** Smallest positive normal double; nonzero results below it are rejected */
export const MIN_NORMAL = 2.2250738585072014e-308;

// =============================================================================
// AST NODE TYPES
// =============================================================================

/** AST node types */
export type ASTNodeType = "number" | "unary" | "binary";

/** Node kinds the evaluator will run */
const ALLOWED_NODE_TYPES: ReadonlySet<string> = new Set<ASTNodeType>(["number", "unary", "binary"]);

/** Base AST node */
export interface ASTNodeBase {
  type: ASTNodeType;
}

/** Number literal node */
export interface NumberNode extends ASTNodeBase {
  type: "number";
  value: number;
}

/** Unary negation node */
export interface UnaryNode extends ASTNodeBase {
  type: "unary";
  operator: "-";
  operand: ASTNode;
}

/** Binary operation node */
export interface BinaryNode extends ASTNodeBase {
  type: "binary";
  operator: CanonicalOperator;
  left: ASTNode;
  right: ASTNode;
}

/** Union of all AST node types */
export type ASTNode = NumberNode | UnaryNode | BinaryNode;

/** Result of AST building */
export interface ASTResult {
  ast: ASTNode | null;
  error?: string;
}

// =============================================================================
// AST BUILDING (Shunting-Yard Algorithm)
// =============================================================================

/**
 * Build an Abstract Syntax Tree from tokens using the shunting-yard algorithm
 * Respects operator precedence and associativity. Expects tokens that already
 * passed validateExpression().
 *
 * @example
 * const tokens = tokenizeMathExpression("2 + 3 * 4").tokens;
 * const { ast } = buildAST(tokens);
 * // ast = { type: "binary", operator: "+", left: 2, right: { type: "binary", operator: "*", left: 3, right: 4 } }
 */
export function buildAST(tokens: MathToken[]): ASTResult {
  if (tokens.length === 0) {
    return { ast: null, error: "Empty expression" };
  }

  const outputStack: ASTNode[] = [];
  const operatorStack: MathToken[] = [];

  for (const token of tokens) {
    const error = processASTToken(token, outputStack, operatorStack);
    if (error) return { ast: null, error };
  }

  // Pop remaining operators
  let op = operatorStack.pop();
  while (op) {
    if (op.type === "paren") {
      return { ast: null, error: "Mismatched parentheses" };
    }
    const error = applyOperator(op, outputStack);
    if (error) return { ast: null, error };
    op = operatorStack.pop();
  }

  const [root] = outputStack;
  if (outputStack.length !== 1 || !root) {
    return { ast: null, error: "Invalid expression structure" };
  }

  return { ast: root };
}

/** Process a single token for AST building */
function processASTToken(
  token: MathToken,
  outputStack: ASTNode[],
  operatorStack: MathToken[],
): string | null {
  switch (token.type) {
    case "number":
      outputStack.push({ type: "number", value: parseFloat(token.value) });
      return null;

    case "operator":
      return processASTOperator(token, outputStack, operatorStack);

    case "paren":
      return processASTParen(token, outputStack, operatorStack);

    case "identifier":
    case "unknown":
      return `Unexpected token: ${token.value}`;
  }
}

/** Process operator token for AST */
function processASTOperator(
  token: MathToken,
  outputStack: ASTNode[],
  operatorStack: MathToken[],
): string | null {
  if (token.arity === 1) {
    operatorStack.push(token);
    return null;
  }

  // Binary operator - pop unary operators and higher/equal precedence operators
  let top = operatorStack.at(-1);
  while (top && top.type !== "paren") {
    const topPrec = top.precedence ?? 0;
    const currPrec = token.precedence ?? 0;
    const shouldPop =
      top.arity === 1 || topPrec > currPrec || (topPrec === currPrec && !token.rightAssociative);

    if (!shouldPop) break;

    operatorStack.pop();
    const error = applyOperator(top, outputStack);
    if (error) return error;
    top = operatorStack.at(-1);
  }

  operatorStack.push(token);
  return null;
}

/** Process parenthesis token for AST */
function processASTParen(
  token: MathToken,
  outputStack: ASTNode[],
  operatorStack: MathToken[],
): string | null {
  if (token.value === "(") {
    operatorStack.push(token);
    return null;
  }

  // Closing paren - pop until matching open
  let top = operatorStack.pop();
  while (top) {
    if (top.type === "paren") return null;
    const error = applyOperator(top, outputStack);
    if (error) return error;
    top = operatorStack.pop();
  }
  return "Mismatched parentheses";
}

/** Apply an operator to operands on the stack */
function applyOperator(op: MathToken, stack: ASTNode[]): string | null {
  if (op.arity === 1) {
    const operand = stack.pop();
    if (!operand || op.value !== "-") {
      return `Missing operand for unary operator ${op.value}`;
    }
    stack.push({ type: "unary", operator: "-", operand });
    return null;
  }

  const right = stack.pop();
  const left = stack.pop();
  if (!left || !right) {
    return `Missing operands for binary operator ${op.value}`;
  }
  if (!isCanonicalOperator(op.value)) {
    return `Unsupported operator ${op.value}`;
  }
  stack.push({ type: "binary", operator: op.value, left, right });
  return null;
}

// =============================================================================
// AST VALIDATION
// =============================================================================

/**
 * Walk the whole tree and reject any node kind outside the whitelist, any
 * binary operator outside the canonical set, or any node deeper than
 * MAX_AST_DEPTH. The walk stops descending as soon as the bound is crossed.
 */
export function isSafeAST(node: ASTNode, depth: number = 1): boolean {
  if (depth > MAX_AST_DEPTH) return false;
  if (!ALLOWED_NODE_TYPES.has(node.type)) return false;

  switch (node.type) {
    case "number":
      return true;
    case "unary":
      return node.operator === "-" && isSafeAST(node.operand, depth + 1);
    case "binary":
      return (
        isCanonicalOperator(node.operator) &&
        isSafeAST(node.left, depth + 1) &&
        isSafeAST(node.right, depth + 1)
      );
  }
}

// =============================================================================
// EXPRESSION EVALUATION
// =============================================================================

/**
 * Why an evaluation produced no value
 * - input: empty or over MAX_EXPRESSION_LENGTH
 * - syntax: tokenizer or parser rejected the text
 * - unsafe: disallowed node kind or tree too deep
 * - numeric: zero divisor, oversized exponent, non-finite or out-of-range value
 */
export type EvalFailureKind = "input" | "syntax" | "unsafe" | "numeric";

/** Result of expression evaluation */
export interface EvalResult {
  value: number | null;
  error?: string;
  kind?: EvalFailureKind;
}

function fail(kind: EvalFailureKind, error: string): EvalResult {
  return { value: null, error, kind };
}

/**
 * Evaluate an arithmetic expression
 * Returns a null value with a failure kind instead of throwing
 *
 * @example
 * evaluateExpression("2 + 3 * 4"); // { value: 14 }
 * evaluateExpression("10 / 0");    // { value: null, error: "Division by zero", kind: "numeric" }
 */
export function evaluateExpression(expr: string): EvalResult {
  if (!expr.trim()) {
    return fail("input", "Empty expression");
  }
  if (expr.length > MAX_EXPRESSION_LENGTH) {
    return fail("input", `Expression longer than ${MAX_EXPRESSION_LENGTH} characters`);
  }

  const { tokens, errors } = tokenizeMathExpression(expr);
  if (errors.length > 0) {
    return fail("syntax", errors[0] ?? "Tokenize error");
  }

  const validation = validateExpression(tokens);
  if (!validation.valid) {
    return fail("syntax", validation.error ?? "Invalid expression");
  }

  const { ast, error } = buildAST(tokens);
  if (error || !ast) {
    return fail("syntax", error ?? "Failed to build AST");
  }

  if (!isSafeAST(ast)) {
    return fail("unsafe", `Expression exceeds depth ${MAX_AST_DEPTH} or uses a disallowed node`);
  }

  const result = evaluateAST(ast);
  if (result.value === null) return result;

  if (!isValidNumber(result.value)) {
    return fail("numeric", `Result out of range: ${result.value}`);
  }
  return result;
}

/** Evaluate a validated AST node; every intermediate value must be finite */
function evaluateAST(node: ASTNode): EvalResult {
  switch (node.type) {
    case "number":
      return checked(node.value);

    case "unary": {
      const operand = evaluateAST(node.operand);
      if (operand.value === null) return operand;
      return checked(-operand.value);
    }

    case "binary": {
      const left = evaluateAST(node.left);
      if (left.value === null) return left;

      const right = evaluateAST(node.right);
      if (right.value === null) return right;

      return evaluateBinaryOp(node.operator, left.value, right.value);
    }
  }
}

/** Evaluate a binary operation on two numbers */
function evaluateBinaryOp(op: CanonicalOperator, left: number, right: number): EvalResult {
  switch (op) {
    case "+":
      return checked(left + right);
    case "-":
      return checked(left - right);
    case "*":
      return checked(left * right);
    case "/":
      if (right === 0) return fail("numeric", "Division by zero");
      return checked(left / right);
    case "%":
      if (right === 0) return fail("numeric", "Modulo by zero");
      return checked(left % right);
    case "^":
      if (Math.abs(right) > MAX_EXPONENT) {
        return fail("numeric", `Exponent magnitude above ${MAX_EXPONENT}`);
      }
      return checked(left ** right);
  }
}

function checked(value: number): EvalResult {
  return Number.isFinite(value) ? { value } : fail("numeric", `Non-finite value: ${value}`);
}

/** Finite, within double range, and not subnormal */
export function isValidNumber(value: number): boolean {
  if (Number.isNaN(value)) return false;
  const magnitude = Math.abs(value);
  return magnitude <= Number.MAX_VALUE && (value === 0 || magnitude >= MIN_NORMAL);
}

/**
 * Format a result: 15 significant digits, then shortest JS notation
 * 4 → "4", 0.1 + 0.2 → "0.3", -0 → "0"
 * Values that would round past Number.MAX_VALUE keep their full digits.
 */
export function formatNumber(value: number): string {
  const rounded = Number(value.toPrecision(15));
  return Number.isFinite(rounded) ? String(rounded) : String(value);
}

/**
 * Evaluate untrusted arithmetic text to a display string, or null.
 * Never throws.
 *
 * @example
 * evaluate("2 ^ 3");   // "8"
 * evaluate("1 / 0");   // null
 * evaluate("2 ^ 1000"); // null
 */
export function evaluate(text: string): string | null {
  try {
    const { value } = evaluateExpression(text);
    return value === null ? null : formatNumber(value);
  } catch {
    return null;
  }
}
