/**
 * Math module barrel export
 * Re-exports operator utilities, tokenizer, and the safe evaluator
 */

export * from "./ast.ts";
export * from "./operators.ts";
export * from "./tokenizer.ts";
