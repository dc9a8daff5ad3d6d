/**
 * Arithmetic handler - safe evaluation of math expressions
 * Uses the shunting-yard parser and tree validator instead of eval/Function
 */

import { evaluate } from "../math/index.ts";
import type { Handler } from "./types.ts";

export const arithmeticHandler: Handler = {
  name: "arithmetic",
  description: "Safe evaluation of math expressions (+, -, *, /, %, ^, parentheses)",
  attempt: (line) => evaluate(line),
};
