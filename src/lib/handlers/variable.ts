/**
 * Variable handler - answers definition lines with the defined value
 * Supported formats:
 *   x = 5
 *   y := 10
 */

import { evaluate } from "../math/index.ts";
import { splitAssignment } from "../preprocess.ts";
import { isValidIdentifier } from "../variables.ts";
import { evaluateCalls } from "./function.ts";
import type { Handler } from "./types.ts";

/**
 * Return the value of a definition line: evaluated when it is arithmetic
 * (function calls included), the value text otherwise.
 *
 * @example
 * tryVariable("z = 5 + 3"); // "8"
 * tryVariable("r = sqrt(16)"); // "4"
 * tryVariable("name = box"); // "box"
 * tryVariable("5 + 3");     // null
 */
export function tryVariable(line: string): string | null {
  const parts = splitAssignment(line);
  if (!parts) return null;

  const [name, value] = parts;
  if (!isValidIdentifier(name) || !value) return null;

  return evaluate(value) ?? evaluateCalls(value) ?? value;
}

export const variableHandler: Handler = {
  name: "variable",
  description: "Definition lines (x = 5, y := 10) answer with the stored value",
  attempt: tryVariable,
};
