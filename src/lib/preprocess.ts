/**
 * Line preprocessor
 * Records `name = expr` / `name := expr` definitions and substitutes variable
 * and operator-alias references, one whitespace token at a time.
 */

import { isValidIdentifier, type VariableStore } from "./variables.ts";

export interface PreprocessResult {
  /** Rewritten line; empty means "no result" downstream */
  text: string;
  /** Whether the line defined a variable */
  definition: boolean;
  /** Lowercased name of the defined variable */
  name?: string;
  /** Substituted value that was stored */
  value?: string;
}

/** Split a definition line into name and value parts, or null when it is not one */
export function splitAssignment(line: string): [string, string] | null {
  // ':' wins over '=' whenever both appear
  const separator = line.includes(":") ? ":" : "=";
  const index = line.indexOf(separator);
  if (index === -1) return null;

  const name = line.slice(0, index).trim();
  let value = line.slice(index + 1).trim();
  if (separator === ":" && value.startsWith("=")) {
    value = value.slice(1).trim();
  }
  return [name, value];
}

export class Preprocessor {
  constructor(private readonly store: VariableStore) {}

  /**
   * Process one raw line.
   *
   * @example
   * pre.process("x = 2 plus 3"); // { text: "x = 2 + 3", definition: true, ... }
   * pre.process("x times 2");    // { text: "2 + 3 * 2", definition: false }
   */
  process(rawLine: string): PreprocessResult {
    const line = rawLine.trim();
    if (!line) return { text: "", definition: false };

    const parts = splitAssignment(line);
    if (parts) {
      const [name, rawValue] = parts;
      if (isValidIdentifier(name)) {
        const value = this.substitute(rawValue);
        this.store.define(name, value);
        return { text: `${name} = ${value}`, definition: true, name: name.toLowerCase(), value };
      }
    }

    return { text: this.substitute(line), definition: false };
  }

  /** Replace each whitespace-separated token with its stored value, single pass */
  substitute(source: string): string {
    return source
      .split(/\s+/)
      .filter((token) => token.length > 0)
      .map((token) => this.store.lookup(token) ?? token)
      .join(" ");
  }
}
