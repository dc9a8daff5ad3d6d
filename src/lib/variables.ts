/**
 * Variable Store - case-insensitive name → text mapping
 * Seeded with the operator alias table; every entry remembers whether it came
 * from the alias table or from a user definition.
 */

import { aliasEntries } from "./math/operators.ts";

export type VariableOrigin = "operator" | "user";

export interface VariableEntry {
  name: string;
  value: string;
  origin: VariableOrigin;
}

/** Alphanumeric, first character alphabetic */
export const IDENTIFIER_PATTERN = /^[a-zA-Z][a-zA-Z0-9]*$/;

export function isValidIdentifier(name: string): boolean {
  return IDENTIFIER_PATTERN.test(name);
}

export class VariableStore {
  private variables: Map<string, VariableEntry> = new Map();

  constructor() {
    this.seedOperators();
  }

  private seedOperators(): void {
    for (const [key, op] of aliasEntries()) {
      this.variables.set(key, { name: key, value: op, origin: "operator" });
    }
  }

  /**
   * Store a user variable. Returns false (and changes nothing) for an invalid name.
   * A later definition overwrites an earlier one, including an alias of the same name.
   */
  define(name: string, value: string): boolean {
    if (!isValidIdentifier(name)) return false;
    const key = name.toLowerCase();
    this.variables.set(key, { name: key, value: String(value), origin: "user" });
    return true;
  }

  lookup(name: string): string | null {
    return this.variables.get(name.toLowerCase())?.value ?? null;
  }

  has(name: string): boolean {
    return this.variables.has(name.toLowerCase());
  }

  /**
   * Drop every user-defined entry. Alias entries survive; an alias a user
   * had shadowed is restored from the alias table.
   * Returns the number of user entries removed.
   */
  resetUserVariables(): number {
    let removed = 0;
    for (const [key, entry] of this.variables) {
      if (entry.origin === "user") {
        this.variables.delete(key);
        removed++;
      }
    }
    for (const [key, op] of aliasEntries()) {
      if (!this.variables.has(key)) {
        this.variables.set(key, { name: key, value: op, origin: "operator" });
      }
    }
    return removed;
  }

  /** Entries in insertion order, optionally filtered by origin */
  entries(origin?: VariableOrigin): VariableEntry[] {
    const all = Array.from(this.variables.values());
    return origin ? all.filter((e) => e.origin === origin) : all;
  }

  get size(): number {
    return this.variables.size;
  }
}
