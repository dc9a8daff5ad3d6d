/**
 * Unit conversion handler - "<number> <unit> to|in <unit>"
 * Local conversion through a per-dimension base unit; the table lives in
 * src/data/units.json. Each unit maps to its base as `base = value * factor + offset`.
 */

import { readFileSync } from "node:fs";
import { z } from "zod";
import { formatNumber, isValidNumber } from "../math/index.ts";
import type { Handler } from "./types.ts";

const UnitSpecSchema = z.object({
  factor: z.number().positive(),
  offset: z.number().default(0),
  aliases: z.array(z.string()).default([]),
});

export const UnitTableSchema = z.record(z.string(), z.record(z.string(), UnitSpecSchema));

export type UnitTable = z.infer<typeof UnitTableSchema>;

export interface UnitDefinition {
  symbol: string;
  dimension: string;
  factor: number;
  offset: number;
}

const CONVERSION_PATTERN =
  /^(-?(?:\d+\.?\d*|\.\d+)(?:e[+-]?\d+)?)\s*(\S+)\s+(?:to|in|as)\s+(\S+)$/i;

/** Index every symbol and alias (lowercased) of a unit table */
export function indexUnits(table: UnitTable): Map<string, UnitDefinition> {
  const index = new Map<string, UnitDefinition>();

  for (const [dimension, units] of Object.entries(table)) {
    for (const [symbol, unit] of Object.entries(units)) {
      const definition: UnitDefinition = {
        symbol,
        dimension,
        factor: unit.factor,
        offset: unit.offset,
      };
      for (const key of [symbol, ...unit.aliases]) {
        const lower = key.toLowerCase();
        const existing = index.get(lower);
        if (existing) {
          throw new Error(`Unit '${lower}' defined twice (${existing.dimension}, ${dimension})`);
        }
        index.set(lower, definition);
      }
    }
  }

  return index;
}

/** Load and validate the bundled unit table */
export function loadUnitTable(path: URL = new URL("../../data/units.json", import.meta.url)): UnitTable {
  return UnitTableSchema.parse(JSON.parse(readFileSync(path, "utf-8")));
}

/**
 * Convert between two units of the same dimension
 * Returns null for unknown units or mismatched dimensions
 */
export function convertUnits(
  value: number,
  from: string,
  to: string,
  units: Map<string, UnitDefinition>,
): number | null {
  const source = units.get(from.toLowerCase());
  const target = units.get(to.toLowerCase());
  if (!source || !target || source.dimension !== target.dimension) return null;

  const base = value * source.factor + source.offset;
  return (base - target.offset) / target.factor;
}

export function createUnitHandler(table: UnitTable = loadUnitTable()): Handler {
  const units = indexUnits(table);

  return {
    name: "unit",
    description: "Unit conversion (1 km to m, 100 c to f)",
    attempt: (line) => {
      const match = line.match(CONVERSION_PATTERN);
      if (!match?.[1] || !match[2] || !match[3]) return null;

      const result = convertUnits(parseFloat(match[1]), match[2], match[3], units);
      if (result === null || !isValidNumber(result)) return null;
      return formatNumber(result);
    },
  };
}
