import type { Context } from "fastmcp";
import { z } from "zod";
import type { LineResult } from "../lib/calculator.ts";
import { createLogger } from "../lib/logger.ts";
import { SessionManager } from "../lib/session.ts";

type MCPContext = Context<Record<string, unknown> | undefined>;

/** Only the per-call logger is used */
type ToolContext = Pick<MCPContext, "log">;

const log = createLogger("tools:calculate");

/**
 * Calculator tools - batch evaluation and variable management per session
 */

export const CalculateSchema = z.object({
  lines: z
    .array(z.string())
    .min(1)
    .describe("Input lines, evaluated in order; later lines may use variables defined earlier"),
  session_id: z
    .string()
    .optional()
    .describe("Session whose variables to use (omit to start a new session)"),
});

export type CalculateArgs = z.infer<typeof CalculateSchema>;

export const calculateTool = {
  name: "calculate",
  description: `Evaluate calculator lines in order, one result per line.

Each line is tried by: arithmetic (2 + 2, 2 ^ 10, 7 % 3), variable definitions
(x = 5, y := x times 2), unit conversion (1 km to m), currency conversion
(100 usd to eur) and translation (hello in spanish). The first handler that
understands a line answers it. Operator words (plus, minus, times, divide, mod,
power) work anywhere.

Variables persist within a session_id.`,

  parameters: CalculateSchema,

  execute: async (args: CalculateArgs, ctx?: ToolContext): Promise<string> => {
    const sessionId = args.session_id || `s_${crypto.randomUUID()}`;
    const results = await SessionManager.calculate(sessionId, args.lines);

    const answered = results.filter((r) => r.result !== null).length;
    log.debug("calculated", { session: sessionId, lines: results.length, answered });
    ctx?.log.debug("calculated", { session: sessionId, lines: results.length, answered });

    return formatResults(sessionId, results);
  },
};

export const ResetVariablesSchema = z.object({
  session_id: z.string().describe("Session whose user variables to clear"),
});

export const resetVariablesTool = {
  name: "reset_variables",
  description: "Clear user-defined variables in a session; operator words (plus, times, ...) stay",
  parameters: ResetVariablesSchema,
  execute: async (args: z.infer<typeof ResetVariablesSchema>): Promise<string> => {
    const session = SessionManager.get(args.session_id);
    if (!session) {
      return `Session not found: ${args.session_id}`;
    }
    const removed = session.calculator.resetVariables();
    return `Cleared ${removed} variable(s) in session ${args.session_id}.`;
  },
};

export const ListVariablesSchema = z.object({
  session_id: z.string().describe("Session to inspect"),
  include_operators: z.boolean().default(false).describe("Also list operator words and symbols"),
});

export const listVariablesTool = {
  name: "list_variables",
  description: "List the variables defined in a session",
  parameters: ListVariablesSchema,
  execute: async (args: z.input<typeof ListVariablesSchema>): Promise<string> => {
    const session = SessionManager.get(args.session_id);
    if (!session) {
      return `Session not found: ${args.session_id}`;
    }

    const entries = session.calculator.store.entries(args.include_operators ? undefined : "user");
    if (entries.length === 0) {
      return "No variables defined.";
    }

    const lines = ["| Name | Value | Origin |", "|------|-------|--------|"];
    for (const e of entries) {
      lines.push(`| ${escapeCell(e.name)} | ${escapeCell(e.value)} | ${e.origin} |`);
    }
    return lines.join("\n");
  },
};

/** Markdown table of lines and results */
export function formatResults(sessionId: string, results: LineResult[]): string {
  const lines = [`**Session**: ${sessionId}`, "", "| # | Line | Result |", "|---|------|--------|"];

  results.forEach((r, i) => {
    const shown = r.result === null ? "—" : escapeCell(r.result);
    lines.push(`| ${i + 1} | ${escapeCell(r.input.trim())} | ${shown} |`);
  });

  return lines.join("\n");
}

function escapeCell(text: string): string {
  return text.replace(/\|/g, "\\|");
}
