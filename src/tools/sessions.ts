import { z } from "zod";
import { SessionManager } from "../lib/session.ts";

/**
 * Session management tools for calculator sessions
 */

export const listSessionsTool = {
  name: "list_sessions",
  description: "List active calculator sessions with their line and variable counts",
  parameters: z.object({}),
  execute: async (): Promise<string> => {
    const sessions = SessionManager.list();

    if (sessions.length === 0) {
      return "No active sessions.";
    }

    const lines = [
      `**Active Sessions** (${sessions.length})`,
      "",
      "| Session | Lines | Variables | Age |",
      "|---------|-------|-----------|-----|",
    ];

    for (const s of sessions) {
      lines.push(`| ${s.id} | ${s.lines_processed} | ${s.variables} | ${formatAge(s.age_ms)} |`);
    }

    return lines.join("\n");
  },
};

export const clearSessionTool = {
  name: "clear_session",
  description: "Clear a specific session or all sessions to free memory",
  parameters: z.object({
    session_id: z.string().optional().describe("Session ID to clear (omit for all)"),
    all: z.boolean().default(false).describe("Clear all sessions"),
  }),
  execute: async (args: { session_id?: string; all?: boolean }): Promise<string> => {
    if (args.all) {
      const count = SessionManager.clearAll();
      return `Cleared ${count} session(s).`;
    }

    if (!args.session_id) {
      return "Provide session_id or set all=true";
    }

    const cleared = SessionManager.clear(args.session_id);
    return cleared ? `Cleared session: ${args.session_id}` : `Session not found: ${args.session_id}`;
  },
};

export function formatAge(ms: number): string {
  if (ms < 60_000) return `${Math.round(ms / 1000)}s`;
  if (ms < 3_600_000) return `${Math.round(ms / 60_000)}m`;
  return `${Math.round(ms / 3_600_000)}h`;
}
