/**
 * Type definitions for line handlers
 */

/** Sync or async; null (or an empty string) means "declined" */
export type HandlerResult = string | null | Promise<string | null>;

/** Handler interface - each handler interprets a preprocessed line or declines */
export interface Handler {
  /** Unique name for this handler */
  name: string;
  /** Human-readable description of what this handler accepts */
  description?: string;
  /** Attempt to interpret the line */
  attempt: (line: string) => HandlerResult;
}

/** Subset of the fetch API the network handlers use; tests pass a stand-in */
export type FetchLike = (input: string, init?: { signal?: AbortSignal }) => Promise<{
  ok: boolean;
  status: number;
  json(): Promise<unknown>;
}>;
