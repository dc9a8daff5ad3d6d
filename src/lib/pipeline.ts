/**
 * Dispatch Pipeline - ordered, short-circuiting handler dispatch
 * The first handler returning a non-empty string wins; a throwing handler
 * counts as a decline and dispatch moves on.
 */

import type { Handler } from "./handlers/types.ts";
import { createLogger } from "./logger.ts";

const log = createLogger("pipeline");

export interface DispatchResult {
  result: string | null;
  /** Name of the handler that produced the result */
  handler: string | null;
}

export class DispatchPipeline {
  private readonly handlers: readonly Handler[];

  constructor(handlers: readonly Handler[]) {
    this.handlers = [...handlers];
  }

  get handlerNames(): string[] {
    return this.handlers.map((h) => h.name);
  }

  /** Run a preprocessed line; null when every handler declined */
  async run(line: string): Promise<string | null> {
    return (await this.dispatch(line)).result;
  }

  /** Like run(), also reporting which handler answered */
  async dispatch(line: string): Promise<DispatchResult> {
    if (!line) return { result: null, handler: null };

    for (const handler of this.handlers) {
      let result: string | null;
      try {
        result = await handler.attempt(line);
      } catch (err) {
        log.debug("handler failed", {
          handler: handler.name,
          error: err instanceof Error ? err.message : String(err),
        });
        continue;
      }

      if (result) {
        return { result, handler: handler.name };
      }
    }

    return { result: null, handler: null };
  }
}
