/**
 * Calculator - preprocess then dispatch, one line at a time, in input order.
 * Later lines see the variables earlier lines defined, so a batch is a
 * sequential fold over its lines with the store as the carried state.
 */

import { type AppConfig, DEFAULT_CONFIG } from "../config.ts";
import { buildHandlers, type FetchLike, type Handler } from "./handlers/index.ts";
import { DispatchPipeline } from "./pipeline.ts";
import { Preprocessor } from "./preprocess.ts";
import { VariableStore } from "./variables.ts";

/** Per-line trace of a calculation */
export interface LineResult {
  input: string;
  /** Line after preprocessing */
  processed: string;
  result: string | null;
  handler: string | null;
  definition: boolean;
}

export class Calculator {
  readonly store: VariableStore;
  private readonly preprocessor: Preprocessor;
  private readonly pipeline: DispatchPipeline;

  constructor(handlers: readonly Handler[], store: VariableStore = new VariableStore()) {
    this.store = store;
    this.preprocessor = new Preprocessor(store);
    this.pipeline = new DispatchPipeline(handlers);
  }

  get handlerNames(): string[] {
    return this.pipeline.handlerNames;
  }

  /**
   * One result per input line, positionally aligned; null means no handler
   * could interpret the line.
   *
   * @example
   * await calc.calculate(["x = 5", "x + 1"]); // ["5", "6"]
   */
  async calculate(lines: readonly string[]): Promise<(string | null)[]> {
    const traced = await this.trace(lines);
    return traced.map((line) => line.result);
  }

  /** calculate() with the preprocessed text and answering handler per line */
  async trace(lines: readonly string[]): Promise<LineResult[]> {
    const results: LineResult[] = [];
    for (const input of lines) {
      const { text, definition } = this.preprocessor.process(input);
      const { result, handler } = await this.pipeline.dispatch(text);
      results.push({ input, processed: text, result, handler, definition });
    }
    return results;
  }

  /** Remove user variables; operator aliases stay. Returns the number removed. */
  resetVariables(): number {
    return this.store.resetUserVariables();
  }
}

export interface CreateCalculatorOptions {
  config?: AppConfig;
  fetch?: FetchLike;
  /** Prebuilt handler list; overrides config.handlers */
  handlers?: readonly Handler[];
}

export function createCalculator(options: CreateCalculatorOptions = {}): Calculator {
  const config = options.config ?? DEFAULT_CONFIG;
  const handlers = options.handlers ?? buildHandlers(config, { fetch: options.fetch });
  return new Calculator(handlers);
}
