/**
 * Command-line front end
 *
 *   linecalc -e "2 + 2"        evaluate one expression
 *   linecalc -f sheet.txt      evaluate a file, one expression per line
 *   linecalc [-i]              interactive shell (default)
 */

import { readFile } from "node:fs/promises";
import { createInterface } from "node:readline";
import { pathToFileURL } from "node:url";
import minimist from "minimist";
import { loadConfig } from "./config.ts";
import { type Calculator, createCalculator } from "./lib/calculator.ts";
import { logger, setLogLevel } from "./lib/logger.ts";

export type CliMode =
  | { kind: "expression"; expression: string }
  | { kind: "file"; path: string }
  | { kind: "interactive" }
  | { kind: "help" };

export function parseCliArgs(argv: string[]): CliMode {
  const args = minimist(argv, {
    string: ["e", "f"],
    boolean: ["i", "h"],
    alias: { e: "expression", f: "file", i: "interactive", h: "help" },
  });

  if (args.h) return { kind: "help" };
  if (typeof args.e === "string" && args.e.length > 0) return { kind: "expression", expression: args.e };
  if (typeof args.f === "string" && args.f.length > 0) return { kind: "file", path: args.f };
  return { kind: "interactive" };
}

/** `expr = result` with the expression padded to a column */
export function formatLine(expression: string, result: string): string {
  return `${expression.padEnd(30)} = ${result}`;
}

/** Evaluate a batch and render the lines that produced a result */
export async function renderBatch(calculator: Calculator, lines: readonly string[]): Promise<string[]> {
  const results = await calculator.calculate(lines);
  const out: string[] = [];
  lines.forEach((line, i) => {
    const result = results[i];
    if (result) out.push(formatLine(line, result));
  });
  return out;
}

function printUsage(): void {
  console.error("usage: linecalc [-e EXPRESSION | -f FILE | -i]");
  console.error("  -e, --expression: evaluate one expression");
  console.error("  -f, --file: evaluate each line of a file");
  console.error("  -i, --interactive: interactive shell (default)");
}

async function interactive(calculator: Calculator): Promise<void> {
  console.log("linecalc interactive shell (Ctrl+D to exit)");
  console.log("Examples:");
  console.log("  2 + 2");
  console.log("  1 km to m");
  console.log("  hello in spanish");
  console.log("  100 usd to eur");
  console.log("-".repeat(40));

  const rl = createInterface({ input: process.stdin, output: process.stdout, prompt: ">>> " });
  rl.prompt();

  for await (const line of rl) {
    if (line.trim()) {
      const [result] = await calculator.calculate([line]);
      console.log(result ?? "Could not process expression");
    }
    rl.prompt();
  }
  console.log("\nGoodbye!");
}

export async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
  const config = loadConfig();
  setLogLevel(config.logLevel);

  const mode = parseCliArgs(argv);
  const calculator = createCalculator({ config });

  switch (mode.kind) {
    case "help":
      printUsage();
      return 0;
    case "expression": {
      const [result] = await calculator.calculate([mode.expression]);
      if (!result) {
        console.error("Could not process expression");
        return 1;
      }
      console.log(formatLine(mode.expression, result));
      return 0;
    }
    case "file": {
      const source = await readFile(mode.path, "utf8");
      const lines = source.split(/\r?\n/).filter((line) => line.trim().length > 0);
      for (const line of await renderBatch(calculator, lines)) {
        console.log(line);
      }
      return 0;
    }
    case "interactive":
      await interactive(calculator);
      return 0;
  }
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  main()
    .then((code) => {
      process.exitCode = code;
    })
    .catch((err: unknown) => {
      logger.error("cli failed", { error: err instanceof Error ? err.message : String(err) });
      process.exitCode = 1;
    });
}
