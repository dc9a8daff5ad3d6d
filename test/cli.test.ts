import { describe, expect, test } from "vitest";
import { formatLine, parseCliArgs, renderBatch } from "../src/cli";
import { Calculator } from "../src/lib/calculator";
import { arithmeticHandler, variableHandler } from "../src/lib/handlers";

describe("parseCliArgs", () => {
  test("expression mode", () => {
    expect(parseCliArgs(["-e", "2 + 2"])).toEqual({ kind: "expression", expression: "2 + 2" });
    expect(parseCliArgs(["--expression", "1 km to m"])).toEqual({ kind: "expression", expression: "1 km to m" });
  });

  test("file mode", () => {
    expect(parseCliArgs(["-f", "sheet.txt"])).toEqual({ kind: "file", path: "sheet.txt" });
    expect(parseCliArgs(["--file", "sheet.txt"])).toEqual({ kind: "file", path: "sheet.txt" });
  });

  test("interactive is the default", () => {
    expect(parseCliArgs([])).toEqual({ kind: "interactive" });
    expect(parseCliArgs(["-i"])).toEqual({ kind: "interactive" });
  });

  test("help", () => {
    expect(parseCliArgs(["--help"])).toEqual({ kind: "help" });
  });
});

describe("output", () => {
  test("formatLine pads the expression", () => {
    expect(formatLine("2 + 2", "4")).toBe(`2 + 2${" ".repeat(25)} = 4`);
  });

  test("renderBatch skips lines without a result", async () => {
    const calc = new Calculator([arithmeticHandler, variableHandler]);
    expect(await renderBatch(calc, ["x = 3", "what", "x ^ 2"])).toEqual([
      formatLine("x = 3", "3"),
      formatLine("x ^ 2", "9"),
    ]);
  });
});
