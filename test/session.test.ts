import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import { DEFAULT_CONFIG } from "../src/config";
import { arithmeticHandler, variableHandler } from "../src/lib/handlers";
import { SessionManagerImpl } from "../src/lib/session";

describe("SessionManager", () => {
  let manager: SessionManagerImpl;
  const factory = vi.fn(() => [arithmeticHandler, variableHandler]);

  beforeEach(() => {
    vi.useFakeTimers({ now: 10_000 });
    factory.mockClear();
    manager = new SessionManagerImpl({ ttl_ms: 1_000, max_sessions: 2 }, factory);
  });

  afterEach(() => {
    manager.destroy();
    vi.useRealTimers();
  });

  test("calculate creates a session and keeps its variables", async () => {
    expect(await manager.calculate("s1", ["x = 5"])).toHaveLength(1);
    const [line] = await manager.calculate("s1", ["x * 2"]);

    expect(line?.result).toBe("10");
    expect(manager.get("s1")?.lines_processed).toBe(2);
  });

  test("sessions are isolated", async () => {
    await manager.calculate("a", ["x = 1"]);
    const [line] = await manager.calculate("b", ["x"]);
    expect(line?.result).toBeNull();
  });

  test("handlers are built once and shared", async () => {
    await manager.calculate("a", ["1 + 1"]);
    await manager.calculate("b", ["1 + 1"]);
    expect(factory).toHaveBeenCalledTimes(1);
  });

  test("evicts the least recently updated session at capacity", () => {
    manager.getOrCreate("a");
    vi.setSystemTime(10_100);
    manager.getOrCreate("b");
    vi.setSystemTime(10_200);
    manager.get("a"); // touch
    vi.setSystemTime(10_300);
    manager.getOrCreate("c");

    expect(manager.list().map((s) => s.id)).toEqual(["a", "c"]);
  });

  test("cleanup drops idle sessions", () => {
    manager.getOrCreate("old");
    vi.setSystemTime(10_800);
    manager.getOrCreate("new");

    expect(manager.cleanup(11_500)).toBe(1);
    expect(manager.get("old")).toBeUndefined();
    expect(manager.get("new")).toBeDefined();
  });

  test("the cleanup timer runs cleanup", () => {
    manager.getOrCreate("idle");
    vi.advanceTimersByTime(5 * 60 * 1000);
    expect(manager.list()).toEqual([]);
  });

  test("list reports lines, variables and age", async () => {
    await manager.calculate("s", ["x = 1", "y = 2", "x + y"]);
    vi.setSystemTime(12_500);

    expect(manager.list()).toEqual([{ id: "s", lines_processed: 3, variables: 2, age_ms: 2_500 }]);
  });

  test("clear and clearAll", () => {
    manager.getOrCreate("a");
    manager.getOrCreate("b");

    expect(manager.clear("a")).toBe(true);
    expect(manager.clear("a")).toBe(false);
    expect(manager.clearAll()).toBe(1);
  });

  test("configure applies limits and rebuilds handlers", async () => {
    await manager.calculate("a", ["1 + 1"]);
    manager.configure({ ...DEFAULT_CONFIG, handlers: ["arithmetic"], maxSessions: 1, sessionTtlMs: 50 });

    expect(manager.list()).toEqual([]);
    const session = manager.getOrCreate("b");
    expect(session.calculator.handlerNames).toEqual(["arithmetic"]);

    manager.getOrCreate("c");
    expect(manager.list().map((s) => s.id)).toEqual(["c"]);
  });
});
