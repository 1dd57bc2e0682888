import { describe, it, expect, vi, afterEach } from "vitest";
import { createCourierLogger, silentLogger } from "../src/logger.js";

afterEach(() => {
  vi.restoreAllMocks();
});

/**
 * Capture everything Winston's Console transport prints.
 * Spies must exist BEFORE the logger is created, since the transport
 * binds console methods in its constructor.
 */
function captureConsole(): () => string[] {
  const spies = (["log", "info", "warn", "error", "debug"] as const).map((m) =>
    vi.spyOn(console, m).mockImplementation(() => {}),
  );
  return () => spies.flatMap((s) => s.mock.calls.map((args) => args.map(String).join(" ")));
}

describe("createCourierLogger", () => {
  it("returns a CourierLogger-compatible object", () => {
    const logger = createCourierLogger();
    expect(typeof logger.info).toBe("function");
    expect(typeof logger.warn).toBe("function");
    expect(typeof logger.error).toBe("function");
    expect(typeof logger.debug).toBe("function");
  });

  it("warn level suppresses debug and info", () => {
    const lines = captureConsole();
    const logger = createCourierLogger({ level: "warn", prefix: "test" });

    logger.debug?.("dbg-suppressed");
    logger.info("info-suppressed");
    logger.warn("warn-visible");
    logger.error("error-visible");

    const out = lines();
    expect(out.some((l) => l.includes("dbg-suppressed"))).toBe(false);
    expect(out.some((l) => l.includes("info-suppressed"))).toBe(false);
    expect(out.some((l) => l.includes("warn-visible"))).toBe(true);
    expect(out.some((l) => l.includes("error-visible"))).toBe(true);
  });

  it("debug level shows everything", () => {
    const lines = captureConsole();
    const logger = createCourierLogger({ level: "debug", prefix: "test" });

    logger.debug?.("dbg-msg");
    logger.info("inf-msg");

    const out = lines();
    expect(out.some((l) => l.includes("dbg-msg"))).toBe(true);
    expect(out.some((l) => l.includes("inf-msg"))).toBe(true);
  });

  it("formats lines as '<timestamp> [prefix:level] message'", () => {
    const lines = captureConsole();
    const logger = createCourierLogger({ prefix: "peer-a" });

    logger.warn("[courier:session] queue full");

    const line = lines().find((l) => l.includes("queue full"));
    expect(line).toMatch(
      /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}\S* \[peer-a:warn\] \[courier:session\] queue full/,
    );
  });

  it("uses default prefix 'courier'", () => {
    const lines = captureConsole();
    createCourierLogger().info("msg");
    expect(lines().some((l) => l.includes("[courier:info] msg"))).toBe(true);
  });
});

describe("silentLogger", () => {
  it("prints nothing", () => {
    const lines = captureConsole();
    silentLogger.info("a");
    silentLogger.warn("b");
    silentLogger.error("c");
    silentLogger.debug?.("d");
    expect(lines()).toEqual([]);
  });
});
