// Tests for debug-namespace logging

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createLogger, isEnabled } from "./logging.ts";

// Mock localStorage
const mockLocalStorage: Record<string, string> = {};
vi.stubGlobal("localStorage", {
  getItem: (key: string) => mockLocalStorage[key] ?? null,
  setItem: (key: string, value: string) => {
    mockLocalStorage[key] = value;
  },
  removeItem: (key: string) => {
    delete mockLocalStorage[key];
  },
});

describe("createLogger", () => {
  let consoleLogs: Array<{ message: string; data: unknown }> = [];
  let consoleWarnings: Array<{ message: string; data: unknown }> = [];
  const originalConsoleLog = console.log;
  const originalConsoleWarn = console.warn;

  beforeEach(() => {
    consoleLogs = [];
    consoleWarnings = [];
    console.log = (message: string, data?: unknown) => {
      consoleLogs.push({ message, data });
    };
    console.warn = (message: string, data?: unknown) => {
      consoleWarnings.push({ message, data });
    };
    mockLocalStorage["debug"] = "lnmp:*";
  });

  afterEach(() => {
    console.log = originalConsoleLog;
    console.warn = originalConsoleWarn;
    delete mockLocalStorage["debug"];
    vi.unstubAllEnvs();
  });

  it("logs structured records under the namespace", () => {
    const log = createLogger("lnmp:stream");
    log.debug("begin", { streamId: 1n });

    expect(consoleLogs).toEqual([
      { message: "lnmp:stream begin", data: { namespace: "lnmp:stream", streamId: 1n } },
    ]);
  });

  it("sends warnings to console.warn", () => {
    createLogger("lnmp:stream").warn("checksum mismatch", { sequence: 2n });
    expect(consoleLogs).toHaveLength(0);
    expect(consoleWarnings[0].data).toMatchObject({ sequence: 2n });
  });

  it("does not log when debug is not enabled", () => {
    delete mockLocalStorage["debug"];
    vi.stubEnv("DEBUG", "");

    const log = createLogger("lnmp:stream");
    log.debug("begin");
    expect(log.enabled()).toBe(false);
    expect(consoleLogs).toHaveLength(0);
  });

  it("falls back to the DEBUG environment variable", () => {
    delete mockLocalStorage["debug"];
    vi.stubEnv("DEBUG", "lnmp:negotiation");

    expect(isEnabled("lnmp:negotiation")).toBe(true);
    expect(isEnabled("lnmp:stream")).toBe(false);
  });

  it("respects namespace patterns", () => {
    mockLocalStorage["debug"] = "other:*";
    const log = createLogger("lnmp:backpressure");
    log.debug("sent");
    expect(consoleLogs).toHaveLength(0);

    mockLocalStorage["debug"] = "lnmp:backpressure";
    log.debug("sent");
    expect(consoleLogs).toHaveLength(1);
  });

  it("supports wildcard and exclusion patterns", () => {
    mockLocalStorage["debug"] = "*,-lnmp:stream";
    expect(isEnabled("anything:here")).toBe(true);
    expect(isEnabled("lnmp:stream")).toBe(false);
  });
});
