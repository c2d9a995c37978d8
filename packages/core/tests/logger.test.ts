/**
 * Tests for scoped logging
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { config, createLogger } from "@peglogic/core";

describe("createLogger", () => {
  beforeEach(() => {
    config.reset();
    vi.spyOn(console, "debug").mockImplementation(() => {});
    vi.spyOn(console, "info").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    config.reset();
  });

  it("should prefix messages with the scope", () => {
    const log = createLogger("peglogic:test");
    expect(log.scope).toBe("peglogic:test");
    log.warn("careful");
    expect(console.warn).toHaveBeenCalledWith("[peglogic:test] careful");
  });

  it("should drop messages below the configured level", () => {
    const log = createLogger("s");
    log.debug("d");
    log.info("i");
    log.warn("w");
    log.error("e");
    expect(console.debug).not.toHaveBeenCalled();
    expect(console.info).not.toHaveBeenCalled();
    expect(console.warn).toHaveBeenCalledWith("[s] w");
    expect(console.error).toHaveBeenCalledWith("[s] e");
  });

  it("should log everything in debug mode", () => {
    config.set({ debug: true });
    const log = createLogger("s");
    log.debug("d");
    log.info("i");
    expect(console.debug).toHaveBeenCalledWith("[s] d");
    expect(console.info).toHaveBeenCalledWith("[s] i");
  });

  it("should log nothing when silent", () => {
    config.set({ log: { level: "silent" } });
    const log = createLogger("s");
    log.error("e");
    expect(console.error).not.toHaveBeenCalled();
  });

  it("should pick up level changes after creation", () => {
    const log = createLogger("s");
    config.set({ log: { level: "error" } });
    log.warn("w");
    expect(console.warn).not.toHaveBeenCalled();
  });
});
