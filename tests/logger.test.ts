/**
 * Tests for logger module.
 */

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
  configureLogger,
  debug,
  error as logError,
  getLoggerState,
  info,
  isDebugEnabled,
  resetLogger,
  warn,
} from "../src/core/logger.js";

let capturedOutput: string[] = [];

describe("Logger", () => {
  beforeEach(() => {
    resetLogger();
    capturedOutput = [];
    vi.spyOn(console, "error").mockImplementation((...args: unknown[]) => {
      capturedOutput.push(args.join(" "));
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe("configureLogger", () => {
    it("should set quiet flag", () => {
      configureLogger({ quiet: true });
      const state = getLoggerState();
      expect(state.quiet).toBe(true);
      expect(state.debug).toBe(false);
    });

    it("should set debug flag", () => {
      configureLogger({ debug: true });
      const state = getLoggerState();
      expect(state.quiet).toBe(false);
      expect(state.debug).toBe(true);
      expect(isDebugEnabled()).toBe(true);
    });

    it("should prioritize quiet over debug", () => {
      configureLogger({ quiet: true, debug: true });
      expect(getLoggerState()).toEqual({ quiet: true, debug: false });
      expect(isDebugEnabled()).toBe(false);
    });
  });

  describe("warn and info", () => {
    it("should output by default", () => {
      warn("test warning");
      info("test info");
      expect(capturedOutput).toEqual(["test warning", "test info"]);
    });

    it("should suppress output with --quiet", () => {
      configureLogger({ quiet: true });
      warn("test warning");
      info("test info");
      expect(capturedOutput).toEqual([]);
    });
  });

  describe("debug", () => {
    it("should not output debug by default", () => {
      debug("test debug");
      expect(capturedOutput).toEqual([]);
    });

    it("should prefix debug output", () => {
      configureLogger({ debug: true });
      debug("test debug");
      expect(capturedOutput).toEqual(["[DEBUG] test debug"]);
    });
  });

  describe("error", () => {
    it("should output error even with --quiet", () => {
      configureLogger({ quiet: true });
      logError("test error");
      expect(capturedOutput).toEqual(["test error"]);
    });
  });

  it("should reset to default state", () => {
    configureLogger({ debug: true });
    resetLogger();
    expect(getLoggerState()).toEqual({ quiet: false, debug: false });
  });
});
