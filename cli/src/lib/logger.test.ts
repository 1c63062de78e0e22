import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { logger } from "./logger.js";

describe("logger", () => {
  let consoleLogSpy: typeof console.log;
  let consoleWarnSpy: typeof console.warn;
  let consoleErrorSpy: typeof console.error;
  let consoleDirSpy: typeof console.dir;
  let logCalls: string[];
  let warnCalls: string[];
  let errorCalls: string[];
  let dirCalls: unknown[];

  const render = (arg: unknown): string =>
    arg === null ? String(arg) : typeof arg === "object" ? JSON.stringify(arg) : String(arg);

  beforeEach(() => {
    logCalls = [];
    warnCalls = [];
    errorCalls = [];
    dirCalls = [];

    consoleLogSpy = console.log;
    consoleWarnSpy = console.warn;
    consoleErrorSpy = console.error;
    consoleDirSpy = console.dir;

    console.log = (...args: unknown[]) => {
      logCalls.push(...args.map(render));
    };
    console.warn = (...args: unknown[]) => {
      warnCalls.push(...args.map(render));
    };
    console.error = (...args: unknown[]) => {
      errorCalls.push(...args.map(render));
    };
    console.dir = (obj: unknown) => {
      dirCalls.push(obj);
    };

    logger.setOptions({ quiet: false, json: false });
  });

  afterEach(() => {
    console.log = consoleLogSpy;
    console.warn = consoleWarnSpy;
    console.error = consoleErrorSpy;
    console.dir = consoleDirSpy;
  });

  describe("info", () => {
    it("prints human-readable lines", () => {
      logger.info("Blast radius for db-1");
      expect(logCalls).toEqual(["Blast radius for db-1"]);
    });

    it("dumps attached data", () => {
      logger.info("Details", { key: "value" });
      expect(logCalls).toEqual(["Details"]);
      expect(dirCalls).toEqual([{ key: "value" }]);
    });

    it("stays silent in quiet mode", () => {
      logger.setOptions({ quiet: true });
      logger.info("Test message");
      expect(logCalls).toHaveLength(0);
    });

    it("stays silent in json mode so stdout carries only the result", () => {
      logger.setOptions({ json: true });
      logger.info("Test message");
      expect(logCalls).toHaveLength(0);
    });
  });

  describe("section", () => {
    it("prints a heading", () => {
      logger.section("Outcomes");
      expect(logCalls).toEqual(["\n=== Outcomes ==="]);
    });
  });

  describe("result", () => {
    it("prints pretty JSON in json mode", () => {
      logger.setOptions({ json: true });
      logger.result({ riskScore: 42 });
      expect(logCalls).toEqual([JSON.stringify({ riskScore: 42 }, null, 2)]);
    });

    it("prints even when quiet", () => {
      logger.setOptions({ json: true, quiet: true });
      logger.result([1, 2]);
      expect(logCalls).toHaveLength(1);
    });

    it("does nothing in human mode", () => {
      logger.result({ riskScore: 42 });
      expect(logCalls).toHaveLength(0);
    });
  });

  describe("warn", () => {
    it("writes to stderr", () => {
      logger.warn("Warning message");
      expect(warnCalls).toEqual(["Warning message"]);
    });

    it("stays silent in quiet mode", () => {
      logger.setOptions({ quiet: true });
      logger.warn("Warning message");
      expect(warnCalls).toHaveLength(0);
    });

    it("writes a JSON line in json mode", () => {
      logger.setOptions({ json: true });
      logger.warn("Warning message", { reason: "test" });
      expect(JSON.parse(warnCalls[0])).toEqual({ level: "warn", message: "Warning message", reason: "test" });
    });
  });

  describe("error", () => {
    it("prints the message and the Error text", () => {
      logger.error("Request failed", new Error("boom"));
      expect(errorCalls).toEqual(["Request failed", "boom"]);
    });

    it("dumps non-Error values", () => {
      logger.error("Request failed", { code: 500 });
      expect(errorCalls).toEqual(["Request failed"]);
      expect(dirCalls).toEqual([{ code: 500 }]);
    });

    it("is shown even in quiet mode", () => {
      logger.setOptions({ quiet: true });
      logger.error("Error message");
      expect(errorCalls).toHaveLength(1);
    });

    it("writes a JSON line with the Error text in json mode", () => {
      logger.setOptions({ json: true });
      logger.error("Request failed", new Error("boom"));
      expect(JSON.parse(errorCalls[0])).toEqual({ level: "error", message: "Request failed", error: "boom" });
    });

    it("writes a JSON line with a non-Error value in json mode", () => {
      logger.setOptions({ json: true });
      logger.error("Request failed", { code: 500 });
      expect(JSON.parse(errorCalls[0])).toEqual({ level: "error", message: "Request failed", error: { code: 500 } });
    });
  });

  describe("setOptions", () => {
    it("merges options", () => {
      logger.setOptions({ quiet: true });
      logger.setOptions({ json: true });
      expect(logger.jsonMode).toBe(true);
      logger.warn("Test");
      expect(warnCalls).toHaveLength(0);
    });
  });
});
