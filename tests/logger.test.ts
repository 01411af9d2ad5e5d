import { describe, it, expect, beforeEach } from "@jest/globals";
import { formatData, formatEntry, formatPrefix, isLogLevel, Logger } from "../tooling/lib/logger";

describe("Logger", () => {
  let logger: Logger;

  beforeEach(() => {
    logger = new Logger("debug", false); // Disable console output for tests
  });

  describe("logging levels", () => {
    it("should log at debug level", () => {
      logger.debug("Debug message", { value: 42 });
      const entries = logger.getEntries();
      expect(entries).toHaveLength(1);
      expect(entries[0].level).toBe("debug");
      expect(entries[0].message).toBe("Debug message");
    });

    it("should log at warn and error level", () => {
      logger.warn("Warning message");
      logger.error("Error message");
      const entries = logger.getEntries();
      expect(entries.map((e) => e.level)).toEqual(["warn", "error"]);
    });

    it("should only log at or above configured level", () => {
      const infoLogger = new Logger("info", false);
      infoLogger.debug("Debug message");
      infoLogger.info("Info message");
      infoLogger.warn("Warn message");

      const entries = infoLogger.getEntries();
      expect(entries).toHaveLength(2);
      expect(entries[0].level).toBe("info");
      expect(entries[1].level).toBe("warn");
    });

    it("should change logging level dynamically", () => {
      logger.setLevel("warn");
      logger.debug("Debug");
      logger.info("Info");
      logger.warn("Warn");

      expect(logger.getLevel()).toBe("warn");
      expect(logger.getEntries()).toHaveLength(1);
    });

    it("should recognise level names", () => {
      expect(isLogLevel("warn")).toBe(true);
      expect(isLogLevel("verbose")).toBe(false);
    });
  });

  describe("context management", () => {
    it("should merge context updates", () => {
      logger.pushContext({ command: "ip route" });
      logger.pushContext({ model: "RTX830" });
      logger.info("Message");

      expect(logger.getEntries()[0].context).toEqual({ command: "ip route", model: "RTX830" });
    });

    it("should drop selected context keys", () => {
      logger.pushContext({ command: "ip route", phase: "boundary", model: "RTX830" });
      logger.popContext(["model"]);
      logger.info("Message");

      expect(logger.getEntries()[0].context).toEqual({ command: "ip route", phase: "boundary" });
    });

    it("should clear all context", () => {
      logger.pushContext({ command: "ip route" });
      logger.clearContext();
      logger.info("Message");

      expect(logger.getEntries()[0].context).toBeUndefined();
    });

    it("should restore context after withContext, also when the callback throws", () => {
      logger.pushContext({ command: "ip route" });
      const result = logger.withContext({ phase: "pairwise" }, () => {
        logger.info("inside");
        return 7;
      });
      expect(result).toBe(7);

      expect(() =>
        logger.withContext({ phase: "boundary" }, () => {
          throw new Error("boom");
        })
      ).toThrow("boom");

      logger.info("outside");
      const entries = logger.getEntries();
      expect(entries[0].context).toEqual({ command: "ip route", phase: "pairwise" });
      expect(entries[1].context).toEqual({ command: "ip route" });
    });
  });

  describe("timers", () => {
    it("should start and end timers", () => {
      logger.startTimer("operation");

      const delay = new Promise((resolve) => setTimeout(resolve, 50));

      return delay.then(() => {
        const duration = logger.endTimer("operation", "Operation completed");
        // timer resolution can undershoot by a millisecond
        expect(duration).toBeGreaterThanOrEqual(45);

        const entries = logger.getEntries();
        expect(entries).toHaveLength(1);
        expect(entries[0].data?.duration).toBe(duration);
      });
    });

    it("should warn about unknown timers", () => {
      expect(logger.endTimer("missing", "never started")).toBe(0);
      expect(logger.getEntries()[0].level).toBe("warn");
      expect(logger.getEntries()[0].message).toBe('Timer "missing" not found');
    });
  });

  describe("entry filtering", () => {
    it("should filter entries by command", () => {
      logger.withContext({ command: "ip route" }, () => logger.info("Message 1"));
      logger.withContext({ command: "ipsec ike encryption" }, () => logger.info("Message 2"));

      const entries = logger.getEntriesForCommand("ip route");
      expect(entries).toHaveLength(1);
      expect(entries[0].message).toBe("Message 1");
    });

    it("should filter entries by level", () => {
      logger.debug("Debug");
      logger.info("Info");
      logger.warn("Warn");
      logger.error("Error");

      const warnAndAbove = logger.getEntriesAtLevel("warn");
      expect(warnAndAbove.map((e) => e.level)).toEqual(["warn", "error"]);
    });
  });

  describe("summary", () => {
    it("should provide accurate statistics", () => {
      logger.debug("Debug");
      logger.info("Info 1");
      logger.info("Info 2");
      logger.warn("Warn");
      logger.error("Error");

      expect(logger.getSummary()).toEqual({ totalEntries: 5, debug: 1, info: 2, warn: 1, error: 1 });
    });

    it("should clear all entries", () => {
      logger.info("Message 1");
      logger.clear();
      expect(logger.getEntries()).toHaveLength(0);
    });
  });

  describe("formatting", () => {
    it("should render the context prefix", () => {
      expect(formatPrefix({ phase: "boundary", component: "suite", command: "ip route", model: "RTX830" })).toBe(
        '[boundary] <suite> "ip route" @RTX830: '
      );
      expect(formatPrefix(undefined)).toBe("");
    });

    it("should render data after the message", () => {
      expect(formatData({ duration: 12, models: ["a", "b"], limit: { max: 3 }, name: "x" })).toBe(
        'duration: 12ms, models: [2 items], limit: {"max":3}, name: x'
      );
      expect(
        formatEntry({ timestamp: "t", level: "info", message: "Done", context: { command: "ip route" }, data: { cases: 4 } })
      ).toBe('"ip route": Done\n  cases: 4');
    });
  });
});
