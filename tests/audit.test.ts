import { describe, it, expect, beforeEach } from "@jest/globals";
import { AuditLog } from "../tooling/lib/audit";

describe("AuditLog", () => {
  let auditLog: AuditLog;

  beforeEach(() => {
    auditLog = new AuditLog();
  });

  describe("recordBoundaryExpansion", () => {
    it("should accumulate cases per command", () => {
      auditLog.recordBoundaryExpansion("ip route", "weight", 4);
      auditLog.recordBoundaryExpansion("ip route", "gateway", 8, ["RTX830"]);

      expect(auditLog.getCommandAudit("ip route")?.boundaryCases).toBe(12);
      expect(auditLog.getEntries()[1].details).toEqual({ parameter: "gateway", cases: 8, skippedModels: ["RTX830"] });
    });
  });

  describe("recordPairwise", () => {
    it("should record combination counts", () => {
      auditLog.recordPairwise("ip route", 6, 21, { RTX830: 6 });

      expect(auditLog.getCommandAudit("ip route")?.combinations).toBe(6);
      expect(auditLog.getEntries()[0].type).toBe("pairwise_generated");
    });
  });

  describe("recordRoundTrip", () => {
    it("should count results by status", () => {
      auditLog.recordRoundTrip("ip route", "default route", "passed");
      auditLog.recordRoundTrip("ip route", "pp route", "failed", "RTX830");
      auditLog.recordRoundTrip("ip route", "tunnel route", "skipped", "RTX830");

      expect(auditLog.getCommandAudit("ip route")?.roundTrips).toEqual({ passed: 1, failed: 1, skipped: 1 });
    });
  });

  describe("defects, gaps and failures", () => {
    it("should keep defects with their command", () => {
      auditLog.recordDefects("ip route", [{ code: "unknown_model", message: 'unknown model "RTX9999"' }]);
      expect(auditLog.getCommandAudit("ip route")?.defects).toEqual([{ code: "unknown_model", message: 'unknown model "RTX9999"' }]);
    });

    it("should log suppressed gaps without counting them", () => {
      const gap = { command: "ip route", parameter: "metric", reason: "no range" };
      auditLog.recordGaps("ip route", [gap], true);
      expect(auditLog.getCommandAudit("ip route")?.gaps).toEqual([]);
      expect(auditLog.getEntries()[0].details).toEqual({ gaps: [gap], suppressed: true });

      auditLog.recordGaps("ip route", [gap], false);
      expect(auditLog.getCommandAudit("ip route")?.gaps).toEqual([gap]);
    });

    it("should record case failures", () => {
      auditLog.recordFailure({
        command: "ip route",
        kind: "boundary",
        subject: "weight=0",
        expected: "invalid",
        actual: "valid",
      });
      expect(auditLog.getCommandAudit("ip route")?.failures).toHaveLength(1);
      expect(auditLog.getEntries()[0].type).toBe("case_failed");
    });
  });

  describe("queries", () => {
    it("should filter entries by command", () => {
      auditLog.recordBoundaryExpansion("ip route", "weight", 4);
      auditLog.recordBoundaryExpansion("ipsec ike encryption", "gateway_id", 4);

      expect(auditLog.getEntriesForCommand("ip route")).toHaveLength(1);
      expect(auditLog.getCommandAudit("ip filter")).toBeUndefined();
    });

    it("should summarise every command", () => {
      auditLog.recordBoundaryExpansion("ip route", "weight", 4);
      auditLog.recordPairwise("ip route", 3, 12, { "*": 3 });
      auditLog.recordRoundTrip("ip route", "t", "failed");
      auditLog.recordDefects("ip filter", [{ code: "empty_name", message: "command name is empty" }]);

      expect(auditLog.getSummary()).toEqual({
        totalEntries: 4,
        commands: 2,
        boundaryCases: 4,
        combinations: 3,
        roundTripsFailed: 1,
        defects: 1,
        gaps: 0,
        failures: 0,
      });
    });

    it("should export summary, commands and entries", () => {
      auditLog.recordRoundTrip("ip route", "t", "passed");
      const exported = auditLog.toJSON();

      expect(exported.summary.commands).toBe(1);
      expect(exported.commands.map((c) => c.command)).toEqual(["ip route"]);
      expect(exported.entries).toHaveLength(1);
    });

    it("should clear everything", () => {
      auditLog.recordRoundTrip("ip route", "t", "passed");
      auditLog.clear();
      expect(auditLog.getSummary().totalEntries).toBe(0);
      expect(auditLog.getSummary().commands).toBe(0);
    });
  });
});
