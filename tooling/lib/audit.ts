/**
 * Audit Trail System
 * Tracks what each generation run derived, verified and rejected per command
 */

import { CaseFailure, CoverageGap, SpecIssue } from "./errors";

export type AuditEntryType =
  | "boundary_expanded"
  | "pairwise_generated"
  | "roundtrip_checked"
  | "defect_reported"
  | "gap_reported"
  | "case_failed";

export interface AuditEntry {
  timestamp: string;
  type: AuditEntryType;
  command: string;
  details: Record<string, unknown>;
}

export interface CommandAudit {
  command: string;
  boundaryCases: number;
  combinations: number;
  roundTrips: { passed: number; failed: number; skipped: number };
  defects: SpecIssue[];
  gaps: CoverageGap[];
  failures: CaseFailure[];
}

export class AuditLog {
  private entries: AuditEntry[] = [];
  private commands: Map<string, CommandAudit> = new Map();

  private audit(command: string): CommandAudit {
    let existing = this.commands.get(command);
    if (!existing) {
      existing = {
        command,
        boundaryCases: 0,
        combinations: 0,
        roundTrips: { passed: 0, failed: 0, skipped: 0 },
        defects: [],
        gaps: [],
        failures: [],
      };
      this.commands.set(command, existing);
    }
    return existing;
  }

  private push(type: AuditEntryType, command: string, details: Record<string, unknown>): void {
    this.entries.push({ timestamp: new Date().toISOString(), type, command, details });
  }

  /**
   * Record the cases derived for one parameter
   */
  recordBoundaryExpansion(command: string, parameter: string, cases: number, skippedModels: string[] = []): void {
    this.audit(command).boundaryCases += cases;
    this.push("boundary_expanded", command, { parameter, cases, skippedModels });
  }

  recordPairwise(command: string, combinations: number, requiredPairs: number, perModel: Record<string, number>): void {
    this.audit(command).combinations += combinations;
    this.push("pairwise_generated", command, { combinations, requiredPairs, perModel });
  }

  recordRoundTrip(command: string, test: string, status: "passed" | "failed" | "skipped", model?: string): void {
    this.audit(command).roundTrips[status] += 1;
    this.push("roundtrip_checked", command, { test, status, model });
  }

  recordDefects(command: string, issues: SpecIssue[]): void {
    this.audit(command).defects.push(...issues);
    this.push("defect_reported", command, { issues: issues.map((issue) => ({ ...issue })) });
  }

  recordGaps(command: string, gaps: CoverageGap[], suppressed: boolean): void {
    if (!suppressed) {
      this.audit(command).gaps.push(...gaps);
    }
    this.push("gap_reported", command, { gaps: gaps.map((gap) => ({ ...gap })), suppressed });
  }

  recordFailure(failure: CaseFailure): void {
    this.audit(failure.command).failures.push(failure);
    this.push("case_failed", failure.command, { ...failure });
  }

  /**
   * Get all entries
   */
  getEntries(): AuditEntry[] {
    return [...this.entries];
  }

  getEntriesForCommand(command: string): AuditEntry[] {
    return this.entries.filter((entry) => entry.command === command);
  }

  getCommandAudit(command: string): CommandAudit | undefined {
    return this.commands.get(command);
  }

  /**
   * Get summary statistics
   */
  getSummary(): {
    totalEntries: number;
    commands: number;
    boundaryCases: number;
    combinations: number;
    roundTripsFailed: number;
    defects: number;
    gaps: number;
    failures: number;
  } {
    const audits = Array.from(this.commands.values());
    const sum = (pick: (audit: CommandAudit) => number) => audits.reduce((total, audit) => total + pick(audit), 0);

    return {
      totalEntries: this.entries.length,
      commands: audits.length,
      boundaryCases: sum((a) => a.boundaryCases),
      combinations: sum((a) => a.combinations),
      roundTripsFailed: sum((a) => a.roundTrips.failed),
      defects: sum((a) => a.defects.length),
      gaps: sum((a) => a.gaps.length),
      failures: sum((a) => a.failures.length),
    };
  }

  /**
   * Export as JSON for persistence
   */
  toJSON(): { summary: ReturnType<AuditLog["getSummary"]>; commands: CommandAudit[]; entries: AuditEntry[] } {
    return {
      summary: this.getSummary(),
      commands: Array.from(this.commands.values()),
      entries: this.entries,
    };
  }

  clear(): void {
    this.entries = [];
    this.commands.clear();
  }
}
