/**
 * Error taxonomy for specification processing
 *
 * - SpecDefectError: the command description itself is wrong (always surfaced)
 * - CoverageGapError: a parameter lacks the data needed to derive its cases
 * - CaseFailure: a generated case disagrees with its validator (reported, never thrown)
 */

export type SpecIssueCode =
  | "empty_name"
  | "missing_syntax"
  | "duplicate_parameter"
  | "unknown_parameter"
  | "unknown_model"
  | "unsupported_model"
  | "unknown_capability"
  | "malformed_range"
  | "malformed_license_table"
  | "malformed_template"
  | "malformed_document"
  | "enum_violation"
  | "duplicate_variant"
  | "field_collision"
  | "uncoverable_pair"
  | "constraint_precedence"
  | "search_exhausted";

export interface SpecIssue {
  code: SpecIssueCode;
  message: string;
  path?: string;
}

export class SpecDefectError extends Error {
  readonly command: string;
  readonly issues: SpecIssue[];

  constructor(command: string, issues: SpecIssue[]) {
    const summary = issues.map((issue) => (issue.path ? `${issue.path}: ${issue.message}` : issue.message));
    super(`Specification defect in "${command}": ${summary.join("; ")}`);
    this.name = "SpecDefectError";
    this.command = command;
    this.issues = issues;
  }

  hasCode(code: SpecIssueCode): boolean {
    return this.issues.some((issue) => issue.code === code);
  }
}

export interface CoverageGap {
  command: string;
  parameter: string;
  model?: string;
  reason: string;
}

export class CoverageGapError extends Error {
  readonly command: string;
  readonly gaps: CoverageGap[];

  constructor(command: string, gaps: CoverageGap[]) {
    super(`Coverage gaps in "${command}": ${gaps.map((gap) => `${gap.parameter} (${gap.reason})`).join("; ")}`);
    this.name = "CoverageGapError";
    this.command = command;
    this.gaps = gaps;
  }
}

export interface CaseFailure {
  command: string;
  kind: "boundary" | "pairwise";
  subject: string;
  model?: string;
  expected: string;
  actual: string;
}

/**
 * Key used to suppress a gap in configuration: `command.parameter`
 */
export function gapKey(gap: CoverageGap): string {
  return `${gap.command}.${gap.parameter}`;
}

export function isSuppressed(gap: CoverageGap, suppressed: string[]): boolean {
  return suppressed.includes("*") || suppressed.includes(gapKey(gap)) || suppressed.includes(`${gap.command}.*`);
}
