/**
 * Syntax round-trip verification
 * Checks declared (command text, structured record) pairs against the codec in the
 * directions each test asks for.
 */

import { CommandCodec } from "./syntax";
import { ModelConstraint, StructuredRecord, SyntaxTest } from "./types";
import { normalize, scalarEquals } from "./utils";

export type RoundTripDirection = "parse" | "build";

export interface RoundTripFailure {
  direction: RoundTripDirection;
  line?: number;
  expected: string;
  actual: string;
  message: string;
}

export interface RoundTripResult {
  test: string;
  model?: string;
  status: "passed" | "failed" | "skipped";
  checked: RoundTripDirection[];
  failures: RoundTripFailure[];
  reason?: string;
}

/**
 * Whether a model-scoped test applies; unscoped tests and runs without a model always apply
 */
export function appliesTo(constraint: ModelConstraint | undefined, model: string | undefined): boolean {
  if (!constraint || model === undefined) return true;
  if (constraint.validFor && !constraint.validFor.includes(model)) return false;
  if (constraint.invalidFor?.includes(model)) return false;
  return true;
}

/**
 * Fields of `expected` that differ in `actual`; fields only `actual` has are ignored
 */
export function diffDeclaredFields(expected: StructuredRecord, actual: StructuredRecord): string[] {
  return Object.keys(expected).filter((key) => {
    const value = actual[key];
    return value === undefined || !scalarEquals(expected[key], value);
  });
}

function render(record: StructuredRecord | undefined): string {
  return record === undefined ? "<no match>" : JSON.stringify(record);
}

export class RoundTripValidator {
  constructor(private codec: CommandCodec) {}

  verify(test: SyntaxTest, model?: string): RoundTripResult {
    const result: RoundTripResult = { test: test.name, model, status: "passed", checked: [], failures: [] };

    if (!appliesTo(test.models, model)) {
      return { ...result, status: "skipped", reason: `not applicable to ${model}` };
    }

    const lines = test.text.split("\n").map(normalize).filter((line) => line.length > 0);
    const records = test.structured.kind === "single" ? [test.structured.record] : test.structured.records;

    if (lines.length !== records.length) {
      result.failures.push({
        direction: test.direction === "build" ? "build" : "parse",
        expected: `${records.length} record(s)`,
        actual: `${lines.length} line(s)`,
        message: "command lines and structured records must pair up one to one",
      });
      return { ...result, status: "failed" };
    }

    if (test.direction !== "build") {
      result.checked.push("parse");
      lines.forEach((line, index) => this.checkParse(test, line, records[index], index, result));
    }
    if (test.direction !== "parse") {
      result.checked.push("build");
      records.forEach((record, index) => this.checkBuild(test, lines[index], record, index, result));
    }

    return { ...result, status: result.failures.length > 0 ? "failed" : "passed" };
  }

  private checkParse(test: SyntaxTest, line: string, expected: StructuredRecord, index: number, result: RoundTripResult): void {
    const parsed = this.codec.parse(line, test.form);
    const actual = parsed ? this.codec.toRecord(parsed) : undefined;
    const differing = actual ? diffDeclaredFields(expected, actual) : Object.keys(expected);

    if (!actual || differing.length > 0) {
      result.failures.push({
        direction: "parse",
        line: index + 1,
        expected: JSON.stringify(expected),
        actual: render(actual),
        message: actual ? `fields differ: ${differing.join(", ")}` : `"${line}" matches no ${test.form} form`,
      });
    }
  }

  private checkBuild(test: SyntaxTest, line: string, record: StructuredRecord, index: number, result: RoundTripResult): void {
    const built = this.codec.serialize(record, test.form);
    if (built === undefined || this.codec.normalizeText(built) !== this.codec.normalizeText(line)) {
      result.failures.push({
        direction: "build",
        line: index + 1,
        expected: line,
        actual: built ?? "<not serializable>",
        message: built === undefined ? `no ${test.form} form can express the record` : "command text differs",
      });
    }
  }
}
