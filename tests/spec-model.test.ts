import { describe, it, expect } from "@jest/globals";
import { SpecDefectError } from "../tooling/lib/errors";
import { assertValidCommand, collectSpecIssues, findParameter } from "../tooling/lib/spec-model";
import { catalog, command, ipRouteCommand, keepaliveCommand, members, param } from "./fixtures/commands";

describe("collectSpecIssues", () => {
  it("should accept consistent commands", () => {
    expect(collectSpecIssues(keepaliveCommand, catalog)).toEqual([]);
    expect(collectSpecIssues(ipRouteCommand, catalog)).toEqual([]);
  });

  it("should report structural problems", () => {
    const broken = command({ name: " ", parameters: [param("a"), param("a")] });
    expect(collectSpecIssues(broken)).toEqual([
      { code: "empty_name", message: "command name is empty", path: "name" },
      { code: "missing_syntax", message: "at least one set form is required", path: "syntax.set" },
      { code: "duplicate_parameter", message: "parameters repeat: a", path: "parameters" },
    ]);
  });

  it("should require template parameters to be declared", () => {
    const undeclared = command({
      syntax: { set: ["ip route <network> <metric>"], delete: [] },
      parameters: [param("network")],
    });
    expect(collectSpecIssues(undeclared)).toEqual([
      { code: "unknown_parameter", message: 'unknown parameter "metric"', path: "syntax.set[0]" },
    ]);
  });

  it("should report malformed templates", () => {
    const malformed = command({ syntax: { set: ["ip route [<network>"], delete: [] }, parameters: [param("network")] });
    expect(collectSpecIssues(malformed)).toEqual([
      { code: "malformed_template", message: 'unclosed [ in "ip route [<network>"', path: "syntax.set[0]" },
    ]);
  });

  it("should check enum defaults and members", () => {
    const mode = param("mode", { type: "enum", enumValues: members("a", "b", "a"), default: "c" });
    const issues = collectSpecIssues(command({ syntax: { set: ["mode <mode>"], delete: [] }, parameters: [mode] }));
    expect(issues).toEqual([
      { code: "enum_violation", message: 'default "c" is not one of a, b, a', path: "parameters.mode.default" },
      { code: "enum_violation", message: "enum values repeat", path: "parameters.mode.enum_values" },
    ]);
  });

  it("should check auto dependencies", () => {
    const selfish = param("method", {
      type: "enum",
      enumValues: [{ value: "auto", description: "", auto: { dependsOn: "method", map: {}, otherwise: "dpd" } }],
    });
    const dangling = param("mode", {
      type: "enum",
      enumValues: [{ value: "auto", description: "", auto: { dependsOn: "switch", map: {}, otherwise: "x" } }],
    });
    const issues = collectSpecIssues(
      command({ syntax: { set: ["k <method> <mode>"], delete: [] }, parameters: [selfish, dangling] })
    );
    expect(issues.map((issue) => issue.message)).toEqual([
      '"auto" cannot depend on its own parameter',
      'unknown parameter "switch"',
    ]);
  });

  it("should check models against the catalog", () => {
    const scoped = command({
      syntax: { set: ["k <a>"], delete: [] },
      models: ["RTX830", "RTX9999"],
      parameters: [param("a", { modelOverrides: { RTX810: { unavailable: true } } })],
    });
    expect(collectSpecIssues(scoped, catalog)).toEqual([
      { code: "unknown_model", message: 'unknown model "RTX9999"', path: "applicable_models" },
      { code: "unknown_model", message: 'unknown model "RTX810"', path: "parameters.a.model_constraints" },
    ]);
    expect(collectSpecIssues(scoped)).toEqual([]);
  });

  it("should check references from tests", () => {
    const referencing = command({
      syntax: { set: ["k <a> <b>"], delete: [] },
      parameters: [param("a"), param("b")],
      tests: {
        syntax: [],
        multiline: [],
        boundaries: { c: [{ value: 1, valid: true }] },
        pairwise: {
          parameters: ["a", "d"],
          values: {},
          constraints: [{ kind: "requires", when: [{ param: "a", values: ["x"] }], then: { param: "b", sameAs: "e" } }],
        },
      },
    });
    expect(collectSpecIssues(referencing).map((issue) => `${issue.path}: ${issue.message}`)).toEqual([
      'boundary_tests.c: unknown parameter "c"',
      'pairwise.parameters: unknown parameter "d"',
      'pairwise.constraints: unknown parameter "e"',
    ]);
  });

  it("should require an auto value's driver to join the pairwise set", () => {
    const pairwise = (parameters: string[], values: Record<string, string[]> = {}) =>
      collectSpecIssues({
        ...keepaliveCommand,
        tests: { ...keepaliveCommand.tests, pairwise: { parameters, values, constraints: [] } },
      });

    expect(pairwise(["method", "count"])).toEqual([
      {
        code: "unknown_parameter",
        message: '"method=auto" depends on "switch", which is not a pairwise parameter',
        path: "pairwise.parameters",
      },
    ]);
    expect(pairwise(["method", "count"], { method: ["heartbeat", "dpd"] })).toEqual([]);
    expect(pairwise(["switch", "method"])).toEqual([]);
  });

  it("should check variant names and ranges", () => {
    const gateway = param("gateway", {
      variants: [
        { name: "pp", keyword: "pp", type: "integer", range: { min: 30, max: 1 } },
        { name: "pp", keyword: "pp", type: "integer" },
      ],
      field: { kind: "per-variant", fields: { ppp: [{ name: "x" }] } },
    });
    const issues = collectSpecIssues(command({ syntax: { set: ["k <gateway>"], delete: [] }, parameters: [gateway] }));
    expect(issues.map((issue) => issue.code)).toEqual(["duplicate_variant", "malformed_range", "unknown_parameter"]);
  });
});

describe("assertValidCommand", () => {
  it("should throw a SpecDefectError listing every issue", () => {
    try {
      assertValidCommand(command({ name: "", parameters: [] }));
      throw new Error("expected a SpecDefectError");
    } catch (error) {
      expect(error).toBeInstanceOf(SpecDefectError);
      if (error instanceof SpecDefectError) {
        expect(error.command).toBe("<unnamed>");
        expect(error.issues.map((issue) => issue.code)).toEqual(["empty_name", "missing_syntax"]);
      }
    }
  });

  it("should find parameters by name", () => {
    expect(findParameter(ipRouteCommand, "weight")?.default).toBe(1);
    expect(findParameter(ipRouteCommand, "metric")).toBeUndefined();
  });
});
