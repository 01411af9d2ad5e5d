import { describe, it, expect } from "@jest/globals";
import { appliesTo, diffDeclaredFields, RoundTripValidator } from "../tooling/lib/roundtrip";
import { CommandCodec } from "../tooling/lib/syntax";
import { SyntaxTest } from "../tooling/lib/types";
import { keepaliveCommand } from "./fixtures/commands";

function syntaxTest(overrides: Partial<SyntaxTest>): SyntaxTest {
  return {
    name: "case",
    text: "",
    structured: { kind: "single", record: {} },
    direction: "bidirectional",
    form: "set",
    ...overrides,
  };
}

describe("RoundTripValidator", () => {
  const validator = new RoundTripValidator(new CommandCodec(keepaliveCommand));

  it("should pass when both directions agree", () => {
    const result = validator.verify(
      syntaxTest({
        name: "dpd with timers",
        text: "ipsec ike keepalive use 1 on dpd interval=30",
        structured: { kind: "single", record: { gateway_id: 1, keepalive: "on", keepalive_method: "dpd", interval: 30 } },
      })
    );
    expect(result).toEqual({ test: "dpd with timers", model: undefined, status: "passed", checked: ["parse", "build"], failures: [] });
  });

  it("should report differing fields and differing text", () => {
    const result = validator.verify(
      syntaxTest({
        text: "ipsec ike keepalive use 1 on dpd",
        structured: { kind: "single", record: { gateway_id: 1, keepalive: "on", keepalive_method: "icmp-echo" } },
      })
    );
    expect(result.status).toBe("failed");
    expect(result.failures).toEqual([
      {
        direction: "parse",
        line: 1,
        expected: '{"gateway_id":1,"keepalive":"on","keepalive_method":"icmp-echo"}',
        actual: '{"gateway_id":1,"keepalive":"on","keepalive_method":"dpd","interval":10,"retry_count":6}',
        message: "fields differ: keepalive_method",
      },
      {
        direction: "build",
        line: 1,
        expected: "ipsec ike keepalive use 1 on dpd",
        actual: "ipsec ike keepalive use 1 on icmp-echo",
        message: "command text differs",
      },
    ]);
  });

  it("should only check the requested direction", () => {
    const result = validator.verify(
      syntaxTest({
        text: "ipsec ike keepalive use x on",
        structured: { kind: "single", record: { gateway_id: 1 } },
        direction: "parse",
      })
    );
    expect(result.checked).toEqual(["parse"]);
    expect(result.failures).toEqual([
      {
        direction: "parse",
        line: 1,
        expected: '{"gateway_id":1}',
        actual: "<no match>",
        message: '"ipsec ike keepalive use x on" matches no set form',
      },
    ]);
  });

  it("should check the delete form", () => {
    const result = validator.verify(
      syntaxTest({ text: "no ipsec ike keepalive use 3", structured: { kind: "single", record: { gateway_id: 3 } }, form: "delete" })
    );
    expect(result.status).toBe("passed");
  });

  it("should pair each line of a multi-line test with one record", () => {
    const result = validator.verify(
      syntaxTest({
        text: "ipsec ike keepalive use 1 on\n\nipsec ike keepalive use 2 off\n",
        structured: {
          kind: "multi",
          records: [
            { gateway_id: 1, keepalive: "on" },
            { gateway_id: 2, keepalive: "off" },
          ],
        },
      })
    );
    expect(result.status).toBe("passed");
  });

  it("should fail when lines and records do not pair up", () => {
    const result = validator.verify(
      syntaxTest({
        text: "ipsec ike keepalive use 1 on\nipsec ike keepalive use 2 on",
        structured: { kind: "multi", records: [{ gateway_id: 1 }] },
      })
    );
    expect(result.status).toBe("failed");
    expect(result.failures[0]).toEqual({
      direction: "parse",
      expected: "1 record(s)",
      actual: "2 line(s)",
      message: "command lines and structured records must pair up one to one",
    });
  });

  it("should skip tests scoped to other models", () => {
    const test = syntaxTest({ text: "ipsec ike keepalive use 150 on", models: { validFor: ["RTX1300"] } });
    expect(validator.verify(test, "RTX830")).toEqual({
      test: "case",
      model: "RTX830",
      status: "skipped",
      checked: [],
      failures: [],
      reason: "not applicable to RTX830",
    });
  });
});

describe("round-trip helpers", () => {
  it("should decide model applicability", () => {
    expect(appliesTo(undefined, "RTX830")).toBe(true);
    expect(appliesTo({ validFor: ["RTX1300"] }, undefined)).toBe(true);
    expect(appliesTo({ validFor: ["RTX1300"] }, "RTX830")).toBe(false);
    expect(appliesTo({ invalidFor: ["RTX830"] }, "RTX830")).toBe(false);
    expect(appliesTo({ invalidFor: ["RTX830"] }, "RTX1300")).toBe(true);
  });

  it("should compare declared fields only", () => {
    expect(diffDeclaredFields({ a: 1, b: "x" }, { a: "1", b: "y", c: 2 })).toEqual(["b"]);
    expect(diffDeclaredFields({ a: 1 }, {})).toEqual(["a"]);
  });
});
