import { describe, it, expect } from "@jest/globals";
import { SpecDefectError } from "../tooling/lib/errors";
import { CommandCodec, compileTemplate } from "../tooling/lib/syntax";
import { command, ipRouteCommand, keepaliveCommand, param } from "./fixtures/commands";

describe("compileTemplate", () => {
  it("should compile keywords, slots and nested optional groups", () => {
    const template = compileTemplate("ipsec ike duration ipsec-sa <gateway_id> <seconds> [bytes=<kbytes>]");
    expect(template.params).toEqual(["gateway_id", "seconds", "kbytes"]);
    expect(template.nodes).toEqual([
      { kind: "keyword", words: ["ipsec"] },
      { kind: "keyword", words: ["ike"] },
      { kind: "keyword", words: ["duration"] },
      { kind: "keyword", words: ["ipsec-sa"] },
      { kind: "slot", param: "gateway_id", prefix: "", suffix: "" },
      { kind: "slot", param: "seconds", prefix: "", suffix: "" },
      { kind: "optional", nodes: [{ kind: "slot", param: "kbytes", prefix: "bytes=", suffix: "" }] },
    ]);
  });

  it("should read keyword alternatives", () => {
    expect(compileTemplate("ipsec sa policy {esp|ah}").nodes[3]).toEqual({ kind: "keyword", words: ["esp", "ah"] });
  });

  it("should reject malformed templates", () => {
    expect(() => compileTemplate("ip route [<network>")).toThrow('unclosed [ in "ip route [<network>"');
    expect(() => compileTemplate("ip route ]")).toThrow("unbalanced ]");
    expect(() => compileTemplate("ip route []")).toThrow("empty optional group");
    expect(() => compileTemplate("ip <a><b>")).toThrow('token "<a><b>" binds more than one parameter');
    expect(() => compileTemplate("ip <a> <a>")).toThrow("parameter <a> appears twice");
    expect(() => compileTemplate("   ")).toThrow("empty template");
  });

  it("should surface template errors as specification defects", () => {
    const broken = command({ name: "broken", syntax: { set: ["ip route [<network>"], delete: [] } });
    try {
      new CommandCodec(broken);
      throw new Error("expected a SpecDefectError");
    } catch (error) {
      expect(error).toBeInstanceOf(SpecDefectError);
      if (error instanceof SpecDefectError) {
        expect(error.hasCode("malformed_template")).toBe(true);
      }
    }
  });
});

describe("CommandCodec", () => {
  describe("parse", () => {
    const codec = new CommandCodec(keepaliveCommand);

    it("should bind slots, optional groups and prefixed tokens", () => {
      const parsed = codec.parse("ipsec ike keepalive use 1 on dpd interval=30");
      expect(parsed).toEqual({
        form: "set",
        template: 0,
        bindings: {
          gateway_id: { value: 1 },
          switch: { value: "on" },
          method: { value: "dpd" },
          interval: { value: 30 },
        },
      });
    });

    it("should fill omitted parameters with defaults in the record", () => {
      const parsed = codec.parse("ipsec  ike keepalive use 1 on");
      expect(parsed && codec.toRecord(parsed)).toEqual({
        gateway_id: 1,
        keepalive: "on",
        keepalive_method: "heartbeat",
        interval: 10,
        retry_count: 6,
      });
    });

    it("should fall through to the delete form", () => {
      const parsed = codec.parse("no ipsec ike keepalive use 1");
      expect(parsed?.form).toBe("delete");
      expect(parsed && codec.toRecord(parsed)).toEqual({ gateway_id: 1, keepalive: "on" });
    });

    it("should not match values outside the enum or with trailing tokens", () => {
      expect(codec.parse("ipsec ike keepalive use 1 maybe")).toBeUndefined();
      expect(codec.parse("ipsec ike keepalive use 1 on dpd interval=30 extra")).toBeUndefined();
      expect(codec.parse("ipsec ike keepalive use 1 on", "delete")).toBeUndefined();
    });
  });

  describe("variants", () => {
    const codec = new CommandCodec(ipRouteCommand);

    it("should record each variant under its own field", () => {
      const viaPp = codec.parse("ip route default gateway pp 1");
      expect(viaPp && codec.toRecord(viaPp)).toEqual({ prefix: "default", pp_interface: 1, weight: 1 });

      const viaIp = codec.parse("ip route 10.0.0.0/8 gateway 192.168.1.1 weight 2");
      expect(viaIp && codec.toRecord(viaIp)).toEqual({ prefix: "10.0.0.0/8", next_hop: "192.168.1.1", weight: 2 });
    });

    it("should reject variant values outside their range", () => {
      expect(codec.parse("ip route default gateway pp 31")).toBeUndefined();
      expect(codec.parse("ip route default gateway tunnel 3001")).toBeUndefined();
    });

    it("should serialize the variant keyword", () => {
      expect(codec.serialize({ prefix: "default", tunnel_interface: 5 })).toBe("ip route default gateway tunnel 5");
      expect(codec.serialize({ prefix: "10.0.0.0/8", next_hop: "192.168.1.1", weight: 2 })).toBe(
        "ip route 10.0.0.0/8 gateway 192.168.1.1 weight 2"
      );
    });
  });

  describe("serialize", () => {
    const codec = new CommandCodec(keepaliveCommand);

    it("should leave out groups that only hold defaults", () => {
      expect(codec.serialize({ gateway_id: 1, keepalive: "on", keepalive_method: "heartbeat" })).toBe(
        "ipsec ike keepalive use 1 on"
      );
    });

    it("should write optional groups with non-default values", () => {
      expect(codec.serialize({ gateway_id: 1, keepalive: "on", keepalive_method: "dpd", interval: 30 })).toBe(
        "ipsec ike keepalive use 1 on dpd interval=30"
      );
    });

    it("should write defaults for slots ahead of a written value", () => {
      expect(codec.serialize({ gateway_id: 1, keepalive: "on", interval: 30 })).toBe(
        "ipsec ike keepalive use 1 on heartbeat interval=30"
      );
    });

    it("should serialize the delete form", () => {
      expect(codec.serialize({ gateway_id: 1 }, "delete")).toBe("no ipsec ike keepalive use 1");
    });

    it("should give up when a required slot has no value", () => {
      expect(codec.serialize({ keepalive: "on" })).toBeUndefined();
    });
  });

  describe("text handling", () => {
    const filter = command({
      name: "ip filter",
      syntax: { set: ["ip filter <filter_id> {pass|accept} <source>"], delete: [] },
      parameters: [param("filter_id", { type: "integer", range: { min: 1, max: 100 } }), param("source")],
    });
    const codec = new CommandCodec(filter);

    it("should normalize keyword synonyms and whitespace", () => {
      expect(codec.normalizeText("ip  filter 1 accept 10.0.0.1")).toBe("ip filter 1 pass 10.0.0.1");
    });

    it("should parse synonyms and write the first spelling", () => {
      const parsed = codec.parse("ip filter 1 accept 10.0.0.1");
      expect(parsed?.bindings).toEqual({ filter_id: { value: 1 }, source: { value: "10.0.0.1" } });
      expect(codec.serialize({ filter_id: 1, source: "10.0.0.1" })).toBe("ip filter 1 pass 10.0.0.1");
    });

    it("should let a trailing free-text slot take the rest of the line", () => {
      const parsed = codec.parse("ip filter 7 pass main office link");
      expect(parsed?.bindings.source).toEqual({ value: "main office link" });
    });
  });
});
