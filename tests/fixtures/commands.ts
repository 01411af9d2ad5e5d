import { CapabilityCatalog, Command, EnumValue, Parameter } from "../../tooling/lib/types";

export function param(name: string, overrides: Partial<Parameter> = {}): Parameter {
  return { name, type: "string", required: false, modelOverrides: {}, autoBoundaries: true, ...overrides };
}

export function members(...values: string[]): EnumValue[] {
  return values.map((value) => ({ value, description: "" }));
}

export function command(overrides: Partial<Command> = {}): Command {
  return {
    name: "test command",
    description: "",
    syntax: { set: [], delete: [] },
    parameters: [],
    models: [],
    tests: { syntax: [], multiline: [], boundaries: {} },
    notes: [],
    ...overrides,
  };
}

export const catalog: CapabilityCatalog = {
  models: {
    RTX1300: {
      firmware: "23.00.09",
      limits: { vpn_tunnels: 100 },
      licenses: { vpn_tunnels: { "YSL-VPN-EX1": [200, 300, 400] } },
    },
    RTX1220: { firmware: "15.04.05", limits: { vpn_tunnels: 100 } },
    RTX830: { firmware: "15.02.31", limits: { vpn_tunnels: 20 } },
  },
};

export const keepaliveCommand: Command = command({
  name: "ipsec ike keepalive use",
  syntax: {
    set: ["ipsec ike keepalive use <gateway_id> <switch> [<method> [interval=<interval>] [count=<count>]]"],
    delete: ["no ipsec ike keepalive use <gateway_id> [<switch>]"],
  },
  parameters: [
    param("gateway_id", {
      type: "integer",
      required: true,
      range: { min: 1, max: 3000 },
      field: { kind: "single", field: { name: "gateway_id", type: "number" } },
    }),
    param("switch", {
      type: "enum",
      required: true,
      enumValues: members("on", "off"),
      default: "on",
      field: { kind: "single", field: { name: "keepalive" } },
    }),
    param("method", {
      type: "enum",
      enumValues: [
        ...members("heartbeat", "icmp-echo", "dpd"),
        { value: "auto", description: "", auto: { dependsOn: "switch", map: { off: "heartbeat" }, otherwise: "dpd" } },
      ],
      default: "heartbeat",
      field: { kind: "single", field: { name: "keepalive_method" } },
    }),
    param("interval", { type: "integer", range: { min: 1, max: 600 }, default: 10 }),
    param("count", {
      type: "integer",
      range: { min: 1, max: 50 },
      default: 6,
      field: { kind: "single", field: { name: "retry_count", type: "number" } },
    }),
  ],
});

export const ipRouteCommand: Command = command({
  name: "ip route",
  syntax: {
    set: ["ip route <network> gateway <gateway> [weight <weight>]"],
    delete: ["no ip route <network> [gateway <gateway>]"],
  },
  parameters: [
    param("network", {
      required: true,
      pattern: "default|(\\d{1,3}\\.){3}\\d{1,3}/\\d{1,2}",
      field: { kind: "single", field: { name: "prefix" } },
    }),
    param("gateway", {
      required: true,
      variants: [
        { name: "ip", type: "ipv4", field: { name: "next_hop" } },
        { name: "pp", keyword: "pp", type: "integer", range: { min: 1, max: 30 }, field: { name: "pp_interface", type: "number" } },
        {
          name: "tunnel",
          keyword: "tunnel",
          type: "integer",
          range: { min: 1, max: 3000 },
          field: { name: "tunnel_interface", type: "number" },
        },
      ],
    }),
    param("weight", { type: "integer", range: { min: 1, max: 255 }, default: 1 }),
  ],
});
