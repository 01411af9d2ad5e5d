/**
 * Test suite for Registry system
 */

import { describe, it, expect, beforeEach, afterEach } from "@jest/globals";
import { parseSuiteEntry, Registry, SuiteRegistryEntry } from "../tooling/lib/registry";
import { writeFileSync, readFileSync, existsSync, mkdirSync, rmSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";

function entry(id: string, overrides: Partial<SuiteRegistryEntry> = {}): SuiteRegistryEntry {
  return {
    id,
    command: id.replace(/-/g, " "),
    file: `${id}.cases.ts`,
    boundaryCases: 4,
    combinations: 2,
    roundTrips: 1,
    fieldMappings: 3,
    hash: "abc",
    ...overrides,
  };
}

describe("Registry", () => {
  let registryPath: string;
  let indexPath: string;
  let registry: Registry<SuiteRegistryEntry>;
  let tempDir: string;

  const indexGenerator = (entries: SuiteRegistryEntry[]) => `export const ids = ${JSON.stringify(entries.map((e) => e.id))};\n`;
  const open = () => new Registry(registryPath, indexPath, indexGenerator, parseSuiteEntry);

  beforeEach(() => {
    tempDir = join(tmpdir(), `registry-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    mkdirSync(tempDir, { recursive: true });
    registryPath = join(tempDir, "registry.json");
    indexPath = join(tempDir, "index.ts");
    registry = open();
  });

  afterEach(() => {
    if (existsSync(tempDir)) {
      rmSync(tempDir, { recursive: true, force: true });
    }
  });

  it("should create an empty registry", () => {
    expect(registry.size()).toBe(0);
    expect(registry.all()).toEqual([]);
  });

  it("should register a new entry and mark the registry dirty", () => {
    expect(registry.isDirty()).toBe(false);
    registry.register(entry("ip-route"));
    expect(registry.size()).toBe(1);
    expect(registry.get("ip-route")).toEqual(entry("ip-route"));
    expect(registry.isDirty()).toBe(true);
  });

  it("should not mark dirty when registering an identical entry", () => {
    registry.register(entry("ip-route"));
    registry.persist();
    expect(registry.isDirty()).toBe(false);

    registry.register(entry("ip-route"));
    expect(registry.isDirty()).toBe(false);

    registry.register(entry("ip-route", { hash: "def" }));
    expect(registry.isDirty()).toBe(true);
  });

  it("should ignore entries without an id", () => {
    registry.register(entry(""));
    expect(registry.size()).toBe(0);
  });

  it("should persist sorted entries and the index", () => {
    registry.register(entry("ipsec-ike-encryption"));
    registry.register(entry("ip-route"));
    registry.persist();

    const stored: unknown = JSON.parse(readFileSync(registryPath, "utf8"));
    expect(Array.isArray(stored) && stored.map((item) => parseSuiteEntry(item)?.id)).toEqual(["ip-route", "ipsec-ike-encryption"]);
    expect(readFileSync(indexPath, "utf8")).toBe('export const ids = ["ip-route","ipsec-ike-encryption"];\n');
  });

  it("should reload persisted entries", () => {
    registry.register(entry("ip-route"));
    registry.persist();

    const reopened = open();
    expect(reopened.get("ip-route")).toEqual(entry("ip-route"));
    expect(reopened.isDirty()).toBe(false);
  });

  it("should start empty from a corrupt registry file", () => {
    writeFileSync(registryPath, "{ not json", "utf8");
    expect(open().size()).toBe(0);
  });

  it("should skip stored entries of the wrong shape", () => {
    writeFileSync(registryPath, JSON.stringify([entry("ip-route"), { id: "partial" }]), "utf8");
    const reopened = open();
    expect(reopened.all().map((e) => e.id)).toEqual(["ip-route"]);
  });

  it("should clear entries", () => {
    registry.register(entry("ip-route"));
    registry.persist();
    registry.clear();
    expect(registry.size()).toBe(0);
    expect(registry.isDirty()).toBe(true);
  });
});
