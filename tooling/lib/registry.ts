/**
 * Registry of generated artifact modules
 * Keeps one JSON entry per id and regenerates an index module whenever entries change
 */

import { writeFileSync, readFileSync, existsSync, mkdirSync } from "fs";
import { dirname } from "path";
import { isPlainObject, stableStringify } from "./utils";

export interface RegistryEntry {
  id: string;
}

export class Registry<T extends RegistryEntry> {
  private entries: Record<string, T> = {};
  private dirty = false;

  constructor(
    private registryPath: string,
    private indexPath: string,
    private indexGenerator: (entries: T[]) => string,
    private parseEntry: (value: unknown) => T | undefined
  ) {
    this.load();
  }

  private load(): void {
    this.entries = {};
    if (!existsSync(this.registryPath)) {
      return;
    }
    let parsed: unknown;
    try {
      parsed = JSON.parse(readFileSync(this.registryPath, "utf8"));
    } catch (error) {
      // a corrupt registry is rebuilt from the next run
      if (error instanceof SyntaxError) return;
      throw error;
    }
    if (!Array.isArray(parsed)) return;
    for (const item of parsed) {
      const entry = this.parseEntry(item);
      if (entry && entry.id) {
        this.entries[entry.id] = entry;
      }
    }
  }

  register(entry: T): void {
    if (!entry.id) return;

    const existing = this.entries[entry.id];
    if (!existing || stableStringify(existing) !== stableStringify(entry)) {
      this.entries[entry.id] = entry;
      this.dirty = true;
    }
  }

  get(id: string): T | undefined {
    return this.entries[id];
  }

  all(): T[] {
    return Object.values(this.entries);
  }

  isDirty(): boolean {
    return this.dirty;
  }

  persist(): void {
    if (!this.dirty) {
      return;
    }

    mkdirSync(dirname(this.registryPath), { recursive: true });

    const entries = this.all().sort((a, b) => a.id.localeCompare(b.id));
    writeFileSync(this.registryPath, JSON.stringify(entries, null, 2), "utf8");

    mkdirSync(dirname(this.indexPath), { recursive: true });
    writeFileSync(this.indexPath, this.indexGenerator(entries), "utf8");

    this.dirty = false;
  }

  clear(): void {
    this.entries = {};
    this.dirty = true;
  }

  size(): number {
    return Object.keys(this.entries).length;
  }
}

/**
 * Entry describing one emitted `<slug>.cases.ts` module
 */
export interface SuiteRegistryEntry extends RegistryEntry {
  command: string;
  file: string;
  boundaryCases: number;
  combinations: number;
  roundTrips: number;
  fieldMappings: number;
  hash: string;
}

export function parseSuiteEntry(value: unknown): SuiteRegistryEntry | undefined {
  if (!isPlainObject(value)) return undefined;
  const { id, command, file, boundaryCases, combinations, roundTrips, fieldMappings, hash } = value;
  if (
    typeof id !== "string" ||
    typeof command !== "string" ||
    typeof file !== "string" ||
    typeof boundaryCases !== "number" ||
    typeof combinations !== "number" ||
    typeof roundTrips !== "number" ||
    typeof fieldMappings !== "number" ||
    typeof hash !== "string"
  ) {
    return undefined;
  }
  return { id, command, file, boundaryCases, combinations, roundTrips, fieldMappings, hash };
}
