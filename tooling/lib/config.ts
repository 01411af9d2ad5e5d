/**
 * Configuration loading and path expansion utilities
 */

import { existsSync, readFileSync } from "fs";
import { dirname, isAbsolute, join } from "path";
import { parse as parseEnv } from "dotenv";
import { isLogLevel, LogLevel } from "./logger";
import { CapabilityCatalog, Config, LicenseContext, LicenseTable, ModelProfile } from "./types";
import { isPlainObject } from "./utils";
import { DEFAULT_MAX_SEARCH_NODES } from "./pairwise";

export const DEFAULT_ENV_SEARCH_PATHS = [".env"];
export const DEFAULT_OUTPUT_DIR = "generated/cases";
export const DEFAULT_CATALOG_PATH = "config/models.json";
export const DEFAULT_LOG_LEVEL: LogLevel = "info";

/**
 * Nearest directory at or above `start` holding a package.json (the sources and dist/ both resolve here)
 */
export function findProjectRoot(start: string): string {
  let current = start;
  while (!existsSync(join(current, "package.json"))) {
    const parent = dirname(current);
    if (parent === current) {
      return start;
    }
    current = parent;
  }
  return current;
}

function stringList(value: unknown): string[] | undefined {
  if (!Array.isArray(value)) return undefined;
  return value.filter((item): item is string => typeof item === "string");
}

function numberRecord(value: unknown): Record<string, number> | undefined {
  if (!isPlainObject(value)) return undefined;
  const result: Record<string, number> = {};
  for (const [key, entry] of Object.entries(value)) {
    if (typeof entry === "number") result[key] = entry;
  }
  return result;
}

/**
 * Keep the recognised keys of a parsed config file; anything else is ignored
 */
export function parseConfig(value: unknown): Config {
  if (!isPlainObject(value)) return {};
  const config: Config = {};
  const envSearchPaths = stringList(value.envSearchPaths);
  if (envSearchPaths) config.envSearchPaths = envSearchPaths;
  if (typeof value.outputDir === "string") config.outputDir = value.outputDir;
  if (typeof value.catalogPath === "string") config.catalogPath = value.catalogPath;
  if (typeof value.logLevel === "string" && isLogLevel(value.logLevel)) config.logLevel = value.logLevel;
  const licenses = numberRecord(value.licenses);
  if (licenses) config.licenses = licenses;
  const suppressedGaps = stringList(value.suppressedGaps);
  if (suppressedGaps) config.suppressedGaps = suppressedGaps;
  if (typeof value.maxSearchNodes === "number" && value.maxSearchNodes > 0) config.maxSearchNodes = value.maxSearchNodes;
  return config;
}

/**
 * Read `SKU:qty,SKU:qty`; malformed pairs are dropped
 */
export function parseLicenseList(raw: string): LicenseContext {
  const licenses: LicenseContext = {};
  for (const part of raw.split(",")) {
    const match = /^\s*([^:\s]+)\s*:\s*(\d+)\s*$/.exec(part);
    if (match) {
      licenses[match[1]] = Number(match[2]);
    }
  }
  return licenses;
}

function parseProfile(value: unknown): ModelProfile {
  if (!isPlainObject(value)) return {};
  const profile: ModelProfile = {};
  if (typeof value.firmware === "string") profile.firmware = value.firmware;
  const limits = numberRecord(value.limits);
  if (limits) profile.limits = limits;
  if (isPlainObject(value.licenses)) {
    const licenses: Record<string, LicenseTable> = {};
    for (const [capability, table] of Object.entries(value.licenses)) {
      if (!isPlainObject(table)) continue;
      licenses[capability] = {};
      for (const [sku, rows] of Object.entries(table)) {
        // row checks happen in the resolver
        licenses[capability][sku] = Array.isArray(rows) ? rows.map((row) => (typeof row === "number" ? row : Number.NaN)) : [];
      }
    }
    profile.licenses = licenses;
  }
  return profile;
}

export function parseCatalog(value: unknown): CapabilityCatalog {
  const models: Record<string, ModelProfile> = {};
  const raw = isPlainObject(value) && isPlainObject(value.models) ? value.models : {};
  for (const [model, profile] of Object.entries(raw)) {
    models[model] = parseProfile(profile);
  }
  return { models };
}

export class ConfigManager {
  private config: Config;
  private projectRoot: string;

  constructor(projectRoot: string, configPath: string, private env: NodeJS.ProcessEnv = process.env) {
    this.projectRoot = projectRoot;
    this.config = this.readConfig(configPath);
  }

  private readConfig(configPath: string): Config {
    if (!existsSync(configPath)) {
      return { envSearchPaths: DEFAULT_ENV_SEARCH_PATHS };
    }

    try {
      return parseConfig(JSON.parse(readFileSync(configPath, "utf8")));
    } catch (error) {
      if (error instanceof SyntaxError) {
        return { envSearchPaths: DEFAULT_ENV_SEARCH_PATHS };
      }
      throw error;
    }
  }

  expandPath(rawPath: string): string {
    if (rawPath.startsWith("~/")) {
      const home = this.env.HOME;
      if (!home) {
        return rawPath.slice(2);
      }
      return join(home, rawPath.slice(2));
    }

    if (isAbsolute(rawPath)) {
      return rawPath;
    }

    return join(this.projectRoot, rawPath);
  }

  /**
   * Load every existing env file without overriding variables already set.
   * Returns the files that were read.
   */
  loadEnvironment(): string[] {
    const loaded: string[] = [];
    for (const candidate of this.getEnvSearchPaths()) {
      const expanded = this.expandPath(candidate);
      if (!expanded || !existsSync(expanded)) {
        continue;
      }
      const parsed = parseEnv(readFileSync(expanded));
      for (const [key, value] of Object.entries(parsed)) {
        if (this.env[key] === undefined) {
          this.env[key] = value;
        }
      }
      loaded.push(expanded);
    }
    return loaded;
  }

  getEnvSearchPaths(): string[] {
    return this.config.envSearchPaths ?? DEFAULT_ENV_SEARCH_PATHS;
  }

  getOutputDir(): string {
    return this.expandPath(this.config.outputDir ?? DEFAULT_OUTPUT_DIR);
  }

  getCatalogPath(): string {
    return this.expandPath(this.config.catalogPath ?? DEFAULT_CATALOG_PATH);
  }

  getLogLevel(): LogLevel {
    const fromEnv = this.env.CMDSPEC_LOG_LEVEL;
    if (fromEnv && isLogLevel(fromEnv)) {
      return fromEnv;
    }
    return this.config.logLevel ?? DEFAULT_LOG_LEVEL;
  }

  getLicenses(): LicenseContext {
    const fromEnv = this.env.CMDSPEC_LICENSES;
    if (fromEnv !== undefined && fromEnv.trim().length > 0) {
      return parseLicenseList(fromEnv);
    }
    return { ...(this.config.licenses ?? {}) };
  }

  getSuppressedGaps(): string[] {
    return this.config.suppressedGaps ?? [];
  }

  getMaxSearchNodes(): number {
    return this.config.maxSearchNodes ?? DEFAULT_MAX_SEARCH_NODES;
  }

  /**
   * Spec files named by CMDSPEC_SPEC_FILES (comma separated), if any
   */
  getSpecFiles(): string[] {
    const raw = this.env.CMDSPEC_SPEC_FILES;
    if (!raw) return [];
    return raw.split(",").map((file) => file.trim()).filter((file) => file.length > 0);
  }

  /**
   * Read the capability catalog; a missing file yields an empty catalog
   */
  loadCatalog(): CapabilityCatalog {
    const path = this.getCatalogPath();
    if (!existsSync(path)) {
      return { models: {} };
    }
    return parseCatalog(JSON.parse(readFileSync(path, "utf8")));
  }

  getConfig(): Config {
    return this.config;
  }
}
