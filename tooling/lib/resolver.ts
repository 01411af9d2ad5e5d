/**
 * Parameter resolution
 * Computes the effective domain of a parameter for a (model, license context) pair:
 * base range, model overrides, catalog capability limits and license-tier extensions.
 */

import { SpecDefectError, SpecIssue } from "./errors";
import {
  CapabilityCatalog,
  EnumValue,
  LicenseContext,
  LicenseTable,
  ModelOverride,
  NumericRange,
  Parameter,
  ParameterType,
  ScalarValue,
  Variant,
} from "./types";
import { compareRevisions, stableStringify } from "./utils";

export type RangeSource = "base" | "model" | "capability" | "license";

export interface LicenseLimit {
  sku: string;
  quantity: number;
  limit: number;
}

export interface EffectiveDomain {
  parameter: string;
  type: ParameterType;
  model?: string;
  range?: NumericRange;
  rangeSource?: RangeSource;
  /** License row that produced the upper bound, when one applied */
  license?: LicenseLimit;
  /** License table consulted for this model, whether or not the context matched it */
  licenseTable?: LicenseTable;
  enumValues?: EnumValue[];
  variants?: Variant[];
  pattern?: string;
  default?: ScalarValue;
}

export type Resolution =
  | { status: "supported"; domain: EffectiveDomain }
  | { status: "unsupported"; parameter: string; model: string; reason: string };

export const EMPTY_CATALOG: CapabilityCatalog = { models: {} };

export class ParameterResolver {
  private memo: WeakMap<Parameter, Map<string, Resolution>> = new WeakMap();

  constructor(
    private catalog: CapabilityCatalog = EMPTY_CATALOG,
    private commandName: string = "<unnamed>"
  ) {}

  /**
   * Models the catalog knows about, in declaration order
   */
  knownModels(): string[] {
    return Object.keys(this.catalog.models);
  }

  isKnownModel(model: string): boolean {
    const known = this.knownModels();
    return known.length === 0 || known.includes(model);
  }

  /**
   * Resolve the effective domain. Unsupported combinations come back as a status;
   * inconsistent specifications throw SpecDefectError.
   */
  resolve(parameter: Parameter, model?: string, license: LicenseContext = {}): Resolution {
    const key = `${model ?? "*"}|${stableStringify(license)}`;
    let perParameter = this.memo.get(parameter);
    if (!perParameter) {
      perParameter = new Map();
      this.memo.set(parameter, perParameter);
    }

    const cached = perParameter.get(key);
    if (cached) {
      return cached;
    }

    const resolution = this.compute(parameter, model, license);
    perParameter.set(key, resolution);
    return resolution;
  }

  private compute(parameter: Parameter, model: string | undefined, license: LicenseContext): Resolution {
    if (model === undefined) {
      this.checkRange(parameter.name, parameter.range);
      return { status: "supported", domain: this.baseDomain(parameter) };
    }

    if (!this.isKnownModel(model)) {
      throw this.defect({ code: "unknown_model", message: `unknown model "${model}"`, path: parameter.name });
    }

    const unsupported = this.availabilityFailure(parameter, model, license);
    if (unsupported) {
      return { status: "unsupported", parameter: parameter.name, model, reason: unsupported };
    }

    const override: ModelOverride = parameter.modelOverrides[model] ?? {};
    if (override.unavailable) {
      return { status: "unsupported", parameter: parameter.name, model, reason: "marked unavailable" };
    }

    const domain: EffectiveDomain = { ...this.baseDomain(parameter), model };

    if (override.range) {
      domain.range = { ...override.range };
      domain.rangeSource = "model";
    }

    const profile = this.catalog.models[model];
    let table = override.licenseLimits;
    if (override.capability) {
      const limit = profile?.limits?.[override.capability];
      const capabilityTable = profile?.licenses?.[override.capability];
      if (limit === undefined && capabilityTable === undefined) {
        throw this.defect({
          code: "unknown_capability",
          message: `model "${model}" declares no capability "${override.capability}"`,
          path: parameter.name,
        });
      }
      if (limit !== undefined) {
        domain.range = { min: domain.range?.min ?? 1, max: limit };
        domain.rangeSource = "capability";
      }
      table = table ?? capabilityTable;
    }

    if (table) {
      this.checkLicenseTable(parameter.name, model, table);
      domain.licenseTable = table;
      const applied = pickLicenseLimit(table, license);
      if (applied) {
        domain.range = { min: domain.range?.min ?? 1, max: applied.limit };
        domain.rangeSource = "license";
        domain.license = applied;
      }
    }

    this.checkRange(`${parameter.name}@${model}`, domain.range);
    return { status: "supported", domain };
  }

  private baseDomain(parameter: Parameter): EffectiveDomain {
    return {
      parameter: parameter.name,
      type: parameter.type,
      range: parameter.range ? { ...parameter.range } : undefined,
      rangeSource: parameter.range ? "base" : undefined,
      enumValues: parameter.enumValues,
      variants: parameter.variants,
      pattern: parameter.pattern,
      default: parameter.default,
    };
  }

  private availabilityFailure(parameter: Parameter, model: string, license: LicenseContext): string | undefined {
    const availability = parameter.availability;
    if (!availability) {
      return undefined;
    }
    if (availability.validFor && !availability.validFor.includes(model)) {
      return `only valid for ${availability.validFor.join(", ")}`;
    }
    if (availability.invalidFor?.includes(model)) {
      return `invalid for ${model}`;
    }
    if (availability.minFirmware) {
      const firmware = this.catalog.models[model]?.firmware;
      if (firmware && compareRevisions(firmware, availability.minFirmware) < 0) {
        return `requires firmware ${availability.minFirmware} (model has ${firmware})`;
      }
    }
    if (availability.requiresLicense && !((license[availability.requiresLicense] ?? 0) > 0)) {
      return `requires license ${availability.requiresLicense}`;
    }
    return undefined;
  }

  private checkRange(path: string, range: NumericRange | undefined): void {
    if (!range) return;
    if (!Number.isFinite(range.min) || !Number.isFinite(range.max) || range.min > range.max) {
      throw this.defect({
        code: "malformed_range",
        message: `range ${range.min}..${range.max} is not orderable`,
        path,
      });
    }
  }

  private checkLicenseTable(parameter: string, model: string, table: LicenseTable): void {
    for (const [sku, rows] of Object.entries(table)) {
      rows.forEach((limit, index) => {
        if (!Number.isInteger(limit) || (index > 0 && limit < rows[index - 1])) {
          throw this.defect({
            code: "malformed_license_table",
            message: `license ${sku} row ${index + 1} (${limit}) must be an integer not below the previous row`,
            path: `${parameter}@${model}`,
          });
        }
      });
    }
  }

  private defect(issue: SpecIssue): SpecDefectError {
    return new SpecDefectError(this.commandName, [issue]);
  }
}

/**
 * Highest limit among the SKUs present in both the table and the context.
 * Quantities beyond the table use its last row.
 */
export function pickLicenseLimit(table: LicenseTable, license: LicenseContext): LicenseLimit | undefined {
  let best: LicenseLimit | undefined;
  for (const [sku, rows] of Object.entries(table)) {
    const quantity = license[sku] ?? 0;
    if (quantity < 1 || rows.length === 0) continue;
    const limit = rows[Math.min(quantity, rows.length) - 1];
    if (!best || limit > best.limit) {
      best = { sku, quantity, limit };
    }
  }
  return best;
}

/**
 * Resolve an `auto` enum member against the other values of an assignment.
 * Returns undefined while the value it depends on is not assigned.
 */
export function resolveAuto(
  parameter: Parameter,
  value: ScalarValue,
  assignment: Record<string, ScalarValue>
): ScalarValue | undefined {
  const member = parameter.enumValues?.find((candidate) => candidate.value === String(value));
  if (!member?.auto) {
    return value;
  }
  const driver = assignment[member.auto.dependsOn];
  if (driver === undefined) {
    return undefined;
  }
  return member.auto.map[String(driver)] ?? member.auto.otherwise;
}
