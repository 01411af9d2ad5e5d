/**
 * Boundary test expansion
 * Turns declared boundary tests into concrete per-model cases and derives the
 * off-by-one, enum and license-tier cases every parameter should have.
 */

import { CoverageGap, SpecDefectError, SpecIssue } from "./errors";
import { EffectiveDomain, ParameterResolver } from "./resolver";
import { BoundaryTest, LicenseContext, NumericRange, Parameter, ScalarValue, Variant } from "./types";
import { stableStringify } from "./utils";

export type BoundaryOrigin = "declared" | "range" | "enum" | "license" | "variant";

export interface ConcreteBoundaryCase {
  parameter: string;
  value: ScalarValue;
  expectedValid: boolean;
  model?: string;
  license?: LicenseContext;
  variant?: string;
  origin: BoundaryOrigin;
  description: string;
  errorContains?: string;
  /** Effective domain on `model`, for declared cases scoped to a supported model */
  domain?: EffectiveDomain;
}

export interface ExpandOptions {
  models?: string[];
  license?: LicenseContext;
}

export interface ExpansionResult {
  cases: ConcreteBoundaryCase[];
  gaps: CoverageGap[];
  /** Models on which the parameter resolved as unsupported */
  skippedModels: string[];
}

export const INVALID_ENUM_TOKEN = "invalid-token";

/**
 * An arbitrary token outside the declared set
 */
export function outOfSetToken(members: string[]): string {
  let token = INVALID_ENUM_TOKEN;
  for (let suffix = 2; members.includes(token); suffix += 1) {
    token = `${INVALID_ENUM_TOKEN}-${suffix}`;
  }
  return token;
}

export function caseKey(c: Pick<ConcreteBoundaryCase, "value" | "model" | "license" | "variant">): string {
  return `${c.model ?? "*"}|${c.variant ?? ""}|${String(c.value)}|${stableStringify(c.license ?? {})}`;
}

export class BoundaryExpander {
  constructor(
    private resolver: ParameterResolver,
    private commandName: string = "<unnamed>"
  ) {}

  expand(parameter: Parameter, declared: BoundaryTest[] = [], options: ExpandOptions = {}): ExpansionResult {
    const models = options.models ?? [];
    const license = options.license ?? {};
    const cases = this.expandDeclared(parameter, declared, license);
    const gaps: CoverageGap[] = [];
    const skippedModels: string[] = [];

    if (parameter.autoBoundaries) {
      const scoped = models.length > 0 && (Object.keys(parameter.modelOverrides).length > 0 || !!parameter.availability);
      const targets: (string | undefined)[] = scoped ? models : [undefined];

      for (const model of targets) {
        const resolution = this.resolver.resolve(parameter, model, license);
        if (resolution.status === "unsupported") {
          skippedModels.push(resolution.model);
          continue;
        }
        const derived = this.derive(parameter, resolution.domain, license, gaps);
        cases.push(...derived);
      }
    }

    // A declared value replaces the derived cases for the same value on its model,
    // or on every model and license tier when it is unscoped
    const declaredValues = new Set(
      cases.filter((c) => c.origin === "declared").map((c) => `${c.model ?? "*"}|${String(c.value)}`)
    );
    const overridden = (c: ConcreteBoundaryCase) =>
      c.origin !== "declared" &&
      (declaredValues.has(`*|${String(c.value)}`) || declaredValues.has(`${c.model ?? "*"}|${String(c.value)}`));

    const seen = new Set<string>();
    const merged = cases.filter((c) => {
      if (overridden(c)) return false;
      const key = caseKey(c);
      if (seen.has(key)) return false;
      seen.add(key);
      return true;
    });

    return { cases: merged, gaps, skippedModels };
  }

  private expandDeclared(parameter: Parameter, declared: BoundaryTest[], license: LicenseContext): ConcreteBoundaryCase[] {
    const issues: SpecIssue[] = [];
    const cases: ConcreteBoundaryCase[] = [];
    const members = parameter.type === "enum" ? (parameter.enumValues ?? []).map((m) => m.value) : undefined;

    for (const test of declared) {
      if (members && test.valid && !members.includes(String(test.value))) {
        issues.push({
          code: "enum_violation",
          message: `boundary value "${String(test.value)}" is declared valid but is not an enum member`,
          path: `boundary_tests.${parameter.name}`,
        });
        continue;
      }

      const base = {
        parameter: parameter.name,
        value: test.value,
        origin: "declared" as const,
        description: test.description ?? `declared ${test.valid ? "valid" : "invalid"} value ${String(test.value)}`,
        errorContains: test.errorContains,
      };

      if (!test.validFor && !test.invalidFor) {
        cases.push({ ...base, expectedValid: test.valid });
        continue;
      }

      const scoped: [string[] | undefined, boolean][] = [
        [test.validFor, true],
        [test.invalidFor, false],
      ];
      for (const [list, expectedValid] of scoped) {
        for (const model of list ?? []) {
          if (!this.resolver.isKnownModel(model)) {
            issues.push({ code: "unknown_model", message: `unknown model "${model}"`, path: `boundary_tests.${parameter.name}` });
            continue;
          }
          const resolution = this.resolver.resolve(parameter, model, license);
          if (resolution.status === "unsupported") {
            if (expectedValid) {
              issues.push({
                code: "unsupported_model",
                message: `value ${String(test.value)} is declared valid on ${model}, where the parameter is unavailable (${resolution.reason})`,
                path: `boundary_tests.${parameter.name}`,
              });
              continue;
            }
            cases.push({ ...base, model, expectedValid });
            continue;
          }
          cases.push({ ...base, model, expectedValid, domain: resolution.domain });
        }
      }
    }

    if (issues.length > 0) {
      throw new SpecDefectError(this.commandName, issues);
    }
    return cases;
  }

  private derive(
    parameter: Parameter,
    domain: EffectiveDomain,
    license: LicenseContext,
    gaps: CoverageGap[]
  ): ConcreteBoundaryCase[] {
    const model = domain.model;
    const gap = (reason: string) => gaps.push({ command: this.commandName, parameter: parameter.name, model, reason });

    if (domain.variants && domain.variants.length > 0) {
      return domain.variants.flatMap((variant) => this.deriveVariant(parameter, variant, model, gap));
    }

    if (domain.type === "enum") {
      const members = (domain.enumValues ?? []).map((member) => member.value);
      if (members.length === 0) {
        gap("enum parameter declares no values");
        return [];
      }
      const valid = (domain.enumValues ?? []).map((member) => ({
        parameter: parameter.name,
        value: member.value,
        expectedValid: true,
        model,
        origin: "enum" as const,
        description: member.auto ? `deferred value ${member.value}` : `enum value ${member.value}`,
      }));
      const token = outOfSetToken(members);
      return [
        ...valid,
        { parameter: parameter.name, value: token, expectedValid: false, model, origin: "enum", description: `unlisted token ${token}` },
      ];
    }

    if (domain.type !== "integer") {
      return [];
    }

    if (!domain.range) {
      gap("integer parameter has no range to derive boundaries from");
      return [];
    }

    const hasContext = Object.keys(license).length > 0;
    const licenseTag = hasContext && domain.license ? { ...license } : undefined;
    const cases = canonicalCases(parameter.name, domain.range, model, "range").map((c) => ({ ...c, license: licenseTag }));

    if (domain.license) {
      cases.push({
        parameter: parameter.name,
        value: domain.license.limit - 1,
        expectedValid: true,
        model,
        license: licenseTag,
        origin: "license",
        description: `just below ${domain.license.sku} x${domain.license.quantity} limit`,
      });
    }

    // Tiers of every SKU the context did not select get their own limit pair
    if (domain.licenseTable) {
      for (const [sku, rows] of Object.entries(domain.licenseTable)) {
        if (sku === domain.license?.sku) continue;
        if (rows.length === 0) {
          gap(`license table for ${sku} has no tiers`);
          continue;
        }
        rows.forEach((limit, index) => {
          const tier = { [sku]: index + 1 };
          cases.push(
            {
              parameter: parameter.name,
              value: limit,
              expectedValid: true,
              model,
              license: tier,
              origin: "license",
              description: `${sku} x${index + 1} limit`,
            },
            {
              parameter: parameter.name,
              value: limit + 1,
              expectedValid: false,
              model,
              license: tier,
              origin: "license",
              description: `above ${sku} x${index + 1} limit`,
            }
          );
        });
      }
    }

    return cases;
  }

  private deriveVariant(
    parameter: Parameter,
    variant: Variant,
    model: string | undefined,
    gap: (reason: string) => void
  ): ConcreteBoundaryCase[] {
    if (variant.type !== "integer") {
      return [];
    }
    if (!variant.range) {
      gap(`integer variant ${variant.name} has no range`);
      return [];
    }
    return canonicalCases(parameter.name, variant.range, model, "variant").map((c) => ({
      ...c,
      value: variant.keyword ? `${variant.keyword} ${c.value}` : c.value,
      variant: variant.name,
    }));
  }
}

/**
 * min-1 invalid, min valid, max valid, max+1 invalid
 */
export function canonicalCases(
  parameter: string,
  range: NumericRange,
  model: string | undefined,
  origin: BoundaryOrigin
): ConcreteBoundaryCase[] {
  const points: [number, boolean, string][] = [
    [range.min - 1, false, "below minimum"],
    [range.min, true, "minimum"],
    [range.max, true, "maximum"],
    [range.max + 1, false, "above maximum"],
  ];
  return points.map(([value, expectedValid, label]) => ({
    parameter,
    value,
    expectedValid,
    model,
    origin,
    description: `${label} (${value})`,
  }));
}
