/**
 * Parameter validators
 * Builds runtime checks and equivalent predicate source from an effective domain
 */

import { EffectiveDomain } from "./resolver";
import { NumericRange, ParameterType, ValidationResult, Variant } from "./types";

export type ParameterValidator = (value: unknown) => ValidationResult;

const IPV4_OCTET = "(25[0-5]|2[0-4]\\d|1\\d\\d|[1-9]?\\d)";
const IPV4_SOURCE = `${IPV4_OCTET}(\\.${IPV4_OCTET}){3}`;

export const TYPE_PATTERNS: Record<ParameterType, string | undefined> = {
  string: undefined,
  integer: "-?\\d+",
  enum: undefined,
  ipv4: IPV4_SOURCE,
  ip_range: `${IPV4_SOURCE}(-${IPV4_SOURCE})?`,
  hex: "0x[0-9a-fA-F]+",
};

export function toInteger(value: unknown): number | undefined {
  if (typeof value === "number") {
    return Number.isInteger(value) ? value : undefined;
  }
  if (typeof value === "string" && /^-?\d+$/.test(value.trim())) {
    return parseInt(value.trim(), 10);
  }
  return undefined;
}

function matchesWhole(pattern: string, text: string): boolean {
  return new RegExp(`^(?:${pattern})$`).test(text);
}

function checkRange(range: NumericRange | undefined, value: number, label: string): string[] {
  if (range && (value < range.min || value > range.max)) {
    return [`${label} ${value} is outside ${range.min}..${range.max}`];
  }
  return [];
}

function checkTyped(
  type: ParameterType,
  value: unknown,
  label: string,
  range?: NumericRange,
  pattern?: string
): string[] {
  if (type === "integer") {
    const parsed = toInteger(value);
    if (parsed === undefined) {
      return [`${label} must be an integer, got ${JSON.stringify(value)}`];
    }
    return checkRange(range, parsed, label);
  }

  if (typeof value !== "string" || value.length === 0) {
    return [`${label} must be a non-empty string`];
  }

  const typePattern = TYPE_PATTERNS[type];
  if (typePattern && !matchesWhole(typePattern, value)) {
    return [`${label} "${value}" is not a valid ${type}`];
  }
  if (pattern && !matchesWhole(pattern, value)) {
    return [`${label} "${value}" does not match /${pattern}/`];
  }
  return [];
}

/**
 * Strip a variant's keyword from a value written as "<keyword> <rest>"
 */
export function variantPayload(variant: Variant, value: unknown): unknown {
  if (!variant.keyword) {
    return value;
  }
  if (typeof value !== "string") {
    return undefined;
  }
  const prefix = `${variant.keyword} `;
  return value.startsWith(prefix) ? value.slice(prefix.length) : undefined;
}

function checkVariants(domain: EffectiveDomain, variants: Variant[], value: unknown): string[] {
  const errors: string[] = [];
  for (const variant of variants) {
    const payload = variantPayload(variant, value);
    if (payload === undefined) {
      errors.push(`variant ${variant.name}: expected "${variant.keyword} ..."`);
      continue;
    }
    const variantErrors = checkTyped(variant.type, payload, `${domain.parameter}/${variant.name}`, variant.range, variant.pattern);
    if (variantErrors.length === 0) {
      return [];
    }
    errors.push(...variantErrors);
  }
  return [`${domain.parameter} matches no variant: ${errors.join("; ")}`];
}

/**
 * Create a validator for a resolved domain
 */
export function createValidator(domain: EffectiveDomain): ParameterValidator {
  return (value: unknown): ValidationResult => {
    let errors: string[];

    if (domain.variants && domain.variants.length > 0) {
      errors = checkVariants(domain, domain.variants, value);
    } else if (domain.type === "enum") {
      const members = (domain.enumValues ?? []).map((member) => member.value);
      errors = members.includes(String(value))
        ? []
        : [`${domain.parameter} "${String(value)}" is not one of ${members.join(", ")}`];
    } else {
      errors = checkTyped(domain.type, value, domain.parameter, domain.range, domain.pattern);
    }

    return errors.length === 0 ? { ok: true } : { ok: false, errors };
  };
}

/**
 * Anchored regex literal for generated code; slashes in the pattern are escaped
 */
function regexLiteral(pattern: string): string {
  const escaped = pattern.replace(/\\.|\//g, (match) => (match === "/" ? "\\/" : match));
  return `/^(?:${escaped})$/`;
}

function typedPredicate(type: ParameterType, range?: NumericRange, pattern?: string, subject: string = "x"): string {
  if (type === "integer") {
    const parts = [`/^-?\\d+$/.test(String(${subject}))`];
    if (range) {
      parts.push(`Number(${subject}) >= ${range.min}`, `Number(${subject}) <= ${range.max}`);
    }
    return parts.join(" && ");
  }

  const parts = [`typeof ${subject} === "string"`];
  const typePattern = TYPE_PATTERNS[type];
  if (typePattern) {
    parts.push(`${regexLiteral(typePattern)}.test(${subject})`);
  }
  if (pattern) {
    parts.push(`${regexLiteral(pattern)}.test(${subject})`);
  }
  if (parts.length === 1) {
    parts.push(`${subject}.length > 0`);
  }
  return parts.join(" && ");
}

/**
 * JavaScript expression over `x` equivalent to createValidator(domain), for generated modules
 */
export function toPredicateSource(domain: EffectiveDomain): string {
  if (domain.variants && domain.variants.length > 0) {
    const branches = domain.variants.map((variant) => {
      if (!variant.keyword) {
        return `(${typedPredicate(variant.type, variant.range, variant.pattern)})`;
      }
      const prefix = JSON.stringify(`${variant.keyword} `);
      const payload = `String(x).slice(${prefix}.length)`;
      return `(String(x).startsWith(${prefix}) && ${typedPredicate(variant.type, variant.range, variant.pattern, payload)})`;
    });
    return branches.join(" || ");
  }

  if (domain.type === "enum") {
    const members = (domain.enumValues ?? []).map((member) => JSON.stringify(member.value));
    return `[${members.join(", ")}].includes(String(x))`;
  }

  return typedPredicate(domain.type, domain.range, domain.pattern);
}

/**
 * Regex source matching one command token for a type; used by the syntax codec
 */
export function tokenPattern(type: ParameterType, pattern?: string): RegExp | undefined {
  const source = pattern ?? TYPE_PATTERNS[type];
  return source ? new RegExp(`^(?:${source})$`) : undefined;
}
