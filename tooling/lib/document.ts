/**
 * YAML command documents
 * Reads the snake_case document format and normalizes it into a Command. Only the shape
 * is checked here; semantic checks live in spec-model.ts.
 */

import * as fs from "fs";
import { parse as parseYaml, YAMLParseError } from "yaml";
import { SpecDefectError, SpecIssue } from "./errors";
import {
  AutoRule,
  BoundaryTest,
  Command,
  Condition,
  EnumValue,
  FieldBinding,
  ModelConstraint,
  ModelOverride,
  NumericRange,
  PairwiseConstraint,
  PairwiseSpec,
  Parameter,
  ParameterType,
  ScalarValue,
  SpecLoader,
  StructuredMapping,
  StructuredRecord,
  SyntaxDirection,
  SyntaxTest,
  TargetField,
  TargetFieldType,
  Variant,
} from "./types";
import { isPlainObject, isScalar } from "./utils";

const TYPE_ALIASES: Record<string, ParameterType> = {
  string: "string",
  text: "string",
  integer: "integer",
  int: "integer",
  number: "integer",
  enum: "enum",
  ipv4: "ipv4",
  ip: "ipv4",
  ip_address: "ipv4",
  ip_range: "ip_range",
  hex: "hex",
};

const FIELD_TYPES: TargetFieldType[] = ["string", "number", "bool", "list"];

/** Keys of a parameter's model_constraints that are not model names */
const CONSTRAINT_KEYS = new Set(["valid_for", "invalid_for", "min_firmware", "requires_license", "unavailable"]);

/**
 * Split a condition such as `pfs=on && strictly=on|auto` into conditions
 */
export function parseConditions(text: string): Condition[] | undefined {
  const terms = text.split("&&").map((term) => term.trim()).filter((term) => term.length > 0);
  const conditions: Condition[] = [];
  for (const term of terms) {
    const match = /^([A-Za-z_][\w-]*)\s*==?\s*(.+)$/.exec(term);
    if (!match) return undefined;
    const values = match[2].split("|").map((value) => value.trim()).filter((value) => value.length > 0);
    if (values.length === 0) return undefined;
    conditions.push({ param: match[1], values });
  }
  return conditions;
}

/**
 * Parse the consequence of a requires rule: `peer_pfs=on|auto` or `peer_pfs=$pfs`
 */
export function parseRequirement(text: string): { param: string; oneOf: ScalarValue[] } | { param: string; sameAs: string } | undefined {
  const conditions = parseConditions(text);
  if (!conditions || conditions.length !== 1) return undefined;
  const [condition] = conditions;
  const only = condition.values.length === 1 ? String(condition.values[0]) : undefined;
  if (only?.startsWith("$")) {
    return { param: condition.param, sameAs: only.slice(1) };
  }
  return { param: condition.param, oneOf: condition.values };
}

/**
 * Collects shape issues while walking a document
 */
class DocumentReader {
  readonly issues: SpecIssue[] = [];

  problem(path: string, message: string): void {
    this.issues.push({ code: "malformed_document", message, path });
  }

  object(value: unknown, path: string): Record<string, unknown> {
    if (value === undefined || value === null) return {};
    if (!isPlainObject(value)) {
      this.problem(path, "expected a mapping");
      return {};
    }
    return value;
  }

  string(value: unknown, path: string): string | undefined {
    if (value === undefined || value === null) return undefined;
    if (typeof value === "string") return value;
    if (typeof value === "number" || typeof value === "boolean") return String(value);
    this.problem(path, "expected a string");
    return undefined;
  }

  number(value: unknown, path: string): number | undefined {
    if (value === undefined || value === null) return undefined;
    if (typeof value === "number" && Number.isFinite(value)) return value;
    if (typeof value === "string" && /^-?\d+$/.test(value.trim())) return Number(value);
    this.problem(path, "expected a number");
    return undefined;
  }

  boolean(value: unknown, path: string, fallback: boolean): boolean {
    if (value === undefined || value === null) return fallback;
    if (typeof value === "boolean") return value;
    this.problem(path, "expected true or false");
    return fallback;
  }

  scalar(value: unknown, path: string): ScalarValue | undefined {
    if (value === undefined || value === null) return undefined;
    if (isScalar(value)) return value;
    this.problem(path, "expected a scalar value");
    return undefined;
  }

  /** A string or list of strings, always returned as a list */
  strings(value: unknown, path: string): string[] {
    if (value === undefined || value === null) return [];
    const items = Array.isArray(value) ? value : [value];
    const result: string[] = [];
    items.forEach((item, index) => {
      const text = this.string(item, Array.isArray(value) ? `${path}[${index}]` : path);
      if (text !== undefined) result.push(text);
    });
    return result;
  }

  list(value: unknown, path: string): unknown[] {
    if (value === undefined || value === null) return [];
    if (!Array.isArray(value)) {
      this.problem(path, "expected a list");
      return [];
    }
    return value;
  }

  range(value: unknown, path: string): NumericRange | undefined {
    if (value === undefined || value === null) return undefined;
    if (Array.isArray(value) && value.length === 2) {
      const min = this.number(value[0], `${path}[0]`);
      const max = this.number(value[1], `${path}[1]`);
      return min !== undefined && max !== undefined ? { min, max } : undefined;
    }
    if (isPlainObject(value)) {
      const min = this.number(value.min, `${path}.min`);
      const max = this.number(value.max, `${path}.max`);
      return min !== undefined && max !== undefined ? { min, max } : undefined;
    }
    this.problem(path, "expected [min, max]");
    return undefined;
  }

  parameterType(value: unknown, path: string, fallback: ParameterType): ParameterType {
    const raw = this.string(value, path);
    if (raw === undefined) return fallback;
    const type = TYPE_ALIASES[raw.toLowerCase()];
    if (!type) {
      this.problem(path, `unknown parameter type "${raw}"`);
      return fallback;
    }
    return type;
  }

  field(value: unknown, path: string): TargetField | undefined {
    if (value === undefined || value === null) return undefined;
    if (typeof value === "string") return { name: value };
    if (!isPlainObject(value)) {
      this.problem(path, "expected a field name or field mapping");
      return undefined;
    }
    const name = this.string(value.name, `${path}.name`);
    if (!name) {
      this.problem(path, "field has no name");
      return undefined;
    }
    const field: TargetField = { name };
    const type = this.string(value.type, `${path}.type`);
    if (type !== undefined) {
      const known = FIELD_TYPES.find((candidate) => candidate === type);
      if (known) field.type = known;
      else this.problem(`${path}.type`, `unknown field type "${type}"`);
    }
    if (value.enum !== undefined) field.enum = this.strings(value.enum, `${path}.enum`);
    const description = this.string(value.description, `${path}.description`);
    if (description) field.description = description;
    return field;
  }

  record(value: unknown, path: string): StructuredRecord {
    const record: StructuredRecord = {};
    for (const [key, entry] of Object.entries(this.object(value, path))) {
      const scalar = this.scalar(entry, `${path}.${key}`);
      if (scalar !== undefined) record[key] = scalar;
    }
    return record;
  }
}

function readAuto(reader: DocumentReader, value: unknown, path: string): AutoRule | undefined {
  if (value === undefined || value === null) return undefined;
  const raw = reader.object(value, path);
  const dependsOn = reader.string(raw.depends_on, `${path}.depends_on`);
  const otherwise = reader.scalar(raw.otherwise, `${path}.otherwise`);
  if (!dependsOn || otherwise === undefined) {
    reader.problem(path, "auto needs depends_on and otherwise");
    return undefined;
  }
  const map: Record<string, ScalarValue> = {};
  for (const [key, entry] of Object.entries(reader.object(raw.map, `${path}.map`))) {
    const scalar = reader.scalar(entry, `${path}.map.${key}`);
    if (scalar !== undefined) map[key] = scalar;
  }
  return { dependsOn, map, otherwise };
}

function readEnumValues(reader: DocumentReader, value: unknown, path: string): EnumValue[] | undefined {
  if (value === undefined || value === null) return undefined;
  return reader.list(value, path).flatMap((item, index): EnumValue[] => {
    const itemPath = `${path}[${index}]`;
    if (isScalar(item)) return [{ value: String(item), description: "" }];
    const raw = reader.object(item, itemPath);
    const member = reader.string(raw.value, `${itemPath}.value`);
    if (member === undefined) {
      reader.problem(itemPath, "enum value has no value");
      return [];
    }
    const entry: EnumValue = { value: member, description: reader.string(raw.description, `${itemPath}.description`) ?? "" };
    const auto = readAuto(reader, raw.auto, `${itemPath}.auto`);
    if (auto) entry.auto = auto;
    return [entry];
  });
}

function readVariants(reader: DocumentReader, value: unknown, path: string): Variant[] | undefined {
  if (value === undefined || value === null) return undefined;
  return reader.list(value, path).map((item, index) => {
    const itemPath = `${path}[${index}]`;
    const raw = reader.object(item, itemPath);
    const type = reader.parameterType(raw.type, `${itemPath}.type`, "string");
    const keyword = reader.string(raw.keyword ?? raw.value, `${itemPath}.keyword`);
    const variant: Variant = { name: reader.string(raw.name, `${itemPath}.name`) ?? keyword ?? type, type };
    if (keyword) variant.keyword = keyword;
    const pattern = reader.string(raw.pattern, `${itemPath}.pattern`);
    if (pattern) variant.pattern = pattern;
    const range = reader.range(raw.range, `${itemPath}.range`);
    if (range) variant.range = range;
    const description = reader.string(raw.description, `${itemPath}.description`);
    if (description) variant.description = description;
    const field = reader.field(raw.terraform_field, `${itemPath}.terraform_field`);
    if (field) variant.field = field;
    return variant;
  });
}

function readModelConstraint(reader: DocumentReader, raw: Record<string, unknown>, path: string): ModelConstraint | undefined {
  const constraint: ModelConstraint = {};
  const validFor = reader.strings(raw.valid_for, `${path}.valid_for`);
  const invalidFor = [
    ...reader.strings(raw.invalid_for, `${path}.invalid_for`),
    ...reader.strings(raw.unavailable, `${path}.unavailable`),
  ];
  if (validFor.length > 0) constraint.validFor = validFor;
  if (invalidFor.length > 0) constraint.invalidFor = invalidFor;
  const minFirmware = reader.string(raw.min_firmware, `${path}.min_firmware`);
  if (minFirmware) constraint.minFirmware = minFirmware;
  const requiresLicense = reader.string(raw.requires_license, `${path}.requires_license`);
  if (requiresLicense) constraint.requiresLicense = requiresLicense;
  return Object.keys(constraint).length > 0 ? constraint : undefined;
}

function readOverride(reader: DocumentReader, value: unknown, path: string): ModelOverride {
  if (value === false || value === "unavailable") return { unavailable: true };
  const raw = reader.object(value, path);
  const override: ModelOverride = {};
  const range = reader.range(raw.range, `${path}.range`);
  if (range) override.range = range;
  if (raw.unavailable !== undefined) override.unavailable = reader.boolean(raw.unavailable, `${path}.unavailable`, false);
  const capability = reader.string(raw.capability, `${path}.capability`);
  if (capability) override.capability = capability;
  if (raw.license_limits !== undefined) {
    const table: Record<string, number[]> = {};
    for (const [sku, rows] of Object.entries(reader.object(raw.license_limits, `${path}.license_limits`))) {
      // row values are checked by the resolver, which knows the model
      table[sku] = reader.list(rows, `${path}.license_limits.${sku}`).map((row) => (typeof row === "number" ? row : Number.NaN));
    }
    override.licenseLimits = table;
  }
  const note = reader.string(raw.note, `${path}.note`);
  if (note) override.note = note;
  return override;
}

function readFieldBinding(reader: DocumentReader, raw: Record<string, unknown>, path: string): FieldBinding | undefined {
  if (raw.terraform_fields !== undefined) {
    const fields: Record<string, TargetField[]> = {};
    for (const [variant, entry] of Object.entries(reader.object(raw.terraform_fields, `${path}.terraform_fields`))) {
      const entryPath = `${path}.terraform_fields.${variant}`;
      const items = Array.isArray(entry) ? entry : [entry];
      fields[variant] = items.flatMap((item, index) => {
        const field = reader.field(item, `${entryPath}[${index}]`);
        return field ? [field] : [];
      });
    }
    return { kind: "per-variant", fields };
  }
  const field = reader.field(raw.terraform_field, `${path}.terraform_field`);
  return field ? { kind: "single", field } : undefined;
}

function readParameter(reader: DocumentReader, name: string, value: unknown): Parameter {
  const path = `parameters.${name}`;
  const raw = reader.object(value, path);
  const enumValues = readEnumValues(reader, raw.enum_values, `${path}.enum_values`);
  const range = reader.range(raw.range, `${path}.range`);
  const inferred: ParameterType = enumValues ? "enum" : range ? "integer" : "string";

  const parameter: Parameter = {
    name,
    type: reader.parameterType(raw.type, `${path}.type`, inferred),
    required: reader.boolean(raw.required, `${path}.required`, false),
    modelOverrides: {},
    autoBoundaries: reader.boolean(raw.auto_boundaries, `${path}.auto_boundaries`, true),
  };

  const description = reader.string(raw.description, `${path}.description`);
  if (description) parameter.description = description;
  const fallback = reader.scalar(raw.default, `${path}.default`);
  if (fallback !== undefined) parameter.default = fallback;
  if (range) parameter.range = range;
  const pattern = reader.string(raw.pattern, `${path}.pattern`);
  if (pattern) parameter.pattern = pattern;
  if (enumValues) parameter.enumValues = enumValues;
  const variants = readVariants(reader, raw.variants, `${path}.variants`);
  if (variants) parameter.variants = variants;

  const constraints = reader.object(raw.model_constraints, `${path}.model_constraints`);
  const availability = readModelConstraint(reader, { ...constraints, unavailable: undefined }, `${path}.model_constraints`);
  if (availability) parameter.availability = availability;
  for (const model of reader.strings(constraints.unavailable, `${path}.model_constraints.unavailable`)) {
    parameter.modelOverrides[model] = { unavailable: true };
  }
  for (const [key, entry] of Object.entries(constraints)) {
    if (CONSTRAINT_KEYS.has(key)) continue;
    parameter.modelOverrides[key] = { ...parameter.modelOverrides[key], ...readOverride(reader, entry, `${path}.model_constraints.${key}`) };
  }

  const field = readFieldBinding(reader, raw, path);
  if (field) parameter.field = field;
  return parameter;
}

function readMapping(reader: DocumentReader, value: unknown, path: string): StructuredMapping {
  if (Array.isArray(value)) {
    return { kind: "multi", records: value.map((item, index) => reader.record(item, `${path}[${index}]`)) };
  }
  return { kind: "single", record: reader.record(value, path) };
}

function readSyntaxTests(reader: DocumentReader, value: unknown, path: string): SyntaxTest[] {
  return reader.list(value, path).map((item, index) => {
    const itemPath = `${path}[${index}]`;
    const raw = reader.object(item, itemPath);
    const text = reader.string(raw.rtx ?? raw.text, `${itemPath}.rtx`) ?? "";
    const parseOnly = reader.boolean(raw.parse_only, `${itemPath}.parse_only`, false);
    const buildOnly = reader.boolean(raw.build_only, `${itemPath}.build_only`, false);
    const bidirectional = reader.boolean(raw.bidirectional, `${itemPath}.bidirectional`, !(parseOnly || buildOnly));

    let direction: SyntaxDirection = "bidirectional";
    if (parseOnly && buildOnly) {
      reader.problem(itemPath, "parse_only and build_only are exclusive");
    } else if (parseOnly || (!bidirectional && !buildOnly)) {
      direction = "parse";
    } else if (buildOnly) {
      direction = "build";
    }

    const formRaw = reader.string(raw.form, `${itemPath}.form`);
    if (formRaw !== undefined && formRaw !== "set" && formRaw !== "delete") {
      reader.problem(`${itemPath}.form`, `unknown form "${formRaw}"`);
    }
    const test: SyntaxTest = {
      name: reader.string(raw.name, `${itemPath}.name`) ?? `${path}-${index + 1}`,
      text,
      structured: readMapping(reader, raw.terraform ?? raw.structured, `${itemPath}.terraform`),
      direction,
      form: formRaw === "delete" || (formRaw === undefined && /^no\s/.test(text.trim())) ? "delete" : "set",
    };
    const models = readModelConstraint(reader, reader.object(raw.model_constraints, `${itemPath}.model_constraints`), `${itemPath}.model_constraints`);
    if (models) test.models = models;
    const note = reader.string(raw.note ?? raw.description, `${itemPath}.note`);
    if (note) test.note = note;
    return test;
  });
}

function readBoundaries(reader: DocumentReader, value: unknown): Record<string, BoundaryTest[]> {
  const boundaries: Record<string, BoundaryTest[]> = {};
  for (const [param, tests] of Object.entries(reader.object(value, "boundary_tests"))) {
    boundaries[param] = reader.list(tests, `boundary_tests.${param}`).flatMap((item, index): BoundaryTest[] => {
      const path = `boundary_tests.${param}[${index}]`;
      const raw = reader.object(item, path);
      const scalar = reader.scalar(raw.value, `${path}.value`);
      if (scalar === undefined) {
        reader.problem(path, "boundary test has no value");
        return [];
      }
      const test: BoundaryTest = { value: scalar, valid: reader.boolean(raw.valid, `${path}.valid`, false) };
      const description = reader.string(raw.description, `${path}.description`);
      if (description) test.description = description;
      const errorContains = reader.string(raw.error_contains, `${path}.error_contains`);
      if (errorContains) test.errorContains = errorContains;
      const validFor = reader.strings(raw.valid_for, `${path}.valid_for`);
      if (validFor.length > 0) test.validFor = validFor;
      const invalidFor = reader.strings(raw.invalid_for, `${path}.invalid_for`);
      if (invalidFor.length > 0) test.invalidFor = invalidFor;
      return [test];
    });
  }
  return boundaries;
}

function readPairwise(reader: DocumentReader, value: unknown): PairwiseSpec | undefined {
  if (value === undefined || value === null) return undefined;
  const raw = reader.object(value, "pairwise");
  if (!reader.boolean(raw.enabled, "pairwise.enabled", true)) return undefined;

  const values: Record<string, ScalarValue[]> = {};
  for (const [param, entries] of Object.entries(reader.object(raw.parameter_values, "pairwise.parameter_values"))) {
    values[param] = reader.list(entries, `pairwise.parameter_values.${param}`).flatMap((entry, index) => {
      const scalar = reader.scalar(entry, `pairwise.parameter_values.${param}[${index}]`);
      return scalar === undefined ? [] : [scalar];
    });
  }

  const constraints = reader.list(raw.constraints, "pairwise.constraints").flatMap((item, index): PairwiseConstraint[] => {
    const path = `pairwise.constraints[${index}]`;
    const entry = reader.object(item, path);
    const conditionText = reader.string(entry.condition, `${path}.condition`);
    const when = conditionText === undefined ? [] : parseConditions(conditionText);
    if (!when) {
      reader.problem(`${path}.condition`, `cannot read condition "${conditionText ?? ""}"`);
      return [];
    }
    const priority = reader.number(entry.priority, `${path}.priority`);
    const description = reader.string(entry.description, `${path}.description`);
    const extras = { ...(priority !== undefined ? { priority } : {}), ...(description ? { description } : {}) };
    const rules: PairwiseConstraint[] = [];

    const requiresText = reader.string(entry.requires, `${path}.requires`);
    if (requiresText !== undefined) {
      const then = parseRequirement(requiresText);
      if (then) rules.push({ kind: "requires", when, then, ...extras });
      else reader.problem(`${path}.requires`, `cannot read requirement "${requiresText}"`);
    }
    const models = reader.strings(entry.invalid_for, `${path}.invalid_for`);
    if (models.length > 0) rules.push({ kind: "invalid_for", when, models, ...extras });
    if (requiresText === undefined && models.length === 0) {
      reader.problem(path, "constraint needs requires or invalid_for");
    }
    return rules;
  });

  return { parameters: reader.strings(raw.parameters, "pairwise.parameters"), values, constraints };
}

/**
 * Normalize a parsed document (with or without the top-level `command:` key)
 */
export function readCommandDocument(document: unknown, origin: string = "<document>"): Command {
  const reader = new DocumentReader();
  const root = reader.object(document, "");
  const raw = isPlainObject(root.command) ? root.command : root;
  const name = reader.string(raw.name, "name") ?? "";

  const syntax = reader.object(raw.syntax, "syntax");
  const command: Command = {
    name,
    description: reader.string(raw.description, "description") ?? "",
    syntax: {
      set: reader.strings(syntax.set, "syntax.set"),
      delete: reader.strings(syntax.delete, "syntax.delete"),
    },
    parameters: Object.entries(reader.object(raw.parameters, "parameters")).map(([key, value]) => readParameter(reader, key, value)),
    models: reader.strings(raw.applicable_models, "applicable_models"),
    tests: {
      syntax: readSyntaxTests(reader, raw.syntax_tests, "syntax_tests"),
      multiline: readSyntaxTests(reader, raw.multiline_tests, "multiline_tests"),
      boundaries: readBoundaries(reader, raw.boundary_tests),
    },
    notes: reader.strings(raw.notes, "notes"),
  };
  const pairwise = readPairwise(reader, raw.pairwise);
  if (pairwise) command.tests.pairwise = pairwise;

  if (reader.issues.length > 0) {
    throw new SpecDefectError(name || origin, reader.issues);
  }
  return command;
}

export class YamlSpecLoader implements SpecLoader {
  loadSpec(source: string, origin: string = "<yaml>"): Command {
    let document: unknown;
    try {
      document = parseYaml(source);
    } catch (error) {
      if (!(error instanceof YAMLParseError)) throw error;
      throw new SpecDefectError(origin, [{ code: "malformed_document", message: error.message }]);
    }
    return readCommandDocument(document, origin);
  }

  loadFile(filePath: string): Command {
    return this.loadSpec(fs.readFileSync(filePath, "utf-8"), filePath);
  }
}
