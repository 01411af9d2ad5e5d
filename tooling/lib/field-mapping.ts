/**
 * Target-schema field mappings for parameters and their variants
 */

import { SpecDefectError, SpecIssue } from "./errors";
import { Command, Parameter, ParameterType, TargetField, TargetFieldType, Variant } from "./types";

export type ResolvedField = Required<Pick<TargetField, "name" | "type">> & Pick<TargetField, "enum" | "description">;

export type FieldMapping =
  | { kind: "single"; parameter: string; field: ResolvedField }
  | { kind: "discriminated"; parameter: string; selector: string; branches: Record<string, ResolvedField[]> }
  | { kind: "none"; parameter: string };

const TYPE_MAP: Record<ParameterType, TargetFieldType> = {
  string: "string",
  integer: "number",
  enum: "string",
  ipv4: "string",
  ip_range: "string",
  hex: "string",
};

function resolveField(field: TargetField, fallbackType: ParameterType, enumValues?: string[]): ResolvedField {
  const resolved: ResolvedField = { name: field.name, type: field.type ?? TYPE_MAP[fallbackType] };
  const values = field.enum ?? enumValues;
  if (values && values.length > 0) resolved.enum = [...values];
  if (field.description) resolved.description = field.description;
  return resolved;
}

function sameEnum(a: string[] | undefined, b: string[] | undefined): boolean {
  if (!a || !b) return a === b;
  return a.length === b.length && a.every((value, index) => value === b[index]);
}

export class FieldMappingEmitter {
  constructor(private commandName: string = "<unnamed>") {}

  emit(parameter: Parameter): FieldMapping {
    const members = parameter.enumValues?.map((m) => m.value);
    const binding = parameter.field;

    if (binding?.kind === "per-variant") {
      const branches: Record<string, ResolvedField[]> = {};
      for (const [variant, fields] of Object.entries(binding.fields)) {
        const owner = parameter.variants?.find((v) => v.name === variant);
        branches[variant] = fields.map((field) => resolveField(field, owner?.type ?? parameter.type));
      }
      return { kind: "discriminated", parameter: parameter.name, selector: parameter.name, branches };
    }

    const variantFields = (parameter.variants ?? []).filter((v) => v.field);
    if (variantFields.length > 0) {
      const branches: Record<string, ResolvedField[]> = {};
      for (const variant of parameter.variants ?? []) {
        branches[variant.name] = [this.emitVariant(parameter, variant)];
      }
      return { kind: "discriminated", parameter: parameter.name, selector: parameter.name, branches };
    }

    if (binding?.kind === "single") {
      return { kind: "single", parameter: parameter.name, field: resolveField(binding.field, parameter.type, members) };
    }
    return { kind: "none", parameter: parameter.name };
  }

  /**
   * Field of one variant; falls back to the parameter's own single field, then its name
   */
  emitVariant(parameter: Parameter, variant: Variant): ResolvedField {
    if (variant.field) {
      return resolveField(variant.field, variant.type);
    }
    if (parameter.field?.kind === "single") {
      return resolveField(parameter.field.field, variant.type);
    }
    return { name: parameter.name, type: TYPE_MAP[variant.type] };
  }

  /**
   * Mappings for every parameter, rejecting a field name reused with another type or enum set
   */
  emitTable(command: Command): FieldMapping[] {
    const mappings = command.parameters.map((parameter) => this.emit(parameter));
    const seen = new Map<string, { field: ResolvedField; parameter: string; owner: string }>();
    const issues: SpecIssue[] = [];

    // Branches of one parameter may narrow a shared field's enum; other parameters may not
    const check = (field: ResolvedField, parameter: string, owner: string) => {
      const previous = seen.get(field.name);
      if (!previous) {
        seen.set(field.name, { field, parameter, owner });
        return;
      }
      const enumClash = previous.parameter !== parameter && !sameEnum(previous.field.enum, field.enum);
      if (previous.field.type !== field.type || enumClash) {
        issues.push({
          code: "field_collision",
          message: `field "${field.name}" is bound by ${previous.owner} (${previous.field.type}) and ${owner} (${field.type}) with incompatible shapes`,
          path: `parameters.${parameter}`,
        });
      }
    };

    for (const mapping of mappings) {
      if (mapping.kind === "single") {
        check(mapping.field, mapping.parameter, mapping.parameter);
      } else if (mapping.kind === "discriminated") {
        for (const [variant, fields] of Object.entries(mapping.branches)) {
          fields.forEach((field) => check(field, mapping.parameter, `${mapping.parameter}/${variant}`));
        }
      }
    }

    if (issues.length > 0) {
      throw new SpecDefectError(this.commandName, issues);
    }
    return mappings;
  }
}
