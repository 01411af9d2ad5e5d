/**
 * Semantic checks over a loaded command
 * The loader only guarantees shape; everything that makes a command self-inconsistent
 * is reported here as a specification defect.
 */

import { SpecDefectError, SpecIssue } from "./errors";
import { compileTemplate, TemplateError } from "./syntax";
import { CapabilityCatalog, Command, ModelConstraint, NumericRange, Parameter } from "./types";

function checkRange(range: NumericRange | undefined, path: string, issues: SpecIssue[]): void {
  if (range && !(range.min <= range.max)) {
    issues.push({ code: "malformed_range", message: `range ${range.min}..${range.max} is not orderable`, path });
  }
}

function checkModels(models: string[] | undefined, known: string[], path: string, issues: SpecIssue[]): void {
  if (known.length === 0) return;
  for (const model of models ?? []) {
    if (!known.includes(model)) {
      issues.push({ code: "unknown_model", message: `unknown model "${model}"`, path });
    }
  }
}

function checkModelConstraint(constraint: ModelConstraint | undefined, known: string[], path: string, issues: SpecIssue[]): void {
  if (!constraint) return;
  checkModels(constraint.validFor, known, `${path}.valid_for`, issues);
  checkModels(constraint.invalidFor, known, `${path}.invalid_for`, issues);
}

function checkParameter(parameter: Parameter, known: string[], issues: SpecIssue[]): void {
  const path = `parameters.${parameter.name}`;
  checkRange(parameter.range, `${path}.range`, issues);
  checkModelConstraint(parameter.availability, known, `${path}.model_constraints`, issues);

  for (const [model, override] of Object.entries(parameter.modelOverrides)) {
    checkModels([model], known, `${path}.model_constraints`, issues);
    checkRange(override.range, `${path}.model_constraints.${model}.range`, issues);
  }

  const members = parameter.enumValues?.map((m) => m.value);
  if (parameter.type === "enum" && (!members || members.length === 0)) {
    issues.push({ code: "enum_violation", message: "enum parameter declares no values", path });
  }
  if (members && parameter.default !== undefined && !members.includes(String(parameter.default))) {
    issues.push({
      code: "enum_violation",
      message: `default "${String(parameter.default)}" is not one of ${members.join(", ")}`,
      path: `${path}.default`,
    });
  }
  if (members && new Set(members).size !== members.length) {
    issues.push({ code: "enum_violation", message: "enum values repeat", path: `${path}.enum_values` });
  }

  for (const member of parameter.enumValues ?? []) {
    if (member.auto && member.auto.dependsOn === parameter.name) {
      issues.push({ code: "unknown_parameter", message: `"${member.value}" cannot depend on its own parameter`, path });
    }
  }

  const variantNames = (parameter.variants ?? []).map((v) => v.name);
  if (new Set(variantNames).size !== variantNames.length) {
    issues.push({ code: "duplicate_variant", message: "variant names repeat", path: `${path}.variants` });
  }
  for (const variant of parameter.variants ?? []) {
    checkRange(variant.range, `${path}.variants.${variant.name}.range`, issues);
  }
  if (parameter.field?.kind === "per-variant") {
    for (const variant of Object.keys(parameter.field.fields)) {
      if (!variantNames.includes(variant)) {
        issues.push({ code: "unknown_parameter", message: `field binding names unknown variant "${variant}"`, path: `${path}.terraform_fields` });
      }
    }
  }
}

/**
 * All semantic issues of a command; an empty list means it can be generated from
 */
export function collectSpecIssues(command: Command, catalog?: CapabilityCatalog): SpecIssue[] {
  const issues: SpecIssue[] = [];
  const known = catalog ? Object.keys(catalog.models) : [];
  const names = command.parameters.map((p) => p.name);
  const declared = new Set(names);
  const requireParam = (name: string, path: string) => {
    if (!declared.has(name)) {
      issues.push({ code: "unknown_parameter", message: `unknown parameter "${name}"`, path });
    }
  };

  if (command.name.trim().length === 0) {
    issues.push({ code: "empty_name", message: "command name is empty", path: "name" });
  }
  if (command.syntax.set.length === 0) {
    issues.push({ code: "missing_syntax", message: "at least one set form is required", path: "syntax.set" });
  }
  if (declared.size !== names.length) {
    const repeated = names.filter((name, index) => names.indexOf(name) !== index);
    issues.push({ code: "duplicate_parameter", message: `parameters repeat: ${repeated.join(", ")}`, path: "parameters" });
  }

  checkModels(command.models, known, "applicable_models", issues);

  for (const form of ["set", "delete"] as const) {
    command.syntax[form].forEach((source, index) => {
      try {
        for (const param of compileTemplate(source).params) {
          requireParam(param, `syntax.${form}[${index}]`);
        }
      } catch (error) {
        if (!(error instanceof TemplateError)) throw error;
        issues.push({ code: "malformed_template", message: error.message, path: `syntax.${form}[${index}]` });
      }
    });
  }

  for (const parameter of command.parameters) {
    checkParameter(parameter, known, issues);
    for (const member of parameter.enumValues ?? []) {
      if (member.auto) requireParam(member.auto.dependsOn, `parameters.${parameter.name}.enum_values`);
    }
  }

  for (const [param, tests] of Object.entries(command.tests.boundaries)) {
    requireParam(param, `boundary_tests.${param}`);
    tests.forEach((test, index) => {
      checkModels(test.validFor, known, `boundary_tests.${param}[${index}].valid_for`, issues);
      checkModels(test.invalidFor, known, `boundary_tests.${param}[${index}].invalid_for`, issues);
    });
  }

  for (const test of [...command.tests.syntax, ...command.tests.multiline]) {
    checkModelConstraint(test.models, known, `syntax_tests.${test.name}`, issues);
  }

  const pairwise = command.tests.pairwise;
  if (pairwise) {
    pairwise.parameters.forEach((param) => requireParam(param, "pairwise.parameters"));
    for (const name of pairwise.parameters) {
      const parameter = command.parameters.find((p) => p.name === name);
      const candidates = pairwise.values[name]?.map(String) ?? parameter?.enumValues?.map((m) => m.value) ?? [];
      for (const member of parameter?.enumValues ?? []) {
        if (member.auto && candidates.includes(member.value) && !pairwise.parameters.includes(member.auto.dependsOn)) {
          issues.push({
            code: "unknown_parameter",
            message: `"${name}=${member.value}" depends on "${member.auto.dependsOn}", which is not a pairwise parameter`,
            path: "pairwise.parameters",
          });
        }
      }
    }
    Object.keys(pairwise.values).forEach((param) => requireParam(param, "pairwise.parameter_values"));
    for (const constraint of pairwise.constraints) {
      constraint.when.forEach((condition) => requireParam(condition.param, "pairwise.constraints"));
      if (constraint.kind === "requires") {
        requireParam(constraint.then.param, "pairwise.constraints");
        if ("sameAs" in constraint.then) requireParam(constraint.then.sameAs, "pairwise.constraints");
      } else {
        checkModels(constraint.models, known, "pairwise.constraints", issues);
      }
    }
  }

  return issues;
}

/**
 * Throw SpecDefectError unless the command is internally consistent
 */
export function assertValidCommand(command: Command, catalog?: CapabilityCatalog): void {
  const issues = collectSpecIssues(command, catalog);
  if (issues.length > 0) {
    throw new SpecDefectError(command.name || "<unnamed>", issues);
  }
}

export function findParameter(command: Command, name: string): Parameter | undefined {
  return command.parameters.find((parameter) => parameter.name === name);
}
