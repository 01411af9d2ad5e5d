/**
 * Pairwise matrix generation
 *
 * Builds a covering array in which every (parameter, value) pair that no constraint
 * forbids appears in at least one combination, per model. Seed pairs are taken
 * most-constrained-first; the rest of each combination is filled greedily by new
 * pair coverage, with backtracking when a partial assignment cannot be completed.
 * Ties always fall back to declaration order, so output is reproducible.
 */

import { SpecDefectError, SpecIssue } from "./errors";
import { Logger } from "./logger";
import { ParameterResolver, resolveAuto } from "./resolver";
import {
  Condition,
  InvalidForConstraint,
  PairwiseConstraint,
  PairwiseSpec,
  Parameter,
  RequiresConstraint,
  LicenseContext,
  ScalarValue,
} from "./types";
import { dedupeBy, scalarEquals, stableStringify } from "./utils";

export type Assignment = Record<string, ScalarValue>;

export interface Combination {
  values: Assignment;
  /** Models the combination is valid on; empty when generated without model scoping */
  models: string[];
}

export interface PairwiseMatrix {
  combinations: Combination[];
  /** Combination count per model ("*" when unscoped) */
  perModel: Record<string, number>;
  requiredPairs: number;
  excludedPairs: number;
}

export interface PairwiseGeneratorOptions {
  commandName?: string;
  resolver?: ParameterResolver;
  logger?: Logger;
  maxSearchNodes?: number;
}

export interface GenerateOptions {
  parameters?: Parameter[];
  models?: string[];
  /** License context used when deciding whether a model supports every participant */
  license?: LicenseContext;
}

export const DEFAULT_MAX_SEARCH_NODES = 50_000;

const UNSCOPED = "*";

type Truth = "true" | "false" | "unknown";

function describeConstraint(constraint: PairwiseConstraint): string {
  if (constraint.description) return constraint.description;
  const when = constraint.when.map((c) => `${c.param}=${c.values.map(String).join("|")}`).join(" && ");
  if (constraint.kind === "invalid_for") {
    return `${when} is invalid for ${constraint.models.join(", ")}`;
  }
  const then = "oneOf" in constraint.then
    ? `${constraint.then.param}=${constraint.then.oneOf.map(String).join("|")}`
    : `${constraint.then.param}=${constraint.then.sameAs}`;
  return `if ${when} then ${then}`;
}

/**
 * The constraints that apply on one model, evaluated against (partial) assignments
 */
export class ConstraintSet {
  private requires: RequiresConstraint[];
  private invalid: InvalidForConstraint[];
  private byName: Map<string, Parameter>;

  constructor(constraints: PairwiseConstraint[], parameters: Parameter[], readonly model?: string) {
    this.requires = constraints.filter((c): c is RequiresConstraint => c.kind === "requires");
    this.invalid = constraints.filter(
      (c): c is InvalidForConstraint => c.kind === "invalid_for" && model !== undefined && c.models.includes(model)
    );
    this.byName = new Map(parameters.map((p) => [p.name, p]));
  }

  private effective(name: string, assignment: Assignment): ScalarValue | undefined {
    const value = assignment[name];
    if (value === undefined) return undefined;
    const parameter = this.byName.get(name);
    return parameter ? resolveAuto(parameter, value, assignment) : value;
  }

  private conditionTruth(condition: Condition, assignment: Assignment): Truth {
    const value = this.effective(condition.param, assignment);
    if (value === undefined) return "unknown";
    return condition.values.some((candidate) => scalarEquals(candidate, value)) ? "true" : "false";
  }

  private whenTruth(conditions: Condition[], assignment: Assignment): Truth {
    let unknown = false;
    for (const condition of conditions) {
      const truth = this.conditionTruth(condition, assignment);
      if (truth === "false") return "false";
      if (truth === "unknown") unknown = true;
    }
    return unknown ? "unknown" : "true";
  }

  private requiresTruth(constraint: RequiresConstraint, assignment: Assignment): Truth {
    const when = this.whenTruth(constraint.when, assignment);
    if (when !== "true") return when === "false" ? "true" : "unknown";

    const actual = this.effective(constraint.then.param, assignment);
    if (actual === undefined) return "unknown";
    if ("oneOf" in constraint.then) {
      return constraint.then.oneOf.some((allowed) => scalarEquals(allowed, actual)) ? "true" : "false";
    }
    const other = this.effective(constraint.then.sameAs, assignment);
    if (other === undefined) return "unknown";
    return scalarEquals(other, actual) ? "true" : "false";
  }

  /**
   * An invalid_for rule is set aside when a higher-priority requires rule matches too
   */
  private overridden(rule: InvalidForConstraint, assignment: Assignment, complete: boolean): boolean {
    if (rule.priority === undefined) return false;
    const threshold = rule.priority;
    return this.requires.some((requires) => {
      if (requires.priority === undefined || requires.priority <= threshold) return false;
      const when = this.whenTruth(requires.when, assignment);
      return when === "true" || (!complete && when === "unknown");
    });
  }

  /**
   * Descriptions of the constraints the assignment definitely breaks.
   * With `complete`, undetermined conditions count as not matching.
   */
  violations(assignment: Assignment, complete: boolean = true): string[] {
    const found: string[] = [];
    for (const rule of this.requires) {
      if (this.requiresTruth(rule, assignment) === "false") {
        found.push(describeConstraint(rule));
      }
    }
    for (const rule of this.invalid) {
      if (this.whenTruth(rule.when, assignment) === "true" && !this.overridden(rule, assignment, complete)) {
        found.push(describeConstraint(rule));
      }
    }
    return found;
  }

  isViolated(assignment: Assignment, complete: boolean = false): boolean {
    return this.violations(assignment, complete).length > 0;
  }
}

interface Pair {
  key: string;
  i: number;
  a: number;
  j: number;
  b: number;
}

class SearchBudgetExceeded extends Error {}

export class PairwiseGenerator {
  private commandName: string;
  private maxSearchNodes: number;

  constructor(private options: PairwiseGeneratorOptions = {}) {
    this.commandName = options.commandName ?? "<unnamed>";
    this.maxSearchNodes = options.maxSearchNodes ?? DEFAULT_MAX_SEARCH_NODES;
  }

  generate(spec: PairwiseSpec, generateOptions: GenerateOptions = {}): PairwiseMatrix {
    const parameters = generateOptions.parameters ?? [];
    const models = generateOptions.models ?? [];
    const names = spec.parameters;
    const license = generateOptions.license ?? {};
    const domains = this.buildDomains(spec, parameters);
    const participants = parameters.filter((p) => names.includes(p.name));
    this.checkPrecedence(spec, names, domains, models, participants);

    const perModel: Record<string, number> = {};
    const merged = new Map<string, Combination>();
    const issues: SpecIssue[] = [];
    const omitted: string[] = [];
    let requiredPairs = 0;
    let excludedPairs = 0;

    const targets: (string | undefined)[] = models.length > 0 ? models : [undefined];
    for (const model of targets) {
      const unavailable = model !== undefined ? this.unavailableOn(participants, model, license) : undefined;
      if (model !== undefined && unavailable !== undefined) {
        this.options.logger?.debug(`Pairwise parameters not all available, model omitted`, { model, reason: unavailable });
        omitted.push(`${model} (${unavailable})`);
        continue;
      }

      const constraints = new ConstraintSet(spec.constraints, participants, model);
      const result = this.cover(names, domains, constraints);
      requiredPairs += result.required;
      excludedPairs += result.excluded;
      issues.push(...result.issues);
      perModel[model ?? UNSCOPED] = result.rows.length;

      for (const values of result.rows) {
        const key = stableStringify(values);
        const existing = merged.get(key);
        if (existing) {
          if (model !== undefined) existing.models.push(model);
        } else {
          merged.set(key, { values, models: model !== undefined ? [model] : [] });
        }
      }
    }

    if (models.length > 0 && omitted.length === models.length) {
      issues.push({
        code: "unsupported_model",
        message: `no model supports every pairwise parameter: ${omitted.join(", ")}`,
        path: "pairwise.parameters",
      });
    }

    if (issues.length > 0) {
      throw new SpecDefectError(this.commandName, issues);
    }

    return { combinations: Array.from(merged.values()), perModel, requiredPairs, excludedPairs };
  }

  /**
   * Why some participant cannot be used on the model, or undefined when all can
   */
  private unavailableOn(participants: Parameter[], model: string, license: LicenseContext): string | undefined {
    const resolver = this.options.resolver;
    if (!resolver) return undefined;
    for (const parameter of participants) {
      const resolution = resolver.resolve(parameter, model, license);
      if (resolution.status === "unsupported") {
        return `${parameter.name}: ${resolution.reason}`;
      }
    }
    return undefined;
  }

  private buildDomains(spec: PairwiseSpec, parameters: Parameter[]): ScalarValue[][] {
    const issues: SpecIssue[] = [];
    const known = new Map(parameters.map((p) => [p.name, p]));
    const checkKnown = parameters.length > 0;

    if (spec.parameters.length < 2) {
      issues.push({ code: "unknown_parameter", message: "pairwise coverage needs at least two parameters", path: "pairwise.parameters" });
    }

    const domains = spec.parameters.map((name) => {
      const parameter = known.get(name);
      if (checkKnown && !parameter) {
        issues.push({ code: "unknown_parameter", message: `unknown parameter "${name}"`, path: "pairwise.parameters" });
        return [];
      }

      const declared = spec.values[name];
      const candidates = dedupeBy(declared ?? (parameter ? derivedCandidates(parameter) : []), (v) => String(v));
      if (candidates.length === 0) {
        issues.push({ code: "unknown_parameter", message: `no candidate values for "${name}"`, path: `pairwise.parameter_values.${name}` });
      }

      if (parameter?.type === "enum") {
        const members = (parameter.enumValues ?? []).map((m) => m.value);
        for (const value of candidates) {
          if (!members.includes(String(value))) {
            issues.push({
              code: "enum_violation",
              message: `candidate "${String(value)}" is not an enum member`,
              path: `pairwise.parameter_values.${name}`,
            });
          }
        }
      }
      return candidates;
    });

    for (const constraint of spec.constraints) {
      const referenced = constraint.when.map((c) => c.param);
      if (constraint.kind === "requires") {
        referenced.push(constraint.then.param);
        if ("sameAs" in constraint.then) referenced.push(constraint.then.sameAs);
      }
      for (const name of referenced) {
        if (!spec.parameters.includes(name)) {
          issues.push({
            code: "unknown_parameter",
            message: `constraint "${describeConstraint(constraint)}" references "${name}" outside the pairwise set`,
            path: "pairwise.constraints",
          });
        }
      }
    }

    if (issues.length > 0) {
      throw new SpecDefectError(this.commandName, issues);
    }
    return domains;
  }

  /**
   * A requires rule and an invalid_for rule that can match the same combination need
   * distinct priorities; otherwise which one decides is undefined.
   * Conditions see every value an `auto` candidate can resolve to.
   */
  private checkPrecedence(
    spec: PairwiseSpec,
    names: string[],
    domains: ScalarValue[][],
    models: string[],
    participants: Parameter[]
  ): void {
    const byName = new Map(participants.map((p) => [p.name, p]));
    const domainOf = (name: string): ScalarValue[] => {
      const candidates = domains[names.indexOf(name)] ?? [];
      const parameter = byName.get(name);
      return candidates.flatMap((value) => {
        const auto = parameter?.enumValues?.find((member) => member.value === String(value))?.auto;
        return auto ? [value, ...Object.values(auto.map), auto.otherwise] : [value];
      });
    };
    const satisfiable = (conditions: Condition[]) => {
      const byParam = new Map<string, ScalarValue[]>();
      for (const condition of conditions) {
        const current = byParam.get(condition.param) ?? domainOf(condition.param);
        byParam.set(
          condition.param,
          current.filter((value) => condition.values.some((allowed) => scalarEquals(allowed, value)))
        );
      }
      return Array.from(byParam.values()).every((values) => values.length > 0);
    };

    const issues: SpecIssue[] = [];
    const requires = spec.constraints.filter((c): c is RequiresConstraint => c.kind === "requires");
    const invalid = spec.constraints.filter(
      (c): c is InvalidForConstraint => c.kind === "invalid_for" && c.models.some((m) => models.includes(m))
    );

    for (const rule of invalid) {
      for (const other of requires) {
        if (!satisfiable([...rule.when, ...other.when])) continue;
        const ordered = rule.priority !== undefined && other.priority !== undefined && rule.priority !== other.priority;
        if (!ordered) {
          issues.push({
            code: "constraint_precedence",
            message: `"${describeConstraint(other)}" and "${describeConstraint(rule)}" can apply to the same combination; give both distinct priorities`,
            path: "pairwise.constraints",
          });
        }
      }
    }

    if (issues.length > 0) {
      throw new SpecDefectError(this.commandName, issues);
    }
  }

  private cover(
    names: string[],
    domains: ScalarValue[][],
    constraints: ConstraintSet
  ): { rows: Assignment[]; required: number; excluded: number; issues: SpecIssue[] } {
    const where = constraints.model ? ` on ${constraints.model}` : "";
    const toAssignment = (entries: [number, number][]): Assignment => {
      const assignment: Assignment = {};
      for (const [index, valueIndex] of entries) {
        assignment[names[index]] = domains[index][valueIndex];
      }
      return assignment;
    };

    const uncovered = new Map<string, Pair>();
    let excluded = 0;
    for (let i = 0; i < names.length; i += 1) {
      for (let j = i + 1; j < names.length; j += 1) {
        for (let a = 0; a < domains[i].length; a += 1) {
          for (let b = 0; b < domains[j].length; b += 1) {
            if (constraints.isViolated(toAssignment([[i, a], [j, b]]))) {
              excluded += 1;
              continue;
            }
            const key = pairKey(i, a, j, b);
            uncovered.set(key, { key, i, a, j, b });
          }
        }
      }
    }
    const required = uncovered.size;

    const rows: Assignment[] = [];
    const issues: SpecIssue[] = [];

    while (uncovered.size > 0) {
      const seed = this.pickSeed(uncovered, names, domains, constraints, toAssignment);
      const fixed = new Map<number, number>([
        [seed.i, seed.a],
        [seed.j, seed.b],
      ]);

      let row: Map<number, number> | undefined;
      try {
        row = this.complete(fixed, names, domains, constraints, uncovered, toAssignment, { nodes: 0 });
      } catch (error) {
        if (!(error instanceof SearchBudgetExceeded)) throw error;
        issues.push({
          code: "search_exhausted",
          message: `gave up completing ${names[seed.i]}=${String(domains[seed.i][seed.a])}, ${names[seed.j]}=${String(domains[seed.j][seed.b])}${where} after ${this.maxSearchNodes} steps`,
          path: "pairwise",
        });
        uncovered.delete(seed.key);
        continue;
      }

      if (!row) {
        issues.push({
          code: "uncoverable_pair",
          message: `no valid combination contains ${names[seed.i]}=${String(domains[seed.i][seed.a])} and ${names[seed.j]}=${String(domains[seed.j][seed.b])}${where}`,
          path: "pairwise",
        });
        uncovered.delete(seed.key);
        continue;
      }

      const entries = Array.from(row.entries()).sort(([x], [y]) => x - y);
      for (let x = 0; x < entries.length; x += 1) {
        for (let y = x + 1; y < entries.length; y += 1) {
          uncovered.delete(pairKey(entries[x][0], entries[x][1], entries[y][0], entries[y][1]));
        }
      }
      rows.push(toAssignment(entries));
    }

    return { rows, required, excluded, issues };
  }

  /**
   * Uncovered pair leaving the fewest consistent values for the other parameters
   */
  private pickSeed(
    uncovered: Map<string, Pair>,
    names: string[],
    domains: ScalarValue[][],
    constraints: ConstraintSet,
    toAssignment: (entries: [number, number][]) => Assignment
  ): Pair {
    let best: Pair | undefined;
    let bestScore = Infinity;
    for (const pair of uncovered.values()) {
      let score = 0;
      for (let k = 0; k < names.length; k += 1) {
        if (k === pair.i || k === pair.j) continue;
        for (let v = 0; v < domains[k].length; v += 1) {
          if (!constraints.isViolated(toAssignment([[pair.i, pair.a], [pair.j, pair.b], [k, v]]))) {
            score += 1;
          }
        }
      }
      if (score < bestScore) {
        best = pair;
        bestScore = score;
      }
    }
    if (!best) {
      throw new Error("pickSeed called without uncovered pairs");
    }
    return best;
  }

  private complete(
    fixed: Map<number, number>,
    names: string[],
    domains: ScalarValue[][],
    constraints: ConstraintSet,
    uncovered: Map<string, Pair>,
    toAssignment: (entries: [number, number][]) => Assignment,
    budget: { nodes: number }
  ): Map<number, number> | undefined {
    const current = toAssignment(Array.from(fixed.entries()));
    if (fixed.size === names.length) {
      return constraints.isViolated(current, true) ? undefined : fixed;
    }

    // Most constrained free parameter first
    let next = -1;
    let options: number[] = [];
    for (let k = 0; k < names.length; k += 1) {
      if (fixed.has(k)) continue;
      const consistent: number[] = [];
      for (let v = 0; v < domains[k].length; v += 1) {
        if (!constraints.isViolated({ ...current, [names[k]]: domains[k][v] })) {
          consistent.push(v);
        }
      }
      if (next === -1 || consistent.length < options.length) {
        next = k;
        options = consistent;
      }
    }

    const gain = (v: number) => {
      let covered = 0;
      for (const [index, valueIndex] of fixed) {
        const key = index < next ? pairKey(index, valueIndex, next, v) : pairKey(next, v, index, valueIndex);
        if (uncovered.has(key)) covered += 1;
      }
      return covered;
    };
    const ranked = options
      .map((v) => ({ v, gain: gain(v) }))
      .sort((x, y) => y.gain - x.gain || x.v - y.v);

    for (const { v } of ranked) {
      budget.nodes += 1;
      if (budget.nodes > this.maxSearchNodes) {
        throw new SearchBudgetExceeded();
      }
      const attempt = new Map(fixed);
      attempt.set(next, v);
      const result = this.complete(attempt, names, domains, constraints, uncovered, toAssignment, budget);
      if (result) return result;
    }
    return undefined;
  }
}

function pairKey(i: number, a: number, j: number, b: number): string {
  return `${i}:${a}|${j}:${b}`;
}

/**
 * Candidate values when a pairwise spec lists none: enum members, or range endpoints
 */
export function derivedCandidates(parameter: Parameter): ScalarValue[] {
  if (parameter.type === "enum") {
    return (parameter.enumValues ?? []).map((member) => member.value);
  }
  if (parameter.range) {
    return [parameter.range.min, parameter.range.max];
  }
  return parameter.default !== undefined ? [parameter.default] : [];
}

/**
 * Every (parameter, value) pair covered by a set of combinations, as "p=v|q=w" keys
 */
export function coveredPairs(combinations: Combination[], parameters: string[]): Set<string> {
  const covered = new Set<string>();
  for (const combination of combinations) {
    for (let i = 0; i < parameters.length; i += 1) {
      for (let j = i + 1; j < parameters.length; j += 1) {
        const p = parameters[i];
        const q = parameters[j];
        covered.add(`${p}=${String(combination.values[p])}|${q}=${String(combination.values[q])}`);
      }
    }
  }
  return covered;
}

/**
 * Constraints a complete combination breaks on a model (unscoped when `model` is undefined)
 */
export function findViolations(
  combination: Assignment,
  spec: PairwiseSpec,
  parameters: Parameter[],
  model?: string
): string[] {
  return new ConstraintSet(spec.constraints, parameters, model).violations(combination, true);
}
