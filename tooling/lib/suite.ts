/**
 * Per-command suite generation
 *
 * Runs every generator over one command and checks the generated cases against the
 * validators they were derived for. Batches isolate failures per command: one defective
 * command never hides the artifacts of the others.
 */

import { AuditLog } from "./audit";
import { BoundaryExpander, ConcreteBoundaryCase } from "./boundary";
import { CaseFailure, CoverageGap, CoverageGapError, isSuppressed, SpecDefectError } from "./errors";
import { FieldMapping, FieldMappingEmitter } from "./field-mapping";
import { Logger } from "./logger";
import { findViolations, PairwiseGenerator, PairwiseMatrix } from "./pairwise";
import { EMPTY_CATALOG, ParameterResolver } from "./resolver";
import { RoundTripResult, RoundTripValidator } from "./roundtrip";
import { assertValidCommand } from "./spec-model";
import { CommandCodec } from "./syntax";
import { CapabilityCatalog, Command, LicenseContext, Parameter, SyntaxTest } from "./types";
import { createValidator, toPredicateSource } from "./validators";

export interface SuiteGeneratorOptions {
  catalog?: CapabilityCatalog;
  license?: LicenseContext;
  suppressedGaps?: string[];
  maxSearchNodes?: number;
  logger?: Logger;
  audit?: AuditLog;
}

/** Predicate sources per parameter, keyed by model ("*" for the base domain) */
export type ValidatorTable = Record<string, Record<string, string>>;

export interface CommandSuite {
  command: Command;
  boundaryCases: ConcreteBoundaryCase[];
  /** Gaps that configuration suppressed */
  suppressedGaps: CoverageGap[];
  pairwise?: PairwiseMatrix;
  roundTrips: RoundTripResult[];
  fieldMappings: FieldMapping[];
  validators: ValidatorTable;
  failures: CaseFailure[];
}

export type SuiteOutcome =
  | { status: "ok"; command: string; suite: CommandSuite }
  | { status: "failed"; command: string; error: SpecDefectError | CoverageGapError };

const BASE_SCOPE = "*";

export class SuiteGenerator {
  private catalog: CapabilityCatalog;
  private license: LicenseContext;
  private suppressed: string[];
  private logger: Logger;
  private audit: AuditLog;

  constructor(private options: SuiteGeneratorOptions = {}) {
    this.catalog = options.catalog ?? EMPTY_CATALOG;
    this.license = options.license ?? {};
    this.suppressed = options.suppressedGaps ?? [];
    this.logger = options.logger ?? new Logger("info", false);
    this.audit = options.audit ?? new AuditLog();
  }

  /**
   * Generate every artifact for one command. Throws SpecDefectError or CoverageGapError.
   */
  generate(command: Command): CommandSuite {
    return this.logger.withContext({ command: command.name, component: "suite" }, () => {
      this.logger.startTimer(command.name);
      assertValidCommand(command, this.catalog);

      const resolver = new ParameterResolver(this.catalog, command.name);
      const { cases, suppressedGaps } = this.expandBoundaries(command, resolver);
      const pairwise = this.generatePairwise(command, resolver);
      const roundTrips = this.verifyRoundTrips(command);
      const fieldMappings = this.logger.withContext({ phase: "fields" }, () =>
        new FieldMappingEmitter(command.name).emitTable(command)
      );

      const failures = [...this.checkBoundaryCases(command, cases, resolver), ...this.checkCombinations(command, pairwise)];
      failures.forEach((failure) => {
        this.audit.recordFailure(failure);
        this.logger.warn(`Generated ${failure.kind} case disagrees with its validator`, {
          subject: failure.subject,
          model: failure.model,
          expected: failure.expected,
          actual: failure.actual,
        });
      });

      this.logger.endTimer(command.name, "Suite generated", "info");
      return {
        command,
        boundaryCases: cases,
        suppressedGaps,
        pairwise,
        roundTrips,
        fieldMappings,
        validators: this.validatorTable(command, resolver),
        failures,
      };
    });
  }

  /**
   * Generate each command independently; specification defects and coverage gaps
   * become failed outcomes, anything else propagates.
   */
  generateBatch(commands: Command[]): SuiteOutcome[] {
    return commands.map((command): SuiteOutcome => {
      try {
        return { status: "ok", command: command.name, suite: this.generate(command) };
      } catch (error) {
        if (error instanceof SpecDefectError) {
          this.audit.recordDefects(command.name, error.issues);
          this.logger.error(error.message, { command: command.name });
          return { status: "failed", command: command.name, error };
        }
        if (error instanceof CoverageGapError) {
          this.logger.error(error.message, { command: command.name });
          return { status: "failed", command: command.name, error };
        }
        throw error;
      }
    });
  }

  getAuditLog(): AuditLog {
    return this.audit;
  }

  private expandBoundaries(
    command: Command,
    resolver: ParameterResolver
  ): { cases: ConcreteBoundaryCase[]; suppressedGaps: CoverageGap[] } {
    return this.logger.withContext({ phase: "boundary" }, () => {
      const expander = new BoundaryExpander(resolver, command.name);
      const cases: ConcreteBoundaryCase[] = [];
      const open: CoverageGap[] = [];
      const suppressedGaps: CoverageGap[] = [];

      for (const parameter of command.parameters) {
        const result = expander.expand(parameter, command.tests.boundaries[parameter.name] ?? [], {
          models: command.models,
          license: this.license,
        });
        cases.push(...result.cases);
        this.audit.recordBoundaryExpansion(command.name, parameter.name, result.cases.length, result.skippedModels);
        this.logger.debug(`Expanded ${parameter.name}`, { cases: result.cases.length, skipped: result.skippedModels });

        for (const gap of result.gaps) {
          const suppressed = isSuppressed(gap, this.suppressed);
          this.audit.recordGaps(command.name, [gap], suppressed);
          if (suppressed) {
            this.logger.warn(`Suppressed coverage gap for ${gap.parameter}: ${gap.reason}`);
            suppressedGaps.push(gap);
          } else {
            open.push(gap);
          }
        }
      }

      if (open.length > 0) {
        throw new CoverageGapError(command.name, open);
      }
      return { cases, suppressedGaps };
    });
  }

  private generatePairwise(command: Command, resolver: ParameterResolver): PairwiseMatrix | undefined {
    const spec = command.tests.pairwise;
    if (!spec) {
      return undefined;
    }
    return this.logger.withContext({ phase: "pairwise" }, () => {
      const generator = new PairwiseGenerator({
        commandName: command.name,
        resolver,
        logger: this.logger,
        maxSearchNodes: this.options.maxSearchNodes,
      });
      const matrix = generator.generate(spec, {
        parameters: command.parameters,
        models: command.models,
        license: this.license,
      });
      this.audit.recordPairwise(command.name, matrix.combinations.length, matrix.requiredPairs, matrix.perModel);
      this.logger.info(`Generated ${matrix.combinations.length} combination(s)`, { requiredPairs: matrix.requiredPairs });
      return matrix;
    });
  }

  private verifyRoundTrips(command: Command): RoundTripResult[] {
    return this.logger.withContext({ phase: "roundtrip" }, () => {
      const validator = new RoundTripValidator(new CommandCodec(command));
      const results: RoundTripResult[] = [];

      for (const test of [...command.tests.syntax, ...command.tests.multiline]) {
        for (const model of this.roundTripModels(command, test)) {
          const result = validator.verify(test, model);
          results.push(result);
          this.audit.recordRoundTrip(command.name, test.name, result.status, model);
          if (result.status === "failed") {
            this.logger.warn(`Round trip "${test.name}" failed`, {
              model,
              failures: result.failures.map((failure) => failure.message),
            });
          }
        }
      }
      return results;
    });
  }

  /** Model-scoped tests run once per applicable model; the rest run once */
  private roundTripModels(command: Command, test: SyntaxTest): (string | undefined)[] {
    if (!test.models || command.models.length === 0) {
      return [undefined];
    }
    return command.models;
  }

  private checkBoundaryCases(command: Command, cases: ConcreteBoundaryCase[], resolver: ParameterResolver): CaseFailure[] {
    const byName = new Map(command.parameters.map((p) => [p.name, p]));
    const failures: CaseFailure[] = [];

    for (const c of cases) {
      const parameter = byName.get(c.parameter);
      if (!parameter) continue;
      const resolution = resolver.resolve(parameter, c.model, c.license ?? this.license);
      let actual: boolean;
      let detail: string;
      if (resolution.status === "unsupported") {
        actual = false;
        detail = resolution.reason;
      } else {
        const result = createValidator(resolution.domain)(c.value);
        actual = result.ok;
        detail = result.ok ? "accepted" : result.errors.join("; ");
      }
      if (actual !== c.expectedValid) {
        failures.push({
          command: command.name,
          kind: "boundary",
          subject: `${c.parameter}=${String(c.value)}`,
          model: c.model,
          expected: c.expectedValid ? "valid" : "invalid",
          actual: `${actual ? "valid" : "invalid"} (${detail})`,
        });
      }
    }
    return failures;
  }

  private checkCombinations(command: Command, matrix: PairwiseMatrix | undefined): CaseFailure[] {
    const spec = command.tests.pairwise;
    if (!matrix || !spec) return [];
    const failures: CaseFailure[] = [];

    for (const combination of matrix.combinations) {
      const models: (string | undefined)[] = combination.models.length > 0 ? combination.models : [undefined];
      for (const model of models) {
        const violations = findViolations(combination.values, spec, command.parameters, model);
        if (violations.length > 0) {
          failures.push({
            command: command.name,
            kind: "pairwise",
            subject: JSON.stringify(combination.values),
            model,
            expected: "no constraint violated",
            actual: violations.join("; "),
          });
        }
      }
    }
    return failures;
  }

  private validatorTable(command: Command, resolver: ParameterResolver): ValidatorTable {
    const table: ValidatorTable = {};
    for (const parameter of command.parameters) {
      table[parameter.name] = this.parameterValidators(parameter, command.models, resolver);
    }
    return table;
  }

  private parameterValidators(parameter: Parameter, models: string[], resolver: ParameterResolver): Record<string, string> {
    const sources: Record<string, string> = {};
    const base = resolver.resolve(parameter, undefined, this.license);
    if (base.status === "supported") {
      sources[BASE_SCOPE] = toPredicateSource(base.domain);
    }
    for (const model of models) {
      const resolution = resolver.resolve(parameter, model, this.license);
      if (resolution.status !== "supported") continue;
      const source = toPredicateSource(resolution.domain);
      if (source !== sources[BASE_SCOPE]) {
        sources[model] = source;
      }
    }
    return sources;
  }
}
