/**
 * rtx-cmdspec: Main entry point
 * Exports the command model, the generators and the document loader
 */

export {
  Command,
  Parameter,
  Variant,
  EnumValue,
  AutoRule,
  BoundaryTest,
  PairwiseSpec,
  PairwiseConstraint,
  SyntaxTest,
  StructuredMapping,
  CapabilityCatalog,
  LicenseContext,
  SpecLoader,
} from "../tooling/lib/types";

export { SpecDefectError, CoverageGapError, SpecIssue, CoverageGap, CaseFailure } from "../tooling/lib/errors";
export { ParameterResolver, Resolution, EffectiveDomain } from "../tooling/lib/resolver";
export { createValidator, toPredicateSource } from "../tooling/lib/validators";
export { BoundaryExpander, ConcreteBoundaryCase } from "../tooling/lib/boundary";
export { PairwiseGenerator, PairwiseMatrix, Combination, findViolations } from "../tooling/lib/pairwise";
export { CommandCodec, compileTemplate } from "../tooling/lib/syntax";
export { RoundTripValidator, RoundTripResult } from "../tooling/lib/roundtrip";
export { FieldMappingEmitter, FieldMapping } from "../tooling/lib/field-mapping";
export { assertValidCommand, collectSpecIssues } from "../tooling/lib/spec-model";
export { YamlSpecLoader, readCommandDocument } from "../tooling/lib/document";
export { SuiteGenerator, CommandSuite, SuiteOutcome } from "../tooling/lib/suite";
