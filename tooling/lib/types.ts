/**
 * Shared type definitions for the command specification model
 */

export type ScalarValue = string | number | boolean;

export type Config = {
  envSearchPaths?: string[];
  outputDir?: string;
  catalogPath?: string;
  logLevel?: "debug" | "info" | "warn" | "error";
  licenses?: LicenseContext;
  suppressedGaps?: string[];
  maxSearchNodes?: number;
};

export type ParameterType = "string" | "integer" | "enum" | "ipv4" | "ip_range" | "hex";

export type NumericRange = {
  min: number;
  max: number;
};

/**
 * Quantity-indexed limits per license SKU: entry `q - 1` is the limit with `q` licenses.
 */
export type LicenseTable = Record<string, number[]>;

/**
 * License SKU to installed quantity, e.g. `{ "YSL-VPN-EX2": 2 }`
 */
export type LicenseContext = Record<string, number>;

export type AutoRule = {
  dependsOn: string;
  map: Record<string, ScalarValue>;
  otherwise: ScalarValue;
};

export type EnumValue = {
  value: string;
  description: string;
  auto?: AutoRule;
};

export type TargetFieldType = "string" | "number" | "bool" | "list";

export type TargetField = {
  name: string;
  type?: TargetFieldType;
  enum?: string[];
  description?: string;
};

export type FieldBinding =
  | { kind: "single"; field: TargetField }
  | { kind: "per-variant"; fields: Record<string, TargetField[]> };

export type Variant = {
  name: string;
  keyword?: string;
  type: ParameterType;
  pattern?: string;
  range?: NumericRange;
  description?: string;
  field?: TargetField;
};

export type ModelConstraint = {
  validFor?: string[];
  invalidFor?: string[];
  minFirmware?: string;
  requiresLicense?: string;
};

export type ModelOverride = {
  range?: NumericRange;
  unavailable?: boolean;
  capability?: string;
  licenseLimits?: LicenseTable;
  note?: string;
};

export type Parameter = {
  name: string;
  description?: string;
  type: ParameterType;
  required: boolean;
  default?: ScalarValue;
  range?: NumericRange;
  pattern?: string;
  enumValues?: EnumValue[];
  variants?: Variant[];
  availability?: ModelConstraint;
  modelOverrides: Record<string, ModelOverride>;
  field?: FieldBinding;
  autoBoundaries: boolean;
};

export type BoundaryTest = {
  value: ScalarValue;
  valid: boolean;
  description?: string;
  errorContains?: string;
  validFor?: string[];
  invalidFor?: string[];
};

export type Condition = {
  param: string;
  values: ScalarValue[];
};

export type RequiresConstraint = {
  kind: "requires";
  when: Condition[];
  then: { param: string; oneOf: ScalarValue[] } | { param: string; sameAs: string };
  priority?: number;
  description?: string;
};

export type InvalidForConstraint = {
  kind: "invalid_for";
  when: Condition[];
  models: string[];
  priority?: number;
  description?: string;
};

export type PairwiseConstraint = RequiresConstraint | InvalidForConstraint;

export type PairwiseSpec = {
  parameters: string[];
  values: Record<string, ScalarValue[]>;
  constraints: PairwiseConstraint[];
};

export type StructuredRecord = Record<string, ScalarValue>;

export type StructuredMapping =
  | { kind: "single"; record: StructuredRecord }
  | { kind: "multi"; records: StructuredRecord[] };

export type SyntaxDirection = "bidirectional" | "parse" | "build";

export type SyntaxForm = "set" | "delete";

export type SyntaxTest = {
  name: string;
  text: string;
  structured: StructuredMapping;
  direction: SyntaxDirection;
  form: SyntaxForm;
  models?: ModelConstraint;
  note?: string;
};

export type Command = {
  name: string;
  description: string;
  syntax: { set: string[]; delete: string[] };
  parameters: Parameter[];
  models: string[];
  tests: {
    syntax: SyntaxTest[];
    multiline: SyntaxTest[];
    boundaries: Record<string, BoundaryTest[]>;
    pairwise?: PairwiseSpec;
  };
  notes: string[];
};

export type ModelProfile = {
  firmware?: string;
  limits?: Record<string, number>;
  licenses?: Record<string, LicenseTable>;
};

export type CapabilityCatalog = {
  models: Record<string, ModelProfile>;
};

export type ValidationResult = { ok: true } | { ok: false; errors: string[] };

export interface SpecLoader {
  loadSpec(source: string): Command;
}
