export type ArtifactFormat = "plist" | "json" | "android-manifest" | "generated-source" | "png";

export type Platform = "android" | "ios";

export type ArtifactPlatform = Platform | "shared";

export type FlagValue = string | boolean | number;

export type FeatureFlags = Readonly<Record<string, FlagValue>>;

export type PlainValue = string | number | boolean | PlainValue[] | { [key: string]: PlainValue };

export type KeyOp = "set" | "include" | "present";

export type ValueType = "string" | "boolean" | "integer" | "real";

/** How the pipeline treats a failed artifact. */
export type FailurePolicy = { kind: "abort" } | { kind: "warn"; consequence: string };

export type RequiredKeySpec = {
  path: string;
  op?: KeyOp;
  value?: PlainValue;
  type?: ValueType;
};

/** A required key whose value no longer references any flag. */
export type ResolvedKey =
  | { path: string; op: "set"; value: PlainValue; type?: ValueType }
  | { path: string; op: "include"; value: PlainValue }
  | { path: string; op: "present" };

export type ArtifactSource = {
  flag: string;
  minBytes?: number;
};

export type ArtifactDefinition = {
  id: string;
  path: string;
  format: ArtifactFormat;
  platform: ArtifactPlatform;
  policy: FailurePolicy;
  dependsOn: string[];
  template?: string;
  source?: ArtifactSource;
  schema?: string;
  /** Project-relative directory for backups, when they must not sit beside the file. */
  backupDir?: string;
  requiredKeys: RequiredKeySpec[];
};

export type RuleCategory = "identity" | "security" | "capability" | "permission" | "cosmetic";

export type RuleCondition =
  | { flag: string; equals: FlagValue }
  | { flag: string; notEquals: FlagValue }
  | { flag: string; present: boolean };

export type RequirementRule = {
  id: string;
  category: RuleCategory;
  artifact: string;
  platform?: Platform;
  when: RuleCondition[];
  keys: RequiredKeySpec[];
};

export type FlagType = "boolean" | "string" | "integer" | "real";

export type FlagDefinition = {
  name: string;
  type: FlagType;
  default?: FlagValue;
  description?: string;
};

export type Catalog = {
  flags: FlagDefinition[];
  artifacts: ArtifactDefinition[];
  rules: RequirementRule[];
};

export type ReconciliationRequirement =
  | { artifactId: string; satisfiable: true; keys: ResolvedKey[]; rules: string[] }
  | { artifactId: string; satisfiable: false; missingFlag: string; rules: string[] };

export type PlannedArtifact = {
  artifact: ArtifactDefinition;
  requirement: ReconciliationRequirement;
};

export type MissingKey = {
  path: string;
  reason: "absent" | "type-mismatch" | "value-mismatch";
  expected?: PlainValue;
  actual?: unknown;
};

export type Inspection =
  | { status: "valid" }
  | { status: "missing" }
  | { status: "corrupted"; detail: string }
  | { status: "unsatisfied"; missing: MissingKey[] };

export type ArtifactState =
  | "unchecked"
  | "validating"
  | "valid"
  | "invalid"
  | "reconciling"
  | "reconciled"
  | "failed"
  | "reported";

export type ReconcileStrategy = "patch" | "template";

export type ResultFailure = {
  kind: "acquisition" | "syntax-corruption" | "requirement-unsatisfiable" | "reconciliation" | "validation";
  flag?: string;
};

export type ReconciliationResult = Readonly<{
  artifactId: string;
  path: string;
  outcome: "valid" | "reconciled" | "failed";
  valid: boolean;
  repaired: boolean;
  backupCreated: string | null;
  strategy: ReconcileStrategy | null;
  errors: readonly string[];
  failure: ResultFailure | null;
  policy: FailurePolicy;
  transitions: readonly ArtifactState[];
}>;

export type RunReport = {
  results: ReconciliationResult[];
  fatal: ReconciliationResult[];
  warnings: string[];
  exitCode: number;
  firstFatalReason: string | null;
};
