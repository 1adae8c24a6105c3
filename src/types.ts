// Canonical `pkg:maven/<namespace>/<name>@<version>` string. Equality is string equality.
export type Identifier = string;

export type IdentifierSet = ReadonlySet<Identifier>;

export interface DependencyRecord {
  namespace: string;
  name: string;
  packaging: string;
  classifier?: string; // only present on 6-field lines, e.g. "tests"
  version: string;
  scope: string;
  depth: number; // 1 = direct dependency, 2 = its dependencies, ...; the root line yields no record
}

export interface ExpectedSet {
  readonly identifiers: IdentifierSet;
  readonly count: number;
  readonly scopes: readonly string[];
}

// One entry of a CycloneDX `components` array, reduced to what extraction needs.
export interface ComponentRecord {
  purl?: string;
  scope?: string;
}

export interface CycloneDXComponent {
  purl?: unknown;
  scope?: unknown;
  components?: unknown;
  [key: string]: unknown;
}

export interface CycloneDXDocument {
  bomFormat?: unknown;
  specVersion?: unknown;
  components?: unknown;
  [key: string]: unknown;
}

export interface MetricsResult {
  observedCount: number;
  expectedCount: number;
  truePositives: Identifier[];
  falseNegatives: Identifier[];
  truePositiveCount: number;
  falseNegativeCount: number;
  recall: number | undefined; // undefined when expectedCount is 0
}

export type SbomInput =
  | { label: string; document: unknown }
  | { label: string; text: string };

export type FailureKind = 'malformed-input' | 'consistency-violation' | 'generator-failed';

export interface EvaluationSuccess {
  status: 'ok';
  label: string;
  observed: Identifier[]; // sorted
  metrics: MetricsResult;
  warnings: string[];
}

export interface EvaluationFailure {
  status: 'failed';
  label: string;
  kind: FailureKind;
  message: string;
}

export type EvaluationOutcome = EvaluationSuccess | EvaluationFailure;

export type ScopeCounts = Record<string, number>;

export interface EvaluationReport {
  schemaVersion: number;
  generated: string; // ISO timestamp
  project?: { name?: string; version?: string };
  expectedScopes: string[];
  scopeCounts: ScopeCounts;
  expectedCount: number;
  expected: Identifier[];
  outcomes: EvaluationOutcome[];
}

export type ReportFormat = 'table' | 'json' | 'yaml';

export interface SbomSpec {
  label: string;
  path: string;
}

export interface GeneratorSpec {
  label: string;
  command: string;
  args: string[];
  output: string; // SBOM file the generator writes
  timeoutMs?: number;
}

export interface EvaluatorConfig {
  project?: { name?: string; version?: string; pomPath?: string };
  expectedScopes: string[];
  dependencyTree?: string;
  sboms: SbomSpec[];
  generators: GeneratorSpec[];
  outputDir?: string;
  format: ReportFormat;
}
