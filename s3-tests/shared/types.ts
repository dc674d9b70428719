export const TEST_STATUSES = ['PASSED', 'FAILED', 'ERROR', 'SKIPPED', 'TIMEOUT'] as const;

export type TestStatus = (typeof TEST_STATUSES)[number];

/** Inclusive numeric ID range owned by a test group. */
export type TestIdRange = readonly [start: number, end: number];

export type TestGroupTable = Readonly<Record<string, TestIdRange>>;

export const DEFAULT_TEST_GROUPS: TestGroupTable = {
  basic: [1, 99],
  multipart: [100, 199],
  versioning: [200, 299],
  acl: [300, 399],
  encryption: [400, 499],
  lifecycle: [500, 599],
  performance: [600, 699],
  stress: [700, 799],
  compatibility: [800, 899],
};

export interface TestUnit {
  /** Numeric ID zero-padded to three digits. */
  readonly id: string;
  readonly numericId: number;
  readonly name: string;
  readonly group: string;
  /** Absolute path of the module implementing the unit. */
  readonly location: string;
}

export interface TestResult {
  readonly testId: string;
  readonly testName: string;
  readonly testGroup: string;
  readonly status: TestStatus;
  /** Wall-clock seconds. */
  readonly duration: number;
  readonly message: string;
  /** Full diagnostic trace; empty unless the status is FAILED or ERROR. */
  readonly error: string;
  /** ISO-8601 start time of the execution. */
  readonly timestamp: string;
}

/** TIMEOUT results are folded into `errors`, so the four counts always sum to `total`. */
export interface ResultSummary {
  total: number;
  passed: number;
  failed: number;
  skipped: number;
  errors: number;
}

/**
 * What a unit's entry point may hand back instead of throwing. Returning
 * nothing means the unit passed.
 */
export type UnitOutcome =
  | { kind: 'assertion_failed'; message: string }
  | { kind: 'fault'; message: string; trace?: string }
  | { kind: 'skipped'; reason: string };

export interface SuiteDefinition {
  key: string;
  name: string;
  description: string;
  tests: readonly string[];
  /** Percentage, 0-100. */
  requiredPassRate: number;
}

export type SuiteState = 'NOT_STARTED' | 'RUNNING' | 'MEETS_REQUIREMENT' | 'FAILS_REQUIREMENT';

export type TerminalSuiteState = Extract<SuiteState, 'MEETS_REQUIREMENT' | 'FAILS_REQUIREMENT'>;

export interface SuiteResult extends ResultSummary {
  key: string;
  name: string;
  description: string;
  requiredPassRate: number;
  state: TerminalSuiteState;
  tests: TestResult[];
  /** Rounded to one decimal place. */
  passRate: number;
  meetsRequirement: boolean;
}

export interface ValidationTarget {
  endpoint: string;
  vendor: string;
}

export interface ValidationSummary {
  totalTests: number;
  passed: number;
  failed: number;
  skipped: number;
  errors: number;
  /** Rounded to one decimal place. */
  overallPassRate: number;
  requiredOverallPassRate: number;
  criticalSuite: string;
  criticalTestsPassed: boolean;
}

export interface ValidationReport {
  timestamp: string;
  target: ValidationTarget;
  suites: Record<string, SuiteResult>;
  summary: ValidationSummary;
  productionReady: boolean;
}

export const OUTPUT_FORMATS = ['json', 'yaml', 'text', 'junit', 'markdown'] as const;

export type OutputFormat = (typeof OUTPUT_FORMATS)[number];
