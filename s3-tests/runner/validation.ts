import { ValidationConfigError, errorMessage, errorTrace } from '../shared/errors.js';
import { createValidationLogger } from '../shared/logger.js';
import { createTestResult } from '../shared/test-utils.js';
import type {
  SuiteDefinition,
  SuiteResult,
  SuiteState,
  TerminalSuiteState,
  TestResult,
  ValidationReport,
  ValidationTarget,
} from '../shared/types.js';
import type { TestLauncher } from './child-runner.js';
import { passRate, summarize } from './formatters.js';
import { CRITICAL_SUITE_KEY, PRODUCTION_PASS_RATE_THRESHOLD } from './suites.js';

export interface ValidationListener {
  onSuiteStart?(suite: SuiteDefinition): void;
  onTestStart?(suite: SuiteDefinition, testId: string): void;
  onTestComplete?(suite: SuiteDefinition, result: TestResult): void;
  onSuiteComplete?(result: SuiteResult): void;
}

export interface ProductionValidatorOptions {
  suites: readonly SuiteDefinition[];
  launcher: TestLauncher;
  target: ValidationTarget;
  criticalSuiteKey?: string;
  /** Minimum overall pass rate in percent. */
  readinessThreshold?: number;
  listener?: ValidationListener;
  now?: () => Date;
}

const TRANSITIONS: Record<SuiteState, readonly SuiteState[]> = {
  NOT_STARTED: ['RUNNING', 'MEETS_REQUIREMENT', 'FAILS_REQUIREMENT'],
  RUNNING: ['MEETS_REQUIREMENT', 'FAILS_REQUIREMENT'],
  MEETS_REQUIREMENT: [],
  FAILS_REQUIREMENT: [],
};

export class SuiteRun {
  private current: SuiteState = 'NOT_STARTED';

  constructor(readonly suite: SuiteDefinition) {}

  get state(): SuiteState {
    return this.current;
  }

  /** Moves to RUNNING on the first launched test. */
  testStarted(): void {
    if (this.current !== 'RUNNING') this.transition('RUNNING');
  }

  finish(state: TerminalSuiteState): void {
    // Skipping RUNNING is only legal for a suite that had nothing to run.
    if (this.current === 'NOT_STARTED' && this.suite.tests.length > 0) {
      throw new Error(`Suite '${this.suite.key}' cannot finish before it starts`);
    }
    this.transition(state);
  }

  private transition(next: SuiteState): void {
    if (!TRANSITIONS[this.current].includes(next)) {
      throw new Error(`Suite '${this.suite.key}' cannot move from ${this.current} to ${next}`);
    }
    this.current = next;
  }
}

export function roundRate(rate: number): number {
  return Math.round(rate * 10) / 10;
}

/**
 * Pass rate is passed / total * 100. An empty suite meets its requirement
 * only when the requirement is zero.
 */
export function evaluateSuite(suite: SuiteDefinition, tests: readonly TestResult[]): SuiteResult {
  const summary = summarize(tests);
  const rate = passRate(summary);
  const meetsRequirement =
    summary.total === 0 ? suite.requiredPassRate <= 0 : rate >= suite.requiredPassRate;

  return {
    key: suite.key,
    name: suite.name,
    description: suite.description,
    requiredPassRate: suite.requiredPassRate,
    state: meetsRequirement ? 'MEETS_REQUIREMENT' : 'FAILS_REQUIREMENT',
    tests: [...tests],
    ...summary,
    passRate: roundRate(rate),
    meetsRequirement,
  };
}

export interface ReadinessOptions {
  timestamp: string;
  target: ValidationTarget;
  criticalSuiteKey?: string;
  readinessThreshold?: number;
}

export function evaluateReadiness(
  suiteResults: readonly SuiteResult[],
  options: ReadinessOptions
): ValidationReport {
  const criticalSuite = options.criticalSuiteKey ?? CRITICAL_SUITE_KEY;
  const threshold = options.readinessThreshold ?? PRODUCTION_PASS_RATE_THRESHOLD;

  const totals = suiteResults.reduce(
    (acc, suite) => ({
      total: acc.total + suite.total,
      passed: acc.passed + suite.passed,
      failed: acc.failed + suite.failed,
      skipped: acc.skipped + suite.skipped,
      errors: acc.errors + suite.errors,
    }),
    { total: 0, passed: 0, failed: 0, skipped: 0, errors: 0 }
  );
  const overallRate = passRate(totals);
  const criticalTestsPassed =
    suiteResults.find((suite) => suite.key === criticalSuite)?.meetsRequirement ?? false;
  const allSuitesMet = suiteResults.every((suite) => suite.meetsRequirement);

  return {
    timestamp: options.timestamp,
    target: options.target,
    suites: Object.fromEntries(suiteResults.map((suite) => [suite.key, suite])),
    summary: {
      totalTests: totals.total,
      passed: totals.passed,
      failed: totals.failed,
      skipped: totals.skipped,
      errors: totals.errors,
      overallPassRate: roundRate(overallRate),
      requiredOverallPassRate: threshold,
      criticalSuite,
      criticalTestsPassed,
    },
    productionReady: allSuitesMet && criticalTestsPassed && overallRate >= threshold,
  };
}

export class ProductionValidator {
  /** Suite state machines of the latest `validate()` call. */
  private runs: Map<string, SuiteRun>;
  private readonly log = createValidationLogger();

  constructor(private readonly options: ProductionValidatorOptions) {
    if (options.suites.length === 0) {
      throw new ValidationConfigError('No validation suites configured');
    }
    const keys = new Set<string>();
    for (const suite of options.suites) {
      if (keys.has(suite.key)) {
        throw new ValidationConfigError(`Duplicate validation suite key '${suite.key}'`);
      }
      keys.add(suite.key);
    }
    this.runs = this.freshRuns();
  }

  suiteState(key: string): SuiteState | undefined {
    return this.runs.get(key)?.state;
  }

  /** Runs every suite from NOT_STARTED; a validator may be run again. */
  async validate(): Promise<ValidationReport> {
    const now = this.options.now ?? (() => new Date());
    const timestamp = now().toISOString();
    const results: SuiteResult[] = [];

    this.runs = this.freshRuns();
    for (const run of this.runs.values()) {
      results.push(await this.runSuite(run));
    }

    const report = evaluateReadiness(results, {
      timestamp,
      target: this.options.target,
      criticalSuiteKey: this.options.criticalSuiteKey,
      readinessThreshold: this.options.readinessThreshold,
    });
    this.log.info(
      { productionReady: report.productionReady, overallPassRate: report.summary.overallPassRate },
      'Validation finished'
    );
    return report;
  }

  private freshRuns(): Map<string, SuiteRun> {
    return new Map(this.options.suites.map((suite) => [suite.key, new SuiteRun(suite)]));
  }

  private async runSuite(run: SuiteRun): Promise<SuiteResult> {
    const { suite } = run;
    const listener = this.options.listener;
    listener?.onSuiteStart?.(suite);

    if (suite.tests.length === 0) {
      this.log.warn({ suite: suite.key, requiredPassRate: suite.requiredPassRate }, 'Suite has no tests');
    }

    const tests: TestResult[] = [];
    for (const testId of suite.tests) {
      run.testStarted();
      listener?.onTestStart?.(suite, testId);
      const result = await this.launch(testId);
      tests.push(result);
      listener?.onTestComplete?.(suite, result);
    }

    const result = evaluateSuite(suite, tests);
    run.finish(result.state);
    listener?.onSuiteComplete?.(result);
    return result;
  }

  private async launch(testId: string): Promise<TestResult> {
    const timestamp = new Date().toISOString();
    try {
      return await this.options.launcher.launch(testId);
    } catch (error) {
      this.log.error({ testId, err: error }, 'Launcher failed; recording an ERROR result');
      return createTestResult(
        { id: testId, name: `test_${testId}`, group: 'unknown' },
        'ERROR',
        0,
        timestamp,
        `Test error: ${errorMessage(error)}`,
        errorTrace(error)
      );
    }
  }
}
