import { AssertionError } from 'node:assert';
import { pathToFileURL } from 'node:url';
import type { S3Config } from '../shared/config.js';
import { SkipTestError, errorMessage, errorTrace } from '../shared/errors.js';
import { createExecutorLogger } from '../shared/logger.js';
import type { S3TestClient } from '../shared/s3-client.js';
import { createTestResult } from '../shared/test-utils.js';
import type { TestResult, TestUnit, UnitOutcome } from '../shared/types.js';

export type TestEntry = (
  client: S3TestClient,
  config: S3Config
) => Promise<UnitOutcome | void> | UnitOutcome | void;

export type UnitModule = Readonly<Record<string, unknown>>;

/** Resolves a unit's location to its module namespace. */
export type UnitLoader = (location: string) => Promise<UnitModule>;

export const importUnit: UnitLoader = async (location) => {
  const mod: unknown = await import(pathToFileURL(location).href);
  if (typeof mod !== 'object' || mod === null) {
    throw new Error(`Module at ${location} did not evaluate to a namespace object`);
  }
  return Object.fromEntries(Object.entries(mod));
};

function isTestEntry(value: unknown): value is TestEntry {
  return typeof value === 'function';
}

export function isAssertionFailure(error: unknown): error is Error {
  return error instanceof AssertionError || (error instanceof Error && error.name === 'AssertionError');
}

function isUnitOutcome(value: unknown): value is UnitOutcome {
  if (typeof value !== 'object' || value === null || !('kind' in value)) return false;
  return value.kind === 'assertion_failed' || value.kind === 'fault' || value.kind === 'skipped';
}

export function entryPointNames(unit: Pick<TestUnit, 'id' | 'numericId'>): string[] {
  return [...new Set([`test_${unit.id}`, `test_${unit.numericId}`, 'run'])];
}

export class TestExecutor {
  private readonly log = createExecutorLogger();

  constructor(
    private readonly client: S3TestClient,
    private readonly config: S3Config,
    private readonly loader: UnitLoader = importUnit
  ) {}

  /** Runs one unit and classifies the outcome. Never rejects. */
  async execute(unit: TestUnit): Promise<TestResult> {
    const timestamp = new Date().toISOString();
    const start = performance.now();
    const elapsed = () => (performance.now() - start) / 1000;

    try {
      const mod = await this.loader(unit.location);
      const entry = entryPointNames(unit)
        .map((name) => mod[name])
        .find(isTestEntry);
      if (!entry) {
        return createTestResult(
          unit,
          'ERROR',
          elapsed(),
          timestamp,
          `Test error: No test function 'test_${unit.id}' or 'run' found in ${unit.location}`
        );
      }

      this.log.debug({ testId: unit.id, location: unit.location }, 'Executing test');
      const outcome = await entry(this.client, this.config);
      const duration = elapsed();

      if (isUnitOutcome(outcome)) {
        return this.fromOutcome(unit, outcome, duration, timestamp);
      }
      return createTestResult(unit, 'PASSED', duration, timestamp, 'Test passed successfully');
    } catch (error) {
      return this.fromError(unit, error, elapsed(), timestamp);
    }
  }

  private fromOutcome(unit: TestUnit, outcome: UnitOutcome, duration: number, timestamp: string): TestResult {
    switch (outcome.kind) {
      case 'assertion_failed':
        return createTestResult(unit, 'FAILED', duration, timestamp, outcome.message, outcome.message);
      case 'skipped':
        return createTestResult(unit, 'SKIPPED', duration, timestamp, outcome.reason);
      case 'fault':
        return createTestResult(
          unit,
          'ERROR',
          duration,
          timestamp,
          `Test error: ${outcome.message}`,
          outcome.trace ?? outcome.message
        );
    }
  }

  private fromError(unit: TestUnit, error: unknown, duration: number, timestamp: string): TestResult {
    if (error instanceof SkipTestError) {
      return createTestResult(unit, 'SKIPPED', duration, timestamp, error.message);
    }
    if (isAssertionFailure(error)) {
      return createTestResult(unit, 'FAILED', duration, timestamp, error.message, errorTrace(error));
    }
    this.log.debug({ testId: unit.id, err: error }, 'Test raised an unexpected fault');
    return createTestResult(
      unit,
      'ERROR',
      duration,
      timestamp,
      `Test error: ${errorMessage(error)}`,
      errorTrace(error)
    );
  }
}
