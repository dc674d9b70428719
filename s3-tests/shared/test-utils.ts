import { AssertionError } from 'node:assert';
import { createHash, randomBytes as cryptoRandomBytes, randomUUID } from 'node:crypto';
import type { S3TestClient } from './s3-client.js';
import { SkipTestError, errorMessage } from './errors.js';
import { createUnitLogger } from './logger.js';
import type { TestResult, TestStatus, TestUnit, UnitOutcome } from './types.js';

export function createTestResult(
  unit: Pick<TestUnit, 'id' | 'name' | 'group'>,
  status: TestStatus,
  duration: number,
  timestamp: string,
  message = '',
  error = ''
): TestResult {
  return {
    testId: unit.id,
    testName: unit.name,
    testGroup: unit.group,
    status,
    duration: Math.max(0, duration),
    message,
    error: status === 'FAILED' || status === 'ERROR' ? error : '',
    timestamp,
  };
}

/** Duration in milliseconds. */
export async function withTiming<T>(fn: () => Promise<T>): Promise<{ result: T; duration: number }> {
  const start = performance.now();
  const result = await fn();
  const duration = performance.now() - start;
  return { result, duration };
}

export function generateBucketName(prefix: string, suffix?: string): string {
  const parts = [prefix];
  if (suffix) parts.push(suffix);
  parts.push(randomUUID().substring(0, 8));
  return parts.join('-').toLowerCase();
}

export function generateKeyName(prefix = 'test-object'): string {
  return `${prefix}-${randomUUID()}`;
}

export function randomBytes(size: number): Buffer {
  return cryptoRandomBytes(size);
}

export function md5Hex(data: Uint8Array | string): string {
  return createHash('md5').update(data).digest('hex');
}

export async function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function assertDeepEqual<T>(actual: T, expected: T, message?: string): void {
  const actualJson = JSON.stringify(actual, null, 2);
  const expectedJson = JSON.stringify(expected, null, 2);
  if (actualJson !== expectedJson) {
    throw new AssertionError({
      message: `${message ?? 'Assertion failed'}\nExpected: ${expectedJson}\nActual: ${actualJson}`,
      actual,
      expected,
      operator: 'deepEqual',
    });
  }
}

export function assertionFailed(message: string): UnitOutcome {
  return { kind: 'assertion_failed', message };
}

export function fault(message: string, trace?: string): UnitOutcome {
  return { kind: 'fault', message, trace };
}

export function skipped(reason: string): UnitOutcome {
  return { kind: 'skipped', reason };
}

export function skip(reason: string): never {
  throw new SkipTestError(reason);
}

/** Best-effort teardown: deletes every object version and the bucket, never throws. */
export async function cleanupBucket(client: S3TestClient, bucket: string | undefined): Promise<void> {
  if (!bucket) return;
  try {
    if (!(await client.bucketExists(bucket))) return;
    await client.emptyBucket(bucket);
    await client.deleteBucket(bucket);
  } catch (error) {
    createUnitLogger(bucket).debug({ bucket, err: errorMessage(error) }, 'Cleanup failed');
  }
}
