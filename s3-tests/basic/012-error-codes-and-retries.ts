import assert from 'node:assert/strict';
import type { S3Config } from '../shared/config.js';
import { isNotFound, s3ErrorCode, type S3TestClient } from '../shared/s3-client.js';
import { cleanupBucket, generateBucketName, generateKeyName, withTiming } from '../shared/test-utils.js';

const SEQUENTIAL_UPLOADS = 5;
const CONCURRENT_UPLOADS = 10;
const MAX_OPERATION_MS = 30_000;
const MAX_AVERAGE_MS = 5_000;
const MIN_CONCURRENT_SUCCESS_RATE = 0.8;

export async function test_012(client: S3TestClient, config: S3Config): Promise<void> {
  const bucket = generateBucketName(config.bucketPrefix, 'test-012');

  try {
    await client.createBucket(bucket);

    // Missing keys surface as a clean not-found fault.
    const missing = generateKeyName('non-existent');
    await assert.rejects(
      client.getObject(bucket, missing),
      (error: unknown) => {
        assert.ok(isNotFound(error), `Expected NoSuchKey error, got: ${s3ErrorCode(error) ?? String(error)}`);
        return true;
      }
    );

    const timings: number[] = [];
    for (let i = 0; i < SEQUENTIAL_UPLOADS; i++) {
      const { duration } = await withTiming(() =>
        client.putObject(bucket, `retry-test-${i}.txt`, 'Test data for retry logic')
      );
      timings.push(duration);
    }
    const average = timings.reduce((sum, ms) => sum + ms, 0) / timings.length;
    const slowest = Math.max(...timings);
    assert.ok(slowest < MAX_OPERATION_MS, `Operations taking too long, possible retry issues: max=${slowest}ms`);
    assert.ok(average < MAX_AVERAGE_MS, `Average operation time too high: ${average}ms`);

    const concurrent = await Promise.allSettled(
      Array.from({ length: CONCURRENT_UPLOADS }, (_, i) =>
        client.putObject(bucket, `concurrent-retry-${i}.txt`, `Data for upload ${i}`)
      )
    );
    const succeeded = concurrent.filter((outcome) => outcome.status === 'fulfilled').length;
    assert.ok(
      succeeded / CONCURRENT_UPLOADS > MIN_CONCURRENT_SUCCESS_RATE,
      `Too many failures: ${CONCURRENT_UPLOADS - succeeded}/${CONCURRENT_UPLOADS}`
    );

    // Repeating a PUT or DELETE must be safe to retry.
    const idempotentKey = 'idempotent-test.txt';
    for (let attempt = 0; attempt < 3; attempt++) {
      await client.putObject(bucket, idempotentKey, `Idempotent test data ${attempt}`);
    }
    const latest = await client.getObject(bucket, idempotentKey);
    assert.equal(Buffer.from(latest.body).toString('utf-8'), 'Idempotent test data 2', 'Last write did not win');

    await client.deleteObject(bucket, idempotentKey);
    await client.deleteObject(bucket, idempotentKey);
    assert.equal(await client.objectExists(bucket, idempotentKey), false, 'Object survived deletion');
  } finally {
    await cleanupBucket(client, bucket);
  }
}
