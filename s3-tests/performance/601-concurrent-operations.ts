import assert from 'node:assert/strict';
import { numericOption, type S3Config } from '../shared/config.js';
import type { S3TestClient } from '../shared/s3-client.js';
import { createUnitLogger } from '../shared/logger.js';
import { cleanupBucket, generateBucketName, md5Hex, randomBytes, withTiming } from '../shared/test-utils.js';

const CONCURRENCY = 20;
const OBJECT_SIZE = 64 * 1024;

function percentile(values: readonly number[], p: number): number {
  const sorted = [...values].sort((a, b) => a - b);
  return sorted[Math.min(sorted.length - 1, Math.ceil((p / 100) * sorted.length) - 1)];
}

/** Concurrent PUT then GET; every request succeeds and p95 latency stays under `max_latency_ms`. */
export async function test_601(client: S3TestClient, config: S3Config): Promise<void> {
  const bucket = generateBucketName(config.bucketPrefix, 'test-601');
  const maxLatency = numericOption(config, 'max_latency_ms', 5000);
  const bodies = Array.from({ length: CONCURRENCY }, () => randomBytes(OBJECT_SIZE));

  try {
    await client.createBucket(bucket);

    const puts = await Promise.all(
      bodies.map((body, i) => withTiming(() => client.putObject(bucket, `concurrent-${i}.bin`, body)))
    );
    const gets = await Promise.all(
      bodies.map((_, i) => withTiming(() => client.getObject(bucket, `concurrent-${i}.bin`)))
    );

    for (const [i, { result }] of gets.entries()) {
      assert.equal(md5Hex(result.body), md5Hex(bodies[i]), `Object concurrent-${i}.bin corrupted`);
    }

    const latencies = [...puts, ...gets].map((timing) => timing.duration);
    const p95 = percentile(latencies, 95);
    createUnitLogger('601').info({ p95, requests: latencies.length }, 'Concurrent latency (ms)');
    assert.ok(p95 <= maxLatency, `p95 latency ${p95.toFixed(0)}ms exceeds ${maxLatency}ms`);
  } finally {
    await cleanupBucket(client, bucket);
  }
}
