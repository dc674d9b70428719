import assert from 'node:assert/strict';
import type { S3Config } from '../shared/config.js';
import { createS3TestClient, s3ErrorCode, type S3TestClient } from '../shared/s3-client.js';
import { errorMessage } from '../shared/errors.js';
import { cleanupBucket, generateBucketName, randomBytes, sleep } from '../shared/test-utils.js';

const TIMEOUT_HINT = /timeout|timed out|socket|connection|ECONNRESET|aborted/i;

function isTimeoutFault(error: unknown): boolean {
  const code = s3ErrorCode(error) ?? '';
  return TIMEOUT_HINT.test(code) || TIMEOUT_HINT.test(errorMessage(error));
}

/**
 * A client with a 1 ms request timeout either gets its upload through or
 * fails with a timeout-shaped error, and the endpoint keeps serving normal
 * requests afterwards.
 */
export async function test_011(client: S3TestClient, config: S3Config): Promise<void> {
  const bucket = generateBucketName(config.bucketPrefix, 'test-011');
  const impatient = createS3TestClient(config, { requestTimeout: 1, connectionTimeout: 1, maxAttempts: 1 });

  try {
    await client.createBucket(bucket);

    const put = await client.putObject(bucket, 'timeout-test.txt', 'Test data for timeout handling');
    assert.ok(put.ETag, 'Normal upload returned no ETag');

    try {
      const slow = await impatient.putObject(bucket, 'large-timeout-test.bin', randomBytes(1024 * 1024));
      assert.ok(slow.ETag, 'Upload under a short timeout returned no ETag');
    } catch (error) {
      assert.ok(isTimeoutFault(error), `Expected a timeout error, got: ${errorMessage(error)}`);
    }

    // Give the endpoint a moment to drop the abandoned connection.
    await sleep(1000);

    const keys = (await client.listObjects(bucket)).map((object) => object.Key);
    assert.ok(keys.includes('timeout-test.txt'), 'Listing after a timeout lost the first object');

    const recovery = await client.putObject(bucket, 'recovery-test.txt', 'Small test data');
    assert.ok(recovery.ETag, 'Upload after a timeout did not recover');
  } finally {
    impatient.destroy();
    await cleanupBucket(client, bucket);
  }
}
