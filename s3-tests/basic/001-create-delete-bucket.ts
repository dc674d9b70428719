import assert from 'node:assert/strict';
import type { S3Config } from '../shared/config.js';
import type { S3TestClient } from '../shared/s3-client.js';
import { cleanupBucket, generateBucketName } from '../shared/test-utils.js';

/** Create a bucket, find it in the listing, delete it. */
export async function test_001(client: S3TestClient, config: S3Config): Promise<void> {
  const bucket = generateBucketName(config.bucketPrefix, 'test-001');

  try {
    await client.createBucket(bucket);
    assert.ok(await client.bucketExists(bucket), `Bucket ${bucket} missing after creation`);

    const names = (await client.listBuckets()).map((entry) => entry.Name);
    assert.ok(names.includes(bucket), `Bucket ${bucket} not in ListBuckets`);

    await client.deleteBucket(bucket);
    assert.equal(await client.bucketExists(bucket), false, `Bucket ${bucket} still exists after deletion`);
  } finally {
    await cleanupBucket(client, bucket);
  }
}
