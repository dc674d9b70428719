import assert from 'node:assert/strict';
import type { S3Config } from '../shared/config.js';
import { s3ErrorCode, type S3TestClient } from '../shared/s3-client.js';
import { cleanupBucket, generateBucketName, skip } from '../shared/test-utils.js';

const UNSUPPORTED = new Set(['NotImplemented', 'MethodNotAllowed']);

export async function test_200(client: S3TestClient, config: S3Config): Promise<void> {
  const bucket = generateBucketName(config.bucketPrefix, 'test-200');
  const key = 'versioned.txt';

  try {
    await client.createBucket(bucket);
    assert.equal(await client.getBucketVersioning(bucket), 'Disabled', 'New bucket should not be versioned');

    try {
      await client.putBucketVersioning(bucket, 'Enabled');
    } catch (error) {
      const code = s3ErrorCode(error);
      if (code && UNSUPPORTED.has(code)) skip(`Versioning not supported by endpoint (${code})`);
      throw error;
    }
    assert.equal(await client.getBucketVersioning(bucket), 'Enabled', 'Versioning did not turn on');

    const v1 = await client.putObject(bucket, key, 'version one');
    const v2 = await client.putObject(bucket, key, 'version two');
    assert.ok(v1.VersionId && v2.VersionId, 'Versioned PUT returned no VersionId');
    assert.notEqual(v1.VersionId, v2.VersionId, 'Two writes share one VersionId');

    const { versions } = await client.listObjectVersions(bucket, key);
    assert.equal(versions.length, 2, `Expected 2 versions, got ${versions.length}`);

    const older = await client.getObject(bucket, key, { VersionId: v1.VersionId });
    assert.equal(Buffer.from(older.body).toString('utf-8'), 'version one', 'Old version content changed');
    const current = await client.getObject(bucket, key);
    assert.equal(Buffer.from(current.body).toString('utf-8'), 'version two', 'Latest version is not current');

    await client.putBucketVersioning(bucket, 'Suspended');
    assert.equal(await client.getBucketVersioning(bucket), 'Suspended', 'Versioning did not suspend');

    const afterSuspend = await client.listObjectVersions(bucket, key);
    assert.equal(afterSuspend.versions.length, 2, 'Suspending versioning dropped existing versions');
  } finally {
    await cleanupBucket(client, bucket);
  }
}
