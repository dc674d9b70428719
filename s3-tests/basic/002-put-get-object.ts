import assert from 'node:assert/strict';
import type { S3Config } from '../shared/config.js';
import type { S3TestClient } from '../shared/s3-client.js';
import { cleanupBucket, generateBucketName } from '../shared/test-utils.js';

export async function test_002(client: S3TestClient, config: S3Config): Promise<void> {
  const bucket = generateBucketName(config.bucketPrefix, 'test-002');
  const key = 'hello.txt';
  const body = 'Hello from the S3 compatibility suite';

  try {
    await client.createBucket(bucket);
    await client.putObject(bucket, key, body, {
      ContentType: 'text/plain',
      Metadata: { purpose: 'round-trip' },
    });

    const downloaded = await client.getObject(bucket, key);
    assert.equal(Buffer.from(downloaded.body).toString('utf-8'), body, 'Downloaded body differs');
    assert.equal(downloaded.contentType, 'text/plain', 'Content-Type not preserved');
    assert.equal(downloaded.metadata.purpose, 'round-trip', 'User metadata not preserved');

    const head = await client.headObject(bucket, key);
    assert.equal(head.ContentLength, Buffer.byteLength(body), 'HEAD reports the wrong length');

    const listed = (await client.listObjects(bucket)).map((object) => object.Key);
    assert.deepEqual(listed, [key], 'Listing does not show exactly the uploaded key');

    await client.deleteObject(bucket, key);
    assert.equal(await client.objectExists(bucket, key), false, 'Object still exists after deletion');
  } finally {
    await cleanupBucket(client, bucket);
  }
}
