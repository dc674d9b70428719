import assert from 'node:assert/strict';
import type { S3Config } from '../shared/config.js';
import type { S3TestClient } from '../shared/s3-client.js';
import { stripEtag } from '../shared/s3-client.js';
import { cleanupBucket, generateBucketName, md5Hex, randomBytes } from '../shared/test-utils.js';

export async function test_003(client: S3TestClient, config: S3Config): Promise<void> {
  const source = generateBucketName(config.bucketPrefix, 'test-003-src');
  const target = generateBucketName(config.bucketPrefix, 'test-003-dst');
  const body = randomBytes(64 * 1024);

  try {
    await client.createBucket(source);
    await client.createBucket(target);
    await client.putObject(source, 'original.bin', body, { Metadata: { origin: 'copy-test' } });

    const sameBucket = await client.copyObject(source, 'original.bin', source, 'copies/same-bucket.bin');
    assert.equal(stripEtag(sameBucket.CopyObjectResult?.ETag), md5Hex(body), 'Copy ETag differs from source MD5');

    await client.copyObject(source, 'original.bin', target, 'across.bin');
    const copied = await client.getObject(target, 'across.bin');
    assert.equal(md5Hex(copied.body), md5Hex(body), 'Cross-bucket copy changed the content');
    assert.equal(copied.metadata.origin, 'copy-test', 'Copy did not keep user metadata');

    assert.equal(await client.objectExists(source, 'original.bin'), true, 'Copying removed the source');
  } finally {
    await cleanupBucket(client, source);
    await cleanupBucket(client, target);
  }
}
