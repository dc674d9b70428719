import assert from 'node:assert/strict';
import { createHash } from 'node:crypto';
import type { S3Config } from '../shared/config.js';
import { stripEtag, type S3TestClient } from '../shared/s3-client.js';
import { cleanupBucket, generateBucketName, randomBytes } from '../shared/test-utils.js';

const PART_SIZE = 5 * 1024 * 1024;

function sha256(data: Uint8Array): string {
  return createHash('sha256').update(data).digest('hex');
}

/** Two-part upload: a full-size part and a short last part. */
export async function test_100(client: S3TestClient, config: S3Config): Promise<void> {
  const bucket = generateBucketName(config.bucketPrefix, 'test-100');
  const key = 'multipart-basic.bin';
  const first = randomBytes(PART_SIZE);
  const last = randomBytes(1024 * 1024);

  try {
    await client.createBucket(bucket);

    const uploadId = await client.createMultipartUpload(bucket, key);
    const parts = [
      await client.uploadPart(bucket, key, uploadId, 1, first),
      await client.uploadPart(bucket, key, uploadId, 2, last),
    ];
    const completed = await client.completeMultipartUpload(bucket, key, uploadId, parts);

    const etag = stripEtag(completed.ETag) ?? '';
    assert.match(etag, /-2$/, `Multipart ETag ${etag} does not carry the part count`);

    const downloaded = await client.getObject(bucket, key);
    assert.equal(downloaded.contentLength, first.length + last.length, 'Assembled object has the wrong size');
    assert.equal(sha256(downloaded.body), sha256(Buffer.concat([first, last])), 'Assembled object is corrupted');
  } finally {
    await cleanupBucket(client, bucket);
  }
}
