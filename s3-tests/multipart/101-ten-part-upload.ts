import assert from 'node:assert/strict';
import { createHash } from 'node:crypto';
import type { CompletedPart } from '@aws-sdk/client-s3';
import type { S3Config } from '../shared/config.js';
import type { S3TestClient } from '../shared/s3-client.js';
import { cleanupBucket, generateBucketName, randomBytes } from '../shared/test-utils.js';

const PART_COUNT = 10;
const PART_SIZE = 5 * 1024 * 1024;
const LAST_PART_SIZE = 512 * 1024;

/** Parts uploaded out of order and completed in order reassemble byte for byte. */
export async function test_101(client: S3TestClient, config: S3Config): Promise<void> {
  const bucket = generateBucketName(config.bucketPrefix, 'test-101');
  const key = 'multipart-ten-parts.bin';
  const bodies = Array.from({ length: PART_COUNT }, (_, index) =>
    randomBytes(index === PART_COUNT - 1 ? LAST_PART_SIZE : PART_SIZE)
  );
  const expectedHash = createHash('sha256').update(Buffer.concat(bodies)).digest('hex');

  try {
    await client.createBucket(bucket);
    const uploadId = await client.createMultipartUpload(bucket, key);

    const parts: CompletedPart[] = [];
    for (let index = PART_COUNT - 1; index >= 0; index--) {
      parts.push(await client.uploadPart(bucket, key, uploadId, index + 1, bodies[index]));
    }
    parts.sort((a, b) => (a.PartNumber ?? 0) - (b.PartNumber ?? 0));
    await client.completeMultipartUpload(bucket, key, uploadId, parts);

    const head = await client.headObject(bucket, key);
    const expectedSize = (PART_COUNT - 1) * PART_SIZE + LAST_PART_SIZE;
    assert.equal(head.ContentLength, expectedSize, `Size mismatch: expected ${expectedSize}, got ${head.ContentLength}`);

    const downloaded = await client.getObject(bucket, key);
    const actualHash = createHash('sha256').update(downloaded.body).digest('hex');
    assert.equal(actualHash, expectedHash, 'Ten-part object is corrupted');

    const pending = await client.listMultipartUploads(bucket);
    assert.equal(pending.length, 0, 'Completed upload is still listed as in progress');
  } finally {
    await cleanupBucket(client, bucket);
  }
}
