import assert from 'node:assert/strict';
import { createHash } from 'node:crypto';
import type { CompletedPart } from '@aws-sdk/client-s3';
import { numericOption, type S3Config } from '../shared/config.js';
import type { S3TestClient } from '../shared/s3-client.js';
import { cleanupBucket, generateBucketName, randomBytes } from '../shared/test-utils.js';

const DEFAULT_FILE_SIZE = 10 * 1024 * 1024;
// Smallest part size S3 accepts for every part except the last.
const PART_SIZE = 5 * 1024 * 1024;

/** Uploads `large_file_size` bytes (multipart above one part) and verifies SHA-256 and size. */
export async function test_005(client: S3TestClient, config: S3Config): Promise<void> {
  const bucket = generateBucketName(config.bucketPrefix, 'test-005');
  const key = 'large-file-test.bin';
  const fileSize = numericOption(config, 'large_file_size', DEFAULT_FILE_SIZE);
  const hasher = createHash('sha256');

  try {
    await client.createBucket(bucket);

    if (fileSize > PART_SIZE) {
      const uploadId = await client.createMultipartUpload(bucket, key);
      const parts: CompletedPart[] = [];
      for (let offset = 0, partNumber = 1; offset < fileSize; offset += PART_SIZE, partNumber++) {
        const chunk = randomBytes(Math.min(PART_SIZE, fileSize - offset));
        hasher.update(chunk);
        parts.push(await client.uploadPart(bucket, key, uploadId, partNumber, chunk));
      }
      await client.completeMultipartUpload(bucket, key, uploadId, parts);
    } else {
      const data = randomBytes(fileSize);
      hasher.update(data);
      await client.putObject(bucket, key, data);
    }

    const originalHash = hasher.digest('hex');
    const downloaded = await client.getObject(bucket, key);
    const downloadedHash = createHash('sha256').update(downloaded.body).digest('hex');
    assert.equal(
      downloadedHash,
      originalHash,
      `Large file corrupted: expected hash ${originalHash}, got ${downloadedHash}`
    );

    const head = await client.headObject(bucket, key);
    assert.equal(head.ContentLength, fileSize, `Size mismatch: expected ${fileSize}, got ${head.ContentLength}`);
  } finally {
    await cleanupBucket(client, bucket);
  }
}
