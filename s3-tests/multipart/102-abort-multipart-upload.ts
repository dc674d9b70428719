import assert from 'node:assert/strict';
import type { S3Config } from '../shared/config.js';
import { s3ErrorCode, type S3TestClient } from '../shared/s3-client.js';
import { cleanupBucket, generateBucketName, randomBytes } from '../shared/test-utils.js';

export async function test_102(client: S3TestClient, config: S3Config): Promise<void> {
  const bucket = generateBucketName(config.bucketPrefix, 'test-102');
  const key = 'multipart-aborted.bin';

  try {
    await client.createBucket(bucket);
    const uploadId = await client.createMultipartUpload(bucket, key);
    await client.uploadPart(bucket, key, uploadId, 1, randomBytes(5 * 1024 * 1024));

    const inProgress = await client.listMultipartUploads(bucket);
    assert.ok(
      inProgress.some((upload) => upload.UploadId === uploadId),
      'New upload is not listed as in progress'
    );

    await client.abortMultipartUpload(bucket, key, uploadId);

    const remaining = await client.listMultipartUploads(bucket);
    assert.ok(
      remaining.every((upload) => upload.UploadId !== uploadId),
      'Aborted upload is still listed'
    );
    assert.equal(await client.objectExists(bucket, key), false, 'Aborted upload produced an object');

    await assert.rejects(client.uploadPart(bucket, key, uploadId, 2, randomBytes(1024)), (error: unknown) => {
      assert.equal(s3ErrorCode(error), 'NoSuchUpload', 'Uploading to an aborted upload should fail with NoSuchUpload');
      return true;
    });
  } finally {
    await cleanupBucket(client, bucket);
  }
}
