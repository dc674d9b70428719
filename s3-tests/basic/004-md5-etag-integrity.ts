import assert from 'node:assert/strict';
import type { S3Config } from '../shared/config.js';
import { stripEtag, type S3TestClient } from '../shared/s3-client.js';
import { cleanupBucket, generateBucketName, md5Hex } from '../shared/test-utils.js';

/** A single-part upload's ETag is the MD5 of its body, and the body survives the round trip. */
export async function test_004(client: S3TestClient, config: S3Config): Promise<void> {
  const bucket = generateBucketName(config.bucketPrefix, 'test-004');
  const key = 'test-md5-validation.bin';
  const data = Buffer.from('This is test data for MD5 validation'.repeat(100));
  const originalMd5 = md5Hex(data);

  try {
    await client.createBucket(bucket);
    const put = await client.putObject(bucket, key, data, { Metadata: { 'original-md5': originalMd5 } });

    const etag = stripEtag(put.ETag);
    assert.equal(etag, originalMd5, `ETag ${etag} doesn't match MD5 ${originalMd5}`);

    const downloaded = await client.getObject(bucket, key);
    const downloadedMd5 = md5Hex(downloaded.body);
    assert.equal(downloadedMd5, originalMd5, `Data corrupted: expected MD5 ${originalMd5}, got ${downloadedMd5}`);
    assert.ok(data.equals(downloaded.body), "Downloaded data doesn't match original");
    assert.equal(downloaded.metadata['original-md5'], originalMd5, 'Metadata MD5 not preserved');
  } finally {
    await cleanupBucket(client, bucket);
  }
}
