import assert from 'node:assert/strict';
import type { S3Config } from '../shared/config.js';
import { stripEtag, type S3TestClient } from '../shared/s3-client.js';
import { cleanupBucket, generateBucketName, md5Hex } from '../shared/test-utils.js';

const CONCURRENT_UPLOADS = 10;

function payload(index: number): Buffer {
  const pattern = Buffer.from(Array.from({ length: 256 }, (_, byte) => byte));
  return Buffer.concat([Buffer.from(`Upload ${index} data: `), ...Array<Buffer>(100).fill(pattern)]);
}

/** Parallel uploads of distinct bodies must not bleed into each other. */
export async function test_006(client: S3TestClient, config: S3Config): Promise<void> {
  const bucket = generateBucketName(config.bucketPrefix, 'test-006');
  const uploads = Array.from({ length: CONCURRENT_UPLOADS }, (_, index) => {
    const data = payload(index);
    return { key: `concurrent-upload-${index}.dat`, data, hash: md5Hex(data), index };
  });

  try {
    await client.createBucket(bucket);

    const settled = await Promise.allSettled(
      uploads.map((upload) =>
        client.putObject(bucket, upload.key, upload.data, {
          Metadata: { hash: upload.hash, upload: String(upload.index) },
        })
      )
    );
    const failed = settled
      .map((outcome, index) => ({ outcome, key: uploads[index].key }))
      .filter(({ outcome }) => outcome.status === 'rejected')
      .map(({ key }) => key);
    assert.deepEqual(failed, [], `Some uploads failed: ${failed.join(', ')}`);

    for (const [index, outcome] of settled.entries()) {
      if (outcome.status === 'fulfilled') {
        assert.equal(stripEtag(outcome.value.ETag), uploads[index].hash, `ETag mismatch for ${uploads[index].key}`);
      }
    }

    for (const upload of uploads) {
      const downloaded = await client.getObject(bucket, upload.key);
      const downloadedHash = md5Hex(downloaded.body);
      assert.equal(
        downloadedHash,
        upload.hash,
        `Object ${upload.key} corrupted: expected ${upload.hash}, got ${downloadedHash}`
      );
      assert.equal(downloaded.metadata.upload, String(upload.index), `Metadata crossed over on ${upload.key}`);
    }
  } finally {
    await cleanupBucket(client, bucket);
  }
}
