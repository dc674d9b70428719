import assert from 'node:assert/strict';
import { numericOption, type S3Config } from '../shared/config.js';
import type { S3TestClient } from '../shared/s3-client.js';
import { createUnitLogger } from '../shared/logger.js';
import { cleanupBucket, generateBucketName, randomBytes, withTiming } from '../shared/test-utils.js';

const OBJECT_COUNT = 10;
const OBJECT_SIZE = 1024 * 1024;

function megabytesPerSecond(bytes: number, ms: number): number {
  return bytes / (1024 * 1024) / Math.max(ms / 1000, 0.001);
}

/** Sequential 1 MiB uploads and downloads must reach `min_throughput_mbps` (default 1). */
export async function test_600(client: S3TestClient, config: S3Config): Promise<void> {
  const bucket = generateBucketName(config.bucketPrefix, 'test-600');
  const minimum = numericOption(config, 'min_throughput_mbps', 1);
  const data = randomBytes(OBJECT_SIZE);
  const totalBytes = OBJECT_COUNT * OBJECT_SIZE;

  try {
    await client.createBucket(bucket);

    const upload = await withTiming(async () => {
      for (let i = 0; i < OBJECT_COUNT; i++) {
        await client.putObject(bucket, `throughput-${i}.bin`, data);
      }
    });
    const download = await withTiming(async () => {
      for (let i = 0; i < OBJECT_COUNT; i++) {
        const object = await client.getObject(bucket, `throughput-${i}.bin`);
        assert.equal(object.body.length, OBJECT_SIZE, `Object throughput-${i}.bin came back truncated`);
      }
    });

    const uploadRate = megabytesPerSecond(totalBytes, upload.duration);
    const downloadRate = megabytesPerSecond(totalBytes, download.duration);
    createUnitLogger('600').info({ uploadRate, downloadRate }, 'Sequential throughput (MiB/s)');

    assert.ok(uploadRate >= minimum, `Upload throughput ${uploadRate.toFixed(2)} MiB/s below ${minimum} MiB/s`);
    assert.ok(downloadRate >= minimum, `Download throughput ${downloadRate.toFixed(2)} MiB/s below ${minimum} MiB/s`);
  } finally {
    await cleanupBucket(client, bucket);
  }
}
