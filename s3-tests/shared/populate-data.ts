import { errorMessage } from './errors.js';
import { createChildLogger } from './logger.js';
import { s3ErrorCode, type S3TestClient } from './s3-client.js';
import { md5Hex, randomBytes } from './test-utils.js';

/** Size categories of the binary objects written to every standard bucket. */
export const POPULATION_SIZES: Readonly<Record<string, number>> = {
  tiny: 1024,
  small: 100 * 1024,
  medium: 1024 * 1024,
  large: 10 * 1024 * 1024,
};

export const DEFAULT_BUCKET_COUNT = 3;

const TEXT_CHARS =
  'abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789!"#$%&\'()*+,-./:;<=>?@[\\]^_`{|}~ \n';
const LOWERCASE = 'abcdefghijklmnopqrstuvwxyz';

export type PopulationClient = Pick<
  S3TestClient,
  | 'createBucket'
  | 'deleteBucket'
  | 'bucketExists'
  | 'emptyBucket'
  | 'putObject'
  | 'putBucketVersioning'
  | 'putBucketPolicy'
>;

export interface PlannedObject {
  key: string;
  contentType?: string;
  metadata: Record<string, string>;
  /** Generated on upload so large bodies are not held for the whole run. */
  body: () => Uint8Array;
}

export interface PopulateOptions {
  prefix: string;
  bucketCount?: number;
  sizes?: Readonly<Record<string, number>>;
  /** Remove the buckets this run would create, with their contents, first. */
  clean?: boolean;
  random?: () => number;
  now?: () => Date;
  report?: (line: string) => void;
}

export interface PopulationSummary {
  buckets: string[];
  objects: number;
  warnings: string[];
}

export interface PopulationBuckets {
  standard: string[];
  versioned: string;
  public: string;
}

export function populationBuckets(prefix: string, count = DEFAULT_BUCKET_COUNT): PopulationBuckets {
  return {
    standard: Array.from({ length: count }, (_, i) => `${prefix}-${String(i).padStart(2, '0')}`),
    versioned: `${prefix}-versioned`,
    public: `${prefix}-public`,
  };
}

function pick(chars: string, random: () => number): string {
  return chars[Math.floor(random() * chars.length)];
}

export function generateText(size: number, random: () => number = Math.random): Uint8Array {
  let text = '';
  for (let i = 0; i < size; i++) text += pick(TEXT_CHARS, random);
  return Buffer.from(text, 'utf-8');
}

export function generateJson(random: () => number = Math.random, now: () => Date = () => new Date()): Uint8Array {
  const document = {
    timestamp: now().toISOString(),
    test_id: Array.from({ length: 8 }, () => pick(LOWERCASE, random)).join(''),
    metadata: { version: '1.0', synthetic: true },
    values: Array.from({ length: 10 }, () => random()),
    description: 'Synthetic test data for S3 compatibility testing',
  };
  return Buffer.from(JSON.stringify(document, null, 2), 'utf-8');
}

export function generateCsv(random: () => number = Math.random, now: () => Date = () => new Date()): Uint8Array {
  const lines = ['id,name,value,timestamp'];
  for (let i = 0; i < 100; i++) {
    lines.push(`${i},item_${i},${random().toFixed(4)},${now().toISOString()}`);
  }
  return Buffer.from(`${lines.join('\n')}\n`, 'utf-8');
}

/** Objects written to each standard bucket, in upload order. */
export function standardObjects(
  sizes: Readonly<Record<string, number>> = POPULATION_SIZES,
  random: () => number = Math.random,
  now: () => Date = () => new Date()
): PlannedObject[] {
  const objects: PlannedObject[] = [];

  for (const [category, size] of Object.entries(sizes)) {
    objects.push({
      key: `binary/${category}/test-${category}.bin`,
      metadata: { type: 'binary', size_category: category },
      body: () => randomBytes(size),
    });
  }
  for (let i = 0; i < 3; i++) {
    objects.push({
      key: `text/document-${i}.txt`,
      contentType: 'text/plain',
      metadata: { type: 'text', index: String(i) },
      body: () => generateText(1000 + Math.floor(random() * 9001), random),
    });
  }
  for (let i = 0; i < 2; i++) {
    objects.push({
      key: `json/data-${i}.json`,
      contentType: 'application/json',
      metadata: { type: 'json' },
      body: () => generateJson(random, now),
    });
  }
  objects.push({
    key: 'csv/data.csv',
    contentType: 'text/csv',
    metadata: { type: 'csv' },
    body: () => generateCsv(random, now),
  });
  for (let depth = 0; depth < 3; depth++) {
    const dirs = Array.from({ length: depth + 1 }, (_, level) => `level${level}`).join('/');
    for (let file = 0; file < 2; file++) {
      objects.push({
        key: `${dirs}/file${file}.dat`,
        metadata: { type: 'nested', depth: String(depth) },
        body: () => randomBytes(1024),
      });
    }
  }
  return objects;
}

export function publicReadPolicy(bucket: string) {
  return {
    Version: '2012-10-17',
    Statement: [
      {
        Sid: 'PublicRead',
        Effect: 'Allow',
        Principal: '*',
        Action: ['s3:GetObject'],
        Resource: `arn:aws:s3:::${bucket}/*`,
      },
    ],
  };
}

/**
 * Fills an endpoint with synthetic buckets: standard buckets of mixed binary,
 * text, JSON, CSV and nested objects, a versioned bucket holding three
 * versions of one key, and a bucket with a public-read policy. Every object
 * carries its MD5 in the `md5` metadata key. Storage faults are reported as
 * warnings and the run carries on.
 */
export async function populate(client: PopulationClient, options: PopulateOptions): Promise<PopulationSummary> {
  const log = createChildLogger({ component: 'populate' });
  const report = options.report ?? (() => undefined);
  const random = options.random ?? Math.random;
  const now = options.now ?? (() => new Date());
  const names = populationBuckets(options.prefix, options.bucketCount);
  const summary: PopulationSummary = { buckets: [], objects: 0, warnings: [] };

  const warn = (message: string, error: unknown) => {
    log.warn({ err: error }, message);
    summary.warnings.push(message);
    report(`  ⚠ ${message}`);
  };

  const createBucket = async (bucket: string): Promise<boolean> => {
    try {
      await client.createBucket(bucket);
      report(`  ✓ Created bucket: ${bucket}`);
    } catch (error) {
      if (s3ErrorCode(error) !== 'BucketAlreadyOwnedByYou') {
        warn(`Cannot create bucket ${bucket}: ${errorMessage(error)}`, error);
        return false;
      }
      report(`  → Bucket already exists: ${bucket}`);
    }
    summary.buckets.push(bucket);
    return true;
  };

  const upload = async (bucket: string, object: PlannedObject): Promise<void> => {
    const body = object.body();
    try {
      await client.putObject(bucket, object.key, body, {
        ...(object.contentType ? { ContentType: object.contentType } : {}),
        Metadata: { ...object.metadata, md5: md5Hex(body) },
      });
      summary.objects++;
      report(`    ✓ Created ${object.key} (${body.byteLength} bytes)`);
    } catch (error) {
      warn(`Cannot upload ${bucket}/${object.key}: ${errorMessage(error)}`, error);
    }
  };

  if (options.clean) {
    for (const bucket of [...names.standard, names.versioned, names.public]) {
      try {
        if (!(await client.bucketExists(bucket))) continue;
        await client.emptyBucket(bucket);
        await client.deleteBucket(bucket);
        report(`  ✓ Removed bucket: ${bucket}`);
      } catch (error) {
        warn(`Cannot remove bucket ${bucket}: ${errorMessage(error)}`, error);
      }
    }
  }

  for (const bucket of names.standard) {
    if (!(await createBucket(bucket))) continue;
    for (const object of standardObjects(options.sizes, random, now)) {
      await upload(bucket, object);
    }
  }

  if (await createBucket(names.versioned)) {
    try {
      await client.putBucketVersioning(names.versioned, 'Enabled');
      report(`  ✓ Enabled versioning on ${names.versioned}`);
      for (let version = 1; version <= 3; version++) {
        await upload(names.versioned, {
          key: 'versioned-object.txt',
          contentType: 'text/plain',
          metadata: { version: String(version) },
          body: () => Buffer.from(`Version ${version} content\n`, 'utf-8'),
        });
      }
    } catch (error) {
      warn(`Versioning not supported: ${errorMessage(error)}`, error);
    }
  }

  if (await createBucket(names.public)) {
    try {
      await client.putBucketPolicy(names.public, publicReadPolicy(names.public));
      report(`  ✓ Set public read policy on ${names.public}`);
    } catch (error) {
      warn(`Public bucket policy not supported: ${errorMessage(error)}`, error);
    }
    await upload(names.public, {
      key: 'public-file.txt',
      contentType: 'text/plain',
      metadata: {},
      body: () => Buffer.from('This is a public file for testing.', 'utf-8'),
    });
  }

  log.info({ buckets: summary.buckets.length, objects: summary.objects }, 'Population finished');
  return summary;
}
