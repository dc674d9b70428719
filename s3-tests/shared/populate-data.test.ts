import {
  S3ServiceException,
  type BucketVersioningStatus,
  type PutObjectCommandInput,
  type PutObjectCommandOutput,
} from '@aws-sdk/client-s3';
import { describe, expect, it } from 'vitest';
import {
  generateCsv,
  generateJson,
  populate,
  populationBuckets,
  publicReadPolicy,
  standardObjects,
  type PopulationClient,
} from './populate-data.js';
import { md5Hex } from './test-utils.js';

interface StoredObject {
  key: string;
  body: Uint8Array;
  contentType?: string;
  metadata: Record<string, string>;
}

function serviceError(name: string): S3ServiceException {
  return new S3ServiceException({ name, message: name, $fault: 'client', $metadata: { httpStatusCode: 409 } });
}

/** In-memory storage recording every call it receives. */
class FakeStorage implements PopulationClient {
  readonly calls: string[] = [];
  readonly objects = new Map<string, StoredObject[]>();
  readonly policies = new Map<string, object>();

  constructor(
    private readonly faults: {
      owned?: string[];
      denied?: string[];
      existing?: string[];
      noVersioning?: boolean;
      noPolicy?: boolean;
    } = {}
  ) {}

  async createBucket(bucket: string): Promise<void> {
    this.calls.push(`createBucket ${bucket}`);
    if (this.faults.owned?.includes(bucket)) throw serviceError('BucketAlreadyOwnedByYou');
    if (this.faults.denied?.includes(bucket)) throw serviceError('AccessDenied');
    this.objects.set(bucket, []);
  }

  async deleteBucket(bucket: string): Promise<void> {
    this.calls.push(`deleteBucket ${bucket}`);
  }

  async bucketExists(bucket: string): Promise<boolean> {
    return this.faults.existing?.includes(bucket) ?? false;
  }

  async emptyBucket(bucket: string): Promise<void> {
    this.calls.push(`emptyBucket ${bucket}`);
  }

  async putObject(
    bucket: string,
    key: string,
    body: PutObjectCommandInput['Body'],
    extras: Omit<PutObjectCommandInput, 'Bucket' | 'Key' | 'Body'> = {}
  ): Promise<PutObjectCommandOutput> {
    if (!(body instanceof Uint8Array)) throw new Error(`unexpected body for ${key}`);
    const stored = this.objects.get(bucket) ?? [];
    stored.push({ key, body, contentType: extras.ContentType, metadata: extras.Metadata ?? {} });
    this.objects.set(bucket, stored);
    return { $metadata: {} };
  }

  async putBucketVersioning(bucket: string, status: BucketVersioningStatus): Promise<void> {
    this.calls.push(`putBucketVersioning ${bucket} ${status}`);
    if (this.faults.noVersioning) throw serviceError('NotImplemented');
  }

  async putBucketPolicy(bucket: string, policy: object): Promise<void> {
    if (this.faults.noPolicy) throw serviceError('NotImplemented');
    this.policies.set(bucket, policy);
  }

  keys(bucket: string): string[] {
    return (this.objects.get(bucket) ?? []).map((object) => object.key);
  }
}

const SIZES = { tiny: 16, small: 32 };
const NOW = new Date('2024-05-01T12:00:00.000Z');
const options = { prefix: 'fill', bucketCount: 2, sizes: SIZES, random: () => 0.5, now: () => NOW };

describe('populationBuckets', () => {
  it('names standard, versioned and public buckets from the prefix', () => {
    expect(populationBuckets('fill', 3)).toEqual({
      standard: ['fill-00', 'fill-01', 'fill-02'],
      versioned: 'fill-versioned',
      public: 'fill-public',
    });
  });
});

describe('standardObjects', () => {
  it('plans binary, text, json, csv and nested objects in order', () => {
    expect(standardObjects(SIZES, () => 0.5, () => NOW).map((object) => object.key)).toEqual([
      'binary/tiny/test-tiny.bin',
      'binary/small/test-small.bin',
      'text/document-0.txt',
      'text/document-1.txt',
      'text/document-2.txt',
      'json/data-0.json',
      'json/data-1.json',
      'csv/data.csv',
      'level0/file0.dat',
      'level0/file1.dat',
      'level0/level1/file0.dat',
      'level0/level1/file1.dat',
      'level0/level1/level2/file0.dat',
      'level0/level1/level2/file1.dat',
    ]);
  });

  it('sizes binary objects by category and text between 1000 and 10000 bytes', () => {
    const [tiny, small, text] = standardObjects(SIZES, () => 0.5, () => NOW);

    expect(tiny.body().byteLength).toBe(16);
    expect(small.body().byteLength).toBe(32);
    expect(text.body().byteLength).toBe(5500);
  });
});

describe('generated documents', () => {
  it('writes a CSV with a header and 100 rows', () => {
    const lines = Buffer.from(generateCsv(() => 0.5, () => NOW)).toString('utf-8').split('\n');

    expect(lines).toHaveLength(102);
    expect(lines.slice(0, 2)).toEqual(['id,name,value,timestamp', '0,item_0,0.5000,2024-05-01T12:00:00.000Z']);
    expect(lines[101]).toBe('');
  });

  it('writes a JSON document with a random test id', () => {
    const document: unknown = JSON.parse(Buffer.from(generateJson(() => 0.5, () => NOW)).toString('utf-8'));

    expect(document).toMatchObject({
      timestamp: '2024-05-01T12:00:00.000Z',
      test_id: 'nnnnnnnn',
      metadata: { version: '1.0', synthetic: true },
    });
  });
});

describe('populate', () => {
  it('fills every bucket and tags each object with its MD5', async () => {
    const storage = new FakeStorage();

    const summary = await populate(storage, options);

    expect(summary).toEqual({
      buckets: ['fill-00', 'fill-01', 'fill-versioned', 'fill-public'],
      objects: 14 * 2 + 3 + 1,
      warnings: [],
    });
    const [binary] = storage.objects.get('fill-00') ?? [];
    expect(binary.metadata).toEqual({ type: 'binary', size_category: 'tiny', md5: md5Hex(binary.body) });
    expect(storage.keys('fill-versioned')).toEqual([
      'versioned-object.txt',
      'versioned-object.txt',
      'versioned-object.txt',
    ]);
    expect(storage.calls).toContain('putBucketVersioning fill-versioned Enabled');
    expect(storage.policies.get('fill-public')).toEqual(publicReadPolicy('fill-public'));
    expect(storage.keys('fill-public')).toEqual(['public-file.txt']);
  });

  it('sets the content type of text, json and csv objects', async () => {
    const storage = new FakeStorage();

    await populate(storage, options);

    const types = new Map((storage.objects.get('fill-01') ?? []).map((object) => [object.key, object.contentType]));
    expect(types.get('text/document-0.txt')).toBe('text/plain');
    expect(types.get('json/data-1.json')).toBe('application/json');
    expect(types.get('csv/data.csv')).toBe('text/csv');
    expect(types.get('level0/file0.dat')).toBeUndefined();
  });

  it('skips versions when versioning is unsupported and still fills the public bucket', async () => {
    const storage = new FakeStorage({ noVersioning: true, noPolicy: true });

    const summary = await populate(storage, options);

    expect(storage.keys('fill-versioned')).toEqual([]);
    expect(storage.keys('fill-public')).toEqual(['public-file.txt']);
    expect(summary.objects).toBe(14 * 2 + 1);
    expect(summary.warnings).toEqual([
      'Versioning not supported: NotImplemented',
      'Public bucket policy not supported: NotImplemented',
    ]);
  });

  it('reuses buckets it already owns and skips those it cannot create', async () => {
    const lines: string[] = [];
    const storage = new FakeStorage({ owned: ['fill-00'], denied: ['fill-01'] });

    const summary = await populate(storage, { ...options, report: (line) => lines.push(line) });

    expect(summary.buckets).toEqual(['fill-00', 'fill-versioned', 'fill-public']);
    expect(storage.keys('fill-01')).toEqual([]);
    expect(lines).toContain('  → Bucket already exists: fill-00');
    expect(summary.warnings).toEqual(['Cannot create bucket fill-01: AccessDenied']);
  });

  it('removes existing buckets first when cleaning', async () => {
    const storage = new FakeStorage({ existing: ['fill-00', 'fill-public'] });

    await populate(storage, { ...options, clean: true });

    expect(storage.calls.slice(0, 5)).toEqual([
      'emptyBucket fill-00',
      'deleteBucket fill-00',
      'emptyBucket fill-public',
      'deleteBucket fill-public',
      'createBucket fill-00',
    ]);
  });
});
