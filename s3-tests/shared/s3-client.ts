import { Agent } from 'node:https';
import {
  AbortMultipartUploadCommand,
  BucketLocationConstraint,
  CompleteMultipartUploadCommand,
  CopyObjectCommand,
  CreateBucketCommand,
  CreateMultipartUploadCommand,
  DeleteBucketCommand,
  DeleteObjectCommand,
  GetBucketVersioningCommand,
  GetObjectCommand,
  HeadBucketCommand,
  HeadObjectCommand,
  ListBucketsCommand,
  ListMultipartUploadsCommand,
  ListObjectVersionsCommand,
  ListObjectsV2Command,
  PutBucketPolicyCommand,
  PutBucketVersioningCommand,
  PutObjectCommand,
  S3Client,
  S3ServiceException,
  UploadPartCommand,
  type Bucket,
  type BucketVersioningStatus,
  type CompleteMultipartUploadCommandOutput,
  type CompletedPart,
  type CopyObjectCommandOutput,
  type DeleteMarkerEntry,
  type GetObjectCommandInput,
  type HeadObjectCommandOutput,
  type MultipartUpload,
  type ObjectVersion,
  type PutObjectCommandInput,
  type PutObjectCommandOutput,
  type S3ClientConfig,
  type _Object,
} from '@aws-sdk/client-s3';
import { defaultConfig, type S3Config } from './config.js';
import { createChildLogger } from './logger.js';

type PutExtras = Omit<PutObjectCommandInput, 'Bucket' | 'Key' | 'Body'>;
type GetExtras = Omit<GetObjectCommandInput, 'Bucket' | 'Key'>;

export interface DownloadedObject {
  body: Uint8Array;
  etag?: string;
  contentLength?: number;
  contentType?: string;
  metadata: Record<string, string>;
  versionId?: string;
}

export interface ObjectVersions {
  versions: ObjectVersion[];
  deleteMarkers: DeleteMarkerEntry[];
}

const NOT_FOUND_CODES = new Set(['NotFound', 'NoSuchBucket', 'NoSuchKey', '404']);

function isLocationConstraint(region: string): region is BucketLocationConstraint {
  return Object.values<string>(BucketLocationConstraint).includes(region);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/** Machine-readable error code of a storage fault, e.g. `NoSuchKey`. */
export function s3ErrorCode(error: unknown): string | undefined {
  if (error instanceof S3ServiceException) return error.name;
  if (isRecord(error)) {
    if (typeof error.Code === 'string') return error.Code;
    if (typeof error.name === 'string') return error.name;
  }
  return undefined;
}

export function s3HttpStatus(error: unknown): number | undefined {
  if (!isRecord(error) || !isRecord(error.$metadata)) return undefined;
  const status = error.$metadata.httpStatusCode;
  return typeof status === 'number' ? status : undefined;
}

export function isNotFound(error: unknown): boolean {
  const code = s3ErrorCode(error);
  return (code !== undefined && NOT_FOUND_CODES.has(code)) || s3HttpStatus(error) === 404;
}

export function stripEtag(etag: string | undefined): string | undefined {
  return etag?.replace(/^"|"$/g, '');
}

const URL_SCHEME = /^[a-z][a-z0-9+.-]*:\/\//i;

/**
 * A bare `host:port` endpoint takes its scheme from `useSsl`. An endpoint that
 * names a scheme keeps it.
 */
export function resolveEndpoint(endpointUrl: string, useSsl: boolean): string {
  return URL_SCHEME.test(endpointUrl) ? endpointUrl : `${useSsl ? 'https' : 'http'}://${endpointUrl}`;
}

export interface TransportOverrides {
  /** Milliseconds before an in-flight request is abandoned. */
  requestTimeout?: number;
  connectionTimeout?: number;
  maxAttempts?: number;
}

export function createS3ClientConfig(
  config: S3Config = defaultConfig,
  overrides: TransportOverrides = {}
): S3ClientConfig {
  const configuredAttempts = config.options.max_attempts;
  const maxAttempts =
    overrides.maxAttempts ?? (typeof configuredAttempts === 'number' ? configuredAttempts : undefined);
  const handlerOptions = {
    ...(overrides.requestTimeout !== undefined ? { requestTimeout: overrides.requestTimeout } : {}),
    ...(overrides.connectionTimeout !== undefined ? { connectionTimeout: overrides.connectionTimeout } : {}),
    ...(config.verifySsl ? {} : { httpsAgent: new Agent({ rejectUnauthorized: false }) }),
  };

  return {
    endpoint: resolveEndpoint(config.endpointUrl, config.useSsl),
    region: config.region,
    forcePathStyle: true,
    credentials: {
      accessKeyId: config.accessKey,
      secretAccessKey: config.secretKey,
    },
    ...(maxAttempts !== undefined ? { maxAttempts } : {}),
    ...(Object.keys(handlerOptions).length > 0 ? { requestHandler: handlerOptions } : {}),
  };
}

/**
 * Storage handle passed to every test unit. A thin pass-through over the AWS
 * SDK: responses are the SDK's own shapes and faults are `S3ServiceException`s.
 */
export class S3TestClient {
  private readonly log = createChildLogger({ component: 's3-client' });

  constructor(
    private readonly client: S3Client,
    readonly region: string
  ) {}

  async createBucket(bucket: string): Promise<void> {
    const locationConfig =
      this.region !== 'us-east-1' && isLocationConstraint(this.region)
        ? { CreateBucketConfiguration: { LocationConstraint: this.region } }
        : {};
    await this.client.send(new CreateBucketCommand({ Bucket: bucket, ...locationConfig }));
    this.log.debug({ bucket }, 'Created bucket');
  }

  async deleteBucket(bucket: string): Promise<void> {
    await this.client.send(new DeleteBucketCommand({ Bucket: bucket }));
    this.log.debug({ bucket }, 'Deleted bucket');
  }

  async bucketExists(bucket: string): Promise<boolean> {
    try {
      await this.client.send(new HeadBucketCommand({ Bucket: bucket }));
      return true;
    } catch (error) {
      if (isNotFound(error)) return false;
      throw error;
    }
  }

  async listBuckets(): Promise<Bucket[]> {
    const res = await this.client.send(new ListBucketsCommand({}));
    return res.Buckets ?? [];
  }

  async putObject(
    bucket: string,
    key: string,
    body: PutObjectCommandInput['Body'],
    extras: PutExtras = {}
  ): Promise<PutObjectCommandOutput> {
    const res = await this.client.send(
      new PutObjectCommand({ Bucket: bucket, Key: key, Body: body, ...extras })
    );
    this.log.debug({ bucket, key }, 'Put object');
    return res;
  }

  async getObject(bucket: string, key: string, extras: GetExtras = {}): Promise<DownloadedObject> {
    const res = await this.client.send(new GetObjectCommand({ Bucket: bucket, Key: key, ...extras }));
    const body = res.Body ? await res.Body.transformToByteArray() : new Uint8Array();
    return {
      body,
      etag: stripEtag(res.ETag),
      contentLength: res.ContentLength,
      contentType: res.ContentType,
      metadata: res.Metadata ?? {},
      versionId: res.VersionId,
    };
  }

  async headObject(bucket: string, key: string): Promise<HeadObjectCommandOutput> {
    return this.client.send(new HeadObjectCommand({ Bucket: bucket, Key: key }));
  }

  async objectExists(bucket: string, key: string): Promise<boolean> {
    try {
      await this.headObject(bucket, key);
      return true;
    } catch (error) {
      if (isNotFound(error)) return false;
      throw error;
    }
  }

  async deleteObject(bucket: string, key: string, versionId?: string): Promise<void> {
    await this.client.send(new DeleteObjectCommand({ Bucket: bucket, Key: key, VersionId: versionId }));
    this.log.debug({ bucket, key, versionId }, 'Deleted object');
  }

  async listObjects(bucket: string, prefix = '', maxKeys = 1000): Promise<_Object[]> {
    const res = await this.client.send(
      new ListObjectsV2Command({ Bucket: bucket, Prefix: prefix, MaxKeys: maxKeys })
    );
    return res.Contents ?? [];
  }

  async copyObject(
    sourceBucket: string,
    sourceKey: string,
    destBucket: string,
    destKey: string
  ): Promise<CopyObjectCommandOutput> {
    return this.client.send(
      new CopyObjectCommand({
        Bucket: destBucket,
        Key: destKey,
        CopySource: encodeURIComponent(`${sourceBucket}/${sourceKey}`),
      })
    );
  }

  async createMultipartUpload(bucket: string, key: string): Promise<string> {
    const res = await this.client.send(new CreateMultipartUploadCommand({ Bucket: bucket, Key: key }));
    if (!res.UploadId) {
      throw new Error(`CreateMultipartUpload for ${bucket}/${key} returned no UploadId`);
    }
    return res.UploadId;
  }

  async uploadPart(
    bucket: string,
    key: string,
    uploadId: string,
    partNumber: number,
    body: Uint8Array
  ): Promise<CompletedPart> {
    const res = await this.client.send(
      new UploadPartCommand({
        Bucket: bucket,
        Key: key,
        UploadId: uploadId,
        PartNumber: partNumber,
        Body: body,
      })
    );
    return { PartNumber: partNumber, ETag: res.ETag };
  }

  async completeMultipartUpload(
    bucket: string,
    key: string,
    uploadId: string,
    parts: CompletedPart[]
  ): Promise<CompleteMultipartUploadCommandOutput> {
    return this.client.send(
      new CompleteMultipartUploadCommand({
        Bucket: bucket,
        Key: key,
        UploadId: uploadId,
        MultipartUpload: { Parts: parts },
      })
    );
  }

  async abortMultipartUpload(bucket: string, key: string, uploadId: string): Promise<void> {
    await this.client.send(new AbortMultipartUploadCommand({ Bucket: bucket, Key: key, UploadId: uploadId }));
  }

  async listMultipartUploads(bucket: string): Promise<MultipartUpload[]> {
    const res = await this.client.send(new ListMultipartUploadsCommand({ Bucket: bucket }));
    return res.Uploads ?? [];
  }

  async putBucketPolicy(bucket: string, policy: object): Promise<void> {
    await this.client.send(new PutBucketPolicyCommand({ Bucket: bucket, Policy: JSON.stringify(policy) }));
  }

  async putBucketVersioning(bucket: string, status: BucketVersioningStatus): Promise<void> {
    await this.client.send(
      new PutBucketVersioningCommand({ Bucket: bucket, VersioningConfiguration: { Status: status } })
    );
  }

  /** `Disabled` when versioning was never configured on the bucket. */
  async getBucketVersioning(bucket: string): Promise<string> {
    const res = await this.client.send(new GetBucketVersioningCommand({ Bucket: bucket }));
    return res.Status ?? 'Disabled';
  }

  async listObjectVersions(bucket: string, prefix?: string): Promise<ObjectVersions> {
    const res = await this.client.send(new ListObjectVersionsCommand({ Bucket: bucket, Prefix: prefix }));
    return { versions: res.Versions ?? [], deleteMarkers: res.DeleteMarkers ?? [] };
  }

  /** Removes objects, object versions, delete markers and pending multipart uploads. */
  async emptyBucket(bucket: string): Promise<void> {
    for (const upload of await this.listMultipartUploads(bucket)) {
      if (upload.Key && upload.UploadId) {
        await this.abortMultipartUpload(bucket, upload.Key, upload.UploadId);
      }
    }

    const { versions, deleteMarkers } = await this.listObjectVersions(bucket);
    for (const entry of [...versions, ...deleteMarkers]) {
      if (entry.Key) await this.deleteObject(bucket, entry.Key, entry.VersionId);
    }

    for (const object of await this.listObjects(bucket)) {
      if (object.Key) await this.deleteObject(bucket, object.Key);
    }
  }

  destroy(): void {
    this.client.destroy();
  }
}

export function createS3TestClient(
  config: S3Config = defaultConfig,
  overrides: TransportOverrides = {}
): S3TestClient {
  return new S3TestClient(new S3Client(createS3ClientConfig(config, overrides)), config.region);
}

let sharedClient: S3TestClient | null = null;

export function getSharedS3Client(config: S3Config = defaultConfig): S3TestClient {
  if (!sharedClient) {
    sharedClient = createS3TestClient(config);
  }
  return sharedClient;
}

export function closeSharedS3Client(): void {
  if (sharedClient) {
    sharedClient.destroy();
    sharedClient = null;
  }
}
