import {
  DeleteObjectCommand,
  GetObjectCommand,
  HeadBucketCommand,
  PutObjectCommand,
  S3Client,
  S3ServiceException
} from '@aws-sdk/client-s3';
import { getSignedUrl } from '@aws-sdk/s3-request-presigner';
import { v4 as uuidv4 } from 'uuid';
import { DOCX_MIME_TYPE, PDF_MIME_TYPE } from '../providers/types';
import { describeError, logger } from './logger';

export interface StoredFileInfo {
  key: string;
  url: string;
  publicUrl: string;
  bucket: string;
  size: number;
  fileName: string;
}

export interface FileStorage {
  readonly enabled: boolean;
  readonly bucket: string | null;
  readonly region: string;
  uploadResume(buffer: Buffer, fileName: string, userId: string | null, contentType?: string): Promise<StoredFileInfo>;
  presignedDownloadUrl(key: string, expiresInSeconds: number): Promise<string>;
  deleteObject(key: string): Promise<boolean>;
}

export interface S3StorageOptions {
  accessKeyId?: string;
  secretAccessKey?: string;
  region: string;
  bucket?: string;
  client?: S3Client;
}

const CONTENT_TYPES: Record<string, string> = {
  pdf: PDF_MIME_TYPE,
  docx: DOCX_MIME_TYPE
};

function extensionOf(fileName: string): string {
  const parts = fileName.split('.');
  return parts.length > 1 ? parts[parts.length - 1].toLowerCase() : 'bin';
}

/** `resumes/<owner>/<yyyyMMdd_HHmmss>_<8 hex>.<ext>`, timestamp in UTC. */
export function buildObjectKey(fileName: string, userId: string | null, now: Date, uniqueId: string): string {
  const timestamp = now.toISOString().slice(0, 19).replace(/[-:]/g, '').replace('T', '_');
  const owner = userId ?? 'anonymous';
  return `resumes/${owner}/${timestamp}_${uniqueId.replace(/-/g, '').slice(0, 8)}.${extensionOf(fileName)}`;
}

export class S3FileStorage implements FileStorage {
  readonly bucket: string | null;
  readonly region: string;
  private readonly client: S3Client | null;
  private isEnabled: boolean;

  constructor(options: S3StorageOptions) {
    this.region = options.region;
    this.bucket = options.bucket ?? null;

    if (options.client && this.bucket) {
      this.client = options.client;
    } else if (options.accessKeyId && options.secretAccessKey && this.bucket) {
      this.client = new S3Client({
        region: options.region,
        credentials: {
          accessKeyId: options.accessKeyId,
          secretAccessKey: options.secretAccessKey
        }
      });
    } else {
      this.client = null;
      logger.info('S3 disabled: missing AWS credentials or bucket name');
    }
    this.isEnabled = this.client !== null;
  }

  get enabled(): boolean {
    return this.isEnabled;
  }

  /**
   * Checks bucket access once at startup. A 403 keeps uploads enabled since
   * put-only credentials cannot head the bucket; other failures disable S3.
   */
  async verify(): Promise<void> {
    if (!this.client || !this.bucket) {
      return;
    }

    try {
      await this.client.send(new HeadBucketCommand({ Bucket: this.bucket }));
      logger.info('S3 initialized', { bucket: this.bucket });
    } catch (error) {
      const status = error instanceof S3ServiceException ? error.$metadata.httpStatusCode : undefined;
      if (status === 403) {
        logger.warn('S3 initialized with limited access to bucket', { bucket: this.bucket });
        return;
      }
      this.isEnabled = false;
      logger.error('S3 disabled: bucket check failed', { bucket: this.bucket, reason: describeError(error) });
    }
  }

  async uploadResume(
    buffer: Buffer,
    fileName: string,
    userId: string | null,
    contentType?: string
  ): Promise<StoredFileInfo> {
    const { client, bucket } = this.requireClient();
    const key = buildObjectKey(fileName, userId, new Date(), uuidv4());

    await client.send(new PutObjectCommand({
      Bucket: bucket,
      Key: key,
      Body: buffer,
      ContentType: contentType ?? CONTENT_TYPES[extensionOf(fileName)]
    }));

    const publicUrl = this.publicUrl(bucket, key);
    logger.info('S3 upload successful', { bucket, key });
    return {
      key,
      url: publicUrl,
      publicUrl,
      bucket,
      size: buffer.length,
      fileName
    };
  }

  async presignedDownloadUrl(key: string, expiresInSeconds: number): Promise<string> {
    const { client, bucket } = this.requireClient();
    return getSignedUrl(client, new GetObjectCommand({ Bucket: bucket, Key: key }), {
      expiresIn: expiresInSeconds
    });
  }

  async deleteObject(key: string): Promise<boolean> {
    if (!this.isEnabled) {
      return false;
    }
    const { client, bucket } = this.requireClient();
    try {
      await client.send(new DeleteObjectCommand({ Bucket: bucket, Key: key }));
      return true;
    } catch (error) {
      logger.error('S3 delete failed', { key, reason: describeError(error) });
      return false;
    }
  }

  private publicUrl(bucket: string, key: string): string {
    return `https://${bucket}.s3.${this.region}.amazonaws.com/${key}`;
  }

  private requireClient(): { client: S3Client; bucket: string } {
    if (!this.isEnabled || !this.client || !this.bucket) {
      throw new Error('S3 storage is not enabled');
    }
    return { client: this.client, bucket: this.bucket };
  }
}
