/**
 * AWS S3 Storage Implementation
 */

import {
  S3Client,
  PutObjectCommand,
  GetObjectCommand,
  HeadObjectCommand,
} from '@aws-sdk/client-s3';
import { Config } from '../config';
import { Logger, errorMessage } from '../utils';

function isNotFound(error: unknown): boolean {
  return error instanceof Error && (error.name === 'NotFound' || error.name === 'NoSuchKey');
}

export class S3Storage {
  private client: S3Client;
  private bucket: string;

  constructor() {
    this.bucket = Config.S3_BUCKET;

    this.client = new S3Client({
      region: Config.S3_REGION,
      credentials: {
        accessKeyId: Config.S3_ACCESS_KEY,
        secretAccessKey: Config.S3_SECRET_KEY,
      },
      ...(Config.S3_ENDPOINT && {
        endpoint: Config.S3_ENDPOINT,
        forcePathStyle: true, // MinIO and most S3-compatible services
      }),
    });

    Logger.debug('S3Storage initialized', {
      bucket: this.bucket,
      region: Config.S3_REGION,
      hasEndpoint: !!Config.S3_ENDPOINT,
    });
  }

  async put(key: string, data: Buffer | string, contentType: string): Promise<string> {
    const buffer = typeof data === 'string' ? Buffer.from(data, 'utf-8') : data;

    try {
      await this.client.send(
        new PutObjectCommand({
          Bucket: this.bucket,
          Key: key,
          Body: buffer,
          ContentType: contentType,
          ACL: 'public-read',
        })
      );
    } catch (error) {
      Logger.error('S3 put failed', { key, error: errorMessage(error) });
      throw error;
    }

    const url = this.getPublicUrl(key);
    Logger.debug('S3 put successful', { key, size: buffer.length, url });
    return url;
  }

  async get(key: string): Promise<Buffer> {
    try {
      const response = await this.client.send(
        new GetObjectCommand({
          Bucket: this.bucket,
          Key: key,
        })
      );

      if (!response.Body) {
        throw new Error('No data returned from S3');
      }

      return Buffer.from(await response.Body.transformToByteArray());
    } catch (error) {
      if (isNotFound(error)) {
        throw new Error(`S3 object not found: ${key}`);
      }
      Logger.error('S3 get failed', { key, error: errorMessage(error) });
      throw error;
    }
  }

  async exists(key: string): Promise<boolean> {
    try {
      await this.client.send(
        new HeadObjectCommand({
          Bucket: this.bucket,
          Key: key,
        })
      );
      return true;
    } catch (error) {
      if (!isNotFound(error)) {
        Logger.warn('S3 exists check failed', { key, error: errorMessage(error) });
      }
      return false;
    }
  }

  getPublicUrl(key: string): string {
    if (Config.S3_ENDPOINT) {
      const endpoint = Config.S3_ENDPOINT.replace(/\/$/, '');
      return `${endpoint}/${this.bucket}/${key}`;
    }
    return `https://${this.bucket}.s3.${Config.S3_REGION}.amazonaws.com/${key}`;
  }
}
