/**
 * Storage Tool - Abstraction over the local filesystem, Vercel Blob and S3
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import { put, list } from '@vercel/blob';
import { Config, type StorageBackend } from '../config';
import { Logger } from '../utils';
import { S3Storage } from './storage-s3';

export class StorageTool {
  private backend: StorageBackend;
  private rootDir: string;
  private s3?: S3Storage;

  constructor(options: { backend?: StorageBackend; rootDir?: string } = {}) {
    this.backend = options.backend ?? Config.STORAGE_BACKEND;
    this.rootDir = options.rootDir ?? Config.LOCAL_STORAGE_DIR;
  }

  get backendName(): StorageBackend {
    return this.backend;
  }

  async put(
    objectPath: string,
    data: Buffer | string,
    contentType: string
  ): Promise<string> {
    Logger.debug('Storage put', { path: objectPath, size: data.length, contentType });

    switch (this.backend) {
      case 'vercel-blob':
        return this.putVercelBlob(objectPath, data, contentType);
      case 's3':
        return this.getS3().put(objectPath, data, contentType);
      default:
        return this.putLocal(objectPath, data);
    }
  }

  async get(objectPath: string): Promise<Buffer> {
    Logger.debug('Storage get', { path: objectPath });

    switch (this.backend) {
      case 'vercel-blob':
        return this.getVercelBlob(objectPath);
      case 's3':
        return this.getS3().get(objectPath);
      default:
        return fs.readFile(this.localPath(objectPath));
    }
  }

  async exists(objectPath: string): Promise<boolean> {
    switch (this.backend) {
      case 'vercel-blob': {
        const { blobs } = await list({ prefix: objectPath, limit: 1 });
        return blobs.length > 0 && blobs[0].pathname === objectPath;
      }
      case 's3':
        return this.getS3().exists(objectPath);
      default:
        try {
          await fs.access(this.localPath(objectPath));
          return true;
        } catch {
          return false;
        }
    }
  }

  /**
   * Public URL for an object written with put()
   */
  publicUrl(objectPath: string): string {
    if (this.backend === 's3') {
      return this.getS3().getPublicUrl(objectPath);
    }
    return `${Config.PUBLIC_BASE_URL.replace(/\/$/, '')}/api/files/${objectPath}`;
  }

  /**
   * Resolve a path under the local root, refusing anything that escapes it
   */
  localPath(objectPath: string): string {
    const root = path.resolve(this.rootDir);
    const resolved = path.resolve(root, objectPath);
    if (resolved !== root && !resolved.startsWith(root + path.sep)) {
      throw new Error(`Invalid storage path: ${objectPath}`);
    }
    return resolved;
  }

  private async putLocal(objectPath: string, data: Buffer | string): Promise<string> {
    const target = this.localPath(objectPath);
    await fs.mkdir(path.dirname(target), { recursive: true });
    await fs.writeFile(target, data);
    return this.publicUrl(objectPath);
  }

  private async putVercelBlob(
    objectPath: string,
    data: Buffer | string,
    contentType: string
  ): Promise<string> {
    const blob = await put(objectPath, data, {
      access: 'public',
      contentType,
      addRandomSuffix: false,
      token: Config.BLOB_READ_WRITE_TOKEN || undefined,
    });

    Logger.debug('Blob created', { pathname: blob.pathname, url: blob.url });
    return blob.url;
  }

  private async getVercelBlob(objectPath: string): Promise<Buffer> {
    const { blobs } = await list({ prefix: objectPath, limit: 10 });
    const blob = blobs.find(candidate => candidate.pathname === objectPath);
    if (!blob) {
      throw new Error(`Blob not found: ${objectPath}`);
    }

    const response = await fetch(blob.url);
    if (!response.ok) {
      throw new Error(`Failed to fetch blob: ${response.status} ${response.statusText}`);
    }
    return Buffer.from(await response.arrayBuffer());
  }

  private getS3(): S3Storage {
    if (!this.s3) {
      this.s3 = new S3Storage();
    }
    return this.s3;
  }
}
