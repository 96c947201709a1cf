/**
 * Storage Service
 * Handles public asset uploads to Google Cloud Storage
 */

import { Storage } from '@google-cloud/storage';
import { IObjectStorage } from '@/shared/interfaces.js';
import { logger } from '@/config/logger.js';
import { handleGCSError } from '@/utils/errorHandling.js';

export interface StorageServiceConfig {
  projectId?: string | undefined;
  bucketName: string;
  /** Prefix applied to every object path */
  folder?: string | undefined;
}

export class StorageService implements IObjectStorage {
  private storage: Storage;
  private bucketName: string;
  private folder: string;

  constructor(config: StorageServiceConfig, storage?: Storage) {
    this.storage = storage ?? new Storage({ projectId: config.projectId });
    this.bucketName = config.bucketName;
    this.folder = (config.folder ?? '').replace(/^\/+|\/+$/g, '');

    logger.info('Storage Service initialized', {
      projectId: config.projectId,
      bucketName: this.bucketName,
      folder: this.folder,
    });
  }

  objectName(path: string): string {
    const clean = path.replace(/^\/+/, '');
    return this.folder ? `${this.folder}/${clean}` : clean;
  }

  publicUrl(path: string): string {
    return `https://storage.googleapis.com/${this.bucketName}/${this.objectName(path)}`;
  }

  async upload(bytes: Buffer, path: string, contentType: string): Promise<void> {
    const filename = this.objectName(path);
    try {
      logger.debug('Uploading file to GCS', {
        filename,
        size: bytes.length,
        contentType,
      });

      await this.storage.bucket(this.bucketName).file(filename).save(bytes, {
        metadata: { contentType },
      });

      logger.info('File uploaded successfully', { filename, size: bytes.length });
    } catch (error) {
      const errorDetails = handleGCSError(error, {
        filename,
        size: bytes.length,
        contentType,
        bucketName: this.bucketName,
        operation: 'upload',
      });
      logger.error('Failed to upload file', errorDetails);
      throw error;
    }
  }

  async makePublic(path: string): Promise<string> {
    const filename = this.objectName(path);
    try {
      await this.storage.bucket(this.bucketName).file(filename).makePublic();
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      // Buckets with uniform access reject object ACLs; visibility then comes from bucket IAM
      if (!message.includes('uniform bucket-level access')) {
        const errorDetails = handleGCSError(error, {
          filename,
          bucketName: this.bucketName,
          operation: 'makePublic',
        });
        logger.error('Failed to make file public', errorDetails);
        throw error;
      }
      logger.warn('Bucket uses uniform access; relying on bucket-level IAM for public reads', {
        filename,
        bucketName: this.bucketName,
      });
    }

    return this.publicUrl(path);
  }
}
