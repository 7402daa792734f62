/**
 * Case document storage.
 *
 * Documents live at `{sourcePrefix}{ownerId}/{filename}` in one S3 bucket.
 * The bucket location comes from a Secrets Manager secret when one is
 * configured, otherwise straight from the environment.
 */

import { createWriteStream } from 'fs';
import { mkdir, rm, stat } from 'fs/promises';
import { dirname } from 'path';
import { Readable } from 'stream';
import { pipeline } from 'stream/promises';
import { S3Client, GetObjectCommand, S3ServiceException } from '@aws-sdk/client-s3';
import type { FastifyBaseLogger } from 'fastify';
import { z } from 'zod';
import type { AppConfig } from '../config.js';
import { errorMessage } from '../utils/errors.js';
import type { SecretsCache } from './secrets.service.js';

export interface ObjectStore {
  /** Download one case document. Resolves true only if a non-empty file was written. */
  download(ownerId: string, filename: string, localPath: string): Promise<boolean>;
}

export interface StorageLocation {
  bucketName: string;
  region: string;
  sourcePrefix: string;
}

const StorageSecret = z.object({
  bucket_name: z.string().min(1),
  region: z.string().min(1).optional(),
  source_prefix: z.string().optional(),
});

/**
 * Build the location resolver for the configured storage settings.
 */
export function storageLocationResolver(
  storage: AppConfig['storage'],
  secrets: SecretsCache | null,
): () => Promise<StorageLocation> {
  return async () => {
    if (storage.secretName && secrets) {
      const raw = await secrets.getSecret(storage.secretName, storage.secretTtlSeconds);
      const secret = StorageSecret.parse(raw);
      return {
        bucketName: secret.bucket_name,
        region: secret.region ?? storage.region,
        sourcePrefix: secret.source_prefix ?? storage.prefix,
      };
    }
    if (!storage.bucket) {
      throw new Error('No case document bucket configured');
    }
    return { bucketName: storage.bucket, region: storage.region, sourcePrefix: storage.prefix };
  };
}

function isMissingObject(err: unknown): boolean {
  if (err instanceof S3ServiceException && err.$metadata.httpStatusCode === 404) {
    return true;
  }
  return err instanceof Error && (err.name === 'NoSuchKey' || err.name === 'NotFound');
}

export class S3CaseFileStore implements ObjectStore {
  private readonly clients = new Map<string, S3Client>();

  constructor(
    private readonly resolveLocation: () => Promise<StorageLocation>,
    private readonly logger: FastifyBaseLogger,
  ) {}

  async download(ownerId: string, filename: string, localPath: string): Promise<boolean> {
    let key = filename;
    try {
      const location = await this.resolveLocation();
      key = `${location.sourcePrefix}${ownerId}/${filename}`;

      const response = await this.client(location.region).send(
        new GetObjectCommand({ Bucket: location.bucketName, Key: key }),
      );
      if (!(response.Body instanceof Readable)) {
        this.logger.error({ code: 'CASE_FILE_EMPTY_BODY', key }, 'S3 object has no readable body');
        return false;
      }

      await mkdir(dirname(localPath), { recursive: true });
      await pipeline(response.Body, createWriteStream(localPath));

      const { size } = await stat(localPath);
      if (size === 0) {
        this.logger.warn({ code: 'CASE_FILE_EMPTY', key }, 'Downloaded case file is empty');
        await rm(localPath, { force: true });
        return false;
      }
      return true;
    } catch (err) {
      if (isMissingObject(err)) {
        this.logger.warn({ code: 'CASE_FILE_NOT_FOUND', key }, 'Case file not found in storage');
      } else {
        this.logger.error({ code: 'CASE_FILE_DOWNLOAD_ERROR', key, error: errorMessage(err) }, 'Case file download failed');
      }
      return false;
    }
  }

  private client(region: string): S3Client {
    let client = this.clients.get(region);
    if (!client) {
      client = new S3Client({ region });
      this.clients.set(region, client);
    }
    return client;
  }
}
