import { S3Client, PutObjectCommand, GetObjectCommand } from '@aws-sdk/client-s3';
import type { Logger } from '../infrastructure/logger';

export interface ObjectStore {
  getObject(key: string): Promise<Buffer>;
  putObject(key: string, body: Buffer, contentType?: string): Promise<string>;
  putJson(key: string, value: unknown): Promise<string>;
}

export class ObjectStoreError extends Error {
  readonly code: string;

  constructor(operation: 'get' | 'put', key: string, cause: unknown) {
    const name = cause instanceof Error ? cause.name : 'UnknownError';
    const message = cause instanceof Error ? cause.message : String(cause);
    super(`S3 ${operation} failed for ${key}: ${message}`);
    this.name = 'ObjectStoreError';
    this.code = name;
    this.cause = cause;
  }
}

export type S3ObjectStoreOptions = {
  bucket: string;
  region: string;
  accessKeyId?: string;
  secretAccessKey?: string;
  client?: S3Client;
};

export class S3ObjectStore implements ObjectStore {
  private readonly client: S3Client;
  private readonly bucket: string;

  constructor(options: S3ObjectStoreOptions, private readonly logger: Logger) {
    this.bucket = options.bucket;
    this.client =
      options.client ??
      new S3Client({
        region: options.region,
        credentials:
          options.accessKeyId && options.secretAccessKey
            ? { accessKeyId: options.accessKeyId, secretAccessKey: options.secretAccessKey }
            : undefined,
      });
  }

  async getObject(key: string): Promise<Buffer> {
    try {
      const response = await this.client.send(new GetObjectCommand({ Bucket: this.bucket, Key: key }));
      if (!response.Body) {
        throw new Error(`S3 object ${key} has no body`);
      }
      return Buffer.from(await response.Body.transformToByteArray());
    } catch (error) {
      const wrapped = new ObjectStoreError('get', key, error);
      this.logger.error({ event: 's3.get.failed', bucket: this.bucket, key, code: wrapped.code }, wrapped.message);
      throw wrapped;
    }
  }

  async putObject(key: string, body: Buffer, contentType = 'application/octet-stream'): Promise<string> {
    try {
      await this.client.send(
        new PutObjectCommand({
          Bucket: this.bucket,
          Key: key,
          Body: body,
          ContentLength: body.length,
          ContentType: contentType,
        })
      );
      return key;
    } catch (error) {
      const wrapped = new ObjectStoreError('put', key, error);
      this.logger.error({ event: 's3.put.failed', bucket: this.bucket, key, code: wrapped.code }, wrapped.message);
      throw wrapped;
    }
  }

  async putJson(key: string, value: unknown): Promise<string> {
    return this.putObject(key, Buffer.from(JSON.stringify(value), 'utf-8'), 'application/json');
  }
}
