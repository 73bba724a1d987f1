import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { PutObjectCommand, S3Client } from '@aws-sdk/client-s3';
import { promises as fs } from 'fs';
import path from 'path';
import { errorMessage, isRecord } from '../common/describe-error';

export type StorageDriver = 'local' | 's3';

export interface StoredObject {
  key: string;
  url: string;
  localPath?: string;
}

@Injectable()
export class StorageService {
  private readonly logger = new Logger(StorageService.name);
  private bucket?: string;
  private region?: string;
  private client?: S3Client;
  readonly driver: StorageDriver;
  private readonly localDir: string;

  constructor(private readonly configService: ConfigService) {
    this.driver = (this.configService.get<string>('STORAGE_DRIVER') || 'local').toLowerCase() === 's3' ? 's3' : 'local';
    this.localDir = path.resolve(process.cwd(), this.configService.get<string>('STORAGE_LOCAL_DIR') || 'output');
  }

  uploadAudio(buffer: Buffer, key: string, contentType = 'audio/mpeg'): Promise<StoredObject> {
    return this.put(buffer, key, contentType);
  }

  uploadText(text: string, key: string): Promise<StoredObject> {
    return this.put(Buffer.from(text, 'utf8'), key, 'text/plain; charset=utf-8');
  }

  private async put(body: Buffer, key: string, contentType: string): Promise<StoredObject> {
    const objectKey = this.normalizeKey(key);
    if (this.driver === 'local') {
      const fullPath = await this.saveLocalCopy(objectKey, body);
      return { key: objectKey, url: `file://${fullPath}`, localPath: fullPath };
    }

    const { bucket, region, client } = this.getClient();
    try {
      await client.send(
        new PutObjectCommand({
          Bucket: bucket,
          Key: objectKey,
          Body: body,
          ContentType: contentType,
        }),
      );
    } catch (error) {
      this.logger.error(`Failed to upload ${bucket}/${objectKey}: ${this.describeS3Error(error)}`);
      throw error;
    }
    return { key: objectKey, url: this.getPublicUrlForBucket(bucket, region, objectKey) };
  }

  private normalizeKey(key: string): string {
    const normalized = key.replace(/\\/g, '/').replace(/^\/+/, '');
    if (!normalized || normalized.split('/').includes('..')) {
      throw new Error(`Invalid storage key: "${key}"`);
    }
    return normalized;
  }

  private describeS3Error(error: unknown): string {
    const metadata = isRecord(error) && isRecord(error['$metadata']) ? error['$metadata'] : {};
    const code = isRecord(error) ? error['Code'] || error['code'] || error['name'] : undefined;
    const status = metadata['httpStatusCode'];
    const parts: string[] = [];
    if (code) parts.push(`code=${String(code)}`);
    if (status) parts.push(`status=${String(status)}`);
    parts.push(errorMessage(error));
    return parts.join(' | ');
  }

  private async saveLocalCopy(objectKey: string, buffer: Buffer): Promise<string> {
    const fullPath = path.join(this.localDir, objectKey);
    await fs.mkdir(path.dirname(fullPath), { recursive: true });
    await fs.writeFile(fullPath, buffer);
    return fullPath;
  }

  private getClient(): { bucket: string; region: string; client: S3Client } {
    if (this.client && this.bucket && this.region) {
      return { bucket: this.bucket, region: this.region, client: this.client };
    }

    const { bucket, region, accessKeyId, secretAccessKey, endpoint } = this.requireConfigBundle();
    this.client = new S3Client({
      region,
      endpoint: endpoint || undefined,
      forcePathStyle: Boolean(endpoint),
      credentials: {
        accessKeyId,
        secretAccessKey,
      },
    });
    this.bucket = bucket;
    this.region = region;
    return { bucket, region, client: this.client };
  }

  private requireConfigBundle() {
    const bucket = this.requireConfig('S3_BUCKET_NAME');
    const region = this.requireConfig('S3_REGION');
    const accessKeyId = this.requireConfig('S3_ACCESS_KEY_ID');
    const secretAccessKey = this.requireConfig('S3_SECRET_ACCESS_KEY');
    const endpoint = this.configService.get<string>('S3_ENDPOINT');
    return { bucket, region, accessKeyId, secretAccessKey, endpoint };
  }

  private requireConfig(key: string): string {
    const value = this.configService.get<string>(key);
    if (!value) {
      throw new Error(`Missing required env var: ${key}`);
    }
    return value;
  }

  private getPublicUrlForBucket(bucket: string, region: string, key: string): string {
    return `https://${bucket}.s3.${region}.amazonaws.com/${key}`;
  }
}
