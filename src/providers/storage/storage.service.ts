import { Injectable, OnModuleInit, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { S3Client, PutObjectCommand } from '@aws-sdk/client-s3';
import { StorageError, errorMessage } from '../../common/errors/ingestion.errors';
import { ObjectStore } from './object-store';

/**
 * S3 兼容存储（Cloudflare R2 / MinIO / AWS S3）
 */
@Injectable()
export class StorageService extends ObjectStore implements OnModuleInit {
  private readonly logger = new Logger(StorageService.name);
  private client: S3Client | null = null;
  private bucket = '';
  private publicBaseUrl = '';

  constructor(private configService: ConfigService) {
    super();
  }

  onModuleInit() {
    const endpoint = this.configService.get<string>('storage.endpoint');
    const accessKey = this.configService.get<string>('storage.accessKey');
    const secretKey = this.configService.get<string>('storage.secretKey');
    this.bucket = this.configService.get<string>('storage.bucket') || '';
    this.publicBaseUrl = (this.configService.get<string>('storage.publicUrl') || '').replace(/\/+$/, '');

    if (!endpoint || !accessKey || !secretKey) {
      this.logger.warn('Object storage configuration missing');
      return;
    }

    this.client = new S3Client({
      region: this.configService.get<string>('storage.region') || 'auto',
      endpoint,
      credentials: {
        accessKeyId: accessKey,
        secretAccessKey: secretKey,
      },
      maxAttempts: 1, // 不自动重试
    });

    this.logger.log(`Object storage initialized (bucket: ${this.bucket})`);
  }

  async put(key: string, body: Buffer, contentType: string): Promise<void> {
    if (!this.client) {
      throw new StorageError('Object storage not configured');
    }

    try {
      await this.client.send(
        new PutObjectCommand({
          Bucket: this.bucket,
          Key: key,
          Body: body,
          ContentType: contentType,
        }),
      );
    } catch (err) {
      throw new StorageError(`Upload of ${key} failed: ${errorMessage(err)}`, { cause: err });
    }
  }

  /**
   * 公开访问地址；未配置公开域名时退回 endpoint/bucket/key
   */
  publicUrl(key: string): string {
    if (this.publicBaseUrl) {
      return `${this.publicBaseUrl}/${key}`;
    }
    const endpoint = (this.configService.get<string>('storage.endpoint') || '').replace(/\/+$/, '');
    return `${endpoint}/${this.bucket}/${key}`;
  }
}
