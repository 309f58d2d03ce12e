import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { FetchError, InvalidInputError, errorMessage } from '../../common/errors/ingestion.errors';

export type MediaKind = 'video' | 'image';

export interface FetchedMedia {
  content: Buffer;
  kind: MediaKind;
  contentType: string | null;
}

// 常见图片文件头
const IMAGE_SIGNATURES: Array<{ offset: number; bytes: number[] }> = [
  { offset: 0, bytes: [0xff, 0xd8, 0xff] }, // jpeg
  { offset: 0, bytes: [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a] }, // png
  { offset: 0, bytes: [0x47, 0x49, 0x46, 0x38] }, // gif
  { offset: 0, bytes: [0x42, 0x4d] }, // bmp
  { offset: 8, bytes: [0x57, 0x45, 0x42, 0x50] }, // webp（RIFF....WEBP）
];

export function hasImageSignature(bytes: Buffer): boolean {
  return IMAGE_SIGNATURES.some(({ offset, bytes: signature }) =>
    bytes.length >= offset + signature.length &&
    signature.every((b, i) => bytes[offset + i] === b),
  );
}

function isImageContentType(contentType: string | null | undefined): boolean {
  return !!contentType && contentType.trim().toLowerCase().startsWith('image/');
}

const IMAGE_EXTENSIONS = /\.(jpe?g|png|gif|bmp|webp|heic|heif)$/i;

function hasImageExtension(filename: string | undefined): boolean {
  return !!filename && IMAGE_EXTENSIONS.test(filename.trim());
}

@Injectable()
export class MediaFetcherService {
  private readonly logger = new Logger(MediaFetcherService.name);
  private readonly timeoutMs: number;
  private readonly maxBytes: number;

  constructor(private configService: ConfigService) {
    this.timeoutMs = this.configService.get<number>('media.fetchTimeoutMs') || 60_000;
    this.maxBytes = this.configService.get<number>('media.maxBytes') || 15 * 1024 * 1024;
  }

  /**
   * 直接上传的文件，不产生网络请求
   * 文件头、声明类型或扩展名任一为图片即按图片处理
   */
  fetchUpload(bytes: Buffer, declaredContentType?: string, filename?: string): FetchedMedia {
    if (bytes.length === 0) {
      throw new FetchError('Uploaded file is empty');
    }
    if (bytes.length > this.maxBytes) {
      throw new FetchError(`Uploaded file exceeds ${this.maxBytes} bytes`);
    }

    const kind: MediaKind =
      hasImageSignature(bytes) ||
      isImageContentType(declaredContentType) ||
      hasImageExtension(filename)
        ? 'image'
        : 'video';
    return { content: bytes, kind, contentType: declaredContentType || null };
  }

  /**
   * 流式下载远程媒体，超时 / 非 2xx / 空内容 / 超过大小上限均抛 FetchError
   */
  async fetchFromUrl(url: string): Promise<FetchedMedia> {
    if (!/^https?:\/\//i.test(url.trim())) {
      throw new InvalidInputError(`Invalid media URL: ${url}`);
    }

    this.logger.log(`Downloading media from ${url}`);

    try {
      const response = await fetch(url.trim(), {
        signal: AbortSignal.timeout(this.timeoutMs),
        redirect: 'follow',
      });

      if (!response.ok) {
        throw new FetchError(`Download failed: HTTP ${response.status}`);
      }

      const declaredLength = Number(response.headers.get('content-length'));
      if (Number.isFinite(declaredLength) && declaredLength > this.maxBytes) {
        throw new FetchError(`Remote media exceeds ${this.maxBytes} bytes`);
      }

      const chunks: Buffer[] = [];
      let total = 0;
      if (response.body) {
        for await (const chunk of response.body) {
          const buf = Buffer.from(chunk);
          total += buf.length;
          if (total > this.maxBytes) {
            throw new FetchError(`Remote media exceeds ${this.maxBytes} bytes`);
          }
          chunks.push(buf);
        }
      }

      if (total === 0) {
        throw new FetchError('Downloaded media is empty');
      }

      const contentType = response.headers.get('content-type');
      this.logger.log(`Downloaded ${total} bytes (${contentType || 'unknown type'})`);

      return {
        content: Buffer.concat(chunks),
        kind: isImageContentType(contentType) ? 'image' : 'video',
        contentType,
      };
    } catch (err) {
      if (err instanceof FetchError) {
        throw err;
      }
      throw new FetchError(`Download of ${url} failed: ${errorMessage(err)}`, { cause: err });
    }
  }
}
