import {
  IsArray,
  IsBase64,
  IsNotEmpty,
  IsObject,
  IsOptional,
  IsString,
  ValidateNested,
} from 'class-validator';
import { Type } from 'class-transformer';
import { SubmissionItem, Submitter } from '../ingestion.types';

export class UploadedFileDto {
  @IsBase64()
  @IsNotEmpty()
  content_base64!: string;

  @IsString()
  @IsOptional()
  content_type?: string;

  @IsString()
  @IsOptional()
  filename?: string;
}

/**
 * POST /api/uploads 请求体
 * 兼容表单 / CRM webhook 的多种字段命名
 */
export class IngestRequestDto {
  @IsString()
  @IsOptional()
  name?: string;

  @IsString()
  @IsOptional()
  full_name?: string;

  @IsString()
  @IsOptional()
  first_name?: string;

  @IsString()
  @IsOptional()
  phone?: string;

  @IsString()
  @IsOptional()
  'Phone Number'?: string;

  @IsString()
  @IsOptional()
  address1?: string;

  @IsString()
  @IsOptional()
  city?: string;

  @IsString()
  @IsOptional()
  state?: string;

  @IsString()
  @IsOptional()
  postal_code?: string;

  @IsString()
  @IsOptional()
  country?: string;

  // 单个 URL 或 URL 数组
  @IsString({ each: true })
  @IsOptional()
  video?: string | string[];

  @IsArray()
  @IsString({ each: true })
  @IsOptional()
  videos?: string[];

  @IsString()
  @IsOptional()
  uploadvideolink?: string;

  @IsObject()
  @IsOptional()
  customData?: Record<string, unknown>;

  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => UploadedFileDto)
  @IsOptional()
  files?: UploadedFileDto[];
}

export interface IngestResponseDto {
  success: boolean;
  upload_number: number;
  transcript_ids: Array<string | number>;
  failed_count: number;
  failures: Array<{ index: number; code: string; message: string }>;
  frame_status: 'processing';
}

export function toSubmitter(dto: IngestRequestDto): Submitter {
  return {
    name: dto.full_name || dto.first_name || dto.name || '',
    phone: dto.phone || dto['Phone Number'] || '',
    address: {
      address1: dto.address1,
      city: dto.city,
      state: dto.state,
      postalCode: dto.postal_code,
      country: dto.country,
    },
  };
}

/**
 * 收集所有 URL 与上传文件；URL 去重，保持出现顺序
 */
export function toSubmissionItems(dto: IngestRequestDto): SubmissionItem[] {
  const customVideo = dto.customData?.video;
  const candidates: unknown[] = [
    ...(dto.videos ?? []),
    ...(Array.isArray(dto.video) ? dto.video : [dto.video]),
    dto.uploadvideolink,
    // 表单构建器可能把单个链接包成数组，只取第一项
    Array.isArray(customVideo) ? customVideo[0] : customVideo,
  ];

  const urls: string[] = [];
  for (const value of candidates) {
    if (typeof value === 'string' && value.trim() && !urls.includes(value.trim())) {
      urls.push(value.trim());
    }
  }

  const uploads = (dto.files ?? []).map((file): SubmissionItem => ({
    kind: 'upload',
    data: Buffer.from(file.content_base64, 'base64'),
    contentType: file.content_type,
    filename: file.filename,
  }));

  return [...urls.map((url): SubmissionItem => ({ kind: 'url', url })), ...uploads];
}
