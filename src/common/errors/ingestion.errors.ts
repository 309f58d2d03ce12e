import { ErrorCode } from '../interfaces/response.interface';

/**
 * 流水线领域错误基类
 * code 用于日志与 HTTP 错误响应
 */
export class IngestionError extends Error {
  constructor(
    readonly code: ErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** 提交人信息缺失或条目为空，整批失败 */
export class ValidationError extends IngestionError {
  constructor(message: string) {
    super(ErrorCode.INVALID_INPUT, message);
  }
}

/** 媒体获取失败，仅影响当前条目 */
export class FetchError extends IngestionError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(ErrorCode.FETCH_FAILED, message, options);
  }
}

export class InvalidInputError extends FetchError {}

/** 语音识别服务返回非成功状态 */
export class TranscriptionError extends IngestionError {
  constructor(
    message: string,
    readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super(ErrorCode.ENGINE_ERROR, message, options);
  }
}

/** 数据库读写失败 */
export class StoreError extends IngestionError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(ErrorCode.STORE_ERROR, message, options);
  }
}

/** 对象存储上传失败 */
export class StorageError extends IngestionError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(ErrorCode.STORAGE_ERROR, message, options);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
