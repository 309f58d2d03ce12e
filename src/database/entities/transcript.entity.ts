/**
 * 转录文本片段（语音识别返回，不落库）
 */
export interface TimedSegment {
  start: number; // 开始时间（秒）
  end: number; // 结束时间（秒）
  text: string;
}

/** 存储层分配的主键，bigint 或 uuid 均可 */
export type RecordId = string | number;

export enum FrameStatus {
  PROCESSING = 'processing',
  COMPLETED = 'completed',
  FAILED = 'failed',
}

export const NO_AUDIO_TRANSCRIPT = '[No audio found]';
export const IMAGE_TRANSCRIPT = '[Image uploaded]';

/**
 * 转录记录（对应 transcript 表）
 */
export interface TranscriptRecord {
  id: RecordId;
  name: string;
  phoneNumber: string;
  transcript: string; // 格式化文本或占位符
  upload_number: number; // 同一次提交共享
  frame_status: FrameStatus;
  created_at?: string;
}

export type NewTranscriptRecord = Omit<TranscriptRecord, 'id' | 'created_at'>;
