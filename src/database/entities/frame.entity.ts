import { RecordId } from './transcript.entity';

/**
 * 帧记录（对应 frame 表），多对一关联 transcript
 */
export interface FrameRecord {
  transcript_id: RecordId;
  frame_timestamp: number; // 视频内秒数
  frame_storage_url: string | null; // null 表示上传失败
}
