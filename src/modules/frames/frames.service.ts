import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ObjectStore } from '../../providers/storage/object-store';
import { RowStore } from '../../providers/supabase/row-store';
import { FrameRecord, RecordId } from '../../database/entities';
import { StorageError, errorMessage } from '../../common/errors/ingestion.errors';
import { FrameSamplerService } from '../media/frame-sampler.service';

/** 单帧上传结果，失败时保留错误而不是丢弃该帧 */
export type FrameUploadResult =
  | { ok: true; url: string }
  | { ok: false; error: StorageError };

export function frameObjectKey(transcriptId: RecordId, timestampSeconds: number): string {
  return `${transcriptId}/frame_${timestampSeconds}.jpg`;
}

@Injectable()
export class FramesService {
  private readonly logger = new Logger(FramesService.name);
  private readonly frameTable: string;

  constructor(
    private frameSampler: FrameSamplerService,
    private objectStore: ObjectStore,
    private rowStore: RowStore,
    private configService: ConfigService,
  ) {
    this.frameTable = this.configService.get<string>('supabase.frameTable') || 'frame';
  }

  async uploadFrame(
    transcriptId: RecordId,
    timestampSeconds: number,
    image: Buffer,
    contentType = 'image/jpeg',
  ): Promise<FrameUploadResult> {
    const key = frameObjectKey(transcriptId, timestampSeconds);
    try {
      await this.objectStore.put(key, image, contentType);
      return { ok: true, url: this.objectStore.publicUrl(key) };
    } catch (err) {
      const error =
        err instanceof StorageError ? err : new StorageError(errorMessage(err), { cause: err });
      this.logger.warn(`Frame upload failed for ${key}: ${error.message}`);
      return { ok: false, error };
    }
  }

  /**
   * 图片类提交：原图作为第 0 秒的帧
   */
  async saveImageFrame(transcriptId: RecordId, image: Buffer, contentType: string | null): Promise<FrameRecord> {
    const upload = await this.uploadFrame(transcriptId, 0, image, contentType || 'image/jpeg');
    const record = this.toRecord(transcriptId, 0, upload);
    await this.rowStore.insert(this.frameTable, [{ ...record }]);
    return record;
  }

  /**
   * 视频抽帧 -> 逐帧上传 -> 批量入库
   * 没有帧时不写库；返回写入的帧数
   */
  async processVideoFrames(transcriptId: RecordId, video: Buffer): Promise<number> {
    const frames = await this.frameSampler.sample(video);
    if (frames.length === 0) {
      this.logger.warn(`No frames produced for transcript ${transcriptId}`);
      return 0;
    }

    const records: FrameRecord[] = [];
    for (const frame of frames) {
      const upload = await this.uploadFrame(transcriptId, frame.timestampSeconds, frame.image);
      records.push(this.toRecord(transcriptId, frame.timestampSeconds, upload));
    }

    await this.rowStore.insert(
      this.frameTable,
      records.map((record) => ({ ...record })),
    );

    const failedUploads = records.filter((r) => r.frame_storage_url === null).length;
    this.logger.log(
      `Saved ${records.length} frames for transcript ${transcriptId}` +
        (failedUploads ? ` (${failedUploads} without storage url)` : ''),
    );
    return records.length;
  }

  private toRecord(transcriptId: RecordId, timestampSeconds: number, upload: FrameUploadResult): FrameRecord {
    return {
      transcript_id: transcriptId,
      frame_timestamp: timestampSeconds,
      frame_storage_url: upload.ok ? upload.url : null,
    };
  }
}
