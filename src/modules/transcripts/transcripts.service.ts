import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { RowStore, StoredRow } from '../../providers/supabase/row-store';
import {
  FrameRecord,
  FrameStatus,
  NewTranscriptRecord,
  RecordId,
  TranscriptRecord,
} from '../../database/entities';
import { isNumberString, isUUID } from 'class-validator';
import { StoreError } from '../../common/errors/ingestion.errors';

export interface TranscriptWithFrames {
  transcript: TranscriptRecord;
  frames: FrameRecord[];
}

function isRecordId(value: unknown): value is RecordId {
  return typeof value === 'string' || typeof value === 'number';
}

/** 主键只可能是正整数或 uuid，其余输入查询前直接视为不存在 */
function isLookupId(id: RecordId): boolean {
  if (typeof id === 'number') return Number.isSafeInteger(id) && id > 0;
  return isNumberString(id, { no_symbols: true }) || isUUID(id);
}

function isFrameStatus(value: unknown): value is FrameStatus {
  return Object.values<unknown>(FrameStatus).includes(value);
}

function toTranscriptRecord(row: StoredRow): TranscriptRecord | null {
  if (!isRecordId(row.id)) return null;
  return {
    id: row.id,
    name: String(row.name ?? ''),
    phoneNumber: String(row.phoneNumber ?? ''),
    transcript: String(row.transcript ?? ''),
    upload_number: Number(row.upload_number ?? 0),
    frame_status: isFrameStatus(row.frame_status) ? row.frame_status : FrameStatus.PROCESSING,
    ...(typeof row.created_at === 'string' && { created_at: row.created_at }),
  };
}

function toFrameRecord(row: StoredRow): FrameRecord | null {
  if (!isRecordId(row.transcript_id) || typeof row.frame_timestamp !== 'number') return null;
  return {
    transcript_id: row.transcript_id,
    frame_timestamp: row.frame_timestamp,
    frame_storage_url: typeof row.frame_storage_url === 'string' ? row.frame_storage_url : null,
  };
}

@Injectable()
export class TranscriptsService {
  private readonly logger = new Logger(TranscriptsService.name);
  private readonly transcriptTable: string;
  private readonly frameTable: string;

  constructor(
    private rowStore: RowStore,
    private configService: ConfigService,
  ) {
    this.transcriptTable = this.configService.get<string>('supabase.transcriptTable') || 'transcript';
    this.frameTable = this.configService.get<string>('supabase.frameTable') || 'frame';
  }

  /**
   * 分配本次提交的 upload_number（当前最大值 + 1）
   * 读后写，无事务保护：并发提交可能拿到相同编号
   */
  async allocateUploadNumber(): Promise<number> {
    const current = await this.rowStore.selectMax(this.transcriptTable, 'upload_number');
    return (current ?? 0) + 1;
  }

  /**
   * 插入转录记录，返回存储层分配的 id
   */
  async createTranscript(record: NewTranscriptRecord): Promise<RecordId> {
    const [row] = await this.rowStore.insert(this.transcriptTable, [{ ...record }]);
    const id = row?.id;
    if (!isRecordId(id)) {
      throw new StoreError(`Insert into ${this.transcriptTable} returned no id`);
    }
    this.logger.log(`Transcript ${id} saved (upload #${record.upload_number})`);
    return id;
  }

  async updateFrameStatus(id: RecordId, status: FrameStatus): Promise<void> {
    await this.rowStore.updateById(this.transcriptTable, id, { frame_status: status });
  }

  /**
   * 获取转录及其帧（按时间戳升序）
   */
  async getTranscript(id: RecordId): Promise<TranscriptWithFrames | null> {
    if (!isLookupId(id)) {
      return null;
    }

    const [row] = await this.rowStore.selectWhere(this.transcriptTable, 'id', id);
    const transcript = row ? toTranscriptRecord(row) : null;
    if (!transcript) {
      return null;
    }

    const frameRows = await this.rowStore.selectWhere(
      this.frameTable,
      'transcript_id',
      transcript.id,
      'frame_timestamp',
    );
    const frames = frameRows
      .map(toFrameRecord)
      .filter((frame): frame is FrameRecord => frame !== null);

    return { transcript, frames };
  }
}
