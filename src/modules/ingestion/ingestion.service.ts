import { Injectable, Logger } from '@nestjs/common';
import {
  FrameStatus,
  IMAGE_TRANSCRIPT,
  NO_AUDIO_TRANSCRIPT,
  RecordId,
} from '../../database/entities';
import {
  IngestionError,
  ValidationError,
  errorMessage,
} from '../../common/errors/ingestion.errors';
import { ErrorCode } from '../../common/interfaces/response.interface';
import { MediaFetcherService, FetchedMedia } from '../media/media-fetcher.service';
import { TranscriberService } from '../transcripts/transcriber.service';
import { TranscriptsService } from '../transcripts/transcripts.service';
import { formatTranscript } from '../transcripts/transcript-formatter';
import { FramesService } from '../frames/frames.service';
import { BackgroundJobsService } from '../jobs/background-jobs.service';
import { BatchResult, ItemFailure, SubmissionItem, Submitter } from './ingestion.types';

/**
 * 提交流程编排
 * 获取媒体 -> 同步转录 -> 写 transcript -> 后台抽帧上传并写 frame
 */
@Injectable()
export class IngestionService {
  private readonly logger = new Logger(IngestionService.name);

  constructor(
    private mediaFetcher: MediaFetcherService,
    private transcriber: TranscriberService,
    private transcriptsService: TranscriptsService,
    private framesService: FramesService,
    private jobs: BackgroundJobsService,
  ) {}

  async ingestBatch(submitter: Submitter, items: SubmissionItem[]): Promise<BatchResult> {
    const name = submitter.name?.trim() ?? '';
    const phone = submitter.phone?.trim() ?? '';

    // 1. 校验（任何 IO 之前）
    if (!name || !phone) {
      throw new ValidationError('Name and phone are required');
    }
    if (items.length === 0) {
      throw new ValidationError('At least one video or image is required');
    }

    // 2. 本批次共享的 upload_number
    const uploadNumber = await this.transcriptsService.allocateUploadNumber();
    this.logger.log(`Ingesting ${items.length} item(s) as upload #${uploadNumber}`);

    // 3. 逐条处理，单条失败不影响其他条目
    const transcriptIds: RecordId[] = [];
    const failures: ItemFailure[] = [];

    for (const [index, item] of items.entries()) {
      try {
        const id = await this.ingestItem({ name, phone }, item, uploadNumber);
        transcriptIds.push(id);
      } catch (err) {
        const code = err instanceof IngestionError ? err.code : ErrorCode.INTERNAL_ERROR;
        failures.push({ index, code, message: errorMessage(err) });
        this.logger.warn(`Item ${index} of upload #${uploadNumber} failed: ${errorMessage(err)}`);
      }
    }

    return {
      uploadNumber,
      transcriptIds,
      failedCount: failures.length,
      failures,
    };
  }

  private async ingestItem(
    submitter: { name: string; phone: string },
    item: SubmissionItem,
    uploadNumber: number,
  ): Promise<RecordId> {
    const media = await this.fetch(item);

    if (media.kind === 'image') {
      const id = await this.transcriptsService.createTranscript({
        name: submitter.name,
        phoneNumber: submitter.phone,
        transcript: IMAGE_TRANSCRIPT,
        upload_number: uploadNumber,
        frame_status: FrameStatus.COMPLETED,
      });

      try {
        await this.framesService.saveImageFrame(id, media.content, media.contentType);
      } catch (err) {
        this.logger.error(`Image frame for transcript ${id} not saved: ${errorMessage(err)}`);
      }
      return id;
    }

    const transcript = await this.transcribeOrSentinel(media.content);
    const id = await this.transcriptsService.createTranscript({
      name: submitter.name,
      phoneNumber: submitter.phone,
      transcript,
      upload_number: uploadNumber,
      frame_status: FrameStatus.PROCESSING,
    });

    void this.jobs.submit(`frames:${id}`, () => this.processFrames(id, media.content));
    return id;
  }

  private async fetch(item: SubmissionItem): Promise<FetchedMedia> {
    return item.kind === 'url'
      ? this.mediaFetcher.fetchFromUrl(item.url)
      : this.mediaFetcher.fetchUpload(item.data, item.contentType, item.filename);
  }

  /**
   * 转录失败或无语音时降级为占位文本，不中断条目
   */
  private async transcribeOrSentinel(video: Buffer): Promise<string> {
    try {
      const segments = await this.transcriber.transcribe(video);
      const text = segments ? formatTranscript(segments) : '';
      return text || NO_AUDIO_TRANSCRIPT;
    } catch (err) {
      this.logger.warn(`Transcription failed, using placeholder: ${errorMessage(err)}`);
      return NO_AUDIO_TRANSCRIPT;
    }
  }

  /**
   * 后台任务：抽帧上传入库，并回写 frame_status
   */
  private async processFrames(id: RecordId, video: Buffer): Promise<void> {
    try {
      await this.framesService.processVideoFrames(id, video);
    } catch (err) {
      await this.markFrames(id, FrameStatus.FAILED);
      throw err;
    }
    await this.markFrames(id, FrameStatus.COMPLETED);
  }

  private async markFrames(id: RecordId, status: FrameStatus): Promise<void> {
    try {
      await this.transcriptsService.updateFrameStatus(id, status);
    } catch (err) {
      this.logger.warn(`Could not mark transcript ${id} frames ${status}: ${errorMessage(err)}`);
    }
  }
}
