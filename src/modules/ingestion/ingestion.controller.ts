import { Controller, Post, Body, HttpCode, HttpStatus } from '@nestjs/common';
import { IngestionService } from './ingestion.service';
import {
  IngestRequestDto,
  IngestResponseDto,
  toSubmissionItems,
  toSubmitter,
} from './dto/ingest.dto';

@Controller('uploads')
export class IngestionController {
  constructor(private readonly ingestionService: IngestionService) {}

  /**
   * POST /api/uploads
   * 同步返回转录 id，抽帧在后台继续
   */
  @Post()
  @HttpCode(HttpStatus.OK)
  async upload(@Body() dto: IngestRequestDto): Promise<IngestResponseDto> {
    const result = await this.ingestionService.ingestBatch(toSubmitter(dto), toSubmissionItems(dto));

    return {
      success: result.transcriptIds.length > 0,
      upload_number: result.uploadNumber,
      transcript_ids: result.transcriptIds,
      failed_count: result.failedCount,
      failures: result.failures,
      frame_status: 'processing',
    };
  }
}
