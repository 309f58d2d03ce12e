import { Controller, Get, Param, NotFoundException } from '@nestjs/common';
import { TranscriptsService, TranscriptWithFrames } from './transcripts.service';

@Controller('transcripts')
export class TranscriptsController {
  constructor(private readonly transcriptsService: TranscriptsService) {}

  /**
   * GET /api/transcripts/:id
   * 获取转录及已入库的帧
   */
  @Get(':id')
  async getTranscript(@Param('id') id: string): Promise<TranscriptWithFrames> {
    const result = await this.transcriptsService.getTranscript(id);
    if (!result) {
      throw new NotFoundException({
        code: 'NOT_FOUND',
        message: `Transcript ${id} not found`,
      });
    }
    return result;
  }
}
