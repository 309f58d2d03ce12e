import { Module } from '@nestjs/common';
import { MediaModule } from '../media/media.module';
import { TranscriptsController } from './transcripts.controller';
import { TranscriptsService } from './transcripts.service';
import { TranscriberService } from './transcriber.service';

@Module({
  imports: [MediaModule],
  controllers: [TranscriptsController],
  providers: [TranscriptsService, TranscriberService],
  exports: [TranscriptsService, TranscriberService],
})
export class TranscriptsModule {}
