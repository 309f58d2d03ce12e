import { Module } from '@nestjs/common';
import { MediaModule } from '../media/media.module';
import { TranscriptsModule } from '../transcripts/transcripts.module';
import { FramesModule } from '../frames/frames.module';
import { IngestionController } from './ingestion.controller';
import { IngestionService } from './ingestion.service';

@Module({
  imports: [MediaModule, TranscriptsModule, FramesModule],
  controllers: [IngestionController],
  providers: [IngestionService],
})
export class IngestionModule {}
