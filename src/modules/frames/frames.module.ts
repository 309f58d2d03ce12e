import { Module } from '@nestjs/common';
import { MediaModule } from '../media/media.module';
import { FramesService } from './frames.service';

@Module({
  imports: [MediaModule],
  providers: [FramesService],
  exports: [FramesService],
})
export class FramesModule {}
