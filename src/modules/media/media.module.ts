import { Module } from '@nestjs/common';
import { ProcessRunner } from './process-runner.service';
import { MediaFetcherService } from './media-fetcher.service';
import { AudioExtractorService } from './audio-extractor.service';
import { FrameSamplerService } from './frame-sampler.service';

@Module({
  providers: [ProcessRunner, MediaFetcherService, AudioExtractorService, FrameSamplerService],
  exports: [MediaFetcherService, AudioExtractorService, FrameSamplerService],
})
export class MediaModule {}
