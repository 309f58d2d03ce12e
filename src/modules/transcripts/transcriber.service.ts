import { Injectable, Logger } from '@nestjs/common';
import { TimedSegment } from '../../database/entities';
import { AudioExtractorService } from '../media/audio-extractor.service';
import { SpeechToText } from '../../providers/openai/speech-to-text';

@Injectable()
export class TranscriberService {
  private readonly logger = new Logger(TranscriberService.name);

  constructor(
    private audioExtractor: AudioExtractorService,
    private speechToText: SpeechToText,
  ) {}

  /**
   * 视频 -> 音频 -> 语音识别
   * 无音轨时返回 null，不发起网络请求
   */
  async transcribe(video: Buffer): Promise<TimedSegment[] | null> {
    const audio = await this.audioExtractor.extract(video);
    if (!audio) {
      this.logger.log('No audio track, skipping transcription');
      return null;
    }
    return this.speechToText.transcribe(audio, 'audio.mp3');
  }
}
