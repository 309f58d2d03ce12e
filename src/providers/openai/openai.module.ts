import { Module, Global } from '@nestjs/common';
import { OpenAIService } from './openai.service';
import { SpeechToText } from './speech-to-text';

@Global()
@Module({
  providers: [OpenAIService, { provide: SpeechToText, useExisting: OpenAIService }],
  exports: [SpeechToText],
})
export class OpenAIModule {}
