import { ConfigService } from '@nestjs/config';
import { OpenAIService, parseVerboseSegments } from './openai.service';
import { TranscriptionError } from '../../common/errors/ingestion.errors';

describe('parseVerboseSegments', () => {
  it('keeps well-formed segments in order', () => {
    const response = {
      text: 'hello world',
      segments: [
        { id: 0, start: 0, end: 1.5, text: ' hello' },
        { id: 1, start: 1.5, end: 3.25, text: ' world' },
      ],
    };

    expect(parseVerboseSegments(response)).toEqual([
      { start: 0, end: 1.5, text: ' hello' },
      { start: 1.5, end: 3.25, text: ' world' },
    ]);
  });

  it('drops malformed entries', () => {
    const response = {
      segments: [
        { start: '0', end: 1, text: 'string start' },
        null,
        { start: 1, end: 2 },
        { start: 2, end: 3, text: 'ok' },
      ],
    };

    expect(parseVerboseSegments(response)).toEqual([{ start: 2, end: 3, text: 'ok' }]);
  });

  it('returns an empty list when segments are missing', () => {
    expect(parseVerboseSegments({ text: 'plain' })).toEqual([]);
    expect(parseVerboseSegments('plain text')).toEqual([]);
  });
});

describe('OpenAIService', () => {
  it('rejects with TranscriptionError when no api key is configured', async () => {
    const service = new OpenAIService(new ConfigService({ openai: {} }));

    await expect(service.transcribe(Buffer.from('mp3'), 'audio.mp3')).rejects.toThrow(
      'OpenAI service not available. Please configure OPENAI_API_KEY.',
    );
    await expect(service.transcribe(Buffer.from('mp3'), 'audio.mp3')).rejects.toThrow(TranscriptionError);
  });
});
