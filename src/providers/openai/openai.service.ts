import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import OpenAI, { toFile } from 'openai';
import { TimedSegment } from '../../database/entities';
import { TranscriptionError, errorMessage } from '../../common/errors/ingestion.errors';
import { SpeechToText } from './speech-to-text';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * 解析 verbose_json 响应中的 segments
 * 缺少 start/end/text 的片段直接丢弃
 */
export function parseVerboseSegments(response: unknown): TimedSegment[] {
  if (!isRecord(response) || !Array.isArray(response.segments)) {
    return [];
  }

  const segments: TimedSegment[] = [];
  for (const seg of response.segments) {
    if (
      isRecord(seg) &&
      typeof seg.start === 'number' &&
      typeof seg.end === 'number' &&
      typeof seg.text === 'string'
    ) {
      segments.push({ start: seg.start, end: seg.end, text: seg.text });
    }
  }
  return segments;
}

@Injectable()
export class OpenAIService extends SpeechToText {
  private readonly logger = new Logger(OpenAIService.name);
  private client: OpenAI | null = null;
  private readonly model: string;

  constructor(private configService: ConfigService) {
    super();
    this.model = this.configService.get<string>('openai.model') || 'whisper-1';

    const apiKey = this.configService.get<string>('openai.apiKey');
    if (apiKey) {
      this.client = new OpenAI({
        apiKey,
        baseURL: this.configService.get<string>('openai.baseUrl') || undefined,
        timeout: this.configService.get<number>('openai.timeoutMs'),
        maxRetries: 0,
      });
      this.logger.log('OpenAI client initialized');
    } else {
      this.logger.warn('OPENAI_API_KEY not configured, transcription will be unavailable');
    }
  }

  /**
   * 上传音频并返回带时间戳的 segments
   */
  async transcribe(audio: Buffer, filename: string): Promise<TimedSegment[]> {
    if (!this.client) {
      throw new TranscriptionError('OpenAI service not available. Please configure OPENAI_API_KEY.');
    }

    let response: unknown;
    try {
      response = await this.client.audio.transcriptions.create({
        file: await toFile(audio, filename, { type: 'audio/mpeg' }),
        model: this.model,
        response_format: 'verbose_json',
        timestamp_granularities: ['segment'],
      });
    } catch (error) {
      if (error instanceof OpenAI.APIError) {
        throw new TranscriptionError(
          `Speech-to-text API error: ${error.status ?? 'no status'} - ${error.message}`,
          error.status,
          { cause: error },
        );
      }
      throw new TranscriptionError(`Speech-to-text request failed: ${errorMessage(error)}`, undefined, {
        cause: error,
      });
    }

    const segments = parseVerboseSegments(response);
    this.logger.log(`Transcription response: ${segments.length} segments (${audio.length} bytes audio)`);
    return segments;
  }
}
