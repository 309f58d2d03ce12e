import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { readFile, writeFile } from 'fs/promises';
import { ProcessRunner, ProcessResult } from './process-runner.service';
import { withTempFiles } from './temp-files';

/**
 * 从视频中抽取单声道 16kHz 64kbps mp3
 * 无音轨 / ffmpeg 失败 / 超时 / 输出过小，统一返回 null
 */
@Injectable()
export class AudioExtractorService {
  private readonly logger = new Logger(AudioExtractorService.name);
  private readonly ffmpegPath: string;
  private readonly tempDir: string;
  private readonly timeoutMs: number;
  private readonly minAudioBytes: number;

  constructor(
    private configService: ConfigService,
    private runner: ProcessRunner,
  ) {
    this.ffmpegPath = this.configService.get<string>('media.ffmpegPath') || 'ffmpeg';
    this.tempDir = this.configService.get<string>('media.tempDir') || '/tmp/media-ingest';
    this.timeoutMs = this.configService.get<number>('media.extractTimeoutMs') || 60_000;
    this.minAudioBytes = this.configService.get<number>('media.minAudioBytes') ?? 1000;
  }

  async extract(video: Buffer): Promise<Buffer | null> {
    return withTempFiles(this.tempDir, ['.mp4', '.mp3'], async ([videoPath, audioPath]) => {
      await writeFile(videoPath, video);

      const args = [
        '-y',
        '-i', videoPath,
        '-vn',
        '-ac', '1',
        '-ar', '16000',
        '-b:a', '64k',
        audioPath,
      ];

      let result: ProcessResult;
      try {
        result = await this.runner.run(this.ffmpegPath, args, this.timeoutMs);
      } catch (err) {
        this.logger.warn(`Audio extraction could not start: ${err}`);
        return null;
      }

      if (result.timedOut) {
        this.logger.warn(`Audio extraction timed out after ${this.timeoutMs}ms`);
        return null;
      }
      if (result.exitCode !== 0) {
        this.logger.log(`No audio extracted (ffmpeg exit ${result.exitCode})`);
        return null;
      }

      let audio: Buffer;
      try {
        audio = await readFile(audioPath);
      } catch (err) {
        this.logger.warn(`Audio output missing: ${err}`);
        return null;
      }

      if (audio.length <= this.minAudioBytes) {
        this.logger.log(`Audio output too small (${audio.length} bytes), treating as no audio`);
        return null;
      }
      return audio;
    });
  }
}
