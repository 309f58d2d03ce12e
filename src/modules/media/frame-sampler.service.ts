import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { writeFile } from 'fs/promises';
import { ProcessRunner } from './process-runner.service';
import { withTempFiles } from './temp-files';

export interface SampledFrame {
  timestampSeconds: number;
  image: Buffer; // jpeg
}

export interface VideoProbe {
  totalFrames: number;
  fps: number;
}

function parseRate(rate: unknown): number {
  if (typeof rate !== 'string') return 0;
  const [num, den] = rate.split('/').map(Number);
  const value = den ? num / den : num;
  return Number.isFinite(value) && value > 0 ? value : 0;
}

function parsePositive(value: unknown): number {
  const n = typeof value === 'number' ? value : parseFloat(String(value ?? ''));
  return Number.isFinite(n) && n > 0 ? n : 0;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * 可变帧率视频的 r_frame_rate 常是时间基（如 90000/1），此时改用平均帧率
 */
export function guessFrameRate(realRate: number, avgRate: number): number {
  if (realRate > 210 && avgRate > 0 && avgRate < 70) {
    return avgRate;
  }
  return realRate || avgRate;
}

/**
 * 解析 ffprobe JSON 输出
 * 容器未给出 nb_frames 时（webm/mkv 常见）按 时长 × fps 估算
 */
export function parseProbeOutput(output: string, defaultFps: number): VideoProbe | null {
  let data: unknown;
  try {
    data = JSON.parse(output);
  } catch {
    return null;
  }
  if (!isRecord(data) || !Array.isArray(data.streams)) return null;

  const stream: unknown = data.streams[0];
  if (!isRecord(stream)) return null;

  const fps = guessFrameRate(parseRate(stream.r_frame_rate), parseRate(stream.avg_frame_rate)) || defaultFps;

  let totalFrames = Math.floor(parsePositive(stream.nb_frames));
  if (!totalFrames) {
    const format = isRecord(data.format) ? data.format : {};
    const duration = parsePositive(stream.duration) || parsePositive(format.duration);
    totalFrames = Math.round(duration * fps);
  }

  return { totalFrames, fps };
}

/**
 * 每秒抽取一帧并编码为 jpeg
 */
@Injectable()
export class FrameSamplerService {
  private readonly logger = new Logger(FrameSamplerService.name);
  private readonly ffmpegPath: string;
  private readonly ffprobePath: string;
  private readonly tempDir: string;
  private readonly timeoutMs: number;
  private readonly defaultFps: number;

  constructor(
    private configService: ConfigService,
    private runner: ProcessRunner,
  ) {
    this.ffmpegPath = this.configService.get<string>('media.ffmpegPath') || 'ffmpeg';
    this.ffprobePath = this.configService.get<string>('media.ffprobePath') || 'ffprobe';
    this.tempDir = this.configService.get<string>('media.tempDir') || '/tmp/media-ingest';
    this.timeoutMs = this.configService.get<number>('media.frameTimeoutMs') || 30_000;
    this.defaultFps = this.configService.get<number>('media.defaultFps') || 25;
  }

  async sample(video: Buffer): Promise<SampledFrame[]> {
    return withTempFiles(this.tempDir, ['.mp4'], async ([videoPath]) => {
      await writeFile(videoPath, video);

      const probe = await this.probe(videoPath);
      if (!probe) {
        this.logger.warn('File could not be opened as video, no frames sampled');
        return [];
      }

      const durationSeconds = Math.floor(probe.totalFrames / probe.fps);
      const frames: SampledFrame[] = [];

      for (let sec = 0; sec < durationSeconds; sec++) {
        const image = await this.grabFrame(videoPath, sec);
        if (image) {
          frames.push({ timestampSeconds: sec, image });
        }
      }

      // 不足一秒或全部 seek 失败时，取第一帧
      if (frames.length === 0) {
        const first = await this.grabFrame(videoPath, null);
        if (first) {
          frames.push({ timestampSeconds: 0, image: first });
        }
      }

      this.logger.log(
        `Sampled ${frames.length} frames (duration ${durationSeconds}s, ${probe.fps.toFixed(2)} fps)`,
      );
      return frames;
    });
  }

  private async probe(videoPath: string): Promise<VideoProbe | null> {
    const args = [
      '-v', 'error',
      '-select_streams', 'v:0',
      '-show_entries', 'stream=nb_frames,r_frame_rate,avg_frame_rate,duration:format=duration',
      '-of', 'json',
      videoPath,
    ];

    try {
      const result = await this.runner.run(this.ffprobePath, args, this.timeoutMs);
      if (result.exitCode !== 0 || result.timedOut) {
        return null;
      }
      return parseProbeOutput(result.stdout.toString('utf-8'), this.defaultFps);
    } catch (err) {
      this.logger.warn(`ffprobe failed: ${err}`);
      return null;
    }
  }

  /**
   * 解码 second 处最近的一帧；second 为 null 时取流的第一帧
   */
  private async grabFrame(videoPath: string, second: number | null): Promise<Buffer | null> {
    const args = [
      '-v', 'error',
      ...(second !== null ? ['-ss', String(second)] : []),
      '-i', videoPath,
      '-frames:v', '1',
      '-f', 'image2pipe',
      '-c:v', 'mjpeg',
      '-q:v', '2',
      'pipe:1',
    ];

    try {
      const result = await this.runner.run(this.ffmpegPath, args, this.timeoutMs);
      if (result.exitCode !== 0 || result.timedOut || result.stdout.length === 0) {
        this.logger.debug(`No frame at ${second ?? 'start'} (exit ${result.exitCode})`);
        return null;
      }
      return result.stdout;
    } catch (err) {
      this.logger.warn(`Frame decode at ${second ?? 'start'} failed: ${err}`);
      return null;
    }
  }
}
