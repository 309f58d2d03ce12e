import { tmpdir } from 'os';
import { join } from 'path';

function intFromEnv(value: string | undefined, fallback: number): number {
  const parsed = parseInt(value || '', 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

export default () => ({
  port: intFromEnv(process.env.PORT, 3000),
  nodeEnv: process.env.NODE_ENV || 'development',

  supabase: {
    url: process.env.SUPABASE_URL,
    serviceRoleKey: process.env.SUPABASE_SERVICE_ROLE_KEY,
    transcriptTable: process.env.SUPABASE_TRANSCRIPT_TABLE || 'transcript',
    frameTable: process.env.SUPABASE_FRAME_TABLE || 'frame',
  },

  // S3 兼容对象存储（R2 / MinIO / S3）
  storage: {
    endpoint: process.env.STORAGE_ENDPOINT,
    region: process.env.STORAGE_REGION || 'auto',
    accessKey: process.env.STORAGE_ACCESS_KEY,
    secretKey: process.env.STORAGE_SECRET_KEY,
    bucket: process.env.STORAGE_BUCKET || 'video-frames',
    publicUrl: process.env.STORAGE_PUBLIC_URL,
  },

  openai: {
    apiKey: process.env.OPENAI_API_KEY,
    baseUrl: process.env.OPENAI_BASE_URL,
    model: process.env.OPENAI_TRANSCRIBE_MODEL || 'whisper-1',
    timeoutMs: intFromEnv(process.env.OPENAI_TIMEOUT_MS, 120_000),
  },

  media: {
    ffmpegPath: process.env.FFMPEG_PATH || 'ffmpeg',
    ffprobePath: process.env.FFPROBE_PATH || 'ffprobe',
    tempDir: process.env.MEDIA_TEMP_DIR || join(tmpdir(), 'media-ingest'),
    maxBytes: intFromEnv(process.env.MEDIA_MAX_BYTES, 15 * 1024 * 1024), // 15 MB
    fetchTimeoutMs: intFromEnv(process.env.MEDIA_FETCH_TIMEOUT_MS, 60_000),
    extractTimeoutMs: intFromEnv(process.env.AUDIO_EXTRACT_TIMEOUT_MS, 60_000),
    frameTimeoutMs: intFromEnv(process.env.FRAME_DECODE_TIMEOUT_MS, 30_000),
    minAudioBytes: 1000, // 小于此大小视为无音轨
    defaultFps: 25,
  },

  frames: {
    concurrency: intFromEnv(process.env.FRAME_JOB_CONCURRENCY, 2),
  },
});
