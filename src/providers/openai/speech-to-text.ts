import { TimedSegment } from '../../database/entities';

/**
 * 语音识别服务端口
 */
export abstract class SpeechToText {
  /** 单次请求，失败抛 TranscriptionError，不重试 */
  abstract transcribe(audio: Buffer, filename: string): Promise<TimedSegment[]>;
}
