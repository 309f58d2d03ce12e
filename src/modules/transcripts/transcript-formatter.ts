import { TimedSegment } from '../../database/entities';

function pad(n: number, width: number): string {
  return String(n).padStart(width, '0');
}

/**
 * 秒 -> HH:MM:SS,mmm（毫秒截断，不四舍五入）
 */
export function formatTimestamp(seconds: number): string {
  const whole = Math.floor(seconds);
  // 先放大到微秒再截断，避免 0.25 * 1000 = 249.99… 之类的浮点误差
  const ms = Math.min(999, Math.floor(Math.round((seconds - whole) * 1_000_000) / 1000));
  const h = Math.floor(whole / 3600);
  const m = Math.floor(whole / 60) % 60;
  const s = whole % 60;
  return `${pad(h, 2)}:${pad(m, 2)}:${pad(s, 2)},${pad(ms, 3)}`;
}

/**
 * 按输入顺序逐行输出 [start --> end] text
 */
export function formatTranscript(segments: TimedSegment[]): string {
  return segments
    .map((seg) => `[${formatTimestamp(seg.start)} --> ${formatTimestamp(seg.end)}] ${seg.text.trim()}`)
    .join('\n');
}
