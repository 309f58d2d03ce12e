import { Injectable } from '@nestjs/common';
import { spawn } from 'child_process';

export interface ProcessResult {
  exitCode: number | null;
  stdout: Buffer;
  stderr: string;
  timedOut: boolean;
}

const MAX_STDERR_CHARS = 4000;

/**
 * 子进程执行器（ffmpeg / ffprobe）
 * 超时后 SIGKILL，stdout 以二进制收集（用于图片管道输出）
 */
@Injectable()
export class ProcessRunner {
  run(command: string, args: string[], timeoutMs: number): Promise<ProcessResult> {
    return new Promise((resolve, reject) => {
      const proc = spawn(command, args, { stdio: ['ignore', 'pipe', 'pipe'] });

      const chunks: Buffer[] = [];
      let stderr = '';
      let timedOut = false;

      proc.stdout.on('data', (data: Buffer) => {
        chunks.push(data);
      });

      proc.stderr.on('data', (data: Buffer) => {
        stderr = (stderr + data.toString()).slice(-MAX_STDERR_CHARS);
      });

      const timer = setTimeout(() => {
        timedOut = true;
        proc.kill('SIGKILL');
      }, timeoutMs);

      proc.on('close', (code) => {
        clearTimeout(timer);
        resolve({ exitCode: code, stdout: Buffer.concat(chunks), stderr, timedOut });
      });

      proc.on('error', (err) => {
        clearTimeout(timer);
        reject(new Error(`Failed to spawn ${command}: ${err.message}`));
      });
    });
  }
}
