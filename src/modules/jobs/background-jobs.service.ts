import { Injectable, Logger, OnApplicationShutdown } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { errorMessage } from '../../common/errors/ingestion.errors';

export type JobStatus = 'completed' | 'failed';

export interface JobOutcome {
  id: string;
  status: JobStatus;
  error?: string;
}

interface QueuedJob {
  id: string;
  work: () => Promise<void>;
  resolve: (outcome: JobOutcome) => void;
}

/**
 * 进程内后台任务队列
 * 有界并发、FIFO；submit 返回的 Promise 只会 resolve（失败体现在 status）
 * 应用关闭时等待队列清空，不取消正在执行的任务
 */
@Injectable()
export class BackgroundJobsService implements OnApplicationShutdown {
  private readonly logger = new Logger(BackgroundJobsService.name);
  private readonly concurrency: number;
  private readonly queue: QueuedJob[] = [];
  private running = 0;
  private idleWaiters: Array<() => void> = [];

  constructor(private configService: ConfigService) {
    this.concurrency = Math.max(1, this.configService.get<number>('frames.concurrency') || 2);
  }

  get pending(): number {
    return this.queue.length;
  }

  get active(): number {
    return this.running;
  }

  submit(id: string, work: () => Promise<void>): Promise<JobOutcome> {
    return new Promise((resolve) => {
      this.queue.push({ id, work, resolve });
      this.logger.log(`Job ${id} queued (pending: ${this.queue.length}, active: ${this.running})`);
      this.drain();
    });
  }

  /**
   * 队列为空且没有运行中的任务时 resolve
   */
  onIdle(): Promise<void> {
    if (this.running === 0 && this.queue.length === 0) {
      return Promise.resolve();
    }
    return new Promise((resolve) => this.idleWaiters.push(resolve));
  }

  async onApplicationShutdown(signal?: string) {
    if (this.running > 0 || this.queue.length > 0) {
      this.logger.log(
        `Shutdown${signal ? ` (${signal})` : ''}: waiting for ${this.running + this.queue.length} background jobs`,
      );
    }
    await this.onIdle();
  }

  private drain() {
    while (this.running < this.concurrency && this.queue.length > 0) {
      const job = this.queue.shift();
      if (job) {
        this.running++;
        void this.execute(job);
      }
    }

    if (this.running === 0 && this.queue.length === 0) {
      const waiters = this.idleWaiters;
      this.idleWaiters = [];
      waiters.forEach((resolve) => resolve());
    }
  }

  private async execute(job: QueuedJob): Promise<void> {
    let outcome: JobOutcome;
    try {
      await job.work();
      outcome = { id: job.id, status: 'completed' };
      this.logger.log(`Job ${job.id} has completed`);
    } catch (err) {
      outcome = { id: job.id, status: 'failed', error: errorMessage(err) };
      this.logger.error(`Job ${job.id} failed: ${outcome.error}`);
    }

    this.running--;
    job.resolve(outcome);
    this.drain();
  }
}
