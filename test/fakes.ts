import { ConfigService } from '@nestjs/config';
import { RowStore, StoredRow } from '../src/providers/supabase/row-store';
import { ObjectStore } from '../src/providers/storage/object-store';
import { ProcessRunner, ProcessResult } from '../src/modules/media/process-runner.service';
import { RecordId } from '../src/database/entities';
import { StorageError, StoreError } from '../src/common/errors/ingestion.errors';

export function testConfig(overrides: Record<string, unknown> = {}): ConfigService {
  return new ConfigService({
    supabase: { transcriptTable: 'transcript', frameTable: 'frame' },
    media: {
      ffmpegPath: 'ffmpeg',
      ffprobePath: 'ffprobe',
      tempDir: '/tmp/media-ingest-test',
      maxBytes: 1024,
      fetchTimeoutMs: 1000,
      extractTimeoutMs: 1000,
      frameTimeoutMs: 1000,
      minAudioBytes: 1000,
      defaultFps: 25,
    },
    frames: { concurrency: 2 },
    ...overrides,
  });
}

/**
 * 内存版行存储，id 自增
 */
export class InMemoryRowStore extends RowStore {
  readonly calls: string[] = [];
  failInsert: (table: string) => boolean = () => false;
  private readonly tables = new Map<string, StoredRow[]>();
  private nextId = 1;

  rows(table: string): StoredRow[] {
    return this.tables.get(table) ?? [];
  }

  seed(table: string, rows: StoredRow[]) {
    this.tables.set(table, [...this.rows(table), ...rows]);
  }

  async insert(table: string, rows: StoredRow[]): Promise<StoredRow[]> {
    this.calls.push(`insert:${table}`);
    if (this.failInsert(table)) {
      throw new StoreError(`insert into ${table} rejected`);
    }
    const stored = rows.map((row) => ({ id: this.nextId++, ...row }));
    this.seed(table, stored);
    return stored.map((row) => ({ ...row }));
  }

  async selectMax(table: string, column: string): Promise<number | null> {
    this.calls.push(`selectMax:${table}.${column}`);
    const values = this.rows(table)
      .map((row) => row[column])
      .filter((value): value is number => typeof value === 'number');
    return values.length ? Math.max(...values) : null;
  }

  async updateById(table: string, id: RecordId, fields: StoredRow): Promise<void> {
    this.calls.push(`update:${table}`);
    const row = this.rows(table).find((r) => r.id === id);
    if (row) {
      Object.assign(row, fields);
    }
  }

  async selectWhere(
    table: string,
    column: string,
    value: RecordId,
    orderBy?: string,
  ): Promise<StoredRow[]> {
    this.calls.push(`select:${table}`);
    const rows = this.rows(table).filter((row) => String(row[column]) === String(value));
    if (orderBy) {
      rows.sort((a, b) => Number(a[orderBy]) - Number(b[orderBy]));
    }
    return rows.map((row) => ({ ...row }));
  }
}

export class FakeObjectStore extends ObjectStore {
  readonly objects = new Map<string, { body: Buffer; contentType: string }>();
  readonly attempts: string[] = [];
  fail: (key: string) => boolean = () => false;

  async put(key: string, body: Buffer, contentType: string): Promise<void> {
    this.attempts.push(key);
    if (this.fail(key)) {
      throw new StorageError(`bucket unavailable for ${key}`);
    }
    this.objects.set(key, { body, contentType });
  }

  publicUrl(key: string): string {
    return `https://cdn.test/frames/${key}`;
  }
}

export type ProcessHandler = (command: string, args: string[]) => Promise<ProcessResult>;

export class FakeProcessRunner extends ProcessRunner {
  readonly calls: Array<{ command: string; args: string[] }> = [];

  constructor(private readonly handler: ProcessHandler) {
    super();
  }

  async run(command: string, args: string[]): Promise<ProcessResult> {
    this.calls.push({ command, args });
    return this.handler(command, args);
  }
}

export function processResult(partial: Partial<ProcessResult> = {}): ProcessResult {
  return {
    exitCode: 0,
    stdout: Buffer.alloc(0),
    stderr: '',
    timedOut: false,
    ...partial,
  };
}
