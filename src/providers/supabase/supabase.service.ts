import { Injectable, OnModuleInit, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { createClient, SupabaseClient } from '@supabase/supabase-js';
import { RecordId } from '../../database/entities';
import { StoreError, errorMessage } from '../../common/errors/ingestion.errors';
import { RowStore, StoredRow } from './row-store';

interface PostgrestResult {
  data: StoredRow[] | null;
  error: { message: string } | null;
}

@Injectable()
export class SupabaseService extends RowStore implements OnModuleInit {
  private readonly logger = new Logger(SupabaseService.name);
  private client: SupabaseClient | null = null;

  constructor(private configService: ConfigService) {
    super();
  }

  onModuleInit() {
    const url = this.configService.get<string>('supabase.url');
    const serviceRoleKey = this.configService.get<string>('supabase.serviceRoleKey');

    if (!url || !serviceRoleKey) {
      this.logger.warn('Supabase configuration missing');
      return;
    }

    this.client = createClient(url, serviceRoleKey, {
      auth: {
        autoRefreshToken: false,
        persistSession: false,
      },
    });

    this.logger.log('Supabase client initialized');
  }

  getClient(): SupabaseClient {
    if (!this.client) {
      throw new StoreError('Supabase client not configured');
    }
    return this.client;
  }

  async insert(table: string, rows: StoredRow[]): Promise<StoredRow[]> {
    const data = await this.run(`insert into ${table}`, () =>
      this.getClient().from(table).insert(rows).select(),
    );
    if (data.length !== rows.length) {
      throw new StoreError(`Insert into ${table} returned ${data.length} of ${rows.length} rows`);
    }
    return data;
  }

  async selectMax(table: string, column: string): Promise<number | null> {
    const data = await this.run(`select max(${column}) from ${table}`, () =>
      this.getClient()
        .from(table)
        .select<string, StoredRow>(column)
        .not(column, 'is', null)
        .order(column, { ascending: false })
        .limit(1),
    );
    const value = data[0]?.[column];
    return typeof value === 'number' && Number.isFinite(value) ? value : null;
  }

  async updateById(table: string, id: RecordId, fields: StoredRow): Promise<void> {
    await this.run(`update ${table} ${id}`, () =>
      this.getClient().from(table).update(fields).eq('id', id).select(),
    );
  }

  async selectWhere(
    table: string,
    column: string,
    value: RecordId,
    orderBy?: string,
  ): Promise<StoredRow[]> {
    return this.run(`select from ${table}`, () => {
      const query = this.getClient().from(table).select('*').eq(column, value);
      return orderBy ? query.order(orderBy, { ascending: true }) : query;
    });
  }

  /**
   * 执行 PostgREST 请求，错误统一转换为 StoreError
   */
  private async run(
    label: string,
    request: () => PromiseLike<PostgrestResult>,
  ): Promise<StoredRow[]> {
    let result: PostgrestResult;
    try {
      result = await request();
    } catch (err) {
      throw new StoreError(`Supabase ${label} failed: ${errorMessage(err)}`, { cause: err });
    }

    if (result.error) {
      this.logger.error(`Supabase ${label} failed: ${result.error.message}`);
      throw new StoreError(`Supabase ${label} failed: ${result.error.message}`, {
        cause: result.error,
      });
    }
    return result.data ?? [];
  }
}
