import { RecordId } from '../../database/entities';

export type StoredRow = Record<string, unknown>;

/**
 * 关系型行存储端口
 * 生产环境由 SupabaseService 实现，测试使用内存实现
 */
export abstract class RowStore {
  /** 插入多行并返回带主键的结果，失败抛 StoreError */
  abstract insert(table: string, rows: StoredRow[]): Promise<StoredRow[]>;

  /** 读取某列当前最大值，表为空时返回 null */
  abstract selectMax(table: string, column: string): Promise<number | null>;

  abstract updateById(table: string, id: RecordId, fields: StoredRow): Promise<void>;

  abstract selectWhere(
    table: string,
    column: string,
    value: RecordId,
    orderBy?: string,
  ): Promise<StoredRow[]>;
}
