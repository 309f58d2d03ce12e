/**
 * 对象存储端口
 */
export abstract class ObjectStore {
  /** 上传对象，失败抛 StorageError */
  abstract put(key: string, body: Buffer, contentType: string): Promise<void>;

  abstract publicUrl(key: string): string;
}
