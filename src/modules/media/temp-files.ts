import { Logger } from '@nestjs/common';
import { mkdir, rm } from 'fs/promises';
import { join } from 'path';
import { v4 as uuidv4 } from 'uuid';

const logger = new Logger('TempFiles');

/**
 * 在 dir 下为每个扩展名分配一个临时路径，回调结束后（包括抛错）全部删除
 */
export async function withTempFiles<T>(
  dir: string,
  extensions: string[],
  fn: (paths: string[]) => Promise<T>,
): Promise<T> {
  await mkdir(dir, { recursive: true });
  const id = uuidv4();
  const paths = extensions.map((ext, i) => join(dir, `${id}-${i}${ext}`));

  try {
    return await fn(paths);
  } finally {
    await Promise.all(
      paths.map(async (path) => {
        try {
          await rm(path, { force: true });
        } catch (err) {
          logger.warn(`Failed to remove temp file ${path}: ${err}`);
        }
      }),
    );
  }
}
