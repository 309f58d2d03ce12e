import { ValidationPipe } from '@nestjs/common';

/**
 * 全局校验管道
 * 未声明的字段直接剔除，不报错
 */
export function createValidationPipe(): ValidationPipe {
  return new ValidationPipe({
    whitelist: true,
    transform: true,
  });
}
