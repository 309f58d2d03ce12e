import {
  ExceptionFilter,
  Catch,
  ArgumentsHost,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { FastifyReply } from 'fastify';
import { ApiResponse, ErrorCode } from '../interfaces/response.interface';
import { IngestionError } from '../errors/ingestion.errors';

@Catch()
export class HttpExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(HttpExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost) {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<FastifyReply>();

    let status = HttpStatus.INTERNAL_SERVER_ERROR;
    let errorCode: string = ErrorCode.INTERNAL_ERROR;
    let message = 'Internal server error';
    let details: Record<string, unknown> | undefined;

    if (exception instanceof HttpException) {
      status = exception.getStatus();
      const exceptionResponse = exception.getResponse();

      if (typeof exceptionResponse === 'object' && exceptionResponse !== null) {
        const resp: Record<string, unknown> = { ...exceptionResponse };
        message = this.readMessage(resp.message) || exception.message;
        errorCode = typeof resp.code === 'string' ? resp.code : this.mapStatusToErrorCode(status);
        if (typeof resp.details === 'object' && resp.details !== null) {
          details = { ...resp.details };
        } else if (Array.isArray(resp.message)) {
          // ValidationPipe 返回的是字段错误数组
          details = { violations: resp.message };
        }
      } else {
        message = String(exceptionResponse);
        errorCode = this.mapStatusToErrorCode(status);
      }
    } else if (exception instanceof IngestionError) {
      status = this.mapErrorCodeToStatus(exception.code);
      errorCode = exception.code;
      message = exception.message;
      if (status >= HttpStatus.INTERNAL_SERVER_ERROR) {
        this.logger.error(`${exception.name}: ${exception.message}`, exception.stack);
      }
    } else if (exception instanceof Error) {
      message = exception.message;
      this.logger.error(`Unhandled error: ${exception.message}`, exception.stack);
    }

    const errorResponse: ApiResponse = {
      data: null,
      error: {
        code: errorCode,
        message,
        ...(details && { details }),
      },
    };

    response.status(status).send(errorResponse);
  }

  private readMessage(value: unknown): string {
    if (typeof value === 'string') return value;
    if (Array.isArray(value)) return value.filter((v) => typeof v === 'string').join('; ');
    return '';
  }

  private mapErrorCodeToStatus(code: ErrorCode): number {
    switch (code) {
      case ErrorCode.INVALID_INPUT:
        return HttpStatus.BAD_REQUEST;
      case ErrorCode.NOT_FOUND:
        return HttpStatus.NOT_FOUND;
      case ErrorCode.FETCH_FAILED:
      case ErrorCode.ENGINE_ERROR:
      case ErrorCode.STORAGE_ERROR:
        return HttpStatus.BAD_GATEWAY;
      default:
        return HttpStatus.INTERNAL_SERVER_ERROR;
    }
  }

  private mapStatusToErrorCode(status: number): ErrorCode {
    switch (status) {
      case HttpStatus.BAD_REQUEST:
        return ErrorCode.INVALID_INPUT;
      case HttpStatus.NOT_FOUND:
        return ErrorCode.NOT_FOUND;
      case HttpStatus.PAYLOAD_TOO_LARGE:
        return ErrorCode.PAYLOAD_TOO_LARGE;
      default:
        return ErrorCode.INTERNAL_ERROR;
    }
  }
}
