import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { isRecord } from '../../shared/common/record.util';
import { formatError } from '../../shared/logging/format-error.util';

type ErrorBody = {
  error: string;
  code: string;
  message: string;
  statusCode: number;
  path?: string;
  timestamp: string;
  details?: Record<string, unknown> | unknown[];
};

const STATUS_CODES: Partial<Record<number, string>> = {
  [HttpStatus.BAD_REQUEST]: 'BadRequest',
  [HttpStatus.UNAUTHORIZED]: 'Unauthorized',
  [HttpStatus.FORBIDDEN]: 'Forbidden',
  [HttpStatus.NOT_FOUND]: 'NotFound',
  [HttpStatus.CONFLICT]: 'Conflict',
  [HttpStatus.UNPROCESSABLE_ENTITY]: 'ValidationFailed',
  [HttpStatus.TOO_MANY_REQUESTS]: 'RateLimited',
  [HttpStatus.BAD_GATEWAY]: 'BadGateway',
  [HttpStatus.SERVICE_UNAVAILABLE]: 'ServiceUnavailable',
};

const RESERVED_KEYS = new Set(['code', 'error', 'message', 'statusCode']);

/**
 * Renders every error as one JSON shape. Ledger errors carry their kind in
 * `code` (`cap_exceeded`, `conflict`, ...) and their extra fields in `details`.
 */
@Catch()
export class HttpErrorFilter implements ExceptionFilter {
  private readonly logger = new Logger(HttpErrorFilter.name);

  private statusToCode(status: number): string {
    return STATUS_CODES[status] ?? 'InternalError';
  }

  private formatMessage(message: unknown): string {
    if (typeof message === 'string') return message;
    if (Array.isArray(message) && message.every((m) => typeof m === 'string')) {
      return message.join('; ');
    }
    return 'Internal Server Error';
  }

  catch(exception: unknown, host: ArgumentsHost) {
    const ctx = host.switchToHttp();
    const res = ctx.getResponse<{
      status: (code: number) => { json: (body: unknown) => void };
    }>();
    const req = ctx.getRequest<{ originalUrl?: string; url?: string }>();

    let status: number = HttpStatus.INTERNAL_SERVER_ERROR;
    let message: unknown = 'Internal Server Error';
    let code = this.statusToCode(status);
    let details: ErrorBody['details'];

    if (exception instanceof HttpException) {
      status = exception.getStatus();
      code = this.statusToCode(status);
      const response = exception.getResponse();
      if (typeof response === 'string') {
        message = response;
      } else if (isRecord(response)) {
        message = response.message ?? exception.message;
        if (typeof response.code === 'string') code = response.code;
        if (Array.isArray(response.message)) {
          details = response.message;
        } else {
          const extra = Object.fromEntries(
            Object.entries(response).filter(
              ([key, value]) => !RESERVED_KEYS.has(key) && value !== undefined,
            ),
          );
          if (Object.keys(extra).length) details = extra;
        }
      }
    } else {
      this.logger.error(
        `Unhandled error on ${req.originalUrl ?? req.url ?? ''}: ${formatError(exception)}`,
        exception instanceof Error ? exception.stack : undefined,
      );
    }

    const body: ErrorBody = {
      error: code,
      code,
      message:
        status >= 500 && !(exception instanceof HttpException)
          ? 'Internal Server Error'
          : this.formatMessage(message),
      statusCode: status,
      path: req.originalUrl ?? req.url,
      timestamp: new Date().toISOString(),
      ...(details !== undefined ? { details } : {}),
    };

    res.status(status).json(body);
  }
}
