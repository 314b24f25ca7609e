// src/core/common/filters/http-exception.filter.ts
import { ResolvedHttpError } from '@app-types/errors/exception-payload';
import { ACTIVITY_ERROR, DomainError, isDomainError } from '@core/common/errors';
import { ArgumentsHost, Catch, ExceptionFilter, HttpException, HttpStatus } from '@nestjs/common';
import { errorLogWithStack } from '@src/utils/logger/templates';
import { Request, Response } from 'express';
import { InjectPinoLogger, PinoLogger } from 'nestjs-pino';

/** 领域错误码 → HTTP 状态码 */
const DOMAIN_ERROR_STATUS: Record<string, number> = {
  [ACTIVITY_ERROR.ACTIVITY_NOT_FOUND]: HttpStatus.NOT_FOUND,
  [ACTIVITY_ERROR.ALREADY_REGISTERED]: HttpStatus.BAD_REQUEST,
  [ACTIVITY_ERROR.CAPACITY_EXCEEDED]: HttpStatus.BAD_REQUEST,
  [ACTIVITY_ERROR.NOT_REGISTERED]: HttpStatus.BAD_REQUEST,
  [ACTIVITY_ERROR.CONSTRAINT_VIOLATION]: HttpStatus.CONFLICT,
};

const INTERNAL_ERROR_DETAIL = 'Internal Server Error';

/** 从 HttpException 的响应体中提取描述（string | { message: string | string[] }） */
function extractHttpExceptionDetail(exception: HttpException): string {
  const resp = exception.getResponse();
  if (typeof resp === 'string') return resp;
  if ('message' in resp) {
    const msg = resp.message;
    if (Array.isArray(msg)) return msg.map(String).join(', ');
    if (typeof msg === 'string') return msg;
  }
  return exception.message;
}

/**
 * 将领域错误映射为 HTTP 状态码
 * 未登记的错误码一律视为 400，保证领域错误不会被当作服务端故障
 */
export function mapDomainErrorToStatus(error: DomainError): number {
  return DOMAIN_ERROR_STATUS[error.code] ?? HttpStatus.BAD_REQUEST;
}

/**
 * 解析任意异常为 HTTP 状态码与响应体
 * - DomainError：固定状态码 + 领域错误描述
 * - HttpException：沿用其状态码与 message
 * - 其它：500
 */
export function resolveHttpError(exception: unknown): ResolvedHttpError {
  if (isDomainError(exception)) {
    return { status: mapDomainErrorToStatus(exception), body: { detail: exception.message } };
  }
  if (exception instanceof HttpException) {
    return {
      status: exception.getStatus(),
      body: { detail: extractHttpExceptionDetail(exception) },
    };
  }
  return { status: HttpStatus.INTERNAL_SERVER_ERROR, body: { detail: INTERNAL_ERROR_DETAIL } };
}

/** HTTP 全局异常过滤器 */
@Catch()
export class HttpExceptionFilter implements ExceptionFilter {
  constructor(
    @InjectPinoLogger('HttpExceptionFilter')
    private readonly logger: PinoLogger,
  ) {}

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const req = ctx.getRequest<Request>();
    const res = ctx.getResponse<Response>();
    const { status, body } = resolveHttpError(exception);

    if (status >= HttpStatus.INTERNAL_SERVER_ERROR) {
      const error = exception instanceof Error ? exception : new Error(String(exception));
      errorLogWithStack(this.logger, '请求处理失败', error, {
        method: req.method,
        url: req.originalUrl,
      });
    } else if (isDomainError(exception)) {
      this.logger.debug(
        { code: exception.code, details: exception.details, url: req.originalUrl },
        '领域错误已转换为 HTTP 响应',
      );
    }

    res.status(status).json(body);
  }
}
