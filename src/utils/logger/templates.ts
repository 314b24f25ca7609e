// src/utils/logger/templates.ts
import { PinoLogger } from 'nestjs-pino';

/**
 * 输出 info 日志（带上下文标记）
 */
export function infoLog(
  logger: PinoLogger,
  message: string,
  payload?: unknown,
  context?: string,
): void {
  if (context) logger.setContext(context);
  logger.info(payload ?? {}, message);
}

/**
 * 输出 warn 日志（带上下文标记）
 */
export function warnLog(
  logger: PinoLogger,
  message: string,
  payload?: unknown,
  context?: string,
): void {
  if (context) logger.setContext(context);
  logger.warn(payload ?? {}, message);
}

/**
 * 带错误堆栈的 error 日志
 */
export function errorLogWithStack(
  logger: PinoLogger,
  message: string,
  error: Error,
  payload?: Record<string, unknown>,
  context?: string,
): void {
  if (context) logger.setContext(context);
  logger.error(
    {
      ...payload,
      error: {
        message: error.message,
        stack: error.stack,
        name: error.name,
      },
    },
    message,
  );
}
