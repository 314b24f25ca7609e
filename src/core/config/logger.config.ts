// src/core/config/logger.config.ts
import { ConfigFactory } from '@nestjs/config';
import { IncomingMessage, ServerResponse } from 'http';

type RequestLogLevel = 'silent' | 'info' | 'warn' | 'error';

const customPropsFor4xx = (req: IncomingMessage, res: ServerResponse): Record<string, unknown> => {
  const statusCode = res.statusCode ?? 0;
  if (statusCode >= 400 && statusCode < 500) {
    const forwardedRaw = req.headers?.['x-forwarded-for'];
    const xForwardedFor = Array.isArray(forwardedRaw) ? forwardedRaw.join(',') : forwardedRaw;
    const userAgentRaw = req.headers?.['user-agent'];
    const userAgent = Array.isArray(userAgentRaw) ? userAgentRaw.join(',') : userAgentRaw;

    return {
      remoteAddress: req.socket?.remoteAddress ?? null,
      xForwardedFor: xForwardedFor ?? null,
      method: req.method ?? null,
      url: req.url ?? null,
      userAgent: userAgent ?? null,
    };
  }
  return {};
};

/**
 * 按请求结果决定 HTTP 访问日志级别
 * 只有报名 / 取消报名这类写操作的成功请求会记录 info
 */
export const customLogLevel = (
  req: IncomingMessage,
  res: ServerResponse,
  err?: Error,
): RequestLogLevel => {
  if (req.url === '/favicon.ico') return 'silent';

  if (res.statusCode >= 500 || err) return 'error';
  if (res.statusCode >= 400) return 'warn';

  const isRosterWrite =
    (req.method === 'POST' || req.method === 'DELETE') && (req.url ?? '').startsWith('/activities/');
  if (isRosterWrite) return 'info';

  // GET /activities 等只读请求默认不记录
  return 'silent';
};

const loggerConfig: ConfigFactory = () => {
  const nodeEnv = process.env.NODE_ENV || 'development';
  const isDev = nodeEnv !== 'production';
  const isTest = nodeEnv === 'test';
  const logPath = process.env.LOG_PATH || (isDev ? './logs' : '/var/log/activities');

  const level = isTest ? 'silent' : isDev ? 'debug' : 'info';

  return {
    logger: {
      level,
      redactFields: ['req.headers.authorization'],
      customProps: customPropsFor4xx,
      customLogLevel,
      // 测试环境不启用 transport，避免 worker 线程残留
      transport: isTest
        ? undefined
        : isDev
          ? {
              target: 'pino-pretty',
              options: {
                colorize: true,
                translateTime: 'SYS:dd HH:MM:ss',
                messageFormat: '{time} - [{context}] {method} {url} {statusCode} - {msg}',
                ignore: 'hostname,pid,req,context',
              },
            }
          : {
              targets: [
                {
                  target: 'pino/file',
                  options: {
                    destination: `${logPath}/app.log`,
                    mkdir: true,
                  },
                  level: 'info',
                },
                {
                  target: 'pino/file',
                  options: {
                    destination: `${logPath}/error.log`,
                    mkdir: true,
                  },
                  level: 'error',
                },
              ],
            },
    },
  };
};

export default loggerConfig;
