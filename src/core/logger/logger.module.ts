// src/core/logger/logger.module.ts
import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { IncomingMessage, ServerResponse } from 'http';
import { LoggerModule as PinoLoggerModule } from 'nestjs-pino';
import { LoggerOptions } from 'pino';

type CustomProps = (req: IncomingMessage, res: ServerResponse) => Record<string, unknown>;
type CustomLogLevel = (
  req: IncomingMessage,
  res: ServerResponse,
  err?: Error,
) => 'silent' | 'info' | 'warn' | 'error';

/**
 * 日志模块
 * 基于 nestjs-pino，所有参数来自 logger 配置命名空间
 */
@Module({
  imports: [
    PinoLoggerModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => {
        return {
          pinoHttp: {
            level: configService.get<string>('logger.level', 'info'),
            transport: configService.get<LoggerOptions['transport']>('logger.transport'),
            redact: configService.get<string[]>('logger.redactFields', []),
            customProps: configService.get<CustomProps>('logger.customProps'),
            customLogLevel: configService.get<CustomLogLevel>('logger.customLogLevel'),
          },
        };
      },
    }),
  ],
})
export class LoggerModule {}
