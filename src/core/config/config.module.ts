// src/core/config/config.module.ts
import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import databaseConfig from './database.config';
import loggerConfig from './logger.config';
import seedConfig from './seed.config';
import serverConfig from './server.config';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true, // 使 ConfigService 全局可用（无需再次 import）
      envFilePath: [
        `env/.env.${process.env.NODE_ENV || 'development'}`,
        'env/.env.development', // 备用文件
      ],
      load: [serverConfig, loggerConfig, databaseConfig, seedConfig],
    }),
  ],
})
export class AppConfigModule {}
