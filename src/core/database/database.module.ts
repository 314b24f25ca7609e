// src/core/database/database.module.ts

import { DatabaseType } from '@core/config/database.config';
import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { TypeOrmModule, TypeOrmModuleOptions } from '@nestjs/typeorm';

/**
 * 数据库配置工厂函数
 * @param config 配置服务实例
 * @returns TypeORM 配置选项
 */
export const createDatabaseConfig = (config: ConfigService): TypeOrmModuleOptions => {
  const type = config.get<DatabaseType>('database.type', 'better-sqlite3');
  const common = {
    synchronize: config.get<boolean>('database.synchronize', true),
    logging: config.get<boolean>('database.logging', false),
    // 自动加载 forFeature 注册的 entities
    autoLoadEntities: true,
  };

  if (type === 'mysql') {
    return {
      ...common,
      type,
      host: config.get<string>('database.host'),
      port: config.get<number>('database.port'),
      username: config.get<string>('database.username'),
      password: config.get<string>('database.password'),
      database: config.get<string>('database.database'),
      timezone: config.get<string>('database.timezone'),
      charset: config.get<string>('database.charset'),
      extra: config.get<Record<string, unknown>>('database.extra'),
    };
  }

  return {
    ...common,
    type,
    database: config.get<string>('database.database', ':memory:'),
  };
};

/**
 * 数据库模块
 * 封装 TypeORM 配置和初始化逻辑
 */
@Module({
  imports: [
    TypeOrmModule.forRootAsync({
      inject: [ConfigService],
      useFactory: createDatabaseConfig,
    }),
  ],
  exports: [TypeOrmModule],
})
export class DatabaseModule {}
