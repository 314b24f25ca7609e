// src/core/config/database.config.ts
import { ConfigFactory } from '@nestjs/config';

/** 支持的数据库驱动 */
export type DatabaseType = 'mysql' | 'better-sqlite3';

const resolveDatabaseType = (raw: string | undefined): DatabaseType =>
  raw === 'mysql' ? 'mysql' : 'better-sqlite3';

/**
 * 数据库配置工厂函数
 * 默认使用本地 SQLite 文件；生产环境可通过 DB_TYPE=mysql 切换到 MySQL 8.0
 */
const databaseConfig: ConfigFactory = () => {
  const type = resolveDatabaseType(process.env.DB_TYPE);

  return {
    database: {
      type,
      // SQLite 下为文件路径（:memory: 为内存库），MySQL 下为库名
      database: process.env.DB_NAME || (type === 'mysql' ? 'activities' : 'data/activities.sqlite'),
      host: process.env.DB_HOST || 'localhost',
      port: parseInt(process.env.DB_PORT || '3306', 10),
      username: process.env.DB_USER,
      password: process.env.DB_PASS,
      timezone: process.env.DB_TIMEZONE || 'Z',
      // 启动时按 Entity 建表，与首次运行即可用的行为保持一致
      synchronize: process.env.DB_SYNCHRONIZE !== 'false',
      logging: process.env.DB_LOGGING === 'true',
      charset: 'utf8mb4',
      extra: {
        connectionLimit: parseInt(process.env.DB_POOL_SIZE || '10', 10),
        // 连接超时时间（毫秒）
        connectTimeout: 60000,
        // 是否等待连接释放
        waitForConnections: true,
        // 等待队列上限，0 为不限制
        queueLimit: 0,
      },
    },
  };
};

export default databaseConfig;
