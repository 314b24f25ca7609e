// src/core/config/seed.config.ts
import { ConfigFactory } from '@nestjs/config';
import { resolve } from 'path';

/**
 * 初始化种子配置
 * 种子文件路径相对于进程工作目录解析
 */
const seedConfig: ConfigFactory = () => ({
  seed: {
    enabled: process.env.SEED_ON_STARTUP !== 'false',
    file: resolve(process.cwd(), process.env.SEED_FILE || 'data/initial-activities.json'),
  },
});

export default seedConfig;
