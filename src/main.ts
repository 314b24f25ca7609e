import 'reflect-metadata';

import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { loadActivitySeeds } from '@src/bootstrap/activity-seed.loader';
import { InitializeActivitiesUsecase } from '@usecases/activities/initialize-activities.usecase';
import { Logger } from 'nestjs-pino';
import { AppModule } from './app.module';

/**
 * 应用程序启动函数
 * 先完成种子初始化，再开始监听端口；初始化失败直接终止启动
 */
async function bootstrap() {
  const app = await NestFactory.create(AppModule, { bufferLogs: true });

  // 使用 PinoLogger 替换 Nest 默认日志
  const logger = app.get(Logger);
  app.useLogger(logger);
  app.enableShutdownHooks();

  const configService = app.get<ConfigService>(ConfigService);

  if (configService.get<boolean>('seed.enabled', true)) {
    const seedFile = configService.get<string>('seed.file', 'data/initial-activities.json');
    const seeds = await loadActivitySeeds(seedFile);
    const result = await app.get(InitializeActivitiesUsecase).execute({ seeds });
    logger.log(
      result.seeded
        ? `🌱 已写入 ${result.activityCount} 个种子活动（${seedFile}）`
        : '🌱 活动表非空，跳过种子初始化',
    );
  }

  const host = configService.get<string>('server.host', '127.0.0.1');
  const port = configService.get<number>('server.port', 3000);
  const nodeEnv = configService.get<string>('NODE_ENV', 'development');

  await app.listen(port, host);

  logger.log(`🚀 NestJS 服务在 http://${host}:${port} 上以 ${nodeEnv} 模式启动成功`);
}

void bootstrap();
