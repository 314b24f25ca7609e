// test/00-app/00-app.e2e-spec.ts

import { INestApplication } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import request from 'supertest';
import { App } from 'supertest/types';
import { DataSource } from 'typeorm';
import { AppModule } from '../../src/app.module';

describe('00-App 全局测试', () => {
  let app: INestApplication<App>;
  let dataSource: DataSource;

  beforeAll(async () => {
    const moduleFixture: TestingModule = await Test.createTestingModule({
      imports: [AppModule],
    }).compile();

    app = moduleFixture.createNestApplication();
    dataSource = moduleFixture.get<DataSource>(DataSource);

    await app.init();
  }, 30000);

  afterAll(async () => {
    if (app) {
      await app.close();
    }
  });

  describe('应用基础设施测试', () => {
    it('数据库连接应该正常建立并完成建表', async () => {
      expect(dataSource.isInitialized).toBe(true);
      expect(dataSource.options.type).toBe('better-sqlite3');

      const tables: Array<{ name: string }> = await dataSource.query(
        "SELECT name FROM sqlite_master WHERE type = 'table' AND name LIKE 'activit%' ORDER BY name",
      );
      expect(tables.map((t) => t.name)).toEqual(['activities', 'activity_signups']);
    });

    it('未初始化种子时活动列表为空对象', async () => {
      const response = await request(app.getHttpServer()).get('/activities').expect(200);

      expect(response.body).toEqual({});
    });

    it('未知路由返回 404 与 detail', async () => {
      const response = await request(app.getHttpServer()).get('/unknown').expect(404);

      expect(response.body).toEqual({ detail: 'Cannot GET /unknown' });
    });
  });
});
