// src/modules/activities/activity-roster.module.ts
import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { ActivityRosterService } from './activity-roster.service';
import { ActivitySignupEntity } from './activity-signup.entity';
import { ActivityEntity } from './activity.entity';

/**
 * 活动名册模块
 * 注册实体与服务，供 usecases 编排调用
 */
@Module({
  imports: [TypeOrmModule.forFeature([ActivityEntity, ActivitySignupEntity])],
  providers: [ActivityRosterService],
  exports: [TypeOrmModule, ActivityRosterService],
})
export class ActivityRosterModule {}
