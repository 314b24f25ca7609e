// src/usecases/activities/activities-usecases.module.ts
import { Module } from '@nestjs/common';
import { ActivityRosterModule } from '@src/modules/activities/activity-roster.module';
import { InitializeActivitiesUsecase } from './initialize-activities.usecase';
import { ListActivitiesUsecase } from './list-activities.usecase';
import { SignupForActivityUsecase } from './signup-for-activity.usecase';
import { UnregisterFromActivityUsecase } from './unregister-from-activity.usecase';

/**
 * 活动用例模块
 * 聚合活动相关的 usecases，供适配层与启动代码调用
 */
@Module({
  imports: [ActivityRosterModule],
  providers: [
    ListActivitiesUsecase,
    SignupForActivityUsecase,
    UnregisterFromActivityUsecase,
    InitializeActivitiesUsecase,
  ],
  exports: [
    ListActivitiesUsecase,
    SignupForActivityUsecase,
    UnregisterFromActivityUsecase,
    InitializeActivitiesUsecase,
  ],
})
export class ActivitiesUsecasesModule {}
