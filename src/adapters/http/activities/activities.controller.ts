// src/adapters/http/activities/activities.controller.ts
import { ValidateInput } from '@core/common/errors/validate-input.decorator';
import { Controller, Delete, Get, HttpCode, HttpStatus, Param, Post, Query } from '@nestjs/common';
import { ActivityListing, ActivityRosterChangeResult } from '@src/types/models/activity.types';
import { ListActivitiesUsecase } from '@usecases/activities/list-activities.usecase';
import { SignupForActivityUsecase } from '@usecases/activities/signup-for-activity.usecase';
import { UnregisterFromActivityUsecase } from '@usecases/activities/unregister-from-activity.usecase';
import { ActivityEmailQuery } from './dto/activity-email.query';

/**
 * 活动 HTTP 接口
 * 只负责参数提取与用例调用；领域错误由全局 HttpExceptionFilter 映射为状态码
 */
@Controller('activities')
export class ActivitiesController {
  constructor(
    private readonly listActivitiesUsecase: ListActivitiesUsecase,
    private readonly signupForActivityUsecase: SignupForActivityUsecase,
    private readonly unregisterFromActivityUsecase: UnregisterFromActivityUsecase,
  ) {}

  @Get()
  async list(): Promise<ActivityListing> {
    return await this.listActivitiesUsecase.execute();
  }

  @Post(':activityName/signup')
  @HttpCode(HttpStatus.OK)
  @ValidateInput()
  async signup(
    @Param('activityName') activityName: string,
    @Query() query: ActivityEmailQuery,
  ): Promise<ActivityRosterChangeResult> {
    return await this.signupForActivityUsecase.execute({ activityName, email: query.email });
  }

  @Delete(':activityName/unregister')
  @ValidateInput()
  async unregister(
    @Param('activityName') activityName: string,
    @Query() query: ActivityEmailQuery,
  ): Promise<ActivityRosterChangeResult> {
    return await this.unregisterFromActivityUsecase.execute({ activityName, email: query.email });
  }
}
