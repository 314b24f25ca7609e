// src/usecases/activities/unregister-from-activity.usecase.ts
import { ACTIVITY_ERROR, activityError } from '@core/common/errors';
import { Injectable } from '@nestjs/common';
import { InjectDataSource } from '@nestjs/typeorm';
import { ActivityRosterService } from '@src/modules/activities/activity-roster.service';
import {
  ActivityRosterChangeInput,
  ActivityRosterChangeResult,
} from '@src/types/models/activity.types';
import { DataSource } from 'typeorm';

/**
 * 学生取消报名用例
 * 校验顺序：活动不存在 → 未报名
 */
@Injectable()
export class UnregisterFromActivityUsecase {
  constructor(
    @InjectDataSource() private readonly dataSource: DataSource,
    private readonly rosterService: ActivityRosterService,
  ) {}

  async execute(input: ActivityRosterChangeInput): Promise<ActivityRosterChangeResult> {
    return await this.dataSource.transaction(async (manager) => {
      const activity = await this.rosterService.findActivity(input.activityName, manager);
      if (!activity) {
        throw activityError(ACTIVITY_ERROR.ACTIVITY_NOT_FOUND, {
          activityName: input.activityName,
        });
      }

      if (!(await this.rosterService.hasSignup(activity.id, input.email, manager))) {
        throw activityError(ACTIVITY_ERROR.NOT_REGISTERED, {
          activityName: input.activityName,
          email: input.email,
        });
      }

      await this.rosterService.removeSignup(activity.id, input.email, manager);
      return { message: `Unregistered ${input.email} from ${input.activityName}` };
    });
  }
}
