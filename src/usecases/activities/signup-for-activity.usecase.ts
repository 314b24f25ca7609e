// src/usecases/activities/signup-for-activity.usecase.ts
import { ACTIVITY_ERROR, activityError } from '@core/common/errors';
import { Injectable } from '@nestjs/common';
import { InjectDataSource } from '@nestjs/typeorm';
import { ActivityEntity } from '@src/modules/activities/activity.entity';
import { ActivityRosterService } from '@src/modules/activities/activity-roster.service';
import {
  ActivityRosterChangeInput,
  ActivityRosterChangeResult,
} from '@src/types/models/activity.types';
import { DataSource, EntityManager } from 'typeorm';

/**
 * 学生报名活动用例
 * 职责：
 * - 校验顺序固定：活动不存在 → 已报名 → 名额已满
 * - 三项校验与写入在同一事务中完成
 * - 容量校验是"先读后写"，并发下仅尽力而为；重复报名由唯一约束兜底
 */
@Injectable()
export class SignupForActivityUsecase {
  constructor(
    @InjectDataSource() private readonly dataSource: DataSource,
    private readonly rosterService: ActivityRosterService,
  ) {}

  async execute(input: ActivityRosterChangeInput): Promise<ActivityRosterChangeResult> {
    return await this.dataSource.transaction(async (manager) => {
      const activity = await this.findActivityOrThrow(input.activityName, manager);

      if (await this.rosterService.hasSignup(activity.id, input.email, manager)) {
        throw activityError(ACTIVITY_ERROR.ALREADY_REGISTERED, {
          activityName: input.activityName,
          email: input.email,
        });
      }

      await this.ensureCapacityOrThrow(activity, manager);
      await this.rosterService.addSignup(activity.id, input.email, manager);

      return { message: `Signed up ${input.email} for ${input.activityName}` };
    });
  }

  private async findActivityOrThrow(
    activityName: string,
    manager: EntityManager,
  ): Promise<ActivityEntity> {
    const activity = await this.rosterService.findActivity(activityName, manager);
    if (!activity) {
      throw activityError(ACTIVITY_ERROR.ACTIVITY_NOT_FOUND, { activityName });
    }
    return activity;
  }

  /**
   * 容量校验：未设置上限的活动不限人数
   */
  private async ensureCapacityOrThrow(
    activity: ActivityEntity,
    manager: EntityManager,
  ): Promise<void> {
    if (activity.maxParticipants === null) return;
    const count = await this.rosterService.countSignups(activity.id, manager);
    if (count >= activity.maxParticipants) {
      throw activityError(ACTIVITY_ERROR.CAPACITY_EXCEEDED, {
        activityName: activity.name,
        count,
        maxParticipants: activity.maxParticipants,
      });
    }
  }
}
