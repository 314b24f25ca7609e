// src/usecases/activities/initialize-activities.usecase.ts
import { ACTIVITY_ERROR, activityError } from '@core/common/errors';
import { Injectable } from '@nestjs/common';
import { InjectDataSource } from '@nestjs/typeorm';
import { ActivityRosterService } from '@src/modules/activities/activity-roster.service';
import { ActivitySeed } from '@src/types/models/activity.types';
import { DataSource } from 'typeorm';

export interface InitializeActivitiesInput {
  readonly seeds: ReadonlyArray<ActivitySeed>;
}

export interface InitializeActivitiesOutput {
  /** 本次是否写入了种子数据 */
  readonly seeded: boolean;
  /** 本次写入的活动数量 */
  readonly activityCount: number;
}

/**
 * 初始化活动用例
 * 仅由进程启动代码调用一次，不出现在任何请求路径中；对非空库是幂等的空操作
 */
@Injectable()
export class InitializeActivitiesUsecase {
  constructor(
    @InjectDataSource() private readonly dataSource: DataSource,
    private readonly rosterService: ActivityRosterService,
  ) {}

  async execute(input: InitializeActivitiesInput): Promise<InitializeActivitiesOutput> {
    this.ensureSeedsWithinCapacity(input.seeds);

    const activityCount = await this.dataSource.transaction((manager) =>
      this.rosterService.seedIfEmpty(input.seeds, manager),
    );
    return { seeded: activityCount > 0, activityCount };
  }

  /**
   * 种子中的初始报名人数不得超过容量上限
   */
  private ensureSeedsWithinCapacity(seeds: ReadonlyArray<ActivitySeed>): void {
    for (const seed of seeds) {
      if (seed.maxParticipants !== null && seed.participants.length > seed.maxParticipants) {
        throw activityError(ACTIVITY_ERROR.CAPACITY_EXCEEDED, {
          activityName: seed.name,
          participants: seed.participants.length,
          maxParticipants: seed.maxParticipants,
        });
      }
    }
  }
}
