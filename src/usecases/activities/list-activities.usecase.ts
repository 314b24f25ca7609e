// src/usecases/activities/list-activities.usecase.ts
import { Injectable } from '@nestjs/common';
import { InjectDataSource } from '@nestjs/typeorm';
import { ActivityRosterService } from '@src/modules/activities/activity-roster.service';
import { ActivityListing } from '@src/types/models/activity.types';
import { DataSource } from 'typeorm';

/**
 * 查询活动列表用例
 * 纯读取：活动名称 → { description, schedule, max_participants, participants }
 */
@Injectable()
export class ListActivitiesUsecase {
  constructor(
    @InjectDataSource() private readonly dataSource: DataSource,
    private readonly rosterService: ActivityRosterService,
  ) {}

  async execute(): Promise<ActivityListing> {
    const activities = await this.dataSource.transaction((manager) =>
      this.rosterService.listActivities(manager),
    );

    const listing: ActivityListing = {};
    for (const activity of activities) {
      listing[activity.name] = {
        description: activity.description,
        schedule: activity.schedule,
        max_participants: activity.maxParticipants,
        participants: (activity.signups ?? []).map((signup) => signup.email),
      };
    }
    return listing;
  }
}
