// src/usecases/activities/list-activities.usecase.spec.ts
import { Test, TestingModule } from '@nestjs/testing';
import { ActivityRosterService } from '@src/modules/activities/activity-roster.service';
import { DataSource } from 'typeorm';
import { ListActivitiesUsecase } from './list-activities.usecase';

describe('ListActivitiesUsecase', () => {
  let usecase: ListActivitiesUsecase;

  const mockDataSource = {
    transaction: jest.fn(async <T>(work: (manager: unknown) => Promise<T>): Promise<T> =>
      work({}),
    ),
  };

  const mockRosterService = {
    listActivities: jest.fn(),
  };

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        ListActivitiesUsecase,
        { provide: DataSource, useValue: mockDataSource },
        { provide: ActivityRosterService, useValue: mockRosterService },
      ],
    }).compile();

    usecase = module.get<ListActivitiesUsecase>(ListActivitiesUsecase);
  });

  it('按活动名称组装列表视图', async () => {
    mockRosterService.listActivities.mockResolvedValue([
      {
        id: 1,
        name: 'Chess Club',
        description: 'Weekly chess practice',
        schedule: 'Fridays, 3:30 PM - 5:00 PM',
        maxParticipants: 12,
        signups: [
          { id: 1, email: 'michael@example.edu' },
          { id: 2, email: 'daniel@example.edu' },
        ],
      },
      {
        id: 2,
        name: 'Open Studio',
        description: 'Drop-in art room',
        schedule: 'Wednesdays',
        maxParticipants: null,
        signups: [],
      },
    ]);

    const listing = await usecase.execute();

    expect(listing).toEqual({
      'Chess Club': {
        description: 'Weekly chess practice',
        schedule: 'Fridays, 3:30 PM - 5:00 PM',
        max_participants: 12,
        participants: ['michael@example.edu', 'daniel@example.edu'],
      },
      'Open Studio': {
        description: 'Drop-in art room',
        schedule: 'Wednesdays',
        max_participants: null,
        participants: [],
      },
    });
    expect(Object.keys(listing)).toEqual(['Chess Club', 'Open Studio']);
  });

  it('空库返回空对象', async () => {
    mockRosterService.listActivities.mockResolvedValue([]);

    await expect(usecase.execute()).resolves.toEqual({});
  });
});
