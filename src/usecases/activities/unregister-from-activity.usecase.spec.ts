// src/usecases/activities/unregister-from-activity.usecase.spec.ts
import { ACTIVITY_ERROR } from '@core/common/errors';
import { Test, TestingModule } from '@nestjs/testing';
import { ActivityRosterService } from '@src/modules/activities/activity-roster.service';
import { DataSource } from 'typeorm';
import { UnregisterFromActivityUsecase } from './unregister-from-activity.usecase';

describe('UnregisterFromActivityUsecase', () => {
  let usecase: UnregisterFromActivityUsecase;

  const fakeManager = { name: 'tx-manager' };

  const mockDataSource = {
    transaction: jest.fn(async <T>(work: (manager: unknown) => Promise<T>): Promise<T> =>
      work(fakeManager),
    ),
  };

  const mockRosterService = {
    findActivity: jest.fn(),
    hasSignup: jest.fn(),
    removeSignup: jest.fn(),
  };

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        UnregisterFromActivityUsecase,
        { provide: DataSource, useValue: mockDataSource },
        { provide: ActivityRosterService, useValue: mockRosterService },
      ],
    }).compile();

    usecase = module.get<UnregisterFromActivityUsecase>(UnregisterFromActivityUsecase);
  });

  it('已报名时删除报名并返回确认消息', async () => {
    mockRosterService.findActivity.mockResolvedValue({ id: 7, name: 'Chess Club' });
    mockRosterService.hasSignup.mockResolvedValue(true);
    mockRosterService.removeSignup.mockResolvedValue(undefined);

    const result = await usecase.execute({ activityName: 'Chess Club', email: 'x@y.edu' });

    expect(result).toEqual({ message: 'Unregistered x@y.edu from Chess Club' });
    expect(mockRosterService.removeSignup).toHaveBeenCalledWith(7, 'x@y.edu', fakeManager);
  });

  it('活动不存在时报告 NotFound', async () => {
    mockRosterService.findActivity.mockResolvedValue(null);

    await expect(
      usecase.execute({ activityName: 'Nope', email: 'x@y.edu' }),
    ).rejects.toMatchObject({ code: ACTIVITY_ERROR.ACTIVITY_NOT_FOUND });
    expect(mockRosterService.hasSignup).not.toHaveBeenCalled();
  });

  it('未报名时报告 NotRegistered 且不做删除', async () => {
    mockRosterService.findActivity.mockResolvedValue({ id: 7, name: 'Chess Club' });
    mockRosterService.hasSignup.mockResolvedValue(false);

    await expect(
      usecase.execute({ activityName: 'Chess Club', email: 'x@y.edu' }),
    ).rejects.toMatchObject({
      code: ACTIVITY_ERROR.NOT_REGISTERED,
      message: 'Student is not signed up for this activity',
    });
    expect(mockRosterService.removeSignup).not.toHaveBeenCalled();
  });
});
