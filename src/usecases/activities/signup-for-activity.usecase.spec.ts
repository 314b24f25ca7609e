// src/usecases/activities/signup-for-activity.usecase.spec.ts
import { ACTIVITY_ERROR, DomainError } from '@core/common/errors';
import { Test, TestingModule } from '@nestjs/testing';
import { ActivityRosterService } from '@src/modules/activities/activity-roster.service';
import { DataSource } from 'typeorm';
import { SignupForActivityUsecase } from './signup-for-activity.usecase';

describe('SignupForActivityUsecase', () => {
  let usecase: SignupForActivityUsecase;

  const fakeManager = { name: 'tx-manager' };

  const mockDataSource = {
    transaction: jest.fn(async <T>(work: (manager: unknown) => Promise<T>): Promise<T> =>
      work(fakeManager),
    ),
  };

  const mockRosterService = {
    findActivity: jest.fn(),
    hasSignup: jest.fn(),
    countSignups: jest.fn(),
    addSignup: jest.fn(),
  };

  const chessClub = { id: 7, name: 'Chess Club', maxParticipants: 12 };

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        SignupForActivityUsecase,
        { provide: DataSource, useValue: mockDataSource },
        { provide: ActivityRosterService, useValue: mockRosterService },
      ],
    }).compile();

    usecase = module.get<SignupForActivityUsecase>(SignupForActivityUsecase);
  });

  it('名额充足时写入报名并返回确认消息', async () => {
    mockRosterService.findActivity.mockResolvedValue(chessClub);
    mockRosterService.hasSignup.mockResolvedValue(false);
    mockRosterService.countSignups.mockResolvedValue(2);
    mockRosterService.addSignup.mockResolvedValue({ id: 1, activityId: 7, email: 'x@y.edu' });

    const result = await usecase.execute({ activityName: 'Chess Club', email: 'x@y.edu' });

    expect(result).toEqual({ message: 'Signed up x@y.edu for Chess Club' });
    expect(mockDataSource.transaction).toHaveBeenCalledTimes(1);
    expect(mockRosterService.findActivity).toHaveBeenCalledWith('Chess Club', fakeManager);
    expect(mockRosterService.addSignup).toHaveBeenCalledWith(7, 'x@y.edu', fakeManager);
  });

  it('活动不存在时报告 NotFound，且不再做后续检查', async () => {
    mockRosterService.findActivity.mockResolvedValue(null);

    const promise = usecase.execute({ activityName: 'Nope', email: 'x@y.edu' });

    await expect(promise).rejects.toBeInstanceOf(DomainError);
    await expect(promise).rejects.toMatchObject({
      code: ACTIVITY_ERROR.ACTIVITY_NOT_FOUND,
      message: 'Activity not found',
    });
    expect(mockRosterService.hasSignup).not.toHaveBeenCalled();
    expect(mockRosterService.addSignup).not.toHaveBeenCalled();
  });

  it('已报名时报告 AlreadyRegistered，优先于容量检查', async () => {
    mockRosterService.findActivity.mockResolvedValue({ ...chessClub, maxParticipants: 2 });
    mockRosterService.hasSignup.mockResolvedValue(true);
    mockRosterService.countSignups.mockResolvedValue(2);

    await expect(
      usecase.execute({ activityName: 'Chess Club', email: 'daniel@example.edu' }),
    ).rejects.toMatchObject({
      code: ACTIVITY_ERROR.ALREADY_REGISTERED,
      message: 'Student is already signed up',
    });
    expect(mockRosterService.countSignups).not.toHaveBeenCalled();
    expect(mockRosterService.addSignup).not.toHaveBeenCalled();
  });

  it('报名人数达到上限时报告 CapacityExceeded', async () => {
    mockRosterService.findActivity.mockResolvedValue({ id: 3, name: 'Solo Lab', maxParticipants: 1 });
    mockRosterService.hasSignup.mockResolvedValue(false);
    mockRosterService.countSignups.mockResolvedValue(1);

    await expect(
      usecase.execute({ activityName: 'Solo Lab', email: 'x@y.edu' }),
    ).rejects.toMatchObject({
      code: ACTIVITY_ERROR.CAPACITY_EXCEEDED,
      message: 'Activity is full',
    });
    expect(mockRosterService.addSignup).not.toHaveBeenCalled();
  });

  it('未设置容量上限时不统计人数', async () => {
    mockRosterService.findActivity.mockResolvedValue({
      id: 9,
      name: 'Open Studio',
      maxParticipants: null,
    });
    mockRosterService.hasSignup.mockResolvedValue(false);
    mockRosterService.addSignup.mockResolvedValue({ id: 2, activityId: 9, email: 'x@y.edu' });

    const result = await usecase.execute({ activityName: 'Open Studio', email: 'x@y.edu' });

    expect(result.message).toBe('Signed up x@y.edu for Open Studio');
    expect(mockRosterService.countSignups).not.toHaveBeenCalled();
  });

  it('写入阶段的约束冲突原样向上抛出', async () => {
    const conflict = new DomainError(
      ACTIVITY_ERROR.CONSTRAINT_VIOLATION,
      'Signup conflicts with an existing record',
    );
    mockRosterService.findActivity.mockResolvedValue(chessClub);
    mockRosterService.hasSignup.mockResolvedValue(false);
    mockRosterService.countSignups.mockResolvedValue(2);
    mockRosterService.addSignup.mockRejectedValue(conflict);

    await expect(usecase.execute({ activityName: 'Chess Club', email: 'x@y.edu' })).rejects.toBe(
      conflict,
    );
  });
});
