// src/modules/activities/activity-roster.service.ts
import { ACTIVITY_ERROR, activityError } from '@core/common/errors';
import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { ActivitySeed } from '@src/types/models/activity.types';
import { infoLog, warnLog } from '@src/utils/logger/templates';
import { InjectPinoLogger, PinoLogger } from 'nestjs-pino';
import { EntityManager, QueryFailedError, Repository } from 'typeorm';
import { ActivitySignupEntity } from './activity-signup.entity';
import { ActivityEntity } from './activity.entity';

/**
 * 活动名册服务
 * 唯一直接读写 activities / activity_signups 两张表的地方
 * 所有方法都接受可选的事务管理器，由 usecase 决定事务边界
 */
@Injectable()
export class ActivityRosterService {
  constructor(
    @InjectPinoLogger('ActivityRosterService')
    private readonly logger: PinoLogger,
    @InjectRepository(ActivityEntity)
    private readonly activityRepository: Repository<ActivityEntity>,
    @InjectRepository(ActivitySignupEntity)
    private readonly signupRepository: Repository<ActivitySignupEntity>,
  ) {}

  private activityRepo(manager?: EntityManager): Repository<ActivityEntity> {
    return manager ? manager.getRepository(ActivityEntity) : this.activityRepository;
  }

  private signupRepo(manager?: EntityManager): Repository<ActivitySignupEntity> {
    return manager ? manager.getRepository(ActivitySignupEntity) : this.signupRepository;
  }

  /**
   * 判断是否为唯一约束冲突（兼容 MySQL、SQLite、PostgreSQL 常见错误码）
   */
  private isUniqueViolation(error: unknown): boolean {
    if (!(error instanceof QueryFailedError)) return false;

    const driverError: unknown = error.driverError;
    if (!driverError || typeof driverError !== 'object') return false;

    const code = 'code' in driverError ? driverError.code : undefined;
    const errno = 'errno' in driverError ? driverError.errno : undefined;
    return (
      code === 'ER_DUP_ENTRY' ||
      errno === 1062 ||
      code === 'SQLITE_CONSTRAINT_UNIQUE' ||
      code === 'SQLITE_CONSTRAINT_PRIMARYKEY' ||
      code === '23505'
    );
  }

  /**
   * 查询全部活动及其报名名单
   * 活动按 id 升序（即种子顺序），名单按报名先后排序
   */
  async listActivities(manager?: EntityManager): Promise<ActivityEntity[]> {
    return await this.activityRepo(manager).find({
      relations: { signups: true },
      order: { id: 'ASC', signups: { id: 'ASC' } },
    });
  }

  /**
   * 按唯一名称查询活动（精确匹配）
   * @param name 活动名称
   */
  async findActivity(name: string, manager?: EntityManager): Promise<ActivityEntity | null> {
    return await this.activityRepo(manager).findOne({ where: { name } });
  }

  /**
   * 统计活动当前报名人数
   */
  async countSignups(activityId: number, manager?: EntityManager): Promise<number> {
    return await this.signupRepo(manager).count({ where: { activityId } });
  }

  /**
   * 判断 (活动, 邮箱) 报名是否存在
   */
  async hasSignup(activityId: number, email: string, manager?: EntityManager): Promise<boolean> {
    const count = await this.signupRepo(manager).count({ where: { activityId, email } });
    return count > 0;
  }

  /**
   * 新增报名
   * 不重复业务校验（由调用方负责）；唯一约束冲突转换为 CONSTRAINT_VIOLATION
   */
  async addSignup(
    activityId: number,
    email: string,
    manager?: EntityManager,
  ): Promise<ActivitySignupEntity> {
    const repo = this.signupRepo(manager);
    try {
      const saved = await repo.save(repo.create({ activityId, email }));
      infoLog(this.logger, '报名记录已写入', { activityId, email, signupId: saved.id });
      return saved;
    } catch (error) {
      if (this.isUniqueViolation(error)) {
        warnLog(this.logger, '报名写入触发唯一约束冲突', { activityId, email });
        throw activityError(ACTIVITY_ERROR.CONSTRAINT_VIOLATION, { activityId, email }, error);
      }
      throw error;
    }
  }

  /**
   * 删除报名
   * 没有记录被删除时视为未报名
   */
  async removeSignup(activityId: number, email: string, manager?: EntityManager): Promise<void> {
    const result = await this.signupRepo(manager).delete({ activityId, email });
    if (!result.affected) {
      throw activityError(ACTIVITY_ERROR.NOT_REGISTERED, { activityId, email });
    }
    infoLog(this.logger, '报名记录已删除', { activityId, email });
  }

  /**
   * 空库时写入种子活动与初始报名
   * 未传入事务管理器时自行开启事务，保证整体原子性
   * @param seeds 种子活动列表
   * @returns 实际写入的活动数量；非空库返回 0
   */
  async seedIfEmpty(seeds: ReadonlyArray<ActivitySeed>, manager?: EntityManager): Promise<number> {
    if (!manager) {
      return await this.activityRepository.manager.transaction((txManager) =>
        this.seedIfEmpty(seeds, txManager),
      );
    }

    const activityRepo = this.activityRepo(manager);
    const signupRepo = this.signupRepo(manager);

    const existing = await activityRepo.count();
    if (existing > 0) {
      this.logger.debug({ existing }, '活动表非空，跳过种子写入');
      return 0;
    }

    try {
      for (const seed of seeds) {
        const activity = await activityRepo.save(
          activityRepo.create({
            name: seed.name,
            description: seed.description,
            schedule: seed.schedule,
            maxParticipants: seed.maxParticipants,
          }),
        );
        if (seed.participants.length > 0) {
          await signupRepo.save(
            seed.participants.map((email) => signupRepo.create({ activityId: activity.id, email })),
          );
        }
      }
    } catch (error) {
      if (this.isUniqueViolation(error)) {
        warnLog(this.logger, '种子数据触发唯一约束冲突', { seedCount: seeds.length });
        throw activityError(ACTIVITY_ERROR.CONSTRAINT_VIOLATION, { seedCount: seeds.length }, error);
      }
      throw error;
    }

    infoLog(this.logger, '种子活动已写入', { activityCount: seeds.length });
    return seeds.length;
  }
}
