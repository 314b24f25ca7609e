// src/modules/activities/activity-signup.entity.ts
import {
  Column,
  CreateDateColumn,
  Entity,
  Index,
  JoinColumn,
  ManyToOne,
  PrimaryGeneratedColumn,
  Unique,
} from 'typeorm';
import { ActivityEntity } from './activity.entity';

/**
 * 活动报名实体
 * 对应数据库表：activity_signups
 * (activity_id, email) 复合唯一键是防止重复报名的最终保障
 */
@Entity('activity_signups')
@Unique('uk_activity_email', ['activityId', 'email'])
@Index('idx_activity', ['activityId'])
export class ActivitySignupEntity {
  /** 主键 ID（自增，同时决定名单顺序） */
  @PrimaryGeneratedColumn({ type: 'int' })
  id!: number;

  @Column({ name: 'activity_id', type: 'int', nullable: false })
  activityId!: number;

  @ManyToOne(() => ActivityEntity, (activity) => activity.signups, {
    onDelete: 'CASCADE',
    nullable: false,
  })
  @JoinColumn({ name: 'activity_id' })
  activity!: ActivityEntity;

  /** 学生邮箱（按原样保存，不做大小写归一） */
  @Column({ name: 'email', type: 'varchar', length: 255, nullable: false })
  email!: string;

  @CreateDateColumn({ name: 'created_at' })
  createdAt!: Date;
}
