// src/modules/activities/activity.entity.ts
import {
  Column,
  CreateDateColumn,
  Entity,
  Index,
  OneToMany,
  PrimaryGeneratedColumn,
  UpdateDateColumn,
} from 'typeorm';
import { ActivitySignupEntity } from './activity-signup.entity';

/**
 * 课外活动实体
 * 对应数据库表：activities
 * 活动只在初始化时写入，之后在本服务内不可变
 */
@Entity('activities')
@Index('uk_activity_name', ['name'], { unique: true })
export class ActivityEntity {
  /** 主键 ID */
  @PrimaryGeneratedColumn({ type: 'int' })
  id!: number;

  /** 活动名称（全局唯一，对外以名称寻址） */
  @Column({ name: 'name', type: 'varchar', length: 100, nullable: false })
  name!: string;

  @Column({ name: 'description', type: 'varchar', length: 500, nullable: false })
  description!: string;

  /** 时间安排（自由文本，如 "Fridays, 3:30 PM - 5:00 PM"） */
  @Column({ name: 'schedule', type: 'varchar', length: 200, nullable: false })
  schedule!: string;

  /** 容量上限；NULL 表示不限人数 */
  @Column({ name: 'max_participants', type: 'int', nullable: true })
  maxParticipants!: number | null;

  /** 报名记录，删除活动时级联删除 */
  @OneToMany(() => ActivitySignupEntity, (signup) => signup.activity)
  signups!: ActivitySignupEntity[];

  @CreateDateColumn({ name: 'created_at' })
  createdAt!: Date;

  @UpdateDateColumn({ name: 'updated_at' })
  updatedAt!: Date;
}
