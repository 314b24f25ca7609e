// src/adapters/http/activities/dto/activity-email.query.ts
import { IsNotEmpty, IsString } from 'class-validator';

/**
 * 报名 / 取消报名的查询参数
 * 邮箱格式不做校验，按原样写入名册
 */
export class ActivityEmailQuery {
  @IsString({ message: 'email must be a string' })
  @IsNotEmpty({ message: 'email is required' })
  email!: string;
}
