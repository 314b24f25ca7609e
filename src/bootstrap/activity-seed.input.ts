// src/bootstrap/activity-seed.input.ts
import { Expose } from 'class-transformer';
import {
  ArrayUnique,
  IsArray,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  Min,
} from 'class-validator';

/**
 * 种子文件中的单个活动条目
 * 字段名沿用种子文件的 snake_case（max_participants）
 */
export class ActivitySeedInput {
  @IsString()
  @IsNotEmpty()
  name!: string;

  @IsString()
  @IsNotEmpty()
  description!: string;

  @IsString()
  @IsNotEmpty()
  schedule!: string;

  /** 缺省或 null 表示不限人数 */
  @Expose({ name: 'max_participants' })
  @IsOptional()
  @IsInt()
  @Min(1)
  maxParticipants?: number | null;

  @IsArray()
  @ArrayUnique()
  @IsString({ each: true })
  @IsNotEmpty({ each: true })
  participants!: string[];
}
