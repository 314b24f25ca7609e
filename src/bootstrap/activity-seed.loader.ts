// src/bootstrap/activity-seed.loader.ts
import { formatValidationErrors } from '@core/common/errors/validation.formatter';
import { ActivitySeed } from '@src/types/models/activity.types';
import { plainToInstance } from 'class-transformer';
import { validateSync } from 'class-validator';
import { readFile } from 'fs/promises';
import { ActivitySeedInput } from './activity-seed.input';

/**
 * 解析并校验种子数据
 * @param raw 种子文件反序列化后的内容
 * @param source 来源描述（用于错误信息）
 * @returns 规范化后的种子活动列表
 */
export function parseActivitySeeds(raw: unknown, source = 'seed'): ActivitySeed[] {
  if (!Array.isArray(raw)) {
    throw new Error(`${source}: 种子数据必须是活动数组`);
  }

  const inputs = plainToInstance(ActivitySeedInput, raw);
  const messages: string[] = [];
  inputs.forEach((input, index) => {
    const errors = validateSync(input, { forbidUnknownValues: true });
    if (errors.length > 0) {
      messages.push(`[${index}] ${formatValidationErrors(errors)}`);
    }
  });
  if (messages.length > 0) {
    throw new Error(`${source}: 种子数据校验失败 ${messages.join(' | ')}`);
  }

  return inputs.map((input) => ({
    name: input.name,
    description: input.description,
    schedule: input.schedule,
    maxParticipants: input.maxParticipants ?? null,
    participants: [...input.participants],
  }));
}

/**
 * 读取种子文件
 * @param filePath 种子文件绝对路径
 */
export async function loadActivitySeeds(filePath: string): Promise<ActivitySeed[]> {
  const content = await readFile(filePath, 'utf8');
  const raw: unknown = JSON.parse(content);
  return parseActivitySeeds(raw, filePath);
}
