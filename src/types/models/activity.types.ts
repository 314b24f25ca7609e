// src/types/models/activity.types.ts

/**
 * 活动对外视图
 * 字段命名（max_participants）属于 HTTP 契约，保持 snake_case
 */
export interface ActivityView {
  readonly description: string;
  readonly schedule: string;
  /** 容量上限；null 表示不限人数 */
  readonly max_participants: number | null;
  /** 已报名学生邮箱，按报名先后排序 */
  readonly participants: string[];
}

/**
 * 活动列表：活动名称 → 活动视图
 */
export type ActivityListing = Record<string, ActivityView>;

/**
 * 初始化种子中的单个活动
 */
export interface ActivitySeed {
  readonly name: string;
  readonly description: string;
  readonly schedule: string;
  readonly maxParticipants: number | null;
  readonly participants: ReadonlyArray<string>;
}

/**
 * 报名 / 取消报名的输入
 */
export interface ActivityRosterChangeInput {
  readonly activityName: string;
  readonly email: string;
}

/**
 * 报名 / 取消报名的确认结果
 */
export interface ActivityRosterChangeResult {
  readonly message: string;
}
