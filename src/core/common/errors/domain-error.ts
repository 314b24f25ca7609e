// src/core/common/errors/domain-error.ts
// 领域错误与错误码：跨层共享的核心错误定义

/**
 * 领域错误类
 * 用于表示业务逻辑层的错误，可在 Service、Usecase 和 Adapter 层之间传递
 */
export class DomainError extends Error {
  readonly code: string;
  readonly details?: unknown;
  readonly cause?: unknown;

  constructor(code: string, message: string, details?: unknown, cause?: unknown) {
    super(message);
    this.name = 'DomainError';
    this.code = code;
    this.details = details;
    this.cause = cause;

    // 兼容某些编译目标/测试环境的原型链问题，确保 instanceof 正常
    Object.setPrototypeOf(this, new.target.prototype);
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, DomainError);
    }
  }

  toJSON() {
    return { name: this.name, code: this.code, message: this.message, details: this.details };
  }
}

// 活动报名领域错误码（名册约束与报名流程）
export const ACTIVITY_ERROR = {
  ACTIVITY_NOT_FOUND: 'ACTIVITY_NOT_FOUND',
  ALREADY_REGISTERED: 'ALREADY_REGISTERED',
  CAPACITY_EXCEEDED: 'CAPACITY_EXCEEDED',
  NOT_REGISTERED: 'NOT_REGISTERED',
  // 存储层唯一约束冲突（并发报名竞争或种子数据冲突）
  CONSTRAINT_VIOLATION: 'CONSTRAINT_VIOLATION',
} as const;
Object.freeze(ACTIVITY_ERROR);

// 对外可见的错误描述，属于 HTTP 契约的一部分，不要随意修改
export const ACTIVITY_ERROR_MESSAGE = {
  [ACTIVITY_ERROR.ACTIVITY_NOT_FOUND]: 'Activity not found',
  [ACTIVITY_ERROR.ALREADY_REGISTERED]: 'Student is already signed up',
  [ACTIVITY_ERROR.CAPACITY_EXCEEDED]: 'Activity is full',
  [ACTIVITY_ERROR.NOT_REGISTERED]: 'Student is not signed up for this activity',
  [ACTIVITY_ERROR.CONSTRAINT_VIOLATION]: 'Signup conflicts with an existing record',
} as const;
Object.freeze(ACTIVITY_ERROR_MESSAGE);

// 类型辅助
export type ActivityErrorCode = (typeof ACTIVITY_ERROR)[keyof typeof ACTIVITY_ERROR];

// 类型守卫：统一判断是否为领域错误（兼容多包/反序列化场景）
export const isDomainError = (error: unknown): error is DomainError => {
  if (error instanceof DomainError) return true;
  if (!error || typeof error !== 'object') return false;
  return (
    'name' in error && error.name === 'DomainError' && 'code' in error && typeof error.code === 'string'
  );
};

/**
 * 以标准描述构造活动领域错误
 * @param code 活动错误码
 * @param details 附加上下文（仅用于日志，不对外暴露）
 */
export const activityError = (code: ActivityErrorCode, details?: unknown, cause?: unknown) =>
  new DomainError(code, ACTIVITY_ERROR_MESSAGE[code], details, cause);
