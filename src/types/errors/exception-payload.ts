/**
 * HTTP 错误响应体
 * 与原有前端约定一致：只暴露一个 detail 字段
 */
export interface ExceptionPayload {
  /** 人类可读的错误描述 */
  detail: string;
}

/**
 * 异常过滤器解析出的 HTTP 响应
 */
export interface ResolvedHttpError {
  readonly status: number;
  readonly body: ExceptionPayload;
}
