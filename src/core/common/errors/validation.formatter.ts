// src/core/common/errors/validation.formatter.ts

import { ValidationError } from 'class-validator';

/**
 * 格式化验证错误消息
 * 嵌套属性（如数组元素）会带上路径前缀，便于定位种子文件中的错误条目
 * @param errors 验证错误数组
 * @param parentPath 父级属性路径
 * @returns 格式化后的错误消息
 */
export function formatValidationErrors(errors: ValidationError[], parentPath = ''): string {
  const messages: string[] = [];

  errors.forEach((error) => {
    const path = parentPath ? `${parentPath}.${error.property}` : error.property;

    if (error.constraints) {
      Object.values(error.constraints).forEach((message) => {
        // 顶层错误的 message 已包含属性名，嵌套错误才需要补充路径
        messages.push(parentPath ? `${parentPath}: ${message}` : message);
      });
    }

    if (error.children && error.children.length > 0) {
      messages.push(formatValidationErrors(error.children, path));
    }
  });

  return messages.filter((message) => message.length > 0).join('; ');
}
