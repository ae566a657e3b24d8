/**
 * 自定义错误类型
 *
 * 错误码与处理方式：
 * - DEVICE_ERROR       音频设备丢失，退避重连，重试耗尽后进程退出
 * - TRIGGER_AMBIGUITY  两个触发源同时发起开始，记录后忽略
 * - STAGE_TIMEOUT / STAGE_FAILURE  按阶段回退表处理
 * - CANCELLED          用户取消，属于正常结束
 */

import type { StageName } from '../types/session';

/**
 * 基础应用错误
 */
export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = 'AppError';
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * 配置错误
 */
export class ConfigError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 'CONFIG_ERROR', details);
    this.name = 'ConfigError';
  }
}

/**
 * 音频设备错误
 */
export class DeviceError extends AppError {
  constructor(
    message: string,
    public readonly fatal: boolean = false,
    details?: unknown
  ) {
    super(message, 'DEVICE_ERROR', details);
    this.name = 'DeviceError';
  }
}

/**
 * 触发冲突：防抖窗口内两个触发源都发起了开始
 */
export class TriggerAmbiguityError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 'TRIGGER_AMBIGUITY', details);
    this.name = 'TriggerAmbiguityError';
  }
}

/**
 * 阶段超时
 */
export class StageTimeoutError extends AppError {
  readonly kind = 'timeout' as const;

  constructor(
    public readonly stage: StageName,
    public readonly timeoutMs: number
  ) {
    super(`${stage} 阶段超时 (${timeoutMs}ms)`, 'STAGE_TIMEOUT');
    this.name = 'StageTimeoutError';
  }
}

/**
 * 阶段失败
 */
export class StageFailureError extends AppError {
  readonly kind = 'failure' as const;

  constructor(
    public readonly stage: StageName,
    message: string,
    details?: unknown
  ) {
    super(message, 'STAGE_FAILURE', details);
    this.name = 'StageFailureError';
  }
}

/**
 * 取消请求（正常的终止转换，不算失败）
 */
export class CancellationRequested extends AppError {
  readonly kind = 'cancelled' as const;

  constructor(public readonly stage?: StageName) {
    super(stage ? `已在 ${stage} 阶段取消` : '已取消', 'CANCELLED');
    this.name = 'CancellationRequested';
  }
}

/**
 * 阶段错误
 */
export type StageError = StageTimeoutError | StageFailureError | CancellationRequested;

/**
 * 模型服务错误（Gemini / Ollama）
 */
export class ModelError extends AppError {
  constructor(
    message: string,
    public readonly statusCode?: number,
    details?: unknown
  ) {
    super(message, 'MODEL_ERROR', details);
    this.name = 'ModelError';
  }
}

/**
 * 文本输出错误
 */
export class DeliveryError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 'DELIVERY_ERROR', details);
    this.name = 'DeliveryError';
  }
}

/**
 * 外部命令错误
 */
export class CommandError extends AppError {
  constructor(
    message: string,
    public readonly exitCode: number | null = null,
    details?: unknown
  ) {
    super(message, 'COMMAND_ERROR', details);
    this.name = 'CommandError';
  }
}

/**
 * 文件系统错误
 */
export class FileSystemError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 'FILE_SYSTEM_ERROR', details);
    this.name = 'FileSystemError';
  }
}

/**
 * 验证错误
 */
export class ValidationError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 'VALIDATION_ERROR', details);
    this.name = 'ValidationError';
  }
}

/**
 * 控制接口错误，携带 JSON-RPC 错误码
 */
export class RpcError extends AppError {
  constructor(
    message: string,
    public readonly rpcCode: number,
    details?: unknown
  ) {
    super(message, 'RPC_ERROR', details);
    this.name = 'RpcError';
  }
}

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

export function isCancellation(error: unknown): error is CancellationRequested {
  return error instanceof CancellationRequested;
}

/**
 * 格式化错误信息
 */
export function formatError(error: unknown): string {
  if (isAppError(error)) {
    return `[${error.code}] ${error.message}`;
  }

  if (error instanceof Error) {
    return error.message;
  }

  return String(error);
}
