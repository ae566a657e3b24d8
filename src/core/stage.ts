/**
 * 流水线阶段执行器
 *
 * 给阶段调用加上硬超时和取消；超时或取消时立即返回，
 * 不等待被放弃的调用，其迟到的结果直接丢弃。
 */

import { performance } from 'perf_hooks';
import { Result, ok, err, fromPromise } from '../utils/result';
import {
  CancellationRequested,
  StageFailureError,
  StageTimeoutError,
  isAppError,
  type StageError,
} from '../utils/errors';
import type { StageName } from '../types/session';

export interface StageOptions {
  timeoutMs: number;
  /** 会话级取消信号 */
  signal: AbortSignal;
}

export interface StageRun<T> {
  result: Result<T, StageError>;
  latencyMs: number;
}

/**
 * 运行一个阶段
 *
 * fn 收到的 signal 在超时或会话取消时中止。
 */
export async function runStage<T>(
  stage: StageName,
  fn: (signal: AbortSignal) => Promise<Result<T, Error>>,
  options: StageOptions
): Promise<StageRun<T>> {
  const startedAt = performance.now();
  const elapsed = (): number => Math.round(performance.now() - startedAt);

  if (options.signal.aborted) {
    return { result: err(new CancellationRequested(stage)), latencyMs: 0 };
  }

  const controller = new AbortController();
  let interrupt: (error: StageTimeoutError | CancellationRequested) => void = () => undefined;
  const interrupted = new Promise<StageTimeoutError | CancellationRequested>((resolve) => {
    interrupt = resolve;
  });

  const timer = setTimeout(() => {
    const error = new StageTimeoutError(stage, options.timeoutMs);
    controller.abort(error);
    interrupt(error);
  }, options.timeoutMs);

  const onAbort = (): void => {
    const error = new CancellationRequested(stage);
    controller.abort(error);
    interrupt(error);
  };
  options.signal.addEventListener('abort', onAbort, { once: true });

  const work = fromPromise(Promise.resolve().then(() => fn(controller.signal)));

  try {
    const outcome = await Promise.race([work, interrupted]);

    if (isStageInterruption(outcome)) {
      return { result: err(outcome), latencyMs: elapsed() };
    }

    if (!outcome.success) {
      return { result: err(toStageFailure(stage, outcome.error)), latencyMs: elapsed() };
    }

    const inner = outcome.data;
    if (inner.success) {
      return { result: ok(inner.data), latencyMs: elapsed() };
    }

    return { result: err(toStageFailure(stage, inner.error)), latencyMs: elapsed() };
  } finally {
    clearTimeout(timer);
    options.signal.removeEventListener('abort', onAbort);
  }
}

function isStageInterruption(value: unknown): value is StageTimeoutError | CancellationRequested {
  return value instanceof StageTimeoutError || value instanceof CancellationRequested;
}

function toStageFailure(stage: StageName, error: Error): StageError {
  if (error instanceof StageFailureError || error instanceof StageTimeoutError || error instanceof CancellationRequested) {
    return error;
  }
  const message = isAppError(error) ? `${stage} 阶段失败: [${error.code}] ${error.message}` : `${stage} 阶段失败: ${error.message}`;
  return new StageFailureError(stage, message, error);
}
