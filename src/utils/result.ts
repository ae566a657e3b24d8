/**
 * Result 类型 - 协作者调用的统一返回值
 *
 * 流水线阶段、外部进程、文件读写都返回 Result，
 * 失败以值的形式向上传递，由编排器按阶段决定回退或终止。
 */

/**
 * 成功结果
 */
export interface Success<T> {
  success: true;
  data: T;
}

/**
 * 失败结果
 */
export interface Failure<E = Error> {
  success: false;
  error: E;
}

export type Result<T, E = Error> = Success<T> | Failure<E>;

export function ok<T>(data: T): Success<T> {
  return { success: true, data };
}

export function err<E = Error>(error: E): Failure<E> {
  return { success: false, error };
}

export function isOk<T, E>(result: Result<T, E>): result is Success<T> {
  return result.success === true;
}

export function isErr<T, E>(result: Result<T, E>): result is Failure<E> {
  return result.success === false;
}

/**
 * 把未知的异常值规整为 Error
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * 将 Promise 包装为 Result
 */
export async function fromPromise<T>(promise: Promise<T>): Promise<Result<T, Error>> {
  try {
    const data = await promise;
    return ok(data);
  } catch (error) {
    return err(toError(error));
  }
}

/**
 * 将可能抛出异常的函数包装为 Result
 */
export function tryCatch<T>(fn: () => T): Result<T, Error> {
  try {
    return ok(fn());
  } catch (error) {
    return err(toError(error));
  }
}

/**
 * 异步版本的 tryCatch
 */
export async function tryCatchAsync<T>(fn: () => Promise<T>): Promise<Result<T, Error>> {
  try {
    return ok(await fn());
  } catch (error) {
    return err(toError(error));
  }
}
