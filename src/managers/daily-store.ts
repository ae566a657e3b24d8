/**
 * 按天分文件的 JSONL 存储
 *
 * 文件名为 `YYYY-MM-DD{suffix}.jsonl`，只追加；写入经由一条 Promise 链串行执行。
 */

import { join } from 'path';
import type { z } from 'zod';
import { createLogger } from '../utils/logger';
import { Result, ok, err, tryCatch } from '../utils/result';
import { FileSystemError } from '../utils/errors';
import { appendTextFile, fileExists, listFiles, readTextFile } from '../utils/file-adapter';

const logger = createLogger('DailyStore');

const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

/**
 * 本地日期 YYYY-MM-DD
 */
export function formatLocalDate(date: Date): string {
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  return `${date.getFullYear()}-${month}-${day}`;
}

/**
 * 本地时间 HH:MM:SS
 */
export function formatLocalTime(date: Date): string {
  return [date.getHours(), date.getMinutes(), date.getSeconds()]
    .map((part) => String(part).padStart(2, '0'))
    .join(':');
}

export function isDateString(value: string): boolean {
  return DATE_PATTERN.test(value);
}

export interface DailyStoreOptions<T> {
  dir: string;
  /** 文件名后缀，如 "-tts" */
  suffix?: string;
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  now?: () => Date;
}

export class DailyJsonlStore<T> {
  private writeQueue: Promise<Result<void, FileSystemError>> = Promise.resolve(ok(undefined));
  private readonly suffix: string;
  private readonly now: () => Date;

  constructor(private readonly options: DailyStoreOptions<T>) {
    this.suffix = options.suffix ?? '';
    this.now = options.now ?? (() => new Date());
  }

  /**
   * 'today' 解析为当天日期
   */
  resolveDate(date: string): string {
    return date === 'today' ? formatLocalDate(this.now()) : date;
  }

  fileFor(date: string): string {
    return join(this.options.dir, `${this.resolveDate(date)}${this.suffix}.jsonl`);
  }

  /**
   * 追加一条记录到当天文件
   */
  append(record: T): Promise<Result<void, FileSystemError>> {
    const filePath = this.fileFor('today');
    const line = `${JSON.stringify(record)}\n`;

    this.writeQueue = this.writeQueue.then(() => appendTextFile(filePath, line));
    return this.writeQueue;
  }

  /**
   * 读取某天的全部记录，损坏的行跳过
   */
  async load(date: string): Promise<Result<T[], FileSystemError>> {
    const filePath = this.fileFor(date);
    if (!(await fileExists(filePath))) {
      return ok([]);
    }

    const content = await readTextFile(filePath);
    if (!content.success) {
      return err(content.error);
    }

    const records: T[] = [];
    content.data.split('\n').forEach((line, index) => {
      const trimmed = line.trim();
      if (!trimmed) {
        return;
      }

      const parsed = tryCatch((): unknown => JSON.parse(trimmed));
      const validated = parsed.success ? this.options.schema.safeParse(parsed.data) : null;
      if (validated?.success) {
        records.push(validated.data);
      } else {
        logger.warn(`跳过无效记录: ${filePath}:${index + 1}`);
      }
    });

    return ok(records);
  }

  /**
   * 有记录的日期，新的在前
   */
  async listDates(): Promise<Result<string[], FileSystemError>> {
    const files = await listFiles(this.options.dir);
    if (!files.success) {
      return err(files.error);
    }

    const ending = `${this.suffix}.jsonl`;
    const dates = files.data
      .filter((name) => name.endsWith(ending))
      .map((name) => name.slice(0, -ending.length))
      .filter(isDateString)
      .sort()
      .reverse();

    return ok(dates);
  }

  /**
   * 跨日期取最近的 limit 条记录，旧的在前
   */
  async recent(limit: number): Promise<Result<T[], FileSystemError>> {
    const dates = await this.listDates();
    if (!dates.success) {
      return err(dates.error);
    }

    const collected: T[] = [];
    for (const date of dates.data) {
      const records = await this.load(date);
      if (!records.success) {
        return err(records.error);
      }
      collected.unshift(...records.data);
      if (collected.length >= limit) {
        break;
      }
    }

    return ok(collected.slice(Math.max(0, collected.length - limit)));
  }

  /**
   * 等待排队中的写入完成
   */
  async flush(): Promise<void> {
    await this.writeQueue;
  }
}
