/**
 * 播报历史
 * 记录写入 `YYYY-MM-DD-tts.jsonl`，与听写历史同目录
 */

import { z } from 'zod';
import { createLogger } from '../utils/logger';
import { Result, ok, err } from '../utils/result';
import { FileSystemError, ValidationError } from '../utils/errors';
import { DailyJsonlStore, isDateString } from './daily-store';
import { renderDateList } from './history-manager';

const logger = createLogger('SpeechHistory');

export const SpeechRecordSchema = z.object({
  timestamp: z.string(),
  eventType: z.string(),
  inputChars: z.number().int(),
  summarized: z.boolean(),
  spokenText: z.string(),
  summarizeMs: z.number(),
  speakMs: z.number(),
  totalMs: z.number(),
  voice: z.string(),
  cancelled: z.boolean(),
  /** 提醒播报时为第几次提醒，其余为 0 */
  reminderCount: z.number().int(),
});

export type SpeechRecord = z.infer<typeof SpeechRecordSchema>;

export interface SpeechHistoryStore {
  append(record: SpeechRecord): Promise<Result<void, FileSystemError>>;
  query(date: string): Promise<Result<string, FileSystemError | ValidationError>>;
}

function average(values: number[]): number {
  return values.length > 0 ? values.reduce((sum, value) => sum + value, 0) / values.length : 0;
}

/**
 * 生成某天的播报报告
 */
export function renderSpeechReport(date: string, records: SpeechRecord[]): string {
  if (records.length === 0) {
    return `No TTS events recorded for ${date}.`;
  }

  const byType = new Map<string, number>();
  records.forEach((record) => byType.set(record.eventType, (byType.get(record.eventType) ?? 0) + 1));

  const played = records.filter((record) => !record.cancelled);
  const summarized = played.filter((record) => record.summarized);

  const lines = [`=== TTS Report: ${date} ===`, '', `Total events: ${records.length}`];
  Array.from(byType.entries())
    .sort(([a], [b]) => a.localeCompare(b))
    .forEach(([type, count]) => lines.push(`  ${type}: ${count}`));

  lines.push(
    '',
    '--- Latency (non-cancelled events) ---',
    `  Summarize: ${Math.round(average(summarized.map((record) => record.summarizeMs)))}ms avg (${summarized.length} summarized)`,
    `  Speak:     ${Math.round(average(played.map((record) => record.speakMs)))}ms avg`,
    `  Total:     ${Math.round(average(played.map((record) => record.totalMs)))}ms avg`
  );

  const reminders = records.filter((record) => record.reminderCount > 0);
  if (reminders.length > 0) {
    lines.push(
      '',
      '--- Reminders ---',
      `  Reminders fired: ${reminders.length}`,
      `  Max in one event: ${Math.max(...reminders.map((record) => record.reminderCount))}`
    );
  }

  const cancelled = records.length - played.length;
  if (cancelled > 0) {
    lines.push('', `Cancelled events: ${cancelled}`);
  }

  return lines.join('\n');
}

export class SpeechHistory implements SpeechHistoryStore {
  private readonly store: DailyJsonlStore<SpeechRecord>;

  constructor(historyDir: string, now?: () => Date) {
    this.store = new DailyJsonlStore({ dir: historyDir, suffix: '-tts', schema: SpeechRecordSchema, now });
  }

  async append(record: SpeechRecord): Promise<Result<void, FileSystemError>> {
    const result = await this.store.append(record);
    if (!result.success) {
      logger.error(`播报记录写入失败: ${result.error.message}`);
    }
    return result;
  }

  /**
   * date 为 YYYY-MM-DD、'today' 或 'list'
   */
  async query(date: string): Promise<Result<string, FileSystemError | ValidationError>> {
    if (date === 'list') {
      const dates = await this.store.listDates();
      return dates.success ? ok(renderDateList(dates.data)) : err(dates.error);
    }

    if (date !== 'today' && !isDateString(date)) {
      return err(new ValidationError(`日期格式无效: ${date}（应为 YYYY-MM-DD、today 或 list）`));
    }

    const records = await this.store.load(date);
    if (!records.success) {
      return err(records.error);
    }
    return ok(renderSpeechReport(this.store.resolveDate(date), records.data));
  }

  async flush(): Promise<void> {
    await this.store.flush();
  }
}
