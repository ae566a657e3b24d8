/**
 * 听写历史
 * 每个会话结束时追加一条记录，按天生成 Markdown 报告
 */

import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { createLogger } from '../utils/logger';
import { Result, ok, err } from '../utils/result';
import { FileSystemError, ValidationError } from '../utils/errors';
import { countCharacters, countWords, formatDuration, formatThousands, truncate } from '../utils/text-utils';
import { TriggerKind } from '../types/trigger';
import { OutputMode, SessionStatus, type HistoryRecord, type SessionOutcome } from '../types/session';
import { DailyJsonlStore, formatLocalTime, isDateString } from './daily-store';

const logger = createLogger('HistoryManager');

const HistoryRecordSchema = z.object({
  recordId: z.string(),
  sessionId: z.number().int(),
  timestamp: z.string(),
  triggerKind: z.nativeEnum(TriggerKind),
  status: z.nativeEnum(SessionStatus),
  failureReason: z.enum(['no_speech', 'transcribe_failed', 'deliver_failed', 'device_lost', 'cancelled']).nullable(),
  rawText: z.string().nullable(),
  correctedText: z.string().nullable(),
  finalText: z.string().nullable(),
  deliveredText: z.string().nullable(),
  correctionFailed: z.boolean(),
  outputMode: z.nativeEnum(OutputMode),
  transcribeLatencyMs: z.number().nullable(),
  correctLatencyMs: z.number().nullable(),
  deliverLatencyMs: z.number().nullable(),
  totalLatencyMs: z.number().nullable(),
  audioDurationS: z.number(),
  charCount: z.number().int(),
  wordCount: z.number().int(),
  speedRatio: z.number(),
  configVersion: z.number().int(),
});

/**
 * 历史存储接口
 */
export interface HistoryStore {
  append(record: HistoryRecord): Promise<Result<void, FileSystemError>>;
  /** date 为 YYYY-MM-DD、'today' 或 'list' */
  query(date: string): Promise<Result<string, FileSystemError | ValidationError>>;
  recent(limit: number): Promise<Result<HistoryRecord[], FileSystemError>>;
}

/**
 * 由会话结局生成历史记录
 */
export function buildHistoryRecord(outcome: SessionOutcome, sampleRate: number, recordId: string = uuidv4()): HistoryRecord {
  const { session } = outcome;
  const audioDurationS = session.audioSamples ? round(session.audioSamples.length / sampleRate, 3) : 0;
  const totalMs = session.latencies.totalMs;
  const text = session.finalText ?? '';

  return {
    recordId,
    sessionId: session.id,
    timestamp: new Date(session.startTime).toISOString(),
    triggerKind: session.triggerKind,
    status: outcome.status,
    failureReason: outcome.reason ?? null,
    rawText: session.rawText,
    correctedText: session.correctedText,
    finalText: session.finalText,
    deliveredText: session.deliveredText,
    correctionFailed: session.correctionFailed,
    outputMode: session.outputMode,
    transcribeLatencyMs: session.latencies.transcribeMs,
    correctLatencyMs: session.latencies.correctMs,
    deliverLatencyMs: session.latencies.deliverMs,
    totalLatencyMs: totalMs,
    audioDurationS,
    charCount: countCharacters(text),
    wordCount: text ? countWords(text) : 0,
    speedRatio: totalMs && totalMs > 0 ? round((audioDurationS * 1000) / totalMs, 2) : 0,
    configVersion: session.snapshot.version,
  };
}

function round(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

function average(values: number[]): number {
  return values.length > 0 ? values.reduce((sum, value) => sum + value, 0) / values.length : 0;
}

function latencies(records: HistoryRecord[], pick: (record: HistoryRecord) => number | null): number[] {
  return records.map(pick).filter((value): value is number => value !== null);
}

/**
 * 生成某天的 Markdown 报告
 */
export function renderReport(date: string, records: HistoryRecord[]): string {
  const title = `# Dictation Report - ${date}`;
  if (records.length === 0) {
    return `${title}\n\nNo transcriptions recorded.`;
  }

  const completed = records.filter((record) => record.status === SessionStatus.COMPLETED);
  const unsuccessful = records.filter((record) => record.status !== SessionStatus.COMPLETED);

  const totalChars = completed.reduce((sum, record) => sum + record.charCount, 0);
  const totalWords = completed.reduce((sum, record) => sum + record.wordCount, 0);
  const totalAudio = completed.reduce((sum, record) => sum + record.audioDurationS, 0);
  const totalProcessing = completed.reduce((sum, record) => sum + (record.totalLatencyMs ?? 0), 0) / 1000;
  const fallbacks = completed.filter((record) => record.correctionFailed).length;

  const lines = [
    title,
    '',
    '## Summary',
    `- **Transcriptions**: ${completed.length}`,
  ];

  if (unsuccessful.length > 0) {
    lines.push(`- **Failed or cancelled**: ${unsuccessful.length}`);
  }

  lines.push(
    `- **Total characters**: ${formatThousands(totalChars)}`,
    `- **Total words**: ${formatThousands(totalWords)}`,
    `- **Total audio**: ${formatDuration(totalAudio)}`,
    `- **Total processing time**: ${formatDuration(totalProcessing)}`,
    `- **Average speed ratio**: ${average(completed.map((record) => record.speedRatio)).toFixed(1)}x`
  );

  if (fallbacks > 0) {
    lines.push(`- **Correction fallbacks**: ${fallbacks}`);
  }

  const correctLatencies = latencies(completed, (record) => record.correctLatencyMs);
  lines.push('', '## Latency Averages', `- Transcribe: ${Math.round(average(latencies(completed, (r) => r.transcribeLatencyMs)))}ms`);
  if (correctLatencies.length > 0) {
    lines.push(`- Correct: ${Math.round(average(correctLatencies))}ms`);
  }
  lines.push(`- Deliver: ${Math.round(average(latencies(completed, (r) => r.deliverLatencyMs)))}ms`);

  lines.push(
    '',
    '## Transcription Log',
    '',
    '| Time | Raw | Corrected | Chars | Speed |',
    '|------|-----|-----------|-------|-------|'
  );

  for (const record of completed) {
    const raw = record.rawText ?? '';
    const corrected =
      record.correctedText && record.correctedText !== raw ? truncate(record.correctedText, 30) : '-';
    lines.push(
      `| ${formatLocalTime(new Date(record.timestamp))} | ${truncate(raw, 30)} | ${corrected} | ${record.charCount} | ${record.speedRatio.toFixed(1)}x |`
    );
  }

  if (unsuccessful.length > 0) {
    lines.push('', '## Failures', '', '| Time | Status | Reason |', '|------|--------|--------|');
    for (const record of unsuccessful) {
      lines.push(
        `| ${formatLocalTime(new Date(record.timestamp))} | ${record.status} | ${record.failureReason ?? '-'} |`
      );
    }
  }

  return lines.join('\n');
}

/**
 * 日期列表
 */
export function renderDateList(dates: string[]): string {
  if (dates.length === 0) {
    return 'No history recorded.';
  }
  return ['Available dates:', ...dates.map((date) => `- ${date}`)].join('\n');
}

export class HistoryManager implements HistoryStore {
  private readonly store: DailyJsonlStore<HistoryRecord>;

  constructor(historyDir: string, now?: () => Date) {
    this.store = new DailyJsonlStore({ dir: historyDir, schema: HistoryRecordSchema, now });
  }

  async append(record: HistoryRecord): Promise<Result<void, FileSystemError>> {
    const result = await this.store.append(record);
    if (result.success) {
      logger.debug(`历史记录已写入: #${record.sessionId} (${record.status})`);
    } else {
      logger.error(`历史记录写入失败: ${result.error.message}`);
    }
    return result;
  }

  async query(date: string): Promise<Result<string, FileSystemError | ValidationError>> {
    if (date === 'list') {
      const dates = await this.store.listDates();
      return dates.success ? ok(renderDateList(dates.data)) : err(dates.error);
    }

    if (date !== 'today' && !isDateString(date)) {
      return err(new ValidationError(`日期格式应为 YYYY-MM-DD、today 或 list: ${date}`));
    }

    const records = await this.store.load(date);
    if (!records.success) {
      return err(records.error);
    }

    return ok(renderReport(this.store.resolveDate(date), records.data));
  }

  recent(limit: number): Promise<Result<HistoryRecord[], FileSystemError>> {
    return this.store.recent(limit);
  }

  flush(): Promise<void> {
    return this.store.flush();
  }
}
