/**
 * 语音播报服务
 *
 * speak：取消当前播报和提醒 → 长文本摘要 → 逐句播放（句间检查取消）→ 可选提醒。
 * 同一时刻只有一段在播放；后来的 speak 通过代号（generation）使先前的失效。
 */

import { EventEmitter } from 'events';
import { performance } from 'perf_hooks';
import { createLogger } from '../utils/logger';
import { Result, ok, err, tryCatchAsync } from '../utils/result';
import { ValidationError, formatError } from '../utils/errors';
import { splitSentences } from '../utils/text-utils';
import type { SpeechEngine } from '../services/speech-engine';
import type { Summarizer } from '../services/summarizer';
import type { ReminderManager } from './reminder-manager';
import type { SpeechHistoryStore, SpeechRecord } from './speech-history';

const logger = createLogger('SpeechManager');

export interface SpeakRequest {
  text: string;
  summarize?: boolean;
  /** 事件类型，如 stop / permission / notification / manual */
  eventType?: string;
  startReminder?: boolean;
}

export interface PlaybackResult {
  sentences: number;
  spokenSentences: number;
  speakMs: number;
  cancelled: boolean;
}

export interface SpeakOutcome extends PlaybackResult {
  eventType: string;
  inputChars: number;
  spokenText: string;
  summarized: boolean;
  summarizeMs: number;
  totalMs: number;
}

export interface SpeechStatus {
  speaking: boolean;
  voice: string;
  generation: number;
  reminderActive: boolean;
  reminderCount: number;
}

export interface SpeechManagerOptions {
  /** 超过此长度且请求摘要时先做摘要 */
  maxDirectChars: number;
}

export interface SpeechManagerEvents {
  spoken: (outcome: SpeakOutcome) => void;
}

export class SpeechManager extends EventEmitter {
  private generation = 0;
  private controller: AbortController | null = null;
  private playing = false;
  private lock: Promise<unknown> = Promise.resolve();
  private readonly pending = new Set<Promise<void>>();

  constructor(
    private readonly engine: SpeechEngine,
    private readonly summarizer: Summarizer,
    private readonly reminders: ReminderManager,
    private readonly history: SpeechHistoryStore | null,
    private readonly options: SpeechManagerOptions
  ) {
    super();
  }

  /**
   * 后台播报：校验后立即返回，播报在后台进行
   */
  enqueue(request: SpeakRequest): Result<void, ValidationError> {
    if (!request.text.trim()) {
      return err(new ValidationError('播报文本为空'));
    }

    const task: Promise<void> = this.speak(request)
      .then((result) => {
        if (!result.success) {
          logger.warn(`播报被拒绝: ${result.error.message}`);
        }
      })
      .finally(() => {
        this.pending.delete(task);
      });
    this.pending.add(task);
    return ok(undefined);
  }

  /**
   * 播报一段文本，完成（或被取代、取消）后返回
   */
  async speak(request: SpeakRequest): Promise<Result<SpeakOutcome, ValidationError>> {
    const text = request.text.trim();
    if (!text) {
      return err(new ValidationError('播报文本为空'));
    }

    const startedAt = performance.now();
    const eventType = request.eventType ?? 'manual';
    this.reminders.cancel();
    this.controller?.abort();

    const generation = ++this.generation;
    const controller = new AbortController();
    this.controller = controller;
    logger.info(`🔊 播报 [${eventType}]: ${text.length} 字符${request.summarize ? '，需要时摘要' : ''}`);

    let spokenText = text;
    let summarized = false;
    let summarizeMs = 0;
    if (request.summarize && text.length > this.options.maxDirectChars) {
      const summary = await this.summarizer.summarize(text, controller.signal);
      spokenText = summary.text;
      summarized = true;
      summarizeMs = summary.latencyMs;
      logger.info(`摘要 ${text.length} → ${spokenText.length} 字符 (${summarizeMs}ms)`);
    }

    const playback = await this.play(spokenText, controller.signal);
    if (this.controller === controller) {
      this.controller = null;
    }

    const cancelled = playback.cancelled || generation !== this.generation;
    const outcome: SpeakOutcome = {
      ...playback,
      cancelled,
      eventType,
      inputChars: text.length,
      spokenText,
      summarized,
      summarizeMs,
      totalMs: Math.round(performance.now() - startedAt),
    };

    logger.info(
      `播报${cancelled ? '已取消' : '完成'} [${eventType}]: ${outcome.spokenSentences}/${outcome.sentences} 句, 总计 ${outcome.totalMs}ms`
    );

    if (request.startReminder && !cancelled) {
      this.reminders.start(spokenText, (reminderText, count) => this.remind(reminderText, eventType, count));
    }

    await this.record(outcome, 0);
    this.emit('spoken', outcome);
    return ok(outcome);
  }

  /**
   * 立即停止当前播报
   */
  cancel(): boolean {
    const active = this.controller !== null;
    this.controller?.abort();
    this.controller = null;
    this.generation++;
    if (active) {
      logger.info('🛑 播报已取消');
    }
    return active;
  }

  /**
   * 停止提醒和当前播报，返回已提醒次数
   */
  cancelReminder(): number {
    const fired = this.reminders.cancel();
    this.cancel();
    return fired;
  }

  getStatus(): SpeechStatus {
    return {
      speaking: this.playing,
      voice: this.engine.voice,
      generation: this.generation,
      reminderActive: this.reminders.isActive,
      reminderCount: this.reminders.reminderCount,
    };
  }

  /**
   * 等待后台播报结束（关闭与测试用）
   */
  async idle(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.all(Array.from(this.pending));
    }
  }

  /**
   * 关闭：停止提醒与播报，等待后台任务退出
   */
  async shutdown(): Promise<void> {
    this.cancelReminder();
    await this.idle();
    await this.reminders.idle();
  }

  private async remind(text: string, eventType: string, count: number): Promise<void> {
    const controller = new AbortController();
    this.controller?.abort();
    this.controller = controller;

    const startedAt = performance.now();
    const playback = await this.play(text, controller.signal);
    if (this.controller === controller) {
      this.controller = null;
    }

    await this.record(
      {
        ...playback,
        eventType,
        inputChars: text.length,
        spokenText: text,
        summarized: false,
        summarizeMs: 0,
        totalMs: Math.round(performance.now() - startedAt),
      },
      count
    );
  }

  /**
   * 排队播放：前一段结束后才开始
   */
  private play(text: string, signal: AbortSignal): Promise<PlaybackResult> {
    const run = this.lock.then(() => this.playSentences(text, signal));
    this.lock = run;
    return run;
  }

  private async playSentences(text: string, signal: AbortSignal): Promise<PlaybackResult> {
    const sentences = splitSentences(text);
    const startedAt = performance.now();
    let spokenSentences = 0;
    let cancelled = false;

    this.playing = true;
    try {
      for (const [index, sentence] of sentences.entries()) {
        if (signal.aborted) {
          cancelled = true;
          logger.debug(`第 ${index + 1}/${sentences.length} 句前取消`);
          break;
        }

        const spoken = await tryCatchAsync(() => this.engine.speak(sentence, signal));
        const failure = !spoken.success ? spoken.error : !spoken.data.success ? spoken.data.error : null;
        if (signal.aborted) {
          cancelled = true;
          break;
        }
        if (failure) {
          logger.warn(`播放失败: ${formatError(failure)}`);
          break;
        }
        spokenSentences++;
      }
    } finally {
      this.playing = false;
    }

    return { sentences: sentences.length, spokenSentences, speakMs: Math.round(performance.now() - startedAt), cancelled };
  }

  private async record(outcome: SpeakOutcome, reminderCount: number): Promise<void> {
    if (!this.history) {
      return;
    }

    const record: SpeechRecord = {
      timestamp: new Date().toISOString(),
      eventType: outcome.eventType,
      inputChars: outcome.inputChars,
      summarized: outcome.summarized,
      spokenText: outcome.spokenText,
      summarizeMs: outcome.summarizeMs,
      speakMs: outcome.speakMs,
      totalMs: outcome.totalMs,
      voice: this.engine.voice,
      cancelled: outcome.cancelled,
      reminderCount,
    };
    await this.history.append(record);
  }
}
