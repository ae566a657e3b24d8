/**
 * 播报提醒
 * 播报完成后按间隔重复同一段文本，直到被取消或次数用完；
 * 每次间隔乘以 escalation，不超过 maxInterval
 */

import { createLogger } from '../utils/logger';
import { formatError } from '../utils/errors';
import { sleep } from '../utils/backoff';

const logger = createLogger('ReminderManager');

export interface ReminderOptions {
  intervalSeconds: number;
  escalation: number;
  maxIntervalSeconds: number;
  /** 0 表示不提醒 */
  maxCount: number;
}

/**
 * 提醒时的播报函数；第二个参数为本次是第几次提醒
 */
export type ReminderSpeakFn = (text: string, count: number) => Promise<unknown>;

export class ReminderManager {
  private controller: AbortController | null = null;
  private task: Promise<void> | null = null;
  private count = 0;

  constructor(private readonly options: ReminderOptions) {}

  get isActive(): boolean {
    return this.controller !== null;
  }

  get reminderCount(): number {
    return this.count;
  }

  /**
   * 第 n 次提醒前的等待秒数（n 从 1 开始）
   */
  intervalFor(n: number): number {
    const { intervalSeconds, escalation, maxIntervalSeconds } = this.options;
    return Math.min(maxIntervalSeconds, intervalSeconds * escalation ** Math.max(0, n - 1));
  }

  /**
   * 开始提醒；已有提醒时先取消
   */
  start(text: string, speak: ReminderSpeakFn): void {
    this.cancel();
    if (this.options.maxCount <= 0) {
      return;
    }

    const controller = new AbortController();
    this.controller = controller;
    this.task = this.loop(text, speak, controller.signal)
      .catch((error: unknown) => {
        logger.error('提醒播报失败:', formatError(error));
      })
      .finally(() => {
        if (this.controller === controller) {
          this.controller = null;
        }
      });

    logger.info(`⏰ 提醒已开始: ${this.intervalFor(1)}s 后首次提醒`);
  }

  /**
   * 取消提醒，返回已触发的次数
   */
  cancel(): number {
    const fired = this.count;
    if (this.controller) {
      this.controller.abort();
      this.controller = null;
      logger.info(`提醒已取消 (已提醒 ${fired} 次)`);
    }
    this.count = 0;
    return fired;
  }

  /**
   * 等待当前提醒循环退出
   */
  async idle(): Promise<void> {
    await this.task;
  }

  private async loop(text: string, speak: ReminderSpeakFn, signal: AbortSignal): Promise<void> {
    for (let n = 1; n <= this.options.maxCount; n++) {
      const elapsed = await sleep(this.intervalFor(n) * 1000, signal);
      if (!elapsed) {
        return;
      }

      this.count = n;
      logger.info(`🔔 第 ${n} 次提醒`);
      await speak(text, n);
      if (signal.aborted) {
        return;
      }
    }

    logger.info(`提醒次数已用完 (${this.options.maxCount})`);
  }
}
