/**
 * 桌面通知
 *
 * 通过 notify-send 弹出通知；未启用或命令失败时改为写日志。
 */

import { createLogger } from '../utils/logger';
import { truncate } from '../utils/text-utils';
import { runCommand, type CommandRunner } from './run-command';

const logger = createLogger('Notifier');

export type NotifyEvent = 'session-started' | 'session-completed' | 'session-failed' | 'service-ready';

export interface NotifyPayload {
  sessionId?: number;
  /** 已输出的文本 */
  text?: string;
  /** 失败原因 */
  reason?: string;
  /** 补充说明 */
  message?: string;
}

/**
 * 通知器接口
 */
export interface Notifier {
  notify(event: NotifyEvent, payload: NotifyPayload): Promise<void>;
}

export interface Notification {
  title: string;
  body: string;
  icon: string;
}

const PREVIEW_LENGTH = 80;

/**
 * 事件对应的通知内容
 */
export function describeNotification(event: NotifyEvent, payload: NotifyPayload): Notification {
  switch (event) {
    case 'session-started':
      return { title: 'Recording', body: 'Speak now...', icon: 'media-record' };
    case 'session-completed':
      return { title: 'Typed', body: truncate(payload.text ?? '', PREVIEW_LENGTH), icon: 'dialog-ok' };
    case 'session-failed': {
      const reason = payload.reason ?? 'error';
      return {
        title: 'Dictation failed',
        body: payload.message ? `${reason}: ${payload.message}` : reason,
        icon: 'dialog-error',
      };
    }
    case 'service-ready':
      return { title: 'Dictation ready', body: payload.message ?? '', icon: 'audio-input-microphone' };
  }
}

/**
 * 只写日志的通知器
 */
export class LogNotifier implements Notifier {
  async notify(event: NotifyEvent, payload: NotifyPayload): Promise<void> {
    const { title, body } = describeNotification(event, payload);
    logger.info(`[通知] ${title}${body ? `: ${body}` : ''}`);
  }
}

export interface DesktopNotifierOptions {
  command: string;
  appName: string;
  timeoutMs: number;
  runner?: CommandRunner;
}

export class DesktopNotifier implements Notifier {
  private readonly runner: CommandRunner;
  private readonly fallback = new LogNotifier();

  constructor(private readonly options: DesktopNotifierOptions) {
    this.runner = options.runner ?? runCommand;
  }

  async notify(event: NotifyEvent, payload: NotifyPayload): Promise<void> {
    const { title, body, icon } = describeNotification(event, payload);
    const args = ['-a', this.options.appName, '-i', icon, '-u', 'low', title];
    if (body) {
      args.push(body);
    }

    const result = await this.runner(this.options.command, args, { timeoutMs: this.options.timeoutMs });
    if (!result.success) {
      logger.debug(`桌面通知失败: ${result.error.message}`);
      await this.fallback.notify(event, payload);
    }
  }
}

/**
 * 按配置创建通知器
 */
export function createNotifier(options: DesktopNotifierOptions & { enabled: boolean }): Notifier {
  return options.enabled ? new DesktopNotifier(options) : new LogNotifier();
}
