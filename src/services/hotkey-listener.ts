/**
 * 热键监听器
 * 负责监听全局按键并识别组合键的按下/松开
 */

import { EventEmitter } from 'events';
import { GlobalKeyboardListener, type IGlobalKeyListener } from 'node-global-key-listener';
import { createLogger } from '../utils/logger';
import { Result, ok, err, tryCatchAsync } from '../utils/result';
import { AppError } from '../utils/errors';
import { ChordMatcher } from '../core/chord-matcher';
import type { KeyEvent, KeySource } from '../types/trigger';

const logger = createLogger('HotkeyListener');

/**
 * 热键监听器事件
 */
export interface HotkeyListenerEvents {
  /** 组合键按下 */
  press: () => void;
  /** 组合键松开 */
  release: () => void;
}

/**
 * 系统全局按键来源
 */
export class GlobalKeySource implements KeySource {
  private listener: GlobalKeyboardListener | null = null;
  private handler: IGlobalKeyListener | null = null;

  async start(onKey: (event: KeyEvent) => void): Promise<void> {
    const listener = new GlobalKeyboardListener();
    const handler: IGlobalKeyListener = (event) => {
      if (event.name) {
        onKey({ key: event.name, state: event.state === 'DOWN' ? 'down' : 'up' });
      }
      // 不拦截按键，继续传给前台应用
      return false;
    };

    await listener.addListener(handler);
    this.listener = listener;
    this.handler = handler;
  }

  stop(): void {
    if (this.listener && this.handler) {
      this.listener.removeListener(this.handler);
    }
    this.listener?.kill();
    this.listener = null;
    this.handler = null;
  }
}

/**
 * 模拟按键来源
 * 用于测试和开发
 */
export class SimulatedKeySource implements KeySource {
  private onKey: ((event: KeyEvent) => void) | null = null;

  async start(onKey: (event: KeyEvent) => void): Promise<void> {
    this.onKey = onKey;
  }

  stop(): void {
    this.onKey = null;
  }

  /**
   * 模拟按下
   */
  press(...keys: string[]): void {
    keys.forEach((key) => this.onKey?.({ key, state: 'down' }));
  }

  /**
   * 模拟松开
   */
  release(...keys: string[]): void {
    keys.forEach((key) => this.onKey?.({ key, state: 'up' }));
  }
}

export class HotkeyListener extends EventEmitter {
  private readonly matcher: ChordMatcher;
  private listening = false;

  constructor(
    private readonly source: KeySource,
    combos: string[][]
  ) {
    super();
    this.matcher = new ChordMatcher(combos);
  }

  /**
   * 开始监听
   */
  async start(): Promise<Result<void, AppError>> {
    if (this.listening) {
      return err(new AppError('热键监听已在运行', 'HOTKEY_ERROR'));
    }

    this.matcher.reset();
    const result = await tryCatchAsync(() => this.source.start((event) => this.handleKey(event)));
    if (!result.success) {
      return err(new AppError(`热键监听启动失败: ${result.error.message}`, 'HOTKEY_ERROR', result.error));
    }

    this.listening = true;
    logger.info(`✅ 开始监听热键: ${this.matcher.describe()}`);
    return ok(undefined);
  }

  /**
   * 停止监听
   */
  stop(): void {
    if (!this.listening) {
      return;
    }

    this.source.stop();
    this.listening = false;
    this.matcher.reset();
    logger.info('✅ 停止监听热键');
  }

  isListening(): boolean {
    return this.listening;
  }

  private handleKey(event: KeyEvent): void {
    const transition = this.matcher.feed(event);
    if (transition === 'press') {
      logger.debug('🔽 组合键按下');
      this.emit('press');
    } else if (transition === 'release') {
      logger.debug('🔼 组合键松开');
      this.emit('release');
    }
  }
}
