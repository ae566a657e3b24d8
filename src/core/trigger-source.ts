/**
 * 触发源
 *
 * 合并热键和唤醒词两个生产者，输出开始/停止事件到编排器邮箱：
 * - 防抖窗口内另一个生产者的开始事件视为冲突，记录后丢弃
 * - 只有被接受的按下才会配对发出松开
 */

import type { EventEmitter } from 'events';
import { createLogger } from '../utils/logger';
import { TriggerAmbiguityError, formatError } from '../utils/errors';
import { StopReason, TriggerKind, type TriggerEvent } from '../types/trigger';

const logger = createLogger('TriggerSource');

export type TriggerSink = (event: TriggerEvent) => boolean;

export interface TriggerSourceOptions {
  debounceMs: number;
  now?: () => number;
}

export class TriggerSource {
  private lastStart: { kind: TriggerKind; at: number } | null = null;
  private chordAccepted = false;
  private readonly now: () => number;
  private readonly detachers: Array<() => void> = [];
  private ambiguities = 0;

  constructor(
    private readonly sink: TriggerSink,
    private readonly options: TriggerSourceOptions
  ) {
    this.now = options.now ?? Date.now;
  }

  /**
   * 接入热键监听器（press / release 事件）
   */
  attachHotkey(listener: EventEmitter): void {
    const onPress = (): void => this.chordPressed();
    const onRelease = (): void => this.chordReleased();
    listener.on('press', onPress);
    listener.on('release', onRelease);
    this.detachers.push(() => {
      listener.off('press', onPress);
      listener.off('release', onRelease);
    });
  }

  /**
   * 接入唤醒词检测器（detected 事件）
   */
  attachWakeWord(detector: EventEmitter): void {
    const onDetected = (): void => this.wakeWordDetected();
    detector.on('detected', onDetected);
    this.detachers.push(() => detector.off('detected', onDetected));
  }

  detachAll(): void {
    this.detachers.splice(0).forEach((detach) => detach());
  }

  chordPressed(): void {
    this.chordAccepted = this.start(TriggerKind.MANUAL);
  }

  chordReleased(): void {
    if (!this.chordAccepted) {
      return;
    }
    this.chordAccepted = false;
    this.send({ type: 'stop', kind: TriggerKind.MANUAL, reason: StopReason.RELEASE, at: this.now() });
  }

  wakeWordDetected(): void {
    this.start(TriggerKind.WAKEWORD);
  }

  /**
   * 被判定为冲突而丢弃的开始事件数
   */
  get ambiguityCount(): number {
    return this.ambiguities;
  }

  private start(kind: TriggerKind): boolean {
    const at = this.now();
    const previous = this.lastStart;

    if (previous && previous.kind !== kind && at - previous.at < this.options.debounceMs) {
      this.ambiguities++;
      const error = new TriggerAmbiguityError(
        `${kind} 开始事件与 ${previous.kind} 相距 ${at - previous.at}ms，已丢弃`,
        { accepted: previous.kind, discarded: kind }
      );
      logger.warn(formatError(error));
      return false;
    }

    this.lastStart = { kind, at };
    return this.send({ type: 'start', kind, at });
  }

  private send(event: TriggerEvent): boolean {
    const accepted = this.sink(event);
    if (!accepted) {
      logger.warn(`邮箱已满，丢弃触发事件: ${event.type}/${event.kind}`);
    }
    return accepted;
  }
}
