/**
 * 触发相关的类型定义
 */

/**
 * 触发来源
 */
export enum TriggerKind {
  /** 热键组合 */
  MANUAL = 'manual',
  /** 唤醒词 */
  WAKEWORD = 'wakeword',
}

/**
 * 停止原因
 */
export enum StopReason {
  /** 松开热键 */
  RELEASE = 'release',
  /** 静音自动停止 */
  SILENCE = 'silence',
  /** 超过最长录音时长 */
  CEILING = 'ceiling',
}

/**
 * 触发事件
 */
export type TriggerEvent =
  | { type: 'start'; kind: TriggerKind; at: number }
  | { type: 'stop'; kind: TriggerKind; reason: StopReason; at: number };

/**
 * 按键事件（来自全局键盘监听）
 */
export interface KeyEvent {
  /** 规范化后的键名，如 LEFT META */
  key: string;
  /** 按下或松开 */
  state: 'down' | 'up';
}

/**
 * 按键来源
 */
export interface KeySource {
  start(onKey: (event: KeyEvent) => void): Promise<void>;
  stop(): void;
}
