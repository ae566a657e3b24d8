/**
 * 会话相关的类型定义
 */

import type { TriggerKind } from './trigger';

/**
 * 编排器状态
 */
export enum SessionState {
  /** 空闲 */
  IDLE = 'idle',
  /** 录音中 */
  RECORDING = 'recording',
  /** 处理中 */
  PROCESSING = 'processing',
}

/**
 * 输出模式
 */
export enum OutputMode {
  /** 只输出转录原文 */
  RAW = 'raw',
  /** 输出纠错后文本 */
  CORRECTED = 'corrected',
  /** 纠错文本 + [原文] */
  BOTH = 'both',
}

/**
 * 会话结局
 */
export enum SessionStatus {
  COMPLETED = 'completed',
  FAILED = 'failed',
  CANCELLED = 'cancelled',
}

/**
 * 流水线阶段名
 */
export type StageName = 'transcribe' | 'correct' | 'deliver';

/**
 * 会话失败原因
 */
export type FailureReason =
  | 'no_speech'
  | 'transcribe_failed'
  | 'deliver_failed'
  | 'device_lost'
  | 'cancelled';

/**
 * 配置快照（会话开始时复制，之后不再变化）
 */
export interface ConfigSnapshot {
  /** 版本号，每次设置变更 +1 */
  readonly version: number;
  readonly outputMode: OutputMode;
  readonly correctionEnabled: boolean;
  /** 转录偏置词表 */
  readonly vocabulary: readonly string[];
  /** 纠错词典：错写 → 正写 */
  readonly dictionary: Readonly<Record<string, string>>;
}

/**
 * 阶段耗时（ms）
 */
export interface SessionLatencies {
  transcribeMs: number | null;
  correctMs: number | null;
  deliverMs: number | null;
  totalMs: number | null;
}

/**
 * 会话
 */
export interface Session {
  /** 单调递增 ID */
  id: number;
  triggerKind: TriggerKind;
  /** 开始时刻（epoch ms） */
  startTime: number;
  /** 录音结束时刻 */
  endTime: number | null;
  /** 16kHz 单声道采样，录音结束时交接 */
  audioSamples: Float32Array | null;
  /** 转录引擎原始输出 */
  transcript: string | null;
  /** 词典预处理后的文本 */
  rawText: string | null;
  /** 纠错模型输出 */
  correctedText: string | null;
  /** 会话结果文本 */
  finalText: string | null;
  /** 按输出模式渲染后实际输入的文本 */
  deliveredText: string | null;
  /** 纠错是否超时或失败 */
  correctionFailed: boolean;
  outputMode: OutputMode;
  latencies: SessionLatencies;
  snapshot: ConfigSnapshot;
}

/**
 * 会话结束时的归档结果
 */
export interface SessionOutcome {
  session: Session;
  status: SessionStatus;
  reason?: FailureReason;
  /** 失败阶段 */
  stage?: StageName;
  /** 错误描述 */
  error?: string;
}

/**
 * 历史记录（只追加，不修改）
 */
export interface HistoryRecord {
  recordId: string;
  sessionId: number;
  /** ISO 8601 */
  timestamp: string;
  triggerKind: TriggerKind;
  status: SessionStatus;
  failureReason: FailureReason | null;
  rawText: string | null;
  correctedText: string | null;
  finalText: string | null;
  deliveredText: string | null;
  correctionFailed: boolean;
  outputMode: OutputMode;
  transcribeLatencyMs: number | null;
  correctLatencyMs: number | null;
  deliverLatencyMs: number | null;
  totalLatencyMs: number | null;
  audioDurationS: number;
  charCount: number;
  wordCount: number;
  /** 音频时长 / 处理时长 */
  speedRatio: number;
  configVersion: number;
}
