/**
 * 音频相关的类型定义
 */

/**
 * 音频流格式（固定单声道 Float32 PCM）
 */
export interface AudioFormat {
  /** 采样率 (Hz) */
  sampleRate: number;
  /** 每帧采样数 */
  frameSize: number;
}

/**
 * 音频帧监听器
 *
 * 在帧回调中同步调用，实现必须是有界工作量且不能阻塞。
 * frame 只在调用期间有效，需要保留时自行复制。
 */
export type FrameListener = (frame: Float32Array, rms: number) => void;

/**
 * 设备事件
 */
export type DeviceEvent =
  | { type: 'lost'; error: Error }
  | { type: 'recovered'; attempts: number }
  | { type: 'fatal'; error: Error };

/**
 * 底层音频设备
 *
 * 打开后持续推送帧；设备异常时调用 onError 并自行停止。
 */
export interface AudioDevice {
  /** 设备名称（用于日志） */
  readonly name: string;
  open(handlers: {
    onFrame: (frame: Float32Array) => void;
    onError: (error: Error) => void;
  }): Promise<void>;
  close(): Promise<void>;
}

/**
 * 录音句柄
 */
export interface CaptureHandle {
  /** 句柄序号 */
  readonly id: number;
  /** 开始时刻（ms） */
  readonly startedAt: number;
  /** 开始时包含的预录采样数 */
  readonly preRollSamples: number;
}
