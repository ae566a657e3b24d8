/**
 * 静音检测
 *
 * 能量窗口由帧回调维护（固定容量，无分配）；
 * isSilent 是纯函数，只读取窗口的总时长和最大能量。
 */

/**
 * 能量窗口视图
 */
export interface EnergyWindowView {
  readonly sampleRate: number;
  /** 窗口覆盖的采样数 */
  readonly totalSamples: number;
  /** 窗口内最大 RMS；空窗口为 0 */
  maxRms(): number;
}

/**
 * 窗口覆盖时长 ≥ minDurationSeconds 且窗口内每一帧能量都低于阈值时为真
 */
export function isSilent(
  window: EnergyWindowView,
  threshold: number,
  minDurationSeconds: number
): boolean {
  if (window.sampleRate <= 0) {
    return false;
  }

  const spanSeconds = window.totalSamples / window.sampleRate;
  if (spanSeconds < minDurationSeconds) {
    return false;
  }

  return window.maxRms() < threshold;
}

/**
 * 尾部能量窗口
 *
 * 只保留最近 spanSeconds 的帧：丢掉最旧一帧后仍然够长时就丢。
 */
export class EnergyWindow implements EnergyWindowView {
  private readonly rms: Float64Array;
  private readonly sizes: Int32Array;
  private head = 0;
  private count = 0;
  private samples = 0;
  private readonly requiredSamples: number;

  /**
   * @param capacity 最多记录的帧数
   */
  constructor(
    readonly sampleRate: number,
    spanSeconds: number,
    capacity: number
  ) {
    this.rms = new Float64Array(capacity);
    this.sizes = new Int32Array(capacity);
    this.requiredSamples = Math.ceil(spanSeconds * sampleRate);
  }

  /**
   * 按帧大小估算容量
   */
  static forFrames(sampleRate: number, spanSeconds: number, frameSize: number): EnergyWindow {
    const frames = Math.ceil((spanSeconds * sampleRate) / Math.max(1, frameSize));
    return new EnergyWindow(sampleRate, spanSeconds, frames * 2 + 4);
  }

  push(rms: number, sampleCount: number): void {
    if (this.rms.length === 0) {
      return;
    }

    if (this.count === this.rms.length) {
      this.dropOldest();
    }

    const index = (this.head + this.count) % this.rms.length;
    this.rms[index] = rms;
    this.sizes[index] = sampleCount;
    this.count++;
    this.samples += sampleCount;

    while (this.count > 1 && this.samples - this.sizes[this.head] >= this.requiredSamples) {
      this.dropOldest();
    }
  }

  reset(): void {
    this.head = 0;
    this.count = 0;
    this.samples = 0;
  }

  get totalSamples(): number {
    return this.samples;
  }

  get frameCount(): number {
    return this.count;
  }

  maxRms(): number {
    let max = 0;
    for (let i = 0; i < this.count; i++) {
      const value = this.rms[(this.head + i) % this.rms.length];
      if (value > max) {
        max = value;
      }
    }
    return max;
  }

  private dropOldest(): void {
    this.samples -= this.sizes[this.head];
    this.head = (this.head + 1) % this.rms.length;
    this.count--;
  }
}
