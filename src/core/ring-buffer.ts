/**
 * 音频环形缓冲
 *
 * - 预录环：固定容量，帧回调一直覆盖写入，保存触发前的最近一段音频
 * - 录音缓冲：预先分配到最长录音时长，仅在录音期间写入
 *
 * 同一时刻最多一个录音；endCapture 把录音缓冲的所有权交给调用方，
 * 下一次 beginCapture 再分配新的缓冲。
 */

export class AudioRingBuffer {
  private readonly ring: Float32Array;
  private ringWrite = 0;
  private ringFilled = 0;

  private capture: Float32Array | null = null;
  private captureLength = 0;
  private capturing = false;
  private full = false;

  /**
   * @param preRollSamples 预录环容量
   * @param maxCaptureSamples 单次录音上限
   * @param onCaptureFull 录音缓冲写满时调用一次
   */
  constructor(
    preRollSamples: number,
    private readonly maxCaptureSamples: number,
    private readonly onCaptureFull?: () => void
  ) {
    this.ring = new Float32Array(Math.max(0, Math.floor(preRollSamples)));
    this.capture = new Float32Array(maxCaptureSamples);
  }

  /**
   * 帧回调路径：写预录环，录音中时追加到录音缓冲
   */
  write(frame: Float32Array): void {
    if (this.capturing && this.capture && !this.full) {
      const room = this.maxCaptureSamples - this.captureLength;
      const count = Math.min(room, frame.length);
      this.capture.set(count === frame.length ? frame : frame.subarray(0, count), this.captureLength);
      this.captureLength += count;

      if (this.captureLength >= this.maxCaptureSamples) {
        this.full = true;
        this.onCaptureFull?.();
      }
    }

    const capacity = this.ring.length;
    if (capacity === 0) {
      return;
    }

    // 只保留帧尾部能放进环里的部分
    const start = frame.length > capacity ? frame.length - capacity : 0;
    for (let i = start; i < frame.length; i++) {
      this.ring[this.ringWrite] = frame[i];
      this.ringWrite = (this.ringWrite + 1) % capacity;
    }
    this.ringFilled = Math.min(capacity, this.ringFilled + (frame.length - start));
  }

  /**
   * 开始录音，把预录环内容按时间顺序拷到录音缓冲开头，返回预录采样数
   */
  beginCapture(): number {
    if (this.capturing) {
      throw new Error('录音已在进行中');
    }

    if (!this.capture) {
      this.capture = new Float32Array(this.maxCaptureSamples);
    }

    const preRoll = Math.min(this.ringFilled, this.maxCaptureSamples);
    const capacity = this.ring.length;
    const oldest = (this.ringWrite - this.ringFilled + capacity) % Math.max(capacity, 1);
    for (let i = 0; i < preRoll; i++) {
      this.capture[i] = this.ring[(oldest + (this.ringFilled - preRoll) + i) % capacity];
    }

    this.captureLength = preRoll;
    this.full = preRoll >= this.maxCaptureSamples;
    this.capturing = true;

    return preRoll;
  }

  /**
   * 结束录音，交出已录采样
   */
  endCapture(): Float32Array {
    if (!this.capturing || !this.capture) {
      throw new Error('当前没有进行中的录音');
    }

    const samples = this.capture.subarray(0, this.captureLength);
    this.capture = null;
    this.captureLength = 0;
    this.capturing = false;
    this.full = false;

    return samples;
  }

  isCapturing(): boolean {
    return this.capturing;
  }

  /**
   * 当前已录采样数
   */
  get capturedSamples(): number {
    return this.captureLength;
  }

  /**
   * 预录环中已有的采样数
   */
  get preRollAvailable(): number {
    return this.ringFilled;
  }
}
