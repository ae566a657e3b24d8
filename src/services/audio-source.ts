/**
 * 音频源
 * 进程生命周期内保持输入流常开，录音只是在缓冲上开关一个窗口
 */

import { EventEmitter } from 'events';
import { createLogger } from '../utils/logger';
import { Result, ok, err, tryCatchAsync } from '../utils/result';
import { DeviceError, formatError } from '../utils/errors';
import { computeRms } from '../utils/audio-utils';
import { backoffDelay, sleep } from '../utils/backoff';
import { AudioRingBuffer } from '../core/ring-buffer';
import { EnergyWindow, type EnergyWindowView } from '../core/silence-detector';
import type { AudioDevice, CaptureHandle, DeviceEvent, FrameListener } from '../types/audio';

const logger = createLogger('AudioSource');

export interface AudioSourceOptions {
  sampleRate: number;
  frameSize: number;
  preRollSeconds: number;
  maxCaptureSeconds: number;
  /** 静音窗口时长 */
  silenceWindowSeconds: number;
  reconnectMaxRetries: number;
  reconnectBaseDelayMs: number;
  reconnectMaxDelayMs: number;
}

/**
 * 音频源事件
 */
export interface AudioSourceEvents {
  /** 设备丢失 / 恢复 / 重连耗尽 */
  device: (event: DeviceEvent) => void;
  /** 录音缓冲写满 */
  captureFull: (handle: CaptureHandle) => void;
}

export class AudioSource extends EventEmitter {
  private readonly buffer: AudioRingBuffer;
  private readonly energy: EnergyWindow;
  private readonly frameListeners = new Set<FrameListener>();
  private running = false;
  private reconnecting = false;
  private stopController: AbortController | null = null;
  private handle: CaptureHandle | null = null;
  private nextHandleId = 1;
  private framesReceived = 0;

  constructor(
    private readonly device: AudioDevice,
    private readonly options: AudioSourceOptions
  ) {
    super();

    const { sampleRate } = options;
    this.buffer = new AudioRingBuffer(
      Math.round(options.preRollSeconds * sampleRate),
      Math.round(options.maxCaptureSeconds * sampleRate),
      () => this.handleCaptureFull()
    );
    this.energy = EnergyWindow.forFrames(sampleRate, options.silenceWindowSeconds, options.frameSize);
  }

  /**
   * 打开输入流（进程内只调用一次）
   */
  async start(): Promise<Result<void, DeviceError>> {
    if (this.running) {
      return err(new DeviceError('音频源已在运行'));
    }

    this.stopController = new AbortController();
    const opened = await this.openDevice();
    if (!opened.success) {
      return opened;
    }

    this.running = true;
    logger.info(
      `🎙️ 音频输入已打开: ${this.device.name} (${this.options.sampleRate}Hz, 预录 ${this.options.preRollSeconds}s)`
    );
    return ok(undefined);
  }

  async stop(): Promise<void> {
    if (!this.running) {
      return;
    }

    this.running = false;
    this.stopController?.abort();
    this.stopController = null;
    await this.device.close();
    logger.info('音频输入已关闭');
  }

  /**
   * 开始录音，预录内容包含在内
   */
  beginCapture(): CaptureHandle {
    const preRollSamples = this.buffer.beginCapture();
    this.energy.reset();

    const handle: CaptureHandle = {
      id: this.nextHandleId++,
      startedAt: Date.now(),
      preRollSamples,
    };
    this.handle = handle;

    logger.debug(`开始录音 #${handle.id} (预录 ${preRollSamples} 采样)`);
    return handle;
  }

  /**
   * 结束录音并交出采样
   */
  endCapture(handle: CaptureHandle): Float32Array {
    if (!this.handle || this.handle.id !== handle.id) {
      throw new DeviceError(`录音句柄无效: #${handle.id}`);
    }

    this.handle = null;
    const samples = this.buffer.endCapture();
    logger.debug(`结束录音 #${handle.id}: ${samples.length} 采样`);
    return samples;
  }

  isCapturing(): boolean {
    return this.handle !== null;
  }

  /**
   * 订阅音频帧，返回取消订阅函数
   */
  onFrame(listener: FrameListener): () => void {
    this.frameListeners.add(listener);
    return () => {
      this.frameListeners.delete(listener);
    };
  }

  /**
   * 当前录音的能量窗口
   */
  get energyWindow(): EnergyWindowView {
    return this.energy;
  }

  get sampleRate(): number {
    return this.options.sampleRate;
  }

  get isRunning(): boolean {
    return this.running;
  }

  get frameCount(): number {
    return this.framesReceived;
  }

  /**
   * 帧回调：只做有界工作
   */
  private handleFrame(frame: Float32Array): void {
    this.framesReceived++;
    const rms = computeRms(frame);

    this.buffer.write(frame);
    if (this.handle) {
      this.energy.push(rms, frame.length);
    }

    for (const listener of this.frameListeners) {
      try {
        listener(frame, rms);
      } catch (error) {
        logger.error('帧监听器异常:', formatError(error));
      }
    }
  }

  private handleCaptureFull(): void {
    if (this.handle) {
      this.emit('captureFull', this.handle);
    }
  }

  private async openDevice(): Promise<Result<void, DeviceError>> {
    const result = await tryCatchAsync(() =>
      this.device.open({
        onFrame: (frame) => this.handleFrame(frame),
        onError: (error) => this.handleDeviceError(error),
      })
    );

    if (result.success) {
      return ok(undefined);
    }

    return err(new DeviceError(`打开音频设备失败: ${result.error.message}`, false, result.error));
  }

  private handleDeviceError(error: Error): void {
    if (!this.running || this.reconnecting) {
      return;
    }

    logger.warn(`⚠️ 音频设备丢失: ${error.message}`);
    this.emitDevice({ type: 'lost', error });
    this.reconnecting = true;

    this.reconnect()
      .catch((reconnectError: unknown) => {
        const fatal = new DeviceError(`音频设备重连异常: ${formatError(reconnectError)}`, true);
        this.emitDevice({ type: 'fatal', error: fatal });
      })
      .finally(() => {
        this.reconnecting = false;
      });
  }

  /**
   * 指数退避重连，耗尽后报告致命错误
   */
  private async reconnect(): Promise<void> {
    const { reconnectMaxRetries, reconnectBaseDelayMs, reconnectMaxDelayMs } = this.options;
    const signal = this.stopController?.signal;
    let lastError: Error | null = null;

    await this.device.close();

    for (let attempt = 1; attempt <= reconnectMaxRetries; attempt++) {
      const delay = backoffDelay(attempt, reconnectBaseDelayMs, reconnectMaxDelayMs);
      logger.info(`🔄 ${delay}ms 后第 ${attempt}/${reconnectMaxRetries} 次重连音频设备`);

      if (!(await sleep(delay, signal))) {
        return;
      }

      const opened = await this.openDevice();
      if (opened.success) {
        logger.info(`✅ 音频设备已恢复 (第 ${attempt} 次尝试)`);
        this.emitDevice({ type: 'recovered', attempts: attempt });
        return;
      }

      lastError = opened.error;
      logger.warn(`重连失败: ${opened.error.message}`);
    }

    const fatal = new DeviceError(
      `音频设备重连 ${reconnectMaxRetries} 次均失败${lastError ? `: ${lastError.message}` : ''}`,
      true,
      lastError
    );
    logger.error(`❌ ${fatal.message}`);
    this.emitDevice({ type: 'fatal', error: fatal });
  }

  private emitDevice(event: DeviceEvent): void {
    this.emit('device', event);
  }
}
