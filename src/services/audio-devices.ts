/**
 * 音频设备实现
 *
 * - CommandAudioDevice：通过 arecord / parec / ffmpeg 读取 s16le 原始流
 * - SimulatedAudioDevice：手动推帧，用于测试和无麦克风环境
 */

import { spawn, type ChildProcessWithoutNullStreams } from 'child_process';
import { createLogger } from '../utils/logger';
import { DeviceError } from '../utils/errors';
import { pcm16ToFloat } from '../utils/audio-utils';
import type { AudioDevice } from '../types/audio';

const logger = createLogger('AudioDevice');

const START_STABILITY_DELAY_MS = 300;

export type CommandAudioBackend = 'arecord' | 'parec' | 'ffmpeg';

/**
 * 各后端的采集命令
 */
export function buildCaptureCommand(
  backend: CommandAudioBackend,
  device: string,
  sampleRate: number
): { command: string; args: string[] } {
  switch (backend) {
    case 'arecord':
      return {
        command: 'arecord',
        args: ['-q', '-D', device, '-f', 'S16_LE', '-r', String(sampleRate), '-c', '1', '-t', 'raw'],
      };
    case 'parec': {
      const args = ['--format=s16le', `--rate=${sampleRate}`, '--channels=1', '--raw'];
      if (device !== 'default') {
        args.push(`--device=${device}`);
      }
      return { command: 'parec', args };
    }
    case 'ffmpeg':
      return {
        command: 'ffmpeg',
        args: [
          '-hide_banner',
          '-loglevel',
          'error',
          '-f',
          'pulse',
          '-i',
          device,
          '-ac',
          '1',
          '-ar',
          String(sampleRate),
          '-f',
          's16le',
          '-acodec',
          'pcm_s16le',
          'pipe:1',
        ],
      };
  }
}

/**
 * 把采集进程的错误输出翻译成可读提示
 */
function normalizeMicError(raw: string): string {
  const detail = raw.trim();

  if (/Permission denied|not permitted/i.test(detail)) {
    return '麦克风权限被拒绝，请检查音频设备权限';
  }

  if (/No such file|No such device|device not found|Connection refused/i.test(detail)) {
    return `音频输入设备不可用: ${detail}`;
  }

  return detail ? `音频采集失败: ${detail}` : '音频采集进程异常退出';
}

/**
 * 外部命令音频设备
 */
export class CommandAudioDevice implements AudioDevice {
  readonly name: string;
  private child: ChildProcessWithoutNullStreams | null = null;
  private closing = false;
  /** 凑满一帧的字节缓冲 */
  private readonly pending: Buffer;
  private pendingBytes = 0;
  /** 复用的帧缓冲，监听方需要保留时自行复制 */
  private readonly frame: Float32Array;

  constructor(
    private readonly backend: CommandAudioBackend,
    private readonly device: string,
    private readonly sampleRate: number,
    frameSize: number
  ) {
    this.name = `${backend}:${device}`;
    this.pending = Buffer.alloc(frameSize * 2);
    this.frame = new Float32Array(frameSize);
  }

  async open(handlers: {
    onFrame: (frame: Float32Array) => void;
    onError: (error: Error) => void;
  }): Promise<void> {
    if (this.child) {
      throw new DeviceError('音频设备已打开');
    }

    const { command, args } = buildCaptureCommand(this.backend, this.device, this.sampleRate);
    const child = spawn(command, args, { stdio: 'pipe' });
    let stderrLog = '';
    let started = false;
    this.closing = false;
    this.pendingBytes = 0;

    child.stderr.on('data', (chunk: Buffer) => {
      stderrLog = (stderrLog + chunk.toString()).slice(-2000);
    });

    child.stdout.on('data', (chunk: Buffer) => {
      this.handleBytes(chunk, handlers.onFrame);
    });

    await new Promise<void>((resolve, reject) => {
      child.once('error', (error) => {
        if (!started) {
          started = true;
          reject(new DeviceError(`无法启动 ${command}: ${error.message}`, false, error));
          return;
        }
        handlers.onError(error);
      });

      child.once('spawn', () => {
        setTimeout(() => {
          if (started) {
            return;
          }
          started = true;

          if (child.exitCode !== null) {
            reject(new DeviceError(normalizeMicError(stderrLog)));
            return;
          }

          this.child = child;
          resolve();
        }, START_STABILITY_DELAY_MS);
      });

      child.once('close', (code) => {
        if (this.child === child) {
          this.child = null;
        }

        if (!started) {
          started = true;
          reject(new DeviceError(normalizeMicError(`${stderrLog}\nexit code=${code}`)));
          return;
        }

        if (!this.closing) {
          handlers.onError(new DeviceError(normalizeMicError(`${stderrLog}\nexit code=${code}`)));
        }
      });
    });

    logger.debug(`采集进程已启动: ${command} ${args.join(' ')}`);
  }

  async close(): Promise<void> {
    const child = this.child;
    if (!child) {
      return;
    }

    this.closing = true;
    this.child = null;

    await new Promise<void>((resolve) => {
      const timer = setTimeout(() => {
        child.kill('SIGKILL');
        resolve();
      }, 1500);

      child.once('close', () => {
        clearTimeout(timer);
        resolve();
      });

      child.kill('SIGTERM');
    });
  }

  private handleBytes(chunk: Buffer, onFrame: (frame: Float32Array) => void): void {
    let offset = 0;

    while (offset < chunk.length) {
      const toCopy = Math.min(this.pending.length - this.pendingBytes, chunk.length - offset);
      chunk.copy(this.pending, this.pendingBytes, offset, offset + toCopy);
      this.pendingBytes += toCopy;
      offset += toCopy;

      if (this.pendingBytes === this.pending.length) {
        pcm16ToFloat(this.pending, this.frame);
        this.pendingBytes = 0;
        onFrame(this.frame);
      }
    }
  }
}

/**
 * 模拟音频设备
 */
export class SimulatedAudioDevice implements AudioDevice {
  readonly name = 'simulated';
  private handlers: {
    onFrame: (frame: Float32Array) => void;
    onError: (error: Error) => void;
  } | null = null;
  private failuresBeforeOpen = 0;
  private opens = 0;

  async open(handlers: {
    onFrame: (frame: Float32Array) => void;
    onError: (error: Error) => void;
  }): Promise<void> {
    this.opens++;

    if (this.failuresBeforeOpen > 0) {
      this.failuresBeforeOpen--;
      throw new DeviceError('模拟设备打开失败');
    }

    this.handlers = handlers;
  }

  async close(): Promise<void> {
    this.handlers = null;
  }

  /**
   * 推送一帧
   */
  push(frame: Float32Array): void {
    this.handlers?.onFrame(frame);
  }

  /**
   * 推送 seconds 秒的恒定幅度音频，按 frameSize 分帧
   */
  pushConstant(amplitude: number, seconds: number, sampleRate: number, frameSize: number): void {
    let remaining = Math.round(seconds * sampleRate);
    while (remaining > 0) {
      const size = Math.min(frameSize, remaining);
      this.push(new Float32Array(size).fill(amplitude));
      remaining -= size;
    }
  }

  /**
   * 模拟设备丢失
   */
  fail(error: Error = new DeviceError('模拟设备断开')): void {
    const handlers = this.handlers;
    this.handlers = null;
    handlers?.onError(error);
  }

  /**
   * 让接下来 count 次 open 失败
   */
  failNextOpens(count: number): void {
    this.failuresBeforeOpen = count;
  }

  get isOpen(): boolean {
    return this.handlers !== null;
  }

  get openCount(): number {
    return this.opens;
  }
}
