/**
 * 唤醒词检测
 *
 * 帧回调里只把采样拷进预分配的待处理缓冲，
 * 打分放到 setImmediate 中进行，不占用音频回调。
 */

import { EventEmitter } from 'events';
import { spawn, type ChildProcessWithoutNullStreams } from 'child_process';
import { createLogger } from '../utils/logger';
import { formatError } from '../utils/errors';
import { tryCatch } from '../utils/result';
import { floatToPcm16 } from '../utils/audio-utils';
import { fillArgs } from './run-command';
import type { AudioSource } from './audio-source';

const logger = createLogger('WakeWord');

/**
 * 唤醒词打分器（声学模型为黑盒）
 */
export interface WakeWordClassifier {
  start(onScore: (score: number, label: string) => void, onError: (error: Error) => void): Promise<void>;
  /** 输入一段 16kHz 单声道采样，可由实现方异步打分 */
  feed(samples: Float32Array): void;
  stop(): Promise<void>;
}

/**
 * 外部进程打分器
 *
 * 进程从 stdin 读取 s16le PCM，每行输出一个 JSON：{"label": "...", "score": 0.93}
 */
export class CommandWakeWordClassifier implements WakeWordClassifier {
  private child: ChildProcessWithoutNullStreams | null = null;
  private stdoutBuffer = '';
  private stopping = false;

  constructor(
    private readonly command: string,
    private readonly args: string[],
    private readonly model: string
  ) {}

  async start(onScore: (score: number, label: string) => void, onError: (error: Error) => void): Promise<void> {
    const args = fillArgs(this.args, { model: this.model });
    const child = spawn(this.command, args, { stdio: 'pipe' });
    this.stopping = false;

    await new Promise<void>((resolve, reject) => {
      child.once('error', reject);
      child.once('spawn', () => {
        child.off('error', reject);
        resolve();
      });
    });

    child.stdout.on('data', (chunk: Buffer) => this.handleStdout(chunk.toString(), onScore));
    child.stderr.on('data', (chunk: Buffer) => logger.debug(`打分进程: ${chunk.toString().trim()}`));
    child.stdin.on('error', (error) => onError(error));
    child.on('close', (code) => {
      this.child = null;
      if (!this.stopping) {
        onError(new Error(`唤醒词进程退出 (code=${code})`));
      }
    });

    this.child = child;
    logger.info(`唤醒词打分进程已启动: ${this.command} (${this.model})`);
  }

  feed(samples: Float32Array): void {
    this.child?.stdin.write(floatToPcm16(samples));
  }

  async stop(): Promise<void> {
    this.stopping = true;
    this.child?.kill('SIGTERM');
    this.child = null;
  }

  private handleStdout(text: string, onScore: (score: number, label: string) => void): void {
    this.stdoutBuffer += text;

    let newlineIndex = this.stdoutBuffer.indexOf('\n');
    while (newlineIndex !== -1) {
      const line = this.stdoutBuffer.slice(0, newlineIndex).trim();
      this.stdoutBuffer = this.stdoutBuffer.slice(newlineIndex + 1);
      newlineIndex = this.stdoutBuffer.indexOf('\n');

      if (!line) {
        continue;
      }

      const parsed = parseScoreLine(line);
      if (parsed) {
        onScore(parsed.score, parsed.label);
      } else {
        logger.debug(`无法解析打分输出: ${line}`);
      }
    }
  }
}

/**
 * 解析打分行
 */
export function parseScoreLine(line: string): { score: number; label: string } | null {
  const parsed = tryCatch((): unknown => JSON.parse(line));
  if (!parsed.success) {
    return null;
  }

  const value = parsed.data;
  if (typeof value !== 'object' || value === null || !('score' in value)) {
    return null;
  }
  const score = Number(value.score);
  const label = 'label' in value && typeof value.label === 'string' ? value.label : 'wakeword';
  return Number.isFinite(score) ? { score, label } : null;
}

export interface WakeWordDetectorOptions {
  threshold: number;
  cooldownMs: number;
  /** 待处理缓冲容量（采样数） */
  pendingCapacity: number;
  now?: () => number;
}

/**
 * 唤醒词检测器事件
 */
export interface WakeWordDetectorEvents {
  detected: (score: number, label: string) => void;
}

export class WakeWordDetector extends EventEmitter {
  private readonly pending: Float32Array;
  private pendingLength = 0;
  private dropped = 0;
  private drainScheduled = false;
  private lastDetection = Number.NEGATIVE_INFINITY;
  private unsubscribe: (() => void) | null = null;
  private readonly now: () => number;

  constructor(
    private readonly classifier: WakeWordClassifier,
    private readonly options: WakeWordDetectorOptions
  ) {
    super();
    this.pending = new Float32Array(options.pendingCapacity);
    this.now = options.now ?? Date.now;
  }

  async start(source: AudioSource): Promise<void> {
    await this.classifier.start(
      (score, label) => this.handleScore(score, label),
      (error) => logger.error('唤醒词打分器异常:', formatError(error))
    );
    this.unsubscribe = source.onFrame((frame) => this.enqueue(frame));
    logger.info(`👂 唤醒词检测已启动 (阈值 ${this.options.threshold})`);
  }

  async stop(): Promise<void> {
    this.unsubscribe?.();
    this.unsubscribe = null;
    await this.classifier.stop();
  }

  /**
   * 处理一个分数：超过阈值且不在冷却期内时触发
   */
  handleScore(score: number, label: string): boolean {
    if (score < this.options.threshold) {
      return false;
    }

    const now = this.now();
    if (now - this.lastDetection < this.options.cooldownMs) {
      logger.debug(`冷却期内忽略唤醒词 ${label} (${score.toFixed(2)})`);
      return false;
    }

    this.lastDetection = now;
    logger.info(`🗣️ 检测到唤醒词 ${label} (${score.toFixed(2)})`);
    this.emit('detected', score, label);
    return true;
  }

  /**
   * 帧回调路径：拷贝到待处理缓冲，满了就丢弃
   */
  private enqueue(frame: Float32Array): void {
    const room = this.pending.length - this.pendingLength;
    const count = Math.min(room, frame.length);
    if (count > 0) {
      this.pending.set(count === frame.length ? frame : frame.subarray(0, count), this.pendingLength);
      this.pendingLength += count;
    }
    this.dropped += frame.length - count;

    if (!this.drainScheduled) {
      this.drainScheduled = true;
      setImmediate(() => this.drain());
    }
  }

  private drain(): void {
    this.drainScheduled = false;
    if (this.pendingLength === 0) {
      return;
    }

    const chunk = this.pending.slice(0, this.pendingLength);
    this.pendingLength = 0;

    if (this.dropped > 0) {
      logger.warn(`唤醒词打分跟不上，丢弃 ${this.dropped} 个采样`);
      this.dropped = 0;
    }

    try {
      this.classifier.feed(chunk);
    } catch (error) {
      logger.error('唤醒词打分输入失败:', formatError(error));
    }
  }
}
