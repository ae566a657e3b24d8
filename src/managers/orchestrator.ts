/**
 * 编排器
 * 听写会话的状态机：IDLE → RECORDING → PROCESSING → IDLE
 *
 * 所有输入（触发、自动停止、阶段结果、取消、设备事件）都投递到同一个有界邮箱，
 * 由单一消费者按顺序同步处理，状态转换之间不会交错。
 * 副作用（通知、历史、状态文件）排在一条 Promise 链上执行，不阻塞状态机。
 */

import { EventEmitter } from 'events';
import { createLogger } from '../utils/logger';
import { formatError } from '../utils/errors';
import { sleep } from '../utils/backoff';
import { BoundedChannel } from '../core/channel';
import { isSilent } from '../core/silence-detector';
import type { AudioSource } from '../services/audio-source';
import type { Notifier } from '../services/notifier';
import type { StateFileWriter, StateSnapshot } from '../services/state-file';
import type { CaptureHandle, DeviceEvent } from '../types/audio';
import { StopReason, TriggerKind, type TriggerEvent } from '../types/trigger';
import {
  SessionState,
  SessionStatus,
  type FailureReason,
  type Session,
  type SessionOutcome,
  type StageName,
} from '../types/session';
import type { DictationPipeline, PipelineResult } from './dictation-pipeline';
import type { SettingsStore } from './settings-store';
import { buildHistoryRecord, type HistoryStore } from './history-manager';

const logger = createLogger('Orchestrator');

/**
 * 邮箱消息
 */
export type OrchestratorMessage =
  | { type: 'trigger'; event: TriggerEvent }
  | { type: 'autoStop'; captureId: number; reason: StopReason }
  | { type: 'processed'; sessionId: number; result: PipelineResult }
  | { type: 'cancel'; reply: (cancelled: boolean) => void }
  | { type: 'device'; event: DeviceEvent };

export interface OrchestratorDeps {
  audio: AudioSource;
  pipeline: DictationPipeline;
  settings: SettingsStore;
  history: HistoryStore;
  notifier: Notifier;
  stateFile?: StateFileWriter | null;
}

export interface OrchestratorOptions {
  mailboxCapacity: number;
  /** 热键会话的录音上限 */
  maxRecordingSeconds: number;
  /** 唤醒词会话的录音上限 */
  wakewordMaxSeconds: number;
  silenceThreshold: number;
  silenceDurationSeconds: number;
  recentLimit: number;
}

/**
 * 编排器事件
 */
export interface OrchestratorEvents {
  stateChange: (from: SessionState, to: SessionState) => void;
  recordingStopped: (sessionId: number, reason: StopReason, samples: number) => void;
  sessionComplete: (outcome: SessionOutcome) => void;
  /** 设备重连耗尽，进程应退出 */
  fatal: (error: Error) => void;
}

export interface OrchestratorStats {
  sessions: number;
  completed: number;
  failed: number;
  cancelled: number;
  ignoredStarts: number;
  staleResults: number;
}

export interface OrchestratorStatus {
  state: SessionState;
  sessionId: number | null;
  triggerKind: TriggerKind | null;
  deviceAvailable: boolean;
  outputMode: string;
  correctionEnabled: boolean;
  configVersion: number;
  recentCount: number;
  stats: OrchestratorStats;
}

export class Orchestrator extends EventEmitter {
  private readonly mailbox: BoundedChannel<OrchestratorMessage>;
  private state: SessionState = SessionState.IDLE;
  private current: Session | null = null;
  private capture: CaptureHandle | null = null;
  private controller: AbortController | null = null;
  private ceilingTimer: NodeJS.Timeout | null = null;
  private stopSilenceWatch: (() => void) | null = null;
  private deviceAvailable = true;
  private nextSessionId = 1;
  private loop: Promise<void> | null = null;
  private effects: Promise<void> = Promise.resolve();
  private readonly inflight = new Set<Promise<void>>();
  private readonly recent: string[] = [];
  private readonly detachers: Array<() => void> = [];
  private readonly stats: OrchestratorStats = {
    sessions: 0,
    completed: 0,
    failed: 0,
    cancelled: 0,
    ignoredStarts: 0,
    staleResults: 0,
  };

  constructor(
    private readonly deps: OrchestratorDeps,
    private readonly options: OrchestratorOptions
  ) {
    super();
    this.mailbox = new BoundedChannel(options.mailboxCapacity);
  }

  /**
   * 启动消费循环并订阅音频源事件
   */
  start(): void {
    if (this.loop) {
      return;
    }

    const onDevice = (event: DeviceEvent): void => {
      this.post({ type: 'device', event });
    };
    const onCaptureFull = (handle: CaptureHandle): void => {
      this.post({ type: 'autoStop', captureId: handle.id, reason: StopReason.CEILING });
    };
    this.deps.audio.on('device', onDevice);
    this.deps.audio.on('captureFull', onCaptureFull);
    this.detachers.push(() => {
      this.deps.audio.off('device', onDevice);
      this.deps.audio.off('captureFull', onCaptureFull);
    });

    this.loop = this.consume().catch((error: unknown) => {
      logger.error('❌ 编排器循环异常:', formatError(error));
    });
    this.writeState();
    logger.info('编排器已启动');
  }

  /**
   * 关闭邮箱，取消进行中的会话，等待副作用写完
   */
  async stop(): Promise<void> {
    if (this.current) {
      this.controller?.abort();
      this.finish(SessionStatus.CANCELLED, { reason: 'cancelled' });
    }

    this.mailbox.close();
    this.detachers.splice(0).forEach((detach) => detach());
    await this.loop;
    this.loop = null;
    await this.effects;
  }

  /**
   * 投递消息；邮箱已满时返回 false
   */
  post(message: OrchestratorMessage): boolean {
    const accepted = this.mailbox.trySend(message);
    if (!accepted && !this.mailbox.isClosed) {
      logger.warn(`邮箱已满，丢弃消息: ${message.type}`);
    }
    return accepted;
  }

  /**
   * 触发源的投递入口
   */
  readonly triggerSink = (event: TriggerEvent): boolean => this.post({ type: 'trigger', event });

  /**
   * 取消当前会话；没有会话时返回 false
   */
  cancel(): Promise<boolean> {
    return new Promise((resolve) => {
      if (!this.post({ type: 'cancel', reply: resolve })) {
        resolve(false);
      }
    });
  }

  /**
   * 等待邮箱、进行中的流水线和副作用全部处理完
   */
  async settle(): Promise<void> {
    for (;;) {
      await new Promise<void>((resolve) => setImmediate(resolve));
      const effects = this.effects;
      const inflight = Array.from(this.inflight);
      await Promise.all([effects, ...inflight]);
      await new Promise<void>((resolve) => setImmediate(resolve));

      if (this.mailbox.size === 0 && this.inflight.size === 0 && this.effects === effects) {
        return;
      }
    }
  }

  getStatus(): OrchestratorStatus {
    const snapshot = this.deps.settings.snapshot();
    return {
      state: this.state,
      sessionId: this.current?.id ?? null,
      triggerKind: this.current?.triggerKind ?? null,
      deviceAvailable: this.deviceAvailable,
      outputMode: snapshot.outputMode,
      correctionEnabled: snapshot.correctionEnabled,
      configVersion: snapshot.version,
      recentCount: this.recent.length,
      stats: { ...this.stats },
    };
  }

  /**
   * 最近输出的文本，新的在前
   */
  getRecent(count: number): string[] {
    return this.recent.slice(-count).reverse();
  }

  /**
   * 用历史记录预填最近列表（旧的在前）
   */
  seedRecent(texts: readonly string[]): void {
    this.recent.push(...texts);
    this.recent.splice(0, Math.max(0, this.recent.length - this.options.recentLimit));
  }

  get currentState(): SessionState {
    return this.state;
  }

  private async consume(): Promise<void> {
    for await (const message of this.mailbox) {
      try {
        this.handle(message);
      } catch (error) {
        logger.error(`处理消息 ${message.type} 失败:`, formatError(error));
      }
    }
  }

  private handle(message: OrchestratorMessage): void {
    switch (message.type) {
      case 'trigger':
        if (message.event.type === 'start') {
          this.handleStart(message.event.kind, message.event.at);
        } else {
          this.handleStop(message.event.kind, message.event.reason);
        }
        return;
      case 'autoStop':
        if (this.state === SessionState.RECORDING && this.capture?.id === message.captureId) {
          logger.info(message.reason === StopReason.SILENCE ? '🔇 检测到静音，自动停止' : '⏱️ 达到录音上限，自动停止');
          this.stopRecording(message.reason);
        }
        return;
      case 'processed':
        this.handleProcessed(message.sessionId, message.result);
        return;
      case 'cancel':
        message.reply(this.handleCancel());
        return;
      case 'device':
        this.handleDevice(message.event);
        return;
    }
  }

  private handleStart(kind: TriggerKind, at: number): void {
    if (this.state !== SessionState.IDLE) {
      this.stats.ignoredStarts++;
      logger.info(`忽略开始事件 (${kind})：当前状态 ${this.state}`);
      return;
    }

    if (!this.deviceAvailable) {
      this.stats.ignoredStarts++;
      logger.warn(`忽略开始事件 (${kind})：音频设备不可用`);
      return;
    }

    const snapshot = this.deps.settings.snapshot();
    const capture = this.deps.audio.beginCapture();
    const session: Session = {
      id: this.nextSessionId++,
      triggerKind: kind,
      startTime: at,
      endTime: null,
      audioSamples: null,
      transcript: null,
      rawText: null,
      correctedText: null,
      finalText: null,
      deliveredText: null,
      correctionFailed: false,
      outputMode: snapshot.outputMode,
      latencies: { transcribeMs: null, correctMs: null, deliverMs: null, totalMs: null },
      snapshot,
    };

    this.current = session;
    this.capture = capture;
    this.stats.sessions++;

    const ceilingSeconds =
      kind === TriggerKind.WAKEWORD ? this.options.wakewordMaxSeconds : this.options.maxRecordingSeconds;
    this.ceilingTimer = setTimeout(() => {
      this.post({ type: 'autoStop', captureId: capture.id, reason: StopReason.CEILING });
    }, ceilingSeconds * 1000);

    if (kind === TriggerKind.WAKEWORD) {
      this.watchSilence(capture.id);
    }

    this.transition(SessionState.RECORDING);
    logger.info(`🎤 开始录音 #${session.id} (${kind})`);
    this.schedule(() => this.deps.notifier.notify('session-started', { sessionId: session.id }));
  }

  /**
   * 唤醒词会话：在帧回调里检查静音窗口，满足条件时投递一次自动停止
   */
  private watchSilence(captureId: number): void {
    const { audio } = this.deps;
    const { silenceThreshold, silenceDurationSeconds } = this.options;
    let posted = false;

    this.stopSilenceWatch = audio.onFrame(() => {
      if (!posted && isSilent(audio.energyWindow, silenceThreshold, silenceDurationSeconds)) {
        posted = true;
        this.post({ type: 'autoStop', captureId, reason: StopReason.SILENCE });
      }
    });
  }

  private handleStop(kind: TriggerKind, reason: StopReason): void {
    const session = this.current;
    if (this.state !== SessionState.RECORDING || !session) {
      logger.debug(`忽略停止事件 (${kind})：当前状态 ${this.state}`);
      return;
    }

    if (session.triggerKind !== kind) {
      logger.debug(`忽略停止事件 (${kind})：会话 #${session.id} 由 ${session.triggerKind} 触发`);
      return;
    }

    this.stopRecording(reason);
  }

  private stopRecording(reason: StopReason): void {
    const session = this.current;
    const capture = this.capture;
    if (!session || !capture) {
      return;
    }

    this.clearRecordingWatchers();
    const samples = this.deps.audio.endCapture(capture);
    this.capture = null;

    session.endTime = Date.now();
    session.audioSamples = samples;

    const controller = new AbortController();
    this.controller = controller;
    this.transition(SessionState.PROCESSING);
    logger.info(
      `⏹️ 停止录音 #${session.id} (${reason}): ${(samples.length / this.deps.audio.sampleRate).toFixed(2)}s`
    );
    this.emit('recordingStopped', session.id, reason, samples.length);

    const sessionId = session.id;
    const run: Promise<void> = this.deps.pipeline
      .process({ samples, snapshot: session.snapshot, signal: controller.signal })
      .catch((error: unknown): PipelineResult => ({
        status: SessionStatus.FAILED,
        reason: 'transcribe_failed',
        error: formatError(error),
        transcript: null,
        rawText: null,
        correctedText: null,
        finalText: null,
        deliveredText: null,
        correctionFailed: false,
        latencies: { transcribeMs: null, correctMs: null, deliverMs: null, totalMs: null },
        backend: null,
      }))
      .then((result) => this.postResult({ type: 'processed', sessionId, result }))
      .finally(() => {
        this.inflight.delete(run);
      });

    this.inflight.add(run);
  }

  /**
   * 阶段结果必须送达；邮箱满时稍后重试
   */
  private async postResult(message: OrchestratorMessage): Promise<void> {
    while (!this.mailbox.trySend(message)) {
      if (this.mailbox.isClosed) {
        return;
      }
      await sleep(5);
    }
  }

  private handleProcessed(sessionId: number, result: PipelineResult): void {
    const session = this.current;
    if (this.state !== SessionState.PROCESSING || !session || session.id !== sessionId) {
      this.stats.staleResults++;
      logger.debug(`丢弃过期的处理结果 #${sessionId}`);
      return;
    }

    session.transcript = result.transcript;
    session.rawText = result.rawText;
    session.correctedText = result.correctedText;
    session.finalText = result.finalText;
    session.deliveredText = result.deliveredText;
    session.correctionFailed = result.correctionFailed;
    session.latencies = result.latencies;

    this.finish(result.status, { reason: result.reason, stage: result.stage, error: result.error });
  }

  private handleCancel(): boolean {
    if (this.state === SessionState.IDLE || !this.current) {
      return false;
    }

    logger.info(`🛑 取消会话 #${this.current.id}`);
    if (this.state === SessionState.RECORDING) {
      this.releaseCapture();
    } else {
      this.controller?.abort();
    }

    this.finish(SessionStatus.CANCELLED, { reason: 'cancelled' });
    return true;
  }

  private handleDevice(event: DeviceEvent): void {
    switch (event.type) {
      case 'lost':
        this.deviceAvailable = false;
        if (this.state === SessionState.RECORDING) {
          this.releaseCapture();
          this.finish(SessionStatus.FAILED, { reason: 'device_lost', error: event.error.message });
        }
        this.writeState();
        return;
      case 'recovered':
        this.deviceAvailable = true;
        logger.info(`音频设备已恢复 (${event.attempts} 次尝试)`);
        this.writeState();
        return;
      case 'fatal':
        this.deviceAvailable = false;
        if (this.state === SessionState.RECORDING) {
          this.releaseCapture();
          this.finish(SessionStatus.FAILED, { reason: 'device_lost', error: event.error.message });
        }
        logger.error(`❌ ${event.error.message}`);
        this.emit('fatal', event.error);
        return;
    }
  }

  /**
   * 放弃正在录制的音频
   */
  private releaseCapture(): void {
    this.clearRecordingWatchers();
    if (this.capture) {
      const capture = this.capture;
      this.capture = null;
      if (this.deps.audio.isCapturing()) {
        this.deps.audio.endCapture(capture);
      }
    }
  }

  private clearRecordingWatchers(): void {
    if (this.ceilingTimer) {
      clearTimeout(this.ceilingTimer);
      this.ceilingTimer = null;
    }
    if (this.stopSilenceWatch) {
      this.stopSilenceWatch();
      this.stopSilenceWatch = null;
    }
  }

  /**
   * 结束会话：回到 IDLE，发出一次通知、写一条历史
   */
  private finish(
    status: SessionStatus,
    detail: { reason?: FailureReason; stage?: StageName; error?: string }
  ): void {
    const session = this.current;
    if (!session) {
      return;
    }

    this.releaseCapture();
    this.current = null;
    this.controller = null;

    const outcome: SessionOutcome = { session, status, ...detail };
    switch (status) {
      case SessionStatus.COMPLETED:
        this.stats.completed++;
        if (session.deliveredText) {
          this.seedRecent([session.deliveredText.trim()]);
        }
        logger.info(`✅ 会话 #${session.id} 完成: "${session.finalText ?? ''}"`);
        break;
      case SessionStatus.FAILED:
        this.stats.failed++;
        logger.warn(`会话 #${session.id} 失败: ${detail.reason ?? 'unknown'}${detail.error ? ` (${detail.error})` : ''}`);
        break;
      case SessionStatus.CANCELLED:
        this.stats.cancelled++;
        logger.info(`会话 #${session.id} 已取消`);
        break;
    }

    this.transition(SessionState.IDLE);
    this.emit('sessionComplete', outcome);

    const record = buildHistoryRecord(outcome, this.deps.audio.sampleRate);
    this.schedule(async () => {
      if (status === SessionStatus.COMPLETED) {
        await this.deps.notifier.notify('session-completed', { sessionId: session.id, text: session.finalText ?? '' });
      } else {
        await this.deps.notifier.notify('session-failed', {
          sessionId: session.id,
          reason: detail.reason,
          message: detail.error,
        });
      }
    });
    this.schedule(async () => {
      await this.deps.history.append(record);
    });
  }

  private transition(next: SessionState): void {
    const previous = this.state;
    if (previous === next) {
      return;
    }
    this.state = next;
    this.emit('stateChange', previous, next);
    this.writeState();
  }

  private writeState(): void {
    const writer = this.deps.stateFile;
    if (!writer) {
      return;
    }

    const snapshot = this.deps.settings.snapshot();
    const state: StateSnapshot = {
      pid: process.pid,
      state: this.state,
      sessionId: this.current?.id ?? null,
      triggerKind: this.current?.triggerKind ?? null,
      outputMode: snapshot.outputMode,
      correctionEnabled: snapshot.correctionEnabled,
      configVersion: snapshot.version,
      recent: [...this.recent],
      updatedAt: new Date().toISOString(),
    };
    this.schedule(() => writer.write(state));
  }

  /**
   * 排入副作用链；单个副作用失败只记录日志
   */
  private schedule(task: () => Promise<void>): void {
    this.effects = this.effects.then(task).catch((error: unknown) => {
      logger.error('副作用执行失败:', formatError(error));
    });
  }
}
