/**
 * 听写流水线：转录 → 纠错 → 输出
 *
 * 阶段回退规则：
 * - transcribe 失败：会话失败，不重试
 * - correct 超时或失败：回退到词典处理后的原文，记录标志，会话继续
 * - deliver：按后端顺序回退，全部失败时会话失败，文本保留在历史中
 */

import { performance } from 'perf_hooks';
import { createLogger } from '../utils/logger';
import { computeRms } from '../utils/audio-utils';
import { formatError, isCancellation, type StageError } from '../utils/errors';
import { runStage } from '../core/stage';
import { applyCorrectionDictionary, type Corrector } from '../services/corrector';
import { deliverWithFallback, type DeliveryBackend } from '../services/delivery';
import type { Transcriber } from '../services/transcriber';
import {
  OutputMode,
  SessionStatus,
  type ConfigSnapshot,
  type FailureReason,
  type SessionLatencies,
  type StageName,
} from '../types/session';
import hallucinationPhrases from './hallucinations.json';

const logger = createLogger('DictationPipeline');

const HALLUCINATIONS = new Set(hallucinationPhrases.map(normalizePhrase));

function normalizePhrase(text: string): string {
  return text
    .trim()
    .toLowerCase()
    .replace(/[.!?。！？,，]+$/u, '')
    .trim();
}

/**
 * 空文本或常见的静音幻听输出
 */
export function isHallucination(text: string): boolean {
  const normalized = normalizePhrase(text);
  return normalized.length === 0 || HALLUCINATIONS.has(normalized);
}

/**
 * 按输出模式渲染实际输入的文本
 */
export function renderOutput(mode: OutputMode, rawText: string, correctedText: string | null, finalText: string): string {
  switch (mode) {
    case OutputMode.RAW:
      return rawText;
    case OutputMode.CORRECTED:
      return finalText;
    case OutputMode.BOTH:
      return correctedText !== null && correctedText !== rawText ? `${correctedText} [${rawText}]` : finalText;
  }
}

export interface PipelineStages {
  transcriber: Transcriber;
  /** 为 null 时不做模型纠错 */
  corrector: Corrector | null;
  backends: readonly DeliveryBackend[];
}

export interface PipelineOptions {
  sampleRate: number;
  minDurationSeconds: number;
  /** 整段 RMS 低于此值视为无语音 */
  silenceThreshold: number;
  transcribeTimeoutMs: number;
  correctTimeoutMs: number;
  deliverTimeoutMs: number;
  trailingSpace: boolean;
}

export interface PipelineInput {
  samples: Float32Array;
  snapshot: ConfigSnapshot;
  signal: AbortSignal;
}

/**
 * 流水线结果，由编排器合并回会话
 */
export interface PipelineResult {
  status: SessionStatus;
  reason?: FailureReason;
  stage?: StageName;
  error?: string;
  transcript: string | null;
  rawText: string | null;
  correctedText: string | null;
  finalText: string | null;
  deliveredText: string | null;
  correctionFailed: boolean;
  latencies: SessionLatencies;
  /** 成功的输出后端 */
  backend: string | null;
}

export class DictationPipeline {
  constructor(
    private readonly stages: PipelineStages,
    private readonly options: PipelineOptions
  ) {}

  async process(input: PipelineInput): Promise<PipelineResult> {
    const startedAt = performance.now();
    const { samples, snapshot, signal } = input;
    const result: PipelineResult = {
      status: SessionStatus.COMPLETED,
      transcript: null,
      rawText: null,
      correctedText: null,
      finalText: null,
      deliveredText: null,
      correctionFailed: false,
      latencies: { transcribeMs: null, correctMs: null, deliverMs: null, totalMs: null },
      backend: null,
    };

    const finish = (changes: Partial<PipelineResult> = {}): PipelineResult => {
      Object.assign(result, changes);
      result.latencies.totalMs = Math.round(performance.now() - startedAt);
      return result;
    };

    const duration = samples.length / this.options.sampleRate;
    if (duration < this.options.minDurationSeconds) {
      logger.warn(`⚠️ 录音过短 (${duration.toFixed(2)}s)，忽略`);
      return finish({ status: SessionStatus.FAILED, reason: 'no_speech', error: 'Recording too short' });
    }

    if (computeRms(samples) < this.options.silenceThreshold) {
      logger.warn('⚠️ 音频为静音，忽略');
      return finish({ status: SessionStatus.FAILED, reason: 'no_speech', error: 'No speech detected' });
    }

    // 转录
    const transcribed = await runStage(
      'transcribe',
      (stageSignal) =>
        this.stages.transcriber.transcribe({
          samples,
          sampleRate: this.options.sampleRate,
          biasVocabulary: snapshot.vocabulary,
          signal: stageSignal,
        }),
      { timeoutMs: this.options.transcribeTimeoutMs, signal }
    );
    result.latencies.transcribeMs = transcribed.latencyMs;

    if (!transcribed.result.success) {
      return finish(this.stageFailure(transcribed.result.error, 'transcribe_failed'));
    }

    const transcript = transcribed.result.data.text;
    result.transcript = transcript;
    logger.info(`转录 [${transcribed.latencyMs}ms]: "${transcript}"`);

    if (isHallucination(transcript)) {
      logger.warn(`过滤无效转录: "${transcript}"`);
      return finish({ status: SessionStatus.FAILED, reason: 'no_speech', error: 'No speech detected' });
    }

    // 词典预处理
    const dictionary = applyCorrectionDictionary(transcript, snapshot.dictionary);
    if (dictionary.replacements.length > 0) {
      logger.debug(`词典替换 ${dictionary.replacements.length} 处`);
    }
    const rawText = dictionary.text;
    result.rawText = rawText;
    let finalText = rawText;

    // 纠错
    const corrector = this.stages.corrector;
    if (corrector && snapshot.correctionEnabled && snapshot.outputMode !== OutputMode.RAW) {
      const corrected = await runStage(
        'correct',
        (stageSignal) => corrector.correct({ text: rawText, dictionary: snapshot.dictionary, signal: stageSignal }),
        { timeoutMs: this.options.correctTimeoutMs, signal }
      );
      result.latencies.correctMs = corrected.latencyMs;

      if (corrected.result.success) {
        finalText = corrected.result.data.text;
        result.correctedText = finalText;
        logger.info(`纠错 [${corrected.latencyMs}ms]: "${finalText}"`);
      } else if (isCancellation(corrected.result.error)) {
        return finish(this.stageFailure(corrected.result.error, 'cancelled'));
      } else {
        result.correctionFailed = true;
        logger.warn(`纠错失败，使用原文: ${formatError(corrected.result.error)}`);
      }
    }

    result.finalText = finalText;
    let delivered = renderOutput(snapshot.outputMode, rawText, result.correctedText, finalText);
    if (this.options.trailingSpace) {
      delivered += ' ';
    }
    result.deliveredText = delivered;

    // 输出
    const sent = await runStage(
      'deliver',
      (stageSignal) => deliverWithFallback(this.stages.backends, delivered, stageSignal),
      { timeoutMs: this.options.deliverTimeoutMs, signal }
    );
    result.latencies.deliverMs = sent.latencyMs;

    if (!sent.result.success) {
      return finish(this.stageFailure(sent.result.error, 'deliver_failed'));
    }

    result.backend = sent.result.data;
    return finish();
  }

  private stageFailure(error: StageError, reason: FailureReason): Partial<PipelineResult> {
    if (isCancellation(error)) {
      return { status: SessionStatus.CANCELLED, reason: 'cancelled', stage: error.stage, error: error.message };
    }

    logger.error(`❌ ${formatError(error)}`);
    return { status: SessionStatus.FAILED, reason, stage: error.stage, error: error.message };
  }
}
