/**
 * 播报摘要
 * 长文本先交给本地模型压缩成一两句，模型不可用时取前两句
 */

import { performance } from 'perf_hooks';
import { createLogger } from '../utils/logger';
import { formatError } from '../utils/errors';
import { splitSentences } from '../utils/text-utils';
import type { TextGenerator } from './gemini-client';

const logger = createLogger('Summarizer');

/** 送入模型的最大字符数 */
const MAX_INPUT_CHARS = 2000;

const SUMMARY_PROMPT = `Summarize this in 1-2 short sentences suitable for text-to-speech. Be concise and conversational. Output ONLY the summary, nothing else.

Text: {text}

Summary:`;

export interface SummaryResult {
  text: string;
  latencyMs: number;
  /** 是否使用了回退摘要 */
  fallback: boolean;
}

/**
 * 回退摘要：前两句
 */
export function fallbackSummary(text: string): string {
  const sentences = splitSentences(text);
  return sentences.length > 0 ? sentences.slice(0, 2).join(' ') : text.trim();
}

export function buildSummaryPrompt(text: string): string {
  return SUMMARY_PROMPT.replace('{text}', () => text.slice(0, MAX_INPUT_CHARS));
}

export class Summarizer {
  constructor(
    private readonly generator: TextGenerator | null,
    private readonly timeoutMs: number
  ) {}

  async summarize(text: string, signal?: AbortSignal): Promise<SummaryResult> {
    const startedAt = performance.now();
    const elapsed = (): number => Math.round(performance.now() - startedAt);

    if (!this.generator) {
      return { text: fallbackSummary(text), latencyMs: elapsed(), fallback: true };
    }

    const timeout = AbortSignal.timeout(this.timeoutMs);
    const result = await this.generator.generate({
      prompt: buildSummaryPrompt(text),
      temperature: 0.3,
      maxTokens: 200,
      signal: signal ? AbortSignal.any([signal, timeout]) : timeout,
    });

    if (!result.success) {
      logger.warn(`摘要失败，使用前两句: ${formatError(result.error)}`);
      return { text: fallbackSummary(text), latencyMs: elapsed(), fallback: true };
    }

    return { text: result.data.trim(), latencyMs: elapsed(), fallback: false };
  }
}
