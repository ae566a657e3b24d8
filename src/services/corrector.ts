/**
 * 文本纠错
 *
 * 模型调用前先做确定性的词典替换；模型纠错可关闭，失败时由编排器回退到原文。
 */

import { performance } from 'perf_hooks';
import { Result, ok, err } from '../utils/result';
import { ModelError } from '../utils/errors';
import { escapeRegex, preserveCase } from '../utils/text-utils';
import type { TextGenerator } from './gemini-client';

export interface CorrectInput {
  text: string;
  /** 已知纠正：错写 → 正写 */
  dictionary: Readonly<Record<string, string>>;
  signal: AbortSignal;
}

export interface CorrectOutput {
  text: string;
  latencyMs: number;
}

/**
 * 纠错器接口
 */
export interface Corrector {
  readonly name: string;
  correct(input: CorrectInput): Promise<Result<CorrectOutput, Error>>;
}

export interface DictionaryResult {
  text: string;
  replacements: Array<{ from: string; to: string }>;
}

/**
 * 词典替换：整词匹配、不区分大小写、长词优先，一遍完成
 */
export function applyCorrectionDictionary(
  text: string,
  dictionary: Readonly<Record<string, string>>
): DictionaryResult {
  const lookup = new Map<string, string>();
  for (const [wrong, right] of Object.entries(dictionary)) {
    const key = wrong.trim().toLowerCase();
    if (key) {
      lookup.set(key, right);
    }
  }

  if (lookup.size === 0 || !text) {
    return { text, replacements: [] };
  }

  const alternatives = Array.from(lookup.keys())
    .sort((a, b) => b.length - a.length)
    .map(escapeRegex)
    .join('|');
  const pattern = new RegExp(`(?<![\\p{L}\\p{N}_])(?:${alternatives})(?![\\p{L}\\p{N}_])`, 'giu');

  const replacements: DictionaryResult['replacements'] = [];
  const replaced = text.replace(pattern, (match) => {
    const target = lookup.get(match.toLowerCase());
    if (target === undefined) {
      return match;
    }
    const output = preserveCase(match, target);
    replacements.push({ from: match, to: output });
    return output;
  });

  return { text: replaced, replacements };
}

const PROMPT_TEMPLATE = `Fix this speech transcription. Correct:
- Grammar and punctuation
- Misspelled names
- Technical terms
- Every sentence must end with a full stop or question mark

Output ONLY the corrected text, nothing else.

Text: {text}

Corrected:`;

/**
 * 构造纠错提示，已知纠正列在正文之前
 */
export function buildCorrectionPrompt(text: string, dictionary: Readonly<Record<string, string>>): string {
  let prompt = PROMPT_TEMPLATE;

  const entries = Object.entries(dictionary);
  if (entries.length > 0) {
    const lines = entries.map(([wrong, right]) => `- "${wrong}" → "${right}"`).join('\n');
    prompt = prompt.replace('\nText:', `\nKnown corrections (apply these substitutions):\n${lines}\n\nText:`);
  }

  return prompt.replace('{text}', () => text);
}

/**
 * 清理模型输出：去掉前缀和成对引号
 */
export function cleanModelOutput(raw: string): string {
  let text = raw.trim().replace(/^corrected:\s*/i, '');
  const quoted = text.match(/^"([\s\S]*)"$/);
  if (quoted) {
    text = quoted[1];
  }
  return text.trim();
}

/**
 * 基于文本生成模型的纠错器（Ollama / Gemini）
 */
export class ModelCorrector implements Corrector {
  readonly name: string;

  constructor(
    private readonly generator: TextGenerator,
    engine: 'ollama' | 'gemini',
    private readonly temperature: number
  ) {
    this.name = `${engine}:${generator.model}`;
  }

  async correct(input: CorrectInput): Promise<Result<CorrectOutput, Error>> {
    const startedAt = performance.now();
    const result = await this.generator.generate({
      prompt: buildCorrectionPrompt(input.text, input.dictionary),
      signal: input.signal,
      temperature: this.temperature,
    });

    if (!result.success) {
      return err(result.error);
    }

    const text = cleanModelOutput(result.data);
    if (!text) {
      return err(new ModelError('纠错结果为空'));
    }

    return ok({ text, latencyMs: Math.round(performance.now() - startedAt) });
  }
}
