/**
 * 语音转录
 *
 * - GeminiTranscriber：WAV 内联上传给 Gemini
 * - CommandTranscriber：调用本地 whisper.cpp 风格的命令行，stdout 为转录文本
 */

import { tmpdir } from 'os';
import { join } from 'path';
import { promises as fs } from 'fs';
import { performance } from 'perf_hooks';
import { createLogger } from '../utils/logger';
import { Result, ok, err } from '../utils/result';
import { ModelError } from '../utils/errors';
import { encodeWav } from '../utils/audio-utils';
import { sanitizeText } from '../utils/text-utils';
import { makeTempDir, removePath } from '../utils/file-adapter';
import { fillArgs, runCommand, type CommandRunner } from './run-command';
import type { TextGenerator } from './gemini-client';

const logger = createLogger('Transcriber');

export interface TranscribeInput {
  samples: Float32Array;
  sampleRate: number;
  /** 偏置词表，提示引擎优先识别 */
  biasVocabulary: readonly string[];
  signal: AbortSignal;
}

export interface TranscribeOutput {
  text: string;
  latencyMs: number;
}

/**
 * 转录器接口
 */
export interface Transcriber {
  readonly name: string;
  transcribe(input: TranscribeInput): Promise<Result<TranscribeOutput, Error>>;
}

/**
 * 偏置提示：词表拼成一句
 */
export function buildVocabularyPrompt(vocabulary: readonly string[]): string {
  return vocabulary.length > 0 ? `Vocabulary: ${vocabulary.join(', ')}.` : '';
}

const GEMINI_TRANSCRIBE_PROMPT =
  'Transcribe this audio verbatim. Output only the spoken words as plain text, with punctuation. ' +
  'If there is no speech, output nothing.';

export class GeminiTranscriber implements Transcriber {
  readonly name: string;

  constructor(private readonly client: TextGenerator) {
    this.name = `gemini:${client.model}`;
  }

  async transcribe(input: TranscribeInput): Promise<Result<TranscribeOutput, Error>> {
    const startedAt = performance.now();
    const wav = encodeWav(input.samples, input.sampleRate);
    const vocabulary = buildVocabularyPrompt(input.biasVocabulary);
    const prompt = vocabulary ? `${GEMINI_TRANSCRIBE_PROMPT}\n${vocabulary}` : GEMINI_TRANSCRIBE_PROMPT;

    logger.debug(`上传音频 ${(wav.length / 1024).toFixed(1)}KB`);
    const result = await this.client.generate({ prompt, audio: wav, signal: input.signal, temperature: 0 });
    if (!result.success) {
      return err(result.error);
    }

    return ok({ text: sanitizeText(result.data), latencyMs: Math.round(performance.now() - startedAt) });
  }
}

export interface CommandTranscriberOptions {
  command: string;
  /** 参数模板，支持 {file} {prompt} {language} */
  args: string[];
  language: string;
  runner?: CommandRunner;
  tempDir?: string;
}

export class CommandTranscriber implements Transcriber {
  readonly name: string;
  private readonly runner: CommandRunner;

  constructor(private readonly options: CommandTranscriberOptions) {
    this.name = `command:${options.command}`;
    this.runner = options.runner ?? runCommand;
  }

  async transcribe(input: TranscribeInput): Promise<Result<TranscribeOutput, Error>> {
    const startedAt = performance.now();
    const dir = await makeTempDir('voxline-', this.options.tempDir ?? tmpdir());
    const file = join(dir, 'capture.wav');

    try {
      await fs.writeFile(file, encodeWav(input.samples, input.sampleRate));

      const args = fillArgs(this.options.args, {
        file,
        prompt: buildVocabularyPrompt(input.biasVocabulary),
        language: this.options.language,
      });

      const result = await this.runner(this.options.command, args, { signal: input.signal });
      if (!result.success) {
        return err(result.error);
      }

      return ok({
        text: sanitizeText(result.data.stdout),
        latencyMs: Math.round(performance.now() - startedAt),
      });
    } finally {
      await removePath(dir);
    }
  }
}

/**
 * 按配置创建转录器
 */
export function createTranscriber(
  engine: 'gemini' | 'command',
  deps: { gemini: TextGenerator | null; command: CommandTranscriberOptions }
): Transcriber {
  if (engine === 'gemini') {
    if (!deps.gemini) {
      throw new ModelError('转录引擎为 gemini，但 Gemini 客户端未初始化');
    }
    return new GeminiTranscriber(deps.gemini);
  }
  return new CommandTranscriber(deps.command);
}
