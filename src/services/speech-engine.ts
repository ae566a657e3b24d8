/**
 * 语音合成引擎
 * 逐句合成并播放，引擎本身不做拆句和取消判断
 */

import { createLogger } from '../utils/logger';
import { Result, ok, err } from '../utils/result';
import type { CommandError } from '../utils/errors';
import { fillArgs, runCommand, type CommandRunner } from './run-command';

const logger = createLogger('SpeechEngine');

/** espeak 的默认语速（词/分钟） */
const BASE_WORDS_PER_MINUTE = 175;

/**
 * 语音引擎接口；speak 在播放结束（或被中止）后返回
 */
export interface SpeechEngine {
  readonly voice: string;
  speak(sentence: string, signal: AbortSignal): Promise<Result<void, Error>>;
}

export interface CommandSpeechEngineOptions {
  command: string;
  /** 参数模板，支持 {voice} {rate} {speed} {text} */
  args: readonly string[];
  voice: string;
  speed: number;
  timeoutMs: number;
}

/**
 * 调用外部 TTS 命令（espeak-ng、piper 包装脚本等）
 */
export class CommandSpeechEngine implements SpeechEngine {
  readonly voice: string;

  constructor(
    private readonly options: CommandSpeechEngineOptions,
    private readonly runner: CommandRunner = runCommand
  ) {
    this.voice = options.voice;
  }

  async speak(sentence: string, signal: AbortSignal): Promise<Result<void, CommandError>> {
    const args = fillArgs(this.options.args, {
      voice: this.options.voice,
      rate: String(Math.round(BASE_WORDS_PER_MINUTE * this.options.speed)),
      speed: String(this.options.speed),
      text: sentence,
    });

    logger.debug(`播放: "${sentence}"`);
    const result = await this.runner(this.options.command, args, { timeoutMs: this.options.timeoutMs, signal });
    return result.success ? ok(undefined) : err(result.error);
  }
}
