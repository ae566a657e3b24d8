/**
 * 配置管理系统 - 使用 Zod 进行验证
 */

import { homedir } from 'os';
import { join } from 'path';
import { z } from 'zod';
import * as dotenv from 'dotenv';
import { createLogger } from '../utils/logger';
import { ConfigError } from '../utils/errors';
import { OutputMode } from '../types/session';
import { unsupportedKeys } from '../services/delivery';

const logger = createLogger('Config');

/**
 * 音频配置 Schema
 */
const AudioConfigSchema = z.object({
  backend: z.enum(['arecord', 'parec', 'ffmpeg', 'simulated']).default('arecord'),
  device: z.string().default('default'),
  sampleRate: z.number().int().positive().default(16000),
  frameSize: z.number().int().min(64).max(16384).default(1024),
  preRollSeconds: z.number().min(0).max(5).default(0.5),
  reconnectMaxRetries: z.number().int().min(0).max(20).default(5),
  reconnectBaseDelayMs: z.number().int().min(10).default(500),
  reconnectMaxDelayMs: z.number().int().min(10).default(8000),
});

/**
 * 录音时长配置 Schema
 */
const RecordingConfigSchema = z.object({
  maxDurationSeconds: z.number().positive().max(600).default(120),
  minDurationSeconds: z.number().min(0).default(0.3),
});

/**
 * 静音检测配置 Schema
 */
const SilenceConfigSchema = z.object({
  threshold: z.number().min(0).max(1).default(0.01),
  durationSeconds: z.number().positive().default(1.5),
  wakewordMaxDurationSeconds: z.number().positive().default(30),
});

/**
 * 热键配置 Schema
 */
const HotkeyConfigSchema = z.object({
  enabled: z.boolean().default(true),
  combos: z.array(z.array(z.string().min(1)).min(1)).default([['LEFT META', 'LEFT ALT']]),
  debounceMs: z.number().int().min(0).max(5000).default(300),
});

/**
 * 唤醒词配置 Schema
 */
const WakewordConfigSchema = z.object({
  enabled: z.boolean().default(false),
  command: z.string().default('wakeword-scorer'),
  args: z.array(z.string()).default(['--model', '{model}']),
  model: z.string().default('hey_jarvis'),
  threshold: z.number().min(0).max(1).default(0.5),
  cooldownSeconds: z.number().min(0).default(2.0),
});

/**
 * 转录配置 Schema
 */
const TranscribeConfigSchema = z.object({
  engine: z.enum(['gemini', 'command']).default('gemini'),
  timeoutMs: z.number().int().min(1000).max(300000).default(30000),
  command: z.string().default('whisper-cli'),
  args: z.array(z.string()).default(['-nt', '-np', '-f', '{file}', '--prompt', '{prompt}']),
  language: z.string().default('en'),
});

/**
 * Gemini 配置 Schema
 */
const GeminiConfigSchema = z.object({
  apiKey: z.string().default(''),
  model: z.string().min(1).default('gemini-2.5-flash'),
});

/**
 * 纠错配置 Schema
 */
const CorrectionConfigSchema = z.object({
  enabled: z.boolean().default(true),
  engine: z.enum(['ollama', 'gemini']).default('ollama'),
  timeoutMs: z.number().int().min(100).max(120000).default(8000),
  ollamaUrl: z.string().url().default('http://localhost:11434'),
  ollamaModel: z.string().min(1).default('llama3.2:3b'),
  temperature: z.number().min(0).max(2).default(0.1),
  maxTokens: z.number().int().positive().default(500),
});

/**
 * 输出配置 Schema
 */
const OutputConfigSchema = z.object({
  mode: z.nativeEnum(OutputMode).default(OutputMode.CORRECTED),
  trailingSpace: z.boolean().default(true),
});

/**
 * 文本输入配置 Schema
 */
const DeliverConfigSchema = z.object({
  backends: z.array(z.enum(['paste', 'type', 'clipboard'])).min(1).default(['type', 'paste', 'clipboard']),
  injector: z.enum(['xdotool', 'ydotool', 'wtype', 'dotool']).default('xdotool'),
  pasteKeys: z.string().default('ctrl+v'),
  pasteDelayMs: z.number().int().min(0).max(2000).default(50),
  restoreClipboard: z.boolean().default(true),
  timeoutMs: z.number().int().min(100).max(60000).default(5000),
});

/**
 * 桌面通知配置 Schema
 */
const NotifierConfigSchema = z.object({
  enabled: z.boolean().default(true),
  command: z.string().default('notify-send'),
  appName: z.string().default('voxline'),
  timeoutMs: z.number().int().min(100).default(2000),
});

/**
 * 数据路径配置 Schema
 */
const PathsConfigSchema = z.object({
  dataDir: z.string().min(1),
  historyDir: z.string().min(1),
  stateFile: z.string().min(1),
});

/**
 * 控制接口配置 Schema
 */
const ControlConfigSchema = z.object({
  enabled: z.boolean().default(true),
  host: z.string().default('127.0.0.1'),
  port: z.number().int().min(1).max(65535).default(8767),
});

/**
 * 语音播报配置 Schema
 */
const SpeechConfigSchema = z.object({
  enabled: z.boolean().default(true),
  command: z.string().default('espeak-ng'),
  args: z.array(z.string()).default(['-v', '{voice}', '-s', '{rate}', '{text}']),
  voice: z.string().default('en-us'),
  speed: z.number().min(0.25).max(4).default(1.0),
  maxDirectChars: z.number().int().positive().default(150),
  summarizeTimeoutMs: z.number().int().min(100).default(8000),
  sentenceTimeoutMs: z.number().int().min(100).default(30000),
  reminderIntervalSeconds: z.number().positive().default(300),
  reminderEscalation: z.number().min(1).max(10).default(1.5),
  reminderMaxIntervalSeconds: z.number().positive().default(1800),
  reminderMaxCount: z.number().int().min(0).default(5),
});

/**
 * 应用配置 Schema
 */
const AppConfigSchema = z.object({
  debugMode: z.boolean().default(false),
  logFile: z.string().optional(),
  recentLimit: z.number().int().min(1).max(200).default(20),
});

/**
 * 完整配置 Schema
 */
const ConfigSchema = z.object({
  audio: AudioConfigSchema,
  recording: RecordingConfigSchema,
  silence: SilenceConfigSchema,
  hotkey: HotkeyConfigSchema,
  wakeword: WakewordConfigSchema,
  transcribe: TranscribeConfigSchema,
  gemini: GeminiConfigSchema,
  correction: CorrectionConfigSchema,
  output: OutputConfigSchema,
  deliver: DeliverConfigSchema,
  notifier: NotifierConfigSchema,
  paths: PathsConfigSchema,
  control: ControlConfigSchema,
  speech: SpeechConfigSchema,
  app: AppConfigSchema,
});

/**
 * 配置类型
 */
export type Config = z.infer<typeof ConfigSchema>;
export type AudioConfig = z.infer<typeof AudioConfigSchema>;
export type RecordingConfig = z.infer<typeof RecordingConfigSchema>;
export type SilenceConfig = z.infer<typeof SilenceConfigSchema>;
export type HotkeyConfig = z.infer<typeof HotkeyConfigSchema>;
export type WakewordConfig = z.infer<typeof WakewordConfigSchema>;
export type TranscribeConfig = z.infer<typeof TranscribeConfigSchema>;
export type GeminiConfig = z.infer<typeof GeminiConfigSchema>;
export type CorrectionConfig = z.infer<typeof CorrectionConfigSchema>;
export type OutputConfig = z.infer<typeof OutputConfigSchema>;
export type DeliverConfig = z.infer<typeof DeliverConfigSchema>;
export type NotifierConfig = z.infer<typeof NotifierConfigSchema>;
export type PathsConfig = z.infer<typeof PathsConfigSchema>;
export type ControlConfig = z.infer<typeof ControlConfigSchema>;
export type SpeechConfig = z.infer<typeof SpeechConfigSchema>;
export type AppConfig = z.infer<typeof AppConfigSchema>;

type Env = Record<string, string | undefined>;

/**
 * 读取数字；未设置或为空时交给 schema 默认值
 */
function envNumber(env: Env, key: string): number | undefined {
  const value = env[key];
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  return Number(value);
}

function envBool(env: Env, key: string): boolean | undefined {
  const value = env[key]?.trim().toLowerCase();
  if (!value) {
    return undefined;
  }
  return value === 'true' || value === '1' || value === 'yes';
}

function envString(env: Env, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

/**
 * 逗号分隔列表
 */
function envList(env: Env, key: string): string[] | undefined {
  const value = envString(env, key);
  if (!value) {
    return undefined;
  }
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

/**
 * 命令参数：按空白拆分
 */
function envArgs(env: Env, key: string): string[] | undefined {
  const value = envString(env, key);
  return value ? value.split(/\s+/) : undefined;
}

/**
 * 热键组合："LEFT META+LEFT ALT; RIGHT CTRL+RIGHT SHIFT"
 */
export function parseCombos(value: string): string[][] {
  return value
    .split(';')
    .map((combo) =>
      combo
        .split('+')
        .map((key) => key.trim().replace(/\s+/g, ' ').toUpperCase())
        .filter((key) => key.length > 0)
    )
    .filter((combo) => combo.length > 0);
}

/**
 * 展开 ~ 开头的路径
 */
export function expandHome(path: string): string {
  if (path === '~') {
    return homedir();
  }
  return path.startsWith('~/') ? join(homedir(), path.slice(2)) : path;
}

/**
 * 从环境变量加载配置
 */
function loadConfigFromEnv(env: Env): unknown {
  const dataDir = expandHome(envString(env, 'DATA_DIR') ?? '~/.local/share/voxline');
  const combos = envString(env, 'HOTKEY_COMBOS');

  return {
    audio: {
      backend: envString(env, 'AUDIO_BACKEND'),
      device: envString(env, 'AUDIO_DEVICE'),
      sampleRate: envNumber(env, 'AUDIO_SAMPLE_RATE'),
      frameSize: envNumber(env, 'AUDIO_FRAME_SIZE'),
      preRollSeconds: envNumber(env, 'AUDIO_PREROLL_SECONDS'),
      reconnectMaxRetries: envNumber(env, 'AUDIO_RECONNECT_MAX_RETRIES'),
      reconnectBaseDelayMs: envNumber(env, 'AUDIO_RECONNECT_BASE_DELAY_MS'),
      reconnectMaxDelayMs: envNumber(env, 'AUDIO_RECONNECT_MAX_DELAY_MS'),
    },
    recording: {
      maxDurationSeconds: envNumber(env, 'RECORDING_MAX_DURATION'),
      minDurationSeconds: envNumber(env, 'RECORDING_MIN_DURATION'),
    },
    silence: {
      threshold: envNumber(env, 'SILENCE_THRESHOLD'),
      durationSeconds: envNumber(env, 'SILENCE_DURATION'),
      wakewordMaxDurationSeconds: envNumber(env, 'WAKEWORD_MAX_DURATION'),
    },
    hotkey: {
      enabled: envBool(env, 'HOTKEY_ENABLED'),
      combos: combos ? parseCombos(combos) : undefined,
      debounceMs: envNumber(env, 'TRIGGER_DEBOUNCE_MS'),
    },
    wakeword: {
      enabled: envBool(env, 'WAKEWORD_ENABLED'),
      command: envString(env, 'WAKEWORD_COMMAND'),
      args: envArgs(env, 'WAKEWORD_ARGS'),
      model: envString(env, 'WAKEWORD_MODEL'),
      threshold: envNumber(env, 'WAKEWORD_THRESHOLD'),
      cooldownSeconds: envNumber(env, 'WAKEWORD_COOLDOWN'),
    },
    transcribe: {
      engine: envString(env, 'TRANSCRIBE_ENGINE'),
      timeoutMs: envNumber(env, 'TRANSCRIBE_TIMEOUT_MS'),
      command: envString(env, 'TRANSCRIBE_COMMAND'),
      args: envArgs(env, 'TRANSCRIBE_ARGS'),
      language: envString(env, 'TRANSCRIBE_LANGUAGE'),
    },
    gemini: {
      apiKey: envString(env, 'GEMINI_API_KEY'),
      model: envString(env, 'GEMINI_MODEL'),
    },
    correction: {
      enabled: envBool(env, 'CORRECTION_ENABLED'),
      engine: envString(env, 'CORRECTION_ENGINE'),
      timeoutMs: envNumber(env, 'CORRECTION_TIMEOUT_MS'),
      ollamaUrl: envString(env, 'OLLAMA_URL'),
      ollamaModel: envString(env, 'OLLAMA_MODEL'),
      temperature: envNumber(env, 'CORRECTION_TEMPERATURE'),
      maxTokens: envNumber(env, 'CORRECTION_MAX_TOKENS'),
    },
    output: {
      mode: envString(env, 'OUTPUT_MODE'),
      trailingSpace: envBool(env, 'OUTPUT_TRAILING_SPACE'),
    },
    deliver: {
      backends: envList(env, 'DELIVER_BACKENDS'),
      injector: envString(env, 'DELIVER_INJECTOR'),
      pasteKeys: envString(env, 'DELIVER_PASTE_KEYS'),
      pasteDelayMs: envNumber(env, 'DELIVER_PASTE_DELAY_MS'),
      restoreClipboard: envBool(env, 'DELIVER_RESTORE_CLIPBOARD'),
      timeoutMs: envNumber(env, 'DELIVER_TIMEOUT_MS'),
    },
    notifier: {
      enabled: envBool(env, 'ENABLE_NOTIFICATIONS'),
      command: envString(env, 'NOTIFIER_COMMAND'),
      appName: envString(env, 'NOTIFIER_APP_NAME'),
      timeoutMs: envNumber(env, 'NOTIFIER_TIMEOUT_MS'),
    },
    paths: {
      dataDir,
      historyDir: expandHome(envString(env, 'HISTORY_DIR') ?? join(dataDir, 'history')),
      stateFile: expandHome(envString(env, 'STATE_FILE') ?? '~/.cache/voxline/state.json'),
    },
    control: {
      enabled: envBool(env, 'CONTROL_ENABLED'),
      host: envString(env, 'CONTROL_HOST'),
      port: envNumber(env, 'CONTROL_PORT'),
    },
    speech: {
      enabled: envBool(env, 'SPEECH_ENABLED'),
      command: envString(env, 'SPEECH_COMMAND'),
      args: envArgs(env, 'SPEECH_ARGS'),
      voice: envString(env, 'SPEECH_VOICE'),
      speed: envNumber(env, 'SPEECH_SPEED'),
      maxDirectChars: envNumber(env, 'SPEECH_MAX_DIRECT_CHARS'),
      summarizeTimeoutMs: envNumber(env, 'SPEECH_SUMMARIZE_TIMEOUT_MS'),
      sentenceTimeoutMs: envNumber(env, 'SPEECH_SENTENCE_TIMEOUT_MS'),
      reminderIntervalSeconds: envNumber(env, 'REMINDER_INTERVAL'),
      reminderEscalation: envNumber(env, 'REMINDER_ESCALATION'),
      reminderMaxIntervalSeconds: envNumber(env, 'REMINDER_MAX_INTERVAL'),
      reminderMaxCount: envNumber(env, 'REMINDER_MAX_COUNT'),
    },
    app: {
      debugMode: envBool(env, 'DEBUG_MODE'),
      logFile: envString(env, 'LOG_FILE'),
      recentLimit: envNumber(env, 'RECENT_LIMIT'),
    },
  };
}

/**
 * 验证并返回配置
 *
 * 传入 env 时不读取 .env 文件（测试用）
 */
export function getConfig(env?: Env): Config {
  if (!env) {
    dotenv.config();
  }

  const result = ConfigSchema.safeParse(loadConfigFromEnv(env ?? process.env));

  if (!result.success) {
    const issues = result.error.errors.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    logger.error('配置验证失败:');
    issues.forEach((issue) => logger.error(`  - ${issue}`));
    throw new ConfigError('配置验证失败，请检查环境变量', issues);
  }

  const config = result.data;
  if (config.app.debugMode) {
    logger.debug('配置验证成功');
    logger.debug(`转录引擎: ${config.transcribe.engine}, 纠错引擎: ${config.correction.engine}`);
  }

  return config;
}

/**
 * 验证配置（用于启动时检查）
 */
export function validateConfig(config: Config): { valid: boolean; errors: string[] } {
  const errors: string[] = [];

  const needsGemini =
    config.transcribe.engine === 'gemini' ||
    (config.correction.enabled && config.correction.engine === 'gemini');
  if (needsGemini && config.gemini.apiKey.length < 10) {
    errors.push('GEMINI_API_KEY 未配置或长度异常');
  }

  if (!config.hotkey.enabled && !config.wakeword.enabled) {
    errors.push('热键与唤醒词均已禁用，无法触发录音');
  }

  if (config.hotkey.enabled && config.hotkey.combos.length === 0) {
    errors.push('HOTKEY_COMBOS 至少需要一组按键');
  }

  if (config.silence.durationSeconds >= config.silence.wakewordMaxDurationSeconds) {
    errors.push('静音时长必须小于唤醒词录音上限');
  }

  if (config.recording.minDurationSeconds >= config.recording.maxDurationSeconds) {
    errors.push('最短录音时长必须小于最长录音时长');
  }

  if (config.audio.reconnectBaseDelayMs > config.audio.reconnectMaxDelayMs) {
    errors.push('重连基础延迟不能大于最大延迟');
  }

  const unknownKeys = unsupportedKeys(config.deliver.injector, config.deliver.pasteKeys);
  if (config.deliver.backends.includes('paste') && unknownKeys.length > 0) {
    errors.push(`DELIVER_PASTE_KEYS 含 ${config.deliver.injector} 不支持的按键: ${unknownKeys.join(', ')}`);
  }

  return {
    valid: errors.length === 0,
    errors,
  };
}

/**
 * 打印配置摘要
 */
export function printConfigSummary(config: Config): void {
  const combos = config.hotkey.combos.map((combo) => combo.join('+')).join(' | ');
  const correction = config.correction.enabled
    ? `${config.correction.engine} (${config.correction.engine === 'ollama' ? config.correction.ollamaModel : config.gemini.model})`
    : '禁用';

  console.log('📋 当前配置摘要:');
  console.log(`  • 音频: ${config.audio.backend} ${config.audio.device} @ ${config.audio.sampleRate}Hz`);
  console.log(`  • 热键: ${config.hotkey.enabled ? combos : '禁用'}`);
  console.log(`  • 唤醒词: ${config.wakeword.enabled ? `${config.wakeword.model} (阈值 ${config.wakeword.threshold})` : '禁用'}`);
  console.log(`  • 转录: ${config.transcribe.engine === 'gemini' ? config.gemini.model : config.transcribe.command}`);
  console.log(`  • 纠错: ${correction}`);
  console.log(`  • 输出模式: ${config.output.mode}`);
  console.log(`  • 输出方式: ${config.deliver.backends.join(' → ')}`);
  console.log(`  • 语音播报: ${config.speech.enabled ? `${config.speech.command} (${config.speech.voice})` : '禁用'}`);
  console.log(`  • 控制接口: ${config.control.enabled ? `http://${config.control.host}:${config.control.port}/rpc` : '禁用'}`);
  console.log(`  • 调试模式: ${config.app.debugMode ? '开启' : '关闭'}`);
  console.log();
}
