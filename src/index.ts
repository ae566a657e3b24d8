/**
 * voxline - 常驻语音听写服务
 * 热键/唤醒词触发录音 → 转录 → 纠错 → 输入到当前应用
 */

import { getConfig, validateConfig, printConfigSummary, type Config } from './core/config';
import { TriggerSource } from './core/trigger-source';
import { configureLogFile, createLogger } from './utils/logger';
import { formatError } from './utils/errors';
import { AudioSource } from './services/audio-source';
import { CommandAudioDevice, SimulatedAudioDevice } from './services/audio-devices';
import { GlobalKeySource, HotkeyListener } from './services/hotkey-listener';
import { CommandWakeWordClassifier, WakeWordDetector } from './services/wake-word';
import { createGeminiClient, type TextGenerator } from './services/gemini-client';
import { OllamaClient } from './services/ollama-client';
import { createTranscriber } from './services/transcriber';
import { ModelCorrector } from './services/corrector';
import { createDeliveryBackends } from './services/delivery';
import { createNotifier } from './services/notifier';
import { StateFileWriter } from './services/state-file';
import { RpcRouter } from './services/rpc-router';
import { ControlServer } from './services/control-server';
import { CommandSpeechEngine } from './services/speech-engine';
import { Summarizer } from './services/summarizer';
import { createClipboardManager } from './managers/clipboard-manager';
import { SettingsStore } from './managers/settings-store';
import { HistoryManager } from './managers/history-manager';
import { DictationPipeline } from './managers/dictation-pipeline';
import { Orchestrator } from './managers/orchestrator';
import { ReminderManager } from './managers/reminder-manager';
import { SpeechManager } from './managers/speech-manager';
import { SpeechHistory } from './managers/speech-history';
import { registerControlMethods } from './managers/control-methods';
import { SessionStatus } from './types/session';

const logger = createLogger('Main');

/** 唤醒词打分缓冲：2 秒音频 */
const WAKEWORD_PENDING_SECONDS = 2;

/**
 * 按需创建文本生成客户端；纠错和摘要共用
 */
function createGenerators(config: Config): { gemini: TextGenerator | null; ollama: OllamaClient } {
  // 纠错可在运行时开启，引擎为 gemini 且有密钥时即创建客户端
  const needsGemini =
    config.transcribe.engine === 'gemini' ||
    (config.correction.engine === 'gemini' && config.gemini.apiKey.length > 0);

  return {
    gemini: needsGemini ? createGeminiClient(config.gemini) : null,
    ollama: new OllamaClient({
      baseUrl: config.correction.ollamaUrl,
      model: config.correction.ollamaModel,
      temperature: config.correction.temperature,
      maxTokens: config.correction.maxTokens,
    }),
  };
}

async function main(): Promise<void> {
  console.log('🎙️ voxline');
  console.log('🚀 正在启动语音听写服务...\n');

  // 1. 加载并验证配置
  logger.info('加载配置...');
  const config = getConfig();
  configureLogFile(config.app.logFile ?? null);

  const validation = validateConfig(config);
  if (!validation.valid) {
    logger.error('配置验证失败:');
    validation.errors.forEach((error) => logger.error(`  - ${error}`));
    process.exit(1);
  }

  printConfigSummary(config);

  // 2. 运行时设置与历史
  const settings = new SettingsStore({
    dataDir: config.paths.dataDir,
    outputMode: config.output.mode,
    correctionEnabled: config.correction.enabled,
  });
  const loaded = await settings.load();
  if (!loaded.success) {
    logger.warn('设置加载失败，使用空词表:', formatError(loaded.error));
  }

  const history = new HistoryManager(config.paths.historyDir);
  const notifier = createNotifier(config.notifier);
  const stateFile = new StateFileWriter(config.paths.stateFile);

  // 3. 流水线阶段
  const generators = createGenerators(config);
  const transcriber = createTranscriber(config.transcribe.engine, {
    gemini: generators.gemini,
    command: {
      command: config.transcribe.command,
      args: config.transcribe.args,
      language: config.transcribe.language,
    },
  });

  const correctionClient = config.correction.engine === 'gemini' ? generators.gemini : generators.ollama;
  const corrector = correctionClient
    ? new ModelCorrector(correctionClient, config.correction.engine, config.correction.temperature)
    : null;

  const clipboard = createClipboardManager();
  const backends = createDeliveryBackends(config.deliver.backends, clipboard, {
    tool: config.deliver.injector,
    pasteKeys: config.deliver.pasteKeys,
    pasteDelayMs: config.deliver.pasteDelayMs,
    restoreClipboard: config.deliver.restoreClipboard,
    timeoutMs: config.deliver.timeoutMs,
  });

  const pipeline = new DictationPipeline(
    { transcriber, corrector, backends },
    {
      sampleRate: config.audio.sampleRate,
      minDurationSeconds: config.recording.minDurationSeconds,
      silenceThreshold: config.silence.threshold,
      transcribeTimeoutMs: config.transcribe.timeoutMs,
      correctTimeoutMs: config.correction.timeoutMs,
      deliverTimeoutMs: config.deliver.timeoutMs,
      trailingSpace: config.output.trailingSpace,
    }
  );

  // 4. 音频源
  const device =
    config.audio.backend === 'simulated'
      ? new SimulatedAudioDevice()
      : new CommandAudioDevice(config.audio.backend, config.audio.device, config.audio.sampleRate, config.audio.frameSize);
  const audio = new AudioSource(device, {
    sampleRate: config.audio.sampleRate,
    frameSize: config.audio.frameSize,
    preRollSeconds: config.audio.preRollSeconds,
    maxCaptureSeconds: Math.max(config.recording.maxDurationSeconds, config.silence.wakewordMaxDurationSeconds),
    silenceWindowSeconds: config.silence.durationSeconds,
    reconnectMaxRetries: config.audio.reconnectMaxRetries,
    reconnectBaseDelayMs: config.audio.reconnectBaseDelayMs,
    reconnectMaxDelayMs: config.audio.reconnectMaxDelayMs,
  });

  // 5. 编排器
  const orchestrator = new Orchestrator(
    { audio, pipeline, settings, history, notifier, stateFile },
    {
      mailboxCapacity: 64,
      maxRecordingSeconds: config.recording.maxDurationSeconds,
      wakewordMaxSeconds: config.silence.wakewordMaxDurationSeconds,
      silenceThreshold: config.silence.threshold,
      silenceDurationSeconds: config.silence.durationSeconds,
      recentLimit: config.app.recentLimit,
    }
  );

  const recent = await history.recent(config.app.recentLimit);
  if (recent.success) {
    orchestrator.seedRecent(
      recent.data
        .filter((record) => record.status === SessionStatus.COMPLETED && record.deliveredText)
        .map((record) => (record.deliveredText ?? '').trim())
    );
  } else {
    logger.warn('读取最近记录失败:', formatError(recent.error));
  }

  // 6. 语音播报
  let speech: SpeechManager | null = null;
  let speechHistory: SpeechHistory | null = null;
  if (config.speech.enabled) {
    speechHistory = new SpeechHistory(config.paths.historyDir);
    speech = new SpeechManager(
      new CommandSpeechEngine({
        command: config.speech.command,
        args: config.speech.args,
        voice: config.speech.voice,
        speed: config.speech.speed,
        timeoutMs: config.speech.sentenceTimeoutMs,
      }),
      new Summarizer(generators.ollama, config.speech.summarizeTimeoutMs),
      new ReminderManager({
        intervalSeconds: config.speech.reminderIntervalSeconds,
        escalation: config.speech.reminderEscalation,
        maxIntervalSeconds: config.speech.reminderMaxIntervalSeconds,
        maxCount: config.speech.reminderMaxCount,
      }),
      speechHistory,
      { maxDirectChars: config.speech.maxDirectChars }
    );
  }

  // 7. 打开音频流
  const started = await audio.start();
  if (!started.success) {
    logger.error('❌ 音频设备打开失败:', formatError(started.error));
    process.exit(1);
  }
  orchestrator.start();

  // 8. 触发源
  const triggers = new TriggerSource(orchestrator.triggerSink, { debounceMs: config.hotkey.debounceMs });

  let hotkeys: HotkeyListener | null = null;
  if (config.hotkey.enabled) {
    hotkeys = new HotkeyListener(new GlobalKeySource(), config.hotkey.combos);
    const listening = await hotkeys.start();
    if (listening.success) {
      triggers.attachHotkey(hotkeys);
    } else {
      logger.error('热键监听启动失败:', formatError(listening.error));
      hotkeys = null;
    }
  }

  let wakeWord: WakeWordDetector | null = null;
  if (config.wakeword.enabled) {
    wakeWord = new WakeWordDetector(
      new CommandWakeWordClassifier(config.wakeword.command, config.wakeword.args, config.wakeword.model),
      {
        threshold: config.wakeword.threshold,
        cooldownMs: config.wakeword.cooldownSeconds * 1000,
        pendingCapacity: config.audio.sampleRate * WAKEWORD_PENDING_SECONDS,
      }
    );
    await wakeWord.start(audio);
    triggers.attachWakeWord(wakeWord);
  }

  // 9. 控制接口
  let control: ControlServer | null = null;
  if (config.control.enabled) {
    const router = new RpcRouter();
    registerControlMethods(router, {
      orchestrator,
      settings,
      history,
      recentLimit: config.app.recentLimit,
      correctionAvailable: corrector !== null,
      speech,
      speechHistory,
    });

    control = new ControlServer(router, config.control.host, config.control.port);
    const listening = await control.start();
    if (!listening.success) {
      logger.error(formatError(listening.error));
      control = null;
    }
  }

  // 10. 退出处理
  let shuttingDown = false;
  const shutdown = async (exitCode: number): Promise<void> => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    logger.info('正在关闭...');

    triggers.detachAll();
    hotkeys?.stop();
    await wakeWord?.stop();
    await control?.stop();
    await speech?.shutdown();
    await orchestrator.stop();
    await audio.stop();
    await history.flush();
    await speechHistory?.flush();
    await stateFile.flush();
    configureLogFile(null);

    logger.info('👋 已退出');
    process.exit(exitCode);
  };

  const onSignal = (signal: NodeJS.Signals): void => {
    logger.info(`收到 ${signal}`);
    shutdown(0).catch((error: unknown) => {
      logger.error('关闭失败:', error);
      process.exit(1);
    });
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  orchestrator.on('fatal', (error: Error) => {
    logger.error('❌ 音频设备不可恢复，退出:', error.message);
    shutdown(1).catch((shutdownError: unknown) => {
      logger.error('关闭失败:', shutdownError);
      process.exit(1);
    });
  });

  // 11. 就绪
  const triggersReady = [hotkeys ? '热键' : null, wakeWord ? '唤醒词' : null].filter(Boolean).join(' / ');
  console.log('\n' + '='.repeat(60));
  console.log(`✅ 服务已就绪 (${triggersReady || '仅控制接口'})`);
  console.log('='.repeat(60) + '\n');

  await notifier.notify('service-ready', {
    message: hotkeys ? `Hold ${config.hotkey.combos.map((combo) => combo.join('+')).join(' or ')} to dictate` : '',
  });
}

// 处理未捕获的异常
process.on('uncaughtException', (error) => {
  logger.error('未捕获的异常:', error);
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logger.error('未处理的 Promise 拒绝:', reason);
  process.exit(1);
});

main().catch((error: unknown) => {
  logger.error('启动失败:', error);
  console.error('\n❌ 启动失败:', formatError(error));
  process.exit(1);
});
