#!/usr/bin/env node
/**
 * voxline - 命令行工具
 * 查看状态与历史，单独调试输出和纠错
 */

import { getConfig, printConfigSummary } from './core/config';
import { createLogger } from './utils/logger';
import { formatError } from './utils/errors';
import { readStateFile } from './services/state-file';
import { createDeliveryBackends, deliverWithFallback } from './services/delivery';
import { applyCorrectionDictionary, ModelCorrector } from './services/corrector';
import { OllamaClient } from './services/ollama-client';
import { createGeminiClient } from './services/gemini-client';
import { createClipboardManager } from './managers/clipboard-manager';
import { HistoryManager } from './managers/history-manager';
import { SpeechHistory } from './managers/speech-history';
import { SettingsStore } from './managers/settings-store';

const logger = createLogger('CLI');

interface CLICommand {
  name: string;
  usage: string;
  description: string;
  execute: (args: string[]) => Promise<void>;
}

/**
 * 显示配置信息
 */
async function showConfig(): Promise<void> {
  console.log('\n⚙️ 当前配置\n');
  const config = getConfig();
  printConfigSummary(config);

  console.log('路径:');
  console.log(`  数据目录: ${config.paths.dataDir}`);
  console.log(`  历史目录: ${config.paths.historyDir}`);
  console.log(`  状态文件: ${config.paths.stateFile}\n`);
}

/**
 * 读取服务写出的状态文件
 */
async function showStatus(): Promise<void> {
  const config = getConfig();
  const result = await readStateFile(config.paths.stateFile);
  if (!result.success) {
    console.error(`❌ 无法读取状态文件（服务是否在运行？）: ${formatError(result.error)}`);
    process.exitCode = 1;
    return;
  }

  const state = result.data;
  console.log('\n📊 服务状态\n');
  console.log(`  进程: ${state.pid}`);
  console.log(`  状态: ${state.state}${state.sessionId !== null ? ` (会话 #${state.sessionId}, ${state.triggerKind})` : ''}`);
  console.log(`  输出模式: ${state.outputMode}`);
  console.log(`  模型纠错: ${state.correctionEnabled ? '开启' : '关闭'}`);
  console.log(`  配置版本: ${state.configVersion}`);
  console.log(`  更新时间: ${state.updatedAt}`);

  if (state.recent.length > 0) {
    console.log('\n  最近输出:');
    state.recent
      .slice(-5)
      .reverse()
      .forEach((text, index) => console.log(`    ${index + 1}. ${text}`));
  }
  console.log();
}

async function showHistory(args: string[]): Promise<void> {
  const config = getConfig();
  const result = await new HistoryManager(config.paths.historyDir).query(args[0] ?? 'today');
  if (!result.success) {
    console.error(`❌ ${formatError(result.error)}`);
    process.exitCode = 1;
    return;
  }
  console.log(result.data);
}

async function showSpeechHistory(args: string[]): Promise<void> {
  const config = getConfig();
  const result = await new SpeechHistory(config.paths.historyDir).query(args[0] ?? 'today');
  if (!result.success) {
    console.error(`❌ ${formatError(result.error)}`);
    process.exitCode = 1;
    return;
  }
  console.log(result.data);
}

/**
 * 通过配置的输出后端输入一段文本
 */
async function deliverText(args: string[]): Promise<void> {
  const text = args.join(' ').trim();
  if (!text) {
    console.error('❌ 请提供要输入的文本');
    process.exitCode = 1;
    return;
  }

  const config = getConfig();
  const backends = createDeliveryBackends(config.deliver.backends, createClipboardManager(), {
    tool: config.deliver.injector,
    pasteKeys: config.deliver.pasteKeys,
    pasteDelayMs: config.deliver.pasteDelayMs,
    restoreClipboard: config.deliver.restoreClipboard,
    timeoutMs: config.deliver.timeoutMs,
  });

  console.log('⏳ 3 秒后输入，请切换到目标窗口...');
  await new Promise((resolve) => setTimeout(resolve, 3000));

  const result = await deliverWithFallback(backends, text, AbortSignal.timeout(config.deliver.timeoutMs));
  if (result.success) {
    console.log(`✅ 已通过 ${result.data} 输入`);
  } else {
    console.error(`❌ ${formatError(result.error)}`);
    process.exitCode = 1;
  }
}

/**
 * 对一段文本执行词典替换和模型纠错
 */
async function correctText(args: string[]): Promise<void> {
  const text = args.join(' ').trim();
  if (!text) {
    console.error('❌ 请提供要纠错的文本');
    process.exitCode = 1;
    return;
  }

  const config = getConfig();
  const settings = new SettingsStore({
    dataDir: config.paths.dataDir,
    outputMode: config.output.mode,
    correctionEnabled: config.correction.enabled,
  });
  const loaded = await settings.load();
  if (!loaded.success) {
    logger.warn('设置加载失败:', formatError(loaded.error));
  }

  const { dictionary } = settings.snapshot();
  const preprocessed = applyCorrectionDictionary(text, dictionary);
  console.log(`\n  原文: ${text}`);
  if (preprocessed.replacements.length > 0) {
    console.log(`  词典: ${preprocessed.text}`);
    console.log(`  替换: ${preprocessed.replacements.map((r) => `"${r.from}" → "${r.to}"`).join(', ')}`);
  }

  const generator =
    config.correction.engine === 'gemini'
      ? createGeminiClient(config.gemini)
      : new OllamaClient({
          baseUrl: config.correction.ollamaUrl,
          model: config.correction.ollamaModel,
          temperature: config.correction.temperature,
          maxTokens: config.correction.maxTokens,
        });
  const corrector = new ModelCorrector(generator, config.correction.engine, config.correction.temperature);

  const result = await corrector.correct({
    text: preprocessed.text,
    dictionary,
    signal: AbortSignal.timeout(config.correction.timeoutMs),
  });

  if (result.success) {
    console.log(`  纠正: ${result.data.text} (${result.data.latencyMs}ms)`);
    console.log(result.data.text === preprocessed.text ? '  ℹ️ 无需修改\n' : '  ✅ 检测到变化\n');
  } else {
    console.error(`  ❌ 纠错失败: ${formatError(result.error)}\n`);
    process.exitCode = 1;
  }
}

/**
 * 命令列表
 */
const commands: CLICommand[] = [
  { name: 'config', usage: 'config', description: '显示当前配置', execute: showConfig },
  { name: 'status', usage: 'status', description: '显示服务状态（读取状态文件）', execute: showStatus },
  { name: 'history', usage: 'history [date|list]', description: '听写历史报告', execute: showHistory },
  {
    name: 'speech-history',
    usage: 'speech-history [date|list]',
    description: '语音播报历史报告',
    execute: showSpeechHistory,
  },
  { name: 'deliver', usage: 'deliver <text>', description: '测试文本输出后端', execute: deliverText },
  { name: 'correct', usage: 'correct <text>', description: '测试词典替换与模型纠错', execute: correctText },
];

/**
 * 显示帮助
 */
function showHelp(): void {
  console.log('\n🎙️ voxline - 命令行工具\n');
  console.log('用法: npm run cli -- <command> [args]\n');
  console.log('可用命令:\n');

  commands.forEach((cmd) => {
    console.log(`  ${cmd.usage.padEnd(28)} ${cmd.description}`);
  });

  console.log('\n示例:');
  console.log('  npm run cli -- history list     # 列出有记录的日期');
  console.log('  npm run cli -- correct "teh api" # 测试纠错\n');
}

/**
 * 主函数
 */
async function main(): Promise<void> {
  const [commandName, ...rest] = process.argv.slice(2);

  if (!commandName || commandName === 'help' || commandName === '--help' || commandName === '-h') {
    showHelp();
    return;
  }

  const command = commands.find((cmd) => cmd.name === commandName);

  if (!command) {
    console.error(`❌ 未知命令: ${commandName}\n`);
    showHelp();
    process.exit(1);
  }

  try {
    await command.execute(rest);
  } catch (error) {
    console.error('\n❌ 执行失败:', formatError(error));
    process.exit(1);
  }
}

// 运行
main().catch((error: unknown) => {
  console.error('❌ 程序错误:', error);
  process.exit(1);
});
