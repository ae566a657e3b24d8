/**
 * 文本输出
 *
 * 后端按配置顺序尝试，第一个成功的为准；全部失败时返回汇总错误，不抛出。
 */

import { createLogger } from '../utils/logger';
import { Result, ok, err, tryCatchAsync } from '../utils/result';
import { CancellationRequested, DeliveryError } from '../utils/errors';
import { sleep } from '../utils/backoff';
import { runCommand, type CommandRunner } from './run-command';
import type { ClipboardManager } from '../managers/clipboard-manager';

const logger = createLogger('Delivery');

/**
 * 输出后端
 */
export interface DeliveryBackend {
  readonly name: string;
  deliver(text: string, signal: AbortSignal): Promise<Result<void, Error>>;
}

export type InjectorTool = 'xdotool' | 'ydotool' | 'wtype' | 'dotool';

/**
 * Linux evdev 键码（ydotool 使用）
 */
const EVDEV_KEYCODES: Record<string, number> = {
  ctrl: 29,
  shift: 42,
  alt: 56,
  super: 125,
  v: 47,
  insert: 110,
};

/**
 * 各工具的输入命令
 */
export function buildTypeCommand(tool: InjectorTool, text: string): { command: string; args: string[]; stdin?: string } {
  switch (tool) {
    case 'xdotool':
      return { command: 'xdotool', args: ['type', '--clearmodifiers', '--delay', '0', '--', text] };
    case 'ydotool':
      return { command: 'ydotool', args: ['type', '--', text] };
    case 'wtype':
      return { command: 'wtype', args: ['--', text] };
    case 'dotool':
      return { command: 'dotool', args: [], stdin: `type ${text.replace(/\n/g, ' ')}\n` };
  }
}

function parseKeys(keys: string): string[] {
  return keys
    .toLowerCase()
    .split('+')
    .map((part) => part.trim())
    .filter(Boolean);
}

/**
 * 该工具无法发送的键名；只有 ydotool 依赖键码表
 */
export function unsupportedKeys(tool: InjectorTool, keys: string): string[] {
  if (tool !== 'ydotool') {
    return [];
  }
  return parseKeys(keys).filter((part) => !(part in EVDEV_KEYCODES));
}

/**
 * 各工具的组合键命令，keys 形如 "ctrl+v"；ydotool 不认识的键名被跳过
 */
export function buildKeysCommand(tool: InjectorTool, keys: string): { command: string; args: string[]; stdin?: string } {
  const parts = parseKeys(keys);

  switch (tool) {
    case 'xdotool':
      return { command: 'xdotool', args: ['key', '--clearmodifiers', parts.join('+')] };
    case 'ydotool': {
      const codes = parts.filter((part) => part in EVDEV_KEYCODES).map((part) => EVDEV_KEYCODES[part]);
      const down = codes.map((code) => `${code}:1`);
      const up = [...codes].reverse().map((code) => `${code}:0`);
      return { command: 'ydotool', args: ['key', ...down, ...up] };
    }
    case 'wtype': {
      const modifiers = parts.slice(0, -1);
      const key = parts[parts.length - 1] ?? 'v';
      return {
        command: 'wtype',
        args: [...modifiers.flatMap((m) => ['-M', m]), key, ...modifiers.flatMap((m) => ['-m', m])],
      };
    }
    case 'dotool':
      return { command: 'dotool', args: [], stdin: `key ${parts.join('+')}\n` };
  }
}

/**
 * 直接模拟键盘输入
 */
export class KeyInjectionBackend implements DeliveryBackend {
  readonly name: string;

  constructor(
    private readonly tool: InjectorTool,
    private readonly timeoutMs: number,
    private readonly runner: CommandRunner = runCommand
  ) {
    this.name = `type:${tool}`;
  }

  async deliver(text: string, signal: AbortSignal): Promise<Result<void, Error>> {
    const { command, args, stdin } = buildTypeCommand(this.tool, text);
    const result = await this.runner(command, args, { stdin, timeoutMs: this.timeoutMs, signal });
    return result.success ? ok(undefined) : err(result.error);
  }
}

export interface ClipboardPasteOptions {
  tool: InjectorTool;
  pasteKeys: string;
  pasteDelayMs: number;
  restoreClipboard: boolean;
  timeoutMs: number;
}

/**
 * 写剪贴板后发送粘贴快捷键
 */
export class ClipboardPasteBackend implements DeliveryBackend {
  readonly name: string;

  constructor(
    private readonly clipboard: ClipboardManager,
    private readonly options: ClipboardPasteOptions,
    private readonly runner: CommandRunner = runCommand
  ) {
    this.name = `paste:${options.tool}`;
  }

  async deliver(text: string, signal: AbortSignal): Promise<Result<void, Error>> {
    const unknown = unsupportedKeys(this.options.tool, this.options.pasteKeys);
    if (unknown.length > 0) {
      return err(new DeliveryError(`${this.options.tool} 不支持的按键: ${unknown.join(', ')}`));
    }

    const written = await this.clipboard.write(text, this.options.restoreClipboard);
    if (!written.success) {
      return err(written.error);
    }

    const { command, args, stdin } = buildKeysCommand(this.options.tool, this.options.pasteKeys);
    const pasted = await this.runner(command, args, { stdin, timeoutMs: this.options.timeoutMs, signal });
    if (!pasted.success) {
      return err(pasted.error);
    }

    if (this.options.restoreClipboard && this.clipboard.hasBackup()) {
      // 等目标应用读完剪贴板再恢复
      await sleep(this.options.pasteDelayMs, signal);
      const restored = await this.clipboard.restore();
      if (!restored.success) {
        logger.warn(`剪贴板恢复失败: ${restored.error.message}`);
      }
    }

    return ok(undefined);
  }
}

/**
 * 只写剪贴板，由用户自行粘贴
 */
export class ClipboardOnlyBackend implements DeliveryBackend {
  readonly name = 'clipboard';

  constructor(private readonly clipboard: ClipboardManager) {}

  async deliver(text: string): Promise<Result<void, Error>> {
    const written = await this.clipboard.write(text, false);
    return written.success ? ok(undefined) : err(written.error);
  }
}

/**
 * 依次尝试各后端，返回成功的后端名
 */
export async function deliverWithFallback(
  backends: readonly DeliveryBackend[],
  text: string,
  signal: AbortSignal
): Promise<Result<string, DeliveryError | CancellationRequested>> {
  if (backends.length === 0) {
    return err(new DeliveryError('未配置任何输出后端'));
  }

  const failures: string[] = [];

  for (const backend of backends) {
    if (signal.aborted) {
      return err(new CancellationRequested('deliver'));
    }

    // 后端抛出异常与返回 err 同样处理
    const attempt = await tryCatchAsync(() => backend.deliver(text, signal));
    const result = attempt.success ? attempt.data : attempt;
    if (result.success) {
      logger.info(`✅ 文本已输出 (${backend.name}, ${text.length} 字符)`);
      return ok(backend.name);
    }

    failures.push(`${backend.name}: ${result.error.message}`);
    logger.warn(`输出后端 ${backend.name} 失败，尝试下一个: ${result.error.message}`);
  }

  return err(new DeliveryError(`所有输出后端均失败: ${failures.join(' | ')}`, failures));
}

/**
 * 按配置顺序构造后端
 */
export function createDeliveryBackends(
  names: readonly ('paste' | 'type' | 'clipboard')[],
  clipboard: ClipboardManager,
  options: ClipboardPasteOptions,
  runner: CommandRunner = runCommand
): DeliveryBackend[] {
  return names.map((name) => {
    switch (name) {
      case 'type':
        return new KeyInjectionBackend(options.tool, options.timeoutMs, runner);
      case 'paste':
        return new ClipboardPasteBackend(clipboard, options, runner);
      case 'clipboard':
        return new ClipboardOnlyBackend(clipboard);
    }
  });
}
