/**
 * 剪贴板管理器
 */

import clipboardy from 'clipboardy';
import { createLogger } from '../utils/logger';
import { Result, ok, err, tryCatchAsync } from '../utils/result';
import { AppError } from '../utils/errors';

const logger = createLogger('ClipboardManager');

/**
 * 剪贴板操作错误
 */
export class ClipboardError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 'CLIPBOARD_ERROR', details);
    this.name = 'ClipboardError';
  }
}

/**
 * 剪贴板读写（可替换为测试实现）
 */
export interface ClipboardAdapter {
  read(): Promise<string>;
  write(text: string): Promise<void>;
}

const systemClipboard: ClipboardAdapter = {
  read: () => clipboardy.read(),
  write: (text) => clipboardy.write(text),
};

export class ClipboardManager {
  private lastBackup: string | null = null;

  constructor(private readonly adapter: ClipboardAdapter = systemClipboard) {}

  /**
   * 读取剪贴板内容
   */
  async read(): Promise<Result<string, ClipboardError>> {
    const result = await tryCatchAsync(() => this.adapter.read());

    if (result.success) {
      logger.debug(`读取剪贴板: ${result.data.length} 字符`);
      return ok(result.data);
    }

    return err(new ClipboardError('读取剪贴板失败', result.error));
  }

  /**
   * 写入剪贴板内容，backup 为真时先备份当前内容
   */
  async write(text: string, backup: boolean = true): Promise<Result<void, ClipboardError>> {
    if (backup) {
      const current = await this.read();
      if (current.success) {
        this.lastBackup = current.data;
        logger.debug('已备份当前剪贴板内容');
      } else {
        logger.debug(`剪贴板备份失败，继续写入: ${current.error.message}`);
      }
    }

    const result = await tryCatchAsync(() => this.adapter.write(text));

    if (result.success) {
      logger.debug(`✅ 写入剪贴板: ${text.length} 字符`);
      return ok(undefined);
    }

    return err(new ClipboardError('写入剪贴板失败', result.error));
  }

  /**
   * 恢复备份的内容
   */
  async restore(): Promise<Result<void, ClipboardError>> {
    const backup = this.lastBackup;
    if (backup === null) {
      return err(new ClipboardError('没有备份内容'));
    }

    const result = await tryCatchAsync(() => this.adapter.write(backup));
    this.lastBackup = null;

    if (result.success) {
      logger.debug('✅ 剪贴板已恢复');
      return ok(undefined);
    }

    return err(new ClipboardError('恢复剪贴板失败', result.error));
  }

  hasBackup(): boolean {
    return this.lastBackup !== null;
  }
}

/**
 * 创建剪贴板管理器
 */
export function createClipboardManager(adapter?: ClipboardAdapter): ClipboardManager {
  return new ClipboardManager(adapter);
}
