/**
 * 状态文件
 *
 * 编排器每次状态转换时写入当前状态，供外部脚本和 status 命令读取。
 * 外部对该文件的修改不会被读回。
 */

import { z } from 'zod';
import { createLogger } from '../utils/logger';
import { Result } from '../utils/result';
import { FileSystemError } from '../utils/errors';
import { readJsonFile, writeJsonFile } from '../utils/file-adapter';
import { OutputMode, SessionState } from '../types/session';
import { TriggerKind } from '../types/trigger';

const logger = createLogger('StateFile');

const StateSnapshotSchema = z.object({
  pid: z.number().int(),
  state: z.nativeEnum(SessionState),
  sessionId: z.number().int().nullable(),
  triggerKind: z.nativeEnum(TriggerKind).nullable(),
  outputMode: z.nativeEnum(OutputMode),
  correctionEnabled: z.boolean(),
  configVersion: z.number().int(),
  recent: z.array(z.string()),
  updatedAt: z.string(),
});

export type StateSnapshot = z.infer<typeof StateSnapshotSchema>;

/**
 * 状态写入器：写入串行执行，排队期间只保留最新一份
 */
export class StateFileWriter {
  private pending: StateSnapshot | null = null;
  private writeQueue: Promise<void> = Promise.resolve();

  constructor(private readonly filePath: string) {}

  write(snapshot: StateSnapshot): Promise<void> {
    this.pending = snapshot;
    this.writeQueue = this.writeQueue.then(() => this.writePending());
    return this.writeQueue;
  }

  private async writePending(): Promise<void> {
    const snapshot = this.pending;
    if (!snapshot) {
      return;
    }
    this.pending = null;

    const result = await writeJsonFile(this.filePath, snapshot);
    if (!result.success) {
      logger.warn(`状态文件写入失败: ${result.error.message}`);
    }
  }

  flush(): Promise<void> {
    return this.writeQueue;
  }
}

/**
 * 读取状态文件
 */
export function readStateFile(filePath: string): Promise<Result<StateSnapshot, FileSystemError>> {
  return readJsonFile(filePath, StateSnapshotSchema);
}
