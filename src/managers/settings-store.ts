/**
 * 运行时设置
 * 输出模式、纠错开关、偏置词表和纠错词典；每次修改版本号 +1，
 * 会话开始时取一份不可变快照，修改只影响之后的会话
 */

import { join } from 'path';
import { z } from 'zod';
import { createLogger } from '../utils/logger';
import { Result, ok, err } from '../utils/result';
import { FileSystemError, ValidationError } from '../utils/errors';
import { fileExists, readJsonFile, readTextFile, writeJsonFile, writeTextFile } from '../utils/file-adapter';
import { OutputMode, type ConfigSnapshot } from '../types/session';

const logger = createLogger('SettingsStore');

const CorrectionsSchema = z.record(z.string(), z.string());

export interface SettingsStoreOptions {
  /** vocabulary.txt 与 corrections.json 所在目录 */
  dataDir: string;
  outputMode: OutputMode;
  correctionEnabled: boolean;
}

export interface TeachResult {
  added: string[];
  total: number;
}

export interface CorrectionResult {
  updated: boolean;
  total: number;
}

export class SettingsStore {
  private current: ConfigSnapshot;
  private writeQueue: Promise<unknown> = Promise.resolve();
  private readonly vocabularyPath: string;
  private readonly correctionsPath: string;

  constructor(options: SettingsStoreOptions) {
    this.vocabularyPath = join(options.dataDir, 'vocabulary.txt');
    this.correctionsPath = join(options.dataDir, 'corrections.json');
    this.current = Object.freeze({
      version: 1,
      outputMode: options.outputMode,
      correctionEnabled: options.correctionEnabled,
      vocabulary: Object.freeze<string[]>([]),
      dictionary: Object.freeze<Record<string, string>>({}),
    });
  }

  /**
   * 从数据目录加载词表和词典；文件不存在时视为空
   */
  async load(): Promise<Result<ConfigSnapshot, FileSystemError>> {
    let vocabulary: string[] = [];
    if (await fileExists(this.vocabularyPath)) {
      const content = await readTextFile(this.vocabularyPath);
      if (!content.success) {
        return err(content.error);
      }
      vocabulary = parseVocabulary(content.data);
    }

    let dictionary: Record<string, string> = {};
    if (await fileExists(this.correctionsPath)) {
      const corrections = await readJsonFile(this.correctionsPath, CorrectionsSchema);
      if (!corrections.success) {
        return err(corrections.error);
      }
      dictionary = corrections.data;
    }

    this.replace({ vocabulary, dictionary });
    logger.info(`✅ 设置已加载: 词表 ${vocabulary.length} 项, 纠错 ${Object.keys(dictionary).length} 项`);
    return ok(this.current);
  }

  /**
   * 当前配置快照
   */
  snapshot(): ConfigSnapshot {
    return this.current;
  }

  get version(): number {
    return this.current.version;
  }

  setOutputMode(mode: OutputMode): ConfigSnapshot {
    this.replace({ outputMode: mode });
    logger.info(`输出模式: ${mode}`);
    return this.current;
  }

  setCorrectionEnabled(enabled: boolean): ConfigSnapshot {
    this.replace({ correctionEnabled: enabled });
    logger.info(`模型纠错: ${enabled ? '开启' : '关闭'}`);
    return this.current;
  }

  /**
   * 添加偏置词，去重后排序写回 vocabulary.txt
   */
  teachVocabulary(terms: readonly string[]): Promise<Result<TeachResult, FileSystemError | ValidationError>> {
    return this.serialize(() => this.doTeachVocabulary(terms));
  }

  private async doTeachVocabulary(
    terms: readonly string[]
  ): Promise<Result<TeachResult, FileSystemError | ValidationError>> {
    const cleaned = terms.map((term) => term.trim()).filter((term) => term.length > 0);
    if (cleaned.length === 0) {
      return err(new ValidationError('没有提供词汇'));
    }

    const existing = new Set(this.current.vocabulary);
    const added = cleaned.filter((term) => {
      if (existing.has(term)) {
        return false;
      }
      existing.add(term);
      return true;
    });

    if (added.length === 0) {
      return ok({ added, total: existing.size });
    }

    const vocabulary = Array.from(existing).sort();
    const written = await writeTextFile(this.vocabularyPath, `${vocabulary.join('\n')}\n`);
    if (!written.success) {
      return err(written.error);
    }

    this.replace({ vocabulary });
    logger.info(`📚 新增词汇 ${added.length} 项: ${added.join(', ')}`);
    return ok({ added, total: vocabulary.length });
  }

  /**
   * 添加或更新一条纠错
   */
  addCorrection(wrong: string, right: string): Promise<Result<CorrectionResult, FileSystemError | ValidationError>> {
    return this.serialize(() => this.doAddCorrection(wrong, right));
  }

  private async doAddCorrection(
    wrong: string,
    right: string
  ): Promise<Result<CorrectionResult, FileSystemError | ValidationError>> {
    const key = wrong.trim();
    const value = right.trim();
    if (!key || !value) {
      return err(new ValidationError('纠错的原词和目标词都不能为空'));
    }

    const updated = Object.hasOwn(this.current.dictionary, key);
    const dictionary = { ...this.current.dictionary, [key]: value };
    const written = await writeJsonFile(this.correctionsPath, dictionary);
    if (!written.success) {
      return err(written.error);
    }

    this.replace({ dictionary });
    logger.info(`${updated ? '更新' : '新增'}纠错: "${key}" → "${value}"`);
    return ok({ updated, total: Object.keys(dictionary).length });
  }

  /**
   * 删除一条纠错，返回是否存在过
   */
  removeCorrection(wrong: string): Promise<Result<boolean, FileSystemError>> {
    return this.serialize(() => this.doRemoveCorrection(wrong));
  }

  private async doRemoveCorrection(wrong: string): Promise<Result<boolean, FileSystemError>> {
    const key = wrong.trim();
    if (!Object.hasOwn(this.current.dictionary, key)) {
      return ok(false);
    }

    const dictionary = Object.fromEntries(
      Object.entries(this.current.dictionary).filter(([existing]) => existing !== key)
    );
    const written = await writeJsonFile(this.correctionsPath, dictionary);
    if (!written.success) {
      return err(written.error);
    }

    this.replace({ dictionary });
    logger.info(`删除纠错: "${key}"`);
    return ok(true);
  }

  /**
   * 文件写入依次执行，避免并发修改互相覆盖
   */
  private serialize<T>(task: () => Promise<T>): Promise<T> {
    const run = this.writeQueue.then(task);
    this.writeQueue = run.catch((error: unknown) => {
      logger.error('设置写入异常:', error);
    });
    return run;
  }

  private replace(changes: Partial<Omit<ConfigSnapshot, 'version'>>): void {
    const next = { ...this.current, ...changes, version: this.current.version + 1 };
    this.current = Object.freeze({
      ...next,
      vocabulary: Object.freeze([...next.vocabulary]),
      dictionary: Object.freeze({ ...next.dictionary }),
    });
  }
}

/**
 * 解析词表文件：每行一项，# 开头为注释
 */
export function parseVocabulary(content: string): string[] {
  const terms = content
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith('#'));
  return Array.from(new Set(terms));
}
