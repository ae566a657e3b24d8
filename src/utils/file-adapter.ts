/**
 * 文件系统适配器
 */

import { promises as fs } from 'fs';
import { dirname, join } from 'path';
import type { z } from 'zod';
import { Result, ok, err, tryCatch, tryCatchAsync } from './result';
import { FileSystemError } from './errors';
import { createLogger } from './logger';

const logger = createLogger('FileAdapter');

/**
 * 读取文本文件
 */
export async function readTextFile(filePath: string): Promise<Result<string, FileSystemError>> {
  logger.debug(`读取文件: ${filePath}`);

  const result = await tryCatchAsync(() => fs.readFile(filePath, 'utf-8'));

  if (result.success) {
    return ok(result.data);
  }

  return err(new FileSystemError(`读取文件失败: ${filePath}`, result.error));
}

/**
 * 写入文本文件（先写临时文件再 rename，读者不会看到半截内容）
 */
export async function writeTextFile(
  filePath: string,
  content: string
): Promise<Result<void, FileSystemError>> {
  logger.debug(`写入文件: ${filePath}`);

  const result = await tryCatchAsync(async () => {
    await fs.mkdir(dirname(filePath), { recursive: true });
    const tmpPath = `${filePath}.${process.pid}.tmp`;
    await fs.writeFile(tmpPath, content, 'utf-8');
    await fs.rename(tmpPath, filePath);
  });

  if (result.success) {
    return ok(undefined);
  }

  return err(new FileSystemError(`写入文件失败: ${filePath}`, result.error));
}

/**
 * 追加内容到文件
 */
export async function appendTextFile(
  filePath: string,
  content: string
): Promise<Result<void, FileSystemError>> {
  logger.debug(`追加内容到文件: ${filePath}`);

  const result = await tryCatchAsync(async () => {
    await fs.mkdir(dirname(filePath), { recursive: true });
    await fs.appendFile(filePath, content, 'utf-8');
  });

  if (result.success) {
    return ok(undefined);
  }

  return err(new FileSystemError(`追加文件失败: ${filePath}`, result.error));
}

/**
 * 检查文件是否存在
 */
export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * 列出目录下的文件名；目录不存在时返回空列表
 */
export async function listFiles(dirPath: string): Promise<Result<string[], FileSystemError>> {
  if (!(await fileExists(dirPath))) {
    return ok([]);
  }

  const result = await tryCatchAsync(() => fs.readdir(dirPath));
  if (result.success) {
    return ok(result.data);
  }

  return err(new FileSystemError(`读取目录失败: ${dirPath}`, result.error));
}

/**
 * 读取并校验 JSON 文件
 */
export async function readJsonFile<T>(
  filePath: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): Promise<Result<T, FileSystemError>> {
  const readResult = await readTextFile(filePath);

  if (!readResult.success) {
    return err(readResult.error);
  }

  const parseResult = tryCatch((): unknown => JSON.parse(readResult.data));
  if (!parseResult.success) {
    return err(new FileSystemError(`解析 JSON 文件失败: ${filePath}`, parseResult.error));
  }

  const validated = schema.safeParse(parseResult.data);
  if (!validated.success) {
    return err(new FileSystemError(`JSON 文件格式不符: ${filePath}`, validated.error.errors));
  }

  return ok(validated.data);
}

/**
 * 写入 JSON 文件
 */
export async function writeJsonFile<T>(
  filePath: string,
  data: T,
  pretty: boolean = true
): Promise<Result<void, FileSystemError>> {
  const content = pretty ? JSON.stringify(data, null, 2) : JSON.stringify(data);
  return writeTextFile(filePath, content);
}

/**
 * 在临时目录中创建一个独占子目录
 */
export async function makeTempDir(prefix: string, baseDir: string): Promise<string> {
  return fs.mkdtemp(join(baseDir, prefix));
}

/**
 * 删除文件或目录（不存在时忽略）
 */
export async function removePath(targetPath: string): Promise<void> {
  await fs.rm(targetPath, { recursive: true, force: true });
}
