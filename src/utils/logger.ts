/**
 * 分级日志工具
 *
 * 控制台输出带时间戳、前缀与颜色；设置 LOG_FILE 后同时以纯文本追加到文件。
 * 音频帧回调路径上不允许逐帧打日志。
 */

import { createWriteStream, mkdirSync, type WriteStream } from 'fs';
import { dirname } from 'path';
import { inspect } from 'util';

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

const LOG_LEVEL_NAMES: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: 'DEBUG',
  [LogLevel.INFO]: 'INFO',
  [LogLevel.WARN]: 'WARN',
  [LogLevel.ERROR]: 'ERROR',
  [LogLevel.SILENT]: 'SILENT',
};

const LOG_LEVEL_COLORS: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: '\x1b[36m', // Cyan
  [LogLevel.INFO]: '\x1b[32m', // Green
  [LogLevel.WARN]: '\x1b[33m', // Yellow
  [LogLevel.ERROR]: '\x1b[31m', // Red
  [LogLevel.SILENT]: '',
};

const RESET_COLOR = '\x1b[0m';

interface LoggerOptions {
  prefix?: string;
  minLevel?: LogLevel;
  enableColors?: boolean;
  enableTimestamp?: boolean;
}

/**
 * 文件输出（进程内共享一个追加流）
 */
let fileSink: WriteStream | null = null;

/**
 * 打开日志文件；传 null 关闭
 */
export function configureLogFile(filePath: string | null): void {
  if (fileSink) {
    fileSink.end();
    fileSink = null;
  }

  if (!filePath) {
    return;
  }

  mkdirSync(dirname(filePath), { recursive: true });
  fileSink = createWriteStream(filePath, { flags: 'a', encoding: 'utf-8' });
  fileSink.on('error', (error) => {
    console.error(`[Logger] 日志文件写入失败: ${error.message}`);
    fileSink = null;
  });
}

function formatArg(arg: unknown): string {
  if (typeof arg === 'string') {
    return arg;
  }
  if (arg instanceof Error) {
    return arg.stack ?? arg.message;
  }
  return inspect(arg, { depth: 4, breakLength: Infinity });
}

export class Logger {
  private prefix: string;
  private minLevel: LogLevel;
  private enableColors: boolean;
  private enableTimestamp: boolean;

  constructor(options: LoggerOptions = {}) {
    this.prefix = options.prefix || 'APP';
    this.minLevel = options.minLevel ?? LogLevel.INFO;
    this.enableColors = options.enableColors ?? true;
    this.enableTimestamp = options.enableTimestamp ?? true;
  }

  private shouldLog(level: LogLevel): boolean {
    return level >= this.minLevel;
  }

  private formatMessage(level: LogLevel, message: string, colored: boolean): string {
    const parts: string[] = [];

    if (this.enableTimestamp) {
      parts.push(`[${new Date().toISOString()}]`);
    }

    parts.push(`[${this.prefix}]`);

    const levelName = LOG_LEVEL_NAMES[level];
    if (colored) {
      parts.push(`${LOG_LEVEL_COLORS[level]}[${levelName}]${RESET_COLOR}`);
    } else {
      parts.push(`[${levelName}]`);
    }

    parts.push(message);

    return parts.join(' ');
  }

  private write(level: LogLevel, message: string, args: unknown[]): void {
    if (!this.shouldLog(level)) {
      return;
    }

    const colored = this.enableColors && Boolean(process.stdout.isTTY);
    const line = this.formatMessage(level, message, colored);

    switch (level) {
      case LogLevel.DEBUG:
        console.debug(line, ...args);
        break;
      case LogLevel.INFO:
        console.info(line, ...args);
        break;
      case LogLevel.WARN:
        console.warn(line, ...args);
        break;
      default:
        console.error(line, ...args);
    }

    if (fileSink) {
      const plain = this.formatMessage(level, message, false);
      const extra = args.length > 0 ? ' ' + args.map(formatArg).join(' ') : '';
      fileSink.write(`${plain}${extra}\n`);
    }
  }

  debug(message: string, ...args: unknown[]): void {
    this.write(LogLevel.DEBUG, message, args);
  }

  info(message: string, ...args: unknown[]): void {
    this.write(LogLevel.INFO, message, args);
  }

  warn(message: string, ...args: unknown[]): void {
    this.write(LogLevel.WARN, message, args);
  }

  error(message: string, ...args: unknown[]): void {
    this.write(LogLevel.ERROR, message, args);
  }

  /**
   * 记录带代码的错误
   */
  errorWithCode(code: string, message: string, ...args: unknown[]): void {
    this.error(`[${code}] ${message}`, ...args);
  }

  setLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  getLevel(): LogLevel {
    return this.minLevel;
  }

  /**
   * 创建子 Logger
   */
  child(childPrefix: string): Logger {
    return new Logger({
      prefix: `${this.prefix}:${childPrefix}`,
      minLevel: this.minLevel,
      enableColors: this.enableColors,
      enableTimestamp: this.enableTimestamp,
    });
  }
}

/**
 * 全局日志级别（从环境变量读取）
 */
export const parseLogLevel = (value: string | undefined): LogLevel => {
  switch (value?.toUpperCase()) {
    case 'DEBUG':
      return LogLevel.DEBUG;
    case 'INFO':
      return LogLevel.INFO;
    case 'WARN':
      return LogLevel.WARN;
    case 'ERROR':
      return LogLevel.ERROR;
    case 'SILENT':
      return LogLevel.SILENT;
    default:
      return process.env.DEBUG_MODE === 'true' ? LogLevel.DEBUG : LogLevel.INFO;
  }
};

/**
 * 创建 Logger 实例
 */
export const createLogger = (prefix: string, options?: Partial<LoggerOptions>): Logger => {
  return new Logger({
    prefix,
    minLevel: parseLogLevel(process.env.LOG_LEVEL),
    ...options,
  });
};
