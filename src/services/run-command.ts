/**
 * 外部命令执行
 */

import { spawn } from 'child_process';
import { Result, ok, err } from '../utils/result';
import { CommandError } from '../utils/errors';

export interface RunCommandOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  stdin?: string | Buffer;
  timeoutMs?: number;
  signal?: AbortSignal;
}

export interface CommandOutput {
  stdout: string;
  stderr: string;
}

export type CommandRunner = (
  command: string,
  args: string[],
  options?: RunCommandOptions
) => Promise<Result<CommandOutput, CommandError>>;

/**
 * 执行命令并收集输出；非零退出、超时、中止都以 CommandError 返回
 */
export const runCommand: CommandRunner = (command, args, options = {}) =>
  new Promise((resolve) => {
    if (options.signal?.aborted) {
      resolve(err(new CommandError(`命令已取消: ${command}`)));
      return;
    }

    const child = spawn(command, args, {
      cwd: options.cwd,
      env: options.env,
      stdio: 'pipe',
    });

    let stdout = '';
    let stderr = '';
    let settled = false;
    let timeoutHandle: NodeJS.Timeout | undefined;

    const finish = (result: Result<CommandOutput, CommandError>): void => {
      if (settled) {
        return;
      }
      settled = true;
      if (timeoutHandle) {
        clearTimeout(timeoutHandle);
      }
      options.signal?.removeEventListener('abort', onAbort);
      resolve(result);
    };

    const onAbort = (): void => {
      child.kill('SIGKILL');
      finish(err(new CommandError(`命令已取消: ${command}`)));
    };

    if (options.timeoutMs && options.timeoutMs > 0) {
      timeoutHandle = setTimeout(() => {
        child.kill('SIGKILL');
        finish(err(new CommandError(`命令超时 (${options.timeoutMs}ms): ${command}`)));
      }, options.timeoutMs);
    }

    options.signal?.addEventListener('abort', onAbort, { once: true });

    child.stdout.on('data', (chunk: Buffer) => {
      stdout += chunk.toString();
    });

    child.stderr.on('data', (chunk: Buffer) => {
      stderr += chunk.toString();
    });

    child.on('error', (error) => {
      finish(err(new CommandError(`无法执行 ${command}: ${error.message}`, null, error)));
    });

    child.on('close', (code) => {
      if (code !== 0) {
        const suffix = stderr.trim() ? `\n${stderr.trim()}` : '';
        finish(err(new CommandError(`命令失败 (${code}): ${command}${suffix}`, code)));
        return;
      }

      finish(ok({ stdout, stderr }));
    });

    // 子进程提前退出时写 stdin 会 EPIPE，由 close 事件报告结果
    child.stdin.on('error', () => undefined);

    if (options.stdin !== undefined) {
      child.stdin.end(options.stdin);
    } else {
      child.stdin.end();
    }
  });

/**
 * 替换参数模板中的 {name} 占位符
 */
export function fillArgs(template: readonly string[], values: Record<string, string>): string[] {
  return template.map((arg) =>
    arg.replace(/\{(\w+)\}/g, (match, name: string) => (name in values ? values[name] : match))
  );
}
