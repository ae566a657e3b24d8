/**
 * Ollama 本地模型客户端
 */

import { z } from 'zod';
import { createLogger } from '../utils/logger';
import { Result, ok, err } from '../utils/result';
import { ModelError } from '../utils/errors';
import type { GenerateRequest, TextGenerator } from './gemini-client';

const logger = createLogger('OllamaClient');

const GenerateResponseSchema = z.object({
  response: z.string(),
});

export interface OllamaClientOptions {
  baseUrl: string;
  model: string;
  /** 未在请求中指定时的默认温度 */
  temperature: number;
  maxTokens: number;
  fetchImpl?: typeof fetch;
}

export class OllamaClient implements TextGenerator {
  readonly model: string;
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: OllamaClientOptions) {
    this.model = options.model;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  /**
   * 调用 /api/generate（非流式）
   */
  async generate(request: GenerateRequest): Promise<Result<string, ModelError>> {
    if (request.audio) {
      return err(new ModelError('Ollama 不支持音频输入'));
    }

    const url = `${this.options.baseUrl.replace(/\/+$/, '')}/api/generate`;
    const body = {
      model: this.model,
      prompt: request.prompt,
      stream: false,
      options: {
        temperature: request.temperature ?? this.options.temperature,
        num_predict: request.maxTokens ?? this.options.maxTokens,
      },
    };

    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(body),
        signal: request.signal,
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.debug(`Ollama 请求失败: ${message}`);
      return err(new ModelError(`无法连接 Ollama (${url}): ${message}`, undefined, error));
    }

    if (!response.ok) {
      return err(new ModelError(`Ollama 返回 HTTP ${response.status}`, response.status));
    }

    let payload: unknown;
    try {
      payload = await response.json();
    } catch (error) {
      return err(new ModelError('Ollama 响应不是合法 JSON', response.status, error));
    }

    const parsed = GenerateResponseSchema.safeParse(payload);
    if (!parsed.success) {
      return err(new ModelError('Ollama 响应缺少 response 字段', response.status, parsed.error.errors));
    }

    const text = parsed.data.response.trim();
    if (!text) {
      return err(new ModelError('Ollama 返回空响应'));
    }

    return ok(text);
  }

  /**
   * 检查 Ollama 服务是否可达
   */
  async checkHealth(signal?: AbortSignal): Promise<boolean> {
    try {
      const response = await this.fetchImpl(`${this.options.baseUrl.replace(/\/+$/, '')}/api/tags`, { signal });
      return response.ok;
    } catch (error) {
      logger.debug(`Ollama 不可达: ${error instanceof Error ? error.message : String(error)}`);
      return false;
    }
  }
}
