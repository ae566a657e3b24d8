/**
 * Gemini AI 客户端封装
 */

import { GoogleGenerativeAI, type GenerativeModel, type Part } from '@google/generative-ai';
import { createHash } from 'crypto';
import type { GeminiConfig } from '../core/config';
import { createLogger } from '../utils/logger';
import { Result, ok, err } from '../utils/result';
import { ModelError } from '../utils/errors';

const logger = createLogger('GeminiClient');

/**
 * 生成请求
 */
export interface GenerateRequest {
  prompt: string;
  /** 内联音频（WAV） */
  audio?: Buffer;
  signal?: AbortSignal;
  temperature?: number;
  /** 输出长度上限 */
  maxTokens?: number;
}

/**
 * 文本生成客户端（Gemini / Ollama 共用的最小接口）
 */
export interface TextGenerator {
  readonly model: string;
  generate(request: GenerateRequest): Promise<Result<string, ModelError>>;
}

export class GeminiClient implements TextGenerator {
  private readonly generativeModel: GenerativeModel;
  readonly model: string;

  constructor(config: GeminiConfig) {
    if (!config.apiKey) {
      logger.error('Gemini API Key 未配置');
      throw new ModelError('Gemini API Key 未配置');
    }

    this.model = config.model;
    this.generativeModel = new GoogleGenerativeAI(config.apiKey).getGenerativeModel({ model: config.model });

    logger.info(`Gemini 客户端初始化成功 (${config.model})`);
    logger.debug(`API 密钥指纹: ${createHash('sha256').update(config.apiKey).digest('hex').substring(0, 12)}`);
  }

  async generate(request: GenerateRequest): Promise<Result<string, ModelError>> {
    const parts: Part[] = [{ text: request.prompt }];
    if (request.audio) {
      parts.push({ inlineData: { data: request.audio.toString('base64'), mimeType: 'audio/wav' } });
    }

    try {
      const result = await this.generativeModel.generateContent(
        {
          contents: [{ role: 'user', parts }],
          generationConfig: {
            temperature: request.temperature,
            maxOutputTokens: request.maxTokens,
          },
        },
        { signal: request.signal }
      );

      const text = result.response.text().trim();
      if (!text) {
        return err(new ModelError('Gemini 返回空响应'));
      }

      return ok(text);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);

      if (message.includes('401') || message.toUpperCase().includes('UNAUTHORIZED')) {
        return err(new ModelError('Gemini API 认证失败，请检查 GEMINI_API_KEY 配置', 401, error));
      }

      return err(new ModelError(`Gemini 请求失败: ${message}`, undefined, error));
    }
  }

  /**
   * 健康检查
   */
  async checkHealth(): Promise<Result<boolean, ModelError>> {
    logger.debug('执行 Gemini 健康检查...');
    const result = await this.generate({ prompt: 'health check ping' });
    return result.success ? ok(true) : err(result.error);
  }
}

/**
 * 创建 Gemini 客户端
 */
export function createGeminiClient(config: GeminiConfig): GeminiClient {
  return new GeminiClient(config);
}
