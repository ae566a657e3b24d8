/**
 * JSON-RPC 2.0 路由
 * 参数先经 zod 校验，再交给处理函数
 */

import { z } from 'zod';
import { createLogger } from '../utils/logger';
import { tryCatch } from '../utils/result';
import { RpcError, formatError } from '../utils/errors';

const logger = createLogger('RpcRouter');

export const RPC_PARSE_ERROR = -32700;
export const RPC_INVALID_REQUEST = -32600;
export const RPC_METHOD_NOT_FOUND = -32601;
export const RPC_INVALID_PARAMS = -32602;
export const RPC_HANDLER_ERROR = -32000;

type RpcId = string | number | null;

const RequestSchema = z.object({
  jsonrpc: z.literal('2.0').optional(),
  method: z.string().min(1),
  params: z.unknown().optional(),
  id: z.union([z.string(), z.number(), z.null()]).optional(),
});

interface JsonRpcResponse {
  jsonrpc: '2.0';
  result?: unknown;
  error?: { code: number; message: string; data?: unknown };
  id: RpcId;
}

type RegisteredHandler = (params: unknown) => Promise<unknown>;

function errorResponse(code: number, message: string, id: RpcId, data?: unknown): string {
  const response: JsonRpcResponse = {
    jsonrpc: '2.0',
    error: data === undefined ? { code, message } : { code, message, data },
    id,
  };
  return JSON.stringify(response);
}

function successResponse(result: unknown, id: RpcId): string {
  const response: JsonRpcResponse = { jsonrpc: '2.0', result: result ?? null, id };
  return JSON.stringify(response);
}

function requestId(value: unknown): RpcId {
  if (typeof value === 'object' && value !== null && 'id' in value) {
    const { id } = value;
    if (typeof id === 'string' || typeof id === 'number') {
      return id;
    }
  }
  return null;
}

export class RpcRouter {
  private readonly handlers = new Map<string, RegisteredHandler>();

  /**
   * 注册方法；params 缺省时按空对象校验
   */
  register<S extends z.ZodTypeAny>(
    method: string,
    schema: S,
    handler: (params: z.infer<S>) => Promise<unknown>
  ): void {
    this.handlers.set(method, async (params) => {
      const parsed = schema.safeParse(params ?? {});
      if (!parsed.success) {
        const issues = parsed.error.errors.map((issue) => `${issue.path.join('.') || 'params'}: ${issue.message}`);
        throw new RpcError(`参数无效: ${issues.join('; ')}`, RPC_INVALID_PARAMS, issues);
      }
      return handler(parsed.data);
    });
  }

  get methods(): string[] {
    return Array.from(this.handlers.keys()).sort();
  }

  /**
   * 处理一条请求，返回响应 JSON；通知（无 id）返回 null
   */
  async handle(raw: string): Promise<string | null> {
    const decoded = tryCatch((): unknown => JSON.parse(raw));
    if (!decoded.success) {
      return errorResponse(RPC_PARSE_ERROR, 'Parse error', null);
    }

    const request = RequestSchema.safeParse(decoded.data);
    if (!request.success) {
      return errorResponse(RPC_INVALID_REQUEST, 'Invalid request', requestId(decoded.data));
    }

    const { method, params } = request.data;
    const id = request.data.id ?? null;
    const isNotification = request.data.id === undefined;

    const handler = this.handlers.get(method);
    if (!handler) {
      return isNotification ? null : errorResponse(RPC_METHOD_NOT_FOUND, `Method not found: ${method}`, id);
    }

    try {
      const result = await handler(params);
      return isNotification ? null : successResponse(result, id);
    } catch (error) {
      logger.warn(`${method} 调用失败: ${formatError(error)}`);
      if (isNotification) {
        return null;
      }
      if (error instanceof RpcError) {
        return errorResponse(error.rpcCode, error.message, id, error.details);
      }
      return errorResponse(RPC_HANDLER_ERROR, error instanceof Error ? error.message : 'Internal error', id);
    }
  }
}
