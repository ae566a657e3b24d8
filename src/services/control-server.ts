/**
 * 控制接口 HTTP 服务
 * POST /rpc 接收 JSON-RPC 请求，只监听本机地址
 */

import { createServer, type IncomingMessage, type Server, type ServerResponse } from 'http';
import { createLogger } from '../utils/logger';
import { Result, ok, err } from '../utils/result';
import { AppError } from '../utils/errors';
import type { RpcRouter } from './rpc-router';

const logger = createLogger('ControlServer');

/** 请求体上限 */
const MAX_BODY_BYTES = 1024 * 1024;

export class ControlServer {
  private server: Server | null = null;

  constructor(
    private readonly router: RpcRouter,
    private readonly host: string,
    private readonly port: number
  ) {}

  async start(): Promise<Result<number, AppError>> {
    if (this.server) {
      return err(new AppError('控制接口已在运行', 'CONTROL_ERROR'));
    }

    const server = createServer((req, res) => {
      this.handleRequest(req, res).catch((error: unknown) => {
        logger.error('请求处理异常:', error);
        if (!res.headersSent) {
          res.writeHead(500);
        }
        res.end();
      });
    });

    const listening = await new Promise<Result<number, AppError>>((resolve) => {
      server.once('error', (error) => {
        resolve(err(new AppError(`控制接口启动失败: ${error.message}`, 'CONTROL_ERROR', error)));
      });
      server.listen(this.port, this.host, () => {
        const address = server.address();
        const port = typeof address === 'object' && address !== null ? address.port : this.port;
        resolve(ok(port));
      });
    });

    if (listening.success) {
      this.server = server;
      logger.info(`🔌 控制接口已启动: http://${this.host}:${listening.data}/rpc`);
    }
    return listening;
  }

  async stop(): Promise<void> {
    const server = this.server;
    if (!server) {
      return;
    }
    this.server = null;

    await new Promise<void>((resolve) => {
      server.close(() => resolve());
      server.closeAllConnections();
    });
    logger.info('控制接口已关闭');
  }

  private async handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const path = (req.url ?? '').split('?')[0];

    if (req.method === 'GET' && path === '/health') {
      sendJson(res, 200, JSON.stringify({ status: 'ok', methods: this.router.methods }));
      return;
    }

    if (path !== '/rpc') {
      sendJson(res, 404, JSON.stringify({ error: 'Not found' }));
      return;
    }

    if (req.method !== 'POST') {
      res.writeHead(405, { Allow: 'POST' });
      res.end();
      return;
    }

    const body = await readBody(req);
    if (body === null) {
      sendJson(res, 413, JSON.stringify({ error: 'Payload too large' }));
      return;
    }

    const response = await this.router.handle(body);
    if (response === null) {
      res.writeHead(204);
      res.end();
      return;
    }

    sendJson(res, 200, response);
  }
}

function sendJson(res: ServerResponse, status: number, body: string): void {
  res.writeHead(status, { 'Content-Type': 'application/json' });
  res.end(body);
}

/**
 * 读取请求体；超过上限时返回 null
 */
function readBody(req: IncomingMessage): Promise<string | null> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;
    let tooLarge = false;

    req.on('data', (chunk: Buffer) => {
      size += chunk.length;
      if (size > MAX_BODY_BYTES) {
        tooLarge = true;
        return;
      }
      chunks.push(chunk);
    });
    req.on('end', () => resolve(tooLarge ? null : Buffer.concat(chunks).toString('utf-8')));
    req.on('error', reject);
  });
}
