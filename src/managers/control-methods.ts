/**
 * 控制接口方法注册
 * dictation.* 读写运行时设置和最近记录；speech.* 控制语音播报
 */

import { z } from 'zod';
import { RpcError, ValidationError } from '../utils/errors';
import type { Result } from '../utils/result';
import { RPC_HANDLER_ERROR, RPC_INVALID_PARAMS, type RpcRouter } from '../services/rpc-router';
import { OutputMode } from '../types/session';
import type { HistoryStore } from './history-manager';
import type { Orchestrator } from './orchestrator';
import type { SettingsStore } from './settings-store';
import type { SpeechManager } from './speech-manager';
import type { SpeechHistoryStore } from './speech-history';

const NoParams = z.object({}).strict();
const DateParams = z.object({ date: z.string().default('today') });

export interface ControlTargets {
  orchestrator: Orchestrator;
  settings: SettingsStore;
  history: HistoryStore;
  recentLimit: number;
  /** 流水线没有纠错器时不能开启纠错 */
  correctionAvailable: boolean;
  /** 语音播报禁用时为 null，不注册 speech.* */
  speech: SpeechManager | null;
  speechHistory: SpeechHistoryStore | null;
}

/**
 * Result 失败时转成 RPC 错误；校验错误对应 -32602
 */
function unwrap<T>(result: Result<T, Error>): T {
  if (result.success) {
    return result.data;
  }
  const code = result.error instanceof ValidationError ? RPC_INVALID_PARAMS : RPC_HANDLER_ERROR;
  throw new RpcError(result.error.message, code);
}

export function registerControlMethods(router: RpcRouter, targets: ControlTargets): void {
  const { orchestrator, settings, history } = targets;

  router.register('dictation.getStatus', NoParams, async () => orchestrator.getStatus());

  router.register('dictation.setMode', z.object({ mode: z.nativeEnum(OutputMode) }), async ({ mode }) => {
    const snapshot = settings.setOutputMode(mode);
    return { outputMode: snapshot.outputMode, configVersion: snapshot.version };
  });

  router.register('dictation.setCorrection', z.object({ enabled: z.boolean() }), async ({ enabled }) => {
    if (enabled && !targets.correctionAvailable) {
      throw new RpcError('未配置纠错引擎，无法开启纠错', RPC_HANDLER_ERROR);
    }
    const snapshot = settings.setCorrectionEnabled(enabled);
    return { correctionEnabled: snapshot.correctionEnabled, configVersion: snapshot.version };
  });

  router.register(
    'dictation.teachVocabulary',
    z.object({ terms: z.array(z.string()).min(1) }),
    async ({ terms }) => {
      const result = unwrap(await settings.teachVocabulary(terms));
      return { ...result, configVersion: settings.version };
    }
  );

  router.register(
    'dictation.addCorrection',
    z.object({ wrong: z.string().min(1), right: z.string().min(1) }),
    async ({ wrong, right }) => {
      const result = unwrap(await settings.addCorrection(wrong, right));
      return { ...result, configVersion: settings.version };
    }
  );

  router.register('dictation.removeCorrection', z.object({ wrong: z.string().min(1) }), async ({ wrong }) => {
    const removed = unwrap(await settings.removeCorrection(wrong));
    return { removed, configVersion: settings.version };
  });

  router.register(
    'dictation.getRecent',
    z.object({ count: z.number().int().min(1).max(targets.recentLimit).default(5) }),
    async ({ count }) => ({ texts: orchestrator.getRecent(count) })
  );

  router.register('dictation.history', DateParams, async ({ date }) => ({ report: unwrap(await history.query(date)) }));

  router.register('dictation.cancel', NoParams, async () => ({ cancelled: await orchestrator.cancel() }));

  const { speech, speechHistory } = targets;
  if (!speech) {
    return;
  }

  router.register(
    'speech.speak',
    z.object({
      text: z.string(),
      summarize: z.boolean().default(false),
      eventType: z.string().min(1).default('manual'),
      startReminder: z.boolean().default(false),
    }),
    async (params) => {
      unwrap(speech.enqueue(params));
      return { status: 'speaking' };
    }
  );

  router.register('speech.cancel', NoParams, async () => {
    speech.cancel();
    return { status: 'cancelled' };
  });

  router.register('speech.cancelReminder', NoParams, async () => ({
    status: 'cancelled',
    remindersFired: speech.cancelReminder(),
  }));

  router.register('speech.status', NoParams, async () => speech.getStatus());

  if (speechHistory) {
    router.register('speech.history', DateParams, async ({ date }) => ({
      report: unwrap(await speechHistory.query(date)),
    }));
  }
}
