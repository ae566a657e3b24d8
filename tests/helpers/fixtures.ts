import { OutputMode, SessionStatus, type ConfigSnapshot, type HistoryRecord, type Session } from '../../src/types/session';
import { TriggerKind } from '../../src/types/trigger';

export function makeSnapshot(overrides: Partial<ConfigSnapshot> = {}): ConfigSnapshot {
  return {
    version: 1,
    outputMode: OutputMode.CORRECTED,
    correctionEnabled: true,
    vocabulary: [],
    dictionary: {},
    ...overrides,
  };
}

export function makeSession(overrides: Partial<Session> = {}): Session {
  return {
    id: 1,
    triggerKind: TriggerKind.MANUAL,
    startTime: Date.UTC(2026, 9, 18, 9, 30, 0),
    endTime: null,
    audioSamples: null,
    transcript: null,
    rawText: null,
    correctedText: null,
    finalText: null,
    deliveredText: null,
    correctionFailed: false,
    outputMode: OutputMode.CORRECTED,
    latencies: { transcribeMs: null, correctMs: null, deliverMs: null, totalMs: null },
    snapshot: makeSnapshot(),
    ...overrides,
  };
}

export function makeRecord(overrides: Partial<HistoryRecord> = {}): HistoryRecord {
  return {
    recordId: 'rec-1',
    sessionId: 1,
    timestamp: '2026-10-18T09:30:00.000Z',
    triggerKind: TriggerKind.MANUAL,
    status: SessionStatus.COMPLETED,
    failureReason: null,
    rawText: 'hello',
    correctedText: 'Hello.',
    finalText: 'Hello.',
    deliveredText: 'Hello.',
    correctionFailed: false,
    outputMode: OutputMode.CORRECTED,
    transcribeLatencyMs: 100,
    correctLatencyMs: 100,
    deliverLatencyMs: 100,
    totalLatencyMs: 300,
    audioDurationS: 1,
    charCount: 6,
    wordCount: 1,
    speedRatio: 3.33,
    configVersion: 1,
    ...overrides,
  };
}
