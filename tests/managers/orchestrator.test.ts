import { describe, it, expect, vi, afterEach } from 'vitest';
import { createHarness, type Harness } from '../helpers/harness';
import { OutputMode, SessionState, SessionStatus, type SessionOutcome } from '../../src/types/session';
import { StopReason, TriggerKind } from '../../src/types/trigger';
import type { DeviceEvent } from '../../src/types/audio';

function deviceSettled(h: Harness): Promise<DeviceEvent> {
  return new Promise((resolve) => {
    const onDevice = (event: DeviceEvent): void => {
      if (event.type !== 'lost') {
        h.audio.off('device', onDevice);
        resolve(event);
      }
    };
    h.audio.on('device', onDevice);
  });
}

async function waitForState(h: Harness, state: SessionState): Promise<void> {
  await vi.waitFor(() => {
    expect(h.orchestrator.currentState).toBe(state);
  });
}

describe('Orchestrator', () => {
  let h: Harness;

  afterEach(async () => {
    await h.dispose();
  });

  it('runs a hotkey session from press to delivery', async () => {
    h = await createHarness();
    const transitions: string[] = [];
    h.orchestrator.on('stateChange', (from: SessionState, to: SessionState) => transitions.push(`${from}->${to}`));

    h.startManual();
    await h.orchestrator.settle();
    expect(h.orchestrator.getStatus().sessionId).toBe(1);
    expect(h.orchestrator.getStatus().triggerKind).toBe(TriggerKind.MANUAL);

    h.speak(2.0);
    h.stopManual();
    await h.orchestrator.settle();

    expect(transitions).toEqual(['idle->recording', 'recording->processing', 'processing->idle']);
    expect(h.backend.delivered).toEqual(['Hello world.']);
    expect(h.notifier.names).toEqual(['session-started', 'session-completed']);
    expect(h.notifier.events[1].payload).toEqual({ sessionId: 1, text: 'Hello world.' });

    expect(h.history.records).toHaveLength(1);
    const record = h.history.records[0];
    expect(record.status).toBe(SessionStatus.COMPLETED);
    expect(record.triggerKind).toBe(TriggerKind.MANUAL);
    expect(record.rawText).toBe('hello world');
    expect(record.finalText).toBe('Hello world.');
    expect(record.audioDurationS).toBe(2);
    expect(record.correctionFailed).toBe(false);

    expect(h.orchestrator.getRecent(5)).toEqual(['Hello world.']);
    expect(h.orchestrator.getStatus()).toMatchObject({
      state: SessionState.IDLE,
      sessionId: null,
      recentCount: 1,
      stats: { sessions: 1, completed: 1, failed: 0, cancelled: 0 },
    });
  });

  it('delivers the raw transcript when correction is disabled', async () => {
    h = await createHarness();
    h.settings.setCorrectionEnabled(false);

    h.startManual();
    await h.orchestrator.settle();
    h.speak(2.0);
    h.stopManual();
    await h.orchestrator.settle();

    expect(h.corrector.inputs).toEqual([]);
    expect(h.backend.delivered).toEqual(['hello world']);
    expect(h.history.records[0]).toMatchObject({
      finalText: 'hello world',
      correctedText: null,
      correctionFailed: false,
      audioDurationS: 2,
    });
  });

  it('includes pre-roll audio captured before the trigger', async () => {
    h = await createHarness();
    const stopped: number[] = [];
    h.orchestrator.on('recordingStopped', (_id: number, _reason: StopReason, samples: number) => stopped.push(samples));

    h.speak(0.5);
    h.startManual();
    await h.orchestrator.settle();
    h.speak(1.0);
    h.stopManual();
    await h.orchestrator.settle();

    expect(stopped).toEqual([24000]);
    expect(h.history.records[0].audioDurationS).toBe(1.5);
  });

  it('ignores a start while a session is recording', async () => {
    h = await createHarness();

    h.startManual();
    h.orchestrator.triggerSink({ type: 'start', kind: TriggerKind.WAKEWORD, at: Date.now() });
    await h.orchestrator.settle();

    expect(h.orchestrator.getStatus()).toMatchObject({
      state: SessionState.RECORDING,
      sessionId: 1,
      triggerKind: TriggerKind.MANUAL,
      stats: { sessions: 1, ignoredStarts: 1 },
    });
  });

  it('ignores a start while a session is processing', async () => {
    h = await createHarness();
    const release = h.transcriber.hold();

    h.startManual();
    await h.orchestrator.settle();
    h.speak(1.0);
    h.stopManual();
    await waitForState(h, SessionState.PROCESSING);

    h.startManual();
    await vi.waitFor(() => {
      expect(h.orchestrator.getStatus().stats.ignoredStarts).toBe(1);
    });

    release();
    await h.orchestrator.settle();
    expect(h.orchestrator.getStatus().stats).toMatchObject({ sessions: 1, completed: 1 });
  });

  it('ignores a stop from the other trigger kind', async () => {
    h = await createHarness();

    h.startManual();
    await h.orchestrator.settle();
    h.speak(1.0);
    h.orchestrator.triggerSink({ type: 'stop', kind: TriggerKind.WAKEWORD, reason: StopReason.SILENCE, at: Date.now() });
    await h.orchestrator.settle();
    expect(h.orchestrator.currentState).toBe(SessionState.RECORDING);

    h.stopManual();
    await h.orchestrator.settle();
    expect(h.orchestrator.currentState).toBe(SessionState.IDLE);
    expect(h.backend.delivered).toEqual(['Hello world.']);
  });

  it('stops a wake-word session after trailing silence', async () => {
    h = await createHarness();
    const stops: Array<{ reason: StopReason; samples: number }> = [];
    h.orchestrator.on('recordingStopped', (_id: number, reason: StopReason, samples: number) =>
      stops.push({ reason, samples })
    );

    h.orchestrator.triggerSink({ type: 'start', kind: TriggerKind.WAKEWORD, at: Date.now() });
    await h.orchestrator.settle();
    h.speak(0.5);
    for (let i = 0; i < 14; i++) {
      h.speak(0.1, 0);
    }
    await h.orchestrator.settle();
    expect(h.orchestrator.currentState).toBe(SessionState.RECORDING);

    h.speak(0.1, 0);
    await h.orchestrator.settle();

    expect(stops).toEqual([{ reason: StopReason.SILENCE, samples: 32000 }]);
    expect(h.history.records[0].triggerKind).toBe(TriggerKind.WAKEWORD);
    expect(h.history.records[0].status).toBe(SessionStatus.COMPLETED);
  });

  it('auto-stops a silent wake-word session and reports no speech', async () => {
    h = await createHarness();
    const reasons: StopReason[] = [];
    h.orchestrator.on('recordingStopped', (_id: number, reason: StopReason) => reasons.push(reason));

    h.orchestrator.triggerSink({ type: 'start', kind: TriggerKind.WAKEWORD, at: Date.now() });
    await h.orchestrator.settle();
    h.speak(1.6, 0);
    await h.orchestrator.settle();

    expect(reasons).toEqual([StopReason.SILENCE]);
    expect(h.transcriber.calls).toBe(0);
    expect(h.history.records[0]).toMatchObject({ status: SessionStatus.FAILED, failureReason: 'no_speech' });
  });

  it('does not watch for silence in hotkey sessions', async () => {
    h = await createHarness();

    h.startManual();
    await h.orchestrator.settle();
    h.speak(0.5);
    h.speak(2.0, 0);
    await h.orchestrator.settle();

    expect(h.orchestrator.currentState).toBe(SessionState.RECORDING);
  });

  it('stops when the capture buffer is full', async () => {
    h = await createHarness({ audio: { maxCaptureSeconds: 1 } });
    const stops: Array<{ reason: StopReason; samples: number }> = [];
    h.orchestrator.on('recordingStopped', (_id: number, reason: StopReason, samples: number) =>
      stops.push({ reason, samples })
    );

    h.startManual();
    await h.orchestrator.settle();
    h.speak(1.0);
    await h.orchestrator.settle();

    expect(stops).toEqual([{ reason: StopReason.CEILING, samples: 16000 }]);
  });

  it('stops when the recording ceiling elapses', async () => {
    h = await createHarness({ orchestrator: { maxRecordingSeconds: 0.05 } });
    const reasons: StopReason[] = [];
    h.orchestrator.on('recordingStopped', (_id: number, reason: StopReason) => reasons.push(reason));

    h.startManual();
    await h.orchestrator.settle();
    h.speak(1.0);
    await vi.waitFor(() => {
      expect(reasons).toEqual([StopReason.CEILING]);
    });
    await h.orchestrator.settle();

    expect(h.history.records[0].status).toBe(SessionStatus.COMPLETED);
  });

  it('falls back to the raw text when correction times out', async () => {
    h = await createHarness({ pipeline: { correctTimeoutMs: 30 } });
    h.corrector.hang = true;

    h.startManual();
    await h.orchestrator.settle();
    h.speak(1.0);
    h.stopManual();
    await h.orchestrator.settle();

    expect(h.backend.delivered).toEqual(['hello world']);
    expect(h.history.records[0]).toMatchObject({
      status: SessionStatus.COMPLETED,
      correctionFailed: true,
      correctedText: null,
      deliveredText: 'hello world',
    });
  });

  it('keeps the configuration captured at session start', async () => {
    h = await createHarness();

    h.startManual();
    await h.orchestrator.settle();
    h.settings.setOutputMode(OutputMode.RAW);
    h.speak(1.0);
    h.stopManual();
    await h.orchestrator.settle();

    h.startManual();
    await h.orchestrator.settle();
    h.speak(1.0);
    h.stopManual();
    await h.orchestrator.settle();

    expect(h.backend.delivered).toEqual(['Hello world.', 'hello world']);
    expect(h.history.records.map((record) => [record.outputMode, record.configVersion])).toEqual([
      [OutputMode.CORRECTED, 1],
      [OutputMode.RAW, 2],
    ]);
  });

  it('reports nothing to cancel when idle', async () => {
    h = await createHarness();

    expect(await h.orchestrator.cancel()).toBe(false);
  });

  it('cancels a recording and discards its audio', async () => {
    h = await createHarness();

    h.startManual();
    await h.orchestrator.settle();
    h.speak(0.5);

    expect(await h.orchestrator.cancel()).toBe(true);
    expect(h.audio.isCapturing()).toBe(false);
    expect(h.orchestrator.currentState).toBe(SessionState.IDLE);
    await h.orchestrator.settle();

    expect(h.transcriber.calls).toBe(0);
    expect(h.notifier.events[1]).toEqual({
      event: 'session-failed',
      payload: { sessionId: 1, reason: 'cancelled', message: undefined },
    });
    expect(h.history.records[0]).toMatchObject({ status: SessionStatus.CANCELLED, failureReason: 'cancelled' });
  });

  it('cancels processing and drops the late result', async () => {
    h = await createHarness();
    const release = h.transcriber.hold();

    h.startManual();
    await h.orchestrator.settle();
    h.speak(1.0);
    h.stopManual();
    await waitForState(h, SessionState.PROCESSING);

    expect(await h.orchestrator.cancel()).toBe(true);
    await h.orchestrator.settle();
    release();

    expect(h.backend.delivered).toEqual([]);
    expect(h.orchestrator.getStatus().stats).toMatchObject({ cancelled: 1, completed: 0, staleResults: 1 });
    expect(h.history.records.map((record) => record.status)).toEqual([SessionStatus.CANCELLED]);

    h.startManual();
    await h.orchestrator.settle();
    expect(h.orchestrator.getStatus().sessionId).toBe(2);
  });

  it('fails a recording when the device is lost and recovers afterwards', async () => {
    h = await createHarness();
    const settled = deviceSettled(h);

    h.startManual();
    await h.orchestrator.settle();
    h.speak(0.5);
    h.device.fail();
    expect(await settled).toEqual({ type: 'recovered', attempts: 1 });
    await h.orchestrator.settle();

    expect(h.history.records[0]).toMatchObject({ status: SessionStatus.FAILED, failureReason: 'device_lost' });
    expect(h.notifier.events[1].payload.reason).toBe('device_lost');
    expect(h.orchestrator.getStatus()).toMatchObject({ state: SessionState.IDLE, deviceAvailable: true });
  });

  it('keeps processing when the device drops after recording', async () => {
    h = await createHarness();
    const release = h.transcriber.hold();
    const settled = deviceSettled(h);

    h.startManual();
    await h.orchestrator.settle();
    h.speak(1.0);
    h.stopManual();
    await waitForState(h, SessionState.PROCESSING);

    h.device.fail();
    await settled;
    release();
    await h.orchestrator.settle();

    expect(h.backend.delivered).toEqual(['Hello world.']);
    expect(h.history.records[0].status).toBe(SessionStatus.COMPLETED);
  });

  it('emits fatal when the device cannot be reopened', async () => {
    h = await createHarness();
    const fatal = new Promise<Error>((resolve) => h.orchestrator.once('fatal', resolve));

    h.device.failNextOpens(5);
    h.device.fail();
    const error = await fatal;

    expect(error.message).toBe('音频设备重连 1 次均失败: 打开音频设备失败: 模拟设备打开失败');
    expect(h.orchestrator.getStatus().deviceAvailable).toBe(false);

    h.startManual();
    await h.orchestrator.settle();
    expect(h.orchestrator.getStatus().stats.ignoredStarts).toBe(1);
  });

  it('lists recent deliveries newest first', async () => {
    h = await createHarness();
    h.orchestrator.seedRecent(['older']);

    h.startManual();
    await h.orchestrator.settle();
    h.speak(1.0);
    h.stopManual();
    await h.orchestrator.settle();

    expect(h.orchestrator.getRecent(5)).toEqual(['Hello world.', 'older']);
    expect(h.orchestrator.getRecent(1)).toEqual(['Hello world.']);
  });

  it('keeps at most one session open across mixed triggers', async () => {
    h = await createHarness();
    let seed = 20241017;
    const next = (): number => {
      seed = (seed * 48271) % 2147483647;
      return seed / 2147483647;
    };

    let open = 0;
    let maxOpen = 0;
    const completed: number[] = [];
    h.orchestrator.on('stateChange', (_from: SessionState, to: SessionState) => {
      if (to === SessionState.RECORDING) {
        open++;
        maxOpen = Math.max(maxOpen, open);
      }
    });
    h.orchestrator.on('sessionComplete', (outcome: SessionOutcome) => {
      open--;
      completed.push(outcome.session.id);
    });

    const kinds = [TriggerKind.MANUAL, TriggerKind.WAKEWORD];
    for (let step = 0; step < 200; step++) {
      const roll = next();
      const kind = kinds[Math.floor(next() * kinds.length)];
      if (roll < 0.3) {
        h.orchestrator.triggerSink({ type: 'start', kind, at: Date.now() });
      } else if (roll < 0.55) {
        h.orchestrator.triggerSink({ type: 'stop', kind, reason: StopReason.RELEASE, at: Date.now() });
      } else if (roll < 0.65) {
        await h.orchestrator.cancel();
      } else if (roll < 0.8) {
        h.speak(0.5);
      } else if (roll < 0.85) {
        h.speak(2.0, 0);
      } else {
        await h.orchestrator.settle();
      }
    }

    await h.orchestrator.settle();
    await h.orchestrator.cancel();
    await h.orchestrator.settle();

    const { stats } = h.orchestrator.getStatus();
    expect(maxOpen).toBe(1);
    expect(open).toBe(0);
    expect(stats.sessions).toBeGreaterThan(1);
    expect(completed).toEqual(Array.from({ length: stats.sessions }, (_, index) => index + 1));
    expect(stats.completed + stats.failed + stats.cancelled).toBe(stats.sessions);
    expect(h.history.records).toHaveLength(stats.sessions);
    expect(h.orchestrator.currentState).toBe(SessionState.IDLE);
  });
});
