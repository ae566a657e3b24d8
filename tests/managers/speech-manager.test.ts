import { describe, it, expect, afterEach, vi } from 'vitest';
import { SpeechManager, type SpeakOutcome } from '../../src/managers/speech-manager';
import { ReminderManager } from '../../src/managers/reminder-manager';
import type { SpeechHistoryStore, SpeechRecord } from '../../src/managers/speech-history';
import type { SpeechEngine } from '../../src/services/speech-engine';
import { Summarizer } from '../../src/services/summarizer';
import { CommandError, ValidationError } from '../../src/utils/errors';
import { ok, err, type Result } from '../../src/utils/result';

/**
 * 以 "Block" 开头的句子一直播放到被中止；"Broken" 开头的句子播放失败
 */
class FakeEngine implements SpeechEngine {
  readonly voice = 'test-voice';
  spoken: string[] = [];
  started: string[] = [];

  async speak(sentence: string, signal: AbortSignal): Promise<Result<void, Error>> {
    this.started.push(sentence);
    if (sentence.startsWith('Broken')) {
      return err(new CommandError('player crashed'));
    }
    if (sentence.startsWith('Block')) {
      await new Promise<void>((resolve) => signal.addEventListener('abort', () => resolve(), { once: true }));
      return err(new CommandError('killed'));
    }
    this.spoken.push(sentence);
    return ok(undefined);
  }
}

class MemorySpeechHistory implements SpeechHistoryStore {
  records: SpeechRecord[] = [];

  async append(record: SpeechRecord): Promise<Result<void, never>> {
    this.records.push(record);
    return ok(undefined);
  }

  async query(): Promise<Result<string, never>> {
    return ok('');
  }
}

function setup(reminderCount: number = 0, maxDirectChars: number = 200) {
  const engine = new FakeEngine();
  const history = new MemorySpeechHistory();
  const reminders = new ReminderManager({
    intervalSeconds: 5,
    escalation: 1,
    maxIntervalSeconds: 5,
    maxCount: reminderCount,
  });
  const speech = new SpeechManager(engine, new Summarizer(null, 1000), reminders, history, { maxDirectChars });
  return { engine, history, reminders, speech };
}

async function outcomeOf(pending: Promise<Result<SpeakOutcome, ValidationError>>): Promise<SpeakOutcome> {
  const result = await pending;
  if (!result.success) {
    throw result.error;
  }
  return result.data;
}

const tick = (): Promise<void> => new Promise((resolve) => setTimeout(resolve, 5));

describe('SpeechManager', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('speaks sentence by sentence and records the event', async () => {
    const { engine, history, speech } = setup();

    const outcome = await outcomeOf(speech.speak({ text: 'One. Two! Three?', eventType: 'stop' }));

    expect(engine.spoken).toEqual(['One.', 'Two!', 'Three?']);
    expect(outcome).toMatchObject({
      eventType: 'stop',
      sentences: 3,
      spokenSentences: 3,
      cancelled: false,
      summarized: false,
      inputChars: 16,
      spokenText: 'One. Two! Three?',
    });
    expect(history.records).toHaveLength(1);
    expect(history.records[0]).toMatchObject({ eventType: 'stop', voice: 'test-voice', reminderCount: 0, cancelled: false });
  });

  it('summarizes long text only when asked', async () => {
    const { engine, speech } = setup(0, 20);
    const text = 'The build finished. All tests passed. Deploy is next.';

    const summarized = await outcomeOf(speech.speak({ text, summarize: true }));
    expect(summarized).toMatchObject({ summarized: true, spokenText: 'The build finished. All tests passed.' });
    expect(engine.spoken).toEqual(['The build finished.', 'All tests passed.']);

    const direct = await outcomeOf(speech.speak({ text }));
    expect(direct).toMatchObject({ summarized: false, sentences: 3 });
  });

  it('stops between sentences when cancelled', async () => {
    const { engine, history, speech } = setup();

    const pending = outcomeOf(speech.speak({ text: 'Block here. Never spoken.' }));
    await tick();
    expect(speech.getStatus().speaking).toBe(true);
    expect(speech.cancel()).toBe(true);
    const outcome = await pending;

    expect(outcome).toMatchObject({ cancelled: true, sentences: 2, spokenSentences: 0 });
    expect(engine.started).toEqual(['Block here.']);
    expect(history.records[0].cancelled).toBe(true);
    expect(speech.cancel()).toBe(false);
  });

  it('lets a new request supersede the current one', async () => {
    const { engine, speech } = setup();

    const first = outcomeOf(speech.speak({ text: 'Block first.' }));
    await tick();
    const second = outcomeOf(speech.speak({ text: 'Second one.' }));

    expect((await first).cancelled).toBe(true);
    expect(await second).toMatchObject({ cancelled: false, spokenSentences: 1 });
    expect(engine.spoken).toEqual(['Second one.']);
    expect(speech.getStatus().generation).toBe(2);
  });

  it('stops playback when the engine fails', async () => {
    const { engine, speech } = setup();

    const outcome = await outcomeOf(speech.speak({ text: 'Fine. Broken now. Skipped.' }));

    expect(outcome).toMatchObject({ cancelled: false, sentences: 3, spokenSentences: 1 });
    expect(engine.started).toEqual(['Fine.', 'Broken now.']);
  });

  it('validates and runs background requests', async () => {
    const { engine, speech } = setup();

    const empty = speech.enqueue({ text: '   ' });
    expect(empty.success).toBe(false);
    if (!empty.success) {
      expect(empty.error.message).toBe('播报文本为空');
    }

    expect(speech.enqueue({ text: 'Queued.' }).success).toBe(true);
    await speech.idle();
    expect(engine.spoken).toEqual(['Queued.']);
  });

  it('repeats as a reminder until cancelled', async () => {
    vi.useFakeTimers();
    const { engine, history, speech } = setup(2);

    await outcomeOf(speech.speak({ text: 'Waiting for input.', eventType: 'permission', startReminder: true }));
    expect(speech.getStatus()).toMatchObject({ reminderActive: true, reminderCount: 0 });

    await vi.advanceTimersByTimeAsync(5000);
    await vi.waitFor(() => expect(history.records).toHaveLength(2));

    expect(engine.spoken).toEqual(['Waiting for input.', 'Waiting for input.']);
    expect(history.records[1]).toMatchObject({ eventType: 'permission', reminderCount: 1, cancelled: false });
    expect(speech.cancelReminder()).toBe(1);
    expect(speech.getStatus().reminderActive).toBe(false);

    await speech.shutdown();
  });

  it('does not start a reminder for a cancelled request', async () => {
    const { speech } = setup(2);

    const pending = outcomeOf(speech.speak({ text: 'Block me.', startReminder: true }));
    await tick();
    speech.cancel();
    await pending;

    expect(speech.getStatus().reminderActive).toBe(false);
  });
});
