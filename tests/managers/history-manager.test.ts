import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { tmpdir } from 'os';
import { buildHistoryRecord, HistoryManager, renderDateList, renderReport } from '../../src/managers/history-manager';
import { formatLocalTime } from '../../src/managers/daily-store';
import { makeTempDir, removePath } from '../../src/utils/file-adapter';
import { ValidationError } from '../../src/utils/errors';
import { SessionStatus } from '../../src/types/session';
import { makeRecord, makeSession } from '../helpers/fixtures';

const time = (iso: string): string => formatLocalTime(new Date(iso));

describe('buildHistoryRecord', () => {
  it('derives counts, duration and speed from the session', () => {
    const session = makeSession({
      id: 7,
      audioSamples: new Float32Array(32000),
      rawText: 'the cat sat',
      correctedText: 'The cat sat.',
      finalText: 'The cat sat.',
      deliveredText: 'The cat sat.',
      latencies: { transcribeMs: 600, correctMs: 300, deliverMs: 100, totalMs: 1000 },
    });

    const record = buildHistoryRecord({ session, status: SessionStatus.COMPLETED }, 16000, 'rec-7');

    expect(record).toMatchObject({
      recordId: 'rec-7',
      sessionId: 7,
      timestamp: '2026-10-18T09:30:00.000Z',
      status: SessionStatus.COMPLETED,
      failureReason: null,
      audioDurationS: 2,
      charCount: 12,
      wordCount: 3,
      speedRatio: 2,
      totalLatencyMs: 1000,
      configVersion: 1,
    });
  });

  it('records failures without text', () => {
    const record = buildHistoryRecord(
      { session: makeSession(), status: SessionStatus.FAILED, reason: 'no_speech' },
      16000,
      'rec-x'
    );

    expect(record).toMatchObject({ failureReason: 'no_speech', audioDurationS: 0, charCount: 0, wordCount: 0, speedRatio: 0 });
  });

  it('generates a record id when none is given', () => {
    const record = buildHistoryRecord({ session: makeSession(), status: SessionStatus.CANCELLED }, 16000);

    expect(record.recordId).toMatch(/^[0-9a-f-]{36}$/);
  });
});

describe('renderReport', () => {
  it('summarises completed sessions and lists failures', () => {
    const records = [
      makeRecord({
        timestamp: '2026-10-18T09:00:00.000Z',
        rawText: 'teh cat',
        correctedText: 'The cat.',
        charCount: 8,
        wordCount: 2,
        audioDurationS: 2,
        totalLatencyMs: 1000,
        transcribeLatencyMs: 400,
        correctLatencyMs: 300,
        deliverLatencyMs: 100,
        speedRatio: 2,
      }),
      makeRecord({
        timestamp: '2026-10-18T09:05:00.000Z',
        rawText: 'hello',
        correctedText: 'hello',
        charCount: 5,
        wordCount: 1,
        audioDurationS: 1,
        totalLatencyMs: 500,
        transcribeLatencyMs: 200,
        correctLatencyMs: null,
        deliverLatencyMs: 50,
        speedRatio: 2,
        correctionFailed: true,
      }),
      makeRecord({
        timestamp: '2026-10-18T09:10:00.000Z',
        status: SessionStatus.FAILED,
        failureReason: 'no_speech',
      }),
    ];

    expect(renderReport('2026-10-18', records).split('\n')).toEqual([
      '# Dictation Report - 2026-10-18',
      '',
      '## Summary',
      '- **Transcriptions**: 2',
      '- **Failed or cancelled**: 1',
      '- **Total characters**: 13',
      '- **Total words**: 3',
      '- **Total audio**: 3.0s',
      '- **Total processing time**: 1.5s',
      '- **Average speed ratio**: 2.0x',
      '- **Correction fallbacks**: 1',
      '',
      '## Latency Averages',
      '- Transcribe: 300ms',
      '- Correct: 300ms',
      '- Deliver: 75ms',
      '',
      '## Transcription Log',
      '',
      '| Time | Raw | Corrected | Chars | Speed |',
      '|------|-----|-----------|-------|-------|',
      `| ${time('2026-10-18T09:00:00.000Z')} | teh cat | The cat. | 8 | 2.0x |`,
      `| ${time('2026-10-18T09:05:00.000Z')} | hello | - | 5 | 2.0x |`,
      '',
      '## Failures',
      '',
      '| Time | Status | Reason |',
      '|------|--------|--------|',
      `| ${time('2026-10-18T09:10:00.000Z')} | failed | no_speech |`,
    ]);
  });

  it('reports an empty day', () => {
    expect(renderReport('2026-10-18', [])).toBe('# Dictation Report - 2026-10-18\n\nNo transcriptions recorded.');
  });
});

describe('renderDateList', () => {
  it('lists dates or says there are none', () => {
    expect(renderDateList(['2026-10-18', '2026-10-17'])).toBe('Available dates:\n- 2026-10-18\n- 2026-10-17');
    expect(renderDateList([])).toBe('No history recorded.');
  });
});

describe('HistoryManager', () => {
  let dir: string;
  let history: HistoryManager;

  beforeEach(async () => {
    dir = await makeTempDir('history-', tmpdir());
    history = new HistoryManager(dir, () => new Date(2026, 9, 18, 12, 0, 0));
  });

  afterEach(async () => {
    await removePath(dir);
  });

  it('appends records and reports them for today', async () => {
    await history.append(makeRecord({ sessionId: 1, rawText: 'first' }));
    await history.append(makeRecord({ sessionId: 2, rawText: 'second' }));
    await history.flush();

    const report = await history.query('today');
    expect(report.success).toBe(true);
    if (report.success) {
      expect(report.data.startsWith('# Dictation Report - 2026-10-18\n')).toBe(true);
      expect(report.data).toContain('- **Transcriptions**: 2');
    }

    expect(await history.query('list')).toEqual({ success: true, data: 'Available dates:\n- 2026-10-18' });

    const recent = await history.recent(1);
    expect(recent.success && recent.data.map((record) => record.sessionId)).toEqual([2]);
  });

  it('rejects malformed dates', async () => {
    const report = await history.query('yesterday');

    expect(report.success).toBe(false);
    if (!report.success) {
      expect(report.error).toBeInstanceOf(ValidationError);
    }
  });

  it('reports a day without a file as empty', async () => {
    expect(await history.query('2026-01-01')).toEqual({
      success: true,
      data: '# Dictation Report - 2026-01-01\n\nNo transcriptions recorded.',
    });
  });
});
