import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { tmpdir } from 'os';
import { join } from 'path';
import { z } from 'zod';
import { DailyJsonlStore, formatLocalDate, formatLocalTime, isDateString } from '../../src/managers/daily-store';
import { appendTextFile, makeTempDir, removePath } from '../../src/utils/file-adapter';

const EntrySchema = z.object({ n: z.number() });

describe('date helpers', () => {
  it('formats local dates and times with padding', () => {
    expect(formatLocalDate(new Date(2026, 0, 5, 7, 8, 9))).toBe('2026-01-05');
    expect(formatLocalTime(new Date(2026, 0, 5, 7, 8, 9))).toBe('07:08:09');
  });

  it('recognises date strings', () => {
    expect(isDateString('2026-10-18')).toBe(true);
    expect(isDateString('2026-10-18-tts')).toBe(false);
    expect(isDateString('today')).toBe(false);
  });
});

describe('DailyJsonlStore', () => {
  let dir: string;
  let today: Date;
  let store: DailyJsonlStore<{ n: number }>;

  beforeEach(async () => {
    dir = await makeTempDir('daily-', tmpdir());
    today = new Date(2026, 9, 17, 10, 0, 0);
    store = new DailyJsonlStore({ dir, schema: EntrySchema, now: () => today });
  });

  afterEach(async () => {
    await removePath(dir);
  });

  it('writes one file per day and lists the newest first', async () => {
    await store.append({ n: 1 });
    today = new Date(2026, 9, 18, 10, 0, 0);
    await store.append({ n: 2 });
    await store.append({ n: 3 });

    expect(await store.listDates()).toEqual({ success: true, data: ['2026-10-18', '2026-10-17'] });
    expect(await store.load('2026-10-17')).toEqual({ success: true, data: [{ n: 1 }] });
    expect(await store.load('today')).toEqual({ success: true, data: [{ n: 2 }, { n: 3 }] });
  });

  it('returns the most recent records across days, oldest first', async () => {
    await store.append({ n: 1 });
    await store.append({ n: 2 });
    today = new Date(2026, 9, 18, 10, 0, 0);
    await store.append({ n: 3 });

    expect(await store.recent(2)).toEqual({ success: true, data: [{ n: 2 }, { n: 3 }] });
    expect(await store.recent(10)).toEqual({ success: true, data: [{ n: 1 }, { n: 2 }, { n: 3 }] });
  });

  it('skips corrupted lines', async () => {
    await appendTextFile(join(dir, '2026-10-17.jsonl'), '{"n":1}\nnot json\n{"m":2}\n\n{"n":4}\n');

    expect(await store.load('2026-10-17')).toEqual({ success: true, data: [{ n: 1 }, { n: 4 }] });
  });

  it('keeps suffixed stores apart', async () => {
    const tts = new DailyJsonlStore({ dir, suffix: '-tts', schema: EntrySchema, now: () => today });
    await store.append({ n: 1 });
    await tts.append({ n: 9 });

    expect(tts.fileFor('today')).toBe(join(dir, '2026-10-17-tts.jsonl'));
    expect(await tts.load('today')).toEqual({ success: true, data: [{ n: 9 }] });
    expect(await store.listDates()).toEqual({ success: true, data: ['2026-10-17'] });
    expect(await tts.listDates()).toEqual({ success: true, data: ['2026-10-17'] });
  });

  it('returns no records for a missing day', async () => {
    expect(await store.load('2020-01-01')).toEqual({ success: true, data: [] });
  });
});
