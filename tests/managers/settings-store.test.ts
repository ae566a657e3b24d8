import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { tmpdir } from 'os';
import { join } from 'path';
import { parseVocabulary, SettingsStore } from '../../src/managers/settings-store';
import { makeTempDir, readTextFile, removePath, writeTextFile } from '../../src/utils/file-adapter';
import { ValidationError } from '../../src/utils/errors';
import { OutputMode } from '../../src/types/session';

describe('SettingsStore', () => {
  let dir: string;
  let store: SettingsStore;

  beforeEach(async () => {
    dir = await makeTempDir('settings-', tmpdir());
    store = new SettingsStore({ dataDir: dir, outputMode: OutputMode.CORRECTED, correctionEnabled: true });
  });

  afterEach(async () => {
    await removePath(dir);
  });

  it('starts empty when no files exist', async () => {
    const loaded = await store.load();

    expect(loaded.success).toBe(true);
    expect(store.snapshot()).toEqual({
      version: 2,
      outputMode: OutputMode.CORRECTED,
      correctionEnabled: true,
      vocabulary: [],
      dictionary: {},
    });
  });

  it('loads vocabulary and corrections from the data directory', async () => {
    await writeTextFile(join(dir, 'vocabulary.txt'), '# project terms\nVitest\n\nKubernetes\nVitest\n');
    await writeTextFile(join(dir, 'corrections.json'), JSON.stringify({ 'cube control': 'kubectl' }));

    await store.load();

    expect(store.snapshot().vocabulary).toEqual(['Vitest', 'Kubernetes']);
    expect(store.snapshot().dictionary).toEqual({ 'cube control': 'kubectl' });
  });

  it('fails to load malformed corrections', async () => {
    await writeTextFile(join(dir, 'corrections.json'), JSON.stringify({ wrong: 3 }));

    const loaded = await store.load();

    expect(loaded.success).toBe(false);
  });

  it('bumps the version on every change and keeps old snapshots intact', () => {
    const before = store.snapshot();

    const after = store.setOutputMode(OutputMode.BOTH);
    store.setCorrectionEnabled(false);

    expect(before.outputMode).toBe(OutputMode.CORRECTED);
    expect(after.version).toBe(2);
    expect(store.version).toBe(3);
    expect(store.snapshot().correctionEnabled).toBe(false);
    expect(Object.isFrozen(store.snapshot())).toBe(true);
  });

  it('adds new vocabulary terms and writes them sorted', async () => {
    const taught = await store.teachVocabulary(['Vitest', ' Kubernetes ', 'Vitest', '']);

    expect(taught).toEqual({ success: true, data: { added: ['Vitest', 'Kubernetes'], total: 2 } });
    expect(await readTextFile(join(dir, 'vocabulary.txt'))).toEqual({ success: true, data: 'Kubernetes\nVitest\n' });
    expect(store.version).toBe(2);

    const again = await store.teachVocabulary(['Vitest']);
    expect(again).toEqual({ success: true, data: { added: [], total: 2 } });
    expect(store.version).toBe(2);
  });

  it('rejects empty vocabulary', async () => {
    const taught = await store.teachVocabulary(['  ']);

    expect(taught.success).toBe(false);
    if (!taught.success) {
      expect(taught.error).toBeInstanceOf(ValidationError);
    }
  });

  it('adds, updates and removes corrections', async () => {
    expect(await store.addCorrection('teh', 'the')).toEqual({ success: true, data: { updated: false, total: 1 } });
    expect(await store.addCorrection('teh ', 'THE')).toEqual({ success: true, data: { updated: true, total: 1 } });
    expect(store.snapshot().dictionary).toEqual({ teh: 'THE' });

    expect(await store.removeCorrection('teh')).toEqual({ success: true, data: true });
    expect(await store.removeCorrection('teh')).toEqual({ success: true, data: false });
    expect(await readTextFile(join(dir, 'corrections.json'))).toEqual({ success: true, data: '{}' });
  });

  it('applies concurrent edits in order', async () => {
    await Promise.all([store.addCorrection('a', '1'), store.addCorrection('b', '2'), store.addCorrection('c', '3')]);

    expect(store.snapshot().dictionary).toEqual({ a: '1', b: '2', c: '3' });
  });
});

describe('parseVocabulary', () => {
  it('skips comments and duplicates', () => {
    expect(parseVocabulary('# x\nfoo\n foo \nbar\n')).toEqual(['foo', 'bar']);
  });
});
