import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { tmpdir } from 'os';
import { join } from 'path';
import { readStateFile, StateFileWriter, type StateSnapshot } from '../../src/services/state-file';
import { makeTempDir, removePath } from '../../src/utils/file-adapter';
import { OutputMode, SessionState } from '../../src/types/session';
import { TriggerKind } from '../../src/types/trigger';

function snapshot(state: SessionState, sessionId: number | null): StateSnapshot {
  return {
    pid: 4242,
    state,
    sessionId,
    triggerKind: sessionId === null ? null : TriggerKind.MANUAL,
    outputMode: OutputMode.CORRECTED,
    correctionEnabled: true,
    configVersion: 3,
    recent: ['first text'],
    updatedAt: '2026-10-18T09:00:00.000Z',
  };
}

describe('StateFileWriter', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir('state-file-', tmpdir());
  });

  afterEach(async () => {
    await removePath(dir);
  });

  it('writes the latest snapshot', async () => {
    const filePath = join(dir, 'nested', 'state.json');
    const writer = new StateFileWriter(filePath);

    await Promise.all([
      writer.write(snapshot(SessionState.RECORDING, 1)),
      writer.write(snapshot(SessionState.PROCESSING, 1)),
      writer.write(snapshot(SessionState.IDLE, null)),
    ]);
    await writer.flush();

    const read = await readStateFile(filePath);
    expect(read).toEqual({ success: true, data: snapshot(SessionState.IDLE, null) });
  });

  it('fails to read a missing file', async () => {
    const read = await readStateFile(join(dir, 'missing.json'));

    expect(read.success).toBe(false);
  });
});
