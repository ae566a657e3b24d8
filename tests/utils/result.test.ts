import { describe, it, expect } from 'vitest';
import { err, fromPromise, isErr, isOk, ok, toError, tryCatch } from '../../src/utils/result';

describe('Result', () => {
  it('builds success and failure values', () => {
    expect(ok(1)).toEqual({ success: true, data: 1 });
    expect(err('bad')).toEqual({ success: false, error: 'bad' });
    expect(isOk(ok(1))).toBe(true);
    expect(isErr(err('bad'))).toBe(true);
  });

  it('captures thrown values', async () => {
    const thrown = tryCatch(() => JSON.parse('{'));
    expect(thrown.success).toBe(false);

    const rejected = await fromPromise(Promise.reject('nope'));
    expect(rejected.success).toBe(false);
    if (!rejected.success) {
      expect(rejected.error).toBeInstanceOf(Error);
      expect(rejected.error.message).toBe('nope');
    }
  });

  it('normalizes unknown values to Error', () => {
    const original = new Error('keep');
    expect(toError(original)).toBe(original);
    expect(toError(42).message).toBe('42');
  });
});
