import { describe, it, expect, vi } from 'vitest';
import { AudioRingBuffer } from '../../src/core/ring-buffer';

function frame(...values: number[]): Float32Array {
  return Float32Array.from(values);
}

describe('AudioRingBuffer', () => {
  it('keeps only the most recent pre-roll samples', () => {
    const buffer = new AudioRingBuffer(4, 16);
    buffer.write(frame(1, 2, 3));
    buffer.write(frame(4, 5, 6));
    expect(buffer.preRollAvailable).toBe(4);

    expect(buffer.beginCapture()).toBe(4);
    expect(Array.from(buffer.endCapture())).toEqual([3, 4, 5, 6]);
  });

  it('prepends pre-roll to captured frames', () => {
    const buffer = new AudioRingBuffer(2, 16);
    buffer.write(frame(1, 2, 3));
    buffer.beginCapture();
    buffer.write(frame(4, 5));
    buffer.write(frame(6));

    expect(buffer.capturedSamples).toBe(5);
    expect(Array.from(buffer.endCapture())).toEqual([2, 3, 4, 5, 6]);
  });

  it('captures nothing before the first frame when pre-roll is disabled', () => {
    const buffer = new AudioRingBuffer(0, 8);
    buffer.write(frame(1, 2));
    expect(buffer.beginCapture()).toBe(0);
    buffer.write(frame(3));
    expect(Array.from(buffer.endCapture())).toEqual([3]);
  });

  it('stops at the capture ceiling and reports it once', () => {
    const onFull = vi.fn();
    const buffer = new AudioRingBuffer(0, 4, onFull);
    buffer.beginCapture();
    buffer.write(frame(1, 2, 3));
    buffer.write(frame(4, 5, 6));
    buffer.write(frame(7));

    expect(onFull).toHaveBeenCalledTimes(1);
    expect(Array.from(buffer.endCapture())).toEqual([1, 2, 3, 4]);
  });

  it('allows only one capture at a time', () => {
    const buffer = new AudioRingBuffer(2, 8);
    buffer.beginCapture();
    expect(() => buffer.beginCapture()).toThrow('录音已在进行中');
    buffer.endCapture();
    expect(() => buffer.endCapture()).toThrow('当前没有进行中的录音');
  });

  it('hands out a fresh buffer for each capture', () => {
    const buffer = new AudioRingBuffer(0, 4);
    buffer.beginCapture();
    buffer.write(frame(1, 1));
    const first = buffer.endCapture();

    buffer.beginCapture();
    buffer.write(frame(2, 2));
    const second = buffer.endCapture();

    expect(Array.from(first)).toEqual([1, 1]);
    expect(Array.from(second)).toEqual([2, 2]);
  });
});
