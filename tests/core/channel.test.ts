import { describe, it, expect } from 'vitest';
import { BoundedChannel } from '../../src/core/channel';

describe('BoundedChannel', () => {
  it('rejects a non-positive capacity', () => {
    expect(() => new BoundedChannel<number>(0)).toThrow(RangeError);
  });

  it('refuses messages once full instead of blocking', () => {
    const channel = new BoundedChannel<number>(2);
    expect(channel.trySend(1)).toBe(true);
    expect(channel.trySend(2)).toBe(true);
    expect(channel.trySend(3)).toBe(false);
    expect(channel.size).toBe(2);
  });

  it('delivers messages in order', async () => {
    const channel = new BoundedChannel<string>(4);
    channel.trySend('a');
    channel.trySend('b');
    expect(await channel.receive()).toBe('a');
    expect(await channel.receive()).toBe('b');
  });

  it('hands a message straight to a waiting consumer', async () => {
    const channel = new BoundedChannel<number>(1);
    const pending = channel.receive();
    expect(channel.trySend(7)).toBe(true);
    expect(channel.size).toBe(0);
    expect(await pending).toBe(7);
  });

  it('allows only one waiting consumer', async () => {
    const channel = new BoundedChannel<number>(1);
    const first = channel.receive();
    await expect(channel.receive()).rejects.toThrow('通道只允许一个消费者');
    channel.close();
    expect(await first).toBeUndefined();
  });

  it('drains queued messages after close, then ends iteration', async () => {
    const channel = new BoundedChannel<number>(3);
    channel.trySend(1);
    channel.trySend(2);
    channel.close();
    expect(channel.trySend(3)).toBe(false);

    const received: number[] = [];
    for await (const item of channel) {
      received.push(item);
    }
    expect(received).toEqual([1, 2]);
  });
});
