/**
 * 有界消息通道（多生产者、单消费者）
 *
 * 生产者调用 trySend，满了直接返回 false，不会阻塞帧回调。
 */

export class BoundedChannel<T> implements AsyncIterable<T> {
  private readonly items: T[] = [];
  private waiter: ((item: T | undefined) => void) | null = null;
  private closed = false;

  constructor(private readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`通道容量必须为正整数: ${capacity}`);
    }
  }

  /**
   * 投递消息；通道已满或已关闭时返回 false
   */
  trySend(item: T): boolean {
    if (this.closed) {
      return false;
    }

    if (this.waiter) {
      const resolve = this.waiter;
      this.waiter = null;
      resolve(item);
      return true;
    }

    if (this.items.length >= this.capacity) {
      return false;
    }

    this.items.push(item);
    return true;
  }

  /**
   * 取下一条消息；通道关闭且已取空时返回 undefined
   */
  receive(): Promise<T | undefined> {
    const next = this.items.shift();
    if (next !== undefined) {
      return Promise.resolve(next);
    }

    if (this.closed) {
      return Promise.resolve(undefined);
    }

    if (this.waiter) {
      return Promise.reject(new Error('通道只允许一个消费者'));
    }

    return new Promise((resolve) => {
      this.waiter = resolve;
    });
  }

  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;

    if (this.waiter) {
      const resolve = this.waiter;
      this.waiter = null;
      resolve(undefined);
    }
  }

  get size(): number {
    return this.items.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  async *[Symbol.asyncIterator](): AsyncIterator<T> {
    while (true) {
      const item = await this.receive();
      if (item === undefined) {
        return;
      }
      yield item;
    }
  }
}
