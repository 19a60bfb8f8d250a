/**
 * Simple event channel for batching and consuming events
 * 用于批处理和消费事件的简单事件通道
 */
export class EventChannel<T> {
  private q: T[] = [];

  /**
   * Emit an event to the channel
   * 向通道发出事件
   */
  emit(event: T): void {
    this.q.push(event);
  }

  /**
   * Consume all queued events in emission order. Events emitted by the
   * handler stay queued for the next drain.
   * 按发出顺序消费所有排队事件。处理函数中新发出的事件留待下次消费。
   */
  drain(fn: (event: T) => void): void {
    const batch = this.takeAll();
    for (const event of batch) {
      fn(event);
    }
  }

  /**
   * Take all events and clear the queue (for batch processing)
   * 取出所有事件并清空队列（用于批处理）
   */
  takeAll(): T[] {
    const out = this.q;
    this.q = [];
    return out;
  }

  /**
   * Queued events without consuming them
   * 查看排队事件但不消费
   */
  peek(): readonly T[] {
    return this.q;
  }

  get size(): number {
    return this.q.length;
  }

  get hasEvents(): boolean {
    return this.q.length > 0;
  }

  /**
   * Clear all events without processing
   * 清空所有事件而不处理
   */
  clear(): void {
    this.q = [];
  }
}
