/**
 * Event Channel
 *
 * Bounded, in-order queue between the scheduler and one consumer.
 * publish() waits while the buffer is full, so a slow consumer slows the
 * scheduler down instead of growing memory.
 *
 *   const channel = new EventChannel(256);
 *   scheduler = new ConversionScheduler({ engines, sink: channel });
 *   for await (const event of channel) render(event);
 */

import type { ConversionEvent, EventSink } from '@vconvert/core';

type Reader = (result: IteratorResult<ConversionEvent>) => void;

export class EventChannel implements EventSink, AsyncIterable<ConversionEvent> {
  private readonly capacity: number;
  private readonly buffer: ConversionEvent[] = [];
  private readonly readers: Reader[] = [];
  private readonly writers: Array<() => void> = [];
  private closed = false;

  constructor(capacity: number = 256) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Event channel capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
  }

  get size(): number {
    return this.buffer.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Enqueue an event, waiting for room. Events published after close()
   * are dropped.
   */
  async publish(event: ConversionEvent): Promise<void> {
    while (!this.closed && this.buffer.length >= this.capacity) {
      await new Promise<void>((resolve) => this.writers.push(resolve));
    }
    if (this.closed) return;

    const reader = this.readers.shift();
    if (reader) {
      reader({ value: event, done: false });
    } else {
      this.buffer.push(event);
    }
  }

  /**
   * Stop accepting events. Buffered events are still delivered.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;

    for (const reader of this.readers.splice(0)) {
      reader({ value: undefined, done: true });
    }
    for (const writer of this.writers.splice(0)) {
      writer();
    }
  }

  [Symbol.asyncIterator](): AsyncIterator<ConversionEvent> {
    return {
      next: () => this.next(),
      return: async (): Promise<IteratorResult<ConversionEvent>> => {
        // Consumer went away; release blocked publishers
        this.close();
        this.buffer.length = 0;
        return { value: undefined, done: true };
      },
    };
  }

  private next(): Promise<IteratorResult<ConversionEvent>> {
    const event = this.buffer.shift();
    if (event) {
      this.writers.shift()?.();
      return Promise.resolve({ value: event, done: false });
    }

    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true });
    }

    return new Promise((resolve) => this.readers.push(resolve));
  }
}
