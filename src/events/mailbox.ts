/**
 * Bounded per-subscriber buffer that delivers events off the publisher's call stack.
 */

export type Listener<E> = (event: E) => void | Promise<void>;

export interface MailboxOptions<E> {
  /** Maximum buffered events before droppable ones are discarded */
  capacity: number;
  /** Events that may be discarded (oldest first) when the buffer is full */
  isDroppable: (event: E) => boolean;
  /** Called when the listener throws or rejects */
  onError: (error: unknown, event: E) => void;
}

export class Mailbox<E> {
  private readonly buffer: E[] = [];
  private scheduled = false;
  private closed = false;
  private droppedCount = 0;
  private idleWaiters: (() => void)[] = [];

  constructor(
    private readonly listener: Listener<E>,
    private readonly options: MailboxOptions<E>
  ) {}

  /**
   * Enqueues an event. Never runs the listener synchronously.
   */
  push(event: E): void {
    if (this.closed) return;

    if (this.buffer.length >= this.options.capacity) {
      const index = this.buffer.findIndex((buffered) => this.options.isDroppable(buffered));
      if (index >= 0) {
        this.buffer.splice(index, 1);
        this.droppedCount++;
      } else if (this.options.isDroppable(event)) {
        this.droppedCount++;
        return;
      }
    }

    this.buffer.push(event);
    this.schedule();
  }

  /** Number of events discarded because the buffer was full */
  get dropped(): number {
    return this.droppedCount;
  }

  get size(): number {
    return this.buffer.length;
  }

  /**
   * Resolves once every buffered event has been delivered.
   */
  idle(): Promise<void> {
    if (!this.scheduled && this.buffer.length === 0) {
      return Promise.resolve();
    }
    return new Promise((resolve) => this.idleWaiters.push(resolve));
  }

  /**
   * Discards pending events and stops delivery.
   */
  close(): void {
    this.closed = true;
    this.buffer.length = 0;
    if (!this.scheduled) {
      this.notifyIdle();
    }
  }

  private schedule(): void {
    if (this.scheduled) return;
    this.scheduled = true;
    setImmediate(() => void this.drain());
  }

  private async drain(): Promise<void> {
    while (!this.closed && this.buffer.length > 0) {
      const event = this.buffer.shift();
      if (event === undefined) break;
      try {
        await this.listener(event);
      } catch (error) {
        this.options.onError(error, event);
      }
    }
    this.scheduled = false;
    this.notifyIdle();
  }

  private notifyIdle(): void {
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) resolve();
  }
}
