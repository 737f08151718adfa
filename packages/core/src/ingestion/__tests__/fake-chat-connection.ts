/**
 * In-process ChatConnection for ingestor tests
 */
import type { ChatConnection } from '../types.js';

export class FakeChatConnection implements ChatConnection {
  readonly sent: string[] = [];
  private queue: Array<Uint8Array | Error | null> = [];
  private wake: (() => void) | null = null;
  private isClosed = false;

  get closed(): boolean {
    return this.isClosed;
  }

  /** Queue text as one received chunk */
  pushText(text: string): this {
    return this.pushBytes(new TextEncoder().encode(text));
  }

  pushBytes(bytes: Uint8Array): this {
    this.enqueue(bytes);
    return this;
  }

  /** Make the next read fail */
  fail(error: Error): this {
    this.enqueue(error);
    return this;
  }

  /** Remote end closes after the queued chunks */
  end(): this {
    this.enqueue(null);
    return this;
  }

  async send(text: string): Promise<void> {
    if (this.isClosed) {
      throw new Error('closed');
    }
    this.sent.push(text);
  }

  async *receive(): AsyncGenerator<Uint8Array> {
    while (!this.isClosed) {
      const next = this.queue.shift();
      if (next === undefined) {
        await new Promise<void>((resolve) => {
          this.wake = resolve;
        });
        continue;
      }
      if (next === null) {
        return;
      }
      if (next instanceof Error) {
        throw next;
      }
      yield next;
    }
  }

  close(): void {
    this.isClosed = true;
    this.wake?.();
    this.wake = null;
  }

  private enqueue(item: Uint8Array | Error | null): void {
    this.queue.push(item);
    this.wake?.();
    this.wake = null;
  }
}
