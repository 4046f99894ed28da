/**
 * Pipe
 * Unbuffered asynchronous channel carrying migration progress events
 */

import { PipeClosedError } from '../errors';
import type { MigrationFile } from '../files/migration-file';

/**
 * A progress event: the file a step is working on, an error, or free text.
 */
export type PipeEvent = MigrationFile | Error | string;

interface PendingSend<T> {
  event: T;
  resolve: () => void;
}

type Receiver<T> = (result: IteratorResult<T, undefined>) => void;

/**
 * Rendezvous channel. `send` settles only once a reader has taken the event,
 * so a producer never runs ahead of its consumer.
 *
 * @example
 * ```typescript
 * const pipe = new Pipe();
 * void producer(pipe);
 * for await (const event of pipe) {
 *   render(event);
 * }
 * ```
 */
export class Pipe<T = PipeEvent> implements AsyncIterable<T> {
  private readonly senders: PendingSend<T>[] = [];
  private readonly receivers: Receiver<T>[] = [];
  private closed = false;

  get isClosed(): boolean {
    return this.closed;
  }

  send(event: T): Promise<void> {
    if (this.closed) {
      return Promise.reject(new PipeClosedError());
    }

    const receiver = this.receivers.shift();
    if (receiver) {
      receiver({ value: event, done: false });
      return Promise.resolve();
    }

    return new Promise<void>((resolve) => {
      this.senders.push({ event, resolve });
    });
  }

  /**
   * Next event, or `done` once the pipe is closed and drained.
   */
  receive(): Promise<IteratorResult<T, undefined>> {
    const sender = this.senders.shift();
    if (sender) {
      sender.resolve();
      return Promise.resolve({ value: sender.event, done: false });
    }

    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true });
    }

    return new Promise((resolve) => {
      this.receivers.push(resolve);
    });
  }

  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;

    for (const receiver of this.receivers.splice(0)) {
      receiver({ value: undefined, done: true });
    }
  }

  [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
    return {
      next: () => this.receive(),
    };
  }
}
