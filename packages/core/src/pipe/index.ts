/**
 * Pipe helpers
 */

import { Pipe, type PipeEvent } from './pipe';
import { INTERRUPT_NOTICE } from '../constants';
import { CloseError } from '../errors';

import type { InterruptWatcher } from './interrupts';

export { Pipe, type PipeEvent } from './pipe';
export {
  InterruptWatcher,
  watchInterrupts,
  type InterruptSource,
  type InterruptWatcherOptions,
} from './interrupts';

export function newPipe(): Pipe {
  return new Pipe();
}

/**
 * Send `error` when given, then close the pipe.
 */
export async function closePipe(pipe: Pipe, error?: Error): Promise<void> {
  if (error && !pipe.isClosed) {
    await pipe.send(error);
  }
  pipe.close();
}

/**
 * Drain the pipe until it closes and return the error events in order.
 */
export async function readErrors(pipe: Pipe): Promise<Error[]> {
  const errors: Error[] = [];
  for await (const event of pipe) {
    if (event instanceof Error) {
      errors.push(event);
    }
  }
  return errors;
}

type Next =
  | { kind: 'event'; result: IteratorResult<PipeEvent, undefined> }
  | { kind: 'interrupt'; count: number };

/**
 * Forward every event of `inner` to `outer` until `inner` closes.
 *
 * Returns `false` when an error (other than a {@link CloseError}) or an
 * interrupt notice passed through, or when an interrupt arrived. The first interrupt only queues a notice:
 * forwarding goes on until the inner producer closes, so a running step is
 * never cut short. A second interrupt forces a quit through the watcher.
 * The watcher is disposed on return.
 */
export async function waitAndRedirect(
  inner: Pipe,
  outer: Pipe,
  watcher?: InterruptWatcher,
): Promise<boolean> {
  let errorReceived = false;
  let abortRelayed = false;
  let interrupts = 0;

  const nextEvent = (): Promise<Next> =>
    inner.receive().then((result): Next => ({ kind: 'event', result }));
  const nextInterrupt = (): Promise<Next> | undefined =>
    watcher?.next().then((count): Next => ({ kind: 'interrupt', count }));

  const onInterrupt = async (count: number): Promise<void> => {
    const first = interrupts === 0;
    interrupts = count;
    if (first) {
      await outer.send(INTERRUPT_NOTICE);
    }
    if (count > 1) {
      watcher?.forceQuit();
    }
  };

  let pendingEvent = nextEvent();
  let pendingInterrupt = nextInterrupt();

  try {
    for (;;) {
      const next = pendingInterrupt
        ? await Promise.race([pendingEvent, pendingInterrupt])
        : await pendingEvent;

      if (next.kind === 'interrupt') {
        pendingInterrupt = nextInterrupt();
        await onInterrupt(next.count);
        continue;
      }

      if (next.result.done) {
        // an interrupt that lost the race against close still counts
        const received = watcher?.received ?? 0;
        if (received > interrupts) {
          await onInterrupt(received);
        }
        return !errorReceived && !abortRelayed && interrupts === 0;
      }

      const event = next.result.value;
      await outer.send(event);
      if (event instanceof Error) {
        // a failed close is reported but does not fail the run
        if (!(event instanceof CloseError)) {
          errorReceived = true;
        }
      } else if (event === INTERRUPT_NOTICE) {
        // a nested run was interrupted
        abortRelayed = true;
      }
      pendingEvent = nextEvent();
    }
  } finally {
    watcher?.dispose();
  }
}
