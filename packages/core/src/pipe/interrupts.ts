/**
 * Interrupt Watcher
 * Observes SIGINT while one step's events are being forwarded
 */

import { EventEmitter } from 'eventemitter3';

import { FORCE_QUIT_EXIT_CODE } from '../constants';

import type { InterruptMode } from '../types';

/**
 * Anything that emits `SIGINT`; `process` in production.
 */
export interface InterruptSource {
  on(event: 'SIGINT', listener: () => void): unknown;
  off(event: 'SIGINT', listener: () => void): unknown;
}

export interface InterruptWatcherOptions {
  source?: InterruptSource;
  /** Called on the second interrupt. Exits the process by default. */
  onForceQuit?: () => void;
}

interface InterruptEvents {
  interrupt: [count: number];
}

export class InterruptWatcher extends EventEmitter<InterruptEvents> {
  private readonly source: InterruptSource;
  private readonly onForceQuit: () => void;
  private count = 0;
  private delivered = 0;
  private disposed = false;

  private readonly listener = (): void => {
    this.count += 1;
    this.emit('interrupt', this.count);
  };

  constructor(options: InterruptWatcherOptions = {}) {
    super();
    this.source = options.source ?? process;
    this.onForceQuit = options.onForceQuit ?? (() => process.exit(FORCE_QUIT_EXIT_CODE));
    this.source.on('SIGINT', this.listener);
  }

  /** Interrupts seen since the watcher was armed */
  get received(): number {
    return this.count;
  }

  /**
   * Resolves with the running count on the next interrupt. Interrupts that
   * arrived since the previous call resolve at once.
   */
  next(): Promise<number> {
    if (this.count > this.delivered) {
      this.delivered = this.count;
      return Promise.resolve(this.count);
    }
    return new Promise((resolve) => {
      this.once('interrupt', (count) => {
        this.delivered = count;
        resolve(count);
      });
    });
  }

  forceQuit(): void {
    this.onForceQuit();
  }

  dispose(): void {
    if (this.disposed) {
      return;
    }
    this.disposed = true;
    this.source.off('SIGINT', this.listener);
    this.removeAllListeners();
  }
}

/**
 * A freshly armed watcher for graceful runs, `undefined` otherwise.
 */
export function watchInterrupts(
  mode: InterruptMode,
  options: InterruptWatcherOptions = {},
): InterruptWatcher | undefined {
  return mode === 'graceful' ? new InterruptWatcher(options) : undefined;
}
