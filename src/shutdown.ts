import type { EventEmitter } from 'events';
import type { EventLog } from './utils/logger/EventLog.js';

export const SHUTDOWN_SIGNALS = ['SIGINT', 'SIGTERM'] as const;

/**
 * Collects the reasons the process should stop. Sources can be watched before
 * anything awaits the outcome; a trigger that arrives early is kept until
 * `wait()` is called.
 */
export class ShutdownController {
  private exitCode?: number;
  private readonly waiters: Array<(code: number) => void> = [];

  constructor(private readonly log: EventLog) {}

  /** Stop with exit code 1 when a component emits `fatal` or `error` */
  watchFailures(source: EventEmitter, event: 'fatal' | 'error', label: string): void {
    source.on(event, (error: Error) => {
      this.log.event('WARN', `${label} error: ${error.message}`);
      this.log.event('WARN', 'Shutting down due to error...');
      this.trigger(1);
    });
  }

  watchSignals(target: EventEmitter = process): void {
    const onSignal = () => {
      this.log.event('WARN', 'Thanks for playing! Stopping threads and exiting...');
      this.trigger(0);
    };
    for (const signal of SHUTDOWN_SIGNALS) {
      target.once(signal, onSignal);
    }
  }

  /** The first trigger decides the exit code */
  trigger(code: number): void {
    if (this.exitCode !== undefined) {
      return;
    }
    this.exitCode = code;
    for (const resolve of this.waiters.splice(0)) {
      resolve(code);
    }
  }

  get triggered(): boolean {
    return this.exitCode !== undefined;
  }

  wait(): Promise<number> {
    const code = this.exitCode;
    if (code !== undefined) {
      return Promise.resolve(code);
    }
    return new Promise((resolve) => this.waiters.push(resolve));
  }
}
