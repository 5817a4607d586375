/**
 * EventEmitter whose event names and listener arguments come from an
 * event map, e.g. `ReminderSchedulerEvents`
 */

import { EventEmitter } from 'events';

export abstract class TypedEventEmitter<
  // eslint-disable-next-line @typescript-eslint/no-explicit-any
  TEvents extends { [K in keyof TEvents]: (...args: any[]) => void }
> extends EventEmitter {
  emit<K extends keyof TEvents>(event: K, ...args: Parameters<TEvents[K]>): boolean {
    return super.emit(String(event), ...args);
  }

  on<K extends keyof TEvents>(event: K, listener: TEvents[K]): this {
    return super.on(String(event), listener);
  }
}
