import { EventEmitter } from 'node:events';

/**
 * Holds the latest state of a component and notifies subscribers on change.
 * New subscribers receive the current state immediately.
 */
export class StateChannel<T> {
  private readonly emitter = new EventEmitter();
  private current: T;

  constructor(initial: T) {
    this.current = initial;
  }

  get value(): T {
    return this.current;
  }

  publish(next: T): void {
    this.current = next;
    this.emitter.emit('state', next);
  }

  /**
   * @returns Function that removes the subscription
   */
  subscribe(listener: (state: T) => void): () => void {
    this.emitter.on('state', listener);
    listener(this.current);
    return () => {
      this.emitter.off('state', listener);
    };
  }
}
