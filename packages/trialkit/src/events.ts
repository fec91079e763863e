export type Listener<T> = (arg: T) => void;

/**
 * Ordered list of listeners, invoked synchronously at the transition point.
 * A throwing listener stops the dispatch and the error reaches the caller.
 */
export class EventList<T> {
  private listeners: Listener<T>[] = [];

  /** Register a listener; returns a function that removes it again. */
  add(listener: Listener<T>): () => void {
    this.listeners.push(listener);
    return () => this.remove(listener);
  }

  remove(listener: Listener<T>): void {
    const idx = this.listeners.indexOf(listener);
    if (idx >= 0) this.listeners.splice(idx, 1);
  }

  get size(): number {
    return this.listeners.length;
  }

  invoke(arg: T): void {
    // copy so a listener that unsubscribes mid-dispatch doesn't skip its neighbour
    for (const listener of [...this.listeners]) {
      listener(arg);
    }
  }
}
