type Listener<T> = (value: T) => void;

/**
 * Value holder with synchronous change notification. Listeners run in
 * subscription order before `set` returns.
 */
export class ObservableValue<T> {
  private value: T;
  private listeners: Set<Listener<T>> = new Set();
  private isDisposed = false;

  constructor(initial: T) {
    this.value = initial;
  }

  get disposed(): boolean {
    return this.isDisposed;
  }

  get(): T {
    return this.value;
  }

  set(next: T) {
    if (this.isDisposed || Object.is(this.value, next)) return;
    this.value = next;
    this.notify();
  }

  subscribe(listener: Listener<T>): () => void {
    if (this.isDisposed) return () => {};
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  dispose() {
    this.isDisposed = true;
    this.listeners.clear();
  }

  private notify() {
    // A listener may set again; the rest of this round still gets this value
    const value = this.value;
    // Snapshot so a listener that unsubscribes mid-notify doesn't skip a sibling
    for (const listener of [...this.listeners]) {
      try {
        listener(value);
      } catch (err) {
        console.error("[observable-value] Listener error:", err);
      }
    }
  }
}

/** The visibility flag of a single popup, as handed to the host. */
export type VisibilityHandle = ObservableValue<boolean>;
