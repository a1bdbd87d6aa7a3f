/**
 * FIFO async lock. Callers queue behind whoever holds it; there is no timeout and no
 * re-entrancy, so code already inside `run` must not call `run` again.
 */
export class SessionLock {
  private tail: Promise<void> = Promise.resolve();
  private held = false;

  get isHeld() {
    return this.held;
  }

  run<T>(task: () => Promise<T>): Promise<T> {
    const previous = this.tail;
    let release: () => void = () => undefined;
    this.tail = new Promise<void>((resolve) => {
      release = resolve;
    });

    return previous.then(async () => {
      this.held = true;
      try {
        return await task();
      } finally {
        this.held = false;
        release();
      }
    });
  }
}
