/**
 * Holds at most one value. The first `offer` wins; later offers are
 * rejected. `take` waits for that value or gives up after a timeout.
 */
export class SingleSlot<T> {
  private value: T | undefined;
  private filled = false;
  private readonly waiters: Array<(value: T) => void> = [];

  offer(value: T): boolean {
    if (this.filled) {
      return false;
    }
    this.filled = true;
    this.value = value;
    for (const waiter of this.waiters.splice(0)) {
      waiter(value);
    }
    return true;
  }

  take(timeoutMs: number): Promise<T | undefined> {
    if (this.filled) {
      return Promise.resolve(this.value);
    }

    return new Promise((resolve) => {
      const waiter = (value: T): void => {
        clearTimeout(timer);
        resolve(value);
      };
      const timer = setTimeout(() => {
        const index = this.waiters.indexOf(waiter);
        if (index >= 0) {
          this.waiters.splice(index, 1);
        }
        resolve(undefined);
      }, Math.max(0, timeoutMs));
      this.waiters.push(waiter);
    });
  }
}
