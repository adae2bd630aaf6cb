/**
 * Single-slot channel: writers overwrite, readers see the most recent value.
 * Reads and writes happen on the event loop, so each one is atomic.
 */
export class LatestValueChannel<T> {
  private value: T;

  constructor(initial: T) {
    this.value = initial;
  }

  write(value: T): void {
    this.value = value;
  }

  read(): T {
    return this.value;
  }
}
