interface Deferred {
  promise: Promise<void>;
  resolve: () => void;
}

function createDeferred(): Deferred {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

/**
 * One-shot completion signal.
 * A single writer calls signal(); any number of readers await wait().
 * Signalling twice is a no-op. reset() arms it again for the next cycle.
 */
export class Latch {
  private deferred = createDeferred();
  private signalled = false;

  get isSignalled(): boolean {
    return this.signalled;
  }

  signal(): void {
    if (this.signalled) return;
    this.signalled = true;
    this.deferred.resolve();
  }

  wait(): Promise<void> {
    return this.deferred.promise;
  }

  reset(): void {
    this.signalled = false;
    this.deferred = createDeferred();
  }
}
