/**
 * Serialize protocol exchanges on one connection via a promise chain.
 * The channel, bulk sessions and realtime readers of a connection share one lock,
 * so at most one of them is subscribed and awaiting frames at any time.
 */
export class ExchangeLock {
  private chain: Promise<void> = Promise.resolve();
  private pending = 0;

  /** Number of exchanges running or waiting for the lock. */
  get depth(): number {
    return this.pending;
  }

  run<T>(fn: () => Promise<T>): Promise<T> {
    this.pending++;
    const result = this.chain.then(fn, fn).finally(() => {
      this.pending--;
    });
    // Swallow errors in the chain so one failed exchange doesn't block the next
    this.chain = result.then(
      () => {},
      () => {},
    );
    return result;
  }
}
