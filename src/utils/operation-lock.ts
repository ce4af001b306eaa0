// Per-key FIFO operation lock.
// Operations queued under the same key run one at a time in the order they
// were submitted; different keys never wait on each other.

export class OperationLock {
  private tails: Map<string, Promise<void>> = new Map();

  /**
   * Runs `operation` once every earlier operation for `key` has settled.
   * The returned promise settles with the operation's own outcome; a failure
   * does not block the operations queued behind it.
   */
  async run<T>(key: string, operation: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    let release: () => void = () => {};
    const turn = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => turn);
    this.tails.set(key, tail);

    await previous;
    try {
      return await operation();
    } finally {
      release();
      // Drop the entry once nothing else has queued behind this operation
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }
}
