/**
 * Per-identity turn serialization.
 *
 * Turns for the same identity run one after another in arrival order;
 * turns for different identities run concurrently. The session store's
 * read-merge-write cycle relies on this.
 */
export class TurnQueue {
  private readonly tails = new Map<string, Promise<void>>();

  /** Run `task` after every earlier task queued under `key` has settled. */
  enqueue<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const run = previous.then(task);
    const tail = run.then(
      () => undefined,
      () => undefined,
    );
    this.tails.set(key, tail);
    void tail.then(() => {
      if (this.tails.get(key) === tail) this.tails.delete(key);
    });
    return run;
  }

  /** Resolves once every turn queued so far has settled */
  async onIdle(): Promise<void> {
    while (this.tails.size > 0) {
      await Promise.all(this.tails.values());
    }
  }

  /** Identities with queued or running turns */
  get activeKeys(): number {
    return this.tails.size;
  }
}
