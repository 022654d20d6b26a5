// Per-key mutex used to serialize writes to one resource (a history file,
// the Spotify token refresh). A Map<key, Promise> acts as a chain: each run()
// attaches to the end of the chain, so tasks for a key execute FIFO.

export type MutexTask<T> = () => Promise<T> | T;

export class KeyedMutex {
  private chains = new Map<string, Promise<unknown>>();

  async run<T>(key: string, task: MutexTask<T>): Promise<T> {
    const prev = this.chains.get(key) ?? Promise.resolve();

    let release: () => void = () => undefined;
    const done = new Promise<void>((resolve) => {
      release = resolve;
    });

    const chain = prev.then(() => done);
    this.chains.set(key, chain);

    try {
      await prev;
      return await task();
    } finally {
      release();
      if (this.chains.get(key) === chain) {
        this.chains.delete(key);
      }
    }
  }
}
