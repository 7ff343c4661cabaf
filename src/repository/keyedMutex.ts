/** Promise-chained exclusive locks by name, for a single process. */
export class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>();

  async acquire(name: string): Promise<() => void> {
    const previous = this.tails.get(name) ?? Promise.resolve();
    let release: () => void = () => undefined;
    const held = new Promise<void>((resolve) => {
      release = () => resolve();
    });
    const tail = previous.then(() => held);
    this.tails.set(name, tail);

    await previous;

    return () => {
      release();
      if (this.tails.get(name) === tail) {
        this.tails.delete(name);
      }
    };
  }

  /** Takes the locks one by one in the order given and returns a single release for all of them. */
  async acquireAll(names: readonly string[]): Promise<() => void> {
    const releases: Array<() => void> = [];
    for (const name of names) {
      releases.push(await this.acquire(name));
    }

    return () => {
      for (const release of releases.reverse()) release();
    };
  }
}
