/**
 * Verrou exclusif basé sur une chaîne de promesses.
 *
 * Usage:
 *   const release = await lock.acquire();
 *   try { ... } finally { release(); }
 */
export class Lock {
  private tail: Promise<void> = Promise.resolve();

  acquire(): Promise<() => void> {
    let release: () => void = () => {};
    const next = new Promise<void>((resolve) => {
      release = resolve;
    });
    const previous = this.tail;
    this.tail = next;
    return previous.then(() => once(release));
  }

  /** Exécute `fn` sous verrou; le verrou est relâché même si `fn` échoue. */
  async runExclusive<T>(fn: () => Promise<T> | T): Promise<T> {
    const release = await this.acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }
}

function once(fn: () => void): () => void {
  let done = false;
  return () => {
    if (done) return;
    done = true;
    fn();
  };
}
