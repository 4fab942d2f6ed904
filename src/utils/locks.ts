type Release = () => void;

export interface LockState {
  readers: number;
  writing: boolean;
  waiting: number;
}

/**
 * Writer-preferring readers/writer lock for async callers. Waiting writers
 * block new readers; a released writer hands over to the next writer before
 * any queued reader.
 */
export class AsyncRWLock {
  #readers = 0;
  #writing = false;
  #queuedReaders: Release[] = [];
  #queuedWriters: Release[] = [];

  get state(): LockState {
    return {
      readers: this.#readers,
      writing: this.#writing,
      waiting: this.#queuedReaders.length + this.#queuedWriters.length,
    };
  }

  acquireRead(): Promise<Release> {
    if (!this.#writing && this.#queuedWriters.length === 0) {
      this.#readers += 1;
      return Promise.resolve(() => this.#releaseRead());
    }
    return new Promise<Release>((resolve) => {
      this.#queuedReaders.push(() => {
        this.#readers += 1;
        resolve(() => this.#releaseRead());
      });
    });
  }

  acquireWrite(): Promise<Release> {
    if (!this.#writing && this.#readers === 0) {
      this.#writing = true;
      return Promise.resolve(() => this.#releaseWrite());
    }
    return new Promise<Release>((resolve) => {
      this.#queuedWriters.push(() => {
        this.#writing = true;
        resolve(() => this.#releaseWrite());
      });
    });
  }

  #releaseRead(): void {
    this.#readers -= 1;
    if (this.#readers === 0) {
      this.#queuedWriters.shift()?.();
    }
  }

  #releaseWrite(): void {
    this.#writing = false;
    const writer = this.#queuedWriters.shift();
    if (writer) {
      writer();
      return;
    }
    const readers = this.#queuedReaders.splice(0);
    for (const reader of readers) {
      reader();
    }
  }
}
