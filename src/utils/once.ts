/**
 * Once-only async computation.
 *
 * The first caller starts `compute`; concurrent callers share the same
 * in-flight promise, later callers get the cached value straight from the
 * `done` fast path. A rejected computation is not cached: the next caller
 * starts a fresh attempt.
 */
export class Once<T> {
  private done = false;
  private result: { value: T } | null = null;
  private inFlight: Promise<T> | null = null;
  private runs = 0;

  constructor(private readonly compute: () => Promise<T>) {}

  get isDone(): boolean {
    return this.done;
  }

  /** Number of times `compute` has actually been started */
  get runCount(): number {
    return this.runs;
  }

  get(): Promise<T> {
    if (this.done && this.result) return Promise.resolve(this.result.value);
    if (!this.inFlight) {
      this.runs++;
      this.inFlight = this.compute().then(
        value => {
          this.result = { value };
          this.done = true;
          return value;
        },
        (e: unknown) => {
          this.inFlight = null;
          throw e;
        },
      );
    }
    return this.inFlight;
  }
}
