/**
 * A promise that is settled from the outside, at most once.
 *
 * Later calls to `resolve` or `reject` are ignored and report `false`, so a
 * duplicate terminator for the same request cannot change its outcome.
 */
export class Deferred<T> {
  readonly promise: Promise<T>;
  private settle: { resolve: (value: T) => void; reject: (reason: Error) => void } | null = null;
  private done = false;

  constructor() {
    this.promise = new Promise<T>((resolve, reject) => {
      this.settle = { resolve, reject };
    });
  }

  get settled(): boolean {
    return this.done;
  }

  resolve(value: T): boolean {
    if (this.done || !this.settle) {
      return false;
    }
    this.done = true;
    this.settle.resolve(value);
    return true;
  }

  reject(reason: Error): boolean {
    if (this.done || !this.settle) {
      return false;
    }
    this.done = true;
    this.settle.reject(reason);
    return true;
  }
}
