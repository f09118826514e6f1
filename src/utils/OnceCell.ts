/**
 * Initialize-once cell for async resources.
 *
 * Concurrent callers share a single in-flight initialization. A rejected
 * initialization is forgotten so the next caller starts a fresh attempt.
 */
export class OnceCell<T> {
  private promise: Promise<T> | null = null;
  private _initialized = false;

  get initialized(): boolean {
    return this._initialized;
  }

  getOrInit(init: () => Promise<T>): Promise<T> {
    if (!this.promise) {
      const attempt = init().then(
        (value) => {
          this._initialized = true;
          return value;
        },
        (error: unknown) => {
          if (this.promise === attempt) {
            this.promise = null;
          }
          throw error;
        }
      );
      this.promise = attempt;
    }

    return this.promise;
  }
}
