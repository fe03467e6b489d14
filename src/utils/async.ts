/**
 * Async Utility Functions
 *
 * Cooperative cancellation and bounded concurrency for dry runs.
 *
 * @module
 */

// =============================================================================
// Sleep
// =============================================================================

/**
 * Returns a promise that resolves after the specified duration.
 *
 * @param ms - Duration in milliseconds
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

// =============================================================================
// Cancellation
// =============================================================================

/**
 * A token that can be used to cancel async operations.
 * Follows the cancellation token pattern for cooperative cancellation.
 */
export class CancellationToken {
  private _cancelled = false;
  private _reason?: string;
  private listeners: Array<() => void> = [];

  /** A token that is never cancelled */
  static readonly none: CancellationToken = new CancellationToken();

  /** Whether the token has been cancelled */
  get cancelled(): boolean {
    return this._cancelled;
  }

  /** The reason for cancellation (if any) */
  get reason(): string | undefined {
    return this._reason;
  }

  /**
   * Cancels the token, notifying all listeners.
   *
   * @param reason - Optional reason for cancellation
   */
  cancel(reason?: string): void {
    if (this === CancellationToken.none) return;
    if (!this._cancelled) {
      this._cancelled = true;
      this._reason = reason;
      const listeners = this.listeners;
      this.listeners = [];
      listeners.forEach((fn) => fn());
    }
  }

  /**
   * Registers a callback to be called when the token is cancelled.
   * If already cancelled, the callback is invoked immediately.
   *
   * @returns Unsubscribe function
   */
  onCancel(fn: () => void): () => void {
    if (this._cancelled) {
      fn();
      return () => {};
    }
    this.listeners.push(fn);
    return () => {
      const idx = this.listeners.indexOf(fn);
      if (idx >= 0) this.listeners.splice(idx, 1);
    };
  }

  /**
   * Throws an error if the token has been cancelled.
   * Use this for cooperative cancellation checks.
   */
  throwIfCancelled(): void {
    if (this._cancelled) {
      throw new CancelledError(this._reason ?? "Operation cancelled");
    }
  }
}

/**
 * Thrown by {@link CancellationToken.throwIfCancelled}
 */
export class CancelledError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CancelledError";
  }
}

/**
 * A CancellationToken source that owns and can cancel a token.
 * A source created with a parent token is cancelled together with it.
 */
export class CancellationTokenSource {
  readonly token: CancellationToken;
  private unlink: () => void = () => {};

  constructor(parent?: CancellationToken) {
    this.token = new CancellationToken();
    if (parent) {
      this.unlink = parent.onCancel(() => this.cancel(parent.reason));
    }
  }

  /**
   * Cancels the associated token.
   *
   * @param reason - Optional reason for cancellation
   */
  cancel(reason?: string): void {
    this.token.cancel(reason);
  }

  /** Detaches from the parent token */
  dispose(): void {
    this.unlink();
    this.unlink = () => {};
  }
}

// =============================================================================
// Concurrency Utilities
// =============================================================================

/**
 * Runs `fn` over `items` with at most `concurrency` calls in flight, waiting
 * for every item and reporting each outcome. Results keep the order of `items`.
 */
export async function settleConcurrent<T, U>(
  items: readonly T[],
  fn: (item: T, index: number) => Promise<U>,
  concurrency: number
): Promise<PromiseSettledResult<U>[]> {
  const results: PromiseSettledResult<U>[] = new Array(items.length);
  const queue = items.map((item, index) => [item, index] as const);

  async function worker(): Promise<void> {
    for (let next = queue.shift(); next !== undefined; next = queue.shift()) {
      const [item, index] = next;
      try {
        results[index] = { status: "fulfilled", value: await fn(item, index) };
      } catch (reason) {
        results[index] = { status: "rejected", reason };
      }
    }
  }

  const workers = Array(Math.max(1, Math.min(concurrency, items.length)))
    .fill(null)
    .map(() => worker());

  await Promise.all(workers);
  return results;
}
