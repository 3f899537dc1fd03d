/**
 * Background work scheduled after a response is ready (log shipping).
 */
export interface ExecutionContext {
  waitUntil(promise: Promise<unknown>): void;
}

/**
 * Tracks background promises so shutdown can wait for them to settle.
 */
export class BackgroundTasks implements ExecutionContext {
  private pending = new Set<Promise<void>>();

  waitUntil(promise: Promise<unknown>): void {
    const tracked: Promise<void> = promise
      .then(
        () => undefined,
        (error: unknown) => {
          console.error(
            JSON.stringify({
              timestamp: new Date().toISOString(),
              level: "ERROR",
              message: "Background task failed",
              error: error instanceof Error ? error.message : String(error),
            })
          );
        }
      )
      .finally(() => {
        this.pending.delete(tracked);
      });
    this.pending.add(tracked);
  }

  get size(): number {
    return this.pending.size;
  }

  async drain(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.all([...this.pending]);
    }
  }
}
