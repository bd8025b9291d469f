export type ScheduledTask = (signal: AbortSignal) => Promise<void>;

/**
 * Runs the dispatches of one connection strictly one after another, in arrival order. Closing the
 * connection aborts the running task's signal and drops tasks that have not started.
 */
export class ConnectionScheduler {
  public readonly connectionId: string;
  private readonly controller = new AbortController();
  private readonly onTaskError: (error: unknown) => void;
  private tail: Promise<void> = Promise.resolve();
  private queued = 0;

  public constructor({connectionId, onTaskError}: {connectionId: string; onTaskError: (error: unknown) => void}) {
    this.connectionId = connectionId;
    this.onTaskError = onTaskError;
  }

  public get signal() {
    return this.controller.signal;
  }

  public get closed() {
    return this.controller.signal.aborted;
  }

  /** Tasks scheduled or running. */
  public get pending() {
    return this.queued;
  }

  /** Resolves once the task ran, failed or was dropped. */
  public schedule(task: ScheduledTask): Promise<void> {
    this.queued += 1;
    const run = this.tail.then(async () => {
      try {
        if (!this.closed) {
          await task(this.controller.signal);
        }
      } catch (error) {
        this.onTaskError(error);
      } finally {
        this.queued -= 1;
      }
    });

    this.tail = run;
    return run;
  }

  public close() {
    if (!this.closed) {
      this.controller.abort();
    }
  }
}
