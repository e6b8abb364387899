/**
 * Fan-out notifications shared by the workers of one pool.
 *
 * `idleWake` is re-armed after every broadcast, so it only interrupts the idle
 * waits that were in progress when a worker saw a shutdown message. `stop`
 * is one-shot and interrupts idle and retry waits alike.
 */
export class PoolSignals {
  private wakeController = new AbortController();
  private readonly stopController = new AbortController();

  get idleWake(): AbortSignal {
    return this.wakeController.signal;
  }

  get stop(): AbortSignal {
    return this.stopController.signal;
  }

  get isStopped(): boolean {
    return this.stopController.signal.aborted;
  }

  wakeIdleWorkers(): void {
    const current = this.wakeController;
    this.wakeController = new AbortController();
    current.abort();
  }

  forceStop(): void {
    this.stopController.abort();
  }
}
