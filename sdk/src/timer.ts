/**
 * A started one-shot timer.
 */
export type TimerHandle = {
  /** Prevent the callback from running if it has not run yet. */
  readonly cancel: () => void
}

/**
 * Delayed-callback primitive used by the executor to fire bundles on their
 * delay threshold. Swap it out in tests for deterministic firing.
 */
export type Timer = {
  readonly start: <A extends unknown[]>(
    delayMs: number,
    callback: (...args: A) => void,
    ...args: A
  ) => TimerHandle
}

/**
 * Timer backed by setTimeout. An armed timeout keeps the process alive until
 * its bundle has fired.
 */
export const systemTimer: Timer = {
  start(delayMs, callback, ...args) {
    const timeout = setTimeout(callback, delayMs, ...args)
    return {
      cancel() {
        clearTimeout(timeout)
      }
    }
  }
}
