import type { BundleOutcome } from './types/bundling'

/**
 * The outcome of one caller's contribution to a bundle.
 *
 * Pending until the owning task runs, then fulfilled exactly once with
 * either the (possibly demultiplexed) response or a CombinedCallError whose
 * `cause` is the error the call threw.
 * A handle whose contribution was cancelled stays pending forever.
 */
export type CompletionHandle<Resp> = {
  /** The delivered outcome, or undefined while pending. */
  readonly result: BundleOutcome<Resp> | undefined
  /**
   * Wait until fulfilled. Resolves false if `timeoutMs` elapses first.
   * Waiting never affects the bundle; call cancel() to withdraw.
   */
  readonly wait: (timeoutMs?: number) => Promise<boolean>
  readonly isFulfilled: () => boolean
  /** Set the outcome and wake waiters. Later calls are ignored. */
  readonly fulfill: (outcome: BundleOutcome<Resp>) => void
  /** Return to pending, dropping any result. */
  readonly reset: () => void
  /**
   * Withdraw this contribution from its bundle.
   * Returns false if the bundle already fired or no canceller is bound.
   */
  readonly cancel: () => boolean
  /** Wait for the outcome and unwrap it, rejecting with the delivered error. */
  readonly response: () => Promise<Resp>
}

/**
 * Create a pending completion handle.
 *
 * @param canceller - Removes the contribution from its task; returns whether it did
 */
export function createCompletionHandle<Resp>(canceller?: () => boolean): CompletionHandle<Resp> {
  let result: BundleOutcome<Resp> | undefined
  let wake: () => void = () => {}
  let fulfilled = createSignal()

  function createSignal(): Promise<void> {
    return new Promise<void>((resolve) => {
      wake = resolve
    })
  }

  async function wait(timeoutMs?: number): Promise<boolean> {
    if (result !== undefined) return true
    if (timeoutMs === undefined) {
      await fulfilled
      return true
    }

    let timeout: NodeJS.Timeout | undefined
    const expired = new Promise<false>((resolve) => {
      timeout = setTimeout(resolve, Math.max(0, timeoutMs), false)
    })
    try {
      return await Promise.race([fulfilled.then(() => true), expired])
    } finally {
      clearTimeout(timeout)
    }
  }

  return {
    get result(): BundleOutcome<Resp> | undefined {
      return result
    },

    wait,

    isFulfilled(): boolean {
      return result !== undefined
    },

    fulfill(outcome: BundleOutcome<Resp>): void {
      if (result !== undefined) return
      result = outcome
      wake()
    },

    reset(): void {
      if (result === undefined) return
      result = undefined
      fulfilled = createSignal()
    },

    cancel(): boolean {
      return canceller !== undefined ? canceller() : false
    },

    async response(): Promise<Resp> {
      let outcome = result
      // Loop: a reset between wake-up and here leaves nothing to unwrap.
      while (outcome === undefined) {
        await wait()
        outcome = result
      }
      if (!outcome.ok) throw outcome.error
      return outcome.response
    }
  }
}
