import { bundleKey } from './bundle-id'
import type { CompletionHandle } from './completion'
import { BundledFieldError } from './errors'
import { readList, withField } from './fields'
import { stderrWarn } from './log'
import { msgpackSize } from './size'
import { createBundleTask, type BundleTask } from './task'
import { systemTimer, type Timer, type TimerHandle } from './timer'
import type {
  ApiCall,
  BundleDescriptor,
  BundleId,
  BundleOptions,
  SizeEstimator,
  WarnFn
} from './types/bundling'

/**
 * Thresholds used when none are given: every trigger disabled.
 * With all three disabled, bundles only fire through fire() or flush().
 */
export const DEFAULT_BUNDLE_OPTIONS: Required<BundleOptions> = {
  messageCountThreshold: 0,
  messageBytesizeThreshold: 0,
  delayThresholdMs: 0
}

/**
 * Options for creating a bundle executor.
 */
export type ExecutorOptions = {
  readonly thresholds?: BundleOptions
  /** Delayed-callback primitive for the delay threshold. Default: setTimeout */
  readonly timer?: Timer
  /** Clock in milliseconds, used to re-arm the delay timer. Default: Date.now */
  readonly now?: () => number
  /** Per-message size estimate for the bytesize threshold. Default: MessagePack length */
  readonly sizeOf?: SizeEstimator
  /** Sink for soft failures. Default: stderr */
  readonly warn?: WarnFn
}

/**
 * Registry of in-flight bundles for one API method.
 *
 * Each bundle id maps to at most one live task. Firing removes the task, so
 * the next schedule() for that id starts a fresh bundle.
 */
export type BundleExecutor<Req extends object, Resp extends object> = {
  /**
   * Add the messages in `request[descriptor.bundledField]` to the bundle for
   * `bundleId`, firing it immediately if a count or size threshold is reached.
   *
   * @throws BundledFieldError if the bundled field is not an array
   */
  readonly schedule: (
    apiCall: ApiCall<Req, Resp>,
    bundleId: BundleId,
    descriptor: BundleDescriptor<Req, Resp>,
    request: Req
  ) => CompletionHandle<Resp>
  /**
   * Remove and run the bundle for `bundleId`. No-op if it is not live.
   * Resolves once every handle in the bundle has been fulfilled.
   */
  readonly fire: (bundleId: BundleId) => Promise<void>
  /**
   * Disarm the delay timer and fire every live bundle. Resolves once those
   * bundles, and any fired earlier whose call is still in flight, are
   * distributed.
   */
  readonly flush: () => Promise<void>
  /** Number of live (unfired) bundles. */
  readonly pending: number
}

type LiveBundle<Resp> = {
  readonly task: BundleTask<Resp>
  readonly createdAt: number
}

/**
 * Merge thresholds over the defaults and validate them.
 * Zero or negative values disable a trigger; non-finite values are rejected.
 */
export function resolveBundleOptions(options?: BundleOptions): Required<BundleOptions> {
  const resolved: Required<BundleOptions> = {
    messageCountThreshold:
      options?.messageCountThreshold ?? DEFAULT_BUNDLE_OPTIONS.messageCountThreshold,
    messageBytesizeThreshold:
      options?.messageBytesizeThreshold ?? DEFAULT_BUNDLE_OPTIONS.messageBytesizeThreshold,
    delayThresholdMs: options?.delayThresholdMs ?? DEFAULT_BUNDLE_OPTIONS.delayThresholdMs
  }
  const entries: Array<[keyof BundleOptions, number]> = [
    ['messageCountThreshold', resolved.messageCountThreshold],
    ['messageBytesizeThreshold', resolved.messageBytesizeThreshold],
    ['delayThresholdMs', resolved.delayThresholdMs]
  ]
  for (const [name, value] of entries) {
    if (!Number.isFinite(value)) {
      throw new RangeError(`BundleOptions "${name}" must be a finite number, got ${value}`)
    }
  }
  return resolved
}

/**
 * Create a bundle executor.
 *
 * All bookkeeping (lookup, creation, removal, timer arming) is synchronous,
 * so it cannot interleave with another schedule() or timer callback. The
 * combined call itself runs after its task has left the registry and never
 * blocks scheduling for the same id.
 *
 * A single delay timer is shared by the executor. It is armed for one
 * bundle at a time; once that bundle fires, the timer is re-armed for the
 * oldest remaining bundle with whatever is left of its delay.
 */
export function createBundleExecutor<Req extends object, Resp extends object>(
  options: ExecutorOptions = {}
): BundleExecutor<Req, Resp> {
  const thresholds = resolveBundleOptions(options.thresholds)
  const timer = options.timer ?? systemTimer
  const now = options.now ?? Date.now
  const sizeOf = options.sizeOf ?? msgpackSize
  const warn = options.warn ?? stderrWarn

  const bundles = new Map<string, LiveBundle<Resp>>()
  let armed: { readonly key: string; readonly handle: TimerHandle } | null = null
  // Runs started by a threshold or the timer, awaited by flush()
  const inFlight = new Set<Promise<void>>()

  function arm(key: string, createdAt: number): void {
    if (armed !== null || thresholds.delayThresholdMs <= 0) return
    const remaining = Math.max(0, createdAt + thresholds.delayThresholdMs - now())
    armed = { key, handle: timer.start(remaining, onTimer, key) }
  }

  function disarm(): void {
    if (armed === null) return
    armed.handle.cancel()
    armed = null
  }

  function rearm(): void {
    // Map iteration order is insertion order: the first live bundle is the oldest
    for (const [key, bundle] of bundles) {
      arm(key, bundle.createdAt)
      return
    }
  }

  function onTimer(key: string): void {
    if (armed !== null && armed.key === key) armed = null
    // run() never rejects; call failures land in the handles
    void fireKey(key)
    rearm()
  }

  function fireKey(key: string): Promise<void> {
    const bundle = bundles.get(key)
    if (bundle === undefined) return Promise.resolve()
    bundles.delete(key)
    if (armed !== null && armed.key === key) {
      disarm()
      rearm()
    }
    return track(bundle.task.run())
  }

  function track(running: Promise<void>): Promise<void> {
    inFlight.add(running)
    void running.then(() => {
      inFlight.delete(running)
    })
    return running
  }

  function bundleFor(
    key: string,
    apiCall: ApiCall<Req, Resp>,
    bundleId: BundleId,
    descriptor: BundleDescriptor<Req, Resp>,
    request: Req
  ): BundleTask<Resp> {
    const live = bundles.get(key)
    if (live !== undefined) return live.task

    const task = createBundleTask<Req, Resp>({
      apiCall,
      bundleId,
      descriptor,
      request: withField(request, descriptor.bundledField, []),
      sizeOf,
      warn
    })
    const createdAt = now()
    bundles.set(key, { task, createdAt })
    arm(key, createdAt)
    return task
  }

  return {
    schedule(apiCall, bundleId, descriptor, request) {
      const messages = readList(request, descriptor.bundledField)
      if (messages === null) {
        throw new BundledFieldError(
          descriptor.bundledField,
          Reflect.get(request, descriptor.bundledField)
        )
      }

      const key = bundleKey(bundleId)
      const task = bundleFor(key, apiCall, bundleId, descriptor, request)
      const handle = task.extend(messages)

      const countReached =
        thresholds.messageCountThreshold > 0 &&
        task.messageCount >= thresholds.messageCountThreshold
      const sizeReached =
        thresholds.messageBytesizeThreshold > 0 &&
        task.messageBytesize >= thresholds.messageBytesizeThreshold
      if (countReached || sizeReached) {
        void fireKey(key)
      }

      return handle
    },

    fire(bundleId: BundleId): Promise<void> {
      return fireKey(bundleKey(bundleId))
    },

    async flush(): Promise<void> {
      disarm()
      const live = [...bundles.values()]
      bundles.clear()
      for (const bundle of live) {
        track(bundle.task.run())
      }
      await Promise.all(inFlight)
    },

    get pending(): number {
      return bundles.size
    }
  }
}
