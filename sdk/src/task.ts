import { createCompletionHandle, type CompletionHandle } from './completion'
import { CombinedCallError } from './errors'
import { readList, withField } from './fields'
import { stderrWarn } from './log'
import { msgpackSize } from './size'
import type {
  ApiCall,
  BundleDescriptor,
  BundleId,
  BundleOutcome,
  CallOutcome,
  SizeEstimator,
  WarnFn
} from './types/bundling'

/**
 * Options for creating a bundle task.
 */
export type BundleTaskOptions<Req extends object, Resp extends object> = {
  readonly apiCall: ApiCall<Req, Resp>
  readonly bundleId: BundleId
  readonly descriptor: BundleDescriptor<Req, Resp>
  /** Template for the combined request; the merged messages replace its bundled field. */
  readonly request: Req
  /** Default: MessagePack-encoded length */
  readonly sizeOf?: SizeEstimator
  /** Default: one line on stderr */
  readonly warn?: WarnFn
}

/**
 * Accumulates the message groups of one bundle and runs its combined call
 * exactly once.
 */
export type BundleTask<Resp> = {
  readonly bundleId: BundleId
  /** Total messages across queued groups. */
  readonly messageCount: number
  /** Estimated byte size of all queued messages. */
  readonly messageBytesize: number
  /** True once run() has drained the task. */
  readonly isFired: boolean
  /** Queue a group of messages; the handle receives this group's outcome. */
  readonly extend: (messages: readonly unknown[]) => CompletionHandle<Resp>
  /**
   * Send all queued messages as one call and fulfil every queued handle.
   * Never rejects: call failures become handle results.
   */
  readonly run: () => Promise<void>
}

/**
 * One caller's contribution. Entries are removed by identity, so equal
 * message groups from different callers never cancel each other.
 */
type QueuedGroup<Resp> = {
  readonly messages: readonly unknown[]
  readonly bytesize: number
  readonly handle: CompletionHandle<Resp>
}

export function demuxMismatchMessage(received: number, expected: number): string {
  return (
    `cannot demultiplex the bundled response, got ${received} subresponses; ` +
    `want ${expected}, each bundled request will receive all responses`
  )
}

/**
 * Create a task for one bundle id.
 */
export function createBundleTask<Req extends object, Resp extends object>(
  options: BundleTaskOptions<Req, Resp>
): BundleTask<Resp> {
  const { apiCall, bundleId, descriptor, request } = options
  const sizeOf = options.sizeOf ?? msgpackSize
  const warn = options.warn ?? stderrWarn

  const queue: QueuedGroup<Resp>[] = []
  let fired = false

  function extend(messages: readonly unknown[]): CompletionHandle<Resp> {
    if (fired) {
      throw new Error('Cannot extend a bundle task that has already run')
    }
    let bytesize = 0
    for (const message of messages) {
      bytesize += sizeOf(message)
    }

    const entry: QueuedGroup<Resp> = {
      messages,
      bytesize,
      handle: createCompletionHandle<Resp>(() => {
        const index = queue.indexOf(entry)
        if (index === -1) return false
        queue.splice(index, 1)
        return true
      })
    }
    queue.push(entry)
    return entry.handle
  }

  /**
   * Perform the combined call. The call starts synchronously; both
   * synchronous throws and rejections are captured as a failed outcome.
   */
  function invoke(messages: unknown[]): Promise<CallOutcome<Resp>> {
    return new Promise<Resp>((resolve) => {
      resolve(apiCall(withField(request, descriptor.bundledField, messages)))
    }).then(
      (response): CallOutcome<Resp> => ({ ok: true, response }),
      (error: unknown): CallOutcome<Resp> => ({ ok: false, error })
    )
  }

  function fulfilAll(groups: readonly QueuedGroup<Resp>[], outcome: BundleOutcome<Resp>): void {
    for (const group of groups) {
      group.handle.fulfill(outcome)
    }
  }

  function distribute(groups: readonly QueuedGroup<Resp>[], outcome: CallOutcome<Resp>): void {
    if (!outcome.ok) {
      fulfilAll(groups, { ok: false, error: new CombinedCallError(outcome.error) })
      return
    }

    const { response } = outcome
    const field = descriptor.subresponseField
    if (field === undefined) {
      fulfilAll(groups, outcome)
      return
    }

    const subresponses = readList(response, field)
    if (subresponses === null) {
      const cause = new TypeError(`Subresponse field "${field}" must be an array`)
      fulfilAll(groups, { ok: false, error: new CombinedCallError(cause) })
      return
    }

    const expected = groups.reduce((sum, group) => sum + group.messages.length, 0)
    if (subresponses.length !== expected) {
      warn(demuxMismatchMessage(subresponses.length, expected))
      fulfilAll(groups, outcome)
      return
    }

    let start = 0
    for (const group of groups) {
      const end = start + group.messages.length
      group.handle.fulfill({
        ok: true,
        response: withField(response, field, subresponses.slice(start, end))
      })
      start = end
    }
  }

  return {
    bundleId,

    get messageCount(): number {
      return queue.reduce((sum, group) => sum + group.messages.length, 0)
    },

    get messageBytesize(): number {
      return queue.reduce((sum, group) => sum + group.bytesize, 0)
    },

    get isFired(): boolean {
      return fired
    },

    extend,

    async run(): Promise<void> {
      fired = true
      if (queue.length === 0) return
      // Drain before the call so a cancel during the call reports false
      const groups = queue.splice(0)
      const outcome = await invoke(groups.flatMap((group) => group.messages))
      try {
        distribute(groups, outcome)
      } catch (error) {
        // Handles fulfilled before the throw keep their result
        fulfilAll(groups, { ok: false, error: new CombinedCallError(error) })
      }
    }
  }
}
