/**
 * Failure tests for combined calls.
 *
 * Goal: Call failures become handle results, never escape the executor,
 * and never affect other bundle ids or later bundles.
 */
import { afterEach, describe, expect, it, vi } from 'vitest'
import { CombinedCallError } from '../../../src/errors'
import { createBundleExecutor } from '../../../src/executor'
import type { ApiCall } from '../../../src/types/bundling'
import {
  createDeferredCall,
  echoIds,
  ManualTimer,
  PUBLISH,
  PUBLISH_DEMUX,
  publishRequest,
  type PublishRequest,
  type PublishResponse
} from '../_harness'

describe('combined call failures', () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('delivers the same CombinedCallError to every caller', async () => {
    const cause = new Error('quota exceeded')
    const failing: ApiCall<PublishRequest, PublishResponse> = () => Promise.reject(cause)
    const executor = createBundleExecutor<PublishRequest, PublishResponse>({
      thresholds: { messageCountThreshold: 2 },
      timer: new ManualTimer()
    })

    const a = executor.schedule(failing, ['orders'], PUBLISH, publishRequest('orders', 'a'))
    const b = executor.schedule(failing, ['orders'], PUBLISH, publishRequest('orders', 'b'))

    await expect(a.response()).rejects.toBeInstanceOf(CombinedCallError)
    await expect(b.response()).rejects.toMatchObject({ cause })
    expect(a.result).toEqual(b.result)
  })

  it('does not throw from schedule when the call throws synchronously', () => {
    const throwing: ApiCall<PublishRequest, PublishResponse> = () => {
      throw new Error('bad request')
    }
    const executor = createBundleExecutor<PublishRequest, PublishResponse>({
      thresholds: { messageCountThreshold: 1 },
      timer: new ManualTimer()
    })

    expect(() =>
      executor.schedule(throwing, ['orders'], PUBLISH, publishRequest('orders', 'a'))
    ).not.toThrow()
  })

  it('keeps the timer path working after a failed bundle', async () => {
    const timer = new ManualTimer()
    let calls = 0
    const flaky: ApiCall<PublishRequest, PublishResponse> = (request) => {
      calls++
      if (calls === 1) throw new Error('transient')
      return echoIds(request)
    }
    const executor = createBundleExecutor<PublishRequest, PublishResponse>({
      thresholds: { delayThresholdMs: 50 },
      timer
    })

    const first = executor.schedule(flaky, ['orders'], PUBLISH, publishRequest('orders', 'a'))
    timer.fireNext()
    await expect(first.response()).rejects.toThrow('Bundled call failed: transient')

    const second = executor.schedule(flaky, ['orders'], PUBLISH, publishRequest('orders', 'b'))
    expect(timer.active).toHaveLength(1)
    timer.fireNext()
    await expect(second.response()).resolves.toEqual({
      messageIds: ['orders:b'],
      server: 'test-server'
    })
  })

  it('isolates failures to their own bundle id', async () => {
    const deferred = createDeferredCall<PublishRequest, PublishResponse>()
    const executor = createBundleExecutor<PublishRequest, PublishResponse>({
      timer: new ManualTimer()
    })

    const orders = executor.schedule(deferred.call, ['orders'], PUBLISH, publishRequest('orders', 'a'))
    const refunds = executor.schedule(deferred.call, ['refunds'], PUBLISH, publishRequest('refunds', 'b'))

    const firedOrders = executor.fire(['orders'])
    const firedRefunds = executor.fire(['refunds'])
    deferred.reject(new Error('orders backend down'))
    deferred.resolve({ messageIds: ['r1'], server: 's1' })
    await Promise.all([firedOrders, firedRefunds])

    expect(orders.result?.ok).toBe(false)
    expect(refunds.result).toEqual({ ok: true, response: { messageIds: ['r1'], server: 's1' } })
  })

  it('fails every caller when the subresponse field is not a list', async () => {
    const broken: ApiCall<PublishRequest, PublishResponse> = () =>
      Object.assign({ messageIds: [], server: 's1' }, { messageIds: 'nope' })
    const executor = createBundleExecutor<PublishRequest, PublishResponse>({
      timer: new ManualTimer()
    })

    const handle = executor.schedule(broken, ['orders'], PUBLISH_DEMUX, publishRequest('orders', 'a'))
    await executor.fire(['orders'])

    await expect(handle.response()).rejects.toThrow(
      'Bundled call failed: Subresponse field "messageIds" must be an array'
    )
  })

  it('writes the demux mismatch warning to stderr by default', async () => {
    const write = vi.spyOn(process.stderr, 'write').mockImplementation(() => true)
    const mismatched: ApiCall<PublishRequest, PublishResponse> = () => ({
      messageIds: [],
      server: 's1'
    })
    const executor = createBundleExecutor<PublishRequest, PublishResponse>({
      timer: new ManualTimer()
    })

    const handle = executor.schedule(mismatched, ['orders'], PUBLISH_DEMUX, publishRequest('orders', 'a'))
    await executor.fire(['orders'])

    expect(handle.result).toEqual({ ok: true, response: { messageIds: [], server: 's1' } })
    expect(write).toHaveBeenCalledWith(
      '[bundlekit] cannot demultiplex the bundled response, got 0 subresponses; want 1, each bundled request will receive all responses\n'
    )
  })
})
