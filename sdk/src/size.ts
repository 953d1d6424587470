import { encode } from '@msgpack/msgpack'
import type { SizeEstimator } from './types/bundling'

/**
 * Default size estimator: the MessagePack-encoded length of the message.
 *
 * Values MessagePack cannot encode (e.g. symbols, bigints beyond int64)
 * are measured as the UTF-8 length of their string form instead.
 */
export const msgpackSize: SizeEstimator = (message) => {
  try {
    return encode(message).byteLength
  } catch {
    return Buffer.byteLength(String(message), 'utf8')
  }
}
